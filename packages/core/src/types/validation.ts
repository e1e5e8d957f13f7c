export type CheckStatus = "pass" | "fail";

export interface ValidationCheck {
  name: string;
  status: CheckStatus;
  message: string;
  /** Advisory checks are reported but never fail the validation */
  advisory: boolean;
}

export interface ValidationReport {
  validationSuccessful: boolean;
  checks: ValidationCheck[];
  errors: string[];
  recipeContent: string;
}

export interface ValidationSummary {
  total: number;
  passed: number;
  failed: number;
  advisory: number;
  /** Share of passed checks, 0-100 rounded to one decimal */
  passRate: number;
}
