import type { ValidationReport, ValidationSummary } from "@cursor-bin/core";

export const REPORT_START = "=== PKGBUILD_VALIDATION_START ===";
export const REPORT_END = "=== PKGBUILD_VALIDATION_END ===";

export function summarizeReport(report: ValidationReport): ValidationSummary {
  const total = report.checks.length;
  const passed = report.checks.filter((check) => check.status === "pass").length;
  return {
    total,
    passed,
    failed: total - passed,
    advisory: report.checks.filter((check) => check.advisory).length,
    passRate: total === 0 ? 0 : Math.round((passed / total) * 1000) / 10,
  };
}

/** The report framed by sentinel lines, for log scrapers. */
export function formatReportBlock(report: ValidationReport): string {
  const summary = summarizeReport(report);
  const body = {
    validation_successful: report.validationSuccessful,
    checks: report.checks.map((check) => ({
      check: check.name,
      status: check.status,
      message: check.message,
      advisory: check.advisory,
    })),
    errors: report.errors,
    summary: {
      total: summary.total,
      passed: summary.passed,
      failed: summary.failed,
      advisory: summary.advisory,
      pass_rate: summary.passRate,
    },
    pkgbuild_content: report.recipeContent,
  };
  return [REPORT_START, JSON.stringify(body, null, 2), REPORT_END].join("\n");
}
