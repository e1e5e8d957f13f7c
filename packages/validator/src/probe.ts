import { createLogger } from "@cursor-bin/logger";
import { DEFAULT_TIMEOUTS, formatError, type ValidationCheck, type ValidationReport } from "@cursor-bin/core";

const log = createLogger("validator:probe");

const DEB_SOURCE_RE = /^source=\(\s*['"]?(https:\/\/[^'"\s)]+\.deb)/m;

export interface ProbeOptions {
  /** Defaults to the first `.deb` source of the report's recipe */
  url?: string;
  timeoutMs?: number;
}

/** First `.deb` source entry of a recipe, if any. */
export function findDownloadUrl(content: string): string | null {
  return DEB_SOURCE_RE.exec(content)?.[1] ?? null;
}

async function probe(url: string, timeoutMs: number): Promise<Pick<ValidationCheck, "status" | "message">> {
  try {
    const response = await fetch(url, {
      method: "HEAD",
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
    return response.ok
      ? { status: "pass", message: `Download URL is reachable (HTTP ${response.status})` }
      : { status: "fail", message: `Download URL returned HTTP ${response.status}` };
  } catch (error) {
    return { status: "fail", message: `Download URL is unreachable: ${formatError(error)}` };
  }
}

/**
 * Append the advisory `download_reachable` check. The overall result of
 * the report is left as it was.
 */
export async function probeDownload(report: ValidationReport, options: ProbeOptions = {}): Promise<ValidationReport> {
  const url = options.url ?? findDownloadUrl(report.recipeContent);
  const outcome = url
    ? await probe(url, options.timeoutMs ?? DEFAULT_TIMEOUTS.probeMs)
    : { status: "fail" as const, message: "No .deb source URL found" };

  if (outcome.status === "fail") {
    log.warn(outcome.message);
  }

  return {
    ...report,
    checks: [...report.checks, { name: "download_reachable", ...outcome, advisory: true }],
  };
}
