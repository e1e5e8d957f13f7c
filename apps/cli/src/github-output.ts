import { appendFile } from "node:fs/promises";

/**
 * Append `name=value` lines to the file named by GITHUB_OUTPUT.
 * Values must be single-line.
 */
export async function appendGithubOutput(path: string, outputs: Record<string, string>): Promise<void> {
  const lines = Object.entries(outputs).map(([name, value]) => {
    if (/[\r\n]/.test(value)) {
      throw new Error(`Output "${name}" must be a single line`);
    }
    return `${name}=${value}\n`;
  });
  await appendFile(path, lines.join(""), "utf-8");
}
