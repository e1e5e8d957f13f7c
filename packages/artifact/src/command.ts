import { execFile } from "node:child_process";

export interface CommandOptions {
  cwd: string;
  timeoutMs: number;
}

/** Runs an external tool to completion; rejects on non-zero exit or timeout. */
export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<void>;

export const runCommand: CommandRunner = (command, args, options) =>
  new Promise<void>((resolve, reject) => {
    execFile(
      command,
      args,
      { cwd: options.cwd, timeout: options.timeoutMs, encoding: "utf8" },
      (error, _stdout, stderr) => {
        if (error) {
          const detail = stderr.trim() || error.message;
          reject(new Error(`${command} ${args.join(" ")} failed: ${detail}`));
          return;
        }
        resolve();
      },
    );
  });
