import { spawn } from "node:child_process";
import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { delimiter, join } from "node:path";
import { MissingResourceError } from "../service/common/errors.ts";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  file: string,
  args: string[],
  options?: { timeoutMs?: number },
) => Promise<CommandResult>;

/**
 * Runs a command to completion and collects its output. A non-zero exit code
 * is not an error; callers decide what it means.
 *
 * @throws {MissingResourceError} when the executable doesn't exist
 */
export const runCommand: CommandRunner = (file, args, options = {}) => {
  const child = spawn(file, args, {
    stdio: ["ignore", "pipe", "pipe"],
    timeout: options.timeoutMs,
  });

  let stdout = "";
  let stderr = "";
  child.stdout.on("data", (chunk) => (stdout += chunk.toString()));
  child.stderr.on("data", (chunk) => (stderr += chunk.toString()));

  return new Promise((resolve, reject) => {
    child.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "ENOENT") {
        reject(new MissingResourceError(file, error));
      } else {
        reject(error);
      }
    });
    child.on("close", (code) => {
      // `code` is null when the timeout or a signal killed the process
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
  });
};

/**
 * Looks for an executable named `name` on the search path, like `command -v`.
 */
export async function commandExists(
  name: string,
  pathEnv: string = process.env.PATH ?? "",
): Promise<boolean> {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    const found = await access(candidate, constants.X_OK)
      .then(() => stat(candidate))
      .then(
        (info) => info.isFile(),
        () => false,
      );
    if (found) {
      return true;
    }
  }
  return false;
}
