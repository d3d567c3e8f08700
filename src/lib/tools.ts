import { readFile } from "node:fs/promises";
import { machine } from "node:os";
import type { DiagnosticConfig } from "./env.ts";
import { GpgCli, type GpgTool } from "./gpg.ts";
import { FetchHttpClient, type HttpClient } from "./http.ts";
import {
  commandExists,
  runCommand,
  type CommandResult,
  type CommandRunner,
} from "./process.ts";

/**
 * The deprecated `apt-key` command, which manages the system-wide trust store
 */
export interface LegacyKeyTool {
  list(): Promise<CommandResult>;
}

export interface SystemInfo {
  arch(): string;
  /**
   * @returns the file's contents, or `undefined` if it can't be read
   */
  readOsRelease(path: string): Promise<string | undefined>;
}

/**
 * The external capabilities the checklist relies on. A capability is `null`
 * when it isn't available on this system.
 */
export type Toolbox = {
  gpg: GpgTool | null;
  http: HttpClient | null;
  aptKey: LegacyKeyTool | null;
  system: SystemInfo;
};

export class AptKeyCli implements LegacyKeyTool {
  private run: CommandRunner;

  constructor(run: CommandRunner = runCommand) {
    this.run = run;
  }

  list() {
    return this.run("apt-key", ["list"]);
  }
}

export const nodeSystemInfo: SystemInfo = {
  arch: () => machine(),
  readOsRelease: (path) =>
    readFile(path, "utf-8").catch((): undefined => undefined),
};

export async function resolveToolbox(
  config: DiagnosticConfig,
  pathEnv: string = process.env.PATH ?? "",
): Promise<Toolbox> {
  const [hasGpg, hasAptKey] = await Promise.all([
    commandExists("gpg", pathEnv),
    commandExists("apt-key", pathEnv),
  ]);

  return {
    gpg: hasGpg ? new GpgCli() : null,
    http:
      !config.offline && typeof globalThis.fetch === "function"
        ? new FetchHttpClient()
        : null,
    aptKey: hasAptKey ? new AptKeyCli() : null,
    system: nodeSystemInfo,
  };
}
