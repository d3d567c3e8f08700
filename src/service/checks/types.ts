import type { DiagnosticConfig } from "../../lib/env.ts";
import type { ReportEntry } from "../../lib/report.ts";
import type { Toolbox } from "../../lib/tools.ts";

export type CheckContext = {
  config: DiagnosticConfig;
  tools: Toolbox;
  now: () => Date;
};

/**
 * One step of the diagnostic checklist. Checks don't share state: each one
 * re-derives what it needs from the filesystem and tools.
 */
export type Check = {
  title: string;
  run(context: CheckContext): Promise<ReportEntry[]>;
};
