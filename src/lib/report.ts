import {
  ConfigurationWarning,
  MissingResourceError,
} from "../service/common/errors.ts";

export type CheckStatus = "pass" | "fail" | "warn";

export type ReportEntry =
  | {
      kind: "status";
      status: CheckStatus;
      message: string;
      details?: string[];
    }
  | { kind: "text"; lines: string[] };

export type CheckResult = {
  title: string;
  /** The most severe status among the entries, or "info" if there are none */
  status: CheckStatus | "info";
  entries: ReportEntry[];
};

const MARKS: Record<CheckStatus, string> = {
  pass: "[✓]",
  fail: "[✗]",
  warn: "[!]",
};

const SEVERITY: Record<CheckResult["status"], number> = {
  info: 0,
  pass: 1,
  warn: 2,
  fail: 3,
};

export const pass = (message: string, ...details: string[]): ReportEntry => ({
  kind: "status",
  status: "pass",
  message,
  details,
});

export const fail = (message: string, ...details: string[]): ReportEntry => ({
  kind: "status",
  status: "fail",
  message,
  details,
});

export const warn = (message: string, ...details: string[]): ReportEntry => ({
  kind: "status",
  status: "warn",
  message,
  details,
});

export const text = (...lines: string[]): ReportEntry => ({
  kind: "text",
  lines,
});

/**
 * Turns an error thrown inside a check into a report line. Warnings stay
 * warnings; everything else is a failure.
 */
export function entryFromError(error: unknown): ReportEntry {
  if (error instanceof ConfigurationWarning) {
    return warn(error.message);
  }
  if (error instanceof MissingResourceError) {
    return fail(`Required resource not found: ${error.resource}`);
  }
  return fail(error instanceof Error ? error.message : String(error));
}

export function summarize(title: string, entries: ReportEntry[]): CheckResult {
  let status: CheckResult["status"] = "info";
  for (const entry of entries) {
    if (entry.kind === "status" && SEVERITY[entry.status] > SEVERITY[status]) {
      status = entry.status;
    }
  }
  return { title, status, entries };
}

export type Reporter = {
  line(text?: string): void;
  banner(title: string): void;
  section(index: number, result: CheckResult): void;
};

export function createReporter(
  write: (line: string) => void = console.log,
): Reporter {
  const line = (value: string = "") => write(value);

  return {
    line,
    banner(title) {
      line("======================================");
      line(title);
      line("======================================");
    },
    section(index, result) {
      line(`=== ${index}. ${result.title} ===`);
      for (const entry of result.entries) {
        if (entry.kind === "text") {
          entry.lines.forEach((it) => line(it));
          continue;
        }
        line(`${MARKS[entry.status]} ${entry.message}`);
        entry.details?.forEach((it) => line(`    ${it}`));
      }
      line();
    },
  };
}
