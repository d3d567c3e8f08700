import {
  createReporter,
  entryFromError,
  summarize,
  type CheckResult,
  type Reporter,
} from "../lib/report.ts";
import {
  checks as defaultChecks,
  type Check,
  type CheckContext,
} from "./checks/index.ts";

export type ChecklistOptions = CheckContext & {
  reporter?: Reporter;
  checks?: readonly Check[];
};

const SUMMARY = [
  "- If keyring exists but signature verification fails: Key may be corrupted or mismatched",
  "- If key is expired: NVIDIA needs to update the key",
  "- If signed-by directive missing: APT sources may need updating",
  "- If network issues: Repository may be temporarily unavailable",
];

/**
 * Runs every check in order and prints its result as soon as it finishes.
 *
 * A check that fails, or throws, never stops the ones after it: the point of
 * the report is to show everything that's wrong at once.
 */
export async function runChecklist({
  reporter = createReporter(),
  checks = defaultChecks,
  ...context
}: ChecklistOptions): Promise<CheckResult[]> {
  reporter.banner("CUDA GPG Key Diagnostics Report");
  reporter.line();
  reporter.line(context.now().toString());
  reporter.line();

  const results: CheckResult[] = [];
  for (const [i, check] of checks.entries()) {
    let result: CheckResult;
    try {
      result = summarize(check.title, await check.run(context));
    } catch (e) {
      result = summarize(check.title, [entryFromError(e)]);
    }
    reporter.section(i + 1, result);
    results.push(result);
  }

  reporter.banner("Diagnostic Report Complete");
  reporter.line();
  reporter.line("Summary:");
  SUMMARY.forEach((it) => reporter.line(it));
  reporter.line();

  return results;
}
