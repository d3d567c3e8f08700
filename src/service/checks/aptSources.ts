import { readFile } from "node:fs/promises";
import { findByName, isDirectory } from "../../lib/files.ts";
import {
  fail,
  pass,
  text,
  warn,
  type ReportEntry,
} from "../../lib/report.ts";
import { ConfigurationWarning } from "../common/errors.ts";
import type { Check } from "./types.ts";

export type RepoSourceFile = {
  path: string;
  contents: string;
  signedBy: boolean;
};

// One-line sources write `[signed-by=...]`, deb822 .sources files write
// `Signed-By:`
const SIGNED_BY = /signed-by/i;

export async function readSourceFile(path: string): Promise<RepoSourceFile> {
  const contents = await readFile(path, "utf-8");
  return { path, contents, signedBy: SIGNED_BY.test(contents) };
}

/**
 * @throws {ConfigurationWarning} if the source trusts every key in the
 * system-wide keyring
 */
export function assertPinnedKeyring(source: RepoSourceFile) {
  if (!source.signedBy) {
    throw new ConfigurationWarning(
      "No 'signed-by' directive (legacy APT method)",
    );
  }
}

export const aptSourcesCheck: Check = {
  title: "APT Sources Configuration",
  async run({ config }) {
    const dir = config.aptSourcesDir;
    const entries: ReportEntry[] = [
      text("Checking CUDA repository configuration in APT sources..."),
    ];
    if (!(await isDirectory(dir))) {
      entries.push(fail(`${dir} directory not found`));
      return entries;
    }

    const paths = await findByName(dir, ["cuda", "nvidia"], true);
    for (const path of paths) {
      let source: RepoSourceFile;
      try {
        source = await readSourceFile(path);
      } catch (e) {
        entries.push(
          fail(
            `Cannot read ${path}`,
            e instanceof Error ? e.message : String(e),
          ),
        );
        continue;
      }
      entries.push(text(`Found: ${path}`, source.contents.trimEnd(), ""));
      try {
        assertPinnedKeyring(source);
        entries.push(pass("Uses 'signed-by' directive (modern APT method)"));
      } catch (e) {
        if (!(e instanceof ConfigurationWarning)) throw e;
        entries.push(
          warn(
            e.message,
            "This may cause verification issues on newer systems",
          ),
        );
      }
    }
    if (paths.length > 0) {
      return entries;
    }

    entries.push(
      warn(
        `No CUDA/NVIDIA sources found in ${dir}`,
        `Checking ${config.aptSourcesList}...`,
      ),
    );
    const legacy = await readFile(config.aptSourcesList, "utf-8").catch(
      () => "",
    );
    const cudaLines = legacy
      .split("\n")
      .filter((line) => line.includes("cuda"));
    if (cudaLines.length > 0) {
      entries.push(
        text(`Found CUDA repo in ${config.aptSourcesList}:`, ...cudaLines),
      );
    } else {
      entries.push(fail("No CUDA repository configured in APT"));
    }
    return entries;
  },
};
