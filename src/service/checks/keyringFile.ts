import { stat } from "node:fs/promises";
import { findByName } from "../../lib/files.ts";
import { fail, pass, text, type ReportEntry } from "../../lib/report.ts";
import { formatSize } from "../../lib/text.ts";
import type { Check } from "./types.ts";

const PERMISSION_CHARS = "rwxrwxrwx";

/**
 * Renders the permission bits of a file mode like `ls -l` does,
 * e.g. `-rw-r--r--`.
 */
export const formatMode = (mode: number) =>
  "-" +
  [...PERMISSION_CHARS]
    .map((char, i) => (mode & (1 << (8 - i)) ? char : "-"))
    .join("");

export const keyringFileCheck: Check = {
  title: "Keyring File Check",
  async run({ config }) {
    const info = await stat(config.keyringPath).catch(() => undefined);
    if (info?.isFile()) {
      const mode = formatMode(info.mode);
      const size = formatSize(info.size);
      const modified = info.mtime.toISOString().slice(0, 16).replace("T", " ");
      return [
        pass(`Keyring file exists: ${config.keyringPath}`),
        text(`${mode} ${size} ${modified} ${config.keyringPath}`),
      ];
    }

    const entries: ReportEntry[] = [
      fail(
        `Keyring file NOT found: ${config.keyringPath}`,
        "Looking for alternative locations...",
      ),
    ];
    const alternatives = await findByName(config.keyringDir, [
      "cuda",
      "nvidia",
    ]).catch((): string[] => []);
    entries.push(
      alternatives.length > 0
        ? text(...alternatives)
        : text("    No CUDA/NVIDIA keyrings found"),
    );
    return entries;
  },
};
