import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";

export const isFile = (path: string) =>
  stat(path).then(
    (info) => info.isFile(),
    () => false,
  );

export const isDirectory = (path: string) =>
  stat(path).then(
    (info) => info.isDirectory(),
    () => false,
  );

/**
 * Recursively lists the entries under `dir` whose name contains one of
 * `fragments`, like `find <dir> -name '*a*' -o -name '*b*'`. Results are
 * sorted so the report is stable.
 *
 * @param filesOnly skip directories and other non-regular entries
 */
export async function findByName(
  dir: string,
  fragments: string[],
  filesOnly: boolean = false,
): Promise<string[]> {
  const entries = await readdir(dir, { recursive: true, withFileTypes: true });
  return entries
    .filter((entry) => fragments.some((it) => entry.name.includes(it)))
    .filter((entry) => !filesOnly || entry.isFile())
    .map((entry) => join(entry.parentPath ?? entry.path, entry.name))
    .sort();
}
