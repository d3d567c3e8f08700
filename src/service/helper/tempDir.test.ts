import { access, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { expect, test } from "vitest";
import { withTempDir } from "./tempDir.ts";

test("Removes the directory after the callback resolves", async () => {
  let seen = "";
  const result = await withTempDir("cuda-debug-test-", async (dir) => {
    seen = dir;
    await writeFile(join(dir, "InRelease"), "contents");
    return "done";
  });

  expect(result).toBe("done");
  await expect(access(seen)).rejects.toThrow();
});

test("Removes the directory when the callback throws", async () => {
  let seen = "";
  await expect(
    withTempDir("cuda-debug-test-", async (dir) => {
      seen = dir;
      throw new Error("download interrupted");
    }),
  ).rejects.toThrow("download interrupted");

  expect(seen).not.toBe("");
  await expect(access(seen)).rejects.toThrow();
});
