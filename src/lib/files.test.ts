import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { makeSandbox, writeFixture } from "../../test/fixtures/toolbox.ts";
import { findByName, isDirectory, isFile } from "./files.ts";

let root: string;

beforeEach(async () => {
  root = await makeSandbox();
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

test("Finds entries by name fragment, recursively", async () => {
  await writeFixture(root, "cuda-archive-keyring.gpg", "key");
  await writeFixture(root, "ubuntu-archive-keyring.gpg", "key");
  await writeFixture(root, "vendor/nvidia-container.gpg", "key");
  await mkdir(join(root, "cuda-old"));

  expect(await findByName(root, ["cuda", "nvidia"])).toEqual([
    join(root, "cuda-archive-keyring.gpg"),
    join(root, "cuda-old"),
    join(root, "vendor", "nvidia-container.gpg"),
  ]);
  expect(await findByName(root, ["cuda", "nvidia"], true)).toEqual([
    join(root, "cuda-archive-keyring.gpg"),
    join(root, "vendor", "nvidia-container.gpg"),
  ]);
});

test("Tells files and directories apart", async () => {
  const file = await writeFixture(root, "sources.list", "");

  expect(await isFile(file)).toBe(true);
  expect(await isDirectory(file)).toBe(false);
  expect(await isDirectory(root)).toBe(true);
  expect(await isFile(join(root, "missing"))).toBe(false);
});
