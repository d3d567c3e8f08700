import { expect, test } from "vitest";
import { firstLines, formatSize, grepWithContext } from "./text.ts";

test("Prints trailing context like grep -A", () => {
  const text = [
    "a",
    "cuda 1",
    "b",
    "c",
    "d",
    "e",
    "f",
    "g",
    "h",
    "NVIDIA x",
    "i",
  ].join("\n");

  expect(grepWithContext(text, /cuda|nvidia/i, 2)).toEqual([
    "cuda 1",
    "b",
    "c",
    "--",
    "NVIDIA x",
    "i",
  ]);
});

test("Merges overlapping context groups", () => {
  expect(
    grepWithContext("cuda\nx\nnvidia\ny\nz\n", /cuda|nvidia/i, 1),
  ).toEqual(["cuda", "x", "nvidia", "y"]);
  expect(grepWithContext("nothing here\n", /cuda/, 5)).toEqual([]);
});

test("Takes the first lines of a file", () => {
  expect(firstLines("1\n2\n3\n", 2)).toEqual(["1", "2"]);
  expect(firstLines("1\n2\n", 5)).toEqual(["1", "2"]);
});

test("Formats sizes like ls -lh", () => {
  expect(formatSize(512)).toBe("512");
  expect(formatSize(1024)).toBe("1.0K");
  expect(formatSize(2456)).toBe("2.4K");
  expect(formatSize(10240)).toBe("10K");
  expect(formatSize(5 * 1024 * 1024)).toBe("5.0M");
});
