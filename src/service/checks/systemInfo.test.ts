import { expect, test } from "vitest";
import {
  context,
  NOW,
  testConfig,
} from "../../../test/fixtures/toolbox.ts";
import { text } from "../../lib/report.ts";
import { parsePrettyName, systemInfoCheck } from "./systemInfo.ts";

test("Reads the pretty name from os-release", () => {
  expect(parsePrettyName('ID=ubuntu\nPRETTY_NAME="Ubuntu 22.04.4 LTS"\n')).toBe(
    "Ubuntu 22.04.4 LTS",
  );
  expect(parsePrettyName("PRETTY_NAME=Debian\n")).toBe("Debian");
  expect(parsePrettyName("ID=alpine\n")).toBe("");
});

test("Displays system information without judging it", async () => {
  const result = await systemInfoCheck.run(context(testConfig("/nonexistent")));

  expect(result).toEqual([
    text(
      "OS: Ubuntu 24.04.1 LTS",
      "Architecture: x86_64",
      `Date: ${NOW.toString()}`,
    ),
  ]);
});
