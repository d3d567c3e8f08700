import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { isFile } from "../../lib/files.ts";
import {
  fail,
  pass,
  text,
  warn,
  type ReportEntry,
} from "../../lib/report.ts";
import { firstLines } from "../../lib/text.ts";
import { NetworkError, VerificationError } from "../common/errors.ts";
import { withTempDir } from "../helper/tempDir.ts";
import type { Check, CheckContext } from "./types.ts";

const PREVIEW_LINES = 20;

async function verifyInRelease(
  { config, tools }: CheckContext,
  file: string,
): Promise<ReportEntry[]> {
  if (!(await isFile(config.keyringPath))) {
    return [warn("Cannot verify signature - keyring file missing")];
  }
  if (!tools.gpg) {
    return [warn("gpg not available, cannot verify signature")];
  }

  const entries = [text("Attempting to verify signature with keyring...")];
  try {
    const output = await tools.gpg.verify(config.keyringPath, file);
    entries.push(text(output.trimEnd()));
    entries.push(pass("Signature verification SUCCESSFUL"));
  } catch (e) {
    if (!(e instanceof VerificationError)) throw e;
    entries.push(text(e.output.trimEnd()));
    entries.push(
      fail(
        "Signature verification FAILED",
        "This indicates the key cannot verify the repository",
      ),
    );
  }
  return entries;
}

export const inReleaseSignatureCheck: Check = {
  title: "Repository InRelease Signature",
  async run(context) {
    const { config, tools } = context;
    if (!tools.http) {
      return [warn("No HTTP client available, skipping InRelease download")];
    }
    const http = tools.http;

    return withTempDir("cuda-inrelease-", async (dir) => {
      const file = join(dir, "InRelease");
      const entries = [
        text("Downloading and checking InRelease file signature..."),
      ];
      try {
        await http.download(`${config.repoUrl}/InRelease`, file, {
          timeoutMs: config.downloadTimeoutMs,
        });
      } catch (e) {
        if (!(e instanceof NetworkError)) throw e;
        entries.push(fail("Failed to download InRelease file", e.message));
        return entries;
      }

      const contents = await readFile(file, "utf-8");
      entries.push(
        pass("Downloaded InRelease file"),
        text(
          "",
          "InRelease signature info:",
          ...firstLines(contents, PREVIEW_LINES),
          "",
        ),
      );
      entries.push(...(await verifyInRelease(context, file)));
      return entries;
    });
  },
};
