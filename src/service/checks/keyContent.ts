import { isFile } from "../../lib/files.ts";
import { fail, pass, text, warn } from "../../lib/report.ts";
import type { Check } from "./types.ts";

export const keyContentCheck: Check = {
  title: "GPG Key Content",
  async run({ config, tools }) {
    if (!(await isFile(config.keyringPath))) {
      return [fail("Cannot check key content - keyring file missing")];
    }
    if (!tools.gpg) {
      return [warn("gpg not available, skipping key listing")];
    }

    const listing = await tools.gpg.listKeys(config.keyringPath);
    if (listing.exitCode !== 0) {
      return [
        text("Listing keys in keyring...", listing.stderr.trimEnd(), ""),
        fail(`gpg could not read the keyring (exit ${listing.exitCode})`),
      ];
    }

    const output = listing.stdout.trimEnd();
    const entries = [text("Listing keys in keyring...", output, "")];

    if (listing.stdout.includes(config.expectedKeyId)) {
      entries.push(pass(`Expected key ID found: ${config.expectedKeyId}`));
    } else {
      const keyLines = output
        .split("\n")
        .filter((line) => line.includes("pub"));
      entries.push(
        fail(
          `Expected key ID NOT found: ${config.expectedKeyId}`,
          "Available key IDs:",
          ...(keyLines.length > 0 ? keyLines : ["No keys found"]),
        ),
      );
    }
    return entries;
  },
};
