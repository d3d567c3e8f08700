import { isFile } from "../../lib/files.ts";
import { parseColonListing, type KeyRecord } from "../../lib/gpg.ts";
import {
  fail,
  pass,
  text,
  warn,
  type ReportEntry,
} from "../../lib/report.ts";
import { ExpirationError } from "../common/errors.ts";
import type { Check } from "./types.ts";

/**
 * @returns the date as `YYYY-MM-DD HH:MM:SS UTC`, or `Unknown` if it's outside
 * the range a `Date` can hold
 */
export function formatEpoch(epoch: number): string {
  const date = new Date(epoch * 1000);
  if (Number.isNaN(date.getTime())) {
    return "Unknown";
  }
  return date.toISOString().slice(0, 19).replace("T", " ") + " UTC";
}

/**
 * @returns a description of when the key expires
 * @throws {ExpirationError} if the key has expired, or its expiration date
 * can't be compared with the current time
 */
export function assessExpiry(key: KeyRecord, now: Date): string {
  const { expiry } = key;
  switch (expiry.kind) {
    case "never":
      return `Key ${key.keyId}: Never expires`;
    case "at": {
      const valid = expiry.epoch * 1000 > now.getTime();
      const date = formatEpoch(expiry.epoch);
      if (valid) {
        return `Key ${key.keyId}: Expires on ${date} (still valid)`;
      }
      throw new ExpirationError(`Key ${key.keyId}: EXPIRED on ${date}`);
    }
    case "unparseable":
      throw new ExpirationError(`Key ${key.keyId}: EXPIRED on Unknown`);
  }
}

export const keyExpirationCheck: Check = {
  title: "Key Expiration Check",
  async run({ config, tools, now }) {
    if (!(await isFile(config.keyringPath))) {
      return [fail("Cannot check expiration - keyring file missing")];
    }
    if (!tools.gpg) {
      return [warn("gpg not available, skipping expiration check")];
    }

    const listing = await tools.gpg.listKeysWithColons(config.keyringPath);
    if (listing.exitCode !== 0) {
      return [
        text(listing.stderr.trimEnd()),
        fail(`gpg could not read the keyring (exit ${listing.exitCode})`),
      ];
    }
    const keys = parseColonListing(listing.stdout);
    if (keys.length === 0) {
      return [warn("No public keys found in keyring")];
    }

    const entries: ReportEntry[] = [text("Checking key expiration dates...")];
    for (const key of keys) {
      try {
        entries.push(pass(assessExpiry(key, now())));
      } catch (e) {
        if (!(e instanceof ExpirationError)) throw e;
        entries.push(fail(e.message));
      }
    }
    return entries;
  },
};
