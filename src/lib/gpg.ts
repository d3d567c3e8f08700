import { VerificationError } from "../service/common/errors.ts";
import {
  runCommand,
  type CommandResult,
  type CommandRunner,
} from "./process.ts";

export type KeyExpiry =
  | { kind: "never" }
  | { kind: "at"; epoch: number }
  | { kind: "unparseable"; raw: string };

export type KeyRecord = {
  keyId: string;
  validity: string;
  createdAt?: number;
  expiry: KeyExpiry;
};

export interface GpgTool {
  listKeys(keyring: string): Promise<CommandResult>;
  listKeysWithColons(keyring: string): Promise<CommandResult>;
  /**
   * Verifies a signed file (e.g. a cleartext-signed InRelease) against the
   * keyring.
   *
   * @returns gpg's combined output
   * @throws {VerificationError} if gpg rejects the signature
   */
  verify(keyring: string, file: string): Promise<string>;
}

export class GpgCli implements GpgTool {
  private readonly run: CommandRunner;
  private readonly binary: string;

  constructor(run: CommandRunner = runCommand, binary: string = "gpg") {
    this.run = run;
    this.binary = binary;
  }

  private withKeyring(keyring: string, ...args: string[]) {
    return this.run(this.binary, [
      "--no-default-keyring",
      "--keyring",
      keyring,
      ...args,
    ]);
  }

  listKeys(keyring: string) {
    return this.withKeyring(keyring, "--list-keys", "--keyid-format", "LONG");
  }

  listKeysWithColons(keyring: string) {
    return this.withKeyring(keyring, "--list-keys", "--with-colons");
  }

  async verify(keyring: string, file: string) {
    const result = await this.withKeyring(keyring, "--verify", file);
    const output = result.stdout + result.stderr;
    if (result.exitCode !== 0) {
      throw new VerificationError(
        `gpg exited with code ${result.exitCode} while verifying ${file}`,
        output,
      );
    }
    return output;
  }
}

const parseEpoch = (field: string) =>
  /^\d+$/.test(field) ? parseInt(field, 10) : undefined;

/**
 * Extracts the public key records from `gpg --with-colons` output.
 *
 * Only the fields up to the expiration date are read:
 * `pub:<validity>:<length>:<algorithm>:<key id>:<created>:<expires>:...`
 */
export function parseColonListing(output: string): KeyRecord[] {
  const records: KeyRecord[] = [];
  for (const line of output.split("\n")) {
    const [type, validity = "", , , keyId = "", created = "", expires = ""] =
      line.trimEnd().split(":");
    if (type !== "pub") continue;

    const epoch = parseEpoch(expires);
    records.push({
      keyId,
      validity,
      createdAt: parseEpoch(created),
      expiry:
        expires === ""
          ? { kind: "never" }
          : epoch !== undefined
            ? { kind: "at", epoch }
            : { kind: "unparseable", raw: expires },
    });
  }
  return records;
}
