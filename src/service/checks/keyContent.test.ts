import { rm } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  context,
  FakeGpg,
  listingFor,
  makeSandbox,
  OTHER_KEY_ID,
  TEST_KEY_ID,
  testConfig,
  unreadableKeyring,
  writeFixture,
} from "../../../test/fixtures/toolbox.ts";
import { fail, pass, text, warn } from "../../lib/report.ts";
import { keyContentCheck } from "./keyContent.ts";

describe("keyContentCheck", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeSandbox();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const withKeyring = async () => {
    await writeFixture(root, "keyrings/cuda-archive-keyring.gpg", "keyring");
    return testConfig(root);
  };

  test("fails without a keyring file", async () => {
    const gpg = new FakeGpg(listingFor(TEST_KEY_ID));

    const entries = await keyContentCheck.run(
      context(testConfig(root), { gpg }),
    );

    expect(entries).toEqual([
      fail("Cannot check key content - keyring file missing"),
    ]);
    expect(gpg.calls).toEqual([]);
  });

  test("warns when gpg isn't installed", async () => {
    const config = await withKeyring();

    expect(await keyContentCheck.run(context(config))).toEqual([
      warn("gpg not available, skipping key listing"),
    ]);
  });

  test("passes when the expected key is in the keyring", async () => {
    const config = await withKeyring();
    const gpg = new FakeGpg(listingFor(TEST_KEY_ID));

    expect(await keyContentCheck.run(context(config, { gpg }))).toEqual([
      text(
        "Listing keys in keyring...",
        listingFor(TEST_KEY_ID).trimEnd(),
        "",
      ),
      pass(`Expected key ID found: ${TEST_KEY_ID}`),
    ]);
    expect(gpg.calls).toEqual([`list ${config.keyringPath}`]);
  });

  test("lists the keys that are there when the expected one isn't", async () => {
    const config = await withKeyring();
    const gpg = new FakeGpg(listingFor(OTHER_KEY_ID));

    const entries = await keyContentCheck.run(context(config, { gpg }));

    expect(entries.at(-1)).toEqual(
      fail(
        `Expected key ID NOT found: ${TEST_KEY_ID}`,
        "Available key IDs:",
        `pub   rsa4096/${OTHER_KEY_ID} 2022-04-14 [SC]`,
      ),
    );
  });

  test("reports an empty keyring", async () => {
    const config = await withKeyring();
    const gpg = new FakeGpg("");

    const entries = await keyContentCheck.run(context(config, { gpg }));

    expect(entries.at(-1)).toEqual(
      fail(
        `Expected key ID NOT found: ${TEST_KEY_ID}`,
        "Available key IDs:",
        "No keys found",
      ),
    );
  });

  test("shows gpg's error when it can't read the keyring", async () => {
    const config = await withKeyring();
    const gpg = new FakeGpg(listingFor(TEST_KEY_ID));
    gpg.listingFailure = unreadableKeyring();

    expect(await keyContentCheck.run(context(config, { gpg }))).toEqual([
      text(
        "Listing keys in keyring...",
        "gpg: keydb_search failed: Invalid keyring",
        "",
      ),
      fail("gpg could not read the keyring (exit 2)"),
    ]);
  });
});
