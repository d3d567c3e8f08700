import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../service/common/errors.ts";
import { loadConfig } from "./env.ts";

describe("loadConfig", () => {
  test("uses the defaults for a stock Ubuntu 22.04 image", () => {
    const config = loadConfig({});
    expect(config.keyringPath).toBe(
      "/usr/share/keyrings/cuda-archive-keyring.gpg",
    );
    expect(config.expectedKeyId).toBe("A4B469963BF863CC");
    expect(config.repoUrl).toBe(
      "https://developer.download.nvidia.com/compute/cuda/repos/ubuntu2204/x86_64",
    );
    expect(config.keyringVersion).toBe("1.1-1");
    expect(config.connectTimeoutMs).toBe(10_000);
    expect(config.downloadTimeoutMs).toBe(60_000);
    expect(config.offline).toBe(false);
    expect(config.containerEngine).toBe("docker");
    expect(config.buildLogPath).toBe("/tmp/cuda-debug-build.log");
  });

  test("reads overrides from the environment", () => {
    const config = loadConfig({
      CUDA_REPO_URL: "https://mirror.test/cuda/repos/ubuntu2404/sbsa/",
      CUDA_EXPECTED_KEY_ID: "0123456789ABCDEF",
      CONNECT_TIMEOUT_MS: "2500",
      OFFLINE: "1",
      CONTAINER_ENGINE: "podman",
    });
    expect(config.repoUrl).toBe(
      "https://mirror.test/cuda/repos/ubuntu2404/sbsa",
    );
    expect(config.expectedKeyId).toBe("0123456789ABCDEF");
    expect(config.connectTimeoutMs).toBe(2500);
    expect(config.offline).toBe(true);
    expect(config.containerEngine).toBe("podman");
  });

  test("treats empty variables as unset", () => {
    const config = loadConfig({ CUDA_KEYRING_VERSION: "", OFFLINE: "" });
    expect(config.keyringVersion).toBe("1.1-1");
    expect(config.offline).toBe(false);
  });

  test("rejects timeouts that aren't positive integers", () => {
    expect(() => loadConfig({ CONNECT_TIMEOUT_MS: "soon" })).toThrow(
      ConfigurationError,
    );
    expect(() => loadConfig({ DOWNLOAD_TIMEOUT_MS: "0" })).toThrow(
      'Environment variable DOWNLOAD_TIMEOUT_MS must be a positive number of milliseconds, got "0"',
    );
  });
});
