import { ConfigurationError } from "../service/common/errors.ts";

type EnvVarDefinition = {
  defaultValue?: string;
  kind?: "string" | "milliseconds";
};

const variables = {
  /**
   * The keyring installed by the cuda-keyring package
   */
  CUDA_KEYRING_PATH: {
    defaultValue: "/usr/share/keyrings/cuda-archive-keyring.gpg",
  },
  /**
   * Directory searched for other CUDA/NVIDIA keyrings when CUDA_KEYRING_PATH
   * is missing
   */
  CUDA_KEYRING_DIR: { defaultValue: "/usr/share/keyrings" },
  /**
   * The long (16 hex digit) ID of the key that signs the CUDA repository
   */
  CUDA_EXPECTED_KEY_ID: { defaultValue: "A4B469963BF863CC" },
  /**
   * Base URL of the CUDA APT repository, without a trailing slash.
   * `/InRelease` is appended to it.
   */
  CUDA_REPO_URL: {
    defaultValue:
      "https://developer.download.nvidia.com/compute/cuda/repos/ubuntu2204/x86_64",
  },
  /**
   * Version of the cuda-keyring package installed in the debug image,
   * e.g. 1.1-1
   */
  CUDA_KEYRING_VERSION: { defaultValue: "1.1-1" },
  APT_SOURCES_DIR: { defaultValue: "/etc/apt/sources.list.d" },
  APT_SOURCES_LIST: { defaultValue: "/etc/apt/sources.list" },
  OS_RELEASE_PATH: { defaultValue: "/etc/os-release" },
  /**
   * How long the connectivity check waits for the repository to answer
   */
  CONNECT_TIMEOUT_MS: { defaultValue: "10000", kind: "milliseconds" },
  /**
   * Upper bound on downloading the InRelease file
   */
  DOWNLOAD_TIMEOUT_MS: { defaultValue: "60000", kind: "milliseconds" },
  /**
   * Set this to any non-empty value to skip every check that needs the network
   */
  OFFLINE: {},
  /**
   * The container engine CLI used to build the debug image. Anything with a
   * Docker-compatible `build` works, e.g. podman.
   */
  CONTAINER_ENGINE: { defaultValue: "docker" },
  DEBUG_IMAGE_TAG: { defaultValue: "cuda-debug-temp" },
  DOCKERFILE_PATH: { defaultValue: "Dockerfile.debug-cuda" },
  BUILD_CONTEXT: { defaultValue: "." },
  /**
   * Where the driver saves the combined output of the image build
   */
  BUILD_LOG_PATH: { defaultValue: "/tmp/cuda-debug-build.log" },
  /**
   * Location of the checklist entry point inside the debug image
   * (see Dockerfile.debug-cuda)
   */
  CHECKLIST_PATH: { defaultValue: "/opt/cuda-debug/bin/debug-cuda-keys.mjs" },
} as const satisfies Record<string, EnvVarDefinition>;

type VariableName = keyof typeof variables;

export type DiagnosticConfig = {
  keyringPath: string;
  keyringDir: string;
  expectedKeyId: string;
  repoUrl: string;
  keyringVersion: string;
  aptSourcesDir: string;
  aptSourcesList: string;
  osReleasePath: string;
  connectTimeoutMs: number;
  downloadTimeoutMs: number;
  offline: boolean;
  containerEngine: string;
  imageTag: string;
  dockerfilePath: string;
  buildContext: string;
  buildLogPath: string;
  checklistPath: string;
};

const readVariables = (source: NodeJS.ProcessEnv) => {
  const values: Partial<Record<VariableName, string>> = {};
  for (const [key, params] of Object.entries(variables) as [
    VariableName,
    EnvVarDefinition,
  ][]) {
    const value = source[key];
    if (value !== undefined && value !== "") {
      values[key] = value;
    } else if (params.defaultValue !== undefined) {
      values[key] = params.defaultValue;
    }

    if (
      params.kind === "milliseconds" &&
      !/^[1-9]\d*$/.test(values[key] ?? "")
    ) {
      throw new ConfigurationError(
        `Environment variable ${key} must be a positive number of milliseconds, got "${value}"`,
      );
    }
  }
  return values;
};

/**
 * Reads the tool's configuration from environment variables, falling back to
 * the defaults for a stock Ubuntu 22.04 x86_64 image.
 *
 * @throws {ConfigurationError} when a numeric variable isn't a positive integer
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
): DiagnosticConfig {
  const env = readVariables(source);
  const str = (key: VariableName) => env[key] ?? "";

  return {
    keyringPath: str("CUDA_KEYRING_PATH"),
    keyringDir: str("CUDA_KEYRING_DIR"),
    expectedKeyId: str("CUDA_EXPECTED_KEY_ID"),
    repoUrl: str("CUDA_REPO_URL").replace(/\/+$/, ""),
    keyringVersion: str("CUDA_KEYRING_VERSION"),
    aptSourcesDir: str("APT_SOURCES_DIR"),
    aptSourcesList: str("APT_SOURCES_LIST"),
    osReleasePath: str("OS_RELEASE_PATH"),
    connectTimeoutMs: parseInt(str("CONNECT_TIMEOUT_MS"), 10),
    downloadTimeoutMs: parseInt(str("DOWNLOAD_TIMEOUT_MS"), 10),
    offline: str("OFFLINE") !== "",
    containerEngine: str("CONTAINER_ENGINE"),
    imageTag: str("DEBUG_IMAGE_TAG"),
    dockerfilePath: str("DOCKERFILE_PATH"),
    buildContext: str("BUILD_CONTEXT"),
    buildLogPath: str("BUILD_LOG_PATH"),
    checklistPath: str("CHECKLIST_PATH"),
  };
}
