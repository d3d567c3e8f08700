import { createWriteStream } from "node:fs";
import { finished } from "node:stream/promises";
import type { ContainerEngine } from "../lib/container.ts";
import type { DiagnosticConfig } from "../lib/env.ts";
import { MissingResourceError } from "./common/errors.ts";

export type DriverContext = {
  config: DiagnosticConfig;
  engine: ContainerEngine;
  /** Name the tool is invoked as, shown in the usage text */
  programName?: string;
  print?: (line: string) => void;
  /** Receives the raw build output as it streams in */
  writeOutput?: (chunk: string) => void;
};

const BANNER = "======================================";

export function usage(programName: string): string[] {
  return [
    `Usage: ${programName} <base_image> [cuda_keyring_version]`,
    "",
    "Runs comprehensive CUDA GPG key diagnostics to identify:",
    "  - Key presence and validity",
    "  - Key expiration status",
    "  - Repository signature verification",
    "  - APT configuration issues",
    "",
    "Examples:",
    `  ${programName} ubuntu:24.04`,
    `  ${programName} ubuntu:22.04`,
    "",
  ];
}

/**
 * Builds the debug image on top of `baseImage` and reports whether the build
 * succeeded. A failed build is the expected way to reproduce the problem, so
 * it's reported, not returned: the exit code is 0 unless the arguments are
 * invalid.
 *
 * @returns the process exit code
 */
export async function runDriver(
  [baseImage, keyringVersion]: string[],
  {
    config,
    engine,
    programName = "run-cuda-debug",
    print = console.log,
    writeOutput = (chunk) => process.stdout.write(chunk),
  }: DriverContext,
): Promise<number> {
  if (!baseImage) {
    usage(programName).forEach((line) => print(line));
    return 1;
  }
  const version = keyringVersion || config.keyringVersion;

  [
    BANNER,
    "CUDA GPG Key Debug Tool",
    BANNER,
    `Base Image:      ${baseImage}`,
    `Keyring Version: ${version}`,
    "",
    "This will:",
    "1. Build a container from your base image",
    "2. Install the CUDA keyring package",
    "3. Run diagnostics before and after the installation",
    "4. Identify where the GPG error occurs",
    "",
    "Building...",
    "",
  ].forEach((line) => print(line));

  const log = createWriteStream(config.buildLogPath);
  let logError: Error | undefined;
  log.on("error", (error) => (logError = error));
  const tee = (chunk: string) => {
    writeOutput(chunk);
    if (!logError) log.write(chunk);
  };

  let exitCode: number;
  try {
    exitCode = await engine.build(
      {
        tag: config.imageTag,
        dockerfile: config.dockerfilePath,
        context: config.buildContext,
        buildArgs: {
          BASE_IMAGE: baseImage,
          CUDA_KEYRING_VERSION: version,
        },
      },
      tee,
    );
  } catch (e) {
    if (!(e instanceof MissingResourceError)) throw e;
    tee(`${e.message}\n`);
    exitCode = 127;
  }
  if (!logError) {
    log.end();
    await finished(log).catch((error: Error) => (logError = error));
  }

  print("");
  print(BANNER);
  print("Build Complete");
  print(BANNER);

  const lines =
    exitCode === 0
      ? [
          "Status: SUCCESS",
          "",
          "The build completed successfully. This means:",
          "- CUDA keyring installed correctly",
          "- GPG keys are valid",
          "- apt-get update succeeded",
          "",
          "You can review the diagnostic output above.",
          "To run diagnostics again:",
          `  ${engine.name} run --rm ${config.imageTag} ` +
            config.checklistPath,
        ]
      : [
          "Status: FAILED",
          "",
          `The build failed (exit code ${exitCode}).`,
          "Review the diagnostic output above to identify:",
          "  - Which stage failed",
          "  - Key expiration status",
          "  - Repository verification errors",
          "  - APT configuration issues",
          "",
          logError
            ? `Could not save the build log to ${config.buildLogPath}: ` +
              logError.message
            : `Full build log saved to: ${config.buildLogPath}`,
        ];
  lines.forEach((line) => print(line));
  print("");

  return 0;
}
