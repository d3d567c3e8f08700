import { spawn } from "node:child_process";
import { MissingResourceError } from "../service/common/errors.ts";

export type BuildOptions = {
  tag: string;
  dockerfile: string;
  context: string;
  buildArgs: Record<string, string>;
};

/**
 * A container engine that can build images from a Dockerfile.
 */
export interface ContainerEngine {
  readonly name: string;
  /**
   * Builds an image, streaming the combined stdout and stderr of the build to
   * `onOutput`.
   *
   * @returns the build's exit code
   * @throws {MissingResourceError} if the engine isn't installed
   */
  build(
    options: BuildOptions,
    onOutput: (chunk: string) => void,
  ): Promise<number>;
}

export const buildArgs = ({
  tag,
  dockerfile,
  context,
  buildArgs,
}: BuildOptions) => [
  "build",
  ...Object.entries(buildArgs).flatMap(([key, value]) => [
    "--build-arg",
    `${key}=${value}`,
  ]),
  "-t",
  tag,
  "-f",
  dockerfile,
  context,
];

export class CliContainerEngine implements ContainerEngine {
  readonly name: string;

  constructor(name: string = "docker") {
    this.name = name;
  }

  build(options: BuildOptions, onOutput: (chunk: string) => void) {
    const child = spawn(this.name, buildArgs(options), {
      stdio: ["ignore", "pipe", "pipe"],
    });
    child.stdout.on("data", (chunk) => onOutput(chunk.toString()));
    child.stderr.on("data", (chunk) => onOutput(chunk.toString()));

    return new Promise<number>((resolve, reject) => {
      child.on("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "ENOENT") {
          reject(new MissingResourceError(this.name, error));
        } else {
          reject(error);
        }
      });
      child.on("close", (code) => resolve(code ?? 1));
    });
  }
}
