/* eslint-disable no-console */
import { exit } from "node:process";
import { loadConfig } from "../lib/env.ts";
import { resolveToolbox } from "../lib/tools.ts";
import { runChecklist } from "../service/checklist.ts";
import { ConfigurationError } from "../service/common/errors.ts";

/**
 * Prints the CUDA GPG key diagnostics report. Meant to run inside the debug
 * image built by run-cuda-debug (see Dockerfile.debug-cuda), but works on any
 * Debian-based system.
 */
async function debugCudaKeys() {
  const config = loadConfig();
  const tools = await resolveToolbox(config);
  await runChecklist({ config, tools, now: () => new Date() });
}

try {
  await debugCudaKeys();
} catch (e) {
  if (!(e instanceof ConfigurationError)) throw e;
  console.error(e.message);
  exit(1);
}
