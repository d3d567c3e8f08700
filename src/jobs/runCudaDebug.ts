/* eslint-disable no-console */
import { argv, exit } from "node:process";
import { CliContainerEngine } from "../lib/container.ts";
import { loadConfig } from "../lib/env.ts";
import { ConfigurationError } from "../service/common/errors.ts";
import { runDriver } from "../service/driver.ts";

try {
  const config = loadConfig();
  const code = await runDriver(argv.slice(2), {
    config,
    engine: new CliContainerEngine(config.containerEngine),
  });
  exit(code);
} catch (e) {
  if (!(e instanceof ConfigurationError)) throw e;
  console.error(e.message);
  exit(1);
}
