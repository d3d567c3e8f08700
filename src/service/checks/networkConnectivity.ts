import { fail, pass, text, warn } from "../../lib/report.ts";
import { NetworkError } from "../common/errors.ts";
import type { Check } from "./types.ts";

export const networkConnectivityCheck: Check = {
  title: "Network Connectivity",
  async run({ config, tools }) {
    if (!tools.http) {
      return [warn("No HTTP client available, skipping network test")];
    }

    const entries = [text("Testing connection to CUDA repository...")];
    try {
      const status = await tools.http.head(`${config.repoUrl}/InRelease`, {
        timeoutMs: config.connectTimeoutMs,
      });
      entries.push(
        pass(
          `CUDA repository is accessible: ${config.repoUrl}`,
          `HTTP ${status}`,
        ),
      );
    } catch (e) {
      if (!(e instanceof NetworkError)) throw e;
      entries.push(
        fail(
          `Cannot reach CUDA repository: ${config.repoUrl}`,
          "This may be a network issue or repository availability problem",
        ),
      );
    }
    return entries;
  },
};
