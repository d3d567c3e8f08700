import { text, warn } from "../../lib/report.ts";
import { grepWithContext } from "../../lib/text.ts";
import type { Check } from "./types.ts";

const CUDA_KEY_PATTERN = /cuda|nvidia/i;

export const legacyAptKeyCheck: Check = {
  title: "Legacy APT Key Check",
  async run({ tools }) {
    if (!tools.aptKey) {
      return [
        warn("apt-key command not available (expected on modern systems)"),
      ];
    }

    const { stdout } = await tools.aptKey.list();
    const matches = grepWithContext(stdout, CUDA_KEY_PATTERN, 5);
    if (matches.length === 0) {
      return [text("    No CUDA/NVIDIA keys in legacy keyring")];
    }
    return [text("Legacy apt-key list:", ...matches)];
  },
};
