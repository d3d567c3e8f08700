import { text } from "../../lib/report.ts";
import type { Check } from "./types.ts";

/**
 * Reads PRETTY_NAME from an os-release file, without its quotes.
 */
export function parsePrettyName(osRelease: string): string {
  const line = osRelease
    .split("\n")
    .find((it) => it.startsWith("PRETTY_NAME="));
  return line?.slice("PRETTY_NAME=".length).replaceAll('"', "").trim() ?? "";
}

export const systemInfoCheck: Check = {
  title: "System Information",
  async run({ config, tools, now }) {
    const osRelease = await tools.system.readOsRelease(config.osReleasePath);
    return [
      text(
        `OS: ${parsePrettyName(osRelease ?? "")}`,
        `Architecture: ${tools.system.arch()}`,
        `Date: ${now().toString()}`,
      ),
    ];
  },
};
