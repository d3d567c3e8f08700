/**
 * Returns the lines matching `pattern` plus `after` lines of trailing context,
 * the way `grep -A <after>` prints them: overlapping groups merge and
 * separate groups are divided by a `--` line.
 */
export function grepWithContext(
  text: string,
  pattern: RegExp,
  after: number,
): string[] {
  const lines = text.split("\n");
  if (lines.at(-1) === "") lines.pop();

  const output: string[] = [];
  let lastPrinted = -1;
  let printUntil = -1;

  lines.forEach((line, i) => {
    if (pattern.test(line)) {
      printUntil = i + after;
    }
    if (i <= printUntil) {
      if (lastPrinted !== -1 && i > lastPrinted + 1) {
        output.push("--");
      }
      output.push(line);
      lastPrinted = i;
    }
  });
  return output;
}

export const firstLines = (text: string, count: number) => {
  const lines = text.split("\n").slice(0, count);
  return lines.at(-1) === "" ? lines.slice(0, -1) : lines;
};

/**
 * Formats a byte count like `ls -lh`: one decimal place below 10, none above.
 */
export function formatSize(bytes: number): string {
  const units = ["K", "M", "G", "T"];
  if (bytes < 1024) return `${bytes}`;

  let value = bytes;
  let unit = "";
  for (const next of units) {
    value /= 1024;
    unit = next;
    if (value < 1024) break;
  }
  const tenths = Math.ceil(value * 10) / 10;
  return tenths < 10
    ? `${tenths.toFixed(1)}${unit}`
    : `${Math.ceil(value)}${unit}`;
}
