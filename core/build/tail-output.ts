/**
 * Keep the last lines of command output for error reports.
 *
 * @param output - Full command output.
 * @param maxLines - Number of trailing lines to keep.
 * @returns Trailing non-empty lines joined by newlines.
 */
export function tailOutput(output: string, maxLines: number = 20): string {
  let lines = output.split(/\r?\n/u).filter(line => line.trim() !== '')
  return lines.slice(-maxLines).join('\n')
}
