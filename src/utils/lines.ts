import { LINE_SEPARATOR, REGEX_FULL_WIDTH_PADDING } from "../constants.js";

/**
 * Splits file contents into lines. A trailing `\r` is dropped from each line,
 * and a final newline does not yield an empty last line.
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (text.endsWith("\n")) lines.pop();
  return lines;
}

export function trimFullWidthPadding(line: string): string {
  return line.replace(REGEX_FULL_WIDTH_PADDING, "");
}

/**
 * Joins lines with a blank line between each, so a blank source line shows up
 * as a run of four newlines in the joined document.
 */
export function joinLines(lines: ReadonlyArray<string>): string {
  return lines.join(LINE_SEPARATOR);
}
