import { REGEX_ACCENT_SPAN } from "../constants.js";
import { getAccentTable } from "./tables.js";

/**
 * Decodes accent-separation tokens (`e'` -> `é`, `AE&` -> `Æ`) in table order.
 */
export function decodeAccents(text: string): string {
  for (const [token, character] of getAccentTable()) {
    text = text.replaceAll(token, character);
  }
  return text;
}

/**
 * Unwraps `〔...〕` spans and decodes the accent tokens inside them.
 * ASCII outside the brackets is never touched.
 */
export function replaceAccents(line: string): string {
  return line.replace(REGEX_ACCENT_SPAN, (_span: string, inner: string) => decodeAccents(inner));
}
