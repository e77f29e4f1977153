import { REGEX_GLYPH_ANNOTATION, REGEX_GLYPH_LOCATOR } from "../constants.js";
import { lookupGlyph } from "./tables.js";

/**
 * Parses the JIS locator out of a glyph annotation's description, e.g.
 * `「勹＜夕」、第3水準1-14-76` gives 311476.
 */
export function parseGlyphCode(description: string): number | undefined {
  const locator = REGEX_GLYPH_LOCATOR.exec(description);
  if (!locator) return undefined;
  const [, level, subLevel, row, column] = locator;
  return Number(level + subLevel + row + column);
}

/**
 * Replaces `※［＃...第3水準1-14-76］` references with the character they
 * describe. Annotations that cannot be resolved are left in place with a
 * warning.
 */
export function replaceGlyphs(line: string): string {
  const seen = new Set<string>();

  for (const match of line.matchAll(REGEX_GLYPH_ANNOTATION)) {
    const [annotation, description] = match;
    if (seen.has(annotation)) continue;
    seen.add(annotation);

    const code = parseGlyphCode(description);
    if (code === undefined) {
      console.warn(`glyphs: no jis locator in annotation: ${annotation}`);
      continue;
    }

    const glyph = lookupGlyph(code);
    if (glyph === undefined) {
      console.warn(`glyphs: jis code not implemented: ${code}: ${annotation}`);
      continue;
    }

    line = line.replaceAll(annotation, () => glyph);
  }

  return line;
}
