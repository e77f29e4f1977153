import { REGEX_EMPHASIS, REGEX_RUBY, SESAME_DOT } from "../constants.js";
import { applyTemplate } from "../formats.js";
import type { OutputFormat } from "../types.js";

/**
 * Rewrites ruby (`漢字《かんじ》`, optionally opened with `｜`) and sesame-dot
 * emphasis (`text［＃「text」に傍点］`) with the format's ruby template.
 *
 * Every distinct raw match is replaced wherever it occurs in the line.
 */
export function replaceRuby(line: string, format: Readonly<OutputFormat>): string {
  for (const raw of distinctMatches(line, REGEX_RUBY)) {
    const [whole, base, reading] = raw;
    const replacement = applyTemplate(format.ruby, base, reading);
    line = line.replaceAll(whole, () => replacement);
  }

  for (const raw of distinctMatches(line, REGEX_EMPHASIS)) {
    const [annotation, text] = raw;
    // one dot per code point, not per UTF-16 unit
    const dots = SESAME_DOT.repeat([...text].length);
    const replacement = applyTemplate(format.ruby, text, dots);
    line = line.replaceAll(text + annotation, () => replacement);
  }

  return line;
}

function distinctMatches(line: string, pattern: RegExp): RegExpMatchArray[] {
  const byText = new Map<string, RegExpMatchArray>();
  for (const match of line.matchAll(pattern)) {
    if (!byText.has(match[0])) byText.set(match[0], match);
  }
  return [...byText.values()];
}
