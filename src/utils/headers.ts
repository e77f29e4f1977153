import {
  PAGE_BREAK_MARKER,
  REGEX_ISOLATED_LINE_HEADING,
  REGEX_STRUCTURED_HEADING,
} from "../constants.js";
import { applyTemplate } from "../formats.js";
import type { HeadingLevel, OutputFormat } from "../types.js";

const HEADING_TEMPLATES: Readonly<Record<HeadingLevel, keyof OutputFormat>> = {
  大: "header",
  中: "subheader",
  小: "subsubheader",
};

function isHeadingLevel(word: string): word is HeadingLevel {
  return Object.hasOwn(HEADING_TEMPLATES, word);
}

/**
 * Rewrites heading blocks of the joined document.
 *
 * When the document carries `［＃「title」は大見出し］` style annotations, each
 * annotated block becomes a header, subheader or subsubheader. Otherwise any
 * line standing alone between blank lines is taken as a top-level header.
 */
export function replaceHeaders(document: string, format: Readonly<OutputFormat>): string {
  const structured = [...document.matchAll(REGEX_STRUCTURED_HEADING)];
  if (structured.length === 0) {
    return replaceIsolatedLineHeaders(document, format);
  }

  const done = new Set<string>();
  for (const [block, title, level] of structured) {
    if (done.has(block)) continue;
    done.add(block);

    let replacement: string;
    if (isHeadingLevel(level)) {
      replacement = applyTemplate(format[HEADING_TEMPLATES[level]], title);
    } else {
      console.warn(`headers: bad hdr: ${block}`);
      replacement = title;
    }
    document = document.replaceAll(block, () => replacement + "\n");
  }

  return document;
}

function replaceIsolatedLineHeaders(document: string, format: Readonly<OutputFormat>): string {
  const done = new Set<string>();
  for (const [block, title] of document.matchAll(REGEX_ISOLATED_LINE_HEADING)) {
    if (done.has(block)) continue;
    done.add(block);

    const replacement = "\n" + applyTemplate(format.header, title) + "\n";
    document = document.replaceAll(block, () => replacement);
  }
  return document;
}

export function replacePageBreaks(document: string, format: Readonly<OutputFormat>): string {
  return document.replaceAll(PAGE_BREAK_MARKER, () => format.pageBreak);
}
