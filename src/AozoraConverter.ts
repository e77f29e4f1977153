import { readFileSync } from "node:fs";
import { ConversionError, toError } from "./errors.js";
import { getOutputFormat } from "./formats.js";
import type { ConverterOptions, OutputFormat } from "./types.js";
import { replaceAccents } from "./utils/accents.js";
import { replaceGlyphs } from "./utils/glyphs.js";
import { replaceHeaders, replacePageBreaks } from "./utils/headers.js";
import { joinLines, splitLines, trimFullWidthPadding } from "./utils/lines.js";
import { trimMetadata } from "./utils/metadata.js";
import { replaceRuby } from "./utils/ruby.js";

/**
 * AozoraConverter - turns an Aozora Bunko text into LaTeX, Markdown or plain text.
 *
 * Each source line is cleaned and rewritten on its own (glyph references, ruby,
 * emphasis, accents); the joined document then gets its headings, page breaks
 * and, unless disabled, the metadata block removed.
 */
export class AozoraConverter {
  private readonly options: Required<ConverterOptions>;
  private readonly format: Readonly<OutputFormat>;

  private static readonly DEFAULT_OPTIONS: Required<ConverterOptions> = {
    format: "plain",
    trimMetadata: true,
  };

  /**
   * @throws {ConversionError} ERR_UNKNOWN_FORMAT if `options.format` is not a known format.
   */
  constructor(options: ConverterOptions = {}) {
    this.options = { ...AozoraConverter.DEFAULT_OPTIONS, ...options };
    this.format = getOutputFormat(this.options.format);
  }

  /**
   * Converts a whole document.
   * @throws {ConversionError} ERR_METADATA_BLOCK_MISSING if trimming is on and
   *   the document has no metadata block.
   */
  public convert(text: string): string {
    const lines = splitLines(text).map((line) => this.preprocessLine(line));
    return this.postprocessDocument(joinLines(lines));
  }

  /**
   * Reads a UTF-8 file and converts it.
   * @throws {ConversionError} ERR_READ_INPUT if the file cannot be read.
   */
  public convertFile(path: string): string {
    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch (e: unknown) {
      const error = toError(e);
      throw new ConversionError(`cannot read ${path}: ${error.message}`, "ERR_READ_INPUT", error);
    }
    return this.convert(text);
  }

  // --- Line Preprocessing ---

  private preprocessLine(line: string): string {
    line = trimFullWidthPadding(line);
    line = replaceGlyphs(line);
    line = replaceRuby(line, this.format);
    line = replaceAccents(line);
    return line;
  }

  // --- Document Postprocessing ---

  private postprocessDocument(document: string): string {
    document = replaceHeaders(document, this.format);
    document = replacePageBreaks(document, this.format);
    if (this.options.trimMetadata) {
      document = trimMetadata(document);
    }
    return document;
  }
}

export function convert(text: string, options: ConverterOptions = {}): string {
  return new AozoraConverter(options).convert(text);
}

export function convertFile(path: string, options: ConverterOptions = {}): string {
  return new AozoraConverter(options).convertFile(path);
}
