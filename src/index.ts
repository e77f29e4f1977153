import type { ConverterOptions, CliArguments, HeadingLevel, OutputFormat } from "./types.js";

export type { ConverterOptions, CliArguments, HeadingLevel, OutputFormat };
export { AozoraConverter, convert, convertFile } from "./AozoraConverter.js";
export { ConversionError } from "./errors.js";
export type { ConversionErrorCode, ConversionErrorDetails } from "./errors.js";
export { FORMAT_NAMES, applyTemplate, getOutputFormat, isFormatName } from "./formats.js";
export type { FormatName } from "./formats.js";
export { parseCliArguments, run } from "./cli.js";

// Individual transforms, for callers assembling their own pipeline
export { replaceAccents, decodeAccents } from "./utils/accents.js";
export { replaceGlyphs, parseGlyphCode } from "./utils/glyphs.js";
export { replaceHeaders, replacePageBreaks } from "./utils/headers.js";
export { joinLines, splitLines, trimFullWidthPadding } from "./utils/lines.js";
export { trimMetadata } from "./utils/metadata.js";
export { replaceRuby } from "./utils/ruby.js";
export { getAccentTable, getGlyphTable, lookupGlyph } from "./utils/tables.js";
export type { AccentEntry } from "./utils/tables.js";
