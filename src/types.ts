import type { FormatName } from "./formats.js";

/**
 * Output templates for one target format.
 *
 * Each template holds `%s` placeholders that are filled positionally.
 */
export interface OutputFormat {
  /** Ruby annotation; filled with the base text, then the reading. */
  ruby: string;
  /** Top-level heading (大見出し, and every heading in fallback mode). */
  header: string;
  /** Second-level heading (中見出し). */
  subheader: string;
  /** Third-level heading (小見出し). */
  subsubheader: string;
  /** Text that replaces a page-break annotation. Has no placeholder. */
  pageBreak: string;
}

/**
 * Configuration options for the AozoraConverter.
 */
export interface ConverterOptions {
  /**
   * Target format.
   * @default "plain"
   */
  format?: FormatName;
  /**
   * If true, the bibliographic block between the two hyphen separator lines
   * near the top of the document is removed.
   * @default true
   */
  trimMetadata?: boolean;
}

/**
 * Arguments accepted by the command line, after parsing.
 */
export interface CliArguments {
  /** Keeps the metadata block (`-d`). */
  debug: boolean;
  format: FormatName;
  /** Path of the input document. */
  file: string;
}

export type HeadingLevel = "大" | "中" | "小";
