import { z } from "zod";
import { ConversionError } from "./errors.js";
import type { OutputFormat } from "./types.js";

export const FORMAT_NAMES = ["plain", "md", "tex"] as const;

export const FormatNameSchema = z.enum(FORMAT_NAMES);

export type FormatName = z.infer<typeof FormatNameSchema>;

const OUTPUT_FORMATS: Readonly<Record<FormatName, Readonly<OutputFormat>>> = {
  tex: {
    ruby: "\\ruby{%s}{%s}",
    header: "\\chapter{%s}",
    subheader: "\\section*{%s}",
    subsubheader: "\\subsection*{%s}",
    pageBreak: "\\newpage",
  },
  md: {
    ruby: "<ruby>%s<rp>《</rp><rt>%s</rt><rp>》</rp></ruby>",
    header: "# %s",
    subheader: "## %s",
    subsubheader: "### %s",
    pageBreak: "<div style='break-after:always'></div>",
  },
  plain: {
    ruby: "[%s:%s]",
    header: "%s",
    subheader: "%s",
    subsubheader: "%s",
    pageBreak: "",
  },
};

export function isFormatName(value: string): value is FormatName {
  return FormatNameSchema.safeParse(value).success;
}

export function unknownFormatMessage(name: string): string {
  return `unknown output format "${name}" (expected one of: ${FORMAT_NAMES.join(", ")})`;
}

/**
 * Returns the templates for a format name.
 *
 * @throws {ConversionError} ERR_UNKNOWN_FORMAT for any name outside {@link FORMAT_NAMES}.
 */
export function getOutputFormat(name: string): Readonly<OutputFormat> {
  if (!isFormatName(name)) {
    throw new ConversionError(unknownFormatMessage(name), "ERR_UNKNOWN_FORMAT");
  }
  return OUTPUT_FORMATS[name];
}

/**
 * Fills `%s` placeholders left to right. Values are inserted literally, so a
 * `%s` or `$&` inside a value is never expanded.
 */
export function applyTemplate(template: string, ...values: string[]): string {
  const parts = template.split("%s");
  let result = parts[0];
  for (let i = 1; i < parts.length; i++) {
    result += (values[i - 1] ?? "") + parts[i];
  }
  return result;
}
