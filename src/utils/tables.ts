import { readFileSync } from "node:fs";
import { z } from "zod";
import { ACCENT_TABLE_FILE, GLYPH_TABLE_FILE } from "../constants.js";
import { ConversionError, toError } from "../errors.js";

// JIS glyph code (level, sub-level, row, column) -> character
const GlyphTableSchema = z.record(z.string().regex(/^\d{6}$/), z.string().min(1));
// [token, character] pairs, applied in file order
const AccentTableSchema = z.array(z.tuple([z.string().min(2).max(3), z.string().min(1)]));

export type AccentEntry = readonly [token: string, character: string];

let glyphTable: ReadonlyMap<number, string> | undefined;
let accentTable: ReadonlyArray<AccentEntry> | undefined;

/**
 * Reads a table file shipped in this package's `data/` directory.
 * Both `src/utils` and `dist/utils` sit two levels below the package root.
 */
function readTableFile<T>(relativePath: string, schema: z.ZodType<T>): T {
  const url = new URL(`../../${relativePath}`, import.meta.url);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(url, "utf8"));
  } catch (e: unknown) {
    throw new ConversionError(`cannot load table ${relativePath}`, "ERR_INVALID_TABLE", toError(e));
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ConversionError(
      `malformed table ${relativePath}${where}: ${issue?.message ?? "invalid"}`,
      "ERR_INVALID_TABLE"
    );
  }
  return parsed.data;
}

export function getGlyphTable(): ReadonlyMap<number, string> {
  if (!glyphTable) {
    const entries = Object.entries(readTableFile(GLYPH_TABLE_FILE, GlyphTableSchema));
    glyphTable = new Map(entries.map(([code, glyph]) => [Number(code), glyph]));
  }
  return glyphTable;
}

export function getAccentTable(): ReadonlyArray<AccentEntry> {
  if (!accentTable) {
    accentTable = readTableFile(ACCENT_TABLE_FILE, AccentTableSchema);
  }
  return accentTable;
}

export function lookupGlyph(code: number): string | undefined {
  return getGlyphTable().get(code);
}
