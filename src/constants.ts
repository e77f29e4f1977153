export const PROGRAM_NAME = "aozora2fmt";

// Line preprocessing
export const FULL_WIDTH_SPACE = "　";
export const SESAME_DOT = "﹅";

// Kanji accepted as ruby base text: Extension A, the main block, Compatibility
// Ideographs, Extensions B-F and the Supplement, plus a few iteration marks.
const KANJI_CLASS = "\\u{3400}-\\u{4DBF}\\u{4E00}-\\u{9FFF}\\u{F900}-\\u{FAFF}\\u{20000}-\\u{2FA1F}〆〻〇々ヶ";

// Regex
export const REGEX_FULL_WIDTH_PADDING = /^　+|　+$/g;
export const REGEX_GLYPH_ANNOTATION = /※［＃([^］]+)］/g;
export const REGEX_GLYPH_LOCATOR = /第(\d)水準(\d)-(\d\d)-(\d\d)/;
export const REGEX_RUBY = new RegExp(`｜?([${KANJI_CLASS}]+)《([^》]+)》`, "gu");
export const REGEX_EMPHASIS = /［＃「([^」]+)」に傍点］/g;
export const REGEX_ACCENT_SPAN = /〔([^〕]+)〕/g;
export const REGEX_STRUCTURED_HEADING = /\n\n［[^［]+［＃「([^」]+)」は([大中小])見出し］\n\n\n/g;
export const REGEX_ISOLATED_LINE_HEADING = /\n\n\n([^\n]+)\n\n\n/g;

// Document postprocessing
export const LINE_SEPARATOR = "\n\n";
export const PAGE_BREAK_MARKER = "［＃改ページ］";
export const METADATA_SEPARATOR = `\n${"-".repeat(55)}\n`;

// Table files, relative to this package's root
export const GLYPH_TABLE_FILE = "data/glyphs.json";
export const ACCENT_TABLE_FILE = "data/accents.json";
