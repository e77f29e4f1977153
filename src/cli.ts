import { parseArgs } from "node:util";
import { z } from "zod";
import { convertFile } from "./AozoraConverter.js";
import { PROGRAM_NAME } from "./constants.js";
import { ConversionError, toError } from "./errors.js";
import { FORMAT_NAMES, FormatNameSchema, unknownFormatMessage } from "./formats.js";
import type { CliArguments } from "./types.js";

export const USAGE = [
  `usage: ${PROGRAM_NAME} [-d] [-f format] file`,
  "  -d, --debug          debug mode: keep the metadata block",
  `  -f, --format string  output format [${FORMAT_NAMES.join("|")}] (default "plain")`,
  "  -h, --help           print this message",
].join("\n");

const CliArgumentsSchema = z.object({
  debug: z.boolean(),
  format: FormatNameSchema,
  file: z.string().min(1, "input file path is empty"),
});

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        debug: { type: "boolean", short: "d", default: false },
        format: { type: "string", short: "f", default: "plain" },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: true,
      strict: true,
      tokens: true,
    });
  } catch (e: unknown) {
    const error = toError(e);
    throw new ConversionError(error.message, "ERR_USAGE", error);
  }
}

/**
 * Parses command-line arguments (without the node and script paths).
 *
 * @returns The parsed arguments, or `undefined` when help was requested.
 * @throws {ConversionError} ERR_USAGE for malformed arguments, ERR_UNKNOWN_FORMAT
 *   for a bad `-f` value.
 */
export function parseCliArguments(argv: string[]): CliArguments | undefined {
  const { values, positionals, tokens } = parseFlags(argv);

  // Flags stop at the input file, as in `aozora2fmt -d book.txt`
  let seenFile = false;
  for (const token of tokens) {
    if (token.kind === "positional") {
      seenFile = true;
    } else if (token.kind === "option" && seenFile) {
      throw new ConversionError(`flag ${token.rawName} must come before the input file`, "ERR_USAGE");
    }
  }

  if (values.help) {
    return undefined;
  }
  if (positionals.length !== 1) {
    throw new ConversionError(`expected exactly one input file, got ${positionals.length}`, "ERR_USAGE");
  }

  const result = CliArgumentsSchema.safeParse({
    debug: values.debug,
    format: values.format,
    file: positionals[0],
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue?.path[0] === "format") {
      throw new ConversionError(unknownFormatMessage(String(values.format)), "ERR_UNKNOWN_FORMAT");
    }
    throw new ConversionError(issue?.message ?? "invalid arguments", "ERR_USAGE");
  }
  return result.data;
}

/**
 * Runs the command line and returns the process exit code. The converted
 * document goes to stdout; usage and diagnostics go to stderr.
 */
export function run(argv: string[]): number {
  let args: CliArguments | undefined;
  try {
    args = parseCliArguments(argv);
  } catch (e: unknown) {
    if (!(e instanceof ConversionError)) throw e;
    console.error(`${PROGRAM_NAME}: ${e.message}`);
    console.error(USAGE);
    return 1;
  }

  if (!args) {
    console.error(USAGE);
    return 0;
  }

  let output: string;
  try {
    output = convertFile(args.file, { format: args.format, trimMetadata: !args.debug });
  } catch (e: unknown) {
    if (!(e instanceof ConversionError)) throw e;
    console.error(`${PROGRAM_NAME}: ${e.message}`);
    if (e.code === "ERR_METADATA_BLOCK_MISSING") {
      console.error(`${PROGRAM_NAME}: rerun with -d to keep the whole document`);
    }
    return 1;
  }

  process.stdout.write(output + "\n");
  return 0;
}
