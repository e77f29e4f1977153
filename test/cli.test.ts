import { fileURLToPath } from "node:url";
import { describe, it, expect, vi, afterEach } from "vitest";
import { USAGE, parseCliArguments, run } from "../src/cli.js";
import { ConversionError } from "../src/errors.js";

const SAMPLE = fileURLToPath(new URL("./fixtures/sample.txt", import.meta.url));
const NO_METADATA = fileURLToPath(new URL("./fixtures/no-metadata.txt", import.meta.url));

describe("parseCliArguments", () => {
  it("applies defaults", () => {
    expect(parseCliArguments(["book.txt"])).toEqual({ debug: false, format: "plain", file: "book.txt" });
  });

  it("reads short and long flags", () => {
    expect(parseCliArguments(["-d", "-f", "tex", "book.txt"])).toEqual({
      debug: true,
      format: "tex",
      file: "book.txt",
    });
    expect(parseCliArguments(["--format", "md", "book.txt"])).toEqual({
      debug: false,
      format: "md",
      file: "book.txt",
    });
  });

  it("takes a file name after -- as the input file", () => {
    expect(parseCliArguments(["--", "-d"])).toEqual({ debug: false, format: "plain", file: "-d" });
  });

  it("returns undefined for help", () => {
    expect(parseCliArguments(["-h"])).toBeUndefined();
  });

  it.each<[string[], string]>([
    [[], "ERR_USAGE"],
    [["a.txt", "b.txt"], "ERR_USAGE"],
    [["-x", "a.txt"], "ERR_USAGE"],
    [["-f", "html", "a.txt"], "ERR_UNKNOWN_FORMAT"],
    [["a.txt", "-d"], "ERR_USAGE"],
    [["a.txt", "--format", "md"], "ERR_USAGE"],
  ])("rejects %j", (argv, code) => {
    try {
      parseCliArguments(argv);
      expect.unreachable("parseCliArguments should throw");
    } catch (e) {
      expect(e).toBeInstanceOf(ConversionError);
      if (e instanceof ConversionError) expect(e.code).toBe(code);
    }
  });
});

function captureOutput() {
  return {
    writeSpy: vi.spyOn(process.stdout, "write").mockImplementation(() => true),
    errorSpy: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

describe("run", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes the converted document with a trailing newline", () => {
    const { writeSpy, errorSpy } = captureOutput();
    expect(run(["-f", "md", SAMPLE])).toBe(0);
    expect(writeSpy).toHaveBeenCalledTimes(1);
    const output = String(writeSpy.mock.calls[0][0]);
    expect(output.endsWith("底本：「テスト文庫」\n")).toBe(true);
    expect(output.split("\n")[4]).toBe("## 一");
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("keeps the whole document in debug mode", () => {
    const { writeSpy } = captureOutput();
    expect(run(["-d", NO_METADATA])).toBe(0);
    expect(writeSpy).toHaveBeenCalledWith("一行目\n\n二行目\n");
  });

  it("prints usage and fails without an input file", () => {
    const { writeSpy, errorSpy } = captureOutput();
    expect(run([])).toBe(1);
    expect(errorSpy).toHaveBeenNthCalledWith(1, "aozora2fmt: expected exactly one input file, got 0");
    expect(errorSpy).toHaveBeenNthCalledWith(2, USAGE);
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it("fails with more than one input file", () => {
    const { errorSpy } = captureOutput();
    expect(run([SAMPLE, NO_METADATA])).toBe(1);
    expect(errorSpy).toHaveBeenNthCalledWith(1, "aozora2fmt: expected exactly one input file, got 2");
  });

  it("rejects flags after the input file", () => {
    const { writeSpy, errorSpy } = captureOutput();
    expect(run([SAMPLE, "-d"])).toBe(1);
    expect(errorSpy).toHaveBeenNthCalledWith(1, "aozora2fmt: flag -d must come before the input file");
    expect(errorSpy).toHaveBeenNthCalledWith(2, USAGE);
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it("rejects unknown formats", () => {
    const { errorSpy } = captureOutput();
    expect(run(["-f", "html", SAMPLE])).toBe(1);
    expect(errorSpy).toHaveBeenNthCalledWith(
      1,
      'aozora2fmt: unknown output format "html" (expected one of: plain, md, tex)'
    );
    expect(errorSpy).toHaveBeenNthCalledWith(2, USAGE);
  });

  it("prints usage for -h and succeeds", () => {
    const { writeSpy, errorSpy } = captureOutput();
    expect(run(["-h"])).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith(USAGE);
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it("fails when the input cannot be read", () => {
    const { errorSpy } = captureOutput();
    expect(run(["/nonexistent/book.txt"])).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toMatch(/^aozora2fmt: cannot read \/nonexistent\/book\.txt: ENOENT/);
  });

  it("suggests -d when the metadata block is missing", () => {
    const { errorSpy } = captureOutput();
    expect(run([NO_METADATA])).toBe(1);
    expect(errorSpy).toHaveBeenNthCalledWith(
      1,
      "aozora2fmt: expected two separator lines of 55 hyphens around the metadata block, found 0"
    );
    expect(errorSpy).toHaveBeenNthCalledWith(2, "aozora2fmt: rerun with -d to keep the whole document");
  });
});
