import { describe, it, expect } from "vitest";
import * as path from "path";
import { Readable } from "stream";

import { parseArgs, formatError, renderOutput, run, CliOptions } from "../src/cli-options";
import {
  loadConfigSync,
  ConfigLoadError,
  ExpressionSyntaxError,
  IniSyntaxError,
  KeyNotFoundError,
  EvaluationError,
} from "../src/index";

const EXAMPLE = path.join(__dirname, "fixtures", "example.ini");

function options(overrides: Partial<CliOptions> = {}): CliOptions {
  return {
    inputFile: EXAMPLE,
    name: "Config",
    separator: "/",
    constantsSection: "Constants",
    gets: [],
    json: false,
    color: false,
    ...overrides,
  };
}

describe("parseArgs", () => {
  it("fills in defaults", () => {
    expect(parseArgs(["settings.ini"], {})).toEqual({
      kind: "run",
      options: {
        inputFile: "settings.ini",
        name: "toplevel",
        separator: "/",
        constantsSection: "Constants",
        gets: [],
        json: false,
        color: true,
      },
    });
  });

  it("reads every option", () => {
    const parsed = parseArgs(
      ["-", "-n", "Cfg", "--separator", ".", "-g", "a", "--get", "b", "--json", "--no-constants", "--no-color"],
      {}
    );
    expect(parsed).toEqual({
      kind: "run",
      options: {
        inputFile: "-",
        name: "Cfg",
        separator: ".",
        constantsSection: null,
        gets: ["a", "b"],
        json: true,
        color: false,
      },
    });
  });

  it("turns colour off under NO_COLOR", () => {
    const parsed = parseArgs(["settings.ini"], { NO_COLOR: "1" });
    expect(parsed.kind === "run" && parsed.options.color).toBe(false);
  });

  it("takes a custom constants section", () => {
    const parsed = parseArgs(["settings.ini", "--constants", "Vars"], {});
    expect(parsed.kind === "run" && parsed.options.constantsSection).toBe("Vars");
  });

  it("asks for help", () => {
    expect(parseArgs(["settings.ini", "--help"], {})).toEqual({ kind: "help" });
  });

  it("reports bad arguments", () => {
    expect(parseArgs([], {})).toEqual({ kind: "error", message: "No input file specified" });
    expect(parseArgs(["a.ini", "b.ini"], {})).toEqual({ kind: "error", message: "Multiple input files not supported" });
    expect(parseArgs(["--bogus"], {})).toEqual({ kind: "error", message: "Unknown option: --bogus" });
    expect(parseArgs(["a.ini", "-g"], {})).toEqual({ kind: "error", message: "--get requires a value" });
  });
});

describe("renderOutput", () => {
  const tree = loadConfigSync(EXAMPLE, { name: "Config" });

  it("prints looked-up values one per line", () => {
    expect(renderOutput(tree, options({ gets: ["sampler_name", "c"] }))).toBe("custom\n300000000");
  });

  it("prints a looked-up section as a tree", () => {
    expect(renderOutput(tree, options({ gets: ["parameter1"] }))).toBe("parameter1/\n ├─min = 0\n └─max = 1.0");
  });

  it("prints JSON on request", () => {
    expect(renderOutput(tree, options({ gets: ["sampler_name"], json: true }))).toBe('"custom"');
    expect(renderOutput(tree, options({ gets: ["parameter1"], json: true }))).toBe('{\n  "min": 0,\n  "max": 1\n}');
  });

  it("prints the whole tree without lookups", () => {
    const output = renderOutput(tree, options());
    expect(output.split("\n")[0]).toBe("Config/");
    expect(output.split("\n")).toHaveLength(17);
  });
});

describe("run", () => {
  it("reads the configuration from stdin for '-'", async () => {
    const stdin = Readable.from(["[a]\nx = 6 * 7\n"]);
    const output = await run(options({ inputFile: "-", gets: ["x"] }), stdin);
    expect(output).toBe("42");
  });

  it("loads a file by path", async () => {
    const output = await run(options({ gets: ["Sampler/parameter2/max"] }), Readable.from([]));
    expect(output).toBe("150000000.0");
  });

  it("rejects a missing file", async () => {
    await expect(run(options({ inputFile: "missing.ini" }), Readable.from([]))).rejects.toThrow(
      "No such file: missing.ini"
    );
  });
});

describe("formatError", () => {
  it("prefixes each error kind", () => {
    const load = new ConfigLoadError("s", "x", "1 / 0", new EvaluationError("Division by zero"));
    expect(formatError(load, "f.ini")).toBe("f.ini: Failed to evaluate [s] x = 1 / 0: Division by zero");
    expect(formatError(new IniSyntaxError("Key outside of any section", 1), "f.ini")).toBe(
      "Syntax error: <string>:1: Key outside of any section"
    );
    expect(formatError(new ExpressionSyntaxError("Unexpected token", 1, 2), "f.ini")).toBe(
      "f.ini: Expression syntax error: Unexpected token at line 1, column 2"
    );
    expect(formatError(new KeyNotFoundError("k"), "f.ini")).toBe("Lookup error: No value or section with key k");
    expect(formatError(new Error("boom"), "f.ini")).toBe("f.ini: boom");
    expect(formatError("odd", "f.ini")).toBe("f.ini: Unknown error: odd");
  });
});
