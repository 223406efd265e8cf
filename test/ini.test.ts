import { describe, it, expect } from "vitest";

import { IniReader, IniSyntaxError, parseIni } from "../src/index";

function asObject(text: string) {
  return parseIni(text).map((s) => [s.name, Object.fromEntries(s.entries)]);
}

describe("IniReader", () => {
  it("reads sections and raw values in order", () => {
    const text = ["[Sampler]", "sampler_name = custom", "", "[detectors]", "width: 2", "url = a=b", "blank ="].join("\n");
    expect(asObject(text)).toEqual([
      ["Sampler", { sampler_name: "custom" }],
      ["detectors", { width: "2", url: "a=b", blank: "" }],
    ]);
  });

  it("joins indented continuation lines", () => {
    const text = ["[a]", "Description = first line", "  second line", "", "; comment", "[b]", "x = 1"].join("\n");
    expect(asObject(text)).toEqual([
      ["a", { description: "first line\nsecond line" }],
      ["b", { x: "1" }],
    ]);
  });

  it("skips comment lines", () => {
    expect(asObject("# top\n[a]\n; note\nx = 1\n")).toEqual([["a", { x: "1" }]]);
  });

  it("lower-cases keys unless asked not to", () => {
    expect(parseIni("[a]\nMixedCase = 1")[0].entries.has("mixedcase")).toBe(true);
    expect(parseIni("[a]\nMixedCase = 1", { preserveKeyCase: true })[0].entries.has("MixedCase")).toBe(true);
  });

  it("merges default entries into every section", () => {
    const text = "[DEFAULT]\nunit = m\n[a]\nx = 1\nunit = cm\n[b]\ny = 2";
    expect(asObject(text)).toEqual([
      ["a", { x: "1", unit: "cm" }],
      ["b", { y: "2", unit: "m" }],
    ]);
  });

  it("merges sections across sources", () => {
    const reader = new IniReader();
    reader.read("[a]\nx = 1\ny = 2");
    reader.read("[b]\nz = 3\n[a]\nx = 10");
    expect(reader.sections().map((s) => [s.name, Object.fromEntries(s.entries)])).toEqual([
      ["a", { x: "10", y: "2" }],
      ["b", { z: "3" }],
    ]);
  });
});

describe("IniReader errors", () => {
  it("rejects duplicates within one source", () => {
    expect(() => parseIni("[a]\nx = 1\n[a]")).toThrow("<string>:3: Section 'a' already exists");
    expect(() => parseIni("[a]\nx = 1\nX = 2")).toThrow("<string>:3: Key 'x' already set in section 'a'");
  });

  it("rejects keys outside any section", () => {
    expect(() => parseIni("x = 1", { source: "cfg.ini" })).toThrow("cfg.ini:1: Key outside of any section");
  });

  it("rejects lines without a delimiter", () => {
    try {
      parseIni("[a]\njunk");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IniSyntaxError);
      expect(error instanceof IniSyntaxError && error.line).toBe(2);
      expect(error instanceof IniSyntaxError && error.message).toBe(`<string>:2: Expected 'key = value', got "junk"`);
    }
  });
});
