/**
 * Tests for the section tree: path algebra, storage and lookup.
 */
import { describe, it, expect } from "vitest";

import {
  Section,
  Value,
  intVal,
  floatVal,
  strVal,
  AmbiguousKeyError,
  InvalidPathError,
  KeyNotFoundError,
  MissingSubsectionError,
} from "../src/index";

function detectorTree(): Section {
  const root = Section.createRoot("top");
  root.ensurePath("/detectors/det1");
  root.ensurePath("/detectors/det2");
  root.set("/detectors/det1/height", floatVal(1.5));
  root.set("/detectors/det2/height", intVal(2));
  root.set("/detectors/width", intVal(2));
  root.ensurePath("/Sampler/parameter1");
  root.set("/Sampler/parameter1/min", intVal(0));
  root.set("/Sampler/sampler_name", strVal("custom"));
  return root;
}

describe("Path algebra", () => {
  const root = Section.createRoot("top");
  const sub2 = root.ensurePath("/sub1/sub2").section;

  it("computes full paths and depth", () => {
    expect(sub2.fullPath).toBe("top/sub1/sub2");
    expect(sub2.depth).toBe(2);
    expect(sub2.root).toBe(root);
    expect(root.fullPath).toBe("top");
  });

  it("expands relative keys below the section", () => {
    expect(sub2.expand("sub3")).toBe("top/sub1/sub2/sub3");
  });

  it("expands leading separators against the section's own path", () => {
    expect(sub2.expand("/x")).toBe("top/x");
    expect(sub2.expand("//y")).toBe("top/sub1/y");
    expect(sub2.expand("///z")).toBe("top/sub1/sub2/z");
  });

  it("rejects more leading separators than levels", () => {
    expect(() => sub2.expand("////z")).toThrow(InvalidPathError);
  });

  it("treats a key starting with a child name as relative", () => {
    expect(root.expand("sub1/sub2")).toBe("top/sub1/sub2");
    expect(root.expand("top/sub1")).toBe("top/sub1");
  });

  it("splits a key into existing and missing segments", () => {
    expect(root.splitExisting("/sub1/other/leaf")).toEqual({
      existing: ["top", "sub1"],
      missing: ["other", "leaf"],
    });
  });

  it("rejects paths outside the tree", () => {
    expect(() => root.splitExisting("elsewhere/x")).toThrow("path must start with 'top'");
  });
});

describe("ensurePath", () => {
  it("creates missing sections outermost first", () => {
    const root = Section.createRoot("top");
    const { section, created } = root.ensurePath("/a/b");
    expect(section.fullPath).toBe("top/a/b");
    expect(created.map((s) => s.fullPath)).toEqual(["top/a", "top/a/b"]);
  });

  it("is idempotent", () => {
    const root = Section.createRoot("top");
    const first = root.ensurePath("/a/b");
    const second = root.ensurePath("/a/b");
    expect(second.section).toBe(first.section);
    expect(second.created).toEqual([]);
    expect(root.sections()).toEqual(["a"]);
  });

  it("ignores a trailing separator and rejects empty segments", () => {
    const root = Section.createRoot("top");
    expect(root.ensurePath("/c/").section.fullPath).toBe("top/c");
    expect(() => root.ensurePath("/c//d")).toThrow("empty section name");
  });

  it("returns the subsection directly", () => {
    const root = Section.createRoot("top");
    expect(root.subsection("/x").name).toBe("x");
  });
});

describe("set and resolve", () => {
  it("requires every section on the path to exist", () => {
    const root = Section.createRoot("top");
    root.ensurePath("/a");
    try {
      root.set("/a/b/c", intVal(1));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingSubsectionError);
      expect(error instanceof MissingSubsectionError && error.missing).toBe("top/a/b");
    }
  });

  it("reports a missing first section of a relative key", () => {
    const root = Section.createRoot("top");
    try {
      root.set("a/b/c", intVal(1));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingSubsectionError);
      expect(error instanceof MissingSubsectionError && error.missing).toBe("top/a");
      expect(error instanceof MissingSubsectionError && error.path).toBe("top/a/b/c");
    }
  });

  it("reports a missing section below the invoking one", () => {
    const root = Section.createRoot("top");
    const a = root.subsection("/a");
    expect(() => a.set("b/c", intVal(1))).toThrow("Cannot set top/a/b/c: subsection top/a/b does not exist");
  });

  it("rejects an empty key", () => {
    const root = Section.createRoot("top");
    root.ensurePath("/a");
    expect(() => root.set("/a/", intVal(1))).toThrow("no key to set");
  });

  it("stores values relative to the section", () => {
    const root = detectorTree();
    const det1 = root.section("det1");
    det1.set("offset", floatVal(0.5));
    expect(det1.keys()).toEqual(["height", "offset"]);
    expect(root.resolve("top/detectors/det1/offset")).toEqual(floatVal(0.5));
  });

  it("resolves sections and values", () => {
    const root = detectorTree();
    expect(root.resolve("top/detectors/width")).toEqual(intVal(2));
    const det1 = root.resolve("top/detectors/det1");
    expect(det1 instanceof Section && det1.fullPath).toBe("top/detectors/det1");
    expect(root.resolve("top")).toBe(root);
  });

  it("names the section itself with a trailing separator", () => {
    const root = detectorTree();
    root.set("/detectors/det1", strVal("shadow"));
    expect(root.resolve("top/detectors/det1")).toEqual(strVal("shadow"));
    const section = root.resolve("top/detectors/det1/");
    expect(section instanceof Section && section.name).toBe("det1");
  });

  it("reports a missing path", () => {
    const root = detectorTree();
    expect(() => root.resolve("top/missing")).toThrow("Path top/missing not found");
    expect(() => root.resolve("top/missing")).toThrow(KeyNotFoundError);
  });
});

describe("Lookup", () => {
  it("finds a unique bare key anywhere below", () => {
    const root = detectorTree();
    expect(root.get("width")).toEqual(intVal(2));
    expect(root.get("sampler_name")).toEqual(strVal("custom"));
  });

  it("reports ambiguous keys with every candidate", () => {
    const root = detectorTree();
    try {
      root.get("height");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AmbiguousKeyError);
      expect(error instanceof AmbiguousKeyError && error.candidates).toEqual([
        "top/detectors/det1/height",
        "top/detectors/det2/height",
      ]);
    }
  });

  it("narrows the search to the invoking subtree", () => {
    const root = detectorTree();
    expect(root.section("det1").get("height")).toEqual(floatVal(1.5));
  });

  it("prefers a direct match under the nearest policy", () => {
    const root = detectorTree();
    root.set("/width", intVal(10));
    expect(root.get("width")).toEqual(intVal(10));
    expect(() => root.get("width", { policy: "strict" })).toThrow(AmbiguousKeyError);
  });

  it("separates values from sections by scope", () => {
    const root = detectorTree();
    root.set("/det1", intVal(7));
    expect(root.value("det1")).toEqual(intVal(7));
    expect(root.section("det1").fullPath).toBe("top/detectors/det1");
    expect(root.get("det1")).toEqual(intVal(7));
  });

  it("resolves keys containing a separator as paths", () => {
    const root = detectorTree();
    expect(root.get("detectors/det1/height")).toEqual(floatVal(1.5));
    expect(root.section("det2").get("//width")).toEqual(intVal(2));
    expect(() => root.get("detectors/width", { scope: "sections" })).toThrow(
      "detectors/width does not name a section"
    );
  });

  it("reports keys that match nothing", () => {
    const root = detectorTree();
    expect(() => root.get("depth")).toThrow("No value or section with key depth");
    expect(() => root.value("detectors")).toThrow("No value with key detectors");
    expect(root.has("depth")).toBe(false);
    expect(root.has("width")).toBe(true);
    expect(() => root.has("height")).toThrow(AmbiguousKeyError);
  });

  it("finds values strictly", () => {
    const root = detectorTree();
    expect(root.findValue("min")).toEqual(intVal(0));
    expect(() => root.findValue("height")).toThrow(AmbiguousKeyError);
  });

  it("collects every value by holding section", () => {
    const root = detectorTree();
    expect(root.findValues("height")).toEqual(
      new Map<string, Value>([
        ["top/detectors/det1", floatVal(1.5)],
        ["top/detectors/det2", intVal(2)],
      ])
    );
  });

  it("finds subsections by name", () => {
    const root = detectorTree();
    expect(root.findSubsections("det2")).toEqual(["top/detectors/det2"]);
    expect(root.isSubsection("parameter1")).toBe(true);
    expect(root.isSubsection("parameter2")).toBe(false);
    expect(root.isDirectSubsection("det1")).toBe(false);
    expect(root.section("detectors").isDirectSubsection("det1")).toBe(true);
  });
});

describe("Export", () => {
  it("dumps the subtree as nested maps, content first", () => {
    const root = detectorTree();
    const detectors = root.toDict().get("detectors");
    expect(detectors instanceof Map && Array.from(detectors.keys())).toEqual(["width", "det1", "det2"]);
  });

  it("dumps from the root on request", () => {
    const root = detectorTree();
    const dict = root.section("det1").toDict({ fromRoot: true });
    expect(Array.from(dict.keys())).toEqual(["detectors", "Sampler"]);
  });

  it("serializes to JSON", () => {
    const root = detectorTree();
    expect(JSON.stringify(root)).toBe(
      '{"detectors":{"width":2,"det1":{"height":1.5},"det2":{"height":2}},' +
        '"Sampler":{"sampler_name":"custom","parameter1":{"min":0}}}'
    );
  });

  it("lists child sections and entries in insertion order", () => {
    const root = detectorTree();
    expect(root.sections()).toEqual(["detectors", "Sampler"]);
    expect(root.childSections().map((s) => s.name)).toEqual(["detectors", "Sampler"]);
    expect(root.section("Sampler").entries()).toEqual([["sampler_name", strVal("custom")]]);
  });
});

describe("Roots", () => {
  it("validates the root name and separator", () => {
    expect(() => Section.createRoot("")).toThrow(InvalidPathError);
    expect(() => Section.createRoot("a/b")).toThrow(InvalidPathError);
    expect(() => Section.createRoot("x", "")).toThrow("separator must not be empty");
  });

  it("uses a custom separator throughout", () => {
    const root = Section.createRoot("cfg", ".");
    root.ensurePath(".a.b");
    root.set(".a.b.key", intVal(1));
    expect(root.get("key")).toEqual(intVal(1));
    expect(root.get("a.b.key")).toEqual(intVal(1));
    expect(root.section("b").fullPath).toBe("cfg.a.b");
  });
});
