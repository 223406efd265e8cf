import { describe, it, expect } from "vitest";
import color from "cli-color";

import { Section, formatTree, colorStyler, plainStyler, intVal, strVal, listVal, TreeStyler } from "../src/index";

describe("formatTree", () => {
  it("draws sections before values with box connectors", () => {
    const root = Section.createRoot("top");
    root.ensurePath("/a/b");
    root.set("/a/b/x", intVal(1));
    root.set("/a/y", strVal("text"));
    root.set("/z", listVal([intVal(1), strVal("s")]));
    expect(formatTree(root)).toBe(
      ["top/", " ├─a/", " │  ├─b/", " │  │  └─x = 1", " │  └─y = text", " └─z = [1, 's']"].join("\n")
    );
  });

  it("trims trailing blanks from empty values", () => {
    const root = Section.createRoot("top");
    root.set("/empty", strVal(""));
    expect(formatTree(root)).toBe("top/\n └─empty =");
  });

  it("renders a subtree from its own name", () => {
    const root = Section.createRoot("top");
    const leaf = root.subsection("/a/leaf");
    leaf.set("k", intVal(3));
    expect(formatTree(leaf)).toBe("leaf/\n └─k = 3");
    expect(leaf.toString()).toBe("leaf/\n └─k = 3");
  });

  it("uses the section's separator", () => {
    const root = Section.createRoot("cfg", ".");
    root.ensurePath(".inner");
    expect(formatTree(root)).toBe("cfg.\n └─inner.");
  });

  it("passes every piece through the styler", () => {
    const tags: TreeStyler = {
      section: (label) => `<${label}>`,
      key: (key) => key,
      value: (text) => text,
      connector: (text) => text,
    };
    const root = Section.createRoot("R");
    root.set("/A", listVal([intVal(1)]));
    expect(formatTree(root, { styler: tags })).toBe("<R/>\n └─A = [1]");
  });

  it("leaves plain text untouched by default", () => {
    expect(plainStyler.value("1", intVal(1))).toBe("1");
  });

  it("colours values by type", () => {
    expect(colorStyler.value("1", intVal(1))).toBe(color.yellow("1"));
    expect(colorStyler.value("x", strVal("x"))).toBe(color.green("x"));
    expect(colorStyler.value("[]", listVal([]))).toBe("[]");
    expect(colorStyler.key("k")).toBe(color.cyan("k"));
  });
});
