/**
 * Tree rendering for human display.
 *
 *   Config/
 *    ├─Constants/
 *    │  └─c = 300000000
 *    └─Sampler/
 *       └─sampler_name = custom
 */

import color from "cli-color";
import type { Section } from "./section";
import { Value, formatValue } from "./value";

const BRANCH = " ├─";
const LAST = " └─";
const PIPE = " │ ";
const BLANK = "   ";

/**
 * Decorates the pieces of a rendered line. Each hook gets plain text and
 * returns the text to print.
 */
export interface TreeStyler {
  section(label: string): string;
  key(key: string): string;
  value(text: string, value: Value): string;
  connector(text: string): string;
}

export interface FormatOptions {
  styler?: TreeStyler;
}

export const plainStyler: TreeStyler = {
  section: (label) => label,
  key: (key) => key,
  value: (text) => text,
  connector: (text) => text,
};

export const colorStyler: TreeStyler = {
  section: (label) => color.bold.blue(label),
  key: (key) => color.cyan(key),
  value: (text, value) => {
    switch (value.tag) {
      case "str":
        return color.green(text);
      case "int":
      case "float":
        return color.yellow(text);
      case "bool":
      case "none":
        return color.magenta(text);
      default:
        return text;
    }
  },
  connector: (text) => color.blackBright(text),
};

/**
 * Render a section and everything below it. Child sections come before
 * the section's own values, both in insertion order.
 */
export function formatTree(section: Section, options: FormatOptions = {}): string {
  const styler = options.styler ?? plainStyler;
  const lines = [styler.section(section.name + section.separator)];
  renderChildren(section, "", styler, lines);
  return lines.join("\n");
}

function renderChildren(section: Section, prefix: string, styler: TreeStyler, lines: string[]): void {
  const children = section.childSections();
  const entries = section.entries();
  const count = children.length + entries.length;

  children.forEach((child, i) => {
    const last = i === count - 1;
    lines.push(line(prefix, last, styler.section(child.name + child.separator), styler));
    renderChildren(child, prefix + (last ? BLANK : PIPE), styler, lines);
  });

  entries.forEach(([key, value], i) => {
    const last = children.length + i === count - 1;
    const label = `${styler.key(key)} = ${styler.value(formatValue(value), value)}`;
    lines.push(line(prefix, last, label, styler));
  });
}

function line(prefix: string, last: boolean, label: string, styler: TreeStyler): string {
  return (styler.connector(prefix + (last ? LAST : BRANCH)) + label).trimEnd();
}
