/**
 * INI-style text reader.
 *
 * Yields sections in first-seen order, each with its raw `key = value`
 * strings in first-seen order. Values are not interpreted here.
 */

import { IniSyntaxError } from "./errors";

export interface IniSection {
  name: string;
  entries: Map<string, string>;
}

export interface IniOptions {
  /** Keep key spelling instead of lower-casing. */
  preserveKeyCase?: boolean;
  /** Name of the section whose entries every other section inherits. */
  defaultSection?: string;
}

const SECTION_HEADER = /^\[(.+)\]/;
const OPTION_LINE = /^(.*?)\s*([=:])\s*(.*)$/;
const COMMENT_PREFIXES = ["#", ";"];

interface PendingValue {
  lines: string[];
}

/**
 * Accumulates any number of sources. Sections repeated across sources
 * merge, and later values overwrite earlier ones.
 */
export class IniReader {
  private readonly sectionMap = new Map<string, Map<string, PendingValue>>();
  private readonly defaults = new Map<string, PendingValue>();
  private readonly preserveKeyCase: boolean;
  private readonly defaultSection: string;

  constructor(options: IniOptions = {}) {
    this.preserveKeyCase = options.preserveKeyCase ?? false;
    this.defaultSection = options.defaultSection ?? "DEFAULT";
  }

  /**
   * Read one source. Within a source a section or key may appear only once.
   */
  read(text: string, source?: string): void {
    const seenSections = new Set<string>();
    const seenKeys = new Set<string>();

    let current: Map<string, PendingValue> | null = null;
    let currentName = "";
    let pending: PendingValue | null = null;
    let indentLevel = 0;

    const lines = text.split(/\r\n|\r|\n/);
    for (const [index, raw] of lines.entries()) {
      const lineNumber = index + 1;
      const value = raw.trim();

      if (value === "") {
        pending?.lines.push("");
        continue;
      }
      if (COMMENT_PREFIXES.some((prefix) => value.startsWith(prefix))) {
        continue;
      }

      const indent = raw.length - raw.trimStart().length;
      if (current !== null && pending !== null && indent > indentLevel) {
        pending.lines.push(value);
        continue;
      }
      indentLevel = indent;

      const header = SECTION_HEADER.exec(value);
      if (header) {
        const name = header[1];
        if (seenSections.has(name)) {
          throw new IniSyntaxError(`Section '${name}' already exists`, lineNumber, source);
        }
        seenSections.add(name);
        current = this.sectionFor(name);
        currentName = name;
        pending = null;
        continue;
      }

      if (current === null) {
        throw new IniSyntaxError("Key outside of any section", lineNumber, source);
      }

      const option = OPTION_LINE.exec(value);
      if (!option || option[1] === "") {
        throw new IniSyntaxError(`Expected 'key = value', got ${JSON.stringify(raw)}`, lineNumber, source);
      }

      const key = this.normalizeKey(option[1]);
      const seenKey = `${currentName}\u0000${key}`;
      if (seenKeys.has(seenKey)) {
        throw new IniSyntaxError(`Key '${key}' already set in section '${currentName}'`, lineNumber, source);
      }
      seenKeys.add(seenKey);

      pending = { lines: [option[3].trim()] };
      current.set(key, pending);
    }
  }

  /**
   * Sections in first-seen order, default entries merged in after each
   * section's own keys.
   */
  sections(): IniSection[] {
    const out: IniSection[] = [];
    for (const [name, pendingEntries] of this.sectionMap) {
      const entries = new Map<string, string>();
      for (const [key, value] of pendingEntries) {
        entries.set(key, joinLines(value));
      }
      for (const [key, value] of this.defaults) {
        if (!entries.has(key)) entries.set(key, joinLines(value));
      }
      out.push({ name, entries });
    }
    return out;
  }

  private sectionFor(name: string): Map<string, PendingValue> {
    if (name === this.defaultSection) {
      return this.defaults;
    }
    let section = this.sectionMap.get(name);
    if (section === undefined) {
      section = new Map();
      this.sectionMap.set(name, section);
    }
    return section;
  }

  private normalizeKey(key: string): string {
    const trimmed = key.trimEnd();
    return this.preserveKeyCase ? trimmed : trimmed.toLowerCase();
  }
}

function joinLines(value: PendingValue): string {
  return value.lines.join("\n").trimEnd();
}

/**
 * Read a single INI text.
 */
export function parseIni(text: string, options: IniOptions & { source?: string } = {}): IniSection[] {
  const reader = new IniReader(options);
  reader.read(text, options.source);
  return reader.sections();
}
