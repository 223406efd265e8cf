/**
 * Section tree.
 *
 * Sections own their children; the parent link is a back-reference used
 * only to compute full paths and to reach the root. New sections are made
 * by ensurePath, never directly.
 */

import { AmbiguousKeyError, InvalidPathError, KeyNotFoundError, MissingSubsectionError } from "./errors";
import { Value, JsonValue, toJSON } from "./value";
import { formatTree } from "./format";

// ============================================================================
// Types
// ============================================================================

/**
 * What a key resolves to: a stored value or a section.
 */
export type Entry = Value | Section;

export type LookupPolicy = "nearest" | "strict";
export type LookupScope = "all" | "values" | "sections";

export interface LookupOptions {
  /**
   * "nearest" prefers a single match held directly by the invoking section
   * when a bare key matches several times; "strict" fails on any multi-match.
   */
  policy?: LookupPolicy;
  scope?: LookupScope;
}

export interface EnsurePathResult {
  /** The section the key names. */
  section: Section;
  /** Sections created by the call, outermost first. Empty if all existed. */
  created: Section[];
}

export interface SplitPath {
  existing: string[];
  missing: string[];
}

/**
 * Recursive dump of a subtree. A child section replaces a content entry
 * with the same key.
 */
export interface ConfigDict extends Map<string, Value | ConfigDict> {}

interface Candidate {
  path: string;
  entry: Entry;
  direct: boolean;
}

// ============================================================================
// Section
// ============================================================================

export class Section {
  private readonly content = new Map<string, Value>();
  private readonly children = new Map<string, Section>();

  private constructor(
    readonly name: string,
    readonly separator: string,
    readonly parent: Section | null
  ) {}

  static createRoot(name: string, separator: string = "/"): Section {
    if (separator === "") {
      throw new InvalidPathError(name, "separator must not be empty");
    }
    if (name === "" || name.includes(separator)) {
      throw new InvalidPathError(name, `root name must be non-empty and must not contain '${separator}'`);
    }
    return new Section(name, separator, null);
  }

  get root(): Section {
    return this.parent === null ? this : this.parent.root;
  }

  get fullPath(): string {
    return this.parent === null ? this.name : `${this.parent.fullPath}${this.separator}${this.name}`;
  }

  get depth(): number {
    return this.parent === null ? 0 : this.parent.depth + 1;
  }

  // ==========================================================================
  // Path Algebra
  // ==========================================================================

  /**
   * Expand a key to a full path.
   *
   * A key without separator names something directly under this section.
   * Each leading separator stands for the segment at the same position in
   * this section's own path, so from `top/sub1/sub2`, `/x` is `top/x` and
   * `//y` is `top/sub1/y`. A key starting with the name of a direct child
   * is taken as relative to this section.
   */
  expand(key: string): string {
    const sep = this.separator;
    const parts = key.split(sep);
    if (parts.length === 1) {
      return `${this.fullPath}${sep}${key}`;
    }
    if (!key.startsWith(sep) && this.children.has(parts[0])) {
      parts.unshift("");
    }

    const ownParts = this.fullPath.split(sep);
    for (let i = 0; i < parts.length && parts[i] === ""; i++) {
      if (i >= ownParts.length) {
        throw new InvalidPathError(key, `more leading separators than levels above ${this.fullPath}`);
      }
      parts[i] = ownParts[i];
    }
    return parts.join(sep);
  }

  /**
   * Split the expanded key into the segments that already exist, starting
   * with the root name, and those that do not.
   */
  splitExisting(key: string): SplitPath {
    const path = this.expand(key);
    const [head, ...rest] = path.split(this.separator);
    let section = this.root;
    if (head !== section.name) {
      throw new InvalidPathError(path, `path must start with '${section.name}'`);
    }

    const existing = [head];
    let index = 0;
    while (index < rest.length) {
      const child = section.children.get(rest[index]);
      if (child === undefined) break;
      existing.push(rest[index]);
      section = child;
      index++;
    }
    return { existing, missing: rest.slice(index) };
  }

  /**
   * Make sure every section on the key's path exists. Idempotent: a second
   * call with the same key creates nothing.
   */
  ensurePath(key: string): EnsurePathResult {
    const { existing, missing } = this.splitExisting(key);
    if (missing.length > 0 && missing[missing.length - 1] === "") {
      missing.pop();
    }
    if (missing.includes("")) {
      throw new InvalidPathError(this.expand(key), "empty section name");
    }

    let section = this.root;
    for (const segment of existing.slice(1)) {
      section = section.childOrThrow(segment);
    }

    const created: Section[] = [];
    for (const segment of missing) {
      const child = new Section(segment, this.separator, section);
      section.children.set(segment, child);
      created.push(child);
      section = child;
    }
    return { section, created };
  }

  subsection(key: string): Section {
    return this.ensurePath(key).section;
  }

  /**
   * Store a value. Every section on the way must exist already.
   */
  set(key: string, value: Value): void {
    const path = this.expand(key);
    const parts = path.split(this.separator);
    const head = parts.shift();
    const valueKey = parts.pop();
    if (head !== this.root.name) {
      // expand() left the key as given: its first segment is no child here.
      const sep = this.separator;
      throw new MissingSubsectionError(`${this.fullPath}${sep}${key}`, `${this.fullPath}${sep}${head}`);
    }
    if (valueKey === undefined || valueKey === "") {
      throw new InvalidPathError(path, "no key to set");
    }

    let section = this.root;
    for (const segment of parts) {
      const child = section.children.get(segment);
      if (child === undefined) {
        throw new MissingSubsectionError(path, `${section.fullPath}${this.separator}${segment}`);
      }
      section = child;
    }
    section.content.set(valueKey, value);
  }

  /**
   * Resolve a full path. The last segment prefers a value over a section of
   * the same name; a trailing separator names the section itself.
   */
  resolve(path: string): Entry {
    const [head, ...rest] = path.split(this.separator);
    let section = this.root;
    if (head !== section.name) {
      throw new InvalidPathError(path, `path must start with '${section.name}'`);
    }

    for (let i = 0; i < rest.length; i++) {
      const segment = rest[i];
      const last = i === rest.length - 1;
      if (last) {
        if (segment === "") return section;
        const value = section.content.get(segment);
        if (value !== undefined) return value;
      }
      const child = section.children.get(segment);
      if (child === undefined) {
        throw new KeyNotFoundError(path, `Path ${path} not found`);
      }
      section = child;
    }
    return section;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  /**
   * Look up a bare key (searched in this subtree) or a path (resolved).
   */
  get(key: string, options: LookupOptions = {}): Entry {
    const { policy = "nearest", scope = "all" } = options;

    if (key.includes(this.separator)) {
      const entry = this.resolve(this.expand(key));
      if (!inScope(entry, scope)) {
        throw new KeyNotFoundError(key, `${key} does not name a ${scope === "values" ? "value" : "section"}`);
      }
      return entry;
    }

    const candidates = this.search(key, scope);
    if (candidates.length === 0) {
      throw new KeyNotFoundError(key, notFoundMessage(key, scope));
    }
    if (candidates.length === 1) {
      return candidates[0].entry;
    }
    if (policy === "nearest") {
      const direct = candidates.filter((c) => c.direct);
      if (direct.length === 1) {
        return direct[0].entry;
      }
    }
    throw new AmbiguousKeyError(key, candidates.map((c) => c.path));
  }

  value(key: string, options: Omit<LookupOptions, "scope"> = {}): Value {
    const entry = this.get(key, { ...options, scope: "values" });
    if (entry instanceof Section) {
      throw new KeyNotFoundError(key, `${key} names a section, not a value`);
    }
    return entry;
  }

  section(key: string, options: Omit<LookupOptions, "scope"> = {}): Section {
    const entry = this.get(key, { ...options, scope: "sections" });
    if (!(entry instanceof Section)) {
      throw new KeyNotFoundError(key, `${key} names a value, not a section`);
    }
    return entry;
  }

  /**
   * The single value stored under `name` anywhere in this subtree.
   */
  findValue(name: string): Value {
    return this.value(name, { policy: "strict" });
  }

  /**
   * Every value stored under `name` in this subtree, by the full path of
   * the section holding it.
   */
  findValues(name: string): Map<string, Value> {
    const found = new Map<string, Value>();
    const value = this.content.get(name);
    if (value !== undefined) {
      found.set(this.fullPath, value);
    }
    for (const child of this.children.values()) {
      for (const [path, v] of child.findValues(name)) {
        found.set(path, v);
      }
    }
    return found;
  }

  /**
   * Full paths of all descendant sections called `name`, in pre-order.
   */
  findSubsections(name: string): string[] {
    const found: string[] = [];
    for (const child of this.children.values()) {
      if (child.name === name) found.push(child.fullPath);
      found.push(...child.findSubsections(name));
    }
    return found;
  }

  isSubsection(name: string): boolean {
    return this.findSubsections(name).length > 0;
  }

  isDirectSubsection(name: string): boolean {
    const parts = this.expand(name).split(this.separator);
    return this.children.has(parts[parts.length - 1]);
  }

  private search(key: string, scope: LookupScope): Candidate[] {
    const candidates: Candidate[] = [];
    if (scope !== "sections") {
      for (const [path, value] of this.findValues(key)) {
        candidates.push({ path: `${path}${this.separator}${key}`, entry: value, direct: path === this.fullPath });
      }
    }
    if (scope !== "values") {
      this.collectSections(key, candidates);
    }
    return candidates;
  }

  private collectSections(name: string, out: Candidate[], from: Section = this): void {
    for (const child of from.children.values()) {
      if (child.name === name) {
        out.push({ path: child.fullPath, entry: child, direct: from === this });
      }
      this.collectSections(name, out, child);
    }
  }

  private childOrThrow(name: string): Section {
    const child = this.children.get(name);
    if (child === undefined) {
      throw new KeyNotFoundError(name, `No section ${name} under ${this.fullPath}`);
    }
    return child;
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  /**
   * Names of the direct child sections, in insertion order.
   */
  sections(): string[] {
    return Array.from(this.children.keys());
  }

  childSections(): Section[] {
    return Array.from(this.children.values());
  }

  /**
   * Content keys of this section, in insertion order.
   */
  keys(): string[] {
    return Array.from(this.content.keys());
  }

  entries(): [string, Value][] {
    return Array.from(this.content.entries());
  }

  has(key: string): boolean {
    try {
      this.get(key);
      return true;
    } catch (error) {
      if (error instanceof KeyNotFoundError) return false;
      throw error;
    }
  }

  // ==========================================================================
  // Export
  // ==========================================================================

  toDict(options: { fromRoot?: boolean } = {}): ConfigDict {
    if (options.fromRoot) {
      return this.root.toDict();
    }
    const dict: ConfigDict = new Map<string, Value | ConfigDict>(this.content);
    for (const [name, child] of this.children) {
      dict.set(name, child.toDict());
    }
    return dict;
  }

  /**
   * JSON form of the subtree; also what JSON.stringify picks up.
   */
  toJSON(): { [key: string]: JsonValue } {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, value] of this.content) {
      out[key] = toJSON(value);
    }
    for (const [name, child] of this.children) {
      out[name] = child.toJSON();
    }
    return out;
  }

  toString(): string {
    return formatTree(this);
  }
}

function inScope(entry: Entry, scope: LookupScope): boolean {
  if (scope === "all") return true;
  return (entry instanceof Section) === (scope === "sections");
}

function notFoundMessage(key: string, scope: LookupScope): string {
  switch (scope) {
    case "values":
      return `No value with key ${key}`;
    case "sections":
      return `No section with key ${key}`;
    case "all":
      return `No value or section with key ${key}`;
  }
}
