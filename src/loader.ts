/**
 * Configuration loader.
 *
 * Glue between the INI reader, the evaluator and the section tree: every
 * INI section becomes a tree section, every raw value is evaluated and
 * stored under its key.
 */

import * as fs from "fs";
import type { Readable } from "stream";
import { ExpressionEvaluator } from "./evaluate";
import { IniReader, IniOptions, IniSection } from "./ini";
import { Section } from "./section";
import { ConfigLoadError } from "./errors";
import { Value } from "./value";
import { Logger, loaderLogger } from "./logger";

// ============================================================================
// Options
// ============================================================================

/**
 * A file path (used when it exists), a readable stream, or INI text.
 */
export type ConfigSource = string | Readable;

export interface LoaderOptions {
  /** Name of the root section. */
  name?: string;
  separator?: string;
  /** Section whose entries become constants; null disables it. */
  constantsSection?: string | null;
  /** Evaluator to use; a fresh one with the default registry otherwise. */
  evaluator?: ExpressionEvaluator;
  logger?: Logger;
  ini?: IniOptions;
}

export const DEFAULT_ROOT_NAME = "toplevel";
export const DEFAULT_CONSTANTS_SECTION = "Constants";

// ============================================================================
// Loading
// ============================================================================

export async function loadConfig(sources: ConfigSource | ConfigSource[], options: LoaderOptions = {}): Promise<Section> {
  const reader = new IniReader(options.ini);
  for (const source of toArray(sources)) {
    if (typeof source === "string") {
      readTextSource(reader, source);
    } else {
      reader.read(await readStream(source), "<stream>");
    }
  }
  return buildTree(reader.sections(), options);
}

/**
 * Like loadConfig, for paths and inline text only.
 */
export function loadConfigSync(sources: string | string[], options: LoaderOptions = {}): Section {
  const reader = new IniReader(options.ini);
  for (const source of toArray(sources)) {
    readTextSource(reader, source);
  }
  return buildTree(reader.sections(), options);
}

/**
 * Build the tree from parsed INI sections.
 *
 * Constants are evaluated and registered first, in order, so later
 * constants and every other section can refer to them. Each header is
 * placed relative to the previous section: `[x]` directly under the root,
 * `[/x]` under the current top-level section, and so on.
 */
export function buildTree(sections: IniSection[], options: LoaderOptions = {}): Section {
  const log = options.logger ?? loaderLogger;
  const evaluator = options.evaluator ?? new ExpressionEvaluator();
  const constantsName = options.constantsSection === undefined ? DEFAULT_CONSTANTS_SECTION : options.constantsSection;
  const root = Section.createRoot(options.name ?? DEFAULT_ROOT_NAME, options.separator ?? "/");

  const evaluateEntry = (section: IniSection, key: string, raw: string): Value => {
    try {
      return evaluator.evaluate(raw);
    } catch (error) {
      const loadError = new ConfigLoadError(section.name, key, raw, error);
      log.error(loadError.message);
      throw loadError;
    }
  };

  const constants = new Map<string, Value>();
  const constantsSection = sections.find((s) => s.name === constantsName);
  if (constantsSection !== undefined) {
    for (const [key, raw] of constantsSection.entries) {
      const value = evaluateEntry(constantsSection, key, raw);
      evaluator.registerConstant(key, value);
      constants.set(key, value);
      log.debug(`Registered constant ${key}`);
    }
  }

  let current = root;
  for (const iniSection of sections) {
    const { section, created } = current.ensurePath(root.separator + iniSection.name);
    for (const s of created) {
      log.debug(`Created section ${s.fullPath}`);
    }
    current = section;

    const precomputed = iniSection === constantsSection ? constants : undefined;
    for (const [key, raw] of iniSection.entries) {
      // A sequence constant is single-pass, so the tree gets its own copy.
      const value = precomputed?.get(key);
      section.set(key, value !== undefined && value.tag !== "sequence" ? value : evaluateEntry(iniSection, key, raw));
    }
  }
  return root;
}

// ============================================================================
// Sources
// ============================================================================

function toArray<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

function readTextSource(reader: IniReader, source: string): void {
  if (fs.existsSync(source) && fs.statSync(source).isFile()) {
    reader.read(fs.readFileSync(source, "utf-8"), source);
  } else {
    reader.read(source);
  }
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8"));
  }
  return chunks.join("");
}
