/**
 * Runtime values produced by the evaluator and stored in the section tree.
 */

import { EvaluationError } from "./errors";

// ============================================================================
// Value Types
// ============================================================================

export type Value =
  | NoneValue
  | BoolValue
  | IntValue
  | FloatValue
  | StrValue
  | ListValue
  | SetValue
  | MapValue
  | SequenceValue;

export type ValueTag = Value["tag"];

export interface NoneValue {
  tag: "none";
}

export interface BoolValue {
  tag: "bool";
  value: boolean;
}

export interface IntValue {
  tag: "int";
  value: bigint;
}

export interface FloatValue {
  tag: "float";
  value: number;
}

export interface StrValue {
  tag: "str";
  value: string;
}

export interface ListValue {
  tag: "list";
  elements: Value[];
}

/**
 * Elements are unique under valuesEqual.
 */
export interface SetValue {
  tag: "set";
  elements: Value[];
}

/**
 * Keys are unique under valuesEqual.
 */
export interface MapValue {
  tag: "map";
  entries: [Value, Value][];
}

/**
 * Lazy, single-pass sequence built from a tuple literal. Iterating it
 * consumes the shared iterator, so a second pass sees no elements.
 */
export interface SequenceValue {
  tag: "sequence";
  iterator: Iterator<Value>;
}

export type Scalar = NoneValue | BoolValue | IntValue | FloatValue | StrValue;

// ============================================================================
// Constructors
// ============================================================================

export const noneVal: NoneValue = { tag: "none" };
export const boolVal = (value: boolean): BoolValue => ({ tag: "bool", value });
export const intVal = (value: bigint | number): IntValue => ({ tag: "int", value: BigInt(value) });
export const floatVal = (value: number): FloatValue => ({ tag: "float", value });
export const strVal = (value: string): StrValue => ({ tag: "str", value });
export const listVal = (elements: Value[]): ListValue => ({ tag: "list", elements });

export function setVal(elements: Iterable<Value>): SetValue {
  const unique: Value[] = [];
  for (const element of elements) {
    requireHashable(element);
    if (!unique.some((u) => valuesEqual(u, element))) {
      unique.push(element);
    }
  }
  return { tag: "set", elements: unique };
}

/**
 * Later duplicate keys overwrite the value but keep the first key's position.
 */
export function mapVal(entries: Iterable<[Value, Value]>): MapValue {
  const unique: [Value, Value][] = [];
  for (const [key, value] of entries) {
    requireHashable(key);
    const existing = unique.find(([k]) => valuesEqual(k, key));
    if (existing) {
      existing[1] = value;
    } else {
      unique.push([key, value]);
    }
  }
  return { tag: "map", entries: unique };
}

export function sequenceVal(elements: Iterable<Value>): SequenceValue {
  return { tag: "sequence", iterator: elements[Symbol.iterator]() };
}

// ============================================================================
// Classification
// ============================================================================

export function typeName(value: Value): string {
  return value.tag;
}

export function isScalar(value: Value): value is Scalar {
  return value.tag === "none" || value.tag === "bool" || value.tag === "int" || value.tag === "float" || value.tag === "str";
}

export function isNumeric(value: Value): value is BoolValue | IntValue | FloatValue {
  return value.tag === "bool" || value.tag === "int" || value.tag === "float";
}

/**
 * Lists, sets and maps cannot be set elements or map keys.
 */
export function isHashable(value: Value): boolean {
  return value.tag !== "list" && value.tag !== "set" && value.tag !== "map";
}

function requireHashable(value: Value): void {
  if (!isHashable(value)) {
    throw new EvaluationError(`Unhashable type: '${typeName(value)}'`);
  }
}

/**
 * Bool and int operands as bigint, for integer arithmetic.
 */
export function asBigInt(value: BoolValue | IntValue): bigint {
  return value.tag === "bool" ? (value.value ? 1n : 0n) : value.value;
}

export function bigintToNumber(value: bigint): number {
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new EvaluationError("int too large to convert to float");
  }
  return n;
}

export function asNumber(value: BoolValue | IntValue | FloatValue): number {
  switch (value.tag) {
    case "bool":
      return value.value ? 1 : 0;
    case "int":
      return bigintToNumber(value.value);
    case "float":
      return value.value;
  }
}

export function truthy(value: Value): boolean {
  switch (value.tag) {
    case "none":
      return false;
    case "bool":
      return value.value;
    case "int":
      return value.value !== 0n;
    case "float":
      return value.value !== 0;
    case "str":
      return value.value.length > 0;
    case "list":
    case "set":
      return value.elements.length > 0;
    case "map":
      return value.entries.length > 0;
    case "sequence":
      return true;
  }
}

/**
 * Iterate a value: list and set elements, map keys, string characters,
 * or the remaining items of a sequence.
 */
export function iterateValue(value: Value): Iterable<Value> {
  switch (value.tag) {
    case "list":
    case "set":
      return value.elements;
    case "map":
      return value.entries.map(([key]) => key);
    case "str":
      return Array.from(value.value, strVal);
    case "sequence": {
      // No return(): leaving a loop early must not close the shared iterator.
      const iterator = value.iterator;
      const resumable: Iterator<Value> = { next: () => iterator.next() };
      return { [Symbol.iterator]: () => resumable };
    }
    default:
      throw new EvaluationError(`'${typeName(value)}' object is not iterable`);
  }
}

// ============================================================================
// Equality
// ============================================================================

function numericEqual(a: BoolValue | IntValue | FloatValue, b: BoolValue | IntValue | FloatValue): boolean {
  if (a.tag !== "float" && b.tag !== "float") {
    return asBigInt(a) === asBigInt(b);
  }
  if (a.tag === "float" && b.tag === "float") {
    return a.value === b.value;
  }
  const integer = a.tag === "float" ? b : a;
  const float = a.tag === "float" ? a : b;
  if (integer.tag === "float" || float.tag !== "float") return false;
  return Number.isInteger(float.value) && asBigInt(integer) === BigInt(float.value);
}

/**
 * Structural equality. Numeric tags compare by value across tags
 * (`1 == 1.0 == True`); sequences compare by identity.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    return numericEqual(a, b);
  }

  switch (a.tag) {
    case "none":
      return b.tag === "none";
    case "str":
      return b.tag === "str" && a.value === b.value;
    case "list": {
      const other = b;
      return other.tag === "list" && a.elements.length === other.elements.length && a.elements.every((e, i) => valuesEqual(e, other.elements[i]));
    }
    case "set": {
      const other = b;
      return other.tag === "set" && a.elements.length === other.elements.length && a.elements.every((e) => other.elements.some((o) => valuesEqual(e, o)));
    }
    case "map": {
      const other = b;
      return (
        other.tag === "map" &&
        a.entries.length === other.entries.length &&
        a.entries.every(([key, value]) => other.entries.some(([k, v]) => valuesEqual(key, k) && valuesEqual(value, v)))
      );
    }
    case "sequence":
      return a === b;
    default:
      return false;
  }
}

/**
 * Identity: scalars are identical when tag and value agree, collections
 * only when they are the same object.
 */
export function valuesIdentical(a: Value, b: Value): boolean {
  if (a === b) return true;
  if (a.tag !== b.tag) return false;
  switch (a.tag) {
    case "none":
      return true;
    case "bool":
    case "int":
    case "float":
    case "str":
      return isScalar(b) && b.tag !== "none" && Object.is(a.value, b.value);
    default:
      return false;
  }
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Shortest round-trip float text, fixed notation for exponents in
 * [-4, 16) and scientific notation outside it.
 */
export function formatFloat(x: number): string {
  if (Number.isNaN(x)) return "nan";
  if (!Number.isFinite(x)) return x > 0 ? "inf" : "-inf";
  if (x === 0) return Object.is(x, -0) ? "-0.0" : "0.0";

  const [mantissa, exponentText] = x.toExponential().split("e");
  const exponent = Number(exponentText);
  const digits = mantissa.replace("-", "").replace(".", "");
  const sign = x < 0 ? "-" : "";

  if (exponent < -4 || exponent >= 16) {
    const m = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
    const e = String(Math.abs(exponent)).padStart(2, "0");
    return `${sign}${m}e${exponent < 0 ? "-" : "+"}${e}`;
  }

  if (exponent >= 0) {
    const intLength = exponent + 1;
    if (digits.length <= intLength) {
      return `${sign}${digits.padEnd(intLength, "0")}.0`;
    }
    return `${sign}${digits.slice(0, intLength)}.${digits.slice(intLength)}`;
  }

  return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
}

function quoteString(s: string): string {
  const quote = s.includes("'") && !s.includes('"') ? '"' : "'";
  let out = quote;
  for (const ch of s) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === "\\") out += "\\\\";
    else if (ch === quote) out += "\\" + quote;
    else if (ch === "\n") out += "\\n";
    else if (ch === "\r") out += "\\r";
    else if (ch === "\t") out += "\\t";
    else if (code < 0x20 || code === 0x7f) out += "\\x" + code.toString(16).padStart(2, "0");
    else out += ch;
  }
  return out + quote;
}

/**
 * Source-like rendering; parses back to an equal value for every
 * scalar and eager collection.
 */
export function reprValue(value: Value): string {
  switch (value.tag) {
    case "none":
      return "None";
    case "bool":
      return value.value ? "True" : "False";
    case "int":
      return value.value.toString();
    case "float":
      return formatFloat(value.value);
    case "str":
      return quoteString(value.value);
    case "list":
      return `[${value.elements.map(reprValue).join(", ")}]`;
    case "set":
      return value.elements.length === 0 ? "set()" : `{${value.elements.map(reprValue).join(", ")}}`;
    case "map":
      return `{${value.entries.map(([k, v]) => `${reprValue(k)}: ${reprValue(v)}`).join(", ")}}`;
    case "sequence":
      return "<sequence>";
  }
}

/**
 * Display rendering: strings unquoted at the top level, reprValue otherwise.
 */
export function formatValue(value: Value): string {
  return value.tag === "str" ? value.value : reprValue(value);
}

// ============================================================================
// Conversion
// ============================================================================

export type NativeValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | NativeValue[]
  | Set<NativeValue>
  | Map<NativeValue, NativeValue>
  | Iterable<NativeValue>;

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Convert to plain JavaScript. Integers become numbers when they are safe,
 * bigints otherwise; a sequence stays lazy.
 */
export function toNative(value: Value): NativeValue {
  switch (value.tag) {
    case "none":
      return null;
    case "bool":
    case "float":
    case "str":
      return value.value;
    case "int": {
      const n = Number(value.value);
      return Number.isSafeInteger(n) ? n : value.value;
    }
    case "list":
      return value.elements.map(toNative);
    case "set":
      return new Set(value.elements.map(toNative));
    case "map":
      return new Map(value.entries.map(([k, v]): [NativeValue, NativeValue] => [toNative(k), toNative(v)]));
    case "sequence": {
      const iterator = value.iterator;
      return {
        *[Symbol.iterator]() {
          for (let next = iterator.next(); !next.done; next = iterator.next()) {
            yield toNative(next.value);
          }
        },
      };
    }
  }
}

/**
 * JSON-safe form. Sets become arrays, map keys their display text; unsafe
 * integers and non-finite floats become strings; sequences are not consumed.
 */
export function toJSON(value: Value): JsonValue {
  switch (value.tag) {
    case "none":
      return null;
    case "bool":
    case "str":
      return value.value;
    case "float":
      return Number.isFinite(value.value) ? value.value : formatFloat(value.value);
    case "int": {
      const n = Number(value.value);
      return Number.isSafeInteger(n) ? n : value.value.toString();
    }
    case "list":
    case "set":
      return value.elements.map(toJSON);
    case "map": {
      const out: { [key: string]: JsonValue } = {};
      for (const [k, v] of value.entries) {
        out[formatValue(k)] = toJSON(v);
      }
      return out;
    }
    case "sequence":
      return reprValue(value);
  }
}

/**
 * Convert plain JavaScript to a Value. Integral numbers become ints.
 */
export function fromNative(input: unknown): Value {
  if (input === null || input === undefined) return noneVal;
  if (typeof input === "boolean") return boolVal(input);
  if (typeof input === "bigint") return intVal(input);
  if (typeof input === "number") return Number.isInteger(input) ? intVal(input) : floatVal(input);
  if (typeof input === "string") return strVal(input);
  if (Array.isArray(input)) return listVal(input.map(fromNative));
  if (input instanceof Set) return setVal(Array.from(input, fromNative));
  if (input instanceof Map) {
    return mapVal(Array.from(input, ([k, v]): [Value, Value] => [fromNative(k), fromNative(v)]));
  }
  if (typeof input === "object") {
    return mapVal(Object.entries(input).map(([k, v]): [Value, Value] => [strVal(k), fromNative(v)]));
  }
  throw new EvaluationError(`Cannot convert ${typeof input} to a value`);
}
