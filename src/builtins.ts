/**
 * Operator tables.
 *
 * Each operator the evaluator accepts has exactly one implementation here.
 * An operator missing from its table is refused with
 * UnsupportedOperatorError, even when the parser understands it.
 */

import { EvaluationError, UnsupportedOperatorError } from "./errors";
import type { BinOp, UnaryOp, CompareOp } from "./expr";
import {
  Value,
  BoolValue,
  IntValue,
  FloatValue,
  boolVal,
  intVal,
  floatVal,
  strVal,
  listVal,
  setVal,
  isNumeric,
  asBigInt,
  asNumber,
  bigintToNumber,
  truthy,
  typeName,
  iterateValue,
  valuesEqual,
  valuesIdentical,
} from "./value";

type Numeric = BoolValue | IntValue | FloatValue;

export type BinaryImpl = (left: Value, right: Value) => Value;
export type UnaryImpl = (operand: Value) => Value;
export type CompareImpl = (left: Value, right: Value) => boolean;

/** Engine limit on BigInt size. */
const MAX_INT_BITS = 2n ** 30n;
const MAX_REPEAT_LENGTH = 2n ** 28n;

function operandError(op: string, left: Value, right: Value): EvaluationError {
  return new EvaluationError(`Unsupported operand types for ${op}: '${typeName(left)}' and '${typeName(right)}'`);
}

function isInteger(value: Value): value is BoolValue | IntValue {
  return value.tag === "bool" || value.tag === "int";
}

/**
 * Applies `ints` when both operands are bool/int, `floats` when either is a
 * float. Non-numeric operands fall through to `other`.
 */
function numeric(
  op: string,
  ints: (a: bigint, b: bigint) => Value,
  floats: (a: number, b: number) => Value,
  other?: BinaryImpl
): BinaryImpl {
  return (left, right) => {
    if (isNumeric(left) && isNumeric(right)) {
      if (isInteger(left) && isInteger(right)) {
        try {
          return ints(asBigInt(left), asBigInt(right));
        } catch (error) {
          if (error instanceof RangeError) {
            throw new EvaluationError("Integer result too large", { cause: error });
          }
          throw error;
        }
      }
      return floats(asNumber(left), asNumber(right));
    }
    if (other) return other(left, right);
    throw operandError(op, left, right);
  };
}

function repeat(op: string): BinaryImpl {
  return (left, right) => {
    const [seq, count] = isInteger(right) ? [left, right] : [right, left];
    if (!isInteger(count)) throw operandError(op, left, right);
    if (seq.tag !== "str" && seq.tag !== "list") throw operandError(op, left, right);

    const length = seq.tag === "str" ? seq.value.length : seq.elements.length;
    const times = asBigInt(count);
    if (times <= 0n || length === 0) {
      return seq.tag === "str" ? strVal("") : listVal([]);
    }
    if (BigInt(length) * times > MAX_REPEAT_LENGTH) {
      throw new EvaluationError("Repeated sequence too large");
    }
    if (seq.tag === "str") {
      return strVal(seq.value.repeat(Number(times)));
    }
    const out: Value[] = [];
    for (let i = 0n; i < times; i++) out.push(...seq.elements);
    return listVal(out);
  };
}

function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && a < 0n !== b < 0n ? q - 1n : q;
}

function floorMod(a: bigint, b: bigint): bigint {
  const r = a % b;
  return r !== 0n && r < 0n !== b < 0n ? r + b : r;
}

function floatMod(a: number, b: number): number {
  const r = a % b;
  return r !== 0 && r < 0 !== b < 0 ? r + b : r;
}

function bitLength(n: bigint): number {
  return (n < 0n ? -n : n).toString(2).length;
}

function scaleByPowerOfTwo(x: number, exponent: number): number {
  let result = x;
  let e = exponent;
  while (e > 1000) {
    result *= 2 ** 1000;
    e -= 1000;
  }
  while (e < -1000) {
    result *= 2 ** -1000;
    e += 1000;
  }
  return result * 2 ** e;
}

/**
 * True division of integers. Operands too large for a float are divided
 * as bigints, keeping 64 significant bits of the quotient.
 */
function intTrueDivide(a: bigint, b: bigint): number {
  const n = Number(a);
  const d = Number(b);
  if (Number.isSafeInteger(n) && Number.isSafeInteger(d)) {
    return n / d;
  }
  const shift = bitLength(b) - bitLength(a) + 64;
  const quotient = shift >= 0 ? (a << BigInt(shift)) / b : a / (b << BigInt(-shift));
  const result = scaleByPowerOfTwo(Number(quotient), -shift);
  if (!Number.isFinite(result)) {
    throw new EvaluationError("Integer division result too large for a float");
  }
  return result;
}

function intPower(a: bigint, b: bigint): Value {
  if (b < 0n) {
    return power(bigintToNumber(a), bigintToNumber(b));
  }
  const magnitude = a < 0n ? -a : a;
  if (magnitude > 1n && BigInt(bitLength(magnitude)) * b > MAX_INT_BITS) {
    throw new EvaluationError("Integer result too large");
  }
  return intVal(a ** b);
}

/**
 * Floored division of floats, rounded the way divmod rounds.
 */
function floatFloorDiv(a: number, b: number): number {
  const mod = a % b;
  let div = (a - mod) / b;
  if (mod !== 0 && b < 0 !== mod < 0) {
    div -= 1;
  }
  if (div === 0) {
    return a / b < 0 ? -0 : 0;
  }
  const floored = Math.floor(div);
  return div - floored > 0.5 ? floored + 1 : floored;
}

function power(a: number, b: number): Value {
  if (a === 0 && b < 0) {
    throw new EvaluationError("0.0 cannot be raised to a negative power");
  }
  if (a < 0 && !Number.isInteger(b)) {
    throw new EvaluationError("Negative number cannot be raised to a fractional power");
  }
  const result = a ** b;
  if (!Number.isFinite(result) && Number.isFinite(a) && Number.isFinite(b)) {
    throw new EvaluationError("Numerical result out of range");
  }
  return floatVal(result);
}

// ============================================================================
// Binary Operators
// ============================================================================

const binaryOps: Partial<Record<BinOp, BinaryImpl>> = {
  "+": numeric(
    "+",
    (a, b) => intVal(a + b),
    (a, b) => floatVal(a + b),
    (left, right) => {
      if (left.tag === "str" && right.tag === "str") return strVal(left.value + right.value);
      if (left.tag === "list" && right.tag === "list") return listVal([...left.elements, ...right.elements]);
      throw operandError("+", left, right);
    }
  ),

  "-": numeric(
    "-",
    (a, b) => intVal(a - b),
    (a, b) => floatVal(a - b),
    (left, right) => {
      if (left.tag === "set" && right.tag === "set") {
        const removed = right.elements;
        return setVal(left.elements.filter((e) => !removed.some((r) => valuesEqual(e, r))));
      }
      throw operandError("-", left, right);
    }
  ),

  "*": numeric(
    "*",
    (a, b) => intVal(a * b),
    (a, b) => floatVal(a * b),
    repeat("*")
  ),

  "/": numeric(
    "/",
    (a, b) => {
      if (b === 0n) throw new EvaluationError("Division by zero");
      return floatVal(intTrueDivide(a, b));
    },
    (a, b) => {
      if (b === 0) throw new EvaluationError("Float division by zero");
      return floatVal(a / b);
    }
  ),

  "//": numeric(
    "//",
    (a, b) => {
      if (b === 0n) throw new EvaluationError("Integer division or modulo by zero");
      return intVal(floorDiv(a, b));
    },
    (a, b) => {
      if (b === 0) throw new EvaluationError("Float floor division by zero");
      return floatVal(floatFloorDiv(a, b));
    }
  ),

  "%": numeric(
    "%",
    (a, b) => {
      if (b === 0n) throw new EvaluationError("Integer division or modulo by zero");
      return intVal(floorMod(a, b));
    },
    (a, b) => {
      if (b === 0) throw new EvaluationError("Float modulo by zero");
      return floatVal(floatMod(a, b));
    }
  ),

  "**": numeric(
    "**",
    intPower,
    power
  ),
};

export function getBinaryOp(op: BinOp): BinaryImpl {
  const impl = binaryOps[op];
  if (impl === undefined) {
    throw new UnsupportedOperatorError(op);
  }
  return impl;
}

// ============================================================================
// Unary Operators
// ============================================================================

function requireNumeric(op: string, operand: Value): Numeric {
  if (!isNumeric(operand)) {
    throw new EvaluationError(`Bad operand type for unary ${op}: '${typeName(operand)}'`);
  }
  return operand;
}

const unaryOps: Record<UnaryOp, UnaryImpl> = {
  "+": (operand) => {
    const n = requireNumeric("+", operand);
    return n.tag === "float" ? n : intVal(asBigInt(n));
  },

  "-": (operand) => {
    const n = requireNumeric("-", operand);
    return n.tag === "float" ? floatVal(-n.value) : intVal(-asBigInt(n));
  },

  not: (operand) => boolVal(!truthy(operand)),

  "~": (operand) => {
    if (!isInteger(operand)) {
      throw new EvaluationError(`Bad operand type for unary ~: '${typeName(operand)}'`);
    }
    return intVal(-asBigInt(operand) - 1n);
  },
};

export function getUnaryOp(op: UnaryOp): UnaryImpl {
  const impl: UnaryImpl | undefined = unaryOps[op];
  if (impl === undefined) {
    throw new UnsupportedOperatorError(op);
  }
  return impl;
}

// ============================================================================
// Comparison Operators
// ============================================================================

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : a === b ? 0 : NaN;
}

/**
 * Exact comparison of an integer with a float, whatever the integer's size.
 */
function compareIntFloat(a: bigint, f: number): number {
  if (Number.isNaN(f)) return NaN;
  if (!Number.isFinite(f)) return f > 0 ? -1 : 1;
  const whole = Math.floor(f);
  const w = BigInt(whole);
  if (a < w) return -1;
  if (a > w) return 1;
  return f > whole ? -1 : 0;
}

/**
 * Three-way comparison for ordered operands; NaN when unordered (float NaN).
 */
function order(op: string, left: Value, right: Value): number {
  if (isNumeric(left) && isNumeric(right)) {
    if (isInteger(left) && isInteger(right)) {
      const a = asBigInt(left);
      const b = asBigInt(right);
      return a < b ? -1 : a > b ? 1 : 0;
    }
    if (isInteger(left) && right.tag === "float") {
      return compareIntFloat(asBigInt(left), right.value);
    }
    if (left.tag === "float" && isInteger(right)) {
      return -compareIntFloat(asBigInt(right), left.value);
    }
    return compareNumbers(asNumber(left), asNumber(right));
  }
  if (left.tag === "str" && right.tag === "str") {
    return left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
  }
  if (left.tag === "list" && right.tag === "list") {
    const length = Math.min(left.elements.length, right.elements.length);
    for (let i = 0; i < length; i++) {
      if (!valuesEqual(left.elements[i], right.elements[i])) {
        return order(op, left.elements[i], right.elements[i]);
      }
    }
    return left.elements.length - right.elements.length;
  }
  throw new EvaluationError(`'${op}' not supported between '${typeName(left)}' and '${typeName(right)}'`);
}

function isSubset(left: Value[], right: Value[]): boolean {
  return left.every((e) => right.some((r) => valuesEqual(e, r)));
}

/**
 * Sets order by inclusion; everything else by order().
 */
function ordering(op: "<" | "<=" | ">" | ">=", test: (cmp: number) => boolean): CompareImpl {
  return (left, right) => {
    if (left.tag === "set" && right.tag === "set") {
      const [small, large] = op === "<" || op === "<=" ? [left.elements, right.elements] : [right.elements, left.elements];
      const strict = op === "<" || op === ">";
      return isSubset(small, large) && (!strict || small.length < large.length);
    }
    return test(order(op, left, right));
  };
}

function contains(container: Value, item: Value): boolean {
  if (container.tag === "str") {
    if (item.tag !== "str") {
      throw new EvaluationError(`'in <str>' requires str as left operand, not '${typeName(item)}'`);
    }
    return container.value.includes(item.value);
  }
  if (container.tag === "list" || container.tag === "set" || container.tag === "map" || container.tag === "sequence") {
    for (const element of iterateValue(container)) {
      if (valuesIdentical(element, item) || valuesEqual(element, item)) return true;
    }
    return false;
  }
  throw new EvaluationError(`Argument of type '${typeName(container)}' is not iterable`);
}

const compareOps: Record<CompareOp, CompareImpl> = {
  "==": (left, right) => valuesEqual(left, right),
  "!=": (left, right) => !valuesEqual(left, right),
  "<": ordering("<", (cmp) => cmp < 0),
  "<=": ordering("<=", (cmp) => cmp <= 0),
  ">": ordering(">", (cmp) => cmp > 0),
  ">=": ordering(">=", (cmp) => cmp >= 0),
  is: (left, right) => valuesIdentical(left, right),
  "is not": (left, right) => !valuesIdentical(left, right),
  in: (left, right) => contains(right, left),
  "not in": (left, right) => !contains(right, left),
};

export function getCompareOp(op: CompareOp): CompareImpl {
  const impl: CompareImpl | undefined = compareOps[op];
  if (impl === undefined) {
    throw new UnsupportedOperatorError(op);
  }
  return impl;
}
