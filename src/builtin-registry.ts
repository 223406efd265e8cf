/**
 * Builtin Registry
 *
 * Named functions and constants an expression may refer to. Nothing else
 * is callable: a call resolves only against this registry.
 */

import { EvaluationError } from "./errors";
import { getBinaryOp } from "./builtins";
import {
  Value,
  boolVal,
  intVal,
  floatVal,
  strVal,
  isNumeric,
  asNumber,
  truthy,
  typeName,
  iterateValue,
  formatValue,
  reprValue,
} from "./value";

// ============================================================================
// Builtin Function Interface
// ============================================================================

/**
 * A registered function: positional arguments and keyword arguments in
 * call order. Throw EvaluationError for bad arguments.
 */
export type BuiltinFunction = (args: Value[], kwargs: Map<string, Value>) => Value;

export class BuiltinRegistry {
  private readonly functions = new Map<string, BuiltinFunction>();
  private readonly constants = new Map<string, Value>();

  /**
   * Registering an existing name replaces it.
   */
  registerFunction(name: string, fn: BuiltinFunction): void {
    this.functions.set(name, fn);
  }

  registerConstant(name: string, value: Value): void {
    this.constants.set(name, value);
  }

  getFunction(name: string): BuiltinFunction | undefined {
    return this.functions.get(name);
  }

  getConstant(name: string): Value | undefined {
    return this.constants.get(name);
  }

  hasFunction(name: string): boolean {
    return this.functions.has(name);
  }

  hasConstant(name: string): boolean {
    return this.constants.has(name);
  }

  functionNames(): string[] {
    return Array.from(this.functions.keys());
  }

  constantNames(): string[] {
    return Array.from(this.constants.keys());
  }
}

// ============================================================================
// Argument Binding
// ============================================================================

/**
 * Bind positional and keyword arguments to named parameters.
 * The first `required` parameters must be present.
 */
export function bindArguments(
  fnName: string,
  params: string[],
  required: number,
  args: Value[],
  kwargs: Map<string, Value>
): (Value | undefined)[] {
  if (args.length > params.length) {
    throw new EvaluationError(`${fnName}() takes at most ${params.length} argument(s) (${args.length} given)`);
  }

  const bound: (Value | undefined)[] = params.map((_, i) => args[i]);
  for (const [key, value] of kwargs) {
    const index = params.indexOf(key);
    if (index < 0) {
      throw new EvaluationError(`${fnName}() got an unexpected keyword argument '${key}'`);
    }
    if (bound[index] !== undefined) {
      throw new EvaluationError(`${fnName}() got multiple values for argument '${key}'`);
    }
    bound[index] = value;
  }

  for (let i = 0; i < required; i++) {
    if (bound[i] === undefined) {
      throw new EvaluationError(`${fnName}() missing required argument '${params[i]}'`);
    }
  }
  return bound;
}

function requireArgument(fnName: string, value: Value | undefined): Value {
  if (value === undefined) {
    throw new EvaluationError(`${fnName}() missing required argument`);
  }
  return value;
}

// ============================================================================
// Math
// ============================================================================

function mathFunction(fnName: string, impl: (x: number) => number): BuiltinFunction {
  return (args, kwargs) => {
    const [arg] = bindArguments(fnName, ["x"], 1, args, kwargs);
    const x = requireArgument(fnName, arg);
    if (!isNumeric(x)) {
      throw new EvaluationError(`${fnName}() must be a real number, not '${typeName(x)}'`);
    }
    const input = asNumber(x);
    const result = impl(input);
    if (Number.isNaN(result) && !Number.isNaN(input)) {
      throw new EvaluationError(`${fnName}(): math domain error`);
    }
    if (!Number.isFinite(result) && Number.isFinite(input)) {
      throw new EvaluationError(`${fnName}(): math range error`);
    }
    return floatVal(result);
  };
}

// ============================================================================
// Aggregation
// ============================================================================

const sum: BuiltinFunction = (args, kwargs) => {
  const [iterable, start] = bindArguments("sum", ["iterable", "start"], 1, args, kwargs);
  const add = getBinaryOp("+");
  let total: Value = start ?? intVal(0);
  if (total.tag === "str") {
    throw new EvaluationError("sum() can't sum strings");
  }
  for (const item of iterateValue(requireArgument("sum", iterable))) {
    total = add(total, item);
  }
  return total;
};

// ============================================================================
// Coercion
// ============================================================================

const DIGITS = "0123456789abcdefghijklmnopqrstuvwxyz";
const PREFIX_BASES: Record<string, number> = { "0x": 16, "0o": 8, "0b": 2 };

function parseInteger(text: string, requestedBase: number): bigint {
  const invalid = () => new EvaluationError(`Invalid literal for int() with base ${requestedBase}: ${reprValue(strVal(text))}`);

  let body = text.trim().toLowerCase();
  let sign = 1n;
  if (body.startsWith("-") || body.startsWith("+")) {
    sign = body.startsWith("-") ? -1n : 1n;
    body = body.slice(1);
  }

  let base = requestedBase;
  const prefixBase = PREFIX_BASES[body.slice(0, 2)];
  if (prefixBase !== undefined && (base === 0 || base === prefixBase)) {
    base = prefixBase;
    body = body.slice(2).replace(/^_/, "");
  } else if (base === 0) {
    if (/^0+(_0+)*$/.test(body)) return 0n;
    if (body.startsWith("0")) throw invalid();
    base = 10;
  }

  if (body === "" || body.startsWith("_") || body.endsWith("_") || body.includes("__")) {
    throw invalid();
  }

  let result = 0n;
  for (const ch of body.replace(/_/g, "")) {
    const digit = DIGITS.indexOf(ch);
    if (digit < 0 || digit >= base) throw invalid();
    result = result * BigInt(base) + BigInt(digit);
  }
  return sign * result;
}

const toInt: BuiltinFunction = (args, kwargs) => {
  const [x, baseArg] = bindArguments("int", ["x", "base"], 0, args, kwargs);
  if (x === undefined) return intVal(0);

  if (baseArg !== undefined) {
    if (x.tag !== "str") {
      throw new EvaluationError("int() can't convert non-string with explicit base");
    }
    if (baseArg.tag !== "int" && baseArg.tag !== "bool") {
      throw new EvaluationError(`int() base must be an integer, not '${typeName(baseArg)}'`);
    }
    const base = baseArg.tag === "bool" ? (baseArg.value ? 1 : 0) : Number(baseArg.value);
    if (base !== 0 && (base < 2 || base > 36)) {
      throw new EvaluationError("int() base must be >= 2 and <= 36, or 0");
    }
    return intVal(parseInteger(x.value, base));
  }

  switch (x.tag) {
    case "bool":
      return intVal(x.value ? 1 : 0);
    case "int":
      return x;
    case "float":
      if (!Number.isFinite(x.value)) {
        throw new EvaluationError(`Cannot convert float ${formatValue(x)} to integer`);
      }
      return intVal(BigInt(Math.trunc(x.value)));
    case "str":
      return intVal(parseInteger(x.value, 10));
    default:
      throw new EvaluationError(`int() argument must be a string or a number, not '${typeName(x)}'`);
  }
};

const FLOAT_PATTERN = /^[+-]?(?:\d+(?:_\d+)*(?:\.(?:\d+(?:_\d+)*)?)?|\.\d+(?:_\d+)*)(?:e[+-]?\d+(?:_\d+)*)?$/;

function parseFloatText(text: string): number {
  const body = text.trim().toLowerCase();
  const special = body.replace(/^[+-]/, "");
  const negative = body.startsWith("-");
  if (special === "inf" || special === "infinity") return negative ? -Infinity : Infinity;
  if (special === "nan") return NaN;
  if (!FLOAT_PATTERN.test(body)) {
    throw new EvaluationError(`Could not convert string to float: ${reprValue(strVal(text))}`);
  }
  return Number(body.replace(/_/g, ""));
}

const toFloat: BuiltinFunction = (args, kwargs) => {
  const [x] = bindArguments("float", ["x"], 0, args, kwargs);
  if (x === undefined) return floatVal(0);
  if (isNumeric(x)) return floatVal(asNumber(x));
  if (x.tag === "str") return floatVal(parseFloatText(x.value));
  throw new EvaluationError(`float() argument must be a string or a number, not '${typeName(x)}'`);
};

const toBool: BuiltinFunction = (args, kwargs) => {
  const [x] = bindArguments("bool", ["x"], 0, args, kwargs);
  return boolVal(x !== undefined && truthy(x));
};

const toStr: BuiltinFunction = (args, kwargs) => {
  const [x] = bindArguments("str", ["object"], 0, args, kwargs);
  return strVal(x === undefined ? "" : formatValue(x));
};

// ============================================================================
// Defaults
// ============================================================================

const sqrt = mathFunction("sqrt", Math.sqrt);

export const DEFAULT_FUNCTIONS: Readonly<Record<string, BuiltinFunction>> = {
  sin: mathFunction("sin", Math.sin),
  cos: mathFunction("cos", Math.cos),
  tan: mathFunction("tan", Math.tan),
  exp: mathFunction("exp", Math.exp),
  root: sqrt,
  sqrt,
  sum,
  int: toInt,
  float: toFloat,
  bool: toBool,
  str: toStr,
};

export const DEFAULT_CONSTANTS: Readonly<Record<string, Value>> = {
  pi: floatVal(Math.PI),
  Pi: floatVal(Math.PI),
  PI: floatVal(Math.PI),
  e: floatVal(Math.E),
  E: floatVal(Math.E),
};

export function createDefaultRegistry(): BuiltinRegistry {
  const registry = new BuiltinRegistry();
  for (const [name, fn] of Object.entries(DEFAULT_FUNCTIONS)) {
    registry.registerFunction(name, fn);
  }
  for (const [name, value] of Object.entries(DEFAULT_CONSTANTS)) {
    registry.registerConstant(name, value);
  }
  return registry;
}
