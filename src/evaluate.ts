/**
 * Restricted expression evaluator.
 *
 * Reduces a parsed syntax tree to a Value. Dispatch is one exhaustive
 * switch over the node tag: the whitelisted kinds have a handler, every
 * other kind is refused with UnsupportedSyntaxError. There is no path
 * from an expression to attribute access, subscripting, assignment or
 * any callable outside the registry.
 */

import {
  Expr,
  LitExpr,
  BinOpExpr,
  UnaryOpExpr,
  BoolOpExpr,
  CompareExpr,
  DictExpr,
  CallExpr,
  ModuleExpr,
  describeKind,
} from "./expr";
import { parse } from "./parser";
import { getBinaryOp, getUnaryOp, getCompareOp } from "./builtins";
import { BuiltinFunction, BuiltinRegistry, createDefaultRegistry } from "./builtin-registry";
import { ArityError, UnknownFunctionError, UnsupportedSyntaxError } from "./errors";
import {
  Value,
  noneVal,
  boolVal,
  intVal,
  floatVal,
  strVal,
  listVal,
  setVal,
  mapVal,
  sequenceVal,
  truthy,
} from "./value";

// ============================================================================
// Options
// ============================================================================

export interface EvaluatorOptions {
  /** Extra constants, installed after the defaults. */
  constants?: Record<string, Value>;
  /** Extra functions, installed after the defaults. */
  functions?: Record<string, BuiltinFunction>;
}

// ============================================================================
// Evaluator
// ============================================================================

export class ExpressionEvaluator {
  private readonly registry: BuiltinRegistry;

  constructor(options: EvaluatorOptions = {}) {
    this.registry = createDefaultRegistry();
    for (const [name, value] of Object.entries(options.constants ?? {})) {
      this.registry.registerConstant(name, value);
    }
    for (const [name, fn] of Object.entries(options.functions ?? {})) {
      this.registry.registerFunction(name, fn);
    }
  }

  registerConstant(name: string, value: Value): void {
    this.registry.registerConstant(name, value);
  }

  registerFunction(name: string, fn: BuiltinFunction): void {
    this.registry.registerFunction(name, fn);
  }

  hasConstant(name: string): boolean {
    return this.registry.hasConstant(name);
  }

  hasFunction(name: string): boolean {
    return this.registry.hasFunction(name);
  }

  constantNames(): string[] {
    return this.registry.constantNames();
  }

  functionNames(): string[] {
    return this.registry.functionNames();
  }

  getConstant(name: string): Value | undefined {
    return this.registry.getConstant(name);
  }

  /**
   * Parse and evaluate expression text.
   */
  evaluate(text: string): Value {
    return this.evaluateExpr(parse(text));
  }

  evaluateExpr(expr: Expr): Value {
    switch (expr.tag) {
      case "lit":
        return this.evalLiteral(expr);

      case "name":
        return this.registry.getConstant(expr.name) ?? strVal(expr.name);

      case "binop":
        return this.evalBinaryOp(expr);

      case "unary":
        return this.evalUnaryOp(expr);

      case "boolop":
        return this.evalBoolOp(expr);

      case "compare":
        return this.evalCompare(expr);

      case "list":
        return listVal(this.evalElements(expr.elements));

      case "set":
        return setVal(this.evalElements(expr.elements));

      case "tuple":
        return sequenceVal(this.lazyElements(expr.elements));

      case "dict":
        return this.evalDict(expr);

      case "call":
        return this.evalCall(expr);

      case "module":
        return this.evalModule(expr);

      case "attribute":
      case "subscript":
      case "slice":
      case "lambda":
      case "conditional":
      case "comprehension":
      case "starred":
      case "named":
      case "assign":
      case "statement":
      case "unsupportedLiteral":
        throw new UnsupportedSyntaxError(describeKind(expr));
    }
  }

  // ==========================================================================
  // Handlers
  // ==========================================================================

  /**
   * A string literal spelling a constant's name yields the constant.
   */
  private evalLiteral(expr: LitExpr): Value {
    const value = expr.value;
    if (value === null) return noneVal;
    if (typeof value === "boolean") return boolVal(value);
    if (typeof value === "bigint") return intVal(value);
    if (typeof value === "number") return floatVal(value);
    return this.registry.getConstant(value) ?? strVal(value);
  }

  private evalBinaryOp(expr: BinOpExpr): Value {
    const impl = getBinaryOp(expr.op);
    const left = this.evaluateExpr(expr.left);
    const right = this.evaluateExpr(expr.right);
    return impl(left, right);
  }

  private evalUnaryOp(expr: UnaryOpExpr): Value {
    const impl = getUnaryOp(expr.op);
    return impl(this.evaluateExpr(expr.operand));
  }

  /**
   * Every operand is evaluated; the result is a bool, not an operand.
   */
  private evalBoolOp(expr: BoolOpExpr): Value {
    if (expr.values.length < 2) {
      throw new ArityError(expr.op, expr.values.length);
    }
    const results = expr.values.map((operand) => truthy(this.evaluateExpr(operand)));
    return boolVal(expr.op === "and" ? results.every(Boolean) : results.some(Boolean));
  }

  private evalCompare(expr: CompareExpr): Value {
    let previous = this.evaluateExpr(expr.left);
    let result = true;
    expr.ops.forEach((op, i) => {
      const impl = getCompareOp(op);
      const next = this.evaluateExpr(expr.comparators[i]);
      result = impl(previous, next) && result;
      previous = next;
    });
    return boolVal(result);
  }

  private evalElements(elements: Expr[]): Value[] {
    return elements.map((element) => this.evaluateExpr(element));
  }

  private *lazyElements(elements: Expr[]): Generator<Value> {
    for (const element of elements) {
      yield this.evaluateExpr(element);
    }
  }

  /**
   * Keys and values are evaluated independently, keys first.
   */
  private evalDict(expr: DictExpr): Value {
    const keys: Value[] = [];
    for (const entry of expr.entries) {
      if (entry.key === null) {
        throw new UnsupportedSyntaxError("double-starred expression", "mapping unpacking");
      }
      keys.push(this.evaluateExpr(entry.key));
    }
    const values = expr.entries.map((entry) => this.evaluateExpr(entry.value));
    return mapVal(keys.map((key, i): [Value, Value] => [key, values[i]]));
  }

  private evalCall(expr: CallExpr): Value {
    if (expr.func.tag !== "name") {
      throw new UnsupportedSyntaxError("call", `call target must be a bare name, got ${describeKind(expr.func)}`);
    }
    const fn = this.registry.getFunction(expr.func.name);
    if (fn === undefined) {
      throw new UnknownFunctionError(expr.func.name);
    }

    const args = this.evalElements(expr.args);
    const kwargs = new Map<string, Value>();
    for (const keyword of expr.keywords) {
      kwargs.set(keyword.name, this.evaluateExpr(keyword.value));
    }
    return fn(args, kwargs);
  }

  private evalModule(expr: ModuleExpr): Value {
    if (expr.body.length === 1) {
      return this.evaluateExpr(expr.body[0]);
    }
    return listVal(this.evalElements(expr.body));
  }
}

/**
 * Evaluate with a throwaway evaluator holding only the defaults.
 */
export function evaluate(text: string, options?: EvaluatorOptions): Value {
  return new ExpressionEvaluator(options).evaluate(text);
}
