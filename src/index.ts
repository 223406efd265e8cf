/**
 * Hierarchical configuration with expression-valued entries.
 */

// Errors
export {
  ConfigError,
  ExpressionSyntaxError,
  UnsupportedSyntaxError,
  UnknownFunctionError,
  UnsupportedOperatorError,
  ArityError,
  EvaluationError,
  KeyNotFoundError,
  AmbiguousKeyError,
  MissingSubsectionError,
  InvalidPathError,
  IniSyntaxError,
  ConfigLoadError,
} from "./errors";

// Values
export type {
  Value,
  ValueTag,
  NoneValue,
  BoolValue,
  IntValue,
  FloatValue,
  StrValue,
  ListValue,
  SetValue,
  MapValue,
  SequenceValue,
  NativeValue,
  JsonValue,
} from "./value";
export {
  noneVal,
  boolVal,
  intVal,
  floatVal,
  strVal,
  listVal,
  setVal,
  mapVal,
  sequenceVal,
  typeName,
  isHashable,
  truthy,
  iterateValue,
  valuesEqual,
  valuesIdentical,
  formatValue,
  reprValue,
  toNative,
  toJSON,
  fromNative,
} from "./value";

// Expressions
export type { Expr, BinOp, UnaryOp, BoolOp, CompareOp } from "./expr";
export { exprToString, describeKind } from "./expr";
export type { Token, TokenType } from "./lexer";
export { Lexer, LexerError, tokenize } from "./lexer";
export { Parser, ParseError, parse } from "./parser";

// Evaluator
export type { EvaluatorOptions } from "./evaluate";
export { ExpressionEvaluator, evaluate } from "./evaluate";
export type { BuiltinFunction } from "./builtin-registry";
export {
  BuiltinRegistry,
  DEFAULT_FUNCTIONS,
  DEFAULT_CONSTANTS,
  bindArguments,
  createDefaultRegistry,
} from "./builtin-registry";
export { getBinaryOp, getUnaryOp, getCompareOp } from "./builtins";

// Section tree
export type {
  Entry,
  ConfigDict,
  LookupOptions,
  LookupPolicy,
  LookupScope,
  EnsurePathResult,
  SplitPath,
} from "./section";
export { Section } from "./section";
export type { FormatOptions, TreeStyler } from "./format";
export { formatTree, plainStyler, colorStyler } from "./format";

// Loading
export type { IniSection, IniOptions } from "./ini";
export { IniReader, parseIni } from "./ini";
export type { ConfigSource, LoaderOptions } from "./loader";
export { loadConfig, loadConfigSync, buildTree, DEFAULT_ROOT_NAME, DEFAULT_CONSTANTS_SECTION } from "./loader";
export type { Logger } from "./logger";
export { logger, silentLogger } from "./logger";
