/**
 * Error taxonomy.
 *
 * Every failure the library reports is a distinct class so callers can
 * branch with `instanceof`. All of them share the ConfigError base.
 */

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Expression Errors
// ============================================================================

/**
 * The text is not an expression at all (lexer or parser failure).
 */
export class ExpressionSyntaxError extends ConfigError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`${message} at line ${line}, column ${column}`);
    this.name = "ExpressionSyntaxError";
  }
}

/**
 * A syntax-tree node kind, or a call form, outside the whitelist.
 */
export class UnsupportedSyntaxError extends ConfigError {
  constructor(public readonly kind: string, detail?: string) {
    super(detail ? `Unsupported syntax: ${kind} (${detail})` : `Unsupported syntax: ${kind}`);
    this.name = "UnsupportedSyntaxError";
  }
}

export class UnknownFunctionError extends ConfigError {
  constructor(public readonly functionName: string) {
    super(`Unknown function ${functionName}`);
    this.name = "UnknownFunctionError";
  }
}

export class UnsupportedOperatorError extends ConfigError {
  constructor(public readonly operator: string) {
    super(`Unsupported operator '${operator}'`);
    this.name = "UnsupportedOperatorError";
  }
}

export class ArityError extends ConfigError {
  constructor(public readonly operator: string, public readonly count: number) {
    super(`Insufficient number of operands for '${operator}': expected at least 2, got ${count}`);
    this.name = "ArityError";
  }
}

/**
 * Runtime failure while reducing a well-formed expression:
 * division by zero, operand type mismatch, bad function arguments.
 */
export class EvaluationError extends ConfigError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EvaluationError";
  }
}

// ============================================================================
// Section Tree Errors
// ============================================================================

export class KeyNotFoundError extends ConfigError {
  constructor(public readonly key: string, message?: string) {
    super(message ?? `No value or section with key ${key}`);
    this.name = "KeyNotFoundError";
  }
}

export class AmbiguousKeyError extends ConfigError {
  constructor(public readonly key: string, public readonly candidates: string[]) {
    super(`Key ${key} is ambiguous, candidates: ${candidates.join(", ")}`);
    this.name = "AmbiguousKeyError";
  }
}

export class MissingSubsectionError extends ConfigError {
  constructor(public readonly path: string, public readonly missing: string) {
    super(`Cannot set ${path}: subsection ${missing} does not exist`);
    this.name = "MissingSubsectionError";
  }
}

export class InvalidPathError extends ConfigError {
  constructor(public readonly path: string, reason?: string) {
    super(reason ? `Invalid path ${path}: ${reason}` : `Invalid path ${path}`);
    this.name = "InvalidPathError";
  }
}

// ============================================================================
// Loader Errors
// ============================================================================

export class IniSyntaxError extends ConfigError {
  constructor(message: string, public readonly line: number, public readonly source?: string) {
    super(`${source ?? "<string>"}:${line}: ${message}`);
    this.name = "IniSyntaxError";
  }
}

export class ConfigLoadError extends ConfigError {
  constructor(
    public readonly section: string,
    public readonly key: string,
    public readonly raw: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to evaluate [${section}] ${key} = ${raw}: ${reason}`, { cause });
    this.name = "ConfigLoadError";
  }
}
