/**
 * Lexer - Tokenizes expression text into tokens.
 */

import { ExpressionSyntaxError } from "./errors";

// ============================================================================
// Token Types
// ============================================================================

export type TokenType =
  // Literals
  | "INT"
  | "FLOAT"
  | "IMAGINARY"
  | "STRING"
  | "BYTES"
  | "FSTRING"
  | "TRUE"
  | "FALSE"
  | "NONE"
  // Identifiers
  | "NAME"
  // Keywords
  | "AND"
  | "OR"
  | "NOT"
  | "IN"
  | "IS"
  | "IF"
  | "ELSE"
  | "FOR"
  | "LAMBDA"
  | "RESERVED"
  // Operators
  | "PLUS"
  | "MINUS"
  | "STAR"
  | "DOUBLESTAR"
  | "SLASH"
  | "DOUBLESLASH"
  | "PERCENT"
  | "AT"
  | "TILDE"
  | "AMP"
  | "PIPE"
  | "CARET"
  | "LSHIFT"
  | "RSHIFT"
  | "EQ"
  | "NEQ"
  | "LT"
  | "GT"
  | "LTE"
  | "GTE"
  // Assignment
  | "ASSIGN"
  | "AUGASSIGN"
  | "WALRUS"
  // Punctuation
  | "LPAREN"
  | "RPAREN"
  | "LBRACE"
  | "RBRACE"
  | "LBRACKET"
  | "RBRACKET"
  | "COMMA"
  | "COLON"
  | "DOT"
  | "ELLIPSIS"
  | "ARROW"
  | "SEMICOLON"
  // Special
  | "NEWLINE"
  | "EOF";

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

// ============================================================================
// Keywords
// ============================================================================

const KEYWORDS: Record<string, TokenType> = {
  True: "TRUE",
  False: "FALSE",
  None: "NONE",
  and: "AND",
  or: "OR",
  not: "NOT",
  in: "IN",
  is: "IS",
  if: "IF",
  else: "ELSE",
  for: "FOR",
  lambda: "LAMBDA",
};

/**
 * Keywords that only introduce statements or forms the evaluator never runs.
 */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "as",
  "assert",
  "async",
  "await",
  "break",
  "class",
  "continue",
  "def",
  "del",
  "elif",
  "except",
  "finally",
  "from",
  "global",
  "import",
  "nonlocal",
  "pass",
  "raise",
  "return",
  "try",
  "while",
  "with",
  "yield",
]);

const STRING_PREFIXES = new Set(["r", "u", "b", "br", "rb", "f", "fr", "rf"]);

const AUGMENTED_OPERATORS = ["**=", "//=", ">>=", "<<=", "+=", "-=", "*=", "/=", "%=", "@=", "&=", "|=", "^="];

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

// ============================================================================
// Lexer Class
// ============================================================================

export class Lexer {
  private source: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private depth: number = 0;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespaceAndComments();
      if (this.isAtEnd()) break;

      if (this.peek() === "\n") {
        const line = this.line;
        const column = this.column;
        this.advance();
        // Newlines inside brackets are implicit line joins
        const last = tokens[tokens.length - 1];
        if (this.depth === 0 && last !== undefined && last.type !== "NEWLINE") {
          tokens.push({ type: "NEWLINE", value: "\n", line, column });
        }
        continue;
      }

      tokens.push(this.nextToken());
    }

    tokens.push(this.makeToken("EOF", ""));
    return tokens;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private peek(offset: number = 0): string {
    return this.source[this.pos + offset] ?? "";
  }

  private advance(): string {
    const ch = this.source[this.pos] ?? "";
    this.pos++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private makeToken(type: TokenType, value: string): Token {
    return { type, value, line: this.line, column: this.column - value.length };
  }

  private error(message: string, line: number = this.line, column: number = this.column): LexerError {
    return new LexerError(message, line, column);
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const ch = this.peek();

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\f") {
        this.advance();
      } else if (ch === "#") {
        while (!this.isAtEnd() && this.peek() !== "\n") {
          this.advance();
        }
      } else if (ch === "\\" && (this.peek(1) === "\n" || (this.peek(1) === "\r" && this.peek(2) === "\n"))) {
        // Explicit line continuation
        this.advance();
        if (this.peek() === "\r") this.advance();
        this.advance();
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const ch = this.peek();

    // Numbers
    if (this.isDigit(ch) || (ch === "." && this.isDigit(this.peek(1)))) {
      return this.readNumber();
    }

    // Strings
    if (ch === '"' || ch === "'") {
      return this.readString("");
    }

    // Identifiers, keywords and prefixed strings
    if (this.isAlpha(ch)) {
      return this.readIdentifier();
    }

    // Operators and punctuation
    return this.readOperator();
  }

  private isDigit(ch: string): boolean {
    return ch >= "0" && ch <= "9";
  }

  private isAlpha(ch: string): boolean {
    return ch === "_" || /^\p{L}$/u.test(ch);
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || /^\p{N}$/u.test(ch);
  }

  private readDigits(valid: (ch: string) => boolean): string {
    let digits = "";
    while (!this.isAtEnd() && (valid(this.peek()) || this.peek() === "_")) {
      digits += this.advance();
    }
    if (digits.startsWith("_") || digits.endsWith("_") || digits.includes("__")) {
      throw this.error(`Invalid digit separator in '${digits}'`);
    }
    return digits.replace(/_/g, "");
  }

  private readNumber(): Token {
    const startLine = this.line;
    const startCol = this.column;

    // Prefixed integers
    if (this.peek() === "0" && /[xXoObB]/.test(this.peek(1))) {
      this.advance();
      const kind = this.advance().toLowerCase();
      if (this.peek() === "_") this.advance();
      const valid =
        kind === "x" ? (c: string) => /[0-9a-fA-F]/.test(c) : kind === "o" ? (c: string) => /[0-7]/.test(c) : (c: string) => c === "0" || c === "1";
      const digits = this.readDigits(valid);
      if (digits === "" || this.isAlphaNumeric(this.peek())) {
        throw this.error(`Invalid ${kind === "x" ? "hexadecimal" : kind === "o" ? "octal" : "binary"} literal`, startLine, startCol);
      }
      return { type: "INT", value: `0${kind}${digits}`, line: startLine, column: startCol };
    }

    let value = this.readDigits((c) => this.isDigit(c));
    let isFloat = false;

    // Decimal part
    if (this.peek() === ".") {
      isFloat = true;
      value += this.advance();
      if (this.isDigit(this.peek())) {
        value += this.readDigits((c) => this.isDigit(c));
      }
    }

    // Exponent
    if ((this.peek() === "e" || this.peek() === "E") && (this.isDigit(this.peek(1)) || (/[+-]/.test(this.peek(1)) && this.isDigit(this.peek(2))))) {
      isFloat = true;
      value += this.advance();
      if (this.peek() === "+" || this.peek() === "-") {
        value += this.advance();
      }
      value += this.readDigits((c) => this.isDigit(c));
    }

    if (this.peek() === "j" || this.peek() === "J") {
      this.advance();
      return { type: "IMAGINARY", value: value + "j", line: startLine, column: startCol };
    }

    if (this.isAlpha(this.peek())) {
      throw this.error(`Invalid decimal literal`, startLine, startCol);
    }

    if (!isFloat && value.length > 1 && value.startsWith("0") && /[1-9]/.test(value)) {
      throw this.error("Leading zeros in decimal integer literals are not permitted", startLine, startCol);
    }

    return { type: isFloat ? "FLOAT" : "INT", value, line: startLine, column: startCol };
  }

  private readString(prefix: string): Token {
    const startLine = this.line;
    const startCol = this.column - prefix.length;
    const lowered = prefix.toLowerCase();
    const raw = lowered.includes("r");
    const quote = this.advance();
    const triple = this.peek() === quote && this.peek(1) === quote;
    if (triple) {
      this.advance();
      this.advance();
    }

    let value = "";
    for (;;) {
      if (this.isAtEnd()) {
        throw this.error("Unterminated string literal", startLine, startCol);
      }
      const ch = this.peek();

      if (ch === quote && (!triple || (this.peek(1) === quote && this.peek(2) === quote))) {
        this.advance();
        if (triple) {
          this.advance();
          this.advance();
        }
        break;
      }

      if (ch === "\n" && !triple) {
        throw this.error("Unterminated string literal", startLine, startCol);
      }

      if (ch === "\\") {
        this.advance(); // consume backslash
        if (this.isAtEnd()) {
          throw this.error("Unterminated string literal", startLine, startCol);
        }
        value += raw ? "\\" + this.advance() : this.readEscape();
        continue;
      }

      value += this.advance();
    }

    const type: TokenType = lowered.includes("b") ? "BYTES" : lowered.includes("f") ? "FSTRING" : "STRING";
    return { type, value, line: startLine, column: startCol };
  }

  private readEscape(): string {
    const escaped = this.advance();
    const simple = SIMPLE_ESCAPES[escaped];
    if (simple !== undefined) return simple;

    switch (escaped) {
      case "\n":
        return "";
      case "x":
        return this.readCodePoint(2, escaped);
      case "u":
        return this.readCodePoint(4, escaped);
      case "U":
        return this.readCodePoint(8, escaped);
    }

    if (/[0-7]/.test(escaped)) {
      let digits = escaped;
      while (digits.length < 3 && /[0-7]/.test(this.peek())) {
        digits += this.advance();
      }
      return String.fromCodePoint(parseInt(digits, 8));
    }

    // Unknown escapes keep their backslash
    return "\\" + escaped;
  }

  private readCodePoint(length: number, kind: string): string {
    let digits = "";
    while (digits.length < length && /[0-9a-fA-F]/.test(this.peek())) {
      digits += this.advance();
    }
    const code = parseInt(digits, 16);
    if (digits.length !== length || code > 0x10ffff) {
      throw this.error(`Truncated \\${kind} escape`);
    }
    return String.fromCodePoint(code);
  }

  private readIdentifier(): Token {
    const startLine = this.line;
    const startCol = this.column;
    let value = "";

    while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
      value += this.advance();
    }

    if ((this.peek() === '"' || this.peek() === "'") && STRING_PREFIXES.has(value.toLowerCase())) {
      return this.readString(value);
    }

    const keyword = KEYWORDS[value];
    if (keyword !== undefined) {
      return { type: keyword, value, line: startLine, column: startCol };
    }
    if (RESERVED_WORDS.has(value)) {
      return { type: "RESERVED", value, line: startLine, column: startCol };
    }
    return { type: "NAME", value, line: startLine, column: startCol };
  }

  private readOperator(): Token {
    const startLine = this.line;
    const startCol = this.column;
    const token = (type: TokenType, value: string): Token => {
      for (let i = 0; i < value.length; i++) this.advance();
      return { type, value, line: startLine, column: startCol };
    };

    for (const op of AUGMENTED_OPERATORS) {
      if (this.source.startsWith(op, this.pos)) {
        return token("AUGASSIGN", op);
      }
    }

    const ch = this.peek();
    const next = this.peek(1);

    switch (ch) {
      case "+": return token("PLUS", "+");
      case "-": return next === ">" ? token("ARROW", "->") : token("MINUS", "-");
      case "*": return next === "*" ? token("DOUBLESTAR", "**") : token("STAR", "*");
      case "/": return next === "/" ? token("DOUBLESLASH", "//") : token("SLASH", "/");
      case "%": return token("PERCENT", "%");
      case "@": return token("AT", "@");
      case "~": return token("TILDE", "~");
      case "&": return token("AMP", "&");
      case "|": return token("PIPE", "|");
      case "^": return token("CARET", "^");

      case "(":
      case "[":
      case "{":
        this.depth++;
        return token(ch === "(" ? "LPAREN" : ch === "[" ? "LBRACKET" : "LBRACE", ch);
      case ")":
      case "]":
      case "}":
        this.depth = Math.max(0, this.depth - 1);
        return token(ch === ")" ? "RPAREN" : ch === "]" ? "RBRACKET" : "RBRACE", ch);

      case ",": return token("COMMA", ",");
      case ";": return token("SEMICOLON", ";");
      case ":": return next === "=" ? token("WALRUS", ":=") : token("COLON", ":");
      case ".":
        return next === "." && this.peek(2) === "." ? token("ELLIPSIS", "...") : token("DOT", ".");

      case "=": return next === "=" ? token("EQ", "==") : token("ASSIGN", "=");
      case "!":
        if (next === "=") return token("NEQ", "!=");
        break;
      case "<":
        if (next === "<") return token("LSHIFT", "<<");
        if (next === "=") return token("LTE", "<=");
        return token("LT", "<");
      case ">":
        if (next === ">") return token("RSHIFT", ">>");
        if (next === "=") return token("GTE", ">=");
        return token("GT", ">");
    }

    throw this.error(`Unexpected character '${ch}'`);
  }
}

// ============================================================================
// Errors
// ============================================================================

export class LexerError extends ExpressionSyntaxError {
  constructor(message: string, line: number, column: number) {
    super(message, line, column);
    this.name = "LexerError";
  }
}

// ============================================================================
// Convenience Function
// ============================================================================

export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
