/**
 * Parser - Recursive descent parser for configuration expressions.
 *
 * Grammar (in rough precedence order, lowest to highest):
 *
 * module      = (statement (NEWLINE | ";"))*
 * statement   = RESERVED ... | testlist (("=" | AUGASSIGN) testlist)* | testlist ":" test ("=" testlist)?
 * testlist    = testOrStar ("," testOrStar)* ","?
 * testOrStar  = "*" bitOr | test (":=" test)?
 * test        = "lambda" params ":" test | orExpr ("if" orExpr "else" test)?
 * orExpr      = andExpr ("or" andExpr)*
 * andExpr     = notExpr ("and" notExpr)*
 * notExpr     = "not" notExpr | comparison
 * comparison  = bitOr (compOp bitOr)*
 * bitOr       = bitXor ("|" bitXor)*
 * bitXor      = bitAnd ("^" bitAnd)*
 * bitAnd      = shift ("&" shift)*
 * shift       = arith (("<<" | ">>") arith)*
 * arith       = term (("+" | "-") term)*
 * term        = factor (("*" | "@" | "/" | "//" | "%") factor)*
 * factor      = ("+" | "-" | "~") factor | power
 * power       = postfix ("**" factor)?
 * postfix     = primary (call | "." NAME | "[" subscript "]")*
 * primary     = INT | FLOAT | STRING+ | "True" | "False" | "None" | NAME
 *             | ("and" | "or") "(" args ")"
 *             | "(" testlist? ")" | "[" testlist? "]" | "{" entries? "}"
 */

import { Token, TokenType, tokenize } from "./lexer";
import { ExpressionSyntaxError } from "./errors";
import {
  Expr,
  ModuleExpr,
  DictEntry,
  Keyword,
  CompareOp,
  BinOp,
  ComprehensionExpr,
  lit,
  name,
  binop,
  unary,
  boolop,
  compare,
  list,
  tuple,
  set,
  dict,
  call,
  moduleExpr,
  attribute,
  subscript,
  slice,
  lambda,
  conditional,
  comprehension,
  starred,
  named,
  assign,
  statement,
  unsupportedLiteral,
} from "./expr";

const EXPRESSION_START: ReadonlySet<TokenType> = new Set<TokenType>([
  "INT",
  "FLOAT",
  "IMAGINARY",
  "STRING",
  "BYTES",
  "FSTRING",
  "TRUE",
  "FALSE",
  "NONE",
  "NAME",
  "NOT",
  "LAMBDA",
  "PLUS",
  "MINUS",
  "TILDE",
  "LPAREN",
  "LBRACKET",
  "LBRACE",
  "ELLIPSIS",
  "STAR",
  "AND",
  "OR",
  "RESERVED",
]);

const SIMPLE_COMPARISONS: Partial<Record<TokenType, CompareOp>> = {
  EQ: "==",
  NEQ: "!=",
  LT: "<",
  LTE: "<=",
  GT: ">",
  GTE: ">=",
};

// ============================================================================
// Parser Class
// ============================================================================

export class Parser {
  private tokens: Token[];
  private pos: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parse(): ModuleExpr {
    const body: Expr[] = [];

    while (!this.isAtEnd()) {
      if (this.match("NEWLINE", "SEMICOLON")) continue;

      body.push(this.parseStatement());

      if (!this.isAtEnd() && !this.match("NEWLINE", "SEMICOLON")) {
        const tok = this.peek();
        throw this.error(`Unexpected token '${tok.value}'`, tok);
      }
    }

    return moduleExpr(body);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private isAtEnd(): boolean {
    return this.peek().type === "EOF";
  }

  private peek(offset: number = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private previous(): Token {
    return this.tokens[this.pos - 1];
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.pos++;
    }
    return this.previous();
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  private expect(type: TokenType, message: string): Token {
    if (this.check(type)) {
      return this.advance();
    }
    throw this.error(message, this.peek());
  }

  private error(message: string, tok: Token): ParseError {
    const got = tok.type === "EOF" ? "end of input" : `'${tok.value}'`;
    return new ParseError(`${message}, got ${got}`, tok.line, tok.column);
  }

  private canStartExpression(): boolean {
    return EXPRESSION_START.has(this.peek().type);
  }

  // ==========================================================================
  // Statements
  // ==========================================================================

  private parseStatement(): Expr {
    const startsStatement = this.check("FOR") || this.check("IF") || this.check("ELSE");
    if (startsStatement || (this.check("RESERVED") && this.peek().value !== "await")) {
      const keyword = this.advance().value;
      // Only the keyword matters; the rest of the statement is never run
      while (!this.isAtEnd() && !this.check("NEWLINE") && !this.check("SEMICOLON")) {
        this.advance();
      }
      return statement(keyword);
    }

    const first = this.parseTestList();

    if (this.check("ASSIGN")) {
      const targets: Expr[] = [first];
      let value: Expr = first;
      while (this.match("ASSIGN")) {
        value = this.parseTestList();
        targets.push(value);
      }
      targets.pop();
      return assign("=", targets, value);
    }

    if (this.check("AUGASSIGN")) {
      const op = this.advance().value;
      return assign(op, [first], this.parseTestList());
    }

    if (this.match("COLON")) {
      this.parseTest(); // annotation
      const value = this.match("ASSIGN") ? this.parseTestList() : null;
      return assign(":", [first], value);
    }

    return first;
  }

  // ==========================================================================
  // Expression Parsing
  // ==========================================================================

  /**
   * Bare comma-separated expressions form a tuple.
   */
  private parseTestList(): Expr {
    const first = this.parseTestOrStar();
    if (!this.check("COMMA")) return first;

    const elements = [first];
    while (this.match("COMMA")) {
      if (!this.canStartExpression()) break;
      elements.push(this.parseTestOrStar());
    }
    return tuple(...elements);
  }

  private parseTestOrStar(): Expr {
    if (this.match("STAR")) {
      return starred(this.parseBitOr());
    }
    const expr = this.parseTest();
    if (this.match("WALRUS")) {
      return named(expr, this.parseTest());
    }
    return expr;
  }

  private parseTest(): Expr {
    if (this.check("LAMBDA")) return this.parseLambda();

    const body = this.parseOrExpr();
    if (this.match("IF")) {
      const test = this.parseOrExpr();
      this.expect("ELSE", "Expected 'else' in conditional expression");
      const orElse = this.parseTest();
      return conditional(test, body, orElse);
    }
    return body;
  }

  private parseLambda(): Expr {
    this.expect("LAMBDA", "Expected 'lambda'");
    const params: string[] = [];
    while (!this.check("COLON") && !this.isAtEnd()) {
      const tok = this.advance();
      if (tok.type === "NAME") params.push(tok.value);
    }
    this.expect("COLON", "Expected ':' after lambda parameters");
    return lambda(params, this.parseTest());
  }

  private parseOrExpr(): Expr {
    const values = [this.parseAndExpr()];
    while (this.match("OR")) {
      values.push(this.parseAndExpr());
    }
    return values.length === 1 ? values[0] : boolop("or", values);
  }

  private parseAndExpr(): Expr {
    const values = [this.parseNotExpr()];
    while (this.match("AND")) {
      values.push(this.parseNotExpr());
    }
    return values.length === 1 ? values[0] : boolop("and", values);
  }

  private parseNotExpr(): Expr {
    if (this.match("NOT")) {
      return unary("not", this.parseNotExpr());
    }
    return this.parseComparison();
  }

  private parseComparison(): Expr {
    const left = this.parseBitOr();
    const ops: CompareOp[] = [];
    const comparators: Expr[] = [];

    for (let op = this.matchCompareOp(); op !== null; op = this.matchCompareOp()) {
      ops.push(op);
      comparators.push(this.parseBitOr());
    }

    return ops.length === 0 ? left : compare(left, ops, comparators);
  }

  private matchCompareOp(): CompareOp | null {
    const simple = SIMPLE_COMPARISONS[this.peek().type];
    if (simple !== undefined) {
      this.advance();
      return simple;
    }
    if (this.match("IN")) return "in";
    if (this.check("NOT") && this.peek(1).type === "IN") {
      this.advance();
      this.advance();
      return "not in";
    }
    if (this.match("IS")) {
      return this.match("NOT") ? "is not" : "is";
    }
    return null;
  }

  private parseBinaryLevel(next: () => Expr, ops: Partial<Record<TokenType, BinOp>>): Expr {
    let left = next();
    for (let op = ops[this.peek().type]; op !== undefined; op = ops[this.peek().type]) {
      this.advance();
      left = binop(op, left, next());
    }
    return left;
  }

  private parseBitOr(): Expr {
    return this.parseBinaryLevel(() => this.parseBitXor(), { PIPE: "|" });
  }

  private parseBitXor(): Expr {
    return this.parseBinaryLevel(() => this.parseBitAnd(), { CARET: "^" });
  }

  private parseBitAnd(): Expr {
    return this.parseBinaryLevel(() => this.parseShift(), { AMP: "&" });
  }

  private parseShift(): Expr {
    return this.parseBinaryLevel(() => this.parseArith(), { LSHIFT: "<<", RSHIFT: ">>" });
  }

  private parseArith(): Expr {
    return this.parseBinaryLevel(() => this.parseTerm(), { PLUS: "+", MINUS: "-" });
  }

  private parseTerm(): Expr {
    return this.parseBinaryLevel(() => this.parseFactor(), {
      STAR: "*",
      AT: "@",
      SLASH: "/",
      DOUBLESLASH: "//",
      PERCENT: "%",
    });
  }

  private parseFactor(): Expr {
    if (this.match("PLUS")) return unary("+", this.parseFactor());
    if (this.match("MINUS")) return unary("-", this.parseFactor());
    if (this.match("TILDE")) return unary("~", this.parseFactor());
    return this.parsePower();
  }

  private parsePower(): Expr {
    const base = this.parsePostfix();
    if (this.match("DOUBLESTAR")) {
      // Right associative, and binds tighter than a unary operator on its left
      return binop("**", base, this.parseFactor());
    }
    return base;
  }

  private parsePostfix(): Expr {
    let expr = this.parsePrimary();

    for (;;) {
      if (this.match("LPAREN")) {
        const { args, keywords } = this.parseArguments();
        expr = call(expr, args, keywords);
      } else if (this.match("DOT")) {
        const field = this.expect("NAME", "Expected attribute name after '.'");
        expr = attribute(expr, field.value);
      } else if (this.match("LBRACKET")) {
        const index = this.parseSubscript();
        this.expect("RBRACKET", "Expected ']' after subscript");
        expr = subscript(expr, index);
      } else {
        return expr;
      }
    }
  }

  /**
   * Parses call arguments after the opening parenthesis, consuming the
   * closing one.
   */
  private parseArguments(): { args: Expr[]; keywords: Keyword[] } {
    const args: Expr[] = [];
    const keywords: Keyword[] = [];

    while (!this.check("RPAREN")) {
      if (this.match("DOUBLESTAR")) {
        args.push(starred(this.parseTest(), true));
      } else if (this.check("NAME") && this.peek(1).type === "ASSIGN") {
        const keyword = this.advance().value;
        this.advance();
        if (keywords.some((k) => k.name === keyword)) {
          throw this.error(`Keyword argument repeated: ${keyword}`, this.previous());
        }
        keywords.push({ name: keyword, value: this.parseTest() });
      } else {
        if (keywords.length > 0 && !this.check("STAR")) {
          throw this.error("Positional argument follows keyword argument", this.peek());
        }
        const arg = this.parseTestOrStar();
        args.push(this.check("FOR") ? this.parseComprehension("generator", arg) : arg);
      }

      if (!this.match("COMMA")) break;
    }

    this.expect("RPAREN", "Expected ')' after arguments");
    return { args, keywords };
  }

  private parseSubscript(): Expr {
    const items = [this.parseSliceItem()];
    let isTuple = false;
    while (this.match("COMMA")) {
      isTuple = true;
      if (this.check("RBRACKET")) break;
      items.push(this.parseSliceItem());
    }
    return isTuple ? tuple(...items) : items[0];
  }

  private parseSliceItem(): Expr {
    const lower = this.check("COLON") ? undefined : this.parseTestOrStar();
    if (!this.match("COLON")) {
      if (lower === undefined) {
        throw this.error("Expected subscript", this.peek());
      }
      return lower;
    }
    const optional = (): Expr | undefined =>
      this.check("COLON") || this.check("COMMA") || this.check("RBRACKET") ? undefined : this.parseTest();
    const upper = optional();
    const step = this.match("COLON") ? optional() : undefined;
    return slice(lower, upper, step);
  }

  /**
   * Consumes `for ... in ... if ...` clauses after a comprehension element.
   */
  private parseComprehension(kind: ComprehensionExpr["kind"], element: Expr): Expr {
    while (this.match("FOR")) {
      do {
        if (!this.canStartExpression()) break;
        this.parseBitOr();
      } while (this.match("COMMA"));
      this.expect("IN", "Expected 'in' in comprehension");
      this.parseOrExpr();
      while (this.match("IF")) {
        this.parseOrExpr();
      }
    }
    return comprehension(kind, element);
  }

  // ==========================================================================
  // Primary Expressions
  // ==========================================================================

  private parsePrimary(): Expr {
    const tok = this.peek();

    switch (tok.type) {
      case "INT":
        this.advance();
        return lit(BigInt(tok.value));

      case "FLOAT":
        this.advance();
        return lit(Number(tok.value));

      case "IMAGINARY":
        this.advance();
        return unsupportedLiteral("imaginary", tok.value);

      case "STRING":
      case "BYTES":
      case "FSTRING":
        return this.parseStrings();

      case "TRUE":
        this.advance();
        return lit(true);

      case "FALSE":
        this.advance();
        return lit(false);

      case "NONE":
        this.advance();
        return lit(null);

      case "ELLIPSIS":
        this.advance();
        return unsupportedLiteral("ellipsis", "...");

      case "NAME":
        this.advance();
        return name(tok.value);

      case "AND":
      case "OR":
        return this.parsePrefixBoolean();

      case "RESERVED":
        return this.parseReservedExpression();

      case "LPAREN":
        return this.parseParenthesized();

      case "LBRACKET":
        return this.parseListDisplay();

      case "LBRACE":
        return this.parseBraceDisplay();
    }

    throw this.error("Expected expression", tok);
  }

  private parseStrings(): Expr {
    const parts: Token[] = [];
    while (this.check("STRING") || this.check("BYTES") || this.check("FSTRING")) {
      parts.push(this.advance());
    }

    const text = parts.map((p) => p.value).join("");
    const bytes = parts.filter((p) => p.type === "BYTES").length;
    if (bytes > 0 && bytes < parts.length) {
      throw this.error("Cannot mix bytes and nonbytes literals", parts[0]);
    }
    if (bytes > 0) return unsupportedLiteral("bytes", text);
    if (parts.some((p) => p.type === "FSTRING")) return unsupportedLiteral("f-string", text);
    return lit(text);
  }

  /**
   * `and(a, b, ...)` / `or(a, b, ...)` in operand position.
   */
  private parsePrefixBoolean(): Expr {
    const op = this.advance().type === "AND" ? "and" : "or";
    this.expect("LPAREN", `Expected '(' after prefix '${op}'`);
    const values: Expr[] = [];
    while (!this.check("RPAREN")) {
      values.push(this.parseTest());
      if (!this.match("COMMA")) break;
    }
    this.expect("RPAREN", `Expected ')' after '${op}' operands`);
    return boolop(op, values);
  }

  private parseReservedExpression(): Expr {
    const tok = this.advance();
    if (tok.value === "await") {
      this.parsePostfix();
      return statement("await");
    }
    if (tok.value === "yield") {
      if (this.canStartExpression()) this.parseTestList();
      return statement("yield");
    }
    throw this.error("Invalid syntax", tok);
  }

  private parseParenthesized(): Expr {
    this.expect("LPAREN", "Expected '('");
    if (this.match("RPAREN")) return tuple();

    const first = this.parseTestOrStar();
    if (this.check("FOR")) {
      const gen = this.parseComprehension("generator", first);
      this.expect("RPAREN", "Expected ')' after generator expression");
      return gen;
    }
    if (!this.check("COMMA")) {
      this.expect("RPAREN", "Expected ')'");
      return first;
    }

    const elements = [first];
    while (this.match("COMMA")) {
      if (this.check("RPAREN")) break;
      elements.push(this.parseTestOrStar());
    }
    this.expect("RPAREN", "Expected ')' after tuple");
    return tuple(...elements);
  }

  private parseListDisplay(): Expr {
    this.expect("LBRACKET", "Expected '['");
    if (this.match("RBRACKET")) return list();

    const first = this.parseTestOrStar();
    if (this.check("FOR")) {
      const comp = this.parseComprehension("list", first);
      this.expect("RBRACKET", "Expected ']' after list comprehension");
      return comp;
    }

    const elements = [first];
    while (this.match("COMMA")) {
      if (this.check("RBRACKET")) break;
      elements.push(this.parseTestOrStar());
    }
    this.expect("RBRACKET", "Expected ']' after list elements");
    return list(...elements);
  }

  private parseBraceDisplay(): Expr {
    this.expect("LBRACE", "Expected '{'");
    if (this.match("RBRACE")) return dict([]);

    const firstIsSpread = this.match("DOUBLESTAR");
    const first = firstIsSpread ? this.parseBitOr() : this.parseTestOrStar();

    if (firstIsSpread || this.check("COLON")) {
      return this.parseDictRest(firstIsSpread ? { key: null, value: first } : null, first);
    }

    if (this.check("FOR")) {
      const comp = this.parseComprehension("set", first);
      this.expect("RBRACE", "Expected '}' after set comprehension");
      return comp;
    }

    const elements = [first];
    while (this.match("COMMA")) {
      if (this.check("RBRACE")) break;
      elements.push(this.parseTestOrStar());
    }
    this.expect("RBRACE", "Expected '}' after set elements");
    return set(...elements);
  }

  private parseDictRest(spread: DictEntry | null, firstKey: Expr): Expr {
    const entries: DictEntry[] = [];

    if (spread !== null) {
      entries.push(spread);
    } else {
      this.expect("COLON", "Expected ':' in dictionary");
      const value = this.parseTest();
      if (this.check("FOR")) {
        const comp = this.parseComprehension("dict", value);
        this.expect("RBRACE", "Expected '}' after dictionary comprehension");
        return comp;
      }
      entries.push({ key: firstKey, value });
    }

    while (this.match("COMMA")) {
      if (this.check("RBRACE")) break;
      if (this.match("DOUBLESTAR")) {
        entries.push({ key: null, value: this.parseBitOr() });
        continue;
      }
      const key = this.parseTest();
      this.expect("COLON", "Expected ':' in dictionary");
      entries.push({ key, value: this.parseTest() });
    }

    this.expect("RBRACE", "Expected '}' after dictionary entries");
    return dict(entries);
  }
}

// ============================================================================
// Errors
// ============================================================================

export class ParseError extends ExpressionSyntaxError {
  constructor(message: string, line: number, column: number) {
    super(message, line, column);
    this.name = "ParseError";
  }
}

// ============================================================================
// Convenience Function
// ============================================================================

export function parse(source: string): ModuleExpr {
  return new Parser(tokenize(source)).parse();
}
