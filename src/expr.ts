/**
 * Expression syntax tree.
 *
 * The tree is closed: every form the parser can recognise has a variant
 * here, including the forms the evaluator refuses to run. Keeping the
 * refused forms as real variants lets the evaluator reject them by kind
 * in one exhaustive switch.
 */

// ============================================================================
// Operators
// ============================================================================

export type BinOp =
  // Arithmetic
  | "+"
  | "-"
  | "*"
  | "/"
  | "//"
  | "%"
  | "**"
  // Parsed, never evaluated
  | "@"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>";

export type UnaryOp = "+" | "-" | "not" | "~";

export type BoolOp = "and" | "or";

export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=" | "is" | "is not" | "in" | "not in";

// ============================================================================
// Expression Types
// ============================================================================

export type Expr =
  // Whitelisted
  | LitExpr
  | NameExpr
  | BinOpExpr
  | UnaryOpExpr
  | BoolOpExpr
  | CompareExpr
  | ListExpr
  | TupleExpr
  | SetExpr
  | DictExpr
  | CallExpr
  | ModuleExpr
  // Recognised, refused
  | AttributeExpr
  | SubscriptExpr
  | SliceExpr
  | LambdaExpr
  | ConditionalExpr
  | ComprehensionExpr
  | StarredExpr
  | NamedExpr
  | AssignExpr
  | StatementExpr
  | UnsupportedLiteralExpr;

/**
 * Integer literals are bigint, float literals number.
 */
export type LiteralValue = bigint | number | string | boolean | null;

export interface LitExpr {
  tag: "lit";
  value: LiteralValue;
}

export interface NameExpr {
  tag: "name";
  name: string;
}

export interface BinOpExpr {
  tag: "binop";
  op: BinOp;
  left: Expr;
  right: Expr;
}

export interface UnaryOpExpr {
  tag: "unary";
  op: UnaryOp;
  operand: Expr;
}

export interface BoolOpExpr {
  tag: "boolop";
  op: BoolOp;
  values: Expr[];
}

/**
 * Chained comparison: `left ops[0] comparators[0] ops[1] comparators[1] ...`
 */
export interface CompareExpr {
  tag: "compare";
  left: Expr;
  ops: CompareOp[];
  comparators: Expr[];
}

export interface ListExpr {
  tag: "list";
  elements: Expr[];
}

export interface TupleExpr {
  tag: "tuple";
  elements: Expr[];
}

export interface SetExpr {
  tag: "set";
  elements: Expr[];
}

/**
 * A `null` key marks a `**mapping` spread entry.
 */
export interface DictEntry {
  key: Expr | null;
  value: Expr;
}

export interface DictExpr {
  tag: "dict";
  entries: DictEntry[];
}

export interface Keyword {
  name: string;
  value: Expr;
}

export interface CallExpr {
  tag: "call";
  func: Expr;
  args: Expr[];
  keywords: Keyword[];
}

/**
 * Several statements in one value. A single statement evaluates to its own
 * value, any other count to a list of the statement values.
 */
export interface ModuleExpr {
  tag: "module";
  body: Expr[];
}

export interface AttributeExpr {
  tag: "attribute";
  object: Expr;
  name: string;
}

export interface SubscriptExpr {
  tag: "subscript";
  object: Expr;
  index: Expr;
}

export interface SliceExpr {
  tag: "slice";
  lower?: Expr;
  upper?: Expr;
  step?: Expr;
}

export interface LambdaExpr {
  tag: "lambda";
  params: string[];
  body: Expr;
}

export interface ConditionalExpr {
  tag: "conditional";
  test: Expr;
  body: Expr;
  orElse: Expr;
}

export interface ComprehensionExpr {
  tag: "comprehension";
  kind: "list" | "set" | "dict" | "generator";
  element: Expr;
}

export interface StarredExpr {
  tag: "starred";
  value: Expr;
  double: boolean;
}

export interface NamedExpr {
  tag: "named";
  target: Expr;
  value: Expr;
}

export interface AssignExpr {
  tag: "assign";
  op: string;
  targets: Expr[];
  value: Expr | null;
}

/**
 * A statement introduced by a keyword (`import`, `def`, `return`, ...).
 * Only the keyword is kept.
 */
export interface StatementExpr {
  tag: "statement";
  keyword: string;
}

export interface UnsupportedLiteralExpr {
  tag: "unsupportedLiteral";
  kind: "bytes" | "imaginary" | "ellipsis" | "f-string";
  text: string;
}

// ============================================================================
// Constructors
// ============================================================================

export const lit = (value: LiteralValue): LitExpr => ({ tag: "lit", value });
export const int = (value: bigint | number): LitExpr => lit(BigInt(value));
export const float = (value: number): LitExpr => lit(value);
export const str = (value: string): LitExpr => lit(value);
export const bool = (value: boolean): LitExpr => lit(value);
export const none: LitExpr = lit(null);

export const name = (n: string): NameExpr => ({ tag: "name", name: n });

export const binop = (op: BinOp, left: Expr, right: Expr): BinOpExpr =>
  ({ tag: "binop", op, left, right });

export const unary = (op: UnaryOp, operand: Expr): UnaryOpExpr =>
  ({ tag: "unary", op, operand });

export const boolop = (op: BoolOp, values: Expr[]): BoolOpExpr =>
  ({ tag: "boolop", op, values });

export const compare = (left: Expr, ops: CompareOp[], comparators: Expr[]): CompareExpr =>
  ({ tag: "compare", left, ops, comparators });

export const list = (...elements: Expr[]): ListExpr => ({ tag: "list", elements });
export const tuple = (...elements: Expr[]): TupleExpr => ({ tag: "tuple", elements });
export const set = (...elements: Expr[]): SetExpr => ({ tag: "set", elements });
export const dict = (entries: DictEntry[]): DictExpr => ({ tag: "dict", entries });

export const call = (func: Expr, args: Expr[], keywords: Keyword[] = []): CallExpr =>
  ({ tag: "call", func, args, keywords });

export const moduleExpr = (body: Expr[]): ModuleExpr => ({ tag: "module", body });

export const attribute = (object: Expr, n: string): AttributeExpr =>
  ({ tag: "attribute", object, name: n });

export const subscript = (object: Expr, index: Expr): SubscriptExpr =>
  ({ tag: "subscript", object, index });

export const slice = (lower?: Expr, upper?: Expr, step?: Expr): SliceExpr =>
  ({ tag: "slice", lower, upper, step });

export const lambda = (params: string[], body: Expr): LambdaExpr =>
  ({ tag: "lambda", params, body });

export const conditional = (test: Expr, body: Expr, orElse: Expr): ConditionalExpr =>
  ({ tag: "conditional", test, body, orElse });

export const comprehension = (kind: ComprehensionExpr["kind"], element: Expr): ComprehensionExpr =>
  ({ tag: "comprehension", kind, element });

export const starred = (value: Expr, double: boolean = false): StarredExpr =>
  ({ tag: "starred", value, double });

export const named = (target: Expr, value: Expr): NamedExpr =>
  ({ tag: "named", target, value });

export const assign = (op: string, targets: Expr[], value: Expr | null): AssignExpr =>
  ({ tag: "assign", op, targets, value });

export const statement = (keyword: string): StatementExpr => ({ tag: "statement", keyword });

export const unsupportedLiteral = (kind: UnsupportedLiteralExpr["kind"], text: string): UnsupportedLiteralExpr =>
  ({ tag: "unsupportedLiteral", kind, text });

// ============================================================================
// Pretty Printing
// ============================================================================

/**
 * Describe a node kind the way error messages name it.
 */
export function describeKind(expr: Expr): string {
  switch (expr.tag) {
    case "starred":
      return expr.double ? "double-starred expression" : "starred expression";
    case "comprehension":
      return `${expr.kind} comprehension`;
    case "statement":
      return `'${expr.keyword}' statement`;
    case "unsupportedLiteral":
      return `${expr.kind} literal`;
    case "assign":
      return expr.op === "=" ? "assignment" : expr.op === ":" ? "annotated assignment" : "augmented assignment";
    case "named":
      return "assignment expression";
    case "conditional":
      return "conditional expression";
    default:
      return expr.tag;
  }
}

function literalToString(value: LiteralValue): string {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return value.toString();
  return Number.isInteger(value) && Math.abs(value) < 1e16 ? value.toFixed(1) : String(value);
}

/**
 * Render a syntax tree back to expression text, fully parenthesised.
 */
export function exprToString(expr: Expr): string {
  switch (expr.tag) {
    case "lit":
      return literalToString(expr.value);

    case "name":
      return expr.name;

    case "binop":
      return `(${exprToString(expr.left)} ${expr.op} ${exprToString(expr.right)})`;

    case "unary":
      return expr.op === "not" ? `(not ${exprToString(expr.operand)})` : `(${expr.op}${exprToString(expr.operand)})`;

    case "boolop":
      return expr.values.length < 2
        ? `${expr.op}(${expr.values.map(exprToString).join(", ")})`
        : `(${expr.values.map(exprToString).join(` ${expr.op} `)})`;

    case "compare": {
      let out = exprToString(expr.left);
      expr.ops.forEach((op, i) => {
        out += ` ${op} ${exprToString(expr.comparators[i])}`;
      });
      return `(${out})`;
    }

    case "list":
      return `[${expr.elements.map(exprToString).join(", ")}]`;

    case "tuple":
      return expr.elements.length === 1
        ? `(${exprToString(expr.elements[0])},)`
        : `(${expr.elements.map(exprToString).join(", ")})`;

    case "set":
      return `{${expr.elements.map(exprToString).join(", ")}}`;

    case "dict":
      return `{${expr.entries
        .map((e) => (e.key === null ? `**${exprToString(e.value)}` : `${exprToString(e.key)}: ${exprToString(e.value)}`))
        .join(", ")}}`;

    case "call": {
      const args = expr.args.map(exprToString);
      const keywords = expr.keywords.map((k) => `${k.name}=${exprToString(k.value)}`);
      return `${exprToString(expr.func)}(${[...args, ...keywords].join(", ")})`;
    }

    case "module":
      return expr.body.map(exprToString).join("; ");

    case "attribute":
      return `${exprToString(expr.object)}.${expr.name}`;

    case "subscript":
      return `${exprToString(expr.object)}[${exprToString(expr.index)}]`;

    case "slice":
      return [expr.lower, expr.upper, expr.step].map((e) => (e ? exprToString(e) : "")).join(":");

    case "lambda":
      return `(lambda ${expr.params.join(", ")}: ${exprToString(expr.body)})`;

    case "conditional":
      return `(${exprToString(expr.body)} if ${exprToString(expr.test)} else ${exprToString(expr.orElse)})`;

    case "comprehension":
      return `<${expr.kind} comprehension of ${exprToString(expr.element)}>`;

    case "starred":
      return `${expr.double ? "**" : "*"}${exprToString(expr.value)}`;

    case "named":
      return `(${exprToString(expr.target)} := ${exprToString(expr.value)})`;

    case "assign": {
      const targets = expr.targets.map(exprToString).join(` ${expr.op} `);
      return expr.value === null ? targets : `${targets} ${expr.op} ${exprToString(expr.value)}`;
    }

    case "statement":
      return `<${expr.keyword} statement>`;

    case "unsupportedLiteral":
      return expr.text;
  }
}
