/**
 * Build file syntax tree
 *
 * Covers the subset of the Starlark language used by BUILD files:
 * rule calls, assignments, literals, lists, dicts, `+` concatenation
 * and comments. Nodes are plain objects; merge code builds new nodes
 * instead of mutating existing ones.
 */

/**
 * A single `#` comment, stored with its leading marker
 */
export interface Comment {
  text: string;
}

/**
 * Comments attached to a node
 */
export interface Comments {
  /** Whole-line comments printed before the node */
  before: Comment[];
  /** Comments printed at the end of the node's (first) line */
  suffix: Comment[];
  /** Whole-line comments printed before the closing bracket of a container */
  after: Comment[];
}

interface NodeBase {
  comments: Comments;
}

export interface StringExpr extends NodeBase {
  kind: 'string';
  value: string;
  tripleQuoted: boolean;
}

/** Identifiers, keywords such as True/None, and dotted names like native.glob */
export interface IdentExpr extends NodeBase {
  kind: 'ident';
  name: string;
}

export interface NumberExpr extends NodeBase {
  kind: 'number';
  token: string;
}

export interface ListExpr extends NodeBase {
  kind: 'list';
  items: Expr[];
  forceMultiLine: boolean;
}

export interface KeyValueExpr extends NodeBase {
  kind: 'keyvalue';
  key: Expr;
  value: Expr;
}

export interface DictExpr extends NodeBase {
  kind: 'dict';
  entries: KeyValueExpr[];
}

export interface CallExpr extends NodeBase {
  kind: 'call';
  callee: string;
  args: Expr[];
}

/** `lhs = rhs`; used both for keyword arguments and top-level assignments */
export interface AssignExpr extends NodeBase {
  kind: 'assign';
  name: string;
  value: Expr;
}

export interface BinaryExpr extends NodeBase {
  kind: 'binary';
  op: '+';
  left: Expr;
  right: Expr;
}

/** A standalone block of comments separated from statements by blank lines */
export interface CommentBlock extends NodeBase {
  kind: 'comment-block';
}

export type Expr =
  | StringExpr
  | IdentExpr
  | NumberExpr
  | ListExpr
  | DictExpr
  | KeyValueExpr
  | CallExpr
  | AssignExpr
  | BinaryExpr
  | CommentBlock;

export type Statement = CallExpr | AssignExpr | CommentBlock;

/**
 * A parsed build file
 */
export interface BuildFile {
  /** Absolute path of the file (used for reporting and writing) */
  path: string;
  statements: Statement[];
}

export function emptyComments(): Comments {
  return { before: [], suffix: [], after: [] };
}

export function stringExpr(value: string): StringExpr {
  return { kind: 'string', value, tripleQuoted: false, comments: emptyComments() };
}

export function identExpr(name: string): IdentExpr {
  return { kind: 'ident', name, comments: emptyComments() };
}

export function listExpr(items: Expr[]): ListExpr {
  return { kind: 'list', items, forceMultiLine: false, comments: emptyComments() };
}

export function dictExpr(entries: KeyValueExpr[]): DictExpr {
  return { kind: 'dict', entries, comments: emptyComments() };
}

export function keyValueExpr(key: Expr, value: Expr): KeyValueExpr {
  return { kind: 'keyvalue', key, value, comments: emptyComments() };
}

export function callExpr(callee: string, args: Expr[]): CallExpr {
  return { kind: 'call', callee, args, comments: emptyComments() };
}

export function assignExpr(name: string, value: Expr): AssignExpr {
  return { kind: 'assign', name, value, comments: emptyComments() };
}

export function binaryExpr(left: Expr, right: Expr): BinaryExpr {
  return { kind: 'binary', op: '+', left, right, comments: emptyComments() };
}

/**
 * Return the string value of an expression, or null for non-strings
 */
export function stringValue(expr: Expr | undefined): string | null {
  return expr !== undefined && expr.kind === 'string' ? expr.value : null;
}

/**
 * Check whether a node carries any comment
 */
export function hasComments(expr: Expr): boolean {
  const c = expr.comments;
  return c.before.length > 0 || c.suffix.length > 0 || c.after.length > 0;
}

/**
 * What is left of a statement being deleted: its leading comments as a
 * standalone block, since they may carry directives, or null
 */
export function detachedComments(stmt: Statement): CommentBlock | null {
  if (stmt.comments.before.length === 0) return null;
  return { kind: 'comment-block', comments: { before: stmt.comments.before, suffix: [], after: [] } };
}
