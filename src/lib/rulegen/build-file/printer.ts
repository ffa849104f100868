/**
 * Build file printer
 *
 * Emits the canonical layout: one blank line between top-level
 * statements, four-space indentation, trailing commas in multi-line
 * sequences and double-quoted strings. Printing a parsed file and
 * parsing the result again yields the same text.
 */

import type { BuildFile, CallExpr, Comment, DictExpr, Expr, ListExpr, Statement } from './ast.js';
import { hasComments } from './ast.js';

const INDENT = '    ';

function isSingleLine(text: string): boolean {
  return !text.includes('\n');
}

function quote(value: string, tripleQuoted: boolean): string {
  if (tripleQuoted || value.includes('\n')) {
    // Trailing quotes would run into the closing delimiter
    const tail = /"*$/.exec(value)?.[0].length ?? 0;
    const body = value
      .slice(0, value.length - tail)
      .replace(/\\/g, '\\\\')
      .replace(/"""/g, '\\"\\"\\"');
    return `"""${body}${'\\"'.repeat(tail)}"""`;
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r');
  return `"${escaped}"`;
}

function suffixText(comments: Comment[]): string {
  return comments.map(c => `  ${c.text}`).join('');
}

function commentLines(comments: Comment[], indent: string): string {
  return comments.map(c => `${indent}${c.text}\n`).join('');
}

/** Lists and dicts print their own suffix comment after the opening bracket */
function ownsSuffix(expr: Expr): boolean {
  return expr.kind === 'list' || expr.kind === 'dict';
}

/**
 * Print a multi-line bracketed sequence. The first line is not indented;
 * the closing bracket is indented at `indent`.
 */
function printSequence(open: string, close: string, container: Expr, items: Expr[], indent: string): string {
  const inner = indent + INDENT;
  let out = open;
  if (ownsSuffix(container)) {
    out += suffixText(container.comments.suffix);
  }
  out += '\n';
  for (const item of items) {
    out += commentLines(item.comments.before, inner);
    out += `${inner}${printExpr(item, inner)},`;
    if (!ownsSuffix(item)) {
      out += suffixText(item.comments.suffix);
    }
    out += '\n';
  }
  out += commentLines(container.comments.after, inner);
  return `${out}${indent}${close}`;
}

function printList(list: ListExpr, indent: string): string {
  const noOwnComments = list.comments.suffix.length === 0 && list.comments.after.length === 0;
  if (list.items.length === 0 && noOwnComments) {
    return '[]';
  }
  if (list.items.length === 1 && !list.forceMultiLine && noOwnComments && !hasComments(list.items[0])) {
    const only = printExpr(list.items[0], indent);
    if (isSingleLine(only)) {
      return `[${only}]`;
    }
  }
  return printSequence('[', ']', list, list.items, indent);
}

function printDict(dict: DictExpr, indent: string): string {
  if (dict.entries.length === 0 && !hasComments(dict)) {
    return '{}';
  }
  return printSequence('{', '}', dict, dict.entries, indent);
}

function printCall(call: CallExpr, indent: string, topLevel: boolean): string {
  const anyComments = call.comments.after.length > 0 || call.args.some(hasComments);
  if (call.args.length === 0 && !anyComments) {
    return `${call.callee}()`;
  }

  if (!anyComments) {
    const printed = call.args.map(arg => printExpr(arg, indent));
    if (printed.every(isSingleLine) && (call.callee === 'load' || !topLevel || call.args.length === 1)) {
      return `${call.callee}(${printed.join(', ')})`;
    }
    // A lone positional argument hugs the parentheses: glob([...]), select({...})
    if (call.args.length === 1 && call.args[0].kind !== 'assign') {
      return `${call.callee}(${printed[0]})`;
    }
  }

  return printSequence(`${call.callee}(`, ')', call, call.args, indent);
}

/**
 * Print an expression. Continuation lines are indented relative to
 * `indent`; the first line carries no indentation.
 */
export function printExpr(expr: Expr, indent = '', topLevel = false): string {
  switch (expr.kind) {
    case 'string':
      return quote(expr.value, expr.tripleQuoted);
    case 'ident':
      return expr.name;
    case 'number':
      return expr.token;
    case 'list':
      return printList(expr, indent);
    case 'dict':
      return printDict(expr, indent);
    case 'keyvalue':
      return `${printExpr(expr.key, indent)}: ${printExpr(expr.value, indent)}`;
    case 'call':
      return printCall(expr, indent, topLevel);
    case 'assign':
      return `${expr.name} = ${printExpr(expr.value, indent)}`;
    case 'binary':
      return `${printExpr(expr.left, indent)} + ${printExpr(expr.right, indent)}`;
    case 'comment-block':
      return expr.comments.before.map(c => c.text).join('\n');
  }
}

function printStatement(stmt: Statement): string {
  if (stmt.kind === 'comment-block') {
    return printExpr(stmt);
  }
  let out = commentLines(stmt.comments.before, '');
  out += printExpr(stmt, '', true);
  return out + suffixText(stmt.comments.suffix);
}

/**
 * Format a build file in canonical form
 */
export function formatBuildFile(file: BuildFile): string {
  if (file.statements.length === 0) {
    return '';
  }
  return `${file.statements.map(printStatement).join('\n\n')}\n`;
}
