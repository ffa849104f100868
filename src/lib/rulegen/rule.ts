/**
 * Rule accessors for parsed build files
 */

import type { AssignExpr, BuildFile, CallExpr, Expr, Statement } from './build-file/ast.js';
import { stringValue } from './build-file/ast.js';

export function ruleName(rule: CallExpr): string | null {
  return stringValue(attr(rule, 'name')?.value);
}

export function attr(rule: CallExpr, name: string): AssignExpr | undefined {
  return rule.args.find((arg): arg is AssignExpr => arg.kind === 'assign' && arg.name === name);
}

export function hasAttr(rule: CallExpr, name: string): boolean {
  return attr(rule, name) !== undefined;
}

/**
 * Copy of the rule with an attribute replaced, appended, or (with a null
 * value) removed
 */
export function setAttr(rule: CallExpr, name: string, value: Expr | null): CallExpr {
  const existing = attr(rule, name);
  if (value === null) {
    return existing ? { ...rule, args: rule.args.filter(arg => arg !== existing) } : rule;
  }
  if (existing) {
    return { ...rule, args: rule.args.map(arg => (arg === existing ? { ...existing, value } : arg)) };
  }
  const added: AssignExpr = { kind: 'assign', name, value, comments: { before: [], suffix: [], after: [] } };
  return { ...rule, args: [...rule.args, added] };
}

/**
 * Top-level rule calls, excluding load statements
 */
export function rules(file: BuildFile): CallExpr[] {
  return file.statements.filter((s): s is CallExpr => s.kind === 'call' && s.callee !== 'load');
}

export function isRule(stmt: Statement, kind: string, name?: string): stmt is CallExpr {
  return stmt.kind === 'call' && stmt.callee === kind && (name === undefined || ruleName(stmt) === name);
}

/**
 * Key identifying a rule by kind and name
 */
export function ruleKey(rule: CallExpr): string {
  return `${rule.callee}:${ruleName(rule) ?? ''}`;
}
