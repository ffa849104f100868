/**
 * Pin markers
 *
 * A `# keep` comment pins the rule, attribute or list entry it is
 * attached to. Pins are collected once per parsed file into a set of
 * node identities that the merger consults.
 */

import type { BuildFile, Comment, Expr } from './build-file/ast.js';

export type Pins = ReadonlySet<Expr>;

export function isKeepComment(comment: Comment): boolean {
  return /^#\s*keep\b/.test(comment.text);
}

function children(expr: Expr): Expr[] {
  switch (expr.kind) {
    case 'list':
      return expr.items;
    case 'dict':
      return expr.entries;
    case 'keyvalue':
      return [expr.key, expr.value];
    case 'call':
      return expr.args;
    case 'assign':
      return [expr.value];
    case 'binary':
      return [expr.left, expr.right];
    default:
      return [];
  }
}

/**
 * Collect every pinned node of a file. A rule is also pinned by a
 * whole-line `# keep` comment directly above it.
 */
export function collectPins(file: BuildFile): Set<Expr> {
  const pins = new Set<Expr>();
  const visit = (expr: Expr): void => {
    if (expr.comments.suffix.some(isKeepComment)) {
      pins.add(expr);
    }
    for (const child of children(expr)) visit(child);
  };

  for (const stmt of file.statements) {
    if (stmt.kind === 'call' && stmt.comments.before.some(isKeepComment)) {
      pins.add(stmt);
    }
    visit(stmt);
  }
  return pins;
}

/**
 * An attribute is pinned when the `name = value` pair or its value is
 */
export function isPinnedAttr(pins: Pins, attr: Expr): boolean {
  return pins.has(attr) || (attr.kind === 'assign' && pins.has(attr.value));
}
