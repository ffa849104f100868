/**
 * Canonical ordering
 *
 * Sorts label lists in dependency-like attributes and orders call
 * arguments the way the formatter conventionally does.
 */

import type { BuildFile, CallExpr, Expr, ListExpr, Statement } from './build-file/ast.js';
import { stringValue } from './build-file/ast.js';
import { collectPins } from './pins.js';
import type { Pins } from './pins.js';

/** Attributes whose string lists are sorted */
const SORTED_ATTRS = new Set(['srcs', 'deps', 'embed', 'data']);

const ARG_PRIORITY: ReadonlyMap<string, number> = new Map([
  ['name', -99],
  ['size', -95],
  ['timeout', -94],
  ['testonly', -93],
  ['src', -92],
  ['srcdir', -91],
  ['srcs', -90],
  ['out', -89],
  ['outs', -88],
  ['hdrs', -87],
  ['destdir', 1],
  ['exports', 2],
  ['runtime_deps', 3],
  ['deps', 4],
]);

/**
 * Sort key: plain names, then relative labels, then labels in this
 * repository, then external labels; each compared piece by piece
 */
function labelKey(value: string): { phase: number; pieces: string[] } {
  let phase = 0;
  if (value.startsWith(':')) phase = 1;
  else if (value.startsWith('//')) phase = 2;
  else if (value.startsWith('@')) phase = 3;
  return { phase, pieces: value.split(':') };
}

export function compareLabels(a: string, b: string): number {
  const ka = labelKey(a);
  const kb = labelKey(b);
  if (ka.phase !== kb.phase) return ka.phase - kb.phase;
  for (let i = 0; i < Math.min(ka.pieces.length, kb.pieces.length); i++) {
    if (ka.pieces[i] !== kb.pieces[i]) return ka.pieces[i] < kb.pieces[i] ? -1 : 1;
  }
  return ka.pieces.length - kb.pieces.length;
}

function sortList(list: ListExpr, pins: Pins): ListExpr {
  if (pins.has(list)) return list;
  const values = list.items.map(item => stringValue(item));
  if (values.some(v => v === null)) return list;
  const items = [...list.items].sort((x, y) => compareLabels(stringValue(x) ?? '', stringValue(y) ?? ''));
  return items.every((item, i) => item === list.items[i]) ? list : { ...list, items };
}

function sortValue(expr: Expr, pins: Pins): Expr {
  if (pins.has(expr)) return expr;
  switch (expr.kind) {
    case 'list':
      return sortList(expr, pins);
    case 'binary':
      return { ...expr, left: sortValue(expr.left, pins), right: sortValue(expr.right, pins) };
    case 'call':
      if (expr.callee !== 'select') return expr;
      return { ...expr, args: expr.args.map(arg => sortValue(arg, pins)) };
    case 'dict':
      return {
        ...expr,
        entries: expr.entries.map(entry => (pins.has(entry) ? entry : { ...entry, value: sortValue(entry.value, pins) })),
      };
    default:
      return expr;
  }
}

/**
 * Sort label lists of every rule, leaving pinned rules and attributes as written
 */
export function sortLabels(file: BuildFile): BuildFile {
  const pins = collectPins(file);
  const statements = file.statements.map((stmt): Statement => {
    if (stmt.kind !== 'call' || stmt.callee === 'load' || pins.has(stmt)) return stmt;
    return {
      ...stmt,
      args: stmt.args.map(arg => {
        if (arg.kind !== 'assign' || !SORTED_ATTRS.has(arg.name) || pins.has(arg)) return arg;
        return { ...arg, value: sortValue(arg.value, pins) };
      }),
    };
  });
  return { ...file, statements };
}

function argPriority(arg: Expr): number {
  if (arg.kind !== 'assign') return -100;
  return ARG_PRIORITY.get(arg.name) ?? 0;
}

/**
 * Order keyword arguments of unpinned rule calls by priority, keeping
 * positional arguments first and the relative order of equal priorities
 */
export function rewriteArgs(file: BuildFile): BuildFile {
  const pins = collectPins(file);
  const statements = file.statements.map((stmt): Statement => {
    if (stmt.kind !== 'call' || stmt.callee === 'load' || pins.has(stmt)) return stmt;
    return reorder(stmt);
  });
  return { ...file, statements };
}

function reorder(call: CallExpr): CallExpr {
  const args = call.args
    .map((arg, index) => ({ arg, index, priority: argPriority(arg) }))
    .sort((a, b) => a.priority - b.priority || a.index - b.index)
    .map(entry => entry.arg);
  return { ...call, args };
}
