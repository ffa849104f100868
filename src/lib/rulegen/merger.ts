/**
 * Merger
 *
 * Reconciles generated rules with an existing build file. Attributes the
 * generator owns are merged; everything else in the file is preserved.
 * Pinned rules, attributes and list entries are never changed.
 */

import * as path from 'node:path';
import type { BuildFile, CallExpr, DictExpr, Expr, KeyValueExpr, ListExpr, Statement } from './build-file/ast.js';
import { binaryExpr, callExpr, detachedComments, dictExpr, stringValue } from './build-file/ast.js';
import type { Config, Reporter } from './types.js';
import { RuleGenErrorCode } from './types.js';
import { parseDirectives } from './config.js';
import type { Pins } from './pins.js';
import { collectPins, isPinnedAttr } from './pins.js';
import { hasAttr, ruleKey } from './rule.js';
import { fixFile, fixFileMinor, fixLoads, isOutdated } from './fix.js';
import { rewriteArgs, sortLabels } from './sort-labels.js';

/** Attributes whose values are owned by the generator */
export const MERGEABLE_ATTRS: ReadonlySet<string> = new Set([
  'srcs',
  'deps',
  'embed',
  'importpath',
  'proto',
  'cgo',
  'copts',
  'clinkopts',
]);

/** An emptied rule survives only while one of these remains */
const NON_EMPTY_ATTRS = ['srcs', 'deps', 'embed'];

/**
 * Merge a generated list into an existing one. Existing entries are kept
 * when pinned or still generated, with their comments; generated entries
 * not yet present are appended. Returns null when nothing remains.
 */
export function mergeList(gen: ListExpr | null, old: ListExpr | null, pins: Pins): ListExpr | null {
  const genValues = new Set((gen?.items ?? []).map(item => stringValue(item)));
  const kept = (old?.items ?? []).filter(item => {
    if (pins.has(item)) return true;
    const value = stringValue(item);
    return value !== null && genValues.has(value);
  });
  const present = new Set(kept.map(item => stringValue(item)));
  const added = (gen?.items ?? []).filter(item => {
    const value = stringValue(item);
    if (value === null || present.has(value)) return false;
    present.add(value);
    return true;
  });

  const items = [...kept, ...added];
  if (items.length === 0) {
    return null;
  }
  const base = old ?? gen;
  if (base === null) {
    return null;
  }
  return { ...base, items };
}

/**
 * List and select() parts of a platform-dependent value
 */
interface PlatformValue {
  list: ListExpr | null;
  dict: DictExpr | null;
}

function platformParts(expr: Expr): PlatformValue | null {
  if (expr.kind === 'list') {
    return { list: expr, dict: null };
  }
  if (expr.kind === 'call' && expr.callee === 'select' && expr.args.length === 1 && expr.args[0].kind === 'dict') {
    return { list: null, dict: expr.args[0] };
  }
  if (expr.kind === 'binary' && expr.left.kind === 'list') {
    const right = platformParts(expr.right);
    if (right && right.list === null) {
      return { list: expr.left, dict: right.dict };
    }
  }
  return null;
}

const DEFAULT_CONDITION = '//conditions:default';

function mergeEntry(oldEntry: KeyValueExpr | undefined, genEntry: KeyValueExpr | undefined, pins: Pins): KeyValueExpr | null {
  const source = oldEntry ?? genEntry;
  if (!source) return null;
  if (oldEntry && pins.has(oldEntry)) return oldEntry;

  const oldList = oldEntry?.value.kind === 'list' ? oldEntry.value : null;
  const genList = genEntry?.value.kind === 'list' ? genEntry.value : null;
  const merged = mergeList(genList, oldList, pins);
  if (merged) {
    return { ...source, value: merged };
  }
  // The default branch stays, empty, as long as other branches do
  if (stringValue(source.key) === DEFAULT_CONDITION) {
    return { ...source, value: { ...(oldList ?? genList ?? emptyList()), items: [] } };
  }
  return null;
}

function mergeDict(gen: DictExpr | null, old: DictExpr | null, pins: Pins): DictExpr | null {
  const genEntries = new Map<string, KeyValueExpr>();
  for (const entry of gen?.entries ?? []) {
    const key = stringValue(entry.key);
    if (key !== null) genEntries.set(key, entry);
  }

  const merged: KeyValueExpr[] = [];
  const seen = new Set<string>();
  for (const oldEntry of old?.entries ?? []) {
    const key = stringValue(oldEntry.key);
    if (key === null) {
      merged.push(oldEntry);
      continue;
    }
    seen.add(key);
    const entry = mergeEntry(oldEntry, genEntries.get(key), pins);
    if (entry) merged.push(entry);
  }
  for (const [key, genEntry] of genEntries) {
    if (seen.has(key)) continue;
    const entry = mergeEntry(undefined, genEntry, pins);
    if (entry) merged.push(entry);
  }

  const isDefault = (e: KeyValueExpr): boolean => stringValue(e.key) === DEFAULT_CONDITION;
  const branches = merged.filter(e => !isDefault(e));
  if (branches.length === 0) {
    return null;
  }
  return { ...(old ?? gen ?? dictExpr([])), entries: [...branches, ...merged.filter(isDefault)] };
}

function emptyList(): ListExpr {
  return { kind: 'list', items: [], forceMultiLine: false, comments: { before: [], suffix: [], after: [] } };
}

/**
 * Merge one attribute value. Lists and select() expressions are merged
 * entry by entry; other values are replaced by the generated one.
 */
export function mergeValue(gen: Expr | null, old: Expr, pins: Pins): Expr | null {
  if (pins.has(old)) {
    return old;
  }
  const oldParts = platformParts(old);
  const genParts = gen === null ? { list: null, dict: null } : platformParts(gen);
  if (!oldParts || !genParts) {
    return gen;
  }

  const list = mergeList(genParts.list, oldParts.list, pins);
  const dict = mergeDict(genParts.dict, oldParts.dict, pins);
  const selectCall = (d: DictExpr): CallExpr => {
    if (old.kind === 'call') return { ...old, args: [d] };
    if (old.kind === 'binary' && old.right.kind === 'call') return { ...old.right, args: [d] };
    return callExpr('select', [d]);
  };

  if (list && dict) {
    return old.kind === 'binary' ? { ...old, left: list, right: selectCall(dict) } : binaryExpr(list, selectCall(dict));
  }
  if (dict) {
    return selectCall(dict);
  }
  return list;
}

/**
 * Merge a generated rule into an existing rule of the same kind and name
 */
export function mergeRule(gen: CallExpr, old: CallExpr, pins: Pins): CallExpr {
  if (pins.has(old)) {
    return old;
  }

  const genAttrs = new Map<string, Expr>();
  for (const arg of gen.args) {
    if (arg.kind === 'assign') genAttrs.set(arg.name, arg.value);
  }

  const args: Expr[] = [];
  const oldNames = new Set<string>();
  for (const arg of old.args) {
    if (arg.kind !== 'assign') {
      args.push(arg);
      continue;
    }
    oldNames.add(arg.name);
    if (!MERGEABLE_ATTRS.has(arg.name) || isPinnedAttr(pins, arg)) {
      args.push(arg);
      continue;
    }
    const value = mergeValue(genAttrs.get(arg.name) ?? null, arg.value, pins);
    if (value !== null) {
      args.push({ ...arg, value });
    }
  }

  for (const arg of gen.args) {
    if (arg.kind === 'assign' && !oldNames.has(arg.name)) {
      args.push(arg);
    }
  }

  return { ...old, args };
}

export function hasIgnoreDirective(file: BuildFile): boolean {
  return parseDirectives(file).some(d => d.key === 'ignore');
}

/**
 * Merge generated and empty rules into the existing file, or into a new
 * file at `filePath` when there is none. Returns null when the existing
 * file must be left untouched.
 */
export function mergeWithExisting(
  genRules: readonly CallExpr[],
  emptyRules: readonly CallExpr[],
  oldFile: BuildFile | null,
  filePath: string,
  c: Config,
  report: Reporter
): BuildFile | null {
  if (oldFile === null) {
    if (genRules.length === 0) return null;
    return finish({ path: filePath, statements: [...genRules] });
  }
  if (hasIgnoreDirective(oldFile)) {
    return null;
  }

  let file = fixFileMinor(oldFile);
  if (c.shouldFix) {
    file = fixFile(c, file);
  } else if (isOutdated(c, file)) {
    report({
      code: RuleGenErrorCode.RULEGEN_OUTDATED_RULES,
      path: path.relative(c.repoRoot, file.path),
      message: "file contains rules whose structure is out of date. Consider running 'rulegen fix'.",
    });
  }

  const pins = collectPins(file);
  const statements: Array<Statement | null> = [...file.statements];
  const index = new Map<string, number>();
  statements.forEach((stmt, i) => {
    if (stmt && stmt.kind === 'call' && stmt.callee !== 'load') {
      const key = ruleKey(stmt);
      if (!index.has(key)) index.set(key, i);
    }
  });

  for (const gen of genRules) {
    const i = index.get(ruleKey(gen));
    const old = i === undefined ? null : statements[i];
    if (i === undefined || !old || old.kind !== 'call') {
      statements.push(gen);
      continue;
    }
    statements[i] = mergeRule(gen, old, pins);
  }

  for (const empty of emptyRules) {
    const i = index.get(ruleKey(empty));
    const old = i === undefined ? null : statements[i];
    if (i === undefined || !old || old.kind !== 'call' || pins.has(old)) continue;
    const merged = mergeRule(empty, old, pins);
    statements[i] = NON_EMPTY_ATTRS.some(name => hasAttr(merged, name)) ? merged : detachedComments(old);
  }

  return finish({ path: file.path, statements: statements.filter((s): s is Statement => s !== null) });
}

function finish(file: BuildFile): BuildFile {
  return rewriteArgs(sortLabels(fixLoads(file)));
}
