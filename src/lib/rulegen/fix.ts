/**
 * Fixes for deprecated rule shapes and load statement maintenance
 *
 * Minor fixes are always applied. Structural fixes (absorbing
 * `cgo_library` into `go_library`, dropping legacy proto rules) are only
 * applied in fix mode; otherwise the file is reported as out of date.
 */

import type { AssignExpr, BuildFile, CallExpr, Expr, ListExpr, Statement } from './build-file/ast.js';
import { callExpr, detachedComments, identExpr, listExpr, stringExpr, stringValue } from './build-file/ast.js';
import type { Config } from './types.js';
import { LEGACY_PROTO_LOAD } from './config.js';
import { DEFAULT_LIBRARY_NAME, DEFAULT_PROTOS_NAME } from './labeler.js';
import { collectPins } from './pins.js';
import { attr, isRule, ruleName, rules, setAttr } from './rule.js';

/**
 * Symbols provided by each load source
 */
export const KNOWN_LOADS: ReadonlyArray<{ file: string; symbols: readonly string[] }> = [
  {
    file: '@io_bazel_rules_go//go:def.bzl',
    symbols: ['cgo_library', 'go_binary', 'go_library', 'go_prefix', 'go_test'],
  },
  {
    file: '@io_bazel_rules_go//proto:def.bzl',
    symbols: ['go_grpc_library', 'go_proto_library'],
  },
];

/** Attributes whose lists are combined when absorbing cgo_library */
const UNION_ATTRS = ['srcs', 'deps', 'copts', 'clinkopts', 'data'];

/**
 * Replace `library = ":x"` with `embed = [":x"]`
 */
export function fixFileMinor(file: BuildFile): BuildFile {
  let changed = false;
  const statements = file.statements.map((stmt): Statement => {
    if (stmt.kind !== 'call' || stmt.callee === 'load') return stmt;
    const library = attr(stmt, 'library');
    if (!library) return stmt;
    changed = true;

    const embed = attr(stmt, 'embed');
    const embedItems = embed?.value.kind === 'list' ? embed.value.items : [];
    const libraryValue = stringValue(library.value);
    const alreadyEmbedded = embedItems.some(item => stringValue(item) === libraryValue);
    const items: Expr[] = alreadyEmbedded ? embedItems : [...embedItems, library.value];

    const withoutLibrary: CallExpr = { ...stmt, args: stmt.args.filter(arg => arg !== library) };
    if (embed && embed.value.kind === 'list') {
      return setAttr(withoutLibrary, 'embed', { ...embed.value, items });
    }
    if (embed) return withoutLibrary;
    return { ...withoutLibrary, args: [...withoutLibrary.args, { ...library, name: 'embed', value: listExpr(items) }] };
  });
  return changed ? { ...file, statements } : file;
}

function isLegacyProtoLoad(stmt: Statement): boolean {
  return stmt.kind === 'call' && stmt.callee === 'load' && stringValue(stmt.args[0]) === LEGACY_PROTO_LOAD;
}

function isLegacyProtoFilegroup(stmt: Statement): boolean {
  return isRule(stmt, 'filegroup', DEFAULT_PROTOS_NAME);
}

/**
 * Check whether the file uses shapes that `fix` would rewrite
 */
export function isOutdated(c: Config, file: BuildFile): boolean {
  return file.statements.some(
    stmt =>
      isRule(stmt, 'cgo_library') ||
      (c.protoMode !== 'legacy' && (isLegacyProtoLoad(stmt) || isLegacyProtoFilegroup(stmt)))
  );
}

function unionList(target: Expr | undefined, extra: Expr): Expr {
  if (target === undefined) return extra;
  if (target.kind !== 'list' || extra.kind !== 'list') return target;
  const present = new Set(target.items.map(item => stringValue(item)));
  const added = extra.items.filter(item => {
    const value = stringValue(item);
    return value === null || !present.has(value);
  });
  return { ...target, items: [...target.items, ...added] };
}

/**
 * Merge a cgo_library rule into the go_library of the same file
 */
function squashCgoLibrary(file: BuildFile): BuildFile {
  const pins = collectPins(file);
  const cgoLib = file.statements.find((s): s is CallExpr => isRule(s, 'cgo_library') && !pins.has(s));
  if (!cgoLib) return file;
  const cgoName = ruleName(cgoLib) ?? '';
  const goLib = file.statements.find((s): s is CallExpr => isRule(s, 'go_library'));

  if (goLib && pins.has(goLib)) {
    return file;
  }

  let merged: CallExpr;
  if (!goLib) {
    merged = setAttr({ ...cgoLib, callee: 'go_library' }, 'name', stringExpr(DEFAULT_LIBRARY_NAME));
  } else {
    merged = goLib;
    for (const name of UNION_ATTRS) {
      const extra = attr(cgoLib, name);
      if (extra) merged = setAttr(merged, name, unionList(attr(merged, name)?.value, extra.value));
    }
    const embed = attr(merged, 'embed');
    if (embed && embed.value.kind === 'list') {
      const items = embed.value.items.filter(item => stringValue(item) !== `:${cgoName}`);
      const list: ListExpr = { ...embed.value, items };
      merged = setAttr(merged, 'embed', items.length > 0 ? list : null);
    }
  }
  merged = setAttr(merged, 'cgo', identExpr('True'));

  const statements: Statement[] = [];
  for (const stmt of file.statements) {
    if (stmt === cgoLib) {
      const rest = detachedComments(stmt);
      if (!goLib) statements.push(merged);
      else if (rest) statements.push(rest);
    } else if (stmt === goLib) {
      statements.push(merged);
    } else if (stmt.kind === 'call' && stmt.callee !== 'load') {
      statements.push(dropReference(stmt, cgoName));
    } else {
      statements.push(stmt);
    }
  }
  return { ...file, statements };
}

/** Rewrite `embed` references to the absorbed cgo library */
function dropReference(rule: CallExpr, cgoName: string): CallExpr {
  const embed = attr(rule, 'embed');
  if (!embed || embed.value.kind !== 'list') return rule;
  const target = `:${cgoName}`;
  if (!embed.value.items.some(item => stringValue(item) === target)) return rule;
  const items = embed.value.items.map(item =>
    stringValue(item) === target ? { ...stringExpr(`:${DEFAULT_LIBRARY_NAME}`), comments: item.comments } : item
  );
  return setAttr(rule, 'embed', { ...embed.value, items });
}

function removeLegacyProto(c: Config, file: BuildFile): BuildFile {
  if (c.protoMode === 'legacy') return file;
  const pins = collectPins(file);
  let removed = false;
  const statements = file.statements.flatMap(stmt => {
    if (!isLegacyProtoLoad(stmt) && !(isLegacyProtoFilegroup(stmt) && !pins.has(stmt))) return [stmt];
    removed = true;
    const rest = detachedComments(stmt);
    return rest ? [rest] : [];
  });
  return removed ? { ...file, statements } : file;
}

/**
 * Apply structural fixes
 */
export function fixFile(c: Config, file: BuildFile): BuildFile {
  return removeLegacyProto(c, squashCgoLibrary(file));
}

function loadedSymbols(load: CallExpr): string[] {
  return load.args.slice(1).flatMap(arg => {
    const value = stringValue(arg);
    return value === null ? [] : [value];
  });
}

/**
 * Keep `load` statements for the known rule sets in sync with the kinds
 * used in the file. Symbols that come from other load sources are left
 * alone and never loaded twice.
 */
export function fixLoads(file: BuildFile): BuildFile {
  const used = new Set(rules(file).map(rule => rule.callee));
  const known = new Set(KNOWN_LOADS.map(l => l.file));
  const loadedElsewhere = new Set(
    file.statements.flatMap(stmt =>
      stmt.kind === 'call' && stmt.callee === 'load' && !known.has(stringValue(stmt.args[0]) ?? '')
        ? [...loadedSymbols(stmt), ...stmt.args.flatMap(arg => (arg.kind === 'assign' ? [arg.name] : []))]
        : []
    )
  );
  let statements: Array<Statement | null> = [...file.statements];
  const added: CallExpr[] = [];

  for (const { file: source, symbols } of KNOWN_LOADS) {
    const wanted = symbols.filter(s => used.has(s) && !loadedElsewhere.has(s));
    const index = statements.findIndex(
      stmt => stmt !== null && stmt.kind === 'call' && stmt.callee === 'load' && stringValue(stmt.args[0]) === source
    );

    if (index < 0) {
      if (wanted.length > 0) {
        added.push(callExpr('load', [stringExpr(source), ...wanted.map(stringExpr)]));
      }
      continue;
    }

    const load = statements[index];
    if (load === null || load.kind !== 'call') continue;
    const current = loadedSymbols(load);
    const foreign = current.filter(s => !symbols.includes(s));
    const keep = [...new Set([...foreign, ...wanted])].sort();
    const aliases = load.args.slice(1).filter((arg): arg is AssignExpr => arg.kind === 'assign');

    if (keep.length === 0 && aliases.length === 0) {
      statements[index] = detachedComments(load);
      continue;
    }
    const sameSymbols = keep.length === current.length && keep.every((s, i) => s === current[i]);
    if (!sameSymbols) {
      statements[index] = { ...load, args: [load.args[0], ...keep.map(stringExpr), ...aliases] };
    }
  }

  statements = statements.filter(s => s !== null);
  if (added.length > 0) {
    // New loads go after the leading comment blocks and existing loads
    let at = 0;
    while (at < statements.length) {
      const stmt = statements[at];
      if (stmt === null || !(stmt.kind === 'comment-block' || (stmt.kind === 'call' && stmt.callee === 'load'))) break;
      at++;
    }
    statements.splice(at, 0, ...added);
  }

  return { ...file, statements: statements.filter((s): s is Statement => s !== null) };
}
