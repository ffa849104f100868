/**
 * Build constraints
 *
 * Parses `// +build` and `//go:build` header lines and file name
 * suffixes, and decides on which platforms a file is compiled.
 */

import type { Constraint, FileInfo } from './types.js';
import type { Platform } from './platforms.js';
import { getPlatforms, isKnownArch, isKnownOS } from './platforms.js';

function tag(name: string): Constraint {
  return { kind: 'tag', tag: name };
}

function and(x: Constraint | null, y: Constraint | null): Constraint | null {
  if (x === null) return y;
  if (y === null) return x;
  return { kind: 'and', x, y };
}

function or(x: Constraint, y: Constraint): Constraint {
  return { kind: 'or', x, y };
}

/**
 * Parse the arguments of a `// +build` line: spaces separate
 * alternatives, commas separate required terms, `!` negates
 */
export function parsePlusBuild(args: string): Constraint | null {
  let result: Constraint | null = null;
  for (const option of args.trim().split(/\s+/)) {
    if (option === '') continue;
    let clause: Constraint | null = null;
    for (const term of option.split(',')) {
      const negated = term.startsWith('!');
      const name = negated ? term.slice(1) : term;
      if (name === '') {
        throw new Error(`invalid build constraint: ${args}`);
      }
      clause = and(clause, negated ? { kind: 'not', x: tag(name) } : tag(name));
    }
    if (clause !== null) {
      result = result === null ? clause : or(result, clause);
    }
  }
  return result;
}

/**
 * Parse a `//go:build` expression
 */
export function parseGoBuild(expr: string): Constraint {
  const tokens = expr.match(/&&|\|\||[!()]|[^\s!()&|]+/g) ?? [];
  let pos = 0;

  const fail = (): never => {
    throw new Error(`invalid build expression: ${expr}`);
  };

  const parseOr = (): Constraint => {
    let left = parseAnd();
    while (tokens[pos] === '||') {
      pos++;
      left = or(left, parseAnd());
    }
    return left;
  };

  const parseAnd = (): Constraint => {
    let left = parseUnary();
    while (tokens[pos] === '&&') {
      pos++;
      left = { kind: 'and', x: left, y: parseUnary() };
    }
    return left;
  };

  const parseUnary = (): Constraint => {
    const tok = tokens[pos++];
    if (tok === undefined) return fail();
    if (tok === '!') return { kind: 'not', x: parseUnary() };
    if (tok === '(') {
      const inner = parseOr();
      if (tokens[pos++] !== ')') fail();
      return inner;
    }
    if (!/^[\w.]+$/.test(tok)) fail();
    return tag(tok);
  };

  const result = parseOr();
  if (pos !== tokens.length) fail();
  return result;
}

/**
 * Read the build constraint from the comment header of a source file.
 * A `//go:build` line takes precedence over `// +build` lines, which are
 * combined with AND.
 */
export function readConstraint(content: string): Constraint | null {
  let goBuild: Constraint | null = null;
  let plusBuild: Constraint | null = null;
  let inBlockComment = false;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (inBlockComment) {
      if (line.includes('*/')) inBlockComment = false;
      continue;
    }
    if (line === '') continue;
    if (line.startsWith('/*')) {
      inBlockComment = !line.includes('*/');
      continue;
    }
    if (!line.startsWith('//')) break;

    const goBuildMatch = /^\/\/go:build\s+(.*)$/.exec(line);
    if (goBuildMatch) {
      goBuild = parseGoBuild(goBuildMatch[1]);
      continue;
    }
    const plusBuildMatch = /^\/\/\s*\+build\s+(.*)$/.exec(line);
    if (plusBuildMatch) {
      plusBuild = and(plusBuild, parsePlusBuild(plusBuildMatch[1]));
    }
  }

  return goBuild ?? plusBuild;
}

/**
 * Split the OS and architecture suffix from a file name, e.g.
 * `foo_linux_amd64.go`. Only the part after the first `_` counts.
 */
export function fileNamePlatform(name: string): { goos: string; goarch: string } {
  let stem = name.includes('.') ? name.slice(0, name.indexOf('.')) : name;
  if (stem.endsWith('_test')) {
    stem = stem.slice(0, -'_test'.length);
  }
  const underscore = stem.indexOf('_');
  if (underscore < 0) {
    return { goos: '', goarch: '' };
  }
  const parts = stem.slice(underscore).split('_');
  const n = parts.length;
  if (n >= 2 && isKnownOS(parts[n - 2]) && isKnownArch(parts[n - 1])) {
    return { goos: parts[n - 2], goarch: parts[n - 1] };
  }
  if (n >= 1 && isKnownOS(parts[n - 1])) {
    return { goos: parts[n - 1], goarch: '' };
  }
  if (n >= 1 && isKnownArch(parts[n - 1])) {
    return { goos: '', goarch: parts[n - 1] };
  }
  return { goos: '', goarch: '' };
}

export function evalConstraint(c: Constraint, holds: (tag: string) => boolean): boolean {
  switch (c.kind) {
    case 'tag':
      return holds(c.tag);
    case 'not':
      return !evalConstraint(c.x, holds);
    case 'and':
      return evalConstraint(c.x, holds) && evalConstraint(c.y, holds);
    case 'or':
      return evalConstraint(c.x, holds) || evalConstraint(c.y, holds);
  }
}

/**
 * Check whether any tag in the expression satisfies `pred`
 */
export function mentionsTag(c: Constraint | null, pred: (tag: string) => boolean): boolean {
  if (c === null) return false;
  switch (c.kind) {
    case 'tag':
      return pred(c.tag);
    case 'not':
      return mentionsTag(c.x, pred);
    case 'and':
    case 'or':
      return mentionsTag(c.x, pred) || mentionsTag(c.y, pred);
  }
}

type Constrained = Pick<FileInfo, 'goos' | 'goarch' | 'constraint' | 'isCgo'>;

/**
 * Evaluate a file's constraints for one target. Known OS and
 * architecture tags only hold for the given `os` and `arch` (either may
 * be empty); any other tag holds when it is one of the generic tags.
 */
export function checkConstraints(
  file: Constrained,
  extra: Constraint | null,
  genericTags: ReadonlySet<string>,
  os: string,
  arch: string
): boolean {
  if (file.goos !== '' && file.goos !== os) return false;
  if (file.goarch !== '' && file.goarch !== arch) return false;
  const holds = (name: string): boolean => {
    if (isKnownOS(name)) return name === os;
    if (isKnownArch(name)) return name === arch;
    return genericTags.has(name);
  };
  if (file.isCgo && !genericTags.has('cgo')) return false;
  if (file.constraint !== null && !evalConstraint(file.constraint, holds)) return false;
  return extra === null || evalConstraint(extra, holds);
}

/**
 * Where a file applies
 */
export type Placement =
  | { kind: 'generic' }
  | { kind: 'os'; keys: string[] }
  | { kind: 'arch'; keys: string[] }
  | { kind: 'platform'; keys: Platform[] }
  | { kind: 'none' };

/**
 * Decide whether a file (optionally under an extra constraint, such as a
 * `#cgo` line's) applies everywhere, to some OSes, to some
 * architectures, to specific OS/architecture pairs, or nowhere
 */
export function placeFile(file: Constrained, extra: Constraint | null, genericTags: ReadonlySet<string>): Placement {
  const osSpecific =
    file.goos !== '' || mentionsTag(file.constraint, isKnownOS) || mentionsTag(extra, isKnownOS);
  const archSpecific =
    file.goarch !== '' || mentionsTag(file.constraint, isKnownArch) || mentionsTag(extra, isKnownArch);
  const table = getPlatforms();

  if (!osSpecific && !archSpecific) {
    return checkConstraints(file, extra, genericTags, '', '') ? { kind: 'generic' } : { kind: 'none' };
  }

  if (osSpecific && !archSpecific) {
    const keys = [...table.os].filter(os => checkConstraints(file, extra, genericTags, os, ''));
    return keys.length > 0 ? { kind: 'os', keys } : { kind: 'none' };
  }

  if (archSpecific && !osSpecific) {
    const keys = [...table.arch].filter(arch => checkConstraints(file, extra, genericTags, '', arch));
    return keys.length > 0 ? { kind: 'arch', keys } : { kind: 'none' };
  }

  const keys = table.platforms.filter(p => checkConstraints(file, extra, genericTags, p.os, p.arch));
  return keys.length > 0 ? { kind: 'platform', keys } : { kind: 'none' };
}
