/**
 * Label rendering and parsing
 */

import * as path from 'node:path';
import type { Label } from './types.js';

export function label(pkg: string, name: string, repo = ''): Label {
  return { repo, pkg, name, relative: false };
}

/**
 * Render a label in canonical form: `:name` for relative labels,
 * `//pkg` when the name equals the last package segment, otherwise
 * `//pkg:name`, prefixed by `@repo` for external repositories
 */
export function labelToString(l: Label): string {
  if (l.relative) {
    return `:${l.name}`;
  }
  const repo = l.repo === '' ? '' : `@${l.repo}`;
  if (l.pkg !== '' && path.posix.basename(l.pkg) === l.name) {
    return `${repo}//${l.pkg}`;
  }
  return `${repo}//${l.pkg}:${l.name}`;
}

/**
 * Parse a label string
 *
 * @throws Error when the string is not a label
 */
export function parseLabel(s: string): Label {
  const invalid = (): never => {
    throw new Error(`invalid label: ${JSON.stringify(s)}`);
  };

  if (s.startsWith(':')) {
    const name = s.slice(1);
    if (name === '') invalid();
    return { repo: '', pkg: '', name, relative: true };
  }

  let rest = s;
  let repo = '';
  if (rest.startsWith('@')) {
    const slashes = rest.indexOf('//');
    if (slashes < 0) {
      repo = rest.slice(1);
      if (!/^[\w.-]+$/.test(repo)) invalid();
      return { repo, pkg: '', name: repo, relative: false };
    }
    repo = rest.slice(1, slashes);
    if (!/^[\w.-]+$/.test(repo)) invalid();
    rest = rest.slice(slashes);
  }

  if (!rest.startsWith('//')) {
    if (repo !== '' || rest === '' || rest.includes(':')) invalid();
    return { repo: '', pkg: '', name: rest, relative: true };
  }
  rest = rest.slice(2);

  const colon = rest.indexOf(':');
  const pkg = colon < 0 ? rest : rest.slice(0, colon);
  const name = colon < 0 ? path.posix.basename(rest) : rest.slice(colon + 1);
  if (name === '' || pkg.startsWith('/') || pkg.endsWith('/') || name.includes(':')) invalid();
  return { repo, pkg, name, relative: false };
}

/**
 * Label relative to a build file in `pkg` of the main repository
 */
export function relativeTo(l: Label, pkg: string): Label {
  if (l.repo === '' && !l.relative && l.pkg === pkg) {
    return { ...l, relative: true };
  }
  return l;
}
