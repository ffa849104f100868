/**
 * External resolver
 *
 * Maps imports outside the repository to labels in external
 * repositories. The repository root of an import is taken from the
 * cache, from a list of well-known hosting layouts, or from an injected
 * lookup. Repository names are derived from the root by reversing the
 * host name: `github.com/acme/widget` becomes `com_github_acme_widget`.
 */

import type { Label } from './types.js';
import type { Labeler } from './labeler.js';
import { ResolveError } from './errors.js';

/**
 * Find the repository root prefix of an import path
 */
export type RepoRootLookup = (importPath: string) => string;

/**
 * Resolves one import path to a label
 */
export interface ImportResolver {
  resolve(importPath: string): Label;
}

interface KnownHost {
  prefix: string;
  /** Path elements after the prefix that name a repository */
  missing: number;
}

const KNOWN_HOSTS: readonly KnownHost[] = [
  { prefix: 'github.com/', missing: 2 },
  { prefix: 'bitbucket.org/', missing: 2 },
  { prefix: 'gitlab.com/', missing: 2 },
  { prefix: 'golang.org/x/', missing: 1 },
  { prefix: 'cloud.google.com/', missing: 1 },
  { prefix: 'google.golang.org/', missing: 1 },
];

const GOPKG_IN = /^gopkg\.in\/(?:[\w-]+\/)?[\w.-]+\.v\d+(?=\/|$)/;

/**
 * Repository name for a root import path
 */
export function repoName(root: string): string {
  const [host, ...rest] = root.split('/');
  return [...host.split('.').reverse(), ...rest].join('_').replace(/[-.]/g, '_');
}

/**
 * Root prefix for imports on well-known hosts, or null
 *
 * @throws ResolveError when the import is too short to name a repository
 */
export function knownHostRoot(importPath: string): string | null {
  for (const host of KNOWN_HOSTS) {
    if (!importPath.startsWith(host.prefix)) continue;
    const elements = importPath.slice(host.prefix.length).split('/');
    if (elements.length < host.missing || elements.slice(0, host.missing).some(e => e === '')) {
      throw new ResolveError(
        importPath,
        `import path "${importPath}" is shorter than the known prefix "${host.prefix}"`
      );
    }
    return host.prefix + elements.slice(0, host.missing).join('/');
  }
  const gopkg = GOPKG_IN.exec(importPath);
  return gopkg ? gopkg[0] : null;
}

/**
 * Resolver for external mode: each repository is a separate workspace
 */
export class ExternalResolver implements ImportResolver {
  /** Root prefix -> repository name */
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly labeler: Labeler,
    private readonly lookup: RepoRootLookup,
    knownImports: readonly string[] = []
  ) {
    for (const imp of knownImports) {
      this.cache.set(imp, repoName(imp));
    }
  }

  resolve(importPath: string): Label {
    const { root, repo } = this.lookupPrefix(importPath);
    const pkg = importPath === root ? '' : importPath.slice(root.length + 1);
    return { ...this.labeler.libraryLabel(pkg), repo };
  }

  private lookupPrefix(importPath: string): { root: string; repo: string } {
    const parts = importPath.split('/');
    for (let n = parts.length; n > 0; n--) {
      const prefix = parts.slice(0, n).join('/');
      const repo = this.cache.get(prefix);
      if (repo !== undefined) {
        return { root: prefix, repo };
      }
    }

    const root = knownHostRoot(importPath) ?? this.lookup(importPath);
    if (root !== importPath && !importPath.startsWith(root + '/')) {
      throw new ResolveError(importPath, `repository root "${root}" is not a prefix of the import path`);
    }
    const repo = repoName(root);
    this.cache.set(root, repo);
    return { root, repo };
  }
}

/**
 * Resolver for vendored mode: imports live under the root vendor directory
 */
export class VendoredResolver implements ImportResolver {
  constructor(private readonly labeler: Labeler) {}

  resolve(importPath: string): Label {
    return this.labeler.libraryLabel(`vendor/${importPath}`);
  }
}
