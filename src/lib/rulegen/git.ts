/**
 * Git utilities for repository root discovery
 */

import { execFileSync } from 'node:child_process';
import { getAllowedEnv } from '../../cli/utils/env-allowlist.js';
import { ResolveError } from './errors.js';

/** Time to wait for a remote before giving up */
const LS_REMOTE_TIMEOUT_MS = 30_000;

/**
 * Check whether `https://<prefix>` is a reachable git repository
 */
export function isGitRemote(prefix: string): boolean {
  try {
    execFileSync('git', ['ls-remote', '--heads', `https://${prefix}`], {
      stdio: ['ignore', 'pipe', 'pipe'],
      encoding: 'utf-8',
      timeout: LS_REMOTE_TIMEOUT_MS,
      env: { ...getAllowedEnv(), GIT_TERMINAL_PROMPT: '0' },
    });
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the shortest prefix of an import path that names a git
 * repository, probing successively longer prefixes
 *
 * @throws ResolveError when the path is a single segment or no prefix is a repository
 */
export function gitRepoRoot(importPath: string): string {
  const parts = importPath.split('/');
  if (parts.length < 2) {
    throw new ResolveError(importPath, 'import path has fewer than two segments');
  }
  for (let n = 2; n <= parts.length; n++) {
    const prefix = parts.slice(0, n).join('/');
    if (isGitRemote(prefix)) {
      return prefix;
    }
  }
  throw new ResolveError(importPath, 'no repository root found');
}
