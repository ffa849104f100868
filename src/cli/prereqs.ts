import * as fs from 'node:fs';
import * as path from 'node:path';

/** Files that mark the root of a repository */
export const WORKSPACE_FILES = ['WORKSPACE', 'WORKSPACE.bazel', 'MODULE.bazel'];

function isFilesystemRoot(dir: string): boolean {
  return path.dirname(dir) === dir;
}

/**
 * Find the nearest directory at or above `startDir` holding a workspace file
 */
export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);

  while (true) {
    for (const name of WORKSPACE_FILES) {
      const candidate = path.join(current, name);
      if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
        return current;
      }
    }

    if (isFilesystemRoot(current)) {
      return null;
    }

    current = path.dirname(current);
  }
}
