/**
 * Build file emission
 *
 * `fix` writes files in place (temp file + rename) when their content
 * changed, `print` sends them to the output, and `diff` prints a unified
 * diff against the file on disk.
 */

import { spawnSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { BuildFile } from './build-file/ast.js';
import { formatBuildFile } from './build-file/printer.js';
import { getAllowedEnv } from '../../cli/utils/env-allowlist.js';

export type EmitMode = 'fix' | 'print' | 'diff';

export const EMIT_MODES: readonly EmitMode[] = ['fix', 'print', 'diff'];

export function isEmitMode(value: string): value is EmitMode {
  return EMIT_MODES.some(m => m === value);
}

export interface EmitOptions {
  mode: EmitMode;
  repoRoot: string;
  /** Receives printed files and diffs */
  out: (text: string) => void;
}

/**
 * Write a file atomically
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.tmp`);

  fs.writeFileSync(tempPath, content);
  fs.renameSync(tempPath, filePath);
}

function readIfExists(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Unified diff between the file on disk (or nothing) and new content
 *
 * @returns the diff, empty when there is no difference
 */
export function unifiedDiff(filePath: string, displayPath: string, content: string): string {
  const exists = fs.existsSync(filePath);
  const result = spawnSync(
    'diff',
    ['-u', '--label', displayPath, '--label', displayPath, exists ? filePath : '/dev/null', '-'],
    { input: content, encoding: 'utf-8', env: getAllowedEnv() }
  );
  if (result.error) {
    throw result.error;
  }
  if (result.status === 0) return '';
  if (result.status === 1) return result.stdout;
  throw new Error(`diff failed for ${displayPath}: ${result.stderr.trim()}`);
}

/**
 * Emit a build file
 *
 * @returns whether the file differs from the one on disk
 */
export function emitFile(file: BuildFile, options: EmitOptions): boolean {
  const content = formatBuildFile(file);
  const displayPath = path.relative(options.repoRoot, file.path).split(path.sep).join('/');
  const changed = readIfExists(file.path) !== content;

  switch (options.mode) {
    case 'fix':
      if (changed) writeFileAtomic(file.path, content);
      break;
    case 'print':
      options.out(content);
      break;
    case 'diff':
      if (changed) options.out(unifiedDiff(file.path, displayPath, content));
      break;
  }
  return changed;
}
