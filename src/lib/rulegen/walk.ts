/**
 * Directory walker
 *
 * Single post-order traversal of the repository. For every directory it
 * locates the existing build file, applies its directives, classifies
 * entries, recurses, and then builds the directory's package.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { BuildFile } from './build-file/ast.js';
import { stringValue } from './build-file/ast.js';
import { parseBuildFile } from './build-file/parser.js';
import { applyDirectives, inferProtoMode, parseDirectives } from './config.js';
import type { SourceLanguage } from './languages/index.js';
import { buildPackage } from './package-builder.js';
import type { Config, Package, Reporter } from './types.js';
import { RuleGenErrorCode } from './types.js';

/**
 * Called once per visited directory, children before parents
 */
export type WalkFunc = (
  rel: string,
  c: Config,
  pkg: Package | null,
  oldFile: BuildFile | null,
  isUpdateDir: boolean
) => void;

export interface WalkOptions {
  language: SourceLanguage;
  report: Reporter;
  /** Verbose progress output */
  log?: (message: string) => void;
}

/**
 * Outcome of looking for an existing build file
 */
type BuildFileLookup =
  | { kind: 'none' }
  | { kind: 'found'; file: BuildFile }
  | { kind: 'invalid' };

function findBuildFile(c: Config, dir: string, rel: string, names: ReadonlySet<string>, report: Reporter): BuildFileLookup {
  const found = c.validBuildFileNames.filter(n => names.has(n));
  const where = rel === '' ? '.' : rel;
  if (found.length === 0) {
    return { kind: 'none' };
  }
  if (found.length > 1) {
    report({
      code: RuleGenErrorCode.RULEGEN_MULTIPLE_BUILD_FILES,
      path: where,
      message: `multiple build files found in ${where}: ${found.join(', ')}`,
    });
    return { kind: 'invalid' };
  }

  const filePath = path.join(dir, found[0]);
  try {
    return { kind: 'found', file: parseBuildFile(filePath, fs.readFileSync(filePath, 'utf-8')) };
  } catch (error) {
    report({
      code: RuleGenErrorCode.RULEGEN_MALFORMED_BUILD_FILE,
      path: path.posix.join(rel, found[0]),
      message: error instanceof Error ? error.message : String(error),
    });
    return { kind: 'invalid' };
  }
}

/**
 * Names of files produced by rules in a build file (`out` and `outs`)
 */
export function findGenFiles(file: BuildFile, excluded: ReadonlySet<string>): string[] {
  const result: string[] = [];
  for (const stmt of file.statements) {
    if (stmt.kind !== 'call') continue;
    for (const arg of stmt.args) {
      if (arg.kind !== 'assign') continue;
      if (arg.name === 'out') {
        const value = stringValue(arg.value);
        if (value !== null) result.push(value);
      } else if (arg.name === 'outs' && arg.value.kind === 'list') {
        for (const item of arg.value.items) {
          const value = stringValue(item);
          if (value !== null) result.push(value);
        }
      }
    }
  }
  return result.filter(name => !excluded.has(name));
}

function isInScope(c: Config, dir: string): boolean {
  return c.dirs.some(d => d === dir || dir.startsWith(d + path.sep));
}

function ignoreReports(): void {}

/**
 * Walk the repository from its root
 */
export function walk(c: Config, visit: WalkFunc, options: WalkOptions): void {
  const { language, report, log } = options;

  /** Returns whether the directory or a descendant has a package or build file */
  const visitDir = (parent: Config, dir: string, rel: string): boolean => {
    const isUpdateDir = isInScope(parent, dir);
    const dirReport: Reporter = isUpdateDir ? report : ignoreReports;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      dirReport({
        code: RuleGenErrorCode.RULEGEN_READ_ERROR,
        path: rel === '' ? '.' : rel,
        message: error instanceof Error ? error.message : String(error),
      });
      visit(rel, parent, null, null, isUpdateDir);
      return false;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const names = new Set(entries.filter(e => e.isFile()).map(e => e.name));
    const lookup = findBuildFile(parent, dir, rel, names, dirReport);
    const oldFile = lookup.kind === 'found' ? lookup.file : null;

    let c = parent;
    const excluded = new Set<string>();
    if (oldFile) {
      const directives = parseDirectives(oldFile);
      c = applyDirectives(parent, directives, rel, dirReport);
      for (const d of directives) {
        if (d.key === 'exclude' && d.value !== '') excluded.add(d.value);
      }
      c = inferProtoMode(c, oldFile);
    }
    const buildFileNames = new Set(c.validBuildFileNames);

    const subdirs: string[] = [];
    let sourceFiles: string[] = [];
    const otherFiles: string[] = [];
    for (const entry of entries) {
      const name = entry.name;
      if (name.startsWith('.') || name.startsWith('_') || excluded.has(name)) continue;
      if (entry.isDirectory()) {
        if (name === 'vendor' && c.depMode === 'external') continue;
        subdirs.push(name);
      } else if (entry.isFile() && !buildFileNames.has(name)) {
        if (language.isSourceFile(name)) {
          sourceFiles.push(name);
        } else {
          otherFiles.push(name);
        }
      }
    }

    if (c.protoMode === 'default') {
      const generated = new Set(sourceFiles.filter(n => language.isSchemaFile(n)).map(n => language.generatedSchemaFile(n)));
      sourceFiles = sourceFiles.filter(n => !generated.has(n));
    }

    let hasPackageBelow = false;
    let hasTestdata = false;
    for (const name of subdirs) {
      const childHas = visitDir(c, path.join(dir, name), rel === '' ? name : `${rel}/${name}`);
      if (name === 'testdata' && !childHas) {
        hasTestdata = true;
      }
      hasPackageBelow = hasPackageBelow || childHas;
    }

    let pkg: Package | null = null;
    if (lookup.kind !== 'invalid') {
      pkg = buildPackage(
        c,
        language,
        {
          dir,
          rel,
          sourceFiles,
          otherFiles,
          genFiles: oldFile ? findGenFiles(oldFile, excluded) : [],
          hasTestdata,
        },
        dirReport
      );
    }

    if (isUpdateDir && log) {
      log(`Visited ${rel === '' ? '.' : rel}: ${pkg ? `package ${pkg.name}` : 'no package'}`);
    }
    visit(rel, c, isUpdateDir ? pkg : null, oldFile, isUpdateDir);
    return pkg !== null || lookup.kind !== 'none' || hasPackageBelow;
  };

  visitDir(c, c.repoRoot, '');
}
