/**
 * Package builder
 *
 * Turns the classified files of one directory into at most one Package.
 */

import * as path from 'node:path';
import type { Config, FileInfo, Package, Reporter } from './types.js';
import { RuleGenErrorCode } from './types.js';
import type { SourceLanguage } from './languages/index.js';
import { addFiles, isBuildable, newPackage } from './package.js';

/** Package name used only for documentation files */
const DOCUMENTATION_PACKAGE = 'documentation';

/**
 * Classified contents of one directory
 */
export interface DirectoryFiles {
  /** Absolute directory */
  dir: string;
  /** Path relative to the repository root */
  rel: string;
  /** Names of files that declare a package */
  sourceFiles: string[];
  /** Names of all other regular files */
  otherFiles: string[];
  /** Names of files produced by rules of the existing build file */
  genFiles: string[];
  hasTestdata: boolean;
}

/**
 * Package name expected for the directory at `rel`
 */
export function defaultPackageName(c: Config, rel: string): string {
  if (rel !== '') return path.posix.basename(rel);
  return c.prefix !== '' ? path.posix.basename(c.prefix) : 'unnamed';
}

/**
 * Import path of the directory at `rel`. In vendored mode, paths under a
 * vendor directory are importable by the path after it.
 */
export function importPathFor(c: Config, rel: string): string {
  if (c.depMode === 'vendored') {
    const parts = rel.split('/');
    const vendor = parts.lastIndexOf('vendor');
    if (vendor >= 0 && vendor < parts.length - 1) {
      return parts.slice(vendor + 1).join('/');
    }
  }
  if (rel === '') return c.prefix;
  return c.prefix === '' ? rel : `${c.prefix}/${rel}`;
}

/**
 * Render the conflict message for several candidate packages
 */
export function conflictMessage(candidates: ReadonlyArray<{ name: string; file: string }>, dir: string): string {
  const parts = [...candidates]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(p => `${p.name} (${p.file})`);
  const listed = parts.length > 1 ? `${parts.slice(0, -1).join(', ')} and ${parts[parts.length - 1]}` : parts.join('');
  return `found packages ${listed} in ${dir}`;
}

/**
 * Build the package for a directory, or null when it has none or the
 * choice is ambiguous
 */
export function buildPackage(
  c: Config,
  language: SourceLanguage,
  files: DirectoryFiles,
  report: Reporter
): Package | null {
  const { dir, rel } = files;
  const defaultName = defaultPackageName(c, rel);
  const importPath = importPathFor(c, rel);

  const groups = new Map<string, FileInfo[]>();
  const unknown: string[] = [];

  for (const name of files.sourceFiles) {
    const filePath = path.join(dir, name);
    let info: FileInfo;
    try {
      info = language.fileInfo(filePath);
    } catch (error) {
      report({
        code: RuleGenErrorCode.RULEGEN_FILE_ERROR,
        path: path.posix.join(rel, name),
        message: error instanceof Error ? error.message : String(error),
      });
      unknown.push(name);
      continue;
    }

    const packageName = info.packageName === '' ? defaultName : info.packageName;
    if (packageName === DOCUMENTATION_PACKAGE) continue;
    const group = groups.get(packageName);
    if (group) {
      group.push(info);
    } else {
      groups.set(packageName, [info]);
    }
  }

  const candidates: Package[] = [];
  for (const [name, infos] of groups) {
    const pkg = newPackage(name, dir, rel, importPath);
    addFiles(pkg, c, infos);
    candidates.push(pkg);
  }

  const buildable = candidates.filter(pkg => isBuildable(pkg, c));
  let selected: Package | undefined;
  if (buildable.length === 1) {
    selected = buildable[0];
  } else if (buildable.length > 1) {
    selected = buildable.find(pkg => pkg.name === defaultName);
    if (!selected) {
      report({
        code: RuleGenErrorCode.RULEGEN_MULTIPLE_PACKAGES,
        path: rel === '' ? '.' : rel,
        message: conflictMessage(
          buildable.map(pkg => ({ name: pkg.name, file: groups.get(pkg.name)?.[0]?.name ?? '' })),
          dir
        ),
      });
      return null;
    }
  }
  if (!selected) {
    return null;
  }

  const known = new Set([...files.sourceFiles, ...files.otherFiles]);
  const extra: FileInfo[] = [
    ...unknown.map(name => language.staticFileInfo(path.join(dir, name), true)),
    ...files.otherFiles.map(name => language.staticFileInfo(path.join(dir, name), true)),
    ...files.genFiles.filter(name => !known.has(name)).map(name => language.staticFileInfo(path.join(dir, name), false)),
  ];
  addFiles(selected, c, extra);
  selected.hasTestdata = files.hasTestdata;
  return selected;
}
