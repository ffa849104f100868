/**
 * Package descriptors
 *
 * Placement of files, imports and cgo options into per-platform lists,
 * and the buildability rule used when choosing between packages.
 */

import type { Config, Constraint, FileInfo, GoTarget, Package, PlatformStrings, ProtoTarget } from './types.js';
import { placeFile } from './constraints.js';
import { platformKey } from './platforms.js';

export function emptyPlatformStrings(): PlatformStrings {
  return { generic: [], os: new Map(), arch: new Map(), platform: new Map() };
}

export function emptyGoTarget(): GoTarget {
  return {
    sources: emptyPlatformStrings(),
    imports: emptyPlatformStrings(),
    copts: emptyPlatformStrings(),
    clinkopts: emptyPlatformStrings(),
    cgo: false,
  };
}

export function emptyProtoTarget(): ProtoTarget {
  return { sources: emptyPlatformStrings(), imports: emptyPlatformStrings(), hasServices: false };
}

export function newPackage(name: string, dir: string, rel: string, importPath: string): Package {
  return {
    name,
    dir,
    rel,
    importPath,
    library: emptyGoTarget(),
    test: emptyGoTarget(),
    xtest: emptyGoTarget(),
    proto: emptyProtoTarget(),
    hasTestdata: false,
  };
}

function appendTo(map: Map<string, string[]>, key: string, values: readonly string[]): void {
  const list = map.get(key);
  if (list) {
    list.push(...values);
  } else {
    map.set(key, [...values]);
  }
}

/**
 * Add strings to the lists matching where `file` applies, optionally
 * narrowed by an extra constraint
 */
export function addPlatformStrings(
  ps: PlatformStrings,
  c: Config,
  file: FileInfo,
  values: readonly string[],
  extra: Constraint | null = null
): void {
  if (values.length === 0) return;
  const placement = placeFile(file, extra, c.genericTags);
  switch (placement.kind) {
    case 'generic':
      ps.generic.push(...values);
      break;
    case 'os':
      for (const key of placement.keys) appendTo(ps.os, key, values);
      break;
    case 'arch':
      for (const key of placement.keys) appendTo(ps.arch, key, values);
      break;
    case 'platform':
      for (const p of placement.keys) appendTo(ps.platform, platformKey(p), values);
      break;
    case 'none':
      break;
  }
}

export function isEmptyPlatformStrings(ps: PlatformStrings): boolean {
  return ps.generic.length === 0 && ps.os.size === 0 && ps.arch.size === 0 && ps.platform.size === 0;
}

/**
 * Every string in any list, sorted and de-duplicated
 */
export function flattenPlatformStrings(ps: PlatformStrings): string[] {
  const all = new Set(ps.generic);
  for (const map of [ps.os, ps.arch, ps.platform]) {
    for (const list of map.values()) {
      for (const value of list) all.add(value);
    }
  }
  return [...all].sort();
}

/**
 * Target for a Go file: external tests, tests, or the library
 */
function goTargetFor(pkg: Package, file: FileInfo): GoTarget {
  if (file.isXTest) return pkg.xtest;
  if (file.isTest) return pkg.test;
  return pkg.library;
}

function addToGoTarget(target: GoTarget, c: Config, file: FileInfo): void {
  addPlatformStrings(target.sources, c, file, [file.name]);
  addPlatformStrings(target.imports, c, file, file.imports);
  for (const opts of file.copts) {
    addPlatformStrings(target.copts, c, file, opts.options, opts.constraint);
  }
  for (const opts of file.clinkopts) {
    addPlatformStrings(target.clinkopts, c, file, opts.options, opts.constraint);
  }
  if (file.isCgo) target.cgo = true;
}

/**
 * Add a file to the package. Returns false for native C sources and
 * preprocessed assembly while the package is not known to use cgo.
 */
export function addFile(pkg: Package, c: Config, file: FileInfo): boolean {
  switch (file.category) {
    case 'go':
      addToGoTarget(goTargetFor(pkg, file), c, file);
      return true;
    case 'h':
    case 's':
      addPlatformStrings(pkg.library.sources, c, file, [file.name]);
      return true;
    case 'c':
    case 'cs':
      if (!pkg.library.cgo) return false;
      addPlatformStrings(pkg.library.sources, c, file, [file.name]);
      return true;
    case 'proto':
      if (c.protoMode === 'disable') return true;
      addPlatformStrings(pkg.proto.sources, c, file, [file.name]);
      addPlatformStrings(pkg.proto.imports, c, file, file.imports);
      if (file.hasServices) pkg.proto.hasServices = true;
      return true;
    case 'unsupported':
      return true;
  }
}

/**
 * Add files, retrying deferred native sources after cgo is known
 */
export function addFiles(pkg: Package, c: Config, files: readonly FileInfo[]): void {
  const deferred = files.filter(file => !addFile(pkg, c, file));
  for (const file of deferred) {
    addFile(pkg, c, file);
  }
}

/**
 * A package is buildable when it has Go sources, or proto sources that
 * will produce generated Go code
 */
export function isBuildable(pkg: Package, c: Config): boolean {
  const hasGo = [pkg.library, pkg.test, pkg.xtest].some(t => !isEmptyPlatformStrings(t.sources));
  return hasGo || (c.protoMode === 'default' && !isEmptyPlatformStrings(pkg.proto.sources));
}

export function isCommand(pkg: Package): boolean {
  return pkg.name === 'main';
}
