/**
 * Runner - main orchestration module
 *
 * Walks the repository, generates rules for every package in scope,
 * resolves their imports once the whole tree has been seen, merges them
 * into the existing build files and emits the results.
 */

import * as path from 'node:path';
import type { BuildFile } from './build-file/ast.js';
import type { Config, Package, RuleGenWarning, VisitRecord } from './types.js';
import { ConfigError, RuleGenErrorCode } from './types.js';
import { getLanguage } from './languages/index.js';
import type { SourceLanguage } from './languages/index.js';
import { Labeler } from './labeler.js';
import { ExternalResolver, VendoredResolver } from './external-resolver.js';
import type { ImportResolver, RepoRootLookup } from './external-resolver.js';
import { gitRepoRoot } from './git.js';
import { Resolver } from './resolve.js';
import { Generator } from './generator.js';
import { mergeWithExisting } from './merger.js';
import { walk } from './walk.js';
import { emitFile } from './emit.js';
import type { EmitMode } from './emit.js';

/**
 * Run options
 */
export interface RunOptions {
  config: Config;
  mode: EmitMode;
  /** Verbose logging */
  verbose: boolean;
  /** Logger function */
  log: (message: string) => void;
  /** Receives printed files and diffs */
  out: (text: string) => void;
  /** Repository root discovery for external imports; defaults to git ls-remote */
  lookup?: RepoRootLookup;
}

export interface RunStats {
  directories: number;
  packages: number;
  files_changed: number;
  run_time_ms: number;
}

/**
 * Run result
 */
export interface RunResult {
  success: boolean;
  error?: {
    code: RuleGenErrorCode;
    message: string;
  };
  stats?: RunStats;
  warnings: RuleGenWarning[];
}

interface PackageVisit {
  pkg: Package;
  config: Config;
  oldFile: BuildFile | null;
}

function newResolver(c: Config, language: SourceLanguage, lookup: RepoRootLookup): Resolver {
  const labeler = new Labeler(c);
  const external: ImportResolver =
    c.depMode === 'vendored' ? new VendoredResolver(labeler) : new ExternalResolver(labeler, lookup, c.knownImports);
  return new Resolver(c, labeler, language, external);
}

/**
 * Generate and resolve the rules of each package, grouped by the build
 * file that holds them
 */
function buildRecords(
  visits: readonly PackageVisit[],
  root: { config: Config; oldFile: BuildFile | null },
  resolver: Resolver,
  report: (warning: RuleGenWarning) => void
): VisitRecord[] {
  const flat = root.config.structureMode === 'flat';
  const records: VisitRecord[] = [];

  for (const visit of visits) {
    const buildRel = flat ? '' : visit.pkg.rel;
    const oldFile = flat ? root.oldFile : visit.oldFile;
    const config = flat ? root.config : visit.config;
    const generated = new Generator(config, new Labeler(config), oldFile).generate(visit.pkg, buildRel);
    records.push({
      pkgRel: visit.pkg.rel,
      buildRel,
      rules: generated.rules.map(rule => resolver.resolveRule(rule, visit.pkg.rel, buildRel, report)),
      empty: generated.empty,
      oldFile,
      config,
    });
  }

  if (!flat) {
    return records;
  }
  const combined: VisitRecord = {
    pkgRel: '',
    buildRel: '',
    rules: records.flatMap(r => r.rules),
    empty: records.flatMap(r => r.empty),
    oldFile: root.oldFile,
    config: root.config,
  };
  return records.length > 0 ? [combined] : [];
}

/**
 * Generate and merge build files for the configured directories
 */
export function run(options: RunOptions): RunResult {
  const startTime = Date.now();
  const warnings: RuleGenWarning[] = [];
  const report = (warning: RuleGenWarning): void => {
    warnings.push(warning);
  };
  const { log, verbose } = options;

  let language: SourceLanguage;
  try {
    language = getLanguage(options.config.language);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    return { success: false, error: { code: RuleGenErrorCode.RULEGEN_CONFIG_ERROR, message: err.message }, warnings };
  }

  if (verbose) log(`Walking ${options.config.repoRoot}`);

  const visits: PackageVisit[] = [];
  let directories = 0;
  let root: { config: Config; oldFile: BuildFile | null } = { config: options.config, oldFile: null };
  walk(
    options.config,
    (rel, c, pkg, oldFile, isUpdateDir) => {
      if (rel === '') root = { config: c, oldFile };
      if (!isUpdateDir) return;
      directories++;
      if (pkg) visits.push({ pkg, config: c, oldFile });
    },
    { language, report, log: verbose ? log : undefined }
  );

  if (verbose) log(`Found ${visits.length} packages in ${directories} directories`);

  // Resolution runs after the walk so every lookup shares one cache
  const resolver = newResolver(root.config, language, options.lookup ?? gitRepoRoot);
  const records = buildRecords(visits, root, resolver, report);

  let filesChanged = 0;
  for (const record of records) {
    const filePath =
      record.oldFile?.path ?? path.join(record.config.repoRoot, record.buildRel, record.config.validBuildFileNames[0]);
    const merged = mergeWithExisting(record.rules, record.empty, record.oldFile, filePath, record.config, report);
    if (!merged) continue;

    try {
      if (emitFile(merged, { mode: options.mode, repoRoot: record.config.repoRoot, out: options.out })) {
        filesChanged++;
        if (verbose) log(`Updated ${path.relative(record.config.repoRoot, merged.path)}`);
      }
    } catch (err) {
      report({
        code: RuleGenErrorCode.RULEGEN_WRITE_ERROR,
        path: path.relative(record.config.repoRoot, merged.path),
        message: `Failed to emit build file: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  }

  const stats: RunStats = {
    directories,
    packages: visits.length,
    files_changed: filesChanged,
    run_time_ms: Date.now() - startTime,
  };
  if (verbose) log(`Done in ${stats.run_time_ms}ms`);

  return { success: true, stats, warnings };
}
