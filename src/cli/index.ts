import { Command } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  createConfig,
  isEmitMode,
  parseBuildFile,
  readPrefix,
  run,
  DEFAULT_BUILD_FILE_NAMES,
  RuleGenErrorCode,
  type Config,
  type EmitMode,
  type RuleGenWarning,
} from '../lib/rulegen/index.js';
import { isDepMode, isProtoMode, isStructureMode } from '../lib/rulegen/config.js';
import { findRepoRoot } from './prereqs.js';
import { loadRuleGenConfig, type RuleGenFileConfig } from './config.js';
import { log, setVerbosity, Verbosity } from './logger.js';

const VERSION = '0.1.0';

interface CliOptions {
  mode: string;
  repoRoot?: string;
  prefix?: string;
  buildFileName?: string;
  buildTags?: string;
  external?: string;
  proto?: string;
  structure?: string;
  knownImport: string[];
  config?: string;
  verbose?: number;
  quiet?: boolean;
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map((s) => s.trim()).filter((s) => s !== '');
}

function fail(code: RuleGenErrorCode, message: string): number {
  log.error(`${code}: ${message}`);
  return 1;
}

/**
 * Prefix declared in the root build file by directive or go_prefix rule
 */
function prefixFromRootBuildFile(repoRoot: string, buildFileNames: readonly string[]): string | null {
  for (const name of buildFileNames) {
    const filePath = path.join(repoRoot, name);
    if (!fs.existsSync(filePath)) continue;
    try {
      return readPrefix(parseBuildFile(filePath, fs.readFileSync(filePath, 'utf-8')));
    } catch (error) {
      // The walker reports malformed files
      log.verbose(`Could not read prefix from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
  return null;
}

function checkChoice<T extends string>(value: string | undefined, isValid: (v: string) => v is T, field: string): T | undefined {
  if (value === undefined) return undefined;
  if (!isValid(value)) {
    throw new Error(`Invalid ${field}: ${value}`);
  }
  return value;
}

function buildConfig(dirs: string[], options: CliOptions, repoRoot: string, fileConfig: RuleGenFileConfig, shouldFix: boolean): Config {
  const buildFileNames = splitList(options.buildFileName) ?? fileConfig.build_file_names ?? DEFAULT_BUILD_FILE_NAMES;
  const prefix = options.prefix ?? fileConfig.prefix ?? prefixFromRootBuildFile(repoRoot, buildFileNames);
  if (prefix === null || prefix === '') {
    throw new PrefixMissingError();
  }

  return createConfig({
    repoRoot,
    dirs: dirs.map((d) => path.resolve(process.cwd(), d)),
    validBuildFileNames: buildFileNames,
    prefix,
    depMode: checkChoice(options.external ?? fileConfig.external, isDepMode, 'external'),
    protoMode: checkChoice(options.proto ?? fileConfig.proto, isProtoMode, 'proto'),
    structureMode: checkChoice(options.structure ?? fileConfig.structure, isStructureMode, 'structure'),
    buildTags: splitList(options.buildTags) ?? fileConfig.build_tags ?? [],
    knownImports: [...(fileConfig.known_imports ?? []), ...options.knownImport],
    shouldFix,
    language: fileConfig.language,
  });
}

class PrefixMissingError extends Error {
  constructor() {
    super('import path prefix is not set: use --prefix, "prefix" in rulegen.yaml, or a "# rulegen:prefix" directive in the root build file');
    this.name = 'PrefixMissingError';
  }
}

function reportWarnings(warnings: RuleGenWarning[]): void {
  for (const warning of warnings) {
    log.warn(`${warning.path ? `${warning.path}: ` : ''}${warning.message}`);
  }
}

function runCommand(dirs: string[], options: CliOptions, shouldFix: boolean): number {
  const cwd = process.cwd();

  if (options.quiet) {
    setVerbosity(Verbosity.Quiet);
  } else if ((options.verbose ?? 0) > 0) {
    setVerbosity(Verbosity.Verbose);
  } else {
    setVerbosity(Verbosity.Normal);
  }

  if (!isEmitMode(options.mode)) {
    return fail(RuleGenErrorCode.RULEGEN_CONFIG_ERROR, `Invalid mode: ${options.mode} (expected fix, print or diff)`);
  }
  const mode: EmitMode = options.mode;

  const repoRoot = options.repoRoot ? path.resolve(cwd, options.repoRoot) : findRepoRoot(cwd);
  if (!repoRoot) {
    return fail(
      RuleGenErrorCode.RULEGEN_REPO_ROOT_NOT_FOUND,
      'could not find WORKSPACE, WORKSPACE.bazel or MODULE.bazel; use --repo-root'
    );
  }

  let config: Config;
  try {
    const fileConfig = loadRuleGenConfig(cwd, repoRoot, options.config);
    config = buildConfig(dirs, options, repoRoot, fileConfig, shouldFix);
  } catch (error) {
    if (error instanceof PrefixMissingError) {
      return fail(RuleGenErrorCode.RULEGEN_PREFIX_MISSING, error.message);
    }
    return fail(RuleGenErrorCode.RULEGEN_CONFIG_ERROR, error instanceof Error ? error.message : String(error));
  }

  const result = run({
    config,
    mode,
    verbose: true,
    log: (message: string) => log.verbose(message),
    out: (text: string) => log.output(text),
  });

  if (!result.success) {
    return fail(result.error?.code ?? RuleGenErrorCode.RULEGEN_CONFIG_ERROR, result.error?.message ?? 'Unknown error');
  }

  reportWarnings(result.warnings);

  const stats = result.stats;
  if (stats && mode === 'fix') {
    log.verbose(`${stats.files_changed} build files updated (${stats.packages} packages, ${stats.directories} directories)`);
  }

  return 0;
}

function addCommonOptions(command: Command): Command {
  return command
    .argument('[dirs...]', 'Directories to update (default: repository root)')
    .option('--mode <mode>', 'Emission mode: fix, print or diff', 'fix')
    .option('--repo-root <path>', 'Repository root (default: nearest WORKSPACE or MODULE.bazel)')
    .option('--prefix <importpath>', 'Import path prefix of the repository')
    .option('--build-file-name <names>', 'Comma-separated build file names; the first is used for new files')
    .option('--build-tags <tags>', 'Comma-separated build tags considered true on every platform')
    .option('--external <mode>', 'External dependency mode: external or vendored')
    .option('--proto <mode>', 'Proto mode: default, disable or legacy')
    .option('--structure <mode>', 'Build file structure: hierarchical or flat')
    .option('--known-import <path>', 'Import path prefix of an external repository (repeatable)', (value: string, prev: string[]) => [...prev, value], [])
    .option('--config <path>', 'Override rulegen.yaml location')
    .option('-v, --verbose', 'Enable verbose logging', (_: unknown, prev: number) => prev + 1, 0)
    .option('-q, --quiet', 'Suppress non-essential output')
    .allowExcessArguments(false);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('rulegen')
    .description('Generate and update build files from Go sources')
    .version(VERSION, '-V, --version', 'Display version number');

  addCommonOptions(program.command('update', { isDefault: true }).description('Generate rules and merge them into existing build files'))
    .action((dirs: string[], opts: CliOptions) => {
      process.exit(runCommand(dirs, opts, false));
    });

  addCommonOptions(program.command('fix').description('Like update, also rewriting deprecated rule shapes'))
    .action((dirs: string[], opts: CliOptions) => {
      process.exit(runCommand(dirs, opts, true));
    });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exit(1);
  }
}

void main();
