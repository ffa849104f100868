/**
 * Run configuration and build file directives
 *
 * Directives are read from build file comments of the form
 * `# rulegen:<key> <value>` and folded into a derived Config for the
 * directory. `exclude` and `ignore` only apply to the directory that
 * declares them and are not stored in the Config.
 */

import * as path from 'node:path';
import type { BuildFile } from './build-file/ast.js';
import { stringValue } from './build-file/ast.js';
import type { Config, DepMode, Directive, ProtoMode, Reporter, StructureMode } from './types.js';
import { ConfigError, RuleGenErrorCode } from './types.js';

export const DEFAULT_BUILD_FILE_NAMES = ['BUILD.bazel', 'BUILD'];

/** Tags every platform is assumed to satisfy */
export const DEFAULT_GENERIC_TAGS = ['gc', 'cgo'];

export const DIRECTIVE_PREFIX = 'rulegen:';

/** Load through which legacy proto rules were declared */
export const LEGACY_PROTO_LOAD = '@io_bazel_rules_go//proto:go_proto_library.bzl';

const KNOWN_DIRECTIVES = new Set(['build_file_name', 'build_tags', 'exclude', 'ignore', 'prefix', 'proto']);

const DEP_MODES: readonly DepMode[] = ['external', 'vendored'];
const STRUCTURE_MODES: readonly StructureMode[] = ['hierarchical', 'flat'];
const PROTO_MODES: readonly ProtoMode[] = ['default', 'disable', 'legacy'];

export function isDepMode(value: string): value is DepMode {
  return DEP_MODES.some(m => m === value);
}

export function isStructureMode(value: string): value is StructureMode {
  return STRUCTURE_MODES.some(m => m === value);
}

export function isProtoMode(value: string): value is ProtoMode {
  return PROTO_MODES.some(m => m === value);
}

/**
 * Options accepted by createConfig
 */
export interface ConfigOptions {
  repoRoot: string;
  dirs?: string[];
  validBuildFileNames?: string[];
  prefix?: string;
  depMode?: DepMode;
  structureMode?: StructureMode;
  protoMode?: ProtoMode;
  buildTags?: string[];
  knownImports?: string[];
  shouldFix?: boolean;
  language?: string;
}

/**
 * Parse user build tags. Negated tags are rejected.
 */
export function setBuildTags(tags: readonly string[]): Set<string> {
  const result = new Set<string>();
  for (const raw of tags) {
    const tag = raw.trim();
    if (tag === '') continue;
    if (tag.startsWith('!')) {
      throw new ConfigError(`build tags can't be negated: ${tag}`);
    }
    result.add(tag);
  }
  return result;
}

/**
 * Add the tags every build assumes
 */
export function preprocessTags(tags: Set<string>): Set<string> {
  for (const tag of DEFAULT_GENERIC_TAGS) {
    tags.add(tag);
  }
  return tags;
}

/**
 * Validate options and build the root Config
 *
 * @throws ConfigError for invalid names, modes or directories
 */
export function createConfig(options: ConfigOptions): Config {
  const repoRoot = path.resolve(options.repoRoot);
  const names = options.validBuildFileNames ?? DEFAULT_BUILD_FILE_NAMES;
  if (names.length === 0 || names.some(n => n.trim() === '' || n.includes('/'))) {
    throw new ConfigError(`invalid build file names: ${JSON.stringify(names)}`);
  }

  const dirs = (options.dirs && options.dirs.length > 0 ? options.dirs : [repoRoot]).map(d =>
    path.resolve(repoRoot, d)
  );
  for (const dir of dirs) {
    const rel = path.relative(repoRoot, dir);
    if (rel.startsWith('..') || path.isAbsolute(rel)) {
      throw new ConfigError(`directory ${dir} is not inside the repository root ${repoRoot}`);
    }
  }

  return Object.freeze({
    dirs,
    repoRoot,
    validBuildFileNames: [...names],
    prefix: options.prefix ?? '',
    depMode: options.depMode ?? 'external',
    structureMode: options.structureMode ?? 'hierarchical',
    protoMode: options.protoMode ?? 'default',
    protoModeExplicit: options.protoMode !== undefined,
    genericTags: preprocessTags(setBuildTags(options.buildTags ?? [])),
    knownImports: [...(options.knownImports ?? [])],
    shouldFix: options.shouldFix ?? false,
    language: options.language ?? 'go',
  });
}

/**
 * Return a new Config with some fields replaced
 */
export function deriveConfig(c: Config, changes: Partial<Config>): Config {
  return Object.freeze({ ...c, ...changes });
}

/**
 * Parse one comment line as a directive
 */
export function parseDirective(comment: string): Directive | null {
  const match = /^#\s*rulegen:(\w+)(?:\s+(.*))?$/.exec(comment.trim());
  if (!match) return null;
  return { key: match[1], value: (match[2] ?? '').trim() };
}

/**
 * Collect directives from all top-level comments of a build file
 */
export function parseDirectives(file: BuildFile): Directive[] {
  const directives: Directive[] = [];
  for (const stmt of file.statements) {
    for (const comment of [...stmt.comments.before, ...stmt.comments.suffix, ...stmt.comments.after]) {
      const directive = parseDirective(comment.text);
      if (directive) directives.push(directive);
    }
  }
  return directives;
}

/**
 * Fold inherited directives into a Config for the directory at `rel`
 */
export function applyDirectives(c: Config, directives: readonly Directive[], rel: string, report: Reporter): Config {
  const changes: { -readonly [K in keyof Config]?: Config[K] } = {};
  const where = rel === '' ? '.' : rel;

  for (const d of directives) {
    if (!KNOWN_DIRECTIVES.has(d.key)) {
      report({
        code: RuleGenErrorCode.RULEGEN_CONFIG_ERROR,
        path: where,
        message: `unknown directive: ${d.key}`,
      });
      continue;
    }

    switch (d.key) {
      case 'build_file_name': {
        const names = d.value.split(',').map(n => n.trim()).filter(n => n !== '');
        if (names.length > 0) changes.validBuildFileNames = names;
        break;
      }
      case 'build_tags':
        try {
          changes.genericTags = preprocessTags(setBuildTags(d.value.split(',')));
        } catch (error) {
          report({
            code: RuleGenErrorCode.RULEGEN_CONFIG_ERROR,
            path: where,
            message: error instanceof Error ? error.message : String(error),
          });
        }
        break;
      case 'proto':
        if (isProtoMode(d.value)) {
          changes.protoMode = d.value;
          changes.protoModeExplicit = true;
        } else {
          report({
            code: RuleGenErrorCode.RULEGEN_CONFIG_ERROR,
            path: where,
            message: `invalid proto mode: ${d.value}`,
          });
        }
        break;
      case 'prefix':
        if (rel === '') changes.prefix = d.value;
        break;
      default:
        // exclude and ignore are handled by the walker and merger
        break;
    }
  }

  return Object.keys(changes).length === 0 ? c : deriveConfig(c, changes);
}

/**
 * Switch to legacy proto mode when the file still loads the legacy rules
 */
export function inferProtoMode(c: Config, file: BuildFile | null): Config {
  if (c.protoModeExplicit || file === null) {
    return c;
  }
  for (const stmt of file.statements) {
    if (stmt.kind === 'call' && stmt.callee === 'load' && stringValue(stmt.args[0]) === LEGACY_PROTO_LOAD) {
      return deriveConfig(c, { protoMode: 'legacy' });
    }
  }
  return c;
}

/**
 * Read the import path prefix declared in a root build file, either by
 * directive or by a `go_prefix` rule
 */
export function readPrefix(file: BuildFile): string | null {
  for (const d of parseDirectives(file)) {
    if (d.key === 'prefix' && d.value !== '') return d.value;
  }
  for (const stmt of file.statements) {
    if (stmt.kind === 'call' && stmt.callee === 'go_prefix') {
      const value = stringValue(stmt.args[0]);
      if (value !== null) return value;
    }
  }
  return null;
}
