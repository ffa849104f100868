/**
 * rulegen Type Definitions
 *
 * Shared types for the build file generator: configuration, package
 * descriptors, labels, directives and run reporting.
 */

import type { BuildFile, CallExpr } from './build-file/ast.js';

/**
 * How imports outside the repository are resolved
 */
export type DepMode = 'external' | 'vendored';

/**
 * Where rules for a package are written
 */
export type StructureMode = 'hierarchical' | 'flat';

/**
 * How .proto files are handled
 */
export type ProtoMode = 'default' | 'disable' | 'legacy';

/**
 * Directory-scoped configuration.
 *
 * Values are frozen; per-directory changes produce a new object.
 */
export interface Config {
  /** Absolute directories to update */
  readonly dirs: readonly string[];
  /** Absolute repository root */
  readonly repoRoot: string;
  /** Recognized build file names; the first is used for new files */
  readonly validBuildFileNames: readonly string[];
  /** Import path prefix of the repository root (may be empty) */
  readonly prefix: string;
  readonly depMode: DepMode;
  readonly structureMode: StructureMode;
  readonly protoMode: ProtoMode;
  /** Set when a proto mode was chosen explicitly and must not be inferred */
  readonly protoModeExplicit: boolean;
  /** Build tags considered true on every platform */
  readonly genericTags: ReadonlySet<string>;
  /** Import path prefixes known to be external repository roots */
  readonly knownImports: readonly string[];
  /** Apply destructive fixes for deprecated rule shapes */
  readonly shouldFix: boolean;
  /** Source language plug-in name */
  readonly language: string;
}

/**
 * Strings (sources, imports, options) split by the platforms they apply to.
 * Map keys are OS names, architecture names, or `os_arch` pairs.
 */
export interface PlatformStrings {
  generic: string[];
  os: Map<string, string[]>;
  arch: Map<string, string[]>;
  platform: Map<string, string[]>;
}

/**
 * A compiled target (library, test or external test)
 */
export interface GoTarget {
  sources: PlatformStrings;
  imports: PlatformStrings;
  copts: PlatformStrings;
  clinkopts: PlatformStrings;
  cgo: boolean;
}

/**
 * Proto sources of a package
 */
export interface ProtoTarget {
  sources: PlatformStrings;
  imports: PlatformStrings;
  hasServices: boolean;
}

/**
 * One buildable unit in a directory
 */
export interface Package {
  /** Declared package name */
  name: string;
  /** Absolute directory */
  dir: string;
  /** Slash-separated path relative to the repository root ("" for the root) */
  rel: string;
  importPath: string;
  /** Library sources; for `main` packages these are embedded by the binary */
  library: GoTarget;
  test: GoTarget;
  xtest: GoTarget;
  proto: ProtoTarget;
  hasTestdata: boolean;
}

/**
 * Source file classification
 */
export type FileCategory =
  | 'go'
  | 'c'
  | 'h'
  | 's'
  | 'cs'
  | 'proto'
  | 'unsupported';

/**
 * Boolean build constraint expression
 */
export type Constraint =
  | { kind: 'tag'; tag: string }
  | { kind: 'not'; x: Constraint }
  | { kind: 'and'; x: Constraint; y: Constraint }
  | { kind: 'or'; x: Constraint; y: Constraint };

/**
 * Options from a `#cgo` line, with the constraint written on that line
 */
export interface TaggedOptions {
  constraint: Constraint | null;
  options: string[];
}

/**
 * Metadata extracted from one source file
 */
export interface FileInfo {
  /** Absolute path */
  path: string;
  /** Base name */
  name: string;
  /** Extension including the dot */
  ext: string;
  category: FileCategory;
  /** Declared package name; empty when unknown */
  packageName: string;
  /** Explicit import path of the package (proto `go_package`) */
  importPath: string;
  imports: string[];
  isTest: boolean;
  isXTest: boolean;
  isCgo: boolean;
  copts: TaggedOptions[];
  clinkopts: TaggedOptions[];
  /** OS from the file name suffix */
  goos: string;
  /** Architecture from the file name suffix */
  goarch: string;
  /** Build constraint from the file header */
  constraint: Constraint | null;
  hasServices: boolean;
}

/**
 * Build graph address
 */
export interface Label {
  repo: string;
  pkg: string;
  name: string;
  relative: boolean;
}

/**
 * Key/value pair parsed from a `# rulegen:<key> <value>` comment
 */
export interface Directive {
  key: string;
  value: string;
}

/**
 * Per-directory result of the generation phase
 */
export interface VisitRecord {
  /** Package directory, relative to the repository root */
  pkgRel: string;
  /** Directory of the build file holding the rules; "" in flat mode */
  buildRel: string;
  rules: CallExpr[];
  empty: CallExpr[];
  oldFile: BuildFile | null;
  config: Config;
}

/**
 * rulegen error codes
 */
export const RuleGenErrorCode = {
  RULEGEN_CONFIG_ERROR: 'RULEGEN_CONFIG_ERROR',
  RULEGEN_REPO_ROOT_NOT_FOUND: 'RULEGEN_REPO_ROOT_NOT_FOUND',
  RULEGEN_PREFIX_MISSING: 'RULEGEN_PREFIX_MISSING',
  RULEGEN_READ_ERROR: 'RULEGEN_READ_ERROR',
  RULEGEN_MULTIPLE_BUILD_FILES: 'RULEGEN_MULTIPLE_BUILD_FILES',
  RULEGEN_MALFORMED_BUILD_FILE: 'RULEGEN_MALFORMED_BUILD_FILE',
  RULEGEN_MULTIPLE_PACKAGES: 'RULEGEN_MULTIPLE_PACKAGES',
  RULEGEN_FILE_ERROR: 'RULEGEN_FILE_ERROR',
  RULEGEN_RESOLVE_ERROR: 'RULEGEN_RESOLVE_ERROR',
  RULEGEN_OUTDATED_RULES: 'RULEGEN_OUTDATED_RULES',
  RULEGEN_WRITE_ERROR: 'RULEGEN_WRITE_ERROR',
} as const;

export type RuleGenErrorCode = (typeof RuleGenErrorCode)[keyof typeof RuleGenErrorCode];

/**
 * Recoverable problem found during a run
 */
export interface RuleGenWarning {
  code: RuleGenErrorCode;
  /** Path relative to the repository root, when the problem is tied to one */
  path?: string;
  message: string;
}

/**
 * Sink for warnings
 */
export type Reporter = (warning: RuleGenWarning) => void;

/**
 * Error thrown for invalid configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
