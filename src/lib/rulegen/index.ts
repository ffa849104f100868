/**
 * rulegen
 *
 * Main entry point for the build file generator library.
 */

// Runner
export { run, type RunOptions, type RunResult, type RunStats } from './runner.js';

// Configuration
export {
  createConfig,
  deriveConfig,
  parseDirectives,
  readPrefix,
  DEFAULT_BUILD_FILE_NAMES,
  type ConfigOptions,
} from './config.js';

// Components
export { walk, type WalkFunc, type WalkOptions } from './walk.js';
export { buildPackage, type DirectoryFiles } from './package-builder.js';
export { Labeler } from './labeler.js';
export { labelToString, parseLabel } from './label.js';
export { Resolver } from './resolve.js';
export {
  ExternalResolver,
  VendoredResolver,
  repoName,
  type ImportResolver,
  type RepoRootLookup,
} from './external-resolver.js';
export { Generator, type GeneratedRules } from './generator.js';
export { mergeWithExisting, mergeRule } from './merger.js';
export { emitFile, isEmitMode, type EmitMode } from './emit.js';
export { getLanguage, type SourceLanguage } from './languages/index.js';

// Build file model
export { parseBuildFile, BuildFileSyntaxError } from './build-file/parser.js';
export { formatBuildFile } from './build-file/printer.js';
export type { BuildFile } from './build-file/ast.js';

// Errors and types
export { ResolveError, StandardImportError } from './errors.js';
export * from './types.js';
