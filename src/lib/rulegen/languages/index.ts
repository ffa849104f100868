/**
 * Source language plug-ins
 *
 * A plug-in classifies directory entries and extracts the metadata the
 * package builder needs from each file. The walker and builder only talk
 * to this interface.
 */

import type { FileInfo } from '../types.js';
import { ConfigError } from '../types.js';
import { goLanguage } from './go.js';

export interface SourceLanguage {
  readonly name: string;

  /** Files that declare a package (sources and schema files) */
  isSourceFile(name: string): boolean;

  /** Schema files whose checked-in generated companion may be skipped */
  isSchemaFile(name: string): boolean;

  /**
   * Read a source file
   *
   * @throws Error when the file cannot be read or its header cannot be parsed
   */
  fileInfo(filePath: string): FileInfo;

  /**
   * Describe a non-source file from its name and, when it exists, its
   * header. Used for static files and declared build outputs.
   */
  staticFileInfo(filePath: string, exists: boolean): FileInfo;

  /** Name of the generated companion of a schema file */
  generatedSchemaFile(schemaName: string): string;

  /** Imports provided by the toolchain that never need a dependency */
  isStandardImport(importPath: string): boolean;
}

const LANGUAGES: ReadonlyMap<string, SourceLanguage> = new Map([[goLanguage.name, goLanguage]]);

/**
 * Look up a plug-in by name
 *
 * @throws ConfigError for unknown languages
 */
export function getLanguage(name: string): SourceLanguage {
  const language = LANGUAGES.get(name);
  if (!language) {
    throw new ConfigError(`unsupported language: ${name} (supported: ${[...LANGUAGES.keys()].join(', ')})`);
  }
  return language;
}
