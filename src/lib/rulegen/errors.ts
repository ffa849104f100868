/**
 * Import resolution errors
 */

/**
 * An import could not be mapped to a label
 */
export class ResolveError extends Error {
  readonly importPath: string;

  constructor(importPath: string, message: string) {
    super(`${importPath}: ${message}`);
    this.name = 'ResolveError';
    this.importPath = importPath;
  }
}

/**
 * The import is provided by the toolchain and needs no dependency
 */
export class StandardImportError extends Error {
  readonly importPath: string;

  constructor(importPath: string) {
    super(`${importPath} is a standard import`);
    this.name = 'StandardImportError';
    this.importPath = importPath;
  }
}
