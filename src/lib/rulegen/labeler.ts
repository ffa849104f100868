/**
 * Labeler
 *
 * Conventional labels for the targets generated for a directory. In
 * hierarchical mode each directory has its own build file and fixed
 * target names; in flat mode every target lives in the root build file
 * and is named after its directory.
 */

import * as path from 'node:path';
import type { Config, Label } from './types.js';
import { label } from './label.js';

export const DEFAULT_LIBRARY_NAME = 'go_default_library';
export const DEFAULT_TEST_NAME = 'go_default_test';
export const DEFAULT_XTEST_NAME = 'go_default_xtest';
/** Legacy proto mode filegroup */
export const DEFAULT_PROTOS_NAME = 'go_default_library_protos';

export class Labeler {
  constructor(private readonly c: Pick<Config, 'structureMode' | 'prefix'>) {}

  private get flat(): boolean {
    return this.c.structureMode === 'flat';
  }

  /** Name used for the repository root */
  private rootName(): string {
    return this.c.prefix !== '' ? path.posix.basename(this.c.prefix) : 'root';
  }

  private flatName(rel: string): string {
    return rel === '' ? this.rootName() : rel;
  }

  libraryLabel(rel: string): Label {
    if (this.flat) return label('', this.flatName(rel));
    return label(rel, DEFAULT_LIBRARY_NAME);
  }

  binaryLabel(rel: string): Label {
    if (this.flat) return label('', `${this.flatName(rel)}_cmd`);
    return label(rel, rel === '' ? this.rootName() : path.posix.basename(rel));
  }

  testLabel(rel: string, isXTest: boolean): Label {
    if (this.flat) return label('', `${this.flatName(rel)}${isXTest ? '_xtest' : '_test'}`);
    return label(rel, isXTest ? DEFAULT_XTEST_NAME : DEFAULT_TEST_NAME);
  }

  protoLabel(rel: string, name: string): Label {
    if (this.flat) return label('', rel === '' ? `${name}_proto` : `${rel}/${name}_proto`);
    return label(rel, `${name}_proto`);
  }

  goProtoLabel(rel: string, name: string): Label {
    if (this.flat) return label('', rel === '' ? `${name}_go_proto` : `${rel}/${name}_go_proto`);
    return label(rel, `${name}_go_proto`);
  }

  /** Legacy filegroup of .proto sources */
  protosLabel(rel: string): Label {
    if (this.flat) return label('', `${this.flatName(rel)}_protos`);
    return label(rel, DEFAULT_PROTOS_NAME);
  }
}
