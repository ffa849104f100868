/**
 * Tests for walk.ts and package-builder.ts - directory traversal and package selection
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { walk, findGenFiles } from '../walk.js';
import { buildPackage, conflictMessage, defaultPackageName, importPathFor } from '../package-builder.js';
import { createConfig } from '../config.js';
import { getLanguage } from '../languages/index.js';
import { parseBuildFile } from '../build-file/parser.js';
import type { Config, Package, RuleGenWarning } from '../types.js';

interface Visit {
  rel: string;
  pkg: Package | null;
  isUpdateDir: boolean;
  config: Config;
}

describe('walk.ts', () => {
  let root: string;
  const language = getLanguage('go');

  function write(rel: string, content: string): void {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  function collect(c: Config): { visits: Visit[]; warnings: RuleGenWarning[] } {
    const visits: Visit[] = [];
    const warnings: RuleGenWarning[] = [];
    walk(
      c,
      (rel, config, pkg, _oldFile, isUpdateDir) => {
        visits.push({ rel, pkg, isUpdateDir, config });
      },
      { language, report: w => warnings.push(w) }
    );
    return { visits, warnings };
  }

  function find(visits: Visit[], rel: string): Visit {
    const visit = visits.find(v => v.rel === rel);
    if (!visit) throw new Error(`no visit for ${rel}`);
    return visit;
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'rulegen-walk-test-'));
    write('WORKSPACE', '');
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('visits directories children first', () => {
    write('lib/a.go', 'package lib\n');
    write('lib/testdata/input.txt', 'data');
    write('cmd/tool/main.go', 'package main\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(visits.map(v => v.rel)).toEqual(['cmd/tool', 'cmd', 'lib/testdata', 'lib', '']);
  });

  it('builds packages with tests, external tests and testdata', () => {
    write('lib/a.go', 'package lib\n\nimport "fmt"\n');
    write('lib/a_test.go', 'package lib\n\nimport "testing"\n');
    write('lib/x_test.go', 'package lib_test\n');
    write('lib/testdata/input.txt', 'data');
    const { visits, warnings } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    const pkg = find(visits, 'lib').pkg;
    expect(warnings).toEqual([]);
    expect(pkg?.name).toBe('lib');
    expect(pkg?.importPath).toBe('example.com/repo/lib');
    expect(pkg?.library.sources.generic).toEqual(['a.go']);
    expect(pkg?.library.imports.generic).toEqual(['fmt']);
    expect(pkg?.test.sources.generic).toEqual(['a_test.go']);
    expect(pkg?.xtest.sources.generic).toEqual(['x_test.go']);
    expect(pkg?.hasTestdata).toBe(true);
  });

  it('does not treat testdata with a package as test data', () => {
    write('lib/a.go', 'package lib\n');
    write('lib/testdata/fixture.go', 'package testdata\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(find(visits, 'lib').pkg?.hasTestdata).toBe(false);
  });

  it('skips hidden, underscore and vendor directories', () => {
    write('.hidden/h.go', 'package hidden\n');
    write('_skip/s.go', 'package skip\n');
    write('vendor/example.org/v/v.go', 'package v\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(visits.map(v => v.rel)).toEqual(['']);
  });

  it('walks vendor directories in vendored mode', () => {
    write('vendor/example.org/v/v.go', 'package v\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo', depMode: 'vendored' }));
    expect(find(visits, 'vendor/example.org/v').pkg?.importPath).toBe('example.org/v');
  });

  it('honors exclude directives', () => {
    write('BUILD.bazel', '# rulegen:exclude lib\n');
    write('lib/a.go', 'package lib\n');
    write('other/b.go', 'package other\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(visits.map(v => v.rel)).toEqual(['other', '']);
  });

  it('ignores documentation packages', () => {
    write('docs/doc.go', 'package documentation\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(find(visits, 'docs').pkg).toBeNull();
  });

  it('reports conflicting packages', () => {
    write('mixed/a.go', 'package alpha\n');
    write('mixed/b.go', 'package beta\n');
    const { visits, warnings } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(find(visits, 'mixed').pkg).toBeNull();
    expect(warnings).toEqual([
      {
        code: 'RULEGEN_MULTIPLE_PACKAGES',
        path: 'mixed',
        message: `found packages alpha (a.go) and beta (b.go) in ${path.join(root, 'mixed')}`,
      },
    ]);
  });

  it('prefers the package named after the directory', () => {
    write('mixed/a.go', 'package mixed\n');
    write('mixed/b.go', 'package beta\n');
    const { visits, warnings } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(find(visits, 'mixed').pkg?.library.sources.generic).toEqual(['a.go']);
    expect(warnings).toEqual([]);
  });

  it('reports directories with several build files', () => {
    write('two/BUILD', '');
    write('two/BUILD.bazel', '');
    write('two/a.go', 'package two\n');
    const { visits, warnings } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(find(visits, 'two').pkg).toBeNull();
    expect(warnings).toEqual([
      {
        code: 'RULEGEN_MULTIPLE_BUILD_FILES',
        path: 'two',
        message: 'multiple build files found in two: BUILD.bazel, BUILD',
      },
    ]);
  });

  it('reports malformed build files', () => {
    write('bad/BUILD.bazel', 'go_library(\n');
    write('bad/a.go', 'package bad\n');
    const { visits, warnings } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(find(visits, 'bad').pkg).toBeNull();
    expect(warnings.map(w => [w.code, w.path])).toEqual([['RULEGEN_MALFORMED_BUILD_FILE', 'bad/BUILD.bazel']]);
  });

  it('reports unreadable source files and keeps the rest', () => {
    write('lib/a.go', 'package lib\n');
    write('lib/broken.go', '// no package clause\n');
    const { visits, warnings } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(warnings).toEqual([{ code: 'RULEGEN_FILE_ERROR', path: 'lib/broken.go', message: 'missing package clause' }]);
    expect(find(visits, 'lib').pkg?.library.sources.generic).toEqual(['a.go', 'broken.go']);
  });

  it('drops checked-in generated proto code in default mode', () => {
    write('api/api.proto', 'syntax = "proto3";\npackage acme.api;\noption go_package = "example.com/repo/api";\n');
    write('api/api.pb.go', 'package api\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    const pkg = find(visits, 'api').pkg;
    expect(pkg?.name).toBe('api');
    expect(pkg?.proto.sources.generic).toEqual(['api.proto']);
    expect(pkg?.library.sources.generic).toEqual([]);
  });

  it('keeps generated proto code when protos are disabled', () => {
    write('api/api.proto', 'syntax = "proto3";\npackage acme.api;\n');
    write('api/api.pb.go', 'package api\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo', protoMode: 'disable' }));
    const pkg = find(visits, 'api').pkg;
    expect(pkg?.library.sources.generic).toEqual(['api.pb.go']);
    expect(pkg?.proto.sources.generic).toEqual([]);
  });

  it('infers legacy proto mode from existing loads', () => {
    write('api/BUILD.bazel', 'load("@io_bazel_rules_go//proto:go_proto_library.bzl", "go_proto_library")\n');
    write('api/api.proto', 'syntax = "proto3";\npackage api;\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo' }));
    expect(find(visits, 'api').config.protoMode).toBe('legacy');
  });

  it('only builds packages inside the requested directories', () => {
    write('lib/a.go', 'package lib\n');
    write('other/b.go', 'package other\n');
    const { visits } = collect(createConfig({ repoRoot: root, prefix: 'example.com/repo', dirs: ['lib'] }));
    expect(find(visits, 'lib').isUpdateDir).toBe(true);
    expect(find(visits, 'other')).toMatchObject({ isUpdateDir: false, pkg: null });
    expect(find(visits, '')).toMatchObject({ isUpdateDir: false, pkg: null });
  });
});

describe('package-builder.ts', () => {
  let root: string;
  const language = getLanguage('go');

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'rulegen-pkg-test-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('derives default package names', () => {
    const c = createConfig({ repoRoot: root, prefix: 'example.com/repo' });
    expect(defaultPackageName(c, 'a/b')).toBe('b');
    expect(defaultPackageName(c, '')).toBe('repo');
    expect(defaultPackageName(createConfig({ repoRoot: root }), '')).toBe('unnamed');
  });

  it('derives import paths', () => {
    const c = createConfig({ repoRoot: root, prefix: 'example.com/repo' });
    expect(importPathFor(c, '')).toBe('example.com/repo');
    expect(importPathFor(c, 'a/b')).toBe('example.com/repo/a/b');
    expect(importPathFor(c, 'vendor/x.org/y')).toBe('example.com/repo/vendor/x.org/y');
    const vendored = createConfig({ repoRoot: root, prefix: 'example.com/repo', depMode: 'vendored' });
    expect(importPathFor(vendored, 'third_party/vendor/x.org/y')).toBe('x.org/y');
  });

  it('joins conflicting package names', () => {
    expect(
      conflictMessage(
        [
          { name: 'c', file: 'c.go' },
          { name: 'a', file: 'a.go' },
          { name: 'b', file: 'b.go' },
        ],
        '/src/x'
      )
    ).toBe('found packages a (a.go), b (b.go) and c (c.go) in /src/x');
  });

  it('includes native sources only in cgo packages', () => {
    const c = createConfig({ repoRoot: root, prefix: 'example.com/repo' });
    fs.writeFileSync(path.join(root, 'native.go'), 'package native\n\nimport "C"\n');
    fs.writeFileSync(path.join(root, 'impl.c'), 'int x;\n');
    fs.writeFileSync(path.join(root, 'impl.h'), 'int x;\n');
    const pkg = buildPackage(
      c,
      language,
      { dir: root, rel: 'native', sourceFiles: ['native.go'], otherFiles: ['impl.c', 'impl.h', 'README.md'], genFiles: [], hasTestdata: false },
      () => {}
    );
    expect(pkg?.library.cgo).toBe(true);
    expect(pkg?.library.sources.generic).toEqual(['native.go', 'impl.c', 'impl.h']);
  });

  it('drops native sources without cgo', () => {
    const c = createConfig({ repoRoot: root, prefix: 'example.com/repo' });
    fs.writeFileSync(path.join(root, 'plain.go'), 'package plain\n');
    fs.writeFileSync(path.join(root, 'impl.c'), 'int x;\n');
    const pkg = buildPackage(
      c,
      language,
      { dir: root, rel: 'plain', sourceFiles: ['plain.go'], otherFiles: ['impl.c'], genFiles: [], hasTestdata: false },
      () => {}
    );
    expect(pkg?.library.sources.generic).toEqual(['plain.go']);
  });

  it('adds declared outputs of existing rules', () => {
    const c = createConfig({ repoRoot: root, prefix: 'example.com/repo' });
    fs.writeFileSync(path.join(root, 'a.go'), 'package gen\n');
    const oldFile = parseBuildFile(
      path.join(root, 'BUILD.bazel'),
      'genrule(name = "g", outs = ["gen.go", "skip.go"], cmd = "x")\n\ngenrule(name = "h", out = "gen_amd64.s")\n'
    );
    const genFiles = findGenFiles(oldFile, new Set(['skip.go']));
    expect(genFiles).toEqual(['gen.go', 'gen_amd64.s']);
    const pkg = buildPackage(
      c,
      language,
      { dir: root, rel: 'gen', sourceFiles: ['a.go'], otherFiles: [], genFiles, hasTestdata: false },
      () => {}
    );
    expect(pkg?.library.sources.generic).toEqual(['a.go', 'gen.go']);
    expect(pkg?.library.sources.arch.get('amd64')).toEqual(['gen_amd64.s']);
  });
});
