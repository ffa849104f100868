/**
 * Tests for sort-labels.ts and fix.ts - canonical ordering and load maintenance
 */

import { describe, it, expect } from 'vitest';
import { compareLabels, rewriteArgs, sortLabels } from '../sort-labels.js';
import { fixFileMinor, fixLoads, isOutdated } from '../fix.js';
import { createConfig } from '../config.js';
import { parseBuildFile } from '../build-file/parser.js';
import { formatBuildFile } from '../build-file/printer.js';
import type { BuildFile } from '../build-file/ast.js';

function apply(content: string, transform: (file: BuildFile) => BuildFile): string {
  return formatBuildFile(transform(parseBuildFile('/repo/BUILD.bazel', content)));
}

describe('sort-labels.ts', () => {
  describe('compareLabels', () => {
    it('orders plain names, relative, local and external labels', () => {
      const values = ['@acme//x', '//b:c', ':d', 'e.go'];
      expect([...values].sort(compareLabels)).toEqual(['e.go', ':d', '//b:c', '@acme//x']);
    });

    it('compares package before name', () => {
      expect(['//a/b:x', '//a:y'].sort(compareLabels)).toEqual(['//a:y', '//a/b:x']);
    });
  });

  describe('sortLabels', () => {
    it('sorts dependency lists', () => {
      expect(apply('go_library(name = "x", deps = ["@z//:a", "//b:b", ":c"])\n', sortLabels)).toBe(
        ['go_library(', '    name = "x",', '    deps = [', '        ":c",', '        "//b:b",', '        "@z//:a",', '    ],', ')', ''].join('\n')
      );
    });

    it('leaves pinned attributes and other attributes alone', () => {
      const content = [
        'go_library(',
        '    name = "x",',
        '    srcs = [',
        '        "b.go",',
        '        "a.go",',
        '    ],  # keep',
        '    tags = [',
        '        "z",',
        '        "a",',
        '    ],',
        ')',
        '',
      ].join('\n');
      expect(apply(content, sortLabels)).toBe(content);
    });
  });

  describe('rewriteArgs', () => {
    it('orders arguments by priority', () => {
      expect(apply('go_test(deps = [":a"], tags = ["t"], srcs = ["a_test.go"], size = "small", name = "x")\n', rewriteArgs)).toBe(
        [
          'go_test(',
          '    name = "x",',
          '    size = "small",',
          '    srcs = ["a_test.go"],',
          '    tags = ["t"],',
          '    deps = [":a"],',
          ')',
          '',
        ].join('\n')
      );
    });

    it('does not reorder load statements', () => {
      const content = 'load("//a:b.bzl", "y", "x")\n';
      expect(apply(content, rewriteArgs)).toBe(content);
    });
  });
});

describe('fix.ts', () => {
  it('turns library into embed', () => {
    expect(apply('go_test(name = "x", srcs = ["a_test.go"], library = ":go_default_library")\n', fixFileMinor)).toBe(
      [
        'go_test(',
        '    name = "x",',
        '    srcs = ["a_test.go"],',
        '    embed = [":go_default_library"],',
        ')',
        '',
      ].join('\n')
    );
  });

  it('does not duplicate an existing embed entry', () => {
    expect(
      apply('go_test(name = "x", embed = [":go_default_library"], library = ":go_default_library")\n', fixFileMinor)
    ).toBe(['go_test(', '    name = "x",', '    embed = [":go_default_library"],', ')', ''].join('\n'));
  });

  it('detects legacy proto rules outside legacy mode', () => {
    const file = parseBuildFile('/repo/BUILD.bazel', 'filegroup(name = "go_default_library_protos", srcs = ["a.proto"])\n');
    expect(isOutdated(createConfig({ repoRoot: '/repo' }), file)).toBe(true);
    expect(isOutdated(createConfig({ repoRoot: '/repo', protoMode: 'legacy' }), file)).toBe(false);
  });

  describe('fixLoads', () => {
    it('removes loads that are no longer used', () => {
      expect(apply('load("@io_bazel_rules_go//go:def.bzl", "go_library")\n\nexports_files(["a"])\n', fixLoads)).toBe(
        'exports_files(["a"])\n'
      );
    });

    it('keeps symbols loaded for other purposes', () => {
      expect(
        apply('load("@io_bazel_rules_go//go:def.bzl", "go_context", "go_library")\n\ngo_test(name = "x")\n', fixLoads)
      ).toBe('load("@io_bazel_rules_go//go:def.bzl", "go_context", "go_test")\n\ngo_test(name = "x")\n');
    });

    it('inserts new loads after leading comments and existing loads', () => {
      expect(
        apply('# Copyright\n\nload("//tools:x.bzl", "x")\n\ngo_proto_library(name = "p")\n', fixLoads)
      ).toBe(
        [
          '# Copyright',
          '',
          'load("//tools:x.bzl", "x")',
          '',
          'load("@io_bazel_rules_go//proto:def.bzl", "go_proto_library")',
          '',
          'go_proto_library(name = "p")',
          '',
        ].join('\n')
      );
    });
  });
});
