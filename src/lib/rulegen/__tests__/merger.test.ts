/**
 * Tests for merger.ts - reconciling generated rules with existing build files
 */

import { describe, it, expect } from 'vitest';
import { mergeList, mergeValue, mergeWithExisting } from '../merger.js';
import { createConfig } from '../config.js';
import { parseBuildFile } from '../build-file/parser.js';
import { formatBuildFile, printExpr } from '../build-file/printer.js';
import { listExpr, stringExpr } from '../build-file/ast.js';
import type { CallExpr, Expr } from '../build-file/ast.js';
import type { RuleGenWarning } from '../types.js';

const FILE_PATH = '/repo/lib/BUILD.bazel';

function parseRules(content: string): CallExpr[] {
  return parseBuildFile('/generated', content).statements.filter((s): s is CallExpr => s.kind === 'call');
}

function parseValue(content: string): Expr {
  const stmt = parseBuildFile('/value', `x = ${content}\n`).statements[0];
  if (stmt.kind !== 'assign') throw new Error('expected assignment');
  return stmt.value;
}

function merge(
  generated: string,
  empty: string,
  old: string | null,
  shouldFix = false
): { text: string | null; warnings: RuleGenWarning[] } {
  const warnings: RuleGenWarning[] = [];
  const c = createConfig({ repoRoot: '/repo', prefix: 'example.com/repo', shouldFix });
  const oldFile = old === null ? null : parseBuildFile(FILE_PATH, old);
  const merged = mergeWithExisting(parseRules(generated), parseRules(empty), oldFile, FILE_PATH, c, w => warnings.push(w));
  return { text: merged ? formatBuildFile(merged) : null, warnings };
}

function lines(...content: string[]): string {
  return content.join('\n') + '\n';
}

describe('merger.ts', () => {
  describe('mergeList', () => {
    it('keeps generated entries in their existing order and appends new ones', () => {
      const merged = mergeList(
        listExpr([stringExpr('c.go'), stringExpr('a.go')]),
        listExpr([stringExpr('a.go'), stringExpr('b.go')]),
        new Set()
      );
      expect(merged?.items.map(i => (i.kind === 'string' ? i.value : ''))).toEqual(['a.go', 'c.go']);
    });

    it('keeps pinned entries that are no longer generated', () => {
      const pinned = stringExpr('manual.go');
      const merged = mergeList(listExpr([]), listExpr([pinned, stringExpr('old.go')]), new Set([pinned]));
      expect(merged?.items).toEqual([pinned]);
    });

    it('returns null when nothing remains', () => {
      expect(mergeList(null, listExpr([stringExpr('old.go')]), new Set())).toBeNull();
    });
  });

  describe('mergeValue', () => {
    it('merges select() branches by key', () => {
      const old = parseValue(
        '["a.go"] + select({"@io_bazel_rules_go//go/platform:linux": ["a_linux.go", "gone_linux.go"], "@io_bazel_rules_go//go/platform:darwin": ["a_darwin.go"], "//conditions:default": []})'
      );
      const gen = parseValue(
        '["a.go"] + select({"@io_bazel_rules_go//go/platform:linux": ["a_linux.go"], "//conditions:default": []})'
      );
      const merged = mergeValue(gen, old, new Set());
      expect(merged && printExpr(merged)).toBe(
        [
          '["a.go"] + select({',
          '    "@io_bazel_rules_go//go/platform:linux": ["a_linux.go"],',
          '    "//conditions:default": [],',
          '})',
        ].join('\n')
      );
    });

    it('drops select() when no branch remains', () => {
      const old = parseValue('["a.go"] + select({"@io_bazel_rules_go//go/platform:linux": ["a_linux.go"], "//conditions:default": []})');
      const merged = mergeValue(parseValue('["a.go"]'), old, new Set());
      expect(merged && printExpr(merged)).toBe('["a.go"]');
    });

    it('replaces scalar values', () => {
      const merged = mergeValue(parseValue('"example.com/repo/new"'), parseValue('"example.com/repo/old"'), new Set());
      expect(merged && printExpr(merged)).toBe('"example.com/repo/new"');
    });
  });

  describe('mergeWithExisting', () => {
    it('creates a new file with loads', () => {
      const { text } = merge(
        lines(
          'go_library(name = "go_default_library", srcs = ["a.go"], importpath = "example.com/repo/lib", visibility = ["//visibility:public"], deps = ["//other:go_default_library"])',
          'go_test(name = "go_default_test", srcs = ["a_test.go"], embed = [":go_default_library"])'
        ),
        '',
        null
      );
      expect(text).toBe(
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library", "go_test")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          '    importpath = "example.com/repo/lib",',
          '    visibility = ["//visibility:public"],',
          '    deps = ["//other:go_default_library"],',
          ')',
          '',
          'go_test(',
          '    name = "go_default_test",',
          '    srcs = ["a_test.go"],',
          '    embed = [":go_default_library"],',
          ')'
        )
      );
    });

    it('returns null for a new file without rules', () => {
      expect(merge('', 'go_test(name = "go_default_test")\n', null).text).toBeNull();
    });

    it('merges lists and keeps unmanaged attributes and comments', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go", "b.go"], importpath = "example.com/repo/lib", visibility = ["//visibility:public"], deps = ["//other:go_default_library"])\n',
        '',
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
          '',
          '# The library.',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = [',
          '        "a.go",',
          '        "old.go",',
          '    ],',
          '    importpath = "example.com/repo/lib",',
          '    tags = ["manual"],',
          '    visibility = ["//visibility:public"],',
          '    deps = [',
          '        "//legacy:go_default_library",',
          '        "//extra:go_default_library",  # keep',
          '    ],',
          ')'
        )
      );
      expect(text).toBe(
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
          '',
          '# The library.',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = [',
          '        "a.go",',
          '        "b.go",',
          '    ],',
          '    importpath = "example.com/repo/lib",',
          '    tags = ["manual"],',
          '    visibility = ["//visibility:public"],',
          '    deps = [',
          '        "//extra:go_default_library",  # keep',
          '        "//other:go_default_library",',
          '    ],',
          ')'
        )
      );
    });

    it('leaves pinned rules unchanged', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"])\n',
        '',
        lines('go_library(', '    name = "go_default_library",', '    srcs = ["old.go"],', ')  # keep')
      );
      expect(text).toBe(
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["old.go"],',
          ')  # keep'
        )
      );
    });

    it('leaves pinned attributes unchanged', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"], importpath = "example.com/repo/lib")\n',
        '',
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          '    importpath = "example.com/custom",  # keep',
          ')'
        )
      );
      expect(text).toContain('    importpath = "example.com/custom",  # keep\n');
    });

    it('overwrites unpinned scalar attributes', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"], importpath = "example.com/repo/lib")\n',
        '',
        lines('go_library(', '    name = "go_default_library",', '    srcs = ["a.go"],', '    importpath = "example.com/custom",', ')')
      );
      expect(text).toContain('    importpath = "example.com/repo/lib",\n');
    });

    it('deletes rules that no longer have sources', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"])\n',
        'go_test(name = "go_default_test")\n',
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library", "go_test")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          ')',
          '',
          'go_test(',
          '    name = "go_default_test",',
          '    srcs = ["a_test.go"],',
          '    embed = [":go_default_library"],',
          ')'
        )
      );
      expect(text).toBe(
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          ')'
        )
      );
    });

    it('keeps the comments above a deleted rule', () => {
      const old = lines(
        'load("@io_bazel_rules_go//go:def.bzl", "go_library", "go_test")',
        '',
        'go_library(',
        '    name = "go_default_library",',
        '    srcs = ["a.go"],',
        ')',
        '',
        '# rulegen:exclude a_test.go',
        'go_test(',
        '    name = "go_default_test",',
        '    srcs = ["a_test.go"],',
        ')'
      );
      const generated = 'go_library(name = "go_default_library", srcs = ["a.go"])\n';
      const empty = 'go_test(name = "go_default_test")\n';
      const { text } = merge(generated, empty, old);
      expect(text).toBe(
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          ')',
          '',
          '# rulegen:exclude a_test.go'
        )
      );
      expect(merge(generated, empty, text).text).toBe(text);
    });

    it('keeps emptied rules with pinned sources', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"])\n',
        'go_test(name = "go_default_test")\n',
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library", "go_test")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          ')',
          '',
          'go_test(',
          '    name = "go_default_test",',
          '    srcs = ["manual_test.go"],  # keep',
          '    embed = [":go_default_library"],',
          ')'
        )
      );
      expect(text).toContain(lines('go_test(', '    name = "go_default_test",', '    srcs = ["manual_test.go"],  # keep', ')'));
      expect(text).toContain('"go_library", "go_test")');
    });

    it('appends generated rules without a counterpart', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"])\n',
        '',
        lines('exports_files(["LICENSE"])')
      );
      expect(text).toBe(
        lines(
          'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
          '',
          'exports_files(["LICENSE"])',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          ')'
        )
      );
    });

    it('does not touch files with the ignore directive', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"])\n',
        '',
        lines('# rulegen:ignore', '', 'go_library(name = "custom")')
      );
      expect(text).toBeNull();
    });

    it('does not load symbols provided by other files', () => {
      const { text } = merge(
        'go_library(name = "go_default_library", srcs = ["a.go"])\n',
        '',
        lines('load("//tools:defs.bzl", "go_library")')
      );
      expect(text).toBe(
        lines(
          'load("//tools:defs.bzl", "go_library")',
          '',
          'go_library(',
          '    name = "go_default_library",',
          '    srcs = ["a.go"],',
          ')'
        )
      );
    });

    it('is idempotent', () => {
      const generated = lines(
        'go_library(name = "go_default_library", srcs = ["b.go", "a.go"], importpath = "example.com/repo/lib", deps = ["@com_github_acme_widget//:go_default_library", "//other:go_default_library"])'
      );
      const first = merge(generated, '', null).text;
      expect(first).not.toBeNull();
      const second = merge(generated, '', first).text;
      expect(second).toBe(first);
    });

    describe('deprecated rules', () => {
      const old = lines(
        'load("@io_bazel_rules_go//go:def.bzl", "cgo_library", "go_library")',
        '',
        'cgo_library(',
        '    name = "cgo_default_library",',
        '    srcs = ["native.go"],',
        '    clinkopts = ["-lm"],',
        ')',
        '',
        'go_library(',
        '    name = "go_default_library",',
        '    srcs = ["pure.go"],',
        '    library = ":cgo_default_library",',
        ')'
      );
      const generated =
        'go_library(name = "go_default_library", srcs = ["native.go", "pure.go"], cgo = True, clinkopts = ["-lm"])\n';

      it('reports outdated rules outside fix mode', () => {
        const { warnings } = merge(generated, '', old);
        expect(warnings).toEqual([
          {
            code: 'RULEGEN_OUTDATED_RULES',
            path: 'lib/BUILD.bazel',
            message: "file contains rules whose structure is out of date. Consider running 'rulegen fix'.",
          },
        ]);
      });

      it('absorbs cgo_library into go_library in fix mode', () => {
        const { text, warnings } = merge(generated, '', old, true);
        expect(warnings).toEqual([]);
        expect(text).toBe(
          lines(
            'load("@io_bazel_rules_go//go:def.bzl", "go_library")',
            '',
            'go_library(',
            '    name = "go_default_library",',
            '    srcs = [',
            '        "native.go",',
            '        "pure.go",',
            '    ],',
            '    clinkopts = ["-lm"],',
            '    cgo = True,',
            ')'
          )
        );
      });
    });
  });
});
