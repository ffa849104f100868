/**
 * Tests for languages/ - Go and proto file metadata
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { fileCategory, goFileInfo, goLanguage, parseCgoComments, parseGoHeader } from '../languages/go.js';
import { parseProto, protoPackageName, stripComments } from '../languages/proto.js';
import { getLanguage } from '../languages/index.js';
import { ConfigError } from '../types.js';

describe('languages/go.ts', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rulegen-lang-test-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('fileCategory', () => {
    it('classifies extensions', () => {
      expect(fileCategory('.go')).toBe('go');
      expect(fileCategory('.cc')).toBe('c');
      expect(fileCategory('.hpp')).toBe('h');
      expect(fileCategory('.s')).toBe('s');
      expect(fileCategory('.S')).toBe('cs');
      expect(fileCategory('.proto')).toBe('proto');
      expect(fileCategory('.md')).toBe('unsupported');
      expect(fileCategory('.toString')).toBe('unsupported');
    });
  });

  describe('parseGoHeader', () => {
    it('reads the package name and sorted imports', () => {
      const header = parseGoHeader(
        ['package widget', '', 'import (', '\t"os"', '\tf "fmt"', '\t"os"', ')', '', 'import "example.com/repo/lib"', '', 'func main() {}'].join('\n')
      );
      expect(header).toEqual({
        packageName: 'widget',
        imports: ['example.com/repo/lib', 'fmt', 'os'],
        isCgo: false,
        cgoComments: [],
      });
    });

    it('stops at the first declaration', () => {
      const header = parseGoHeader('package a\n\nvar x = 1\n\nimport "late"\n');
      expect(header.imports).toEqual([]);
    });

    it('collects the comment attached to import "C"', () => {
      const header = parseGoHeader(
        ['package native', '', '/*', '#cgo CFLAGS: -DFOO', '#include <stdio.h>', '*/', 'import "C"', ''].join('\n')
      );
      expect(header.isCgo).toBe(true);
      expect(header.imports).toEqual([]);
      expect(header.cgoComments).toContain('#cgo CFLAGS: -DFOO');
    });

    it('throws without a package clause', () => {
      expect(() => parseGoHeader('// just a comment\n')).toThrow('missing package clause');
    });
  });

  describe('parseCgoComments', () => {
    it('splits compile and link options', () => {
      const result = parseCgoComments(['#cgo CFLAGS: -DFOO -I.', '#cgo linux LDFLAGS: -lm', '#include <x.h>']);
      expect(result.copts).toEqual([{ constraint: null, options: ['-DFOO', '-I.'] }]);
      expect(result.clinkopts).toEqual([{ constraint: { kind: 'tag', tag: 'linux' }, options: ['-lm'] }]);
    });

    it('ignores pkg-config lines', () => {
      expect(parseCgoComments(['#cgo pkg-config: png'])).toEqual({ copts: [], clinkopts: [] });
    });
  });

  describe('goFileInfo', () => {
    it('recognizes external tests', () => {
      const file = path.join(tempDir, 'widget_test.go');
      fs.writeFileSync(file, 'package widget_test\n\nimport "testing"\n');
      const info = goFileInfo(file);
      expect(info.packageName).toBe('widget');
      expect(info.isTest).toBe(true);
      expect(info.isXTest).toBe(true);
      expect(info.imports).toEqual(['testing']);
    });

    it('reads constraints and platform suffixes', () => {
      const file = path.join(tempDir, 'poll_linux.go');
      fs.writeFileSync(file, '//go:build !appengine\n\npackage poll\n');
      const info = goFileInfo(file);
      expect(info.goos).toBe('linux');
      expect(info.constraint).toEqual({ kind: 'not', x: { kind: 'tag', tag: 'appengine' } });
      expect(info.isTest).toBe(false);
    });

    it('reads cgo options', () => {
      const file = path.join(tempDir, 'native.go');
      fs.writeFileSync(file, 'package native\n\n// #cgo LDFLAGS: -lz\nimport "C"\n');
      const info = goFileInfo(file);
      expect(info.isCgo).toBe(true);
      expect(info.clinkopts).toEqual([{ constraint: null, options: ['-lz'] }]);
    });
  });

  describe('goLanguage', () => {
    it('identifies standard library imports', () => {
      expect(goLanguage.isStandardImport('net/http')).toBe(true);
      expect(goLanguage.isStandardImport('github.com/acme/widget')).toBe(false);
    });

    it('names generated proto companions', () => {
      expect(goLanguage.generatedSchemaFile('service.proto')).toBe('service.pb.go');
    });

    it('reads constraints of native sources', () => {
      const file = path.join(tempDir, 'impl.c');
      fs.writeFileSync(file, '// +build linux\n\nint x;\n');
      const info = goLanguage.staticFileInfo(file, true);
      expect(info.category).toBe('c');
      expect(info.constraint).toEqual({ kind: 'tag', tag: 'linux' });
    });
  });
});

describe('languages/proto.ts', () => {
  describe('stripComments', () => {
    it('keeps comment markers inside strings', () => {
      expect(stripComments('a // x\nb "//c" /* y */ d')).toBe('a \nb "//c"  d');
    });
  });

  describe('protoPackageName', () => {
    it('prefers the explicit name after a semicolon', () => {
      expect(protoPackageName('example.com/repo/api;apipb', 'acme.api')).toBe('apipb');
    });

    it('uses the last go_package element', () => {
      expect(protoPackageName('example.com/repo/my-api.v1', '')).toBe('my_api_v1');
    });

    it('falls back to the proto package', () => {
      expect(protoPackageName('', 'acme.api.v1')).toBe('acme_api_v1');
    });
  });

  describe('parseProto', () => {
    it('extracts package, imports and services', () => {
      const parsed = parseProto(
        [
          'syntax = "proto3";',
          'package acme.api;',
          'option go_package = "example.com/repo/api;api";',
          'import "google/protobuf/any.proto";',
          '// import "commented/out.proto";',
          'import public "acme/common.proto";',
          'service Greeter {',
          '}',
        ].join('\n')
      );
      expect(parsed).toEqual({
        packageName: 'api',
        importPath: 'example.com/repo/api',
        imports: ['acme/common.proto', 'google/protobuf/any.proto'],
        hasServices: true,
      });
    });
  });
});

describe('languages/index.ts', () => {
  it('returns the Go plug-in', () => {
    expect(getLanguage('go')).toBe(goLanguage);
  });

  it('rejects unknown languages', () => {
    expect(() => getLanguage('cobol')).toThrow(ConfigError);
  });
});
