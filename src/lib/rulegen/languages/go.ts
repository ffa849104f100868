/**
 * Go source metadata extraction
 *
 * Reads only the file header: build constraints, the package clause and
 * import declarations, plus `#cgo` options from the comment attached to
 * `import "C"`. Nothing past the last import is inspected.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileCategory, FileInfo, TaggedOptions } from '../types.js';
import { fileNamePlatform, parsePlusBuild, readConstraint } from '../constraints.js';
import type { SourceLanguage } from './index.js';
import { parseProto } from './proto.js';

const CATEGORIES: Record<string, FileCategory> = {
  '.go': 'go',
  '.c': 'c',
  '.cc': 'c',
  '.cpp': 'c',
  '.cxx': 'c',
  '.h': 'h',
  '.hh': 'h',
  '.hpp': 'h',
  '.hxx': 'h',
  '.s': 's',
  '.S': 'cs',
  '.proto': 'proto',
};

export function fileCategory(ext: string): FileCategory {
  return Object.hasOwn(CATEGORIES, ext) ? CATEGORIES[ext] : 'unsupported';
}

interface GoToken {
  kind: 'ident' | 'string' | 'punct';
  value: string;
  /** Comments between the previous token and this one */
  comments: string[];
}

/**
 * Tokenize enough of a Go file to read its package clause and imports
 */
function tokenizeHeader(content: string): GoToken[] {
  const tokens: GoToken[] = [];
  let comments: string[] = [];
  let i = 0;

  while (i < content.length) {
    const ch = content[i];
    if (/\s/.test(ch) || ch === ';') {
      // A blank line detaches comments from the next declaration
      if (ch === '\n' && content[i + 1] === '\n') comments = [];
      i++;
      continue;
    }
    if (content.startsWith('//', i)) {
      const end = content.indexOf('\n', i);
      const stop = end < 0 ? content.length : end;
      comments.push(content.slice(i + 2, stop));
      i = stop;
      continue;
    }
    if (content.startsWith('/*', i)) {
      const end = content.indexOf('*/', i + 2);
      if (end < 0) throw new Error('unterminated comment');
      comments.push(...content.slice(i + 2, end).split('\n'));
      i = end + 2;
      continue;
    }
    if (ch === '"') {
      let j = i + 1;
      let value = '';
      while (j < content.length && content[j] !== '"') {
        if (content[j] === '\n') throw new Error('newline in string');
        if (content[j] === '\\') {
          value += content[j + 1] ?? '';
          j += 2;
          continue;
        }
        value += content[j];
        j++;
      }
      if (j >= content.length) throw new Error('unterminated string');
      tokens.push({ kind: 'string', value, comments });
      comments = [];
      i = j + 1;
      continue;
    }
    if (ch === '`') {
      const end = content.indexOf('`', i + 1);
      if (end < 0) throw new Error('unterminated raw string');
      tokens.push({ kind: 'string', value: content.slice(i + 1, end), comments });
      comments = [];
      i = end + 1;
      continue;
    }
    const word = /^[\p{L}_][\p{L}\p{N}_]*/u.exec(content.slice(i, i + 256));
    if (word) {
      tokens.push({ kind: 'ident', value: word[0], comments });
      comments = [];
      i += word[0].length;
      // Declarations after the imports end the header
      if (word[0] === 'func' || word[0] === 'type' || word[0] === 'var' || word[0] === 'const') break;
      continue;
    }
    tokens.push({ kind: 'punct', value: ch, comments });
    comments = [];
    i++;
  }

  return tokens;
}

/**
 * Parse `#cgo [constraints] FLAGS: options` lines
 */
export function parseCgoComments(lines: readonly string[]): { copts: TaggedOptions[]; clinkopts: TaggedOptions[] } {
  const copts: TaggedOptions[] = [];
  const clinkopts: TaggedOptions[] = [];

  for (const raw of lines) {
    const match = /^#cgo\s+(.*?)\s*\b(CFLAGS|CPPFLAGS|CXXFLAGS|LDFLAGS|FFLAGS|pkg-config)\s*:\s*(.*)$/.exec(raw.trim());
    if (!match) continue;
    const [, constraintText, verb, optionText] = match;
    const options = optionText.split(/\s+/).filter(o => o !== '');
    if (options.length === 0) continue;
    const entry: TaggedOptions = {
      constraint: constraintText === '' ? null : parsePlusBuild(constraintText),
      options,
    };
    if (verb === 'LDFLAGS') {
      clinkopts.push(entry);
    } else if (verb === 'CFLAGS' || verb === 'CPPFLAGS' || verb === 'CXXFLAGS') {
      copts.push(entry);
    }
  }

  return { copts, clinkopts };
}

/**
 * Parse the package clause and imports of Go source
 */
export function parseGoHeader(content: string): {
  packageName: string;
  imports: string[];
  isCgo: boolean;
  cgoComments: string[];
} {
  const tokens = tokenizeHeader(content);
  let pos = 0;
  const peek = (): GoToken | undefined => tokens[pos];

  const pkgKeyword = tokens[pos++];
  const pkgName = tokens[pos++];
  if (pkgKeyword?.value !== 'package' || pkgName?.kind !== 'ident') {
    throw new Error('missing package clause');
  }

  const imports: string[] = [];
  const cgoComments: string[] = [];
  let isCgo = false;

  const readSpec = (doc: string[]): void => {
    let tok = peek();
    if (tok !== undefined && (tok.kind === 'ident' || tok.value === '.')) {
      pos++;
      tok = peek();
    }
    if (tok === undefined || tok.kind !== 'string') {
      throw new Error('expected import path');
    }
    pos++;
    if (tok.value === 'C') {
      isCgo = true;
      cgoComments.push(...doc, ...tok.comments);
      return;
    }
    imports.push(tok.value);
  };

  while (peek()?.value === 'import') {
    const importTok = tokens[pos++];
    if (peek()?.value === '(') {
      pos++;
      while (peek() !== undefined && peek()?.value !== ')') {
        const specStart = peek();
        readSpec(specStart?.comments ?? []);
      }
      if (peek()?.value !== ')') throw new Error('unterminated import block');
      pos++;
    } else {
      readSpec(importTok.comments);
    }
  }

  return {
    packageName: pkgName.value,
    imports: [...new Set(imports)].sort(),
    isCgo,
    cgoComments,
  };
}

function baseInfo(filePath: string): FileInfo {
  const name = path.basename(filePath);
  const ext = path.extname(name);
  const { goos, goarch } = fileNamePlatform(name);
  return {
    path: filePath,
    name,
    ext,
    category: fileCategory(ext),
    packageName: '',
    importPath: '',
    imports: [],
    isTest: false,
    isXTest: false,
    isCgo: false,
    copts: [],
    clinkopts: [],
    goos,
    goarch,
    constraint: null,
    hasServices: false,
  };
}

/**
 * Read metadata from a .go file
 */
export function goFileInfo(filePath: string): FileInfo {
  const info = baseInfo(filePath);
  const content = fs.readFileSync(filePath, 'utf-8');
  const header = parseGoHeader(content);
  const isTest = info.name.endsWith('_test.go');
  const isXTest = isTest && header.packageName.endsWith('_test');
  const cgo = parseCgoComments(header.cgoComments);

  return {
    ...info,
    packageName: isXTest ? header.packageName.slice(0, -'_test'.length) : header.packageName,
    imports: header.imports,
    isTest,
    isXTest,
    isCgo: header.isCgo,
    copts: cgo.copts,
    clinkopts: cgo.clinkopts,
    constraint: readConstraint(content),
  };
}

/**
 * Read metadata from a .proto file
 */
export function protoFileInfo(filePath: string): FileInfo {
  const info = baseInfo(filePath);
  const parsed = parseProto(fs.readFileSync(filePath, 'utf-8'));
  return { ...info, ...parsed };
}

export const goLanguage: SourceLanguage = {
  name: 'go',

  isSourceFile(name) {
    const ext = path.extname(name);
    return ext === '.go' || ext === '.proto';
  },

  isSchemaFile(name) {
    return path.extname(name) === '.proto';
  },

  fileInfo(filePath) {
    return path.extname(filePath) === '.proto' ? protoFileInfo(filePath) : goFileInfo(filePath);
  },

  staticFileInfo(filePath, exists) {
    const info = baseInfo(filePath);
    const readsHeader = info.category === 'c' || info.category === 'h' || info.category === 's' || info.category === 'cs';
    return {
      ...info,
      isTest: info.category === 'go' && info.name.endsWith('_test.go'),
      constraint: exists && readsHeader ? readConstraint(fs.readFileSync(filePath, 'utf-8')) : null,
    };
  },

  generatedSchemaFile(schemaName) {
    return `${schemaName.slice(0, -path.extname(schemaName).length)}.pb.go`;
  },

  isStandardImport(importPath) {
    return !importPath.split('/')[0].includes('.');
  },
};
