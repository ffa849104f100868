/**
 * .proto file metadata
 *
 * Extracts the package, `go_package` option, imports and whether the
 * file declares services. Comments are removed before matching.
 */

import type { FileInfo } from '../types.js';

/**
 * Remove `//` and `/* *\/` comments outside string literals
 */
export function stripComments(content: string): string {
  let out = '';
  let i = 0;
  while (i < content.length) {
    const ch = content[i];
    if (ch === '"' || ch === "'") {
      let j = i + 1;
      while (j < content.length && content[j] !== ch && content[j] !== '\n') {
        j += content[j] === '\\' ? 2 : 1;
      }
      out += content.slice(i, j + 1);
      i = j + 1;
      continue;
    }
    if (content.startsWith('//', i)) {
      const end = content.indexOf('\n', i);
      i = end < 0 ? content.length : end;
      continue;
    }
    if (content.startsWith('/*', i)) {
      const end = content.indexOf('*/', i + 2);
      const skipped = content.slice(i, end < 0 ? content.length : end + 2);
      out += '\n'.repeat(skipped.split('\n').length - 1);
      i = end < 0 ? content.length : end + 2;
      continue;
    }
    out += ch;
    i++;
  }
  return out;
}

function sanitize(name: string): string {
  return name.replace(/[-.]/g, '_');
}

/**
 * Go package name implied by a proto file: the name after `;` in
 * `go_package`, the last element of `go_package`, or the proto package
 * with dots replaced. Empty when none is declared.
 */
export function protoPackageName(goPackage: string, protoPackage: string): string {
  if (goPackage !== '') {
    const semi = goPackage.lastIndexOf(';');
    if (semi >= 0) return goPackage.slice(semi + 1);
    return sanitize(goPackage.slice(goPackage.lastIndexOf('/') + 1));
  }
  return protoPackage.replace(/\./g, '_');
}

/**
 * Parse proto file content into the fields of a FileInfo
 */
export function parseProto(
  content: string
): Pick<FileInfo, 'packageName' | 'importPath' | 'imports' | 'hasServices'> {
  const source = stripComments(content);
  const protoPackage = /^\s*package\s+([\w.]+)\s*;/m.exec(source)?.[1] ?? '';
  const goPackage = /^\s*option\s+go_package\s*=\s*"([^"]*)"\s*;/m.exec(source)?.[1] ?? '';

  const imports: string[] = [];
  for (const match of source.matchAll(/^\s*import\s+(?:public\s+|weak\s+)?"([^"]+)"\s*;/gm)) {
    imports.push(match[1]);
  }

  const semi = goPackage.lastIndexOf(';');
  return {
    packageName: protoPackageName(goPackage, protoPackage),
    importPath: semi >= 0 ? goPackage.slice(0, semi) : goPackage,
    imports: [...new Set(imports)].sort(),
    hasServices: /^\s*service\s+\w+\s*\{/m.test(source),
  };
}
