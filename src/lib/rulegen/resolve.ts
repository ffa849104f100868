/**
 * Resolver
 *
 * Rewrites the import placeholder attribute of generated rules into
 * `deps` labels. Go imports are resolved against the repository prefix,
 * relative paths, the toolchain's standard imports and finally the
 * external resolver. Proto imports map to the proto targets of their
 * directory or to the well-known types.
 */

import * as path from 'node:path';
import type { AssignExpr, CallExpr, Expr } from './build-file/ast.js';
import { assignExpr, listExpr, stringExpr } from './build-file/ast.js';
import type { Config, Label, Reporter } from './types.js';
import { RuleGenErrorCode } from './types.js';
import type { Labeler } from './labeler.js';
import type { SourceLanguage } from './languages/index.js';
import type { ImportResolver } from './external-resolver.js';
import { ResolveError, StandardImportError } from './errors.js';
import { label, labelToString, relativeTo } from './label.js';
import { defaultPackageName } from './package-builder.js';

function isRelativeImport(importPath: string): boolean {
  return importPath === '.' || importPath === '..' || importPath.startsWith('./') || importPath.startsWith('../');
}

/** Attribute holding raw imports until resolution */
export const IMPORTS_ATTR = '_rulegen_imports';

const WELL_KNOWN_PROTO = /^google\/protobuf\/(\w+)\.proto$/;

type ImportKind = 'go' | 'proto' | 'go_proto';

function importKindOf(ruleKind: string): ImportKind | null {
  switch (ruleKind) {
    case 'go_library':
    case 'go_binary':
    case 'go_test':
      return 'go';
    case 'proto_library':
      return 'proto';
    case 'go_proto_library':
    case 'go_grpc_library':
      return 'go_proto';
    default:
      return null;
  }
}

export class Resolver {
  /** Results for imports that do not depend on the importing package */
  private readonly labelCache = new Map<string, Label | Error>();

  constructor(
    private readonly c: Config,
    private readonly labeler: Labeler,
    private readonly language: SourceLanguage,
    private readonly external: ImportResolver
  ) {}

  /**
   * Resolve a Go import seen in the package at `fromRel`
   *
   * @throws ResolveError or StandardImportError
   */
  resolveGo(importPath: string, fromRel: string): Label {
    if (isRelativeImport(importPath)) {
      const rel = path.posix.normalize(path.posix.join(fromRel, importPath));
      if (rel === '..' || rel.startsWith('../')) {
        throw new ResolveError(importPath, `relative import escapes the repository root from "${fromRel}"`);
      }
      return this.labeler.libraryLabel(rel === '.' ? '' : rel);
    }
    return this.cached(`go:${importPath}`, () => this.resolveAbsoluteGo(importPath));
  }

  private resolveAbsoluteGo(importPath: string): Label {
    const prefix = this.c.prefix;
    if (prefix !== '' && importPath === prefix) {
      return this.labeler.libraryLabel('');
    }
    if (prefix !== '' && importPath.startsWith(prefix + '/')) {
      return this.labeler.libraryLabel(importPath.slice(prefix.length + 1));
    }
    if (this.language.isStandardImport(importPath)) {
      throw new StandardImportError(importPath);
    }
    return this.external.resolve(importPath);
  }

  /**
   * Resolve a proto import to a proto_library label, or to the compiled
   * library when `compiled` is set
   */
  resolveProto(importPath: string, compiled: boolean): Label {
    const kind = compiled ? 'go_proto' : 'proto';
    return this.cached(`${kind}:${importPath}`, () => {
      const wkt = WELL_KNOWN_PROTO.exec(importPath);
      if (wkt) {
        return compiled
          ? label('proto/wkt', `${wkt[1]}_go_proto`, 'io_bazel_rules_go')
          : label('', `${wkt[1]}_proto`, 'com_google_protobuf');
      }
      if (!importPath.endsWith('.proto')) {
        throw new ResolveError(importPath, 'not a .proto file');
      }
      const dir = path.posix.dirname(importPath);
      const rel = dir === '.' ? '' : dir;
      const name = defaultPackageName(this.c, rel);
      return compiled ? this.labeler.goProtoLabel(rel, name) : this.labeler.protoLabel(rel, name);
    });
  }

  private cached(key: string, resolve: () => Label): Label {
    let result = this.labelCache.get(key);
    if (result === undefined) {
      try {
        result = resolve();
      } catch (error) {
        if (!(error instanceof Error)) throw error;
        result = error;
      }
      this.labelCache.set(key, result);
    }
    if (result instanceof Error) throw result;
    return result;
  }

  /**
   * Replace the import placeholder of a rule with `deps`. Unresolvable
   * imports are reported and dropped; standard imports are dropped
   * silently.
   */
  resolveRule(rule: CallExpr, pkgRel: string, buildRel: string, report: Reporter): CallExpr {
    const placeholder = rule.args.find(
      (arg): arg is AssignExpr => arg.kind === 'assign' && arg.name === IMPORTS_ATTR
    );
    if (!placeholder) {
      return rule;
    }
    const args: Expr[] = rule.args.filter(arg => arg !== placeholder);
    const kind = importKindOf(rule.callee);

    const deps = new Set<string>();
    const imports = placeholder.value.kind === 'list' ? placeholder.value.items : [];
    for (const item of imports) {
      if (item.kind !== 'string' || kind === null) continue;
      try {
        const resolved =
          kind === 'go' ? this.resolveGo(item.value, pkgRel) : this.resolveProto(item.value, kind === 'go_proto');
        deps.add(labelToString(relativeTo(resolved, buildRel)));
      } catch (error) {
        if (error instanceof StandardImportError) continue;
        report({
          code: RuleGenErrorCode.RULEGEN_RESOLVE_ERROR,
          path: pkgRel === '' ? '.' : pkgRel,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    if (deps.size > 0) {
      args.push(assignExpr('deps', listExpr([...deps].sort().map(stringExpr))));
    }
    return { ...rule, args };
  }
}
