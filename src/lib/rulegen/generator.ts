/**
 * Rule generator
 *
 * Converts a Package into rule calls, plus bare "empty" rules naming the
 * targets that no longer have sources and may be deleted by the merger.
 */

import * as path from 'node:path';
import type { BuildFile, CallExpr, Expr, KeyValueExpr } from './build-file/ast.js';
import {
  assignExpr,
  binaryExpr,
  callExpr,
  dictExpr,
  identExpr,
  keyValueExpr,
  listExpr,
  stringExpr,
} from './build-file/ast.js';
import type { Config, GoTarget, Label, Package, PlatformStrings } from './types.js';
import type { Labeler } from './labeler.js';
import { labelToString, relativeTo } from './label.js';
import { flattenPlatformStrings, isCommand, isEmptyPlatformStrings } from './package.js';
import { IMPORTS_ATTR } from './resolve.js';

/** Prefix of the config_setting labels used as select() keys */
export const PLATFORM_LABEL_PREFIX = '@io_bazel_rules_go//go/platform:';

const DEFAULT_CONDITION = '//conditions:default';
const PUBLIC_VISIBILITY = '//visibility:public';
const PRIVATE_VISIBILITY = '//visibility:private';

export interface GeneratedRules {
  rules: CallExpr[];
  empty: CallExpr[];
}

function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

function stringList(values: readonly string[]): Expr {
  return listExpr(values.map(stringExpr));
}

function hasDefaultVisibility(file: BuildFile | null): boolean {
  if (!file) return false;
  return file.statements.some(
    stmt =>
      stmt.kind === 'call' &&
      stmt.callee === 'package' &&
      stmt.args.some(arg => arg.kind === 'assign' && arg.name === 'default_visibility')
  );
}

/**
 * Visibility for the package at `rel`: packages below an `internal`
 * directory are visible to the subtree of its parent
 */
export function visibilityFor(rel: string): string {
  const parts = rel.split('/');
  const internal = parts.lastIndexOf('internal');
  if (internal < 0) return PUBLIC_VISIBILITY;
  return `//${parts.slice(0, internal).join('/')}:__subpackages__`;
}

export class Generator {
  private readonly omitVisibility: boolean;

  constructor(
    private readonly c: Config,
    private readonly labeler: Labeler,
    oldFile: BuildFile | null
  ) {
    this.omitVisibility = hasDefaultVisibility(oldFile);
  }

  /**
   * Generate rules for a package whose build file lives at `buildRel`
   */
  generate(pkg: Package, buildRel: string): GeneratedRules {
    const out: GeneratedRules = { rules: [], empty: [] };
    const add = (kind: string, name: string, rule: CallExpr | null): void => {
      if (rule) {
        out.rules.push(rule);
      } else {
        out.empty.push(callExpr(kind, [assignExpr('name', stringExpr(name))]));
      }
    };

    const hasProtos = !isEmptyPlatformStrings(pkg.proto.sources);
    const protosLabel = this.labeler.protosLabel(pkg.rel);
    const protoLabel = this.labeler.protoLabel(pkg.rel, pkg.name);
    const goProtoLabel = this.labeler.goProtoLabel(pkg.rel, pkg.name);
    let embedsGoProto = false;

    switch (this.c.protoMode) {
      case 'legacy':
        add('filegroup', protosLabel.name, hasProtos ? this.protosFilegroup(pkg, protosLabel, buildRel) : null);
        break;
      case 'default':
        add('filegroup', protosLabel.name, null);
        add('proto_library', protoLabel.name, hasProtos ? this.protoLibrary(pkg, protoLabel, buildRel) : null);
        if (hasProtos) {
          const kind = pkg.proto.hasServices ? 'go_grpc_library' : 'go_proto_library';
          out.rules.push(this.goProtoLibrary(kind, pkg, goProtoLabel, protoLabel, buildRel));
          add(pkg.proto.hasServices ? 'go_proto_library' : 'go_grpc_library', goProtoLabel.name, null);
          embedsGoProto = true;
        } else {
          add('go_proto_library', goProtoLabel.name, null);
          add('go_grpc_library', goProtoLabel.name, null);
        }
        break;
      case 'disable':
        break;
    }

    const libLabel = this.labeler.libraryLabel(pkg.rel);
    const library = this.goLibrary(pkg, libLabel, embedsGoProto ? goProtoLabel : null, buildRel);
    add('go_library', libLabel.name, library);

    const binLabel = this.labeler.binaryLabel(pkg.rel);
    add('go_binary', binLabel.name, library && isCommand(pkg) ? this.goBinary(pkg, binLabel, libLabel, buildRel) : null);

    const testLabel = this.labeler.testLabel(pkg.rel, false);
    add('go_test', testLabel.name, this.goTest(pkg, pkg.test, testLabel, library ? libLabel : null, buildRel));

    const xtestLabel = this.labeler.testLabel(pkg.rel, true);
    add('go_test', xtestLabel.name, this.goTest(pkg, pkg.xtest, xtestLabel, null, buildRel));

    return out;
  }

  /** Render a label as seen from the build file at `buildRel` */
  private ref(l: Label, buildRel: string): string {
    return labelToString(relativeTo(l, buildRel));
  }

  private visibility(value: string): Expr[] {
    return this.omitVisibility ? [] : [assignExpr('visibility', stringList([value]))];
  }

  /** Source names as seen from the build file */
  private sourcePath(pkg: Package, buildRel: string, name: string): string {
    const dir = path.posix.relative(buildRel, pkg.rel);
    return dir === '' ? name : `${dir}/${name}`;
  }

  /**
   * List expression for platform-dependent strings: a plain list, a
   * select() keyed by platform, or their sum
   */
  private platformExpr(ps: PlatformStrings, map: (value: string) => string = v => v): Expr | null {
    const generic = uniqueSorted(ps.generic.map(map));
    const entries: KeyValueExpr[] = [];
    const keys = new Map<string, string[]>();
    for (const source of [ps.os, ps.arch, ps.platform]) {
      for (const [key, values] of source) {
        const list = uniqueSorted(values.map(map)).filter(v => !generic.includes(v));
        if (list.length > 0) keys.set(key, list);
      }
    }
    for (const key of [...keys.keys()].sort()) {
      entries.push(keyValueExpr(stringExpr(PLATFORM_LABEL_PREFIX + key), stringList(keys.get(key) ?? [])));
    }

    if (entries.length === 0) {
      return generic.length > 0 ? stringList(generic) : null;
    }
    entries.push(keyValueExpr(stringExpr(DEFAULT_CONDITION), listExpr([])));
    const select = callExpr('select', [dictExpr(entries)]);
    return generic.length > 0 ? binaryExpr(stringList(generic), select) : select;
  }

  private sources(pkg: Package, ps: PlatformStrings, buildRel: string): Expr[] {
    const srcs = this.platformExpr(ps, name => this.sourcePath(pkg, buildRel, name));
    return srcs ? [assignExpr('srcs', srcs)] : [];
  }

  private importsAttr(ps: PlatformStrings): Expr[] {
    const imports = flattenPlatformStrings(ps);
    return imports.length > 0 ? [assignExpr(IMPORTS_ATTR, stringList(imports))] : [];
  }

  private cgoAttrs(target: GoTarget): Expr[] {
    const attrs: Expr[] = [];
    if (target.cgo) attrs.push(assignExpr('cgo', identExpr('True')));
    const copts = this.platformExpr(target.copts);
    if (copts) attrs.push(assignExpr('copts', copts));
    const clinkopts = this.platformExpr(target.clinkopts);
    if (clinkopts) attrs.push(assignExpr('clinkopts', clinkopts));
    return attrs;
  }

  private importPathAttr(pkg: Package): Expr[] {
    return this.c.prefix !== '' ? [assignExpr('importpath', stringExpr(pkg.importPath))] : [];
  }

  private protosFilegroup(pkg: Package, l: Label, buildRel: string): CallExpr {
    return callExpr('filegroup', [
      assignExpr('name', stringExpr(l.name)),
      ...this.sources(pkg, pkg.proto.sources, buildRel),
      ...this.visibility(PUBLIC_VISIBILITY),
    ]);
  }

  private protoLibrary(pkg: Package, l: Label, buildRel: string): CallExpr {
    return callExpr('proto_library', [
      assignExpr('name', stringExpr(l.name)),
      ...this.sources(pkg, pkg.proto.sources, buildRel),
      ...this.visibility(visibilityFor(pkg.rel)),
      ...this.importsAttr(pkg.proto.imports),
    ]);
  }

  private goProtoLibrary(kind: string, pkg: Package, l: Label, proto: Label, buildRel: string): CallExpr {
    return callExpr(kind, [
      assignExpr('name', stringExpr(l.name)),
      ...this.importPathAttr(pkg),
      assignExpr('proto', stringExpr(this.ref(proto, buildRel))),
      ...this.visibility(visibilityFor(pkg.rel)),
      ...this.importsAttr(pkg.proto.imports),
    ]);
  }

  private goLibrary(pkg: Package, l: Label, goProto: Label | null, buildRel: string): CallExpr | null {
    const srcs = this.sources(pkg, pkg.library.sources, buildRel);
    if (srcs.length === 0 && goProto === null) {
      return null;
    }
    const embed = goProto ? [assignExpr('embed', stringList([this.ref(goProto, buildRel)]))] : [];
    const visibility = isCommand(pkg) ? PRIVATE_VISIBILITY : visibilityFor(pkg.rel);
    return callExpr('go_library', [
      assignExpr('name', stringExpr(l.name)),
      ...srcs,
      ...embed,
      ...this.importPathAttr(pkg),
      ...this.cgoAttrs(pkg.library),
      ...this.visibility(visibility),
      ...this.importsAttr(pkg.library.imports),
    ]);
  }

  private goBinary(pkg: Package, l: Label, lib: Label, buildRel: string): CallExpr {
    return callExpr('go_binary', [
      assignExpr('name', stringExpr(l.name)),
      assignExpr('embed', stringList([this.ref(lib, buildRel)])),
      ...this.visibility(visibilityFor(pkg.rel)),
    ]);
  }

  private goTest(pkg: Package, target: GoTarget, l: Label, lib: Label | null, buildRel: string): CallExpr | null {
    const srcs = this.sources(pkg, target.sources, buildRel);
    if (srcs.length === 0) {
      return null;
    }
    const data = pkg.hasTestdata
      ? [assignExpr('data', callExpr('glob', [stringList([this.sourcePath(pkg, buildRel, 'testdata/**')])]))]
      : [];
    const embed = lib ? [assignExpr('embed', stringList([this.ref(lib, buildRel)]))] : [];
    return callExpr('go_test', [
      assignExpr('name', stringExpr(l.name)),
      ...srcs,
      ...data,
      ...embed,
      ...this.cgoAttrs(target),
      ...this.importsAttr(target.imports),
    ]);
  }
}
