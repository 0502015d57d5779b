/**
 * @module binder/resolver
 *
 * 名字查找与类型引用解析。
 *
 * 简单名的查找顺序（局部变量与类成员由调用方先行处理）：
 * 1. 当前命名空间，逐级向外直到根命名空间
 * 2. 当前命名空间块及外层块、文件级的导入
 * 3. 预置命名空间 `System`
 * 4. 作为限定符使用的命名空间名
 */

import { isPrimitiveName, PRELUDE_NAMESPACE } from '../config/semantic.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { MemberSymbol, NamespaceSymbol, TypeSymbol } from '../symbols/symbols.js';
import { missingFeatures } from '../symbols/features.js';
import type { Directive, NamedTypeRef, Span, TypeRef } from '../types.js';
import type { DiagnosticCollector } from './diagnostics.js';
import type { ProgramModel, TypeInfo } from './model.js';
import { TypeSystem, type ParamType, type Type } from './type_system.js';

export interface LookupEnv {
  readonly file: string;
  /** 当前命名空间路径 */
  readonly namespace: readonly string[];
  /** 作用域内的泛型形参（方法级覆盖类级） */
  readonly typeParams: ReadonlyMap<string, ParamType>;
}

export type Resolved = MemberSymbol | NamespaceSymbol;

export function withTypeParams(env: LookupEnv, owner: string, names: readonly string[]): LookupEnv {
  if (names.length === 0) return env;
  const typeParams = new Map(env.typeParams);
  for (const name of names) typeParams.set(name, TypeSystem.param(name, owner));
  return { ...env, typeParams };
}

export class SymbolResolver {
  constructor(
    readonly program: ProgramModel,
    private readonly diagnostics: DiagnosticCollector,
    /** 引用方编译单元启用的特性；为 null 时不检查 B009 */
    private readonly features: ReadonlySet<string> | null
  ) {}

  lookupSimple(env: LookupEnv, name: string): Resolved | undefined {
    const { table } = this.program;
    for (let depth = env.namespace.length; depth >= 0; depth--) {
      const found = table.lookupMember(env.namespace.slice(0, depth).join('.'), name);
      if (found) return found;
    }
    for (let depth = env.namespace.length; depth >= 0; depth--) {
      for (const target of table.importsOf(env.file, env.namespace.slice(0, depth).join('.'))) {
        if (target.kind === 'namespace') {
          const found = target.namespace.members.get(name);
          if (found) return found;
        } else if (target.symbol.name === name) {
          return target.symbol;
        }
      }
    }
    const prelude = table.lookupMember(PRELUDE_NAMESPACE, name);
    if (prelude) return prelude;
    for (let depth = env.namespace.length; depth >= 0; depth--) {
      const ns = table.getNamespace([...env.namespace.slice(0, depth), name].join('.'));
      if (ns) return ns;
    }
    return undefined;
  }

  /** 在命名空间内查找下一段 */
  lookupIn(ns: NamespaceSymbol, name: string): Resolved | undefined {
    return ns.members.get(name) ?? this.program.table.getNamespace([...ns.path, name].join('.'));
  }

  lookupPath(env: LookupEnv, path: readonly string[]): Resolved | undefined {
    const [first, ...rest] = path;
    if (first === undefined) return undefined;
    let current = this.lookupSimple(env, first);
    for (const segment of rest) {
      if (!current || current.kind !== 'namespace') return undefined;
      current = this.lookupIn(current, segment);
    }
    return current;
  }

  infoOf(symbol: TypeSymbol): TypeInfo | undefined {
    return this.program.types.get(symbol);
  }

  /**
   * 引用处的特性检查：被引用声明要求的特性在引用方单元中未启用时报告 B009。
   */
  checkFeatures(name: string, directives: readonly Directive[], span: Span): void {
    if (!this.features) return;
    const missing = missingFeatures(
      directives.filter(d => d.name === 'require'),
      this.features
    );
    for (const feature of missing) {
      this.diagnostics.error(ErrorCode.FEATURE_UNAVAILABLE, span, { name, feature });
    }
  }

  resolveType(env: LookupEnv, ref: TypeRef): Type {
    switch (ref.kind) {
      case 'NamedType':
        return this.resolveNamed(env, ref);
      case 'ArrayType': {
        const element = this.resolveType(env, ref.element);
        if (TypeSystem.isVoid(element)) {
          this.diagnostics.error(ErrorCode.TYPE_MISMATCH, ref.span, { expected: 'a value type', actual: 'Void' });
          return TypeSystem.ERROR;
        }
        return TypeSystem.array(element, ref.nullable);
      }
      case 'FunctionType': {
        const params = ref.params.map(p => this.resolveType(env, p));
        const ret = this.resolveType(env, ref.ret);
        return TypeSystem.fn(params, ret, ref.nullable);
      }
    }
  }

  /** 解析为类或接口；其他结果报告错误并返回 null */
  resolveTypeInfo(env: LookupEnv, ref: NamedTypeRef): TypeInfo | null {
    const found = this.lookupPath(env, ref.name);
    const display = ref.name.join('.');
    if (!found || (found.kind !== 'class' && found.kind !== 'interface')) {
      this.diagnostics.unresolved(display, ref.span);
      return null;
    }
    this.checkFeatures(found.qualifiedName, found.decl.directives, ref.span);
    return this.infoOf(found) ?? null;
  }

  private resolveNamed(env: LookupEnv, ref: NamedTypeRef): Type {
    const display = ref.name.join('.');
    const [single] = ref.name;
    if (ref.name.length === 1 && single !== undefined) {
      const param = env.typeParams.get(single);
      if (param) {
        if (ref.args.length > 0) this.arity(display, 0, ref.args.length, ref.span);
        return ref.nullable ? TypeSystem.withNullable(param, true) : param;
      }
      if (isPrimitiveName(single)) {
        if (ref.args.length > 0) this.arity(display, 0, ref.args.length, ref.span);
        if (single === 'Void' && ref.nullable) {
          this.diagnostics.error(ErrorCode.TYPE_MISMATCH, ref.span, { expected: 'a value type', actual: 'Void?' });
          return TypeSystem.ERROR;
        }
        return TypeSystem.primitive(single, ref.nullable);
      }
    }
    const info = this.resolveTypeInfo(env, ref);
    if (!info) return TypeSystem.ERROR;
    const args = ref.args.map(a => this.resolveType(env, a));
    if (args.length !== info.typeParams.length) {
      this.arity(info.qualifiedName, info.typeParams.length, args.length, ref.span);
      return TypeSystem.ERROR;
    }
    for (const [i, arg] of args.entries()) {
      if (TypeSystem.isVoid(arg)) {
        const argRef = ref.args[i];
        this.diagnostics.error(ErrorCode.TYPE_MISMATCH, argRef ? argRef.span : ref.span, {
          expected: 'a value type',
          actual: 'Void',
        });
        return TypeSystem.ERROR;
      }
    }
    return TypeSystem.object(info, args, ref.nullable);
  }

  private arity(name: string, expected: number, actual: number, span: Span): void {
    this.diagnostics.error(ErrorCode.GENERIC_ARITY, span, { name, expected, actual });
  }
}
