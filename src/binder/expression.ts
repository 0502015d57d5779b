import { ErrorCode } from '../diagnostics/error_codes.js';
import type { NamespaceSymbol } from '../symbols/symbols.js';
import type {
  ArrayLiteral,
  Assign,
  Binary,
  Call,
  Cast,
  Conditional,
  Expression,
  Index,
  Lambda,
  Member,
  Name,
  New,
  Span,
  Super,
  TypeCheck,
  Unary,
} from '../types.js';
import type { BinderContext } from './context.js';
import { blockCompletes } from './flow.js';
import {
  lookupConstructors,
  lookupField,
  lookupMethods,
  lookupStaticField,
  selfType,
  superTypeOf,
  type MethodCandidate,
} from './members.js';
import type { Dispatch, FieldInfo, LambdaInfo, LocalSymbol, MethodInfo, TypeInfo } from './model.js';
import { formatSignature, resolveOverload, type OverloadCandidate, type OverloadResult } from './overloads.js';
import { equalityPlan, isArithmetic, stringifyPlan } from './plans.js';
import type { Resolved } from './resolver.js';
import type { LocalLookup } from './scope.js';
import { bindBody } from './statement.js';
import { TypeSystem, type ObjectType, type PrimitiveType, type Type } from './type_system.js';

// 表达式绑定：为每个表达式节点计算静态类型，并把名字、成员、调用的解析结果写入侧表。

export type Qualifier =
  | { readonly kind: 'namespace'; readonly ns: NamespaceSymbol }
  | { readonly kind: 'type'; readonly info: TypeInfo };

export type Narrowing = readonly [LocalSymbol, Type];

const INT_RANGES: Partial<Record<string, readonly [number, number]>> = {
  Byte: [-128, 127],
  Short: [-32768, 32767],
};

function describe(symbol: Resolved): string {
  switch (symbol.kind) {
    case 'namespace':
      return `namespace ${symbol.path.join('.')}`;
    case 'functions':
      return `function ${symbol.qualifiedName}`;
    default:
      return `${symbol.kind} ${symbol.qualifiedName}`;
  }
}

export class ExpressionBinder {
  constructor(private readonly ctx: BinderContext) {}

  bind(expr: Expression, expected: Type | null = null): Type {
    return this.ctx.setType(expr, this.compute(expr, expected));
  }

  /** 绑定表达式并检查其可隐式转换为 `target` */
  expect(expr: Expression, target: Type): Type {
    const actual = this.bind(expr, target);
    if (!TypeSystem.canCastTo(actual, target)) this.ctx.diagnostics.typeMismatch(target, actual, expr.span);
    return actual;
  }

  /** 条件为真（或为假）时成立的局部变量收窄 */
  narrowings(cond: Expression, whenTrue: boolean): Narrowing[] {
    switch (cond.kind) {
      case 'Unary':
        return cond.op === '!' ? this.narrowings(cond.operand, !whenTrue) : [];
      case 'Binary': {
        if (cond.op === '&&') {
          return whenTrue ? [...this.narrowings(cond.left, true), ...this.narrowings(cond.right, true)] : [];
        }
        if (cond.op === '||') {
          return whenTrue ? [] : [...this.narrowings(cond.left, false), ...this.narrowings(cond.right, false)];
        }
        if (cond.op !== '==' && cond.op !== '!=') return [];
        const nonNullWhen = cond.op === '!=' ? whenTrue : !whenTrue;
        if (!nonNullWhen) return [];
        const subject = cond.right.kind === 'Null' ? cond.left : cond.left.kind === 'Null' ? cond.right : null;
        const local = subject ? this.localOf(subject) : null;
        if (!local || !TypeSystem.isNullable(local.type)) return [];
        return [[local, TypeSystem.nonNull(this.ctx.scopes.typeOf(local))]];
      }
      case 'TypeCheck': {
        if (!whenTrue) return [];
        const local = this.localOf(cond.expr);
        const target = this.ctx.bindings.targets.get(cond);
        return local && target && target.kind === 'object' ? [[local, target]] : [];
      }
      default:
        return [];
    }
  }

  /** 在新的块作用域中应用收窄后执行 `body` */
  withNarrowings<T>(narrowings: readonly Narrowing[], body: () => T): T {
    const { scopes } = this.ctx;
    scopes.enter('block');
    try {
      for (const [local, type] of narrowings) scopes.narrow(local, type);
      return body();
    } finally {
      scopes.exit();
    }
  }

  /**
   * 与 `null` 比较时，已收窄为非空的可空局部变量按声明类型比较。
   */
  private comparand(expr: Expression, other: Expression): Type {
    const type = this.bind(expr);
    if (other.kind !== 'Null' || TypeSystem.isNullable(type)) return type;
    const local = this.localOf(expr);
    if (!local || !TypeSystem.isNullable(local.type)) return type;
    return this.ctx.setType(expr, local.type);
  }

  private localOf(expr: Expression): LocalSymbol | null {
    if (expr.kind !== 'Name') return null;
    const resolution = this.ctx.bindings.names.get(expr);
    return resolution?.kind === 'local' ? resolution.local : null;
  }

  private compute(expr: Expression, expected: Type | null): Type {
    switch (expr.kind) {
      case 'Int': {
        if (expected && expected.kind === 'primitive') {
          const range = INT_RANGES[expected.name];
          if (range && expr.value >= range[0] && expr.value <= range[1]) return TypeSystem.primitive(expected.name);
        }
        return TypeSystem.INT;
      }
      case 'Long':
        return TypeSystem.primitive('Long');
      case 'Float':
        return TypeSystem.primitive(expr.precision === 'float' ? 'Float' : 'Double');
      case 'Char':
        return TypeSystem.primitive('Char');
      case 'Bool':
        return TypeSystem.BOOL;
      case 'Null':
        return TypeSystem.NULL;
      case 'String':
        return TypeSystem.STRING;
      case 'Interpolated':
        for (const part of expr.parts) {
          if (part.kind === 'expr') this.planStringify(part.expr, this.bind(part.expr));
        }
        return TypeSystem.STRING;
      case 'Name':
        return this.name(expr);
      case 'This':
        return this.thisType(expr.span);
      case 'Super':
        this.invalidSuper(expr.span, "'super' can only be used to access a member or call a constructor");
        return TypeSystem.ERROR;
      case 'Member':
        return this.member(expr);
      case 'Call':
        return this.call(expr);
      case 'New':
        return this.newObject(expr);
      case 'NewArray': {
        const element = this.ctx.resolver.resolveType(this.ctx.env, expr.element);
        this.expect(expr.size, TypeSystem.INT);
        if (TypeSystem.isVoid(element)) {
          this.ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.element.span, { expected: 'a value type', actual: 'Void' });
          return TypeSystem.ERROR;
        }
        return TypeSystem.array(element);
      }
      case 'Index':
        return this.index(expr);
      case 'Unary':
        return this.unary(expr, expected);
      case 'Binary':
        return this.binary(expr);
      case 'Assign':
        return this.assign(expr);
      case 'Conditional':
        return this.conditional(expr, expected);
      case 'ArrayLiteral':
        return this.arrayLiteral(expr, expected);
      case 'Lambda':
        return this.lambda(expr);
      case 'Cast':
        return this.cast(expr);
      case 'TypeCheck':
        return this.typeCheck(expr);
    }
  }

  private planStringify(expr: Expression, type: Type): void {
    if (TypeSystem.isVoid(type)) {
      this.ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: 'a value', actual: 'Void' });
    }
    this.ctx.bindings.stringify.set(expr, stringifyPlan(type));
  }

  // ----------------------------------------------------------
  // 名字与成员
  // ----------------------------------------------------------

  private capture(found: LocalLookup): void {
    if (found.crossed.length === 0) return;
    for (const lambda of found.crossed) {
      if (!lambda.captures.includes(found.local)) lambda.captures.push(found.local);
    }
    found.local.captured = true;
  }

  /** 使用隐式或显式的 `this`；静态上下文中报告 B021 */
  private useThis(name: string, span: Span): LocalSymbol | null {
    const { ctx } = this;
    const found = ctx.frame.isStatic ? undefined : ctx.scopes.lookup('this');
    if (!found) {
      ctx.diagnostics.error(ErrorCode.INVALID_STATIC_ACCESS, span, { name, context: 'static' });
      return null;
    }
    this.capture(found);
    return found.local;
  }

  private thisType(span: Span): Type {
    const local = this.useThis('this', span);
    return local ? local.type : TypeSystem.ERROR;
  }

  private superType(span: Span): ObjectType | null {
    const { frame } = this.ctx;
    if (!frame.classInfo) {
      this.invalidSuper(span, "'super' used outside of a class");
      return null;
    }
    const sup = superTypeOf(selfType(frame.classInfo));
    if (!sup) {
      this.invalidSuper(span, `Class '${frame.classInfo.qualifiedName}' has no superclass`);
      return null;
    }
    if (!this.useThis('super', span)) return null;
    return sup;
  }

  private invalidSuper(span: Span, detail: string): void {
    this.ctx.diagnostics.error(ErrorCode.INVALID_SUPER_CALL, span, { detail });
  }

  private checkFeatures(target: FieldInfo | MethodInfo, span: Span): void {
    this.ctx.resolver.checkFeatures(target.qualifiedName, target.directives, span);
  }

  private name(expr: Name): Type {
    const { ctx } = this;
    const found = ctx.scopes.lookup(expr.name);
    if (found) {
      this.capture(found);
      ctx.bindings.names.set(expr, { kind: 'local', local: found.local });
      return ctx.scopes.typeOf(found.local);
    }
    const info = ctx.frame.classInfo;
    if (info) {
      const self = selfType(info);
      const field = lookupField(self, expr.name);
      if (field) {
        if (!this.useThis(expr.name, expr.span)) return TypeSystem.ERROR;
        this.checkFeatures(field.field, expr.span);
        ctx.bindings.names.set(expr, { kind: 'field', field: field.field, receiver: self });
        return field.type;
      }
      const staticField = lookupStaticField(info, expr.name);
      if (staticField) {
        this.checkFeatures(staticField, expr.span);
        ctx.bindings.names.set(expr, { kind: 'static', field: staticField });
        return staticField.type;
      }
    }
    const resolved = ctx.resolver.lookupSimple(ctx.env, expr.name);
    if (!resolved) {
      ctx.diagnostics.unresolved(expr.name, expr.span);
      return TypeSystem.ERROR;
    }
    const global = this.globalOf(resolved, expr.span);
    if (!global) return TypeSystem.ERROR;
    ctx.bindings.names.set(expr, { kind: 'global', field: global });
    return global.type;
  }

  private globalOf(resolved: Resolved, span: Span): FieldInfo | null {
    const global = resolved.kind === 'global' ? this.ctx.program.globals.get(resolved) : undefined;
    if (!global) {
      this.ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, span, { expected: 'a value', actual: describe(resolved) });
      return null;
    }
    this.checkFeatures(global, span);
    return global;
  }

  /**
   * 名字或成员链作为命名空间或类型限定符使用时的解析结果；作为值使用时返回 null。
   */
  qualifier(expr: Expression): Qualifier | null {
    const { ctx } = this;
    if (expr.kind === 'Name') {
      if (ctx.scopes.lookup(expr.name)) return null;
      const info = ctx.frame.classInfo;
      if (info && (lookupField(selfType(info), expr.name) || lookupStaticField(info, expr.name))) return null;
      return this.asQualifier(ctx.resolver.lookupSimple(ctx.env, expr.name), expr.span);
    }
    if (expr.kind === 'Member' && !expr.safe) {
      const outer = this.qualifier(expr.object);
      if (!outer || outer.kind !== 'namespace') return null;
      return this.asQualifier(ctx.resolver.lookupIn(outer.ns, expr.name), expr.span);
    }
    return null;
  }

  private asQualifier(found: Resolved | undefined, span: Span): Qualifier | null {
    if (!found) return null;
    if (found.kind === 'namespace') return { kind: 'namespace', ns: found };
    if (found.kind === 'class' || found.kind === 'interface') {
      const info = this.ctx.resolver.infoOf(found);
      if (!info) return null;
      this.ctx.resolver.checkFeatures(found.qualifiedName, found.decl.directives, span);
      return { kind: 'type', info };
    }
    return null;
  }

  /** 接收者类型：可空值不经 `?.` 访问时报告 B003，返回非空类型 */
  private receiver(type: Type, safe: boolean, span: Span): Type {
    if (type.kind === 'null') {
      this.ctx.diagnostics.error(ErrorCode.NULL_SAFETY_VIOLATION, span, { expected: 'a value', actual: 'null' });
      return TypeSystem.ERROR;
    }
    if (TypeSystem.isNullable(type) && !safe) {
      this.ctx.diagnostics.typeMismatch(TypeSystem.nonNull(type), type, span);
    }
    return TypeSystem.nonNull(type);
  }

  private member(expr: Member): Type {
    const { ctx } = this;
    if (expr.object.kind === 'Super') {
      const sup = this.superType(expr.object.span);
      if (!sup) return TypeSystem.ERROR;
      const field = lookupField(sup, expr.name);
      if (!field) {
        ctx.diagnostics.unresolved(`super.${expr.name}`, expr.span);
        return TypeSystem.ERROR;
      }
      ctx.bindings.members.set(expr, { kind: 'field', field: field.field, receiver: sup });
      return field.type;
    }
    const qualifier = this.qualifier(expr.object);
    if (qualifier) return this.qualifiedMember(expr, qualifier);

    const objectType = this.bind(expr.object);
    if (TypeSystem.isError(objectType)) return TypeSystem.ERROR;
    const target = this.receiver(objectType, expr.safe, expr.object.span);
    const result = this.memberOf(expr, target);
    return expr.safe && TypeSystem.isNullable(objectType) ? TypeSystem.withNullable(result, true) : result;
  }

  private qualifiedMember(expr: Member, qualifier: Qualifier): Type {
    const { ctx } = this;
    if (qualifier.kind === 'namespace') {
      const found = ctx.resolver.lookupIn(qualifier.ns, expr.name);
      if (!found) {
        ctx.diagnostics.unresolved([...qualifier.ns.path, expr.name].join('.'), expr.span);
        return TypeSystem.ERROR;
      }
      const global = this.globalOf(found, expr.span);
      if (!global) return TypeSystem.ERROR;
      ctx.bindings.members.set(expr, { kind: 'global', field: global });
      return global.type;
    }
    const { info } = qualifier;
    const display = `${info.qualifiedName}.${expr.name}`;
    if (info.kind === 'class') {
      const field = lookupStaticField(info, expr.name);
      if (field) {
        this.checkFeatures(field, expr.span);
        ctx.bindings.members.set(expr, { kind: 'static', field });
        return field.type;
      }
      if (lookupField(selfType(info), expr.name)) {
        ctx.diagnostics.error(ErrorCode.INVALID_STATIC_ACCESS, expr.span, { name: display, context: 'static' });
        return TypeSystem.ERROR;
      }
    }
    ctx.diagnostics.unresolved(display, expr.span);
    return TypeSystem.ERROR;
  }

  private memberOf(expr: Member, target: Type): Type {
    const { ctx } = this;
    if (TypeSystem.isError(target)) return TypeSystem.ERROR;
    if (expr.name === 'length' && target.kind === 'array') {
      ctx.bindings.members.set(expr, { kind: 'arrayLength' });
      return TypeSystem.INT;
    }
    if (expr.name === 'length' && TypeSystem.isString(target)) {
      ctx.bindings.members.set(expr, { kind: 'stringLength' });
      return TypeSystem.INT;
    }
    if (target.kind === 'object') {
      const field = lookupField(target, expr.name);
      if (field) {
        this.checkFeatures(field.field, expr.span);
        ctx.bindings.members.set(expr, { kind: 'field', field: field.field, receiver: target });
        return field.type;
      }
      if (target.info.kind === 'class' && lookupStaticField(target.info, expr.name)) {
        ctx.diagnostics.error(ErrorCode.INVALID_STATIC_ACCESS, expr.span, { name: expr.name, context: 'non-static' });
        return TypeSystem.ERROR;
      }
      if (lookupMethods(target, expr.name).length > 0) {
        ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: 'a value', actual: `method ${expr.name}` });
        return TypeSystem.ERROR;
      }
    }
    ctx.diagnostics.unresolved(`${TypeSystem.format(target)}.${expr.name}`, expr.span);
    return TypeSystem.ERROR;
  }

  // ----------------------------------------------------------
  // 调用
  // ----------------------------------------------------------

  private bindArgs(args: readonly Expression[]): Type[] {
    return args.map(arg => this.bind(arg));
  }

  private overload<C extends OverloadCandidate>(
    name: string,
    candidates: readonly C[],
    args: readonly Type[],
    span: Span
  ): Extract<OverloadResult<C>, { kind: 'resolved' }> | null {
    const { diagnostics } = this.ctx;
    const result = resolveOverload(candidates, args);
    switch (result.kind) {
      case 'resolved':
        this.checkFeatures(result.candidate.method, span);
        return result;
      case 'ambiguous':
        diagnostics.error(ErrorCode.AMBIGUOUS_OVERLOAD, span, {
          name,
          candidates: result.candidates.map(formatSignature).join(', '),
        });
        return null;
      case 'none':
        if (!args.some(a => TypeSystem.containsError(a))) {
          diagnostics.error(ErrorCode.NO_APPLICABLE_OVERLOAD, span, {
            name,
            args: args.map(a => TypeSystem.format(a)).join(', '),
          });
        }
        return null;
    }
  }

  private dispatchOf(method: MethodInfo): Dispatch {
    if (method.owner?.kind === 'interface') return 'interface';
    return method.slot !== null ? 'virtual' : 'direct';
  }

  private requestGeneric(method: MethodInfo, ownerArgs: readonly Type[], typeArgs: readonly Type[]): void {
    if (method.typeParams.length > 0) this.ctx.requestMethod(method, ownerArgs, typeArgs);
  }

  private call(expr: Call): Type {
    const { callee } = expr;
    if (callee.kind === 'Super') return this.superConstructorCall(expr, callee);
    if (callee.kind === 'Name') {
      const result = this.nameCall(expr, callee);
      if (result) return result;
    }
    if (callee.kind === 'Member') {
      const result = this.memberCall(expr, callee);
      if (result) return result;
    }
    return this.invokeClosure(expr, this.bind(callee));
  }

  /** `f(args)`：局部变量与字段优先作为函数值调用 */
  private nameCall(expr: Call, callee: Name): Type | null {
    const { ctx } = this;
    if (ctx.scopes.lookup(callee.name)) return null;
    const info = ctx.frame.classInfo;
    if (info) {
      const self = selfType(info);
      const methods = lookupMethods(self, callee.name);
      if (methods.length > 0) return this.implicitMethodCall(expr, callee, self, methods);
      if (lookupField(self, callee.name) || lookupStaticField(info, callee.name)) return null;
    }
    const resolved = ctx.resolver.lookupSimple(ctx.env, callee.name);
    if (resolved?.kind === 'functions') return this.functionCall(expr, callee.name, ctx.program.functions.get(resolved) ?? []);
    if (resolved?.kind === 'global') return null;
    this.bindArgs(expr.args);
    if (!resolved) ctx.diagnostics.unresolved(callee.name, callee.span);
    else ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, callee.span, { expected: 'a function', actual: describe(resolved) });
    return TypeSystem.ERROR;
  }

  private implicitMethodCall(expr: Call, callee: Name, self: ObjectType, methods: readonly MethodCandidate[]): Type {
    const { ctx } = this;
    const args = this.bindArgs(expr.args);
    const result = this.overload(callee.name, methods, args, expr.span);
    if (!result) return TypeSystem.ERROR;
    const { method, owner } = result.candidate;
    if (method.isStatic) {
      ctx.bindings.calls.set(expr, { kind: 'function', method, typeArgs: result.typeArgs, owner, params: result.params });
      this.requestGeneric(method, [], result.typeArgs);
      return result.ret;
    }
    if (!this.useThis(callee.name, callee.span)) return TypeSystem.ERROR;
    ctx.bindings.calls.set(expr, {
      kind: 'method',
      method,
      receiver: self,
      dispatch: this.dispatchOf(method),
      typeArgs: result.typeArgs,
      params: result.params,
      safe: false,
    });
    this.requestGeneric(method, owner.args, result.typeArgs);
    return result.ret;
  }

  private functionCall(expr: Call, name: string, group: readonly MethodInfo[]): Type {
    const args = this.bindArgs(expr.args);
    const candidates = group.map(method => ({ method, params: method.params, ret: method.ret }));
    const result = this.overload(name, candidates, args, expr.span);
    if (!result) return TypeSystem.ERROR;
    const { method } = result.candidate;
    this.ctx.bindings.calls.set(expr, { kind: 'function', method, typeArgs: result.typeArgs, owner: null, params: result.params });
    this.requestGeneric(method, [], result.typeArgs);
    return result.ret;
  }

  private memberCall(expr: Call, callee: Member): Type | null {
    const { ctx } = this;
    if (callee.object.kind === 'Super') return this.superMethodCall(expr, callee, callee.object);

    const qualifier = this.qualifier(callee.object);
    if (qualifier?.kind === 'namespace') {
      const found = ctx.resolver.lookupIn(qualifier.ns, callee.name);
      if (found?.kind === 'functions') {
        return this.functionCall(expr, found.qualifiedName, ctx.program.functions.get(found) ?? []);
      }
      if (found?.kind === 'global') return null;
      this.bindArgs(expr.args);
      const display = [...qualifier.ns.path, callee.name].join('.');
      if (!found) ctx.diagnostics.unresolved(display, callee.span);
      else ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, callee.span, { expected: 'a function', actual: describe(found) });
      return TypeSystem.ERROR;
    }
    if (qualifier?.kind === 'type') return this.staticCall(expr, callee, qualifier.info);

    const objectType = this.bind(callee.object);
    if (TypeSystem.isError(objectType)) {
      this.bindArgs(expr.args);
      return TypeSystem.ERROR;
    }
    const target = this.receiver(objectType, callee.safe, callee.object.span);
    const safe = callee.safe && TypeSystem.isNullable(objectType);
    if (target.kind === 'object') {
      const methods = lookupMethods(target, callee.name);
      if (methods.length === 0 && lookupField(target, callee.name)) {
        const fieldType = this.memberOf(callee, target);
        const calleeType = ctx.setType(callee, safe ? TypeSystem.withNullable(fieldType, true) : fieldType);
        return this.invokeClosure(expr, calleeType);
      }
      if (methods.length > 0) {
        const args = this.bindArgs(expr.args);
        const result = this.overload(`${target.info.qualifiedName}.${callee.name}`, methods, args, expr.span);
        if (!result) return TypeSystem.ERROR;
        const { method, owner } = result.candidate;
        if (method.isStatic) {
          ctx.diagnostics.error(ErrorCode.INVALID_STATIC_ACCESS, callee.span, { name: method.qualifiedName, context: 'non-static' });
          return TypeSystem.ERROR;
        }
        ctx.bindings.calls.set(expr, {
          kind: 'method',
          method,
          receiver: target,
          dispatch: this.dispatchOf(method),
          typeArgs: result.typeArgs,
          params: result.params,
          safe,
        });
        this.requestGeneric(method, owner.args, result.typeArgs);
        return safe && !TypeSystem.isVoid(result.ret) ? TypeSystem.withNullable(result.ret, true) : result.ret;
      }
    }
    this.bindArgs(expr.args);
    if (!TypeSystem.isError(target)) ctx.diagnostics.unresolved(`${TypeSystem.format(target)}.${callee.name}`, callee.span);
    return TypeSystem.ERROR;
  }

  private staticCall(expr: Call, callee: Member, info: TypeInfo): Type {
    const { ctx } = this;
    const args = this.bindArgs(expr.args);
    const display = `${info.qualifiedName}.${callee.name}`;
    const all = info.kind === 'class' ? lookupMethods(selfType(info), callee.name) : [];
    const statics = all.filter(c => c.method.isStatic);
    if (statics.length === 0) {
      if (all.length > 0) ctx.diagnostics.error(ErrorCode.INVALID_STATIC_ACCESS, callee.span, { name: display, context: 'static' });
      else ctx.diagnostics.unresolved(display, callee.span);
      return TypeSystem.ERROR;
    }
    const result = this.overload(display, statics, args, expr.span);
    if (!result) return TypeSystem.ERROR;
    const { method, owner } = result.candidate;
    ctx.bindings.calls.set(expr, { kind: 'function', method, typeArgs: result.typeArgs, owner, params: result.params });
    this.requestGeneric(method, [], result.typeArgs);
    return result.ret;
  }

  private superMethodCall(expr: Call, callee: Member, object: Super): Type {
    const { ctx } = this;
    const sup = this.superType(object.span);
    const args = this.bindArgs(expr.args);
    if (!sup) return TypeSystem.ERROR;
    const methods = lookupMethods(sup, callee.name).filter(c => !c.method.isStatic && c.method.owner?.kind === 'class');
    if (methods.length === 0) {
      ctx.diagnostics.unresolved(`super.${callee.name}`, callee.span);
      return TypeSystem.ERROR;
    }
    const result = this.overload(`super.${callee.name}`, methods, args, expr.span);
    if (!result) return TypeSystem.ERROR;
    const { method, owner } = result.candidate;
    if (method.isNative && !method.decl.body) {
      this.invalidSuper(callee.span, `Method '${method.qualifiedName}' has no implementation to call`);
    }
    ctx.bindings.calls.set(expr, {
      kind: 'method',
      method,
      receiver: sup,
      dispatch: 'super',
      typeArgs: result.typeArgs,
      params: result.params,
      safe: false,
    });
    this.requestGeneric(method, owner.args, result.typeArgs);
    return result.ret;
  }

  private superConstructorCall(expr: Call, callee: Super): Type {
    const { ctx } = this;
    const args = this.bindArgs(expr.args);
    const { frame } = ctx;
    if (!frame.isConstructor || ctx.superCall !== expr) {
      this.invalidSuper(callee.span, "'super(...)' must be the first statement of a constructor");
      return TypeSystem.VOID;
    }
    const sup = this.superType(callee.span);
    if (!sup) return TypeSystem.VOID;
    const ctors = lookupConstructors(sup);
    if (ctors.length === 0) {
      if (args.length > 0) {
        ctx.diagnostics.error(ErrorCode.NO_APPLICABLE_OVERLOAD, expr.span, {
          name: TypeSystem.format(sup),
          args: args.map(a => TypeSystem.format(a)).join(', '),
        });
      }
      ctx.bindings.calls.set(expr, { kind: 'superConstructor', ctor: null, owner: sup, params: [] });
      return TypeSystem.VOID;
    }
    const result = this.overload(TypeSystem.format(sup), ctors, args, expr.span);
    if (result) {
      ctx.bindings.calls.set(expr, { kind: 'superConstructor', ctor: result.candidate.method, owner: sup, params: result.params });
    }
    return TypeSystem.VOID;
  }

  private invokeClosure(expr: Call, calleeType: Type): Type {
    const { ctx } = this;
    const args = this.bindArgs(expr.args);
    if (TypeSystem.isError(calleeType)) return TypeSystem.ERROR;
    const target = this.receiver(calleeType, false, expr.callee.span);
    if (target.kind !== 'function') {
      if (!TypeSystem.isError(target)) {
        ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.callee.span, { expected: 'a function', actual: TypeSystem.format(target) });
      }
      return TypeSystem.ERROR;
    }
    if (target.params.length !== args.length) {
      ctx.diagnostics.error(ErrorCode.NO_APPLICABLE_OVERLOAD, expr.span, {
        name: TypeSystem.format(target),
        args: args.map(a => TypeSystem.format(a)).join(', '),
      });
      return target.ret;
    }
    target.params.forEach((param, i) => {
      const arg = args[i];
      const node = expr.args[i];
      if (arg && node && !TypeSystem.canCastTo(arg, param)) ctx.diagnostics.typeMismatch(param, arg, node.span);
    });
    ctx.bindings.calls.set(expr, { kind: 'closure', type: target });
    return target.ret;
  }

  private newObject(expr: New): Type {
    const { ctx } = this;
    const args = this.bindArgs(expr.args);
    const resolved = ctx.resolver.resolveType(ctx.env, expr.type);
    if (resolved.kind !== 'object') {
      if (!TypeSystem.isError(resolved)) {
        ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.type.span, { expected: 'a class type', actual: TypeSystem.format(resolved) });
      }
      return TypeSystem.ERROR;
    }
    const type = TypeSystem.nonNullObject(resolved);
    if (type.info.kind !== 'class') {
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.type.span, { expected: 'a class type', actual: `interface ${type.info.qualifiedName}` });
      return TypeSystem.ERROR;
    }
    let ctor: MethodInfo | null = null;
    let params: readonly Type[] = [];
    const ctors = lookupConstructors(type);
    if (ctors.length === 0) {
      if (args.length > 0) {
        ctx.diagnostics.error(ErrorCode.NO_APPLICABLE_OVERLOAD, expr.span, {
          name: TypeSystem.format(type),
          args: args.map(a => TypeSystem.format(a)).join(', '),
        });
      }
    } else {
      const result = this.overload(TypeSystem.format(type), ctors, args, expr.span);
      if (!result) return type;
      ctor = result.candidate.method;
      params = result.params;
    }
    const mock = type.args.length === 0 ? ctx.scopes.mockFor(type.info) : undefined;
    ctx.bindings.news.set(expr, { type: mock ? TypeSystem.object(mock) : type, ctor, params });
    return type;
  }

  // ----------------------------------------------------------
  // 运算符
  // ----------------------------------------------------------

  private index(expr: Index): Type {
    const { ctx } = this;
    const objectType = this.bind(expr.object);
    this.expect(expr.index, TypeSystem.INT);
    if (TypeSystem.isError(objectType)) return TypeSystem.ERROR;
    const target = this.receiver(objectType, false, expr.object.span);
    if (target.kind === 'array') return target.element;
    if (TypeSystem.isString(target)) return TypeSystem.primitive('Char');
    if (!TypeSystem.isError(target)) {
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.object.span, { expected: 'an array or String', actual: TypeSystem.format(target) });
    }
    return TypeSystem.ERROR;
  }

  /** 算术操作数：可空报告 B003，非数值报告 B002 */
  private arithmeticOperand(expr: Expression, type: Type): PrimitiveType | null {
    if (TypeSystem.isError(type)) return null;
    if (TypeSystem.isNullable(type)) {
      this.ctx.diagnostics.typeMismatch(TypeSystem.nonNull(type), type, expr.span);
      return null;
    }
    if (!isArithmetic(type)) {
      this.ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: 'a numeric type', actual: TypeSystem.format(type) });
      return null;
    }
    return type;
  }

  private unary(expr: Unary, expected: Type | null): Type {
    if (expr.op === '!') {
      this.expect(expr.operand, TypeSystem.BOOL);
      return TypeSystem.BOOL;
    }
    const literal = expr.operand.kind === 'Int' || expr.operand.kind === 'Long' || expr.operand.kind === 'Float';
    const operand = this.arithmeticOperand(expr.operand, this.bind(expr.operand, literal ? expected : null));
    if (!operand) return TypeSystem.ERROR;
    return literal ? operand : (TypeSystem.numericResult(operand, operand) ?? TypeSystem.ERROR);
  }

  private binary(expr: Binary): Type {
    const { ctx } = this;
    switch (expr.op) {
      case '&&':
      case '||':
        this.expect(expr.left, TypeSystem.BOOL);
        this.withNarrowings(this.narrowings(expr.left, expr.op === '&&'), () => this.expect(expr.right, TypeSystem.BOOL));
        return TypeSystem.BOOL;
      case '==':
      case '!=': {
        const left = this.comparand(expr.left, expr.right);
        const right = this.comparand(expr.right, expr.left);
        const plan = equalityPlan(left, right);
        if (!plan) {
          ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: TypeSystem.format(left), actual: TypeSystem.format(right) });
        } else {
          ctx.bindings.equality.set(expr, plan);
        }
        return TypeSystem.BOOL;
      }
      default:
        break;
    }
    const left = this.bind(expr.left);
    const right = this.bind(expr.right);
    if (expr.op === '+' && (TypeSystem.isString(TypeSystem.nonNull(left)) || TypeSystem.isString(TypeSystem.nonNull(right)))) {
      this.planStringify(expr.left, left);
      this.planStringify(expr.right, right);
      return TypeSystem.STRING;
    }
    const a = this.arithmeticOperand(expr.left, left);
    const b = this.arithmeticOperand(expr.right, right);
    if (!a || !b) return TypeSystem.ERROR;
    const result = TypeSystem.numericResult(a, b);
    if (!result) {
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: TypeSystem.format(a), actual: TypeSystem.format(b) });
      return TypeSystem.ERROR;
    }
    ctx.bindings.operandTypes.set(expr, result);
    switch (expr.op) {
      case '<':
      case '<=':
      case '>':
      case '>=':
        return TypeSystem.BOOL;
      default:
        return result;
    }
  }

  private assign(expr: Assign): Type {
    const { ctx } = this;
    const target = this.assignTarget(expr.target);
    if (!target) {
      this.bind(expr.value);
      return TypeSystem.ERROR;
    }
    let value: Type;
    if (expr.op === '=') {
      value = this.expect(expr.value, target.type);
    } else {
      value = this.bind(expr.value);
      if (expr.op === '+=' && TypeSystem.isString(TypeSystem.nonNull(target.type))) {
        this.planStringify(expr.value, value);
        ctx.bindings.compound.set(expr, TypeSystem.STRING);
      } else {
        const a = this.arithmeticOperand(expr.target, target.type);
        const b = this.arithmeticOperand(expr.value, value);
        const result = a && b ? TypeSystem.numericResult(a, b) : null;
        if (a && b && !result) {
          ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: TypeSystem.format(a), actual: TypeSystem.format(b) });
        }
        if (result) ctx.bindings.compound.set(expr, result);
      }
    }
    if (target.local) {
      const narrowed = expr.op === '=' && TypeSystem.isNullable(target.local.type) && value.kind !== 'null' && !TypeSystem.isNullable(value);
      if (narrowed) ctx.scopes.narrow(target.local, TypeSystem.nonNull(target.local.type));
      else ctx.scopes.invalidate(target.local);
    }
    return target.type;
  }

  /**
   * 赋值目标：局部变量、字段、静态字段、全局变量或数组元素。
   */
  private assignTarget(expr: Expression): { readonly type: Type; readonly local: LocalSymbol | null } | null {
    const { ctx } = this;
    const immutable = (name: string): null => {
      ctx.diagnostics.error(ErrorCode.IMMUTABLE_ASSIGNMENT, expr.span, { name });
      return null;
    };
    switch (expr.kind) {
      case 'Name': {
        const found = ctx.scopes.lookup(expr.name);
        this.bind(expr);
        const resolution = ctx.bindings.names.get(expr);
        if (!resolution) return null;
        if (resolution.kind === 'local') {
          const { local } = resolution;
          if (found && found.crossed.length > 0) {
            ctx.diagnostics.error(ErrorCode.CAPTURED_ASSIGNMENT, expr.span, { name: local.name });
            return null;
          }
          if (local.origin === 'this') {
            ctx.diagnostics.error(ErrorCode.INVALID_ASSIGNMENT_TARGET, expr.span);
            return null;
          }
          if (!local.mutable) return immutable(local.name);
          ctx.setType(expr, local.type);
          return { type: local.type, local };
        }
        if (!resolution.field.mutable && !(resolution.kind === 'field' && this.initializing(resolution.field))) {
          return immutable(resolution.field.qualifiedName);
        }
        return { type: ctx.typeOf(expr), local: null };
      }
      case 'Member': {
        if (expr.safe) break;
        const type = this.bind(expr);
        const resolution = ctx.bindings.members.get(expr);
        if (!resolution) return null;
        if (resolution.kind === 'arrayLength' || resolution.kind === 'stringLength') break;
        const viaThis = expr.object.kind === 'This' && resolution.kind === 'field' && this.initializing(resolution.field);
        if (!resolution.field.mutable && !viaThis) return immutable(resolution.field.qualifiedName);
        return { type, local: null };
      }
      case 'Index': {
        const type = this.bind(expr);
        const objectType = ctx.typeOf(expr.object);
        if (TypeSystem.isError(type)) return null;
        if (TypeSystem.isString(TypeSystem.nonNull(objectType))) break;
        return { type, local: null };
      }
      default:
        this.bind(expr);
        break;
    }
    ctx.diagnostics.error(ErrorCode.INVALID_ASSIGNMENT_TARGET, expr.span);
    return null;
  }

  /** 在所属类的构造函数中可以为 val 字段赋值 */
  private initializing(field: FieldInfo): boolean {
    const { frame } = this.ctx;
    return frame.isConstructor && frame.classInfo !== null && frame.classInfo === field.owner;
  }

  private conditional(expr: Conditional, expected: Type | null): Type {
    this.expect(expr.cond, TypeSystem.BOOL);
    const a = this.withNarrowings(this.narrowings(expr.cond, true), () => this.bind(expr.then, expected));
    const b = this.withNarrowings(this.narrowings(expr.cond, false), () => this.bind(expr.otherwise, expected));
    if (expected && TypeSystem.canCastTo(a, expected) && TypeSystem.canCastTo(b, expected)) return expected;
    const joined = TypeSystem.join(a, b);
    if (!joined) {
      this.ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.otherwise.span, { expected: TypeSystem.format(a), actual: TypeSystem.format(b) });
      return TypeSystem.ERROR;
    }
    return joined;
  }

  private arrayLiteral(expr: ArrayLiteral, expected: Type | null): Type {
    const { ctx } = this;
    const element = expected?.kind === 'array' ? expected.element : null;
    const types = expr.elements.map(e => this.bind(e, element));
    if (element && types.every(t => TypeSystem.canCastTo(t, element))) return TypeSystem.array(element);
    let joined: Type | null = null;
    for (const [i, type] of types.entries()) {
      const node = expr.elements[i];
      if (TypeSystem.isVoid(type) && node) {
        ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, node.span, { expected: 'a value', actual: 'Void' });
        return TypeSystem.ERROR;
      }
      const next: Type | null = joined ? TypeSystem.join(joined, type) : type;
      if (!next) {
        ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, node ? node.span : expr.span, {
          expected: joined ? TypeSystem.format(joined) : 'an element',
          actual: TypeSystem.format(type),
        });
        return TypeSystem.ERROR;
      }
      joined = next;
    }
    if (!joined || joined.kind === 'null') {
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: 'an element type', actual: joined ? 'null' : '[]' });
      return TypeSystem.ERROR;
    }
    return TypeSystem.array(joined);
  }

  private lambda(expr: Lambda): Type {
    const { ctx } = this;
    const outer = ctx.frame;
    const params = expr.params.map(p => {
      const type = ctx.resolver.resolveType(outer.env, p.type);
      if (!TypeSystem.isVoid(type)) return type;
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, p.span, { expected: 'a value type', actual: 'Void' });
      return TypeSystem.ERROR;
    });
    const declared = expr.returnType ? ctx.resolver.resolveType(outer.env, expr.returnType) : null;
    const info: LambdaInfo = {
      id: ctx.nextLambda(),
      node: expr,
      type: TypeSystem.fn(params, declared ?? TypeSystem.VOID),
      params: [],
      captures: [],
      enclosing: outer.method,
    };
    ctx.bindings.lambdas.set(expr, info);
    const ret = ctx.withFrame(
      {
        owner: expr,
        method: outer.method,
        classInfo: outer.classInfo,
        isStatic: outer.isStatic,
        isConstructor: false,
        returnType: declared,
        lambda: info,
        env: outer.env,
        shareScopes: true,
        thisType: null,
      },
      frame => {
        ctx.scopes.enter('lambda', info);
        try {
          expr.params.forEach((p, i) => info.params.push(ctx.defineLocal(p.name, params[i] ?? TypeSystem.ERROR, false, p, p.span)));
          if (expr.body.kind !== 'Block') {
            if (!declared) return this.bind(expr.body);
            this.expect(expr.body, declared);
            return declared;
          }
          bindBody(ctx, expr.body);
          const ret = declared ?? this.inferReturn(frame.inferredReturns, expr.span);
          if (!TypeSystem.isVoid(ret) && !TypeSystem.isError(ret) && blockCompletes(expr.body)) {
            ctx.diagnostics.error(ErrorCode.MISSING_RETURN, expr.span, { name: 'lambda', expected: TypeSystem.format(ret) });
          }
          return ret;
        } finally {
          ctx.scopes.exit();
        }
      }
    );
    info.type = TypeSystem.fn(params, ret);
    return info.type;
  }

  private inferReturn(returns: readonly Type[], span: Span): Type {
    let joined: Type = TypeSystem.VOID;
    for (const [i, type] of returns.entries()) {
      const next: Type | null = i === 0 ? type : TypeSystem.join(joined, type);
      if (!next) {
        this.ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, span, { expected: TypeSystem.format(joined), actual: TypeSystem.format(type) });
        return TypeSystem.ERROR;
      }
      joined = next;
    }
    return joined.kind === 'null' ? TypeSystem.ERROR : joined;
  }

  private cast(expr: Cast): Type {
    const { ctx } = this;
    const source = this.bind(expr.expr);
    const target = ctx.resolver.resolveType(ctx.env, expr.type);
    ctx.bindings.targets.set(expr, target);
    if (!TypeSystem.containsError(source) && !TypeSystem.canExplicitlyCast(source, target)) {
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: TypeSystem.format(target), actual: TypeSystem.format(source) });
    }
    return target;
  }

  private typeCheck(expr: TypeCheck): Type {
    const { ctx } = this;
    const source = this.bind(expr.expr);
    const target = ctx.resolver.resolveType(ctx.env, expr.type);
    if (TypeSystem.isError(target) || TypeSystem.isError(source)) return TypeSystem.BOOL;
    if (target.kind !== 'object' || target.nullable) {
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.type.span, { expected: 'a class or interface type', actual: TypeSystem.format(target) });
      return TypeSystem.BOOL;
    }
    if (!TypeSystem.canExplicitlyCast(source, target)) {
      ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: TypeSystem.format(target), actual: TypeSystem.format(source) });
      return TypeSystem.BOOL;
    }
    ctx.bindings.targets.set(expr, target);
    // 代码生成需要目标类型的类描述符
    ctx.requestType(target);
    return TypeSystem.BOOL;
  }
}

export function bindExpression(ctx: BinderContext, expr: Expression, expected: Type | null = null): Type {
  return new ExpressionBinder(ctx).bind(expr, expected);
}
