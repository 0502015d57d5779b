/**
 * @module c/bodies
 *
 * 函数定义的生成：方法、构造函数、分配函数、字段初始化、析构、静态初始化与 lambda。
 */

import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import { leadingSuperCall } from '../binder/bodies.js';
import { blockCompletes } from '../binder/flow.js';
import { methodSubstitution } from '../binder/generics.js';
import { instanceFields, substitutionOf, superTypeOf } from '../binder/members.js';
import type { FieldInfo, LambdaInfo, LocalSymbol, MethodInfo } from '../binder/model.js';
import { TypeSystem, type ObjectType, type Substitution, type Type } from '../binder/type_system.js';
import type { Block, FieldDecl, FunctionDecl, Parameter } from '../types.js';
import type { CodegenContext } from './context.js';
import { cString, cType, declare, functionHeader, isManaged, OBJECT_C } from './ctypes.js';
import { ExpressionEmitter, type LambdaSink } from './expression.js';
import { FunctionState, type BodyEnv } from './function.js';
import { captureName, classDescriptor, localName, PREFIX, staticFieldName, structName } from './names.js';
import { StatementEmitter } from './statement.js';
import type { UnitWriter } from './unit.js';

/** 方法是否带 `self` 形参（实例方法与构造函数） */
export function hasSelf(method: MethodInfo): boolean {
  return method.owner !== null && !method.isStatic;
}

/** 方法实例的 C 形参类型 */
export function parameterTypes(ctx: CodegenContext, method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): string[] {
  const sig = ctx.signature(method, ownerArgs, methodArgs);
  return [...(hasSelf(method) ? [OBJECT_C] : []), ...sig.params.map(p => cType(p))];
}

interface Param {
  readonly local: LocalSymbol;
  readonly type: Type;
}

export class BodyGenerator implements LambdaSink {
  constructor(
    private readonly ctx: CodegenContext,
    private readonly unit: UnitWriter
  ) {}

  private env(file: string, subst: Substitution): BodyEnv {
    return { ctx: this.ctx, unit: this.unit, bound: this.ctx.boundFile(file), subst };
  }

  private emitters(fn: FunctionState): { expressions: ExpressionEmitter; statements: StatementEmitter } {
    const expressions = new ExpressionEmitter(fn, this);
    return { expressions, statements: new StatementEmitter(expressions) };
  }

  private define(header: string, fn: FunctionState, prologue: readonly string[] = []): void {
    this.unit.define([`${header} {`, ...fn.hoistedDeclarations(), ...prologue, ...fn.body(), '}'].join('\n'));
  }

  private params(fn: FunctionState, decls: readonly Parameter[]): Param[] {
    return decls.map(param => {
      const local = fn.env.bound.bindings.declarations.get(param);
      if (!local) throw new InternalCompilerError(`Undeclared parameter ${param.name}`, param.span);
      return { local, type: fn.localType(local) };
    });
  }

  private thisLocal(file: string, owner: FunctionDecl | FieldDecl): LocalSymbol | null {
    return this.ctx.boundFile(file).bindings.thisLocals.get(owner) ?? null;
  }

  /**
   * 形参入口处 retain、函数帧登记释放，再生成函数体。
   * 受管形参在函数正常结束或 return 时释放。
   */
  private body(fn: FunctionState, params: readonly Param[], body: Block, emit: (statements: StatementEmitter) => void): void {
    const managed = params.filter(p => isManaged(p.type)).map(p => fn.ref(p.local));
    fn.pushFrame('function', managed);
    for (const name of managed) fn.line(`aml_retain(${name});`);
    emit(this.emitters(fn).statements);
    fn.popFrame(blockCompletes(body));
  }

  /**
   * 方法、静态方法或命名空间函数的一个实例。
   * 没有函数体的类方法由子类覆盖，直接调用时报告运行时错误。
   */
  method(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): void {
    if (method.isNative || method.isConstructor) return;
    const ctx = this.ctx;
    const name = ctx.functionName(method, ownerArgs, methodArgs);
    const sig = ctx.signature(method, ownerArgs, methodArgs);
    const subst = methodSubstitution(method, ownerArgs, methodArgs);
    const self = hasSelf(method) ? this.thisLocal(method.file, method.decl) : null;
    const fn = new FunctionState(this.env(method.file, subst), method.decl, sig.ret, self);
    const params = this.params(fn, method.decl.params);
    const header = functionHeader(sig.ret, name, [...(hasSelf(method) ? ['aml_object *self'] : []), ...params.map(p => declare(p.type, localName(p.local)))]);
    const body = method.decl.body;
    if (!body) {
      this.unit.define(`${header} {\n  aml_fail(${cString(`${method.qualifiedName} has no implementation`)});\n}`);
      return;
    }
    this.body(fn, params, body, statements => statements.visitBlock(body, fn));
    this.define(header, fn);
  }

  /**
   * 构造函数：先运行父类构造函数（显式 `super(...)` 或隐式零参数调用），
   * 再运行本类字段初始化器，最后是其余语句。`ctor` 为 null 时生成默认构造函数。
   */
  constructorFor(type: ObjectType, ctor: MethodInfo | null): void {
    const ctx = this.ctx;
    const info = ctx.classInfo(type);
    const name = ctx.ctorName(type, ctor);
    const fields = `${ctx.fieldsName(type)}(self);`;
    if (!ctor) {
      const lines = [...this.implicitSuper(type), fields].map(line => `  ${line}`);
      this.unit.define([`void ${name}(aml_object *self) {`, ...lines, '}'].join('\n'));
      return;
    }
    const body = ctor.decl.body;
    if (!body) throw new InternalCompilerError(`Constructor of ${info.qualifiedName} has no body`, ctor.decl.span);
    const subst = methodSubstitution(ctor, type.args, []);
    const fn = new FunctionState(this.env(ctor.file, subst), ctor.decl, TypeSystem.VOID, this.thisLocal(ctor.file, ctor.decl));
    const params = this.params(fn, ctor.decl.params);
    const header = functionHeader(TypeSystem.VOID, name, ['aml_object *self', ...params.map(p => declare(p.type, localName(p.local)))]);
    const superCall = leadingSuperCall(body);
    this.body(fn, params, body, statements => {
      statements.constructorBody(body, fn, superCall ? 1 : 0, () => {
        if (superCall) {
          const { expressions } = this.emitters(fn);
          fn.statement(() => expressions.superConstructor(superCall));
        } else {
          for (const line of this.implicitSuper(type)) fn.line(line);
        }
        fn.line(fields);
      });
    });
    this.define(header, fn);
  }

  private implicitSuper(type: ObjectType): string[] {
    const sup = superTypeOf(type);
    if (!sup) return [];
    return [`${this.ctx.ctorName(sup, this.ctx.implicitSuperCtor(sup))}(self);`];
  }

  /**
   * 分配并构造。mock 类运行被替换类的构造函数，再初始化自己声明的字段。
   */
  allocator(type: ObjectType, ctor: MethodInfo | null): void {
    const ctx = this.ctx;
    const info = ctx.classInfo(type);
    const struct = structName(type);
    const target = info.mockOf ? superTypeOf(type) : type;
    if (!target) throw new InternalCompilerError(`Mock ${info.qualifiedName} has no mocked class`);
    const params = ctor ? ctx.signature(ctor, target.args, []).params : [];
    const names = params.map((_, i) => `p${i}`);
    const lines = [
      `aml_object *self = aml_alloc(sizeof(${struct}), &${classDescriptor(type)}, ${ctx.destroyName(type)});`,
      `${ctx.ctorName(target, ctor)}(${['self', ...names].join(', ')});`,
      ...(info.mockOf ? [`${ctx.fieldsName(type)}(self);`] : []),
      'return self;',
    ];
    const header = functionHeader(type, ctx.newName(type, ctor), params.map((p, i) => declare(p, `p${i}`)));
    this.unit.define([`${header} {`, ...lines.map(line => `  ${line}`), '}'].join('\n'));
  }

  /** 本类声明的实例字段初始化器，按声明顺序执行 */
  fieldInitializers(type: ObjectType): void {
    const ctx = this.ctx;
    const info = ctx.classInfo(type);
    const subst = substitutionOf(type);
    const blocks: string[] = [];
    for (const field of info.fields) {
      const { init } = field.decl;
      if (!init) continue;
      const fieldType = TypeSystem.substitute(field.type, subst);
      const fn = new FunctionState(this.env(field.file, subst), field.decl, TypeSystem.VOID, this.thisLocal(field.file, field.decl));
      const { expressions } = this.emitters(fn);
      fn.pushFrame('function');
      fn.statement(() => expressions.store(ctx.fieldAccess(type, field, 'self'), fieldType, expressions.value(init, fieldType)));
      fn.popFrame();
      blocks.push('  {', ...[...fn.hoistedDeclarations(), ...fn.body()].map(line => `  ${line}`), '  }');
    }
    this.unit.define([`void ${ctx.fieldsName(type)}(aml_object *self) {`, ...(blocks.length > 0 ? blocks : ['  (void)self;']), '}'].join('\n'));
  }

  /** 释放全部受管字段（含继承字段）后归还内存 */
  destructor(type: ObjectType): void {
    const ctx = this.ctx;
    const releases = instanceFields(type)
      .filter(member => isManaged(member.type))
      .reverse()
      .map(member => `  aml_release(${ctx.fieldAccess(type, member.field, 'self')});`);
    this.unit.define([`void ${ctx.destroyName(type)}(aml_object *self) {`, ...releases, '  aml_free(self);', '}'].join('\n'));
  }

  /**
   * 翻译单元的静态初始化函数：按声明顺序初始化静态字段与全局变量。
   */
  staticInitializer(name: string, fields: readonly FieldInfo[]): void {
    const blocks: string[] = [];
    for (const field of fields) {
      const { init } = field.decl;
      if (!init) continue;
      const fn = new FunctionState(this.env(field.file, new Map()), field.decl, TypeSystem.VOID, null);
      const { expressions } = this.emitters(fn);
      fn.pushFrame('function');
      fn.statement(() => expressions.store(staticFieldName(field), field.type, expressions.value(init, field.type)));
      fn.popFrame();
      blocks.push('  {', ...[...fn.hoistedDeclarations(), ...fn.body()].map(line => `  ${line}`), '  }');
    }
    this.unit.define([`void ${name}(void) {`, ...blocks, '}'].join('\n'));
  }

  /**
   * lambda：闭包结构体保存按值捕获的变量，调用函数的第一个形参是闭包本身。
   */
  closure(info: LambdaInfo, outer: FunctionState): string {
    const ctx = this.ctx;
    const struct = this.unit.unique(`${PREFIX}lambda_${ctx.fileIndex(outer.env.bound.file.path)}_${info.id}`);
    const type = outer.subst(info.type);
    if (type.kind !== 'function') throw new InternalCompilerError('Lambda without a function type', info.node.span);
    const captures = info.captures.map(local => ({ local, type: outer.localType(local) }));
    const members = captures.map(c => `  ${declare(c.type, captureName(c.local))};`);
    this.unit.declare([`typedef struct ${struct} {`, '  aml_closure base;', ...members, `} ${struct};`].join('\n'));

    const fn = new FunctionState(outer.env, info.node, type.ret, outer.self, { struct, captures: new Set(info.captures) });
    const params = info.params.map(local => ({ local, type: fn.localType(local) }));
    const invoke = functionHeader(type.ret, `${struct}__invoke`, ['aml_object *closure', ...params.map(p => declare(p.type, localName(p.local)))]);
    const destroy = `void ${struct}__destroy(aml_object *self)`;
    this.unit.declare(`static ${invoke};`);
    this.unit.declare(`static ${destroy};`);

    const body = info.node.body;
    if (body.kind === 'Block') {
      this.body(fn, params, body, statements => statements.visitBlock(body, fn));
    } else {
      const managed = params.filter(p => isManaged(p.type)).map(p => localName(p.local));
      fn.pushFrame('function', managed);
      for (const name of managed) fn.line(`aml_retain(${name});`);
      const { statements } = this.emitters(fn);
      if (TypeSystem.isVoid(type.ret)) {
        statements.visitStatement({ kind: 'ExprStmt', expr: body, span: body.span }, fn);
        fn.popFrame();
      } else {
        statements.visitStatement({ kind: 'Return', expr: body, span: body.span }, fn);
        fn.popFrame(false);
      }
    }
    this.define(`static ${invoke}`, fn, ['  (void)closure;']);

    const releases = captures
      .filter(c => isManaged(c.type))
      .map(c => `  aml_release(((${struct} *)self)->${captureName(c.local)});`);
    this.unit.define([`static ${destroy} {`, ...releases, '  aml_free(self);', '}'].join('\n'));
    return struct;
  }
}
