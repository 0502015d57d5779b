/**
 * @module c/emitter
 *
 * 整个程序的 C 输出：
 * - `aml_program.h`：全部结构体、类与接口描述符、函数原型与静态变量声明
 * - 每个源文件一个翻译单元（非泛型类、命名空间函数、静态变量及其初始化）
 * - `aml_generics.c`：泛型类、接口与函数的具体实例
 * - `aml_program.c`：按文件顺序运行各单元静态初始化的 `aml_static_init`
 * - `aml_main.c` / `aml_tests.c`：程序入口与测试入口（二者择一链接）
 */

import type { ClassInstance, InterfaceInstance } from '../binder/generics.js';
import { allInterfaces, findImplementation, findToString, instanceFields, superTypeOf, vtableOf } from '../binder/members.js';
import type { BoundFile, ClassInfo, FieldInfo, MethodInfo } from '../binder/model.js';
import { TypeSystem, type ObjectType, type Type } from '../binder/type_system.js';
import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import { BodyGenerator, parameterTypes } from './bodies.js';
import { CodegenContext, type CodegenInput } from './context.js';
import { cString, cType, declare, functionHeader } from './ctypes.js';
import { classDescriptor, interfaceDescriptor, staticFieldName, structName, unitFileName, unitInitName } from './names.js';
import { UnitWriter, type GeneratedUnit } from './unit.js';

export interface CodegenOptions {
  /** 生成调用全部测试函数的 `aml_tests.c` */
  readonly emitTestRunner: boolean;
}

export interface CodegenFailure {
  readonly unit: string;
  /** 对应的源文件；程序级单元为 null */
  readonly file: string | null;
  readonly error: InternalCompilerError;
}

export interface CodegenResult {
  readonly units: GeneratedUnit[];
  readonly failures: CodegenFailure[];
}

export const HEADER_NAME = 'aml_program.h';
const BANNER = '/* Generated by amlang-c. Do not edit. */';
const PREAMBLE = [BANNER, `#include "${HEADER_NAME}"`];

function byPosition(a: FieldInfo, b: FieldInfo): number {
  const x = a.decl.span.start;
  const y = b.decl.span.start;
  return x.line - y.line || x.col - y.col;
}

export class ProgramEmitter {
  private readonly ctx: CodegenContext;

  constructor(
    input: CodegenInput,
    private readonly options: CodegenOptions
  ) {
    this.ctx = new CodegenContext(input);
  }

  /**
   * 生成全部翻译单元。某个单元触发 {@link InternalCompilerError} 时只放弃该单元，
   * 其余单元照常生成，失败记录在结果中。
   */
  generate(): CodegenResult {
    const units: GeneratedUnit[] = [];
    const failures: CodegenFailure[] = [];
    const run = (name: string, file: string | null, build: () => GeneratedUnit | null): void => {
      try {
        const unit = build();
        if (unit) units.push(unit);
      } catch (error) {
        if (!(error instanceof InternalCompilerError)) throw error;
        failures.push({ unit: name, file, error });
      }
    };
    run(HEADER_NAME, null, () => this.header());
    this.ctx.files.forEach((bound, i) => run(unitFileName(i, bound.file.path), bound.file.path, () => this.fileUnit(bound, i)));
    run('aml_generics.c', null, () => this.genericsUnit());
    run('aml_program.c', null, () => this.programUnit());
    run('aml_main.c', null, () => this.mainUnit());
    if (this.options.emitTestRunner) run('aml_tests.c', null, () => this.testsUnit());
    return { units, failures };
  }

  // ----------------------------------------------------------
  // 程序范围的查询
  // ----------------------------------------------------------

  private classInstances(): ClassInstance[] {
    return [...this.ctx.registry.classes.values()];
  }

  private interfaceInstances(): InterfaceInstance[] {
    return [...this.ctx.registry.interfaces.values()];
  }

  /** 全部类声明（含 mock 类） */
  private classInfos(): ClassInfo[] {
    return [...this.ctx.program.classes, ...this.ctx.files.flatMap(bound => bound.mockClasses)];
  }

  private staticMethods(info: ClassInfo): MethodInfo[] {
    return [...info.methods.values()].flat().filter(m => m.isStatic && m.typeParams.length === 0);
  }

  private instanceMethods(info: ClassInfo): MethodInfo[] {
    return [...info.methods.values()].flat().filter(m => !m.isStatic && m.typeParams.length === 0);
  }

  private namespaceFunctions(): MethodInfo[] {
    return [...this.ctx.program.functions.values()].flat().filter(m => m.typeParams.length === 0);
  }

  /** 文件中声明的静态字段与全局变量，按声明顺序 */
  private staticsOf(path: string): FieldInfo[] {
    const fields = [
      ...this.ctx.program.classes.filter(info => info.file === path).flatMap(info => info.staticFields),
      ...this.ctx.program.globalOrder.filter(field => field.file === path),
    ];
    return fields.sort(byPosition);
  }

  private allStatics(): FieldInfo[] {
    return [...this.ctx.program.classes.flatMap(info => info.staticFields), ...this.ctx.program.globalOrder];
  }

  /** 构造函数列表；没有显式构造函数时为默认构造（null） */
  private constructorsOf(info: ClassInfo): Array<MethodInfo | null> {
    return info.constructors.length > 0 ? info.constructors : [null];
  }

  /** `new` 可用的构造函数；mock 类沿用被替换类的构造函数 */
  private allocatorsOf(info: ClassInfo): Array<MethodInfo | null> {
    return this.constructorsOf(info.mockOf ?? info);
  }

  private mainFunction(): MethodInfo | null {
    return this.namespaceFunctions().find(m => m.name === 'main' && m.owner === null && !m.isTest && m.params.length === 0) ?? null;
  }

  // ----------------------------------------------------------
  // 头文件
  // ----------------------------------------------------------

  private prototype(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): string {
    const { ctx } = this;
    const sig = ctx.signature(method, ownerArgs, methodArgs);
    return `${functionHeader(sig.ret, ctx.functionName(method, ownerArgs, methodArgs), parameterTypes(ctx, method, ownerArgs, methodArgs))};`;
  }

  private struct(type: ObjectType): string {
    const members = instanceFields(type).map(member => `  ${declare(member.type, this.ctx.fieldMember(member.field))};`);
    const name = structName(type);
    return [`typedef struct ${name} {`, '  aml_object header;', ...members, `} ${name};`].join('\n');
  }

  private classPrototypes(type: ObjectType): string[] {
    const { ctx } = this;
    const info = ctx.classInfo(type);
    const lines = this.instanceMethods(info).map(m => this.prototype(m, type.args, []));
    if (!info.mockOf) {
      for (const ctor of this.constructorsOf(info)) {
        const params = ctor ? ctx.signature(ctor, type.args, []).params : [];
        lines.push(`${functionHeader(TypeSystem.VOID, ctx.ctorName(type, ctor), ['aml_object *', ...params.map(p => cType(p))])};`);
      }
    }
    const target = info.mockOf ? superTypeOf(type) : type;
    if (!target) throw new InternalCompilerError(`Mock ${info.qualifiedName} has no mocked class`);
    for (const ctor of this.allocatorsOf(info)) {
      const params = ctor ? ctx.signature(ctor, target.args, []).params : [];
      lines.push(`${functionHeader(type, ctx.newName(type, ctor), params.map(p => cType(p)))};`);
    }
    lines.push(`void ${ctx.fieldsName(type)}(aml_object *self);`, `void ${ctx.destroyName(type)}(aml_object *self);`);
    return lines;
  }

  private header(): GeneratedUnit {
    const classes = this.classInstances();
    const structs = classes.map(c => this.struct(c.type));
    const descriptors = [
      ...classes.map(c => `extern const aml_class ${classDescriptor(c.type)};`),
      ...this.interfaceInstances().map(i => `extern const aml_interface ${interfaceDescriptor(i.type)};`),
    ];
    const statics = this.allStatics().map(field => `extern ${declare(field.type, staticFieldName(field))};`);
    const prototypes = new Set<string>();
    const add = (line: string): void => {
      prototypes.add(line);
    };
    for (const c of classes) this.classPrototypes(c.type).forEach(add);
    for (const info of this.classInfos()) this.staticMethods(info).forEach(m => add(this.prototype(m, [], [])));
    for (const m of this.namespaceFunctions()) add(this.prototype(m, [], []));
    for (const f of this.ctx.registry.functions.values()) add(this.prototype(f.method, f.ownerArgs, f.methodArgs));
    this.ctx.files.forEach((_, i) => add(`void ${unitInitName(i)}(void);`));
    add('void aml_static_init(void);');

    const sections = [
      [BANNER, '#ifndef AML_PROGRAM_H', '#define AML_PROGRAM_H', '', '#include "aml_runtime.h"'].join('\n'),
      structs.join('\n\n'),
      descriptors.join('\n'),
      statics.join('\n'),
      [...prototypes].join('\n'),
      '#endif',
    ];
    return { name: HEADER_NAME, content: `${sections.filter(s => s.length > 0).join('\n\n')}\n` };
  }

  // ----------------------------------------------------------
  // 类与接口的数据
  // ----------------------------------------------------------

  private emitClass(type: ObjectType, bodies: BodyGenerator, unit: UnitWriter): void {
    const info = this.ctx.classInfo(type);
    for (const method of this.instanceMethods(info)) bodies.method(method, type.args, []);
    if (!info.mockOf) {
      for (const ctor of this.constructorsOf(info)) bodies.constructorFor(type, ctor);
    }
    for (const ctor of this.allocatorsOf(info)) bodies.allocator(type, ctor);
    bodies.fieldInitializers(type);
    bodies.destructor(type);
    this.classData(type, unit);
  }

  /** 虚表、接口分派表与类描述符 */
  private classData(type: ObjectType, unit: UnitWriter): void {
    const { ctx } = this;
    const struct = structName(type);
    const vtable = vtableOf(type).map(c => `(aml_fn)${ctx.functionName(c.method, c.owner.args, [])}`);
    if (vtable.length > 0) unit.define(`static const aml_fn ${struct}__vtable[] = {\n  ${vtable.join(',\n  ')},\n};`);

    const interfaces = allInterfaces(type);
    const itables = interfaces.map((iface, i) => {
      if (iface.info.kind !== 'interface') throw new InternalCompilerError(`${iface.info.qualifiedName} is not an interface`);
      const entries = iface.info.methods.map(method => {
        if (method.typeParams.length > 0) return 'NULL';
        const impl = findImplementation(type, method, iface);
        if (!impl) throw new InternalCompilerError(`${TypeSystem.format(type)} does not implement ${method.qualifiedName}`);
        return `(aml_fn)${ctx.functionName(impl.method, impl.owner.args, [])}`;
      });
      if (entries.length === 0) return `{&${interfaceDescriptor(iface)}, NULL}`;
      unit.define(`static const aml_fn ${struct}__itable_${i}[] = {\n  ${entries.join(',\n  ')},\n};`);
      return `{&${interfaceDescriptor(iface)}, ${struct}__itable_${i}}`;
    });
    if (itables.length > 0) unit.define(`static const aml_itable ${struct}__itables[] = {\n  ${itables.join(',\n  ')},\n};`);

    const sup = superTypeOf(type);
    const toString = findToString(type);
    const fields = [
      cString(TypeSystem.format(type)),
      sup ? `&${classDescriptor(sup)}` : 'NULL',
      vtable.length > 0 ? `${struct}__vtable` : 'NULL',
      String(itables.length),
      itables.length > 0 ? `${struct}__itables` : 'NULL',
      toString ? `(aml_to_string_fn)${ctx.functionName(toString.method, toString.owner.args, [])}` : 'NULL',
    ];
    unit.define(`const aml_class ${classDescriptor(type)} = {${fields.join(', ')}};`);
  }

  private interfaceData(type: ObjectType, unit: UnitWriter): void {
    unit.define(`const aml_interface ${interfaceDescriptor(type)} = {${cString(TypeSystem.format(type))}};`);
  }

  // ----------------------------------------------------------
  // 翻译单元
  // ----------------------------------------------------------

  private fileUnit(bound: BoundFile, index: number): GeneratedUnit {
    const { ctx } = this;
    const path = bound.file.path;
    const unit = new UnitWriter(unitFileName(index, path), String(index));
    const bodies = new BodyGenerator(ctx, unit);
    const statics = this.staticsOf(path);
    for (const field of statics) unit.declare(`${declare(field.type, staticFieldName(field))};`);

    for (const iface of this.interfaceInstances()) {
      if (iface.args.length === 0 && iface.info.file === path) this.interfaceData(iface.type, unit);
    }
    for (const c of this.classInstances()) {
      if (c.args.length === 0 && c.info.file === path) this.emitClass(c.type, bodies, unit);
    }
    for (const info of this.classInfos()) {
      if (info.file !== path) continue;
      for (const method of this.staticMethods(info)) bodies.method(method, [], []);
    }
    for (const method of this.namespaceFunctions()) {
      if (method.file === path) bodies.method(method, [], []);
    }
    bodies.staticInitializer(unitInitName(index), statics);
    return unit.render(PREAMBLE);
  }

  private genericsUnit(): GeneratedUnit {
    const unit = new UnitWriter('aml_generics.c', 'g');
    const bodies = new BodyGenerator(this.ctx, unit);
    for (const iface of this.interfaceInstances()) {
      if (iface.args.length > 0) this.interfaceData(iface.type, unit);
    }
    for (const c of this.classInstances()) {
      if (c.args.length > 0) this.emitClass(c.type, bodies, unit);
    }
    for (const f of this.ctx.registry.functions.values()) bodies.method(f.method, f.ownerArgs, f.methodArgs);
    return unit.render(PREAMBLE);
  }

  private programUnit(): GeneratedUnit {
    const factory = this.ctx.exceptionFactory();
    const body = [
      '  if (aml_initialized) return;',
      '  aml_initialized = true;',
      ...(factory ? [`  aml_exception_factory = ${factory};`] : []),
      ...this.ctx.files.map((_, i) => `  ${unitInitName(i)}();`),
    ];
    const content = [...PREAMBLE, '', 'static bool aml_initialized = false;', '', 'void aml_static_init(void) {', ...body, '}'].join('\n');
    return { name: 'aml_program.c', content: `${content}\n` };
  }

  private mainUnit(): GeneratedUnit | null {
    const main = this.mainFunction();
    if (!main) return null;
    const call = `${this.ctx.functionName(main, [], [])}()`;
    const run = TypeSystem.isPrimitive(main.ret, 'Int') && !main.ret.nullable ? [`  return (int)${call};`] : [`  ${call};`, '  return 0;'];
    const content = [...PREAMBLE, '', 'int main(void) {', '  aml_static_init();', ...run, '}'].join('\n');
    return { name: 'aml_main.c', content: `${content}\n` };
  }

  private testsUnit(): GeneratedUnit {
    const runs = this.ctx.files
      .flatMap(bound => bound.tests)
      .map(test => `  if (!aml_run_test(${cString(test.qualifiedName)}, ${this.ctx.functionName(test, [], [])})) failed++;`);
    const content = [
      ...PREAMBLE,
      '',
      'int main(void) {',
      '  int failed = 0;',
      '  aml_static_init();',
      ...runs,
      '  return failed == 0 ? 0 : 1;',
      '}',
    ].join('\n');
    return { name: 'aml_tests.c', content: `${content}\n` };
  }
}
