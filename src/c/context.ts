/**
 * @module c/context
 *
 * 代码生成的全程序上下文：已绑定文件的索引、实例化注册表，
 * 以及由声明模型推导 C 名字与签名的工具方法。生成过程中只读。
 */

import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import { methodSubstitution, type InstantiationRegistry } from '../binder/generics.js';
import { classChain, findOwner, lookupConstructors, substitutionOf } from '../binder/members.js';
import type { BoundFile, ClassInfo, FieldInfo, MethodInfo, ProgramModel } from '../binder/model.js';
import { TypeSystem, type ObjectType, type Substitution, type Type } from '../binder/type_system.js';
import { ctorSuffix, fieldMember, functionName, structName } from './names.js';

export interface CodegenInput {
  readonly program: ProgramModel;
  /** 按编译顺序排列（决定静态初始化顺序） */
  readonly files: readonly BoundFile[];
  readonly registry: InstantiationRegistry;
}

export interface Signature {
  readonly params: readonly Type[];
  readonly ret: Type;
}

export function substituteObject(type: ObjectType, subst: Substitution): ObjectType {
  const result = TypeSystem.substitute(type, subst);
  if (result.kind !== 'object') throw new InternalCompilerError(`Object type became ${TypeSystem.format(result)}`);
  return result;
}

export class CodegenContext {
  readonly program: ProgramModel;
  readonly files: readonly BoundFile[];
  readonly registry: InstantiationRegistry;

  private readonly byPath = new Map<string, BoundFile>();
  private readonly indexes = new Map<string, number>();
  private readonly overloads = new Map<MethodInfo, number>();

  constructor(input: CodegenInput) {
    this.program = input.program;
    this.files = input.files;
    this.registry = input.registry;
    input.files.forEach((bound, i) => {
      this.byPath.set(bound.file.path, bound);
      this.indexes.set(bound.file.path, i);
    });
    for (const group of input.program.functions.values()) {
      if (group.length > 1) group.forEach((method, i) => this.overloads.set(method, i));
    }
  }

  boundFile(path: string): BoundFile {
    const bound = this.byPath.get(path);
    if (!bound) throw new InternalCompilerError(`No bound file for ${path}`);
    return bound;
  }

  fileIndex(path: string): number {
    const index = this.indexes.get(path);
    if (index === undefined) throw new InternalCompilerError(`No bound file for ${path}`);
    return index;
  }

  functionName(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): string {
    return functionName(method, ownerArgs, methodArgs, this.overloads.get(method) ?? null);
  }

  /** 构造函数体：初始化已分配的对象 */
  ctorName(type: ObjectType, ctor: MethodInfo | null): string {
    const info = this.classInfo(type);
    return `${structName(type)}__ctor${ctorSuffix(info, ctor)}`;
  }

  /**
   * 分配并构造。mock 类没有自己的构造函数，沿用被替换类的构造函数后缀。
   */
  newName(type: ObjectType, ctor: MethodInfo | null): string {
    const info = this.classInfo(type);
    return `${structName(type)}__new${ctorSuffix(info.mockOf ?? info, ctor)}`;
  }

  fieldsName(type: ObjectType): string {
    return `${structName(type)}__fields`;
  }

  destroyName(type: ObjectType): string {
    return `${structName(type)}__destroy`;
  }

  classInfo(type: ObjectType): ClassInfo {
    if (type.info.kind !== 'class') throw new InternalCompilerError(`${type.info.qualifiedName} is not a class`);
    return type.info;
  }

  /** 字段在结构体中的成员名（按声明类在继承链中的深度区分同名字段） */
  fieldMember(field: FieldInfo): string {
    const owner = field.owner;
    if (!owner) throw new InternalCompilerError(`Global ${field.qualifiedName} has no struct member`);
    let depth = 0;
    for (let cur = owner.superclass; cur; cur = cur.info.kind === 'class' ? cur.info.superclass : null) depth++;
    return fieldMember(field, depth);
  }

  /** `recv` 上字段的左值表达式 */
  fieldAccess(receiver: ObjectType, field: FieldInfo, recv: string): string {
    const owner = classChain(receiver).find(o => o.info === field.owner);
    if (!owner) throw new InternalCompilerError(`Field ${field.qualifiedName} not found on ${TypeSystem.format(receiver)}`);
    return `((${structName(owner)} *)${recv})->${this.fieldMember(field)}`;
  }

  /** 字段在接收者视角下的类型 */
  fieldType(receiver: ObjectType, field: FieldInfo): Type {
    const owner = classChain(receiver).find(o => o.info === field.owner);
    if (!owner) throw new InternalCompilerError(`Field ${field.qualifiedName} not found on ${TypeSystem.format(receiver)}`);
    return TypeSystem.substitute(field.type, substitutionOf(owner));
  }

  /** 方法声明所在类型在接收者视角下的实例 */
  ownerOf(receiver: ObjectType, method: MethodInfo): ObjectType {
    const owner = findOwner(TypeSystem.nonNullObject(receiver), method);
    if (!owner) throw new InternalCompilerError(`Method ${method.qualifiedName} not found on ${TypeSystem.format(receiver)}`);
    return owner;
  }

  /** 代入所属类型实参与方法实参后的签名 */
  signature(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): Signature {
    const subst = methodSubstitution(method, ownerArgs, methodArgs);
    return {
      params: method.params.map(p => TypeSystem.substitute(p, subst)),
      ret: TypeSystem.substitute(method.ret, subst),
    };
  }

  /** 父类中被隐式 `super()` 调用的构造函数 */
  implicitSuperCtor(sup: ObjectType): MethodInfo | null {
    return lookupConstructors(sup).find(c => c.params.length === 0)?.method ?? null;
  }

  /** `System.Exception(message)` 的分配函数名，用于运行时错误 */
  exceptionFactory(): string | null {
    const info = this.program.exceptionClass;
    if (!info) return null;
    const ctor = info.constructors.find(c => c.params.length === 1 && c.params[0] !== undefined && TypeSystem.isString(c.params[0]) && !TypeSystem.isNullable(c.params[0]));
    if (!ctor) return null;
    return this.newName(TypeSystem.object(info), ctor);
  }
}
