/**
 * @module c/names
 *
 * C 标识符改编。
 *
 * 源标识符中的 `_` 写作 `_1`、`$` 写作 `_2`，因此单个 `_` 后接字母时总是分隔符，
 * `_` 后接数字时总是转义或结构标记：
 * - `_3` / `_5` / `_4`：泛型实参列表的开始、分隔、结束
 * - `_6`：可空后缀；`_7`：数组；`_8` ... `_9`：函数类型的形参与返回值
 * - `_0`：重载或实例序号
 *
 * 用户符号统一加 `am_` 前缀，避免与 C 关键字和 C 库名冲突。
 */

import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import type { ClassInfo, FieldInfo, LocalSymbol, MethodInfo, TypeInfo } from '../binder/model.js';
import { TypeSystem, type ObjectType, type Type } from '../binder/type_system.js';

export const PREFIX = 'am_';

export function escapeIdent(name: string): string {
  return name.replace(/_/g, '_1').replace(/\$/g, '_2');
}

export function mangleQualified(qualifiedName: string): string {
  return qualifiedName.split('.').map(escapeIdent).join('_');
}

/** 具体类型的改编码；含泛型形参或错误类型时属于编译器缺陷 */
export function typeCode(type: Type): string {
  const q = TypeSystem.isNullable(type) && type.kind !== 'null' ? '_6' : '';
  switch (type.kind) {
    case 'primitive':
      return `${type.name}${q}`;
    case 'object':
      return `${mangleQualified(type.info.qualifiedName)}${argsCode(type.args)}${q}`;
    case 'array':
      return `_7${typeCode(type.element)}${q}`;
    case 'function':
      return `_8${type.params.map(typeCode).join('_5')}_9${typeCode(type.ret)}_4${q}`;
    case 'param':
    case 'null':
    case 'error':
      throw new InternalCompilerError(`Type ${TypeSystem.format(type)} reached code generation`);
  }
}

export function argsCode(args: readonly Type[]): string {
  return args.length === 0 ? '' : `_3${args.map(typeCode).join('_5')}_4`;
}

/** 类或接口实例的结构体（或描述符）基名 */
export function structName(type: ObjectType): string {
  return `${PREFIX}${typeCode(TypeSystem.nonNullObject(type))}`;
}

export function classDescriptor(type: ObjectType): string {
  return `${structName(type)}__class`;
}

export function interfaceDescriptor(type: ObjectType): string {
  return `${structName(type)}__iface`;
}

function overloadSuffix(method: MethodInfo): string {
  const owner = method.owner;
  const group: readonly MethodInfo[] =
    owner === null ? [] : method.isConstructor && owner.kind === 'class' ? owner.constructors : siblings(owner, method.name);
  if (group.length <= 1) return '';
  return `_0${group.indexOf(method)}`;
}

function siblings(owner: TypeInfo, name: string): readonly MethodInfo[] {
  if (owner.kind === 'class') return owner.methods.get(name) ?? [];
  return owner.methods.filter(m => m.name === name);
}

/**
 * 方法、构造函数或命名空间函数的 C 名。
 * 命名空间函数的重载在 `overloadIndex` 中给出（同名函数组内的位置）。
 */
export function functionName(
  method: MethodInfo,
  ownerArgs: readonly Type[],
  methodArgs: readonly Type[],
  overloadIndex: number | null = null
): string {
  if (method.isNative) return nativeName(method, ownerArgs);
  const base =
    method.owner === null
      ? `${PREFIX}${mangleQualified(method.qualifiedName)}`
      : `${PREFIX}${mangleQualified(method.owner.qualifiedName)}${argsCode(ownerArgs)}__${method.isConstructor ? 'ctor' : escapeIdent(method.name)}`;
  const overload = method.owner === null ? (overloadIndex === null ? '' : `_0${overloadIndex}`) : overloadSuffix(method);
  return `${base}${overload}${argsCode(methodArgs)}`;
}

export function nativeName(method: MethodInfo, ownerArgs: readonly Type[]): string {
  if (method.owner === null) return `aml_native_${escapeIdent(method.name)}`;
  return `aml_native_${mangleQualified(method.owner.qualifiedName)}${argsCode(ownerArgs)}__${escapeIdent(method.name)}`;
}

/** 构造函数在同类构造函数中的后缀；无显式构造函数时为默认构造 */
export function ctorSuffix(info: ClassInfo, ctor: MethodInfo | null): string {
  if (!ctor || info.constructors.length <= 1) return '';
  return `_0${info.constructors.indexOf(ctor)}`;
}

export function fieldMember(field: FieldInfo, depth: number): string {
  return `f${depth}_${escapeIdent(field.name)}`;
}

export function staticFieldName(field: FieldInfo): string {
  if (field.owner === null) return `${PREFIX}${mangleQualified(field.qualifiedName)}__g`;
  return `${PREFIX}${mangleQualified(field.owner.qualifiedName)}__s_${escapeIdent(field.name)}`;
}

export function localName(local: LocalSymbol): string {
  return `l_${escapeIdent(local.name)}_${local.id}`;
}

export function captureName(local: LocalSymbol): string {
  return local.origin === 'this' ? 'c_self' : `c_${escapeIdent(local.name)}_${local.id}`;
}

export function unitInitName(index: number): string {
  return `${PREFIX}unit_${index}__init`;
}

/** 源文件路径对应的 C 文件名 */
export function unitFileName(index: number, path: string): string {
  const base = path.split(/[\\/]/).pop() ?? 'unit';
  const stem = base.replace(/\.[^.]*$/, '').replace(/[^A-Za-z0-9]/g, '_');
  return `am_unit_${index}_${stem}.c`;
}
