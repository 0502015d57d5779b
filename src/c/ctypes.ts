/**
 * @module c/ctypes
 *
 * 语义类型到 C 类型的映射与字面量编码。
 */

import type { PrimitiveName } from '../config/semantic.js';
import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import { TypeSystem, type PrimitiveType, type Type } from '../binder/type_system.js';

const PRIMITIVE_C: Readonly<Record<PrimitiveName, string>> = {
  Byte: 'int8_t',
  Short: 'int16_t',
  Int: 'int32_t',
  Long: 'int64_t',
  Float: 'float',
  Double: 'double',
  Bool: 'bool',
  Char: 'uint16_t',
  String: 'aml_object *',
  Void: 'void',
};

/** 与整数类型同宽的无符号类型，用于回绕运算 */
const UNSIGNED_C: Partial<Readonly<Record<PrimitiveName, string>>> = {
  Int: 'uint32_t',
  Long: 'uint64_t',
};

export const OBJECT_C = 'aml_object *';

function unusable(type: Type): InternalCompilerError {
  return new InternalCompilerError(`Type ${TypeSystem.format(type)} reached code generation`);
}

export function cType(type: Type): string {
  switch (type.kind) {
    case 'primitive':
      if (TypeSystem.isNullablePrimitive(type)) return `aml_n_${type.name}`;
      return PRIMITIVE_C[type.name];
    case 'object':
    case 'array':
    case 'function':
    case 'null':
      return OBJECT_C;
    case 'param':
    case 'error':
      throw unusable(type);
  }
}

/** 非空原始类型的 C 类型 */
export function baseCType(type: PrimitiveType): string {
  return PRIMITIVE_C[type.name];
}

export function unsignedCType(type: PrimitiveType): string | null {
  return UNSIGNED_C[type.name] ?? null;
}

/** 按类型声明变量：`int32_t x` / `aml_object *x` */
export function declare(type: Type, name: string): string {
  const c = cType(type);
  return c.endsWith('*') ? `${c}${name}` : `${c} ${name}`;
}

export function isManaged(type: Type): boolean {
  if (type.kind === 'param' || type.kind === 'error') throw unusable(type);
  return TypeSystem.isManaged(type);
}

/** 变量的零值：空引用、空的可空原始值或 0 */
export function zeroValue(type: Type): string {
  if (TypeSystem.isNullablePrimitive(type)) return `AML_NONE(${type.name})`;
  if (isManaged(type)) return 'NULL';
  if (TypeSystem.isPrimitive(type, 'Bool')) return 'false';
  return '0';
}

/** 函数指针类型：`RET (*)(aml_object *, P...)` */
export function functionPointer(ret: Type, params: readonly string[]): string {
  const r = TypeSystem.isVoid(ret) ? 'void' : cType(ret);
  return `${r} (*)(${params.length === 0 ? 'void' : params.join(', ')})`;
}

/** 函数声明头：`RET name(P...)`；`params` 可以带名也可以不带名 */
export function functionHeader(ret: Type, name: string, params: readonly string[]): string {
  const r = TypeSystem.isVoid(ret) ? 'void' : cType(ret);
  const list = params.length === 0 ? 'void' : params.join(', ');
  return r.endsWith('*') ? `${r}${name}(${list})` : `${r} ${name}(${list})`;
}

export function intLiteral(value: number, name: PrimitiveName): string {
  switch (name) {
    case 'Byte':
      return `((int8_t)${value})`;
    case 'Short':
      return `((int16_t)${value})`;
    case 'Char':
      return `((uint16_t)${value})`;
    default:
      if (value === -2147483648) return '((int32_t)(-2147483647 - 1))';
      return value < 0 ? `((int32_t)${value})` : `${value}`;
  }
}

const LONG_MIN = -(2n ** 63n);

export function longLiteral(value: bigint): string {
  if (value === LONG_MIN) return '(-INT64_C(9223372036854775807) - 1)';
  if (value >= 2n ** 63n) return `((int64_t)UINT64_C(${value.toString()}))`;
  return `INT64_C(${value.toString()})`;
}

export function floatLiteral(value: number, precision: 'float' | 'double'): string {
  let text = Number.isFinite(value) ? String(value) : value > 0 ? 'HUGE_VAL' : '-HUGE_VAL';
  if (Number.isFinite(value) && !/[.eE]/.test(text)) text = `${text}.0`;
  return precision === 'float' ? (Number.isFinite(value) ? `${text}f` : `((float)${text})`) : text;
}

/** UTF-16 代码单元，C 数组初始化列表 */
export function utf16Units(text: string): number[] {
  const units: number[] = [];
  for (let i = 0; i < text.length; i++) units.push(text.charCodeAt(i));
  return units;
}

/** 生成注释或字符串中的可读片段（去掉会结束注释的字符） */
export function commentText(text: string): string {
  return text.replace(/\*\//g, '* /').replace(/[\r\n]+/g, ' ');
}

/** C 字符串字面量（ASCII 以外按八进制转义） */
export function cString(text: string): string {
  let out = '"';
  for (const ch of Buffer.from(text, 'utf8')) {
    if (ch === 0x22 || ch === 0x5c) out += `\\${String.fromCharCode(ch)}`;
    else if (ch >= 0x20 && ch < 0x7f && ch !== 0x3f) out += String.fromCharCode(ch);
    else out += `\\${ch.toString(8).padStart(3, '0')}`;
  }
  return `${out}"`;
}
