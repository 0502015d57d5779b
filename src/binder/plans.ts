/**
 * @module binder/plans
 *
 * 字符串化与相等比较的降级方案。方案只依赖操作数类型，
 * 绑定器为非泛型代码预先计算，代码生成对泛型实例在代入实参后重新计算。
 */

import { findEquals, findToString } from './members.js';
import type { EqualityPlan, StringifyPlan } from './model.js';
import { TypeSystem, type PrimitiveType, type Type } from './type_system.js';

/** 可参与算术的原始类型（数值类型与 Char） */
export function isArithmetic(type: Type): type is PrimitiveType {
  return TypeSystem.isNumeric(type) || TypeSystem.isPrimitive(type, 'Char');
}

export function stringifyPlan(type: Type): StringifyPlan {
  switch (type.kind) {
    case 'null':
      return { kind: 'string', nullable: true };
    case 'primitive':
      if (type.name === 'String') return { kind: 'string', nullable: type.nullable };
      return { kind: 'primitive', type };
    case 'object': {
      const found = findToString(TypeSystem.nonNullObject(type));
      return found ? { kind: 'method', method: found.method, receiver: found.owner } : { kind: 'dynamic' };
    }
    default:
      return { kind: 'dynamic' };
  }
}

/**
 * `==` / `!=` 的比较方案；两侧类型不可比较时返回 null。
 */
export function equalityPlan(left: Type, right: Type): EqualityPlan | null {
  if (left.kind === 'error' || right.kind === 'error') return { kind: 'identity' };
  if (right.kind === 'null') return left.kind === 'null' || TypeSystem.isNullable(left) ? { kind: 'nullCheck', side: 'left' } : null;
  if (left.kind === 'null') return TypeSystem.isNullable(right) ? { kind: 'nullCheck', side: 'right' } : null;
  if (TypeSystem.isVoid(left) || TypeSystem.isVoid(right)) return null;

  const a = TypeSystem.nonNull(left);
  const b = TypeSystem.nonNull(right);
  const nullable = TypeSystem.isNullable(left) || TypeSystem.isNullable(right);

  if (TypeSystem.isString(a) || TypeSystem.isString(b)) {
    return TypeSystem.isString(a) && TypeSystem.isString(b) ? { kind: 'string' } : null;
  }
  if (a.kind === 'primitive' || b.kind === 'primitive') {
    if (a.kind !== 'primitive' || b.kind !== 'primitive') return null;
    let operand: PrimitiveType | null = null;
    if (a.name === 'Bool' || b.name === 'Bool') {
      operand = a.name === b.name ? a : null;
    } else if (a.name === 'Char' && b.name === 'Char') {
      operand = a;
    } else if (isArithmetic(a) && isArithmetic(b)) {
      operand = TypeSystem.numericResult(a, b);
    }
    if (!operand) return null;
    return nullable ? { kind: 'nullablePrimitive', operand } : { kind: 'primitive', operand };
  }
  if (a.kind === 'object' && b.kind === 'object') {
    if (!TypeSystem.canExplicitlyCast(a, b)) return null;
    const found = findEquals(a, b);
    return found ? { kind: 'method', method: found.method, receiver: found.owner } : { kind: 'identity' };
  }
  if (a.kind === 'param' || b.kind === 'param') {
    return TypeSystem.isManaged(a) && TypeSystem.isManaged(b) ? { kind: 'identity' } : null;
  }
  return TypeSystem.canCastTo(a, b) || TypeSystem.canCastTo(b, a) ? { kind: 'identity' } : null;
}
