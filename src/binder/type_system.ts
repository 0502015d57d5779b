/**
 * @module binder/type_system
 *
 * 绑定后的语义类型与类型运算。
 *
 * 类型是带标签的联合：原始类型、对象类型（类或接口 + 泛型实参）、数组、函数、
 * 泛型形参，以及 `null` 字面量类型与错误占位类型。
 * 结构相等：标签相同且各组成部分递归相等。
 */

import { isNumericName, wideningSteps, type PrimitiveName } from '../config/semantic.js';
import type { ClassInfo, InterfaceInfo, TypeInfo } from './model.js';

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly name: PrimitiveName;
  readonly nullable: boolean;
}

export interface ObjectType {
  readonly kind: 'object';
  readonly info: TypeInfo;
  readonly args: readonly Type[];
  readonly nullable: boolean;
}

export interface ArrayType {
  readonly kind: 'array';
  readonly element: Type;
  readonly nullable: boolean;
}

export interface FunctionType {
  readonly kind: 'function';
  readonly params: readonly Type[];
  readonly ret: Type;
  readonly nullable: boolean;
}

/** 泛型形参。`owner` 区分同名形参（类级或方法级） */
export interface ParamType {
  readonly kind: 'param';
  readonly name: string;
  readonly owner: string;
  readonly nullable: boolean;
}

export interface NullType {
  readonly kind: 'null';
}

/** 绑定失败处的占位类型；与任何类型兼容，避免级联诊断 */
export interface ErrorType {
  readonly kind: 'error';
}

export type Type = PrimitiveType | ObjectType | ArrayType | FunctionType | ParamType | NullType | ErrorType;

export type Substitution = ReadonlyMap<string, Type>;

/** 转换代价：精确匹配 < 可空包装 < 数值拓宽 < 向上转型到父类 < 向上转型到接口 < 泛型形参 */
export const COST = {
  EXACT: 0,
  NULLABLE_WRAP: 1,
  WIDENING: 10,
  SUPERCLASS: 100,
  INTERFACE: 200,
  TYPE_PARAM: 300,
} as const;

const PRIMITIVES = new Map<string, PrimitiveType>();

export function paramKey(owner: string, name: string): string {
  return `${owner}::${name}`;
}

export class TypeSystem {
  static readonly ERROR: ErrorType = { kind: 'error' };
  static readonly NULL: NullType = { kind: 'null' };

  static primitive(name: PrimitiveName, nullable = false): PrimitiveType {
    const key = `${name}${nullable ? '?' : ''}`;
    let type = PRIMITIVES.get(key);
    if (!type) {
      type = { kind: 'primitive', name, nullable };
      PRIMITIVES.set(key, type);
    }
    return type;
  }

  static object(info: TypeInfo, args: readonly Type[] = [], nullable = false): ObjectType {
    return { kind: 'object', info, args, nullable };
  }

  static array(element: Type, nullable = false): ArrayType {
    return { kind: 'array', element, nullable };
  }

  static fn(params: readonly Type[], ret: Type, nullable = false): FunctionType {
    return { kind: 'function', params, ret, nullable };
  }

  static param(name: string, owner: string, nullable = false): ParamType {
    return { kind: 'param', name, owner, nullable };
  }

  static get VOID(): PrimitiveType {
    return TypeSystem.primitive('Void');
  }

  static get BOOL(): PrimitiveType {
    return TypeSystem.primitive('Bool');
  }

  static get INT(): PrimitiveType {
    return TypeSystem.primitive('Int');
  }

  static get STRING(): PrimitiveType {
    return TypeSystem.primitive('String');
  }

  static isError(type: Type): type is ErrorType {
    return type.kind === 'error';
  }

  static isNullable(type: Type): boolean {
    switch (type.kind) {
      case 'null':
        return true;
      case 'error':
        return false;
      default:
        return type.nullable;
    }
  }

  static withNullable(type: Type, nullable: boolean): Type {
    switch (type.kind) {
      case 'primitive':
        if (type.name === 'Void') return type;
        return TypeSystem.primitive(type.name, nullable);
      case 'object':
        return type.nullable === nullable ? type : { ...type, nullable };
      case 'array':
        return type.nullable === nullable ? type : { ...type, nullable };
      case 'function':
        return type.nullable === nullable ? type : { ...type, nullable };
      case 'param':
        return type.nullable === nullable ? type : { ...type, nullable };
      default:
        return type;
    }
  }

  static nonNull(type: Type): Type {
    return TypeSystem.withNullable(type, false);
  }

  static nonNullObject(type: ObjectType): ObjectType {
    return type.nullable ? { ...type, nullable: false } : type;
  }

  static isPrimitive(type: Type, name?: PrimitiveName): type is PrimitiveType {
    return type.kind === 'primitive' && (name === undefined || type.name === name);
  }

  static isVoid(type: Type): boolean {
    return type.kind === 'primitive' && type.name === 'Void';
  }

  static isString(type: Type): boolean {
    return type.kind === 'primitive' && type.name === 'String';
  }

  static isNumeric(type: Type): type is PrimitiveType {
    return type.kind === 'primitive' && isNumericName(type.name);
  }

  /**
   * 受引用计数管理的类型：字符串、对象、数组、函数值，以及泛型形参（实例化前未知）。
   */
  static isManaged(type: Type): boolean {
    switch (type.kind) {
      case 'primitive':
        return type.name === 'String';
      case 'object':
      case 'array':
      case 'function':
      case 'null':
        return true;
      case 'param':
        return true;
      case 'error':
        return false;
    }
  }

  /** 可空原始类型（C 中以 `{ has, value }` 结构表示） */
  static isNullablePrimitive(type: Type): type is PrimitiveType & { readonly nullable: true } {
    return type.kind === 'primitive' && type.nullable && type.name !== 'String';
  }

  static equals(a: Type, b: Type): boolean {
    if (a.kind !== b.kind) return false;
    switch (a.kind) {
      case 'primitive':
        return b.kind === 'primitive' && a.name === b.name && a.nullable === b.nullable;
      case 'object':
        return (
          b.kind === 'object' &&
          a.info === b.info &&
          a.nullable === b.nullable &&
          TypeSystem.listEquals(a.args, b.args)
        );
      case 'array':
        return b.kind === 'array' && a.nullable === b.nullable && TypeSystem.equals(a.element, b.element);
      case 'function':
        return (
          b.kind === 'function' &&
          a.nullable === b.nullable &&
          TypeSystem.listEquals(a.params, b.params) &&
          TypeSystem.equals(a.ret, b.ret)
        );
      case 'param':
        return b.kind === 'param' && a.name === b.name && a.owner === b.owner && a.nullable === b.nullable;
      case 'null':
      case 'error':
        return true;
    }
  }

  static listEquals(a: readonly Type[], b: readonly Type[]): boolean {
    return a.length === b.length && a.every((t, i) => {
      const other = b[i];
      return other !== undefined && TypeSystem.equals(t, other);
    });
  }

  static format(type: Type): string {
    const q = TypeSystem.isNullable(type) && type.kind !== 'null' ? '?' : '';
    switch (type.kind) {
      case 'primitive':
        return `${type.name}${q}`;
      case 'object': {
        const args = type.args.length > 0 ? `<${type.args.map(a => TypeSystem.format(a)).join(', ')}>` : '';
        return `${type.info.qualifiedName}${args}${q}`;
      }
      case 'array':
        return `${TypeSystem.format(type.element)}[]${q}`;
      case 'function': {
        const sig = `(${type.params.map(p => TypeSystem.format(p)).join(', ')}) -> ${TypeSystem.format(type.ret)}`;
        return q ? `(${sig})?` : sig;
      }
      case 'param':
        return `${type.name}${q}`;
      case 'null':
        return 'null';
      case 'error':
        return '<error>';
    }
  }

  /** 用于实例化去重与名称改编的稳定键 */
  static key(type: Type): string {
    return TypeSystem.format(type);
  }

  static containsParam(type: Type): boolean {
    switch (type.kind) {
      case 'param':
        return true;
      case 'object':
        return type.args.some(a => TypeSystem.containsParam(a));
      case 'array':
        return TypeSystem.containsParam(type.element);
      case 'function':
        return type.params.some(p => TypeSystem.containsParam(p)) || TypeSystem.containsParam(type.ret);
      default:
        return false;
    }
  }

  static containsError(type: Type): boolean {
    switch (type.kind) {
      case 'error':
        return true;
      case 'object':
        return type.args.some(a => TypeSystem.containsError(a));
      case 'array':
        return TypeSystem.containsError(type.element);
      case 'function':
        return type.params.some(p => TypeSystem.containsError(p)) || TypeSystem.containsError(type.ret);
      default:
        return false;
    }
  }

  /**
   * 以替换表实例化类型中的泛型形参；形参的可空性与实参叠加。
   */
  static substitute(type: Type, subst: Substitution): Type {
    if (subst.size === 0) return type;
    switch (type.kind) {
      case 'param': {
        const actual = subst.get(paramKey(type.owner, type.name));
        if (!actual) return type;
        return type.nullable ? TypeSystem.withNullable(actual, true) : actual;
      }
      case 'object':
        if (type.args.length === 0) return type;
        return { ...type, args: type.args.map(a => TypeSystem.substitute(a, subst)) };
      case 'array':
        return { ...type, element: TypeSystem.substitute(type.element, subst) };
      case 'function':
        return {
          ...type,
          params: type.params.map(p => TypeSystem.substitute(p, subst)),
          ret: TypeSystem.substitute(type.ret, subst),
        };
      default:
        return type;
    }
  }

  /** 由形参列表与实参列表构造替换表 */
  static bind(owner: string, params: readonly string[], args: readonly Type[], into?: Map<string, Type>): Map<string, Type> {
    const map = into ?? new Map<string, Type>();
    params.forEach((name, i) => {
      const arg = args[i];
      if (arg) map.set(paramKey(owner, name), arg);
    });
    return map;
  }

  /**
   * 沿继承链查找 `from` 到目标类型声明的路径，返回以 `from` 的实参表达的目标实例与距离。
   */
  static findSupertype(
    from: ObjectType,
    target: TypeInfo
  ): { readonly type: ObjectType; readonly distance: number; readonly viaInterface: boolean } | null {
    if (from.info === target) return { type: from, distance: 0, viaInterface: false };
    const subst = TypeSystem.bind(from.info.qualifiedName, from.info.typeParams, from.args);
    const supers: Array<{ type: ObjectType; isInterface: boolean }> = [];
    if (from.info.kind === 'class') {
      if (from.info.superclass) supers.push({ type: from.info.superclass, isInterface: false });
      for (const iface of from.info.interfaces) supers.push({ type: iface, isInterface: true });
    } else {
      for (const iface of from.info.supers) supers.push({ type: iface, isInterface: true });
    }
    let best: { type: ObjectType; distance: number; viaInterface: boolean } | null = null;
    for (const sup of supers) {
      const substituted = TypeSystem.substitute(sup.type, subst);
      if (substituted.kind !== 'object') continue;
      const found = TypeSystem.findSupertype(substituted, target);
      if (!found) continue;
      const candidate = {
        type: found.type,
        distance: found.distance + 1,
        viaInterface: found.viaInterface || sup.isInterface || target.kind === 'interface',
      };
      if (!best || candidate.distance < best.distance) best = candidate;
    }
    return best;
  }

  static isSubclassOf(info: ClassInfo, ancestor: ClassInfo): boolean {
    for (let cur: ClassInfo | null = info; cur; cur = cur.superclass?.info.kind === 'class' ? cur.superclass.info : null) {
      if (cur === ancestor) return true;
    }
    return false;
  }

  static implementsInterface(info: TypeInfo, iface: InterfaceInfo): boolean {
    return TypeSystem.findSupertype(TypeSystem.object(info, info.typeParams.map(p => TypeSystem.param(p, info.qualifiedName))), iface) !== null;
  }

  /**
   * 从 `from` 隐式转换到 `to` 的代价；不可转换时返回 null。
   * 可空性：非空 → 可空允许（代价 +1），可空 → 非空不允许。
   */
  static conversionCost(from: Type, to: Type): number | null {
    if (from.kind === 'error' || to.kind === 'error') return COST.EXACT;
    if (from.kind === 'null') {
      if (to.kind === 'null') return COST.EXACT;
      if (TypeSystem.isVoid(to)) return null;
      return TypeSystem.isNullable(to) ? COST.NULLABLE_WRAP : null;
    }
    if (to.kind === 'null') return null;
    if (from.nullable && !to.nullable) return null;
    const wrap = !from.nullable && to.nullable ? COST.NULLABLE_WRAP : COST.EXACT;

    switch (to.kind) {
      case 'primitive': {
        if (from.kind !== 'primitive') return null;
        const steps = wideningSteps(from.name, to.name);
        if (steps === null) return null;
        return steps === 0 ? wrap : COST.WIDENING + steps + wrap;
      }
      case 'object': {
        if (from.kind !== 'object') return null;
        const found = TypeSystem.findSupertype(TypeSystem.nonNullObject(from), to.info);
        if (!found) return null;
        if (!TypeSystem.listEquals(found.type.args, to.args)) return null;
        if (found.distance === 0) return wrap;
        const base = to.info.kind === 'interface' ? COST.INTERFACE : COST.SUPERCLASS;
        return base + found.distance + wrap;
      }
      case 'array':
        if (from.kind !== 'array') return null;
        return TypeSystem.equals(TypeSystem.nonNull(from), TypeSystem.nonNull(to)) ? wrap : null;
      case 'function':
        if (from.kind !== 'function') return null;
        return TypeSystem.equals(TypeSystem.nonNull(from), TypeSystem.nonNull(to)) ? wrap : null;
      case 'param':
        if (from.kind !== 'param') return null;
        return from.name === to.name && from.owner === to.owner ? wrap : null;
    }
  }

  /**
   * 赋值兼容关系：存在隐式转换。
   */
  static canCastTo(from: Type, to: Type): boolean {
    return TypeSystem.conversionCost(from, to) !== null;
  }

  /**
   * 仅因可空性而失败的转换（报告 NullSafetyViolation 而不是 TypeMismatch）。
   */
  static failsOnlyOnNullability(from: Type, to: Type): boolean {
    if (TypeSystem.canCastTo(from, to)) return false;
    if (from.kind === 'null') return !TypeSystem.isVoid(to) && to.kind !== 'error';
    return TypeSystem.isNullable(from) && TypeSystem.canCastTo(TypeSystem.nonNull(from), to);
  }

  /**
   * 显式 `as` 转换是否合法：数值互转、对象向上或向下转型、可空性收窄。
   */
  static canExplicitlyCast(from: Type, to: Type): boolean {
    if (TypeSystem.canCastTo(from, to)) return true;
    const a = TypeSystem.nonNull(from);
    const b = TypeSystem.nonNull(to);
    if (TypeSystem.canCastTo(a, b)) return true;
    if ((TypeSystem.isNumeric(a) || TypeSystem.isPrimitive(a, 'Char')) && (TypeSystem.isNumeric(b) || TypeSystem.isPrimitive(b, 'Char'))) {
      return true;
    }
    if (a.kind === 'object' && b.kind === 'object') {
      if (TypeSystem.canCastTo(b, a)) return true;
      // 接口之间或接口与非 final 类之间允许运行时检查
      return a.info.kind === 'interface' || b.info.kind === 'interface';
    }
    if (a.kind === 'param' || b.kind === 'param') return TypeSystem.isManaged(a) && TypeSystem.isManaged(b);
    return false;
  }

  /**
   * 二元数值运算的结果类型：取拓宽格上的较大者，不低于 Int。
   */
  static numericResult(a: PrimitiveType, b: PrimitiveType): PrimitiveType | null {
    const norm = (name: PrimitiveName): PrimitiveName | null => {
      if (name === 'Char' || name === 'Byte' || name === 'Short') return 'Int';
      return isNumericName(name) ? name : null;
    };
    const x = norm(a.name);
    const y = norm(b.name);
    if (!x || !y) return null;
    if (wideningSteps(x, y) !== null) return TypeSystem.primitive(y);
    if (wideningSteps(y, x) !== null) return TypeSystem.primitive(x);
    return null;
  }

  /** 两个分支类型的最小公共类型（条件表达式、数组字面量使用） */
  static join(a: Type, b: Type): Type | null {
    if (a.kind === 'error') return b;
    if (b.kind === 'error') return a;
    if (a.kind === 'null') return b.kind === 'null' ? a : TypeSystem.isVoid(b) ? null : TypeSystem.withNullable(b, true);
    if (b.kind === 'null') return TypeSystem.isVoid(a) ? null : TypeSystem.withNullable(a, true);
    const nullable = TypeSystem.isNullable(a) || TypeSystem.isNullable(b);
    const na = TypeSystem.withNullable(a, nullable);
    const nb = TypeSystem.withNullable(b, nullable);
    if (TypeSystem.canCastTo(na, nb)) return nb;
    if (TypeSystem.canCastTo(nb, na)) return na;
    return null;
  }
}
