/**
 * @module binder/members
 *
 * 成员查找：在类链与接口层次上按实例化类型查找字段与方法，
 * 结果中的类型均已代入接收者的泛型实参。绑定器与代码生成共用。
 */

import type { ClassInfo, FieldInfo, MethodInfo, TypeInfo } from './model.js';
import { TypeSystem, type ObjectType, type Substitution, type Type } from './type_system.js';

export interface FieldMember {
  readonly field: FieldInfo;
  readonly type: Type;
  /** 声明该字段的类在接收者视角下的实例 */
  readonly owner: ObjectType;
}

export interface MethodCandidate {
  readonly method: MethodInfo;
  /** 代入接收者实参后的形参类型（方法级泛型形参保持未代入） */
  readonly params: readonly Type[];
  readonly ret: Type;
  readonly owner: ObjectType;
}

/** 类型声明以自身形参作为实参的实例，即类体内 `this` 的类型 */
export function selfType(info: TypeInfo): ObjectType {
  return TypeSystem.object(
    info,
    info.typeParams.map(p => TypeSystem.param(p, info.qualifiedName))
  );
}

export function substitutionOf(type: ObjectType): Substitution {
  return TypeSystem.bind(type.info.qualifiedName, type.info.typeParams, type.args);
}

function substituteObject(type: ObjectType, subst: Substitution): ObjectType {
  const result = TypeSystem.substitute(type, subst);
  return result.kind === 'object' ? result : type;
}

export function superTypeOf(type: ObjectType): ObjectType | null {
  if (type.info.kind !== 'class' || !type.info.superclass) return null;
  return substituteObject(type.info.superclass, substitutionOf(type));
}

/** 自身起的类链（子类在前） */
export function classChain(type: ObjectType): ObjectType[] {
  const chain: ObjectType[] = [];
  const seen = new Set<TypeInfo>();
  for (let cur: ObjectType | null = TypeSystem.nonNullObject(type); cur; cur = superTypeOf(cur)) {
    if (seen.has(cur.info)) break;
    seen.add(cur.info);
    chain.push(cur);
  }
  return chain;
}

/** 父类链起点（最顶层祖先）在前的全部实例字段，即结构体布局顺序 */
export function instanceFields(type: ObjectType): FieldMember[] {
  const result: FieldMember[] = [];
  for (const owner of classChain(type).reverse()) {
    if (owner.info.kind !== 'class') continue;
    const subst = substitutionOf(owner);
    for (const field of owner.info.fields) {
      result.push({ field, type: TypeSystem.substitute(field.type, subst), owner });
    }
  }
  return result;
}

export function lookupField(type: ObjectType, name: string): FieldMember | null {
  for (const owner of classChain(type)) {
    if (owner.info.kind !== 'class') continue;
    const field = owner.info.fields.find(f => f.name === name);
    if (field) return { field, type: TypeSystem.substitute(field.type, substitutionOf(owner)), owner };
  }
  return null;
}

export function lookupStaticField(info: ClassInfo, name: string): FieldInfo | null {
  for (let cur: ClassInfo | null = info; cur; cur = cur.superclass?.info.kind === 'class' ? cur.superclass.info : null) {
    const field = cur.staticFields.find(f => f.name === name);
    if (field) return field;
  }
  return null;
}

/** 类直接与间接实现的全部接口实例（去重，保持发现顺序） */
export function allInterfaces(type: ObjectType): ObjectType[] {
  const result = new Map<string, ObjectType>();
  const visit = (t: ObjectType): void => {
    const subst = substitutionOf(t);
    const direct = t.info.kind === 'class' ? t.info.interfaces : t.info.supers;
    for (const iface of direct) {
      const inst = substituteObject(iface, subst);
      const key = TypeSystem.key(inst);
      if (result.has(key)) continue;
      result.set(key, inst);
      visit(inst);
    }
  };
  for (const owner of classChain(type)) visit(owner);
  if (type.info.kind === 'interface') visit(TypeSystem.nonNullObject(type));
  return [...result.values()];
}

function candidateOf(method: MethodInfo, owner: ObjectType): MethodCandidate {
  const subst = substitutionOf(owner);
  return {
    method,
    params: method.params.map(p => TypeSystem.substitute(p, subst)),
    ret: TypeSystem.substitute(method.ret, subst),
    owner,
  };
}

function sameParams(a: MethodCandidate, b: MethodCandidate): boolean {
  return TypeSystem.listEquals(a.params, b.params);
}

/**
 * 按名查找可在该类型上调用的方法（实例与静态），
 * 被子类覆盖的祖先方法不重复出现。
 */
export function lookupMethods(type: ObjectType, name: string): MethodCandidate[] {
  const found: MethodCandidate[] = [];
  const add = (candidate: MethodCandidate): void => {
    if (found.some(existing => sameParams(existing, candidate))) return;
    found.push(candidate);
  };
  const plain = TypeSystem.nonNullObject(type);
  for (const owner of classChain(plain)) {
    if (owner.info.kind === 'class') {
      for (const method of owner.info.methods.get(name) ?? []) add(candidateOf(method, owner));
    }
  }
  const interfaces = plain.info.kind === 'interface' ? [plain, ...allInterfaces(plain)] : allInterfaces(plain);
  for (const iface of interfaces) {
    if (iface.info.kind !== 'interface') continue;
    for (const method of iface.info.methods) {
      if (method.name === name) add(candidateOf(method, iface));
    }
  }
  return found;
}

export function lookupConstructors(type: ObjectType): MethodCandidate[] {
  if (type.info.kind !== 'class') return [];
  return type.info.constructors.map(ctor => candidateOf(ctor, type));
}

/**
 * 在类（及其祖先）的虚表中查找接口方法的实现。
 */
export function findImplementation(
  classType: ObjectType,
  ifaceMethod: MethodInfo,
  ifaceType: ObjectType
): MethodCandidate | null {
  if (classType.info.kind !== 'class') return null;
  const wanted = candidateOf(ifaceMethod, ifaceType);
  const vtable = classType.info.vtable;
  for (let slot = vtable.length - 1; slot >= 0; slot--) {
    const impl = vtable[slot];
    if (!impl || impl.name !== ifaceMethod.name) continue;
    const owner = findOwner(classType, impl);
    if (!owner) continue;
    const candidate = candidateOf(impl, owner);
    if (sameParams(candidate, wanted)) return candidate;
  }
  return null;
}

/** 方法声明所在的类在 `type` 视角下的实例 */
export function findOwner(type: ObjectType, method: MethodInfo): ObjectType | null {
  if (!method.owner) return null;
  for (const owner of classChain(type)) {
    if (owner.info === method.owner) return owner;
  }
  for (const iface of allInterfaces(type)) {
    if (iface.info === method.owner) return iface;
  }
  return null;
}

/** 虚表槽位在 `type` 视角下的实现及其签名 */
export function vtableOf(type: ObjectType): MethodCandidate[] {
  if (type.info.kind !== 'class') return [];
  const result: MethodCandidate[] = [];
  for (const impl of type.info.vtable) {
    const owner = findOwner(type, impl);
    if (owner) result.push(candidateOf(impl, owner));
  }
  return result;
}

/** 零参数、返回 String 的 `toString` 方法 */
export function findToString(type: ObjectType): MethodCandidate | null {
  return lookupMethods(type, 'toString').find(c => c.params.length === 0 && !c.method.isStatic && TypeSystem.isString(c.ret) && !TypeSystem.isNullable(c.ret)) ?? null;
}

/** 接受一个可由 `other` 赋值的参数、返回 Bool 的 `equals` 方法 */
export function findEquals(type: ObjectType, other: Type): MethodCandidate | null {
  return (
    lookupMethods(type, 'equals').find(
      c =>
        c.params.length === 1 &&
        !c.method.isStatic &&
        c.method.typeParams.length === 0 &&
        TypeSystem.isPrimitive(c.ret, 'Bool') &&
        c.params[0] !== undefined &&
        TypeSystem.canCastTo(TypeSystem.withNullable(other, false), c.params[0])
    ) ?? null
  );
}
