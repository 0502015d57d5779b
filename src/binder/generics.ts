/**
 * @module binder/generics
 *
 * 泛型：实参推断（合一）与实例化注册表。
 *
 * 泛型声明只绑定一次；绑定过程中记录的实例化请求可能含有外层泛型形参，
 * 注册表从全部非泛型入口出发代入具体实参，迭代到不动点，
 * 得到程序实际用到的每个具体实例（单态化）。
 */

import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import { createLogger } from '../utils/logger.js';
import { substitutionOf } from './members.js';
import type {
  BoundFile,
  ClassInfo,
  InstantiationRequest,
  InterfaceInfo,
  MethodInfo,
  ProgramModel,
  RequestScope,
} from './model.js';
import { paramKey, TypeSystem, type ObjectType, type Substitution, type Type } from './type_system.js';

const logger = createLogger('binder');

/**
 * 以实参类型推断形参类型中 `owner` 所属的泛型形参，结果写入 `bindings`。
 */
export function unify(param: Type, arg: Type, owner: string, bindings: Map<string, Type>): void {
  if (arg.kind === 'error' || arg.kind === 'null') return;
  switch (param.kind) {
    case 'param': {
      if (param.owner !== owner) return;
      const key = paramKey(owner, param.name);
      const candidate = param.nullable ? TypeSystem.nonNull(arg) : arg;
      const existing = bindings.get(key);
      if (!existing) {
        bindings.set(key, candidate);
        return;
      }
      const joined = TypeSystem.join(existing, candidate);
      if (joined) bindings.set(key, joined);
      return;
    }
    case 'object': {
      if (arg.kind !== 'object') return;
      const found = TypeSystem.findSupertype(TypeSystem.nonNullObject(arg), param.info);
      if (!found) return;
      param.args.forEach((p, i) => {
        const a = found.type.args[i];
        if (a) unify(p, a, owner, bindings);
      });
      return;
    }
    case 'array':
      if (arg.kind === 'array') unify(param.element, arg.element, owner, bindings);
      return;
    case 'function':
      if (arg.kind !== 'function') return;
      param.params.forEach((p, i) => {
        const a = arg.params[i];
        if (a) unify(p, a, owner, bindings);
      });
      unify(param.ret, arg.ret, owner, bindings);
      return;
    default:
      return;
  }
}

export function mentionsOwner(type: Type, owner: string): boolean {
  switch (type.kind) {
    case 'param':
      return type.owner === owner;
    case 'object':
      return type.args.some(a => mentionsOwner(a, owner));
    case 'array':
      return mentionsOwner(type.element, owner);
    case 'function':
      return type.params.some(p => mentionsOwner(p, owner)) || mentionsOwner(type.ret, owner);
    default:
      return false;
  }
}

/** 类型中出现的、带泛型实参的对象类型（递归） */
export function genericObjects(type: Type, into: ObjectType[] = []): ObjectType[] {
  switch (type.kind) {
    case 'object':
      if (type.args.length > 0) into.push(TypeSystem.nonNullObject(type));
      for (const arg of type.args) genericObjects(arg, into);
      break;
    case 'array':
      genericObjects(type.element, into);
      break;
    case 'function':
      for (const p of type.params) genericObjects(p, into);
      genericObjects(type.ret, into);
      break;
    default:
      break;
  }
  return into;
}

export interface ClassInstance {
  readonly info: ClassInfo;
  readonly args: readonly Type[];
  readonly type: ObjectType;
  readonly key: string;
}

export interface InterfaceInstance {
  readonly info: InterfaceInfo;
  readonly args: readonly Type[];
  readonly type: ObjectType;
  readonly key: string;
}

export interface FunctionInstance {
  readonly method: MethodInfo;
  readonly ownerArgs: readonly Type[];
  readonly methodArgs: readonly Type[];
  readonly key: string;
}

export function functionInstanceKey(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): string {
  const fmt = (types: readonly Type[]): string => types.map(t => TypeSystem.key(t)).join(',');
  return `${method.typeParamOwner}<${fmt(ownerArgs)}><${fmt(methodArgs)}>`;
}

/** 方法实例的完整替换表：所属类型实参 + 方法级实参 */
export function methodSubstitution(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): Map<string, Type> {
  const subst = new Map<string, Type>();
  if (method.owner) TypeSystem.bind(method.owner.qualifiedName, method.owner.typeParams, ownerArgs, subst);
  TypeSystem.bind(method.typeParamOwner, method.typeParams, methodArgs, subst);
  return subst;
}

/**
 * 程序用到的全部具体实例。非泛型的类与接口以空实参列表出现。
 */
export class InstantiationRegistry {
  readonly classes = new Map<string, ClassInstance>();
  readonly interfaces = new Map<string, InterfaceInstance>();
  readonly functions = new Map<string, FunctionInstance>();

  private readonly requests = new Map<RequestScope, InstantiationRequest[]>();
  private readonly queue: Array<() => void> = [];

  private constructor() {}

  /**
   * 从全部非泛型入口出发计算实例闭包。
   */
  static close(program: ProgramModel, files: readonly BoundFile[]): InstantiationRegistry {
    const registry = new InstantiationRegistry();
    for (const file of files) {
      for (const { scope, request } of file.requests) {
        const list = registry.requests.get(scope);
        if (list) list.push(request);
        else registry.requests.set(scope, [request]);
      }
    }
    registry.processScope(null, new Map());
    for (const info of program.interfaces) {
      if (info.typeParams.length === 0) registry.addType(TypeSystem.object(info));
    }
    for (const info of program.classes) {
      if (info.typeParams.length === 0) registry.addType(TypeSystem.object(info));
    }
    for (const file of files) {
      for (const mock of file.mockClasses) registry.addType(TypeSystem.object(mock));
    }
    for (const group of program.functions.values()) {
      for (const method of group) {
        if (method.typeParams.length === 0) registry.processMethod(method, new Map());
      }
    }
    registry.drain();
    logger.debug('Instantiations closed', {
      classes: registry.classes.size,
      interfaces: registry.interfaces.size,
      functions: registry.functions.size,
    });
    return registry;
  }

  classInstance(type: ObjectType): ClassInstance | undefined {
    return this.classes.get(TypeSystem.key(TypeSystem.nonNullObject(type)));
  }

  private drain(): void {
    for (let job = this.queue.shift(); job; job = this.queue.shift()) job();
  }

  private addType(type: ObjectType): void {
    if (TypeSystem.containsParam(type) || TypeSystem.containsError(type)) {
      throw new InternalCompilerError(`Unresolved generic instantiation ${TypeSystem.format(type)}`);
    }
    const plain = TypeSystem.nonNullObject(type);
    const key = TypeSystem.key(plain);
    const info = plain.info;
    if (info.kind === 'interface') {
      if (this.interfaces.has(key)) return;
      this.interfaces.set(key, { info, args: plain.args, type: plain, key });
      this.queue.push(() => this.expandInterface(info, plain));
      return;
    }
    if (this.classes.has(key)) return;
    this.classes.set(key, { info, args: plain.args, type: plain, key });
    this.queue.push(() => this.expandClass(info, plain));
  }

  private addMentions(type: Type): void {
    for (const obj of genericObjects(type)) this.addType(obj);
  }

  private expandInterface(info: InterfaceInfo, type: ObjectType): void {
    const subst = substitutionOf(type);
    for (const sup of info.supers) this.addMentions(TypeSystem.substitute(sup, subst));
    for (const method of info.methods) {
      for (const p of method.params) this.addMentions(TypeSystem.substitute(p, subst));
      this.addMentions(TypeSystem.substitute(method.ret, subst));
    }
  }

  private expandClass(info: ClassInfo, type: ObjectType): void {
    const subst = substitutionOf(type);
    if (info.superclass) this.addMentions(TypeSystem.substitute(info.superclass, subst));
    for (const iface of info.interfaces) this.addMentions(TypeSystem.substitute(iface, subst));
    for (const field of [...info.fields, ...info.staticFields]) this.addMentions(TypeSystem.substitute(field.type, subst));
    this.processScope(info, subst);
    for (const group of info.methods.values()) {
      for (const method of group) {
        if (method.typeParams.length === 0) this.processMethod(method, subst);
      }
    }
    for (const ctor of info.constructors) this.processMethod(ctor, subst);
  }

  private processMethod(method: MethodInfo, subst: Substitution): void {
    for (const p of method.params) this.addMentions(TypeSystem.substitute(p, subst));
    this.addMentions(TypeSystem.substitute(method.ret, subst));
    this.processScope(method, subst);
  }

  private processScope(scope: RequestScope, subst: Substitution): void {
    for (const request of this.requests.get(scope) ?? []) {
      if (request.kind === 'type') {
        this.addMentions(TypeSystem.substitute(request.type, subst));
        continue;
      }
      const ownerArgs = request.ownerArgs.map(a => TypeSystem.substitute(a, subst));
      const methodArgs = request.methodArgs.map(a => TypeSystem.substitute(a, subst));
      this.addFunction(request.method, ownerArgs, methodArgs);
    }
  }

  private addFunction(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): void {
    if ([...ownerArgs, ...methodArgs].some(t => TypeSystem.containsParam(t) || TypeSystem.containsError(t))) {
      throw new InternalCompilerError(`Unresolved generic instantiation of ${method.qualifiedName}`);
    }
    const key = functionInstanceKey(method, ownerArgs, methodArgs);
    if (this.functions.has(key)) return;
    this.functions.set(key, { method, ownerArgs, methodArgs, key });
    const subst = methodSubstitution(method, ownerArgs, methodArgs);
    if (method.owner && ownerArgs.length > 0) this.addMentions(TypeSystem.object(method.owner, ownerArgs));
    this.queue.push(() => this.processMethod(method, subst));
  }
}
