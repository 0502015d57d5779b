/**
 * @module binder/declarations
 *
 * 声明阶段：由符号表派生全程序声明模型。
 *
 * 在逐文件并行绑定之前单线程完成：
 * - 为每个类、接口、函数、全局变量建立描述对象
 * - 解析继承关系与成员签名
 * - 为每个类计算扁平化的虚表（父类槽位在前）
 * - 检查接口实现完整性（B005）、覆盖签名（B018）与重复签名（B010）
 */

import { PRELUDE_NAMESPACE } from '../config/semantic.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { SymbolTable } from '../symbols/symbols.js';
import type { ClassDecl, Expression, FieldDecl, FunctionDecl, Span } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { DiagnosticCollector } from './diagnostics.js';
import { allInterfaces, findImplementation, findOwner, selfType, substitutionOf } from './members.js';
import type { ClassInfo, FieldInfo, InterfaceInfo, MethodInfo, ProgramModel, TypeInfo } from './model.js';
import { SymbolResolver, withTypeParams, type LookupEnv } from './resolver.js';
import { TypeSystem, type Type } from './type_system.js';

const logger = createLogger('binder');

export interface ProgramModelResult {
  readonly model: ProgramModel;
  readonly diagnostics: Diagnostic[];
}

export function namespacePath(namespace: string): string[] {
  return namespace.length === 0 ? [] : namespace.split('.');
}

export function rootEnv(file: string, namespace: string): LookupEnv {
  return { file, namespace: namespacePath(namespace), typeParams: new Map() };
}

export function createMethodInfo(
  decl: FunctionDecl,
  owner: TypeInfo | null,
  namespace: string,
  file: string,
  qualifiedName: string
): MethodInfo {
  return {
    kind: 'method',
    name: decl.name,
    decl,
    owner,
    namespace,
    qualifiedName,
    file,
    typeParams: decl.typeParams,
    typeParamOwner: `${file}:${decl.span.start.line}:${decl.span.start.col}`,
    params: [],
    ret: TypeSystem.VOID,
    isStatic: owner === null || decl.modifiers.isStatic,
    isNative: decl.modifiers.isNative,
    isSuspend: decl.modifiers.isSuspend,
    isConstructor: decl.flavor === 'constructor',
    isTest: decl.flavor === 'test',
    slot: null,
    overrides: null,
    directives: decl.directives,
  };
}

export function createFieldInfo(
  decl: FieldDecl,
  owner: ClassInfo | null,
  namespace: string,
  file: string,
  qualifiedName: string
): FieldInfo {
  return {
    kind: 'field',
    name: decl.name,
    type: TypeSystem.ERROR,
    decl,
    owner,
    namespace,
    qualifiedName,
    isStatic: owner === null || decl.isStatic,
    mutable: decl.mutable,
    file,
    directives: decl.directives,
  };
}

export function createClassInfo(
  decl: ClassDecl,
  qualifiedName: string,
  namespace: string,
  file: string,
  mockOf: ClassInfo | null
): ClassInfo {
  return {
    kind: 'class',
    name: decl.name,
    qualifiedName,
    namespace,
    file,
    decl,
    symbol: null,
    typeParams: decl.typeParams,
    superclass: null,
    interfaces: [],
    fields: [],
    staticFields: [],
    methods: new Map(),
    constructors: [],
    vtable: [],
    mockOf,
    directives: decl.directives,
  };
}

/**
 * 无类型标注的字段与全局变量：从初始化表达式的字面形式推断类型。
 */
export function literalType(expr: Expression): Type | null {
  switch (expr.kind) {
    case 'Int':
      return TypeSystem.INT;
    case 'Long':
      return TypeSystem.primitive('Long');
    case 'Float':
      return TypeSystem.primitive(expr.precision === 'float' ? 'Float' : 'Double');
    case 'Char':
      return TypeSystem.primitive('Char');
    case 'Bool':
      return TypeSystem.BOOL;
    case 'String':
    case 'Interpolated':
      return TypeSystem.STRING;
    case 'Unary':
      return expr.op === '-' ? literalType(expr.operand) : expr.op === '!' ? TypeSystem.BOOL : null;
    default:
      return null;
  }
}

/**
 * 类成员与继承的公共检查，供声明阶段与 mock 类合成共用。
 */
export class ClassMemberResolver {
  constructor(
    private readonly resolver: SymbolResolver,
    private readonly diagnostics: DiagnosticCollector
  ) {}

  classEnv(info: ClassInfo | InterfaceInfo, base: LookupEnv, isStatic: boolean): LookupEnv {
    return isStatic ? base : withTypeParams(base, info.qualifiedName, info.typeParams);
  }

  resolveSignature(method: MethodInfo, env: LookupEnv): void {
    const scoped = withTypeParams(env, method.typeParamOwner, method.typeParams);
    const seen = new Set<string>();
    method.params = method.decl.params.map(param => {
      if (seen.has(param.name)) {
        this.diagnostics.error(ErrorCode.DUPLICATE_DECLARATION, param.span, { name: param.name });
      }
      seen.add(param.name);
      const type = this.resolver.resolveType(scoped, param.type);
      if (TypeSystem.isVoid(type)) {
        this.diagnostics.error(ErrorCode.TYPE_MISMATCH, param.span, { expected: 'a value type', actual: 'Void' });
        return TypeSystem.ERROR;
      }
      return type;
    });
    method.ret = method.decl.returnType ? this.resolver.resolveType(scoped, method.decl.returnType) : TypeSystem.VOID;
  }

  resolveFieldType(field: FieldInfo, env: LookupEnv): void {
    if (field.decl.type) {
      field.type = this.resolver.resolveType(env, field.decl.type);
      if (TypeSystem.isVoid(field.type)) {
        this.diagnostics.error(ErrorCode.TYPE_MISMATCH, field.decl.span, { expected: 'a value type', actual: 'Void' });
        field.type = TypeSystem.ERROR;
      }
      return;
    }
    const inferred = field.decl.init ? literalType(field.decl.init) : null;
    if (inferred) {
      field.type = inferred;
      return;
    }
    if (field.decl.init && field.decl.init.kind === 'New') {
      field.type = this.resolver.resolveType(env, field.decl.init.type);
      return;
    }
    this.diagnostics.error(ErrorCode.TYPE_MISMATCH, field.decl.span, {
      expected: 'a type annotation',
      actual: field.decl.init ? 'an initializer of unknown type' : 'no initializer',
    });
    field.type = TypeSystem.ERROR;
  }

  /**
   * 解析类的字段与方法签名。同名字段、字段与方法同名、同签名重载报告 B010。
   */
  resolveMembers(info: ClassInfo, env: LookupEnv): void {
    const kinds = new Map<string, 'field' | 'method'>();
    const generic = info.typeParams.length > 0;
    for (const member of info.decl.members) {
      if (member.kind === 'Field') {
        if (kinds.has(member.name)) {
          this.diagnostics.error(ErrorCode.DUPLICATE_DECLARATION, member.span, { name: `${info.qualifiedName}.${member.name}` });
          continue;
        }
        kinds.set(member.name, 'field');
        if (member.isStatic && generic) this.inheritance(member.span, `Generic class '${info.qualifiedName}' cannot declare static field '${member.name}'`);
        const field = createFieldInfo(member, info, info.namespace, info.file, `${info.qualifiedName}.${member.name}`);
        this.resolveFieldType(field, this.classEnv(info, env, field.isStatic));
        (field.isStatic ? info.staticFields : info.fields).push(field);
        continue;
      }
      const method = createMethodInfo(member, info, info.namespace, info.file, `${info.qualifiedName}.${member.name}`);
      if (method.isConstructor) {
        this.resolveSignature(method, this.classEnv(info, env, false));
        info.constructors.push(method);
        continue;
      }
      if (kinds.get(member.name) === 'field') {
        this.diagnostics.error(ErrorCode.DUPLICATE_DECLARATION, member.span, { name: method.qualifiedName });
        continue;
      }
      kinds.set(member.name, 'method');
      if (!member.body && !method.isNative) this.inheritance(member.span, `Method '${method.qualifiedName}' must have a body`);
      if (method.isStatic && generic) this.inheritance(member.span, `Generic class '${info.qualifiedName}' cannot declare static method '${member.name}'`);
      this.resolveSignature(method, this.classEnv(info, env, method.isStatic));
      const group = info.methods.get(member.name);
      if (group) group.push(method);
      else info.methods.set(member.name, [method]);
    }
    for (const group of info.methods.values()) this.checkDuplicateSignatures(group);
    this.checkDuplicateSignatures(info.constructors);
  }

  resolveInterfaceMembers(info: InterfaceInfo, env: LookupEnv): void {
    for (const decl of info.decl.methods) {
      const method = createMethodInfo(decl, info, info.namespace, info.file, `${info.qualifiedName}.${decl.name}`);
      if (decl.typeParams.length > 0) this.inheritance(decl.span, `Interface method '${method.qualifiedName}' cannot be generic`);
      this.resolveSignature(method, this.classEnv(info, env, false));
      info.methods.push(method);
    }
    const byName = new Map<string, MethodInfo[]>();
    for (const method of info.methods) byName.set(method.name, [...(byName.get(method.name) ?? []), method]);
    for (const group of byName.values()) this.checkDuplicateSignatures(group);
  }

  checkDuplicateSignatures(group: readonly MethodInfo[]): void {
    group.forEach((method, i) => {
      const clash = group.slice(0, i).find(other => TypeSystem.listEquals(other.params, method.params));
      if (clash) this.diagnostics.error(ErrorCode.DUPLICATE_DECLARATION, method.decl.span, { name: method.qualifiedName });
    });
  }

  /**
   * 以父类虚表为前缀计算虚表。签名相同（代入父类实参后）即覆盖，返回类型必须一致。
   */
  buildVtable(info: ClassInfo): void {
    const base = info.superclass?.info.kind === 'class' ? info.superclass.info.vtable : [];
    const vtable = [...base];
    const self = selfType(info);
    const inherited = (slot: number): { readonly method: MethodInfo; readonly params: readonly Type[]; readonly ret: Type } | null => {
      const method = vtable[slot];
      if (!method) return null;
      const owner = findOwner(self, method);
      if (!owner) return null;
      const subst = substitutionOf(owner);
      return {
        method,
        params: method.params.map(p => TypeSystem.substitute(p, subst)),
        ret: TypeSystem.substitute(method.ret, subst),
      };
    };
    const findSlot = (method: MethodInfo): number => {
      for (let slot = 0; slot < base.length; slot++) {
        const candidate = inherited(slot);
        if (candidate && candidate.method.name === method.name && TypeSystem.listEquals(candidate.params, method.params)) {
          return slot;
        }
      }
      return -1;
    };
    for (const group of info.methods.values()) {
      for (const method of group) {
        const slot = findSlot(method);
        if (method.isStatic || method.typeParams.length > 0) {
          if (slot >= 0) {
            this.inheritance(method.decl.span, `Method '${method.qualifiedName}' cannot override an inherited virtual method`);
          }
          continue;
        }
        if (slot < 0) {
          if (info.mockOf) {
            this.inheritance(method.decl.span, `Mock method '${method.name}' does not match any method of '${info.mockOf.qualifiedName}'`);
          }
          method.slot = vtable.length;
          vtable.push(method);
          continue;
        }
        const overridden = inherited(slot);
        if (overridden && !TypeSystem.equals(overridden.ret, method.ret)) {
          this.inheritance(
            method.decl.span,
            `Method '${method.qualifiedName}' overrides '${overridden.method.qualifiedName}' with a different return type`
          );
        }
        method.slot = slot;
        method.overrides = vtable[slot] ?? null;
        vtable[slot] = method;
      }
    }
    info.vtable = vtable;
  }

  /** 每个接口方法必须由类自身或祖先以相同签名实现 */
  checkInterfaces(info: ClassInfo): void {
    const self = selfType(info);
    for (const iface of allInterfaces(self)) {
      if (iface.info.kind !== 'interface') continue;
      const subst = substitutionOf(iface);
      for (const method of iface.info.methods) {
        const impl = findImplementation(self, method, iface);
        if (!impl) {
          this.diagnostics.error(ErrorCode.MISSING_OVERRIDE, info.decl.span, {
            class: info.qualifiedName,
            method: method.name,
            interface: TypeSystem.format(iface),
          });
          continue;
        }
        if (!TypeSystem.equals(impl.ret, TypeSystem.substitute(method.ret, subst))) {
          this.inheritance(
            impl.method.decl.span,
            `Method '${impl.method.qualifiedName}' implements '${method.qualifiedName}' with a different return type`
          );
        }
      }
    }
  }

  inheritance(span: Span, detail: string): void {
    this.diagnostics.error(ErrorCode.INVALID_INHERITANCE, span, { detail });
  }
}

class DeclarationBuilder {
  private readonly collectors = new Map<string, DiagnosticCollector>();
  readonly model: ProgramModel;

  constructor(table: SymbolTable) {
    this.model = {
      table,
      types: new Map(),
      functions: new Map(),
      globals: new Map(),
      methodsByDecl: new Map(),
      classes: [],
      interfaces: [],
      globalOrder: [],
      exceptionClass: null,
    };
  }

  private collector(file: string): DiagnosticCollector {
    let collector = this.collectors.get(file);
    if (!collector) {
      collector = new DiagnosticCollector(file);
      this.collectors.set(file, collector);
    }
    return collector;
  }

  private tools(file: string): { resolver: SymbolResolver; members: ClassMemberResolver; diagnostics: DiagnosticCollector } {
    const diagnostics = this.collector(file);
    const resolver = new SymbolResolver(this.model, diagnostics, null);
    return { resolver, members: new ClassMemberResolver(resolver, diagnostics), diagnostics };
  }

  createShells(): void {
    const { table } = this.model;
    for (const symbol of table.types()) {
      if (symbol.kind === 'class') {
        const info: ClassInfo = { ...createClassInfo(symbol.decl, symbol.qualifiedName, symbol.namespace, symbol.file, null), symbol };
        this.model.types.set(symbol, info);
        this.model.classes.push(info);
      } else {
        const info: InterfaceInfo = {
          kind: 'interface',
          name: symbol.name,
          qualifiedName: symbol.qualifiedName,
          namespace: symbol.namespace,
          file: symbol.file,
          decl: symbol.decl,
          symbol,
          typeParams: symbol.decl.typeParams,
          supers: [],
          methods: [],
          directives: symbol.decl.directives,
        };
        this.model.types.set(symbol, info);
        this.model.interfaces.push(info);
      }
      const seen = new Set<string>();
      for (const param of symbol.decl.typeParams) {
        if (seen.has(param)) {
          this.collector(symbol.file).error(ErrorCode.DUPLICATE_DECLARATION, symbol.decl.span, { name: param });
        }
        seen.add(param);
      }
    }
    for (const symbol of table.globals()) {
      const field = createFieldInfo(symbol.decl, null, symbol.namespace, symbol.file, symbol.qualifiedName);
      this.model.globals.set(symbol, field);
      this.model.globalOrder.push(field);
    }
    for (const ns of table.allNamespaces()) {
      for (const member of ns.members.values()) {
        if (member.kind !== 'functions') continue;
        const methods = member.overloads.map(entry =>
          createMethodInfo(entry.decl, null, member.namespace, entry.file, member.qualifiedName)
        );
        this.model.functions.set(member, methods);
        for (const method of methods) this.model.methodsByDecl.set(method.decl, method);
      }
    }
    const exception = table.lookupMember(PRELUDE_NAMESPACE, 'Exception');
    if (exception?.kind === 'class') {
      const info = this.model.types.get(exception);
      if (info?.kind === 'class') this.model.exceptionClass = info;
    }
  }

  resolveHeaders(): void {
    for (const info of this.model.classes) {
      const { resolver, members } = this.tools(info.file);
      const env = members.classEnv(info, rootEnv(info.file, info.namespace), false);
      const decl = info.decl;
      if (decl.superclass) {
        const type = resolver.resolveType(env, decl.superclass);
        if (type.kind === 'object' && type.info.kind === 'class' && !type.nullable) {
          info.superclass = type;
        } else if (type.kind !== 'error') {
          members.inheritance(decl.superclass.span, `Class '${info.qualifiedName}' can only extend a class, found ${TypeSystem.format(type)}`);
        }
      }
      for (const ref of decl.interfaces) {
        const type = resolver.resolveType(env, ref);
        if (type.kind === 'object' && type.info.kind === 'interface' && !type.nullable) info.interfaces.push(type);
        else if (type.kind !== 'error') {
          members.inheritance(ref.span, `Class '${info.qualifiedName}' can only implement interfaces, found ${TypeSystem.format(type)}`);
        }
      }
    }
    for (const info of this.model.interfaces) {
      const { resolver, members } = this.tools(info.file);
      const env = members.classEnv(info, rootEnv(info.file, info.namespace), false);
      for (const ref of info.decl.supers) {
        const type = resolver.resolveType(env, ref);
        if (type.kind === 'object' && type.info.kind === 'interface' && !type.nullable) info.supers.push(type);
        else if (type.kind !== 'error') {
          members.inheritance(ref.span, `Interface '${info.qualifiedName}' can only extend interfaces, found ${TypeSystem.format(type)}`);
        }
      }
    }
    this.breakCycles();
  }

  private breakCycles(): void {
    for (const info of this.model.classes) {
      const seen = new Set<ClassInfo>([info]);
      for (let cur = info.superclass?.info; cur && cur.kind === 'class'; cur = cur.superclass?.info) {
        if (seen.has(cur)) {
          this.tools(info.file).members.inheritance(info.decl.span, `Inheritance cycle involving '${info.qualifiedName}'`);
          info.superclass = null;
          break;
        }
        seen.add(cur);
      }
    }
    const visiting = new Set<InterfaceInfo>();
    const done = new Set<InterfaceInfo>();
    const visit = (info: InterfaceInfo): void => {
      if (done.has(info)) return;
      visiting.add(info);
      info.supers = info.supers.filter(sup => {
        if (sup.info.kind !== 'interface') return false;
        if (visiting.has(sup.info)) {
          this.tools(info.file).members.inheritance(info.decl.span, `Inheritance cycle involving '${info.qualifiedName}'`);
          return false;
        }
        visit(sup.info);
        return true;
      });
      visiting.delete(info);
      done.add(info);
    };
    for (const info of this.model.interfaces) visit(info);
  }

  resolveMembers(): void {
    for (const info of this.model.interfaces) {
      this.tools(info.file).members.resolveInterfaceMembers(info, rootEnv(info.file, info.namespace));
    }
    for (const info of this.model.classes) {
      this.tools(info.file).members.resolveMembers(info, rootEnv(info.file, info.namespace));
      for (const group of info.methods.values()) for (const method of group) this.model.methodsByDecl.set(method.decl, method);
      for (const ctor of info.constructors) this.model.methodsByDecl.set(ctor.decl, ctor);
    }
    for (const info of this.model.interfaces) {
      for (const method of info.methods) this.model.methodsByDecl.set(method.decl, method);
    }
    for (const field of this.model.globalOrder) {
      this.tools(field.file).members.resolveFieldType(field, rootEnv(field.file, field.namespace));
    }
    const mains: MethodInfo[] = [];
    for (const group of this.model.functions.values()) {
      for (const method of group) {
        this.tools(method.file).members.resolveSignature(method, rootEnv(method.file, method.namespace));
        if (method.name === 'main' && !method.isTest) mains.push(method);
      }
      const [first] = group;
      if (first) this.tools(first.file).members.checkDuplicateSignatures(group);
    }
    for (const extra of mains.slice(1)) {
      this.collector(extra.file).error(ErrorCode.DUPLICATE_DECLARATION, extra.decl.span, { name: 'main' });
    }
  }

  /** 按继承深度（祖先在前）构建虚表 */
  buildVtables(): void {
    const depth = (info: ClassInfo): number => {
      let d = 0;
      for (let cur = info.superclass?.info; cur && cur.kind === 'class'; cur = cur.superclass?.info) d++;
      return d;
    };
    const ordered = [...this.model.classes].sort((a, b) => depth(a) - depth(b));
    for (const info of ordered) this.tools(info.file).members.buildVtable(info);
    for (const info of this.model.classes) this.tools(info.file).members.checkInterfaces(info);
  }

  diagnostics(): Diagnostic[] {
    return [...this.collectors.values()].flatMap(c => c.getDiagnostics());
  }
}

/**
 * 由符号表构建全程序声明模型。
 */
export function buildProgramModel(table: SymbolTable): ProgramModelResult {
  const builder = new DeclarationBuilder(table);
  builder.createShells();
  builder.resolveHeaders();
  builder.resolveMembers();
  builder.buildVtables();
  const diagnostics = builder.diagnostics();
  logger.debug('Program model built', {
    classes: builder.model.classes.length,
    interfaces: builder.model.interfaces.length,
    functions: builder.model.functions.size,
    globals: builder.model.globalOrder.length,
    diagnostics: diagnostics.length,
  });
  return { model: builder.model, diagnostics };
}

