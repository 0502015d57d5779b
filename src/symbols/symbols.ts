/**
 * @module symbols/symbols
 *
 * 全局声明图：从全限定名到声明符号的映射。
 *
 * 这一层只回答“存在什么、在哪里”，不解析任何类型。
 * 符号持有声明处语法树节点的只读引用，仅用于查找。
 */

import type { ClassDecl, FieldDecl, FunctionDecl, InterfaceDecl, Span } from '../types.js';

interface SymbolBase {
  readonly name: string;
  /** 所在命名空间的全限定名，根命名空间为空串 */
  readonly namespace: string;
  readonly qualifiedName: string;
}

export interface ClassSymbol extends SymbolBase {
  readonly kind: 'class';
  readonly decl: ClassDecl;
  readonly file: string;
}

export interface InterfaceSymbol extends SymbolBase {
  readonly kind: 'interface';
  readonly decl: InterfaceDecl;
  readonly file: string;
}

export interface FunctionEntry {
  readonly decl: FunctionDecl;
  readonly file: string;
}

export interface FunctionGroupSymbol extends SymbolBase {
  readonly kind: 'functions';
  readonly overloads: FunctionEntry[];
}

export interface GlobalSymbol extends SymbolBase {
  readonly kind: 'global';
  readonly decl: FieldDecl;
  readonly file: string;
}

export type TypeSymbol = ClassSymbol | InterfaceSymbol;
export type MemberSymbol = ClassSymbol | InterfaceSymbol | FunctionGroupSymbol | GlobalSymbol;

export interface NamespaceSymbol {
  readonly kind: 'namespace';
  readonly qualifiedName: string;
  readonly path: readonly string[];
  readonly members: Map<string, MemberSymbol>;
  /** 直接子命名空间的简单名 */
  readonly children: Set<string>;
}

export type ImportTarget =
  | { readonly kind: 'namespace'; readonly namespace: NamespaceSymbol; readonly span: Span }
  | { readonly kind: 'member'; readonly symbol: MemberSymbol; readonly span: Span };

export function qualify(namespace: string, name: string): string {
  return namespace.length === 0 ? name : `${namespace}.${name}`;
}

function importKey(file: string, namespace: string): string {
  return `${file}\u0000${namespace}`;
}

/**
 * 全局符号表。构建完成后只读，可被并行的绑定任务共享。
 */
export class SymbolTable {
  private readonly namespaces = new Map<string, NamespaceSymbol>();
  private readonly imports = new Map<string, ImportTarget[]>();
  private readonly typeOrder: TypeSymbol[] = [];
  private readonly globalOrder: GlobalSymbol[] = [];

  constructor() {
    this.ensureNamespace([]);
  }

  ensureNamespace(path: readonly string[]): NamespaceSymbol {
    const qualifiedName = path.join('.');
    const existing = this.namespaces.get(qualifiedName);
    if (existing) return existing;
    const ns: NamespaceSymbol = {
      kind: 'namespace',
      qualifiedName,
      path: [...path],
      members: new Map(),
      children: new Set(),
    };
    this.namespaces.set(qualifiedName, ns);
    if (path.length > 0) {
      const parent = this.ensureNamespace(path.slice(0, -1));
      const last = path[path.length - 1];
      if (last !== undefined) parent.children.add(last);
    }
    return ns;
  }

  getNamespace(qualifiedName: string): NamespaceSymbol | undefined {
    return this.namespaces.get(qualifiedName);
  }

  allNamespaces(): NamespaceSymbol[] {
    return [...this.namespaces.values()];
  }

  lookupMember(namespace: string, name: string): MemberSymbol | undefined {
    return this.namespaces.get(namespace)?.members.get(name);
  }

  /**
   * 按限定路径查找：`a.b.C` 可能是命名空间，也可能是命名空间成员。
   */
  lookupQualified(path: readonly string[]): MemberSymbol | NamespaceSymbol | undefined {
    const ns = this.namespaces.get(path.join('.'));
    if (ns) return ns;
    if (path.length === 0) return undefined;
    const name = path[path.length - 1];
    if (name === undefined) return undefined;
    return this.lookupMember(path.slice(0, -1).join('.'), name);
  }

  addMember(namespace: NamespaceSymbol, symbol: MemberSymbol): void {
    namespace.members.set(symbol.name, symbol);
    if (symbol.kind === 'class' || symbol.kind === 'interface') this.typeOrder.push(symbol);
    if (symbol.kind === 'global') this.globalOrder.push(symbol);
  }

  addImport(file: string, namespace: string, target: ImportTarget): void {
    const key = importKey(file, namespace);
    const list = this.imports.get(key);
    if (list) list.push(target);
    else this.imports.set(key, [target]);
  }

  /** 某个文件中某个命名空间块可见的导入（不含外层块与文件级导入） */
  importsOf(file: string, namespace: string): readonly ImportTarget[] {
    return this.imports.get(importKey(file, namespace)) ?? [];
  }

  /** 按声明顺序排列的全部类与接口 */
  types(): readonly TypeSymbol[] {
    return this.typeOrder;
  }

  /** 按声明顺序排列的全部全局变量（决定静态初始化顺序） */
  globals(): readonly GlobalSymbol[] {
    return this.globalOrder;
  }
}
