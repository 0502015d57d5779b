/**
 * @module symbols/builder
 *
 * 符号表构建器：聚合所有文件的声明，合并跨文件的同名命名空间。
 *
 * 这是并行解析与并行绑定之间的同步点，必须在任何绑定开始前完成。
 * 报告的诊断：
 * - B010 同一命名空间内的重复声明
 * - B011 两个导入带来同名符号
 * - B001 导入路径不存在
 */

import { ErrorCode } from '../diagnostics/error_codes.js';
import { DiagnosticBuilder, type Diagnostic } from '../diagnostics/diagnostics.js';
import { PRELUDE_NAMESPACE } from '../config/semantic.js';
import type { Import, SourceFile, Span, TopLevelDecl } from '../types.js';
import { createLogger } from '../utils/logger.js';
import {
  SymbolTable,
  qualify,
  type ImportTarget,
  type MemberSymbol,
  type NamespaceSymbol,
} from './symbols.js';

const logger = createLogger('symbols');

export interface SymbolBuildResult {
  readonly table: SymbolTable;
  readonly diagnostics: Diagnostic[];
}

interface PendingImports {
  readonly file: string;
  readonly namespace: NamespaceSymbol;
  readonly imports: readonly Import[];
}

function declName(decl: TopLevelDecl): string {
  return decl.kind === 'Namespace' ? decl.path.join('.') : decl.name;
}

class SymbolTableBuilder {
  readonly table = new SymbolTable();
  readonly diagnostics: Diagnostic[] = [];
  private readonly pending: PendingImports[] = [];

  private error(code: ErrorCode, file: string, span: Span, params: Record<string, unknown>): void {
    this.diagnostics.push(DiagnosticBuilder.error(code).withParams(params).withSpan(span).withFile(file).build());
  }

  addFile(file: SourceFile): void {
    const root = this.table.ensureNamespace([]);
    this.pending.push({ file: file.path, namespace: root, imports: file.imports });
    this.addDecls(file.path, root, file.decls);
  }

  private addDecls(file: string, ns: NamespaceSymbol, decls: readonly TopLevelDecl[]): void {
    for (const decl of decls) {
      if (decl.kind === 'Namespace') {
        const inner = this.table.ensureNamespace([...ns.path, ...decl.path]);
        this.pending.push({ file, namespace: inner, imports: decl.imports });
        this.addDecls(file, inner, decl.decls);
        continue;
      }
      this.addMember(file, ns, decl);
    }
  }

  private addMember(file: string, ns: NamespaceSymbol, decl: Exclude<TopLevelDecl, { kind: 'Namespace' }>): void {
    const name = declName(decl);
    const qualifiedName = qualify(ns.qualifiedName, name);
    const existing = ns.members.get(name);

    if (decl.kind === 'Function') {
      if (!existing) {
        this.table.addMember(ns, {
          kind: 'functions',
          name,
          namespace: ns.qualifiedName,
          qualifiedName,
          overloads: [{ decl, file }],
        });
        return;
      }
      if (existing.kind === 'functions') {
        // 重载在绑定阶段按签名去重
        existing.overloads.push({ decl, file });
        return;
      }
    } else if (!existing) {
      const symbol: MemberSymbol =
        decl.kind === 'Class'
          ? { kind: 'class', name, namespace: ns.qualifiedName, qualifiedName, decl, file }
          : decl.kind === 'Interface'
            ? { kind: 'interface', name, namespace: ns.qualifiedName, qualifiedName, decl, file }
            : { kind: 'global', name, namespace: ns.qualifiedName, qualifiedName, decl, file };
      this.table.addMember(ns, symbol);
      return;
    }
    this.error(ErrorCode.DUPLICATE_DECLARATION, file, decl.span, { name: qualifiedName });
  }

  private resolveImport(entry: PendingImports, imp: Import): ImportTarget | null {
    const found = this.table.lookupQualified(imp.path);
    if (!found) {
      this.error(ErrorCode.UNRESOLVED_SYMBOL, entry.file, imp.span, { name: imp.path.join('.') });
      return null;
    }
    if (found.kind === 'namespace') return { kind: 'namespace', namespace: found, span: imp.span };
    return { kind: 'member', symbol: found, span: imp.span };
  }

  /**
   * 解析全部导入并检测冲突。
   * 当前命名空间自身声明的名字优先于导入，不算冲突。
   */
  resolveImports(): void {
    for (const entry of this.pending) {
      const seen = new Map<string, string>();
      for (const imp of entry.imports) {
        const target = this.resolveImport(entry, imp);
        if (!target) continue;
        this.table.addImport(entry.file, entry.namespace.qualifiedName, target);

        const provided: Array<[string, string]> =
          target.kind === 'namespace'
            ? [...target.namespace.members.keys()].map((name): [string, string] => [name, target.namespace.qualifiedName])
            : [[target.symbol.name, target.symbol.namespace]];
        for (const [name, origin] of provided) {
          if (entry.namespace.members.has(name)) continue;
          const previous = seen.get(name);
          if (previous !== undefined && previous !== origin) {
            this.error(ErrorCode.IMPORT_COLLISION, entry.file, imp.span, {
              name,
              first: previous || '<root>',
              second: origin || '<root>',
            });
            continue;
          }
          seen.set(name, origin);
        }
      }
    }
  }
}

/**
 * 由全部（已按特性过滤的）文件构建全局符号表。
 * 文件顺序决定声明顺序，从而决定静态初始化顺序。
 */
export function buildSymbolTable(files: readonly SourceFile[]): SymbolBuildResult {
  const builder = new SymbolTableBuilder();
  for (const file of files) builder.addFile(file);
  builder.resolveImports();
  logger.debug('Symbol table built', {
    files: files.length,
    namespaces: builder.table.allNamespaces().length,
    types: builder.table.types().length,
    prelude: builder.table.getNamespace(PRELUDE_NAMESPACE) !== undefined,
    diagnostics: builder.diagnostics.length,
  });
  return { table: builder.table, diagnostics: builder.diagnostics };
}
