/**
 * @module symbols/features
 *
 * 条件编译：按编译单元启用的特性集合过滤声明。
 *
 * - `#require f`：仅当 f 启用时保留
 * - `#requireNot f`：仅当 f 未启用时保留
 *
 * 过滤是纯函数且幂等：对结果再次过滤得到相同的语法树。
 */

import type {
  ClassDecl,
  Directive,
  InterfaceDecl,
  MemberDecl,
  NamespaceDecl,
  SourceFile,
  TopLevelDecl,
} from '../types.js';

export function directivesSatisfied(directives: readonly Directive[], features: ReadonlySet<string>): boolean {
  return directives.every(d => (d.name === 'require' ? features.has(d.feature) : !features.has(d.feature)));
}

/** 声明要求、但 `features` 中缺失的特性（供引用处检查使用） */
export function missingFeatures(directives: readonly Directive[], features: ReadonlySet<string>): string[] {
  return directives.filter(d => !directivesSatisfied([d], features)).map(d => d.feature);
}

function filterMembers(members: readonly MemberDecl[], features: ReadonlySet<string>): MemberDecl[] {
  return members.filter(m => directivesSatisfied(m.directives, features));
}

function filterClass(decl: ClassDecl, features: ReadonlySet<string>): ClassDecl {
  const members = filterMembers(decl.members, features);
  if (members.length === decl.members.length) return decl;
  return { ...decl, members };
}

function filterInterface(decl: InterfaceDecl, features: ReadonlySet<string>): InterfaceDecl {
  const methods = decl.methods.filter(m => directivesSatisfied(m.directives, features));
  if (methods.length === decl.methods.length) return decl;
  return { ...decl, methods };
}

function filterNamespace(decl: NamespaceDecl, features: ReadonlySet<string>): NamespaceDecl {
  return { ...decl, decls: filterDecls(decl.decls, features) };
}

function filterDecls(decls: readonly TopLevelDecl[], features: ReadonlySet<string>): TopLevelDecl[] {
  const kept: TopLevelDecl[] = [];
  for (const decl of decls) {
    switch (decl.kind) {
      case 'Namespace':
        kept.push(filterNamespace(decl, features));
        break;
      case 'Class':
        if (directivesSatisfied(decl.directives, features)) kept.push(filterClass(decl, features));
        break;
      case 'Interface':
        if (directivesSatisfied(decl.directives, features)) kept.push(filterInterface(decl, features));
        break;
      case 'Function':
      case 'Field':
        if (directivesSatisfied(decl.directives, features)) kept.push(decl);
        break;
    }
  }
  return kept;
}

/**
 * 返回剔除了未满足特性要求的声明之后的文件语法树。
 * 未被修改的子树按引用复用。
 */
export function filterFeatures(file: SourceFile, features: ReadonlySet<string>): SourceFile {
  return { ...file, decls: filterDecls(file.decls, features) };
}
