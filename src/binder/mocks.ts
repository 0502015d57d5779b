/**
 * @module binder/mocks
 *
 * `mock X { ... }` 块：合成一个继承 X 的匿名类，覆盖其中声明的方法。
 *
 * 在 mock 所在块（及其内层块、其中的 lambda）中，`new X(...)` 构造的是合成类的实例，
 * 调用的仍是 X 的构造函数，之后再执行 mock 类自身字段的初始化。
 * 被替换的方法经由虚表分派，因此覆盖对 X 的全部调用点生效；静态成员不可替换。
 */

import { Node } from '../ast/ast.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { MockDecl } from '../types.js';
import { bindClassBody } from './bodies.js';
import type { BinderContext } from './context.js';
import { ClassMemberResolver, createClassInfo } from './declarations.js';
import type { LookupEnv } from './resolver.js';
import { TypeSystem } from './type_system.js';

export function bindMock(ctx: BinderContext, stmt: MockDecl): void {
  const { diagnostics } = ctx;
  const invalid = (detail: string): void => {
    diagnostics.error(ErrorCode.INVALID_INHERITANCE, stmt.target.span, { detail });
  };
  const target = ctx.resolver.resolveTypeInfo(ctx.env, stmt.target);
  if (!target) return;
  if (target.kind !== 'class') {
    invalid(`Only classes can be mocked, '${target.qualifiedName}' is an interface`);
    return;
  }
  if (target.typeParams.length > 0 || stmt.target.args.length > 0) {
    invalid(`Generic class '${target.qualifiedName}' cannot be mocked`);
    return;
  }

  const members = stmt.members.filter(member => {
    const isStatic = member.kind === 'Field' ? member.isStatic : member.modifiers.isStatic;
    if (member.kind === 'Function' && member.flavor === 'constructor') {
      diagnostics.error(ErrorCode.INVALID_INHERITANCE, member.span, { detail: `Mock of '${target.qualifiedName}' cannot declare constructors` });
      return false;
    }
    if (isStatic) {
      diagnostics.error(ErrorCode.INVALID_INHERITANCE, member.span, { detail: `Mock of '${target.qualifiedName}' cannot declare static members` });
      return false;
    }
    return true;
  });

  const n = ctx.nextMock();
  const decl = { ...Node.Class(`${target.name}$Mock${n}`, [], stmt.target, [], members), span: stmt.span };
  const mock = createClassInfo(decl, `${target.qualifiedName}$Mock${ctx.fileIndex}_${n}`, target.namespace, ctx.file.path, target);
  mock.superclass = TypeSystem.object(target);

  // mock 体中的类型在 mock 语句所在位置解析，不能引用外层的泛型形参
  const env: LookupEnv = { file: ctx.env.file, namespace: ctx.env.namespace, typeParams: new Map() };
  const resolver = new ClassMemberResolver(ctx.resolver, diagnostics);
  resolver.resolveMembers(mock, env);
  resolver.buildVtable(mock);

  ctx.mockClasses.push(mock);
  ctx.bindings.mocks.set(stmt, mock);
  ctx.scopes.addMock(target, mock);
  bindClassBody(ctx, mock, env);
}
