import { ErrorCode } from '../diagnostics/error_codes.js';
import type { Block, Call, Span } from '../types.js';
import type { BinderContext } from './context.js';
import { ExpressionBinder } from './expression.js';
import { blockCompletes } from './flow.js';
import { lookupConstructors, selfType, superTypeOf } from './members.js';
import type { ClassInfo, FieldInfo, MethodInfo } from './model.js';
import { withTypeParams, type LookupEnv } from './resolver.js';
import { bindBody } from './statement.js';
import { TypeSystem, type Type } from './type_system.js';

// 方法体、构造函数体与字段初始化器的绑定入口。

/** 构造函数体首条语句若为 `super(...)`，返回该调用 */
export function leadingSuperCall(body: Block): Call | null {
  const [first] = body.statements;
  if (first?.kind === 'ExprStmt' && first.expr.kind === 'Call' && first.expr.callee.kind === 'Super') return first.expr;
  return null;
}

/** 没有显式 `super(...)` 时，父类必须有零参数构造函数（或不声明构造函数） */
function checkImplicitSuper(ctx: BinderContext, info: ClassInfo, span: Span): void {
  const sup = superTypeOf(selfType(info));
  if (!sup) return;
  const ctors = lookupConstructors(sup);
  if (ctors.length > 0 && !ctors.some(c => c.params.length === 0)) {
    ctx.diagnostics.error(ErrorCode.INVALID_SUPER_CALL, span, {
      detail: `Implicit super() call: '${TypeSystem.format(sup)}' has no zero-argument constructor`,
    });
  }
}

export function bindFieldInit(ctx: BinderContext, field: FieldInfo, env: LookupEnv): void {
  const { init } = field.decl;
  if (!init) return;
  const owner = field.owner;
  ctx.withFrame(
    {
      owner: field.decl,
      method: null,
      classInfo: owner,
      isStatic: field.isStatic,
      isConstructor: false,
      returnType: null,
      lambda: null,
      env,
      shareScopes: false,
      thisType: owner && !field.isStatic ? selfType(owner) : null,
    },
    () => new ExpressionBinder(ctx).expect(init, field.type)
  );
}

export function bindMethod(ctx: BinderContext, method: MethodInfo, info: ClassInfo | null, env: LookupEnv): void {
  const { decl } = method;
  const body = decl.body;
  if (method.isNative) {
    if (body) ctx.diagnostics.error(ErrorCode.INVALID_INHERITANCE, decl.span, { detail: `Native function '${method.qualifiedName}' cannot have a body` });
    return;
  }
  if (!body) {
    if (!info) ctx.diagnostics.error(ErrorCode.INVALID_INHERITANCE, decl.span, { detail: `Function '${method.qualifiedName}' must have a body` });
    return;
  }
  ctx.withFrame(
    {
      owner: decl,
      method,
      classInfo: info,
      isStatic: method.isStatic,
      isConstructor: method.isConstructor,
      returnType: method.ret,
      lambda: null,
      env: withTypeParams(env, method.typeParamOwner, method.typeParams),
      shareScopes: false,
      thisType: info && !method.isStatic ? selfType(info) : null,
    },
    () => {
      const seen = new Set<string>();
      decl.params.forEach((param, i) => {
        const type: Type = method.params[i] ?? TypeSystem.ERROR;
        if (seen.has(param.name)) {
          // 重名参数已在声明阶段报告
          ctx.bindings.declarations.set(param, ctx.newLocal(param.name, type, false, param));
          return;
        }
        seen.add(param.name);
        ctx.defineLocal(param.name, type, false, param, param.span);
      });
      const previous = ctx.superCall;
      const superCall = method.isConstructor ? leadingSuperCall(body) : null;
      ctx.superCall = superCall;
      try {
        bindBody(ctx, body);
      } finally {
        ctx.superCall = previous;
      }
      if (method.isConstructor && !superCall && info) checkImplicitSuper(ctx, info, decl.span);
      if (!TypeSystem.isVoid(method.ret) && !TypeSystem.isError(method.ret) && blockCompletes(body)) {
        ctx.diagnostics.error(ErrorCode.MISSING_RETURN, decl.span, { name: method.qualifiedName, expected: TypeSystem.format(method.ret) });
      }
    }
  );
}

/**
 * 绑定类的全部字段初始化器、方法与构造函数。
 */
export function bindClassBody(ctx: BinderContext, info: ClassInfo, base: LookupEnv): void {
  const instanceEnv = withTypeParams(base, info.qualifiedName, info.typeParams);
  for (const field of info.fields) bindFieldInit(ctx, field, instanceEnv);
  for (const field of info.staticFields) bindFieldInit(ctx, field, base);
  for (const group of info.methods.values()) {
    for (const method of group) bindMethod(ctx, method, info, method.isStatic ? base : instanceEnv);
  }
  for (const ctor of info.constructors) bindMethod(ctx, ctor, info, instanceEnv);
  if (info.constructors.length === 0 && !info.mockOf) checkImplicitSuper(ctx, info, info.decl.span);
}
