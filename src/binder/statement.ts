import { DefaultAstVisitor } from '../ast/ast_visitor.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { Block, Expression, ForRange, If, Span, Statement, Switch, VarDecl } from '../types.js';
import type { BinderContext } from './context.js';
import { ExpressionBinder, type Narrowing } from './expression.js';
import { blockCompletes, completesNormally, containsBreak } from './flow.js';
import { bindMock } from './mocks.js';
import { equalityPlan, isArithmetic } from './plans.js';
import { TypeSystem, type Type } from './type_system.js';

/** 收集语句中被赋值的简单名（用于循环入口处取消收窄） */
class AssignedNames extends DefaultAstVisitor<Set<string>> {
  override visitExpression(e: Expression, names: Set<string>): void {
    if (e.kind === 'Assign' && e.target.kind === 'Name') names.add(e.target.name);
    super.visitExpression(e, names);
  }
}

/** case 值在诊断中的写法 */
function caseLabel(expr: Expression): string | null {
  switch (expr.kind) {
    case 'Int':
      return String(expr.value);
    case 'Long':
      return expr.value;
    case 'Char':
      return `'${String.fromCharCode(expr.value)}'`;
    case 'Bool':
      return String(expr.value);
    case 'String':
      return JSON.stringify(expr.value);
    case 'Null':
      return 'null';
    case 'Unary':
      if (expr.op === '-' && (expr.operand.kind === 'Int' || expr.operand.kind === 'Long')) return `-${String(expr.operand.value)}`;
      return null;
    default:
      return null;
  }
}

function integerValue(expr: Expression): bigint | null {
  switch (expr.kind) {
    case 'Int':
    case 'Char':
    case 'Long':
      return BigInt(expr.value);
    case 'Unary': {
      if (expr.op !== '-') return null;
      const value = integerValue(expr.operand);
      return value === null ? null : -value;
    }
    default:
      return null;
  }
}

/**
 * 重复检测用的键。数值与 Char 类型的 subject 按数值比较，
 * 因此 `97` 与 `'a'`、`0` 与 `-0` 视为同一个值。
 */
function caseKey(expr: Expression, subject: Type): { readonly key: string; readonly label: string } | null {
  const label = caseLabel(expr);
  if (label === null) return null;
  const value = isArithmetic(TypeSystem.nonNull(subject)) ? integerValue(expr) : null;
  return { key: value === null ? label : `#${value}`, label };
}

export class StatementBinder extends DefaultAstVisitor<BinderContext> {
  private readonly expressions: ExpressionBinder;

  constructor(ctx: BinderContext) {
    super();
    this.expressions = new ExpressionBinder(ctx);
  }

  override visitBlock(block: Block, ctx: BinderContext): void {
    ctx.scopes.enter('block');
    try {
      for (const statement of block.statements) this.visitStatement(statement, ctx);
    } finally {
      ctx.bindings.blockLocals.set(block, ctx.scopes.exit());
    }
  }

  override visitStatement(statement: Statement, ctx: BinderContext): void {
    const { diagnostics, scopes } = ctx;
    switch (statement.kind) {
      case 'Block':
        this.visitBlock(statement, ctx);
        return;
      case 'Scope':
        this.visitBlock(statement.body, ctx);
        return;
      case 'Mock':
        bindMock(ctx, statement);
        return;
      case 'VarDecl':
        this.varDecl(statement, ctx);
        return;
      case 'ExprStmt':
        this.expressions.bind(statement.expr);
        return;
      case 'If':
        this.ifStatement(statement, ctx);
        return;
      case 'While': {
        this.invalidateAssigned(statement, ctx);
        this.expressions.expect(statement.cond, TypeSystem.BOOL);
        this.loopBody(statement.body, this.expressions.narrowings(statement.cond, true), ctx);
        if (!containsBreak(statement.body)) this.apply(this.expressions.narrowings(statement.cond, false), ctx);
        return;
      }
      case 'ForRange':
        this.forRange(statement, ctx);
        return;
      case 'Loop':
        this.invalidateAssigned(statement, ctx);
        this.loopBody(statement.body, [], ctx);
        return;
      case 'Switch':
        this.switchStatement(statement, ctx);
        return;
      case 'Return':
        this.returnStatement(statement.expr, statement.span, ctx);
        return;
      case 'Throw': {
        const type = this.expressions.bind(statement.expr);
        if (TypeSystem.isError(type)) return;
        if (TypeSystem.isNullable(type)) {
          diagnostics.typeMismatch(TypeSystem.nonNull(type), type, statement.expr.span);
          return;
        }
        if (type.kind !== 'object' || type.info.kind !== 'class') {
          diagnostics.error(ErrorCode.TYPE_MISMATCH, statement.expr.span, { expected: 'an object', actual: TypeSystem.format(type) });
        }
        return;
      }
      case 'Break':
      case 'Continue':
        if (!scopes.insideLoop()) {
          diagnostics.error(ErrorCode.INVALID_CONTROL_FLOW, statement.span, { keyword: statement.kind === 'Break' ? 'break' : 'continue' });
        }
        return;
    }
  }

  private apply(narrowings: readonly Narrowing[], ctx: BinderContext): void {
    for (const [local, type] of narrowings) ctx.scopes.narrow(local, type);
  }

  /** 循环体内被赋值的变量在进入循环前取消收窄 */
  private invalidateAssigned(statement: Statement, ctx: BinderContext): void {
    const names = new Set<string>();
    new AssignedNames().visitStatement(statement, names);
    for (const name of names) {
      const found = ctx.scopes.lookup(name);
      if (found) ctx.scopes.invalidate(found.local);
    }
  }

  private loopBody(body: Block, narrowings: readonly Narrowing[], ctx: BinderContext): void {
    ctx.scopes.enter('loop');
    try {
      this.apply(narrowings, ctx);
      this.visitBlock(body, ctx);
    } finally {
      ctx.scopes.exit();
    }
  }

  private varDecl(decl: VarDecl, ctx: BinderContext): void {
    const { diagnostics } = ctx;
    let declared = decl.type ? ctx.resolver.resolveType(ctx.env, decl.type) : null;
    if (declared && TypeSystem.isVoid(declared)) {
      diagnostics.error(ErrorCode.TYPE_MISMATCH, decl.span, { expected: 'a value type', actual: 'Void' });
      declared = TypeSystem.ERROR;
    }
    let type: Type = declared ?? TypeSystem.ERROR;
    let initType: Type | null = null;
    if (decl.init) {
      initType = declared ? this.expressions.expect(decl.init, declared) : this.expressions.bind(decl.init);
      if (!declared) {
        if (initType.kind === 'null' || TypeSystem.isVoid(initType)) {
          diagnostics.error(ErrorCode.TYPE_MISMATCH, decl.init.span, { expected: 'a type annotation', actual: TypeSystem.format(initType) });
        } else {
          type = initType;
        }
      }
    } else if (!declared) {
      diagnostics.error(ErrorCode.TYPE_MISMATCH, decl.span, { expected: 'a type annotation', actual: 'no initializer' });
    } else if (!decl.mutable) {
      diagnostics.error(ErrorCode.TYPE_MISMATCH, decl.span, { expected: 'an initializer', actual: 'none' });
    } else if (TypeSystem.isManaged(declared) && !TypeSystem.isNullable(declared) && !TypeSystem.isError(declared)) {
      diagnostics.error(ErrorCode.NULL_SAFETY_VIOLATION, decl.span, { expected: TypeSystem.format(declared), actual: 'null' });
    }
    const local = ctx.defineLocal(decl.name, type, decl.mutable, decl, decl.span);
    if (initType && TypeSystem.isNullable(type) && initType.kind !== 'null' && !TypeSystem.isNullable(initType)) {
      ctx.scopes.narrow(local, TypeSystem.nonNull(type));
    }
  }

  private ifStatement(statement: If, ctx: BinderContext): void {
    const { expressions } = this;
    expressions.expect(statement.cond, TypeSystem.BOOL);
    const whenTrue = expressions.narrowings(statement.cond, true);
    const whenFalse = expressions.narrowings(statement.cond, false);
    expressions.withNarrowings(whenTrue, () => this.visitBlock(statement.then, ctx));
    const { otherwise } = statement;
    if (otherwise) expressions.withNarrowings(whenFalse, () => this.visitStatement(otherwise, ctx));
    const thenExits = !blockCompletes(statement.then);
    const elseExits = otherwise !== null && !completesNormally(otherwise);
    if (thenExits && !elseExits) this.apply(whenFalse, ctx);
    else if (elseExits && !thenExits) this.apply(whenTrue, ctx);
  }

  private forRange(statement: ForRange, ctx: BinderContext): void {
    const from = this.expressions.bind(statement.from);
    const to = this.expressions.bind(statement.to);
    const integral = (expr: Expression, type: Type): boolean => {
      if (TypeSystem.isError(type)) return false;
      const ok = type.kind === 'primitive' && !type.nullable && ['Byte', 'Short', 'Int', 'Long', 'Char'].includes(type.name);
      if (!ok) ctx.diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: 'an integer type', actual: TypeSystem.format(type) });
      return ok;
    };
    const okFrom = integral(statement.from, from);
    const okTo = integral(statement.to, to);
    const type =
      okFrom && okTo && from.kind === 'primitive' && to.kind === 'primitive'
        ? (TypeSystem.numericResult(from, to) ?? TypeSystem.ERROR)
        : TypeSystem.ERROR;
    this.invalidateAssigned(statement.body, ctx);
    ctx.scopes.enter('loop');
    try {
      ctx.defineLocal(statement.variable, type, false, statement, statement.span);
      this.visitBlock(statement.body, ctx);
    } finally {
      ctx.scopes.exit();
    }
  }

  private switchStatement(statement: Switch, ctx: BinderContext): void {
    const { diagnostics } = ctx;
    const subject = this.expressions.bind(statement.subject);
    if (TypeSystem.isVoid(subject)) {
      diagnostics.error(ErrorCode.TYPE_MISMATCH, statement.subject.span, { expected: 'a value', actual: 'Void' });
    }
    const seen = new Set<string>();
    let defaultSeen = false;
    for (const clause of statement.cases) {
      if (defaultSeen) diagnostics.error(ErrorCode.INVALID_SWITCH_ORDERING, clause.span);
      if (clause.isDefault) defaultSeen = true;
      for (const value of clause.values) {
        const type = this.expressions.bind(value, subject);
        if (!TypeSystem.canCastTo(type, subject) && !TypeSystem.canCastTo(subject, type)) {
          diagnostics.typeMismatch(subject, type, value.span);
        }
        const key = caseKey(value, subject);
        if (key === null) continue;
        if (seen.has(key.key)) diagnostics.error(ErrorCode.DUPLICATE_CASE_VALUE, value.span, { value: key.label });
        seen.add(key.key);
      }
      this.visitBlock(clause.body, ctx);
    }
    const equality = equalityPlan(subject, subject);
    if (equality) ctx.bindings.switches.set(statement, { subject, equality });
  }

  private returnStatement(expr: Expression | null, span: Span, ctx: BinderContext): void {
    const { frame, diagnostics } = ctx;
    const expected = frame.returnType;
    if (expected === null) {
      frame.inferredReturns.push(expr ? this.expressions.bind(expr) : TypeSystem.VOID);
      return;
    }
    if (TypeSystem.isVoid(expected)) {
      if (expr) {
        const actual = this.expressions.bind(expr);
        diagnostics.error(ErrorCode.TYPE_MISMATCH, expr.span, { expected: 'Void', actual: TypeSystem.format(actual) });
      }
      return;
    }
    if (!expr) {
      diagnostics.error(ErrorCode.TYPE_MISMATCH, span, { expected: TypeSystem.format(expected), actual: 'Void' });
      return;
    }
    this.expressions.expect(expr, expected);
  }
}

/**
 * 绑定函数体（方法、构造函数、块形式 lambda）。参数已由调用方定义在外层作用域。
 */
export function bindBody(ctx: BinderContext, body: Block): void {
  new StatementBinder(ctx).visitBlock(body, ctx);
}
