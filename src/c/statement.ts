/**
 * @module c/statement
 *
 * 语句降级。结构化控制流直接映射为 C 的 if / while / for，
 * switch 改写为 if-else 链。
 */

import { DefaultAstVisitor } from '../ast/ast_visitor.js';
import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import { blockCompletes } from '../binder/flow.js';
import { equalityPlan } from '../binder/plans.js';
import type { LocalSymbol, SwitchPlan } from '../binder/model.js';
import { TypeSystem } from '../binder/type_system.js';
import type { Block, Expression, ExprStmt, ForRange, If, Return, Statement, Switch, Throw, VarDecl, While } from '../types.js';
import { isManaged, zeroValue } from './ctypes.js';
import type { ExpressionEmitter } from './expression.js';
import type { FunctionState, Value } from './function.js';

const TRIVIAL = /^(?:[A-Za-z_][A-Za-z0-9_]*|-?[0-9][0-9A-Za-z.]*)$/;

export class StatementEmitter extends DefaultAstVisitor<FunctionState> {
  constructor(private readonly expressions: ExpressionEmitter) {
    super();
  }

  /**
   * 块结束时按声明逆序释放块内的受管局部变量。
   * 末尾不可达的块（以 return、break 等结束）不生成释放代码。
   */
  override visitBlock(block: Block, fn: FunctionState): void {
    this.block(block, fn, 0, null);
  }

  /** 构造函数体：前 `lead` 条语句（`super(...)`）由 `prologue` 代替，之后是其余语句 */
  constructorBody(block: Block, fn: FunctionState, lead: number, prologue: () => void): void {
    this.block(block, fn, lead, prologue);
  }

  private block(block: Block, fn: FunctionState, lead: number, prologue: (() => void) | null): void {
    const locals = fn.env.bound.bindings.blockLocals.get(block) ?? [];
    fn.pushFrame('block', locals.filter(local => isManaged(fn.localType(local))).map(local => fn.ref(local)));
    prologue?.();
    for (const statement of block.statements.slice(lead)) this.visitStatement(statement, fn);
    fn.popFrame(blockCompletes(block));
  }

  override visitStatement(statement: Statement, fn: FunctionState): void {
    switch (statement.kind) {
      case 'Block':
        fn.open('{');
        this.visitBlock(statement, fn);
        fn.close();
        return;
      case 'Scope':
        fn.open('{');
        this.visitBlock(statement.body, fn);
        fn.close();
        return;
      case 'Mock':
        // mock 类在文件级生成
        return;
      case 'VarDecl':
        this.varDecl(statement, fn);
        return;
      case 'ExprStmt':
        this.exprStmt(statement, fn);
        return;
      case 'If':
        this.ifStatement(statement, fn);
        return;
      case 'While':
        this.whileStatement(statement, fn);
        return;
      case 'ForRange':
        this.forRange(statement, fn);
        return;
      case 'Loop':
        fn.open('for (;;) {');
        this.loopBody(statement.body, fn);
        fn.close();
        return;
      case 'Switch':
        this.switchStatement(statement, fn);
        return;
      case 'Return':
        this.returnStatement(statement, fn);
        return;
      case 'Throw':
        this.throwStatement(statement, fn);
        return;
      case 'Break':
        fn.releaseToLoop();
        fn.line('break;');
        return;
      case 'Continue':
        fn.releaseToLoop();
        fn.line('continue;');
        return;
    }
  }

  private local(decl: VarDecl | ForRange, fn: FunctionState): LocalSymbol {
    const local = fn.env.bound.bindings.declarations.get(decl);
    if (!local) throw new InternalCompilerError('Undeclared local', decl.span);
    return local;
  }

  private varDecl(decl: VarDecl, fn: FunctionState): void {
    const local = this.local(decl, fn);
    const type = fn.localType(local);
    const ref = fn.ref(local);
    const { init } = decl;
    if (!init) {
      // 循环中再次进入时重新置零
      this.expressions.store(ref, type, { code: zeroValue(type), type, owned: false });
      return;
    }
    fn.statement(() => this.expressions.store(ref, type, this.expressions.value(init, type)));
  }

  private exprStmt(statement: ExprStmt, fn: FunctionState): void {
    fn.statement(() => {
      const value = this.expressions.emit(statement.expr);
      if (value.owned) {
        fn.discard(value);
        return;
      }
      if (statement.expr.kind === 'Assign' || value.code.length === 0 || TRIVIAL.test(value.code)) return;
      // 除法与取余仍需执行以报告除零
      fn.line(`(void)(${value.code});`);
    });
  }

  private test(cond: Expression, fn: FunctionState): string {
    return fn.condition(() => this.expressions.condition(cond));
  }

  private ifStatement(statement: If, fn: FunctionState): void {
    fn.open(`if (${this.test(statement.cond, fn)}) {`);
    this.visitBlock(statement.then, fn);
    const { otherwise } = statement;
    if (otherwise) {
      fn.reopen('} else {');
      if (otherwise.kind === 'Block') this.visitBlock(otherwise, fn);
      else this.ifStatement(otherwise, fn);
    }
    fn.close();
  }

  private loopBody(body: Block, fn: FunctionState): void {
    fn.pushFrame('loop');
    this.visitBlock(body, fn);
    fn.popFrame();
  }

  /** 条件需要前置语句时改写为 `for (;;)`，每次迭代重新计算 */
  private whileStatement(statement: While, fn: FunctionState): void {
    const { lines, result: cond } = fn.isolate(() => this.test(statement.cond, fn));
    if (lines.length === 0) {
      fn.open(`while (${cond}) {`);
    } else {
      fn.open('for (;;) {');
      fn.splice(lines);
      fn.line(`if (!(${cond})) break;`);
    }
    this.loopBody(statement.body, fn);
    fn.close();
  }

  /**
   * 闭区间循环。上界只求值一次；步进前先判断是否已到达上界，
   * 因此上界为类型最大值时不会溢出。
   */
  private forRange(statement: ForRange, fn: FunctionState): void {
    const local = this.local(statement, fn);
    const type = fn.localType(local);
    const ref = fn.ref(local);
    fn.pushFrame('temps');
    const [from, to] = fn.sequence([() => this.expressions.value(statement.from, type), () => this.expressions.value(statement.to, type)]);
    if (!from || !to) throw new InternalCompilerError('Incomplete range', statement.span);
    fn.line(`${ref} = ${from.code};`);
    const end = fn.temp(type, to.code);
    const more = fn.temp('bool', `${ref} <= ${end}`);
    fn.open(`for (; ${more}; ${more} = ${ref} != ${end}, ${ref} += ${more}) {`);
    this.loopBody(statement.body, fn);
    fn.close();
    fn.popFrame();
  }

  private switchPlan(statement: Switch, fn: FunctionState): SwitchPlan {
    const plan = fn.env.bound.bindings.switches.get(statement);
    if (!plan) throw new InternalCompilerError('Switch subject cannot be compared', statement.subject.span);
    return plan;
  }

  /**
   * switch 改写为 if-else 链。需要前置语句的分支条件放入 `else { ... if }` 中，
   * 保证只在前面的分支都不匹配时求值。
   */
  private switchStatement(statement: Switch, fn: FunctionState): void {
    this.switchPlan(statement, fn);
    fn.pushFrame('temps');
    const subject = fn.pin(fn.borrow(this.expressions.emit(statement.subject)));
    let opened = 0;
    for (const clause of statement.cases) {
      if (clause.isDefault) {
        if (opened === 0) {
          fn.open('{');
          opened++;
        } else {
          fn.reopen('} else {');
        }
        this.visitBlock(clause.body, fn);
        break;
      }
      const { lines, result: cond } = fn.isolate(() => this.anyOf(clause.values.map(value => () => this.caseTest(subject, value, fn)), fn), false);
      if (opened === 0) {
        fn.splice(lines);
        fn.open(`if (${cond}) {`);
        opened++;
      } else if (lines.length === 0) {
        fn.reopen(`} else if (${cond}) {`);
      } else {
        fn.reopen('} else {');
        fn.splice(lines);
        fn.open(`if (${cond}) {`);
        opened++;
      }
      this.visitBlock(clause.body, fn);
    }
    for (let i = 0; i < opened; i++) fn.close();
    fn.popFrame();
  }

  /** 依次计算各条件，任一成立即停止 */
  private anyOf(tests: ReadonlyArray<() => string>, fn: FunctionState): string {
    const [first, ...rest] = tests;
    if (!first) return 'false';
    let code = fn.condition(first);
    let result: string | null = null;
    for (const test of rest) {
      const { lines, result: next } = fn.isolate(() => fn.condition(test));
      if (lines.length === 0 && result === null) {
        code = `${code} || ${next}`;
        continue;
      }
      result ??= fn.temp('bool', code);
      fn.open(`if (!${result}) {`);
      fn.splice(lines);
      fn.line(`${result} = ${next};`);
      fn.close();
      code = result;
    }
    return code;
  }

  private caseTest(subject: Value, expr: Expression, fn: FunctionState): string {
    if (expr.kind === 'String' && TypeSystem.isString(TypeSystem.nonNull(subject.type))) {
      const lit = fn.env.unit.literal(expr.value);
      return `aml_string_equals_units(${subject.code}, ${lit}, ${expr.value.length})`;
    }
    const value = fn.borrow(this.expressions.emit(expr));
    const plan = equalityPlan(subject.type, value.type);
    if (!plan) throw new InternalCompilerError(`Case value of type ${TypeSystem.format(value.type)} cannot be compared`, expr.span);
    return this.expressions.equality(plan, subject, value);
  }

  /**
   * 返回值先取得引用，再释放所有仍存活的局部变量与临时引用。
   */
  private returnStatement(statement: Return, fn: FunctionState): void {
    const { expr } = statement;
    if (!expr) {
      fn.releaseAll();
      fn.line('return;');
      return;
    }
    fn.pushFrame('temps');
    const value = this.expressions.value(expr, fn.returnType);
    const code = fn.own(value);
    if (!fn.hasReleases()) {
      fn.popFrame();
      fn.line(`return ${code};`);
      return;
    }
    const result = fn.temp(fn.returnType, code);
    fn.popFrame();
    fn.releaseAll();
    fn.line(`return ${result};`);
  }

  /** 与 return 相同：先取得被抛出的引用，再释放全部局部变量与临时引用 */
  private throwStatement(statement: Throw, fn: FunctionState): void {
    fn.pushFrame('temps');
    const type = fn.typeOf(statement.expr);
    const code = fn.own(this.expressions.value(statement.expr, type));
    if (!fn.hasReleases()) {
      fn.popFrame();
      fn.line(`aml_throw(${code});`);
      return;
    }
    const thrown = fn.temp(type, code);
    fn.popFrame();
    fn.releaseAll();
    fn.line(`aml_throw(${thrown});`);
  }
}
