/**
 * @module c/function
 *
 * 单个 C 函数体的生成状态。
 *
 * 引用计数约定：
 * - 局部变量、字段、数组元素与静态变量持有引用（owned）
 * - 实参以借用方式传递；被调用方在入口处 retain 受管形参，退出时 release
 * - 返回值与 `new` 的结果是新引用（+1）
 *
 * 表达式被降级为前置语句加一个无副作用的 C 表达式（{@link Value}），
 * 调用结果总是先存入临时变量，因此求值顺序从左到右。
 * 语句结束时释放该语句产生的临时引用；每条退出路径（块结束、return、break、continue）
 * 按声明的逆序释放已离开作用域的局部变量。
 */

import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import type { FrameOwner } from '../binder/context.js';
import type { BoundFile, LocalSymbol } from '../binder/model.js';
import { TypeSystem, type ObjectType, type Substitution, type Type } from '../binder/type_system.js';
import type { Expression } from '../types.js';
import type { CodegenContext } from './context.js';
import { baseCType, cType, declare, isManaged, zeroValue } from './ctypes.js';
import { captureName, localName } from './names.js';
import type { UnitWriter } from './unit.js';

export interface Value {
  readonly code: string;
  /** 代入泛型实参后的静态类型 */
  readonly type: Type;
  /** 受管值：调用方是否持有一个需要释放或转移的引用 */
  readonly owned: boolean;
}

/** 生成函数体所需的环境：绑定结果来源与泛型替换 */
export interface BodyEnv {
  readonly ctx: CodegenContext;
  readonly unit: UnitWriter;
  readonly bound: BoundFile;
  readonly subst: Substitution;
}

/** lambda 函数体中通过闭包访问的捕获变量 */
export interface ClosureAccess {
  readonly struct: string;
  readonly captures: ReadonlySet<LocalSymbol>;
}

type FrameKind = 'function' | 'loop' | 'block' | 'temps';

interface Frame {
  readonly kind: FrameKind;
  /** 离开帧时需要 release 的名字（声明顺序） */
  readonly names: string[];
  /** 块局部变量释放后需要置空（循环再次进入或提前返回时不能重复释放） */
  readonly reset: boolean;
}

const IDENT = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TEMP = /^tmp[0-9]+$/;
const LITERAL = /^(?:-?[0-9][0-9A-Za-z.]*|true|false|NULL)$/;

export class FunctionState {
  private lines: string[] = [];
  private indent = 1;
  private tempId = 0;
  private readonly frames: Frame[] = [];

  constructor(
    readonly env: BodyEnv,
    readonly owner: FrameOwner,
    /** 函数返回类型（已代入） */
    readonly returnType: Type,
    /** 方法的 `this`；lambda 沿用外层方法的 `this`（经闭包访问） */
    readonly self: LocalSymbol | null,
    readonly closure: ClosureAccess | null = null
  ) {}

  get ctx(): CodegenContext {
    return this.env.ctx;
  }

  // ----------------------------------------------------------
  // 输出
  // ----------------------------------------------------------

  line(text: string): void {
    this.lines.push(`${'  '.repeat(this.indent)}${text}`);
  }

  open(text: string): void {
    this.line(text);
    this.indent++;
  }

  close(text = '}'): void {
    this.indent--;
    this.line(text);
  }

  /** `} else {` 一类同时结束与开始代码块的行 */
  reopen(text: string): void {
    this.indent--;
    this.line(text);
    this.indent++;
  }

  /**
   * 在独立缓冲中执行 `body`，返回其输出（不写入当前缓冲）。
   * `nested` 为 true 时输出比当前多缩进一级。
   */
  isolate<T>(body: () => T, nested = true): { readonly lines: string[]; readonly result: T } {
    const saved = this.lines;
    const depth = this.indent;
    this.lines = [];
    if (nested) this.indent++;
    try {
      const result = body();
      return { lines: this.lines, result };
    } finally {
      this.lines = saved;
      this.indent = depth;
    }
  }

  /** 把 {@link isolate} 得到的行写入当前缓冲 */
  splice(lines: readonly string[]): void {
    this.lines.push(...lines);
  }

  /** 当前函数体（不含外层花括号） */
  body(): string[] {
    return this.lines;
  }

  // ----------------------------------------------------------
  // 类型与名字
  // ----------------------------------------------------------

  subst(type: Type): Type {
    return TypeSystem.substitute(type, this.env.subst);
  }

  typeOf(expr: Expression): Type {
    const type = this.env.bound.bindings.types.get(expr);
    if (!type) throw new InternalCompilerError(`Unbound ${expr.kind} expression`, expr.span);
    const result = this.subst(type);
    if (TypeSystem.containsError(result)) throw new InternalCompilerError(`Error type in ${expr.kind} expression`, expr.span);
    return result;
  }

  /** 局部变量（含 `this`）的 C 左值 */
  ref(local: LocalSymbol): string {
    if (this.closure?.captures.has(local)) return `((${this.closure.struct} *)closure)->${captureName(local)}`;
    return local.origin === 'this' ? 'self' : localName(local);
  }

  localType(local: LocalSymbol): Type {
    return this.subst(local.type);
  }

  selfRef(): string {
    if (!this.self) throw new InternalCompilerError('No receiver in a static context');
    return this.ref(this.self);
  }

  selfType(): ObjectType {
    if (!this.self) throw new InternalCompilerError('No receiver in a static context');
    const type = this.localType(this.self);
    if (type.kind !== 'object') throw new InternalCompilerError(`Receiver has type ${TypeSystem.format(type)}`);
    return type;
  }

  /** 函数开头的局部变量声明（形参与 `this` 除外） */
  hoistedDeclarations(): string[] {
    const locals = this.env.bound.bindings.functionLocals.get(this.owner) ?? [];
    return locals
      .filter(local => local.origin !== 'this' && (typeof local.origin === 'string' || local.origin.kind !== 'Parameter'))
      .map(local => {
        const type = this.localType(local);
        return `  ${declare(type, localName(local))} = ${zeroValue(type)};`;
      });
  }

  // ----------------------------------------------------------
  // 临时变量与释放帧
  // ----------------------------------------------------------

  tempName(): string {
    return `tmp${this.tempId++}`;
  }

  /** 声明并初始化临时变量 */
  temp(type: Type | string, init: string): string {
    const name = this.tempName();
    this.line(typeof type === 'string' ? `${type} ${name} = ${init};` : `${declare(type, name)} = ${init};`);
    return name;
  }

  pushFrame(kind: FrameKind, names: readonly string[] = []): void {
    this.frames.push({ kind, names: [...names], reset: kind === 'block' });
  }

  /** 弹出帧；`reachable` 为 false 时（帧末尾不可达）不生成释放代码 */
  popFrame(reachable = true): void {
    const frame = this.frames.pop();
    if (!frame) throw new InternalCompilerError('Release frame underflow');
    if (reachable) this.releaseFrame(frame);
  }

  /** 登记需要在当前帧结束时释放的临时引用 */
  track(name: string): void {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw new InternalCompilerError('No release frame');
    frame.names.push(name);
  }

  private releaseFrame(frame: Frame): void {
    for (const name of [...frame.names].reverse()) {
      this.line(`aml_release(${name});`);
      if (frame.reset) this.line(`${name} = NULL;`);
    }
  }

  /** 当前是否有需要在 return 前释放的引用 */
  hasReleases(): boolean {
    return this.frames.some(frame => frame.names.length > 0);
  }

  /** return 之前：释放全部帧（不弹出） */
  releaseAll(): void {
    for (const frame of [...this.frames].reverse()) {
      for (const name of [...frame.names].reverse()) this.line(`aml_release(${name});`);
    }
  }

  /** break / continue 之前：释放最内层循环以内的帧 */
  releaseToLoop(): void {
    for (const frame of [...this.frames].reverse()) {
      if (frame.kind === 'loop') return;
      for (const name of [...frame.names].reverse()) {
        this.line(`aml_release(${name});`);
        if (frame.reset) this.line(`${name} = NULL;`);
      }
    }
    throw new InternalCompilerError('break or continue outside of a loop');
  }

  /** 在新的临时帧中执行 `body`，结束时释放其中登记的临时引用 */
  statement(body: () => void): void {
    this.pushFrame('temps');
    try {
      body();
    } finally {
      this.popFrame();
    }
  }

  /**
   * 计算条件：临时引用在分支前释放，因此需要时把条件存入 bool 临时变量。
   */
  condition(compute: () => string): string {
    this.pushFrame('temps');
    let code: string;
    try {
      code = compute();
    } catch (error) {
      this.frames.pop();
      throw error;
    }
    const frame = this.frames[this.frames.length - 1];
    if (frame && frame.names.length > 0) code = this.temp('bool', code);
    this.popFrame();
    return code;
  }

  // ----------------------------------------------------------
  // 值的所有权
  // ----------------------------------------------------------

  isManaged(type: Type): boolean {
    return isManaged(type);
  }

  /** 借用：新引用存入临时变量并登记到当前帧 */
  borrow(value: Value): Value {
    if (!value.owned || !isManaged(value.type)) return value.owned ? { ...value, owned: false } : value;
    const name = TEMP.test(value.code) ? value.code : this.temp(value.type, value.code);
    this.track(name);
    return { code: name, type: value.type, owned: false };
  }

  /** 转移或获取一个引用，返回可存入变量或字段的表达式 */
  own(value: Value): string {
    if (!isManaged(value.type) || value.owned) return value.code;
    if (value.code === 'NULL') return value.code;
    return `aml_retain(${value.code})`;
  }

  /** 丢弃值；新引用立即释放 */
  discard(value: Value): void {
    if (value.owned && isManaged(value.type) && value.code !== 'NULL') this.line(`aml_release(${value.code});`);
  }

  /** 可重复求值的形式（标识符或字面量）；必要时存入临时变量 */
  stable(value: Value): Value {
    if (IDENT.test(value.code) || LITERAL.test(value.code)) return value;
    if (value.owned && isManaged(value.type)) return this.borrow(value);
    return { ...value, code: this.temp(value.type, value.code) };
  }

  /** 结果存入一个新临时变量（不登记释放），返回其值 */
  spill(type: Type, code: string, owned: boolean): Value {
    return { code: this.temp(type, code), type, owned };
  }

  /** 固定当前值，使之后的求值不再影响它（局部变量、字段读取存入临时变量） */
  pin(value: Value): Value {
    if (TEMP.test(value.code) || LITERAL.test(value.code)) return value;
    if (!isManaged(value.type)) return { ...value, code: this.temp(value.type, value.code) };
    const name = this.temp(value.type, `aml_retain(${value.code})`);
    this.track(name);
    return { code: name, type: value.type, owned: false };
  }

  /**
   * 按从左到右的顺序求值。后面的求值产生语句时，先固定前面的值，
   * 保证实参与操作数看到的是求值当时的结果。
   */
  sequence(thunks: ReadonlyArray<() => Value>): Value[] {
    let values: Value[] = [];
    for (const thunk of thunks) {
      const { lines, result } = this.isolate(thunk, false);
      if (lines.length > 0) {
        values = values.map(v => this.pin(v));
        this.splice(lines);
      }
      values.push(result);
    }
    return values;
  }

  // ----------------------------------------------------------
  // 隐式转换
  // ----------------------------------------------------------

  /**
   * 隐式转换：数值拓宽、可空包装、对象向上转型（C 中为同一指针）。
   */
  coerce(value: Value, to: Type): Value {
    const from = value.type;
    if (TypeSystem.isError(to) || TypeSystem.containsParam(to)) {
      throw new InternalCompilerError(`Cannot convert to ${TypeSystem.format(to)}`);
    }
    if (from.kind === 'null') {
      if (TypeSystem.isNullablePrimitive(to)) return { code: `AML_NONE(${to.name})`, type: to, owned: false };
      return { code: 'NULL', type: to, owned: false };
    }
    if (isManaged(to)) return { ...value, type: to };
    if (to.kind !== 'primitive' || from.kind !== 'primitive') {
      throw new InternalCompilerError(`Cannot convert ${TypeSystem.format(from)} to ${TypeSystem.format(to)}`);
    }
    if (TypeSystem.isVoid(to)) return { ...value, type: to };
    const target = baseCType(to);
    if (!to.nullable) {
      if (from.nullable) throw new InternalCompilerError(`Implicit conversion from ${TypeSystem.format(from)} to ${TypeSystem.format(to)}`);
      if (from.name === to.name) return { ...value, type: to };
      return { code: `((${target})${value.code})`, type: to, owned: false };
    }
    if (!from.nullable) {
      const inner = from.name === to.name ? value.code : `(${target})${value.code}`;
      return { code: `AML_SOME(${to.name}, ${inner})`, type: to, owned: false };
    }
    if (from.name === to.name) return { ...value, type: to };
    const s = this.stable(value).code;
    return {
      code: `(${s}.has ? AML_SOME(${to.name}, (${target})${s}.value) : AML_NONE(${to.name}))`,
      type: to,
      owned: false,
    };
  }

  cType(type: Type): string {
    return cType(type);
  }
}
