/**
 * @module c/expression
 *
 * 表达式降级：每个表达式生成若干前置语句与一个 {@link Value}。
 */

import { InternalCompilerError } from '../diagnostics/diagnostics.js';
import { equalityPlan, stringifyPlan } from '../binder/plans.js';
import type {
  CallResolution,
  Dispatch,
  EqualityPlan,
  LambdaInfo,
  MethodInfo,
  StringifyPlan,
} from '../binder/model.js';
import { TypeSystem, type ObjectType, type PrimitiveType, type Type } from '../binder/type_system.js';
import type {
  ArrayLiteral,
  Assign,
  Binary,
  BinaryOperator,
  Call,
  Cast,
  Conditional,
  Expression,
  Index,
  InterpolationPart,
  Member,
  Name,
  New,
  TypeCheck,
  Unary,
} from '../types.js';
import {
  baseCType,
  cType,
  floatLiteral,
  functionPointer,
  intLiteral,
  isManaged,
  longLiteral,
  OBJECT_C,
  unsignedCType,
  zeroValue,
} from './ctypes.js';
import type { FunctionState, Value } from './function.js';
import { captureName, classDescriptor, interfaceDescriptor, staticFieldName } from './names.js';

/** lambda 的闭包结构与函数由函数体生成器输出，返回闭包结构体名 */
export interface LambdaSink {
  closure(info: LambdaInfo, outer: FunctionState): string;
}

/** 字符串拼接的一段：字面文本或带字符串化方案的表达式 */
type Piece = { readonly kind: 'text'; readonly value: string } | { readonly kind: 'expr'; readonly expr: Expression };

const VOID_VALUE: Value = { code: '', type: TypeSystem.VOID, owned: false };

function isIntegral(type: PrimitiveType): boolean {
  return unsignedCType(type) !== null;
}

export class ExpressionEmitter {
  constructor(
    private readonly fn: FunctionState,
    private readonly lambdas: LambdaSink
  ) {}

  private get bindings() {
    return this.fn.env.bound.bindings;
  }

  private get ctx() {
    return this.fn.ctx;
  }

  /** 求值并转换为目标类型 */
  value(expr: Expression, to: Type): Value {
    return this.fn.coerce(this.emit(expr), to);
  }

  /** 求值为 C 条件表达式 */
  condition(expr: Expression): string {
    return this.fn.borrow(this.value(expr, TypeSystem.BOOL)).code;
  }

  emit(expr: Expression): Value {
    const { fn } = this;
    switch (expr.kind) {
      case 'Int': {
        const type = fn.typeOf(expr);
        return { code: intLiteral(expr.value, type.kind === 'primitive' ? type.name : 'Int'), type, owned: false };
      }
      case 'Long':
        return { code: longLiteral(BigInt(expr.value)), type: TypeSystem.primitive('Long'), owned: false };
      case 'Float':
        return {
          code: floatLiteral(expr.value, expr.precision),
          type: TypeSystem.primitive(expr.precision === 'float' ? 'Float' : 'Double'),
          owned: false,
        };
      case 'Char':
        return { code: intLiteral(expr.value, 'Char'), type: TypeSystem.primitive('Char'), owned: false };
      case 'Bool':
        return { code: expr.value ? 'true' : 'false', type: TypeSystem.BOOL, owned: false };
      case 'Null':
        return { code: 'NULL', type: TypeSystem.NULL, owned: false };
      case 'String': {
        const lit = fn.env.unit.literal(expr.value);
        return fn.spill(TypeSystem.STRING, `aml_string_new(${lit}, ${expr.value.length})`, true);
      }
      case 'Interpolated':
        return this.concat(expr.parts.map(partPiece));
      case 'Name':
        return this.name(expr);
      case 'This':
        return { code: fn.selfRef(), type: fn.selfType(), owned: false };
      case 'Super':
        throw new InternalCompilerError("'super' used as a value", expr.span);
      case 'Member':
        return this.member(expr);
      case 'Call':
        return this.call(expr);
      case 'New':
        return this.newObject(expr);
      case 'NewArray': {
        const type = fn.typeOf(expr);
        if (type.kind !== 'array') throw new InternalCompilerError('Array creation without an array type', expr.span);
        const size = fn.borrow(this.value(expr.size, TypeSystem.INT)).code;
        const element = type.element;
        return fn.spill(type, `aml_array_new(${size}, sizeof(${cType(element)}), ${isManaged(element)})`, true);
      }
      case 'Index':
        return this.index(expr);
      case 'Unary':
        return this.unary(expr);
      case 'Binary':
        return this.binary(expr);
      case 'Assign':
        return this.assign(expr);
      case 'Conditional':
        return this.conditional(expr);
      case 'ArrayLiteral':
        return this.arrayLiteral(expr);
      case 'Lambda': {
        const info = this.bindings.lambdas.get(expr);
        if (!info) throw new InternalCompilerError('Unbound lambda', expr.span);
        return this.closure(info);
      }
      case 'Cast':
        return this.cast(expr);
      case 'TypeCheck':
        return this.typeCheck(expr);
    }
  }

  // ----------------------------------------------------------
  // 名字与成员
  // ----------------------------------------------------------

  private name(expr: Name): Value {
    const { fn } = this;
    const resolution = this.bindings.names.get(expr);
    if (!resolution) throw new InternalCompilerError(`Unresolved name ${expr.name}`, expr.span);
    const type = fn.typeOf(expr);
    switch (resolution.kind) {
      case 'local': {
        const declared = fn.localType(resolution.local);
        const ref = fn.ref(resolution.local);
        // 收窄为非空的可空原始值直接取出内部值
        const code = TypeSystem.isNullablePrimitive(declared) && !TypeSystem.isNullable(type) ? `${ref}.value` : ref;
        return { code, type, owned: false };
      }
      case 'field': {
        const receiver = this.receiverType(resolution.receiver);
        return { code: this.ctx.fieldAccess(receiver, resolution.field, fn.selfRef()), type, owned: false };
      }
      case 'static':
      case 'global':
        return { code: staticFieldName(resolution.field), type, owned: false };
    }
  }

  private receiverType(type: ObjectType): ObjectType {
    const result = this.fn.subst(type);
    if (result.kind !== 'object') throw new InternalCompilerError(`Receiver became ${TypeSystem.format(result)}`);
    return TypeSystem.nonNullObject(result);
  }

  private member(expr: Member): Value {
    const { fn } = this;
    const resolution = this.bindings.members.get(expr);
    if (!resolution) throw new InternalCompilerError(`Unresolved member ${expr.name}`, expr.span);
    const type = fn.typeOf(expr);
    if (resolution.kind === 'static' || resolution.kind === 'global') {
      return { code: staticFieldName(resolution.field), type, owned: false };
    }
    const object = expr.object.kind === 'Super' ? { code: fn.selfRef(), type: fn.selfType(), owned: false } : this.emit(expr.object);
    const read = (recv: string): string => {
      switch (resolution.kind) {
        case 'arrayLength':
          return `aml_array_length(${recv})`;
        case 'stringLength':
          return `aml_string_length(${recv})`;
        case 'field':
          return this.ctx.fieldAccess(this.receiverType(resolution.receiver), resolution.field, recv);
      }
    };
    if (!expr.safe || !TypeSystem.isNullable(object.type)) return { code: read(fn.borrow(object).code), type, owned: false };
    const recv = fn.stable(fn.borrow(object));
    return this.guarded(recv.code, type, () => {
      const inner = resolution.kind === 'field' ? this.ctx.fieldType(this.receiverType(resolution.receiver), resolution.field) : TypeSystem.INT;
      return { code: read(recv.code), type: inner, owned: false };
    });
  }

  /**
   * `recv?.x`：接收者非空时才求值 `body`，结果存入可空类型的临时变量。
   */
  private guarded(recv: string, type: Type, body: () => Value): Value {
    const { fn } = this;
    const managed = !TypeSystem.isVoid(type) && isManaged(type);
    const result = TypeSystem.isVoid(type) ? null : fn.temp(type, zeroValue(type));
    fn.open(`if (${recv} != NULL) {`);
    fn.pushFrame('temps');
    const value = body();
    if (result) {
      const coerced = fn.coerce(value, type);
      fn.line(`${result} = ${managed ? fn.own(coerced) : coerced.code};`);
    } else if (value.code.length > 0) {
      fn.line(`${value.code};`);
    }
    fn.popFrame();
    fn.close();
    return result ? { code: result, type, owned: managed } : VOID_VALUE;
  }

  // ----------------------------------------------------------
  // 调用
  // ----------------------------------------------------------

  private call(expr: Call): Value {
    const { fn } = this;
    const resolution = this.bindings.calls.get(expr);
    if (!resolution) throw new InternalCompilerError('Unresolved call', expr.span);
    switch (resolution.kind) {
      case 'function': {
        // 静态方法不使用所属类的类型实参
        const methodArgs = resolution.typeArgs.map(a => fn.subst(a));
        const sig = this.ctx.signature(resolution.method, [], methodArgs);
        const args = this.arguments(expr.args, sig.params);
        const name = this.ctx.functionName(resolution.method, [], methodArgs);
        return this.result(`${name}(${args.join(', ')})`, sig.ret);
      }
      case 'method':
        return this.methodCall(expr, resolution);
      case 'superConstructor':
        throw new InternalCompilerError("'super(...)' outside of constructor prologue", expr.span);
      case 'closure': {
        const type = fn.subst(resolution.type);
        if (type.kind !== 'function') throw new InternalCompilerError('Closure call on a non-function', expr.span);
        const [callee, ...args] = this.arguments(expr.args, type.params, () => this.emit(expr.callee));
        if (callee === undefined) throw new InternalCompilerError('Missing callee', expr.span);
        const pointer = functionPointer(type.ret, [OBJECT_C, ...type.params.map(p => cType(p))]);
        return this.result(`((${pointer})AML_INVOKE(${callee}))(${[callee, ...args].join(', ')})`, type.ret);
      }
    }
  }

  /** 调用的结果：Void 调用直接成为语句，其余存入临时变量（返回值为新引用） */
  private result(code: string, ret: Type): Value {
    if (TypeSystem.isVoid(ret)) {
      this.fn.line(`${code};`);
      return VOID_VALUE;
    }
    return this.fn.spill(ret, code, isManaged(ret));
  }

  /**
   * 按形参类型求值实参，返回借用的实参表达式。
   * 给出 `receiver` 时先求值接收者，结果放在首位并固定为可重复使用的形式。
   */
  private arguments(args: readonly Expression[], params: readonly Type[], receiver: (() => Value) | null = null): string[] {
    const { fn } = this;
    const thunks = args.map((arg, i) => () => this.value(arg, params[i] ?? TypeSystem.ERROR));
    if (!receiver) return fn.sequence(thunks).map(v => fn.borrow(v).code);
    const [recv, ...rest] = fn.sequence([receiver, ...thunks]).map(v => fn.borrow(v));
    if (!recv) throw new InternalCompilerError('Missing receiver');
    return [fn.stable(recv).code, ...rest.map(v => v.code)];
  }

  private methodCall(expr: Call, resolution: Extract<CallResolution, { kind: 'method' }>): Value {
    const { fn } = this;
    const { callee } = expr;
    const receiverType = this.receiverType(resolution.receiver);
    const methodArgs = resolution.typeArgs.map(a => fn.subst(a));
    const owner = this.ctx.ownerOf(receiverType, resolution.method);
    const sig = this.ctx.signature(resolution.method, owner.args, methodArgs);
    const self = (): Value => ({ code: fn.selfRef(), type: fn.selfType(), owned: false });
    const receiver = callee.kind === 'Member' && callee.object.kind !== 'Super' ? (): Value => this.emit(callee.object) : self;

    if (resolution.safe) {
      const recv = fn.stable(fn.borrow(receiver()));
      const type = fn.typeOf(expr);
      return this.guarded(recv.code, type, () => {
        const args = this.arguments(expr.args, sig.params);
        const code = this.invoke(recv.code, receiverType, resolution.method, resolution.dispatch, methodArgs, args);
        if (TypeSystem.isVoid(sig.ret)) return { code, type: sig.ret, owned: false };
        return fn.spill(sig.ret, code, isManaged(sig.ret));
      });
    }
    const [recv, ...args] = this.arguments(expr.args, sig.params, receiver);
    if (recv === undefined) throw new InternalCompilerError('Missing receiver', expr.span);
    return this.result(this.invoke(recv, receiverType, resolution.method, resolution.dispatch, methodArgs, args), sig.ret);
  }

  /**
   * 方法调用的 C 表达式。`recv` 与实参必须是可重复求值的形式。
   */
  invoke(
    recv: string,
    receiverType: ObjectType,
    method: MethodInfo,
    dispatch: Dispatch,
    methodArgs: readonly Type[],
    args: readonly string[]
  ): string {
    const { ctx } = this;
    const owner = ctx.ownerOf(receiverType, method);
    const all = [recv, ...args].join(', ');
    switch (dispatch) {
      case 'virtual': {
        if (method.slot === null) throw new InternalCompilerError(`Method ${method.qualifiedName} has no vtable slot`);
        const sig = ctx.signature(method, owner.args, methodArgs);
        const pointer = functionPointer(sig.ret, [OBJECT_C, ...sig.params.map(p => cType(p))]);
        return `((${pointer})${recv}->cls->vtable[${method.slot}])(${all})`;
      }
      case 'interface': {
        if (owner.info.kind !== 'interface') throw new InternalCompilerError(`${method.qualifiedName} is not an interface method`);
        if (method.typeParams.length > 0) throw new InternalCompilerError(`Generic interface method ${method.qualifiedName} cannot be dispatched`);
        const index = owner.info.methods.indexOf(method);
        const sig = ctx.signature(method, owner.args, methodArgs);
        const pointer = functionPointer(sig.ret, [OBJECT_C, ...sig.params.map(p => cType(p))]);
        return `((${pointer})aml_find_itable(${recv}, &${interfaceDescriptor(owner)})[${index}])(${all})`;
      }
      case 'direct':
      case 'super':
        return `${ctx.functionName(method, owner.args, methodArgs)}(${all})`;
    }
  }

  /** 构造函数开头的 `super(...)`：在同一对象上运行父类构造函数 */
  superConstructor(expr: Call): void {
    const { fn } = this;
    const resolution = this.bindings.calls.get(expr);
    if (resolution?.kind !== 'superConstructor') throw new InternalCompilerError("Unresolved 'super(...)' call", expr.span);
    const owner = this.receiverType(resolution.owner);
    const args = this.arguments(expr.args, resolution.params.map(p => fn.subst(p)));
    fn.line(`${this.ctx.ctorName(owner, resolution.ctor)}(${[fn.selfRef(), ...args].join(', ')});`);
  }

  private newObject(expr: New): Value {
    const { fn } = this;
    const resolution = this.bindings.news.get(expr);
    if (!resolution) throw new InternalCompilerError('Unresolved object creation', expr.span);
    const type = this.receiverType(resolution.type);
    const params = resolution.params.map(p => fn.subst(p));
    const args = this.arguments(expr.args, params);
    return fn.spill(fn.typeOf(expr), `${this.ctx.newName(type, resolution.ctor)}(${args.join(', ')})`, true);
  }

  // ----------------------------------------------------------
  // 数组、字符串与运算符
  // ----------------------------------------------------------

  private index(expr: Index): Value {
    const { fn } = this;
    const type = fn.typeOf(expr);
    const [object, index] = fn.sequence([() => this.emit(expr.object), () => this.value(expr.index, TypeSystem.INT)]).map(v => fn.stable(fn.borrow(v)));
    if (!object || !index) throw new InternalCompilerError('Malformed index expression', expr.span);
    if (TypeSystem.isString(TypeSystem.nonNull(object.type))) {
      return { code: fn.temp(type, `aml_string_char_at(${object.code}, ${index.code})`), type, owned: false };
    }
    const slot = fn.temp('int32_t', `aml_check_index(${object.code}, ${index.code})`);
    return { code: `AML_ELEMS(${cType(type)}, ${object.code})[${slot}]`, type, owned: false };
  }

  private unary(expr: Unary): Value {
    const { fn } = this;
    const type = fn.typeOf(expr);
    if (expr.op === '!') return { code: `(!${this.condition(expr.operand)})`, type: TypeSystem.BOOL, owned: false };
    const { operand } = expr;
    if (type.kind !== 'primitive') throw new InternalCompilerError('Negation of a non-numeric value', expr.span);
    switch (operand.kind) {
      case 'Int':
        return { code: intLiteral(-operand.value, type.name), type, owned: false };
      case 'Long':
        return { code: longLiteral(-BigInt(operand.value)), type, owned: false };
      case 'Float':
        return { code: floatLiteral(-operand.value, operand.precision), type, owned: false };
      default:
        break;
    }
    const value = fn.borrow(this.value(operand, type)).code;
    const unsigned = unsignedCType(type);
    return { code: unsigned ? `AML_NEG(${baseCType(type)}, ${unsigned}, ${value})` : `(-${value})`, type, owned: false };
  }

  private binary(expr: Binary): Value {
    const { fn } = this;
    switch (expr.op) {
      case '&&':
      case '||':
        return this.logical(expr);
      case '==':
      case '!=': {
        const [left, right] = fn.sequence([() => this.emit(expr.left), () => this.emit(expr.right)]).map(v => fn.borrow(v));
        if (!left || !right) throw new InternalCompilerError('Malformed comparison', expr.span);
        const code = this.equality(this.equalityPlanOf(expr), left, right);
        return { code: expr.op === '==' ? code : `(!${code})`, type: TypeSystem.BOOL, owned: false };
      }
      default:
        break;
    }
    const type = fn.typeOf(expr);
    if (expr.op === '+' && TypeSystem.isString(type)) return this.concat(this.pieces(expr));
    const operand = this.bindings.operandTypes.get(expr);
    if (!operand || operand.kind !== 'primitive') throw new InternalCompilerError('Arithmetic without operand type', expr.span);
    const [a, b] = fn.sequence([() => this.value(expr.left, operand), () => this.value(expr.right, operand)]);
    if (!a || !b) throw new InternalCompilerError('Malformed arithmetic', expr.span);
    return { code: this.arithmetic(expr.op, operand, a.code, b.code), type, owned: false };
  }

  /** 数值运算与比较；整数运算按位宽回绕，除零在运行时报错 */
  arithmetic(op: BinaryOperator, type: PrimitiveType, a: string, b: string): string {
    const c = baseCType(type);
    const unsigned = unsignedCType(type);
    switch (op) {
      case '+':
      case '-':
      case '*':
        return unsigned ? `AML_WRAP(${c}, ${unsigned}, ${a}, ${op}, ${b})` : `(${a} ${op} ${b})`;
      case '/':
        return isIntegral(type) ? `((${c})aml_div(${a}, ${b}))` : `(${a} / ${b})`;
      case '%':
        if (isIntegral(type)) return `((${c})aml_rem(${a}, ${b}))`;
        return type.name === 'Float' ? `fmodf(${a}, ${b})` : `fmod(${a}, ${b})`;
      default:
        return `(${a} ${op} ${b})`;
    }
  }

  /** `&&` / `||`：右操作数需要前置语句时改写为条件语句 */
  private logical(expr: Binary): Value {
    const { fn } = this;
    const left = this.condition(expr.left);
    const { lines, result: right } = fn.isolate(() => fn.condition(() => this.condition(expr.right)));
    if (lines.length === 0) return { code: `(${left} ${expr.op} ${right})`, type: TypeSystem.BOOL, owned: false };
    const result = fn.temp('bool', left);
    fn.open(expr.op === '&&' ? `if (${result}) {` : `if (!${result}) {`);
    fn.splice(lines);
    fn.line(`${result} = ${right};`);
    fn.close();
    return { code: result, type: TypeSystem.BOOL, owned: false };
  }

  private equalityPlanOf(expr: Binary): EqualityPlan {
    const { fn } = this;
    const plan = fn.env.subst.size > 0 ? equalityPlan(fn.typeOf(expr.left), fn.typeOf(expr.right)) : this.bindings.equality.get(expr);
    if (!plan) throw new InternalCompilerError('Comparison without equality plan', expr.span);
    return plan;
  }

  /** 按相等方案比较两个借用值 */
  equality(plan: EqualityPlan, left: Value, right: Value): string {
    const { fn } = this;
    switch (plan.kind) {
      case 'primitive': {
        const operand = fn.subst(plan.operand);
        return `(${fn.coerce(left, operand).code} == ${fn.coerce(right, operand).code})`;
      }
      case 'nullablePrimitive': {
        const operand = TypeSystem.withNullable(fn.subst(plan.operand), true);
        const a = fn.stable(fn.coerce(left, operand)).code;
        const b = fn.stable(fn.coerce(right, operand)).code;
        return `(${a}.has == ${b}.has && (!${a}.has || ${a}.value == ${b}.value))`;
      }
      case 'string':
        return `aml_string_equals(${left.code}, ${right.code})`;
      case 'identity':
        return `(${left.code} == ${right.code})`;
      case 'nullCheck': {
        const value = plan.side === 'left' ? left : right;
        if (value.type.kind === 'null') return 'true';
        return TypeSystem.isNullablePrimitive(value.type) ? `(!${value.code}.has)` : `(${value.code} == NULL)`;
      }
      case 'method':
        return this.equalsCall(plan.method, left, right);
    }
  }

  /** 调用 `equals`；任一侧为 null 时按引用比较 */
  private equalsCall(method: MethodInfo, left: Value, right: Value): string {
    const { fn } = this;
    const a = fn.stable(left);
    const b = fn.stable(right);
    if (a.type.kind !== 'object') throw new InternalCompilerError('equals() on a non-object');
    const receiverType = TypeSystem.nonNullObject(a.type);
    const owner = this.ctx.ownerOf(receiverType, method);
    const [param] = this.ctx.signature(method, owner.args, []).params;
    if (!param) throw new InternalCompilerError('equals() without parameter');
    const checks: string[] = [];
    if (TypeSystem.isNullable(a.type)) checks.push(`${a.code} == NULL`);
    if (TypeSystem.isNullable(b.type) && !TypeSystem.isNullable(param)) checks.push(`${b.code} == NULL`);
    const dispatch: Dispatch = method.owner?.kind === 'interface' ? 'interface' : method.slot !== null ? 'virtual' : 'direct';
    const call = this.invoke(a.code, receiverType, method, dispatch, [], [fn.coerce(b, param).code]);
    if (checks.length === 0) return fn.temp('bool', call);
    const result = fn.temp('bool', 'false');
    fn.open(`if (${checks.join(' || ')}) {`);
    fn.line(`${result} = (${a.code} == ${b.code});`);
    fn.reopen('} else {');
    fn.line(`${result} = ${call};`);
    fn.close();
    return result;
  }

  // ----------------------------------------------------------
  // 字符串拼接
  // ----------------------------------------------------------

  /** 展开嵌套的字符串 `+`，使整条拼接链共用一个缓冲 */
  private pieces(expr: Expression): Piece[] {
    if (expr.kind === 'Binary' && expr.op === '+' && this.bindings.stringify.has(expr.left) && TypeSystem.isString(this.fn.typeOf(expr))) {
      return [...this.pieces(expr.left), ...this.pieces(expr.right)];
    }
    if (expr.kind === 'Interpolated') return expr.parts.map(partPiece);
    if (expr.kind === 'String') return [{ kind: 'text', value: expr.value }];
    return [{ kind: 'expr', expr }];
  }

  private concat(pieces: readonly Piece[]): Value {
    const { fn } = this;
    const builder = fn.tempName();
    fn.line(`aml_builder ${builder};`);
    fn.line(`aml_builder_init(&${builder});`);
    for (const piece of pieces) {
      if (piece.kind === 'text') {
        this.appendText(builder, piece.value);
        continue;
      }
      const value = fn.borrow(this.emit(piece.expr));
      this.append(builder, value, this.stringifyPlanOf(piece.expr, value.type));
    }
    return fn.spill(TypeSystem.STRING, `aml_builder_finish(&${builder})`, true);
  }

  appendText(builder: string, text: string): void {
    if (text.length === 0) return;
    this.fn.line(`aml_builder_units(&${builder}, ${this.fn.env.unit.literal(text)}, ${text.length});`);
  }

  stringifyPlanOf(expr: Expression, type: Type): StringifyPlan {
    if (this.fn.env.subst.size > 0) return stringifyPlan(type);
    return this.bindings.stringify.get(expr) ?? stringifyPlan(type);
  }

  /** 把借用值按方案追加到缓冲 */
  append(builder: string, value: Value, plan: StringifyPlan): void {
    const { fn } = this;
    const b = `&${builder}`;
    switch (plan.kind) {
      case 'string':
        fn.line(`aml_builder_string(${b}, ${value.code});`);
        return;
      case 'primitive': {
        const type = value.type;
        if (type.kind !== 'primitive') throw new InternalCompilerError('Primitive stringify of a non-primitive');
        if (!type.nullable) {
          fn.line(`${this.appendPrimitive(type, value.code, b)};`);
          return;
        }
        const v = fn.stable(value).code;
        fn.line(`if (${v}.has) ${this.appendPrimitive(type, `${v}.value`, b)}; else aml_builder_null(${b});`);
        return;
      }
      case 'method': {
        const recv = fn.stable(value);
        if (recv.type.kind !== 'object') throw new InternalCompilerError('toString() on a non-object');
        const receiverType = TypeSystem.nonNullObject(recv.type);
        const { method } = plan;
        const dispatch: Dispatch = method.owner?.kind === 'interface' ? 'interface' : method.slot !== null ? 'virtual' : 'direct';
        const call = this.invoke(recv.code, receiverType, method, dispatch, [], []);
        const text = fn.tempName();
        if (TypeSystem.isNullable(recv.type)) {
          fn.line(`aml_object *${text} = ${recv.code} == NULL ? NULL : ${call};`);
        } else {
          fn.line(`aml_object *${text} = ${call};`);
        }
        fn.line(`aml_builder_string(${b}, ${text});`);
        fn.line(`aml_release(${text});`);
        return;
      }
      case 'dynamic': {
        const text = fn.temp(TypeSystem.STRING, `aml_to_string(${value.code})`);
        fn.line(`aml_builder_string(${b}, ${text});`);
        fn.line(`aml_release(${text});`);
        return;
      }
    }
  }

  private appendPrimitive(type: PrimitiveType, code: string, builder: string): string {
    switch (type.name) {
      case 'Float':
        return `aml_builder_float(${builder}, ${code})`;
      case 'Double':
        return `aml_builder_double(${builder}, ${code})`;
      case 'Bool':
        return `aml_builder_bool(${builder}, ${code})`;
      case 'Char':
        return `aml_builder_char(${builder}, ${code})`;
      case 'String':
        return `aml_builder_string(${builder}, ${code})`;
      case 'Void':
        throw new InternalCompilerError('Void value in string concatenation');
      default:
        return `aml_builder_long(${builder}, (int64_t)${code})`;
    }
  }

  // ----------------------------------------------------------
  // 赋值
  // ----------------------------------------------------------

  private assign(expr: Assign): Value {
    const { fn } = this;
    const { target } = expr;
    const compound = expr.op === '=' ? null : this.bindings.compound.get(expr);
    if (expr.op !== '=' && !compound) throw new InternalCompilerError('Compound assignment without operation type', expr.span);

    let type: Type;
    let place: (values: readonly Value[]) => string;
    const thunks: Array<() => Value> = [];
    switch (target.kind) {
      case 'Name': {
        const resolution = this.bindings.names.get(target);
        if (!resolution) throw new InternalCompilerError(`Unresolved name ${target.name}`, target.span);
        if (resolution.kind === 'local') {
          type = fn.localType(resolution.local);
          const ref = fn.ref(resolution.local);
          place = () => ref;
        } else if (resolution.kind === 'field') {
          type = fn.typeOf(target);
          const receiver = this.receiverType(resolution.receiver);
          place = () => this.ctx.fieldAccess(receiver, resolution.field, fn.selfRef());
        } else {
          type = fn.typeOf(target);
          place = () => staticFieldName(resolution.field);
        }
        break;
      }
      case 'Member': {
        const resolution = this.bindings.members.get(target);
        if (!resolution) throw new InternalCompilerError(`Unresolved member ${target.name}`, target.span);
        type = fn.typeOf(target);
        if (resolution.kind === 'static' || resolution.kind === 'global') {
          place = () => staticFieldName(resolution.field);
          break;
        }
        if (resolution.kind !== 'field') throw new InternalCompilerError('Assignment to a read-only member', target.span);
        const receiver = this.receiverType(resolution.receiver);
        const object = target.object;
        thunks.push(object.kind === 'Super' ? () => ({ code: fn.selfRef(), type: fn.selfType(), owned: false }) : () => this.emit(object));
        place = ([recv]) => this.ctx.fieldAccess(receiver, resolution.field, recv?.code ?? fn.selfRef());
        break;
      }
      case 'Index': {
        type = fn.typeOf(target);
        const elementType = cType(type);
        thunks.push(() => this.emit(target.object), () => this.value(target.index, TypeSystem.INT));
        place = ([array, index]) => {
          if (!array || !index) throw new InternalCompilerError('Malformed index target', target.span);
          const slot = fn.temp('int32_t', `aml_check_index(${array.code}, ${index.code})`);
          return `AML_ELEMS(${elementType}, ${array.code})[${slot}]`;
        };
        break;
      }
      default:
        throw new InternalCompilerError(`Invalid assignment target ${target.kind}`, target.span);
    }

    const targetType = type;
    const count = thunks.length;
    thunks.push(() => (compound ? this.emit(expr.value) : this.value(expr.value, targetType)));
    const values = fn.sequence(thunks);
    const lvalue = place(values.slice(0, count).map(v => fn.stable(fn.borrow(v))));
    const value = values[count];
    if (!value) throw new InternalCompilerError('Missing assigned value', expr.span);

    let stored: Value = value;
    if (compound && TypeSystem.isString(compound)) {
      const builder = fn.tempName();
      fn.line(`aml_builder ${builder};`);
      fn.line(`aml_builder_init(&${builder});`);
      fn.line(`aml_builder_string(&${builder}, ${lvalue});`);
      this.append(builder, fn.borrow(value), this.stringifyPlanOf(expr.value, value.type));
      stored = fn.spill(TypeSystem.STRING, `aml_builder_finish(&${builder})`, true);
    } else if (compound) {
      if (compound.kind !== 'primitive' || targetType.kind !== 'primitive') {
        throw new InternalCompilerError('Compound assignment on a non-primitive', expr.span);
      }
      const current = fn.coerce({ code: lvalue, type: targetType, owned: false }, compound).code;
      const operand = fn.coerce(value, compound).code;
      const result = this.arithmetic(arithmeticOf(expr.op), compound, current, operand);
      const narrowed = compound.name === targetType.name ? result : `((${baseCType(targetType)})${result})`;
      stored = { code: narrowed, type: targetType, owned: false };
    }
    this.store(lvalue, targetType, fn.coerce(stored, targetType));
    return { code: lvalue, type: targetType, owned: false };
  }

  /** 写入变量、字段或元素；受管值转移一个引用并释放旧值 */
  store(lvalue: string, type: Type, value: Value): void {
    if (isManaged(type)) this.fn.line(`aml_store(&${lvalue}, ${this.fn.own(value)});`);
    else this.fn.line(`${lvalue} = ${value.code};`);
  }

  // ----------------------------------------------------------
  // 条件、数组字面量与 lambda
  // ----------------------------------------------------------

  private conditional(expr: Conditional): Value {
    const { fn } = this;
    const type = fn.typeOf(expr);
    const cond = fn.condition(() => this.condition(expr.cond));
    if (isPure(expr.then) && isPure(expr.otherwise)) {
      const a = fn.coerce(this.emit(expr.then), type);
      const b = fn.coerce(this.emit(expr.otherwise), type);
      return { code: `(${cond} ? ${a.code} : ${b.code})`, type, owned: false };
    }
    const managed = isManaged(type);
    const result = fn.temp(type, zeroValue(type));
    const branch = (e: Expression): void => {
      fn.pushFrame('temps');
      const v = this.value(e, type);
      fn.line(`${result} = ${managed ? fn.own(v) : v.code};`);
      fn.popFrame();
    };
    fn.open(`if (${cond}) {`);
    branch(expr.then);
    fn.reopen('} else {');
    branch(expr.otherwise);
    fn.close();
    return { code: result, type, owned: managed };
  }

  private arrayLiteral(expr: ArrayLiteral): Value {
    const { fn } = this;
    const type = fn.typeOf(expr);
    if (type.kind !== 'array') throw new InternalCompilerError('Array literal without an array type', expr.span);
    const element = type.element;
    const elementType = cType(element);
    const array = fn.spill(type, `aml_array_new(${expr.elements.length}, sizeof(${elementType}), ${isManaged(element)})`, true);
    expr.elements.forEach((e, i) => {
      fn.pushFrame('temps');
      const v = this.value(e, element);
      fn.line(`AML_ELEMS(${elementType}, ${array.code})[${i}] = ${isManaged(element) ? fn.own(v) : v.code};`);
      fn.popFrame();
    });
    return array;
  }

  private closure(info: LambdaInfo): Value {
    const { fn } = this;
    const struct = this.lambdas.closure(info, fn);
    const type = fn.subst(info.type);
    const result = fn.spill(type, `aml_closure_new(sizeof(${struct}), (aml_fn)${struct}__invoke, ${struct}__destroy)`, true);
    for (const local of info.captures) {
      const localType = fn.localType(local);
      const value: Value = { code: fn.ref(local), type: localType, owned: false };
      fn.line(`((${struct} *)${result.code})->${captureName(local)} = ${isManaged(localType) ? fn.own(value) : value.code};`);
    }
    return result;
  }

  // ----------------------------------------------------------
  // 类型转换与类型检查
  // ----------------------------------------------------------

  private cast(expr: Cast): Value {
    const { fn } = this;
    const declared = this.bindings.targets.get(expr);
    if (!declared) throw new InternalCompilerError('Cast without target type', expr.span);
    const target = fn.subst(declared);
    const value = this.emit(expr.expr);
    const source = value.type;
    if (source.kind === 'primitive' && target.kind === 'primitive' && !isManaged(target)) {
      return this.convertPrimitive(value, source, target);
    }
    if (!isManaged(target)) throw new InternalCompilerError(`Cannot cast ${TypeSystem.format(source)} to ${TypeSystem.format(target)}`, expr.span);
    if (source.kind === 'null') return { code: 'NULL', type: target, owned: false };
    const nonNull = TypeSystem.nonNull(target);
    let code: string;
    if (TypeSystem.canCastTo(TypeSystem.nonNull(source), nonNull)) {
      if (!TypeSystem.isNullable(source) || TypeSystem.isNullable(target)) return { ...value, type: target };
      code = `aml_check_not_null(${value.code})`;
    } else if (nonNull.kind === 'object') {
      const checked = nonNull.info.kind === 'class' ? `aml_cast_class(${value.code}, &${classDescriptor(nonNull)}` : `aml_cast_iface(${value.code}, &${interfaceDescriptor(nonNull)}`;
      code = `${checked}, ${TypeSystem.isNullable(target)})`;
    } else {
      throw new InternalCompilerError(`Cannot cast ${TypeSystem.format(source)} to ${TypeSystem.format(target)}`, expr.span);
    }
    return fn.spill(target, code, value.owned);
  }

  /** 数值互转与可空性转换；非空化失败时运行时报错 */
  private convertPrimitive(value: Value, source: PrimitiveType, target: PrimitiveType): Value {
    const { fn } = this;
    const c = baseCType(target);
    const convert = (code: string): string => (source.name === target.name ? code : `((${c})${code})`);
    if (!source.nullable) {
      const inner = convert(value.code);
      return { code: target.nullable ? `AML_SOME(${target.name}, ${inner})` : inner, type: target, owned: false };
    }
    if (!target.nullable) return { code: convert(`aml_unwrap_${source.name}(${value.code})`), type: target, owned: false };
    const s = fn.stable(value).code;
    return {
      code: `(${s}.has ? AML_SOME(${target.name}, ${convert(`${s}.value`)}) : AML_NONE(${target.name}))`,
      type: target,
      owned: false,
    };
  }

  private typeCheck(expr: TypeCheck): Value {
    const { fn } = this;
    const declared = this.bindings.targets.get(expr);
    if (!declared) throw new InternalCompilerError('Type check without target type', expr.span);
    const target = fn.subst(declared);
    const value = fn.borrow(this.emit(expr.expr));
    if (target.kind !== 'object' || !isManaged(value.type)) return { code: 'false', type: TypeSystem.BOOL, owned: false };
    const test = target.info.kind === 'class' ? `aml_is_class(${value.code}, &${classDescriptor(target)})` : `aml_is_iface(${value.code}, &${interfaceDescriptor(target)})`;
    return { code: test, type: TypeSystem.BOOL, owned: false };
  }
}

function arithmeticOf(op: Assign['op']): BinaryOperator {
  switch (op) {
    case '+=':
      return '+';
    case '-=':
      return '-';
    case '*=':
      return '*';
    case '/=':
      return '/';
    case '%=':
      return '%';
    case '=':
      throw new InternalCompilerError('Plain assignment has no arithmetic');
  }
}

function partPiece(part: InterpolationPart): Piece {
  return part.kind === 'text' ? { kind: 'text', value: part.value } : { kind: 'expr', expr: part.expr };
}

/** 求值不产生语句也不产生新引用的表达式 */
function isPure(expr: Expression): boolean {
  switch (expr.kind) {
    case 'Int':
    case 'Long':
    case 'Float':
    case 'Char':
    case 'Bool':
    case 'Null':
    case 'Name':
    case 'This':
      return true;
    case 'Member':
      return !expr.safe && (expr.object.kind === 'Super' || isPure(expr.object));
    default:
      return false;
  }
}
