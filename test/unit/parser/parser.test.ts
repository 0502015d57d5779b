import { describe, it, test } from 'node:test';
import assert from 'node:assert/strict';
import { parseSource } from '../../../src/parser.js';
import type {
  Expression,
  FunctionDecl,
  SourceFile,
  Statement,
  TopLevelDecl,
  TypeRef,
} from '../../../src/types.js';

function parseOk(source: string): SourceFile {
  const { ast, diagnostics } = parseSource(source, { file: 'src/test.aml' });
  assert.deepEqual(
    diagnostics.map(d => `${d.code} ${d.message}`),
    [],
    '不应该产生诊断'
  );
  return ast;
}

/** 将表达式渲染为 S 表达式，便于断言结构 */
function show(expr: Expression): string {
  switch (expr.kind) {
    case 'Int':
    case 'Float':
    case 'Char':
    case 'Bool':
      return String(expr.value);
    case 'Long':
      return `${expr.value}L`;
    case 'String':
      return JSON.stringify(expr.value);
    case 'Null':
      return 'null';
    case 'Name':
      return expr.name;
    case 'This':
      return 'this';
    case 'Super':
      return 'super';
    case 'Member':
      return `(${expr.safe ? '?.' : '.'} ${show(expr.object)} ${expr.name})`;
    case 'Call':
      return `(call ${[expr.callee, ...expr.args].map(show).join(' ')})`;
    case 'Index':
      return `(index ${show(expr.object)} ${show(expr.index)})`;
    case 'Unary':
      return `(${expr.op} ${show(expr.operand)})`;
    case 'Binary':
      return `(${expr.op} ${show(expr.left)} ${show(expr.right)})`;
    case 'Assign':
      return `(${expr.op} ${show(expr.target)} ${show(expr.value)})`;
    case 'Conditional':
      return `(if ${show(expr.cond)} ${show(expr.then)} ${show(expr.otherwise)})`;
    case 'Cast':
      return `(as ${show(expr.expr)} ${typeName(expr.type)})`;
    case 'TypeCheck':
      return `(is ${show(expr.expr)} ${typeName(expr.type)})`;
    case 'New':
      return `(new ${typeName(expr.type)}${expr.args.map(a => ` ${show(a)}`).join('')})`;
    case 'NewArray':
      return `(new-array ${typeName(expr.element)} ${show(expr.size)})`;
    case 'ArrayLiteral':
      return `[${expr.elements.map(show).join(' ')}]`;
    case 'Interpolated':
      return `(str ${expr.parts.map(p => (p.kind === 'text' ? JSON.stringify(p.value) : show(p.expr))).join(' ')})`;
    case 'Lambda':
      return `(fun ${expr.params.map(p => p.name).join(' ')})`;
  }
}

function typeName(type: TypeRef): string {
  const suffix = type.nullable ? '?' : '';
  switch (type.kind) {
    case 'NamedType': {
      const args = type.args.length > 0 ? `<${type.args.map(typeName).join(', ')}>` : '';
      return `${type.name.join('.')}${args}${suffix}`;
    }
    case 'ArrayType':
      return `${typeName(type.element)}[]${suffix}`;
    case 'FunctionType':
      return `(${type.params.map(typeName).join(', ')}) -> ${typeName(type.ret)}${suffix}`;
  }
}

function onlyFunction(file: SourceFile): FunctionDecl {
  const decl = file.decls[0];
  assert.ok(decl && decl.kind === 'Function');
  return decl;
}

function bodyOf(source: string): readonly Statement[] {
  const fn = onlyFunction(parseOk(source));
  assert.ok(fn.body);
  return fn.body.statements;
}

function exprOf(source: string): string {
  const [stmt] = bodyOf(`fun f() { ${source} }`);
  assert.ok(stmt && stmt.kind === 'ExprStmt');
  return show(stmt.expr);
}

function declNames(decls: readonly TopLevelDecl[]): string[] {
  return decls.map(d => (d.kind === 'Namespace' ? d.path.join('.') : d.name));
}

describe('语法分析器', () => {
  describe('声明', () => {
    it('应该解析命名空间、导入与类成员', () => {
      const file = parseOk(`
namespace app.model {
  import System
  class Box<T> extends Base implements Shape, Named {
    var value: T
    static val count: Int = 0
    constructor(value: T) { this.value = value }
    fun get(): T { return value }
    native fun raw(): Int
  }
}
`);
      const ns = file.decls[0];
      assert.ok(ns && ns.kind === 'Namespace');
      assert.deepEqual(ns.path, ['app', 'model']);
      assert.deepEqual(ns.imports[0]?.path, ['System']);
      const cls = ns.decls[0];
      assert.ok(cls && cls.kind === 'Class');
      assert.equal(cls.name, 'Box');
      assert.deepEqual(cls.typeParams, ['T']);
      assert.equal(cls.superclass && typeName(cls.superclass), 'Base');
      assert.deepEqual(cls.interfaces.map(typeName), ['Shape', 'Named']);
      const [value, count, ctor, get, raw] = cls.members;
      assert.ok(value?.kind === 'Field' && value.mutable && !value.isStatic);
      assert.ok(count?.kind === 'Field' && !count.mutable && count.isStatic);
      assert.ok(ctor?.kind === 'Function' && ctor.flavor === 'constructor');
      assert.equal(ctor.params.length, 1);
      assert.ok(get?.kind === 'Function' && get.flavor === 'function');
      assert.equal(get.returnType && typeName(get.returnType), 'T');
      assert.ok(raw?.kind === 'Function' && raw.modifiers.isNative);
      assert.equal(raw.body, null);
    });

    it('命名空间内的 var/val 是全局静态变量', () => {
      const ns = parseOk('namespace app { var counter: Int = 0 }').decls[0];
      assert.ok(ns && ns.kind === 'Namespace');
      const field = ns.decls[0];
      assert.ok(field && field.kind === 'Field');
      assert.equal(field.isStatic, true);
      assert.equal(field.mutable, true);
    });

    it('接口方法与修饰符', () => {
      const decl = parseOk('interface Shape<T> extends Named { suspend fun area(): Double }').decls[0];
      assert.ok(decl && decl.kind === 'Interface');
      assert.deepEqual(decl.supers.map(typeName), ['Named']);
      assert.equal(decl.methods[0]?.modifiers.isSuspend, true);
      assert.equal(decl.methods[0]?.body, null);
    });

    it('test 声明被标记为零参数测试函数', () => {
      const file = parseOk('test adds() { }\ntest other { }');
      assert.deepEqual(
        file.decls.map(d => (d.kind === 'Function' ? [d.name, d.flavor, d.params.length] : null)),
        [
          ['adds', 'test', 0],
          ['other', 'test', 0],
        ]
      );
    });

    it('指令附着在下一个声明上', () => {
      const decl = parseOk('#require net\n#requireNot mobile\nclass Http { }').decls[0];
      assert.ok(decl && decl.kind === 'Class');
      assert.deepEqual(
        decl.directives.map(d => [d.name, d.feature]),
        [
          ['require', 'net'],
          ['requireNot', 'mobile'],
        ]
      );
    });

    it('应该解析各种类型注解', () => {
      const fn = onlyFunction(parseOk('fun f(a: Int?, b: String[], c: (Int) -> Bool, d: Map<String, Int[]>?, e: ((Int) -> Int)?) { }'));
      assert.deepEqual(fn.params.map(p => typeName(p.type)), [
        'Int?',
        'String[]',
        '(Int) -> Bool',
        'Map<String, Int[]>?',
        '(Int) -> Int?',
      ]);
      const last = fn.params[4]?.type;
      assert.ok(last && last.kind === 'FunctionType' && last.nullable);
    });
  });

  describe('表达式', () => {
    test('应该遵循运算符优先级', () => {
      assert.equal(exprOf('x = 1 + 2 * 3 == 7 && !b || c'), '(= x (|| (&& (== (+ 1 (* 2 3)) 7) (! b)) c))');
    });

    test('赋值右结合', () => {
      assert.equal(exprOf('a = b += 1'), '(= a (+= b 1))');
    });

    test('as 比乘法结合更紧，is 位于关系运算层', () => {
      assert.equal(exprOf('a * b as Long'), '(* a (as b Long))');
      assert.equal(exprOf('x is Box && y < 2'), '(&& (is x Box) (< y 2))');
    });

    test('负数字面量折叠为常量', () => {
      assert.equal(exprOf('f(-2147483648, -5L, -1.5, -x)'), '(call f -2147483648 -5L -1.5 (- x))');
    });

    test('后缀运算：成员、安全访问、调用与索引', () => {
      assert.equal(exprOf('a?.b.c(1)[2]'), '(index (call (. (?. a b) c) 1) 2)');
      assert.equal(exprOf('super.describe()'), '(call (. super describe))');
    });

    test('new、数组与条件表达式', () => {
      assert.equal(exprOf('v = new Box<Int>(1)'), '(= v (new Box<Int> 1))');
      assert.equal(exprOf('v = new Int[10]'), '(= v (new-array Int 10))');
      assert.equal(exprOf('v = [1, 2,]'), '(= v [1 2])');
      assert.equal(exprOf('v = if (a) 1 else 2'), '(= v (if a 1 2))');
    });

    test('lambda 支持表达式体与块体', () => {
      const [first, second] = bodyOf('fun f() { val g = fun (x: Int): Int => x * 2\nval h = fun (): Void { }\n}');
      assert.ok(first?.kind === 'VarDecl' && first.init?.kind === 'Lambda');
      assert.equal(first.init.body.kind, 'Binary');
      assert.ok(second?.kind === 'VarDecl' && second.init?.kind === 'Lambda');
      assert.equal(second.init.body.kind, 'Block');
    });

    test('插值字符串的表达式片段被完整解析', () => {
      assert.equal(exprOf('s = "Hello ${a + 1}! $name"'), '(= s (str "Hello " (+ a 1) "! " name))');
    });
  });

  describe('语句', () => {
    test('( 只在同一行时延续表达式', () => {
      const statements = bodyOf('fun f() {\n  val a = b\n  (c)\n}');
      assert.equal(statements.length, 2);
      assert.equal(statements[0]?.kind, 'VarDecl');
      const second = statements[1];
      assert.ok(second?.kind === 'ExprStmt');
      assert.equal(show(second.expr), 'c');
    });

    test('return 的操作数必须在同一行', () => {
      const statements = bodyOf('fun f() {\n  return\n  x\n}');
      assert.equal(statements.length, 2);
      const ret = statements[0];
      assert.ok(ret?.kind === 'Return');
      assert.equal(ret.expr, null);
    });

    test('应该解析控制流语句', () => {
      const statements = bodyOf(`fun f() {
  if (a) { } else if (b) { } else { }
  while (c) { break }
  for (i = 0 to 10) { continue }
  loop { }
  throw e;
  scope { mock Clock { fun now(): Int { return 1 } } }
}`);
      assert.deepEqual(
        statements.map(s => s.kind),
        ['If', 'While', 'ForRange', 'Loop', 'Throw', 'Scope']
      );
      const ifStmt = statements[0];
      assert.ok(ifStmt?.kind === 'If' && ifStmt.otherwise?.kind === 'If');
      assert.equal(ifStmt.otherwise.otherwise?.kind, 'Block');
      const range = statements[2];
      assert.ok(range?.kind === 'ForRange');
      assert.equal(range.variable, 'i');
      const scope = statements[5];
      assert.ok(scope?.kind === 'Scope');
      const mock = scope.body.statements[0];
      assert.ok(mock?.kind === 'Mock');
      assert.deepEqual(mock.target.name, ['Clock']);
      assert.equal(mock.members.length, 1);
    });

    test('switch 分支不贯穿，case 可列出多个值', () => {
      const [stmt] = bodyOf('fun f() { switch (x) { case 1, 2: a() case 3: default: b() } }');
      assert.ok(stmt?.kind === 'Switch');
      assert.deepEqual(
        stmt.cases.map(c => [c.values.length, c.isDefault, c.body.statements.length]),
        [
          [2, false, 1],
          [1, false, 0],
          [0, true, 1],
        ]
      );
    });
  });

  describe('错误恢复', () => {
    it('default 之后的 case 被拒绝并丢弃', () => {
      const { ast, diagnostics } = parseSource('fun f() { switch (x) { default: a() case 1: b() } }');
      assert.deepEqual(
        diagnostics.map(d => [d.code, d.kind]),
        [['P003', 'InvalidSwitchOrdering']]
      );
      const fn = onlyFunction(ast);
      const stmt = fn.body?.statements[0];
      assert.ok(stmt?.kind === 'Switch');
      assert.equal(stmt.cases.length, 1);
    });

    it('出错的声明被跳过，其余声明照常解析', () => {
      const { ast, diagnostics } = parseSource(`
class A { fun f() { val = 1 } }
class B { }
fun g( { }
fun h() { }
`);
      assert.deepEqual(declNames(ast.decls), ['B', 'h']);
      assert.deepEqual(
        diagnostics.map(d => d.code),
        ['P001', 'P001']
      );
      assert.equal(diagnostics[0]?.span.start.line, 2);
      assert.equal(diagnostics[1]?.span.start.line, 4);
    });

    it('非法 token 报告为词法错误并被跳过', () => {
      const { ast, diagnostics } = parseSource('class A { } @ class B { }');
      assert.deepEqual(declNames(ast.decls), ['A', 'B']);
      assert.deepEqual(
        diagnostics.map(d => [d.code, d.kind]),
        [['L001', 'InvalidToken']]
      );
    });

    it('未知指令报告 P004，声明保留', () => {
      const { ast, diagnostics } = parseSource('#feature x\nclass A { }');
      assert.deepEqual(
        diagnostics.map(d => d.code),
        ['P004']
      );
      const decl = ast.decls[0];
      assert.ok(decl?.kind === 'Class');
      assert.equal(decl.directives.length, 0);
    });

    it('未闭合的插值报告 P002', () => {
      const { diagnostics } = parseSource('fun f() { val s = "a ${b" }');
      assert.equal(diagnostics[0]?.code, 'P002');
      assert.equal(diagnostics[0]?.kind, 'UnbalancedInterpolation');
    });

    it('接口方法不能有方法体', () => {
      const { ast, diagnostics } = parseSource('interface Shape { fun area(): Double { return 1.0 } }\nclass C { }');
      assert.deepEqual(
        diagnostics.map(d => d.code),
        ['P001']
      );
      assert.deepEqual(declNames(ast.decls), ['C']);
    });
  });

  test('文件节点记录路径与角色', () => {
    const { ast } = parseSource('class A { }', { file: 'tests/a.aml', role: 'test' });
    assert.equal(ast.path, 'tests/a.aml');
    assert.equal(ast.role, 'test');
    assert.deepEqual(declNames(ast.decls), ['A']);
  });
});
