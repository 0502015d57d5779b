import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TypeSystem } from '../../../src/binder/index.js';
import { compile } from '../../../src/driver/index.js';
import { boundFile, codes, compileOk, compileSources } from '../../helpers/test-utils.js';

async function messages(source: string, path = 'src/app.aml'): Promise<string[]> {
  const result = await compileSources({ [path]: source });
  return result.diagnostics.map(d => `${d.code} ${d.message}`);
}

describe('绑定器', () => {
  it('合法程序不产生诊断', async () => {
    await compileOk({
      'src/app.aml': `
namespace app {
  class Counter {
    var count: Int = 0
    fun inc(): Int {
      count += 1
      return count
    }
  }

  fun main() {
    val c = new Counter()
    c.inc()
    System.println("count: \${c.inc()}")
  }
}
`,
    });
  });

  describe('名称与类型', () => {
    it('未解析的名称报告 B001', async () => {
      assert.deepEqual(await messages('namespace app { fun f(): Int { return y } }'), ["B001 Unresolved symbol 'y'"]);
    });

    it('类型不兼容的初始化报告 B002', async () => {
      assert.deepEqual(await messages('namespace app { fun f() { val x: Int = "a" } }'), [
        'B002 Type mismatch: expected Int, found String',
      ]);
    });

    it('在需要非空值处使用可空值报告 B003', async () => {
      assert.deepEqual(await messages('namespace app { fun f(s: String?): Int { return s.length } }'), [
        'B003 Nullable value of type String? used where String is required',
      ]);
    });

    it('null 检查与提前返回会收窄可空类型', async () => {
      await compileOk({
        'src/app.aml': `
namespace app {
  fun f(s: String?): Int {
    if (s != null) {
      return s.length
    }
    return 0
  }

  fun g(s: String?): Int {
    if (s == null) {
      return 0
    }
    return s.length
  }
}
`,
      });
    });

    it('已由赋值收窄的可空局部变量仍可与 null 比较', async () => {
      const result = await compileOk({
        'src/app.aml': `
namespace app {
  fun main() {
    var s: String? = "a"
    if (s != null) { System.println(s) }
    val y: Int? = 4
    if (y == null) { return }
    var x: Int? = null
    x = 4
    if (null != x) { System.println("x") }
  }
}
`,
      });
      const plans = [...boundFile(result, 'src/app.aml').bindings.equality.values()];

      assert.deepEqual(
        plans.map(plan => plan.kind === 'nullCheck' ? plan.side : plan.kind),
        ['left', 'left', 'right']
      );
    });

    it('非空形参与 null 比较报告 B002', async () => {
      assert.deepEqual(await messages('namespace app { fun f(s: String): Bool { return s == null } }'), [
        'B002 Type mismatch: expected String, found null',
      ]);
    });

    it('无标注的全局变量按初始化式的字面形式推断类型', async () => {
      const result = await compileOk({
        'src/app.aml': 'namespace app {\n  class P { }\n  val a = -2L\n  val b = "n=${a}"\n  val p = new P()\n}',
      });

      assert.deepEqual(
        result.program.globalOrder.filter(g => g.namespace === 'app').map(g => `${g.name}: ${TypeSystem.format(g.type)}`),
        ['a: Long', 'b: String', 'p: app.P']
      );
    });

    it('无标注且初始化式不是字面形式时报告 B002', async () => {
      assert.deepEqual(await messages('namespace app {\n  var a = 1\n  var b = a + 1\n}'), [
        'B002 Type mismatch: expected a type annotation, found an initializer of unknown type',
      ]);
    });

    it('泛型实参个数不符报告 B020', async () => {
      assert.deepEqual(await messages('namespace app {\n  class Box<T> { }\n  fun f(b: Box<Int, Int>) { }\n}'), [
        "B020 'app.Box' expects 1 type argument(s), found 2",
      ]);
    });
  });

  describe('重载决议', () => {
    const overloads = `
namespace app {
  fun f(x: Int) { }
  fun f(x: Long) { }

  fun useShort(s: Short) { f(s) }
  fun useLong(l: Long) { f(l) }
}
`;

    it('选择转换代价最小的重载', async () => {
      const result = await compileOk({ 'src/app.aml': overloads });
      const bound = boundFile(result, 'src/app.aml');
      const chosen = [...bound.bindings.calls.values()].flatMap(call =>
        call.kind === 'function' && call.method.name === 'f' ? [call.method.params.map(p => TypeSystem.format(p)).join(', ')] : []
      );

      assert.deepEqual(chosen, ['Int', 'Long']);
    });

    it('多个候选代价相同时报告 B004 并列出候选', async () => {
      const source = `
namespace app {
  fun f(x: Int, y: Long) { }
  fun f(x: Long, y: Int) { }
  fun g() { f(1, 1) }
}
`;
      assert.deepEqual(await messages(source), [
        "B004 Ambiguous call to 'f': candidates app.f(Int, Long), app.f(Long, Int)",
      ]);
    });

    it('没有可用重载时报告 B012', async () => {
      assert.deepEqual(await messages('namespace app {\n  fun f(x: Int) { }\n  fun g() { f("a") }\n}'), [
        "B012 No overload of 'f' accepts (String)",
      ]);
    });
  });

  describe('类与接口', () => {
    it('未实现接口方法报告 B005，位置指向类声明', async () => {
      const result = await compileSources({
        'src/app.aml': 'namespace app {\n  interface Shape { fun area(): Int }\n  class Square implements Shape { }\n}',
      });

      assert.deepEqual(
        result.diagnostics.map(d => `${d.code} ${d.message}`),
        ["B005 Class 'app.Square' does not implement 'area' from interface 'app.Shape'"]
      );
      assert.equal(result.diagnostics[0]?.span.start.line, 3);
    });

    it('同一类中重复的方法签名报告 B010', async () => {
      assert.deepEqual(await messages('namespace app {\n  class C {\n    fun m() { }\n    fun m() { }\n  }\n}'), [
        "B010 Duplicate declaration of 'app.C.m'",
      ]);
    });

    it('覆盖方法改变返回类型报告 B018', async () => {
      const source = `
namespace app {
  class A { fun m(): Int { return 1 } }
  class B extends A { fun m(): Long { return 1 } }
}
`;
      assert.deepEqual(await messages(source), ["B018 Method 'app.B.m' overrides 'app.A.m' with a different return type"]);
    });

    it('静态方法读取实例字段报告 B021', async () => {
      const source = `
namespace app {
  class C {
    var v: Int = 0
    static fun s(): Int { return v }
  }
}
`;
      assert.deepEqual(await messages(source), ["B021 'v' is not accessible from a static context"]);
    });
  });

  describe('语句与控制流', () => {
    it('重复的 case 值报告 B008', async () => {
      assert.deepEqual(await messages('namespace app { fun f(x: Int) { switch (x) { case 1: case 1: } } }'), [
        'B008 Duplicate case value 1',
      ]);
    });

    it('数值 subject 的 case 按数值判断重复', async () => {
      assert.deepEqual(
        await messages('namespace app {\n  fun f(x: Int) { switch (x) { case 97: case \'a\': } }\n  fun g(x: Long) { switch (x) { case 0: case -0L: } }\n}'),
        ["B008 Duplicate case value 'a'", 'B008 Duplicate case value -0']
      );
    });

    it('default 之后的 case 在语法阶段报告 P003', async () => {
      const result = await compileSources({ 'src/app.aml': 'namespace app { fun f(x: Int) { switch (x) { default: case 1: } } }' });

      assert.deepEqual(codes(result), ['P003']);
      assert.equal(result.success, false);
    });

    it('给 val 赋值报告 B014', async () => {
      assert.deepEqual(await messages('namespace app {\n  fun f() {\n    val a = 1\n    a = 2\n  }\n}'), [
        "B014 Cannot assign to immutable 'a'",
      ]);
    });

    it('lambda 中给捕获的变量赋值报告 B015', async () => {
      assert.deepEqual(await messages('namespace app {\n  fun f() {\n    var n = 1\n    val g = fun (): Void { n = 2 }\n  }\n}'), [
        "B015 Cannot assign to captured variable 'n' inside a lambda",
      ]);
    });

    it('循环外的 break 报告 B016', async () => {
      assert.deepEqual(await messages('namespace app { fun f() { break } }'), ["B016 'break' outside of a loop"]);
    });

    it('并非所有路径都返回值时报告 B017', async () => {
      assert.deepEqual(await messages('namespace app {\n  fun f(x: Int): Int {\n    if (x > 0) { return 1 }\n  }\n}'), [
        "B017 Function 'app.f' must return a value of type Int on every path",
      ]);
    });
  });

  describe('测试与特性', () => {
    it('测试根目录之外的 test 报告 B006', async () => {
      assert.deepEqual(await messages('namespace app { test t() { } }'), ["B006 Test 'app.t' is declared outside the tests/ root"]);
    });

    it('测试根目录中的 test 被记录', async () => {
      const result = await compileOk({ 'tests/app_test.aml': 'namespace app { test first() { }\ntest second { } }' });

      assert.deepEqual(
        boundFile(result, 'tests/app_test.aml').tests.map(t => t.qualifiedName),
        ['app.first', 'app.second']
      );
    });

    it('引用本单元未启用特性的声明报告 B009', async () => {
      const result = await compile(
        [
          { path: 'src/net.aml', source: 'namespace app {\n  #require net\n  class Http { }\n}', features: ['net'] },
          { path: 'src/app.aml', source: 'namespace app {\n  fun f(h: Http) { }\n}', features: [] },
        ],
        { workers: 1 }
      );

      assert.deepEqual(
        result.diagnostics.map(d => `${d.file} ${d.code} ${d.message}`),
        ["src/app.aml B009 'app.Http' requires feature 'net', which is not enabled for this unit"]
      );
    });
  });

  describe('mock', () => {
    it('mock 只在所在作用域内替换 new 的目标', async () => {
      const result = await compileOk({
        'tests/clock_test.aml': `
namespace app {
  class Clock {
    fun now(): Int { return 0 }
  }

  test frozen() {
    scope {
      mock Clock {
        fun now(): Int { return 42 }
      }
      val inner = new Clock()
      inner.now()
    }
    val outer = new Clock()
    outer.now()
  }
}
`,
      });
      const bound = boundFile(result, 'tests/clock_test.aml');

      assert.deepEqual(
        [...bound.bindings.news.values()].map(n => n.type.info.qualifiedName),
        ['app.Clock$Mock1_0', 'app.Clock']
      );
      assert.deepEqual(
        bound.mockClasses.map(m => m.mockOf?.qualifiedName),
        ['app.Clock']
      );
    });
  });
});
