import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { assertLinesInOrder, cLines, compileOk, unitContent } from '../../helpers/test-utils.js';

describe('C 代码生成', () => {
  describe('程序级单元', () => {
    it('按固定顺序输出翻译单元', async () => {
      const result = await compileOk({ 'src/app.aml': 'namespace app { fun main() { } }' });

      assert.deepEqual(
        result.units.map(u => u.name),
        ['aml_program.h', 'am_unit_0_prelude.c', 'am_unit_1_app.c', 'aml_generics.c', 'aml_program.c', 'aml_main.c']
      );
    });

    it('aml_main.c 先运行静态初始化再调用 main', async () => {
      const result = await compileOk({ 'src/app.aml': 'namespace app { fun main() { } }' });

      assert.equal(
        unitContent(result, 'aml_main.c'),
        [
          '/* Generated by amlang-c. Do not edit. */',
          '#include "aml_program.h"',
          '',
          'int main(void) {',
          '  aml_static_init();',
          '  am_app_main();',
          '  return 0;',
          '}',
          '',
        ].join('\n')
      );
    });

    it('返回 Int 的 main 把结果作为退出码', async () => {
      const result = await compileOk({ 'src/app.aml': 'namespace app { fun main(): Int { return 3 } }' });

      assert.ok(cLines(unitContent(result, 'aml_main.c')).includes('return (int)am_app_main();'));
    });

    it('aml_program.c 按文件顺序初始化各单元并登记异常工厂', async () => {
      const result = await compileOk({ 'src/app.aml': 'namespace app { fun main() { } }' });

      assert.equal(
        unitContent(result, 'aml_program.c'),
        [
          '/* Generated by amlang-c. Do not edit. */',
          '#include "aml_program.h"',
          '',
          'static bool aml_initialized = false;',
          '',
          'void aml_static_init(void) {',
          '  if (aml_initialized) return;',
          '  aml_initialized = true;',
          '  aml_exception_factory = am_System_Exception__new;',
          '  am_unit_0__init();',
          '  am_unit_1__init();',
          '}',
          '',
        ].join('\n')
      );
    });

    it('没有 main 时不生成 aml_main.c', async () => {
      const result = await compileOk({ 'src/app.aml': 'namespace app { fun helper() { } }' });

      assert.equal(
        result.units.some(u => u.name === 'aml_main.c'),
        false
      );
    });

    it('测试入口调用测试根目录下的每个 test', async () => {
      const result = await compileOk({ 'tests/app_test.aml': 'namespace app { test mocked() { } }' }, { emitTestRunner: true });

      assertLinesInOrder(cLines(unitContent(result, 'aml_tests.c')), [
        'int main(void) {',
        'int failed = 0;',
        'aml_static_init();',
        'if (!aml_run_test("app.mocked", am_app_mocked)) failed++;',
        'return failed == 0 ? 0 : 1;',
      ]);
    });
  });

  describe('函数体', () => {
    it('switch 生成 if/else 链并把字符串放入字面量池', async () => {
      const result = await compileOk({
        'src/app.aml': `
namespace app {
  fun pick(x: Int): String {
    switch (x) {
      case 1: return "a"
      case 2: return "b"
      default: return "c"
    }
  }
}
`,
      });
      const lines = cLines(unitContent(result, 'am_unit_1_app.c'));

      assertLinesInOrder(lines, [
        'static const uint16_t am_lit_1_0[] = {97};',
        'static const uint16_t am_lit_1_1[] = {98};',
        'static const uint16_t am_lit_1_2[] = {99};',
        /^aml_object \*am_app_pick\(int32_t l_x_\d+\) \{$/,
        /^int32_t tmp0 = l_x_\d+;$/,
        'if ((tmp0 == 1)) {',
        'aml_object *tmp1 = aml_string_new(am_lit_1_0, 1);',
        'return tmp1;',
        '} else if ((tmp0 == 2)) {',
        'aml_object *tmp2 = aml_string_new(am_lit_1_1, 1);',
        'return tmp2;',
        '} else {',
        'aml_object *tmp3 = aml_string_new(am_lit_1_2, 1);',
        'return tmp3;',
      ]);
    });

    it('字符串插值通过 builder 拼接', async () => {
      const result = await compileOk({
        'src/app.aml': 'namespace app {\n  fun greet(name: String): String {\n    return "Hello $name"\n  }\n}',
      });
      const lines = cLines(unitContent(result, 'am_unit_1_app.c'));

      assertLinesInOrder(lines, [
        'static const uint16_t am_lit_1_0[] = {72, 101, 108, 108, 111, 32};',
        /^aml_retain\(l_name_\d+\);$/,
        'aml_builder tmp0;',
        'aml_builder_init(&tmp0);',
        'aml_builder_units(&tmp0, am_lit_1_0, 6);',
        /^aml_builder_string\(&tmp0, l_name_\d+\);$/,
        'aml_object *tmp1 = aml_builder_finish(&tmp0);',
        'aml_object *tmp2 = tmp1;',
        /^aml_release\(l_name_\d+\);$/,
        'return tmp2;',
      ]);
    });

    it('局部引用在作用域结束时释放', async () => {
      const result = await compileOk({
        'src/app.aml': 'namespace app {\n  fun main() {\n    val s = "x"\n    System.println(s)\n  }\n}',
      });
      const lines = cLines(unitContent(result, 'am_unit_1_app.c'));

      assertLinesInOrder(lines, [
        /^aml_object \*l_s_\d+ = NULL;$/,
        'aml_object *tmp0 = aml_string_new(am_lit_1_0, 1);',
        /^aml_store\(&l_s_\d+, tmp0\);$/,
        /^aml_native_println\(l_s_\d+\);$/,
        /^aml_release\(l_s_\d+\);$/,
        /^l_s_\d+ = NULL;$/,
      ]);
    });

    it('throw 之前释放全部存活的局部引用', async () => {
      const result = await compileOk({
        'src/app.aml': 'namespace app {\n  class Boom { }\n  fun fail() {\n    val s = "x"\n    val b = new Boom()\n    throw new Boom()\n  }\n}',
      });
      const lines = cLines(unitContent(result, 'am_unit_1_app.c'));
      const start = lines.indexOf('void am_app_fail(void) {');
      assert.ok(start >= 0);
      const body = lines.slice(start, lines.indexOf('}', start));
      const thrown = body.findIndex(line => /^aml_throw\(tmp\d+\);$/.test(line));

      assert.ok(thrown > 0, body.join('\n'));
      assertLinesInOrder(body, [/^aml_store\(&l_b_\d+, tmp\d+\);$/, /^aml_object \*tmp\d+ = /, /^aml_release\(l_b_\d+\);$/, /^aml_release\(l_s_\d+\);$/]);
      assert.match(body[thrown - 1] ?? '', /^aml_release\(l_s_\d+\);$/);
    });
  });

  describe('头文件', () => {
    it('只为用到的泛型实例生成结构体与原型', async () => {
      const result = await compileOk({
        'src/app.aml': `
namespace app {
  class Box<T> {
    val value: T
    constructor(value: T) { this.value = value }
    fun get(): T { return value }
  }

  fun main() {
    val b = new Box<Int>(1)
    b.get()
  }
}
`,
      });
      const header = unitContent(result, 'aml_program.h');
      const lines = cLines(header);

      assertLinesInOrder(lines, ['typedef struct am_app_Box_3Int_4 {', 'aml_object header;', 'int32_t f0_value;', '} am_app_Box_3Int_4;']);
      assert.ok(lines.includes('int32_t am_app_Box_3Int_4__get(aml_object *);'));
      assert.equal(header.includes('am_app_Box_3String_4'), false);
    });

    it('命名空间函数的重载带序号后缀', async () => {
      const result = await compileOk({ 'src/app.aml': 'namespace app {\n  fun f(x: Int) { }\n  fun f(x: Long) { }\n}' });
      const lines = cLines(unitContent(result, 'aml_program.h'));

      assert.ok(lines.includes('void am_app_f_00(int32_t);'));
      assert.ok(lines.includes('void am_app_f_01(int64_t);'));
    });
  });
});
