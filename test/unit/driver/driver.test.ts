import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { compile, inferRole, loadPrelude, PRELUDE_PATH, runtimeSources } from '../../../src/driver/index.js';
import { compileOk, compileSources } from '../../helpers/test-utils.js';

describe('编译驱动', () => {
  it('按路径推断源文件角色', () => {
    assert.equal(inferRole('tests/a.aml'), 'test');
    assert.equal(inferRole('pkg/tests/sub/a.aml'), 'test');
    assert.equal(inferRole('src\\tests\\a.aml'), 'test');
    assert.equal(inferRole('src/tests.aml'), 'source');
    assert.equal(inferRole('src/app.aml'), 'source');
  });

  it('预置命名空间作为第 0 个文件参与编译', async () => {
    const result = await compileOk({ 'src/app.aml': 'namespace app { fun main() { } }' });

    assert.deepEqual(
      result.bound.map(b => b.file.path),
      [PRELUDE_PATH, 'src/app.aml']
    );
    assert.equal(result.program.exceptionClass?.qualifiedName, 'System.Exception');
  });

  it('prelude: false 时只编译给定文件', async () => {
    const result = await compileOk({ 'src/app.aml': 'namespace app { fun helper() { } }' }, { prelude: false });

    assert.deepEqual(
      result.units.map(u => u.name),
      ['aml_program.h', 'am_unit_0_app.c', 'aml_generics.c', 'aml_program.c']
    );
    assert.equal(result.program.exceptionClass, null);
  });

  it('汇总全部文件的诊断并按文件与位置排序，出错时不生成代码', async () => {
    const result = await compileSources({
      'src/b.aml': 'namespace b {\n  fun f(): Int { return y }\n}',
      'src/a.aml': 'namespace a {\n  fun g() { break }\n  fun h() { val x: Int = "s" }\n}',
    });

    assert.deepEqual(
      result.diagnostics.map(d => `${d.file}:${d.span.start.line} ${d.code}`),
      ['src/a.aml:2 B016', 'src/a.aml:3 B002', 'src/b.aml:2 B001']
    );
    assert.equal(result.success, false);
    assert.deepEqual(result.units, []);
    assert.equal(result.bound.length, 3);
  });

  it('语法错误不妨碍其他文件的绑定', async () => {
    const result = await compileSources({
      'src/a.aml': 'namespace a { fun f( }',
      'src/b.aml': 'namespace b { fun g() { break } }',
    });

    assert.ok(result.diagnostics.some(d => d.file === 'src/a.aml' && d.code.startsWith('P')));
    assert.ok(result.diagnostics.some(d => d.file === 'src/b.aml' && d.code === 'B016'));
  });

  it('每个输入可以单独指定特性', async () => {
    const source = 'namespace app {\n  #require net\n  fun online() { }\n}';
    const result = await compile(
      [
        { path: 'src/on.aml', source: source.replace('app', 'on'), features: ['net'] },
        { path: 'src/off.aml', source: source.replace('app', 'off') },
      ],
      { workers: 2, features: [] }
    );

    assert.equal(result.success, true);
    assert.equal(result.program.table.lookupMember('on', 'online')?.kind, 'functions');
    assert.equal(result.program.table.lookupMember('off', 'online'), undefined);
  });

  it('多 worker 与单 worker 的输出一致', async () => {
    const files = [
      { path: 'src/a.aml', source: 'namespace a { fun main() { System.println("a") } }' },
      { path: 'src/b.aml', source: 'namespace b { fun twice(x: Int): Int { return x * 2 } }' },
      { path: 'src/c.aml', source: 'namespace c { class P { val n: Int = 1 } }' },
    ];
    const serial = await compile(files, { workers: 1 });
    const parallel = await compile(files, { workers: 4 });

    assert.deepEqual(
      parallel.units.map(u => [u.name, u.content]),
      serial.units.map(u => [u.name, u.content])
    );
  });

  it('workers 不是正整数时拒绝编译', async () => {
    const files = [{ path: 'src/a.aml', source: 'namespace a { }' }];

    await assert.rejects(compile(files, { workers: 0 }), { message: 'workers must be a positive integer, got 0' });
    await assert.rejects(compile(files, { workers: 1.5 }), { message: 'workers must be a positive integer, got 1.5' });
  });

  it('能找到随编译器发布的运行时文件', () => {
    assert.match(loadPrelude(), /namespace System \{/);
    assert.deepEqual(
      runtimeSources().map(s => s.name),
      ['aml_runtime.h', 'aml_runtime.c']
    );
  });

  it('运行时只使用 C99 特性', () => {
    for (const { name, content } of runtimeSources()) {
      assert.doesNotMatch(content, /_Alignas|max_align_t|^_Noreturn/m, name);
    }
    const header = runtimeSources().find(s => s.name === 'aml_runtime.h');
    assert.ok(header);
    assert.match(header.content, /^AML_NORETURN void aml_throw\(aml_object \*exception\);$/m);
  });
});
