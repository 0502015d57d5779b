import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseSource } from '../../../src/parser.js';
import { buildSymbolTable, filterFeatures } from '../../../src/symbols/index.js';
import type { SourceFile } from '../../../src/types.js';

function parseFile(path: string, source: string): SourceFile {
  const { ast, diagnostics } = parseSource(source, { file: path });
  assert.deepEqual(diagnostics, []);
  return ast;
}

function build(files: Record<string, string>) {
  return buildSymbolTable(Object.entries(files).map(([path, source]) => parseFile(path, source)));
}

describe('符号表', () => {
  it('应该合并跨文件的同名命名空间', () => {
    const { table, diagnostics } = build({
      'src/a.aml': 'namespace app { class A { } }',
      'src/b.aml': 'namespace app { class B { } }',
    });

    assert.deepEqual(diagnostics, []);
    assert.deepEqual([...(table.getNamespace('app')?.members.keys() ?? [])], ['A', 'B']);
    assert.deepEqual(
      table.types().map(t => t.qualifiedName),
      ['app.A', 'app.B']
    );
    assert.equal(table.lookupMember('app', 'B')?.kind, 'class');
  });

  it('嵌套命名空间登记为父命名空间的子项', () => {
    const { table } = build({ 'src/a.aml': 'namespace app.model { class M { } }' });

    assert.ok(table.getNamespace('app')?.children.has('model'));
    assert.equal(table.lookupQualified(['app', 'model', 'M'])?.kind, 'class');
    assert.equal(table.lookupQualified(['app', 'model'])?.kind, 'namespace');
    assert.equal(table.lookupQualified(['app', 'nothing']), undefined);
  });

  it('同名函数合并为重载组', () => {
    const { table, diagnostics } = build({
      'src/a.aml': 'namespace app { fun f(x: Int) { } }',
      'src/b.aml': 'namespace app { fun f(x: Long) { } }',
    });

    assert.deepEqual(diagnostics, []);
    const group = table.lookupMember('app', 'f');
    assert.ok(group && group.kind === 'functions');
    assert.deepEqual(
      group.overloads.map(o => o.file),
      ['src/a.aml', 'src/b.aml']
    );
  });

  it('重复声明报告 B010 并指向后出现的声明', () => {
    const { diagnostics } = build({
      'src/a.aml': 'namespace app { class A { } }',
      'src/b.aml': 'namespace app {\n  fun A() { }\n}',
    });

    assert.equal(diagnostics.length, 1);
    const [diag] = diagnostics;
    assert.equal(diag?.code, 'B010');
    assert.equal(diag?.message, "Duplicate declaration of 'app.A'");
    assert.equal(diag?.file, 'src/b.aml');
    assert.equal(diag?.span.start.line, 2);
  });

  it('两个导入带来同名符号时报告 B011', () => {
    const { diagnostics } = build({
      'src/a.aml': 'namespace a { class X { } }',
      'src/b.aml': 'namespace b { class X { } }',
      'src/c.aml': 'namespace c {\n  import a\n  import b\n}',
    });

    assert.deepEqual(
      diagnostics.map(d => d.message),
      ["'X' is declared by both imported namespaces a and b"]
    );
    assert.equal(diagnostics[0]?.code, 'B011');
    assert.equal(diagnostics[0]?.span.start.line, 3);
  });

  it('当前命名空间自身的声明优先于导入，不算冲突', () => {
    const { diagnostics } = build({
      'src/a.aml': 'namespace a { class X { } }',
      'src/b.aml': 'namespace b { class X { } }',
      'src/c.aml': 'namespace c {\n  import a\n  import b\n  class X { }\n}',
    });

    assert.deepEqual(diagnostics, []);
  });

  it('导入不存在的路径报告 B001', () => {
    const { diagnostics } = build({ 'src/a.aml': 'namespace app {\n  import missing.thing\n}' });

    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0]?.code, 'B001');
    assert.equal(diagnostics[0]?.message, "Unresolved symbol 'missing.thing'");
  });

  it('导入按文件与命名空间块分别记录', () => {
    const { table } = build({
      'src/a.aml': 'namespace util { class U { } }',
      'src/b.aml': 'namespace app {\n  import util.U\n}',
    });

    const imports = table.importsOf('src/b.aml', 'app');
    assert.equal(imports.length, 1);
    const [target] = imports;
    assert.ok(target && target.kind === 'member');
    assert.equal(target.symbol.qualifiedName, 'util.U');
    assert.deepEqual(table.importsOf('src/a.aml', 'app'), []);
  });

  it('全局变量按声明顺序记录', () => {
    const { table } = build({
      'src/a.aml': 'namespace app {\n  val first: Int = 1\n  var second: Int = 2\n}',
    });

    assert.deepEqual(
      table.globals().map(g => g.qualifiedName),
      ['app.first', 'app.second']
    );
  });
});

describe('条件编译', () => {
  const source = `
namespace app {
  #require net
  class Http { }
  #requireNot net
  class Offline { }
  class Client {
    #require net
    fun fetch() { }
    fun close() { }
  }
}
`;

  function classNames(file: SourceFile): string[] {
    const ns = file.decls[0];
    assert.ok(ns && ns.kind === 'Namespace');
    return ns.decls.map(d => (d.kind === 'Namespace' ? d.path.join('.') : d.name));
  }

  function clientMembers(file: SourceFile): string[] {
    const ns = file.decls[0];
    assert.ok(ns && ns.kind === 'Namespace');
    const client = ns.decls.find(d => d.kind === 'Class' && d.name === 'Client');
    assert.ok(client && client.kind === 'Class');
    return client.members.map(m => m.name);
  }

  it('#require 仅在特性启用时保留声明', () => {
    const file = parseFile('src/app.aml', source);

    const online = filterFeatures(file, new Set(['net']));
    assert.deepEqual(classNames(online), ['Http', 'Client']);
    assert.deepEqual(clientMembers(online), ['fetch', 'close']);

    const offline = filterFeatures(file, new Set());
    assert.deepEqual(classNames(offline), ['Offline', 'Client']);
    assert.deepEqual(clientMembers(offline), ['close']);
  });

  it('过滤是幂等的', () => {
    const file = parseFile('src/app.aml', source);
    const features = new Set<string>();

    const once = filterFeatures(file, features);
    assert.deepEqual(filterFeatures(once, features), once);
  });

  it('被过滤掉的类不进入符号表', () => {
    const file = filterFeatures(parseFile('src/app.aml', source), new Set());
    const { table } = buildSymbolTable([file]);

    assert.equal(table.lookupMember('app', 'Http'), undefined);
    assert.equal(table.lookupMember('app', 'Offline')?.kind, 'class');
  });
});
