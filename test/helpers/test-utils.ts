/**
 * 测试工具函数
 */

import assert from 'node:assert/strict';
import { compile, type CompileOptions, type CompileResult } from '../../src/driver/index.js';
import type { BoundFile } from '../../src/binder/index.js';

/**
 * 编译一组内存中的源文件（路径 → 源码），默认单 worker 以保证日志顺序稳定
 */
export function compileSources(files: Record<string, string>, options: CompileOptions = {}): Promise<CompileResult> {
  const inputs = Object.entries(files).map(([path, source]) => ({ path, source }));
  return compile(inputs, { workers: 1, ...options });
}

/**
 * 诊断错误码列表（已按文件与位置排序）
 */
export function codes(result: CompileResult): string[] {
  return result.diagnostics.map(d => d.code);
}

/**
 * 断言编译成功并返回结果
 */
export async function compileOk(files: Record<string, string>, options: CompileOptions = {}): Promise<CompileResult> {
  const result = await compileSources(files, options);
  assert.deepEqual(
    result.diagnostics.map(d => `${d.code} ${d.file}:${d.span.start.line} ${d.message}`),
    [],
    '不应该产生诊断'
  );
  assert.equal(result.success, true);
  return result;
}

/**
 * 取出指定名称的 C 单元内容
 */
export function unitContent(result: CompileResult, name: string): string {
  const unit = result.units.find(u => u.name === name);
  assert.ok(unit, `缺少输出单元 ${name}，现有：${result.units.map(u => u.name).join(', ')}`);
  return unit.content;
}

/**
 * C 源码按行切分并去掉缩进
 */
export function cLines(content: string): string[] {
  return content.split('\n').map(line => line.trim());
}

/**
 * 断言 `expected` 中的行按顺序出现在 `lines` 中（中间允许有其他行）
 */
export function assertLinesInOrder(lines: readonly string[], expected: readonly (string | RegExp)[]): void {
  let from = 0;
  for (const item of expected) {
    const index = lines.findIndex((line, i) => i >= from && (typeof item === 'string' ? line === item : item.test(line)));
    assert.ok(index >= 0, `在第 ${from} 行之后找不到 ${String(item)}`);
    from = index + 1;
  }
}

/**
 * 按路径取出已绑定的文件
 */
export function boundFile(result: CompileResult, path: string): BoundFile {
  const bound = result.bound.find(b => b.file.path === path);
  assert.ok(bound, `缺少已绑定文件 ${path}`);
  return bound;
}
