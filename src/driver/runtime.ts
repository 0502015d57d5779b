/**
 * @module driver/runtime
 *
 * 定位随编译器发布的 `runtime/` 目录（C 运行时与预置命名空间源码）。
 * 源码运行与构建产物运行时模块深度不同，因此向上逐级查找。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/** 预置源码在诊断中显示的路径 */
export const PRELUDE_PATH = '<prelude>/prelude.aml';

/** 需要与生成代码一起交给 C 工具链的运行时文件 */
export const RUNTIME_FILES = ['aml_runtime.h', 'aml_runtime.c'] as const;

let cached: string | null = null;

export function runtimeDirectory(): string {
  if (cached !== null) return cached;
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, 'runtime');
    if (existsSync(join(candidate, 'prelude.aml'))) {
      cached = candidate;
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) throw new Error('Cannot locate the runtime directory (runtime/prelude.aml)');
    dir = parent;
  }
}

export function loadPrelude(): string {
  return readFileSync(join(runtimeDirectory(), 'prelude.aml'), 'utf8');
}

export function runtimeSources(): Array<{ readonly name: string; readonly content: string }> {
  const dir = runtimeDirectory();
  return RUNTIME_FILES.map(name => ({ name, content: readFileSync(join(dir, name), 'utf8') }));
}
