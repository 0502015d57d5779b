import type { InterpolatedString } from '../types.js';

/**
 * 由插值字符串节点还原字面量的源码正文（不含两端引号）。
 *
 * 文本片段使用转义前的原文，表达式片段使用 `$name` / `${...}` 原文，
 * 因此结果与源码中引号之间的内容逐字一致。
 */
export function reconstructTemplate(node: InterpolatedString): string {
  return node.parts.map(part => part.raw).join('');
}

/**
 * 以占位符替换动态片段，得到插值字符串的静态骨架：
 * `"Hello $name!"` → `Hello {0}!`
 */
export function templateSkeleton(node: InterpolatedString): string {
  let index = 0;
  return node.parts.map(part => (part.kind === 'text' ? part.value : `{${index++}}`)).join('');
}
