/**
 * @module tokens
 *
 * Token kinds 与关键字的统一出口。
 *
 * 新代码可以直接从 types.js（TokenKind）和 config/semantic.js（KW）导入。
 */

import { TokenKind } from '../types.js';
import { KW, isKeyword } from '../config/semantic.js';

export { TokenKind, KW, isKeyword };

/**
 * 按最长匹配排列的运算符与标点表。
 */
export const PUNCTUATORS: readonly string[] = [
  '?.',
  '->',
  '=>',
  '==',
  '!=',
  '<=',
  '>=',
  '&&',
  '||',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '{',
  '}',
  '(',
  ')',
  '[',
  ']',
  ',',
  ';',
  ':',
  '.',
  '?',
  '+',
  '-',
  '*',
  '/',
  '%',
  '<',
  '>',
  '=',
  '!',
];
