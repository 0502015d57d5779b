/**
 * @module config/semantic
 *
 * 集中管理 AmLang 的语言级语义配置。
 *
 * **功能**：
 * - 保留关键字（Keyword）定义和检查
 * - 内置原始类型名称与隐式拓宽（widening）格
 * - 条件编译指令名称
 *
 * **设计原则**：
 * - 单一真源：词法分析器、解析器和绑定器都从这里读取
 * - 关键字区分大小写，且只有小写形式
 */

// ============================================================
// Keyword 配置
// ============================================================

export const KW = {
  NAMESPACE: 'namespace',
  IMPORT: 'import',
  CLASS: 'class',
  INTERFACE: 'interface',
  EXTENDS: 'extends',
  IMPLEMENTS: 'implements',
  FUN: 'fun',
  VAR: 'var',
  VAL: 'val',
  STATIC: 'static',
  NATIVE: 'native',
  SUSPEND: 'suspend',
  CONSTRUCTOR: 'constructor',
  RETURN: 'return',
  IF: 'if',
  ELSE: 'else',
  WHILE: 'while',
  FOR: 'for',
  TO: 'to',
  LOOP: 'loop',
  SWITCH: 'switch',
  CASE: 'case',
  DEFAULT: 'default',
  BREAK: 'break',
  CONTINUE: 'continue',
  THROW: 'throw',
  NEW: 'new',
  THIS: 'this',
  SUPER: 'super',
  NULL: 'null',
  TRUE: 'true',
  FALSE: 'false',
  AS: 'as',
  IS: 'is',
  TEST: 'test',
  MOCK: 'mock',
  SCOPE: 'scope',
} as const;

export type Keyword = (typeof KW)[keyof typeof KW];

const KEYWORD_SET: ReadonlySet<string> = new Set<string>(Object.values(KW));

/**
 * 判断单词是否为保留关键字（区分大小写）。
 *
 * @example
 * ```typescript
 * isKeyword('class') // true
 * isKeyword('Class') // false
 * ```
 */
export function isKeyword(word: string): word is Keyword {
  return KEYWORD_SET.has(word);
}

// ============================================================
// 指令
// ============================================================

export const DIRECTIVES = ['require', 'requireNot'] as const;
export type DirectiveName = (typeof DIRECTIVES)[number];

export function isDirectiveName(name: string): name is DirectiveName {
  return (DIRECTIVES as readonly string[]).includes(name);
}

// ============================================================
// 原始类型
// ============================================================

export const PRIMITIVE_NAMES = [
  'Byte',
  'Short',
  'Int',
  'Long',
  'Float',
  'Double',
  'Bool',
  'Char',
  'String',
  'Void',
] as const;

export type PrimitiveName = (typeof PRIMITIVE_NAMES)[number];

export function isPrimitiveName(name: string): name is PrimitiveName {
  return (PRIMITIVE_NAMES as readonly string[]).includes(name);
}

/**
 * 数值类型在拓宽链上的位置：Byte→Short→Int→Long→Float→Double。
 * Char 只能拓宽为 Int 及其之后的类型。
 */
export const NUMERIC_RANK: Readonly<Partial<Record<PrimitiveName, number>>> = {
  Byte: 0,
  Short: 1,
  Int: 2,
  Long: 3,
  Float: 4,
  Double: 5,
};

export function isNumericName(name: PrimitiveName): boolean {
  return NUMERIC_RANK[name] !== undefined;
}

/**
 * 计算从 `from` 到 `to` 的隐式拓宽步数；不可拓宽时返回 null，相同类型返回 0。
 */
export function wideningSteps(from: PrimitiveName, to: PrimitiveName): number | null {
  if (from === to) return 0;
  if (from === 'Char') {
    const target = NUMERIC_RANK[to];
    const intRank = NUMERIC_RANK.Int ?? 2;
    return target !== undefined && target >= intRank ? target - intRank + 1 : null;
  }
  const a = NUMERIC_RANK[from];
  const b = NUMERIC_RANK[to];
  if (a === undefined || b === undefined) return null;
  return b > a ? b - a : null;
}

/** 隐式导入到每个源文件的内置命名空间 */
export const PRELUDE_NAMESPACE = 'System';
