/**
 * @module lexer
 *
 * 词法分析器：将 AmLang 源代码转换为 Token 流。
 *
 * **功能**：
 * - 识别关键字、标识符、字面量、运算符、标点和条件编译指令
 * - 整数支持十进制、十六进制（0x）、二进制（0b）以及 `L` 后缀
 * - 浮点数支持小数部分、指数部分与 `F`/`D` 类型后缀
 * - 字符字面量以 UTF-16 code unit 表示，支持转义序列
 * - 字符串插值：`$name` 与 `${expr}` 被切分为文本片段和重新词法分析的表达式片段
 * - 行注释（`//`）与不可嵌套的块注释（`/* *\/`）直接丢弃
 *
 * **错误处理**：
 * 词法分析器从不抛出异常。无法识别的输入产生 `INVALID` token，
 * 携带原文与位置，由解析器统一报告。
 */

import { TokenKind, PUNCTUATORS, isKeyword } from './tokens.js';
import type { InvalidTokenValue, Position, TemplatePart, Token, TokenValue } from '../types.js';
import { createLogger, LogLevel } from '../utils/logger.js';

const lexerLogger = createLogger('lexer');

const INT_MAX = 2n ** 31n - 1n;
const LONG_MAX = 2n ** 63n - 1n;

export interface LexOptions {
  /** 写入每个 token 的源文件路径 */
  readonly file?: string;
  /** 起始行号（用于插值片段的重新词法分析） */
  readonly line?: number;
  /** 起始列号 */
  readonly col?: number;
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isHexDigit(ch: string): boolean {
  return /^[0-9a-fA-F]$/.test(ch);
}

function isIdentStart(ch: string): boolean {
  return /^[A-Za-z_]$/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /^[A-Za-z0-9_]$/.test(ch);
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

const PUNCT_START = new Set(PUNCTUATORS.map(p => p[0]));

function startsToken(ch: string): boolean {
  return (
    isWhitespace(ch) ||
    isIdentStart(ch) ||
    isDigit(ch) ||
    ch === '"' ||
    ch === "'" ||
    ch === '#' ||
    PUNCT_START.has(ch)
  );
}

const SIMPLE_ESCAPES: Readonly<Record<string, number>> = {
  n: 10,
  t: 9,
  r: 13,
  b: 8,
  f: 12,
  '0': 0,
  '\\': 92,
  "'": 39,
  '"': 34,
  $: 36,
};

/**
 * 在插值表达式中查找与 `${` 配对的 `}`。
 * 嵌套字符串与字符字面量中的花括号不计入；插值不能跨行。
 *
 * @returns 配对 `}` 的下标，未闭合时返回 -1
 */
function findInterpolationEnd(input: string, from: number): number {
  let depth = 1;
  let j = from;
  while (j < input.length) {
    const c = input.charAt(j);
    if (c === '\n' || c === '\r') return -1;
    if (c === '{') {
      depth++;
    } else if (c === '}') {
      depth--;
      if (depth === 0) return j;
    } else if (c === '"') {
      const after = skipNestedString(input, j);
      if (after < 0) return -1;
      j = after;
      continue;
    } else if (c === "'") {
      j++;
      while (j < input.length && input[j] !== "'" && input[j] !== '\n') {
        if (input[j] === '\\') j++;
        j++;
      }
    }
    j++;
  }
  return -1;
}

function skipNestedString(input: string, openQuote: number): number {
  let j = openQuote + 1;
  while (j < input.length) {
    const c = input.charAt(j);
    if (c === '\n' || c === '\r') return -1;
    if (c === '\\') {
      j += 2;
      continue;
    }
    if (c === '"') return j + 1;
    if (c === '$' && input[j + 1] === '{') {
      const end = findInterpolationEnd(input, j + 2);
      if (end < 0) return -1;
      j = end + 1;
      continue;
    }
    j++;
  }
  return -1;
}

function* scan(input: string, file: string, startLine: number, startCol: number): Generator<Token, void, undefined> {
  let i = 0;
  let line = startLine;
  let col = startCol;

  const pos = (): Position => ({ line, col });
  const peek = (offset = 0): string => input[i + offset] ?? '';
  const next = (): string => {
    const ch = input[i++] ?? '';
    if (ch === '\n') {
      line++;
      col = 1;
    } else if (ch === '\r') {
      // CRLF 只在 '\n' 处计一次换行
      if (input[i] === '\n') {
        col++;
      } else {
        line++;
        col = 1;
      }
    } else {
      col++;
    }
    return ch;
  };
  const make = (kind: TokenKind, from: number, value: TokenValue, start: Position): Token => ({
    kind,
    lexeme: input.slice(from, i),
    value,
    start,
    end: pos(),
    file,
  });
  const invalid = (from: number, start: Position, reason: InvalidTokenValue['reason']): Token =>
    make(TokenKind.INVALID, from, { reason, text: input.slice(from, i) }, start);

  const subTokens = (text: string, at: Position): Token[] => [...scan(text, file, at.line, at.col)];

  const readEscape = (): number | null => {
    next(); // '\\'
    const e = next();
    if (e === 'u') {
      let hex = '';
      while (hex.length < 4 && isHexDigit(peek())) hex += next();
      return hex.length === 4 ? Number.parseInt(hex, 16) : null;
    }
    return SIMPLE_ESCAPES[e] ?? null;
  };

  const integerToken = (digits: string, radix: 'dec' | 'hex' | 'bin', from: number, start: Position): Token => {
    const suffix = peek();
    const isLong = suffix === 'L' || suffix === 'l';
    if (isLong) next();
    if (isIdentPart(peek()) || digits.length === 0) {
      while (isIdentPart(peek())) next();
      return invalid(from, start, 'number');
    }
    const prefix = radix === 'hex' ? '0x' : radix === 'bin' ? '0b' : '';
    const big = BigInt(prefix + digits);
    if (big > LONG_MAX) return invalid(from, start, 'number');
    if (isLong || big > INT_MAX) {
      return make(TokenKind.LONG, from, big.toString(), start);
    }
    return make(TokenKind.INT, from, Number(big), start);
  };

  const scanNumber = (): Token => {
    const start = pos();
    const from = i;
    if (peek() === '0' && (peek(1) === 'x' || peek(1) === 'X')) {
      next();
      next();
      let digits = '';
      while (isHexDigit(peek())) digits += next();
      return integerToken(digits, 'hex', from, start);
    }
    if (peek() === '0' && (peek(1) === 'b' || peek(1) === 'B')) {
      next();
      next();
      let digits = '';
      while (peek() === '0' || peek() === '1') digits += next();
      return integerToken(digits, 'bin', from, start);
    }

    let text = '';
    while (isDigit(peek())) text += next();
    let floating = false;
    if (peek() === '.' && isDigit(peek(1))) {
      text += next();
      while (isDigit(peek())) text += next();
      floating = true;
    }
    const e = peek();
    if (
      (e === 'e' || e === 'E') &&
      (isDigit(peek(1)) || ((peek(1) === '+' || peek(1) === '-') && isDigit(peek(2))))
    ) {
      text += next();
      if (peek() === '+' || peek() === '-') text += next();
      while (isDigit(peek())) text += next();
      floating = true;
    }

    const suffix = peek();
    if (suffix === 'F' || suffix === 'f' || suffix === 'D' || suffix === 'd') {
      next();
      if (isIdentPart(peek())) {
        while (isIdentPart(peek())) next();
        return invalid(from, start, 'number');
      }
      const value = Number(text);
      return suffix === 'F' || suffix === 'f'
        ? make(TokenKind.FLOAT, from, Math.fround(value), start)
        : make(TokenKind.DOUBLE, from, value, start);
    }
    if (floating) {
      if (isIdentPart(peek())) {
        while (isIdentPart(peek())) next();
        return invalid(from, start, 'number');
      }
      return make(TokenKind.DOUBLE, from, Number(text), start);
    }
    return integerToken(text, 'dec', from, start);
  };

  const scanChar = (): Token => {
    const start = pos();
    const from = i;
    next(); // opening quote
    const units: number[] = [];
    let valid = true;
    while (i < input.length && peek() !== "'" && peek() !== '\n' && peek() !== '\r') {
      if (peek() === '\\') {
        const code = readEscape();
        if (code === null) valid = false;
        else units.push(code);
      } else {
        units.push(next().charCodeAt(0));
      }
    }
    if (peek() === "'") next();
    else valid = false;
    const [unit] = units;
    if (!valid || units.length !== 1 || unit === undefined) return invalid(from, start, 'char');
    return make(TokenKind.CHAR, from, unit, start);
  };

  const scanString = (): Token => {
    const start = pos();
    const from = i;
    next(); // opening quote
    const parts: TemplatePart[] = [];
    let text = '';
    let raw = '';
    let interpolated = false;
    let terminated = false;
    const flushText = (): void => {
      if (raw.length === 0) return;
      parts.push({ kind: 'text', value: text, raw });
      text = '';
      raw = '';
    };

    while (i < input.length) {
      const c = peek();
      if (c === '"') {
        next();
        terminated = true;
        break;
      }
      if (c === '\n' || c === '\r') break;
      if (c === '\\') {
        const escFrom = i;
        const code = readEscape();
        raw += input.slice(escFrom, i);
        text += code === null ? input.slice(escFrom + 1, i) : String.fromCharCode(code);
        continue;
      }
      if (c === '$' && peek(1) === '{') {
        flushText();
        interpolated = true;
        const exprStart = pos();
        const rawFrom = i;
        next();
        next();
        const innerStart = pos();
        const innerFrom = i;
        const end = findInterpolationEnd(input, i);
        if (end >= 0) {
          while (i < end) next();
          const inner = input.slice(innerFrom, end);
          next(); // '}'
          parts.push({
            kind: 'expr',
            tokens: subTokens(inner, innerStart),
            raw: input.slice(rawFrom, i),
            start: exprStart,
            terminated: true,
          });
        } else {
          let stop = i;
          while (stop < input.length && input[stop] !== '\n' && input[stop] !== '\r') stop++;
          const closing = input.lastIndexOf('"', stop - 1);
          if (closing >= i) stop = closing;
          while (i < stop) next();
          parts.push({
            kind: 'expr',
            tokens: subTokens(input.slice(innerFrom, i), innerStart),
            raw: input.slice(rawFrom, i),
            start: exprStart,
            terminated: false,
          });
        }
        continue;
      }
      if (c === '$' && isIdentStart(peek(1))) {
        flushText();
        interpolated = true;
        const exprStart = pos();
        const rawFrom = i;
        next();
        const nameStart = pos();
        let name = '';
        while (isIdentPart(peek())) name += next();
        parts.push({
          kind: 'expr',
          tokens: subTokens(name, nameStart),
          raw: input.slice(rawFrom, i),
          start: exprStart,
          terminated: true,
        });
        continue;
      }
      raw += c;
      text += next();
    }
    flushText();

    if (!terminated) return invalid(from, start, 'unterminated-string');
    if (!interpolated) {
      const value = parts.map(part => (part.kind === 'text' ? part.value : '')).join('');
      return make(TokenKind.STRING, from, value, start);
    }
    return make(TokenKind.TEMPLATE, from, parts, start);
  };

  // Skip UTF-8 BOM if present
  if (input.charCodeAt(0) === 0xfeff) i++;

  while (i < input.length) {
    const ch = peek();

    if (isWhitespace(ch)) {
      next();
      continue;
    }

    if (ch === '/' && peek(1) === '/') {
      while (i < input.length && peek() !== '\n' && peek() !== '\r') next();
      continue;
    }
    if (ch === '/' && peek(1) === '*') {
      const start = pos();
      const from = i;
      next();
      next();
      let closed = false;
      while (i < input.length) {
        if (peek() === '*' && peek(1) === '/') {
          next();
          next();
          closed = true;
          break;
        }
        next();
      }
      if (!closed) yield invalid(from, start, 'unterminated-comment');
      continue;
    }

    if (isIdentStart(ch)) {
      const start = pos();
      const from = i;
      let word = '';
      while (isIdentPart(peek())) word += next();
      yield make(isKeyword(word) ? TokenKind.KEYWORD : TokenKind.IDENT, from, word, start);
      continue;
    }

    if (isDigit(ch)) {
      yield scanNumber();
      continue;
    }

    if (ch === '"') {
      yield scanString();
      continue;
    }

    if (ch === "'") {
      yield scanChar();
      continue;
    }

    if (ch === '#') {
      const start = pos();
      const from = i;
      next();
      if (!isIdentStart(peek())) {
        yield invalid(from, start, 'character');
        continue;
      }
      let name = '';
      while (isIdentPart(peek())) name += next();
      yield make(TokenKind.DIRECTIVE, from, name, start);
      continue;
    }

    const punct = PUNCTUATORS.find(p => input.startsWith(p, i));
    if (punct) {
      const start = pos();
      const from = i;
      for (let k = 0; k < punct.length; k++) next();
      yield make(TokenKind.PUNCT, from, punct, start);
      continue;
    }

    const start = pos();
    const from = i;
    while (i < input.length && !startsToken(peek())) next();
    yield invalid(from, start, 'character');
  }

  yield {
    kind: TokenKind.EOF,
    lexeme: '',
    value: null,
    start: pos(),
    end: pos(),
    file,
  };
}

/**
 * 惰性、可重启的 token 序列。
 *
 * 每次迭代都会从头重新扫描输入，因此同一个序列可以被多次消费。
 *
 * @example
 * ```typescript
 * const stream = tokenStream('class Box { }', { file: 'src/box.aml' });
 * for (const token of stream) console.log(token.kind);
 * ```
 */
export function tokenStream(input: string, options: LexOptions = {}): Iterable<Token> {
  const file = options.file ?? '<input>';
  const line = options.line ?? 1;
  const col = options.col ?? 1;
  return {
    [Symbol.iterator]: (): Iterator<Token> => scan(input, file, line, col),
  };
}

/**
 * 对源代码进行词法分析，返回以 EOF 结尾的完整 Token 数组。
 *
 * @param input - 源代码文本
 * @param options - 文件路径与起始位置
 * @returns Token 数组，非法输入以 `INVALID` token 表示
 */
export function lex(input: string, options: LexOptions = {}): Token[] {
  const tokens = [...tokenStream(input, options)];
  if (lexerLogger.isEnabled(LogLevel.DEBUG)) {
    const invalid = tokens.filter(token => token.kind === TokenKind.INVALID).length;
    lexerLogger.debug('词法分析完成', { file: options.file ?? '<input>', tokens: tokens.length, invalid });
  }
  return tokens;
}

export function isInvalidTokenValue(value: TokenValue): value is InvalidTokenValue {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && 'reason' in value;
}

export function isTemplateValue(value: TokenValue): value is readonly TemplatePart[] {
  return Array.isArray(value);
}
