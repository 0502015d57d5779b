/**
 * 解析器工具函数集合
 * 提供错误报告、期望验证和标识符解析等辅助功能
 */

import { TokenKind } from '../frontend/tokens.js';
import type { Token } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { ParserContext } from './context.js';

/**
 * 解析器工具函数接口
 */
export interface ParserTools {
  /**
   * 报告解析错误并中止当前声明
   * @param expected 期望内容的描述
   * @param tok 可选的错误位置 token（默认使用当前 token）
   */
  error: (expected: string, tok?: Token) => never;

  /** 期望并消费指定标点 */
  expectPunct: (punct: string) => Token;

  /** 期望并消费指定关键字 */
  expectKeyword: (kw: string) => Token;

  /** 若当前为指定标点则消费并返回 true */
  acceptPunct: (punct: string) => boolean;

  /** 若当前为指定关键字则消费并返回 true */
  acceptKeyword: (kw: string) => boolean;

  /** 消费可选的语句终止分号 */
  optionalSemicolon: () => void;

  /** 解析普通标识符 */
  parseIdent: () => string;
}

/**
 * 生成用于错误消息的 token 描述
 */
export function describeToken(tok: Token): string {
  switch (tok.kind) {
    case TokenKind.EOF:
      return 'end of input';
    case TokenKind.STRING:
    case TokenKind.TEMPLATE:
      return 'string literal';
    case TokenKind.INT:
    case TokenKind.LONG:
    case TokenKind.FLOAT:
    case TokenKind.DOUBLE:
      return `number '${tok.lexeme}'`;
    case TokenKind.CHAR:
      return 'character literal';
    case TokenKind.IDENT:
      return `identifier '${tok.lexeme}'`;
    case TokenKind.KEYWORD:
      return `keyword '${tok.lexeme}'`;
    default:
      return `'${tok.lexeme}'`;
  }
}

/**
 * 创建解析器工具函数集合
 * @param ctx 解析器上下文
 * @returns 工具函数集合
 */
export function createParserTools(ctx: ParserContext): ParserTools {
  const error = (expected: string, tok: Token = ctx.peek()): never =>
    Diagnostics.unexpectedToken(expected, describeToken(tok), tok.start, ctx.file).throw();

  return {
    error,

    expectPunct(punct: string): Token {
      if (!ctx.atPunct(punct)) error(`'${punct}'`);
      return ctx.next();
    },

    expectKeyword(kw: string): Token {
      if (!ctx.isKeyword(kw)) error(`'${kw}'`);
      return ctx.next();
    },

    acceptPunct(punct: string): boolean {
      if (!ctx.atPunct(punct)) return false;
      ctx.next();
      return true;
    },

    acceptKeyword(kw: string): boolean {
      if (!ctx.isKeyword(kw)) return false;
      ctx.next();
      return true;
    },

    optionalSemicolon(): void {
      while (ctx.atPunct(';')) ctx.next();
    },

    parseIdent(): string {
      const tok = ctx.peek();
      if (tok.kind !== TokenKind.IDENT || typeof tok.value !== 'string') return error('identifier');
      ctx.next();
      return tok.value;
    },
  };
}
