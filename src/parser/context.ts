import type { Token } from '../types.js';
import { TokenKind } from '../frontend/tokens.js';
import type { Diagnostic } from '../diagnostics/diagnostics.js';
import { createLogger, LogLevel } from '../utils/logger.js';

/**
 * Parser 上下文接口
 * 包含词法标记流、解析状态与非致命诊断收集器
 */
export interface ParserContext {
  readonly tokens: readonly Token[];
  readonly file: string;
  index: number;
  /** 不中止当前声明的诊断（非法 token、case 顺序、未知指令等） */
  readonly diagnostics: Diagnostic[];
  /** 当前所在命名空间路径（仅用于调试日志） */
  namespace: readonly string[];
  debug: { enabled: boolean; depth: number; log(message: string): void };
  /** 查看第 N 个 Token（越界时返回 EOF） */
  peek(offset?: number): Token;
  /** 最近一个已消费的 Token */
  previous(): Token | null;
  /** 消费当前 Token 并前进 */
  next(): Token;
  at(kind: TokenKind, value?: string): boolean;
  atPunct(punct: string): boolean;
  isKeyword(kw: string): boolean;
  /** 当前 Token 是否与上一个已消费 Token 处于同一行 */
  onSameLine(): boolean;
  /** 在独立的 token 子流上执行解析（字符串插值使用），共享诊断列表 */
  fork(tokens: readonly Token[]): ParserContext;
}

const parserLogger = createLogger('parser');

export function createParserContext(
  tokens: readonly Token[],
  file: string,
  diagnostics: Diagnostic[] = []
): ParserContext {
  const eof = tokens[tokens.length - 1];
  const ctx: ParserContext = {
    tokens,
    file,
    index: 0,
    diagnostics,
    namespace: [],
    debug: {
      enabled: parserLogger.isEnabled(LogLevel.DEBUG),
      depth: 0,
      log: (message: string): void => {
        if (!ctx.debug.enabled) return;
        parserLogger.debug(message, { file, depth: ctx.debug.depth, namespace: ctx.namespace.join('.') });
      },
    },
    peek: (offset = 0): Token => {
      const tok = ctx.tokens[ctx.index + offset];
      if (tok) return tok;
      if (eof) return eof;
      return {
        kind: TokenKind.EOF,
        lexeme: '',
        value: null,
        start: { line: 1, col: 1 },
        end: { line: 1, col: 1 },
        file,
      };
    },
    previous: (): Token | null => ctx.tokens[ctx.index - 1] ?? null,
    next: (): Token => {
      const tok = ctx.peek();
      if (ctx.index < ctx.tokens.length && tok.kind !== TokenKind.EOF) {
        ctx.index++;
      }
      return tok;
    },
    at: (kind: TokenKind, value?: string): boolean => {
      const t = ctx.peek();
      if (t.kind !== kind) return false;
      if (value === undefined) return true;
      return t.value === value;
    },
    atPunct: (punct: string): boolean => ctx.at(TokenKind.PUNCT, punct),
    isKeyword: (kw: string): boolean => ctx.at(TokenKind.KEYWORD, kw),
    onSameLine: (): boolean => {
      const prev = ctx.previous();
      if (!prev) return true;
      return prev.end.line === ctx.peek().start.line;
    },
    fork: (subTokens: readonly Token[]): ParserContext => {
      const sub = createParserContext(subTokens, file, ctx.diagnostics);
      sub.namespace = ctx.namespace;
      return sub;
    },
  };

  return ctx;
}
