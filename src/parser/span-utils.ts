import type { ParserContext } from './context.js';
import type { Position, Span, Token } from '../types.js';

type SpanSource = Token | { span: Span };

function clonePosition(pos: Position): Position {
  return { line: pos.line, col: pos.col };
}

export function cloneSpan(span: Span): Span {
  return {
    start: clonePosition(span.start),
    end: clonePosition(span.end),
  };
}

export function spanFromTokens(start: Token, end: Token): Span {
  return {
    start: clonePosition(start.start),
    end: clonePosition(end.end),
  };
}

function toSpan(source: SpanSource): Span {
  if ('span' in source) {
    return source.span;
  }
  return {
    start: source.start,
    end: source.end,
  };
}

function isBefore(a: Position, b: Position): boolean {
  return a.line < b.line || (a.line === b.line && a.col < b.col);
}

function isAfter(a: Position, b: Position): boolean {
  return a.line > b.line || (a.line === b.line && a.col > b.col);
}

export function spanFromSources(first: SpanSource, ...rest: SpanSource[]): Span {
  const initial = toSpan(first);
  let start = initial.start;
  let end = initial.end;

  for (const source of rest) {
    const span = toSpan(source);
    if (isBefore(span.start, start)) {
      start = span.start;
    }
    if (isAfter(span.end, end)) {
      end = span.end;
    }
  }

  return {
    start: clonePosition(start),
    end: clonePosition(end),
  };
}

export function lastConsumedToken(ctx: ParserContext): Token {
  return ctx.previous() ?? ctx.peek();
}

/** 从 `startTok` 到最近一个已消费 token 的 span */
export function spanSince(ctx: ParserContext, startTok: Token): Span {
  return spanFromTokens(startTok, lastConsumedToken(ctx));
}

export function assignSpan<T extends { span: Span }>(node: T, span: Span): T {
  node.span = span;
  return node;
}
