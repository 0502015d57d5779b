/**
 * 类型解析器
 *
 * 负责解析类型注解：
 * - 命名类型与限定名（`Box`, `System.Exception`），可带类型参数（`Map<K, V>`）
 * - 数组类型（`Int[]`）
 * - 函数类型（`(Int, String) -> Bool`）
 * - 可空后缀（`Int?`, `String[]?`）
 * - 括号分组（`((Int) -> Int)?`）
 */

import { Node } from '../ast/ast.js';
import { TokenKind } from '../frontend/tokens.js';
import type { NamedTypeRef, TypeRef } from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { assignSpan, spanSince } from './span-utils.js';

/**
 * 解析以点分隔的限定名：`a.b.C`
 */
export function parseQualifiedName(ctx: ParserContext, tools: ParserTools): string[] {
  const parts = [tools.parseIdent()];
  while (ctx.atPunct('.') && ctx.peek(1).kind === TokenKind.IDENT) {
    ctx.next();
    parts.push(tools.parseIdent());
  }
  return parts;
}

/**
 * 解析泛型形参列表：`<T, U>`；不存在时返回空数组
 */
export function parseTypeParams(ctx: ParserContext, tools: ParserTools): string[] {
  if (!ctx.atPunct('<')) return [];
  ctx.next();
  const names = [tools.parseIdent()];
  while (tools.acceptPunct(',')) names.push(tools.parseIdent());
  tools.expectPunct('>');
  return names;
}

function withNullable(type: TypeRef): TypeRef {
  const span = type.span;
  switch (type.kind) {
    case 'NamedType':
      return assignSpan(Node.NamedType(type.name, type.args, true), span);
    case 'ArrayType':
      return assignSpan(Node.ArrayType(type.element, true), span);
    case 'FunctionType':
      return assignSpan(Node.FunctionType(type.params, type.ret, true), span);
  }
}

/**
 * 解析命名类型（`new` 表达式与 `mock` 声明同样使用）
 */
export function parseNamedType(ctx: ParserContext, tools: ParserTools): NamedTypeRef {
  const startTok = ctx.peek();
  const name = parseQualifiedName(ctx, tools);
  const args: TypeRef[] = [];
  if (ctx.atPunct('<')) {
    ctx.next();
    args.push(parseType(ctx, tools));
    while (tools.acceptPunct(',')) args.push(parseType(ctx, tools));
    tools.expectPunct('>');
  }
  return assignSpan(Node.NamedType(name, args, false), spanSince(ctx, startTok));
}

function parseBaseType(ctx: ParserContext, tools: ParserTools): TypeRef {
  const startTok = ctx.peek();
  if (ctx.atPunct('(')) {
    ctx.next();
    const params: TypeRef[] = [];
    if (!ctx.atPunct(')')) {
      params.push(parseType(ctx, tools));
      while (tools.acceptPunct(',')) params.push(parseType(ctx, tools));
    }
    tools.expectPunct(')');
    if (tools.acceptPunct('->')) {
      const ret = parseType(ctx, tools);
      return assignSpan(Node.FunctionType(params, ret, false), spanSince(ctx, startTok));
    }
    const [only] = params;
    if (params.length !== 1 || only === undefined) return tools.error("'->'");
    return assignSpan(only, spanSince(ctx, startTok));
  }
  if (ctx.at(TokenKind.IDENT)) return parseNamedType(ctx, tools);
  return tools.error('type');
}

/**
 * 解析完整类型注解
 */
export function parseType(ctx: ParserContext, tools: ParserTools): TypeRef {
  ctx.debug.depth++;
  try {
    const startTok = ctx.peek();
    let type = parseBaseType(ctx, tools);
    for (;;) {
      if (ctx.atPunct('[') && ctx.peek(1).kind === TokenKind.PUNCT && ctx.peek(1).value === ']') {
        ctx.next();
        ctx.next();
        type = assignSpan(Node.ArrayType(type, false), spanSince(ctx, startTok));
        continue;
      }
      if (ctx.atPunct('?')) {
        ctx.next();
        type = assignSpan(withNullable(type), spanSince(ctx, startTok));
        continue;
      }
      break;
    }
    ctx.debug.log(`type ${type.kind}`);
    return type;
  } finally {
    ctx.debug.depth--;
  }
}
