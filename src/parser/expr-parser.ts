/**
 * 表达式解析器
 *
 * 优先级从低到高：
 * 赋值（右结合）< `||` < `&&` < 相等 < 关系 / `is` < 加法 < 乘法 < `as` < 一元 < 后缀（调用、成员、索引）
 *
 * `if (c) a else b` 作为表达式出现在 primary 层。
 */

import { Node } from '../ast/ast.js';
import { KW, TokenKind } from '../frontend/tokens.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type {
  AssignOperator,
  BinaryOperator,
  Block,
  Expression,
  InterpolationPart,
  Parameter,
  TemplatePart,
  Token,
  TypeRef,
} from '../types.js';
import type { ParserContext } from './context.js';
import { createParserTools, type ParserTools } from './parser-tools.js';
import { assignSpan, spanFromSources, spanSince } from './span-utils.js';
import { parseNamedType, parseType } from './type-parser.js';
import { parseBlock } from './stmt-parser.js';
import { reportInvalidTokens } from './invalid-tokens.js';

const ASSIGN_OPS: readonly AssignOperator[] = ['=', '+=', '-=', '*=', '/=', '%='];
const INT_MIN = -(2n ** 31n);

function atAssignOp(ctx: ParserContext): AssignOperator | null {
  const tok = ctx.peek();
  if (tok.kind !== TokenKind.PUNCT) return null;
  return ASSIGN_OPS.find(op => op === tok.value) ?? null;
}

function atBinaryOp<T extends BinaryOperator>(ctx: ParserContext, ops: readonly T[]): T | null {
  const tok = ctx.peek();
  if (tok.kind !== TokenKind.PUNCT) return null;
  return ops.find(op => op === tok.value) ?? null;
}

export function parseExpression(ctx: ParserContext, tools: ParserTools): Expression {
  return parseAssignment(ctx, tools);
}

function parseAssignment(ctx: ParserContext, tools: ParserTools): Expression {
  const target = parseOr(ctx, tools);
  const op = atAssignOp(ctx);
  if (!op) return target;
  ctx.next();
  const value = parseAssignment(ctx, tools);
  return assignSpan(Node.Assign(op, target, value), spanFromSources(target, value));
}

/**
 * 左结合二元运算层的通用实现
 */
function binaryLevel<T extends BinaryOperator>(
  ops: readonly T[],
  operand: (ctx: ParserContext, tools: ParserTools) => Expression
): (ctx: ParserContext, tools: ParserTools) => Expression {
  return (ctx, tools) => {
    let left = operand(ctx, tools);
    for (let op = atBinaryOp(ctx, ops); op; op = atBinaryOp(ctx, ops)) {
      ctx.next();
      const right = operand(ctx, tools);
      left = assignSpan(Node.Binary(op, left, right), spanFromSources(left, right));
    }
    return left;
  };
}

function parseCastLevel(ctx: ParserContext, tools: ParserTools): Expression {
  let expr = parseUnary(ctx, tools);
  while (ctx.isKeyword(KW.AS)) {
    ctx.next();
    const type = parseType(ctx, tools);
    expr = assignSpan(Node.Cast(expr, type), spanFromSources(expr, type));
  }
  return expr;
}

const parseMultiplicative = binaryLevel(['*', '/', '%'], parseCastLevel);
const parseAdditive = binaryLevel(['+', '-'], parseMultiplicative);

function parseRelational(ctx: ParserContext, tools: ParserTools): Expression {
  const ops = ['<=', '>=', '<', '>'] as const;
  let left = parseAdditive(ctx, tools);
  for (;;) {
    if (ctx.isKeyword(KW.IS)) {
      ctx.next();
      const type = parseType(ctx, tools);
      left = assignSpan(Node.TypeCheck(left, type), spanFromSources(left, type));
      continue;
    }
    const op = atBinaryOp(ctx, ops);
    if (!op) return left;
    ctx.next();
    const right = parseAdditive(ctx, tools);
    left = assignSpan(Node.Binary(op, left, right), spanFromSources(left, right));
  }
}

const parseEquality = binaryLevel(['==', '!='], parseRelational);
const parseAnd = binaryLevel(['&&'], parseEquality);
const parseOr = binaryLevel(['||'], parseAnd);

function negateLiteral(operand: Expression, minus: Token, literal: Token): Expression | null {
  const span = spanFromSources(minus, operand);
  switch (operand.kind) {
    case 'Int':
      return assignSpan(Node.Int(-operand.value), span);
    case 'Long': {
      const negated = -BigInt(operand.value);
      // `-2147483648` 在词法上是 Long，取负后落回 Int 范围
      if (!/[lL]$/.test(literal.lexeme) && negated >= INT_MIN) return assignSpan(Node.Int(Number(negated)), span);
      return assignSpan(Node.Long(negated.toString()), span);
    }
    case 'Float':
      return assignSpan(Node.Float(-operand.value, operand.precision), span);
    default:
      return null;
  }
}

function parseUnary(ctx: ParserContext, tools: ParserTools): Expression {
  const tok = ctx.peek();
  if (ctx.atPunct('-')) {
    ctx.next();
    const first = ctx.peek();
    const operand = parseUnary(ctx, tools);
    if (ctx.previous() === first) {
      const folded = negateLiteral(operand, tok, first);
      if (folded) return folded;
    }
    return assignSpan(Node.Unary('-', operand), spanFromSources(tok, operand));
  }
  if (ctx.atPunct('!')) {
    ctx.next();
    const operand = parseUnary(ctx, tools);
    return assignSpan(Node.Unary('!', operand), spanFromSources(tok, operand));
  }
  return parsePostfix(ctx, tools);
}

export function parseArguments(ctx: ParserContext, tools: ParserTools): Expression[] {
  tools.expectPunct('(');
  const args: Expression[] = [];
  if (!ctx.atPunct(')')) {
    args.push(parseExpression(ctx, tools));
    while (tools.acceptPunct(',')) args.push(parseExpression(ctx, tools));
  }
  tools.expectPunct(')');
  return args;
}

function parsePostfix(ctx: ParserContext, tools: ParserTools): Expression {
  const startTok = ctx.peek();
  let expr = parsePrimary(ctx, tools);
  for (;;) {
    if (ctx.atPunct('.') || ctx.atPunct('?.')) {
      const safe = ctx.next().value === '?.';
      const name = tools.parseIdent();
      expr = assignSpan(Node.Member(expr, name, safe), spanSince(ctx, startTok));
      continue;
    }
    // '(' 与 '[' 只在同一行时延续表达式
    if (ctx.atPunct('(') && ctx.onSameLine()) {
      const args = parseArguments(ctx, tools);
      expr = assignSpan(Node.Call(expr, args), spanSince(ctx, startTok));
      continue;
    }
    if (ctx.atPunct('[') && ctx.onSameLine()) {
      ctx.next();
      const index = parseExpression(ctx, tools);
      tools.expectPunct(']');
      expr = assignSpan(Node.Index(expr, index), spanSince(ctx, startTok));
      continue;
    }
    return expr;
  }
}

export function parseParameters(ctx: ParserContext, tools: ParserTools): Parameter[] {
  tools.expectPunct('(');
  const params: Parameter[] = [];
  if (!ctx.atPunct(')')) {
    do {
      const startTok = ctx.peek();
      const name = tools.parseIdent();
      tools.expectPunct(':');
      const type = parseType(ctx, tools);
      params.push(assignSpan(Node.Parameter(name, type), spanSince(ctx, startTok)));
    } while (tools.acceptPunct(','));
  }
  tools.expectPunct(')');
  return params;
}

function parseLambda(ctx: ParserContext, tools: ParserTools): Expression {
  const startTok = ctx.next(); // 'fun'
  const params = parseParameters(ctx, tools);
  let returnType: TypeRef | null = null;
  if (tools.acceptPunct(':')) returnType = parseType(ctx, tools);
  let body: Block | Expression;
  if (tools.acceptPunct('=>')) {
    body = parseExpression(ctx, tools);
  } else if (ctx.atPunct('{')) {
    body = parseBlock(ctx, tools);
  } else {
    return tools.error("'=>' or '{'");
  }
  return assignSpan(Node.Lambda(params, returnType, body), spanSince(ctx, startTok));
}

function parseNew(ctx: ParserContext, tools: ParserTools): Expression {
  const startTok = ctx.next(); // 'new'
  const type = parseNamedType(ctx, tools);
  if (ctx.atPunct('[')) {
    ctx.next();
    const size = parseExpression(ctx, tools);
    tools.expectPunct(']');
    return assignSpan(Node.NewArray(type, size), spanSince(ctx, startTok));
  }
  const args = parseArguments(ctx, tools);
  return assignSpan(Node.New(type, args), spanSince(ctx, startTok));
}

function parseConditional(ctx: ParserContext, tools: ParserTools): Expression {
  const startTok = ctx.next(); // 'if'
  tools.expectPunct('(');
  const cond = parseExpression(ctx, tools);
  tools.expectPunct(')');
  const then = parseExpression(ctx, tools);
  tools.expectKeyword(KW.ELSE);
  const otherwise = parseExpression(ctx, tools);
  return assignSpan(Node.Conditional(cond, then, otherwise), spanSince(ctx, startTok));
}

/**
 * 将 TEMPLATE token 转换为插值字符串节点。
 * 每个 `${...}` 片段在独立的子上下文中被完整解析为表达式。
 */
export function parseTemplate(ctx: ParserContext, tok: Token, parts: readonly TemplatePart[]): Expression {
  const result: InterpolationPart[] = [];
  for (const part of parts) {
    if (part.kind === 'text') {
      result.push({ kind: 'text', value: part.value, raw: part.raw });
      continue;
    }
    if (!part.terminated) {
      Diagnostics.unbalancedInterpolation(part.start, ctx.file).throw();
    }
    const sub = ctx.fork(reportInvalidTokens(part.tokens, ctx.diagnostics));
    const subTools = createParserTools(sub);
    const expr = parseExpression(sub, subTools);
    if (!sub.at(TokenKind.EOF)) subTools.error("'}'");
    result.push({ kind: 'expr', expr, raw: part.raw });
  }
  return assignSpan(Node.Interpolated(result), spanFromSources(tok));
}

function parsePrimary(ctx: ParserContext, tools: ParserTools): Expression {
  const tok = ctx.peek();
  const span = spanFromSources(tok);
  switch (tok.kind) {
    case TokenKind.INT:
      ctx.next();
      return assignSpan(Node.Int(typeof tok.value === 'number' ? tok.value : 0), span);
    case TokenKind.LONG:
      ctx.next();
      return assignSpan(Node.Long(typeof tok.value === 'string' ? tok.value : '0'), span);
    case TokenKind.FLOAT:
      ctx.next();
      return assignSpan(Node.Float(typeof tok.value === 'number' ? tok.value : 0, 'float'), span);
    case TokenKind.DOUBLE:
      ctx.next();
      return assignSpan(Node.Float(typeof tok.value === 'number' ? tok.value : 0, 'double'), span);
    case TokenKind.CHAR:
      ctx.next();
      return assignSpan(Node.Char(typeof tok.value === 'number' ? tok.value : 0), span);
    case TokenKind.STRING:
      ctx.next();
      return assignSpan(Node.String(typeof tok.value === 'string' ? tok.value : ''), span);
    case TokenKind.TEMPLATE:
      ctx.next();
      return parseTemplate(ctx, tok, Array.isArray(tok.value) ? tok.value : []);
    case TokenKind.IDENT:
      ctx.next();
      return assignSpan(Node.Name(tok.lexeme), span);
    case TokenKind.KEYWORD:
      switch (tok.value) {
        case KW.TRUE:
          ctx.next();
          return assignSpan(Node.Bool(true), span);
        case KW.FALSE:
          ctx.next();
          return assignSpan(Node.Bool(false), span);
        case KW.NULL:
          ctx.next();
          return assignSpan(Node.Null(), span);
        case KW.THIS:
          ctx.next();
          return assignSpan(Node.This(), span);
        case KW.SUPER:
          ctx.next();
          return assignSpan(Node.Super(), span);
        case KW.NEW:
          return parseNew(ctx, tools);
        case KW.IF:
          return parseConditional(ctx, tools);
        case KW.FUN:
          return parseLambda(ctx, tools);
        default:
          return tools.error('expression');
      }
    case TokenKind.PUNCT:
      if (tok.value === '(') {
        ctx.next();
        const inner = parseExpression(ctx, tools);
        tools.expectPunct(')');
        return assignSpan(inner, spanSince(ctx, tok));
      }
      if (tok.value === '[') {
        ctx.next();
        const elements: Expression[] = [];
        while (!ctx.atPunct(']')) {
          elements.push(parseExpression(ctx, tools));
          if (!tools.acceptPunct(',')) break;
        }
        tools.expectPunct(']');
        return assignSpan(Node.ArrayLiteral(elements), spanSince(ctx, tok));
      }
      return tools.error('expression');
    default:
      return tools.error('expression');
  }
}
