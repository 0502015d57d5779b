/**
 * 语句解析器
 *
 * 分号是可选的语句终止符；`return` 的操作数必须与 `return` 位于同一行。
 */

import { Node } from '../ast/ast.js';
import { KW, TokenKind } from '../frontend/tokens.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { Block, Expression, If, MemberDecl, Statement, SwitchCase, TypeRef } from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { assignSpan, spanSince } from './span-utils.js';
import { parseExpression } from './expr-parser.js';
import { parseNamedType, parseType } from './type-parser.js';
import { parseMember } from './decl-parser.js';

export function parseBlock(ctx: ParserContext, tools: ParserTools): Block {
  const startTok = tools.expectPunct('{');
  const statements: Statement[] = [];
  while (!ctx.atPunct('}')) {
    if (ctx.at(TokenKind.EOF)) tools.error("'}'");
    statements.push(parseStatement(ctx, tools));
  }
  ctx.next();
  return assignSpan(Node.Block(statements), spanSince(ctx, startTok));
}

function parseCondition(ctx: ParserContext, tools: ParserTools): Expression {
  tools.expectPunct('(');
  const cond = parseExpression(ctx, tools);
  tools.expectPunct(')');
  return cond;
}

function parseIf(ctx: ParserContext, tools: ParserTools): If {
  const startTok = tools.expectKeyword(KW.IF);
  const cond = parseCondition(ctx, tools);
  const then = parseBlock(ctx, tools);
  let otherwise: Block | If | null = null;
  if (tools.acceptKeyword(KW.ELSE)) {
    otherwise = ctx.isKeyword(KW.IF) ? parseIf(ctx, tools) : parseBlock(ctx, tools);
  }
  return assignSpan(Node.If(cond, then, otherwise), spanSince(ctx, startTok));
}

function atCaseBoundary(ctx: ParserContext): boolean {
  return ctx.isKeyword(KW.CASE) || ctx.isKeyword(KW.DEFAULT) || ctx.atPunct('}') || ctx.at(TokenKind.EOF);
}

/**
 * switch 语句：`switch (expr) { case v, w: ... default: ... }`
 *
 * 分支体延续到下一个 `case`/`default`/`}`，不存在贯穿。
 * 出现在 `default` 之后的 `case` 报告诊断并从语法树中丢弃。
 */
function parseSwitch(ctx: ParserContext, tools: ParserTools): Statement {
  const startTok = tools.expectKeyword(KW.SWITCH);
  const subject = parseCondition(ctx, tools);
  tools.expectPunct('{');
  const cases: SwitchCase[] = [];
  let seenDefault = false;
  while (!ctx.atPunct('}')) {
    const caseTok = ctx.peek();
    const values: Expression[] = [];
    let isDefault = false;
    if (tools.acceptKeyword(KW.CASE)) {
      values.push(parseExpression(ctx, tools));
      while (tools.acceptPunct(',')) values.push(parseExpression(ctx, tools));
    } else if (tools.acceptKeyword(KW.DEFAULT)) {
      isDefault = true;
    } else {
      tools.error("'case', 'default' or '}'");
    }
    tools.expectPunct(':');
    const bodyStart = ctx.peek();
    const statements: Statement[] = [];
    while (!atCaseBoundary(ctx)) statements.push(parseStatement(ctx, tools));
    const body = assignSpan(
      Node.Block(statements),
      statements.length > 0 ? spanSince(ctx, bodyStart) : spanSince(ctx, caseTok)
    );
    const clause = assignSpan(Node.Case(values, isDefault, body), spanSince(ctx, caseTok));
    if (seenDefault) {
      const diag = Diagnostics.caseAfterDefault(clause.span, ctx.file);
      if (isDefault) diag.withMessage("Duplicate 'default' clause");
      ctx.diagnostics.push(diag.build());
      continue;
    }
    seenDefault = isDefault;
    cases.push(clause);
  }
  ctx.next();
  return assignSpan(Node.Switch(subject, cases), spanSince(ctx, startTok));
}

function parseVarDecl(ctx: ParserContext, tools: ParserTools): Statement {
  const startTok = ctx.next(); // 'var' | 'val'
  const mutable = startTok.value === KW.VAR;
  const name = tools.parseIdent();
  let type: TypeRef | null = null;
  let init: Expression | null = null;
  if (tools.acceptPunct(':')) type = parseType(ctx, tools);
  if (tools.acceptPunct('=')) init = parseExpression(ctx, tools);
  if (!type && !init) tools.error("':' or '='");
  return assignSpan(Node.VarDecl(name, type, init, mutable), spanSince(ctx, startTok));
}

function parseForRange(ctx: ParserContext, tools: ParserTools): Statement {
  const startTok = tools.expectKeyword(KW.FOR);
  tools.expectPunct('(');
  const variable = tools.parseIdent();
  tools.expectPunct('=');
  const from = parseExpression(ctx, tools);
  tools.expectKeyword(KW.TO);
  const to = parseExpression(ctx, tools);
  tools.expectPunct(')');
  const body = parseBlock(ctx, tools);
  return assignSpan(Node.ForRange(variable, from, to, body), spanSince(ctx, startTok));
}

function parseMock(ctx: ParserContext, tools: ParserTools): Statement {
  const startTok = tools.expectKeyword(KW.MOCK);
  const target = parseNamedType(ctx, tools);
  tools.expectPunct('{');
  const members: MemberDecl[] = [];
  while (!tools.acceptPunct('}')) {
    if (ctx.at(TokenKind.EOF)) tools.error("'}'");
    members.push(parseMember(ctx, tools));
  }
  return assignSpan(Node.Mock(target, members), spanSince(ctx, startTok));
}

function parseReturn(ctx: ParserContext, tools: ParserTools): Statement {
  const startTok = tools.expectKeyword(KW.RETURN);
  let expr: Expression | null = null;
  const hasOperand =
    ctx.onSameLine() &&
    !ctx.atPunct(';') &&
    !ctx.atPunct('}') &&
    !ctx.at(TokenKind.EOF) &&
    !ctx.isKeyword(KW.CASE) &&
    !ctx.isKeyword(KW.DEFAULT);
  if (hasOperand) expr = parseExpression(ctx, tools);
  return assignSpan(Node.Return(expr), spanSince(ctx, startTok));
}

function parseStatementBody(ctx: ParserContext, tools: ParserTools): Statement {
  const tok = ctx.peek();
  if (ctx.atPunct('{')) return parseBlock(ctx, tools);
  if (tok.kind === TokenKind.KEYWORD) {
    switch (tok.value) {
      case KW.VAR:
      case KW.VAL:
        return parseVarDecl(ctx, tools);
      case KW.IF:
        return parseIf(ctx, tools);
      case KW.WHILE: {
        ctx.next();
        const cond = parseCondition(ctx, tools);
        const body = parseBlock(ctx, tools);
        return assignSpan(Node.While(cond, body), spanSince(ctx, tok));
      }
      case KW.FOR:
        return parseForRange(ctx, tools);
      case KW.LOOP: {
        ctx.next();
        const body = parseBlock(ctx, tools);
        return assignSpan(Node.Loop(body), spanSince(ctx, tok));
      }
      case KW.SWITCH:
        return parseSwitch(ctx, tools);
      case KW.RETURN:
        return parseReturn(ctx, tools);
      case KW.THROW: {
        ctx.next();
        const expr = parseExpression(ctx, tools);
        return assignSpan(Node.Throw(expr), spanSince(ctx, tok));
      }
      case KW.BREAK:
        ctx.next();
        return assignSpan(Node.Break(), spanSince(ctx, tok));
      case KW.CONTINUE:
        ctx.next();
        return assignSpan(Node.Continue(), spanSince(ctx, tok));
      case KW.SCOPE: {
        ctx.next();
        const body = parseBlock(ctx, tools);
        return assignSpan(Node.Scope(body), spanSince(ctx, tok));
      }
      case KW.MOCK:
        return parseMock(ctx, tools);
    }
  }
  const expr = parseExpression(ctx, tools);
  return assignSpan(Node.ExprStmt(expr), spanSince(ctx, tok));
}

export function parseStatement(ctx: ParserContext, tools: ParserTools): Statement {
  const stmt = parseStatementBody(ctx, tools);
  tools.optionalSemicolon();
  return stmt;
}
