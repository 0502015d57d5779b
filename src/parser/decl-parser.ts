/**
 * 声明解析器
 *
 * 负责命名空间、导入、类、接口、函数、测试和全局变量的解析，
 * 以及声明级别的错误恢复：一个声明解析失败时记录诊断，
 * 跳到下一个声明边界继续，使单次解析可以报告多个独立错误。
 */

import { Node } from '../ast/ast.js';
import { KW, TokenKind } from '../frontend/tokens.js';
import { isDirectiveName } from '../config/semantic.js';
import { Diagnostics, DiagnosticError } from '../diagnostics/diagnostics.js';
import type {
  Block,
  Directive,
  Expression,
  FieldDecl,
  FunctionDecl,
  Import,
  MemberDecl,
  Token,
  TopLevelDecl,
  TypeRef,
} from '../types.js';
import type { ParserContext } from './context.js';
import type { ParserTools } from './parser-tools.js';
import { assignSpan, spanSince } from './span-utils.js';
import { parseQualifiedName, parseType, parseTypeParams } from './type-parser.js';
import { parseParameters, parseExpression } from './expr-parser.js';
import { parseBlock } from './stmt-parser.js';

const DECL_START_KEYWORDS: ReadonlySet<string> = new Set([
  KW.NAMESPACE,
  KW.IMPORT,
  KW.CLASS,
  KW.INTERFACE,
  KW.FUN,
  KW.TEST,
  KW.VAR,
  KW.VAL,
  KW.STATIC,
  KW.NATIVE,
  KW.SUSPEND,
]);

function isDeclStart(tok: Token): boolean {
  if (tok.kind === TokenKind.DIRECTIVE) return true;
  return tok.kind === TokenKind.KEYWORD && typeof tok.value === 'string' && DECL_START_KEYWORDS.has(tok.value);
}

/**
 * 解析声明前的 `#require f` / `#requireNot f` 指令
 */
function parseDirectives(ctx: ParserContext, tools: ParserTools): Directive[] {
  const directives: Directive[] = [];
  while (ctx.at(TokenKind.DIRECTIVE)) {
    const tok = ctx.next();
    const name = typeof tok.value === 'string' ? tok.value : '';
    const feature = tools.parseIdent();
    if (!isDirectiveName(name)) {
      ctx.diagnostics.push(Diagnostics.unknownDirective(name, spanSince(ctx, tok), ctx.file).build());
      continue;
    }
    directives.push(assignSpan(Node.Directive(name, feature), spanSince(ctx, tok)));
  }
  return directives;
}

function parseImport(ctx: ParserContext, tools: ParserTools): Import {
  const startTok = tools.expectKeyword(KW.IMPORT);
  const path = parseQualifiedName(ctx, tools);
  tools.optionalSemicolon();
  return assignSpan(Node.Import(path), spanSince(ctx, startTok));
}

function parseField(
  ctx: ParserContext,
  tools: ParserTools,
  startTok: Token,
  isStatic: boolean,
  directives: readonly Directive[]
): FieldDecl {
  const mutable = ctx.next().value === KW.VAR;
  const name = tools.parseIdent();
  let type: TypeRef | null = null;
  let init: Expression | null = null;
  if (tools.acceptPunct(':')) type = parseType(ctx, tools);
  if (tools.acceptPunct('=')) init = parseExpression(ctx, tools);
  if (!type && !init) tools.error("':' or '='");
  tools.optionalSemicolon();
  return assignSpan(Node.Field(name, type, init, { isStatic, mutable }, directives), spanSince(ctx, startTok));
}

interface ModifierSet {
  isStatic: boolean;
  isNative: boolean;
  isSuspend: boolean;
}

function parseModifiers(ctx: ParserContext): ModifierSet {
  const modifiers: ModifierSet = { isStatic: false, isNative: false, isSuspend: false };
  for (;;) {
    if (ctx.isKeyword(KW.STATIC)) modifiers.isStatic = true;
    else if (ctx.isKeyword(KW.NATIVE)) modifiers.isNative = true;
    else if (ctx.isKeyword(KW.SUSPEND)) modifiers.isSuspend = true;
    else return modifiers;
    ctx.next();
  }
}

/**
 * 函数签名与可选函数体：`fun name<T>(params): Ret { ... }`
 */
function parseFunction(
  ctx: ParserContext,
  tools: ParserTools,
  startTok: Token,
  modifiers: ModifierSet,
  directives: readonly Directive[],
  bodyPolicy: 'required' | 'optional' | 'forbidden'
): FunctionDecl {
  tools.expectKeyword(KW.FUN);
  const name = tools.parseIdent();
  const typeParams = parseTypeParams(ctx, tools);
  const params = parseParameters(ctx, tools);
  let returnType: TypeRef | null = null;
  if (tools.acceptPunct(':')) returnType = parseType(ctx, tools);
  let body: Block | null = null;
  if (ctx.atPunct('{')) {
    if (bodyPolicy === 'forbidden' || modifiers.isNative) tools.error('end of declaration');
    body = parseBlock(ctx, tools);
  } else if (bodyPolicy === 'required' && !modifiers.isNative) {
    tools.error("'{'");
  }
  tools.optionalSemicolon();
  ctx.debug.log(`function ${name}`);
  return assignSpan(
    Node.Function(name, 'function', typeParams, params, returnType, body, { ...modifiers }, directives),
    spanSince(ctx, startTok)
  );
}

function parseTest(
  ctx: ParserContext,
  tools: ParserTools,
  startTok: Token,
  directives: readonly Directive[]
): FunctionDecl {
  tools.expectKeyword(KW.TEST);
  const name = tools.parseIdent();
  if (tools.acceptPunct('(')) tools.expectPunct(')');
  const body = parseBlock(ctx, tools);
  return assignSpan(
    Node.Function(name, 'test', [], [], null, body, undefined, directives),
    spanSince(ctx, startTok)
  );
}

/**
 * 类成员：字段、方法或构造函数（mock 声明体复用同一规则）
 */
export function parseMember(ctx: ParserContext, tools: ParserTools): MemberDecl {
  const startTok = ctx.peek();
  const directives = parseDirectives(ctx, tools);
  if (ctx.isKeyword(KW.CONSTRUCTOR)) {
    ctx.next();
    const params = parseParameters(ctx, tools);
    const body = parseBlock(ctx, tools);
    tools.optionalSemicolon();
    return assignSpan(
      Node.Function(KW.CONSTRUCTOR, 'constructor', [], params, null, body, undefined, directives),
      spanSince(ctx, startTok)
    );
  }
  const modifiers = parseModifiers(ctx);
  if (ctx.isKeyword(KW.VAR) || ctx.isKeyword(KW.VAL)) {
    if (modifiers.isNative || modifiers.isSuspend) tools.error("'fun'");
    return parseField(ctx, tools, startTok, modifiers.isStatic, directives);
  }
  if (ctx.isKeyword(KW.FUN)) return parseFunction(ctx, tools, startTok, modifiers, directives, 'optional');
  return tools.error("'var', 'val', 'fun' or 'constructor'");
}

function parseClass(ctx: ParserContext, tools: ParserTools, startTok: Token, directives: readonly Directive[]): TopLevelDecl {
  tools.expectKeyword(KW.CLASS);
  const name = tools.parseIdent();
  const typeParams = parseTypeParams(ctx, tools);
  let superclass: TypeRef | null = null;
  const interfaces: TypeRef[] = [];
  if (tools.acceptKeyword(KW.EXTENDS)) superclass = parseType(ctx, tools);
  if (tools.acceptKeyword(KW.IMPLEMENTS)) {
    interfaces.push(parseType(ctx, tools));
    while (tools.acceptPunct(',')) interfaces.push(parseType(ctx, tools));
  }
  tools.expectPunct('{');
  const members: MemberDecl[] = [];
  while (!tools.acceptPunct('}')) {
    if (ctx.at(TokenKind.EOF)) tools.error("'}'");
    members.push(parseMember(ctx, tools));
  }
  ctx.debug.log(`class ${name} (${members.length} members)`);
  return assignSpan(
    Node.Class(name, typeParams, superclass, interfaces, members, directives),
    spanSince(ctx, startTok)
  );
}

function parseInterface(
  ctx: ParserContext,
  tools: ParserTools,
  startTok: Token,
  directives: readonly Directive[]
): TopLevelDecl {
  tools.expectKeyword(KW.INTERFACE);
  const name = tools.parseIdent();
  const typeParams = parseTypeParams(ctx, tools);
  const supers: TypeRef[] = [];
  if (tools.acceptKeyword(KW.EXTENDS)) {
    supers.push(parseType(ctx, tools));
    while (tools.acceptPunct(',')) supers.push(parseType(ctx, tools));
  }
  tools.expectPunct('{');
  const methods: FunctionDecl[] = [];
  while (!tools.acceptPunct('}')) {
    if (ctx.at(TokenKind.EOF)) tools.error("'}'");
    const methodStart = ctx.peek();
    const methodDirectives = parseDirectives(ctx, tools);
    const modifiers = parseModifiers(ctx);
    if (modifiers.isStatic || modifiers.isNative) tools.error("'fun'");
    methods.push(parseFunction(ctx, tools, methodStart, modifiers, methodDirectives, 'forbidden'));
  }
  return assignSpan(Node.Interface(name, typeParams, supers, methods, directives), spanSince(ctx, startTok));
}

interface DeclList {
  imports: Import[];
  decls: TopLevelDecl[];
}

function parseNamespace(ctx: ParserContext, tools: ParserTools): TopLevelDecl {
  const startTok = tools.expectKeyword(KW.NAMESPACE);
  const path = parseQualifiedName(ctx, tools);
  const openTok = tools.expectPunct('{');
  const outer = ctx.namespace;
  ctx.namespace = [...outer, ...path];
  try {
    const { imports, decls } = collectDecls(ctx, tools, true);
    if (!ctx.atPunct('}')) tools.error("'}'", openTok);
    ctx.next();
    return assignSpan(Node.Namespace(path, imports, decls), spanSince(ctx, startTok));
  } finally {
    ctx.namespace = outer;
  }
}

/**
 * 解析一个顶层（或命名空间内）声明；导入返回 Import 节点
 */
function parseTopLevel(ctx: ParserContext, tools: ParserTools): TopLevelDecl | Import {
  const startTok = ctx.peek();
  if (ctx.isKeyword(KW.IMPORT)) return parseImport(ctx, tools);
  if (ctx.isKeyword(KW.NAMESPACE)) return parseNamespace(ctx, tools);

  const directives = parseDirectives(ctx, tools);
  if (ctx.isKeyword(KW.CLASS)) return parseClass(ctx, tools, startTok, directives);
  if (ctx.isKeyword(KW.INTERFACE)) return parseInterface(ctx, tools, startTok, directives);
  if (ctx.isKeyword(KW.TEST)) return parseTest(ctx, tools, startTok, directives);
  const modifiers = parseModifiers(ctx);
  if (ctx.isKeyword(KW.FUN)) return parseFunction(ctx, tools, startTok, modifiers, directives, 'required');
  if (ctx.isKeyword(KW.VAR) || ctx.isKeyword(KW.VAL)) {
    if (modifiers.isNative || modifiers.isSuspend) tools.error("'fun'");
    return parseField(ctx, tools, startTok, true, directives);
  }
  return tools.error('declaration');
}

/**
 * 声明级错误恢复：从出错声明的起点开始统计花括号深度，
 * 跳到深度回到 0 处的下一个声明关键字（或外层的 `}`）。
 */
function synchronize(ctx: ParserContext, declStart: number): void {
  let depth = 0;
  for (let k = declStart; k < ctx.index; k++) {
    const tok = ctx.tokens[k];
    if (tok?.kind !== TokenKind.PUNCT) continue;
    if (tok.value === '{') depth++;
    else if (tok.value === '}') depth--;
  }
  if (ctx.index === declStart) {
    const tok = ctx.next();
    if (tok.kind === TokenKind.PUNCT && tok.value === '{') depth++;
  }
  while (!ctx.at(TokenKind.EOF)) {
    const tok = ctx.peek();
    if (depth <= 0 && isDeclStart(tok)) return;
    if (tok.kind === TokenKind.PUNCT && tok.value === '}') {
      if (depth <= 0) return;
      depth--;
    } else if (tok.kind === TokenKind.PUNCT && tok.value === '{') {
      depth++;
    }
    ctx.next();
  }
}

function collectDecls(ctx: ParserContext, tools: ParserTools, nested: boolean): DeclList {
  const imports: Import[] = [];
  const decls: TopLevelDecl[] = [];
  for (;;) {
    tools.optionalSemicolon();
    if (ctx.at(TokenKind.EOF)) break;
    if (nested && ctx.atPunct('}')) break;
    const declStart = ctx.index;
    try {
      const decl = parseTopLevel(ctx, tools);
      if (decl.kind === 'Import') imports.push(decl);
      else decls.push(decl);
    } catch (e) {
      if (!(e instanceof DiagnosticError)) throw e;
      ctx.diagnostics.push(e.diagnostic);
      ctx.debug.log(`recovering after ${e.diagnostic.code} at ${e.pos.line}:${e.pos.col}`);
      synchronize(ctx, declStart);
      // 顶层遇到多余的 '}' 时直接跳过
      if (!nested && ctx.atPunct('}')) ctx.next();
    }
  }
  return { imports, decls };
}

/**
 * 收集文件级别的导入与声明。
 * 解析错误不会中止整个文件，所有诊断写入 `ctx.diagnostics`。
 */
export function collectTopLevelDecls(ctx: ParserContext, tools: ParserTools): DeclList {
  return collectDecls(ctx, tools, false);
}
