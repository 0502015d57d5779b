/**
 * AmLang Parser - 主入口
 * 负责协调各个子模块完成单个源文件的解析
 *
 * 解析从不因语法错误而整体失败：出错的声明被跳过，
 * 其余声明照常进入语法树，所有诊断一并返回。
 */

import { Node } from './ast/ast.js';
import type { SourceFile, SourceRole, Token } from './types.js';
import type { Diagnostic } from './diagnostics/diagnostics.js';
import { lex } from './frontend/lexer.js';
import { createParserContext } from './parser/context.js';
import { createParserTools } from './parser/parser-tools.js';
import { collectTopLevelDecls } from './parser/decl-parser.js';
import { reportInvalidTokens } from './parser/invalid-tokens.js';
import { assignSpan, spanFromTokens } from './parser/span-utils.js';

/**
 * 解析结果
 *
 * 包含尽可能完整的语法树和解析过程中收集的诊断信息。
 * 即使存在语法错误，也会返回已成功解析的声明。
 */
export interface ParseResult {
  /** 部分或完整的文件语法树 */
  ast: SourceFile;
  /** 词法与语法诊断 */
  diagnostics: Diagnostic[];
}

export interface ParseOptions {
  /** 源文件路径（写入诊断与语法树） */
  readonly file?: string;
  /** 文件角色，默认 `source` */
  readonly role?: SourceRole;
}

/**
 * 解析标记流生成语法树
 *
 * @param tokens 词法标记数组（以 EOF 结尾）
 * @param options 文件路径与角色
 * @returns 解析结果（语法树 + 诊断信息）
 */
export function parse(tokens: readonly Token[], options: ParseOptions = {}): ParseResult {
  const file = options.file ?? tokens[0]?.file ?? '<input>';
  const diagnostics: Diagnostic[] = [];
  const significant = reportInvalidTokens(tokens, diagnostics);
  const ctx = createParserContext(significant, file, diagnostics);
  const tools = createParserTools(ctx);
  const { imports, decls } = collectTopLevelDecls(ctx, tools);
  const fileNode = Node.File(file, options.role ?? 'source', imports, decls);
  const first = significant[0];
  const last = significant[significant.length - 1];
  if (first && last) assignSpan(fileNode, spanFromTokens(first, last));
  return { ast: fileNode, diagnostics };
}

/**
 * 词法分析并解析源代码文本
 *
 * @example
 * ```typescript
 * const { ast, diagnostics } = parseSource('namespace app { fun main() { } }', { file: 'src/main.aml' });
 * ```
 */
export function parseSource(source: string, options: ParseOptions = {}): ParseResult {
  const file = options.file ?? '<input>';
  return parse(lex(source, { file }), { ...options, file });
}
