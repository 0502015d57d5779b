/**
 * @module amlang-c
 *
 * AmLang 到可移植 C 的编译器 API。
 *
 * **编译管道**：
 * ```
 * 源代码 → lex → parse → filterFeatures → buildSymbolTable → buildProgramModel
 *        → bindFile（逐文件） → InstantiationRegistry.close → generateC
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { compile, formatDiagnostic } from 'amlang-c';
 *
 * const source = `namespace app { fun main() { System.println("Hello") } }`;
 * const result = await compile([{ path: 'src/app.aml', source }]);
 * if (result.success) {
 *   for (const unit of result.units) console.log(unit.name);
 * } else {
 *   console.error(result.diagnostics.map(d => formatDiagnostic(d, source)).join('\n'));
 * }
 * ```
 */

// 编译驱动
export {
  compile,
  inferRole,
  loadPrelude,
  runtimeDirectory,
  runtimeSources,
  PRELUDE_PATH,
  RUNTIME_FILES,
  TEST_ROOT,
} from './driver/index.js';
export type { CompileOptions, CompileResult, SourceInput } from './driver/index.js';

// 各阶段
export { lex, tokenStream } from './frontend/lexer.js';
export { parse, parseSource } from './parser.js';
export type { ParseOptions, ParseResult } from './parser.js';
export { reconstructTemplate, templateSkeleton } from './parser/interpolation.js';
export { buildSymbolTable, filterFeatures, SymbolTable } from './symbols/index.js';
export { bindFile, buildProgramModel, InstantiationRegistry, TypeSystem } from './binder/index.js';
export type { BoundFile, ProgramModel, Type as SemanticType } from './binder/index.js';
export { generateC, HEADER_NAME } from './c/index.js';
export type { CodegenOptions, CodegenResult, GeneratedUnit } from './c/index.js';

// AST 与诊断
export { Node, DefaultAstVisitor } from './ast/index.js';
export type { AstVisitor } from './ast/index.js';
export {
  DiagnosticError,
  InternalCompilerError,
  ErrorCode,
  formatDiagnostic,
  sortDiagnostics,
  hasErrors,
} from './diagnostics/index.js';
export type { Diagnostic } from './diagnostics/index.js';

// 类型定义重导出
export type * from './types.js';
