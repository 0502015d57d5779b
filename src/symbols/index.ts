/**
 * @module symbols
 *
 * 全局符号表与条件编译过滤。
 */

export { buildSymbolTable, type SymbolBuildResult } from './builder.js';
export { filterFeatures, directivesSatisfied, missingFeatures } from './features.js';
export {
  SymbolTable,
  qualify,
  type ClassSymbol,
  type FunctionEntry,
  type FunctionGroupSymbol,
  type GlobalSymbol,
  type ImportTarget,
  type InterfaceSymbol,
  type MemberSymbol,
  type NamespaceSymbol,
  type TypeSymbol,
} from './symbols.js';
