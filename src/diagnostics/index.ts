/**
 * @module diagnostics
 *
 * 诊断系统模块。
 *
 * 包含：
 * - 结构化诊断 (Diagnostic, DiagnosticBuilder, DiagnosticError)
 * - 内部错误 (InternalCompilerError)
 * - 错误码定义 (ErrorCode, ErrorMetadata)
 */

export {
  DiagnosticError,
  DiagnosticBuilder,
  InternalCompilerError,
  Diagnostics,
  formatDiagnostic,
  sortDiagnostics,
  hasErrors,
  dummySpan,
  type Diagnostic,
} from './diagnostics.js';

export {
  ErrorCode,
  ERROR_METADATA,
  formatErrorMessage,
  getErrorMetadata,
  type ErrorCategory,
  type ErrorSeverity,
  type ErrorMetadata,
} from './error_codes.js';
