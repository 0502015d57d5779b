// Structured diagnostics with stable error codes, spans and file attribution

import type { Position, Span } from '../types.js';
import {
  ErrorCode,
  ERROR_METADATA,
  formatErrorMessage,
  type ErrorCategory,
  type ErrorSeverity,
} from './error_codes.js';

export interface Diagnostic {
  readonly severity: ErrorSeverity;
  readonly code: ErrorCode;
  /** 稳定的错误类别标签，例如 `UnresolvedSymbol` */
  readonly kind: string;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly span: Span;
  readonly file: string;
  readonly help?: string;
  readonly relatedInformation?: readonly {
    readonly span: Span;
    readonly message: string;
  }[];
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

/**
 * 代码生成阶段遇到不变量被破坏时抛出（例如绑定树中残留错误类型占位符）。
 * 这属于编译器缺陷，不是面向用户的诊断。
 */
export class InternalCompilerError extends Error {
  constructor(message: string, public readonly span?: Span) {
    super(message);
    this.name = 'InternalCompilerError';
  }
}

export class DiagnosticBuilder {
  private code?: ErrorCode;
  private params: Record<string, unknown> = {};
  private message?: string;
  private span?: Span;
  private file = '<unknown>';
  private relatedInformation: Array<{ span: Span; message: string }> = [];

  static error(code: ErrorCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withCode(code);
  }

  withCode(code: ErrorCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withParams(params: Record<string, unknown>): DiagnosticBuilder {
    this.params = { ...this.params, ...params };
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  withSpan(span: Span): DiagnosticBuilder {
    this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  withFile(file: string): DiagnosticBuilder {
    this.file = file;
    return this;
  }

  withRelated(span: Span, message: string): DiagnosticBuilder {
    this.relatedInformation.push({ span, message });
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.span) throw new Error('Diagnostic span is required');
    const metadata = ERROR_METADATA[this.code];

    const diagnostic: Diagnostic = {
      severity: metadata.severity,
      code: this.code,
      kind: metadata.kind,
      category: metadata.category,
      message: this.message ?? formatErrorMessage(this.code, this.params),
      span: this.span,
      file: this.file,
      ...(metadata.help ? { help: metadata.help } : {}),
      ...(this.relatedInformation.length > 0 ? { relatedInformation: [...this.relatedInformation] } : {}),
    };
    return diagnostic;
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  invalidToken: (text: string, span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.INVALID_TOKEN).withParams({ text }).withSpan(span).withFile(file),

  unterminatedString: (span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.UNTERMINATED_STRING).withSpan(span).withFile(file),

  unterminatedComment: (span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.UNTERMINATED_COMMENT).withSpan(span).withFile(file),

  invalidNumber: (text: string, span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.INVALID_NUMBER).withParams({ text }).withSpan(span).withFile(file),

  invalidChar: (text: string, span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.INVALID_CHAR_LITERAL).withParams({ text }).withSpan(span).withFile(file),

  unexpectedToken: (expected: string, found: string, pos: Position, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.UNEXPECTED_TOKEN)
      .withParams({ expected, found })
      .withPosition(pos)
      .withFile(file),

  unbalancedInterpolation: (pos: Position, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.UNBALANCED_INTERPOLATION).withPosition(pos).withFile(file),

  caseAfterDefault: (span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.CASE_AFTER_DEFAULT).withSpan(span).withFile(file),

  unknownDirective: (name: string, span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.UNKNOWN_DIRECTIVE).withParams({ name }).withSpan(span).withFile(file),

  internal: (detail: string, span: Span, file: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(ErrorCode.INTERNAL_ERROR).withParams({ detail }).withSpan(span).withFile(file),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, code, kind, message, span, file } = diagnostic;
  let result = `${file}:${span.start.line}:${span.start.col}: ${severity} ${code} [${kind}]: ${message}`;

  if (diagnostic.help) {
    result += `\n  help: ${diagnostic.help}`;
  }

  if (source) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line !== undefined) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(Math.max(0, span.start.col - 1))}^`;
    }
  }

  return result;
}

/** 按文件、行、列稳定排序，保证并行阶段产出的诊断顺序确定 */
export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(
    (a, b) =>
      a.file.localeCompare(b.file) ||
      a.span.start.line - b.span.start.line ||
      a.span.start.col - b.span.start.col ||
      a.code.localeCompare(b.code)
  );
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some(diag => diag.severity === 'error');
}

export function dummySpan(): Span {
  return { start: { line: 1, col: 1 }, end: { line: 1, col: 1 } };
}
