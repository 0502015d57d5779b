import { DiagnosticBuilder, type Diagnostic } from '../diagnostics/diagnostics.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { Span } from '../types.js';
import { TypeSystem, type Type } from './type_system.js';

/**
 * 绑定诊断收集器：每个文件一个实例，诊断按报告顺序保存。
 */
export class DiagnosticCollector {
  private readonly diagnostics: Diagnostic[] = [];

  constructor(readonly file: string) {}

  error(code: ErrorCode, span: Span, params: Record<string, unknown> = {}): this {
    this.diagnostics.push(DiagnosticBuilder.error(code).withParams(params).withSpan(span).withFile(this.file).build());
    return this;
  }

  /**
   * 类型不兼容：仅因可空性失败时报告 B003，否则报告 B002。
   * 任一侧含错误占位类型时不报告，避免级联。
   */
  typeMismatch(expected: Type, actual: Type, span: Span): this {
    if (TypeSystem.containsError(expected) || TypeSystem.containsError(actual)) return this;
    const code = TypeSystem.failsOnlyOnNullability(actual, expected)
      ? ErrorCode.NULL_SAFETY_VIOLATION
      : ErrorCode.TYPE_MISMATCH;
    return this.error(code, span, {
      expected: TypeSystem.format(expected),
      actual: TypeSystem.format(actual),
    });
  }

  unresolved(name: string, span: Span): this {
    return this.error(ErrorCode.UNRESOLVED_SYMBOL, span, { name });
  }

  getDiagnostics(): Diagnostic[] {
    return [...this.diagnostics];
  }

  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error');
  }

  get count(): number {
    return this.diagnostics.length;
  }
}
