import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  DiagnosticBuilder,
  Diagnostics,
  ErrorCode,
  formatDiagnostic,
  formatErrorMessage,
  hasErrors,
  sortDiagnostics,
  type Diagnostic,
} from '../../../src/diagnostics/index.js';
import type { Span } from '../../../src/types.js';

function span(line: number, col: number): Span {
  return { start: { line, col }, end: { line, col: col + 1 } };
}

function unresolved(file: string, line: number, col: number): Diagnostic {
  return DiagnosticBuilder.error(ErrorCode.UNRESOLVED_SYMBOL)
    .withParams({ name: 'x' })
    .withSpan(span(line, col))
    .withFile(file)
    .build();
}

describe('诊断', () => {
  it('应该用参数填充消息模板', () => {
    assert.equal(
      formatErrorMessage(ErrorCode.TYPE_MISMATCH, { expected: 'Int', actual: 'String' }),
      'Type mismatch: expected Int, found String'
    );
  });

  it('缺失的参数保留占位符，数组以逗号连接', () => {
    assert.equal(formatErrorMessage(ErrorCode.UNRESOLVED_SYMBOL), "Unresolved symbol '{name}'");
    assert.equal(
      formatErrorMessage(ErrorCode.AMBIGUOUS_OVERLOAD, { name: 'f', candidates: ['f(Int)', 'f(Long)'] }),
      "Ambiguous call to 'f': candidates f(Int), f(Long)"
    );
  });

  it('构建的诊断带有错误码元数据', () => {
    const diag = Diagnostics.caseAfterDefault(span(3, 5), 'src/a.aml').build();

    assert.equal(diag.code, 'P003');
    assert.equal(diag.kind, 'InvalidSwitchOrdering');
    assert.equal(diag.category, 'syntax');
    assert.equal(diag.severity, 'error');
    assert.equal(diag.file, 'src/a.aml');
    assert.equal(diag.help, "'default' must be the last clause of a switch.");
  });

  it('缺少位置时构建失败', () => {
    assert.throws(() => DiagnosticBuilder.error(ErrorCode.INVALID_TOKEN).build(), /span is required/);
  });

  it('应该格式化诊断并指出源码位置', () => {
    const diag = Diagnostics.unexpectedToken("'}'", "'val'", { line: 2, col: 3 }, 'src/a.aml').build();
    const text = formatDiagnostic(diag, 'fun f() {\n  val\n}');

    assert.equal(
      text,
      "src/a.aml:2:3: error P001 [UnexpectedToken]: Expected '}', found 'val'\n> 2|   val\n>      ^"
    );
  });

  it('应该按文件、行、列稳定排序', () => {
    const sorted = sortDiagnostics([
      unresolved('src/b.aml', 1, 1),
      unresolved('src/a.aml', 4, 2),
      unresolved('src/a.aml', 1, 9),
      unresolved('src/a.aml', 1, 3),
    ]);

    assert.deepEqual(
      sorted.map(d => `${d.file}:${d.span.start.line}:${d.span.start.col}`),
      ['src/a.aml:1:3', 'src/a.aml:1:9', 'src/a.aml:4:2', 'src/b.aml:1:1']
    );
  });

  it('hasErrors 只关注错误级别', () => {
    assert.equal(hasErrors([]), false);
    assert.equal(hasErrors([unresolved('src/a.aml', 1, 1)]), true);
  });
});
