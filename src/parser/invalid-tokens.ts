import { TokenKind } from '../frontend/tokens.js';
import { isInvalidTokenValue } from '../frontend/lexer.js';
import { Diagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import type { Token } from '../types.js';

/**
 * 将词法阶段留下的 INVALID token 转换为诊断，并返回剔除它们之后的 token 流。
 */
export function reportInvalidTokens(tokens: readonly Token[], diagnostics: Diagnostic[]): Token[] {
  const kept: Token[] = [];
  for (const tok of tokens) {
    if (tok.kind !== TokenKind.INVALID) {
      kept.push(tok);
      continue;
    }
    const span = { start: tok.start, end: tok.end };
    const text = isInvalidTokenValue(tok.value) ? tok.value.text : tok.lexeme;
    const reason = isInvalidTokenValue(tok.value) ? tok.value.reason : 'character';
    switch (reason) {
      case 'unterminated-string':
        diagnostics.push(Diagnostics.unterminatedString(span, tok.file).build());
        break;
      case 'unterminated-comment':
        diagnostics.push(Diagnostics.unterminatedComment(span, tok.file).build());
        break;
      case 'number':
        diagnostics.push(Diagnostics.invalidNumber(text, span, tok.file).build());
        break;
      case 'char':
        diagnostics.push(Diagnostics.invalidChar(text, span, tok.file).build());
        break;
      case 'character':
        diagnostics.push(Diagnostics.invalidToken(text, span, tok.file).build());
        break;
    }
  }
  return kept;
}
