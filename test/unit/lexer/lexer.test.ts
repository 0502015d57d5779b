import { describe, test, it } from 'node:test';
import assert from 'node:assert/strict';
import { lex, tokenStream, isInvalidTokenValue, isTemplateValue } from '../../../src/frontend/lexer.js';
import { TokenKind } from '../../../src/types.js';
import type { TemplatePart, Token } from '../../../src/types.js';

function kinds(tokens: readonly Token[]): TokenKind[] {
  return tokens.map(t => t.kind);
}

function single(source: string): Token {
  const tokens = lex(source);
  assert.equal(tokens.length, 2, `应该只产生一个 token：${source}`);
  const [first] = tokens;
  assert.ok(first);
  return first;
}

function templateParts(source: string): readonly TemplatePart[] {
  const token = single(source);
  assert.equal(token.kind, TokenKind.TEMPLATE);
  assert.ok(isTemplateValue(token.value));
  return token.value;
}

describe('词法分析器', () => {
  test('应该区分关键字、标识符与标点', () => {
    const tokens = lex('class Box { }');
    assert.deepEqual(kinds(tokens), [TokenKind.KEYWORD, TokenKind.IDENT, TokenKind.PUNCT, TokenKind.PUNCT, TokenKind.EOF]);
    assert.deepEqual(
      tokens.map(t => t.value),
      ['class', 'Box', '{', '}', null]
    );
  });

  test('关键字区分大小写', () => {
    assert.equal(single('Class').kind, TokenKind.IDENT);
    assert.equal(single('class').kind, TokenKind.KEYWORD);
  });

  test('应该按最长匹配识别运算符', () => {
    const tokens = lex('a?.b += c == d');
    assert.deepEqual(
      tokens.filter(t => t.kind === TokenKind.PUNCT).map(t => t.value),
      ['?.', '+=', '==']
    );
  });

  test('应该为 token 提供准确的位置信息', () => {
    const tokens = lex('a\n  b', { file: 'src/pos.aml' });
    const b = tokens[1];
    assert.ok(b);
    assert.deepEqual(b.start, { line: 2, col: 3 });
    assert.deepEqual(b.end, { line: 2, col: 4 });
    assert.equal(b.file, 'src/pos.aml');
  });

  test('应该丢弃行注释与块注释', () => {
    const tokens = lex('a // trailing\nb /* inner */ c');
    assert.deepEqual(
      tokens.filter(t => t.kind === TokenKind.IDENT).map(t => t.value),
      ['a', 'b', 'c']
    );
  });

  test('块注释不可嵌套', () => {
    const tokens = lex('/* a /* b */ c */');
    assert.deepEqual(
      tokens.map(t => t.lexeme),
      ['c', '*', '/', '']
    );
  });

  test('应该识别条件编译指令', () => {
    const tokens = lex('#require net');
    assert.equal(tokens[0]?.kind, TokenKind.DIRECTIVE);
    assert.equal(tokens[0]?.value, 'require');
    assert.equal(tokens[1]?.kind, TokenKind.IDENT);
  });

  describe('数值字面量', () => {
    it('应该识别十进制、十六进制与二进制整数', () => {
      assert.equal(single('42').value, 42);
      assert.equal(single('0x1F').value, 31);
      assert.equal(single('0b101').value, 5);
      assert.equal(single('42').kind, TokenKind.INT);
    });

    it('带 L 后缀或超出 Int 范围的整数为 Long', () => {
      const suffixed = single('42L');
      assert.equal(suffixed.kind, TokenKind.LONG);
      assert.equal(suffixed.value, '42');
      const large = single('3000000000');
      assert.equal(large.kind, TokenKind.LONG);
      assert.equal(large.value, '3000000000');
    });

    it('超出 Long 范围的整数为非法 token', () => {
      const token = single('9223372036854775808');
      assert.equal(token.kind, TokenKind.INVALID);
      assert.ok(isInvalidTokenValue(token.value));
      assert.equal(token.value.reason, 'number');
    });

    it('应该识别小数、指数与类型后缀', () => {
      assert.equal(single('1.5').kind, TokenKind.DOUBLE);
      assert.equal(single('1.5').value, 1.5);
      assert.equal(single('2e3').value, 2000);
      assert.equal(single('1.25e-2D').value, 0.0125);
      const float = single('1.5F');
      assert.equal(float.kind, TokenKind.FLOAT);
      assert.equal(float.value, 1.5);
      assert.equal(single('7F').kind, TokenKind.FLOAT);
    });

    it('数字后紧跟字母为非法 token', () => {
      const token = single('12abc');
      assert.equal(token.kind, TokenKind.INVALID);
      assert.equal(token.lexeme, '12abc');
    });

    it('小数点后没有数字时点号单独成为标点', () => {
      const tokens = lex('1.foo');
      assert.deepEqual(kinds(tokens), [TokenKind.INT, TokenKind.PUNCT, TokenKind.IDENT, TokenKind.EOF]);
    });
  });

  describe('字符字面量', () => {
    it('应该以 UTF-16 code unit 表示字符', () => {
      assert.equal(single("'a'").value, 97);
      assert.equal(single("'\\n'").value, 10);
      assert.equal(single("'\\u0041'").value, 65);
      assert.equal(single("'a'").kind, TokenKind.CHAR);
    });

    it('多个字符为非法 token', () => {
      const token = single("'ab'");
      assert.equal(token.kind, TokenKind.INVALID);
      assert.ok(isInvalidTokenValue(token.value));
      assert.equal(token.value.reason, 'char');
    });
  });

  describe('字符串与插值', () => {
    it('应该处理转义序列', () => {
      const token = single('"a\\tb\\"c"');
      assert.equal(token.kind, TokenKind.STRING);
      assert.equal(token.value, 'a\tb"c');
    });

    it('转义的美元符号不开始插值', () => {
      const token = single('"cost \\$x"');
      assert.equal(token.kind, TokenKind.STRING);
      assert.equal(token.value, 'cost $x');
    });

    it('$name 只捕获一个标识符', () => {
      const parts = templateParts('"Hello $name!"');
      assert.equal(parts.length, 3);
      assert.deepEqual(parts[0], { kind: 'text', value: 'Hello ', raw: 'Hello ' });
      const expr = parts[1];
      assert.ok(expr && expr.kind === 'expr');
      assert.equal(expr.raw, '$name');
      assert.deepEqual(
        expr.tokens.map(t => t.value),
        ['name', null]
      );
      assert.deepEqual(parts[2], { kind: 'text', value: '!', raw: '!' });
    });

    it('${expr} 被重新词法分析为代码', () => {
      const parts = templateParts('"a ${x + 1} b"');
      const expr = parts[1];
      assert.ok(expr && expr.kind === 'expr');
      assert.equal(expr.raw, '${x + 1}');
      assert.equal(expr.terminated, true);
      assert.deepEqual(kinds(expr.tokens), [TokenKind.IDENT, TokenKind.PUNCT, TokenKind.INT, TokenKind.EOF]);
    });

    it('插值内的花括号与嵌套字符串不影响配对', () => {
      const parts = templateParts('"${f("}")} end"');
      const expr = parts[0];
      assert.ok(expr && expr.kind === 'expr');
      assert.equal(expr.raw, '${f("}")}');
      assert.deepEqual(parts[1], { kind: 'text', value: ' end', raw: ' end' });
    });

    it('插值子 token 带有原文中的位置', () => {
      const parts = templateParts('"x${y}"');
      const expr = parts[1];
      assert.ok(expr && expr.kind === 'expr');
      assert.deepEqual(expr.start, { line: 1, col: 3 });
      assert.deepEqual(expr.tokens[0]?.start, { line: 1, col: 5 });
    });

    it('未闭合的插值标记为 terminated=false', () => {
      const parts = templateParts('"a ${x"');
      const expr = parts[1];
      assert.ok(expr && expr.kind === 'expr');
      assert.equal(expr.terminated, false);
    });

    it('未闭合的字符串为非法 token', () => {
      const token = lex('"abc')[0];
      assert.ok(token);
      assert.equal(token.kind, TokenKind.INVALID);
      assert.ok(isInvalidTokenValue(token.value));
      assert.equal(token.value.reason, 'unterminated-string');
    });
  });

  describe('错误恢复', () => {
    it('无法识别的字符成为 INVALID token 而不抛出异常', () => {
      const tokens = lex('a @@ b');
      assert.deepEqual(kinds(tokens), [TokenKind.IDENT, TokenKind.INVALID, TokenKind.IDENT, TokenKind.EOF]);
      const bad = tokens[1];
      assert.ok(bad && isInvalidTokenValue(bad.value));
      assert.equal(bad.value.text, '@@');
      assert.equal(bad.value.reason, 'character');
    });

    it('未闭合的块注释为非法 token', () => {
      const token = lex('/* open')[0];
      assert.ok(token && isInvalidTokenValue(token.value));
      assert.equal(token.value.reason, 'unterminated-comment');
    });
  });

  test('token 序列可以重复迭代', () => {
    const stream = tokenStream('val x = 1');
    const first = [...stream].map(t => t.lexeme);
    const second = [...stream].map(t => t.lexeme);
    assert.deepEqual(first, ['val', 'x', '=', '1', '']);
    assert.deepEqual(second, first);
  });
});
