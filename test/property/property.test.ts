import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import * as fc from 'fast-check';
import { filterFeatures, lex, parseSource, reconstructTemplate, templateSkeleton } from '../../src/index.js';
import { TokenKind, type Expression, type SourceFile } from '../../src/types.js';
import { boundFile, compileOk } from '../helpers/test-utils.js';

const TEXT_CHARS = [...'abcXYZ019 .,!:'];
const textArb = fc.stringOf(fc.constantFrom(...TEXT_CHARS), { maxLength: 8 });
const nameArb = fc.stringOf(fc.constantFrom(...'abcdef'), { maxLength: 4 }).map(rest => `x${rest}`);

function globalInit(file: SourceFile): Expression | null {
  const ns = file.decls[0];
  if (!ns || ns.kind !== 'Namespace') return null;
  const field = ns.decls[0];
  return field && field.kind === 'Field' ? field.init : null;
}

describe('性质', () => {
  it('Int 范围内的十进制字面量词法化为原值', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 2147483647 }), n => {
        const [token] = lex(String(n));
        assert.ok(token);
        assert.equal(token.kind, TokenKind.INT);
        assert.equal(token.value, n);
      })
    );
  });

  it('超出 Int 或带 L 后缀的字面量词法化为 Long 且值不变', () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 2n ** 63n - 1n }), n => {
        const [token] = lex(`${n}L`);
        assert.ok(token);
        assert.equal(token.kind, TokenKind.LONG);
        assert.equal(token.value, n.toString());
      })
    );
    fc.assert(
      fc.property(fc.bigInt({ min: 2n ** 31n, max: 2n ** 63n - 1n }), n => {
        const [token] = lex(n.toString());
        assert.equal(token?.kind, TokenKind.LONG);
      })
    );
  });

  it('插值字符串可以由片段还原为源码', () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(textArb, nameArb), { minLength: 1, maxLength: 4 }), textArb, (pieces, tail) => {
        const template = pieces.map(([text, name]) => `${text}\${${name}}`).join('') + tail;
        const { ast, diagnostics } = parseSource(`namespace app { val s: String = "${template}" }`);
        assert.deepEqual(diagnostics, []);
        const init = globalInit(ast);
        assert.ok(init && init.kind === 'Interpolated');
        assert.equal(reconstructTemplate(init), template);
        assert.equal(templateSkeleton(init), pieces.map(([text], i) => `${text}{${i}}`).join('') + tail);
      })
    );
  });

  it('特性过滤是幂等的', () => {
    const source = `
namespace app {
  #require net
  class Http {
    #requireNot gpu
    fun cpu() { }
    fun get() { }
  }
  #requireNot fs
  fun noDisk() { }
  #require gpu
  val device: Int = 0
}
`;
    const { ast } = parseSource(source, { file: 'src/app.aml' });
    fc.assert(
      fc.property(fc.subarray(['net', 'gpu', 'fs']), features => {
        const enabled = new Set(features);
        const once = filterFeatures(ast, enabled);
        assert.deepEqual(filterFeatures(once, enabled), once);
      })
    );
  });

  it('重载决议选择实参可拓宽到的最窄重载，且结果稳定', async () => {
    await fc.assert(
      fc.asyncProperty(fc.constantFrom('Byte', 'Short', 'Int', 'Long'), async argType => {
        const source = `namespace app {\n  fun f(x: Int) { }\n  fun f(x: Long) { }\n  fun g(a: ${argType}) { f(a) }\n}`;
        const expected = argType === 'Long' ? 'app.f(Long)' : 'app.f(Int)';
        for (let run = 0; run < 2; run++) {
          const result = await compileOk({ 'src/app.aml': source });
          const calls = [...boundFile(result, 'src/app.aml').bindings.calls.values()];
          assert.equal(calls.length, 1);
          const [call] = calls;
          assert.ok(call && call.kind === 'function');
          const param = call.method.params[0];
          assert.equal(`${call.method.qualifiedName}(${param && param.kind === 'primitive' ? param.name : '?'})`, expected);
        }
      }),
      { numRuns: 8 }
    );
  });
});
