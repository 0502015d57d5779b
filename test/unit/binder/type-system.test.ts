import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { COST, TypeSystem } from '../../../src/binder/index.js';

const { primitive } = TypeSystem;

describe('类型系统', () => {
  it('转换代价遵循拓宽格', () => {
    assert.equal(TypeSystem.conversionCost(primitive('Int'), primitive('Int')), COST.EXACT);
    assert.equal(TypeSystem.conversionCost(primitive('Int'), primitive('Int', true)), COST.NULLABLE_WRAP);
    assert.equal(TypeSystem.conversionCost(primitive('Int'), primitive('Long')), 11);
    assert.equal(TypeSystem.conversionCost(primitive('Int'), primitive('Long', true)), 12);
    assert.equal(TypeSystem.conversionCost(primitive('Byte'), primitive('Double')), 15);
    assert.equal(TypeSystem.conversionCost(primitive('Char'), primitive('Int')), 11);
  });

  it('不允许收窄转换与丢弃可空性', () => {
    assert.equal(TypeSystem.conversionCost(primitive('Long'), primitive('Int')), null);
    assert.equal(TypeSystem.conversionCost(primitive('Char'), primitive('Short')), null);
    assert.equal(TypeSystem.conversionCost(primitive('Int', true), primitive('Int')), null);
    assert.equal(TypeSystem.conversionCost(TypeSystem.NULL, primitive('Int')), null);
    assert.equal(TypeSystem.conversionCost(TypeSystem.NULL, primitive('String', true)), COST.NULLABLE_WRAP);
  });

  it('区分可空性失败与类型不匹配', () => {
    assert.equal(TypeSystem.failsOnlyOnNullability(primitive('Int', true), primitive('Int')), true);
    assert.equal(TypeSystem.failsOnlyOnNullability(TypeSystem.NULL, primitive('Int')), true);
    assert.equal(TypeSystem.failsOnlyOnNullability(primitive('String'), primitive('Int')), false);
    assert.equal(TypeSystem.failsOnlyOnNullability(primitive('Int'), primitive('Long')), false);
  });

  it('显式转换允许数值互转与可空性收窄', () => {
    assert.equal(TypeSystem.canExplicitlyCast(primitive('Double'), primitive('Int')), true);
    assert.equal(TypeSystem.canExplicitlyCast(primitive('Int', true), primitive('Int')), true);
    assert.equal(TypeSystem.canExplicitlyCast(primitive('Bool'), primitive('Int')), false);
  });

  it('数值运算结果不低于 Int', () => {
    assert.deepEqual(TypeSystem.numericResult(primitive('Byte'), primitive('Short')), primitive('Int'));
    assert.deepEqual(TypeSystem.numericResult(primitive('Int'), primitive('Float')), primitive('Float'));
    assert.deepEqual(TypeSystem.numericResult(primitive('Long'), primitive('Char')), primitive('Long'));
    assert.equal(TypeSystem.numericResult(primitive('Bool'), primitive('Int')), null);
  });

  it('分支类型取最小公共类型', () => {
    assert.deepEqual(TypeSystem.join(TypeSystem.NULL, primitive('Int')), primitive('Int', true));
    assert.deepEqual(TypeSystem.join(primitive('Int'), primitive('Long')), primitive('Long'));
    assert.equal(TypeSystem.join(primitive('Int'), primitive('String')), null);
    assert.equal(TypeSystem.join(TypeSystem.NULL, TypeSystem.VOID), null);
  });

  it('类型格式化', () => {
    assert.equal(TypeSystem.format(TypeSystem.array(primitive('Int', true), true)), 'Int?[]?');
    assert.equal(TypeSystem.format(TypeSystem.fn([primitive('Int'), primitive('String')], primitive('Bool'))), '(Int, String) -> Bool');
    assert.equal(TypeSystem.format(TypeSystem.fn([primitive('Int')], primitive('Int'), true)), '((Int) -> Int)?');
    assert.equal(TypeSystem.format(TypeSystem.NULL), 'null');
  });
});
