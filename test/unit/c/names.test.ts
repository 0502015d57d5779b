import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { TypeSystem } from '../../../src/binder/type_system.js';
import { cString, cType, floatLiteral, functionHeader, intLiteral, longLiteral } from '../../../src/c/ctypes.js';
import { escapeIdent, mangleQualified, typeCode, unitFileName } from '../../../src/c/names.js';
import { InternalCompilerError } from '../../../src/diagnostics/diagnostics.js';

describe('C 名称改编', () => {
  it('转义下划线与 $', () => {
    assert.equal(escapeIdent('a_b$c'), 'a_1b_2c');
    assert.equal(mangleQualified('app.my_ns.Box'), 'app_my_1ns_Box');
  });

  it('类型改编码区分可空、数组与函数类型', () => {
    assert.equal(typeCode(TypeSystem.primitive('Int', true)), 'Int_6');
    assert.equal(typeCode(TypeSystem.array(TypeSystem.primitive('Int', true))), '_7Int_6');
    assert.equal(
      typeCode(TypeSystem.fn([TypeSystem.primitive('Int'), TypeSystem.primitive('Bool')], TypeSystem.STRING)),
      '_8Int_5Bool_9String_4'
    );
  });

  it('泛型形参到达代码生成属于内部错误', () => {
    assert.throws(() => typeCode(TypeSystem.param('T', 'app.Box')), InternalCompilerError);
  });

  it('单元文件名取源文件名主干', () => {
    assert.equal(unitFileName(1, 'src/dir/my-app.aml'), 'am_unit_1_my_app.c');
    assert.equal(unitFileName(2, 'src\\win.aml'), 'am_unit_2_win.c');
  });
});

describe('C 类型与字面量', () => {
  it('原始类型映射到定宽整数', () => {
    assert.equal(cType(TypeSystem.primitive('Byte')), 'int8_t');
    assert.equal(cType(TypeSystem.primitive('Char')), 'uint16_t');
    assert.equal(cType(TypeSystem.primitive('Long', true)), 'aml_n_Long');
    assert.equal(cType(TypeSystem.STRING), 'aml_object *');
    assert.equal(cType(TypeSystem.array(TypeSystem.INT)), 'aml_object *');
  });

  it('函数头在指针返回类型后不加空格', () => {
    assert.equal(functionHeader(TypeSystem.STRING, 'am_app_f', ['int32_t l_x_0']), 'aml_object *am_app_f(int32_t l_x_0)');
    assert.equal(functionHeader(TypeSystem.VOID, 'am_app_g', []), 'void am_app_g(void)');
  });

  it('整数字面量避开 C 的最小值陷阱', () => {
    assert.equal(intLiteral(-2147483648, 'Int'), '((int32_t)(-2147483647 - 1))');
    assert.equal(intLiteral(-5, 'Int'), '((int32_t)-5)');
    assert.equal(intLiteral(42, 'Int'), '42');
    assert.equal(intLiteral(7, 'Byte'), '((int8_t)7)');
    assert.equal(longLiteral(-(2n ** 63n)), '(-INT64_C(9223372036854775807) - 1)');
    assert.equal(longLiteral(42n), 'INT64_C(42)');
  });

  it('浮点字面量保留小数点与精度后缀', () => {
    assert.equal(floatLiteral(1, 'double'), '1.0');
    assert.equal(floatLiteral(1.5, 'float'), '1.5f');
    assert.equal(floatLiteral(1e21, 'double'), '1e+21');
    assert.equal(floatLiteral(Infinity, 'float'), '((float)HUGE_VAL)');
    assert.equal(floatLiteral(-Infinity, 'double'), '-HUGE_VAL');
  });

  it('C 字符串转义引号、反斜杠与非 ASCII 字节', () => {
    assert.equal(cString('app.t'), '"app.t"');
    assert.equal(cString('a"b\\?é'), '"a\\"b\\\\\\077\\303\\251"');
  });
});
