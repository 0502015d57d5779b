/**
 * @module c
 *
 * C 代码生成：输入为无错误的已绑定程序与泛型实例闭包，输出一组 C 文件。
 * 遇到错误类型或未解析的节点属于编译器缺陷，对应单元放弃生成并记入 `failures`。
 */

import { createLogger, logPerformance } from '../utils/logger.js';
import type { CodegenInput } from './context.js';
import { ProgramEmitter, type CodegenOptions, type CodegenResult } from './emitter.js';

const logger = createLogger('codegen');

export function generateC(input: CodegenInput, options: CodegenOptions = { emitTestRunner: false }): CodegenResult {
  const startTime = performance.now();
  const result = new ProgramEmitter(input, options).generate();
  const metadata = {
    units: result.units.length,
    failures: result.failures.length,
    classes: input.registry.classes.size,
    functions: input.registry.functions.size,
  };
  logPerformance({ component: 'codegen', operation: 'C generation', duration: performance.now() - startTime, metadata });
  for (const failure of result.failures) {
    logger.error('Code generation aborted for unit', failure.error, { unit: failure.unit, file: failure.file });
  }
  logger.info('C units generated', metadata);
  return result;
}

export { CodegenContext, type CodegenInput, type Signature } from './context.js';
export { HEADER_NAME, type CodegenFailure, type CodegenOptions, type CodegenResult } from './emitter.js';
export type { GeneratedUnit } from './unit.js';
export { cString, cType, utf16Units } from './ctypes.js';
export { escapeIdent, mangleQualified, structName, typeCode } from './names.js';
