/**
 * @module driver
 *
 * 编译驱动与运行时文件定位。
 */

export { compile, inferRole, TEST_ROOT, type CompileOptions, type CompileResult, type SourceInput } from './compile.js';
export { loadPrelude, runtimeDirectory, runtimeSources, PRELUDE_PATH, RUNTIME_FILES } from './runtime.js';
