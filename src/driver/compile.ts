/**
 * @module driver/compile
 *
 * 编译驱动：按屏障流水线调度各阶段。
 *
 * 1. 词法与语法分析（逐文件并行）
 * 2. 特性过滤与符号表构建（单线程屏障）
 * 3. 声明模型（单线程屏障）
 * 4. 函数体绑定（逐文件并行，共享只读声明模型）
 * 5. 泛型实例闭包与 C 代码生成（仅在全程序无错误时进行）
 *
 * 某个文件的错误不会中止其他文件的处理，所有诊断汇总后一起返回。
 */

import pLimit from 'p-limit';
import { bindFile, buildProgramModel, InstantiationRegistry, type BoundFile, type ProgramModel } from '../binder/index.js';
import { generateC, type GeneratedUnit } from '../c/index.js';
import { ConfigService } from '../config/config-service.js';
import { Diagnostics, dummySpan, hasErrors, InternalCompilerError, sortDiagnostics, type Diagnostic } from '../diagnostics/diagnostics.js';
import { parseSource } from '../parser.js';
import { buildSymbolTable, filterFeatures } from '../symbols/index.js';
import type { SourceFile, SourceRole } from '../types.js';
import { createLogger, logPerformance } from '../utils/logger.js';
import { loadPrelude, PRELUDE_PATH } from './runtime.js';

const logger = createLogger('driver');

/** 测试根目录名：路径中含有该目录段的文件默认为测试文件 */
export const TEST_ROOT = 'tests';

export interface SourceInput {
  readonly path: string;
  readonly source: string;
  /** 默认按路径推断：位于 `tests/` 目录下为 `test` */
  readonly role?: SourceRole;
  /** 该单元启用的特性；未给出时使用 {@link CompileOptions.features} */
  readonly features?: readonly string[];
}

export interface CompileOptions {
  /** 并行 worker 数量，默认取 ConfigService.workers */
  readonly workers?: number;
  /** 未单独指定特性的单元使用的特性集合，默认取 ConfigService.defaultFeatures */
  readonly features?: readonly string[];
  /** 生成 `aml_tests.c` */
  readonly emitTestRunner?: boolean;
  /** 是否编译预置命名空间 `System`，默认 true */
  readonly prelude?: boolean;
}

export interface CompileResult {
  /** 无任何错误且生成了全部单元 */
  readonly success: boolean;
  readonly diagnostics: Diagnostic[];
  readonly units: GeneratedUnit[];
  /** 已绑定的文件（只读），供下游工具使用；前端出错时同样返回 */
  readonly bound: BoundFile[];
  readonly program: ProgramModel;
}

interface ParsedUnit {
  readonly ast: SourceFile;
  readonly features: ReadonlySet<string>;
}

export function inferRole(path: string): SourceRole {
  return path.split(/[\\/]/).includes(TEST_ROOT) ? 'test' : 'source';
}

function timed<T>(operation: string, metadata: Record<string, unknown>, run: () => T): T {
  const startTime = performance.now();
  const result = run();
  logPerformance({ component: 'driver', operation, duration: performance.now() - startTime, metadata });
  return result;
}

async function timedAsync<T>(operation: string, metadata: Record<string, unknown>, run: () => Promise<T>): Promise<T> {
  const startTime = performance.now();
  const result = await run();
  logPerformance({ component: 'driver', operation, duration: performance.now() - startTime, metadata });
  return result;
}

function internalDiagnostic(error: InternalCompilerError, file: string | null): Diagnostic {
  return Diagnostics.internal(error.message, error.span ?? dummySpan(), file ?? '<codegen>').build();
}

/**
 * 编译一组源文件为 C 翻译单元。
 *
 * @example
 * ```typescript
 * const result = await compile([{ path: 'src/app.aml', source }], { workers: 2 });
 * if (!result.success) console.error(result.diagnostics.map(d => formatDiagnostic(d)).join('\n'));
 * ```
 */
export async function compile(inputs: readonly SourceInput[], options: CompileOptions = {}): Promise<CompileResult> {
  const config = ConfigService.getInstance();
  const workers = options.workers ?? config.workers;
  if (!Number.isInteger(workers) || workers < 1) {
    throw new Error(`workers must be a positive integer, got ${workers}`);
  }
  const defaultFeatures = options.features ?? config.defaultFeatures;
  const limit = pLimit(workers);
  const startTime = performance.now();

  const sources: SourceInput[] = [];
  if (options.prelude ?? true) sources.push({ path: PRELUDE_PATH, source: loadPrelude(), role: 'source', features: [] });
  sources.push(...inputs);
  logger.info('Compilation started', { files: inputs.length, workers, emitTestRunner: options.emitTestRunner ?? false });

  // 阶段 1：逐文件解析，互不共享可变状态
  const parsed = await timedAsync('Parse', { files: sources.length }, () =>
    Promise.all(
      sources.map(input =>
        limit(async () => {
          const role = input.role ?? inferRole(input.path);
          const { ast, diagnostics } = parseSource(input.source, { file: input.path, role });
          const features = new Set(input.features ?? defaultFeatures);
          return { unit: { ast: filterFeatures(ast, features), features }, diagnostics };
        })
      )
    )
  );
  const diagnostics: Diagnostic[] = parsed.flatMap(p => p.diagnostics);
  const units: ParsedUnit[] = parsed.map(p => p.unit);

  // 阶段 2、3：全程序屏障
  const symbols = timed('Symbol table', { files: units.length }, () => buildSymbolTable(units.map(u => u.ast)));
  diagnostics.push(...symbols.diagnostics);
  const model = timed('Program model', {}, () => buildProgramModel(symbols.table));
  diagnostics.push(...model.diagnostics);
  const program = model.model;

  // 阶段 4：并行绑定，声明模型只读
  const bound = await timedAsync('Bind', { files: units.length }, () =>
    Promise.all(
      units.map((unit, fileIndex) =>
        limit(async () => bindFile({ program, file: unit.ast, features: unit.features, fileIndex }))
      )
    )
  );
  for (const file of bound) diagnostics.push(...file.diagnostics);

  const finish = (result: Omit<CompileResult, 'diagnostics'>, all: Diagnostic[]): CompileResult => {
    const sorted = sortDiagnostics(all);
    logPerformance({
      component: 'driver',
      operation: 'Compilation',
      duration: performance.now() - startTime,
      metadata: { files: inputs.length, units: result.units.length, diagnostics: sorted.length, success: result.success },
    });
    return { ...result, diagnostics: sorted };
  };

  if (hasErrors(diagnostics)) {
    logger.info('Compilation stopped before code generation', { diagnostics: diagnostics.length });
    return finish({ success: false, units: [], bound, program }, diagnostics);
  }

  // 阶段 5：实例闭包与代码生成，只读已绑定的树
  let registry: InstantiationRegistry;
  try {
    registry = timed('Instantiation closure', {}, () => InstantiationRegistry.close(program, bound));
  } catch (error) {
    if (!(error instanceof InternalCompilerError)) throw error;
    logger.error('Instantiation closure failed', error);
    diagnostics.push(internalDiagnostic(error, null));
    return finish({ success: false, units: [], bound, program }, diagnostics);
  }
  const generated = generateC({ program, files: bound, registry }, { emitTestRunner: options.emitTestRunner ?? false });
  for (const failure of generated.failures) diagnostics.push(internalDiagnostic(failure.error, failure.file));

  const success = generated.failures.length === 0;
  logger.info('Compilation finished', { units: generated.units.length, success });
  return finish({ success, units: generated.units, bound, program }, diagnostics);
}
