#!/usr/bin/env node
import fs from 'node:fs';
import * as path from 'node:path';
import { cac } from 'cac';
import { compile, formatDiagnostic, lex, parseSource, runtimeSources, type Diagnostic, type SourceInput } from '../src/index.js';

function readFileStrict(file: string): string {
  return fs.readFileSync(file, 'utf8');
}

function splitList(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function printDiagnostics(diagnostics: readonly Diagnostic[], sources: ReadonlyMap<string, string>): void {
  for (const diag of diagnostics) console.error(formatDiagnostic(diag, sources.get(diag.file)));
}

interface CompileCommandOptions {
  out: string;
  features?: string;
  workers?: string;
  tests?: boolean;
  runtime?: boolean;
}

async function cmdCompile(files: string[], options: CompileCommandOptions): Promise<void> {
  const inputs: SourceInput[] = files.map(file => {
    const features = splitList(options.features);
    return { path: file, source: readFileStrict(file), ...(features ? { features } : {}) };
  });
  const sources = new Map(inputs.map(input => [input.path, input.source]));
  const workers = options.workers === undefined ? undefined : Number.parseInt(options.workers, 10);
  const result = await compile(inputs, {
    ...(workers === undefined ? {} : { workers }),
    emitTestRunner: Boolean(options.tests),
  });
  printDiagnostics(result.diagnostics, sources);
  if (!result.success) {
    console.error(`${result.diagnostics.length} diagnostic(s); no C output written`);
    process.exitCode = 1;
    return;
  }
  fs.mkdirSync(options.out, { recursive: true });
  const units = options.runtime === false ? result.units : [...result.units, ...runtimeSources()];
  for (const unit of units) fs.writeFileSync(path.join(options.out, unit.name), unit.content);
  console.log(`Wrote ${units.length} file(s) to ${options.out}`);
}

function cmdTokens(file: string): void {
  const tokens = lex(readFileStrict(file), { file });
  console.log(JSON.stringify(tokens, null, 2));
}

function cmdParse(file: string): void {
  const source = readFileStrict(file);
  const { ast, diagnostics } = parseSource(source, { file });
  printDiagnostics(diagnostics, new Map([[file, source]]));
  console.log(JSON.stringify(ast, null, 2));
  if (diagnostics.length > 0) process.exitCode = 1;
}

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => void | Promise<void>): (...args: Args) => Promise<void> {
  return async (...args: Args) => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 2;
    }
  };
}

function main(): void {
  const cli = cac('amc');

  cli
    .command('compile <...files>', '编译 .aml 文件为 C（默认输出到 build/c）')
    .option('--out <dir>', '输出目录', { default: 'build/c' })
    .option('--features <list>', '启用的特性，逗号分隔')
    .option('--workers <n>', '并行 worker 数量')
    .option('--tests', '生成测试入口 aml_tests.c', { default: false })
    .option('--no-runtime', '不复制 C 运行时文件')
    .action(wrapAction((files: string[], options: CompileCommandOptions) => cmdCompile(files, options)));

  cli.command('tokens <file>', '输出词法标记(JSON)').action(wrapAction((file: string) => cmdTokens(file)));

  cli.command('parse <file>', '解析 .aml 文件为 AST(JSON)').action(wrapAction((file: string) => cmdParse(file)));

  cli.help();
  cli.parse();
}

main();
