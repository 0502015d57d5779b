import { ErrorCode } from '../diagnostics/error_codes.js';
import type { ClassDecl, FieldDecl, SourceFile, TopLevelDecl } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { bindClassBody, bindFieldInit, bindMethod } from './bodies.js';
import { BinderContext } from './context.js';
import { rootEnv } from './declarations.js';
import type { BoundFile, ClassInfo, FieldInfo, ProgramModel } from './model.js';

const logger = createLogger('binder');

export interface BindFileOptions {
  readonly program: ProgramModel;
  readonly file: SourceFile;
  /** 该编译单元启用的特性 */
  readonly features: ReadonlySet<string>;
  readonly fileIndex: number;
}

/**
 * 绑定单个文件中的全部函数体与初始化器。
 *
 * 声明模型只读，逐文件的结果互不依赖，因此多个文件可以并行绑定。
 */
export function bindFile(options: BindFileOptions): BoundFile {
  const { program, file } = options;
  const ctx = new BinderContext(options);
  const classes = new Map<ClassDecl, ClassInfo>();
  for (const info of program.classes) if (info.file === file.path) classes.set(info.decl, info);
  const globals = new Map<FieldDecl, FieldInfo>();
  for (const field of program.globalOrder) if (field.file === file.path) globals.set(field.decl, field);

  const visit = (decls: readonly TopLevelDecl[], namespace: readonly string[]): void => {
    const env = rootEnv(file.path, namespace.join('.'));
    for (const decl of decls) {
      switch (decl.kind) {
        case 'Namespace':
          visit(decl.decls, [...namespace, ...decl.path]);
          break;
        case 'Class': {
          const info = classes.get(decl);
          if (info) bindClassBody(ctx, info, env);
          break;
        }
        case 'Interface':
          break;
        case 'Function': {
          const method = program.methodsByDecl.get(decl);
          if (!method) break;
          if (method.isTest) {
            if (file.role === 'test') ctx.tests.push(method);
            else ctx.diagnostics.error(ErrorCode.INVALID_TEST_LOCATION, decl.span, { name: method.qualifiedName });
          }
          bindMethod(ctx, method, null, env);
          break;
        }
        case 'Field': {
          const field = globals.get(decl);
          if (field) bindFieldInit(ctx, field, env);
          break;
        }
      }
    }
  };
  visit(file.decls, []);

  const diagnostics = ctx.diagnostics.getDiagnostics();
  logger.debug('File bound', {
    file: file.path,
    expressions: ctx.bindings.types.size,
    mocks: ctx.mockClasses.length,
    tests: ctx.tests.length,
    diagnostics: diagnostics.length,
  });
  return {
    file,
    features: options.features,
    bindings: ctx.bindings,
    diagnostics,
    mockClasses: ctx.mockClasses,
    tests: ctx.tests,
    requests: ctx.requests,
  };
}
