import { ErrorCode } from '../diagnostics/error_codes.js';
import type { Call, Expression, FieldDecl, ForRange, FunctionDecl, Lambda, Parameter, SourceFile, Span, VarDecl } from '../types.js';
import { DiagnosticCollector } from './diagnostics.js';
import { genericObjects } from './generics.js';
import {
  createBindings,
  type Bindings,
  type ClassInfo,
  type InstantiationRequest,
  type LambdaInfo,
  type LocalOrigin,
  type LocalSymbol,
  type MethodInfo,
  type ProgramModel,
  type RequestScope,
} from './model.js';
import { SymbolResolver, type LookupEnv } from './resolver.js';
import { DuplicateLocalError, LocalScopes } from './scope.js';
import { TypeSystem, type Type } from './type_system.js';

// 绑定上下文：集中管理文件级侧表、当前函数帧与局部变量的定义。

export type FrameOwner = FunctionDecl | Lambda | FieldDecl;

/**
 * 一个函数体（方法、构造函数、lambda 或字段初始化器）的绑定状态。
 * lambda 帧与外层帧共享作用域栈，以便查找被捕获的变量。
 */
export interface FunctionFrame {
  readonly owner: FrameOwner;
  /** 所在方法，决定泛型环境与实例化请求的归属 */
  readonly method: MethodInfo | null;
  readonly classInfo: ClassInfo | null;
  readonly isStatic: boolean;
  readonly isConstructor: boolean;
  /** 为 null 表示从 return 语句推断（未标注返回类型的 lambda） */
  readonly returnType: Type | null;
  readonly inferredReturns: Type[];
  readonly scopes: LocalScopes;
  readonly locals: LocalSymbol[];
  readonly thisLocal: LocalSymbol | null;
  readonly lambda: LambdaInfo | null;
  readonly env: LookupEnv;
  readonly parent: FunctionFrame | null;
}

export interface BinderContextOptions {
  readonly program: ProgramModel;
  readonly file: SourceFile;
  readonly features: ReadonlySet<string>;
  /** 文件在编译顺序中的下标，用于生成全程序唯一的 mock 类名 */
  readonly fileIndex: number;
}

export class BinderContext {
  readonly program: ProgramModel;
  readonly file: SourceFile;
  readonly features: ReadonlySet<string>;
  readonly fileIndex: number;
  readonly bindings: Bindings = createBindings();
  readonly diagnostics: DiagnosticCollector;
  readonly resolver: SymbolResolver;
  readonly requests: Array<{ readonly scope: RequestScope; readonly request: InstantiationRequest }> = [];
  readonly mockClasses: ClassInfo[] = [];
  readonly tests: MethodInfo[] = [];
  /** 当前构造函数体中允许出现的 `super(...)` 调用（首条语句） */
  superCall: Call | null = null;

  private frameStack: FunctionFrame | null = null;
  private readonly requestKeys = new Set<string>();
  private nextLocalId = 0;
  private nextLambdaId = 0;
  private nextMockId = 0;

  constructor(options: BinderContextOptions) {
    this.program = options.program;
    this.file = options.file;
    this.features = options.features;
    this.fileIndex = options.fileIndex;
    this.diagnostics = new DiagnosticCollector(options.file.path);
    this.resolver = new SymbolResolver(options.program, this.diagnostics, options.features);
  }

  get frame(): FunctionFrame {
    if (!this.frameStack) throw new Error('No active function frame');
    return this.frameStack;
  }

  get scopes(): LocalScopes {
    return this.frame.scopes;
  }

  get env(): LookupEnv {
    return this.frame.env;
  }

  /**
   * 在新的函数帧中执行 `body`；lambda 帧共享外层作用域栈。
   */
  withFrame<T>(
    init: Omit<FunctionFrame, 'scopes' | 'locals' | 'inferredReturns' | 'parent' | 'thisLocal'> & {
      readonly shareScopes: boolean;
      readonly thisType: Type | null;
    },
    body: (frame: FunctionFrame) => T
  ): T {
    const parent = this.frameStack;
    const scopes = init.shareScopes && parent ? parent.scopes : new LocalScopes();
    const locals: LocalSymbol[] = [];
    this.bindings.functionLocals.set(init.owner, locals);
    const thisLocal: LocalSymbol | null = init.thisType
      ? {
          kind: 'local',
          id: this.nextLocalId++,
          name: 'this',
          type: init.thisType,
          mutable: false,
          origin: 'this',
          owner: init.owner,
          captured: false,
        }
      : null;
    if (thisLocal) {
      locals.push(thisLocal);
      this.bindings.thisLocals.set(init.owner, thisLocal);
      scopes.define(thisLocal);
    }
    const frame: FunctionFrame = {
      owner: init.owner,
      method: init.method,
      classInfo: init.classInfo,
      isStatic: init.isStatic,
      isConstructor: init.isConstructor,
      returnType: init.returnType,
      inferredReturns: [],
      scopes,
      locals,
      thisLocal,
      lambda: init.lambda,
      env: init.env,
      parent,
    };
    this.frameStack = frame;
    try {
      return body(frame);
    } finally {
      this.frameStack = parent;
    }
  }

  newLocal(name: string, type: Type, mutable: boolean, origin: LocalOrigin): LocalSymbol {
    const local: LocalSymbol = {
      kind: 'local',
      id: this.nextLocalId++,
      name,
      type,
      mutable,
      origin,
      owner: this.frame.owner,
      captured: false,
    };
    this.frame.locals.push(local);
    return local;
  }

  /**
   * 定义局部变量；同一作用域内重名报告 B010 并不再定义。
   */
  defineLocal(name: string, type: Type, mutable: boolean, origin: VarDecl | Parameter | ForRange, span: Span): LocalSymbol {
    const local = this.newLocal(name, type, mutable, origin);
    this.bindings.declarations.set(origin, local);
    try {
      this.scopes.define(local);
    } catch (error) {
      if (!(error instanceof DuplicateLocalError)) throw error;
      this.diagnostics.error(ErrorCode.DUPLICATE_DECLARATION, span, { name });
    }
    return local;
  }

  nextLambda(): number {
    return this.nextLambdaId++;
  }

  nextMock(): number {
    return this.nextMockId++;
  }

  /** 实例化请求的归属；lambda 归属于外层函数体 */
  requestScope(): RequestScope {
    for (let frame = this.frameStack; frame; frame = frame.lambda ? frame.parent : null) {
      if (frame.method) return frame.method;
      if (frame.classInfo && frame.owner.kind === 'Field' && !frame.isStatic) return frame.classInfo;
    }
    return null;
  }

  private addRequest(request: InstantiationRequest, key: string): void {
    const scope = this.requestScope();
    const scoped = `${scope ? (scope.kind === 'method' ? scope.typeParamOwner : scope.qualifiedName) : ''}|${key}`;
    if (this.requestKeys.has(scoped)) return;
    this.requestKeys.add(scoped);
    this.requests.push({ scope, request });
  }

  /** 记录类型中出现的泛型实例 */
  requestType(type: Type): void {
    if (TypeSystem.containsError(type)) return;
    for (const obj of genericObjects(type)) this.addRequest({ kind: 'type', type: obj }, `T:${TypeSystem.key(obj)}`);
  }

  requestMethod(method: MethodInfo, ownerArgs: readonly Type[], methodArgs: readonly Type[]): void {
    if ([...ownerArgs, ...methodArgs].some(t => TypeSystem.containsError(t))) return;
    const fmt = (types: readonly Type[]): string => types.map(t => TypeSystem.key(t)).join(',');
    this.addRequest(
      { kind: 'method', method, ownerArgs, methodArgs },
      `M:${method.typeParamOwner}<${fmt(ownerArgs)}><${fmt(methodArgs)}>`
    );
  }

  setType(expr: Expression, type: Type): Type {
    this.bindings.types.set(expr, type);
    this.requestType(type);
    return type;
  }

  typeOf(expr: Expression): Type {
    return this.bindings.types.get(expr) ?? TypeSystem.ERROR;
  }
}
