import type { ClassInfo, LambdaInfo, LocalSymbol } from './model.js';
import type { Type } from './type_system.js';

export type ScopeType = 'function' | 'lambda' | 'block' | 'loop' | 'scope';

export class DuplicateLocalError extends Error {
  readonly local: LocalSymbol;

  constructor(local: LocalSymbol) {
    super(`Duplicate local '${local.name}' declared in the same scope`);
    this.local = local;
  }
}

/**
 * 词法作用域。除局部变量外，还承载流敏感的可空性收窄与 mock 覆盖层，
 * 两者都随作用域退出自动失效。
 */
class Scope {
  private readonly locals = new Map<string, LocalSymbol>();
  private readonly narrowings = new Map<LocalSymbol, Type>();
  private readonly mocks = new Map<ClassInfo, ClassInfo>();
  readonly declared: LocalSymbol[] = [];

  constructor(
    readonly parent: Scope | null,
    readonly type: ScopeType,
    readonly lambda: LambdaInfo | null = null
  ) {}

  define(local: LocalSymbol): void {
    if (this.locals.has(local.name)) throw new DuplicateLocalError(local);
    this.locals.set(local.name, local);
    this.declared.push(local);
  }

  lookupLocal(name: string): LocalSymbol | undefined {
    return this.locals.get(name);
  }

  narrowing(local: LocalSymbol): Type | undefined {
    return this.narrowings.get(local);
  }

  setNarrowing(local: LocalSymbol, type: Type): void {
    this.narrowings.set(local, type);
  }

  clearNarrowing(local: LocalSymbol): void {
    this.narrowings.delete(local);
  }

  mockFor(target: ClassInfo): ClassInfo | undefined {
    return this.mocks.get(target);
  }

  addMock(target: ClassInfo, mock: ClassInfo): void {
    this.mocks.set(target, mock);
  }
}

export interface LocalLookup {
  readonly local: LocalSymbol;
  /** 查找过程中跨越的 lambda（由内向外），这些 lambda 需要捕获该变量 */
  readonly crossed: readonly LambdaInfo[];
}

/**
 * 函数体内的作用域栈。
 */
export class LocalScopes {
  private current: Scope;

  constructor() {
    this.current = new Scope(null, 'function');
  }

  enter(type: ScopeType, lambda: LambdaInfo | null = null): void {
    this.current = new Scope(this.current, type, lambda);
  }

  /** 退出当前作用域，返回其中声明的局部变量（按声明顺序） */
  exit(): LocalSymbol[] {
    const parent = this.current.parent;
    if (!parent) throw new Error('Cannot exit root scope');
    const declared = this.current.declared;
    this.current = parent;
    return declared;
  }

  define(local: LocalSymbol): void {
    this.current.define(local);
  }

  lookup(name: string): LocalLookup | undefined {
    const crossed: LambdaInfo[] = [];
    for (let scope: Scope | null = this.current; scope; scope = scope.parent) {
      const local = scope.lookupLocal(name);
      if (local) return { local, crossed };
      if (scope.lambda) crossed.push(scope.lambda);
    }
    return undefined;
  }

  /** 局部变量在当前位置的类型（考虑收窄） */
  typeOf(local: LocalSymbol): Type {
    for (let scope: Scope | null = this.current; scope; scope = scope.parent) {
      const narrowed = scope.narrowing(local);
      if (narrowed) return narrowed;
      if (scope.lookupLocal(local.name) === local) break;
    }
    return local.type;
  }

  narrow(local: LocalSymbol, type: Type): void {
    this.current.setNarrowing(local, type);
  }

  /**
   * 取消变量在所有外层作用域中的收窄，并在当前作用域固定为声明类型。
   */
  invalidate(local: LocalSymbol): void {
    for (let scope: Scope | null = this.current; scope; scope = scope.parent) {
      scope.clearNarrowing(local);
      if (scope.lookupLocal(local.name) === local) break;
    }
    this.current.setNarrowing(local, local.type);
  }

  mockFor(target: ClassInfo): ClassInfo | undefined {
    for (let scope: Scope | null = this.current; scope; scope = scope.parent) {
      const mock = scope.mockFor(target);
      if (mock) return mock;
    }
    return undefined;
  }

  addMock(target: ClassInfo, mock: ClassInfo): void {
    this.current.addMock(target, mock);
  }

  /** 当前位置是否处于循环体内（不跨越 lambda 边界） */
  insideLoop(): boolean {
    for (let scope: Scope | null = this.current; scope; scope = scope.parent) {
      if (scope.type === 'loop') return true;
      if (scope.type === 'lambda' || scope.type === 'function') return false;
    }
    return false;
  }

  currentLambda(): LambdaInfo | null {
    for (let scope: Scope | null = this.current; scope; scope = scope.parent) {
      if (scope.lambda) return scope.lambda;
    }
    return null;
  }
}
