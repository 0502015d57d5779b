/**
 * @module binder/model
 *
 * 绑定阶段的声明模型（类、接口、方法、字段）与逐文件的绑定结果。
 *
 * 绑定结果以“侧表”的形式挂在语法树节点上（以节点身份为键），
 * 不修改语法树本身。代码生成只读取这些表。
 */

import type { Diagnostic } from '../diagnostics/diagnostics.js';
import type { ClassSymbol, FunctionGroupSymbol, GlobalSymbol, InterfaceSymbol, SymbolTable, TypeSymbol } from '../symbols/symbols.js';
import type {
  Assign,
  Binary,
  Block,
  Call,
  Cast,
  ClassDecl,
  Directive,
  Expression,
  FieldDecl,
  ForRange,
  FunctionDecl,
  InterfaceDecl,
  Lambda,
  Member,
  MockDecl,
  Name,
  New,
  Parameter,
  SourceFile,
  Switch,
  TypeCheck,
  VarDecl,
} from '../types.js';
import type { FunctionType, ObjectType, Type } from './type_system.js';

// ============================================================
// 声明模型
// ============================================================

export interface FieldInfo {
  readonly kind: 'field';
  readonly name: string;
  type: Type;
  readonly decl: FieldDecl;
  /** 为 null 表示命名空间级全局变量 */
  readonly owner: ClassInfo | null;
  readonly namespace: string;
  readonly qualifiedName: string;
  readonly isStatic: boolean;
  readonly mutable: boolean;
  readonly file: string;
  readonly directives: readonly Directive[];
}

export interface MethodInfo {
  readonly kind: 'method';
  readonly name: string;
  readonly decl: FunctionDecl;
  /** 为 null 表示命名空间级函数 */
  readonly owner: TypeInfo | null;
  readonly namespace: string;
  readonly qualifiedName: string;
  readonly file: string;
  readonly typeParams: readonly string[];
  /** 方法级泛型形参的归属键 */
  readonly typeParamOwner: string;
  params: readonly Type[];
  ret: Type;
  readonly isStatic: boolean;
  readonly isNative: boolean;
  readonly isSuspend: boolean;
  readonly isConstructor: boolean;
  readonly isTest: boolean;
  /** 虚表槽位；静态方法、构造函数、泛型方法与接口方法为 null */
  slot: number | null;
  /** 被覆盖的父类方法 */
  overrides: MethodInfo | null;
  readonly directives: readonly Directive[];
}

export interface ClassInfo {
  readonly kind: 'class';
  readonly name: string;
  readonly qualifiedName: string;
  readonly namespace: string;
  readonly file: string;
  readonly decl: ClassDecl;
  readonly symbol: ClassSymbol | null;
  readonly typeParams: readonly string[];
  superclass: ObjectType | null;
  interfaces: ObjectType[];
  /** 自身声明的实例字段（不含继承字段） */
  readonly fields: FieldInfo[];
  readonly staticFields: FieldInfo[];
  /** 自身声明的方法（含静态方法），按名分组、保持声明顺序 */
  readonly methods: Map<string, MethodInfo[]>;
  readonly constructors: MethodInfo[];
  /** 槽位 → 最终实现（含继承而来的实现） */
  vtable: MethodInfo[];
  /** mock 类所替换的原始类 */
  readonly mockOf: ClassInfo | null;
  readonly directives: readonly Directive[];
}

export interface InterfaceInfo {
  readonly kind: 'interface';
  readonly name: string;
  readonly qualifiedName: string;
  readonly namespace: string;
  readonly file: string;
  readonly decl: InterfaceDecl;
  readonly symbol: InterfaceSymbol;
  readonly typeParams: readonly string[];
  supers: ObjectType[];
  /** 自身声明的方法，顺序即分派结构中的顺序 */
  readonly methods: MethodInfo[];
  readonly directives: readonly Directive[];
}

export type TypeInfo = ClassInfo | InterfaceInfo;

/**
 * 全程序声明模型：由符号表派生，在并行绑定前构建完毕，之后只读。
 */
export interface ProgramModel {
  readonly table: SymbolTable;
  readonly types: Map<TypeSymbol, TypeInfo>;
  readonly functions: Map<FunctionGroupSymbol, MethodInfo[]>;
  readonly globals: Map<GlobalSymbol, FieldInfo>;
  readonly methodsByDecl: Map<FunctionDecl, MethodInfo>;
  /** 声明顺序 */
  readonly classes: ClassInfo[];
  readonly interfaces: InterfaceInfo[];
  readonly globalOrder: FieldInfo[];
  /** 预置命名空间中的 Exception 类，数组越界与转换失败时抛出 */
  exceptionClass: ClassInfo | null;
}

// ============================================================
// 局部变量与闭包
// ============================================================

export type LocalOrigin = VarDecl | Parameter | ForRange | 'this';

export interface LocalSymbol {
  readonly kind: 'local';
  readonly id: number;
  readonly name: string;
  readonly type: Type;
  readonly mutable: boolean;
  readonly origin: LocalOrigin;
  /** 声明所在的函数或 lambda */
  readonly owner: FunctionDecl | Lambda | FieldDecl;
  /** 被某个 lambda 捕获 */
  captured: boolean;
}

export interface LambdaInfo {
  readonly id: number;
  readonly node: Lambda;
  type: FunctionType;
  readonly params: LocalSymbol[];
  readonly captures: LocalSymbol[];
  /** 所在的方法（泛型环境来源） */
  readonly enclosing: MethodInfo | null;
}

// ============================================================
// 解析结果
// ============================================================

export type NameResolution =
  | { readonly kind: 'local'; readonly local: LocalSymbol }
  | { readonly kind: 'field'; readonly field: FieldInfo; readonly receiver: ObjectType }
  | { readonly kind: 'static'; readonly field: FieldInfo }
  | { readonly kind: 'global'; readonly field: FieldInfo };

export type MemberResolution =
  | { readonly kind: 'field'; readonly field: FieldInfo; readonly receiver: ObjectType }
  | { readonly kind: 'static'; readonly field: FieldInfo }
  | { readonly kind: 'global'; readonly field: FieldInfo }
  | { readonly kind: 'arrayLength' }
  | { readonly kind: 'stringLength' };

export type Dispatch = 'virtual' | 'interface' | 'direct' | 'super';

export type CallResolution =
  | {
      readonly kind: 'function';
      readonly method: MethodInfo;
      readonly typeArgs: readonly Type[];
      /** 静态方法的所属类型实例（泛型类的静态方法不允许使用类形参） */
      readonly owner: ObjectType | null;
      readonly params: readonly Type[];
    }
  | {
      readonly kind: 'method';
      readonly method: MethodInfo;
      readonly receiver: ObjectType;
      readonly dispatch: Dispatch;
      readonly typeArgs: readonly Type[];
      readonly params: readonly Type[];
      /** 安全调用 `?.` */
      readonly safe: boolean;
    }
  | { readonly kind: 'superConstructor'; readonly ctor: MethodInfo | null; readonly owner: ObjectType; readonly params: readonly Type[] }
  | { readonly kind: 'closure'; readonly type: FunctionType };

export interface NewResolution {
  readonly type: ObjectType;
  readonly ctor: MethodInfo | null;
  readonly params: readonly Type[];
}

export type StringifyPlan =
  | { readonly kind: 'string'; readonly nullable: boolean }
  | { readonly kind: 'primitive'; readonly type: Type }
  | { readonly kind: 'method'; readonly method: MethodInfo; readonly receiver: ObjectType }
  | { readonly kind: 'dynamic' };

export type EqualityPlan =
  | { readonly kind: 'primitive'; readonly operand: Type }
  | { readonly kind: 'nullablePrimitive'; readonly operand: Type }
  | { readonly kind: 'string' }
  | { readonly kind: 'method'; readonly method: MethodInfo; readonly receiver: ObjectType }
  | { readonly kind: 'identity' }
  /** 与 null 字面量比较；`side` 指出非 null 字面量的一侧 */
  | { readonly kind: 'nullCheck'; readonly side: 'left' | 'right' };

export interface SwitchPlan {
  readonly subject: Type;
  readonly equality: EqualityPlan;
}

/**
 * 逐文件的绑定侧表。
 */
export interface Bindings {
  readonly types: Map<Expression, Type>;
  readonly names: Map<Name, NameResolution>;
  readonly members: Map<Member, MemberResolution>;
  readonly calls: Map<Call, CallResolution>;
  readonly news: Map<New, NewResolution>;
  readonly declarations: Map<VarDecl | Parameter | ForRange, LocalSymbol>;
  /** 每个函数体（方法或 lambda）按声明顺序的全部局部变量，用于提升声明 */
  readonly functionLocals: Map<FunctionDecl | Lambda | FieldDecl, LocalSymbol[]>;
  /** 在块内直接声明的局部变量（块结束时释放） */
  readonly blockLocals: Map<Block, LocalSymbol[]>;
  readonly thisLocals: Map<FunctionDecl | Lambda | FieldDecl, LocalSymbol>;
  readonly lambdas: Map<Lambda, LambdaInfo>;
  readonly stringify: Map<Expression, StringifyPlan>;
  readonly equality: Map<Binary, EqualityPlan>;
  /** 算术与比较运算的操作数提升类型 */
  readonly operandTypes: Map<Binary, Type>;
  /** 复合赋值（`+=` 等）的运算类型；字符串拼接为 String */
  readonly compound: Map<Assign, Type>;
  /** `as` / `is` 的目标类型 */
  readonly targets: Map<Cast | TypeCheck, Type>;
  readonly switches: Map<Switch, SwitchPlan>;
  readonly mocks: Map<MockDecl, ClassInfo>;
}

export function createBindings(): Bindings {
  return {
    types: new Map(),
    names: new Map(),
    members: new Map(),
    calls: new Map(),
    news: new Map(),
    declarations: new Map(),
    functionLocals: new Map(),
    blockLocals: new Map(),
    thisLocals: new Map(),
    lambdas: new Map(),
    stringify: new Map(),
    equality: new Map(),
    operandTypes: new Map(),
    compound: new Map(),
    targets: new Map(),
    switches: new Map(),
    mocks: new Map(),
  };
}

/**
 * 泛型实例化请求。类型中可能含有泛型形参，由闭包计算时代入具体实参。
 */
export type InstantiationRequest =
  | { readonly kind: 'type'; readonly type: ObjectType }
  | {
      readonly kind: 'method';
      readonly method: MethodInfo;
      readonly ownerArgs: readonly Type[];
      readonly methodArgs: readonly Type[];
    };

/** 请求所在的泛型环境：方法体、类（字段初始化器）或全局初始化 */
export type RequestScope = MethodInfo | ClassInfo | null;

export interface BoundFile {
  readonly file: SourceFile;
  readonly features: ReadonlySet<string>;
  readonly bindings: Bindings;
  readonly diagnostics: Diagnostic[];
  /** 本文件中由 mock 块合成的类 */
  readonly mockClasses: ClassInfo[];
  /** 本文件中的 test 函数（仅测试根目录下的文件） */
  readonly tests: MethodInfo[];
  readonly requests: ReadonlyArray<{ readonly scope: RequestScope; readonly request: InstantiationRequest }>;
}
