// Simple AST node constructors
import type * as AST from '../types.js';

function createEmptySpan(): AST.Span {
  return {
    start: { line: 0, col: 0 },
    end: { line: 0, col: 0 },
  };
}

const NO_MODIFIERS: AST.FunctionModifiers = { isStatic: false, isNative: false, isSuspend: false };

export const Node = {
  // ---- type references ----
  NamedType: (name: readonly string[], args: readonly AST.TypeRef[], nullable: boolean): AST.NamedTypeRef => ({
    kind: 'NamedType',
    name,
    args,
    nullable,
    span: createEmptySpan(),
  }),
  ArrayType: (element: AST.TypeRef, nullable: boolean): AST.ArrayTypeRef => ({
    kind: 'ArrayType',
    element,
    nullable,
    span: createEmptySpan(),
  }),
  FunctionType: (params: readonly AST.TypeRef[], ret: AST.TypeRef, nullable: boolean): AST.FunctionTypeRef => ({
    kind: 'FunctionType',
    params,
    ret,
    nullable,
    span: createEmptySpan(),
  }),

  // ---- declarations ----
  File: (
    path: string,
    role: AST.SourceRole,
    imports: readonly AST.Import[],
    decls: readonly AST.TopLevelDecl[]
  ): AST.SourceFile => ({
    kind: 'File',
    path,
    role,
    imports,
    decls,
    span: createEmptySpan(),
  }),
  Import: (path: readonly string[]): AST.Import => ({
    kind: 'Import',
    path,
    span: createEmptySpan(),
  }),
  Directive: (name: AST.Directive['name'], feature: string): AST.Directive => ({
    kind: 'Directive',
    name,
    feature,
    span: createEmptySpan(),
  }),
  Namespace: (
    path: readonly string[],
    imports: readonly AST.Import[],
    decls: readonly AST.TopLevelDecl[]
  ): AST.NamespaceDecl => ({
    kind: 'Namespace',
    path,
    imports,
    decls,
    span: createEmptySpan(),
  }),
  Class: (
    name: string,
    typeParams: readonly string[],
    superclass: AST.TypeRef | null,
    interfaces: readonly AST.TypeRef[],
    members: readonly AST.MemberDecl[],
    directives: readonly AST.Directive[] = []
  ): AST.ClassDecl => ({
    kind: 'Class',
    name,
    typeParams,
    superclass,
    interfaces,
    members,
    directives,
    span: createEmptySpan(),
  }),
  Interface: (
    name: string,
    typeParams: readonly string[],
    supers: readonly AST.TypeRef[],
    methods: readonly AST.FunctionDecl[],
    directives: readonly AST.Directive[] = []
  ): AST.InterfaceDecl => ({
    kind: 'Interface',
    name,
    typeParams,
    supers,
    methods,
    directives,
    span: createEmptySpan(),
  }),
  Field: (
    name: string,
    type: AST.TypeRef | null,
    init: AST.Expression | null,
    options: { isStatic: boolean; mutable: boolean },
    directives: readonly AST.Directive[] = []
  ): AST.FieldDecl => ({
    kind: 'Field',
    name,
    type,
    init,
    isStatic: options.isStatic,
    mutable: options.mutable,
    directives,
    span: createEmptySpan(),
  }),
  Function: (
    name: string,
    flavor: AST.FunctionFlavor,
    typeParams: readonly string[],
    params: readonly AST.Parameter[],
    returnType: AST.TypeRef | null,
    body: AST.Block | null,
    modifiers: AST.FunctionModifiers = NO_MODIFIERS,
    directives: readonly AST.Directive[] = []
  ): AST.FunctionDecl => ({
    kind: 'Function',
    name,
    flavor,
    typeParams,
    params,
    returnType,
    body,
    modifiers,
    directives,
    span: createEmptySpan(),
  }),
  Parameter: (name: string, type: AST.TypeRef): AST.Parameter => ({
    kind: 'Parameter',
    name,
    type,
    span: createEmptySpan(),
  }),

  // ---- statements ----
  Block: (statements: readonly AST.Statement[]): AST.Block => ({
    kind: 'Block',
    statements,
    span: createEmptySpan(),
  }),
  Scope: (body: AST.Block): AST.ScopeBlock => ({
    kind: 'Scope',
    body,
    span: createEmptySpan(),
  }),
  Mock: (target: AST.NamedTypeRef, members: readonly AST.MemberDecl[]): AST.MockDecl => ({
    kind: 'Mock',
    target,
    members,
    span: createEmptySpan(),
  }),
  VarDecl: (
    name: string,
    type: AST.TypeRef | null,
    init: AST.Expression | null,
    mutable: boolean
  ): AST.VarDecl => ({
    kind: 'VarDecl',
    name,
    type,
    init,
    mutable,
    span: createEmptySpan(),
  }),
  ExprStmt: (expr: AST.Expression): AST.ExprStmt => ({
    kind: 'ExprStmt',
    expr,
    span: createEmptySpan(),
  }),
  If: (cond: AST.Expression, then: AST.Block, otherwise: AST.Block | AST.If | null): AST.If => ({
    kind: 'If',
    cond,
    then,
    otherwise,
    span: createEmptySpan(),
  }),
  While: (cond: AST.Expression, body: AST.Block): AST.While => ({
    kind: 'While',
    cond,
    body,
    span: createEmptySpan(),
  }),
  ForRange: (variable: string, from: AST.Expression, to: AST.Expression, body: AST.Block): AST.ForRange => ({
    kind: 'ForRange',
    variable,
    from,
    to,
    body,
    span: createEmptySpan(),
  }),
  Loop: (body: AST.Block): AST.Loop => ({
    kind: 'Loop',
    body,
    span: createEmptySpan(),
  }),
  Case: (values: readonly AST.Expression[], isDefault: boolean, body: AST.Block): AST.SwitchCase => ({
    kind: 'Case',
    values,
    isDefault,
    body,
    span: createEmptySpan(),
  }),
  Switch: (subject: AST.Expression, cases: readonly AST.SwitchCase[]): AST.Switch => ({
    kind: 'Switch',
    subject,
    cases,
    span: createEmptySpan(),
  }),
  Return: (expr: AST.Expression | null): AST.Return => ({
    kind: 'Return',
    expr,
    span: createEmptySpan(),
  }),
  Throw: (expr: AST.Expression): AST.Throw => ({
    kind: 'Throw',
    expr,
    span: createEmptySpan(),
  }),
  Break: (): AST.Break => ({ kind: 'Break', span: createEmptySpan() }),
  Continue: (): AST.Continue => ({ kind: 'Continue', span: createEmptySpan() }),

  // ---- expressions ----
  Int: (value: number): AST.IntLit => ({ kind: 'Int', value, span: createEmptySpan() }),
  Long: (value: string): AST.LongLit => ({ kind: 'Long', value, span: createEmptySpan() }),
  Float: (value: number, precision: AST.FloatLit['precision']): AST.FloatLit => ({
    kind: 'Float',
    value,
    precision,
    span: createEmptySpan(),
  }),
  Char: (value: number): AST.CharLit => ({ kind: 'Char', value, span: createEmptySpan() }),
  Bool: (value: boolean): AST.BoolLit => ({ kind: 'Bool', value, span: createEmptySpan() }),
  Null: (): AST.NullLit => ({ kind: 'Null', span: createEmptySpan() }),
  String: (value: string): AST.StringLit => ({ kind: 'String', value, span: createEmptySpan() }),
  Interpolated: (parts: readonly AST.InterpolationPart[]): AST.InterpolatedString => ({
    kind: 'Interpolated',
    parts,
    span: createEmptySpan(),
  }),
  Name: (name: string): AST.Name => ({ kind: 'Name', name, span: createEmptySpan() }),
  This: (): AST.This => ({ kind: 'This', span: createEmptySpan() }),
  Super: (): AST.Super => ({ kind: 'Super', span: createEmptySpan() }),
  Member: (object: AST.Expression, name: string, safe: boolean): AST.Member => ({
    kind: 'Member',
    object,
    name,
    safe,
    span: createEmptySpan(),
  }),
  Call: (callee: AST.Expression, args: readonly AST.Expression[]): AST.Call => ({
    kind: 'Call',
    callee,
    args,
    span: createEmptySpan(),
  }),
  New: (type: AST.NamedTypeRef, args: readonly AST.Expression[]): AST.New => ({
    kind: 'New',
    type,
    args,
    span: createEmptySpan(),
  }),
  NewArray: (element: AST.TypeRef, size: AST.Expression): AST.NewArray => ({
    kind: 'NewArray',
    element,
    size,
    span: createEmptySpan(),
  }),
  Index: (object: AST.Expression, index: AST.Expression): AST.Index => ({
    kind: 'Index',
    object,
    index,
    span: createEmptySpan(),
  }),
  Unary: (op: AST.UnaryOperator, operand: AST.Expression): AST.Unary => ({
    kind: 'Unary',
    op,
    operand,
    span: createEmptySpan(),
  }),
  Binary: (op: AST.BinaryOperator, left: AST.Expression, right: AST.Expression): AST.Binary => ({
    kind: 'Binary',
    op,
    left,
    right,
    span: createEmptySpan(),
  }),
  Assign: (op: AST.AssignOperator, target: AST.Expression, value: AST.Expression): AST.Assign => ({
    kind: 'Assign',
    op,
    target,
    value,
    span: createEmptySpan(),
  }),
  Conditional: (cond: AST.Expression, then: AST.Expression, otherwise: AST.Expression): AST.Conditional => ({
    kind: 'Conditional',
    cond,
    then,
    otherwise,
    span: createEmptySpan(),
  }),
  ArrayLiteral: (elements: readonly AST.Expression[]): AST.ArrayLiteral => ({
    kind: 'ArrayLiteral',
    elements,
    span: createEmptySpan(),
  }),
  Lambda: (
    params: readonly AST.Parameter[],
    returnType: AST.TypeRef | null,
    body: AST.Block | AST.Expression
  ): AST.Lambda => ({
    kind: 'Lambda',
    params,
    returnType,
    body,
    span: createEmptySpan(),
  }),
  Cast: (expr: AST.Expression, type: AST.TypeRef): AST.Cast => ({
    kind: 'Cast',
    expr,
    type,
    span: createEmptySpan(),
  }),
  TypeCheck: (expr: AST.Expression, type: AST.TypeRef): AST.TypeCheck => ({
    kind: 'TypeCheck',
    expr,
    type,
    span: createEmptySpan(),
  }),
};
