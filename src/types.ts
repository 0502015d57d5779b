// Core type definitions for AmLang: tokens, spans and the untyped AST

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/**
 * 源文件在工程中的角色。
 *
 * `test` 表示文件位于 tests/ 根目录下，只有这类文件允许声明 `test` 函数。
 */
export type SourceRole = 'source' | 'test';

// ============================================================
// Tokens
// ============================================================

export enum TokenKind {
  EOF = 'EOF',
  IDENT = 'IDENT',
  KEYWORD = 'KEYWORD',
  INT = 'INT',
  LONG = 'LONG',
  FLOAT = 'FLOAT',
  DOUBLE = 'DOUBLE',
  CHAR = 'CHAR',
  STRING = 'STRING',
  TEMPLATE = 'TEMPLATE',
  DIRECTIVE = 'DIRECTIVE',
  PUNCT = 'PUNCT',
  INVALID = 'INVALID',
}

/**
 * 字符串插值片段。
 *
 * - `text`：字面文本，`value` 为转义处理后的内容，`raw` 为源码原文
 * - `expr`：嵌入表达式，`tokens` 为重新词法分析得到的子 token 流（以 EOF 结尾），
 *   `raw` 保留 `$name` 或 `${...}` 的源码原文
 */
export type TemplatePart =
  | { readonly kind: 'text'; readonly value: string; readonly raw: string }
  | {
      readonly kind: 'expr';
      readonly tokens: readonly Token[];
      readonly raw: string;
      readonly start: Position;
      readonly terminated: boolean;
    };

export interface InvalidTokenValue {
  readonly reason: 'character' | 'unterminated-string' | 'unterminated-comment' | 'number' | 'char';
  readonly text: string;
}

export type TokenValue =
  | string
  | number
  | null
  | readonly TemplatePart[]
  | InvalidTokenValue;

export interface Token {
  readonly kind: TokenKind;
  /** 源码原文 */
  readonly lexeme: string;
  readonly value: TokenValue;
  readonly start: Position;
  readonly end: Position;
  readonly file: string;
}

// ============================================================
// Type references (syntax only; resolved by the binder)
// ============================================================

export interface NamedTypeRef {
  readonly kind: 'NamedType';
  readonly name: readonly string[];
  readonly args: readonly TypeRef[];
  readonly nullable: boolean;
  span: Span;
}

export interface ArrayTypeRef {
  readonly kind: 'ArrayType';
  readonly element: TypeRef;
  readonly nullable: boolean;
  span: Span;
}

export interface FunctionTypeRef {
  readonly kind: 'FunctionType';
  readonly params: readonly TypeRef[];
  readonly ret: TypeRef;
  readonly nullable: boolean;
  span: Span;
}

export type TypeRef = NamedTypeRef | ArrayTypeRef | FunctionTypeRef;

// ============================================================
// Declarations
// ============================================================

export interface Directive {
  readonly kind: 'Directive';
  readonly name: 'require' | 'requireNot';
  readonly feature: string;
  span: Span;
}

export interface SourceFile {
  readonly kind: 'File';
  readonly path: string;
  readonly role: SourceRole;
  readonly imports: readonly Import[];
  readonly decls: readonly TopLevelDecl[];
  span: Span;
}

export interface Import {
  readonly kind: 'Import';
  readonly path: readonly string[];
  span: Span;
}

export interface NamespaceDecl {
  readonly kind: 'Namespace';
  readonly path: readonly string[];
  readonly imports: readonly Import[];
  readonly decls: readonly TopLevelDecl[];
  span: Span;
}

export interface ClassDecl {
  readonly kind: 'Class';
  readonly name: string;
  readonly typeParams: readonly string[];
  readonly superclass: TypeRef | null;
  readonly interfaces: readonly TypeRef[];
  readonly members: readonly MemberDecl[];
  readonly directives: readonly Directive[];
  span: Span;
}

export interface InterfaceDecl {
  readonly kind: 'Interface';
  readonly name: string;
  readonly typeParams: readonly string[];
  readonly supers: readonly TypeRef[];
  readonly methods: readonly FunctionDecl[];
  readonly directives: readonly Directive[];
  span: Span;
}

export interface FieldDecl {
  readonly kind: 'Field';
  readonly name: string;
  readonly type: TypeRef | null;
  readonly init: Expression | null;
  readonly isStatic: boolean;
  readonly mutable: boolean;
  readonly directives: readonly Directive[];
  span: Span;
}

export interface FunctionModifiers {
  readonly isStatic: boolean;
  readonly isNative: boolean;
  readonly isSuspend: boolean;
}

export type FunctionFlavor = 'function' | 'constructor' | 'test';

export interface FunctionDecl {
  readonly kind: 'Function';
  readonly name: string;
  readonly flavor: FunctionFlavor;
  readonly typeParams: readonly string[];
  readonly params: readonly Parameter[];
  readonly returnType: TypeRef | null;
  readonly body: Block | null;
  readonly modifiers: FunctionModifiers;
  readonly directives: readonly Directive[];
  span: Span;
}

export interface Parameter {
  readonly kind: 'Parameter';
  readonly name: string;
  readonly type: TypeRef;
  span: Span;
}

export type MemberDecl = FieldDecl | FunctionDecl;
export type TopLevelDecl = NamespaceDecl | ClassDecl | InterfaceDecl | FunctionDecl | FieldDecl;
export type Declaration = TopLevelDecl;

// ============================================================
// Statements
// ============================================================

export interface Block {
  readonly kind: 'Block';
  readonly statements: readonly Statement[];
  span: Span;
}

export interface ScopeBlock {
  readonly kind: 'Scope';
  readonly body: Block;
  span: Span;
}

export interface MockDecl {
  readonly kind: 'Mock';
  readonly target: NamedTypeRef;
  readonly members: readonly MemberDecl[];
  span: Span;
}

export interface VarDecl {
  readonly kind: 'VarDecl';
  readonly name: string;
  readonly type: TypeRef | null;
  readonly init: Expression | null;
  readonly mutable: boolean;
  span: Span;
}

export interface ExprStmt {
  readonly kind: 'ExprStmt';
  readonly expr: Expression;
  span: Span;
}

export interface If {
  readonly kind: 'If';
  readonly cond: Expression;
  readonly then: Block;
  readonly otherwise: Block | If | null;
  span: Span;
}

export interface While {
  readonly kind: 'While';
  readonly cond: Expression;
  readonly body: Block;
  span: Span;
}

export interface ForRange {
  readonly kind: 'ForRange';
  readonly variable: string;
  readonly from: Expression;
  readonly to: Expression;
  readonly body: Block;
  span: Span;
}

export interface Loop {
  readonly kind: 'Loop';
  readonly body: Block;
  span: Span;
}

export interface SwitchCase {
  readonly kind: 'Case';
  /** 为空表示 default 分支 */
  readonly values: readonly Expression[];
  readonly isDefault: boolean;
  readonly body: Block;
  span: Span;
}

export interface Switch {
  readonly kind: 'Switch';
  readonly subject: Expression;
  readonly cases: readonly SwitchCase[];
  span: Span;
}

export interface Return {
  readonly kind: 'Return';
  readonly expr: Expression | null;
  span: Span;
}

export interface Throw {
  readonly kind: 'Throw';
  readonly expr: Expression;
  span: Span;
}

export interface Break {
  readonly kind: 'Break';
  span: Span;
}

export interface Continue {
  readonly kind: 'Continue';
  span: Span;
}

export type Statement =
  | Block
  | ScopeBlock
  | MockDecl
  | VarDecl
  | ExprStmt
  | If
  | While
  | ForRange
  | Loop
  | Switch
  | Return
  | Throw
  | Break
  | Continue;

// ============================================================
// Expressions
// ============================================================

export interface IntLit {
  readonly kind: 'Int';
  readonly value: number;
  span: Span;
}

export interface LongLit {
  readonly kind: 'Long';
  /** 十进制字符串，保留超出 Number 安全范围的精度 */
  readonly value: string;
  span: Span;
}

export interface FloatLit {
  readonly kind: 'Float';
  readonly value: number;
  readonly precision: 'float' | 'double';
  span: Span;
}

export interface CharLit {
  readonly kind: 'Char';
  /** UTF-16 code unit */
  readonly value: number;
  span: Span;
}

export interface BoolLit {
  readonly kind: 'Bool';
  readonly value: boolean;
  span: Span;
}

export interface NullLit {
  readonly kind: 'Null';
  span: Span;
}

export interface StringLit {
  readonly kind: 'String';
  readonly value: string;
  span: Span;
}

export type InterpolationPart =
  | { readonly kind: 'text'; readonly value: string; readonly raw: string }
  | { readonly kind: 'expr'; readonly expr: Expression; readonly raw: string };

export interface InterpolatedString {
  readonly kind: 'Interpolated';
  readonly parts: readonly InterpolationPart[];
  span: Span;
}

export interface Name {
  readonly kind: 'Name';
  readonly name: string;
  span: Span;
}

export interface This {
  readonly kind: 'This';
  span: Span;
}

export interface Super {
  readonly kind: 'Super';
  span: Span;
}

export interface Member {
  readonly kind: 'Member';
  readonly object: Expression;
  readonly name: string;
  readonly safe: boolean;
  span: Span;
}

export interface Call {
  readonly kind: 'Call';
  readonly callee: Expression;
  readonly args: readonly Expression[];
  span: Span;
}

export interface New {
  readonly kind: 'New';
  readonly type: NamedTypeRef;
  readonly args: readonly Expression[];
  span: Span;
}

export interface NewArray {
  readonly kind: 'NewArray';
  readonly element: TypeRef;
  readonly size: Expression;
  span: Span;
}

export interface Index {
  readonly kind: 'Index';
  readonly object: Expression;
  readonly index: Expression;
  span: Span;
}

export type UnaryOperator = '-' | '!';
export type BinaryOperator =
  | '*'
  | '/'
  | '%'
  | '+'
  | '-'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | '&&'
  | '||';
export type AssignOperator = '=' | '+=' | '-=' | '*=' | '/=' | '%=';

export interface Unary {
  readonly kind: 'Unary';
  readonly op: UnaryOperator;
  readonly operand: Expression;
  span: Span;
}

export interface Binary {
  readonly kind: 'Binary';
  readonly op: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
  span: Span;
}

export interface Assign {
  readonly kind: 'Assign';
  readonly op: AssignOperator;
  readonly target: Expression;
  readonly value: Expression;
  span: Span;
}

export interface Conditional {
  readonly kind: 'Conditional';
  readonly cond: Expression;
  readonly then: Expression;
  readonly otherwise: Expression;
  span: Span;
}

export interface ArrayLiteral {
  readonly kind: 'ArrayLiteral';
  readonly elements: readonly Expression[];
  span: Span;
}

export interface Lambda {
  readonly kind: 'Lambda';
  readonly params: readonly Parameter[];
  readonly returnType: TypeRef | null;
  readonly body: Block | Expression;
  span: Span;
}

export interface Cast {
  readonly kind: 'Cast';
  readonly expr: Expression;
  readonly type: TypeRef;
  span: Span;
}

export interface TypeCheck {
  readonly kind: 'TypeCheck';
  readonly expr: Expression;
  readonly type: TypeRef;
  span: Span;
}

export type Expression =
  | IntLit
  | LongLit
  | FloatLit
  | CharLit
  | BoolLit
  | NullLit
  | StringLit
  | InterpolatedString
  | Name
  | This
  | Super
  | Member
  | Call
  | New
  | NewArray
  | Index
  | Unary
  | Binary
  | Assign
  | Conditional
  | ArrayLiteral
  | Lambda
  | Cast
  | TypeCheck;

export type AstNode = SourceFile | Import | Directive | Declaration | Parameter | Statement | SwitchCase | Expression | TypeRef;
