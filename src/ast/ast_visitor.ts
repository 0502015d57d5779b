import type {
  Block,
  Declaration,
  Expression,
  MemberDecl,
  SourceFile,
  Statement,
  TypeRef,
} from '../types.js';

/**
 * 统一的 AST 遍历器接口与默认实现（只读遍历）。
 *
 * - 入口：visitFile/visitDeclaration/visitBlock/visitStatement/visitExpression
 * - 默认实现执行深度优先递归；子类可覆写特定 visit 方法并调用 super 继续遍历
 */
export interface AstVisitor<Ctx, R = void> {
  visitFile(f: SourceFile, ctx: Ctx): R;
  visitDeclaration(d: Declaration | MemberDecl, ctx: Ctx): R;
  visitBlock(b: Block, ctx: Ctx): R;
  visitStatement(s: Statement, ctx: Ctx): R;
  visitExpression(e: Expression, ctx: Ctx): R;
  visitType?(t: TypeRef, ctx: Ctx): R;
}

export class DefaultAstVisitor<Ctx> implements AstVisitor<Ctx, void> {
  // 可选钩子默认不实现，由子类按需覆写
  public visitType?(t: TypeRef, ctx: Ctx): void;

  visitFile(f: SourceFile, ctx: Ctx): void {
    for (const d of f.decls) this.visitDeclaration(d, ctx);
  }

  visitDeclaration(d: Declaration | MemberDecl, ctx: Ctx): void {
    switch (d.kind) {
      case 'Namespace':
        for (const inner of d.decls) this.visitDeclaration(inner, ctx);
        return;
      case 'Class':
        if (d.superclass) this.visitType?.(d.superclass, ctx);
        for (const i of d.interfaces) this.visitType?.(i, ctx);
        for (const m of d.members) this.visitDeclaration(m, ctx);
        return;
      case 'Interface':
        for (const s of d.supers) this.visitType?.(s, ctx);
        for (const m of d.methods) this.visitDeclaration(m, ctx);
        return;
      case 'Field':
        if (d.type) this.visitType?.(d.type, ctx);
        if (d.init) this.visitExpression(d.init, ctx);
        return;
      case 'Function':
        for (const p of d.params) this.visitType?.(p.type, ctx);
        if (d.returnType) this.visitType?.(d.returnType, ctx);
        if (d.body) this.visitBlock(d.body, ctx);
        return;
    }
  }

  visitBlock(b: Block, ctx: Ctx): void {
    for (const s of b.statements) this.visitStatement(s, ctx);
  }

  visitStatement(s: Statement, ctx: Ctx): void {
    switch (s.kind) {
      case 'Block':
        this.visitBlock(s, ctx);
        return;
      case 'Scope':
        this.visitBlock(s.body, ctx);
        return;
      case 'Mock':
        this.visitType?.(s.target, ctx);
        for (const m of s.members) this.visitDeclaration(m, ctx);
        return;
      case 'VarDecl':
        if (s.type) this.visitType?.(s.type, ctx);
        if (s.init) this.visitExpression(s.init, ctx);
        return;
      case 'ExprStmt':
        this.visitExpression(s.expr, ctx);
        return;
      case 'If':
        this.visitExpression(s.cond, ctx);
        this.visitBlock(s.then, ctx);
        if (s.otherwise) this.visitStatement(s.otherwise, ctx);
        return;
      case 'While':
        this.visitExpression(s.cond, ctx);
        this.visitBlock(s.body, ctx);
        return;
      case 'ForRange':
        this.visitExpression(s.from, ctx);
        this.visitExpression(s.to, ctx);
        this.visitBlock(s.body, ctx);
        return;
      case 'Loop':
        this.visitBlock(s.body, ctx);
        return;
      case 'Switch':
        this.visitExpression(s.subject, ctx);
        for (const c of s.cases) {
          for (const v of c.values) this.visitExpression(v, ctx);
          this.visitBlock(c.body, ctx);
        }
        return;
      case 'Return':
        if (s.expr) this.visitExpression(s.expr, ctx);
        return;
      case 'Throw':
        this.visitExpression(s.expr, ctx);
        return;
      case 'Break':
      case 'Continue':
        return;
    }
  }

  visitExpression(e: Expression, ctx: Ctx): void {
    switch (e.kind) {
      case 'Int':
      case 'Long':
      case 'Float':
      case 'Char':
      case 'Bool':
      case 'Null':
      case 'String':
      case 'Name':
      case 'This':
      case 'Super':
        return;
      case 'Interpolated':
        for (const part of e.parts) if (part.kind === 'expr') this.visitExpression(part.expr, ctx);
        return;
      case 'Member':
        this.visitExpression(e.object, ctx);
        return;
      case 'Call':
        this.visitExpression(e.callee, ctx);
        for (const a of e.args) this.visitExpression(a, ctx);
        return;
      case 'New':
        this.visitType?.(e.type, ctx);
        for (const a of e.args) this.visitExpression(a, ctx);
        return;
      case 'NewArray':
        this.visitType?.(e.element, ctx);
        this.visitExpression(e.size, ctx);
        return;
      case 'Index':
        this.visitExpression(e.object, ctx);
        this.visitExpression(e.index, ctx);
        return;
      case 'Unary':
        this.visitExpression(e.operand, ctx);
        return;
      case 'Binary':
        this.visitExpression(e.left, ctx);
        this.visitExpression(e.right, ctx);
        return;
      case 'Assign':
        this.visitExpression(e.target, ctx);
        this.visitExpression(e.value, ctx);
        return;
      case 'Conditional':
        this.visitExpression(e.cond, ctx);
        this.visitExpression(e.then, ctx);
        this.visitExpression(e.otherwise, ctx);
        return;
      case 'ArrayLiteral':
        for (const el of e.elements) this.visitExpression(el, ctx);
        return;
      case 'Lambda':
        for (const p of e.params) this.visitType?.(p.type, ctx);
        if (e.returnType) this.visitType?.(e.returnType, ctx);
        if (e.body.kind === 'Block') this.visitBlock(e.body, ctx);
        else this.visitExpression(e.body, ctx);
        return;
      case 'Cast':
      case 'TypeCheck':
        this.visitExpression(e.expr, ctx);
        this.visitType?.(e.type, ctx);
        return;
    }
  }
}
