import type { AstNode } from '../types.js';

/**
 * 统一的 AST 遍历器接口与默认实现（只读遍历）。
 *
 * - 入口：visitNode，按节点 kind 分派到对应的 visitXxx
 * - 默认实现执行深度优先递归；子类可覆写特定 visit 方法并调用 super 继续遍历
 */
export interface AstVisitor<Ctx, R = void> {
  visitNode(node: AstNode, ctx: Ctx): R;

  // 顶层与声明
  visitProgram(node: AstNode, ctx: Ctx): R;
  visitDeclaration(node: AstNode, ctx: Ctx): R;

  // 语句级
  visitBlock(node: AstNode, ctx: Ctx): R;
  visitStmt(node: AstNode, ctx: Ctx): R;
  visitIfStmt(node: AstNode, ctx: Ctx): R;
  visitWhileStmt(node: AstNode, ctx: Ctx): R;
  visitFunctionStmt(node: AstNode, ctx: Ctx): R;
  visitFunctionBlock(node: AstNode, ctx: Ctx): R;
  visitReturnStmt(node: AstNode, ctx: Ctx): R;
  visitAssignStmt(node: AstNode, ctx: Ctx): R;

  // 表达式级
  visitExpression(node: AstNode, ctx: Ctx): R;
  visitIdentifier(node: AstNode, ctx: Ctx): R;
}

/**
 * 默认的 AST 递归遍历器。
 *
 * 所有表达式种类统一经由 visitExpression 处理；Identifier 单独分派，
 * 因为它既可以是读取位置也可以是写入目标。
 */
export class DefaultAstVisitor<Ctx> implements AstVisitor<Ctx, void> {
  visitNode(node: AstNode, ctx: Ctx): void {
    switch (node.kind) {
      case 'Program':
        return this.visitProgram(node, ctx);
      case 'Declaration':
        return this.visitDeclaration(node, ctx);
      case 'Block':
        return this.visitBlock(node, ctx);
      case 'Stmt':
        return this.visitStmt(node, ctx);
      case 'IfStmt':
        return this.visitIfStmt(node, ctx);
      case 'WhileStmt':
        return this.visitWhileStmt(node, ctx);
      case 'FunctionStmt':
        return this.visitFunctionStmt(node, ctx);
      case 'FunctionBlock':
        return this.visitFunctionBlock(node, ctx);
      case 'ReturnStmt':
        return this.visitReturnStmt(node, ctx);
      case 'AssignStmt':
        return this.visitAssignStmt(node, ctx);
      case 'Identifier':
        return this.visitIdentifier(node, ctx);
      case 'Expr':
      case 'CompExpr':
      case 'AddExpr':
      case 'MulExpr':
      case 'BoolExpr':
      case 'NotExpr':
      case 'UnaExpr':
      case 'GenValue':
      case 'BoolValue':
      case 'IntValue':
        return this.visitExpression(node, ctx);
    }
  }

  protected visitChildren(node: AstNode, ctx: Ctx): void {
    for (const child of node.children) this.visitNode(child, ctx);
  }

  visitProgram(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitDeclaration(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitBlock(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitStmt(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitIfStmt(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitWhileStmt(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitFunctionStmt(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitFunctionBlock(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitReturnStmt(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitAssignStmt(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitExpression(node: AstNode, ctx: Ctx): void {
    this.visitChildren(node, ctx);
  }

  visitIdentifier(_node: AstNode, _ctx: Ctx): void {}
}
