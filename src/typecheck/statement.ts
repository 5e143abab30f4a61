import type { AstNode } from '../types.js';
import { VarType } from '../types.js';
import { DefaultAstVisitor } from '../ast/ast_visitor.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import { enterFunction, type AnalysisContext } from './context.js';
import { typeOfExpr } from './expression.js';
import { childAt, identifierName, parseTypeKeyword } from './utils.js';

/**
 * 语句级语义检查。
 *
 * Program/Block/Stmt/FunctionBlock 沿用默认的深度优先遍历；
 * 出现在语句位置的表达式照常推导类型，结果丢弃。
 * 任何违规立即抛出 DiagnosticError，终止整个遍历。
 */
export class SemanticVisitor extends DefaultAstVisitor<AnalysisContext> {
  override visitDeclaration(node: AstNode, context: AnalysisContext): void {
    const type = parseTypeKeyword(node.value, node.span);
    const target = childAt(node, 0);
    context.state.symbols.declare(identifierName(target), type, target.span ?? node.span);
    context.state.metrics.increment('VAR');
  }

  override visitIfStmt(node: AstNode, context: AnalysisContext): void {
    this.checkConditional(node, context);
    context.state.metrics.increment('IF');
  }

  override visitWhileStmt(node: AstNode, context: AnalysisContext): void {
    this.checkConditional(node, context);
    context.state.metrics.increment('WHILE');
  }

  override visitFunctionStmt(node: AstNode, context: AnalysisContext): void {
    const returnType = parseTypeKeyword(node.value, node.span);
    this.visitChildren(node, enterFunction(context, returnType));
    context.state.metrics.increment('FUNC');
  }

  override visitReturnStmt(node: AstNode, context: AnalysisContext): void {
    const expected = context.functionReturn;
    if (expected === null) {
      Diagnostics.returnOutsideFunction(node.span).throw();
      return;
    }
    const actual = typeOfExpr(childAt(node, 0), context);
    if (actual !== expected) {
      Diagnostics.returnTypeMismatch(node.span).throw();
    }
  }

  override visitAssignStmt(node: AstNode, context: AnalysisContext): void {
    const target = childAt(node, 0);
    const name = identifierName(target);
    const valueType = typeOfExpr(childAt(node, 1), context);
    const declared = context.state.symbols.require(name, target.span ?? node.span);
    if (declared !== valueType) {
      Diagnostics.invalidAssignmentType(name, node.span).throw();
    }
  }

  override visitExpression(node: AstNode, context: AnalysisContext): void {
    void typeOfExpr(node, context);
  }

  /** if/while 共用：首个子节点为条件，必须为 Bool；其余分支语句各自独立检查 */
  private checkConditional(node: AstNode, context: AnalysisContext): void {
    const condition = childAt(node, 0);
    if (typeOfExpr(condition, context) !== VarType.Bool) {
      Diagnostics.invalidConditionType(condition.span ?? node.span).throw();
    }
    for (const branch of node.children.slice(1)) {
      this.visitNode(branch, context);
    }
  }
}
