// Simple AST node constructors
import type { AstNode, NodeKind, Span, TypeKeyword } from '../types.js';

type ComparisonOperator = '<' | '>' | '<=' | '>=' | '==' | '!=';

function make(
  kind: NodeKind,
  children: readonly AstNode[],
  extra: { value?: string; ops?: readonly string[]; span?: Span } = {}
): AstNode {
  return {
    kind,
    children,
    ...(extra.value !== undefined ? { value: extra.value } : {}),
    ...(extra.ops !== undefined ? { ops: extra.ops } : {}),
    ...(extra.span !== undefined ? { span: extra.span } : {}),
  };
}

export const Node = {
  Program: (children: readonly AstNode[]): AstNode => make('Program', children),
  Declaration: (type: TypeKeyword, name: string): AstNode =>
    make('Declaration', [Node.Identifier(name)], { value: type }),
  Block: (children: readonly AstNode[]): AstNode => make('Block', children),
  Stmt: (child: AstNode): AstNode => make('Stmt', [child]),
  IfStmt: (cond: AstNode, ...body: readonly AstNode[]): AstNode => make('IfStmt', [cond, ...body]),
  WhileStmt: (cond: AstNode, ...body: readonly AstNode[]): AstNode =>
    make('WhileStmt', [cond, ...body]),
  FunctionStmt: (returnType: TypeKeyword, name: string, body: readonly AstNode[]): AstNode =>
    make('FunctionStmt', [Node.Identifier(name), make('FunctionBlock', body)], {
      value: returnType,
    }),
  FunctionBlock: (children: readonly AstNode[]): AstNode => make('FunctionBlock', children),
  ReturnStmt: (expr: AstNode): AstNode => make('ReturnStmt', [expr]),
  AssignStmt: (name: string, expr: AstNode): AstNode =>
    make('AssignStmt', [Node.Identifier(name), expr]),
  Expr: (child: AstNode): AstNode => make('Expr', [child]),
  CompExpr: (left: AstNode, op?: ComparisonOperator, right?: AstNode): AstNode =>
    op !== undefined && right !== undefined
      ? make('CompExpr', [left, right], { value: op })
      : make('CompExpr', [left]),
  AddExpr: (operands: readonly AstNode[], ops: readonly string[] = []): AstNode =>
    make('AddExpr', operands, ops.length > 0 ? { ops } : {}),
  MulExpr: (operands: readonly AstNode[], ops: readonly string[] = []): AstNode =>
    make('MulExpr', operands, ops.length > 0 ? { ops } : {}),
  BoolExpr: (operands: readonly AstNode[], ops: readonly string[] = []): AstNode =>
    make('BoolExpr', operands, ops.length > 0 ? { ops } : {}),
  NotExpr: (child: AstNode, count = 0): AstNode =>
    make('NotExpr', [child], { ops: Array.from({ length: count }, () => '!') }),
  UnaExpr: (child: AstNode, count = 0): AstNode =>
    make('UnaExpr', [child], { ops: Array.from({ length: count }, () => '-') }),
  GenValue: (child: AstNode): AstNode => make('GenValue', [child]),
  BoolValue: (value: boolean): AstNode => make('BoolValue', [], { value: String(value) }),
  IntValue: (value: number): AstNode => make('IntValue', [], { value: String(value) }),
  Identifier: (name: string): AstNode => make('Identifier', [], { value: name }),
  /** 以指定种类构造任意节点，供 JSON 反序列化使用 */
  Raw: make,
};

/**
 * 测试与示例常用的简写：标识符读取（GenValue 包裹）、整型与布尔字面量。
 */
export const Value = {
  ref: (name: string): AstNode => Node.GenValue(Node.Identifier(name)),
  int: (value: number): AstNode => Node.IntValue(value),
  bool: (value: boolean): AstNode => Node.BoolValue(value),
};
