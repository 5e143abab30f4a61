import type { AstNode, BinaryExprKind, UnaryExprKind } from '../types.js';
import { VarType } from '../types.js';
import { Diagnostics } from '../diagnostics/diagnostics.js';
import type { AnalysisContext } from './context.js';
import {
  EQUALITY_OPERATORS,
  ORDERING_OPERATORS,
  childAt,
  formatType,
  identifierName,
  valueOf,
} from './utils.js';

// 表达式类型推导：自底向上计算节点类型，每个子节点单独推导、互不共享状态。

/** 二元层的操作数约束；CompExpr 依运算符而定，单独处理 */
const OPERAND_TYPES: Readonly<Record<Exclude<BinaryExprKind, 'CompExpr'>, VarType>> = {
  AddExpr: VarType.Number,
  MulExpr: VarType.Number,
  BoolExpr: VarType.Bool,
};

const UNARY_RULES: Readonly<Record<UnaryExprKind, { readonly op: string; readonly operand: VarType }>> = {
  NotExpr: { op: '!', operand: VarType.Bool },
  UnaExpr: { op: '-', operand: VarType.Number },
};

export function typeOfExpr(node: AstNode, context: AnalysisContext): VarType {
  const type = synthesize(node, context);
  const { logger, traceTypes } = context.state;
  if (traceTypes) {
    logger.debug('表达式类型', { kind: node.kind, type: formatType(type) });
  }
  return type;
}

function synthesize(node: AstNode, context: AnalysisContext): VarType {
  switch (node.kind) {
    case 'Expr':
      return typeOfExpr(childAt(node, 0), context);
    case 'GenValue':
      return typeOfValueChild(childAt(node, 0), context);
    case 'CompExpr':
      return typeOfComparison(node, context);
    case 'AddExpr':
    case 'MulExpr':
    case 'BoolExpr':
      return typeOfArithmetic(node, node.kind, context);
    case 'NotExpr':
    case 'UnaExpr':
      return typeOfUnary(node, node.kind, context);
    case 'BoolValue':
      return VarType.Bool;
    case 'IntValue':
      return VarType.Number;
    default:
      return Diagnostics.malformedTree(`${node.kind} cannot appear in expression position`, node.span).throw();
  }
}

/** GenValue 下的 Identifier 处于读取位置，必须已声明 */
function typeOfValueChild(child: AstNode, context: AnalysisContext): VarType {
  if (child.kind === 'Identifier') {
    return context.state.symbols.require(identifierName(child), child.span);
  }
  return typeOfExpr(child, context);
}

function typeOfComparison(node: AstNode, context: AnalysisContext): VarType {
  if (node.children.length === 1) return typeOfExpr(childAt(node, 0), context);

  const operator = valueOf(node);
  if (!ORDERING_OPERATORS.has(operator) && !EQUALITY_OPERATORS.has(operator)) {
    return Diagnostics.malformedTree(`unknown comparison operator '${operator}'`, node.span).throw();
  }

  // 多个操作数时左结合：前一次比较的结果（Bool）作为下一次的左操作数
  let left = typeOfExpr(childAt(node, 0), context);
  for (const operand of node.children.slice(1)) {
    const right = typeOfExpr(operand, context);
    if (ORDERING_OPERATORS.has(operator)) {
      if (left === VarType.Bool || right === VarType.Bool) {
        Diagnostics.invalidExpressionType(node.span).throw();
      }
    } else if (left !== right) {
      Diagnostics.invalidExpressionType(node.span).throw();
    }
    left = VarType.Bool;
  }

  context.state.metrics.increment('OP');
  return VarType.Bool;
}

function typeOfArithmetic(
  node: AstNode,
  kind: Exclude<BinaryExprKind, 'CompExpr'>,
  context: AnalysisContext
): VarType {
  if (node.children.length === 1) return typeOfExpr(childAt(node, 0), context);
  if (node.children.length === 0) {
    return Diagnostics.malformedTree(`${kind} has no operands`, node.span).throw();
  }

  const expected = OPERAND_TYPES[kind];
  for (const operand of node.children) {
    if (typeOfExpr(operand, context) !== expected) {
      Diagnostics.invalidExpressionType(node.span).throw();
    }
  }

  context.state.metrics.increment('OP');
  return expected;
}

function typeOfUnary(node: AstNode, kind: UnaryExprKind, context: AnalysisContext): VarType {
  const type = typeOfExpr(childAt(node, 0), context);
  const ops = node.ops ?? [];
  if (ops.length === 0) return type;

  const rule = UNARY_RULES[kind];
  if (ops.some(op => op !== rule.op)) {
    return Diagnostics.malformedTree(`${kind} only accepts '${rule.op}' operators`, node.span).throw();
  }
  if (type !== rule.operand) {
    Diagnostics.invalidExpressionType(node.span).throw();
  }

  // 重复的前缀运算符只计一次
  context.state.metrics.increment('OP');
  return type;
}
