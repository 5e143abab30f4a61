// Shared AST and analysis types.

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/**
 * 外部解析器产出的全部节点种类。
 *
 * 二元表达式按优先级分层：CompExpr > AddExpr > MulExpr，BoolExpr 位于最外层。
 */
export const NODE_KINDS = [
  'Program',
  'Declaration',
  'Block',
  'Stmt',
  'IfStmt',
  'WhileStmt',
  'FunctionStmt',
  'FunctionBlock',
  'ReturnStmt',
  'AssignStmt',
  'Expr',
  'CompExpr',
  'AddExpr',
  'MulExpr',
  'BoolExpr',
  'NotExpr',
  'UnaExpr',
  'GenValue',
  'BoolValue',
  'IntValue',
  'Identifier',
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export type BinaryExprKind = 'CompExpr' | 'AddExpr' | 'MulExpr' | 'BoolExpr';
export type UnaryExprKind = 'NotExpr' | 'UnaExpr';

/**
 * 只读 AST 节点。
 *
 * - `value`：类型关键字（`num`/`bool`）、标识符名、运算符或字面量文本
 * - `ops`：一元前缀运算符列表（NotExpr 为 `!`，UnaExpr 为 `-`）
 * - 节点不持有父引用，上下文由分析器沿递归向下传递
 */
export interface AstNode {
  readonly kind: NodeKind;
  readonly children: readonly AstNode[];
  readonly value?: string;
  readonly ops?: readonly string[];
  readonly span?: Span;
}

export enum VarType {
  Number = 'Number',
  Bool = 'Bool',
}

export type TypeKeyword = 'num' | 'bool';

export type MetricKind = 'VAR' | 'WHILE' | 'IF' | 'FUNC' | 'OP';

export type MetricsSnapshot = Readonly<Record<MetricKind, number>>;

export interface AnalysisResult {
  readonly metrics: MetricsSnapshot;
  /** `{VAR:<n>, WHILE:<n>, IF:<n>, FUNC:<n>, OP:<n>}` */
  readonly summary: string;
  readonly symbols: ReadonlyMap<string, VarType>;
}
