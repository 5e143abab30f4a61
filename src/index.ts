/**
 * @module minilang-analyzer
 *
 * 两类型（Number / Bool）小型命令式语言的单遍静态语义分析器。
 *
 * **分析管道**：
 * ```
 * 外部解析器 → AST（或 AST JSON）→ SemanticAnalyzer → {VAR:…, WHILE:…, IF:…, FUNC:…, OP:…}
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { Node, Value, analyzeProgram } from 'minilang-analyzer';
 *
 * const program = Node.Program([
 *   Node.Declaration('num', 'a'),
 *   Node.AssignStmt('a', Value.int(1)),
 * ]);
 * const { summary } = analyzeProgram(program); // {VAR:1, WHILE:0, IF:0, FUNC:0, OP:0}
 * ```
 */

// AST 构造与读写
export * from './ast/index.js';

// 语义分析
export { SemanticAnalyzer, analyzeProgram } from './typecheck.js';
export type { AnalyzerOptions, OutputSink } from './typecheck.js';
export { SymbolTable, MetricCounters, formatMetrics } from './typecheck/index.js';

// 诊断
export * from './diagnostics/index.js';

// 类型定义重导出
export { VarType, NODE_KINDS } from './types.js';
export type {
  AnalysisResult,
  AstNode,
  BinaryExprKind,
  MetricKind,
  MetricsSnapshot,
  NodeKind,
  Position,
  Span,
  TypeKeyword,
  UnaryExprKind,
} from './types.js';
