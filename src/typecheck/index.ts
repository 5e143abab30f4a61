export type { AnalysisContext, AnalysisState } from './context.js';
export { rootContext, enterFunction } from './context.js';
export { MetricCounters, METRIC_KINDS, formatMetrics } from './metrics.js';
export { SymbolTable, type SymbolInfo } from './symbol_table.js';
export { typeOfExpr } from './expression.js';
export { SemanticVisitor } from './statement.js';
export { parseTypeKeyword, formatType } from './utils.js';
