import type { VarType } from '../types.js';
import type { Logger } from '../utils/logger.js';
import type { MetricCounters } from './metrics.js';
import type { SymbolTable } from './symbol_table.js';

// 语义分析上下文：运行级状态（符号表、计数器）与沿递归向下传递的函数上下文。

export interface AnalysisState {
  readonly symbols: SymbolTable;
  readonly metrics: MetricCounters;
  readonly logger: Logger;
  /** 为 true 时记录每个表达式推导出的类型 */
  readonly traceTypes: boolean;
}

export interface AnalysisContext {
  readonly state: AnalysisState;
  /** 最近一层外围函数声明的返回类型；函数外为 null */
  readonly functionReturn: VarType | null;
}

export function rootContext(state: AnalysisState): AnalysisContext {
  return { state, functionReturn: null };
}

export function enterFunction(context: AnalysisContext, returnType: VarType): AnalysisContext {
  return { ...context, functionReturn: returnType };
}
