import { performance } from 'node:perf_hooks';
import type { AnalysisResult, AstNode } from './types.js';
import { Diagnostics, DiagnosticError } from './diagnostics/diagnostics.js';
import { ConfigService } from './config/config-service.js';
import { createLogger, logPerformance, type Logger } from './utils/logger.js';
import { rootContext, type AnalysisState } from './typecheck/context.js';
import { MetricCounters, formatMetrics } from './typecheck/metrics.js';
import { SymbolTable } from './typecheck/symbol_table.js';
import { SemanticVisitor } from './typecheck/statement.js';

export * from './typecheck/index.js';

/** 分析结果的输出目标，默认 process.stdout */
export interface OutputSink {
  write(text: string): void;
}

export interface AnalyzerOptions {
  sink?: OutputSink;
  logger?: Logger;
}

/**
 * 单次语义分析运行。
 *
 * 每个实例只能运行一次：符号表与计数器归实例所有，不在运行之间复用。
 * 首个违规立即以 DiagnosticError 终止，此时不输出任何统计。
 */
export class SemanticAnalyzer {
  private readonly symbols = new SymbolTable();
  private readonly metrics = new MetricCounters();
  private readonly sink: OutputSink;
  private readonly logger: Logger;
  private used = false;

  constructor(options: AnalyzerOptions = {}) {
    this.sink = options.sink ?? process.stdout;
    this.logger = options.logger ?? createLogger('analyzer');
  }

  analyze(program: AstNode): AnalysisResult {
    if (this.used) {
      throw new Error('SemanticAnalyzer instances are single-use; create a new analyzer per run');
    }
    this.used = true;

    if (program.kind !== 'Program') {
      Diagnostics.malformedTree(`expected Program root, found ${program.kind}`, program.span).throw();
    }

    const startTime = performance.now();
    const state: AnalysisState = {
      symbols: this.symbols,
      metrics: this.metrics,
      logger: this.logger,
      traceTypes: ConfigService.getInstance().debugTypes,
    };
    this.logger.debug('开始语义分析', { statements: program.children.length });

    try {
      new SemanticVisitor().visitNode(program, rootContext(state));
    } catch (error) {
      if (error instanceof DiagnosticError) {
        this.logger.debug('语义分析失败', { code: error.code, message: error.message });
      }
      throw error;
    }

    const metrics = this.metrics.snapshot();
    const summary = formatMetrics(metrics);
    this.sink.write(`${summary}\n`);

    logPerformance(
      {
        component: 'analyzer',
        operation: '语义分析',
        duration: performance.now() - startTime,
        metadata: { ...metrics },
      },
      this.logger
    );
    return { metrics, summary, symbols: this.symbols.entries() };
  }
}

export function analyzeProgram(program: AstNode, options?: AnalyzerOptions): AnalysisResult {
  return new SemanticAnalyzer(options).analyze(program);
}
