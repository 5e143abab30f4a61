import { loadAstFile } from '../../ast/ast_json.js';
import { SemanticAnalyzer, type OutputSink } from '../../typecheck.js';
import { createDiagnosticsError } from '../utils/error-handler.js';

export interface AnalyzeOptions {
  json?: boolean;
}

const discard: OutputSink = { write: () => undefined };

/**
 * 分析一个 AST JSON 文件并把统计写入 out。
 *
 * 默认输出分析器的统计行；--json 时分析器输出置空，改为写一行 JSON。
 * 加载或分析失败时抛出，由调用方交给 handleError。
 */
export function analyzeCommand(file: string, options: AnalyzeOptions, out: OutputSink = process.stdout): void {
  const program = loadAstFile(file);
  if (Array.isArray(program)) {
    throw createDiagnosticsError(program);
  }

  if (!options.json) {
    new SemanticAnalyzer({ sink: out }).analyze(program);
    return;
  }

  const { metrics } = new SemanticAnalyzer({ sink: discard }).analyze(program);
  out.write(`${JSON.stringify(metrics)}\n`);
}
