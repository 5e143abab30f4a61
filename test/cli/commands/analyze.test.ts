import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { fileURLToPath } from 'node:url';
import { analyzeCommand } from '../../../src/cli/commands/analyze.js';
import { handleError } from '../../../src/cli/utils/error-handler.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { DiagnosticCode, DiagnosticError } from '../../../src/diagnostics/diagnostics.js';
import { TestFactories } from '../../helpers/test-factories.js';

const fixture = (name: string): string => fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

class ExitSignal extends Error {
  constructor(readonly code: number) {
    super('exit');
  }
}

const ENV_KEYS = ['LOG_LEVEL', 'NO_COLOR'];

describe('analyzeCommand', { concurrency: false }, () => {
  const originalEnv: Record<string, string | undefined> = Object.fromEntries(
    ENV_KEYS.map((key) => [key, process.env[key]])
  );

  beforeEach(() => {
    // 性能日志与颜色都会混入断言的输出
    process.env.LOG_LEVEL = 'ERROR';
    process.env.NO_COLOR = '1';
    ConfigService.resetForTesting();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = originalEnv[key];
      if (typeof value === 'undefined') {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    ConfigService.resetForTesting();
    mock.restoreAll();
  });

  it('默认输出统计行', () => {
    const sink = TestFactories.createSink();
    analyzeCommand(fixture('while-loop.ast.json'), {}, sink);
    assert.deepEqual(sink.output, ['{VAR:1, WHILE:1, IF:0, FUNC:0, OP:2}\n']);
  });

  it('--json 只输出一行 JSON 统计', () => {
    const sink = TestFactories.createSink();
    analyzeCommand(fixture('while-loop.ast.json'), { json: true }, sink);
    assert.deepEqual(sink.output, ['{"VAR":1,"WHILE":1,"IF":0,"FUNC":0,"OP":2}\n']);
  });

  it('语义错误以 ✗ [S003] 输出并以退出码 1 结束', () => {
    const sink = TestFactories.createSink();
    const errors: string[] = [];
    mock.method(process, 'exit', (code?: number) => {
      throw new ExitSignal(code ?? 0);
    });
    mock.method(console, 'error', (message?: unknown) => {
      errors.push(String(message ?? ''));
    });

    let failure: unknown;
    try {
      analyzeCommand(fixture('duplicate-declaration.ast.json'), {}, sink);
    } catch (error) {
      failure = error;
    }
    assert.ok(failure instanceof DiagnosticError);
    assert.equal(failure.code, DiagnosticCode.S003_MultipleDeclaration);

    assert.throws(() => handleError(failure), (error: unknown) => error instanceof ExitSignal && error.code === 1);
    assert.deepEqual(errors, ['✗ [S003] Identifier a has multiple declarations']);
    assert.deepEqual(sink.output, []);
  });

  it('文件不存在时抛出携带 J003 的诊断', () => {
    const missing = fixture('missing.ast.json');
    assert.throws(
      () => analyzeCommand(missing, {}, TestFactories.createSink()),
      (error: unknown) =>
        error instanceof Error &&
        'diagnostics' in error &&
        Array.isArray(error.diagnostics) &&
        error.diagnostics.length === 1
    );
  });
});
