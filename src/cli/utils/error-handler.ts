import type { Diagnostic } from '../../diagnostics/diagnostics.js';
import { DiagnosticCode, DiagnosticError } from '../../diagnostics/diagnostics.js';
import { error as logError, warn as logWarn } from './logger.js';

type CliErrorCategory = 'semantic' | 'tree' | 'input' | 'unknown';

interface DiagnosticCarrier extends Error {
  diagnostics?: Diagnostic[];
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(DiagnosticCode));

function isDiagnostic(value: unknown): value is Diagnostic {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    typeof value.code === 'string' &&
    KNOWN_CODES.has(value.code) &&
    'message' in value &&
    typeof value.message === 'string'
  );
}

function isDiagnosticArray(value: unknown): value is Diagnostic[] {
  return Array.isArray(value) && value.every(isDiagnostic);
}

function isDiagnosticCarrier(error: unknown): error is DiagnosticCarrier {
  return error instanceof Error && 'diagnostics' in error && isDiagnosticArray(error.diagnostics);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

function classify(code: DiagnosticCode): CliErrorCategory {
  if (code.startsWith('S')) return 'semantic';
  if (code.startsWith('A')) return 'tree';
  if (code.startsWith('J')) return 'input';
  return 'unknown';
}

function hintFor(code: DiagnosticCode): string | null {
  switch (classify(code)) {
    case 'tree':
      return '语法树结构不符合文法，请检查解析器输出';
    case 'input':
      return 'AST JSON 不符合 ast.schema.json，请按照 schema 修复后重试';
    default:
      return null;
  }
}

function printDiagnostics(diags: readonly Diagnostic[]): void {
  for (const diag of diags) {
    logError(`[${diag.code}] ${diag.message}`);
    const hint = hintFor(diag.code);
    if (hint) {
      logWarn(hint);
    }
  }
}

export function createDiagnosticsError(diagnostics: Diagnostic[]): Error {
  const carrier: DiagnosticCarrier = new Error('CLI_DIAGNOSTIC_ERROR');
  carrier.diagnostics = diagnostics;
  return carrier;
}

/** 输出错误并以退出码 1 结束进程；语义错误只打印原始消息，不附加提示 */
export function handleError(error: unknown): void {
  if (error instanceof DiagnosticError) {
    printDiagnostics([error.diagnostic]);
  } else if (isDiagnosticCarrier(error)) {
    printDiagnostics(error.diagnostics ?? []);
  } else if (isDiagnosticArray(error)) {
    printDiagnostics(error);
  } else if (isNodeError(error)) {
    logError(`文件系统错误(${error.code ?? 'UNKNOWN'})：${error.message}`);
  } else if (error instanceof Error) {
    logError(error.message);
  } else {
    logError('发生未知错误，请重试');
  }
  process.exit(1);
}
