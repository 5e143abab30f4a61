// Structured diagnostics with error codes and optional spans

import type { Position, Span } from '../types.js';

export enum DiagnosticSeverity {
  Error = 'error',
}

export enum DiagnosticCode {
  // Tree shape errors (A001-A099)
  A001_MalformedTree = 'A001',

  // Semantic errors (S001-S199)
  S001_UndefinedIdentifier = 'S001',
  S002_InvalidExpressionType = 'S002',
  S003_MultipleDeclaration = 'S003',
  S004_InvalidConditionType = 'S004',
  S005_InvalidAssignmentType = 'S005',
  S006_ReturnTypeMismatch = 'S006',
  S007_ReturnOutsideFunction = 'S007',

  // AST JSON envelope errors (J001-J099)
  J001_InvalidAstJson = 'J001',
  J002_UnsupportedVersion = 'J002',
  J003_AstFileNotFound = 'J003',
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span?: Span;
  readonly data?: Readonly<Record<string, unknown>>;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get code(): DiagnosticCode {
    return this.diagnostic.code;
  }

  get pos(): Position | undefined {
    return this.diagnostic.span?.start;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private data: Record<string, unknown> = {};

  static error(code: DiagnosticCode): DiagnosticBuilder {
    return new DiagnosticBuilder().withSeverity(DiagnosticSeverity.Error).withCode(code);
  }

  withSeverity(severity: DiagnosticSeverity): DiagnosticBuilder {
    this.severity = severity;
    return this;
  }

  withCode(code: DiagnosticCode): DiagnosticBuilder {
    this.code = code;
    return this;
  }

  withMessage(message: string): DiagnosticBuilder {
    this.message = message;
    return this;
  }

  /** 节点可能不带位置信息，此时保持 span 缺省 */
  withSpan(span: Span | undefined): DiagnosticBuilder {
    if (span) this.span = span;
    return this;
  }

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  withData(key: string, value: unknown): DiagnosticBuilder {
    this.data[key] = value;
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      ...(this.span ? { span: this.span } : {}),
      ...(Object.keys(this.data).length > 0 ? { data: { ...this.data } } : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
export const Diagnostics = {
  undefinedIdentifier: (name: string, span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S001_UndefinedIdentifier)
      .withMessage(`Invalid use of undefined Identifier ${name}`)
      .withSpan(span)
      .withData('name', name),

  invalidExpressionType: (span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S002_InvalidExpressionType)
      .withMessage('Invalid type in expression')
      .withSpan(span),

  multipleDeclaration: (name: string, span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S003_MultipleDeclaration)
      .withMessage(`Identifier ${name} has multiple declarations`)
      .withSpan(span)
      .withData('name', name),

  invalidConditionType: (span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S004_InvalidConditionType)
      .withMessage('Invalid type in condition')
      .withSpan(span),

  invalidAssignmentType: (name: string, span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S005_InvalidAssignmentType)
      .withMessage(`Invalid type in assignation of Identifier ${name}`)
      .withSpan(span)
      .withData('name', name),

  returnTypeMismatch: (span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S006_ReturnTypeMismatch)
      .withMessage('Return type does not match function type')
      .withSpan(span),

  returnOutsideFunction: (span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.S007_ReturnOutsideFunction)
      .withMessage('Return statement outside of function')
      .withSpan(span),

  malformedTree: (detail: string, span?: Span): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.A001_MalformedTree)
      .withMessage(`Malformed tree: ${detail}`)
      .withSpan(span),

  // AST JSON envelope
  invalidAstJson: (detail: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.J001_InvalidAstJson)
      .withMessage(`Invalid AST JSON: ${detail}`)
      .withPosition(dummyPosition()),

  unsupportedVersion: (version: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.J002_UnsupportedVersion)
      .withMessage(`Unsupported AST JSON version: ${version}`)
      .withPosition(dummyPosition())
      .withData('version', version),

  astFileNotFound: (path: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.J003_AstFileNotFound)
      .withMessage(`AST file not found: ${path}`)
      .withPosition(dummyPosition())
      .withData('path', path),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const { severity, code, message, span } = diagnostic;
  const result = `${severity} ${code}: ${message}`;
  if (!span) return result;
  return `${result} at ${span.start.line}:${span.start.col}`;
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1 };
}
