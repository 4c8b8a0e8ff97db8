// Structured diagnostics with error codes, spans, and fix-its

import type { Position, Span } from '../types.js';
import { SourceText } from '../parser/cursor.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
  Hint = 'hint',
}

export enum DiagnosticCode {
  // Parser errors (P001-P199)
  P001_ExpectedIdentifier = 'P001',
  P003_ExpectedToken = 'P003',
  P004_ExpectedKeyword = 'P004',
  P006_ExpectedPunctuation = 'P006',
  P007_ExpectedExpression = 'P007',
  P012_UnexpectedEndOfInput = 'P012',
  P015_UnterminatedBlock = 'P015',
  P016_NoViableAlternative = 'P016',

  // AST interchange errors (A001-A099)
  A001_InvalidAstJson = 'A001',
  A002_UnsupportedAstVersion = 'A002',
}

export interface FixIt {
  readonly description: string;
  readonly span: Span;
  readonly replacement: string;
}

export interface RelatedInformation {
  readonly span: Span;
  readonly message: string;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly code: DiagnosticCode;
  readonly message: string;
  readonly span: Span;
  readonly fixIts?: readonly FixIt[];
  readonly relatedInformation?: readonly RelatedInformation[];
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

export class DiagnosticBuilder {
  private severity: DiagnosticSeverity = DiagnosticSeverity.Error;
  private code?: DiagnosticCode;
  private message?: string;
  private span?: Span;
  private fixIts: FixIt[] = [];
  private relatedInformation: RelatedInformation[] = [];

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

  withPosition(pos: Position): DiagnosticBuilder {
    this.span = { start: pos, end: pos };
    return this;
  }

  withFixIt(description: string, span: Span, replacement: string): DiagnosticBuilder {
    this.fixIts.push({ description, span, replacement });
    return this;
  }

  withRelated(span: Span, message: string): DiagnosticBuilder {
    this.relatedInformation.push({ span, message });
    return this;
  }

  build(): Diagnostic {
    if (!this.code) throw new Error('Diagnostic code is required');
    if (!this.message) throw new Error('Diagnostic message is required');
    if (!this.span) throw new Error('Diagnostic span is required');

    return {
      severity: this.severity,
      code: this.code,
      message: this.message,
      span: this.span,
      ...(this.fixIts.length > 0 ? { fixIts: [...this.fixIts] } : {}),
      ...(this.relatedInformation.length > 0
        ? { relatedInformation: [...this.relatedInformation] }
        : {}),
    };
  }

  throw(): never {
    throw new DiagnosticError(this.build());
  }
}

// Common diagnostic patterns
// 解析失败的诊断以失败面包屑为消息，由 failure-report 直接构造
export const Diagnostics = {
  // AST interchange errors
  invalidAstJson: (detail: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.A001_InvalidAstJson)
      .withMessage(`Invalid AST JSON: ${detail}`)
      .withPosition(dummyPosition()),

  unsupportedAstVersion: (version: string): DiagnosticBuilder =>
    DiagnosticBuilder.error(DiagnosticCode.A002_UnsupportedAstVersion)
      .withMessage(`Unsupported AST JSON version: ${version}`)
      .withPosition(dummyPosition()),
};

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string | SourceText): string {
  const { severity, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;

  let result = `${severity} ${code}: ${message} at ${pos}`;

  if (source !== undefined && diagnostic.fixIts && diagnostic.fixIts.length > 0) {
    result += '\n\nSuggested fixes:';
    for (const fixIt of diagnostic.fixIts) {
      result += `\n  - ${fixIt.description}: "${fixIt.replacement}"`;
    }
  }

  if (source !== undefined) {
    const text = typeof source === 'string' ? new SourceText(source) : source;
    // 诊断可能来自另一份缓冲区，超出行数时不输出源码行
    const line = span.start.line <= text.lineCount ? text.lineText(span.start.line) : '';
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(span.start.col - 1)}^`;
    }
  }

  return result;
}

// Utility to create a dummy position for diagnostics without source location
export function dummyPosition(): Position {
  return { line: 1, col: 1, offset: 0 };
}
