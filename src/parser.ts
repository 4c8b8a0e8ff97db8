/**
 * Brook Language Parser - 主入口
 * 负责驱动语句序列解析，并把解析失败转换为诊断
 *
 * - `parseProgram()`: 纯函数式入口，返回 ParseResult（成功时游标位于输入末尾）
 * - `parse()`: 面向宿主的入口，返回 AST + 诊断，语法错误不抛异常
 * - `parseOrThrow()`: 失败时抛出 DiagnosticError
 */

import { performance } from 'node:perf_hooks';
import type { Position, Program } from './types.js';
import { Node } from './ast/ast.js';
import { DiagnosticError, type Diagnostic } from './diagnostics/diagnostics.js';
import { ConfigService } from './config/config-service.js';
import { createLogger, logParseSummary, logParseTiming, LogLevel } from './utils/logger.js';
import { createCursor, positionOf, SourceText } from './parser/cursor.js';
import { context, endOfInput, map } from './parser/combinators.js';
import { renderFailure, type ParseResult, type Parser } from './parser/failure.js';
import { failureToDiagnostic } from './parser/failure-report.js';
import { statementSequence } from './parser/stmt-parser.js';

const programRule: Parser<Program> = context(
  'program',
  map(statementSequence(endOfInput, 'end of input'), (statements, span) =>
    Node.Program(statements, span)
  )
);

/**
 * 解析整个文本缓冲区
 *
 * @param source 源文本（或已建立行索引的 SourceText）
 * @param offset 起始偏移量（默认 0）
 */
export function parseProgram(source: string | SourceText, offset = 0): ParseResult<Program> {
  return programRule(createCursor(source, offset));
}

export interface ParseOptions {
  /** 起始偏移量 */
  offset?: number;
  /** 源文件路径，仅用于日志 */
  file?: string;
}

/**
 * 解析结果
 *
 * 失败时 ast 为 null（不返回部分 AST），diagnostics 恰含一条由失败转换而来的诊断。
 */
export interface ParseOutcome {
  ast: Program | null;
  diagnostics: Diagnostic[];
  /** 成功时为输入末尾，失败时为检测到错误的位置 */
  end: Position;
}

export function parse(source: string, options: ParseOptions = {}): ParseOutcome {
  const config = ConfigService.getInstance();
  const logger = createLogger('parser');
  const text = new SourceText(source, options.file ?? null);
  const startedAt = performance.now();
  const result = parseProgram(text, options.offset ?? 0);
  const durationMs = performance.now() - startedAt;
  const file = text.file ?? '<input>';

  if (config.debugParser) {
    logParseTiming({ file, durationMs });
  }

  if (result.ok) {
    logParseSummary(logger, {
      outcome: 'completed',
      file,
      statements: result.value.statements.length,
      durationMs,
    });
    return { ast: result.value, diagnostics: [], end: positionOf(result.cursor) };
  }

  const diagnostic = failureToDiagnostic(result.failure, text);
  // 轨迹只在会被写出时渲染
  const withTrail = config.debugParser && logger.isEnabled(LogLevel.DEBUG);
  logParseSummary(logger, {
    outcome: 'failed',
    file,
    code: diagnostic.code,
    durationMs,
    ...(withTrail ? { trail: renderFailure(result.failure) } : {}),
  });
  return { ast: null, diagnostics: [diagnostic], end: diagnostic.span.start };
}

export function parseOrThrow(source: string, options: ParseOptions = {}): Program {
  const { ast, diagnostics } = parse(source, options);
  const [first] = diagnostics;
  if (first !== undefined) throw new DiagnosticError(first);
  if (ast === null) throw new Error('parse produced neither an AST nor a diagnostic');
  return ast;
}
