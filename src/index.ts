/**
 * @module brook-lang
 *
 * Brook 语言语句解析器的主要 API 接口。
 *
 * Brook 是一种小型过程式语言：语句以 `;` 结尾，语句体是 `{ … }` 块。
 * 解析器由纯函数组合子构成，失败沿返回值传播并携带产生式上下文：
 * ```
 * 源文本 → SourceText → Cursor → parseProgram → Program
 *                                  ↘ ParseFailure → Diagnostic
 * ```
 *
 * @example 基础用法
 * ```typescript
 * import { parse, formatDiagnostic } from 'brook-lang';
 *
 * const src = 'loop { continue; }';
 * const { ast, diagnostics } = parse(src);
 * const [first] = diagnostics;
 * if (ast === null && first !== undefined) {
 *   console.error(formatDiagnostic(first, src));
 * }
 * ```
 */

// 解析入口
export { parse, parseProgram, parseOrThrow } from './parser.js';
export type { ParseOptions, ParseOutcome } from './parser.js';
export {
  parseStatement,
  parseBlock,
  ifStatement,
  whileStatement,
  loopStatement,
  breakStatement,
  continueStatement,
  returnStatement,
  letStatement,
  constStatement,
  functionDeclaration,
  expressionStatement,
  statementSequence,
} from './parser/stmt-parser.js';
export { parseExpr, identifier, KEYWORDS } from './parser/expr-parser.js';

// 组合子与游标
export * from './parser/combinators.js';
export {
  SourceText,
  createCursor,
  advance,
  atDepth,
  isAtEnd,
  remaining,
  startsWith,
  peekChar,
  positionOf,
  sliceBetween,
} from './parser/cursor.js';
export type { Cursor } from './parser/cursor.js';
export {
  succeed,
  failAt,
  failCommitted,
  withFrame,
  commit,
  innermostFrame,
  expectationsOf,
  describeCause,
  describeFailure,
  renderFailure,
} from './parser/failure.js';
export type {
  FailureCause,
  ContextFrame,
  ParseFailure,
  ParseResult,
  Parser,
} from './parser/failure.js';
export { failureToDiagnostic } from './parser/failure-report.js';
export { spanBetween, pointSpan, spanFromSources } from './parser/span-utils.js';

// AST
export { Node } from './ast/ast.js';
export { serializeAst, deserializeAst, isValidAstJson } from './ast/ast_json.js';
export type { AstEnvelope } from './ast/ast_json.js';

// 诊断、配置与日志
export * from './diagnostics/index.js';
export { ConfigService } from './config/config-service.js';
export { createLogger, Logger, LogLevel, logParseSummary, logParseTiming } from './utils/logger.js';
export type { LogFields, ParseSummary, ParseTiming } from './utils/logger.js';

// 类型定义重导出
export type * from './types.js';
