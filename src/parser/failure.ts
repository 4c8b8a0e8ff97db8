/**
 * 解析失败与上下文帧
 *
 * 失败是普通的值，沿返回通道向外传播；任何一层都不会把失败写入全局状态。
 */

import type { Cursor } from './cursor.js';

export type FailureCause =
  | { readonly kind: 'ExpectedLiteral'; readonly literal: string }
  | { readonly kind: 'ExpectedToken'; readonly description: string }
  | { readonly kind: 'UnexpectedEndOfInput'; readonly expected: string }
  | { readonly kind: 'UnterminatedBlock'; readonly expected: string }
  | { readonly kind: 'AllAlternativesFailed'; readonly alternatives: readonly FailureCause[] };

export interface ContextFrame {
  readonly label: string;
  /** 该产生式开始处的偏移量 */
  readonly offset: number;
}

export interface ParseFailure {
  readonly cause: FailureCause;
  /** 检测到终止原因的位置，用于最长匹配比较 */
  readonly offset: number;
  /** 由内向外排列：frames[0] 是最具体的产生式 */
  readonly frames: readonly ContextFrame[];
  /** 已提交的失败不会被 alternation / optional / many0 恢复 */
  readonly committed: boolean;
}

export type ParseResult<T> =
  | { readonly ok: true; readonly cursor: Cursor; readonly value: T }
  | { readonly ok: false; readonly failure: ParseFailure };

/**
 * 每个产生式都满足的签名。
 *
 * 产生式之间互相递归（块包含语句，语句包含块），按此签名前置声明，
 * 分派器可以在所有产生式定义之后再组装。
 */
export type Parser<T> = (cursor: Cursor) => ParseResult<T>;

export function succeed<T>(cursor: Cursor, value: T): ParseResult<T> {
  return { ok: true, cursor, value };
}

export function failAt<T>(cause: FailureCause, offset: number): ParseResult<T> {
  return { ok: false, failure: { cause, offset, frames: [], committed: false } };
}

/** 已提交的失败：用于一旦出错就不应再尝试其他分支的位置 */
export function failCommitted<T>(cause: FailureCause, offset: number): ParseResult<T> {
  return { ok: false, failure: { cause, offset, frames: [], committed: true } };
}

export function withFrame(failure: ParseFailure, label: string, offset: number): ParseFailure {
  return { ...failure, frames: [...failure.frames, { label, offset }] };
}

export function commit(failure: ParseFailure): ParseFailure {
  return failure.committed ? failure : { ...failure, committed: true };
}

/** 最内层（最具体）的上下文帧 */
export function innermostFrame(failure: ParseFailure): ContextFrame | undefined {
  return failure.frames[0];
}

function quote(text: string): string {
  return `'${text}'`;
}

/** 原因的"期望"描述，供 AllAlternativesFailed 合并使用 */
export function expectationsOf(cause: FailureCause): string[] {
  switch (cause.kind) {
    case 'ExpectedLiteral':
      return [quote(cause.literal)];
    case 'ExpectedToken':
      return [cause.description];
    case 'UnexpectedEndOfInput':
    case 'UnterminatedBlock':
      return [quote(cause.expected)];
    case 'AllAlternativesFailed': {
      const all = cause.alternatives.flatMap(expectationsOf);
      return [...new Set(all)];
    }
  }
}

export function describeCause(cause: FailureCause): string {
  switch (cause.kind) {
    case 'ExpectedLiteral':
      return `expected ${quote(cause.literal)}`;
    case 'ExpectedToken':
      return `expected ${cause.description}`;
    case 'UnexpectedEndOfInput':
      return `unexpected end of input, expected ${quote(cause.expected)}`;
    case 'UnterminatedBlock':
      return `unterminated block, expected ${quote(cause.expected)}`;
    case 'AllAlternativesFailed':
      return `expected one of ${expectationsOf(cause).join(', ')}`;
  }
}

/** 面包屑：`program: block: continue_statement: expected ';'` */
export function describeFailure(failure: ParseFailure): string {
  const labels = [...failure.frames].reverse().map((frame) => frame.label);
  return [...labels, describeCause(failure.cause)].join(': ');
}

/**
 * 渲染为 `<最外层>: … <最内层>: expected <token> at offset <N>`
 */
export function renderFailure(failure: ParseFailure): string {
  return `${describeFailure(failure)} at offset ${failure.offset}`;
}
