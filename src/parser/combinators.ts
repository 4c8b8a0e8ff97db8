/**
 * 解析组合子工具集
 *
 * 每个组合子都是游标到 ParseResult 的纯函数：不修改共享状态，
 * 失败时不返回游标，调用方始终从自己持有的原游标重试。
 */

import type { Span } from '../types.js';
import {
  advance,
  atDepth,
  isAtEnd,
  peekChar,
  sliceBetween,
  startsWith,
  type Cursor,
} from './cursor.js';
import {
  commit,
  failAt,
  failCommitted,
  succeed,
  withFrame,
  type FailureCause,
  type ParseFailure,
  type Parser,
} from './failure.js';
import { spanBetween } from './span-utils.js';

const WHITESPACE = /\s/;
const IDENT_START = /[A-Za-z_]/;
const IDENT_CONTINUE = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

export function isWhitespace(ch: string): boolean {
  return ch !== '' && WHITESPACE.test(ch);
}

export function isIdentStart(ch: string): boolean {
  return ch !== '' && IDENT_START.test(ch);
}

export function isIdentContinue(ch: string): boolean {
  return ch !== '' && IDENT_CONTINUE.test(ch);
}

export function isDigit(ch: string): boolean {
  return ch !== '' && DIGIT.test(ch);
}

// ============================================================
// PRIMITIVES
// ============================================================

/** 精确匹配 text，失败原因为 ExpectedLiteral(text) */
export function literal(text: string): Parser<string> {
  return (cursor) =>
    startsWith(cursor, text)
      ? succeed(advance(cursor, text.length), text)
      : failAt({ kind: 'ExpectedLiteral', literal: text }, cursor.offset);
}

/**
 * 匹配 text，但要求其后紧跟的字符不满足 forbidden；
 * 用于关键字词边界以及区分 `=` 与 `==`。
 */
export function literalNotFollowedBy(
  text: string,
  forbidden: (ch: string) => boolean
): Parser<string> {
  return (cursor) => {
    if (startsWith(cursor, text) && !forbidden(peekChar(cursor, text.length))) {
      return succeed(advance(cursor, text.length), text);
    }
    return failAt({ kind: 'ExpectedLiteral', literal: text }, cursor.offset);
  };
}

/** 关键字：`continue` 不会匹配 `continued` 的前缀 */
export function keyword(word: string): Parser<string> {
  return literalNotFollowedBy(word, isIdentContinue);
}

/** 零个或多个空白字符，永不失败 */
export const ws0: Parser<null> = (cursor) => {
  let current = cursor;
  while (isWhitespace(peekChar(current))) {
    current = advance(current, 1);
  }
  return succeed(current, null);
};

/** 空白与 `//` 行注释，永不失败 */
export const trivia0: Parser<null> = (cursor) => {
  let current = cursor;
  for (;;) {
    const afterSpace = ws0(current);
    if (afterSpace.ok) current = afterSpace.cursor;
    if (!startsWith(current, '//')) return succeed(current, null);
    let end = current;
    while (!isAtEnd(end) && peekChar(end) !== '\n') {
      end = advance(end, 1);
    }
    current = end;
  }
};

export function satisfy(predicate: (ch: string) => boolean, description: string): Parser<string> {
  return (cursor) => {
    const ch = peekChar(cursor);
    if (ch !== '' && predicate(ch)) return succeed(advance(cursor, 1), ch);
    return failAt({ kind: 'ExpectedToken', description }, cursor.offset);
  };
}

export function takeWhile0(predicate: (ch: string) => boolean): Parser<string> {
  return (cursor) => {
    let current = cursor;
    while (!isAtEnd(current) && predicate(peekChar(current))) {
      current = advance(current, 1);
    }
    return succeed(current, sliceBetween(cursor, current));
  };
}

export const endOfInput: Parser<null> = (cursor) =>
  isAtEnd(cursor)
    ? succeed(cursor, null)
    : failAt({ kind: 'ExpectedToken', description: 'end of input' }, cursor.offset);

// ============================================================
// SEQUENCING
// ============================================================

export function sequence<A, B>(a: Parser<A>, b: Parser<B>): Parser<[A, B]>;
export function sequence<A, B, C>(a: Parser<A>, b: Parser<B>, c: Parser<C>): Parser<[A, B, C]>;
export function sequence<A, B, C, D>(
  a: Parser<A>,
  b: Parser<B>,
  c: Parser<C>,
  d: Parser<D>
): Parser<[A, B, C, D]>;
export function sequence<A, B, C, D, E>(
  a: Parser<A>,
  b: Parser<B>,
  c: Parser<C>,
  d: Parser<D>,
  e: Parser<E>
): Parser<[A, B, C, D, E]>;
export function sequence<A, B, C, D, E, F>(
  a: Parser<A>,
  b: Parser<B>,
  c: Parser<C>,
  d: Parser<D>,
  e: Parser<E>,
  f: Parser<F>
): Parser<[A, B, C, D, E, F]>;
export function sequence<A, B, C, D, E, F, G>(
  a: Parser<A>,
  b: Parser<B>,
  c: Parser<C>,
  d: Parser<D>,
  e: Parser<E>,
  f: Parser<F>,
  g: Parser<G>
): Parser<[A, B, C, D, E, F, G]>;
export function sequence(...parsers: Parser<unknown>[]): Parser<unknown[]> {
  return (cursor) => {
    const values: unknown[] = [];
    let current = cursor;
    for (const parser of parsers) {
      const result = parser(current);
      if (!result.ok) return result;
      values.push(result.value);
      current = result.cursor;
    }
    return succeed(current, values);
  };
}

export function preceded<A, B>(first: Parser<A>, second: Parser<B>): Parser<B> {
  return (cursor) => {
    const head = first(cursor);
    if (!head.ok) return head;
    return second(head.cursor);
  };
}

export function terminated<A, B>(first: Parser<A>, second: Parser<B>): Parser<A> {
  return (cursor) => {
    const head = first(cursor);
    if (!head.ok) return head;
    const tail = second(head.cursor);
    if (!tail.ok) return tail;
    return succeed(tail.cursor, head.value);
  };
}

export function delimited<A, B, C>(open: Parser<A>, inner: Parser<B>, close: Parser<C>): Parser<B> {
  return preceded(open, terminated(inner, close));
}

// ============================================================
// CHOICE & REPETITION
// ============================================================

function flattenCauses(causes: readonly FailureCause[]): FailureCause[] {
  return causes.flatMap((cause) =>
    cause.kind === 'AllAlternativesFailed' ? flattenCauses(cause.alternatives) : [cause]
  );
}

/**
 * 按给定顺序在同一起始游标上尝试各分支，返回第一个成功。
 *
 * 已提交的失败立即返回；全部失败时返回走得最远的失败（同距离取先出现者），
 * 若没有任何分支越过起点，则合并为 AllAlternativesFailed。
 */
export function alternation<T>(...parsers: Parser<T>[]): Parser<T> {
  if (parsers.length === 0) {
    throw new Error('alternation requires at least one parser');
  }
  return (cursor) => {
    let best: ParseFailure | null = null;
    const causes: FailureCause[] = [];
    for (const parser of parsers) {
      const result = parser(cursor);
      if (result.ok || result.failure.committed) return result;
      causes.push(result.failure.cause);
      if (best === null || result.failure.offset > best.offset) {
        best = result.failure;
      }
    }
    if (best !== null && (best.offset > cursor.offset || parsers.length === 1)) {
      return { ok: false, failure: best };
    }
    return failAt(
      { kind: 'AllAlternativesFailed', alternatives: flattenCauses(causes) },
      cursor.offset
    );
  };
}

export function optional<T>(parser: Parser<T>): Parser<T | null> {
  return (cursor) => {
    const result = parser(cursor);
    if (result.ok || result.failure.committed) return result;
    return succeed(cursor, null);
  };
}

/**
 * 重复直到 parser 失败；最后一次失败的尝试被丢弃，游标停在最后一次成功处。
 * 零宽成功会终止循环。
 */
export function many0<T>(parser: Parser<T>): Parser<T[]> {
  return (cursor) => {
    const values: T[] = [];
    let current = cursor;
    for (;;) {
      const result = parser(current);
      if (!result.ok) {
        return result.failure.committed ? result : succeed(current, values);
      }
      if (result.cursor.offset === current.offset) return succeed(current, values);
      values.push(result.value);
      current = result.cursor;
    }
  };
}

export function separatedList0<T, S>(item: Parser<T>, separator: Parser<S>): Parser<T[]> {
  const rest = many0(preceded(separator, item));
  return (cursor) => {
    const first = item(cursor);
    if (!first.ok) {
      return first.failure.committed ? first : succeed(cursor, []);
    }
    const tail = rest(first.cursor);
    if (!tail.ok) return tail;
    return succeed(tail.cursor, [first.value, ...tail.value]);
  };
}

// ============================================================
// TRANSFORMS & ANNOTATION
// ============================================================

export function map<T, U>(parser: Parser<T>, transform: (value: T, span: Span) => U): Parser<U> {
  return (cursor) => {
    const result = parser(cursor);
    if (!result.ok) return result;
    return succeed(result.cursor, transform(result.value, spanBetween(cursor, result.cursor)));
  };
}

/** 返回 parser 消费的原文 */
export function recognize<T>(parser: Parser<T>): Parser<string> {
  return (cursor) => {
    const result = parser(cursor);
    if (!result.ok) return result;
    return succeed(result.cursor, sliceBetween(cursor, result.cursor));
  };
}

/**
 * 失败时压入 (label, 起始偏移) 上下文帧；成功原样透传
 */
export function context<T>(label: string, parser: Parser<T>): Parser<T> {
  return (cursor) => {
    const result = parser(cursor);
    if (result.ok) return result;
    return { ok: false, failure: withFrame(result.failure, label, cursor.offset) };
  };
}

/** 提交：parser 的任何失败都不再允许外层分支回溯 */
export function cut<T>(parser: Parser<T>): Parser<T> {
  return (cursor) => {
    const result = parser(cursor);
    if (result.ok) return result;
    return { ok: false, failure: commit(result.failure) };
  };
}

/** 括号、调用参数、一元前缀、赋值右侧、块与 else if 共享的嵌套上限 */
export const MAX_NESTING_DEPTH = 128;

/**
 * 进入一层嵌套：parser 在 depth + 1 上运行，成功后游标恢复到原层数。
 * 超出 MAX_NESTING_DEPTH 时以已提交的 ExpectedToken 失败，递归不会耗尽调用栈。
 */
export function nested<T>(parser: Parser<T>): Parser<T> {
  return (cursor) => {
    if (cursor.depth >= MAX_NESTING_DEPTH) {
      return failCommitted(
        { kind: 'ExpectedToken', description: `nesting depth <= ${MAX_NESTING_DEPTH}` },
        cursor.offset
      );
    }
    const result = parser(atDepth(cursor, cursor.depth + 1));
    if (!result.ok) return result;
    return succeed(atDepth(result.cursor, cursor.depth), result.value);
  };
}

/**
 * 未越过起点的非提交失败改写为 ExpectedToken(description)
 */
export function expecting<T>(description: string, parser: Parser<T>): Parser<T> {
  return (cursor) => {
    const result = parser(cursor);
    if (result.ok || result.failure.committed || result.failure.offset > cursor.offset) {
      return result;
    }
    return failAt({ kind: 'ExpectedToken', description }, cursor.offset);
  };
}
