import type { Position, Span } from '../types.js';
import { positionOf, type Cursor } from './cursor.js';

type SpanSource = Cursor | { span: Span };

function isBefore(a: Position, b: Position): boolean {
  return a.offset < b.offset;
}

function isAfter(a: Position, b: Position): boolean {
  return a.offset > b.offset;
}

function toSpan(source: SpanSource): Span {
  if ('span' in source) {
    return source.span;
  }
  const pos = positionOf(source);
  return { start: pos, end: pos };
}

export function spanBetween(start: Cursor, end: Cursor): Span {
  return { start: positionOf(start), end: positionOf(end) };
}

export function pointSpan(pos: Position): Span {
  return { start: pos, end: pos };
}

/** 取覆盖所有来源的最小区间 */
export function spanFromSources(first: SpanSource, ...rest: SpanSource[]): Span {
  let { start, end } = toSpan(first);
  for (const source of rest) {
    const span = toSpan(source);
    if (isBefore(span.start, start)) start = span.start;
    if (isAfter(span.end, end)) end = span.end;
  }
  return { start, end };
}
