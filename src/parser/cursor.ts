import type { Position } from '../types.js';

/**
 * 源文本及其行索引
 *
 * 每个编译单元构造一次，之后只读；多个并发解析可以共享同一个实例。
 */
export class SourceText {
  readonly text: string;
  readonly file: string | null;
  /** 每一行首字符的偏移量，lineStarts[0] 恒为 0 */
  private readonly lineStarts: readonly number[];

  constructor(text: string, file: string | null = null) {
    this.text = text;
    this.file = file;
    const starts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) starts.push(i + 1);
    }
    this.lineStarts = starts;
  }

  get length(): number {
    return this.text.length;
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  /**
   * 将偏移量换算为 1-based 行列号（二分查找行索引）
   */
  positionAt(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineStarts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    const lineStart = this.lineStarts[low] ?? 0;
    return { line: low + 1, col: clamped - lineStart + 1, offset: clamped };
  }

  /** 取第 line 行（1-based）的文本，不含换行符 */
  lineText(line: number): string {
    const start = this.lineStarts[line - 1];
    if (start === undefined) return '';
    const next = this.lineStarts[line];
    const end = next === undefined ? this.text.length : next - 1;
    return this.text.slice(start, end).replace(/\r$/, '');
  }
}

/**
 * 输入游标：剩余输入的不可变视图
 *
 * 游标只是数据，前进总是产生新游标；成功解析返回的游标不会早于其来源游标。
 * depth 记录当前所处的括号/块嵌套层数，由 nested 组合子维护。
 */
export interface Cursor {
  readonly source: SourceText;
  readonly offset: number;
  readonly depth: number;
}

export function createCursor(source: string | SourceText, offset = 0): Cursor {
  const text = typeof source === 'string' ? new SourceText(source) : source;
  if (!Number.isInteger(offset) || offset < 0 || offset > text.length) {
    throw new RangeError(`Cursor offset ${offset} is outside the source (length ${text.length})`);
  }
  return { source: text, offset, depth: 0 };
}

export function advance(cursor: Cursor, count: number): Cursor {
  if (count === 0) return cursor;
  return {
    source: cursor.source,
    offset: Math.min(cursor.offset + count, cursor.source.length),
    depth: cursor.depth,
  };
}

/** 同一位置、不同嵌套层数的游标 */
export function atDepth(cursor: Cursor, depth: number): Cursor {
  return depth === cursor.depth ? cursor : { ...cursor, depth };
}

export function isAtEnd(cursor: Cursor): boolean {
  return cursor.offset >= cursor.source.length;
}

export function remaining(cursor: Cursor): string {
  return cursor.source.text.slice(cursor.offset);
}

export function startsWith(cursor: Cursor, text: string): boolean {
  return cursor.source.text.startsWith(text, cursor.offset);
}

/** 查看游标后第 ahead 个字符；越界时返回空串 */
export function peekChar(cursor: Cursor, ahead = 0): string {
  return cursor.source.text.charAt(cursor.offset + ahead);
}

export function positionOf(cursor: Cursor): Position {
  return cursor.source.positionAt(cursor.offset);
}

export function sliceBetween(start: Cursor, end: Cursor): string {
  return start.source.text.slice(start.offset, end.offset);
}
