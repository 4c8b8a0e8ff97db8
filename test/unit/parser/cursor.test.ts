import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  SourceText,
  advance,
  atDepth,
  createCursor,
  isAtEnd,
  peekChar,
  positionOf,
  remaining,
  sliceBetween,
  startsWith,
} from '../../../src/parser/cursor.js';

describe('SourceText', () => {
  it('应该把偏移量换算为 1-based 行列号', () => {
    const source = new SourceText('ab\ncd');

    assert.deepEqual(source.positionAt(0), { line: 1, col: 1, offset: 0 });
    assert.deepEqual(source.positionAt(2), { line: 1, col: 3, offset: 2 });
    assert.deepEqual(source.positionAt(3), { line: 2, col: 1, offset: 3 });
    assert.deepEqual(source.positionAt(5), { line: 2, col: 3, offset: 5 });
  });

  it('应该把越界偏移量夹到缓冲区范围内', () => {
    const source = new SourceText('ab\ncd');

    assert.deepEqual(source.positionAt(99), { line: 2, col: 3, offset: 5 });
    assert.deepEqual(source.positionAt(-4), { line: 1, col: 1, offset: 0 });
  });

  it('应该返回不含换行符的行文本', () => {
    const source = new SourceText('a\r\nbc\n');

    assert.equal(source.lineCount, 3);
    assert.equal(source.lineText(1), 'a');
    assert.equal(source.lineText(2), 'bc');
    assert.equal(source.lineText(3), '');
    assert.equal(source.lineText(4), '');
  });

  it('应该记录文件名', () => {
    assert.equal(new SourceText('', 'main.brook').file, 'main.brook');
    assert.equal(new SourceText('').file, null);
  });
});

describe('Cursor', () => {
  it('应该拒绝缓冲区之外的起始偏移量', () => {
    assert.throws(() => createCursor('abc', 4), RangeError);
    assert.throws(() => createCursor('abc', -1), RangeError);
    assert.throws(() => createCursor('abc', 1.5), RangeError);
  });

  it('应该允许游标位于输入末尾', () => {
    const cursor = createCursor('abc', 3);

    assert.equal(isAtEnd(cursor), true);
    assert.equal(peekChar(cursor), '');
    assert.equal(remaining(cursor), '');
  });

  it('前进应该产生新游标而不修改原游标', () => {
    const start = createCursor('continue;');
    const next = advance(start, 8);

    assert.equal(start.offset, 0);
    assert.equal(next.offset, 8);
    assert.equal(next.source, start.source);
    assert.equal(remaining(next), ';');
    assert.equal(sliceBetween(start, next), 'continue');
  });

  it('前进应该保留嵌套层数', () => {
    const start = createCursor('{{x}}');
    assert.equal(start.depth, 0);

    const inner = atDepth(advance(start, 2), 2);
    assert.equal(advance(inner, 1).depth, 2);
    assert.equal(inner.offset, 2);
    assert.equal(atDepth(inner, 2), inner);
  });

  it('前进零步应该返回同一个游标', () => {
    const cursor = createCursor('x');
    assert.equal(advance(cursor, 0), cursor);
  });

  it('前进不应该越过输入末尾', () => {
    assert.equal(advance(createCursor('ab'), 10).offset, 2);
  });

  it('应该支持前瞻与前缀判断', () => {
    const cursor = createCursor('let x');

    assert.equal(peekChar(cursor), 'l');
    assert.equal(peekChar(cursor, 4), 'x');
    assert.equal(peekChar(cursor, 5), '');
    assert.equal(startsWith(cursor, 'let'), true);
    assert.equal(startsWith(advance(cursor, 1), 'let'), false);
  });

  it('应该报告游标所在的位置', () => {
    const cursor = createCursor('x;\n  y;', 5);
    assert.deepEqual(positionOf(cursor), { line: 2, col: 3, offset: 5 });
  });
});
