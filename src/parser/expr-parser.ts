/**
 * 表达式文法
 *
 * 语句层通过唯一入口 parseExpr 使用本模块。优先级由低到高：
 * 赋值、||、&&、相等、比较、加减、乘除模、一元前缀、调用后缀、基本表达式。
 */

import type { BinaryOperator, Expression, Name, UnaryOperator } from '../types.js';
import { Node } from '../ast/ast.js';
import { advance, isAtEnd, peekChar, type Cursor } from './cursor.js';
import {
  alternation,
  context,
  cut,
  delimited,
  expecting,
  isDigit,
  isIdentContinue,
  isIdentStart,
  keyword,
  literal,
  literalNotFollowedBy,
  many0,
  map,
  nested,
  optional,
  preceded,
  recognize,
  satisfy,
  separatedList0,
  sequence,
  takeWhile0,
  trivia0,
} from './combinators.js';
import { failAt, failCommitted, succeed, type ParseResult, type Parser } from './failure.js';
import { spanBetween, spanFromSources } from './span-utils.js';

export const KEYWORDS: ReadonlySet<string> = new Set([
  'if',
  'else',
  'while',
  'loop',
  'break',
  'continue',
  'return',
  'let',
  'const',
  'fn',
  'true',
  'false',
  'null',
]);

/** 由低到高的二元运算符层级；同层内较长的运算符在前 */
const BINARY_LEVELS: readonly (readonly BinaryOperator[])[] = [
  ['||'],
  ['&&'],
  ['==', '!='],
  ['<=', '>=', '<', '>'],
  ['+', '-'],
  ['*', '/', '%'],
];

const ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '"': '"',
  '\\': '\\',
  '0': '\0',
};

// ============================================================
// IDENTIFIERS & LITERALS
// ============================================================

const identifierText = recognize(
  sequence(satisfy(isIdentStart, 'identifier'), takeWhile0(isIdentContinue))
);

/** 标识符；保留字不是标识符 */
export const identifier: Parser<string> = (cursor) => {
  const result = identifierText(cursor);
  if (result.ok && KEYWORDS.has(result.value)) {
    return failAt({ kind: 'ExpectedToken', description: 'identifier' }, cursor.offset);
  }
  return result;
};

const name: Parser<Name> = map(identifier, (text, span) => Node.Name(text, span));

const numberText = recognize(
  sequence(
    satisfy(isDigit, 'number'),
    takeWhile0(isDigit),
    optional(sequence(literal('.'), satisfy(isDigit, 'digit'), takeWhile0(isDigit)))
  )
);

/** 数字字面量；超出双精度范围（Infinity）的数字串不是合法字面量 */
const numberLiteral: Parser<Expression> = (cursor) => {
  const result = numberText(cursor);
  if (!result.ok) return result;
  const value = Number(result.value);
  if (!Number.isFinite(value)) {
    return failCommitted({ kind: 'ExpectedToken', description: 'finite number' }, cursor.offset);
  }
  return succeed(result.cursor, Node.Number(value, spanBetween(cursor, result.cursor)));
};

/** 双引号字符串；开引号之后即提交 */
const stringLiteral: Parser<Expression> = (cursor) => {
  if (peekChar(cursor) !== '"') {
    return failAt({ kind: 'ExpectedToken', description: 'string' }, cursor.offset);
  }
  let current = advance(cursor, 1);
  let value = '';
  for (;;) {
    if (isAtEnd(current)) {
      return failCommitted({ kind: 'UnexpectedEndOfInput', expected: '"' }, current.offset);
    }
    const ch = peekChar(current);
    if (ch === '"') {
      const end = advance(current, 1);
      return succeed(end, Node.String(value, spanBetween(cursor, end)));
    }
    if (ch === '\\') {
      const escaped = ESCAPES[peekChar(current, 1)];
      if (escaped === undefined) {
        return failCommitted(
          { kind: 'ExpectedToken', description: 'escape sequence' },
          current.offset + 1
        );
      }
      value += escaped;
      current = advance(current, 2);
      continue;
    }
    value += ch;
    current = advance(current, 1);
  }
};

const constantLiteral: Parser<Expression> = alternation<Expression>(
  map(keyword('true'), (_, span) => Node.Bool(true, span)),
  map(keyword('false'), (_, span) => Node.Bool(false, span)),
  map(keyword('null'), (_, span) => Node.Null(span))
);

const parenthesized: Parser<Expression> = preceded(
  literal('('),
  cut(nested(delimited(trivia0, assignment, sequence(trivia0, literal(')')))))
);

const primary: Parser<Expression> = alternation<Expression>(
  numberLiteral,
  stringLiteral,
  constantLiteral,
  name,
  parenthesized
);

// ============================================================
// POSTFIX / UNARY / BINARY
// ============================================================

const callArguments: Parser<Expression[]> = preceded(
  literal('('),
  cut(
    nested(
      delimited(
        trivia0,
        separatedList0(assignment, sequence(trivia0, literal(','), trivia0)),
        sequence(trivia0, literal(')'))
      )
    )
  )
);

const callSuffixes = many0(
  map(preceded(trivia0, callArguments), (args, span) => ({ args, end: span.end }))
);

const postfix: Parser<Expression> = (cursor) => {
  const head = primary(cursor);
  if (!head.ok) return head;
  const calls = callSuffixes(head.cursor);
  if (!calls.ok) return calls;
  const expr = calls.value.reduce<Expression>(
    (callee, call) => Node.Call(callee, call.args, { start: callee.span.start, end: call.end }),
    head.value
  );
  return succeed(calls.cursor, expr);
};

const unaryOperator: Parser<UnaryOperator> = alternation<UnaryOperator>(
  map(literal('!'), (): UnaryOperator => '!'),
  map(literal('-'), (): UnaryOperator => '-')
);

function unary(cursor: Cursor): ParseResult<Expression> {
  return unaryRule(cursor);
}

const unaryRule: Parser<Expression> = expecting(
  'expression',
  alternation<Expression>(
    map(
      sequence(unaryOperator, cut(preceded(trivia0, nested(unary)))),
      ([operator, operand], span) => Node.Unary(operator, operand, span)
    ),
    postfix
  )
);

function operatorAt(level: readonly BinaryOperator[]): Parser<BinaryOperator> {
  return alternation<BinaryOperator>(
    ...level.map((op) => map(literal(op), (): BinaryOperator => op))
  );
}

/** 左结合的一层二元运算；运算符之后的操作数已提交 */
function binaryLevel(index: number): Parser<Expression> {
  const level = BINARY_LEVELS[index];
  if (level === undefined) return unary;
  const operand = binaryLevel(index + 1);
  const tail = many0(
    sequence(preceded(trivia0, operatorAt(level)), cut(preceded(trivia0, operand)))
  );
  return (cursor) => {
    const head = operand(cursor);
    if (!head.ok) return head;
    const rest = tail(head.cursor);
    if (!rest.ok) return rest;
    const expr = rest.value.reduce<Expression>(
      (left, [operator, right]) =>
        Node.Binary(operator, left, right, spanFromSources(left, right)),
      head.value
    );
    return succeed(rest.cursor, expr);
  };
}

const logicalOr = binaryLevel(0);

// ============================================================
// ASSIGNMENT & ENTRY POINT
// ============================================================

function assignment(cursor: Cursor): ParseResult<Expression> {
  return assignmentRule(cursor);
}

const assignmentRule: Parser<Expression> = expecting(
  'expression',
  alternation<Expression>(
    map(
      sequence(
        name,
        trivia0,
        literalNotFollowedBy('=', (ch) => ch === '='),
        cut(preceded(trivia0, nested(assignment)))
      ),
      ([target, , , value], span) => Node.Assign(target, value, span)
    ),
    logicalOr
  )
);

/**
 * 表达式入口：语句中凡嵌入表达式处都经由此函数
 */
export function parseExpr(cursor: Cursor): ParseResult<Expression> {
  return expressionRule(cursor);
}

const expressionRule: Parser<Expression> = context('expression', assignment);
