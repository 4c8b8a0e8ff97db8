/**
 * 语句文法
 *
 * 每个产生式都遵循同一模板：context(<名称>, sequence(关键字, trivia0, …必需记号…))，
 * 再映射为对应的 AST 变体。关键字匹配成功即提交到该产生式（首记号决定性），
 * 之后的任何失败都不会让分派器改试其他分支。
 */

import type { Block, Expression, If, Statement } from '../types.js';
import { Node } from '../ast/ast.js';
import { isAtEnd, type Cursor } from './cursor.js';
import {
  alternation,
  context,
  cut,
  delimited,
  keyword,
  literal,
  map,
  nested,
  optional,
  preceded,
  separatedList0,
  sequence,
  trivia0,
} from './combinators.js';
import { failAt, succeed, type ParseResult, type Parser } from './failure.js';
import { identifier, parseExpr } from './expr-parser.js';

const spacedExpr: Parser<Expression> = preceded(trivia0, parseExpr);
const spacedBlock: Parser<Block> = preceded(trivia0, parseBlock);
const semicolon: Parser<string> = preceded(trivia0, literal(';'));
const comma = sequence(trivia0, literal(','), trivia0);

// ============================================================
// DRIVER / BLOCK ASSEMBLY
// ============================================================

/**
 * 语句序列驱动循环
 *
 * 反复跳过 trivia 并调用语句分派器，直到 terminator 匹配；
 * 若在此之前到达输入末尾，失败原因为 UnterminatedBlock(expected)。
 * 第一个语句失败即整个序列失败，不产生部分结果。
 */
export function statementSequence(
  terminator: Parser<unknown>,
  expected: string
): Parser<Statement[]> {
  return (cursor) => {
    const statements: Statement[] = [];
    let current = cursor;
    for (;;) {
      const skipped = trivia0(current);
      if (skipped.ok) current = skipped.cursor;

      const closed = terminator(current);
      if (closed.ok) return succeed(closed.cursor, statements);
      if (isAtEnd(current)) {
        return failAt({ kind: 'UnterminatedBlock', expected }, current.offset);
      }

      const result = parseStatement(current);
      if (!result.ok) return result;
      statements.push(result.value);
      current = result.cursor;
    }
  };
}

// ============================================================
// COMPOUND STATEMENTS
// ============================================================

const blockRule: Parser<Block> = context(
  'block',
  map(
    preceded(literal('{'), cut(nested(statementSequence(literal('}'), '}')))),
    (statements, span) => Node.Block(statements, span)
  )
);

export function parseBlock(cursor: Cursor): ParseResult<Block> {
  return blockRule(cursor);
}

/** `else if` 包装为只含嵌套 If 的 Block */
const elseClause: Parser<Block> = preceded(
  sequence(trivia0, keyword('else')),
  cut(
    preceded(
      trivia0,
      alternation<Block>(
        parseBlock,
        map(nested(ifStatement), (inner) => Node.Block([inner], inner.span))
      )
    )
  )
);

const ifRule: Parser<If> = context(
  'if_statement',
  map(
    sequence(keyword('if'), cut(sequence(spacedExpr, spacedBlock, optional(elseClause)))),
    ([, [condition, thenBlock, elseBlock]], span) =>
      Node.If(condition, thenBlock, elseBlock, span)
  )
);

export function ifStatement(cursor: Cursor): ParseResult<If> {
  return ifRule(cursor);
}

export const whileStatement: Parser<Statement> = context(
  'while_statement',
  map(
    sequence(keyword('while'), cut(sequence(spacedExpr, spacedBlock))),
    ([, [condition, body]], span) => Node.While(condition, body, span)
  )
);

export const loopStatement: Parser<Statement> = context(
  'loop_statement',
  map(sequence(keyword('loop'), cut(spacedBlock)), ([, body], span) => Node.Loop(body, span))
);

// ============================================================
// CONTROL-FLOW LEAVES
// ============================================================

export const continueStatement: Parser<Statement> = context(
  'continue_statement',
  map(sequence(keyword('continue'), cut(sequence(trivia0, literal(';')))), (_, span) =>
    Node.Continue(span)
  )
);

export const breakStatement: Parser<Statement> = context(
  'break_statement',
  map(sequence(keyword('break'), cut(sequence(trivia0, literal(';')))), (_, span) =>
    Node.Break(span)
  )
);

export const returnStatement: Parser<Statement> = context(
  'return_statement',
  map(
    sequence(keyword('return'), cut(sequence(optional(spacedExpr), semicolon))),
    ([, [value]], span) => Node.Return(value, span)
  )
);

// ============================================================
// DECLARATIONS
// ============================================================

export const letStatement: Parser<Statement> = context(
  'let_statement',
  map(
    sequence(
      keyword('let'),
      cut(
        sequence(
          preceded(trivia0, identifier),
          optional(preceded(sequence(trivia0, literal('=')), cut(spacedExpr))),
          semicolon
        )
      )
    ),
    ([, [name, init]], span) => Node.Let(name, true, init, span)
  )
);

export const constStatement: Parser<Statement> = context(
  'const_statement',
  map(
    sequence(
      keyword('const'),
      cut(
        sequence(
          preceded(trivia0, identifier),
          preceded(trivia0, literal('=')),
          spacedExpr,
          semicolon
        )
      )
    ),
    ([, [name, , init]], span) => Node.Let(name, false, init, span)
  )
);

const parameterList: Parser<string[]> = delimited(
  sequence(literal('('), trivia0),
  separatedList0(identifier, comma),
  sequence(trivia0, literal(')'))
);

export const functionDeclaration: Parser<Statement> = context(
  'function_declaration',
  map(
    sequence(
      keyword('fn'),
      cut(
        sequence(preceded(trivia0, identifier), preceded(trivia0, parameterList), spacedBlock)
      )
    ),
    ([, [name, params, body]], span) => Node.Func(name, params, body, span)
  )
);

/** 接受范围最广，必须排在分派器最后 */
export const expressionStatement: Parser<Statement> = context(
  'expression_statement',
  map(sequence(parseExpr, semicolon), ([expression], span) => Node.ExprStmt(expression, span))
);

// ============================================================
// DISPATCHER
// ============================================================

const statementRule: Parser<Statement> = alternation<Statement>(
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
  expressionStatement
);

/**
 * 语句分派器：按优先级尝试所有语句产生式
 */
export function parseStatement(cursor: Cursor): ParseResult<Statement> {
  return statementRule(cursor);
}
