// Simple AST node constructors
import type * as AST from '../types.js';

export const Node = {
  Program: (statements: readonly AST.Statement[], span: AST.Span): AST.Program => ({
    kind: 'Program',
    statements,
    span,
  }),
  Block: (statements: readonly AST.Statement[], span: AST.Span): AST.Block => ({
    kind: 'Block',
    statements,
    span,
  }),
  If: (
    condition: AST.Expression,
    thenBlock: AST.Block,
    elseBlock: AST.Block | null,
    span: AST.Span
  ): AST.If => ({
    kind: 'If',
    condition,
    thenBlock,
    elseBlock,
    span,
  }),
  While: (condition: AST.Expression, body: AST.Block, span: AST.Span): AST.While => ({
    kind: 'While',
    condition,
    body,
    span,
  }),
  Loop: (body: AST.Block, span: AST.Span): AST.Loop => ({
    kind: 'Loop',
    body,
    span,
  }),
  Break: (span: AST.Span): AST.Break => ({ kind: 'Break', span }),
  Continue: (span: AST.Span): AST.Continue => ({ kind: 'Continue', span }),
  Return: (value: AST.Expression | null, span: AST.Span): AST.Return => ({
    kind: 'Return',
    value,
    span,
  }),
  Let: (
    name: string,
    mutable: boolean,
    init: AST.Expression | null,
    span: AST.Span
  ): AST.Let => ({
    kind: 'Let',
    name,
    mutable,
    init,
    span,
  }),
  Func: (
    name: string,
    params: readonly string[],
    body: AST.Block,
    span: AST.Span
  ): AST.Func => ({
    kind: 'Func',
    name,
    params,
    body,
    span,
  }),
  ExprStmt: (expression: AST.Expression, span: AST.Span): AST.ExprStmt => ({
    kind: 'ExprStmt',
    expression,
    span,
  }),

  Number: (value: number, span: AST.Span): AST.NumberLiteral => ({ kind: 'Number', value, span }),
  String: (value: string, span: AST.Span): AST.StringLiteral => ({ kind: 'String', value, span }),
  Bool: (value: boolean, span: AST.Span): AST.BoolLiteral => ({ kind: 'Bool', value, span }),
  Null: (span: AST.Span): AST.NullLiteral => ({ kind: 'Null', span }),
  Name: (name: string, span: AST.Span): AST.Name => ({ kind: 'Name', name, span }),
  Unary: (
    operator: AST.UnaryOperator,
    operand: AST.Expression,
    span: AST.Span
  ): AST.Unary => ({
    kind: 'Unary',
    operator,
    operand,
    span,
  }),
  Binary: (
    operator: AST.BinaryOperator,
    left: AST.Expression,
    right: AST.Expression,
    span: AST.Span
  ): AST.Binary => ({
    kind: 'Binary',
    operator,
    left,
    right,
    span,
  }),
  Assign: (target: AST.Name, value: AST.Expression, span: AST.Span): AST.Assign => ({
    kind: 'Assign',
    target,
    value,
    span,
  }),
  Call: (callee: AST.Expression, args: readonly AST.Expression[], span: AST.Span): AST.Call => ({
    kind: 'Call',
    callee,
    args,
    span,
  }),
};
