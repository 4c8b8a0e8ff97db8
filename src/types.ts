// Brook AST 类型定义

/** 1-based 行列号，附带缓冲区内的 UTF-16 偏移量 */
export interface Position {
  readonly line: number;
  readonly col: number;
  readonly offset: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

/**
 * AST 节点的公共基础
 *
 * 所有节点在解析时自底向上构造，之后不再修改；每个节点独占其子节点。
 */
interface BaseNode<K extends string> {
  readonly kind: K;
  readonly span: Span;
}

// ==================== 表达式 ====================

export type BinaryOperator =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '+'
  | '-'
  | '*'
  | '/'
  | '%';

export type UnaryOperator = '!' | '-';

export interface NumberLiteral extends BaseNode<'Number'> {
  readonly value: number;
}

export interface StringLiteral extends BaseNode<'String'> {
  readonly value: string;
}

export interface BoolLiteral extends BaseNode<'Bool'> {
  readonly value: boolean;
}

export type NullLiteral = BaseNode<'Null'>;

export interface Name extends BaseNode<'Name'> {
  readonly name: string;
}

export interface Unary extends BaseNode<'Unary'> {
  readonly operator: UnaryOperator;
  readonly operand: Expression;
}

export interface Binary extends BaseNode<'Binary'> {
  readonly operator: BinaryOperator;
  readonly left: Expression;
  readonly right: Expression;
}

export interface Assign extends BaseNode<'Assign'> {
  readonly target: Name;
  readonly value: Expression;
}

export interface Call extends BaseNode<'Call'> {
  readonly callee: Expression;
  readonly args: readonly Expression[];
}

export type Expression =
  | NumberLiteral
  | StringLiteral
  | BoolLiteral
  | NullLiteral
  | Name
  | Unary
  | Binary
  | Assign
  | Call;

// ==================== 语句 ====================

export interface Block extends BaseNode<'Block'> {
  readonly statements: readonly Statement[];
}

export interface If extends BaseNode<'If'> {
  readonly condition: Expression;
  readonly thenBlock: Block;
  /** `else if` 表示为只含一个嵌套 If 的 Block */
  readonly elseBlock: Block | null;
}

export interface While extends BaseNode<'While'> {
  readonly condition: Expression;
  readonly body: Block;
}

export interface Loop extends BaseNode<'Loop'> {
  readonly body: Block;
}

export type Break = BaseNode<'Break'>;

export type Continue = BaseNode<'Continue'>;

export interface Return extends BaseNode<'Return'> {
  readonly value: Expression | null;
}

/** `let`（mutable）与 `const`（immutable）共用同一节点 */
export interface Let extends BaseNode<'Let'> {
  readonly name: string;
  readonly mutable: boolean;
  readonly init: Expression | null;
}

export interface Func extends BaseNode<'Func'> {
  readonly name: string;
  readonly params: readonly string[];
  readonly body: Block;
}

export interface ExprStmt extends BaseNode<'ExprStmt'> {
  readonly expression: Expression;
}

export type Statement =
  | Block
  | If
  | While
  | Loop
  | Break
  | Continue
  | Return
  | Let
  | Func
  | ExprStmt;

/** 顶层语句序列（编译单元的根） */
export interface Program extends BaseNode<'Program'> {
  readonly statements: readonly Statement[];
}

export type AstNode = Program | Statement | Expression;
