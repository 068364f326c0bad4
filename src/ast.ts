/**
 * AST node types produced by the parser and walked by the interpreter.
 *
 * Both unions are closed: the interpreter switches over `kind` and the
 * compiler checks that every case is handled.
 */

import type { SoorjValue } from './values';

export interface Position {
  line: number;
  column: number;
}

// ---- Expressions ----

export type BinaryOperator =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '=='
  | '!='
  | '<'
  | '>'
  | '<='
  | '>=';

export type UnaryOperator = '-' | 'not';

export type LogicalOperator = 'and' | 'or';

export type LiteralValue = Extract<SoorjValue, { kind: 'number' | 'string' | 'boolean' | 'null' }>;

export interface LiteralExpression extends Position {
  kind: 'literal';
  value: LiteralValue;
}

export interface VariableExpression extends Position {
  kind: 'variable';
  name: string;
}

export interface BinaryExpression extends Position {
  kind: 'binary';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryExpression extends Position {
  kind: 'unary';
  operator: UnaryOperator;
  operand: Expression;
}

/** `և` / `կամ`; kept apart from BinaryExpression because the right side may not run. */
export interface LogicalExpression extends Position {
  kind: 'logical';
  operator: LogicalOperator;
  left: Expression;
  right: Expression;
}

export interface CallExpression extends Position {
  kind: 'call';
  callee: Expression;
  args: Expression[];
}

export type Expression =
  | LiteralExpression
  | VariableExpression
  | BinaryExpression
  | UnaryExpression
  | LogicalExpression
  | CallExpression;

// ---- Statements ----

export interface AssignmentStatement extends Position {
  kind: 'assignment';
  name: string;
  value: Expression;
}

export interface BlockStatement extends Position {
  kind: 'block';
  statements: Statement[];
}

export interface IfStatement extends Position {
  kind: 'if';
  condition: Expression;
  then: BlockStatement;
  otherwise: BlockStatement | null;
}

export interface WhileStatement extends Position {
  kind: 'while';
  condition: Expression;
  body: BlockStatement;
}

export interface FunctionStatement extends Position {
  kind: 'function';
  name: string;
  params: string[];
  body: BlockStatement;
}

export interface ReturnStatement extends Position {
  kind: 'return';
  value: Expression | null;
}

export interface ExpressionStatement extends Position {
  kind: 'expression';
  expression: Expression;
}

export type Statement =
  | AssignmentStatement
  | BlockStatement
  | IfStatement
  | WhileStatement
  | FunctionStatement
  | ReturnStatement
  | ExpressionStatement;

export interface Program {
  statements: Statement[];
}
