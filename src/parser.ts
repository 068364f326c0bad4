/**
 * Recursive-descent parser for Soorj.
 *
 * Statements are dispatched on their leading token; expressions are
 * parsed by precedence climbing over the table below. An expression
 * continues onto the next line only after an operator, a `(` or a `,`.
 * Parsing is all-or-nothing: the first grammar violation throws a
 * SoorjParseError.
 */

import type {
  BinaryOperator,
  BlockStatement,
  Expression,
  LogicalOperator,
  Program,
  Statement,
} from './ast';
import { SoorjParseError } from './errors';
import { tokenize } from './lexer';
import { describeToken, type Keyword, type Token } from './tokens';

type InfixOperator =
  | { type: 'logical'; op: LogicalOperator; precedence: number }
  | { type: 'binary'; op: BinaryOperator; precedence: number };

const OR_PRECEDENCE = 1;
const AND_PRECEDENCE = 2;

const BINARY_OPERATORS: ReadonlyArray<readonly [BinaryOperator, number]> = [
  ['==', 3],
  ['!=', 3],
  ['<', 4],
  ['>', 4],
  ['<=', 4],
  ['>=', 4],
  ['+', 5],
  ['-', 5],
  ['*', 6],
  ['/', 6],
  ['%', 6],
];

export class Parser {
  private idx = 0;

  constructor(private readonly tokens: Token[]) {
    const last = tokens[tokens.length - 1];
    if (last === undefined || last.kind !== 'eof') {
      throw new Error('Token stream must end with an eof token');
    }
  }

  parseProgram(): Program {
    const statements: Statement[] = [];
    this.skipSeparators();
    while (!this.isAtEnd()) {
      statements.push(this.parseStatement());
      this.skipSeparators();
    }
    return { statements };
  }

  // ==================================================================
  // Statements
  // ==================================================================

  private parseStatement(): Statement {
    const t = this.current();

    if (t.kind === 'keyword') {
      switch (t.keyword) {
        case 'if': return this.parseIf();
        case 'while': return this.parseWhile();
        case 'function': return this.parseFunction();
        case 'return': return this.parseReturn();
        default: break;
      }
    }

    if (this.checkOperator('{')) {
      return this.parseBlock();
    }

    if (t.kind === 'identifier' && this.isOperator(this.peekAt(1), '=')) {
      return this.parseAssignment();
    }

    const expression = this.parseExpression();
    return { kind: 'expression', expression, line: t.line, column: t.column };
  }

  private parseAssignment(): Statement {
    const name = this.advance();
    this.advance(); // '='
    const value = this.parseExpression();
    return { kind: 'assignment', name: name.lexeme, value, line: name.line, column: name.column };
  }

  private parseBlock(): BlockStatement {
    const open = this.expectOperator('{', 'to open a block');
    const statements: Statement[] = [];
    this.skipSeparators();
    while (!this.checkOperator('}')) {
      if (this.isAtEnd()) {
        throw this.error(`unterminated block opened at line ${open.line}`, this.current());
      }
      statements.push(this.parseStatement());
      this.skipSeparators();
    }
    this.advance();
    return { kind: 'block', statements, line: open.line, column: open.column };
  }

  private parseIf(): Statement {
    const kw = this.advance();
    const condition = this.parseExpression();
    const then = this.parseBlock();
    const otherwise = this.matchKeyword('else') ? this.parseBlock() : null;
    return { kind: 'if', condition, then, otherwise, line: kw.line, column: kw.column };
  }

  private parseWhile(): Statement {
    const kw = this.advance();
    const condition = this.parseExpression();
    const body = this.parseBlock();
    return { kind: 'while', condition, body, line: kw.line, column: kw.column };
  }

  private parseFunction(): Statement {
    const kw = this.advance();
    const name = this.expectIdentifier('a function name');
    this.expectOperator('(', `after function name '${name.lexeme}'`);
    const params: string[] = [];
    if (!this.checkOperator(')')) {
      params.push(this.expectIdentifier('a parameter name').lexeme);
      while (this.matchOperator(',')) {
        params.push(this.expectIdentifier('a parameter name').lexeme);
      }
    }
    this.expectOperator(')', 'to close the parameter list');
    const body = this.parseBlock();
    return { kind: 'function', name: name.lexeme, params, body, line: kw.line, column: kw.column };
  }

  /**
   * `տուր` takes a value unless the statement visibly ends right after it:
   * a closing brace, a separator, end of input, or a line break.
   */
  private parseReturn(): Statement {
    const kw = this.advance();
    const next = this.current();
    const bare =
      next.kind === 'eof' ||
      this.isOperator(next, '}') ||
      this.isOperator(next, ';') ||
      next.line > kw.line;
    const value = bare ? null : this.parseExpression();
    return { kind: 'return', value, line: kw.line, column: kw.column };
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  parseExpression(): Expression {
    return this.parseBinary(OR_PRECEDENCE);
  }

  private parseBinary(minPrec: number): Expression {
    let left = this.parseUnary();

    for (;;) {
      const info = this.infixOperator();
      if (info === null || info.precedence < minPrec || !this.onSameLine()) break;

      const opTok = this.advance();
      // all infix operators are left-associative
      const right = this.parseBinary(info.precedence + 1);
      left = info.type === 'logical'
        ? { kind: 'logical', operator: info.op, left, right, line: opTok.line, column: opTok.column }
        : { kind: 'binary', operator: info.op, left, right, line: opTok.line, column: opTok.column };
    }

    return left;
  }

  private parseUnary(): Expression {
    const t = this.current();
    if (this.matchOperator('-')) {
      const operand = this.parseUnary();
      return { kind: 'unary', operator: '-', operand, line: t.line, column: t.column };
    }
    if (this.matchKeyword('not')) {
      const operand = this.parseUnary();
      return { kind: 'unary', operator: 'not', operand, line: t.line, column: t.column };
    }
    return this.parseCall();
  }

  private parseCall(): Expression {
    let expr = this.parsePrimary();
    while (this.checkOperator('(') && this.onSameLine()) {
      this.advance();
      const args: Expression[] = [];
      if (!this.checkOperator(')')) {
        args.push(this.parseExpression());
        while (this.matchOperator(',')) {
          args.push(this.parseExpression());
        }
      }
      this.expectOperator(')', 'to close the argument list');
      expr = { kind: 'call', callee: expr, args, line: expr.line, column: expr.column };
    }
    return expr;
  }

  private parsePrimary(): Expression {
    const t = this.current();
    const pos = { line: t.line, column: t.column };

    switch (t.kind) {
      case 'number':
        this.advance();
        return { kind: 'literal', value: { kind: 'number', value: parseFloat(t.lexeme) }, ...pos };
      case 'string':
        this.advance();
        return { kind: 'literal', value: { kind: 'string', value: t.lexeme }, ...pos };
      case 'identifier':
        this.advance();
        return { kind: 'variable', name: t.lexeme, ...pos };
      case 'keyword':
        if (t.keyword === 'true' || t.keyword === 'false') {
          this.advance();
          return { kind: 'literal', value: { kind: 'boolean', value: t.keyword === 'true' }, ...pos };
        }
        if (t.keyword === 'null') {
          this.advance();
          return { kind: 'literal', value: { kind: 'null' }, ...pos };
        }
        break;
      case 'operator':
        if (t.lexeme === '(') {
          this.advance();
          const inner = this.parseExpression();
          this.expectOperator(')', `to close '(' opened at line ${t.line}`);
          return inner;
        }
        break;
      case 'eof':
        break;
    }

    throw this.error(`expected an expression, found ${describeToken(t)}`, t);
  }

  private infixOperator(): InfixOperator | null {
    const t = this.current();
    if (t.kind === 'keyword') {
      if (t.keyword === 'or') return { type: 'logical', op: 'or', precedence: OR_PRECEDENCE };
      if (t.keyword === 'and') return { type: 'logical', op: 'and', precedence: AND_PRECEDENCE };
      return null;
    }
    if (t.kind !== 'operator') return null;
    const entry = BINARY_OPERATORS.find(([op]) => op === t.lexeme);
    if (entry === undefined) return null;
    return { type: 'binary', op: entry[0], precedence: entry[1] };
  }

  // ==================================================================
  // Token helpers
  // ==================================================================

  private current(): Token {
    return this.tokens[this.idx];
  }

  private peekAt(offset: number): Token {
    return this.tokens[Math.min(this.idx + offset, this.tokens.length - 1)];
  }

  /**
   * Whether the current token starts on the line where the previous one
   * ends. A line break ends an expression before an infix operator or a
   * call's `(`.
   */
  private onSameLine(): boolean {
    const previous = this.tokens[this.idx - 1];
    return previous === undefined || this.current().line <= previous.endLine;
  }

  private advance(): Token {
    const t = this.current();
    if (t.kind !== 'eof') this.idx++;
    return t;
  }

  private isAtEnd(): boolean {
    return this.current().kind === 'eof';
  }

  private isOperator(t: Token, op: string): boolean {
    return t.kind === 'operator' && t.lexeme === op;
  }

  private checkOperator(op: string): boolean {
    return this.isOperator(this.current(), op);
  }

  private matchOperator(op: string): boolean {
    if (!this.checkOperator(op)) return false;
    this.advance();
    return true;
  }

  private matchKeyword(keyword: Keyword): boolean {
    const t = this.current();
    if (t.kind !== 'keyword' || t.keyword !== keyword) return false;
    this.advance();
    return true;
  }

  private skipSeparators(): void {
    while (this.matchOperator(';')) {
      // empty statements
    }
  }

  private expectOperator(op: string, context: string): Token {
    if (this.checkOperator(op)) return this.advance();
    const t = this.current();
    throw this.error(`expected '${op}' ${context}, found ${describeToken(t)}`, t);
  }

  private expectIdentifier(what: string): Token {
    const t = this.current();
    if (t.kind === 'identifier') return this.advance();
    if (t.kind === 'keyword') {
      throw this.error(`'${t.lexeme}' is a reserved word and cannot be used as ${what}`, t);
    }
    throw this.error(`expected ${what}, found ${describeToken(t)}`, t);
  }

  private error(message: string, at: Token): SoorjParseError {
    return new SoorjParseError(message, at.line, at.column);
  }
}

/**
 * Lex and parse a complete source text.
 */
export function parse(source: string): Program {
  return new Parser(tokenize(source)).parseProgram();
}
