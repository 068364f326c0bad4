/**
 * Error types for the Soorj lexer, parser and interpreter.
 *
 * Every language-level failure is a SoorjError; anything else that
 * escapes the pipeline (e.g. a host stack overflow) is not.
 */

function location(line?: number, column?: number): string {
  return line !== undefined ? ` [line ${line}, col ${column ?? 0}]` : '';
}

export class SoorjError extends Error {
  public readonly line: number | undefined;
  public readonly column: number | undefined;

  constructor(label: string, message: string, line?: number, column?: number) {
    super(`${label}${location(line, column)}: ${message}`);
    this.name = 'SoorjError';
    this.line = line;
    this.column = column;
  }
}

export class SoorjLexError extends SoorjError {
  constructor(message: string, line: number, column: number) {
    super('LexError', message, line, column);
    this.name = 'SoorjLexError';
  }
}

export class SoorjParseError extends SoorjError {
  constructor(message: string, line: number, column: number) {
    super('ParseError', message, line, column);
    this.name = 'SoorjParseError';
  }
}

export class SoorjNameError extends SoorjError {
  public readonly variable: string;

  constructor(name: string, line?: number, column?: number) {
    super('NameError', `undefined variable '${name}'`, line, column);
    this.name = 'SoorjNameError';
    this.variable = name;
  }
}

export class SoorjTypeError extends SoorjError {
  constructor(message: string, line?: number, column?: number) {
    super('TypeError', message, line, column);
    this.name = 'SoorjTypeError';
  }
}

export class SoorjArityError extends SoorjError {
  constructor(callee: string, expected: number, actual: number, line?: number, column?: number) {
    const plural = expected === 1 ? '' : 's';
    super('ArityError', `'${callee}' expects ${expected} argument${plural}, got ${actual}`, line, column);
    this.name = 'SoorjArityError';
  }
}

export class SoorjArithmeticError extends SoorjError {
  constructor(message: string, line?: number, column?: number) {
    super('ArithmeticError', message, line, column);
    this.name = 'SoorjArithmeticError';
  }
}

export class SoorjValueError extends SoorjError {
  constructor(message: string, line?: number, column?: number) {
    super('ValueError', message, line, column);
    this.name = 'SoorjValueError';
  }
}
