/**
 * Tree-walking interpreter for the Soorj programming language.
 *
 * Statements execute to a Completion rather than throwing: a `տուր`
 * produces `returned`, which every statement sequence passes straight
 * up until the nearest function call unwraps it. Only language errors
 * travel as exceptions.
 */

import type {
  BinaryOperator,
  BlockStatement,
  Expression,
  Position,
  Program,
  Statement,
} from './ast';
import { Environment } from './environment';
import {
  SoorjValue,
  FunctionValue,
  mkNumber,
  mkBool,
  mkNull,
  mkFunction,
  isTruthy,
  typeName,
  valuesEqual,
} from './values';
import {
  SoorjArithmeticError,
  SoorjArityError,
  SoorjTypeError,
} from './errors';
import { registerBuiltins, type Output } from './builtins';

export type Completion =
  | { kind: 'completed' }
  | { kind: 'returned'; value: SoorjValue };

const COMPLETED: Completion = { kind: 'completed' };

type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
type ComparisonOperator = '<' | '>' | '<=' | '>=';

/**
 * A fresh root scope with the builtins bound in it.
 */
export function createGlobalEnvironment(output?: Output): Environment {
  const env = new Environment();
  registerBuiltins(env, output);
  return env;
}

export class Interpreter {
  /**
   * Execute a program's top-level statements directly in `env`.
   *
   * When `onExpression` is given it receives the value of each top-level
   * expression statement. A top-level `տուր` ends the program; its value
   * is carried in the returned Completion and otherwise ignored.
   */
  run(program: Program, env: Environment, onExpression?: (value: SoorjValue) => void): Completion {
    for (const stmt of program.statements) {
      if (stmt.kind === 'expression' && onExpression !== undefined) {
        onExpression(this.evaluate(stmt.expression, env));
        continue;
      }
      const result = this.execute(stmt, env);
      if (result.kind === 'returned') return result;
    }
    return COMPLETED;
  }

  // ==================================================================
  // Statements
  // ==================================================================

  execute(stmt: Statement, env: Environment): Completion {
    switch (stmt.kind) {
      case 'assignment':
        env.assign(stmt.name, this.evaluate(stmt.value, env));
        return COMPLETED;

      case 'block':
        return this.executeBlock(stmt, env);

      case 'if':
        if (isTruthy(this.evaluate(stmt.condition, env))) {
          return this.executeBlock(stmt.then, env);
        }
        if (stmt.otherwise !== null) {
          return this.executeBlock(stmt.otherwise, env);
        }
        return COMPLETED;

      case 'while':
        while (isTruthy(this.evaluate(stmt.condition, env))) {
          const result = this.executeBlock(stmt.body, env);
          if (result.kind === 'returned') return result;
        }
        return COMPLETED;

      case 'function':
        env.define(stmt.name, mkFunction(stmt.name, stmt.params, stmt.body, env));
        return COMPLETED;

      case 'return': {
        const value = stmt.value !== null ? this.evaluate(stmt.value, env) : mkNull();
        return { kind: 'returned', value };
      }

      case 'expression':
        this.evaluate(stmt.expression, env);
        return COMPLETED;
    }
  }

  /**
   * Run a block in a new child scope of `parentEnv`.
   */
  executeBlock(block: BlockStatement, parentEnv: Environment): Completion {
    return this.executeStatements(block.statements, parentEnv.child());
  }

  private executeStatements(statements: Statement[], env: Environment): Completion {
    for (const stmt of statements) {
      const result = this.execute(stmt, env);
      if (result.kind === 'returned') return result;
    }
    return COMPLETED;
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  evaluate(expr: Expression, env: Environment): SoorjValue {
    switch (expr.kind) {
      case 'literal':
        return expr.value;

      case 'variable':
        return env.get(expr.name, expr);

      case 'binary': {
        const left = this.evaluate(expr.left, env);
        const right = this.evaluate(expr.right, env);
        return this.applyBinary(expr.operator, left, right, expr);
      }

      case 'unary': {
        const operand = this.evaluate(expr.operand, env);
        if (expr.operator === 'not') return mkBool(!isTruthy(operand));
        if (operand.kind !== 'number') {
          throw new SoorjTypeError(`cannot negate ${typeName(operand)}`, expr.line, expr.column);
        }
        return mkNumber(-operand.value);
      }

      case 'logical': {
        const left = this.evaluate(expr.left, env);
        if (expr.operator === 'and') {
          return isTruthy(left) ? this.evaluate(expr.right, env) : left;
        }
        return isTruthy(left) ? left : this.evaluate(expr.right, env);
      }

      case 'call': {
        const callee = this.evaluate(expr.callee, env);
        if (callee.kind !== 'function') {
          const label = expr.callee.kind === 'variable' ? `'${expr.callee.name}'` : 'expression';
          throw new SoorjTypeError(
            `${label} is not callable (got ${typeName(callee)})`,
            expr.line,
            expr.column,
          );
        }
        const args = expr.args.map(arg => this.evaluate(arg, env));
        return this.callFunction(callee, args, expr);
      }
    }
  }

  callFunction(callee: FunctionValue, args: SoorjValue[], site: Position): SoorjValue {
    const fn = callee.fn;

    if (fn.type === 'builtin') {
      if (fn.arity !== null && args.length !== fn.arity) {
        throw new SoorjArityError(fn.name, fn.arity, args.length, site.line, site.column);
      }
      return fn.call(args, site);
    }

    if (args.length !== fn.params.length) {
      throw new SoorjArityError(fn.name, fn.params.length, args.length, site.line, site.column);
    }

    const frame = fn.closure.child();
    fn.params.forEach((param, i) => frame.define(param, args[i]));

    const result = this.executeStatements(fn.body.statements, frame);
    return result.kind === 'returned' ? result.value : mkNull();
  }

  // ==================================================================
  // Operators
  // ==================================================================

  private applyBinary(op: BinaryOperator, left: SoorjValue, right: SoorjValue, site: Position): SoorjValue {
    switch (op) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%':
        return mkNumber(this.arithmetic(op, left, right, site));
      case '<':
      case '>':
      case '<=':
      case '>=':
        return mkBool(this.compare(op, left, right, site));
      case '==':
        return mkBool(valuesEqual(left, right));
      case '!=':
        return mkBool(!valuesEqual(left, right));
    }
  }

  private arithmetic(op: ArithmeticOperator, left: SoorjValue, right: SoorjValue, site: Position): number {
    if (left.kind !== 'number' || right.kind !== 'number') {
      throw new SoorjTypeError(
        `unsupported operand types for '${op}': ${typeName(left)} and ${typeName(right)}`,
        site.line,
        site.column,
      );
    }
    const a = left.value;
    const b = right.value;

    switch (op) {
      case '+': return a + b;
      case '-': return a - b;
      case '*': return a * b;
      case '/':
        if (b === 0) throw new SoorjArithmeticError('division by zero', site.line, site.column);
        return a / b;
      case '%': {
        if (b === 0) throw new SoorjArithmeticError('modulo by zero', site.line, site.column);
        // floored: the result takes the divisor's sign
        const m = a % b;
        return m !== 0 && (m < 0) !== (b < 0) ? m + b : m;
      }
    }
  }

  private compare(op: ComparisonOperator, left: SoorjValue, right: SoorjValue, site: Position): boolean {
    if (left.kind === 'number' && right.kind === 'number') {
      const a = left.value;
      const b = right.value;
      return this.ordered(op, a < b, a > b, a === b);
    }
    if (left.kind === 'string' && right.kind === 'string') {
      const a = left.value;
      const b = right.value;
      return this.ordered(op, a < b, a > b, a === b);
    }
    throw new SoorjTypeError(
      `cannot compare ${typeName(left)} and ${typeName(right)} with '${op}'`,
      site.line,
      site.column,
    );
  }

  private ordered(op: ComparisonOperator, lt: boolean, gt: boolean, eq: boolean): boolean {
    switch (op) {
      case '<': return lt;
      case '>': return gt;
      case '<=': return lt || eq;
      case '>=': return gt || eq;
    }
  }
}
