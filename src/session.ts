/**
 * A Session owns one root environment and evaluates source units
 * against it, so bindings made by one unit are visible to the next.
 */

import { parse } from './parser';
import { Interpreter, createGlobalEnvironment, type Completion } from './interpreter';
import { stdoutOutput, type Output } from './builtins';
import type { Environment } from './environment';
import { valueToString, type SoorjValue } from './values';

export interface SessionOptions {
  /** Sink for `գրէ` and for echoed values. */
  output?: Output;
  /**
   * Echo the value of each bare top-level expression as `=> value`
   * (REPL behaviour). `հեչ` is never echoed.
   */
  interactive?: boolean;
}

export class Session {
  readonly globals: Environment;
  private readonly interpreter = new Interpreter();
  private readonly output: Output;
  private readonly interactive: boolean;

  constructor(options: SessionOptions = {}) {
    this.output = options.output ?? stdoutOutput;
    this.interactive = options.interactive ?? false;
    this.globals = createGlobalEnvironment(this.output);
  }

  /**
   * Lex, parse and evaluate one input unit. Any SoorjError aborts the
   * unit; bindings made before the failure point remain.
   */
  run(source: string): Completion {
    const program = parse(source);
    const echo = this.interactive
      ? (value: SoorjValue): void => this.echo(value)
      : undefined;
    return this.interpreter.run(program, this.globals, echo);
  }

  private echo(value: SoorjValue): void {
    if (value.kind === 'null') return;
    this.output.write(`=> ${valueToString(value)}\n`);
  }
}

/**
 * Evaluate a complete program in a fresh, non-interactive session.
 */
export function runSource(source: string, output?: Output): Completion {
  return new Session({ output }).run(source);
}
