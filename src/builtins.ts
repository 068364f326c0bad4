/**
 * Built-in functions for the Soorj interpreter.
 *
 *   գրէ(...)  print its arguments on one line
 *   թիվ(x)    convert to a number
 *   բառ(x)    convert to a string
 */

import { Environment } from './environment';
import {
  SoorjValue,
  mkBuiltin,
  mkNumber,
  mkString,
  mkNull,
  valueToString,
  typeName,
} from './values';
import { SoorjValueError } from './errors';

export const PRINT = 'գրէ';
export const TO_NUMBER = 'թիվ';
export const TO_STRING = 'բառ';

/**
 * Where `գրէ` writes. Defaults to process stdout; tests and embedders
 * swap in their own sink.
 */
export interface Output {
  write(text: string): void;
}

export const stdoutOutput: Output = {
  write(text: string): void {
    process.stdout.write(text);
  },
};

const NUMERIC_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Register all built-in functions into the given environment.
 */
export function registerBuiltins(env: Environment, output: Output = stdoutOutput): void {
  env.define(PRINT, mkBuiltin(PRINT, null, (args: SoorjValue[]): SoorjValue => {
    output.write(args.map(valueToString).join(' ') + '\n');
    return mkNull();
  }));

  env.define(TO_NUMBER, mkBuiltin(TO_NUMBER, 1, ([v], site): SoorjValue => {
    switch (v.kind) {
      case 'number':
        return v;
      case 'string': {
        const text = v.value.trim();
        if (!NUMERIC_LITERAL.test(text)) {
          throw new SoorjValueError(`cannot convert '${v.value}' to a number`, site.line, site.column);
        }
        return mkNumber(Number(text));
      }
      case 'boolean':
      case 'null':
      case 'function':
        throw new SoorjValueError(`cannot convert ${typeName(v)} to a number`, site.line, site.column);
    }
  }));

  env.define(TO_STRING, mkBuiltin(TO_STRING, 1, ([v]): SoorjValue => {
    return mkString(valueToString(v));
  }));
}
