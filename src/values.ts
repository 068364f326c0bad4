/**
 * Runtime value representations for the Soorj interpreter.
 */

import type { BlockStatement, Position } from './ast';
import type { Environment } from './environment';

export type SoorjValue =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }
  | { kind: 'function'; fn: FunctionImpl };

export type FunctionValue = Extract<SoorjValue, { kind: 'function' }>;

/**
 * User functions and host builtins are one `function` value to the
 * language; only the call path tells them apart.
 */
export type FunctionImpl = UserFunction | BuiltinFunction;

export interface UserFunction {
  type: 'user';
  name: string;
  params: string[];
  body: BlockStatement;
  closure: Environment;
}

export interface BuiltinFunction {
  type: 'builtin';
  name: string;
  /** `null` accepts any number of arguments. */
  arity: number | null;
  call: BuiltinFn;
}

/** `site` is the call expression's position, for error reporting. */
export type BuiltinFn = (args: SoorjValue[], site: Position) => SoorjValue;

export const TRUE_SPELLING = 'այո';
export const FALSE_SPELLING = 'ոչ';
export const NULL_SPELLING = 'հեչ';

// ---- Value constructors ----

export function mkNumber(value: number): SoorjValue {
  return { kind: 'number', value };
}

export function mkString(value: string): SoorjValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): SoorjValue {
  return { kind: 'boolean', value };
}

export function mkNull(): SoorjValue {
  return { kind: 'null' };
}

export function mkFunction(
  name: string,
  params: string[],
  body: BlockStatement,
  closure: Environment,
): FunctionValue {
  return { kind: 'function', fn: { type: 'user', name, params, body, closure } };
}

export function mkBuiltin(name: string, arity: number | null, call: BuiltinFn): FunctionValue {
  return { kind: 'function', fn: { type: 'builtin', name, arity, call } };
}

// ---- Value utilities ----

/** Only `հեչ` and `ոչ` are falsy; zero and the empty string are truthy. */
export function isTruthy(v: SoorjValue): boolean {
  switch (v.kind) {
    case 'boolean': return v.value;
    case 'null': return false;
    case 'number': return true;
    case 'string': return true;
    case 'function': return true;
  }
}

/**
 * Numbers always carry a fractional part unless the host renders them
 * in exponent form. Overflow prints as `inf` / `-inf`, and undefined
 * results such as `inf - inf` as `nan`.
 */
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return 'nan';
  if (n === Infinity) return 'inf';
  if (n === -Infinity) return '-inf';
  if (Object.is(n, -0)) return '-0.0';
  const s = String(n);
  return /[.eE]/.test(s) ? s : s + '.0';
}

export function valueToString(v: SoorjValue): string {
  switch (v.kind) {
    case 'number': return formatNumber(v.value);
    case 'string': return v.value;
    case 'boolean': return v.value ? TRUE_SPELLING : FALSE_SPELLING;
    case 'null': return NULL_SPELLING;
    case 'function':
      return v.fn.type === 'user' ? `<գործ ${v.fn.name}>` : `<builtin ${v.fn.name}>`;
  }
}

/** Name of a value's variant, for error messages and the REPL. */
export function typeName(v: SoorjValue): string {
  switch (v.kind) {
    case 'number': return 'Number';
    case 'string': return 'String';
    case 'boolean': return 'Boolean';
    case 'null': return 'Null';
    case 'function': return 'Function';
  }
}

export function valuesEqual(a: SoorjValue, b: SoorjValue): boolean {
  switch (a.kind) {
    case 'number': return b.kind === 'number' && a.value === b.value;
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'boolean': return b.kind === 'boolean' && a.value === b.value;
    case 'null': return b.kind === 'null';
    case 'function': return b.kind === 'function' && a.fn === b.fn;
  }
}
