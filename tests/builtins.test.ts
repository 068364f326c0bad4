import { createGlobalEnvironment } from '../src/interpreter';
import { PRINT, TO_NUMBER, TO_STRING } from '../src/builtins';
import { SoorjValueError } from '../src/errors';
import { SoorjValue, mkBool, mkNull, mkNumber, mkString } from '../src/values';
import { CapturedOutput, runProgram } from './helpers';

const SITE = { line: 4, column: 2 };

function callBuiltin(name: string, args: SoorjValue[], output = new CapturedOutput()): SoorjValue {
  const value = createGlobalEnvironment(output).get(name);
  if (value.kind !== 'function' || value.fn.type !== 'builtin') {
    throw new Error(`${name} is not a builtin`);
  }
  return value.fn.call(args, SITE);
}

describe('Builtins', () => {
  test('print writes its arguments separated by spaces', () => {
    const output = new CapturedOutput();
    expect(callBuiltin(PRINT, [mkString('ա'), mkNumber(2)], output)).toEqual(mkNull());
    expect(output.text).toBe('ա 2.0\n');
  });

  test('to-number parses decimal strings', () => {
    expect(callBuiltin(TO_NUMBER, [mkString('10.5')])).toEqual(mkNumber(10.5));
    expect(callBuiltin(TO_NUMBER, [mkString(' 42 ')])).toEqual(mkNumber(42));
    expect(callBuiltin(TO_NUMBER, [mkString('1e3')])).toEqual(mkNumber(1000));
    expect(callBuiltin(TO_NUMBER, [mkString('-2.5')])).toEqual(mkNumber(-2.5));
  });

  test('to-number returns numbers unchanged', () => {
    expect(callBuiltin(TO_NUMBER, [mkNumber(7)])).toEqual(mkNumber(7));
  });

  test('to-number rejects text that is not a number', () => {
    expect(() => callBuiltin(TO_NUMBER, [mkString('abc')])).toThrow(SoorjValueError);
    expect(() => callBuiltin(TO_NUMBER, [mkString('abc')])).toThrow(
      "ValueError [line 4, col 2]: cannot convert 'abc' to a number",
    );
    expect(() => callBuiltin(TO_NUMBER, [mkString('')])).toThrow("cannot convert '' to a number");
  });

  test('to-number rejects other kinds', () => {
    expect(() => callBuiltin(TO_NUMBER, [mkBool(true)])).toThrow('cannot convert Boolean to a number');
    expect(() => callBuiltin(TO_NUMBER, [mkNull()])).toThrow('cannot convert Null to a number');
  });

  test('to-string uses display formatting', () => {
    expect(callBuiltin(TO_STRING, [mkNumber(30)])).toEqual(mkString('30.0'));
    expect(callBuiltin(TO_STRING, [mkBool(true)])).toEqual(mkString('այո'));
    expect(callBuiltin(TO_STRING, [mkNull()])).toEqual(mkString('հեչ'));
  });

  test('fixed-arity builtins check their argument count', () => {
    expect(() => runProgram('թիվ(1, 2)')).toThrow("ArityError [line 1, col 1]: 'թիվ' expects 1 argument, got 2");
    expect(() => runProgram('բառ()')).toThrow("'բառ' expects 1 argument, got 0");
  });

  test('conversions compose inside programs', () => {
    expect(runProgram('գրէ(թիվ("2") + 3, բառ(1) == "1.0")')).toBe('5.0 այո\n');
  });

  test('conversion errors point at the call', () => {
    expect(() => runProgram('ա = թիվ("x")')).toThrow("ValueError [line 1, col 5]: cannot convert 'x' to a number");
  });
});
