import {
  EXAMPLE_PROGRAMS,
  evaluateInput,
  handleCommand,
  hasUnclosedDelimiters,
  type ReplState,
} from '../src/repl';
import { Session } from '../src/session';
import { CapturedOutput, runProgram } from './helpers';

function makeState(): ReplState {
  return { session: new Session({ output: new CapturedOutput(), interactive: true }) };
}

describe('hasUnclosedDelimiters', () => {
  test('open braces and parens continue the input', () => {
    expect(hasUnclosedDelimiters('գործ ֆ() {')).toBe(true);
    expect(hasUnclosedDelimiters('գրէ(1')).toBe(true);
    expect(hasUnclosedDelimiters('եթե ա {\n  գրէ(ա)')).toBe(true);
  });

  test('balanced input is complete', () => {
    expect(hasUnclosedDelimiters('գործ ֆ() { }')).toBe(false);
    expect(hasUnclosedDelimiters('գրէ(1)')).toBe(false);
    expect(hasUnclosedDelimiters('')).toBe(false);
  });

  test('delimiters inside strings and comments do not count', () => {
    expect(hasUnclosedDelimiters('գրէ("{")')).toBe(false);
    expect(hasUnclosedDelimiters("գրէ('(')")).toBe(false);
    expect(hasUnclosedDelimiters('ա = 1 # {')).toBe(false);
    expect(hasUnclosedDelimiters('գրէ("\\"")')).toBe(false);
  });

  test('an open string continues the input', () => {
    expect(hasUnclosedDelimiters('ա = "բաց')).toBe(true);
  });
});

describe('handleCommand', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    log.mockRestore();
  });

  test('.exit and .quit close the loop', () => {
    const close = jest.fn();
    handleCommand('.exit', makeState(), close);
    handleCommand('.quit', makeState(), close);
    expect(close).toHaveBeenCalledTimes(2);
  });

  test('.env lists user bindings', () => {
    const state = makeState();
    state.session.run('ա = 5');
    handleCommand('.env', state, jest.fn());
    expect(log.mock.calls).toEqual([[''], ['  ա: Number = 5.0'], ['']]);
  });

  test('.env truncates long values', () => {
    const state = makeState();
    state.session.run(`ա = "${'բ'.repeat(70)}"`);
    handleCommand('.env', state, jest.fn());
    expect(log).toHaveBeenCalledWith(`  ա: String = ${'բ'.repeat(57)}...`);
  });

  test('.env with nothing defined', () => {
    handleCommand('.env', makeState(), jest.fn());
    expect(log).toHaveBeenCalledWith('  (only builtins are defined)');
  });

  test('.reset discards definitions', () => {
    const state = makeState();
    state.session.run('ա = 5');
    handleCommand('.reset', state, jest.fn());
    expect(state.session.globals.lookup('ա')).toBeUndefined();
    expect(state.session.globals.lookup('գրէ')).toBeDefined();
    expect(log).toHaveBeenCalledWith('Session reset.');
  });

  test('.example prints numbered, indented programs', () => {
    handleCommand('.example', makeState(), jest.fn());
    expect(log).toHaveBeenCalledWith('Example programs:');
    expect(log).toHaveBeenCalledWith('1. Hello world:');
    expect(log).toHaveBeenCalledWith('   գրէ("Բարեւ, աշխարհ")');
    expect(log).toHaveBeenCalledWith('5. Functions:');
    expect(log).toHaveBeenCalledWith('       տուր x * x');
  });

  test('.help lists .example', () => {
    handleCommand('.help', makeState(), jest.fn());
    expect(log).toHaveBeenCalledWith('  .example        Show example programs');
  });

  test('unknown commands are reported', () => {
    handleCommand('.foo bar', makeState(), jest.fn());
    expect(log).toHaveBeenCalledWith('Unknown command: .foo. Type .help for available commands.');
  });
});

describe('evaluateInput', () => {
  let error: jest.SpyInstance;

  beforeEach(() => {
    error = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('language errors are reported and the session survives', () => {
    const state = makeState();
    evaluateInput(state.session, 'ա = 1\nգրէ(անհայտ)');
    expect(error).toHaveBeenCalledWith("  NameError [line 2, col 5]: undefined variable 'անհայտ'");
    expect(state.session.globals.lookup('ա')).toBeDefined();
  });

  test('a host stack overflow is fatal', () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation((): never => {
      throw new Error('process.exit called');
    });
    expect(() => evaluateInput(makeState().session, 'գործ ֆ() { տուր ֆ() }\nֆ()')).toThrow('process.exit called');
    expect(exit).toHaveBeenCalledWith(1);
    expect(String(error.mock.calls[0][0])).toMatch(/^Fatal: /);
  });
});

describe('example programs', () => {
  test('each one runs and prints what it shows', () => {
    expect(EXAMPLE_PROGRAMS.map(example => runProgram(example.source))).toEqual([
      'Բարեւ, աշխարհ\n',
      'Գումար: 30.0\n',
      'մեծ\n',
      '1.0\n2.0\n3.0\n',
      '16.0\n',
    ]);
  });
});
