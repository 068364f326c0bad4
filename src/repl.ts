/**
 * Soorj REPL: interactive read-eval-print loop.
 *
 * Usage: soorj            (no arguments)
 *
 * Features:
 *   - One persistent Session across inputs
 *   - Multi-line input (detects unclosed braces/parens)
 *   - Special commands: .help, .example, .exit, .env, .clear, .reset
 *   - Language errors are printed and the loop continues
 *   - Echoes the value of bare expressions (unless հեչ)
 */

import * as readline from 'readline';
import { Session } from './session';
import { SoorjError } from './errors';
import { Environment } from './environment';
import { typeName, valueToString } from './values';

const VERSION = '0.1.0';

export interface ReplState {
  session: Session;
}

export interface ExampleProgram {
  title: string;
  source: string;
}

/** Short programs shown by `.example`. */
export const EXAMPLE_PROGRAMS: readonly ExampleProgram[] = [
  { title: 'Hello world', source: 'գրէ("Բարեւ, աշխարհ")' },
  { title: 'Variables and arithmetic', source: 'ա = 10\nբ = 20\nգրէ("Գումար:", ա + բ)' },
  {
    title: 'Conditionals',
    source: 'ա = 15\nեթե ա > 10 {\n    գրէ("մեծ")\n} հպ {\n    գրէ("փոքր")\n}',
  },
  { title: 'Loops', source: 'ի = 1\nմինչև ի <= 3 {\n    գրէ(ի)\n    ի = ի + 1\n}' },
  { title: 'Functions', source: 'գործ քառակուսի(x) {\n    տուր x * x\n}\nգրէ(քառակուսի(4))' },
];

/**
 * Start the Soorj REPL.
 */
export function startRepl(): void {
  const state: ReplState = { session: new Session({ interactive: true }) };

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'soorj> ',
    terminal: true,
  });

  console.log(`Սուրճ (Soorj) REPL v${VERSION}`);
  console.log('Type .help for commands, .exit to quit.\n');

  let buffer = '';
  let multiLine = false;

  rl.prompt();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();

    if (!multiLine && trimmed.startsWith('.')) {
      handleCommand(trimmed, state, () => rl.close());
      rl.prompt();
      return;
    }

    buffer += (buffer ? '\n' : '') + line;

    if (hasUnclosedDelimiters(buffer)) {
      multiLine = true;
      process.stdout.write('  ... ');
      return;
    }

    multiLine = false;
    const input = buffer.trim();
    buffer = '';

    if (input !== '') {
      evaluateInput(state.session, input);
    }
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nՑտեսություն!');
    process.exit(0);
  });
}

/**
 * Evaluate one input unit, reporting language errors without ending the
 * loop. Anything else (such as a host stack overflow) is fatal.
 */
export function evaluateInput(session: Session, input: string): void {
  try {
    session.run(input);
  } catch (e) {
    if (e instanceof SoorjError) {
      console.error(`  ${e.message}`);
      return;
    }
    const reason = e instanceof Error ? e.message : String(e);
    console.error(`Fatal: ${reason}`);
    process.exit(1);
  }
}

/**
 * Check whether the input has unclosed delimiters.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let braces = 0;
  let parens = 0;
  let inString = false;
  let stringChar = '';
  let escaped = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === stringChar) {
        inString = false;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      inString = true;
      stringChar = ch;
      continue;
    }

    if (ch === '#') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }

    switch (ch) {
      case '{': braces++; break;
      case '}': braces--; break;
      case '(': parens++; break;
      case ')': parens--; break;
    }
  }

  return inString || braces > 0 || parens > 0;
}

/**
 * Handle a REPL special command.
 */
export function handleCommand(cmd: string, state: ReplState, close: () => void): void {
  const command = cmd.split(/\s+/)[0];

  switch (command) {
    case '.help':
      console.log('');
      console.log('REPL Commands:');
      console.log('  .help           Show this help message');
      console.log('  .example        Show example programs');
      console.log('  .exit, .quit    Exit the REPL');
      console.log('  .env            Show variables defined at the top level');
      console.log('  .clear          Clear the screen');
      console.log('  .reset          Discard all definitions and start over');
      console.log('');
      console.log('Keywords:');
      console.log('  եթե if   հպ else   մինչև while   գործ function   տուր return');
      console.log('  այո true   ոչ false   հեչ null   և and   կամ or   չի not');
      console.log('');
      console.log('Builtins:');
      console.log('  գրէ(...) print   թիվ(x) to number   բառ(x) to string');
      console.log('');
      break;

    case '.example':
      printExamples();
      break;

    case '.exit':
    case '.quit':
      close();
      break;

    case '.env':
      printEnvironment(state.session.globals);
      break;

    case '.clear':
      console.clear();
      break;

    case '.reset':
      state.session = new Session({ interactive: true });
      console.log('Session reset.');
      break;

    default:
      console.log(`Unknown command: ${command}. Type .help for available commands.`);
      break;
  }
}

function printExamples(): void {
  console.log('');
  console.log('Example programs:');
  EXAMPLE_PROGRAMS.forEach((example, i) => {
    console.log('');
    console.log(`${i + 1}. ${example.title}:`);
    for (const line of example.source.split('\n')) {
      console.log(`   ${line}`);
    }
  });
  console.log('');
}

/**
 * Print the user-defined bindings of the root scope.
 */
function printEnvironment(env: Environment): void {
  let userVars = 0;
  console.log('');
  for (const [name, value] of env.entries()) {
    // Skip builtins for readability
    if (value.kind === 'function' && value.fn.type === 'builtin') continue;
    const preview = valueToString(value);
    const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
    console.log(`  ${name}: ${typeName(value)} = ${truncated}`);
    userVars++;
  }
  if (userVars === 0) {
    console.log('  (only builtins are defined)');
  }
  console.log('');
}
