#!/usr/bin/env node
/**
 * Soorj interpreter CLI entry point.
 *
 * Usage: soorj                   start the REPL
 *        soorj <file.soorj>
 *        soorj run <file.soorj>
 *        soorj --eval "<code>"
 */

import * as fs from 'fs';
import * as path from 'path';
import { runSource } from './session';
import { SoorjError } from './errors';
import { startRepl } from './repl';

const VERSION = '0.1.0';

/**
 * Run the CLI with the given arguments (without node and script path).
 * Returns the process exit code; the REPL keeps the process alive itself.
 */
export function main(args: string[]): number {
  if (args.length === 0) {
    startRepl();
    return 0;
  }

  if (args[0] === '--help' || args[0] === '-h') {
    printUsage();
    return 0;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`soorj v${VERSION}`);
    return 0;
  }

  let source: string;

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) {
      console.error('Error: --eval requires a code argument');
      return 1;
    }
    source = args[1];
  } else {
    // `soorj run <file>` or the shorthand `soorj <file>`
    const filename = args[0] === 'run' && args.length >= 2 ? args[1] : args[0];
    const resolved = path.resolve(filename);
    if (!fs.existsSync(resolved)) {
      console.error(`Error: File not found: ${resolved}`);
      return 1;
    }
    try {
      source = fs.readFileSync(resolved, 'utf-8');
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      console.error(`Error reading file: ${reason}`);
      return 1;
    }
  }

  try {
    runSource(source);
  } catch (e) {
    if (e instanceof SoorjError) {
      console.error(e.message);
      return 1;
    }
    throw e;
  }
  return 0;
}

function printUsage(): void {
  console.log(`Սուրճ (Soorj) v${VERSION}`);
  console.log('');
  console.log('Usage:');
  console.log('  soorj                       Start interactive REPL');
  console.log('  soorj <file.soorj>          Run a Soorj file');
  console.log('  soorj run <file.soorj>      Run a Soorj file');
  console.log('  soorj --eval "<code>"       Evaluate inline code');
  console.log('  soorj --version             Show the version');
  console.log('  soorj --help                Show this help');
}

if (require.main === module) {
  const code = main(process.argv.slice(2));
  if (code !== 0) process.exit(code);
}
