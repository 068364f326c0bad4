import type { Output } from '../src/builtins';
import { Session } from '../src/session';

/**
 * Output sink that keeps everything written to it.
 */
export class CapturedOutput implements Output {
  text = '';

  write(text: string): void {
    this.text += text;
  }
}

/**
 * Run a program in a fresh file-mode session and return what it printed.
 */
export function runProgram(source: string): string {
  const output = new CapturedOutput();
  new Session({ output }).run(source);
  return output.text;
}
