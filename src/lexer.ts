/**
 * Lexer for Soorj source text.
 *
 * Walks the source by code point so that Armenian letters (and any other
 * Unicode letters) are read as single characters.
 */

import { SoorjLexError } from './errors';
import { KEYWORDS, ONE_CHAR_OPERATORS, TWO_CHAR_OPERATORS, type Token } from './tokens';

const LETTER = /\p{L}/u;
const MARK = /\p{M}/u;

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isIdentChar(ch: string): boolean {
  return LETTER.test(ch) || MARK.test(ch) || isDigit(ch);
}

export class Lexer {
  private i = 0;
  private line = 1;
  private col = 1;

  constructor(private readonly src: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (!this.isEOF()) {
      const ch = this.peek();
      if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
        this.advance();
        continue;
      }
      if (ch === '#') {
        this.skipLineComment();
        continue;
      }

      const line = this.line;
      const col = this.col;

      if (isDigit(ch)) {
        tokens.push(this.readNumber(line, col));
        continue;
      }
      if (ch === '"' || ch === "'") {
        tokens.push(this.readString(ch, line, col));
        continue;
      }
      if (LETTER.test(ch)) {
        tokens.push(this.readIdentOrKeyword(line, col));
        continue;
      }

      const pair = ch + this.peek2();
      if (TWO_CHAR_OPERATORS.has(pair)) {
        this.advance();
        this.advance();
        tokens.push({ kind: 'operator', lexeme: pair, line, column: col, endLine: line });
        continue;
      }
      if (ONE_CHAR_OPERATORS.has(ch)) {
        this.advance();
        tokens.push({ kind: 'operator', lexeme: ch, line, column: col, endLine: line });
        continue;
      }

      throw new SoorjLexError(`unrecognized character '${ch}'`, line, col);
    }

    tokens.push({ kind: 'eof', lexeme: '', line: this.line, column: this.col, endLine: this.line });
    return tokens;
  }

  private skipLineComment(): void {
    while (!this.isEOF() && this.peek() !== '\n') {
      this.advance();
    }
  }

  private readNumber(line: number, column: number): Token {
    let text = '';
    while (!this.isEOF() && isDigit(this.peek())) {
      text += this.advance();
    }
    if (this.peek() === '.') {
      text += this.advance();
      while (!this.isEOF() && isDigit(this.peek())) {
        text += this.advance();
      }
    }
    return { kind: 'number', lexeme: text, line, column, endLine: line };
  }

  private readString(quote: string, line: number, column: number): Token {
    this.advance();
    let value = '';
    for (;;) {
      if (this.isEOF()) {
        throw new SoorjLexError('unterminated string', line, column);
      }
      const ch = this.advance();
      if (ch === quote) break;
      if (ch !== '\\') {
        value += ch;
        continue;
      }
      if (this.isEOF()) {
        throw new SoorjLexError('unterminated string', line, column);
      }
      const escaped = this.advance();
      switch (escaped) {
        case 'n': value += '\n'; break;
        case 't': value += '\t'; break;
        case 'r': value += '\r'; break;
        default: value += escaped;
      }
    }
    return { kind: 'string', lexeme: value, line, column, endLine: this.line };
  }

  private readIdentOrKeyword(line: number, column: number): Token {
    let text = '';
    while (!this.isEOF() && isIdentChar(this.peek())) {
      text += this.advance();
    }
    const keyword = KEYWORDS.get(text);
    if (keyword !== undefined) {
      return { kind: 'keyword', lexeme: text, keyword, line, column, endLine: line };
    }
    return { kind: 'identifier', lexeme: text, line, column, endLine: line };
  }

  private isEOF(): boolean {
    return this.i >= this.src.length;
  }

  private peek(): string {
    const cp = this.src.codePointAt(this.i);
    return cp === undefined ? '' : String.fromCodePoint(cp);
  }

  private peek2(): string {
    const cp = this.src.codePointAt(this.i + this.peek().length);
    return cp === undefined ? '' : String.fromCodePoint(cp);
  }

  private advance(): string {
    const ch = this.peek();
    this.i += ch.length;
    if (ch === '\n') {
      this.line++;
      this.col = 1;
    } else {
      this.col++;
    }
    return ch;
  }
}

/**
 * Tokenize a complete source text. The result always ends with an `eof` token.
 */
export function tokenize(source: string): Token[] {
  return new Lexer(source).tokenize();
}
