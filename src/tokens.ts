/**
 * Token definitions for the Soorj lexer.
 */

export type TokenKind =
  | 'identifier'
  | 'keyword'
  | 'number'
  | 'string'
  | 'operator'
  | 'eof';

export type Keyword =
  | 'if'
  | 'else'
  | 'while'
  | 'function'
  | 'return'
  | 'true'
  | 'false'
  | 'null'
  | 'and'
  | 'or'
  | 'not';

export interface Token {
  kind: TokenKind;
  /** Source text of the token; for strings, the decoded contents. */
  lexeme: string;
  /** Set only on keyword tokens. */
  keyword?: Keyword;
  line: number;
  column: number;
  /** Line of the token's last character; differs from `line` only for strings spanning lines. */
  endLine: number;
}

export const KEYWORDS: ReadonlyMap<string, Keyword> = new Map<string, Keyword>([
  ['եթե', 'if'],
  ['հպ', 'else'],
  ['մինչև', 'while'],
  ['գործ', 'function'],
  ['տուր', 'return'],
  ['այո', 'true'],
  ['ոչ', 'false'],
  ['հեչ', 'null'],
  ['և', 'and'],
  ['կամ', 'or'],
  ['չի', 'not'],
]);

export const TWO_CHAR_OPERATORS = new Set(['==', '!=', '<=', '>=']);

export const ONE_CHAR_OPERATORS = new Set([
  '+', '-', '*', '/', '%', '=', '<', '>', '(', ')', '{', '}', ',', ';',
]);

export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'eof': return 'end of input';
    case 'string': return `string "${token.lexeme}"`;
    case 'number': return `number ${token.lexeme}`;
    case 'keyword': return `keyword '${token.lexeme}'`;
    case 'identifier': return `identifier '${token.lexeme}'`;
    case 'operator': return `'${token.lexeme}'`;
  }
}
