import { tokenize } from '../src/lexer';
import { SoorjLexError } from '../src/errors';

describe('Lexer', () => {
  test('tokenizes an assignment', () => {
    const tokens = tokenize('ա = 10');
    expect(tokens.map(t => t.kind)).toEqual(['identifier', 'operator', 'number', 'eof']);
    expect(tokens.map(t => t.lexeme)).toEqual(['ա', '=', '10', '']);
  });

  test('recognizes every reserved word', () => {
    const tokens = tokenize('եթե հպ մինչև գործ տուր այո ոչ հեչ և կամ չի');
    expect(tokens.slice(0, -1).every(t => t.kind === 'keyword')).toBe(true);
    expect(tokens.slice(0, -1).map(t => t.keyword)).toEqual([
      'if', 'else', 'while', 'function', 'return', 'true', 'false', 'null', 'and', 'or', 'not',
    ]);
  });

  test('keywords must match the whole identifier run', () => {
    const tokens = tokenize('եթեա կամք');
    expect(tokens.map(t => t.kind)).toEqual(['identifier', 'identifier', 'eof']);
    expect(tokens[0].lexeme).toBe('եթեա');
  });

  test('identifiers may contain digits and Latin letters', () => {
    const tokens = tokenize('power ա2');
    expect(tokens.map(t => [t.kind, t.lexeme])).toEqual([
      ['identifier', 'power'],
      ['identifier', 'ա2'],
      ['eof', ''],
    ]);
  });

  test('numbers with and without a fraction lex to one kind', () => {
    const tokens = tokenize('3.14 42 5.');
    expect(tokens.map(t => t.kind)).toEqual(['number', 'number', 'number', 'eof']);
    expect(tokens.map(t => t.lexeme)).toEqual(['3.14', '42', '5.', '']);
  });

  test('two-character operators win over single characters', () => {
    const tokens = tokenize('<= >= == != < > = %');
    expect(tokens.slice(0, -1).map(t => t.lexeme)).toEqual(['<=', '>=', '==', '!=', '<', '>', '=', '%']);
  });

  test('skips comments and tracks lines and columns', () => {
    const tokens = tokenize('ա = 1 # մեկնաբանություն\n  բ = 2');
    expect(tokens.map(t => t.lexeme)).toEqual(['ա', '=', '1', 'բ', '=', '2', '']);
    expect(tokens[3]).toEqual({ kind: 'identifier', lexeme: 'բ', line: 2, column: 3, endLine: 2 });
  });

  test('strings take either quote and decode escapes', () => {
    const tokens = tokenize(String.raw`"ա\nբ" 'գ\'դ' "\t\\"`);
    expect(tokens.map(t => t.kind)).toEqual(['string', 'string', 'string', 'eof']);
    expect(tokens[0].lexeme).toBe('ա\nբ');
    expect(tokens[1].lexeme).toBe("գ'դ");
    expect(tokens[2].lexeme).toBe('\t\\');
  });

  test('a double-quoted string may hold a single quote', () => {
    expect(tokenize(`"it's"`)[0].lexeme).toBe("it's");
  });

  test('a string may span lines', () => {
    const [str, next] = tokenize('"ա\nբ" +');
    expect(str).toMatchObject({ kind: 'string', lexeme: 'ա\nբ', line: 1, endLine: 2 });
    expect(next).toMatchObject({ lexeme: '+', line: 2, column: 4 });
  });

  test('unterminated string is a LexError at the opening quote', () => {
    expect(() => tokenize('գրէ("բարեւ')).toThrow(SoorjLexError);
    expect(() => tokenize('գրէ("բարեւ')).toThrow('LexError [line 1, col 5]: unterminated string');
  });

  test('unrecognized character is a LexError with its position', () => {
    expect(() => tokenize('ա = 1\nբ = @')).toThrow("LexError [line 2, col 5]: unrecognized character '@'");
  });

  test('a lone ! is not an operator', () => {
    expect(() => tokenize('!ա')).toThrow(SoorjLexError);
  });

  test('always ends with eof', () => {
    const tokens = tokenize('');
    expect(tokens).toEqual([{ kind: 'eof', lexeme: '', line: 1, column: 1, endLine: 1 }]);
  });
});
