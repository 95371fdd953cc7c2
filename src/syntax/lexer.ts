import moo from 'moo';
import keywords from '../data/keywords.json';

export type TokenType =
  | 'keyword'
  | 'identifier'
  | 'number'
  | 'string'
  | 'op'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'comma'
  | 'semicolon'
  | 'colon'
  | 'range'
  | 'dot'
  | 'error'
  | 'eof';

export interface Token {
  type: TokenType;
  text: string;
  /** Lower-cased for keywords, raw text otherwise. */
  value: string;
  line: number;
  col: number;
  offset: number;
}

const RESERVED_WORDS: ReadonlySet<string> = new Set(keywords.reserved);

export function isReservedWord(text: string): boolean {
  return RESERVED_WORDS.has(text.toLowerCase());
}

const TOKEN_TYPES: ReadonlySet<string> = new Set<TokenType>([
  'keyword', 'identifier', 'number', 'string', 'op', 'lparen', 'rparen',
  'lbracket', 'rbracket', 'comma', 'semicolon', 'colon', 'range', 'dot', 'error',
]);

function isTokenType(type: string): type is TokenType {
  return TOKEN_TYPES.has(type);
}

function createLexer(): moo.Lexer {
  // Rule order matters: comments before '(' and '/', ':=' before ':', '..' before '.'
  return moo.compile({
    ws: { match: /[ \t\r\n\f]+/, lineBreaks: true },
    comment: [
      { match: /\/\/[^\n]*/ },
      { match: /\{[^}]*\}/, lineBreaks: true },
      { match: /\(\*[\s\S]*?\*\)/, lineBreaks: true },
    ],
    string: [
      { match: /'(?:[^'\n]|'')*'/ },
      { match: /"(?:[^"\n\\]|\\.)*"/ },
    ],
    number: [
      { match: /\$[0-9A-Fa-f]+/ },
      { match: /[0-9]+(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?/ },
    ],
    identifier: {
      match: /[A-Za-z_][A-Za-z0-9_]*/,
      type: (text: string) => (isReservedWord(text) ? 'keyword' : 'identifier'),
    },
    op: [':=', '=>', '+=', '-=', '*=', '/=', '<>', '<=', '>=', '+', '-', '*', '/', '=', '<', '>', '@', '^'],
    lparen: '(',
    rparen: ')',
    lbracket: '[',
    rbracket: ']',
    comma: ',',
    semicolon: ';',
    colon: ':',
    range: '..',
    dot: '.',
    error: moo.error,
  });
}

/**
 * Tokenizes DWScript source, dropping whitespace and comments.
 * The returned list always ends with an `eof` token.
 */
export function tokenize(source: string): Token[] {
  const lexer = createLexer();
  lexer.reset(source);

  const tokens: Token[] = [];
  for (const token of lexer) {
    const type = token.type ?? 'error';
    if (type === 'ws' || type === 'comment') continue;
    if (!isTokenType(type)) continue;
    // moo's error token swallows the rest of the input; keep only the offending character.
    const text = type === 'error' ? token.text.charAt(0) : token.text;
    tokens.push({
      type,
      text,
      value: type === 'keyword' ? text.toLowerCase() : text,
      line: token.line,
      col: token.col,
      offset: token.offset,
    });
    if (type === 'error') break;
  }

  const lines = source.split('\n');
  tokens.push({
    type: 'eof',
    text: '',
    value: '',
    line: lines.length,
    col: lines[lines.length - 1].length + 1,
    offset: source.length,
  });
  return tokens;
}
