/**
 * Filter string tokenizer
 *
 * Never fails: a literal left open is marked on its token instead.
 * Positions are 0-based character offsets.
 */

export type TokenKind =
  | 'ident'
  | 'quoted_ident'
  | 'string'
  | 'number'
  | 'operator'
  | 'lparen'
  | 'rparen'
  | 'comma'
  | 'symbol';

export interface Token {
  kind: TokenKind;
  /** Source text of the token */
  text: string;
  /** Unescaped content for strings and quoted identifiers */
  value: string;
  position: number;
  /** Quote character for string tokens */
  quote?: "'" | '"';
  /** False when a string or quoted identifier runs to end of input */
  closed: boolean;
}

/** Longest first */
const OPERATORS = ['!~~', '!=', '<>', '<=', '>=', '~~', '=', '<', '>', '~'];

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    pos = skipWhitespace(input, pos);
    if (pos >= input.length) break;

    const char = input[pos];

    if (char === "'" || char === '"') {
      const token = readQuoted(input, pos, char);
      tokens.push(token);
      pos += token.text.length;
      continue;
    }

    if (char === '`') {
      const end = input.indexOf('`', pos + 1);
      const closed = end !== -1;
      const text = closed ? input.slice(pos, end + 1) : input.slice(pos);
      tokens.push({
        kind: 'quoted_ident',
        text,
        value: closed ? text.slice(1, -1) : text.slice(1),
        position: pos,
        closed,
      });
      pos += text.length;
      continue;
    }

    if (char === '(' || char === ')' || char === ',') {
      const kind: TokenKind = char === '(' ? 'lparen' : char === ')' ? 'rparen' : 'comma';
      tokens.push({ kind, text: char, value: char, position: pos, closed: true });
      pos++;
      continue;
    }

    const op = OPERATORS.find((o) => input.startsWith(o, pos));
    if (op) {
      tokens.push({ kind: 'operator', text: op, value: op, position: pos, closed: true });
      pos += op.length;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const start = pos;
      while (pos < input.length && /[A-Za-z0-9_]/.test(input[pos])) {
        pos++;
      }
      const text = input.slice(start, pos);
      tokens.push({ kind: 'ident', text, value: text, position: start, closed: true });
      continue;
    }

    if (/[0-9-]/.test(char)) {
      const start = pos;
      pos++;
      while (pos < input.length && /[0-9.eE]/.test(input[pos])) {
        pos++;
      }
      const text = input.slice(start, pos);
      tokens.push({ kind: 'number', text, value: text, position: start, closed: true });
      continue;
    }

    tokens.push({ kind: 'symbol', text: char, value: char, position: pos, closed: true });
    pos++;
  }

  return tokens;
}

function skipWhitespace(input: string, pos: number): number {
  while (pos < input.length && /\s/.test(input[pos])) {
    pos++;
  }
  return pos;
}

/** Read a quoted literal; a doubled quote inside is an escaped quote */
function readQuoted(input: string, start: number, quote: "'" | '"'): Token {
  let pos = start + 1;
  let value = '';

  while (pos < input.length) {
    const char = input[pos];
    if (char === quote) {
      if (input[pos + 1] === quote) {
        value += quote;
        pos += 2;
        continue;
      }
      return {
        kind: 'string',
        text: input.slice(start, pos + 1),
        value,
        position: start,
        quote,
        closed: true,
      };
    }
    value += char;
    pos++;
  }

  return {
    kind: 'string',
    text: input.slice(start),
    value,
    position: start,
    quote,
    closed: false,
  };
}
