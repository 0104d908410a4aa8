/**
 * ContractCheck Contract Model — Metadata-Entry Notation Parser
 *
 * Parses the compact notation kernel-metadata extractors emit for one
 * declared argument:
 *
 *   arg_type(GH_FIELD,    GH_REAL, GH_WRITE, ANY_SPACE_1)
 *   arg_type(GH_SCALAR,   GH_REAL, GH_SUM)
 *   arg_type(GH_OPERATOR, GH_REAL, GH_READ,  W0, W1)
 *
 * Keywords are case-insensitive. Entries after the access mode are space
 * names and are lower-cased.
 *
 * The parser is syntactic only. It does not check access legality or the
 * number of spaces for the kind; the validator reports those. A failed parse
 * never yields a partial descriptor.
 */

import { argument } from './builders.js';
import {
  AccessMode,
  ArgumentKind,
  DataType,
  type NotationResult,
  type ParseError,
} from './types.js';

// ---------------------------------------------------------------------------
// Keyword tables
// ---------------------------------------------------------------------------

const KIND_KEYWORDS: ReadonlyMap<string, ArgumentKind> = new Map([
  ['gh_field', ArgumentKind.Field],
  ['gh_scalar', ArgumentKind.Scalar],
  ['gh_operator', ArgumentKind.Operator],
]);

const DATA_TYPE_KEYWORDS: ReadonlyMap<string, DataType> = new Map([
  ['gh_real', DataType.Real],
  ['gh_integer', DataType.Integer],
  ['gh_logical', DataType.Logical],
]);

const ACCESS_KEYWORDS: ReadonlyMap<string, AccessMode> = new Map([
  ['gh_read', AccessMode.Read],
  ['gh_write', AccessMode.Write],
  ['gh_readwrite', AccessMode.ReadWrite],
  ['gh_inc', AccessMode.Increment],
  ['gh_sum', AccessMode.Sum],
]);

const ENTRY_KEYWORD = 'arg_type';

// ---------------------------------------------------------------------------
// Tokenizer
// ---------------------------------------------------------------------------

type TokenKind = 'ident' | 'lparen' | 'rparen' | 'comma' | 'end';

interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  /** 1-based column of the first character. */
  readonly column: number;
}

type TokenizeResult =
  | { readonly ok: true; readonly tokens: ReadonlyArray<Token> }
  | { readonly ok: false; readonly errors: ReadonlyArray<ParseError> };

const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
  ['(', 'lparen'],
  [')', 'rparen'],
  [',', 'comma'],
]);

function tokenize(source: string): TokenizeResult {
  const tokens: Token[] = [];
  const errors: ParseError[] = [];
  const identifier = /[A-Za-z_][A-Za-z0-9_]*/y;

  let i = 0;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const punct = PUNCTUATION.get(ch);
    if (punct !== undefined) {
      tokens.push({ kind: punct, text: ch, column: i + 1 });
      i++;
      continue;
    }
    identifier.lastIndex = i;
    const match = identifier.exec(source);
    if (match !== null) {
      tokens.push({ kind: 'ident', text: match[0], column: i + 1 });
      i += match[0].length;
      continue;
    }
    errors.push({ column: i + 1, message: `Unexpected character ${JSON.stringify(ch)}` });
    i++;
  }
  tokens.push({ kind: 'end', text: '', column: source.length + 1 });

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, tokens };
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse one `arg_type(...)` entry into an ArgumentDescriptor.
 *
 * @returns the descriptor, or every syntax and keyword error found
 */
export function parseArgumentNotation(source: string): NotationResult {
  const tokenized = tokenize(source);
  if (!tokenized.ok) {
    return tokenized;
  }
  const tokens = tokenized.tokens;
  let pos = 0;

  const peek = (): Token => tokens[Math.min(pos, tokens.length - 1)] ?? endToken(source);
  const fail = (token: Token, message: string): NotationResult => ({
    ok: false,
    errors: [{ column: token.column, message }],
  });

  const head = peek();
  if (head.kind !== 'ident' || head.text.toLowerCase() !== ENTRY_KEYWORD) {
    return fail(head, `Expected '${ENTRY_KEYWORD}' but found ${describeToken(head)}`);
  }
  pos++;

  const open = peek();
  if (open.kind !== 'lparen') {
    return fail(open, `Expected '(' but found ${describeToken(open)}`);
  }
  pos++;

  // Comma-separated identifiers up to the closing parenthesis.
  const items: Token[] = [];
  for (;;) {
    const item = peek();
    if (item.kind !== 'ident') {
      return fail(item, `Expected an entry name but found ${describeToken(item)}`);
    }
    items.push(item);
    pos++;

    const sep = peek();
    if (sep.kind === 'comma') {
      pos++;
      continue;
    }
    if (sep.kind === 'rparen') {
      pos++;
      break;
    }
    return fail(sep, `Expected ',' or ')' but found ${describeToken(sep)}`);
  }

  const trailing = peek();
  if (trailing.kind !== 'end') {
    return fail(trailing, `Unexpected ${describeToken(trailing)} after ')'`);
  }

  const [kindToken, typeToken, accessToken, ...spaceTokens] = items;
  if (kindToken === undefined || typeToken === undefined || accessToken === undefined) {
    return fail(
      items[items.length - 1] ?? head,
      `'${ENTRY_KEYWORD}' needs at least 3 entries (kind, data type, access) but has ${items.length}`,
    );
  }

  const errors: ParseError[] = [];
  const kind = lookup(KIND_KEYWORDS, kindToken, 'argument kind', errors);
  const dataType = lookup(DATA_TYPE_KEYWORDS, typeToken, 'data type', errors);
  const access = lookup(ACCESS_KEYWORDS, accessToken, 'access mode', errors);

  if (kind === undefined || dataType === undefined || access === undefined) {
    return { ok: false, errors };
  }

  const spaces = spaceTokens.map((t) => t.text.toLowerCase());
  return { ok: true, descriptor: argument(kind, dataType, access, spaces) };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function lookup<T>(
  table: ReadonlyMap<string, T>,
  token: Token,
  what: string,
  errors: ParseError[],
): T | undefined {
  const value = table.get(token.text.toLowerCase());
  if (value === undefined) {
    errors.push({
      column: token.column,
      message:
        `Unknown ${what} '${token.text}'. ` +
        `Expected one of: ${[...table.keys()].map((k) => k.toUpperCase()).join(', ')}`,
    });
  }
  return value;
}

function describeToken(token: Token): string {
  return token.kind === 'end' ? 'end of input' : `'${token.text}'`;
}

function endToken(source: string): Token {
  return { kind: 'end', text: '', column: source.length + 1 };
}
