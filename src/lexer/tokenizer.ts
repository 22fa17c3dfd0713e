/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import {
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
  tokenFrom,
} from './helpers.js';
import { EQUALS_SUFFIX_OPERATORS, SINGLE_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber, readString } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  match,
  peek,
} from './state.js';

export interface ScanResult {
  readonly tokens: Token[];
  readonly errors: LexerError[];
}

/** Skip whitespace and `//` line comments */
function skipTrivia(state: LexerState): void {
  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (isWhitespace(ch)) {
      advance(state);
    } else if (ch === '/' && peek(state, 1) === '/') {
      while (!isAtEnd(state) && peek(state) !== '\n') {
        advance(state);
      }
    } else {
      return;
    }
  }
}

/**
 * Read the next token.
 * Throws LexerError after consuming the offending input, so the caller can
 * record it and resume at the next character.
 */
export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', null, loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  if (Object.hasOwn(EQUALS_SUFFIX_OPERATORS, ch)) {
    const pair = EQUALS_SUFFIX_OPERATORS[ch];
    if (pair) {
      advance(state);
      const type = match(state, '=') ? pair.double : pair.single;
      return tokenFrom(state, type, start);
    }
  }

  const singleCharType = Object.hasOwn(SINGLE_CHAR_OPERATORS, ch)
    ? SINGLE_CHAR_OPERATORS[ch]
    : undefined;
  if (singleCharType) {
    advance(state);
    return tokenFrom(state, singleCharType, start);
  }

  advance(state);
  throw new LexerError('TARN-L002', { char: ch }, start);
}

/**
 * Scan source text into tokens, recording every lexical error.
 * The token list always ends with exactly one EOF token.
 */
export function scan(source: string): ScanResult {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  for (;;) {
    let token: Token;
    try {
      token = nextToken(state);
    } catch (error) {
      if (error instanceof LexerError) {
        state.errors.push(error);
        continue;
      }
      throw error;
    }
    tokens.push(token);
    if (token.type === TOKEN_TYPES.EOF) break;
  }

  return { tokens, errors: state.errors };
}

/** Scan source text into tokens, throwing the first lexical error */
export function tokenize(source: string): Token[] {
  const { tokens, errors } = scan(source);
  const [first] = errors;
  if (first) {
    throw first;
  }
  return tokens;
}
