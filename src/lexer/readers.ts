/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, tokenFrom } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a string literal. Strings may span lines and have no escape
 * sequences; the literal excludes the quotes.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  while (!isAtEnd(state) && peek(state) !== '"') {
    advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError('TARN-L001', {}, start);
  }

  advance(state); // consume closing "
  const value = state.source.slice(start.offset + 1, state.pos - 1);
  return tokenFrom(state, TOKEN_TYPES.STRING, start, value);
}

/**
 * Read a number: a digit run with an optional `.digits` fraction.
 * A dot not followed by a digit is left for the DOT token.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);

  while (isDigit(peek(state))) {
    advance(state);
  }

  if (peek(state) === '.' && isDigit(peek(state, 1))) {
    advance(state); // consume .
    while (isDigit(peek(state))) {
      advance(state);
    }
  }

  const text = state.source.slice(start.offset, state.pos);
  return tokenFrom(state, TOKEN_TYPES.NUMBER, start, parseFloat(text));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);

  while (isIdentifierChar(peek(state))) {
    advance(state);
  }

  const text = state.source.slice(start.offset, state.pos);
  return tokenFrom(state, keywordType(text) ?? TOKEN_TYPES.IDENTIFIER, start);
}

function keywordType(text: string): TokenType | undefined {
  return Object.hasOwn(KEYWORDS, text) ? KEYWORDS[text] : undefined;
}
