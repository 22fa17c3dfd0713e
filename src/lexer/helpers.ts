/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type {
  LiteralValue,
  SourceLocation,
  Token,
  TokenType,
} from '../types.js';
import { currentLocation, lexemeFrom, type LexerState } from './state.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

export function makeToken(
  type: TokenType,
  lexeme: string,
  literal: LiteralValue,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, lexeme, literal, span: { start, end } };
}

/** Build a token whose lexeme runs from `start` to the current position */
export function tokenFrom(
  state: LexerState,
  type: TokenType,
  start: SourceLocation,
  literal: LiteralValue = null
): Token {
  return makeToken(
    type,
    lexemeFrom(state, start),
    literal,
    start,
    currentLocation(state)
  );
}
