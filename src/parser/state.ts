/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Recovery mode: collect errors and synchronize instead of throwing */
  readonly recoveryMode: boolean;
  /** Errors collected during recovery mode parsing */
  readonly errors: ParseError[];
  /** Nesting depth of the node being parsed */
  depth: number;
}

export interface ParserStateOptions {
  recoveryMode?: boolean;
}

export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens,
    pos: 0,
    recoveryMode: options.recoveryMode ?? false,
    errors: [],
    depth: 0,
  };
}

/** Deepest nesting of statements and expressions the parser accepts */
export const MAX_NESTING_DEPTH = 200;

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** Most recently consumed token @internal */
export function previous(state: ParserState): Token {
  const token = state.tokens[state.pos - 1];
  if (token) return token;
  return current(state);
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** Consume the current token if it has one of the given types @internal */
export function match(state: ParserState, ...types: TokenType[]): boolean {
  if (!check(state, ...types)) return false;
  advance(state);
  return true;
}

/**
 * Consume a token of the given type or throw.
 * `expected` completes the message "Expect {expected}.".
 * @internal
 */
export function expect(
  state: ParserState,
  type: TokenType,
  expected: string
): Token {
  if (check(state, type)) return advance(state);
  throw errorAt(current(state), 'TARN-P002', { expected });
}

// ============================================================
// ERRORS
// ============================================================

/** Build a ParseError pointing at `token` @internal */
export function errorAt(
  token: Token,
  errorId: string,
  context: Record<string, unknown> = {}
): ParseError {
  const where =
    token.type === TOKEN_TYPES.EOF ? ' at end' : ` at '${token.lexeme}'`;
  return new ParseError(errorId, context, token.span.start, where);
}

/**
 * Record an error that does not need resynchronizing.
 * Outside recovery mode it is thrown like any other parse error.
 * @internal
 */
export function reportError(state: ParserState, error: ParseError): void {
  if (!state.recoveryMode) throw error;
  state.errors.push(error);
}

// ============================================================
// NESTING
// ============================================================

/**
 * Enter one level of nesting at `token`.
 * Callers leave with exitNesting(); after an error the enclosing declaration
 * restores the depth.
 * @internal
 */
export function enterNesting(state: ParserState, token: Token): void {
  if (state.depth >= MAX_NESTING_DEPTH) {
    throw errorAt(token, 'TARN-P005', { limit: MAX_NESTING_DEPTH });
  }
  state.depth++;
}

/** @internal */
export function exitNesting(state: ParserState, levels = 1): void {
  state.depth -= levels;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}
