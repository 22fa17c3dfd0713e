/**
 * Lexer State
 * Tracks position in source text and the errors collected while scanning
 */

import type { SourceLocation } from '../types.js';
import type { LexerError } from './errors.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  /** Errors recorded so far; scanning continues past each one */
  readonly errors: LexerError[];
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
    errors: [],
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume the next character only if it equals `expected` */
export function match(state: LexerState, expected: string): boolean {
  if (isAtEnd(state) || peek(state) !== expected) return false;
  advance(state);
  return true;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}

/** Source text from `start` up to the current position */
export function lexemeFrom(state: LexerState, start: SourceLocation): string {
  return state.source.slice(start.offset, state.pos);
}
