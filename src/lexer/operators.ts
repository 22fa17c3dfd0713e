/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/**
 * Operators that become two characters when followed by `=`.
 * Maximal munch: `!=` is one token, never `!` then `=`.
 */
export const EQUALS_SUFFIX_OPERATORS: Record<
  string,
  { single: TokenType; double: TokenType }
> = {
  '!': { single: TOKEN_TYPES.BANG, double: TOKEN_TYPES.NE },
  '=': { single: TOKEN_TYPES.ASSIGN, double: TOKEN_TYPES.EQ },
  '<': { single: TOKEN_TYPES.LT, double: TOKEN_TYPES.LE },
  '>': { single: TOKEN_TYPES.GT, double: TOKEN_TYPES.GE },
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.DOT,
  '-': TOKEN_TYPES.MINUS,
  '+': TOKEN_TYPES.PLUS,
  ';': TOKEN_TYPES.SEMICOLON,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
};

/** Reserved words; never valid as identifiers */
export const KEYWORDS: Record<string, TokenType> = {
  and: TOKEN_TYPES.AND,
  break: TOKEN_TYPES.BREAK,
  class: TOKEN_TYPES.CLASS,
  else: TOKEN_TYPES.ELSE,
  false: TOKEN_TYPES.FALSE,
  for: TOKEN_TYPES.FOR,
  fun: TOKEN_TYPES.FUN,
  if: TOKEN_TYPES.IF,
  nil: TOKEN_TYPES.NIL,
  or: TOKEN_TYPES.OR,
  print: TOKEN_TYPES.PRINT,
  return: TOKEN_TYPES.RETURN,
  super: TOKEN_TYPES.SUPER,
  this: TOKEN_TYPES.THIS,
  true: TOKEN_TYPES.TRUE,
  var: TOKEN_TYPES.VAR,
  while: TOKEN_TYPES.WHILE,
};
