/**
 * Lexer
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { nextToken, scan, tokenize, type ScanResult } from './tokenizer.js';
