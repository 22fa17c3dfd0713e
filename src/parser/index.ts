/**
 * Tarn Parser
 * Main entry point and re-exports
 */

import { scan, tokenize } from '../lexer/index.js';
import type { LexerError, ParseError, ProgramNode, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';

export interface ParseResult {
  /** Program holding every declaration that parsed cleanly */
  readonly ast: ProgramNode;
  readonly errors: (LexerError | ParseError)[];
  readonly success: boolean;
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse Tarn source code into an AST.
 *
 * Throws the first LexerError or ParseError.
 *
 * @example
 * ```typescript
 * const ast = parse('print 1 + 2;');
 * ```
 */
export function parse(source: string): ProgramNode {
  const tokens = tokenize(source);
  const parser = new Parser(tokens, { recoveryMode: false });
  return parser.parse();
}

/**
 * Parse a token stream with panic-mode recovery.
 *
 * Each failed declaration is recorded and skipped, so one pass reports
 * errors from several statements.
 */
export function parseTokens(tokens: Token[]): ParseResult {
  const parser = new Parser(tokens, { recoveryMode: true });
  const ast = parser.parse();

  return {
    ast,
    errors: parser.errors,
    success: parser.errors.length === 0,
  };
}

/**
 * Scan and parse Tarn source code, collecting lexer and parse errors
 * instead of throwing.
 *
 * @example
 * ```typescript
 * const result = parseWithRecovery(source);
 * if (!result.success) {
 *   console.log('Errors:', result.errors);
 * }
 * ```
 */
export function parseWithRecovery(source: string): ParseResult {
  const scanned = scan(source);
  const parsed = parseTokens(scanned.tokens);
  const errors = [...scanned.errors, ...parsed.errors];

  return {
    ast: parsed.ast,
    errors,
    success: errors.length === 0,
  };
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
export { MAX_ARITY, type FunctionKind } from './parser-functions.js';
