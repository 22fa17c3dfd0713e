/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ProgramNode, Token } from '../types.js';
import type { ParseError } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Program, declarations, panic-mode recovery
 * - parser-control.ts: Blocks, if, while, for, print, return, break
 * - parser-functions.ts: Function and class declarations, call arguments
 * - parser-expr.ts: Expressions, precedence chain
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens, { recoveryMode: true });
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state including tokens, position, and error collection */
  state: ParserState;

  constructor(tokens: Token[], options?: { recoveryMode?: boolean }) {
    this.state = createParserState(tokens, {
      recoveryMode: options?.recoveryMode ?? false,
    });
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ProgramNode {
    return this.parseProgram();
  }

  /**
   * Get collected errors (for recovery mode).
   */
  get errors(): ParseError[] {
    return this.state.errors;
  }
}
