/**
 * Lexer Errors
 */

export { LexerError } from '../error-classes.js';
