/**
 * Parser Extension: Program Parsing
 * Program, declarations, and panic-mode recovery
 */

import { Parser } from './parser.js';
import type { ProgramNode, StatementNode, VarDeclNode } from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  enterNesting,
  expect,
  isAtEnd,
  makeSpan,
  match,
  previous,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): ProgramNode;
    parseDeclaration(): StatementNode | null;
    parseVarDeclaration(): VarDeclNode;
    parseStatement(): StatementNode;
    synchronize(): void;
  }
}

/** Tokens that begin a declaration or statement; recovery stops before them */
const STATEMENT_STARTS = [
  TOKEN_TYPES.CLASS,
  TOKEN_TYPES.FUN,
  TOKEN_TYPES.VAR,
  TOKEN_TYPES.FOR,
  TOKEN_TYPES.IF,
  TOKEN_TYPES.WHILE,
  TOKEN_TYPES.PRINT,
  TOKEN_TYPES.RETURN,
] as const;

// ============================================================
// PROGRAM PARSING
// ============================================================

Parser.prototype.parseProgram = function (this: Parser): ProgramNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    const stmt = this.parseDeclaration();
    if (stmt) statements.push(stmt);
  }

  return {
    type: 'Program',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

/**
 * Parse one declaration. In recovery mode a failed declaration is recorded,
 * the parser synchronizes, and null is returned in place of a node.
 * Input nested too deeply fails the outermost declaration instead.
 */
Parser.prototype.parseDeclaration = function (
  this: Parser
): StatementNode | null {
  const depth = this.state.depth;
  try {
    enterNesting(this.state, current(this.state));
    if (match(this.state, TOKEN_TYPES.CLASS)) {
      return this.parseClassDeclaration();
    }
    if (match(this.state, TOKEN_TYPES.FUN)) {
      return this.parseFunction('function');
    }
    if (match(this.state, TOKEN_TYPES.VAR)) {
      return this.parseVarDeclaration();
    }
    return this.parseStatement();
  } catch (err) {
    if (!this.state.recoveryMode || !(err instanceof ParseError)) {
      throw err;
    }
    if (err.errorId === 'TARN-P005' && depth > 0) throw err;
    this.state.errors.push(err);
    this.synchronize();
    return null;
  } finally {
    this.state.depth = depth;
  }
};

Parser.prototype.synchronize = function (this: Parser): void {
  advance(this.state);

  while (!isAtEnd(this.state)) {
    if (previous(this.state).type === TOKEN_TYPES.SEMICOLON) return;
    if (check(this.state, ...STATEMENT_STARTS)) return;
    advance(this.state);
  }
};

/** Parse `var name (= expr)? ;` after the `var` keyword */
Parser.prototype.parseVarDeclaration = function (this: Parser): VarDeclNode {
  const start = previous(this.state).span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'variable name');

  const initializer = match(this.state, TOKEN_TYPES.ASSIGN)
    ? this.parseExpression()
    : null;

  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after variable declaration");

  return {
    type: 'Var',
    name: name.lexeme,
    initializer,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  if (match(this.state, TOKEN_TYPES.FOR)) return this.parseFor();
  if (match(this.state, TOKEN_TYPES.IF)) return this.parseIf();
  if (match(this.state, TOKEN_TYPES.PRINT)) return this.parsePrint();
  if (match(this.state, TOKEN_TYPES.RETURN)) return this.parseReturn();
  if (match(this.state, TOKEN_TYPES.WHILE)) return this.parseWhile();
  if (match(this.state, TOKEN_TYPES.BREAK)) return this.parseBreak();
  if (check(this.state, TOKEN_TYPES.LBRACE)) return this.parseBlock();
  return this.parseExpressionStatement();
};
