/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals, loops, and simple statements
 */

import { Parser } from './parser.js';
import type {
  BlockNode,
  BreakNode,
  ExpressionStmtNode,
  ForNode,
  IfNode,
  PrintNode,
  ReturnNode,
  StatementNode,
  WhileNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  check,
  current,
  enterNesting,
  exitNesting,
  expect,
  isAtEnd,
  makeSpan,
  match,
  previous,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): BlockNode;
    parseBlockStatements(): StatementNode[];
    parseIf(): IfNode;
    parseWhile(): WhileNode;
    parseFor(): ForNode;
    parsePrint(): PrintNode;
    parseReturn(): ReturnNode;
    parseBreak(): BreakNode;
    parseExpressionStatement(): ExpressionStmtNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

Parser.prototype.parseBlock = function (this: Parser): BlockNode {
  const start = current(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LBRACE, "'{' before block");
  const statements = this.parseBlockStatements();
  return {
    type: 'Block',
    statements,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

/** Parse declarations up to and including the closing `}` */
Parser.prototype.parseBlockStatements = function (
  this: Parser
): StatementNode[] {
  const statements: StatementNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACE) && !isAtEnd(this.state)) {
    const stmt = this.parseDeclaration();
    if (stmt) statements.push(stmt);
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}' after block");
  return statements;
};

// ============================================================
// CONDITIONALS AND LOOPS
// ============================================================

Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = previous(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'if'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after if condition");

  enterNesting(this.state, current(this.state));
  const thenBranch = this.parseStatement();
  // Dangling else binds to the nearest if
  const elseBranch = match(this.state, TOKEN_TYPES.ELSE)
    ? this.parseStatement()
    : null;
  exitNesting(this.state);

  return {
    type: 'If',
    condition,
    thenBranch,
    elseBranch,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = previous(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'while'");
  const condition = this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after condition");
  enterNesting(this.state, current(this.state));
  const body = this.parseStatement();
  exitNesting(this.state);

  return {
    type: 'While',
    condition,
    body,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = previous(this.state).span.start;
  expect(this.state, TOKEN_TYPES.LPAREN, "'(' after 'for'");

  let initializer: ForNode['initializer'];
  if (match(this.state, TOKEN_TYPES.SEMICOLON)) {
    initializer = null;
  } else if (match(this.state, TOKEN_TYPES.VAR)) {
    initializer = this.parseVarDeclaration();
  } else {
    initializer = this.parseExpressionStatement();
  }

  const condition = check(this.state, TOKEN_TYPES.SEMICOLON)
    ? null
    : this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after loop condition");

  const increment = check(this.state, TOKEN_TYPES.RPAREN)
    ? null
    : this.parseExpression();
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after for clauses");

  enterNesting(this.state, current(this.state));
  const body = this.parseStatement();
  exitNesting(this.state);

  return {
    type: 'For',
    initializer,
    condition,
    increment,
    body,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

// ============================================================
// SIMPLE STATEMENTS
// ============================================================

Parser.prototype.parsePrint = function (this: Parser): PrintNode {
  const start = previous(this.state).span.start;
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after value");
  return {
    type: 'Print',
    expression,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const start = previous(this.state).span.start;
  const value = check(this.state, TOKEN_TYPES.SEMICOLON)
    ? null
    : this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after return value");
  return {
    type: 'Return',
    value,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

Parser.prototype.parseBreak = function (this: Parser): BreakNode {
  const start = previous(this.state).span.start;
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after 'break'");
  return {
    type: 'Break',
    span: makeSpan(start, previous(this.state).span.end),
  };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStmtNode {
  const start = current(this.state).span.start;
  const expression = this.parseExpression();
  expect(this.state, TOKEN_TYPES.SEMICOLON, "';' after expression");
  return {
    type: 'ExpressionStmt',
    expression,
    span: makeSpan(start, previous(this.state).span.end),
  };
};
