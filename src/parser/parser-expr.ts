/**
 * Parser Extension: Expression Parsing
 * Precedence chain from assignment down to primary
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  LogicalOp,
  TokenType,
  UnaryOp,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  advance,
  check,
  current,
  enterNesting,
  errorAt,
  exitNesting,
  expect,
  makeSpan,
  match,
  previous,
  reportError,
} from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAssignment(): ExpressionNode;
    parseOr(): ExpressionNode;
    parseAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseTerm(): ExpressionNode;
    parseFactor(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseCall(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseBinaryLevel(
      operators: Partial<Record<TokenType, BinaryOp>>,
      next: () => ExpressionNode
    ): ExpressionNode;
  }
}

const EQUALITY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
};

const COMPARISON_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
};

const TERM_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const FACTOR_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
};

const UNARY_OPS: Partial<Record<TokenType, UnaryOp>> = {
  [TOKEN_TYPES.BANG]: '!',
  [TOKEN_TYPES.MINUS]: '-',
};

// ============================================================
// ASSIGNMENT AND LOGIC
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAssignment();
};

/**
 * Assignment is right-associative. The target is parsed as an ordinary
 * expression first, then checked: only variables and property gets can be
 * assigned. An invalid target is reported without unwinding.
 */
Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const expr = this.parseOr();

  if (!check(this.state, TOKEN_TYPES.ASSIGN)) return expr;

  const equals = current(this.state);
  enterNesting(this.state, equals);
  advance(this.state);
  const value = this.parseAssignment();
  exitNesting(this.state);
  const span = makeSpan(expr.span.start, value.span.end);

  if (expr.type === 'Variable') {
    return { type: 'Assign', name: expr.name, value, span };
  }
  if (expr.type === 'Get') {
    return { type: 'Set', object: expr.object, name: expr.name, value, span };
  }

  reportError(this.state, errorAt(equals, 'TARN-P003'));
  return expr;
};

function parseLogical(
  parser: Parser,
  type: TokenType,
  op: LogicalOp,
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();
  let levels = 0;
  while (check(parser.state, type)) {
    enterNesting(parser.state, advance(parser.state));
    levels++;
    const right = next();
    left = {
      type: 'Logical',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
  exitNesting(parser.state, levels);
  return left;
}

Parser.prototype.parseOr = function (this: Parser): ExpressionNode {
  return parseLogical(this, TOKEN_TYPES.OR, 'or', () => this.parseAnd());
};

Parser.prototype.parseAnd = function (this: Parser): ExpressionNode {
  return parseLogical(this, TOKEN_TYPES.AND, 'and', () =>
    this.parseEquality()
  );
};

// ============================================================
// BINARY PRECEDENCE CHAIN
// ============================================================

/**
 * Left-associative loop shared by every binary precedence level.
 * Each operator nests the operands before it one level deeper.
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: Partial<Record<TokenType, BinaryOp>>,
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();
  let levels = 0;

  for (;;) {
    const token = current(this.state);
    const op = operators[token.type];
    if (op === undefined) {
      exitNesting(this.state, levels);
      return left;
    }
    enterNesting(this.state, token);
    levels++;
    advance(this.state);
    const right = next();
    left = {
      type: 'Binary',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseTerm());
};

Parser.prototype.parseTerm = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(TERM_OPS, () => this.parseFactor());
};

Parser.prototype.parseFactor = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(FACTOR_OPS, () => this.parseUnary());
};

// ============================================================
// UNARY, CALL, PRIMARY
// ============================================================

Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const op = UNARY_OPS[token.type];
  if (op === undefined) return this.parseCall();

  enterNesting(this.state, token);
  const start = advance(this.state).span.start;
  const operand = this.parseUnary();
  exitNesting(this.state);
  return {
    type: 'Unary',
    op,
    operand,
    span: makeSpan(start, operand.span.end),
  };
};

Parser.prototype.parseCall = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();
  let levels = 0;

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN, TOKEN_TYPES.DOT)) {
      enterNesting(this.state, current(this.state));
      levels++;
    }
    if (match(this.state, TOKEN_TYPES.LPAREN)) {
      expr = this.finishCall(expr);
    } else if (match(this.state, TOKEN_TYPES.DOT)) {
      const name = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        "property name after '.'"
      );
      expr = {
        type: 'Get',
        object: expr,
        name: name.lexeme,
        span: makeSpan(expr.span.start, name.span.end),
      };
    } else {
      exitNesting(this.state, levels);
      return expr;
    }
  }
};

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const span = token.span;

  switch (token.type) {
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return { type: 'Literal', value: false, span };
    case TOKEN_TYPES.TRUE:
      advance(this.state);
      return { type: 'Literal', value: true, span };
    case TOKEN_TYPES.NIL:
      advance(this.state);
      return { type: 'Literal', value: null, span };
    case TOKEN_TYPES.NUMBER:
    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'Literal', value: token.literal, span };
    case TOKEN_TYPES.THIS:
      advance(this.state);
      return { type: 'This', span };
    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Variable', name: token.lexeme, span };
    case TOKEN_TYPES.SUPER: {
      advance(this.state);
      expect(this.state, TOKEN_TYPES.DOT, "'.' after 'super'");
      const method = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        'superclass method name'
      );
      return {
        type: 'Super',
        method: method.lexeme,
        span: makeSpan(span.start, method.span.end),
      };
    }
    case TOKEN_TYPES.LPAREN: {
      enterNesting(this.state, token);
      advance(this.state);
      const expression = this.parseExpression();
      expect(this.state, TOKEN_TYPES.RPAREN, "')' after expression");
      exitNesting(this.state);
      return {
        type: 'Grouping',
        expression,
        span: makeSpan(span.start, previous(this.state).span.end),
      };
    }
    default:
      throw errorAt(token, 'TARN-P001');
  }
};
