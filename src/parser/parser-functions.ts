/**
 * Parser Extension: Function Parsing
 * Function and class declarations, call argument lists
 */

import { Parser } from './parser.js';
import type {
  CallNode,
  ClassDeclNode,
  ExpressionNode,
  FunctionDeclNode,
  ParamNode,
  VariableNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  check,
  current,
  errorAt,
  expect,
  isAtEnd,
  makeSpan,
  match,
  previous,
  reportError,
} from './state.js';

/** Maximum parameters in a declaration and arguments in a call */
export const MAX_ARITY = 255;

export type FunctionKind = 'function' | 'method';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunction(kind: FunctionKind): FunctionDeclNode;
    parseClassDeclaration(): ClassDeclNode;
    finishCall(callee: ExpressionNode): CallNode;
  }
}

// ============================================================
// FUNCTION DECLARATIONS
// ============================================================

/**
 * Parse `name(params) { body }`.
 * For functions the `fun` keyword has already been consumed.
 */
Parser.prototype.parseFunction = function (
  this: Parser,
  kind: FunctionKind
): FunctionDeclNode {
  const start =
    kind === 'function'
      ? previous(this.state).span.start
      : current(this.state).span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, `${kind} name`);

  expect(this.state, TOKEN_TYPES.LPAREN, `'(' after ${kind} name`);
  const params: ParamNode[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      if (params.length >= MAX_ARITY) {
        reportError(
          this.state,
          errorAt(current(this.state), 'TARN-P004', {
            limit: MAX_ARITY,
            kind: 'parameters',
          })
        );
      }
      const param = expect(
        this.state,
        TOKEN_TYPES.IDENTIFIER,
        'parameter name'
      );
      params.push({ name: param.lexeme, span: param.span });
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }
  expect(this.state, TOKEN_TYPES.RPAREN, "')' after parameters");

  expect(this.state, TOKEN_TYPES.LBRACE, `'{' before ${kind} body`);
  const body = this.parseBlockStatements();

  return {
    type: 'Function',
    name: name.lexeme,
    params,
    body,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

// ============================================================
// CLASS DECLARATIONS
// ============================================================

Parser.prototype.parseClassDeclaration = function (
  this: Parser
): ClassDeclNode {
  const start = previous(this.state).span.start;
  const name = expect(this.state, TOKEN_TYPES.IDENTIFIER, 'class name');

  let superclass: VariableNode | null = null;
  if (match(this.state, TOKEN_TYPES.LT)) {
    const superName = expect(
      this.state,
      TOKEN_TYPES.IDENTIFIER,
      'superclass name'
    );
    superclass = {
      type: 'Variable',
      name: superName.lexeme,
      span: superName.span,
    };
  }

  expect(this.state, TOKEN_TYPES.LBRACE, "'{' before class body");

  const methods: FunctionDeclNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE) && !isAtEnd(this.state)) {
    methods.push(this.parseFunction('method'));
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "'}' after class body");

  return {
    type: 'Class',
    name: name.lexeme,
    superclass,
    methods,
    span: makeSpan(start, previous(this.state).span.end),
  };
};

// ============================================================
// CALL ARGUMENTS
// ============================================================

/** Parse `(args)` after a callee; the `(` has already been consumed */
Parser.prototype.finishCall = function (
  this: Parser,
  callee: ExpressionNode
): CallNode {
  const args: ExpressionNode[] = [];
  if (!check(this.state, TOKEN_TYPES.RPAREN)) {
    do {
      if (args.length >= MAX_ARITY) {
        reportError(
          this.state,
          errorAt(current(this.state), 'TARN-P004', {
            limit: MAX_ARITY,
            kind: 'arguments',
          })
        );
      }
      args.push(this.parseExpression());
    } while (match(this.state, TOKEN_TYPES.COMMA));
  }

  const paren = expect(this.state, TOKEN_TYPES.RPAREN, "')' after arguments");

  return {
    type: 'Call',
    callee,
    args,
    span: makeSpan(callee.span.start, paren.span.end),
  };
};
