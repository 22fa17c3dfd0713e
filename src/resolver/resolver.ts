/**
 * Scope Resolver
 *
 * Static pass between parsing and execution. Walks the AST once, records
 * the hop count of every local reference, and collects semantic errors.
 * The AST is never modified.
 */

import type {
  ClassDeclNode,
  ExpressionNode,
  FunctionDeclNode,
  ProgramNode,
  ResolvableNode,
  SourceSpan,
  StatementNode,
} from '../types.js';
import { ResolveError } from '../types.js';
import type {
  FunctionType,
  ResolveResult,
  ResolverContext,
} from './types.js';

// ============================================================
// ENTRY POINT
// ============================================================

/**
 * Resolve every local reference in a program.
 * Pure: resolving the same AST twice yields identical tables.
 */
export function resolve(program: ProgramNode): ResolveResult {
  const context: ResolverContext = {
    scopes: [],
    locals: new Map(),
    errors: [],
    currentFunction: 'none',
    currentClass: 'none',
    loopDepth: 0,
  };

  resolveStatements(program.statements, context);

  return { locals: context.locals, errors: context.errors };
}

// ============================================================
// SCOPES
// ============================================================

function beginScope(context: ResolverContext): void {
  context.scopes.push(new Map());
}

function endScope(context: ResolverContext): void {
  context.scopes.pop();
}

function innermost(context: ResolverContext): Map<string, boolean> | undefined {
  return context.scopes[context.scopes.length - 1];
}

/** Globals are not tracked; redeclaring a local replaces it */
function declare(context: ResolverContext, name: string): void {
  innermost(context)?.set(name, false);
}

function define(context: ResolverContext, name: string): void {
  innermost(context)?.set(name, true);
}

function resolveLocal(
  context: ResolverContext,
  node: ResolvableNode,
  name: string
): void {
  for (let i = context.scopes.length - 1; i >= 0; i--) {
    if (context.scopes[i]?.has(name)) {
      context.locals.set(node, context.scopes.length - 1 - i);
      return;
    }
  }
}

function error(
  context: ResolverContext,
  errorId: string,
  node: { span: SourceSpan },
  lexeme: string
): void {
  context.errors.push(
    new ResolveError(errorId, {}, node.span.start, ` at '${lexeme}'`)
  );
}

// ============================================================
// STATEMENTS
// ============================================================

function resolveStatements(
  statements: StatementNode[],
  context: ResolverContext
): void {
  for (const stmt of statements) {
    resolveStatement(stmt, context);
  }
}

function resolveStatement(
  node: StatementNode,
  context: ResolverContext
): void {
  switch (node.type) {
    case 'Block':
      beginScope(context);
      resolveStatements(node.statements, context);
      endScope(context);
      break;

    case 'Var':
      declare(context, node.name);
      if (node.initializer) {
        resolveExpression(node.initializer, context);
      }
      define(context, node.name);
      break;

    case 'Function':
      // Defined before the body so the function can call itself
      declare(context, node.name);
      define(context, node.name);
      resolveFunction(node, 'function', context);
      break;

    case 'Class':
      resolveClass(node, context);
      break;

    case 'ExpressionStmt':
    case 'Print':
      resolveExpression(node.expression, context);
      break;

    case 'If':
      resolveExpression(node.condition, context);
      resolveStatement(node.thenBranch, context);
      if (node.elseBranch) {
        resolveStatement(node.elseBranch, context);
      }
      break;

    case 'While':
      resolveExpression(node.condition, context);
      resolveLoopBody(node.body, context);
      break;

    case 'For':
      beginScope(context);
      if (node.initializer) {
        resolveStatement(node.initializer, context);
      }
      if (node.condition) {
        resolveExpression(node.condition, context);
      }
      if (node.increment) {
        resolveExpression(node.increment, context);
      }
      resolveLoopBody(node.body, context);
      endScope(context);
      break;

    case 'Return':
      if (context.currentFunction === 'none') {
        error(context, 'TARN-S002', node, 'return');
      }
      if (node.value) {
        if (context.currentFunction === 'initializer') {
          error(context, 'TARN-S003', node, 'return');
        }
        resolveExpression(node.value, context);
      }
      break;

    case 'Break':
      if (context.loopDepth === 0) {
        error(context, 'TARN-S008', node, 'break');
      }
      break;
  }
}

function resolveLoopBody(body: StatementNode, context: ResolverContext): void {
  context.loopDepth++;
  resolveStatement(body, context);
  context.loopDepth--;
}

function resolveFunction(
  node: FunctionDeclNode,
  type: FunctionType,
  context: ResolverContext
): void {
  const enclosingFunction = context.currentFunction;
  const enclosingLoopDepth = context.loopDepth;
  context.currentFunction = type;
  context.loopDepth = 0;

  beginScope(context);
  for (const param of node.params) {
    declare(context, param.name);
    define(context, param.name);
  }
  resolveStatements(node.body, context);
  endScope(context);

  context.currentFunction = enclosingFunction;
  context.loopDepth = enclosingLoopDepth;
}

function resolveClass(node: ClassDeclNode, context: ResolverContext): void {
  const enclosingClass = context.currentClass;
  context.currentClass = 'class';

  declare(context, node.name);
  define(context, node.name);

  const superclass = node.superclass;
  if (superclass) {
    if (superclass.name === node.name) {
      error(context, 'TARN-S007', superclass, superclass.name);
    }
    context.currentClass = 'subclass';
    resolveExpression(superclass, context);

    beginScope(context);
    define(context, 'super');
  }

  beginScope(context);
  define(context, 'this');

  for (const method of node.methods) {
    const type = method.name === 'init' ? 'initializer' : 'method';
    resolveFunction(method, type, context);
  }

  endScope(context);
  if (superclass) {
    endScope(context);
  }

  context.currentClass = enclosingClass;
}

// ============================================================
// EXPRESSIONS
// ============================================================

function resolveExpression(
  node: ExpressionNode,
  context: ResolverContext
): void {
  switch (node.type) {
    case 'Literal':
      break;

    case 'Grouping':
      resolveExpression(node.expression, context);
      break;

    case 'Unary':
      resolveExpression(node.operand, context);
      break;

    case 'Binary':
    case 'Logical':
      resolveExpression(node.left, context);
      resolveExpression(node.right, context);
      break;

    case 'Variable':
      if (innermost(context)?.get(node.name) === false) {
        error(context, 'TARN-S001', node, node.name);
      }
      resolveLocal(context, node, node.name);
      break;

    case 'Assign':
      resolveExpression(node.value, context);
      resolveLocal(context, node, node.name);
      break;

    case 'Call':
      resolveExpression(node.callee, context);
      for (const arg of node.args) {
        resolveExpression(arg, context);
      }
      break;

    case 'Get':
      resolveExpression(node.object, context);
      break;

    case 'Set':
      resolveExpression(node.value, context);
      resolveExpression(node.object, context);
      break;

    case 'This':
      if (context.currentClass === 'none') {
        error(context, 'TARN-S004', node, 'this');
        break;
      }
      resolveLocal(context, node, 'this');
      break;

    case 'Super':
      if (context.currentClass === 'none') {
        error(context, 'TARN-S005', node, 'super');
      } else if (context.currentClass !== 'subclass') {
        error(context, 'TARN-S006', node, 'super');
      } else {
        resolveLocal(context, node, 'super');
      }
      break;
  }
}
