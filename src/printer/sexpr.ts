/**
 * S-Expression Printer
 * Fully parenthesized view of the tree, used to check parse structure.
 */

import type {
  ExpressionNode,
  FunctionDeclNode,
  ProgramNode,
  StatementNode,
} from '../types.js';
import { formatLiteral } from './format.js';

/**
 * @example
 * toSExpr(parse('print 1 + 2 * 3;'))
 * // "(print (+ 1 (* 2 3)))"
 */
export function toSExpr(
  node: ProgramNode | StatementNode | ExpressionNode
): string {
  switch (node.type) {
    case 'Program':
      return node.statements.map(toSExpr).join('\n');

    // Statements
    case 'ExpressionStmt':
      return list('expr', toSExpr(node.expression));
    case 'Print':
      return list('print', toSExpr(node.expression));
    case 'Var':
      return node.initializer
        ? list('var', node.name, toSExpr(node.initializer))
        : list('var', node.name);
    case 'Block':
      return list('block', ...node.statements.map(toSExpr));
    case 'If':
      return node.elseBranch
        ? list(
            'if',
            toSExpr(node.condition),
            toSExpr(node.thenBranch),
            toSExpr(node.elseBranch)
          )
        : list('if', toSExpr(node.condition), toSExpr(node.thenBranch));
    case 'While':
      return list('while', toSExpr(node.condition), toSExpr(node.body));
    case 'For':
      return list(
        'for',
        node.initializer ? toSExpr(node.initializer) : 'nil',
        node.condition ? toSExpr(node.condition) : 'nil',
        node.increment ? toSExpr(node.increment) : 'nil',
        toSExpr(node.body)
      );
    case 'Function':
      return functionSExpr('fun', node);
    case 'Return':
      return node.value ? list('return', toSExpr(node.value)) : list('return');
    case 'Break':
      return list('break');
    case 'Class': {
      const head = node.superclass
        ? ['class', node.name, '<', node.superclass.name]
        : ['class', node.name];
      return list(
        ...head,
        ...node.methods.map((method) => functionSExpr('method', method))
      );
    }

    // Expressions
    case 'Literal':
      return formatLiteral(node.value);
    case 'Grouping':
      return list('group', toSExpr(node.expression));
    case 'Unary':
      return list(node.op, toSExpr(node.operand));
    case 'Binary':
    case 'Logical':
      return list(node.op, toSExpr(node.left), toSExpr(node.right));
    case 'Variable':
      return node.name;
    case 'Assign':
      return list('=', node.name, toSExpr(node.value));
    case 'Call':
      return list('call', toSExpr(node.callee), ...node.args.map(toSExpr));
    case 'Get':
      return list('.', toSExpr(node.object), node.name);
    case 'Set':
      return list('.=', toSExpr(node.object), node.name, toSExpr(node.value));
    case 'This':
      return 'this';
    case 'Super':
      return list('super', node.method);
  }
}

function functionSExpr(head: string, node: FunctionDeclNode): string {
  const params = `(${node.params.map((param) => param.name).join(' ')})`;
  return list(head, node.name, params, ...node.body.map(toSExpr));
}

function list(...parts: string[]): string {
  return `(${parts.join(' ')})`;
}
