/**
 * Source Printer
 * Renders an AST back to canonical Tarn source.
 */

import type {
  ExpressionNode,
  FunctionDeclNode,
  LiteralValue,
  ProgramNode,
  StatementNode,
} from '../types.js';
import { formatNumber } from '../runtime/core/values.js';

const INDENT = '  ';

// ============================================================
// ENTRY POINT
// ============================================================

/**
 * Print a program, statement or expression as source text.
 *
 * Parentheses come only from Grouping nodes, so printing a parsed program
 * and parsing the result gives back the same tree.
 *
 * @example
 * formatSource(parse('var a=1+(2*3);'))
 * // "var a = 1 + (2 * 3);\n"
 */
export function formatSource(
  node: ProgramNode | StatementNode | ExpressionNode
): string {
  if (node.type === 'Program') {
    return node.statements.map((stmt) => formatStatement(stmt, 0) + '\n').join('');
  }
  if (isStatement(node)) {
    return formatStatement(node, 0);
  }
  return formatExpression(node);
}

function isStatement(
  node: StatementNode | ExpressionNode
): node is StatementNode {
  switch (node.type) {
    case 'ExpressionStmt':
    case 'Print':
    case 'Var':
    case 'Block':
    case 'If':
    case 'While':
    case 'For':
    case 'Function':
    case 'Return':
    case 'Break':
    case 'Class':
      return true;
    default:
      return false;
  }
}

// ============================================================
// STATEMENTS
// ============================================================

/** Print a statement; the first line carries no indentation of its own */
function formatStatement(node: StatementNode, depth: number): string {
  switch (node.type) {
    case 'ExpressionStmt':
      return `${formatExpression(node.expression)};`;
    case 'Print':
      return `print ${formatExpression(node.expression)};`;
    case 'Var':
      return node.initializer
        ? `var ${node.name} = ${formatExpression(node.initializer)};`
        : `var ${node.name};`;
    case 'Block':
      return formatBody(node.statements, depth);
    case 'If': {
      const head = `if (${formatExpression(node.condition)}) ${formatStatement(node.thenBranch, depth)}`;
      if (!node.elseBranch) return head;
      return `${head} else ${formatStatement(node.elseBranch, depth)}`;
    }
    case 'While':
      return `while (${formatExpression(node.condition)}) ${formatStatement(node.body, depth)}`;
    case 'For': {
      const init = node.initializer
        ? formatStatement(node.initializer, depth)
        : ';';
      const condition = node.condition
        ? ` ${formatExpression(node.condition)}`
        : '';
      const increment = node.increment
        ? ` ${formatExpression(node.increment)}`
        : '';
      return `for (${init}${condition};${increment}) ${formatStatement(node.body, depth)}`;
    }
    case 'Function':
      return `fun ${formatFunction(node, depth)}`;
    case 'Return':
      return node.value ? `return ${formatExpression(node.value)};` : 'return;';
    case 'Break':
      return 'break;';
    case 'Class': {
      const superclass = node.superclass ? ` < ${node.superclass.name}` : '';
      if (node.methods.length === 0) {
        return `class ${node.name}${superclass} {}`;
      }
      const inner = INDENT.repeat(depth + 1);
      const methods = node.methods
        .map((method) => `${inner}${formatFunction(method, depth + 1)}\n`)
        .join('');
      return `class ${node.name}${superclass} {\n${methods}${INDENT.repeat(depth)}}`;
    }
  }
}

function formatFunction(node: FunctionDeclNode, depth: number): string {
  const params = node.params.map((param) => param.name).join(', ');
  return `${node.name}(${params}) ${formatBody(node.body, depth)}`;
}

function formatBody(statements: StatementNode[], depth: number): string {
  if (statements.length === 0) return '{}';
  const inner = INDENT.repeat(depth + 1);
  const lines = statements
    .map((stmt) => `${inner}${formatStatement(stmt, depth + 1)}\n`)
    .join('');
  return `{\n${lines}${INDENT.repeat(depth)}}`;
}

// ============================================================
// EXPRESSIONS
// ============================================================

function formatExpression(node: ExpressionNode): string {
  switch (node.type) {
    case 'Literal':
      return formatLiteral(node.value);
    case 'Grouping':
      return `(${formatExpression(node.expression)})`;
    case 'Unary':
      return `${node.op}${formatExpression(node.operand)}`;
    case 'Binary':
    case 'Logical':
      return `${formatExpression(node.left)} ${node.op} ${formatExpression(node.right)}`;
    case 'Variable':
      return node.name;
    case 'Assign':
      return `${node.name} = ${formatExpression(node.value)}`;
    case 'Call':
      return `${formatExpression(node.callee)}(${node.args.map(formatExpression).join(', ')})`;
    case 'Get':
      return `${formatExpression(node.object)}.${node.name}`;
    case 'Set':
      return `${formatExpression(node.object)}.${node.name} = ${formatExpression(node.value)}`;
    case 'This':
      return 'this';
    case 'Super':
      return `super.${node.method}`;
  }
}

/** Literal as written in source; strings have no escapes */
export function formatLiteral(value: LiteralValue): string {
  if (value === null) return 'nil';
  if (typeof value === 'string') return `"${value}"`;
  if (typeof value === 'number') return formatNumberLiteral(value);
  return value ? 'true' : 'false';
}

/**
 * Number in plain decimal digits. Source has no exponent syntax, so the
 * exponent form of very large and very small values is expanded.
 */
function formatNumberLiteral(value: number): string {
  const text = formatNumber(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) return text;

  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) {
    return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
