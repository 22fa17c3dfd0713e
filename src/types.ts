/**
 * Tarn AST Types
 * Tokens, source locations and the expression/statement node unions
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  createError,
  isStackOverflow,
  LexerError,
  ParseError,
  ResolveError,
  RuntimeError,
  TarnError,
  type TarnErrorData,
} from './error-classes.js';

// ============================================================
// TOKENS
// ============================================================

export const TOKEN_TYPES = {
  // Punctuation
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',
  COMMA: 'COMMA',
  DOT: 'DOT',
  SEMICOLON: 'SEMICOLON',

  // Operators
  MINUS: 'MINUS',
  PLUS: 'PLUS',
  SLASH: 'SLASH',
  STAR: 'STAR',
  BANG: 'BANG',
  NE: 'NE',
  ASSIGN: 'ASSIGN',
  EQ: 'EQ',
  GT: 'GT',
  GE: 'GE',
  LT: 'LT',
  LE: 'LE',

  // Literals
  IDENTIFIER: 'IDENTIFIER',
  STRING: 'STRING',
  NUMBER: 'NUMBER',

  // Keywords
  AND: 'AND',
  BREAK: 'BREAK',
  CLASS: 'CLASS',
  ELSE: 'ELSE',
  FALSE: 'FALSE',
  FOR: 'FOR',
  FUN: 'FUN',
  IF: 'IF',
  NIL: 'NIL',
  OR: 'OR',
  PRINT: 'PRINT',
  RETURN: 'RETURN',
  SUPER: 'SUPER',
  THIS: 'THIS',
  TRUE: 'TRUE',
  VAR: 'VAR',
  WHILE: 'WHILE',

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Value carried by NUMBER and STRING tokens; null for every other token */
export type LiteralValue = string | number | boolean | null;

export interface Token {
  readonly type: TokenType;
  readonly lexeme: string;
  readonly literal: LiteralValue;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODES
// ============================================================

export type NodeType =
  | 'Program'
  // Expressions
  | 'Literal'
  | 'Grouping'
  | 'Unary'
  | 'Binary'
  | 'Logical'
  | 'Variable'
  | 'Assign'
  | 'Call'
  | 'Get'
  | 'Set'
  | 'This'
  | 'Super'
  // Statements
  | 'ExpressionStmt'
  | 'Print'
  | 'Var'
  | 'Block'
  | 'If'
  | 'While'
  | 'For'
  | 'Function'
  | 'Return'
  | 'Break'
  | 'Class';

interface BaseNode {
  readonly type: NodeType;
  readonly span: SourceSpan;
}

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type UnaryOp = '-' | '!';

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>=';

export type LogicalOp = 'and' | 'or';

export interface LiteralNode extends BaseNode {
  readonly type: 'Literal';
  readonly value: LiteralValue;
}

export interface GroupingNode extends BaseNode {
  readonly type: 'Grouping';
  readonly expression: ExpressionNode;
}

export interface UnaryNode extends BaseNode {
  readonly type: 'Unary';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export interface BinaryNode extends BaseNode {
  readonly type: 'Binary';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/** Short-circuit `and` / `or`; evaluates to an operand, not a boolean */
export interface LogicalNode extends BaseNode {
  readonly type: 'Logical';
  readonly op: LogicalOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface VariableNode extends BaseNode {
  readonly type: 'Variable';
  readonly name: string;
}

export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export interface GetNode extends BaseNode {
  readonly type: 'Get';
  readonly object: ExpressionNode;
  readonly name: string;
}

export interface SetNode extends BaseNode {
  readonly type: 'Set';
  readonly object: ExpressionNode;
  readonly name: string;
  readonly value: ExpressionNode;
}

export interface ThisNode extends BaseNode {
  readonly type: 'This';
}

/** `super.method` */
export interface SuperNode extends BaseNode {
  readonly type: 'Super';
  readonly method: string;
}

export type ExpressionNode =
  | LiteralNode
  | GroupingNode
  | UnaryNode
  | BinaryNode
  | LogicalNode
  | VariableNode
  | AssignNode
  | CallNode
  | GetNode
  | SetNode
  | ThisNode
  | SuperNode;

/** Nodes that may carry a hop count in the resolution table */
export type ResolvableNode = VariableNode | AssignNode | ThisNode | SuperNode;

// ============================================================
// STATEMENTS
// ============================================================

export interface ExpressionStmtNode extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExpressionNode;
}

export interface PrintNode extends BaseNode {
  readonly type: 'Print';
  readonly expression: ExpressionNode;
}

export interface VarDeclNode extends BaseNode {
  readonly type: 'Var';
  readonly name: string;
  readonly initializer: ExpressionNode | null;
}

export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBranch: StatementNode;
  readonly elseBranch: StatementNode | null;
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: StatementNode;
}

export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly initializer: VarDeclNode | ExpressionStmtNode | null;
  readonly condition: ExpressionNode | null;
  readonly increment: ExpressionNode | null;
  readonly body: StatementNode;
}

export interface ParamNode {
  readonly name: string;
  readonly span: SourceSpan;
}

export interface FunctionDeclNode extends BaseNode {
  readonly type: 'Function';
  readonly name: string;
  readonly params: ParamNode[];
  readonly body: StatementNode[];
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ClassDeclNode extends BaseNode {
  readonly type: 'Class';
  readonly name: string;
  readonly superclass: VariableNode | null;
  readonly methods: FunctionDeclNode[];
}

export type StatementNode =
  | ExpressionStmtNode
  | PrintNode
  | VarDeclNode
  | BlockNode
  | IfNode
  | WhileNode
  | ForNode
  | FunctionDeclNode
  | ReturnNode
  | BreakNode
  | ClassDeclNode;

export type ASTNode = ProgramNode | ExpressionNode | StatementNode;
