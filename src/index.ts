/**
 * Tarn Module
 * Exports lexer, parser, resolver, runtime, printer and AST types
 */

export { LexerError, nextToken, scan, tokenize } from './lexer/index.js';
export type { ScanResult } from './lexer/index.js';
export {
  MAX_ARITY,
  parse,
  parseTokens,
  parseWithRecovery,
  Parser,
} from './parser/index.js';
export type { FunctionKind, ParseResult } from './parser/index.js';
export { resolve } from './resolver/index.js';
export type {
  ClassType,
  FunctionType,
  ResolutionTable,
  ResolveResult,
} from './resolver/index.js';
export { formatLiteral, formatSource, toSExpr } from './printer/index.js';
export {
  run,
  type ContextRunOptions,
  type FreshRunOptions,
  type RunOptions,
  type RunResult,
} from './run.js';

// ============================================================
// RUNTIME
// ============================================================
export {
  type ApplicationCallable,
  type BoundMethod,
  BUILTIN_FUNCTIONS,
  callable,
  type CallableFn,
  type CallFrame,
  type ClassCallable,
  type Completion,
  createRuntimeContext,
  createStepper,
  type ErrorEvent,
  execute,
  type ExecutionResult,
  type ExecutionStepper,
  formatCallable,
  formatNumber,
  formatValue,
  type FunctionReturnEvent,
  getArity,
  getCallStack,
  type HostCallEvent,
  type HostFunctionDefinition,
  inferType,
  isCallable,
  isClass,
  isInstance,
  isNativeCallable,
  isTruthy,
  type ObservabilityCallbacks,
  type RuntimeCallable,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type ScriptCallable,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
  type TarnCallable,
  type TarnInstance,
  type TarnValue,
  valuesEqual,
} from './runtime/index.js';

// ============================================================
// DIAGNOSTICS
// ============================================================
export {
  createDiagnosticSink,
  formatDiagnostic,
  type Diagnostic,
  type DiagnosticPhase,
  type DiagnosticSink,
} from './diagnostics.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
  createError,
  ParseError,
  ResolveError,
  RuntimeError,
  TarnError,
  type TarnErrorData,
} from './types.js';

// ============================================================
// AST AND TOKENS
// ============================================================
export { TOKEN_TYPES } from './types.js';
export type {
  AssignNode,
  ASTNode,
  BinaryNode,
  BinaryOp,
  BlockNode,
  BreakNode,
  CallNode,
  ClassDeclNode,
  ExpressionNode,
  ExpressionStmtNode,
  ForNode,
  FunctionDeclNode,
  GetNode,
  GroupingNode,
  IfNode,
  LiteralNode,
  LiteralValue,
  LogicalNode,
  LogicalOp,
  NodeType,
  ParamNode,
  PrintNode,
  ProgramNode,
  ResolvableNode,
  ReturnNode,
  SetNode,
  SourceLocation,
  SourceSpan,
  StatementNode,
  SuperNode,
  ThisNode,
  Token,
  TokenType,
  UnaryNode,
  UnaryOp,
  VarDeclNode,
  VariableNode,
  WhileNode,
} from './types.js';
