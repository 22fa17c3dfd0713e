/**
 * Tarn Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './types.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TarnErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Offending token description, e.g. ` at ';'` or ` at end` */
  readonly where?: string | undefined;
}

function lookupDefinition(
  errorId: string,
  category?: ErrorCategory
): ErrorDefinition {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (category !== undefined && definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Tarn errors.
 * Provides structured data for host applications to format as needed.
 */
export class TarnError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly where: string;

  constructor(data: TarnErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    const definition = lookupDefinition(data.errorId);

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TarnError';
    this.errorId = data.errorId;
    this.category = definition.category;
    this.location = data.location;
    this.context = data.context;
    this.where = data.where ?? '';
  }

  /** Source line of the error, or 0 when the location is unknown */
  get line(): number {
    return this.location?.line ?? 0;
  }

  /** Get structured error data for custom formatting */
  toData(): TarnErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
      where: this.where,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TarnErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create an error from the registry, rendering its message template.
 *
 * @example
 * createError('TARN-R005', { name: 'foo' }, location)
 * // RuntimeError: "Undefined variable 'foo'. at 1:5"
 *
 * @throws TypeError if errorId is not found in registry
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation
): TarnError {
  const definition = lookupDefinition(errorId);
  switch (definition.category) {
    case 'lexer':
      return new LexerError(errorId, context, location ?? START_OF_SOURCE);
    case 'parse':
      return new ParseError(errorId, context, location ?? START_OF_SOURCE);
    case 'resolve':
      return new ResolveError(errorId, context, location ?? START_OF_SOURCE);
    case 'runtime':
      return new RuntimeError(errorId, context, location);
  }
}

const START_OF_SOURCE: SourceLocation = { line: 1, column: 1, offset: 0 };

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Errors raised while scanning source text */
export class LexerError extends TarnError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'lexer');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Parse-time errors */
export class ParseError extends TarnError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation,
    where?: string
  ) {
    const definition = lookupDefinition(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
      where,
    });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Static scope-resolution errors, reported before execution */
export class ResolveError extends TarnError {
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation,
    where?: string
  ) {
    const definition = lookupDefinition(errorId, 'resolve');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
      where,
    });
    this.name = 'ResolveError';
    this.location = location;
  }
}

/** Runtime execution errors */
export class RuntimeError extends TarnError {
  constructor(
    errorId: string,
    context: Record<string, unknown> = {},
    location?: SourceLocation
  ) {
    const definition = lookupDefinition(errorId, 'runtime');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      location,
      context,
    });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    errorId: string,
    node?: { span: SourceSpan },
    context: Record<string, unknown> = {}
  ): RuntimeError {
    return new RuntimeError(errorId, context, node?.span.start);
  }
}

/**
 * Whether `error` is the host running out of stack.
 * Deep recursion surfaces this before any Tarn limit when maxCallDepth is
 * set high.
 */
export function isStackOverflow(error: unknown): error is RangeError {
  return (
    error instanceof RangeError &&
    error.message.includes('Maximum call stack size exceeded')
  );
}
