/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'resolve' | 'runtime';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TARN-{L|P|S|R}{3-digit} (e.g., TARN-R005) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (TARN-L0xx)
  {
    errorId: 'TARN-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string.',
    cause: 'A string was opened with a double quote and never closed.',
    resolution:
      'Add the closing double quote. Strings may span lines but must end before the end of the file.',
    examples: [{ description: 'Missing closing quote', code: 'print "hello;' }],
  },
  {
    errorId: 'TARN-L002',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: "Unexpected character '{char}'.",
    cause: 'The character is not part of the language syntax.',
    resolution: 'Remove the character, or place it inside a string literal.',
    examples: [{ description: 'At sign outside a string', code: 'var a = @;' }],
  },

  // Parse Errors (TARN-P0xx)
  {
    errorId: 'TARN-P001',
    category: 'parse',
    description: 'Expected expression',
    messageTemplate: 'Expect expression.',
    cause: 'The parser reached a token that cannot begin an expression.',
    resolution: 'Provide a value, variable, call or parenthesized expression.',
    examples: [{ description: 'Dangling operator', code: 'print 1 + ;' }],
  },
  {
    errorId: 'TARN-P002',
    category: 'parse',
    description: 'Missing expected token',
    messageTemplate: 'Expect {expected}.',
    cause: 'A required punctuation mark, keyword or name is missing.',
    resolution: 'Insert the token named in the message.',
    examples: [{ description: 'Missing semicolon', code: 'print 1' }],
  },
  {
    errorId: 'TARN-P003',
    category: 'parse',
    description: 'Invalid assignment target',
    messageTemplate: 'Invalid assignment target.',
    cause: 'The left side of = is neither a variable nor a property access.',
    resolution: 'Assign to a variable name or to an object field.',
    examples: [{ description: 'Assigning to a sum', code: 'a + b = c;' }],
  },
  {
    errorId: 'TARN-P004',
    category: 'parse',
    description: 'Too many parameters or arguments',
    messageTemplate: "Can't have more than {limit} {kind}.",
    cause: 'A function declaration or call lists more than 255 entries.',
    resolution: 'Group related values into an instance and pass that instead.',
  },
  {
    errorId: 'TARN-P005',
    category: 'parse',
    description: 'Nesting too deep',
    messageTemplate: 'Too much nesting.',
    cause: 'Statements or expressions are nested more than 200 levels deep.',
    resolution: 'Split the expression or move inner blocks into functions.',
  },

  // Resolve Errors (TARN-S0xx)
  {
    errorId: 'TARN-S001',
    category: 'resolve',
    description: 'Variable read in its own initializer',
    messageTemplate: "Can't read local variable in its own initializer.",
    cause: 'A local variable initializer refers to the variable being declared.',
    resolution: 'Rename the inner reference or declare the value first.',
    examples: [
      { description: 'Shadowing read', code: 'var a = 1; { var a = a; }' },
    ],
  },
  {
    errorId: 'TARN-S002',
    category: 'resolve',
    description: 'Return at top level',
    messageTemplate: "Can't return from top-level code.",
    cause: 'A return statement appears outside of any function body.',
    resolution: 'Move the return into a function.',
  },
  {
    errorId: 'TARN-S003',
    category: 'resolve',
    description: 'Value returned from initializer',
    messageTemplate: "Can't return a value from an initializer.",
    cause: 'An init method returns an expression.',
    resolution: 'Use a bare return; initializers always produce the instance.',
  },
  {
    errorId: 'TARN-S004',
    category: 'resolve',
    description: 'this outside a class',
    messageTemplate: "Can't use 'this' outside of a class.",
    cause: 'The this keyword appears outside of a method body.',
    resolution: 'Only use this inside class methods.',
  },
  {
    errorId: 'TARN-S005',
    category: 'resolve',
    description: 'super outside a class',
    messageTemplate: "Can't use 'super' outside of a class.",
    cause: 'The super keyword appears outside of a method body.',
    resolution: 'Only use super inside methods of a subclass.',
  },
  {
    errorId: 'TARN-S006',
    category: 'resolve',
    description: 'super without a superclass',
    messageTemplate: "Can't use 'super' in a class with no superclass.",
    cause: 'A method calls super in a class that does not inherit.',
    resolution: 'Declare a superclass with <, or call the method on this.',
  },
  {
    errorId: 'TARN-S007',
    category: 'resolve',
    description: 'Class inherits from itself',
    messageTemplate: "A class can't inherit from itself.",
    cause: 'The superclass name matches the class being declared.',
    resolution: 'Inherit from a different class.',
    examples: [{ description: 'Self inheritance', code: 'class A < A {}' }],
  },
  {
    errorId: 'TARN-S008',
    category: 'resolve',
    description: 'break outside a loop',
    messageTemplate: "Can't use 'break' outside of a loop.",
    cause:
      'A break statement is not enclosed by a while or for loop in the same function.',
    resolution: 'Move the break into a loop body, or use return.',
  },

  // Runtime Errors (TARN-R0xx)
  {
    errorId: 'TARN-R001',
    category: 'runtime',
    description: 'Operand must be a number',
    messageTemplate: 'Operand must be a number.',
    cause: 'Unary minus was applied to a non-number.',
    resolution: 'Negate numbers only.',
  },
  {
    errorId: 'TARN-R002',
    category: 'runtime',
    description: 'Operands must be numbers',
    messageTemplate: 'Operands must be numbers.',
    cause: 'Arithmetic or comparison was applied to a non-number.',
    resolution: 'Convert operands to numbers before the operation.',
  },
  {
    errorId: 'TARN-R003',
    category: 'runtime',
    description: 'Invalid operands for +',
    messageTemplate: 'Operands must be two numbers or two strings.',
    cause: 'Plus was applied to mixed or unsupported operand types.',
    resolution: 'Add two numbers or concatenate two strings.',
    examples: [{ description: 'Number plus string', code: 'print 1 + "1";' }],
  },
  {
    errorId: 'TARN-R004',
    category: 'runtime',
    description: 'Division by zero',
    messageTemplate: 'Division by zero.',
    cause: 'The right operand of / evaluated to zero.',
    resolution: 'Check the divisor before dividing.',
  },
  {
    errorId: 'TARN-R005',
    category: 'runtime',
    description: 'Undefined variable',
    messageTemplate: "Undefined variable '{name}'.",
    cause: 'The variable is not defined in any enclosing scope or globally.',
    resolution: 'Declare the variable with var before using it.',
  },
  {
    errorId: 'TARN-R006',
    category: 'runtime',
    description: 'Value is not callable',
    messageTemplate: 'Can only call functions and classes.',
    cause: 'A call expression was applied to a value that is not callable.',
    resolution: 'Call functions, methods or classes only.',
  },
  {
    errorId: 'TARN-R007',
    category: 'runtime',
    description: 'Wrong number of arguments',
    messageTemplate: 'Expected {expected} arguments but got {actual}.',
    cause: 'The argument count does not match the callable arity.',
    resolution: 'Pass exactly as many arguments as the function declares.',
  },
  {
    errorId: 'TARN-R008',
    category: 'runtime',
    description: 'Property read on non-instance',
    messageTemplate: 'Only instances have properties.',
    cause: 'A property was read from a value that is not an instance.',
    resolution: 'Read properties from class instances only.',
  },
  {
    errorId: 'TARN-R009',
    category: 'runtime',
    description: 'Undefined property',
    messageTemplate: "Undefined property '{name}'.",
    cause: 'The instance has no such field and its class no such method.',
    resolution: 'Assign the field first or define the method on the class.',
  },
  {
    errorId: 'TARN-R010',
    category: 'runtime',
    description: 'Field write on non-instance',
    messageTemplate: 'Only instances have fields.',
    cause: 'A field was assigned on a value that is not an instance.',
    resolution: 'Assign fields on class instances only.',
  },
  {
    errorId: 'TARN-R011',
    category: 'runtime',
    description: 'Superclass is not a class',
    messageTemplate: 'Superclass must be a class.',
    cause: 'The name after < evaluated to something other than a class.',
    resolution: 'Inherit from a declared class.',
  },
  {
    errorId: 'TARN-R012',
    category: 'runtime',
    description: 'Call depth exceeded',
    messageTemplate: 'Stack overflow.',
    cause: 'Nested calls exceeded the configured maximum call depth.',
    resolution:
      'Add a base case to the recursion or raise maxCallDepth in the runtime options.',
  },
  {
    errorId: 'TARN-R013',
    category: 'runtime',
    description: 'Host function failed',
    messageTemplate: "Native function '{name}' failed: {reason}",
    cause: 'A native or host-provided function threw an error.',
    resolution: 'Check the arguments passed to the function.',
  },
];

/** Global error registry instance */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template by replacing {placeholder} tokens with context values.
 *
 * Missing context values render as empty strings. `{{` emits a literal brace.
 * An unclosed brace returns the template unchanged.
 *
 * @example
 * renderMessage("Undefined variable '{name}'.", { name: "x" })
 * // Returns: "Undefined variable 'x'."
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template[i] ?? '';

    if (char === '{') {
      if (template[i + 1] === '{') {
        result += '{';
        i += 2;
        continue;
      }

      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }
      i = j + 1;
      continue;
    }

    if (char === '}' && template[i + 1] === '}') {
      result += '}';
      i += 2;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
