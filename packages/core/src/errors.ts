// Error taxonomy for the Circlet reader, evaluator and embedder API

// Error codes for categorization
export enum ErrorCode {
  // Read errors (1xx)
  UNEXPECTED_EOF = 100,
  UNEXPECTED_TOKEN = 101,
  UNTERMINATED_STRING = 102,
  INVALID_LITERAL = 103,

  // Evaluation errors (2xx)
  UNBOUND_VARIABLE = 200,
  NOT_A_PROCEDURE = 201,
  UNKNOWN_EXPRESSION_TYPE = 202,
  MALFORMED_SYNTAX = 203,
  ARITY_MISMATCH = 204,
  TYPE_ERROR = 205,
  DIVISION_BY_ZERO = 206,
  STACK_OVERFLOW = 207,
  USER_ERROR = 208,

  // Embedder usage errors (3xx)
  DEFINE_IN_EMPTY_ENVIRONMENT = 300,
  REGISTRY_SEALED = 301,
  DUPLICATE_FORM = 302,
}

const ERROR_HINTS: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.UNEXPECTED_EOF]: "The input may be incomplete - check for a missing closing parenthesis",
  [ErrorCode.UNEXPECTED_TOKEN]: "Remove the stray token or add the opening parenthesis it closes",
  [ErrorCode.UNTERMINATED_STRING]: "Add a closing quote to your string",
  [ErrorCode.INVALID_LITERAL]: "Use #t or #f for booleans",

  [ErrorCode.UNBOUND_VARIABLE]: "Bind the name with 'define' before using or assigning it",
  [ErrorCode.NOT_A_PROCEDURE]: "Only procedures can appear in operator position",
  [ErrorCode.MALFORMED_SYNTAX]: "Review the shape this special form expects",
  [ErrorCode.ARITY_MISMATCH]: "Check the procedure's parameter list for the number of arguments",
  [ErrorCode.TYPE_ERROR]: "Check that you're passing the right type to this procedure",
  [ErrorCode.DIVISION_BY_ZERO]: "Ensure the divisor is not zero before dividing",
  [ErrorCode.STACK_OVERFLOW]: "Recursion is not tail-call optimized; reduce the recursion depth",

  [ErrorCode.DEFINE_IN_EMPTY_ENVIRONMENT]: "Extend the empty environment with a frame before defining into it",
  [ErrorCode.REGISTRY_SEALED]: "Register special forms before the first evaluation",
};

// Source location information
export interface SourceLocation {
  line: number;
  column: number;
  file?: string;
}

// Base error class with enhanced information
export class CircletError extends Error {
  readonly code: ErrorCode;
  readonly location?: SourceLocation;
  readonly hint?: string;

  constructor(message: string, code: ErrorCode, location?: SourceLocation, hint?: string) {
    super(message);
    this.name = "CircletError";
    this.code = code;
    this.location = location;
    this.hint = hint ?? ERROR_HINTS[code];
  }

  // Format the error for display
  format(options: { showHint?: boolean; showCode?: boolean } = {}): string {
    const { showHint = true, showCode = true } = options;
    const parts: string[] = [];

    const codeStr = showCode ? ` [E${this.code}]` : "";
    parts.push(`${this.name}${codeStr}: ${this.message}`);

    if (this.location) {
      const file = this.location.file ? `${this.location.file}:` : "";
      parts.push(`  at ${file}${this.location.line}:${this.location.column}`);
    }

    if (showHint && this.hint) {
      parts.push(`Hint: ${this.hint}`);
    }

    return parts.join("\n");
  }
}

export class ReadError extends CircletError {
  constructor(message: string, code: ErrorCode, location?: SourceLocation, hint?: string) {
    super(message, code, location, hint);
    this.name = "ReadError";
  }
}

export class EvalError extends CircletError {
  constructor(message: string, code: ErrorCode, location?: SourceLocation, hint?: string) {
    super(message, code, location, hint);
    this.name = "EvalError";
  }
}

/** Misuse of the embedding API rather than a failure of the evaluated program. */
export class UsageError extends CircletError {
  constructor(message: string, code: ErrorCode) {
    super(message, code);
    this.name = "UsageError";
  }
}

export const Errors = {
  // Read errors
  unexpectedEof: (loc?: SourceLocation) =>
    new ReadError("Unexpected end of input", ErrorCode.UNEXPECTED_EOF, loc),

  unexpectedToken: (token: string, loc?: SourceLocation) =>
    new ReadError(`Unexpected token '${token}'`, ErrorCode.UNEXPECTED_TOKEN, loc),

  unterminatedString: (loc?: SourceLocation) =>
    new ReadError("Unterminated string literal", ErrorCode.UNTERMINATED_STRING, loc),

  invalidLiteral: (text: string, loc?: SourceLocation) =>
    new ReadError(`Invalid literal '${text}'`, ErrorCode.INVALID_LITERAL, loc),

  // Evaluation errors
  unboundVariable: (name: string) =>
    new EvalError(`Unbound variable '${name}'`, ErrorCode.UNBOUND_VARIABLE),

  notAProcedure: (value: string) =>
    new EvalError(`Not a procedure: ${value}`, ErrorCode.NOT_A_PROCEDURE),

  unknownExpressionType: (expr: string) =>
    new EvalError(`Unknown expression type: ${expr}`, ErrorCode.UNKNOWN_EXPRESSION_TYPE),

  malformedSyntax: (detail: string) =>
    new EvalError(`Malformed syntax: ${detail}`, ErrorCode.MALFORMED_SYNTAX),

  arityMismatch: (expected: number | string, got: number) =>
    new EvalError(
      `Expected ${expected} argument(s), got ${got}`,
      ErrorCode.ARITY_MISMATCH
    ),

  typeError: (operation: string, expected: string, got: string) =>
    new EvalError(`${operation} expects ${expected}, got ${got}`, ErrorCode.TYPE_ERROR),

  divisionByZero: () =>
    new EvalError("Division by zero", ErrorCode.DIVISION_BY_ZERO),

  stackOverflow: () =>
    new EvalError("Maximum recursion depth exceeded", ErrorCode.STACK_OVERFLOW),

  userError: (message: string) =>
    new EvalError(message, ErrorCode.USER_ERROR),

  // Usage errors
  defineInEmptyEnvironment: (name: string) =>
    new UsageError(
      `Cannot define '${name}' in the empty environment`,
      ErrorCode.DEFINE_IN_EMPTY_ENVIRONMENT
    ),

  registrySealed: (tag: string) =>
    new UsageError(
      `Cannot register special form '${tag}' after evaluation has started`,
      ErrorCode.REGISTRY_SEALED
    ),

  duplicateForm: (tag: string) =>
    new UsageError(`Special form '${tag}' is already registered`, ErrorCode.DUPLICATE_FORM),
};

// Error result type for recoverable errors
export type Result<T, E = CircletError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Helper to wrap host errors
export function wrapError(error: unknown): CircletError {
  if (error instanceof CircletError) {
    return error;
  }

  if (error instanceof RangeError && /call stack/i.test(error.message)) {
    return Errors.stackOverflow();
  }

  const message = error instanceof Error ? error.message : String(error);
  return new EvalError(message, ErrorCode.USER_ERROR);
}
