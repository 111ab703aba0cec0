/**
 * TesseraError - Error hierarchy for the inference engine
 *
 * All errors extend the native JavaScript Error class.
 *
 * Error types:
 * - NotFoundError: name or attribute has no reachable binding (warning)
 * - UnresolvableNameError: name cannot be resolved syntactically (warning)
 * - InferenceError: no candidate produced any value (error)
 * - TreeStructureError: tree precondition violated (fatal)
 * - ConfigError: configuration parsing/validation errors (fatal)
 *
 * The first three travel as values inside inference outcomes; the last two
 * are thrown.
 */

/**
 * Context for error reporting
 */
export interface ErrorContext {
  name?: string;
  nodeId?: number;
  nodeKind?: string;
  lineNumber?: number;
  filePath?: string;
  [key: string]: unknown;
}

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * JSON representation of TesseraError
 */
export interface TesseraErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all tessera errors.
 */
export abstract class TesseraError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): TesseraErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Requested name or attribute has no binding reachable from the scope.
 *
 * Severity: warning (always)
 * Code: ERR_NOT_FOUND
 */
export class NotFoundError extends TesseraError {
  readonly code = 'ERR_NOT_FOUND';
  readonly severity = 'warning' as const;

  constructor(name: string, context: ErrorContext = {}) {
    super(`No binding for "${name}"`, { name, ...context });
  }
}

/**
 * Name is syntactically unreachable: nothing in the scope chain binds it.
 *
 * Severity: warning (always)
 * Code: ERR_UNRESOLVABLE_NAME
 */
export class UnresolvableNameError extends TesseraError {
  readonly code = 'ERR_UNRESOLVABLE_NAME';
  readonly severity = 'warning' as const;

  constructor(name: string, context: ErrorContext = {}) {
    super(`Cannot resolve name "${name}"`, { name, ...context });
  }
}

/**
 * No candidate produced any result, Unknown included.
 *
 * Severity: error (always)
 * Code: ERR_INFERENCE_FAILED
 */
export class InferenceError extends TesseraError {
  readonly code = 'ERR_INFERENCE_FAILED';
  readonly severity = 'error' as const;

  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Tree precondition violated (missing statement ancestor, shared child,
 * malformed serialized tree).
 *
 * Severity: fatal (always)
 * Codes: ERR_TREE_NO_STATEMENT, ERR_TREE_OWNERSHIP, ERR_TREE_CYCLE,
 *        ERR_TREE_UNKNOWN_NODE, ERR_TREE_DUPLICATE_MODULE, ERR_TREE_INVALID
 */
export class TreeStructureError extends TesseraError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - config.yaml parsing, validation
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID, ERR_CONFIG_VERSION
 */
export class ConfigError extends TesseraError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/** Failures that inference reports as outcomes instead of throwing */
export type InferenceFailure = NotFoundError | UnresolvableNameError | InferenceError;
