/**
 * Code Knowledge Graph - Error Handling
 * @module utils/errors
 *
 * CodeGraphError hierarchy. Per-file and per-edge problems are returned as
 * data; these classes are thrown only for failures that abort an operation.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCodes = {
  // Parse errors
  PARSE_FAILED: 'PARSE_FAILED',
  UNSUPPORTED_LANGUAGE: 'UNSUPPORTED_LANGUAGE',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',

  // File errors
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  PERMISSION_DENIED: 'PERMISSION_DENIED',

  // Graph store errors
  GRAPH_WRITE_FAILED: 'GRAPH_WRITE_FAILED',
  QUERY_FAILED: 'QUERY_FAILED',
  ENTITY_NOT_FOUND: 'ENTITY_NOT_FOUND',
  INVALID_QUERY: 'INVALID_QUERY',

  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  STORE_UNREACHABLE: 'STORE_UNREACHABLE',

  // System errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// Error Solutions
// =============================================================================

const errorSolutions: Record<ErrorCode, string> = {
  PARSE_FAILED:
    'Check the file for syntax errors. The rest of the project is still graphed.',
  UNSUPPORTED_LANGUAGE:
    'No parser is registered for this language. The file is skipped.',
  FILE_TOO_LARGE: 'Raise parser.maxFileSize or add the file to `ignore`.',
  FILE_NOT_FOUND: 'Verify the path exists and is readable.',
  PERMISSION_DENIED: 'Check file permissions on the project root.',
  GRAPH_WRITE_FAILED:
    'The previous graph was kept. Check the graph store logs and rescan.',
  QUERY_FAILED: 'Check that the graph store is reachable and rescan the project.',
  ENTITY_NOT_FOUND: 'Rescan the project; the entity id may be stale.',
  INVALID_QUERY: 'Check the query arguments (depth must be at least 1).',
  CONFIG_INVALID: 'Fix the reported fields in .codegraphrc.json.',
  STORE_UNREACHABLE:
    'Start the graph store or set NEO4J_URI / store.uri to a reachable server.',
  INTERNAL_ERROR: 'An unexpected error occurred. Please report this issue.',
};

interface ErrorOptions {
  userMessage?: string;
  technical?: unknown;
  cause?: Error;
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error raised by the engine
 */
export class CodeGraphError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;
  /** Message with a fix hint */
  readonly userMessage: string;
  /** Debugging payload */
  readonly technical?: unknown;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message);
    this.name = 'CodeGraphError';
    this.code = code;
    this.userMessage =
      options?.userMessage || `${message}\n\nFix: ${errorSolutions[code]}`;
    this.technical = options?.technical;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Format error for CLI display
   */
  toCliOutput(symbols = true): string {
    const prefix = symbols ? '✗' : '[ERR]';
    return `${prefix} ${this.message}\n\n${this.userMessage}`;
  }

  toJSON(): {
    code: string;
    message: string;
    userMessage: string;
    technical?: unknown;
  } {
    return {
      code: this.code,
      message: this.message,
      userMessage: this.userMessage,
      ...(this.technical ? { technical: this.technical } : {}),
    };
  }
}

// =============================================================================
// Specialized Error Classes
// =============================================================================

/**
 * A single file could not be parsed
 */
export class ParseError extends CodeGraphError {
  readonly filePath?: string;
  readonly line?: number;

  constructor(
    message: string,
    options?: ErrorOptions & {
      code?: Extract<ErrorCode, 'PARSE_FAILED' | 'FILE_TOO_LARGE'>;
      filePath?: string;
      line?: number;
    }
  ) {
    super(options?.code ?? 'PARSE_FAILED', message, options);
    this.name = 'ParseError';
    this.filePath = options?.filePath;
    this.line = options?.line;
  }
}

/**
 * No parser is registered for a file's language
 */
export class UnsupportedLanguageError extends CodeGraphError {
  readonly language: string;
  readonly filePath?: string;

  constructor(language: string, options?: ErrorOptions & { filePath?: string }) {
    super(
      'UNSUPPORTED_LANGUAGE',
      `No parser registered for language "${language}"`,
      options
    );
    this.name = 'UnsupportedLanguageError';
    this.language = language;
    this.filePath = options?.filePath;
  }
}

/**
 * Entity nodes could not be written; the build is failed and the
 * previous graph is left in place
 */
export class GraphWriteError extends CodeGraphError {
  readonly projectId: string;
  readonly attempts: number;

  constructor(
    message: string,
    options: ErrorOptions & { projectId: string; attempts: number }
  ) {
    super('GRAPH_WRITE_FAILED', message, options);
    this.name = 'GraphWriteError';
    this.projectId = options.projectId;
    this.attempts = options.attempts;
  }
}

/**
 * A read against the graph failed or was invalid
 */
export class QueryError extends CodeGraphError {
  constructor(
    message: string,
    options?: ErrorOptions & {
      code?: Extract<ErrorCode, 'QUERY_FAILED' | 'ENTITY_NOT_FOUND' | 'INVALID_QUERY'>;
    }
  ) {
    super(options?.code ?? 'QUERY_FAILED', message, options);
    this.name = 'QueryError';
  }
}

/**
 * Invalid configuration or an unreachable store at startup
 */
export class ConfigurationError extends CodeGraphError {
  constructor(
    message: string,
    options?: ErrorOptions & {
      code?: Extract<ErrorCode, 'CONFIG_INVALID' | 'STORE_UNREACHABLE'>;
    }
  ) {
    super(options?.code ?? 'CONFIG_INVALID', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends CodeGraphError {
  /** Path that caused the error */
  readonly path?: string;

  constructor(
    code: Extract<ErrorCode, 'FILE_NOT_FOUND' | 'PERMISSION_DENIED'>,
    message: string,
    options?: ErrorOptions & { path?: string }
  ) {
    super(code, message, options);
    this.name = 'FileSystemError';
    this.path = options?.path;
  }
}

// =============================================================================
// Error Helpers
// =============================================================================

export function isCodeGraphError(error: unknown): error is CodeGraphError {
  return error instanceof CodeGraphError;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a CodeGraphError
 */
export function wrapError(error: unknown, context?: string): CodeGraphError {
  if (isCodeGraphError(error)) {
    return error;
  }

  const message = errorMessage(error);

  return new CodeGraphError(
    'INTERNAL_ERROR',
    context ? `${context}: ${message}` : message,
    {
      cause: error instanceof Error ? error : undefined,
      technical: error,
    }
  );
}
