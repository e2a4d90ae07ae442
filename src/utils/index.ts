/**
 * Code Knowledge Graph - Utilities Module
 * @module utils
 */

// Error handling
export {
  CodeGraphError,
  ParseError,
  UnsupportedLanguageError,
  GraphWriteError,
  QueryError,
  ConfigurationError,
  FileSystemError,
  ErrorCodes,
  isCodeGraphError,
  errorMessage,
  wrapError,
  type ErrorCode,
} from './errors.js';

// Logging
export {
  Logger,
  logger,
  createLogger,
  isLogLevel,
  formatContext,
  formatPretty,
  type ComponentLogger,
  type LogFormat,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerOptions,
} from './logger.js';

// Path utilities
export {
  normalizePath,
  getExtension,
  createIgnoreFilter,
  readGitignore,
  listSourceFiles,
  isDirectory,
  DEFAULT_IGNORE_PATTERNS,
} from './paths.js';

// String utilities
export {
  createEntityId,
  splitTopLevel,
  baseTypeName,
  qualify,
  normalizeType,
  formatSignature,
} from './strings.js';
