/**
 * Shared test fixtures: recording loggers and parse contexts
 */

import { createLogger, type LogEntry, type Logger } from '../../src/utils/logger.js';
import type { ParseContext } from '../../src/parser/types.js';

export interface RecordingLogger {
  logger: Logger;
  entries: LogEntry[];
}

/**
 * Logger that keeps every entry in memory instead of printing it
 */
export function recordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const logger = createLogger({ level: 'debug', output: (entry) => entries.push(entry) });
  return { logger, entries };
}

export function parseContext(rootPath: string, overrides: Partial<ParseContext> = {}): ParseContext {
  return {
    projectId: 'test',
    rootPath,
    maxFileSize: 1024 * 1024,
    includeParameters: false,
    logger: recordingLogger().logger,
    ...overrides,
  };
}
