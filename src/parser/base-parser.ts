/**
 * Base Language Parser
 *
 * Shared batch loop for every language: reads files in path order,
 * enforces the size limit, turns per-file failures into `FileError`
 * entries and hands extractions to the entity assembler.
 *
 * @module parser/base-parser
 */

import * as fs from 'fs';
import * as path from 'path';
import type { FileError, ParseResult } from '../types/index.js';
import { errorMessage, FileSystemError, isCodeGraphError, ParseError } from '../utils/errors.js';
import { getExtension, normalizePath } from '../utils/paths.js';
import { EntityAssembler } from './entity-assembler.js';
import type { FileExtraction, LanguageParser, ParseContext, SourceFile } from './types.js';

/**
 * Extracts one file at a time. Created per `parseFiles` call.
 */
export interface Extractor {
  extract(file: SourceFile): FileExtraction;
  /** An AST language running on pattern extraction */
  readonly usedFallback: boolean;
  dispose?(): void;
}

export abstract class BaseLanguageParser implements LanguageParser {
  abstract readonly language: string;
  abstract readonly extensions: readonly string[];
  abstract readonly version: string;

  protected abstract createExtractor(context: ParseContext): Promise<Extractor>;

  canParse(filePath: string): boolean {
    return this.extensions.includes(getExtension(filePath));
  }

  async parseFiles(files: string[], context: ParseContext): Promise<ParseResult> {
    const startTime = performance.now();
    const log = context.logger;
    const sorted = Array.from(new Set(files.map(normalizePath))).sort();

    const extractor = await this.createExtractor(context);
    const assembler = new EntityAssembler(context.projectId, this.language, context.includeParameters);
    const errors: FileError[] = [];
    let filesParsed = 0;

    try {
      for (const filePath of sorted) {
        try {
          const content = await this.readSource(filePath, context);
          const extraction = extractor.extract({ path: filePath, content });
          assembler.addFile(filePath, content.split('\n').length, extraction);
          filesParsed++;
        } catch (error) {
          const fileError = toFileError(filePath, error);
          errors.push(fileError);
          log.debug('File not parsed', { filePath, code: fileError.code, error: fileError.message });
        }
      }
    } finally {
      extractor.dispose?.();
    }

    const batch = assembler.finish();
    if (batch.duplicates > 0) {
      log.debug('Duplicate declarations dropped', { language: this.language, count: batch.duplicates });
    }

    return {
      language: this.language,
      parserVersion: this.version,
      entities: batch.entities,
      relationships: batch.relationships,
      errors,
      filesParsed,
      filesFailed: errors.length,
      usedFallback: extractor.usedFallback,
      durationMs: performance.now() - startTime,
    };
  }

  /**
   * Read a file relative to the project root, enforcing the size limit
   */
  protected async readSource(filePath: string, context: ParseContext): Promise<string> {
    const absolute = path.resolve(context.rootPath, filePath);

    let size: number;
    try {
      size = (await fs.promises.stat(absolute)).size;
    } catch (error) {
      throw fileSystemError(filePath, error);
    }

    if (size > context.maxFileSize) {
      throw new ParseError(`File exceeds ${context.maxFileSize} bytes (${size})`, {
        code: 'FILE_TOO_LARGE',
        filePath,
      });
    }

    try {
      return await fs.promises.readFile(absolute, 'utf-8');
    } catch (error) {
      throw fileSystemError(filePath, error);
    }
  }
}

function fileSystemError(filePath: string, error: unknown): FileSystemError {
  const code = hasCode(error) && (error.code === 'EACCES' || error.code === 'EPERM')
    ? 'PERMISSION_DENIED'
    : 'FILE_NOT_FOUND';
  return new FileSystemError(code, `Cannot read ${filePath}: ${errorMessage(error)}`, {
    path: filePath,
    cause: error instanceof Error ? error : undefined,
  });
}

function hasCode(error: unknown): error is { code: string } {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

function toFileError(filePath: string, error: unknown): FileError {
  if (isCodeGraphError(error)) {
    return {
      filePath,
      code: error.code,
      message: error.message,
      ...(error instanceof ParseError && error.line !== undefined ? { line: error.line } : {}),
    };
  }
  return { filePath, code: 'PARSE_FAILED', message: errorMessage(error) };
}
