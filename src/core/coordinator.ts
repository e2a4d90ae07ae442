/**
 * Code Knowledge Graph - Parser Coordinator
 * @module core/coordinator
 *
 * Groups a project's files by language, runs the registered parsers on a
 * bounded pool and merges their results into one CoordinatorResult.
 *
 * Each parser call gets its own buffers; results are merged in language
 * order after every parser finished, so the output does not depend on
 * which parser finishes first.
 */

import * as fs from 'fs';
import pLimit from 'p-limit';
import * as path from 'path';
import type { LanguageParser, ParseContext } from '../parser/types.js';
import { getLanguageByExtension, normalizeLanguage } from '../parser/types.js';
import type { ParserRegistry } from '../parser/registry.js';
import type {
  CodeEntity,
  CoordinatorResult,
  FileError,
  LanguageStats,
  ParseResult,
  ProjectSource,
  Relationship,
} from '../types/index.js';
import { errorMessage, FileSystemError, UnsupportedLanguageError } from '../utils/errors.js';
import { logger, type ComponentLogger } from '../utils/logger.js';
import { getExtension, normalizePath } from '../utils/paths.js';
import { createEntityId } from '../utils/strings.js';

// =============================================================================
// Types
// =============================================================================

export interface CoordinatorOptions {
  registry: ParserRegistry;
  /** Languages parsed at the same time */
  concurrency: number;
  maxFileSize: number;
  includeParameters: boolean;
  /** Runs slower than this are logged as warnings */
  slowOperationMs?: number;
  logger?: ComponentLogger;
}

type LanguageOutcome =
  | { language: string; files: string[]; result: ParseResult }
  | { language: string; files: string[]; failure: unknown };

/** Language tag of the Project entity */
export const PROJECT_LANGUAGE = 'multi';

// =============================================================================
// Coordinator
// =============================================================================

export class ParserCoordinator {
  private readonly registry: ParserRegistry;
  private readonly log: ComponentLogger;

  constructor(private readonly options: CoordinatorOptions) {
    this.registry = options.registry;
    this.log = options.logger ?? logger.child({ component: 'coordinator' });
  }

  /**
   * Add or replace a language parser
   */
  register(parser: LanguageParser): void {
    this.registry.register(parser);
  }

  unregister(language: string): boolean {
    return this.registry.unregister(language);
  }

  /**
   * Check a source description before parsing
   */
  validateSource(source: ProjectSource): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!source.projectId.trim()) {
      errors.push('projectId must not be empty');
    }
    if (!source.rootPath || !path.isAbsolute(source.rootPath)) {
      errors.push('rootPath must be an absolute path');
    } else if (!fs.existsSync(source.rootPath)) {
      errors.push(`rootPath does not exist: ${source.rootPath}`);
    }
    for (const file of source.files) {
      if (path.isAbsolute(file) || normalizePath(file).split('/').includes('..')) {
        errors.push(`file path must be relative to the root: ${file}`);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Parse every file of a project with the registered parsers
   *
   * @throws FileSystemError when the root directory cannot be read
   */
  async coordinate(source: ProjectSource): Promise<CoordinatorResult> {
    const startTime = performance.now();
    await this.assertReadableRoot(source.rootPath);

    const { groups, notes } = this.groupFiles(source);
    const context: ParseContext = {
      projectId: source.projectId,
      rootPath: source.rootPath,
      maxFileSize: this.options.maxFileSize,
      includeParameters: this.options.includeParameters,
      logger: this.log,
    };

    const limit = pLimit(Math.max(1, this.options.concurrency));
    const languages = Array.from(groups.keys()).sort();

    const outcomes = await Promise.all(
      languages.map((language) =>
        limit(async (): Promise<LanguageOutcome> => {
          const files = groups.get(language) ?? [];
          const parser = this.registry.get(language);
          if (!parser) return { language, files, failure: new UnsupportedLanguageError(language) };
          try {
            const result = await parser.parseFiles(files, context);
            return { language, files, result };
          } catch (error) {
            return { language, files, failure: error };
          }
        })
      )
    );

    const entities: CodeEntity[] = [];
    const relationships: Relationship[] = [];
    const errors: FileError[] = [];
    const perLanguageStats: Record<string, LanguageStats> = {};
    let attempted = 0;
    let parsed = 0;

    for (const outcome of outcomes) {
      attempted += outcome.files.length;

      if ('failure' in outcome) {
        const message = `${outcome.language} parser failed: ${errorMessage(outcome.failure)}`;
        this.log.error('Parser failed', { language: outcome.language, error: errorMessage(outcome.failure) });
        for (const filePath of outcome.files) {
          errors.push({ filePath, code: 'PARSE_FAILED', message });
        }
        perLanguageStats[outcome.language] = emptyStats(outcome.files.length);
        continue;
      }

      const { result } = outcome;
      entities.push(...result.entities);
      relationships.push(...result.relationships);
      errors.push(...result.errors);
      parsed += result.filesParsed;
      perLanguageStats[outcome.language] = {
        files: result.filesParsed,
        filesFailed: result.filesFailed,
        entities: result.entities.length,
        relationships: result.relationships.length,
        durationMs: result.durationMs,
        usedFallback: result.usedFallback,
      };
    }

    this.addProject(source.projectId, entities, relationships);

    const durationMs = performance.now() - startTime;
    const successRate = attempted === 0 ? 1 : parsed / attempted;
    const summary =
      `Parsed ${parsed}/${attempted} files in ${languages.length} language(s): ` +
      `${entities.length} entities, ${relationships.length} relationships` +
      (errors.length > 0 ? `, ${errors.length} error(s)` : '') +
      (notes.length > 0 ? `, ${notes.length} unsupported file(s) skipped` : '');

    if (this.options.slowOperationMs !== undefined && durationMs > this.options.slowOperationMs) {
      this.log.warn('Slow parse', { projectId: source.projectId, durationMs: Math.round(durationMs) });
    }
    this.log.info(summary, { projectId: source.projectId });

    return {
      projectId: source.projectId,
      entities,
      relationships,
      perLanguageStats,
      errors,
      notes,
      successRate,
      summary,
      durationMs,
    };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async assertReadableRoot(rootPath: string): Promise<void> {
    let isDirectory = false;
    try {
      isDirectory = (await fs.promises.stat(rootPath)).isDirectory();
      await fs.promises.access(rootPath, fs.constants.R_OK);
    } catch (error) {
      const denied = error instanceof Error && 'code' in error && error.code === 'EACCES';
      throw new FileSystemError(
        denied ? 'PERMISSION_DENIED' : 'FILE_NOT_FOUND',
        `Cannot read project root ${rootPath}: ${errorMessage(error)}`,
        { path: rootPath, cause: error instanceof Error ? error : undefined }
      );
    }

    if (!isDirectory) {
      throw new FileSystemError('FILE_NOT_FOUND', `Project root is not a directory: ${rootPath}`, {
        path: rootPath,
      });
    }
  }

  /**
   * Group files by language; files without a parser become notes
   */
  private groupFiles(source: ProjectSource): { groups: Map<string, string[]>; notes: FileError[] } {
    const wanted = new Set(source.languages.map(normalizeLanguage));
    const groups = new Map<string, string[]>();
    const notes: FileError[] = [];
    const files = Array.from(new Set(source.files.map(normalizePath))).sort();

    for (const filePath of files) {
      const language = getLanguageByExtension(getExtension(filePath))?.id ?? 'unknown';
      if (wanted.size > 0 && !wanted.has(language)) continue;

      if (!this.registry.has(language)) {
        const error = new UnsupportedLanguageError(language, { filePath });
        notes.push({ filePath, code: error.code, message: error.message });
        continue;
      }

      const group = groups.get(language) ?? [];
      group.push(filePath);
      groups.set(language, group);
    }

    if (notes.length > 0) {
      this.log.debug('Unsupported files skipped', { count: notes.length });
    }
    return { groups, notes };
  }

  /**
   * Project entity and Project -CONTAINS-> File edges
   */
  private addProject(projectId: string, entities: CodeEntity[], relationships: Relationship[]): void {
    const project: CodeEntity = {
      id: createEntityId(projectId, PROJECT_LANGUAGE, '', projectId),
      projectId,
      kind: 'Project',
      name: projectId,
      qualifiedName: projectId,
      filePath: '',
      startLine: 1,
      endLine: 1,
      visibility: 'default',
      language: PROJECT_LANGUAGE,
      modifiers: [],
      annotations: [],
    };

    const files = entities.filter((e) => e.kind === 'File');
    entities.unshift(project);
    for (const file of files) {
      file.parentId = project.id;
      relationships.push({
        type: 'CONTAINS',
        sourceId: project.id,
        targetId: file.id,
        confidence: 'exact',
        sourceLine: 0,
      });
    }
  }
}

function emptyStats(files: number): LanguageStats {
  return { files: 0, filesFailed: files, entities: 0, relationships: 0, durationMs: 0, usedFallback: false };
}
