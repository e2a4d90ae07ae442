/**
 * Tests for the parser registry and coordinator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ParserCoordinator, PROJECT_LANGUAGE } from '../src/core/coordinator.js';
import { createDefaultRegistry, ParserRegistry } from '../src/parser/registry.js';
import type { LanguageParser } from '../src/parser/types.js';
import type { ProjectSource } from '../src/types/index.js';
import { FileSystemError } from '../src/utils/errors.js';
import { recordingLogger } from './helpers/context.js';

function coordinatorFor(registry: ParserRegistry): ParserCoordinator {
  return new ParserCoordinator({
    registry,
    concurrency: 2,
    maxFileSize: 1024 * 1024,
    includeParameters: false,
    logger: recordingLogger().logger,
  });
}

describe('ParserRegistry', () => {
  it('should register the four default languages', () => {
    expect(createDefaultRegistry().languages()).toEqual(['dart', 'java', 'kotlin', 'python']);
  });

  it('should look parsers up by alias and by file extension', () => {
    const registry = createDefaultRegistry();

    expect(registry.get('py')?.language).toBe('python');
    expect(registry.get('Kotlin')?.language).toBe('kotlin');
    expect(registry.getForFile('lib/main.dart')?.language).toBe('dart');
    expect(registry.getForFile('main.go')).toBeUndefined();
  });

  it('should unregister a language', () => {
    const registry = createDefaultRegistry();

    expect(registry.unregister('dart')).toBe(true);
    expect(registry.has('dart')).toBe(false);
    expect(registry.unregister('dart')).toBe(false);
  });
});

describe('ParserCoordinator', () => {
  let tempDir: string;

  const source = (overrides: Partial<ProjectSource> = {}): ProjectSource => ({
    projectId: 'shop',
    rootPath: tempDir,
    languages: [],
    files: ['A.kt', 'tools/b.py', 'main.go'],
    ...overrides,
  });

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ckg-coordinator-'));
    fs.mkdirSync(path.join(tempDir, 'tools'));
    fs.writeFileSync(path.join(tempDir, 'A.kt'), 'class A {\n    fun run() {\n    }\n}\n');
    fs.writeFileSync(path.join(tempDir, 'tools', 'b.py'), 'def main():\n    pass\n');
    fs.writeFileSync(path.join(tempDir, 'main.go'), 'package main\n');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should merge every language into one result under a Project entity', async () => {
    const result = await coordinatorFor(createDefaultRegistry()).coordinate(source());
    const project = result.entities[0];
    const files = result.entities.filter((e) => e.kind === 'File');

    expect(project?.kind).toBe('Project');
    expect(project?.language).toBe(PROJECT_LANGUAGE);
    expect(files.map((f) => f.filePath)).toEqual(['A.kt', 'tools/b.py']);
    expect(files.every((f) => f.parentId === project?.id)).toBe(true);
    expect(
      result.relationships.filter((r) => r.sourceId === project?.id).map((r) => r.targetId)
    ).toEqual(files.map((f) => f.id));
    expect(Object.keys(result.perLanguageStats)).toEqual(['kotlin', 'python']);
    expect(result.perLanguageStats.python?.usedFallback).toBe(true);
    expect(result.successRate).toBe(1);
  });

  it('should note files no parser handles', async () => {
    const result = await coordinatorFor(createDefaultRegistry()).coordinate(source());

    expect(result.notes).toEqual([
      { filePath: 'main.go', code: 'UNSUPPORTED_LANGUAGE', message: 'No parser registered for language "go"' },
    ]);
    expect(result.errors).toEqual([]);
    expect(result.summary).toBe(
      `Parsed 2/2 files in 2 language(s): ${result.entities.length} entities, ` +
        `${result.relationships.length} relationships, 1 unsupported file(s) skipped`
    );
  });

  it('should restrict parsing to the requested languages', async () => {
    const result = await coordinatorFor(createDefaultRegistry()).coordinate(source({ languages: ['kt'] }));

    expect(Object.keys(result.perLanguageStats)).toEqual(['kotlin']);
    expect(result.notes).toEqual([]);
    expect(result.entities.map((e) => e.qualifiedName)).toEqual(['shop', 'A.kt', 'A', 'A.run']);
  });

  it('should turn a failing parser into per-file errors', async () => {
    const failing: LanguageParser = {
      language: 'kotlin',
      extensions: ['.kt'],
      version: 'test',
      parseFiles: async () => {
        throw new Error('boom');
      },
      canParse: (filePath) => filePath.endsWith('.kt'),
    };
    const coordinator = coordinatorFor(createDefaultRegistry());
    coordinator.register(failing);

    const result = await coordinator.coordinate(source());

    expect(result.errors).toEqual([{ filePath: 'A.kt', code: 'PARSE_FAILED', message: 'kotlin parser failed: boom' }]);
    expect(result.perLanguageStats.kotlin?.filesFailed).toBe(1);
    expect(result.successRate).toBe(0.5);
    expect(result.entities.some((e) => e.filePath === 'tools/b.py')).toBe(true);
  });

  it('should produce the same entities on every run', async () => {
    const coordinator = coordinatorFor(createDefaultRegistry());
    const first = await coordinator.coordinate(source());
    const second = await coordinator.coordinate(source({ files: ['main.go', 'tools/b.py', 'A.kt'] }));

    expect(second.entities.map((e) => e.id)).toEqual(first.entities.map((e) => e.id));
    expect(second.relationships).toEqual(first.relationships);
  });

  it('should reject a missing root directory', async () => {
    const coordinator = coordinatorFor(createDefaultRegistry());

    await expect(coordinator.coordinate(source({ rootPath: path.join(tempDir, 'nope') }))).rejects.toBeInstanceOf(
      FileSystemError
    );
  });

  it('should validate a project source', () => {
    const coordinator = coordinatorFor(createDefaultRegistry());

    expect(coordinator.validateSource(source())).toEqual({ valid: true, errors: [] });
    expect(coordinator.validateSource(source({ projectId: ' ', rootPath: 'relative', files: ['../x.kt'] }))).toEqual({
      valid: false,
      errors: [
        'projectId must not be empty',
        'rootPath must be an absolute path',
        'file path must be relative to the root: ../x.kt',
      ],
    });
  });
});
