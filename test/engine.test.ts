/**
 * End-to-end tests: scan a source tree, then analyse the stored graph
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CodeGraphEngine } from '../src/engine.js';
import { DEFAULT_CONFIG } from '../src/config.js';
import { createDefaultRegistry } from '../src/parser/registry.js';
import { InMemoryGraphDriver } from '../src/storage/memory-driver.js';
import { FileSystemError } from '../src/utils/errors.js';
import { recordingLogger } from './helpers/context.js';

function kotlinObject(name: string, method: string, callee: string): string {
  return ['package shop', '', `object ${name} {`, `    fun ${method}() {`, `        ${callee}()`, '    }', '}', ''].join(
    '\n'
  );
}

describe('CodeGraphEngine', () => {
  let tempDir: string;
  let engine: CodeGraphEngine;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ckg-engine-'));
    fs.writeFileSync(path.join(tempDir, 'A.kt'), kotlinObject('A', 'foo', 'B.bar'));
    fs.writeFileSync(path.join(tempDir, 'B.kt'), kotlinObject('B', 'bar', 'C.baz'));
    fs.writeFileSync(path.join(tempDir, 'C.kt'), kotlinObject('C', 'baz', 'A.foo'));

    engine = new CodeGraphEngine({
      projectRoot: tempDir,
      config: DEFAULT_CONFIG,
      driver: new InMemoryGraphDriver(),
      registry: createDefaultRegistry(),
      logger: recordingLogger().logger,
    });
  });

  afterEach(async () => {
    await engine.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('scan', () => {
    it('should parse the tree and write its graph', async () => {
      const { projectId, parse, build } = await engine.scan({ projectId: 'shop' });

      expect(projectId).toBe('shop');
      expect(parse.perLanguageStats.kotlin?.files).toBe(3);
      expect(parse.successRate).toBe(1);
      expect(build.success).toBe(true);
      expect(build.nodesCreated).toBe(10);
      expect(build.warnings).toEqual([]);

      const overview = await engine.query.getProjectOverview('shop');
      expect(overview.entityCounts.Class).toBe(3);
      expect(overview.entityCounts.Method).toBe(3);
      expect(overview.relationshipCounts.CALLS).toBe(3);
      expect(overview.relationshipCounts.CONTAINS).toBe(9);
    });

    it('should leave the same graph after a rescan', async () => {
      await engine.scan({ projectId: 'shop' });
      const { build } = await engine.scan({ projectId: 'shop' });
      const overview = await engine.query.getProjectOverview('shop');

      expect(build.nodesCreated).toBe(10);
      expect(overview.totalEntities).toBe(10);
      expect(overview.totalRelationships).toBe(12);
    });

    it('should default the project id to the root directory name', async () => {
      const { projectId } = await engine.scan();
      expect(projectId).toBe(path.basename(tempDir));
    });

    it('should fail for a missing project root', async () => {
      const missing = new CodeGraphEngine({
        projectRoot: path.join(tempDir, 'missing'),
        config: DEFAULT_CONFIG,
        driver: new InMemoryGraphDriver(),
        registry: createDefaultRegistry(),
        logger: recordingLogger().logger,
      });

      await expect(missing.scan({ projectId: 'shop' })).rejects.toBeInstanceOf(FileSystemError);
      await missing.close();
    });
  });

  describe('analyzeArchitecture', () => {
    it('should report the cycle between the three objects', async () => {
      await engine.scan({ projectId: 'shop' });
      const result = await engine.analyzeArchitecture('shop');

      expect(result.success).toBe(true);
      expect(result.findings).toHaveLength(1);

      const [cycle] = result.findings;
      expect(cycle?.type).toBe('circular_dependency');
      expect(['A → B → C → A', 'B → C → A → B', 'C → A → B → C']).toContain(cycle?.description);
      expect(cycle?.affectedEntities.map((e) => e.qualifiedName).sort()).toEqual(['shop.A', 'shop.B', 'shop.C']);
      expect(cycle?.severity).toBe('medium');
    });
  });

  describe('analyzeChangeSet', () => {
    it('should report the callers and callees of a changed method', async () => {
      await engine.scan({ projectId: 'shop' });
      const result = await engine.analyzeChangeSet(
        { changedFiles: [], changedEntityNames: ['shop.B.bar'] },
        'shop'
      );

      expect(result.success).toBe(true);
      const [finding] = result.findings;
      expect(finding?.type).toBe('change_impact');
      expect(finding?.description).toBe("Changing 'shop.B.bar' can affect 2 entities (2 direct, 0 indirect)");
      expect(finding?.affectedEntities.map((e) => e.qualifiedName)).toEqual(['shop.A.foo', 'shop.C.baz']);
      expect(finding?.riskScore).toBe(3);
    });
  });
});
