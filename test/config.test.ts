/**
 * Tests for configuration loading and validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  DEFAULT_CONFIG,
  applyEnvironment,
  assertValidConfig,
  generateDefaultConfig,
  loadConfig,
  mergeConfig,
  toUserConfig,
  validateConfig,
} from '../src/config.js';
import { ConfigurationError } from '../src/utils/errors.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ckg-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return defaults when no config file exists', async () => {
    const config = await loadConfig(tempDir, {});

    expect(config.store).toEqual(DEFAULT_CONFIG.store);
    expect(config.impact.depth).toBe(2);
    expect(config.analysis.cycleScopeKind).toBe('Class');
  });

  it('should merge .codegraphrc.json per section', async () => {
    fs.writeFileSync(
      path.join(tempDir, '.codegraphrc.json'),
      JSON.stringify({
        projectName: 'shop',
        builder: { batchSize: 50 },
        analysis: { unused: { publicApi: true } },
      })
    );

    const config = await loadConfig(tempDir, {});

    expect(config.projectName).toBe('shop');
    expect(config.builder.batchSize).toBe(50);
    expect(config.analysis.unused.publicApi).toBe(true);
    expect(config.analysis.unused.names).toEqual(DEFAULT_CONFIG.analysis.unused.names);
    expect(config.parser.maxFileSize).toBe(DEFAULT_CONFIG.parser.maxFileSize);
  });

  it('should read the codegraph field of package.json', async () => {
    fs.writeFileSync(
      path.join(tempDir, 'package.json'),
      JSON.stringify({ name: 'demo', codegraph: { impact: { depth: 4 } } })
    );

    const config = await loadConfig(tempDir, {});
    expect(config.impact.depth).toBe(4);
  });

  it('should apply environment overrides', async () => {
    const config = await loadConfig(tempDir, {
      CODEGRAPH_STORE: 'neo4j',
      NEO4J_URI: 'bolt://graph:7687',
      NEO4J_PASSWORD: 'test-secret',
    });

    expect(config.store.backend).toBe('neo4j');
    expect(config.store.uri).toBe('bolt://graph:7687');
    expect(config.store.password).toBe('test-secret');
    expect(config.store.username).toBe('neo4j');
  });

  it('should reject a config file with a wrong field type', async () => {
    fs.writeFileSync(path.join(tempDir, '.codegraphrc.json'), JSON.stringify({ impact: { depth: 'deep' } }));

    await expect(loadConfig(tempDir, {})).rejects.toThrow('impact.depth must be a number');
  });
});

describe('toUserConfig', () => {
  it('should reject non-objects', () => {
    expect(() => toUserConfig([])).toThrow(ConfigurationError);
  });

  it('should reject unknown entity kinds and relationship types', () => {
    expect(() => toUserConfig({ analysis: { cycleScopeKind: 'Module' } })).toThrow(
      'analysis.cycleScopeKind must be one of'
    );
    expect(() => toUserConfig({ analysis: { cycleRelationshipTypes: ['USES'] } })).toThrow(
      'analysis.cycleRelationshipTypes: unknown relationship type "USES"'
    );
  });

  it('should keep only the fields that are present', () => {
    expect(toUserConfig({ store: { backend: 'memory' } })).toEqual({ store: { backend: 'memory' } });
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [] });
  });

  it('should report every invalid value', () => {
    const result = validateConfig({
      builder: { batchSize: 0 },
      impact: { depth: 0 },
      analysis: { cycleScopeKind: 'Parameter' },
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'builder.batchSize must be at least 1',
      'impact.depth must be at least 1',
      'analysis.cycleScopeKind cannot be Parameter',
    ]);
  });

  it('should throw from assertValidConfig', () => {
    expect(() => assertValidConfig({ parser: { concurrency: 0 } })).toThrow(
      'Invalid configuration: parser.concurrency must be at least 1'
    );
  });
});

describe('mergeConfig / applyEnvironment', () => {
  it('should ignore an unknown CODEGRAPH_STORE value', () => {
    const config = applyEnvironment(mergeConfig({}), { CODEGRAPH_STORE: 'sqlite' });
    expect(config.store.backend).toBe('memory');
  });
});

describe('generateDefaultConfig', () => {
  it('should produce a config that loads and validates', () => {
    const config = toUserConfig(JSON.parse(generateDefaultConfig()));

    expect(validateConfig(config).valid).toBe(true);
    expect(config.store?.backend).toBe('memory');
  });
});
