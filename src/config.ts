/**
 * Code Knowledge Graph - Configuration
 *
 * Loads and validates configuration from the first source found:
 * - .codegraphrc.json
 * - .codegraphrc
 * - codegraph.config.js / .mjs / .cjs
 * - package.json "codegraph" field
 *
 * Environment variables (CODEGRAPH_STORE, NEO4J_*) override file values.
 *
 * @module config
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import {
  ENTITY_KINDS,
  RELATIONSHIP_TYPES,
  type EntityKind,
  type RelationshipType,
} from './types/index.js';
import { ConfigurationError, errorMessage, isCodeGraphError } from './utils/errors.js';
import { logger } from './utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export const STORE_BACKENDS = ['memory', 'neo4j'] as const;

export type StoreBackend = (typeof STORE_BACKENDS)[number];

/**
 * Configuration schema
 */
export interface CodeGraphConfig {
  /** Project id override (defaults to the root directory name) */
  projectName?: string;

  /** Patterns to ignore (in addition to .gitignore) */
  ignore?: string[];

  /** Operations slower than this are logged as warnings */
  slowOperationMs?: number;

  /** Graph store connection */
  store?: {
    backend?: StoreBackend;
    uri?: string;
    username?: string;
    password?: string;
    /** Neo4j database name (server default when empty) */
    database?: string;
    connectionTimeoutMs?: number;
  };

  /** Parser configuration */
  parser?: {
    /** Languages to include (empty = all registered) */
    languages?: string[];
    /** Concurrent language parsers */
    concurrency?: number;
    /** Maximum file size to parse (bytes) */
    maxFileSize?: number;
    /** Emit Parameter entities for methods */
    includeParameters?: boolean;
    /** Give up on the tree-sitter runtime after this long */
    treeSitterInitTimeoutMs?: number;
  };

  /** Graph builder configuration */
  builder?: {
    /** Rows per write statement */
    batchSize?: number;
  };

  /** Architectural analysis configuration */
  analysis?: {
    /** Entity kind cycles are reported at */
    cycleScopeKind?: EntityKind;
    /** Edge types followed when looking for cycles */
    cycleRelationshipTypes?: RelationshipType[];
    unused?: UnusedExclusionConfig;
  };

  /** Change-impact configuration */
  impact?: {
    /** Caller/callee traversal depth */
    depth?: number;
  };
}

/**
 * Entities matched by any of these rules are never reported as unused
 */
export interface UnusedExclusionConfig {
  /** Entity kinds that are checked at all */
  kinds?: EntityKind[];
  /** Exact method/field names (entry points, reserved names) */
  names?: string[];
  /** Accessor-style prefixes, matched only when followed by an upper-case letter */
  namePrefixes?: string[];
  /** Names matching /^__\w+__$/ */
  dunderNames?: boolean;
  /** Exact class names */
  classNames?: string[];
  /** Class name suffixes; members of such classes are excluded too */
  classSuffixes?: string[];
  /** Annotations / modifiers marking overridden or framework callbacks */
  markers?: string[];
  /** Treat every public entity as API surface */
  publicApi?: boolean;
}

/**
 * Configuration with every default filled in
 */
export interface ResolvedConfig {
  projectName: string;
  ignore: string[];
  slowOperationMs: number;
  store: Required<NonNullable<CodeGraphConfig['store']>>;
  parser: Required<NonNullable<CodeGraphConfig['parser']>>;
  builder: Required<NonNullable<CodeGraphConfig['builder']>>;
  analysis: {
    cycleScopeKind: EntityKind;
    cycleRelationshipTypes: RelationshipType[];
    unused: Required<UnusedExclusionConfig>;
  };
  impact: Required<NonNullable<CodeGraphConfig['impact']>>;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  projectName: '',
  ignore: [],
  slowOperationMs: 5000,
  store: {
    backend: 'memory',
    uri: 'bolt://localhost:7687',
    username: 'neo4j',
    password: '',
    database: '',
    connectionTimeoutMs: 10000,
  },
  parser: {
    languages: [],
    concurrency: Math.max(1, os.cpus().length),
    maxFileSize: 1024 * 1024, // 1MB
    includeParameters: false,
    treeSitterInitTimeoutMs: 10000,
  },
  builder: {
    batchSize: 500,
  },
  analysis: {
    cycleScopeKind: 'Class',
    cycleRelationshipTypes: ['CALLS', 'REFERENCES', 'EXTENDS'],
    unused: {
      kinds: ['Class', 'Interface', 'Method', 'Field'],
      names: [
        'main',
        'toString',
        'equals',
        'hashCode',
        'clone',
        'finalize',
        'compareTo',
        'run',
        'build',
        'createState',
        'initState',
        'dispose',
        'onCreate',
        'setUp',
        'tearDown',
        'serialVersionUID',
      ],
      namePrefixes: ['get', 'set', 'is', 'test'],
      dunderNames: true,
      classNames: ['Main', 'Application', 'App'],
      classSuffixes: ['Test', 'Tests'],
      markers: ['Override', 'override', 'Test', 'Bean', 'property', 'staticmethod', 'classmethod'],
      publicApi: false,
    },
  },
  impact: {
    depth: 2,
  },
};

// ============================================================================
// CONFIG LOADER
// ============================================================================

/**
 * Configuration file names to search for (in order of priority)
 */
const CONFIG_FILES = [
  '.codegraphrc.json',
  '.codegraphrc',
  'codegraph.config.js',
  'codegraph.config.mjs',
  'codegraph.config.cjs',
];

/**
 * Load configuration from project root
 *
 * @param projectRoot - Project root directory
 * @param env - Environment to read overrides from
 * @returns Merged configuration with defaults
 */
export async function loadConfig(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<ResolvedConfig> {
  const resolvedRoot = path.resolve(projectRoot);

  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(resolvedRoot, configFile);

    if (fs.existsSync(configPath)) {
      try {
        const config = await loadConfigFile(configPath);
        return applyEnvironment(mergeConfig(config), env);
      } catch (error) {
        if (isCodeGraphError(error)) throw error;
        logger.warn('Failed to load config file', {
          file: configFile,
          error: errorMessage(error),
        });
      }
    }
  }

  const packageJsonPath = path.join(resolvedRoot, 'package.json');
  if (fs.existsSync(packageJsonPath)) {
    try {
      const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
      if (isRecord(packageJson) && isRecord(packageJson.codegraph)) {
        return applyEnvironment(mergeConfig(toUserConfig(packageJson.codegraph)), env);
      }
    } catch (error) {
      if (isCodeGraphError(error)) throw error;
      logger.debug('Ignoring unreadable package.json', { error: errorMessage(error) });
    }
  }

  return applyEnvironment(mergeConfig({}), env);
}

/**
 * Load a specific config file
 */
async function loadConfigFile(configPath: string): Promise<CodeGraphConfig> {
  const ext = path.extname(configPath);

  if (ext === '.json' || configPath.endsWith('.codegraphrc')) {
    const content = fs.readFileSync(configPath, 'utf-8');
    return toUserConfig(JSON.parse(content));
  }

  if (ext === '.js' || ext === '.mjs' || ext === '.cjs') {
    const fileUrl = pathToFileURL(configPath).href;
    const module: unknown = await import(fileUrl);
    if (isRecord(module) && 'default' in module) {
      return toUserConfig(module.default);
    }
    return toUserConfig(module);
  }

  throw new Error(`Unsupported config file format: ${ext}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Field readers: undefined when absent, ConfigurationError on a wrong type

function readString(source: Record<string, unknown>, key: string, at: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new ConfigurationError(`${at}${key} must be a string`);
  return value;
}

function readNumber(source: Record<string, unknown>, key: string, at: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigurationError(`${at}${key} must be a number`);
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, key: string, at: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new ConfigurationError(`${at}${key} must be a boolean`);
  return value;
}

function readStrings(source: Record<string, unknown>, key: string, at: string): string[] | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ConfigurationError(`${at}${key} must be an array of strings`);
  }
  return value;
}

function readOneOf<T extends string>(
  source: Record<string, unknown>,
  key: string,
  at: string,
  allowed: readonly T[]
): T | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigurationError(`${at}${key} must be one of ${allowed.join(', ')}`);
  }
  return match;
}

function readSection(source: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ConfigurationError(`${key} must be an object`);
  return value;
}

function setIfDefined<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) target[key] = value;
}

function readKinds(source: Record<string, unknown>, key: string, at: string): EntityKind[] | undefined {
  return readStrings(source, key, at)?.map((kind) => {
    const match = ENTITY_KINDS.find((candidate) => candidate === kind);
    if (!match) throw new ConfigurationError(`${at}${key}: unknown entity kind "${kind}"`);
    return match;
  });
}

function readRelationshipTypes(
  source: Record<string, unknown>,
  key: string,
  at: string
): RelationshipType[] | undefined {
  return readStrings(source, key, at)?.map((type) => {
    const match = RELATIONSHIP_TYPES.find((candidate) => candidate === type);
    if (!match) throw new ConfigurationError(`${at}${key}: unknown relationship type "${type}"`);
    return match;
  });
}

/**
 * Convert a parsed config file into a typed config. Wrong types throw;
 * value ranges are checked by `validateConfig`.
 */
export function toUserConfig(value: unknown): CodeGraphConfig {
  if (!isRecord(value)) {
    throw new ConfigurationError('Configuration must be a JSON object');
  }

  const config: CodeGraphConfig = {};
  setIfDefined(config, 'projectName', readString(value, 'projectName', ''));
  setIfDefined(config, 'ignore', readStrings(value, 'ignore', ''));
  setIfDefined(config, 'slowOperationMs', readNumber(value, 'slowOperationMs', ''));

  const store = readSection(value, 'store');
  if (store) {
    const section: NonNullable<CodeGraphConfig['store']> = {};
    setIfDefined(section, 'backend', readOneOf(store, 'backend', 'store.', STORE_BACKENDS));
    setIfDefined(section, 'uri', readString(store, 'uri', 'store.'));
    setIfDefined(section, 'username', readString(store, 'username', 'store.'));
    setIfDefined(section, 'password', readString(store, 'password', 'store.'));
    setIfDefined(section, 'database', readString(store, 'database', 'store.'));
    setIfDefined(section, 'connectionTimeoutMs', readNumber(store, 'connectionTimeoutMs', 'store.'));
    config.store = section;
  }

  const parser = readSection(value, 'parser');
  if (parser) {
    const section: NonNullable<CodeGraphConfig['parser']> = {};
    setIfDefined(section, 'languages', readStrings(parser, 'languages', 'parser.'));
    setIfDefined(section, 'concurrency', readNumber(parser, 'concurrency', 'parser.'));
    setIfDefined(section, 'maxFileSize', readNumber(parser, 'maxFileSize', 'parser.'));
    setIfDefined(section, 'includeParameters', readBoolean(parser, 'includeParameters', 'parser.'));
    setIfDefined(
      section,
      'treeSitterInitTimeoutMs',
      readNumber(parser, 'treeSitterInitTimeoutMs', 'parser.')
    );
    config.parser = section;
  }

  const builder = readSection(value, 'builder');
  if (builder) {
    const section: NonNullable<CodeGraphConfig['builder']> = {};
    setIfDefined(section, 'batchSize', readNumber(builder, 'batchSize', 'builder.'));
    config.builder = section;
  }

  const analysis = readSection(value, 'analysis');
  if (analysis) {
    const section: NonNullable<CodeGraphConfig['analysis']> = {};
    setIfDefined(
      section,
      'cycleScopeKind',
      readOneOf(analysis, 'cycleScopeKind', 'analysis.', ENTITY_KINDS)
    );
    setIfDefined(
      section,
      'cycleRelationshipTypes',
      readRelationshipTypes(analysis, 'cycleRelationshipTypes', 'analysis.')
    );

    const unused = readSection(analysis, 'unused');
    if (unused) {
      const at = 'analysis.unused.';
      const exclusions: UnusedExclusionConfig = {};
      setIfDefined(exclusions, 'kinds', readKinds(unused, 'kinds', at));
      setIfDefined(exclusions, 'names', readStrings(unused, 'names', at));
      setIfDefined(exclusions, 'namePrefixes', readStrings(unused, 'namePrefixes', at));
      setIfDefined(exclusions, 'dunderNames', readBoolean(unused, 'dunderNames', at));
      setIfDefined(exclusions, 'classNames', readStrings(unused, 'classNames', at));
      setIfDefined(exclusions, 'classSuffixes', readStrings(unused, 'classSuffixes', at));
      setIfDefined(exclusions, 'markers', readStrings(unused, 'markers', at));
      setIfDefined(exclusions, 'publicApi', readBoolean(unused, 'publicApi', at));
      section.unused = exclusions;
    }
    config.analysis = section;
  }

  const impact = readSection(value, 'impact');
  if (impact) {
    const section: NonNullable<CodeGraphConfig['impact']> = {};
    setIfDefined(section, 'depth', readNumber(impact, 'depth', 'impact.'));
    config.impact = section;
  }

  return config;
}

/**
 * Merge user config with defaults
 */
export function mergeConfig(userConfig: CodeGraphConfig): ResolvedConfig {
  return {
    projectName: userConfig.projectName ?? DEFAULT_CONFIG.projectName,
    ignore: [...DEFAULT_CONFIG.ignore, ...(userConfig.ignore || [])],
    slowOperationMs: userConfig.slowOperationMs ?? DEFAULT_CONFIG.slowOperationMs,
    store: {
      ...DEFAULT_CONFIG.store,
      ...userConfig.store,
    },
    parser: {
      ...DEFAULT_CONFIG.parser,
      ...userConfig.parser,
    },
    builder: {
      ...DEFAULT_CONFIG.builder,
      ...userConfig.builder,
    },
    analysis: {
      ...DEFAULT_CONFIG.analysis,
      ...userConfig.analysis,
      unused: {
        ...DEFAULT_CONFIG.analysis.unused,
        ...userConfig.analysis?.unused,
      },
    },
    impact: {
      ...DEFAULT_CONFIG.impact,
      ...userConfig.impact,
    },
  };
}

/**
 * Apply CODEGRAPH_STORE and NEO4J_* overrides
 */
export function applyEnvironment(
  config: ResolvedConfig,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const backend = env.CODEGRAPH_STORE;
  return {
    ...config,
    store: {
      ...config.store,
      backend: backend === 'neo4j' || backend === 'memory' ? backend : config.store.backend,
      uri: env.NEO4J_URI || config.store.uri,
      username: env.NEO4J_USERNAME || config.store.username,
      password: env.NEO4J_PASSWORD || config.store.password,
      database: env.NEO4J_DATABASE || config.store.database,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: CodeGraphConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.store?.backend === 'neo4j' && !config.store.uri) {
    errors.push('store.uri is required for the neo4j backend');
  }

  if (config.parser?.concurrency !== undefined && config.parser.concurrency < 1) {
    errors.push('parser.concurrency must be at least 1');
  }

  if (config.parser?.maxFileSize !== undefined && config.parser.maxFileSize < 1) {
    errors.push('parser.maxFileSize must be positive');
  }

  if (config.builder?.batchSize !== undefined && config.builder.batchSize < 1) {
    errors.push('builder.batchSize must be at least 1');
  }

  if (config.impact?.depth !== undefined && config.impact.depth < 1) {
    errors.push('impact.depth must be at least 1');
  }

  const scopeKind = config.analysis?.cycleScopeKind;
  if (scopeKind === 'Project' || scopeKind === 'Parameter') {
    errors.push(`analysis.cycleScopeKind cannot be ${scopeKind}`);
  }

  if (config.slowOperationMs !== undefined && config.slowOperationMs < 0) {
    errors.push('slowOperationMs must not be negative');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Throw a ConfigurationError listing every validation problem
 */
export function assertValidConfig(config: CodeGraphConfig): void {
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, {
      technical: { errors },
    });
  }
}

/**
 * Generate a default config file
 */
export function generateDefaultConfig(): string {
  return JSON.stringify(
    {
      projectName: '',
      ignore: ['**/generated/**'],
      store: {
        backend: 'memory',
        uri: 'bolt://localhost:7687',
        username: 'neo4j',
      },
      parser: {
        languages: [],
        maxFileSize: DEFAULT_CONFIG.parser.maxFileSize,
      },
      analysis: {
        cycleScopeKind: 'Class',
      },
      impact: {
        depth: 2,
      },
    },
    null,
    2
  );
}
