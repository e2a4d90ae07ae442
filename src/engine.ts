/**
 * Code Knowledge Graph - Engine
 *
 * Wires the pipeline together from one configuration:
 * - File enumeration and the parser coordinator
 * - The graph builder and its store driver
 * - The query interface
 * - Architectural and change-impact analyzers
 *
 * @module engine
 */

import * as path from 'path';
import { ArchitecturalAnalyzer } from './analytics/architectural-analyzer.js';
import { PrImpactAnalyzer } from './analytics/pr-impact-analyzer.js';
import type { AnalysisResult } from './analytics/types.js';
import { DEFAULT_CONFIG, assertValidConfig, loadConfig, type ResolvedConfig } from './config.js';
import { ParserCoordinator } from './core/coordinator.js';
import { GraphBuilder } from './graph/graph-builder.js';
import { GraphQueryInterface } from './graph/query.js';
import { createDefaultRegistry, type ParserRegistry } from './parser/registry.js';
import { TreeSitterRuntime } from './parser/tree-sitter-runtime.js';
import { normalizeLanguage } from './parser/types.js';
import { createGraphDriver } from './storage/index.js';
import type { GraphDriver } from './storage/driver.js';
import type { BuildResult, ChangeSet, CoordinatorResult, ProjectSource } from './types/index.js';
import { ConfigurationError, FileSystemError } from './utils/errors.js';
import { logger as rootLogger, type ComponentLogger } from './utils/logger.js';
import { isDirectory, listSourceFiles } from './utils/paths.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Engine configuration
 */
export interface CodeGraphEngineConfig {
  /** Project root directory */
  projectRoot: string;
  /** Resolved configuration; loaded from the project root when omitted */
  config?: ResolvedConfig;
  /** Custom store driver (tests use an in-memory one) */
  driver?: GraphDriver;
  /** Custom parser registry */
  registry?: ParserRegistry;
  logger?: ComponentLogger;
}

export interface ScanOptions {
  /** Defaults to the configured project name, then the root directory name */
  projectId?: string;
  /** Restrict parsing to these languages */
  languages?: string[];
  /** Parse these files instead of enumerating the root */
  files?: string[];
}

/**
 * Outcome of one scan: what was parsed and what was written
 */
export interface ScanResult {
  projectId: string;
  parse: CoordinatorResult;
  build: BuildResult;
}

// ============================================================================
// ENGINE
// ============================================================================

/**
 * Code knowledge graph engine
 *
 * @example
 * ```ts
 * const engine = await CodeGraphEngine.open('/path/to/project');
 * await engine.scan();
 * const report = await engine.analyzeArchitecture();
 * await engine.close();
 * ```
 */
export class CodeGraphEngine {
  readonly projectRoot: string;
  readonly config: ResolvedConfig;

  private readonly log: ComponentLogger;
  private readonly driver: GraphDriver;
  private readonly coordinator: ParserCoordinator;
  private readonly builder: GraphBuilder;
  private readonly queryInterface: GraphQueryInterface;
  private readonly architecture: ArchitecturalAnalyzer;
  private readonly impact: PrImpactAnalyzer;
  private readonly registry: ParserRegistry;
  private connection: Promise<void> | null = null;

  constructor(options: CodeGraphEngineConfig) {
    this.projectRoot = path.resolve(options.projectRoot);
    this.config = options.config ?? DEFAULT_CONFIG;
    assertValidConfig(this.config);

    const log = options.logger ?? rootLogger;
    this.log = options.logger ?? rootLogger.child({ component: 'engine' });
    const slowOperationMs = this.config.slowOperationMs;

    this.registry =
      options.registry ??
      createDefaultRegistry(
        new TreeSitterRuntime({
          initTimeoutMs: this.config.parser.treeSitterInitTimeoutMs,
          logger: log,
        })
      );
    this.driver = options.driver ?? createGraphDriver(this.config.store.backend, log);

    this.coordinator = new ParserCoordinator({
      registry: this.registry,
      concurrency: this.config.parser.concurrency,
      maxFileSize: this.config.parser.maxFileSize,
      includeParameters: this.config.parser.includeParameters,
      slowOperationMs,
      logger: options.logger,
    });
    this.builder = new GraphBuilder(this.driver, {
      batchSize: this.config.builder.batchSize,
      slowOperationMs,
      logger: options.logger,
    });
    this.queryInterface = new GraphQueryInterface(this.driver, { slowOperationMs, logger: options.logger });
    this.architecture = new ArchitecturalAnalyzer(this.queryInterface, {
      scopeKind: this.config.analysis.cycleScopeKind,
      relationshipTypes: this.config.analysis.cycleRelationshipTypes,
      unused: this.config.analysis.unused,
      logger: options.logger,
    });
    this.impact = new PrImpactAnalyzer(this.queryInterface, {
      depth: this.config.impact.depth,
      logger: options.logger,
    });
  }

  /**
   * Load the project's configuration and connect to its store
   */
  static async open(
    projectRoot: string,
    overrides: Omit<CodeGraphEngineConfig, 'projectRoot' | 'config'> = {}
  ): Promise<CodeGraphEngine> {
    const config = await loadConfig(projectRoot);
    const engine = new CodeGraphEngine({ ...overrides, projectRoot, config });
    await engine.initialize();
    return engine;
  }

  /**
   * Connect to the graph store. Safe to call more than once.
   *
   * @throws ConfigurationError when the store is unreachable
   */
  async initialize(): Promise<void> {
    if (!this.connection) {
      this.connection = this.driver.connect(this.config.store).catch((error: unknown) => {
        this.connection = null;
        throw error;
      });
    }
    await this.connection;
  }

  /** Read access to the graph */
  get query(): GraphQueryInterface {
    return this.queryInterface;
  }

  /** Builder, for listening to build events */
  get graphBuilder(): GraphBuilder {
    return this.builder;
  }

  /** Project id used when a call names none */
  get defaultProjectId(): string {
    return this.config.projectName || path.basename(this.projectRoot);
  }

  // --------------------------------------------------------------------------
  // Scanning
  // --------------------------------------------------------------------------

  /**
   * Parse the project and replace its graph
   *
   * @throws FileSystemError when the project root is missing
   * @throws ConfigurationError when the project id or file list is invalid
   */
  async scan(options: ScanOptions = {}): Promise<ScanResult> {
    await this.initialize();

    if (!isDirectory(this.projectRoot)) {
      throw new FileSystemError('FILE_NOT_FOUND', `Project root not found: ${this.projectRoot}`, {
        path: this.projectRoot,
      });
    }

    const projectId = options.projectId ?? this.defaultProjectId;
    const languages = (options.languages ?? this.config.parser.languages).map(normalizeLanguage);
    const files = options.files ?? (await this.enumerateFiles(languages));

    const source: ProjectSource = { projectId, rootPath: this.projectRoot, languages, files };
    const validation = this.coordinator.validateSource(source);
    if (!validation.valid) {
      throw new ConfigurationError(`Invalid project source: ${validation.errors.join('; ')}`);
    }

    this.log.info('Scanning project', { projectId, files: files.length });
    const parse = await this.coordinator.coordinate(source);
    const build = await this.builder.build(projectId, parse.entities, parse.relationships);

    return { projectId, parse, build };
  }

  // --------------------------------------------------------------------------
  // Analysis
  // --------------------------------------------------------------------------

  /**
   * Circular dependencies and unused entities
   */
  async analyzeArchitecture(projectId: string = this.defaultProjectId): Promise<AnalysisResult> {
    await this.initialize();
    await this.builder.whenIdle(projectId);
    return this.architecture.analyze(projectId);
  }

  /**
   * Impact of a change set on the rest of the graph
   */
  async analyzeChangeSet(changeSet: ChangeSet, projectId: string = this.defaultProjectId): Promise<AnalysisResult> {
    await this.initialize();
    await this.builder.whenIdle(projectId);
    return this.impact.analyze(projectId, changeSet);
  }

  /**
   * Close the store connection. Builds still queued fail their writes.
   */
  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    await connection;
    await this.driver.close();
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async enumerateFiles(languages: string[]): Promise<string[]> {
    const wanted = languages.length > 0 ? languages : this.registry.languages();
    const extensions = wanted.flatMap((language) => this.registry.get(language)?.extensions ?? []);
    return listSourceFiles(this.projectRoot, extensions, this.config.ignore);
  }
}
