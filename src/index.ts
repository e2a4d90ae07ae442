/**
 * Code Knowledge Graph
 *
 * Turns a checked-out source tree into a directed graph of code entities
 * and relationships, and analyses it:
 * - Java, Python, Kotlin and Dart parsers behind a registry
 * - Neo4j or in-memory graph stores
 * - Circular dependency, unused entity and change impact analyses
 *
 * @packageDocumentation
 * @module code-knowledge-graph
 *
 * @example Quick Start
 * ```ts
 * import { CodeGraphEngine } from 'code-knowledge-graph';
 *
 * const engine = await CodeGraphEngine.open('/path/to/project');
 * const { build } = await engine.scan({ projectId: 'billing' });
 *
 * const report = await engine.analyzeArchitecture('billing');
 * for (const finding of report.findings) {
 *   console.log(finding.severity, finding.title, finding.description);
 * }
 *
 * await engine.close();
 * ```
 */

// Engine
export { CodeGraphEngine, type CodeGraphEngineConfig, type ScanOptions, type ScanResult } from './engine.js';

// Data model
export * from './types/index.js';

// Configuration
export {
  loadConfig,
  toUserConfig,
  mergeConfig,
  applyEnvironment,
  validateConfig,
  assertValidConfig,
  generateDefaultConfig,
  DEFAULT_CONFIG,
  STORE_BACKENDS,
  type StoreBackend,
  type CodeGraphConfig,
  type ResolvedConfig,
  type UnusedExclusionConfig,
} from './config.js';

// Parsing
export * from './parser/index.js';
export { ParserCoordinator, PROJECT_LANGUAGE, type CoordinatorOptions } from './core/coordinator.js';

// Graph
export * from './graph/index.js';
export * from './storage/index.js';

// Analysis
export * from './analytics/index.js';

// Utilities
export * from './utils/index.js';
