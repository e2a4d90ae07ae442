/**
 * Code Knowledge Graph - Core Types
 * @module types
 *
 * Shared entity, relationship and result types used by the parsers,
 * the graph builder, the graph store and the analyzers.
 */

// =============================================================================
// Entity Types
// =============================================================================

export const ENTITY_KINDS = [
  'Project',
  'File',
  'Class',
  'Interface',
  'Method',
  'Field',
  'Parameter',
] as const;

/**
 * Kinds of code entities stored as graph nodes
 */
export type EntityKind = (typeof ENTITY_KINDS)[number];

export const VISIBILITIES = [
  'public',
  'private',
  'protected',
  'package',
  'internal',
  'default',
] as const;

export type Visibility = (typeof VISIBILITIES)[number];

/**
 * A code construct represented as a graph node
 */
export interface CodeEntity {
  /** Deterministic id, see `createEntityId` */
  id: string;
  /** Project namespace the entity belongs to */
  projectId: string;
  kind: EntityKind;
  name: string;
  /** Dotted name, e.g. `com.acme.billing.Invoice.total` */
  qualifiedName: string;
  /** Path relative to the project root, forward slashes */
  filePath: string;
  /** 1-indexed, inclusive */
  startLine: number;
  endLine: number;
  visibility: Visibility;
  language: string;
  /** Methods only: `name(T1, T2): R` */
  signature?: string;
  returnType?: string;
  parameterTypes?: string[];
  /** Raw modifier keywords (`static`, `abstract`, `override`, ...) */
  modifiers: string[];
  /** Annotation / decorator names without the `@` */
  annotations: string[];
  /** Id of the containing entity (File for top-level declarations) */
  parentId?: string;
}

// =============================================================================
// Relationship Types
// =============================================================================

export const RELATIONSHIP_TYPES = [
  'CONTAINS',
  'CALLS',
  'EXTENDS',
  'IMPLEMENTS',
  'REFERENCES',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/**
 * `exact` when the target was resolved unambiguously, `heuristic` when a
 * tie-break rule picked one of several candidates.
 */
export type Confidence = 'exact' | 'heuristic';

/**
 * A typed, directed edge between two entities
 */
export interface Relationship {
  type: RelationshipType;
  sourceId: string;
  targetId: string;
  confidence: Confidence;
  /** Line of the construct that produced the edge (0 when not applicable) */
  sourceLine: number;
}

// =============================================================================
// Parse Results
// =============================================================================

/**
 * A per-file problem, captured as data rather than thrown
 */
export interface FileError {
  filePath: string;
  /** Error code from `ErrorCodes` */
  code: string;
  message: string;
  line?: number;
}

/**
 * Output of one language parser for one build
 */
export interface ParseResult {
  language: string;
  parserVersion: string;
  entities: CodeEntity[];
  relationships: Relationship[];
  errors: FileError[];
  filesParsed: number;
  filesFailed: number;
  /** True when an AST language had to use pattern extraction */
  usedFallback: boolean;
  durationMs: number;
}

export interface LanguageStats {
  files: number;
  filesFailed: number;
  entities: number;
  relationships: number;
  durationMs: number;
  usedFallback: boolean;
}

/**
 * Merged output of the parser coordinator
 */
export interface CoordinatorResult {
  projectId: string;
  entities: CodeEntity[];
  relationships: Relationship[];
  perLanguageStats: Record<string, LanguageStats>;
  errors: FileError[];
  /** Unsupported-language notes, one per skipped file */
  notes: FileError[];
  /** Parsed files / attempted files, 1 when nothing was attempted */
  successRate: number;
  summary: string;
  durationMs: number;
}

// =============================================================================
// Build Results
// =============================================================================

export interface BuildResult {
  projectId: string;
  success: boolean;
  nodesCreated: number;
  relationshipsCreated: number;
  errors: string[];
  warnings: string[];
  durationMs: number;
}

// =============================================================================
// External Inputs
// =============================================================================

/**
 * A checked-out source tree handed over by repository acquisition
 */
export interface ProjectSource {
  projectId: string;
  /** Absolute path of the checkout */
  rootPath: string;
  /** Detected languages; empty means every language with a parser */
  languages: string[];
  /** File paths relative to `rootPath` */
  files: string[];
}

/**
 * Output of diff extraction, input of change-impact analysis
 */
export interface ChangeSet {
  changedFiles: string[];
  changedEntityNames: string[];
}
