/**
 * Code Knowledge Graph - Graph Store Contract
 * @module storage/driver
 *
 * The engine talks to the graph store through structured reads and
 * writes only. Each backend compiles them to its own query language.
 */

import type {
  CodeEntity,
  EntityKind,
  Relationship,
  RelationshipType,
} from '../types/index.js';

// =============================================================================
// Connection
// =============================================================================

export interface StoreConnectionConfig {
  uri: string;
  username: string;
  password: string;
  /** Server default database when empty */
  database: string;
  connectionTimeoutMs: number;
}

// =============================================================================
// Reads
// =============================================================================

/**
 * Entity filter; every given field must match
 */
export interface EntityFilter {
  projectId?: string;
  ids?: string[];
  qualifiedName?: string;
  name?: string;
  kinds?: EntityKind[];
  filePaths?: string[];
}

export type ReadQuery =
  | { kind: 'countEntitiesByKind'; projectId: string }
  | { kind: 'countRelationshipsByType'; projectId: string }
  | { kind: 'findEntities'; filter: EntityFilter }
  | { kind: 'findRelationships'; projectId: string; types?: RelationshipType[] }
  | {
      kind: 'neighbors';
      entityIds: string[];
      types: RelationshipType[];
      /** `outgoing` matches edges leaving the ids, `incoming` edges entering them */
      direction: 'incoming' | 'outgoing';
    };

export type ReadResult =
  | { kind: 'counts'; counts: Record<string, number> }
  /** Ordered by filePath, startLine, id */
  | { kind: 'entities'; entities: CodeEntity[] }
  /** Ordered by sourceId, type, targetId */
  | { kind: 'relationships'; relationships: Relationship[] };

// =============================================================================
// Writes
// =============================================================================

export type WriteStatement =
  | { kind: 'ensureIndexes' }
  | { kind: 'deleteProject'; projectId: string }
  | { kind: 'createEntities'; projectId: string; entityKind: EntityKind; entities: CodeEntity[] }
  | {
      kind: 'createRelationships';
      projectId: string;
      relationshipType: RelationshipType;
      /** Rows whose endpoints do not exist are not created */
      relationships: Relationship[];
    };

export interface WriteResult {
  nodesCreated: number;
  nodesDeleted: number;
  relationshipsCreated: number;
}

// =============================================================================
// Driver
// =============================================================================

/**
 * Minimal contract of a graph-capable backend
 */
export interface GraphDriver {
  /** Backend name for logs */
  readonly backend: string;

  /**
   * Open the connection
   *
   * @throws ConfigurationError when the store cannot be reached
   */
  connect(config: StoreConnectionConfig): Promise<void>;

  runRead(query: ReadQuery): Promise<ReadResult>;

  /**
   * Apply statements in one transaction: all of them or none
   */
  runWrite(statements: WriteStatement[]): Promise<WriteResult>;

  close(): Promise<void>;
}

export function emptyWriteResult(): WriteResult {
  return { nodesCreated: 0, nodesDeleted: 0, relationshipsCreated: 0 };
}

/**
 * Key collapsing identical relationships
 */
export function relationshipKey(relationship: Pick<Relationship, 'type' | 'sourceId' | 'targetId'>): string {
  return `${relationship.type}|${relationship.sourceId}|${relationship.targetId}`;
}

/**
 * Stable entity order shared by every backend
 */
export function compareEntities(a: CodeEntity, b: CodeEntity): number {
  if (a.filePath !== b.filePath) return a.filePath < b.filePath ? -1 : 1;
  if (a.startLine !== b.startLine) return a.startLine - b.startLine;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function compareRelationships(a: Relationship, b: Relationship): number {
  const left = `${a.sourceId}|${a.type}|${a.targetId}`;
  const right = `${b.sourceId}|${b.type}|${b.targetId}`;
  return left < right ? -1 : left > right ? 1 : 0;
}
