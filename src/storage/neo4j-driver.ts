/**
 * Code Knowledge Graph - Neo4j Graph Store
 * @module storage/neo4j-driver
 *
 * Runs compiled Cypher through neo4j-driver. Nodes carry the `CodeEntity`
 * label plus their kind label; edges carry `confidence`, `sourceLine` and
 * the owning `projectId`.
 */

import {
  auth,
  driver as createDriver,
  isInt,
  type Driver,
  type ManagedTransaction,
  type QueryResult,
  type Session,
} from 'neo4j-driver';
import {
  ENTITY_KINDS,
  RELATIONSHIP_TYPES,
  VISIBILITIES,
  type CodeEntity,
  type Relationship,
} from '../types/index.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger, type ComponentLogger } from '../utils/logger.js';
import { compileRead, compileWrite, type CypherStatement } from './cypher.js';
import {
  emptyWriteResult,
  type GraphDriver,
  type ReadQuery,
  type ReadResult,
  type StoreConnectionConfig,
  type WriteResult,
  type WriteStatement,
} from './driver.js';

// =============================================================================
// Record Conversion
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Neo4j integers (counts) and floats (stored JS numbers) as numbers
 */
export function toNumber(value: unknown): number {
  if (isInt(value)) return value.toNumber();
  return typeof value === 'number' ? value : 0;
}

function stringOf(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function stringsOf(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function pick<T extends string>(allowed: readonly T[], value: unknown, field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new Error(`Unexpected ${field} in graph store: ${String(value)}`);
  return match;
}

/**
 * Rebuild an entity from node properties
 */
export function toEntity(properties: unknown): CodeEntity {
  if (!isRecord(properties)) throw new Error('Graph store returned a non-map entity row');

  const entity: CodeEntity = {
    id: stringOf(properties.id),
    projectId: stringOf(properties.projectId),
    kind: pick(ENTITY_KINDS, properties.kind, 'entity kind'),
    name: stringOf(properties.name),
    qualifiedName: stringOf(properties.qualifiedName),
    filePath: stringOf(properties.filePath),
    startLine: toNumber(properties.startLine),
    endLine: toNumber(properties.endLine),
    visibility: pick(VISIBILITIES, properties.visibility, 'visibility'),
    language: stringOf(properties.language),
    modifiers: stringsOf(properties.modifiers),
    annotations: stringsOf(properties.annotations),
  };
  if (typeof properties.signature === 'string') entity.signature = properties.signature;
  if (typeof properties.returnType === 'string') entity.returnType = properties.returnType;
  if (Array.isArray(properties.parameterTypes)) entity.parameterTypes = stringsOf(properties.parameterTypes);
  if (typeof properties.parentId === 'string') entity.parentId = properties.parentId;
  return entity;
}

function toRelationship(row: { get(key: string): unknown }): Relationship {
  return {
    type: pick(RELATIONSHIP_TYPES, row.get('type'), 'relationship type'),
    sourceId: stringOf(row.get('sourceId')),
    targetId: stringOf(row.get('targetId')),
    confidence: row.get('confidence') === 'heuristic' ? 'heuristic' : 'exact',
    sourceLine: toNumber(row.get('sourceLine')),
  };
}

// =============================================================================
// Driver
// =============================================================================

export class Neo4jGraphDriver implements GraphDriver {
  readonly backend = 'neo4j';

  private driver: Driver | null = null;
  private database: string | undefined;
  private readonly log: ComponentLogger;

  constructor(log?: ComponentLogger) {
    this.log = log ?? logger.child({ component: 'neo4j' });
  }

  async connect(config: StoreConnectionConfig): Promise<void> {
    const driver = createDriver(config.uri, auth.basic(config.username, config.password), {
      connectionTimeout: config.connectionTimeoutMs,
      connectionAcquisitionTimeout: config.connectionTimeoutMs,
    });
    this.database = config.database || undefined;

    try {
      await driver.verifyConnectivity({ database: this.database });
    } catch (error) {
      await driver.close();
      throw new ConfigurationError(`Cannot reach graph store at ${config.uri}: ${errorMessage(error)}`, {
        code: 'STORE_UNREACHABLE',
        cause: error instanceof Error ? error : undefined,
      });
    }

    this.driver = driver;
    this.log.info('Connected to graph store', { uri: config.uri, database: this.database ?? 'default' });
  }

  async close(): Promise<void> {
    if (!this.driver) return;
    const driver = this.driver;
    this.driver = null;
    await driver.close();
  }

  async runRead(query: ReadQuery): Promise<ReadResult> {
    const compiled = compileRead(query);
    const session = this.openSession();
    try {
      const result = await session.executeRead((tx) => tx.run(compiled.text, compiled.parameters));
      return toReadResult(query, result);
    } finally {
      await session.close();
    }
  }

  async runWrite(statements: WriteStatement[]): Promise<WriteResult> {
    const schema = statements.filter((s) => s.kind === 'ensureIndexes').flatMap(compileWrite);
    const data = statements.filter((s) => s.kind !== 'ensureIndexes').flatMap(compileWrite);

    const session = this.openSession();
    try {
      // Schema changes may not share a transaction with data writes
      for (const statement of schema) {
        await session.run(statement.text, statement.parameters);
      }
      if (data.length === 0) return emptyWriteResult();
      return await session.executeWrite((tx) => runStatements(tx, data));
    } finally {
      await session.close();
    }
  }

  private openSession(): Session {
    if (!this.driver) {
      throw new ConfigurationError('Neo4j graph store is not connected', { code: 'STORE_UNREACHABLE' });
    }
    return this.driver.session(this.database ? { database: this.database } : {});
  }
}

async function runStatements(tx: ManagedTransaction, statements: CypherStatement[]): Promise<WriteResult> {
  const total = emptyWriteResult();
  for (const statement of statements) {
    const result = await tx.run(statement.text, statement.parameters);
    const updates = result.summary.counters.updates();
    total.nodesCreated += updates.nodesCreated ?? 0;
    total.nodesDeleted += updates.nodesDeleted ?? 0;
    total.relationshipsCreated += updates.relationshipsCreated ?? 0;
  }
  return total;
}

function toReadResult(query: ReadQuery, result: QueryResult): ReadResult {
  switch (query.kind) {
    case 'countEntitiesByKind':
    case 'countRelationshipsByType': {
      const counts: Record<string, number> = {};
      for (const record of result.records) {
        counts[stringOf(record.get('key'))] = toNumber(record.get('count'));
      }
      return { kind: 'counts', counts };
    }

    case 'findEntities':
      return { kind: 'entities', entities: result.records.map((record) => toEntity(record.get('entity'))) };

    case 'findRelationships':
    case 'neighbors':
      return { kind: 'relationships', relationships: result.records.map(toRelationship) };
  }
}
