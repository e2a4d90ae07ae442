/**
 * Code Knowledge Graph - In-Memory Graph Store
 * @module storage/memory-driver
 *
 * Id-keyed arena of entities plus a relationship table. A write applies
 * its statements to a copy of the state and swaps the copy in only when
 * every statement succeeded.
 */

import type { CodeEntity, Relationship } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import {
  compareEntities,
  compareRelationships,
  emptyWriteResult,
  relationshipKey,
  type EntityFilter,
  type GraphDriver,
  type ReadQuery,
  type ReadResult,
  type StoreConnectionConfig,
  type WriteResult,
  type WriteStatement,
} from './driver.js';

// =============================================================================
// Types
// =============================================================================

interface StoredRelationship extends Relationship {
  projectId: string;
}

interface GraphState {
  entities: Map<string, CodeEntity>;
  relationships: Map<string, StoredRelationship>;
}

function cloneEntity(entity: CodeEntity): CodeEntity {
  return {
    ...entity,
    modifiers: [...entity.modifiers],
    annotations: [...entity.annotations],
    ...(entity.parameterTypes ? { parameterTypes: [...entity.parameterTypes] } : {}),
  };
}

function toRelationship(stored: Relationship): Relationship {
  return {
    type: stored.type,
    sourceId: stored.sourceId,
    targetId: stored.targetId,
    confidence: stored.confidence,
    sourceLine: stored.sourceLine,
  };
}

// =============================================================================
// Driver
// =============================================================================

export class InMemoryGraphDriver implements GraphDriver {
  readonly backend = 'memory';

  private state: GraphState = { entities: new Map(), relationships: new Map() };
  private connected = false;

  async connect(_config?: StoreConnectionConfig): Promise<void> {
    this.connected = true;
  }

  async close(): Promise<void> {
    this.connected = false;
  }

  async runRead(query: ReadQuery): Promise<ReadResult> {
    this.assertConnected();
    const { entities, relationships } = this.state;

    switch (query.kind) {
      case 'countEntitiesByKind': {
        const counts: Record<string, number> = {};
        for (const entity of entities.values()) {
          if (entity.projectId !== query.projectId) continue;
          counts[entity.kind] = (counts[entity.kind] ?? 0) + 1;
        }
        return { kind: 'counts', counts };
      }

      case 'countRelationshipsByType': {
        const counts: Record<string, number> = {};
        for (const relationship of relationships.values()) {
          if (relationship.projectId !== query.projectId) continue;
          counts[relationship.type] = (counts[relationship.type] ?? 0) + 1;
        }
        return { kind: 'counts', counts };
      }

      case 'findEntities': {
        const matched = this.filterEntities(query.filter);
        return { kind: 'entities', entities: matched.sort(compareEntities).map(cloneEntity) };
      }

      case 'findRelationships': {
        const types = query.types ? new Set(query.types) : undefined;
        const matched: Relationship[] = [];
        for (const relationship of relationships.values()) {
          if (relationship.projectId !== query.projectId) continue;
          if (types && !types.has(relationship.type)) continue;
          matched.push(toRelationship(relationship));
        }
        return { kind: 'relationships', relationships: matched.sort(compareRelationships) };
      }

      case 'neighbors': {
        const ids = new Set(query.entityIds);
        const types = new Set(query.types);
        const matched: Relationship[] = [];
        for (const relationship of relationships.values()) {
          if (!types.has(relationship.type)) continue;
          const anchor = query.direction === 'outgoing' ? relationship.sourceId : relationship.targetId;
          if (ids.has(anchor)) matched.push(toRelationship(relationship));
        }
        return { kind: 'relationships', relationships: matched.sort(compareRelationships) };
      }
    }
  }

  async runWrite(statements: WriteStatement[]): Promise<WriteResult> {
    this.assertConnected();

    const next: GraphState = {
      entities: new Map(this.state.entities),
      relationships: new Map(this.state.relationships),
    };
    const result = emptyWriteResult();

    for (const statement of statements) {
      applyStatement(next, statement, result);
    }

    this.state = next;
    return result;
  }

  /** Number of stored entities across all projects */
  get size(): number {
    return this.state.entities.size;
  }

  private filterEntities(filter: EntityFilter): CodeEntity[] {
    const kinds = filter.kinds ? new Set<string>(filter.kinds) : undefined;
    const filePaths = filter.filePaths ? new Set(filter.filePaths) : undefined;

    let candidates: Iterable<CodeEntity> = this.state.entities.values();
    if (filter.ids) {
      const byId: CodeEntity[] = [];
      for (const id of new Set(filter.ids)) {
        const entity = this.state.entities.get(id);
        if (entity) byId.push(entity);
      }
      candidates = byId;
    }

    const matched: CodeEntity[] = [];
    for (const entity of candidates) {
      if (filter.projectId !== undefined && entity.projectId !== filter.projectId) continue;
      if (filter.qualifiedName !== undefined && entity.qualifiedName !== filter.qualifiedName) continue;
      if (filter.name !== undefined && entity.name !== filter.name) continue;
      if (kinds && !kinds.has(entity.kind)) continue;
      if (filePaths && !filePaths.has(entity.filePath)) continue;
      matched.push(entity);
    }
    return matched;
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new ConfigurationError('In-memory graph store is not connected', {
        code: 'STORE_UNREACHABLE',
      });
    }
  }
}

function applyStatement(state: GraphState, statement: WriteStatement, result: WriteResult): void {
  switch (statement.kind) {
    case 'ensureIndexes':
      return;

    case 'deleteProject': {
      for (const [id, entity] of state.entities) {
        if (entity.projectId !== statement.projectId) continue;
        state.entities.delete(id);
        result.nodesDeleted++;
      }
      for (const [key, relationship] of state.relationships) {
        if (
          relationship.projectId === statement.projectId ||
          !state.entities.has(relationship.sourceId) ||
          !state.entities.has(relationship.targetId)
        ) {
          state.relationships.delete(key);
        }
      }
      return;
    }

    case 'createEntities': {
      for (const entity of statement.entities) {
        if (entity.kind !== statement.entityKind) {
          throw new Error(`Entity ${entity.id} is a ${entity.kind}, batch expects ${statement.entityKind}`);
        }
        if (!state.entities.has(entity.id)) result.nodesCreated++;
        state.entities.set(entity.id, cloneEntity({ ...entity, projectId: statement.projectId }));
      }
      return;
    }

    case 'createRelationships': {
      for (const relationship of statement.relationships) {
        if (relationship.type !== statement.relationshipType) {
          throw new Error(
            `Relationship ${relationshipKey(relationship)} does not match batch type ${statement.relationshipType}`
          );
        }
        if (!state.entities.has(relationship.sourceId) || !state.entities.has(relationship.targetId)) {
          continue;
        }
        const key = relationshipKey(relationship);
        if (!state.relationships.has(key)) result.relationshipsCreated++;
        state.relationships.set(key, { ...toRelationship(relationship), projectId: statement.projectId });
      }
      return;
    }
  }
}
