/**
 * Code Knowledge Graph - Query Interface
 * @module graph/query
 *
 * Read-only operations over the graph store. Every operation may run
 * concurrently with other reads. A store failure is rethrown as a
 * QueryError; nothing here returns partial results.
 */

import {
  ENTITY_KINDS,
  RELATIONSHIP_TYPES,
  type CodeEntity,
  type EntityKind,
  type Relationship,
  type RelationshipType,
} from '../types/index.js';
import { errorMessage, QueryError } from '../utils/errors.js';
import { logger, type ComponentLogger } from '../utils/logger.js';
import type { EntityFilter, GraphDriver, ReadQuery } from '../storage/driver.js';
import { detectCycles, type CycleEdge } from './cycle-detector.js';

// ============================================================================
// TYPES
// ============================================================================

export interface ProjectOverview {
  projectId: string;
  entityCounts: Record<EntityKind, number>;
  relationshipCounts: Record<RelationshipType, number>;
  totalEntities: number;
  totalRelationships: number;
}

export type CallDirection = 'callers' | 'callees';

export interface TraversalHit {
  entity: CodeEntity;
  /** 1 for direct callers / callees */
  depth: number;
}

export interface DependencyCycle {
  /** Canonical order, starting at the smallest id */
  entityIds: string[];
  entities: CodeEntity[];
  edgeCount: number;
  edgeTypes: RelationshipType[];
}

/** Returns true for entities that must not be reported */
export type EntityPredicate = (entity: CodeEntity) => boolean;

export interface ClassComplexity {
  entity: CodeEntity;
  methodCount: number;
  outgoingCalls: number;
  incomingCalls: number;
  /** methods × 2 + outgoing calls + incoming calls */
  score: number;
}

export interface PublicApiEntry {
  entity: CodeEntity;
  /** Incoming CALLS edges */
  usageCount: number;
}

export interface RefactoringCandidate {
  entity: CodeEntity;
  outgoingCalls: number;
}

export interface QueryOptions {
  /** Reads slower than this are logged as warnings */
  slowOperationMs?: number;
  logger?: ComponentLogger;
}

export const DEFAULT_CYCLE_RELATIONSHIPS: readonly RelationshipType[] = ['CALLS', 'REFERENCES', 'EXTENDS'];

export const UNUSED_CANDIDATE_KINDS: readonly EntityKind[] = ['Class', 'Interface', 'Method', 'Field'];

const USAGE_TYPES: readonly RelationshipType[] = ['CALLS', 'REFERENCES'];

function entityCountsOf(counts: Record<string, number>): Record<EntityKind, number> {
  return {
    Project: counts.Project ?? 0,
    File: counts.File ?? 0,
    Class: counts.Class ?? 0,
    Interface: counts.Interface ?? 0,
    Method: counts.Method ?? 0,
    Field: counts.Field ?? 0,
    Parameter: counts.Parameter ?? 0,
  };
}

function relationshipCountsOf(counts: Record<string, number>): Record<RelationshipType, number> {
  return {
    CONTAINS: counts.CONTAINS ?? 0,
    CALLS: counts.CALLS ?? 0,
    EXTENDS: counts.EXTENDS ?? 0,
    IMPLEMENTS: counts.IMPLEMENTS ?? 0,
    REFERENCES: counts.REFERENCES ?? 0,
  };
}

// ============================================================================
// QUERY INTERFACE
// ============================================================================

export class GraphQueryInterface {
  private readonly log: ComponentLogger;
  private readonly slowOperationMs?: number;

  constructor(
    private readonly driver: GraphDriver,
    options: QueryOptions = {}
  ) {
    this.log = options.logger ?? logger.child({ component: 'query' });
    this.slowOperationMs = options.slowOperationMs;
  }

  // --------------------------------------------------------------------------
  // Lookups
  // --------------------------------------------------------------------------

  /**
   * Entity counts by kind and relationship counts by type
   */
  async getProjectOverview(projectId: string): Promise<ProjectOverview> {
    return this.run('getProjectOverview', async () => {
      const entityCounts = entityCountsOf(await this.counts({ kind: 'countEntitiesByKind', projectId }));
      const relationshipCounts = relationshipCountsOf(
        await this.counts({ kind: 'countRelationshipsByType', projectId })
      );

      return {
        projectId,
        entityCounts,
        relationshipCounts,
        totalEntities: ENTITY_KINDS.reduce((sum, kind) => sum + entityCounts[kind], 0),
        totalRelationships: RELATIONSHIP_TYPES.reduce((sum, type) => sum + relationshipCounts[type], 0),
      };
    });
  }

  async getEntity(entityId: string): Promise<CodeEntity | null> {
    return this.run('getEntity', async () => {
      const [entity] = await this.entities({ ids: [entityId] });
      return entity ?? null;
    });
  }

  async findEntitiesByQualifiedName(projectId: string, qualifiedName: string): Promise<CodeEntity[]> {
    return this.run('findEntitiesByQualifiedName', () => this.entities({ projectId, qualifiedName }));
  }

  async findEntitiesByName(projectId: string, name: string, kinds?: EntityKind[]): Promise<CodeEntity[]> {
    return this.run('findEntitiesByName', () =>
      this.entities(kinds ? { projectId, name, kinds } : { projectId, name })
    );
  }

  async findEntitiesInFiles(projectId: string, filePaths: string[], kinds?: EntityKind[]): Promise<CodeEntity[]> {
    if (filePaths.length === 0) return [];
    return this.run('findEntitiesInFiles', () =>
      this.entities(kinds ? { projectId, filePaths, kinds } : { projectId, filePaths })
    );
  }

  // --------------------------------------------------------------------------
  // Call traversal
  // --------------------------------------------------------------------------

  /**
   * Breadth-first walk over CALLS edges. Each entity is reported once, at
   * the smallest depth it is reached; the start entity is never reported.
   *
   * @throws QueryError INVALID_QUERY for a depth below 1, ENTITY_NOT_FOUND
   * for an unknown id
   */
  async traverseCalls(entityId: string, direction: CallDirection, maxDepth = 1): Promise<TraversalHit[]> {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new QueryError(`maxDepth must be a positive integer, got ${maxDepth}`, { code: 'INVALID_QUERY' });
    }

    return this.run('traverseCalls', async () => {
      const [start] = await this.entities({ ids: [entityId] });
      if (!start) {
        throw new QueryError(`Entity not found: ${entityId}`, { code: 'ENTITY_NOT_FOUND' });
      }

      const visited = new Set([entityId]);
      const hits: TraversalHit[] = [];
      let frontier = [entityId];

      for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
        const edges = await this.relationships({
          kind: 'neighbors',
          entityIds: frontier,
          types: ['CALLS'],
          direction: direction === 'callers' ? 'incoming' : 'outgoing',
        });

        const nextIds: string[] = [];
        for (const edge of edges) {
          const id = direction === 'callers' ? edge.sourceId : edge.targetId;
          if (visited.has(id)) continue;
          visited.add(id);
          nextIds.push(id);
        }
        if (nextIds.length === 0) break;

        for (const entity of await this.entities({ ids: nextIds })) {
          hits.push({ entity, depth });
        }
        frontier = nextIds;
      }

      return hits;
    });
  }

  /**
   * Entities calling `entityId`, directly or up to `maxDepth` hops away
   */
  async findCallers(entityId: string, maxDepth = 1): Promise<CodeEntity[]> {
    return (await this.traverseCalls(entityId, 'callers', maxDepth)).map((hit) => hit.entity);
  }

  async findCallees(entityId: string, maxDepth = 1): Promise<CodeEntity[]> {
    return (await this.traverseCalls(entityId, 'callees', maxDepth)).map((hit) => hit.entity);
  }

  /** Distinct direct callers */
  async getFanIn(entityId: string): Promise<number> {
    return this.run('getFanIn', async () => {
      const edges = await this.relationships({
        kind: 'neighbors',
        entityIds: [entityId],
        types: ['CALLS'],
        direction: 'incoming',
      });
      return new Set(edges.map((e) => e.sourceId)).size;
    });
  }

  /** Distinct direct callees */
  async getFanOut(entityId: string): Promise<number> {
    return this.run('getFanOut', async () => {
      const edges = await this.relationships({
        kind: 'neighbors',
        entityIds: [entityId],
        types: ['CALLS'],
        direction: 'outgoing',
      });
      return new Set(edges.map((e) => e.targetId)).size;
    });
  }

  // --------------------------------------------------------------------------
  // Structure
  // --------------------------------------------------------------------------

  /**
   * Cycles between `scopeKind` entities. Member edges are lifted to the
   * nearest `scopeKind` ancestor through CONTAINS before Tarjan's
   * algorithm runs; edges inside one scope entity are dropped.
   */
  async findCircularDependencies(
    projectId: string,
    scopeKind: EntityKind = 'Class',
    relationshipTypes: readonly RelationshipType[] = DEFAULT_CYCLE_RELATIONSHIPS
  ): Promise<DependencyCycle[]> {
    if (scopeKind === 'Project' || scopeKind === 'Parameter') {
      throw new QueryError(`Cycles cannot be computed at ${scopeKind} level`, { code: 'INVALID_QUERY' });
    }

    return this.run('findCircularDependencies', async () => {
      const entities = await this.entities({ projectId });
      const edges = await this.relationships({
        kind: 'findRelationships',
        projectId,
        types: Array.from(new Set<RelationshipType>(['CONTAINS', ...relationshipTypes])),
      });

      const byId = new Map(entities.map((e) => [e.id, e]));
      const parentOf = new Map<string, string>();
      for (const edge of edges) {
        if (edge.type === 'CONTAINS') parentOf.set(edge.targetId, edge.sourceId);
      }

      const scopeCache = new Map<string, string | undefined>();
      const scopeOf = (id: string): string | undefined => {
        if (scopeCache.has(id)) return scopeCache.get(id);
        let current: string | undefined = id;
        let guard = 0;
        while (current !== undefined && guard++ < byId.size + 1) {
          if (byId.get(current)?.kind === scopeKind) break;
          current = parentOf.get(current);
        }
        const scope = current !== undefined && byId.get(current)?.kind === scopeKind ? current : undefined;
        scopeCache.set(id, scope);
        return scope;
      };

      const wanted = new Set(relationshipTypes);
      const lifted: CycleEdge[] = [];
      for (const edge of edges) {
        if (!wanted.has(edge.type) || edge.type === 'CONTAINS') continue;
        const sourceId = scopeOf(edge.sourceId);
        const targetId = scopeOf(edge.targetId);
        if (sourceId === undefined || targetId === undefined || sourceId === targetId) continue;
        lifted.push({ sourceId, targetId, type: edge.type });
      }

      const nodeIds = entities.filter((e) => e.kind === scopeKind).map((e) => e.id);
      const { cycles } = detectCycles(nodeIds, lifted);

      return cycles.map((cycle) => ({
        entityIds: cycle.nodeIds,
        entities: cycle.nodeIds.flatMap((id) => {
          const entity = byId.get(id);
          return entity ? [entity] : [];
        }),
        edgeCount: cycle.edgeCount,
        edgeTypes: cycle.edgeTypes,
      }));
    });
  }

  /**
   * Entities nothing calls or references. A Class or Interface also counts
   * as used when it is extended, implemented, or one of its members is
   * used. A heuristic: reflection, dependency injection and external
   * callers are invisible here.
   *
   * @param exclude - Entities for which this returns true are not reported
   */
  async findUnusedEntities(
    projectId: string,
    exclude?: EntityPredicate,
    kinds: readonly EntityKind[] = UNUSED_CANDIDATE_KINDS
  ): Promise<CodeEntity[]> {
    return this.run('findUnusedEntities', async () => {
      const entities = await this.entities({ projectId });
      const edges = await this.relationships({
        kind: 'findRelationships',
        projectId,
        types: ['CALLS', 'REFERENCES', 'EXTENDS', 'IMPLEMENTS', 'CONTAINS'],
      });

      const used = new Set<string>();
      const inherited = new Set<string>();
      const membersOf = new Map<string, string[]>();
      for (const edge of edges) {
        if (edge.sourceId === edge.targetId) continue;
        if (USAGE_TYPES.includes(edge.type)) used.add(edge.targetId);
        else if (edge.type === 'EXTENDS' || edge.type === 'IMPLEMENTS') inherited.add(edge.targetId);
        else if (edge.type === 'CONTAINS') {
          const members = membersOf.get(edge.sourceId) ?? [];
          members.push(edge.targetId);
          membersOf.set(edge.sourceId, members);
        }
      }

      const isUsed = (entity: CodeEntity): boolean => {
        if (used.has(entity.id)) return true;
        if (entity.kind !== 'Class' && entity.kind !== 'Interface') return false;
        if (inherited.has(entity.id)) return true;
        return (membersOf.get(entity.id) ?? []).some((id) => used.has(id));
      };

      const wantedKinds = new Set(kinds);
      return entities.filter(
        (entity) => wantedKinds.has(entity.kind) && !isUsed(entity) && !(exclude?.(entity) ?? false)
      );
    });
  }

  /**
   * Classes ranked by methods × 2 + outgoing + incoming calls of their methods
   */
  async getClassComplexity(projectId: string, limit?: number): Promise<ClassComplexity[]> {
    return this.run('getClassComplexity', async () => {
      const entities = await this.entities({ projectId, kinds: ['Class', 'Method'] });
      const edges = await this.relationships({ kind: 'findRelationships', projectId, types: ['CALLS'] });

      const methodsByClass = new Map<string, string[]>();
      const classOfMethod = new Map<string, string>();
      for (const entity of entities) {
        if (entity.kind !== 'Method' || !entity.parentId) continue;
        const methods = methodsByClass.get(entity.parentId) ?? [];
        methods.push(entity.id);
        methodsByClass.set(entity.parentId, methods);
        classOfMethod.set(entity.id, entity.parentId);
      }

      const outgoing = new Map<string, number>();
      const incoming = new Map<string, number>();
      for (const edge of edges) {
        const from = classOfMethod.get(edge.sourceId);
        const to = classOfMethod.get(edge.targetId);
        if (from) outgoing.set(from, (outgoing.get(from) ?? 0) + 1);
        if (to) incoming.set(to, (incoming.get(to) ?? 0) + 1);
      }

      const ranked = entities
        .filter((entity) => entity.kind === 'Class')
        .map((entity) => {
          const methodCount = methodsByClass.get(entity.id)?.length ?? 0;
          const outgoingCalls = outgoing.get(entity.id) ?? 0;
          const incomingCalls = incoming.get(entity.id) ?? 0;
          return {
            entity,
            methodCount,
            outgoingCalls,
            incomingCalls,
            score: methodCount * 2 + outgoingCalls + incomingCalls,
          };
        })
        .sort((a, b) => b.score - a.score || a.entity.qualifiedName.localeCompare(b.entity.qualifiedName));

      return limit === undefined ? ranked : ranked.slice(0, limit);
    });
  }

  /**
   * Public classes, interfaces, methods and fields, grouped by kind and
   * most used first
   */
  async getPublicApiSurface(projectId: string): Promise<PublicApiEntry[]> {
    return this.run('getPublicApiSurface', async () => {
      const entities = await this.entities({ projectId, kinds: ['Class', 'Interface', 'Method', 'Field'] });
      const edges = await this.relationships({ kind: 'findRelationships', projectId, types: ['CALLS'] });

      const usage = new Map<string, number>();
      for (const edge of edges) usage.set(edge.targetId, (usage.get(edge.targetId) ?? 0) + 1);

      return entities
        .filter((entity) => entity.visibility === 'public')
        .map((entity) => ({ entity, usageCount: usage.get(entity.id) ?? 0 }))
        .sort(
          (a, b) =>
            ENTITY_KINDS.indexOf(a.entity.kind) - ENTITY_KINDS.indexOf(b.entity.kind) ||
            b.usageCount - a.usageCount ||
            a.entity.name.localeCompare(b.entity.name) ||
            a.entity.qualifiedName.localeCompare(b.entity.qualifiedName)
        );
    });
  }

  /**
   * Methods with more than `threshold` outgoing calls, most calls first
   */
  async getRefactoringCandidates(projectId: string, threshold = 5, limit = 10): Promise<RefactoringCandidate[]> {
    return this.run('getRefactoringCandidates', async () => {
      const methods = await this.entities({ projectId, kinds: ['Method'] });
      const edges = await this.relationships({ kind: 'findRelationships', projectId, types: ['CALLS'] });

      const outgoing = new Map<string, number>();
      for (const edge of edges) outgoing.set(edge.sourceId, (outgoing.get(edge.sourceId) ?? 0) + 1);

      return methods
        .map((entity) => ({ entity, outgoingCalls: outgoing.get(entity.id) ?? 0 }))
        .filter((candidate) => candidate.outgoingCalls > threshold)
        .sort(
          (a, b) => b.outgoingCalls - a.outgoingCalls || a.entity.qualifiedName.localeCompare(b.entity.qualifiedName)
        )
        .slice(0, limit);
    });
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async run<T>(operation: string, body: () => Promise<T>): Promise<T> {
    const startTime = performance.now();
    try {
      return await body();
    } catch (error) {
      if (error instanceof QueryError) throw error;
      this.log.error('Query failed', { operation, error: errorMessage(error) });
      throw new QueryError(`${operation} failed: ${errorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    } finally {
      const durationMs = performance.now() - startTime;
      if (this.slowOperationMs !== undefined && durationMs > this.slowOperationMs) {
        this.log.warn('Slow query', { operation, durationMs: Math.round(durationMs) });
      }
    }
  }

  private async entities(filter: EntityFilter): Promise<CodeEntity[]> {
    const result = await this.driver.runRead({ kind: 'findEntities', filter });
    if (result.kind !== 'entities') throw new Error(`Store answered findEntities with ${result.kind}`);
    return result.entities;
  }

  private async relationships(query: ReadQuery): Promise<Relationship[]> {
    const result = await this.driver.runRead(query);
    if (result.kind !== 'relationships') throw new Error(`Store answered ${query.kind} with ${result.kind}`);
    return result.relationships;
  }

  private async counts(query: ReadQuery): Promise<Record<string, number>> {
    const result = await this.driver.runRead(query);
    if (result.kind !== 'counts') throw new Error(`Store answered ${query.kind} with ${result.kind}`);
    return result.counts;
  }
}
