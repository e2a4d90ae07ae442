/**
 * Code Knowledge Graph - Graph Builder
 *
 * Replaces a project's slice of the graph store with a new set of
 * entities and relationships.
 *
 * 1. Delete the project and insert entity nodes in batches grouped by
 *    kind, all in one write transaction. A failed transaction is retried
 *    once; a second failure fails the build and the previous graph stays.
 * 2. Insert relationships in batches grouped by type, one transaction per
 *    batch. Edges with an endpoint that was not created, and failed
 *    batches, become warnings.
 *
 * Builds of one project run one at a time; builds of different projects
 * run in parallel.
 *
 * @module graph/graph-builder
 */

import { EventEmitter } from 'events';
import pLimit from 'p-limit';
import {
  ENTITY_KINDS,
  RELATIONSHIP_TYPES,
  type BuildResult,
  type CodeEntity,
  type EntityKind,
  type Relationship,
  type RelationshipType,
} from '../types/index.js';
import { errorMessage, GraphWriteError } from '../utils/errors.js';
import { logger, type ComponentLogger } from '../utils/logger.js';
import { relationshipKey, type GraphDriver, type WriteStatement } from '../storage/driver.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GraphBuilderOptions {
  /** Rows per write statement */
  batchSize: number;
  /** Builds slower than this are logged as warnings */
  slowOperationMs?: number;
  logger?: ComponentLogger;
}

export interface BuildStartEvent {
  projectId: string;
  entities: number;
  relationships: number;
}

type ProjectQueue = ReturnType<typeof pLimit>;

/** Attempts of the entity transaction before the build fails */
const ENTITY_WRITE_ATTEMPTS = 2;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ============================================================================
// BUILD SESSION
// ============================================================================

/**
 * State of one build. Created per call, never shared.
 */
export class BuildSession {
  readonly startTime = performance.now();
  readonly entities: CodeEntity[] = [];
  readonly relationships: Relationship[] = [];
  readonly errors: string[] = [];
  readonly warnings: string[] = [];
  /** Ids committed by the entity transaction */
  readonly createdIds = new Set<string>();
  nodesCreated = 0;
  relationshipsCreated = 0;

  constructor(
    readonly projectId: string,
    entities: readonly CodeEntity[],
    relationships: readonly Relationship[]
  ) {
    const ids = new Set<string>();
    for (const entity of entities) {
      if (ids.has(entity.id)) {
        this.warnings.push(`Duplicate entity id ${entity.id} (${entity.qualifiedName}) dropped`);
        continue;
      }
      ids.add(entity.id);
      this.entities.push(entity);
    }

    const keys = new Set<string>();
    for (const relationship of relationships) {
      const key = relationshipKey(relationship);
      if (keys.has(key)) continue;
      keys.add(key);
      this.relationships.push(relationship);
    }
  }

  entitiesOfKind(kind: EntityKind): CodeEntity[] {
    return this.entities.filter((entity) => entity.kind === kind);
  }

  relationshipsOfType(type: RelationshipType): Relationship[] {
    return this.relationships.filter((relationship) => relationship.type === type);
  }

  toResult(success: boolean): BuildResult {
    return {
      projectId: this.projectId,
      success,
      nodesCreated: success ? this.nodesCreated : 0,
      relationshipsCreated: this.relationshipsCreated,
      errors: [...this.errors],
      warnings: [...this.warnings],
      durationMs: performance.now() - this.startTime,
    };
  }
}

// ============================================================================
// GRAPH BUILDER
// ============================================================================

/**
 * Writes project graphs to a graph store
 *
 * Events:
 * - `build:start` with a BuildStartEvent
 * - `build:complete` with the BuildResult
 *
 * @example
 * ```ts
 * const builder = new GraphBuilder(driver, { batchSize: 500 });
 * builder.on('build:complete', (result) => log.info('built', result));
 *
 * const result = await builder.build('billing', entities, relationships);
 * ```
 */
export class GraphBuilder extends EventEmitter {
  private readonly log: ComponentLogger;
  private readonly queues = new Map<string, ProjectQueue>();
  private readonly inFlight = new Map<string, number>();
  private readonly tails = new Map<string, Promise<void>>();
  private indexes: Promise<void> | null = null;

  constructor(
    private readonly driver: GraphDriver,
    private readonly options: GraphBuilderOptions
  ) {
    super();
    this.log = options.logger ?? logger.child({ component: 'graph-builder' });
  }

  /**
   * Replace the graph of a project. Store failures and listener errors
   * are reported in the result or the log, not as a rejection.
   */
  build(
    projectId: string,
    entities: readonly CodeEntity[],
    relationships: readonly Relationship[]
  ): Promise<BuildResult> {
    const queue = this.queueFor(projectId);
    this.inFlight.set(projectId, (this.inFlight.get(projectId) ?? 0) + 1);

    const promise = queue(() => this.runBuild(projectId, entities, relationships));
    // Bookkeeping runs whatever the outcome; the caller still sees a rejection
    const tail = promise.then(
      () => this.settle(projectId),
      () => this.settle(projectId)
    );
    this.tails.set(projectId, tail);
    return promise;
  }

  /**
   * Resolves once every build queued for the project so far has finished
   */
  async whenIdle(projectId: string): Promise<void> {
    await this.tails.get(projectId);
  }

  /** Whether a build of the project is running or queued */
  isBuilding(projectId: string): boolean {
    return (this.inFlight.get(projectId) ?? 0) > 0;
  }

  // --------------------------------------------------------------------------
  // Build steps
  // --------------------------------------------------------------------------

  private async runBuild(
    projectId: string,
    entities: readonly CodeEntity[],
    relationships: readonly Relationship[]
  ): Promise<BuildResult> {
    const startEvent: BuildStartEvent = {
      projectId,
      entities: entities.length,
      relationships: relationships.length,
    };
    this.notify('build:start', startEvent);

    const session = new BuildSession(projectId, entities, relationships);
    let result: BuildResult;

    try {
      await this.ensureIndexes(session);
      const written = await this.writeEntities(session);
      if (written) await this.writeRelationships(session);
      result = session.toResult(written);
    } catch (error) {
      session.errors.push(`Build failed: ${errorMessage(error)}`);
      this.log.error('Build failed', { projectId, error: errorMessage(error) });
      result = session.toResult(false);
    }

    if (this.options.slowOperationMs !== undefined && result.durationMs > this.options.slowOperationMs) {
      this.log.warn('Slow build', { projectId, durationMs: Math.round(result.durationMs) });
    }
    this.log.info('Build complete', {
      projectId,
      success: result.success,
      nodesCreated: result.nodesCreated,
      relationshipsCreated: result.relationshipsCreated,
      warnings: result.warnings.length,
    });

    this.notify('build:complete', result);
    return result;
  }

  /**
   * Index statements run once before the first build; a failure is
   * logged and retried on the next build
   */
  private async ensureIndexes(session: BuildSession): Promise<void> {
    if (!this.indexes) {
      this.indexes = this.driver.runWrite([{ kind: 'ensureIndexes' }]).then(
        () => undefined,
        (error: unknown) => {
          this.indexes = null;
          this.log.warn('Could not create graph indexes', { error: errorMessage(error) });
          session.warnings.push(`Index creation failed: ${errorMessage(error)}`);
        }
      );
    }
    await this.indexes;
  }

  private async writeEntities(session: BuildSession): Promise<boolean> {
    const statements: WriteStatement[] = [{ kind: 'deleteProject', projectId: session.projectId }];
    for (const kind of ENTITY_KINDS) {
      for (const batch of chunk(session.entitiesOfKind(kind), this.options.batchSize)) {
        statements.push({
          kind: 'createEntities',
          projectId: session.projectId,
          entityKind: kind,
          entities: batch,
        });
      }
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= ENTITY_WRITE_ATTEMPTS; attempt++) {
      try {
        const result = await this.driver.runWrite(statements);
        session.nodesCreated = result.nodesCreated;
        for (const entity of session.entities) session.createdIds.add(entity.id);
        return true;
      } catch (error) {
        lastError = error;
        this.log.warn('Entity write failed', {
          projectId: session.projectId,
          attempt,
          error: errorMessage(error),
        });
      }
    }

    const failure = new GraphWriteError(
      `Entity write failed after ${ENTITY_WRITE_ATTEMPTS} attempts: ${errorMessage(lastError)}`,
      {
        projectId: session.projectId,
        attempts: ENTITY_WRITE_ATTEMPTS,
        cause: lastError instanceof Error ? lastError : undefined,
      }
    );
    session.errors.push(`${failure.code}: ${failure.message}`);
    this.log.error('Build failed, previous graph kept', { projectId: session.projectId, code: failure.code });
    return false;
  }

  private async writeRelationships(session: BuildSession): Promise<void> {
    for (const type of RELATIONSHIP_TYPES) {
      const valid: Relationship[] = [];
      for (const relationship of session.relationshipsOfType(type)) {
        const missing = [relationship.sourceId, relationship.targetId].filter((id) => !session.createdIds.has(id));
        if (missing.length > 0) {
          session.warnings.push(
            `Skipped ${type} ${relationship.sourceId} -> ${relationship.targetId}: endpoint ${missing.join(', ')} not created`
          );
          continue;
        }
        valid.push(relationship);
      }

      for (const batch of chunk(valid, this.options.batchSize)) {
        try {
          const result = await this.driver.runWrite([
            {
              kind: 'createRelationships',
              projectId: session.projectId,
              relationshipType: type,
              relationships: batch,
            },
          ]);
          session.relationshipsCreated += result.relationshipsCreated;
        } catch (error) {
          session.warnings.push(`Failed to write ${batch.length} ${type} relationship(s): ${errorMessage(error)}`);
          this.log.warn('Relationship batch failed', {
            projectId: session.projectId,
            type,
            size: batch.length,
            error: errorMessage(error),
          });
        }
      }
    }
  }

  // --------------------------------------------------------------------------
  // Queues
  // --------------------------------------------------------------------------

  private queueFor(projectId: string): ProjectQueue {
    let queue = this.queues.get(projectId);
    if (!queue) {
      queue = pLimit(1);
      this.queues.set(projectId, queue);
    }
    return queue;
  }

  /**
   * Listener errors are logged, not propagated
   */
  private notify(event: 'build:start' | 'build:complete', payload: BuildStartEvent | BuildResult): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      this.log.warn('Build listener failed', { projectId: payload.projectId, event, error: errorMessage(error) });
    }
  }

  private settle(projectId: string): void {
    const remaining = (this.inFlight.get(projectId) ?? 1) - 1;
    if (remaining > 0) {
      this.inFlight.set(projectId, remaining);
      return;
    }
    this.inFlight.delete(projectId);
    this.queues.delete(projectId);
    this.tails.delete(projectId);
  }
}
