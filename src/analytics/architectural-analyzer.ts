/**
 * Code Knowledge Graph - Architectural Analyzer
 * @module analytics/architectural-analyzer
 *
 * Circular dependencies and unused entities, read through the query
 * interface only.
 */

import type { UnusedExclusionConfig } from '../config.js';
import type { GraphQueryInterface, DependencyCycle, EntityPredicate } from '../graph/query.js';
import type { CodeEntity, EntityKind, RelationshipType } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger, type ComponentLogger } from '../utils/logger.js';
import type { AffectedEntity, AnalysisFinding, AnalysisResult, Severity } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ArchitecturalAnalyzerOptions {
  /** Entity kind cycles are reported at */
  scopeKind: EntityKind;
  /** Edge types followed when looking for cycles */
  relationshipTypes: readonly RelationshipType[];
  unused: Required<UnusedExclusionConfig>;
  logger?: ComponentLogger;
}

/** Confidence of unused-entity findings */
export const UNUSED_CONFIDENCE = 0.7;

export const UNUSED_LIMITATION_WARNING =
  'Unused entities are a static heuristic: usage through reflection, dependency injection, ' +
  'external callers or dynamic dispatch is not visible in the graph';

const CYCLE_RECOMMENDATIONS = [
  'Inject the dependency instead of constructing it to break the cycle',
  'Extract the shared behaviour into a separate class or interface',
  'Decouple the participants with events or callbacks',
  'Review the responsibilities of each participant',
];

const DUNDER = /^__\w+__$/;

// =============================================================================
// Scoring
// =============================================================================

/**
 * Cycle severity from component size and edge count; the higher of the
 * two ratings wins
 */
export function cycleSeverity(nodeCount: number, edgeCount: number): Severity {
  if (nodeCount >= 10 || edgeCount >= 20) return 'critical';
  if (nodeCount >= 6 || edgeCount >= 10) return 'high';
  if (nodeCount >= 3 || edgeCount >= 4) return 'medium';
  return 'low';
}

/**
 * `A → B → C → A`
 */
export function describeCycle(names: readonly string[]): string {
  if (names.length === 0) return '';
  return [...names, names[0]].join(' → ');
}

function affected(entity: CodeEntity): AffectedEntity {
  return {
    id: entity.id,
    name: entity.name,
    qualifiedName: entity.qualifiedName,
    kind: entity.kind,
    filePath: entity.filePath,
  };
}

/** Simple name of the declaring type or module */
function ownerName(entity: CodeEntity): string | undefined {
  const segments = entity.qualifiedName.split('.');
  return segments.length > 1 ? segments[segments.length - 2] : undefined;
}

function hasAccessorPrefix(name: string, prefixes: readonly string[]): boolean {
  return prefixes.some((prefix) => {
    if (!name.startsWith(prefix) || name.length === prefix.length) return false;
    const next = name.charAt(prefix.length);
    return next >= 'A' && next <= 'Z';
  });
}

/**
 * Predicate for entities that must never be reported as unused
 */
export function createUnusedExclusion(config: Required<UnusedExclusionConfig>): EntityPredicate {
  const names = new Set(config.names);
  const classNames = new Set(config.classNames);
  const markers = new Set(config.markers);
  const endsWithSuffix = (name: string | undefined): boolean =>
    name !== undefined && config.classSuffixes.some((suffix) => name.endsWith(suffix));

  return (entity) => {
    const isType = entity.kind === 'Class' || entity.kind === 'Interface';

    if (config.publicApi && entity.visibility === 'public') return true;
    if ([...entity.annotations, ...entity.modifiers].some((marker) => markers.has(marker))) return true;

    if (isType) {
      return classNames.has(entity.name) || endsWithSuffix(entity.name);
    }

    if (names.has(entity.name)) return true;
    if (config.dunderNames && DUNDER.test(entity.name)) return true;
    if (entity.kind === 'Method' && hasAccessorPrefix(entity.name, config.namePrefixes)) return true;
    return endsWithSuffix(ownerName(entity));
  };
}

// =============================================================================
// Analyzer
// =============================================================================

export class ArchitecturalAnalyzer {
  private readonly log: ComponentLogger;
  private readonly exclude: EntityPredicate;

  constructor(
    private readonly query: GraphQueryInterface,
    private readonly options: ArchitecturalAnalyzerOptions
  ) {
    this.log = options.logger ?? logger.child({ component: 'architecture' });
    this.exclude = createUnusedExclusion(options.unused);
  }

  /**
   * One finding per cycle
   *
   * @throws QueryError when the graph cannot be read
   */
  async findCycles(projectId: string): Promise<AnalysisFinding[]> {
    const cycles = await this.query.findCircularDependencies(
      projectId,
      this.options.scopeKind,
      this.options.relationshipTypes
    );
    return cycles.map((cycle) => this.cycleFinding(cycle));
  }

  /**
   * One finding per unused entity
   *
   * @throws QueryError when the graph cannot be read
   */
  async findUnused(projectId: string): Promise<AnalysisFinding[]> {
    const entities = await this.query.findUnusedEntities(projectId, this.exclude, this.options.unused.kinds);
    return entities.map((entity) => this.unusedFinding(entity));
  }

  /**
   * Cycles and unused entities of a project
   */
  async analyze(projectId: string): Promise<AnalysisResult> {
    const startTime = performance.now();
    const result: AnalysisResult = {
      analysisType: 'architecture',
      projectId,
      success: true,
      findings: [],
      errors: [],
      warnings: [],
      durationMs: 0,
    };

    try {
      const cycles = await this.findCycles(projectId);
      const unused = await this.findUnused(projectId);
      result.findings.push(...cycles, ...unused);
      if (unused.length > 0) result.warnings.push(UNUSED_LIMITATION_WARNING);

      this.log.info('Architecture analysis complete', {
        projectId,
        cycles: cycles.length,
        unused: unused.length,
      });
    } catch (error) {
      result.success = false;
      result.findings = [];
      result.errors.push(`Architecture analysis failed: ${errorMessage(error)}`);
      this.log.error('Architecture analysis failed', { projectId, error: errorMessage(error) });
    }

    result.durationMs = performance.now() - startTime;
    return result;
  }

  private cycleFinding(cycle: DependencyCycle): AnalysisFinding {
    const kind = this.options.scopeKind;
    const names = cycle.entities.map((entity) => entity.name);
    const first = cycle.entities[0];

    return {
      type: 'circular_dependency',
      title: `${kind} circular dependency`,
      description: describeCycle(names),
      severity: cycleSeverity(cycle.entityIds.length, cycle.edgeCount),
      confidence: 1,
      affectedEntities: cycle.entities.map(affected),
      ...(first ? { filePath: first.filePath, startLine: first.startLine } : {}),
      recommendations: [...CYCLE_RECOMMENDATIONS],
      metadata: {
        scopeKind: kind,
        cycleLength: cycle.entityIds.length,
        edgeCount: cycle.edgeCount,
        edgeTypes: cycle.edgeTypes,
      },
    };
  }

  private unusedFinding(entity: CodeEntity): AnalysisFinding {
    const kind = entity.kind.toLowerCase();
    const isType = entity.kind === 'Class' || entity.kind === 'Interface';
    const owner = isType ? undefined : ownerName(entity);

    let description = `${capitalize(entity.visibility)} ${kind} '${entity.name}' is never called or referenced in the analyzed code`;
    if (owner) description += ` (declared in '${owner}')`;

    const recommendations = [
      `Check whether this ${kind} is reached through reflection or dependency injection`,
      `Check whether this ${kind} is part of a public API or framework contract`,
    ];
    if (entity.kind === 'Method') {
      recommendations.push(
        'Check whether an interface or superclass requires this method',
        'If it is really unused, make it private or remove it'
      );
    } else if (isType) {
      recommendations.push(
        'Check whether configuration or annotations instantiate this type',
        'If it is really unused, remove it'
      );
    } else {
      recommendations.push('If it is really unused, remove it');
    }

    return {
      type: 'unused_entity',
      title: `Potentially unused ${kind}`,
      description,
      severity: isType && entity.visibility === 'public' ? 'medium' : 'low',
      confidence: UNUSED_CONFIDENCE,
      affectedEntities: [affected(entity)],
      filePath: entity.filePath,
      startLine: entity.startLine,
      recommendations,
      metadata: {
        kind: entity.kind,
        visibility: entity.visibility,
        ...(owner ? { owner } : {}),
      },
    };
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
