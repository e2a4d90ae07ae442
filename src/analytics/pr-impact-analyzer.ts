/**
 * Code Knowledge Graph - Change Impact Analyzer
 * @module analytics/pr-impact-analyzer
 *
 * Looks up each changed entity and follows CALLS edges both ways to find
 * what the change can affect. One finding per changed name.
 */

import type { GraphQueryInterface, TraversalHit } from '../graph/query.js';
import type { ChangeSet, CodeEntity } from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger, type ComponentLogger } from '../utils/logger.js';
import type { AffectedEntity, AnalysisFinding, AnalysisResult, Severity } from './types.js';

export interface PrImpactAnalyzerOptions {
  /** Caller/callee traversal depth */
  depth: number;
  logger?: ComponentLogger;
}

/**
 * `riskScore` = affected entities + direct callers of the changed entity
 */
export function impactSeverity(riskScore: number): Severity {
  if (riskScore >= 10) return 'high';
  if (riskScore >= 5) return 'medium';
  if (riskScore >= 1) return 'low';
  return 'info';
}

function toAffected(hit: TraversalHit): AffectedEntity {
  return {
    id: hit.entity.id,
    name: hit.entity.name,
    qualifiedName: hit.entity.qualifiedName,
    kind: hit.entity.kind,
    filePath: hit.entity.filePath,
    impact: hit.depth === 1 ? 'direct' : 'indirect',
    depth: hit.depth,
  };
}

function plural(count: number, one: string, many: string): string {
  return `${count} ${count === 1 ? one : many}`;
}

export class PrImpactAnalyzer {
  private readonly log: ComponentLogger;

  constructor(
    private readonly query: GraphQueryInterface,
    private readonly options: PrImpactAnalyzerOptions
  ) {
    this.log = options.logger ?? logger.child({ component: 'impact' });
  }

  /**
   * Analyse a change set. When it names no entities, the classes,
   * interfaces and methods declared in the changed files are analysed.
   */
  async analyze(projectId: string, changeSet: ChangeSet): Promise<AnalysisResult> {
    const startTime = performance.now();
    const result: AnalysisResult = {
      analysisType: 'change_impact',
      projectId,
      success: true,
      findings: [],
      errors: [],
      warnings: [],
      durationMs: 0,
    };

    try {
      const names = await this.changedNames(projectId, changeSet);
      if (names.length === 0) {
        result.warnings.push('Change set names no entities and its files declare none');
      }
      for (const name of names) {
        result.findings.push(await this.analyzeEntity(projectId, name));
      }
      this.log.info('Impact analysis complete', { projectId, changed: names.length });
    } catch (error) {
      result.success = false;
      result.findings = [];
      result.errors.push(`Impact analysis failed: ${errorMessage(error)}`);
      this.log.error('Impact analysis failed', { projectId, error: errorMessage(error) });
    }

    result.durationMs = performance.now() - startTime;
    return result;
  }

  /**
   * Finding for one changed qualified name
   *
   * @throws QueryError when the graph cannot be read
   */
  async analyzeEntity(projectId: string, qualifiedName: string): Promise<AnalysisFinding> {
    const matches = await this.query.findEntitiesByQualifiedName(projectId, qualifiedName);
    if (matches.length === 0) return newEntityFinding(qualifiedName);

    const changedIds = new Set(matches.map((m) => m.id));
    const reached = new Map<string, TraversalHit>();
    const directCallers = new Set<string>();
    let callers = 0;
    let callees = 0;

    for (const entity of matches) {
      const upstream = await this.query.traverseCalls(entity.id, 'callers', this.options.depth);
      const downstream = await this.query.traverseCalls(entity.id, 'callees', this.options.depth);
      callers += upstream.length;
      callees += downstream.length;

      for (const hit of upstream) {
        if (hit.depth === 1) directCallers.add(hit.entity.id);
      }
      for (const hit of [...upstream, ...downstream]) {
        if (changedIds.has(hit.entity.id)) continue;
        const known = reached.get(hit.entity.id);
        if (!known || hit.depth < known.depth) reached.set(hit.entity.id, hit);
      }
    }

    const affectedEntities = Array.from(reached.values())
      .sort((a, b) => a.depth - b.depth || a.entity.qualifiedName.localeCompare(b.entity.qualifiedName))
      .map(toAffected);
    const [primary] = matches;
    const location = primary ? { filePath: primary.filePath, startLine: primary.startLine } : {};

    if (affectedEntities.length === 0) {
      return {
        type: 'isolated_change',
        title: `Isolated change: ${qualifiedName}`,
        description: `'${qualifiedName}' has no callers or callees in the graph`,
        severity: 'info',
        confidence: 0.9,
        affectedEntities: [],
        ...location,
        riskScore: 0,
        recommendations: ['Cover the changed behaviour with its own tests'],
        metadata: { callers: 0, callees: 0, fanIn: 0, depth: this.options.depth },
      };
    }

    const fanIn = directCallers.size;
    const riskScore = affectedEntities.length + fanIn;
    const direct = affectedEntities.filter((a) => a.impact === 'direct').length;
    const indirect = affectedEntities.length - direct;

    return {
      type: 'change_impact',
      title: `Change impact: ${qualifiedName}`,
      description:
        `Changing '${qualifiedName}' can affect ${plural(affectedEntities.length, 'entity', 'entities')} ` +
        `(${direct} direct, ${indirect} indirect)`,
      severity: impactSeverity(riskScore),
      confidence: 0.9,
      affectedEntities,
      ...location,
      riskScore,
      recommendations: impactRecommendations(fanIn, callees),
      metadata: { callers, callees, fanIn, depth: this.options.depth },
    };
  }

  private async changedNames(projectId: string, changeSet: ChangeSet): Promise<string[]> {
    if (changeSet.changedEntityNames.length > 0) {
      return Array.from(new Set(changeSet.changedEntityNames));
    }
    const declared: CodeEntity[] = await this.query.findEntitiesInFiles(projectId, changeSet.changedFiles, [
      'Class',
      'Interface',
      'Method',
    ]);
    return Array.from(new Set(declared.map((entity) => entity.qualifiedName)));
  }
}

function newEntityFinding(qualifiedName: string): AnalysisFinding {
  return {
    type: 'new_entity',
    title: `New entity: ${qualifiedName}`,
    description: `'${qualifiedName}' is not in the graph: unknown impact, newly introduced entity`,
    severity: 'info',
    confidence: 0.5,
    affectedEntities: [],
    recommendations: ['Rescan the project after merging to see its callers and callees'],
    metadata: {},
  };
}

function impactRecommendations(fanIn: number, callees: number): string[] {
  const recommendations: string[] = [];
  if (fanIn > 0) {
    recommendations.push('Test every direct caller against the changed behaviour');
    recommendations.push('Review whether the contract of the changed entity moved');
  }
  if (callees > 0) {
    recommendations.push('Check that the called entities still receive valid input');
  }
  if (fanIn > 5) {
    recommendations.push('High fan-in: consider rolling the change out gradually');
  }
  return recommendations;
}
