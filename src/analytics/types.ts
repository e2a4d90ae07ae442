/**
 * Code Knowledge Graph - Analysis Types
 * @module analytics/types
 */

import type { EntityKind } from '../types/index.js';

// =============================================================================
// Findings
// =============================================================================

export type FindingType =
  | 'circular_dependency'
  | 'unused_entity'
  | 'change_impact'
  | 'isolated_change'
  | 'new_entity';

export type Severity = 'critical' | 'high' | 'medium' | 'low' | 'info';

export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium', 'low', 'info'];

/**
 * An entity a finding points at
 */
export interface AffectedEntity {
  id: string;
  name: string;
  qualifiedName: string;
  kind: EntityKind;
  filePath: string;
  /** Change impact only */
  impact?: 'direct' | 'indirect';
  /** Change impact only: hops from the changed entity */
  depth?: number;
}

export interface AnalysisFinding {
  type: FindingType;
  title: string;
  description: string;
  severity: Severity;
  /** 0..1 */
  confidence: number;
  affectedEntities: AffectedEntity[];
  filePath?: string;
  startLine?: number;
  /** Change impact only */
  riskScore?: number;
  recommendations: string[];
  metadata: Record<string, unknown>;
}

/**
 * Output of one analyzer run. A failed query fails the whole run: no
 * findings are reported from a partial read.
 */
export interface AnalysisResult {
  analysisType: 'architecture' | 'change_impact';
  projectId: string;
  success: boolean;
  findings: AnalysisFinding[];
  errors: string[];
  warnings: string[];
  durationMs: number;
}

export function countBySeverity(findings: readonly AnalysisFinding[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const finding of findings) counts[finding.severity]++;
  return counts;
}
