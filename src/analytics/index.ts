/**
 * Code Knowledge Graph - Analytics Module
 * @module analytics
 *
 * Architectural findings and change impact, computed from the graph.
 */

export {
  type FindingType,
  type Severity,
  type AffectedEntity,
  type AnalysisFinding,
  type AnalysisResult,
  SEVERITY_ORDER,
  countBySeverity,
} from './types.js';

export {
  ArchitecturalAnalyzer,
  type ArchitecturalAnalyzerOptions,
  UNUSED_CONFIDENCE,
  UNUSED_LIMITATION_WARNING,
  cycleSeverity,
  describeCycle,
  createUnusedExclusion,
} from './architectural-analyzer.js';

export { PrImpactAnalyzer, type PrImpactAnalyzerOptions, impactSeverity } from './pr-impact-analyzer.js';
