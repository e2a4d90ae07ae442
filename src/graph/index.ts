/**
 * Code Knowledge Graph - Graph Module
 *
 * Graph building, querying and cycle detection.
 *
 * @module graph
 */

export {
  GraphBuilder,
  BuildSession,
  type GraphBuilderOptions,
  type BuildStartEvent,
} from './graph-builder.js';

export {
  GraphQueryInterface,
  DEFAULT_CYCLE_RELATIONSHIPS,
  UNUSED_CANDIDATE_KINDS,
  type ProjectOverview,
  type CallDirection,
  type TraversalHit,
  type DependencyCycle,
  type EntityPredicate,
  type ClassComplexity,
  type PublicApiEntry,
  type RefactoringCandidate,
  type QueryOptions,
} from './query.js';

export {
  detectCycles,
  stronglyConnectedComponents,
  canonicalOrder,
  type Cycle,
  type CycleEdge,
  type CycleDetectionResult,
} from './cycle-detector.js';
