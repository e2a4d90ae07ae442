/**
 * Cycle Detection
 *
 * Tarjan's strongly connected components over an id-keyed edge list.
 * Every component with more than one node is a cycle. Cycles are
 * reported in a canonical order so that rotations of the same cycle
 * compare equal.
 *
 * @module graph/cycle-detector
 */

import type { RelationshipType } from '../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CycleEdge {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
}

/**
 * A strongly connected component of more than one node
 */
export interface Cycle {
  /** Starts at the smallest id, then follows edges inside the component */
  nodeIds: string[];
  /** Distinct directed edges between members */
  edgeCount: number;
  /** Edge types seen inside the component, sorted */
  edgeTypes: RelationshipType[];
}

export interface CycleDetectionResult {
  cycles: Cycle[];
  /** Number of components, singletons included */
  sccCount: number;
  hasCycles: boolean;
  detectionTime: number;
}

interface VisitState {
  index: number;
  lowlink: number;
}

interface Frame {
  nodeId: string;
  state: VisitState;
  next: number;
}

// ============================================================================
// DETECTION
// ============================================================================

function buildAdjacency(nodeIds: readonly string[], edges: readonly CycleEdge[]): Map<string, string[]> {
  const adjacency = new Map<string, Set<string>>();
  for (const id of nodeIds) adjacency.set(id, new Set());

  for (const edge of edges) {
    if (edge.sourceId === edge.targetId) continue;
    const targets = adjacency.get(edge.sourceId);
    if (targets && adjacency.has(edge.targetId)) targets.add(edge.targetId);
  }

  const sorted = new Map<string, string[]>();
  for (const [id, targets] of adjacency) {
    sorted.set(id, Array.from(targets).sort());
  }
  return sorted;
}

/**
 * Strongly connected components, iteratively (no recursion depth limit)
 */
export function stronglyConnectedComponents(adjacency: ReadonlyMap<string, readonly string[]>): string[][] {
  const visited = new Map<string, VisitState>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  const open = (nodeId: string, frames: Frame[]): void => {
    const state = { index: counter, lowlink: counter };
    counter++;
    visited.set(nodeId, state);
    stack.push(nodeId);
    onStack.add(nodeId);
    frames.push({ nodeId, state, next: 0 });
  };

  for (const root of Array.from(adjacency.keys()).sort()) {
    if (visited.has(root)) continue;

    const frames: Frame[] = [];
    open(root, frames);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (!frame) break;
      const neighbors = adjacency.get(frame.nodeId) ?? [];

      if (frame.next < neighbors.length) {
        const neighbor = neighbors[frame.next++];
        if (neighbor === undefined) continue;
        const seen = visited.get(neighbor);
        if (!seen) {
          open(neighbor, frames);
        } else if (onStack.has(neighbor)) {
          frame.state.lowlink = Math.min(frame.state.lowlink, seen.index);
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) parent.state.lowlink = Math.min(parent.state.lowlink, frame.state.lowlink);

      if (frame.state.lowlink === frame.state.index) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.nodeId);
        components.push(component);
      }
    }
  }

  return components;
}

/**
 * Order members by a depth-first walk from the smallest id, taking
 * neighbors in ascending id order
 */
export function canonicalOrder(
  members: readonly string[],
  adjacency: ReadonlyMap<string, readonly string[]>
): string[] {
  const inside = new Set(members);
  const ordered: string[] = [];
  const seen = new Set<string>();

  const pending = [...members].sort().slice(0, 1);
  while (pending.length > 0) {
    const id = pending.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    ordered.push(id);

    const next = (adjacency.get(id) ?? []).filter((n) => inside.has(n) && !seen.has(n));
    // Reverse so the smallest neighbor is visited first
    for (let i = next.length - 1; i >= 0; i--) {
      const neighbor = next[i];
      if (neighbor !== undefined) pending.push(neighbor);
    }
  }
  return ordered;
}

/**
 * Find every cycle in a directed graph
 *
 * @param nodeIds - Graph nodes; edges touching other ids are ignored
 * @param edges - Directed edges; self-loops are ignored
 */
export function detectCycles(nodeIds: readonly string[], edges: readonly CycleEdge[]): CycleDetectionResult {
  const startTime = performance.now();
  const adjacency = buildAdjacency(nodeIds, edges);
  const components = stronglyConnectedComponents(adjacency);

  const cycles: Cycle[] = [];
  const seenKeys = new Set<string>();

  for (const component of components) {
    if (component.length < 2) continue;

    const key = [...component].sort().join('|');
    if (seenKeys.has(key)) continue;
    seenKeys.add(key);

    const members = new Set(component);
    const pairs = new Set<string>();
    const types = new Set<RelationshipType>();
    for (const edge of edges) {
      if (edge.sourceId === edge.targetId) continue;
      if (!members.has(edge.sourceId) || !members.has(edge.targetId)) continue;
      pairs.add(`${edge.sourceId}|${edge.targetId}`);
      types.add(edge.type);
    }

    cycles.push({
      nodeIds: canonicalOrder(component, adjacency),
      edgeCount: pairs.size,
      edgeTypes: Array.from(types).sort(),
    });
  }

  cycles.sort((a, b) => {
    const left = a.nodeIds[0] ?? '';
    const right = b.nodeIds[0] ?? '';
    return left < right ? -1 : left > right ? 1 : 0;
  });

  return {
    cycles,
    sccCount: components.length,
    hasCycles: cycles.length > 0,
    detectionTime: performance.now() - startTime,
  };
}
