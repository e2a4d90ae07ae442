/**
 * Call Resolution
 *
 * Matches call sites to method entities of the same parse batch.
 *
 * Resolution order for a call `receiver.name(args)`:
 * 1. Candidates: batch methods called `name`, in declaration order
 *    (files sorted by path, then source order).
 * 2. Owner narrowing: a receiver whose type is known (extractor-provided
 *    type, a batch class name, or a field of the caller's class) keeps
 *    only methods of that type. No receiver, `this` or `self` keeps the
 *    caller's own class. If narrowing leaves nothing, every candidate
 *    stays and the edge is heuristic.
 * 3. Arity: candidates accepting the argument count are preferred; if
 *    none does, all remain and the edge is heuristic.
 * 4. The caller itself is removed (direct recursion is not an edge).
 * 5. One candidate left gives an exact edge; several give the first one
 *    with heuristic confidence. None gives no edge.
 *
 * @module parser/call-resolver
 */

import type { Confidence } from '../types/index.js';
import { baseTypeName } from '../utils/strings.js';
import type { CallSite } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface MethodCandidate {
  id: string;
  name: string;
  /** Fewest arguments accepted */
  minArity: number;
  /** Most arguments accepted (Infinity for varargs) */
  maxArity: number;
  /** Id of the owning Class/Interface, undefined for file-level functions */
  ownerId?: string;
  /** Simple name of the owning type */
  ownerName?: string;
}

/**
 * What the resolver needs to know about the batch
 */
export interface ResolutionScope {
  /** Methods by simple name, declaration order */
  methodsByName: ReadonlyMap<string, readonly MethodCandidate[]>;
  /** Simple names of batch classes and interfaces */
  typeNames: ReadonlySet<string>;
  /** Declared field types of a type, keyed by field name */
  fieldTypesOf(ownerId: string): ReadonlyMap<string, string> | undefined;
}

export interface CallTarget {
  targetId: string;
  confidence: Confidence;
}

const SELF_RECEIVERS = new Set(['this', 'self']);

// ============================================================================
// RESOLVER
// ============================================================================

function accepts(candidate: MethodCandidate, arity: number): boolean {
  return arity >= candidate.minArity && arity <= candidate.maxArity;
}

/**
 * Name of the type a receiver refers to, when it can be told
 */
function receiverTypeName(
  call: CallSite,
  callerOwnerId: string | undefined,
  scope: ResolutionScope
): string | undefined {
  if (call.receiverType) return baseTypeName(call.receiverType);
  if (!call.receiver) return undefined;
  if (scope.typeNames.has(call.receiver)) return call.receiver;
  if (callerOwnerId) {
    const fieldType = scope.fieldTypesOf(callerOwnerId)?.get(call.receiver);
    if (fieldType) return baseTypeName(fieldType);
  }
  return undefined;
}

/**
 * Resolve a call site to one method of the batch
 *
 * @param call - The call site
 * @param callerId - Id of the calling method
 * @param callerOwnerId - Id of the calling method's class, if any
 * @returns The target and its confidence, or null when nothing matches
 */
export function resolveCall(
  call: CallSite,
  callerId: string,
  callerOwnerId: string | undefined,
  scope: ResolutionScope
): CallTarget | null {
  const byName = scope.methodsByName.get(call.name);
  if (!byName || byName.length === 0) return null;

  let candidates: readonly MethodCandidate[] = byName;
  let precise = true;

  const ownReceiver = !call.hasReceiver || (call.receiver !== undefined && SELF_RECEIVERS.has(call.receiver));

  if (ownReceiver) {
    const own = byName.filter((c) => c.ownerId === callerOwnerId);
    if (own.length > 0) {
      candidates = own;
    } else {
      precise = false;
    }
  } else {
    const typeName = receiverTypeName(call, callerOwnerId, scope);
    const owned = typeName ? byName.filter((c) => c.ownerName === typeName) : [];
    if (owned.length > 0) {
      candidates = owned;
    } else {
      precise = false;
    }
  }

  if (call.arity !== null) {
    const arity = call.arity;
    const matching = candidates.filter((c) => accepts(c, arity));
    if (matching.length > 0) {
      candidates = matching;
    } else {
      precise = false;
    }
  }

  candidates = candidates.filter((c) => c.id !== callerId);
  const first = candidates[0];
  if (!first) return null;

  return {
    targetId: first.id,
    confidence: precise && candidates.length === 1 ? 'exact' : 'heuristic',
  };
}

/**
 * Arity range of a parameter list
 */
export function arityRange(
  parameters: ReadonlyArray<{ optional?: boolean; variadic?: boolean }>
): { minArity: number; maxArity: number } {
  let minArity = 0;
  let maxArity = 0;
  for (const param of parameters) {
    if (param.variadic) {
      maxArity = Infinity;
      continue;
    }
    maxArity++;
    if (!param.optional) minArity++;
  }
  return { minArity, maxArity };
}
