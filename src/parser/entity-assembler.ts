/**
 * Entity Assembler
 *
 * Turns the per-file extractions of one language batch into entities and
 * relationships: assigns deterministic ids, emits File entities and
 * CONTAINS edges, then resolves supertypes, type references and calls by
 * name across the whole batch.
 *
 * One assembler lives for one `parseFiles` call.
 *
 * @module parser/entity-assembler
 */

import type { CodeEntity, Relationship, RelationshipType } from '../types/index.js';
import { baseTypeName, createEntityId, formatSignature, qualify } from '../utils/strings.js';
import { arityRange, resolveCall, type MethodCandidate, type ResolutionScope } from './call-resolver.js';
import type { CallSite, Declaration, FileExtraction, TypeLink } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

interface PendingCall {
  call: CallSite;
  callerId: string;
  callerOwnerId?: string;
  filePath: string;
}

interface PendingLink {
  link: TypeLink;
  from: CodeEntity;
  filePath: string;
}

interface TypeEntry {
  entity: CodeEntity;
  filePath: string;
}

export interface AssembledBatch {
  entities: CodeEntity[];
  relationships: Relationship[];
  /** Declarations dropped because another declaration had the same id */
  duplicates: number;
}

/** Identifier-like words inside a type expression */
const TYPE_WORD = /[A-Za-z_][A-Za-z0-9_]*/g;

// ============================================================================
// ASSEMBLER
// ============================================================================

export class EntityAssembler {
  private readonly entities: CodeEntity[] = [];
  private readonly relationships: Relationship[] = [];
  private readonly byId = new Map<string, CodeEntity>();
  private readonly methodsByName = new Map<string, MethodCandidate[]>();
  private readonly typesByName = new Map<string, TypeEntry[]>();
  private readonly fieldTypes = new Map<string, Map<string, string>>();
  private readonly pendingCalls: PendingCall[] = [];
  private readonly pendingLinks: PendingLink[] = [];
  private duplicates = 0;

  constructor(
    private readonly projectId: string,
    private readonly language: string,
    private readonly includeParameters: boolean
  ) {}

  /**
   * Add one file. Files must be added in a stable order (sorted by path)
   * for call resolution to be deterministic.
   */
  addFile(filePath: string, lineCount: number, extraction: FileExtraction): void {
    const fileEntity = this.createEntity({
      kind: 'File',
      name: filePath.split('/').pop() || filePath,
      qualifiedName: filePath,
      filePath,
      startLine: 1,
      endLine: Math.max(1, lineCount),
      visibility: 'default',
      modifiers: [],
      annotations: [],
    }, filePath);

    if (!fileEntity) return;

    const byIndex: Array<CodeEntity | null | undefined> = [];

    extraction.declarations.forEach((decl, index) => {
      const container = decl.containerIndex !== undefined ? byIndex[decl.containerIndex] : undefined;
      const parent = container ?? fileEntity;
      const entity = this.createDeclaration(decl, filePath, parent);
      byIndex[index] = entity;
      if (!entity) return;

      this.addRelationship('CONTAINS', parent.id, entity.id, 'exact', decl.startLine);
      this.index(entity, decl, container, filePath);

      if (decl.kind === 'Method' && this.includeParameters) {
        this.addParameters(entity, decl, filePath);
      }

      for (const typeText of this.declaredTypes(decl)) {
        this.pendingLinks.push({
          link: { fromIndex: index, targetName: typeText, kind: 'reference', line: decl.startLine },
          from: entity,
          filePath,
        });
      }
    });

    for (const link of extraction.typeLinks) {
      const from = byIndex[link.fromIndex];
      if (from) this.pendingLinks.push({ link, from, filePath });
    }

    for (const call of extraction.calls) {
      const caller = byIndex[call.callerIndex];
      if (!caller || caller.kind !== 'Method') continue;
      const owner = caller.parentId && caller.parentId !== fileEntity.id ? caller.parentId : undefined;
      this.pendingCalls.push({ call, callerId: caller.id, callerOwnerId: owner, filePath });
    }
  }

  /**
   * Resolve every pending link and call, then return the batch
   */
  finish(): AssembledBatch {
    for (const pending of this.pendingLinks) {
      this.resolveLink(pending);
    }

    const scope: ResolutionScope = {
      methodsByName: this.methodsByName,
      typeNames: new Set(this.typesByName.keys()),
      fieldTypesOf: (ownerId) => this.fieldTypes.get(ownerId),
    };

    for (const pending of this.pendingCalls) {
      const { call } = pending;

      // `Foo(...)` / `new Foo(...)` on a batch type is an instantiation
      if (!call.hasReceiver && this.typesByName.has(call.name)) {
        this.resolveLink({
          link: { fromIndex: -1, targetName: call.name, kind: 'reference', line: call.line },
          from: this.entityById(pending.callerId),
          filePath: pending.filePath,
        });
        continue;
      }

      const target = resolveCall(call, pending.callerId, pending.callerOwnerId, scope);
      if (target) {
        this.addRelationship('CALLS', pending.callerId, target.targetId, target.confidence, call.line);
      }
    }

    return {
      entities: this.entities,
      relationships: dedupeRelationships(this.relationships),
      duplicates: this.duplicates,
    };
  }

  // --------------------------------------------------------------------------
  // Entities
  // --------------------------------------------------------------------------

  private createEntity(
    fields: Omit<CodeEntity, 'id' | 'projectId' | 'language'>,
    idKey: string
  ): CodeEntity | null {
    const id = createEntityId(this.projectId, this.language, fields.filePath, idKey);
    if (this.byId.has(id)) {
      this.duplicates++;
      return null;
    }

    const entity: CodeEntity = {
      id,
      projectId: this.projectId,
      language: this.language,
      ...fields,
    };
    this.byId.set(id, entity);
    this.entities.push(entity);
    return entity;
  }

  private createDeclaration(decl: Declaration, filePath: string, parent: CodeEntity): CodeEntity | null {
    const parameterTypes = decl.parameters?.map((p) => p.type ?? p.name);
    const isMethod = decl.kind === 'Method';
    const idKey = isMethod ? `${decl.qualifiedName}(${(parameterTypes ?? []).join(',')})` : decl.qualifiedName;

    return this.createEntity(
      {
        kind: decl.kind,
        name: decl.name,
        qualifiedName: decl.qualifiedName,
        filePath,
        startLine: decl.startLine,
        endLine: Math.max(decl.startLine, decl.endLine),
        visibility: decl.visibility,
        modifiers: decl.modifiers,
        annotations: decl.annotations,
        parentId: parent.id,
        ...(isMethod
          ? {
              signature: formatSignature(decl.name, parameterTypes ?? [], decl.returnType),
              parameterTypes: parameterTypes ?? [],
              ...(decl.returnType ? { returnType: decl.returnType } : {}),
            }
          : {}),
        ...(decl.kind === 'Field' && decl.valueType ? { returnType: decl.valueType } : {}),
      },
      idKey
    );
  }

  private addParameters(method: CodeEntity, decl: Declaration, filePath: string): void {
    for (const param of decl.parameters ?? []) {
      const parameter = this.createEntity(
        {
          kind: 'Parameter',
          name: param.name,
          qualifiedName: qualify(method.qualifiedName, param.name),
          filePath,
          startLine: method.startLine,
          endLine: method.startLine,
          visibility: 'default',
          modifiers: param.variadic ? ['vararg'] : [],
          annotations: [],
          parentId: method.id,
          ...(param.type ? { returnType: param.type } : {}),
        },
        `${method.qualifiedName}(${(method.parameterTypes ?? []).join(',')})#${param.name}`
      );
      if (parameter) {
        this.addRelationship('CONTAINS', method.id, parameter.id, 'exact', method.startLine);
      }
    }
  }

  private index(
    entity: CodeEntity,
    decl: Declaration,
    container: CodeEntity | null | undefined,
    filePath: string
  ): void {
    if (decl.kind === 'Class' || decl.kind === 'Interface') {
      const entries = this.typesByName.get(decl.name) ?? [];
      entries.push({ entity, filePath });
      this.typesByName.set(decl.name, entries);
      return;
    }

    if (decl.kind === 'Field' && container && decl.valueType) {
      const fields = this.fieldTypes.get(container.id) ?? new Map<string, string>();
      if (!fields.has(decl.name)) fields.set(decl.name, decl.valueType);
      this.fieldTypes.set(container.id, fields);
      return;
    }

    if (decl.kind === 'Method') {
      const candidates = this.methodsByName.get(decl.name) ?? [];
      candidates.push({
        id: entity.id,
        name: decl.name,
        ...arityRange(decl.parameters ?? []),
        ownerId: container?.id,
        ownerName: container?.name,
      });
      this.methodsByName.set(decl.name, candidates);
    }
  }

  private declaredTypes(decl: Declaration): string[] {
    const types: string[] = [];
    if (decl.valueType) types.push(decl.valueType);
    if (decl.returnType) types.push(decl.returnType);
    for (const param of decl.parameters ?? []) {
      if (param.type) types.push(param.type);
    }
    return types;
  }

  private entityById(id: string): CodeEntity {
    const entity = this.byId.get(id);
    if (!entity) throw new Error(`Entity ${id} missing from batch`);
    return entity;
  }

  // --------------------------------------------------------------------------
  // Relationships
  // --------------------------------------------------------------------------

  private resolveLink({ link, from, filePath }: PendingLink): void {
    const names =
      link.kind === 'supertype'
        ? [baseTypeName(link.targetName)]
        : Array.from(new Set(link.targetName.match(TYPE_WORD) ?? []));

    for (const name of names) {
      // A type never links to itself or to the type declaring `from`
      const entries = (this.typesByName.get(name) ?? []).filter(
        (e) => e.entity.id !== from.id && e.entity.id !== from.parentId
      );
      if (entries.length === 0) continue;

      // Same-file declarations win; otherwise the first declared
      const sameFile = entries.filter((e) => e.filePath === filePath);
      const pool = sameFile.length > 0 ? sameFile : entries;
      const target = pool[0];
      if (!target) continue;
      const confidence = pool.length === 1 ? 'exact' : 'heuristic';

      let type: RelationshipType = 'REFERENCES';
      if (link.kind === 'supertype') {
        type = from.kind === 'Class' && target.entity.kind === 'Interface' ? 'IMPLEMENTS' : 'EXTENDS';
      }

      this.addRelationship(type, from.id, target.entity.id, confidence, link.line);
    }
  }

  private addRelationship(
    type: RelationshipType,
    sourceId: string,
    targetId: string,
    confidence: Relationship['confidence'],
    sourceLine: number
  ): void {
    this.relationships.push({ type, sourceId, targetId, confidence, sourceLine });
  }
}

/**
 * Keep the first of several relationships with the same type and endpoints
 */
export function dedupeRelationships(relationships: Relationship[]): Relationship[] {
  const seen = new Set<string>();
  const result: Relationship[] = [];
  for (const rel of relationships) {
    const key = `${rel.type}|${rel.sourceId}|${rel.targetId}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(rel);
  }
  return result;
}
