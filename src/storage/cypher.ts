/**
 * Code Knowledge Graph - Cypher Compilation
 * @module storage/cypher
 *
 * Compiles structured reads and writes into parameterised Cypher. Labels
 * and relationship types cannot be parameters, so they are only ever
 * taken from the closed ENTITY_KINDS / RELATIONSHIP_TYPES lists.
 */

import {
  ENTITY_KINDS,
  RELATIONSHIP_TYPES,
  type CodeEntity,
  type EntityKind,
  type Relationship,
  type RelationshipType,
} from '../types/index.js';
import type { ReadQuery, WriteStatement } from './driver.js';

export interface CypherStatement {
  text: string;
  parameters: Record<string, unknown>;
}

/** Label every entity node carries besides its kind label */
export const ENTITY_LABEL = 'CodeEntity';

const RELATIONSHIP_COLUMNS =
  'type(r) AS type, s.id AS sourceId, t.id AS targetId, r.confidence AS confidence, r.sourceLine AS sourceLine';

function kindLabel(kind: EntityKind): string {
  if (!ENTITY_KINDS.includes(kind)) throw new Error(`Unknown entity kind: ${kind}`);
  return kind;
}

function relationshipLabel(type: RelationshipType): string {
  if (!RELATIONSHIP_TYPES.includes(type)) throw new Error(`Unknown relationship type: ${type}`);
  return type;
}

/**
 * Node properties; absent optional fields are left out
 */
export function entityProperties(entity: CodeEntity, projectId: string): Record<string, unknown> {
  const properties: Record<string, unknown> = {
    id: entity.id,
    projectId,
    kind: entity.kind,
    name: entity.name,
    qualifiedName: entity.qualifiedName,
    filePath: entity.filePath,
    startLine: entity.startLine,
    endLine: entity.endLine,
    visibility: entity.visibility,
    language: entity.language,
    modifiers: entity.modifiers,
    annotations: entity.annotations,
  };
  if (entity.signature !== undefined) properties.signature = entity.signature;
  if (entity.returnType !== undefined) properties.returnType = entity.returnType;
  if (entity.parameterTypes !== undefined) properties.parameterTypes = entity.parameterTypes;
  if (entity.parentId !== undefined) properties.parentId = entity.parentId;
  return properties;
}

function relationshipRow(relationship: Relationship): Record<string, unknown> {
  return {
    sourceId: relationship.sourceId,
    targetId: relationship.targetId,
    confidence: relationship.confidence,
    sourceLine: relationship.sourceLine,
  };
}

// =============================================================================
// Writes
// =============================================================================

/**
 * Schema statements; Neo4j runs them outside data transactions
 */
export const INDEX_STATEMENTS: readonly string[] = [
  `CREATE CONSTRAINT code_entity_id IF NOT EXISTS FOR (n:${ENTITY_LABEL}) REQUIRE n.id IS UNIQUE`,
  `CREATE INDEX code_entity_project IF NOT EXISTS FOR (n:${ENTITY_LABEL}) ON (n.projectId)`,
  `CREATE INDEX code_entity_qualified_name IF NOT EXISTS FOR (n:${ENTITY_LABEL}) ON (n.qualifiedName)`,
];

export function compileWrite(statement: WriteStatement): CypherStatement[] {
  switch (statement.kind) {
    case 'ensureIndexes':
      return INDEX_STATEMENTS.map((text) => ({ text, parameters: {} }));

    case 'deleteProject':
      return [
        {
          text: `MATCH (n:${ENTITY_LABEL} {projectId: $projectId}) DETACH DELETE n`,
          parameters: { projectId: statement.projectId },
        },
      ];

    case 'createEntities':
      return [
        {
          text:
            `UNWIND $rows AS row ` +
            `MERGE (n:${ENTITY_LABEL} {id: row.id}) ` +
            `SET n = row, n:${kindLabel(statement.entityKind)}`,
          parameters: {
            rows: statement.entities.map((entity) => entityProperties(entity, statement.projectId)),
          },
        },
      ];

    case 'createRelationships':
      return [
        {
          text:
            `UNWIND $rows AS row ` +
            `MATCH (s:${ENTITY_LABEL} {id: row.sourceId}) ` +
            `MATCH (t:${ENTITY_LABEL} {id: row.targetId}) ` +
            `MERGE (s)-[r:${relationshipLabel(statement.relationshipType)}]->(t) ` +
            `SET r.confidence = row.confidence, r.sourceLine = row.sourceLine, r.projectId = $projectId`,
          parameters: {
            projectId: statement.projectId,
            rows: statement.relationships.map(relationshipRow),
          },
        },
      ];
  }
}

// =============================================================================
// Reads
// =============================================================================

export function compileRead(query: ReadQuery): CypherStatement {
  switch (query.kind) {
    case 'countEntitiesByKind':
      return {
        text:
          `MATCH (n:${ENTITY_LABEL} {projectId: $projectId}) ` +
          `RETURN n.kind AS key, count(n) AS count ORDER BY key`,
        parameters: { projectId: query.projectId },
      };

    case 'countRelationshipsByType':
      return {
        text:
          `MATCH (:${ENTITY_LABEL} {projectId: $projectId})-[r]->(:${ENTITY_LABEL}) ` +
          `RETURN type(r) AS key, count(r) AS count ORDER BY key`,
        parameters: { projectId: query.projectId },
      };

    case 'findEntities': {
      const { filter } = query;
      const conditions: string[] = [];
      const parameters: Record<string, unknown> = {};

      if (filter.projectId !== undefined) {
        conditions.push('n.projectId = $projectId');
        parameters.projectId = filter.projectId;
      }
      if (filter.ids !== undefined) {
        conditions.push('n.id IN $ids');
        parameters.ids = filter.ids;
      }
      if (filter.qualifiedName !== undefined) {
        conditions.push('n.qualifiedName = $qualifiedName');
        parameters.qualifiedName = filter.qualifiedName;
      }
      if (filter.name !== undefined) {
        conditions.push('n.name = $name');
        parameters.name = filter.name;
      }
      if (filter.kinds !== undefined) {
        conditions.push('n.kind IN $kinds');
        parameters.kinds = filter.kinds;
      }
      if (filter.filePaths !== undefined) {
        conditions.push('n.filePath IN $filePaths');
        parameters.filePaths = filter.filePaths;
      }

      const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
      return {
        text:
          `MATCH (n:${ENTITY_LABEL})${where} ` +
          `RETURN properties(n) AS entity ORDER BY n.filePath, n.startLine, n.id`,
        parameters,
      };
    }

    case 'findRelationships': {
      const typed = query.types !== undefined;
      return {
        text:
          `MATCH (s:${ENTITY_LABEL} {projectId: $projectId})-[r]->(t:${ENTITY_LABEL})` +
          (typed ? ' WHERE type(r) IN $types' : '') +
          ` RETURN ${RELATIONSHIP_COLUMNS} ORDER BY sourceId, type, targetId`,
        parameters: typed ? { projectId: query.projectId, types: query.types } : { projectId: query.projectId },
      };
    }

    case 'neighbors': {
      const anchor = query.direction === 'outgoing' ? 's' : 't';
      return {
        text:
          `MATCH (s:${ENTITY_LABEL})-[r]->(t:${ENTITY_LABEL}) ` +
          `WHERE ${anchor}.id IN $ids AND type(r) IN $types ` +
          `RETURN ${RELATIONSHIP_COLUMNS} ORDER BY sourceId, type, targetId`,
        parameters: { ids: query.entityIds, types: query.types },
      };
    }
  }
}
