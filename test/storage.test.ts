/**
 * Tests for the graph stores and Cypher compilation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { int } from 'neo4j-driver';
import { compileRead, compileWrite, entityProperties, ENTITY_LABEL, INDEX_STATEMENTS } from '../src/storage/cypher.js';
import { InMemoryGraphDriver } from '../src/storage/memory-driver.js';
import { toEntity, toNumber } from '../src/storage/neo4j-driver.js';
import { createGraphDriver } from '../src/storage/index.js';
import type { Relationship } from '../src/types/index.js';
import { ConfigurationError } from '../src/utils/errors.js';
import { entity, relationship } from './helpers/graph.js';

function calls(sourceId: string, targetId: string): Relationship {
  return relationship('CALLS', sourceId, targetId, 3);
}

describe('InMemoryGraphDriver', () => {
  let driver: InMemoryGraphDriver;

  beforeEach(async () => {
    driver = new InMemoryGraphDriver();
    await driver.connect();
  });

  it('should refuse reads and writes before connect', async () => {
    const closed = new InMemoryGraphDriver();

    await expect(closed.runRead({ kind: 'countEntitiesByKind', projectId: 'shop' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(closed.runWrite([])).rejects.toThrow('In-memory graph store is not connected');
  });

  it('should create entities and relationships and count them', async () => {
    const result = await driver.runWrite([
      { kind: 'createEntities', projectId: 'shop', entityKind: 'Method', entities: [entity('a', 'Method'), entity('b', 'Method')] },
      { kind: 'createRelationships', projectId: 'shop', relationshipType: 'CALLS', relationships: [calls('a', 'b')] },
    ]);

    expect(result).toEqual({ nodesCreated: 2, nodesDeleted: 0, relationshipsCreated: 1 });
    expect(await driver.runRead({ kind: 'countEntitiesByKind', projectId: 'shop' })).toEqual({
      kind: 'counts',
      counts: { Method: 2 },
    });
    expect(await driver.runRead({ kind: 'countRelationshipsByType', projectId: 'shop' })).toEqual({
      kind: 'counts',
      counts: { CALLS: 1 },
    });
  });

  it('should skip relationships whose endpoints do not exist', async () => {
    const result = await driver.runWrite([
      { kind: 'createEntities', projectId: 'shop', entityKind: 'Method', entities: [entity('a', 'Method')] },
      { kind: 'createRelationships', projectId: 'shop', relationshipType: 'CALLS', relationships: [calls('a', 'ghost')] },
    ]);

    expect(result.relationshipsCreated).toBe(0);
  });

  it('should merge entities and relationships written twice', async () => {
    const write = [
      { kind: 'createEntities' as const, projectId: 'shop', entityKind: 'Method' as const, entities: [entity('a', 'Method'), entity('b', 'Method')] },
      { kind: 'createRelationships' as const, projectId: 'shop', relationshipType: 'CALLS' as const, relationships: [calls('a', 'b')] },
    ];
    await driver.runWrite(write);
    const second = await driver.runWrite(write);

    expect(second).toEqual({ nodesCreated: 0, nodesDeleted: 0, relationshipsCreated: 0 });
    expect(driver.size).toBe(2);
  });

  it('should leave the store untouched when a statement fails', async () => {
    await expect(
      driver.runWrite([
        { kind: 'createEntities', projectId: 'shop', entityKind: 'Method', entities: [entity('a', 'Method')] },
        { kind: 'createEntities', projectId: 'shop', entityKind: 'Class', entities: [entity('b', 'Method')] },
      ])
    ).rejects.toThrow('Entity b is a Method, batch expects Class');

    expect(driver.size).toBe(0);
  });

  it('should delete one project and keep the others', async () => {
    await driver.runWrite([
      { kind: 'createEntities', projectId: 'shop', entityKind: 'Class', entities: [entity('a', 'Class')] },
      { kind: 'createEntities', projectId: 'blog', entityKind: 'Class', entities: [entity('b', 'Class', { projectId: 'blog' })] },
    ]);

    const result = await driver.runWrite([{ kind: 'deleteProject', projectId: 'shop' }]);
    const remaining = await driver.runRead({ kind: 'findEntities', filter: {} });

    expect(result.nodesDeleted).toBe(1);
    expect(remaining.kind === 'entities' ? remaining.entities.map((e) => e.id) : []).toEqual(['b']);
  });

  it('should filter and order entities', async () => {
    await driver.runWrite([
      {
        kind: 'createEntities',
        projectId: 'shop',
        entityKind: 'Method',
        entities: [
          entity('m2', 'Method', { name: 'run', filePath: 'src/B.java', startLine: 2 }),
          entity('m1', 'Method', { name: 'run', filePath: 'src/A.java', startLine: 9 }),
          entity('m0', 'Method', { name: 'stop', filePath: 'src/A.java', startLine: 4 }),
        ],
      },
    ]);

    const all = await driver.runRead({ kind: 'findEntities', filter: { projectId: 'shop' } });
    const named = await driver.runRead({ kind: 'findEntities', filter: { name: 'run', filePaths: ['src/B.java'] } });

    expect(all.kind === 'entities' ? all.entities.map((e) => e.id) : []).toEqual(['m0', 'm1', 'm2']);
    expect(named.kind === 'entities' ? named.entities.map((e) => e.id) : []).toEqual(['m2']);
  });

  it('should return copies that callers cannot use to change the store', async () => {
    await driver.runWrite([
      { kind: 'createEntities', projectId: 'shop', entityKind: 'Class', entities: [entity('a', 'Class')] },
    ]);

    const first = await driver.runRead({ kind: 'findEntities', filter: { ids: ['a'] } });
    if (first.kind === 'entities') first.entities[0]?.modifiers.push('static');
    const second = await driver.runRead({ kind: 'findEntities', filter: { ids: ['a'] } });

    expect(second.kind === 'entities' ? second.entities[0]?.modifiers : undefined).toEqual([]);
  });

  it('should follow relationships in either direction', async () => {
    await driver.runWrite([
      {
        kind: 'createEntities',
        projectId: 'shop',
        entityKind: 'Method',
        entities: [entity('a', 'Method'), entity('b', 'Method'), entity('c', 'Method')],
      },
      {
        kind: 'createRelationships',
        projectId: 'shop',
        relationshipType: 'CALLS',
        relationships: [calls('a', 'c'), calls('b', 'c')],
      },
    ]);

    const incoming = await driver.runRead({ kind: 'neighbors', entityIds: ['c'], types: ['CALLS'], direction: 'incoming' });
    const outgoing = await driver.runRead({ kind: 'neighbors', entityIds: ['c'], types: ['CALLS'], direction: 'outgoing' });

    expect(incoming.kind === 'relationships' ? incoming.relationships.map((r) => r.sourceId) : []).toEqual(['a', 'b']);
    expect(outgoing.kind === 'relationships' ? outgoing.relationships : undefined).toEqual([]);
  });
});

describe('createGraphDriver', () => {
  it('should create a driver per backend', () => {
    expect(createGraphDriver('memory').backend).toBe('memory');
    expect(createGraphDriver('neo4j').backend).toBe('neo4j');
  });
});

describe('Cypher compilation', () => {
  it('should compile the schema statements', () => {
    expect(compileWrite({ kind: 'ensureIndexes' }).map((s) => s.text)).toEqual([...INDEX_STATEMENTS]);
  });

  it('should MERGE entities under their kind label', () => {
    const [statement] = compileWrite({
      kind: 'createEntities',
      projectId: 'shop',
      entityKind: 'Class',
      entities: [entity('a', 'Class')],
    });

    expect(statement?.text).toBe(
      `UNWIND $rows AS row MERGE (n:${ENTITY_LABEL} {id: row.id}) SET n = row, n:Class`
    );
    expect(statement?.parameters.rows).toEqual([entityProperties(entity('a', 'Class'), 'shop')]);
  });

  it('should parameterise every filter value', () => {
    const statement = compileRead({ kind: 'findEntities', filter: { projectId: 'shop', kinds: ['Class'] } });

    expect(statement.text).toBe(
      'MATCH (n:CodeEntity) WHERE n.projectId = $projectId AND n.kind IN $kinds ' +
        'RETURN properties(n) AS entity ORDER BY n.filePath, n.startLine, n.id'
    );
    expect(statement.parameters).toEqual({ projectId: 'shop', kinds: ['Class'] });
  });

  it('should anchor neighbor queries on the requested side', () => {
    const statement = compileRead({ kind: 'neighbors', entityIds: ['x'], types: ['CALLS'], direction: 'incoming' });

    expect(statement.text).toContain('WHERE t.id IN $ids AND type(r) IN $types');
    expect(statement.parameters).toEqual({ ids: ['x'], types: ['CALLS'] });
  });

  it('should leave absent optional fields out of node properties', () => {
    const properties = entityProperties(entity('a', 'Class'), 'shop');

    expect(Object.keys(properties)).not.toContain('signature');
    expect(properties.projectId).toBe('shop');
  });
});

describe('Neo4j record conversion', () => {
  it('should read Neo4j integers as numbers', () => {
    expect(toNumber(int(42))).toBe(42);
    expect(toNumber(7)).toBe(7);
    expect(toNumber(null)).toBe(0);
  });

  it('should rebuild an entity from node properties', () => {
    const stored = { ...entityProperties(entity('a', 'Method', { signature: 'run()' }), 'shop'), startLine: int(3) };

    expect(toEntity(stored)).toEqual(entity('a', 'Method', { signature: 'run()', startLine: 3 }));
  });

  it('should reject unknown kinds', () => {
    expect(() => toEntity({ ...entityProperties(entity('a', 'Class'), 'shop'), kind: 'Module' })).toThrow(
      'Unexpected entity kind in graph store: Module'
    );
  });
});
