/**
 * Entity and relationship builders for store, builder and query tests
 */

import type { CodeEntity, EntityKind, Relationship, RelationshipType } from '../../src/types/index.js';

export function entity(id: string, kind: EntityKind, overrides: Partial<CodeEntity> = {}): CodeEntity {
  return {
    id,
    projectId: 'shop',
    kind,
    name: id,
    qualifiedName: id,
    filePath: 'src/Shop.java',
    startLine: 1,
    endLine: 1,
    visibility: 'public',
    language: 'java',
    modifiers: [],
    annotations: [],
    ...overrides,
  };
}

export function relationship(type: RelationshipType, sourceId: string, targetId: string, sourceLine = 1): Relationship {
  return { type, sourceId, targetId, confidence: 'exact', sourceLine };
}

export interface GraphFixture {
  entities: CodeEntity[];
  relationships: Relationship[];
}

/**
 * One file holding classes A, B and C with one method each;
 * foo calls bar, bar calls baz and, when `cyclic`, baz calls foo
 */
export function shopGraph(cyclic: boolean): GraphFixture {
  const entities = [
    entity('f', 'File', { name: 'Shop.java', qualifiedName: 'src/Shop.java', endLine: 12 }),
    entity('a', 'Class', { name: 'A', qualifiedName: 'shop.A', startLine: 1, endLine: 4, parentId: 'f' }),
    entity('a.foo', 'Method', { name: 'foo', qualifiedName: 'shop.A.foo', startLine: 2, endLine: 3, parentId: 'a' }),
    entity('b', 'Class', { name: 'B', qualifiedName: 'shop.B', startLine: 5, endLine: 8, parentId: 'f' }),
    entity('b.bar', 'Method', { name: 'bar', qualifiedName: 'shop.B.bar', startLine: 6, endLine: 7, parentId: 'b' }),
    entity('c', 'Class', { name: 'C', qualifiedName: 'shop.C', startLine: 9, endLine: 12, parentId: 'f' }),
    entity('c.baz', 'Method', {
      name: 'baz',
      qualifiedName: 'shop.C.baz',
      startLine: 10,
      endLine: 11,
      parentId: 'c',
      visibility: 'private',
    }),
  ];

  const relationships = [
    relationship('CONTAINS', 'f', 'a'),
    relationship('CONTAINS', 'a', 'a.foo', 2),
    relationship('CONTAINS', 'f', 'b', 5),
    relationship('CONTAINS', 'b', 'b.bar', 6),
    relationship('CONTAINS', 'f', 'c', 9),
    relationship('CONTAINS', 'c', 'c.baz', 10),
    relationship('CALLS', 'a.foo', 'b.bar', 3),
    relationship('CALLS', 'b.bar', 'c.baz', 7),
  ];
  if (cyclic) relationships.push(relationship('CALLS', 'c.baz', 'a.foo', 11));

  return { entities, relationships };
}
