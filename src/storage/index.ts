/**
 * Code Knowledge Graph - Storage Module
 * @module storage
 *
 * Graph store contract with an in-memory and a Neo4j backend.
 */

import type { StoreBackend } from '../config.js';
import type { ComponentLogger } from '../utils/logger.js';
import type { GraphDriver } from './driver.js';
import { InMemoryGraphDriver } from './memory-driver.js';
import { Neo4jGraphDriver } from './neo4j-driver.js';

export {
  type GraphDriver,
  type StoreConnectionConfig,
  type EntityFilter,
  type ReadQuery,
  type ReadResult,
  type WriteStatement,
  type WriteResult,
  emptyWriteResult,
  relationshipKey,
  compareEntities,
  compareRelationships,
} from './driver.js';

export { InMemoryGraphDriver } from './memory-driver.js';
export { Neo4jGraphDriver, toEntity, toNumber } from './neo4j-driver.js';
export {
  type CypherStatement,
  ENTITY_LABEL,
  INDEX_STATEMENTS,
  compileRead,
  compileWrite,
  entityProperties,
} from './cypher.js';

/**
 * Create an unconnected driver for a backend
 */
export function createGraphDriver(backend: StoreBackend, log?: ComponentLogger): GraphDriver {
  switch (backend) {
    case 'memory':
      return new InMemoryGraphDriver();
    case 'neo4j':
      return new Neo4jGraphDriver(log);
  }
}
