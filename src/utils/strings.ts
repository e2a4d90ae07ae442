/**
 * Code Knowledge Graph - String Utilities
 * @module utils/strings
 *
 * Identifier, type-name and id helpers shared by the parsers.
 */

import { createHash } from 'node:crypto';

// =============================================================================
// Entity Ids
// =============================================================================

/** Hex characters kept from the sha256 digest */
const ID_LENGTH = 32;

/**
 * Deterministic entity id.
 *
 * The same project, language, file and qualified name always produce the
 * same id, so rebuilding unchanged source yields identical graphs. `key`
 * is the qualified name, extended with the parameter types for methods
 * so overloads do not collide.
 *
 * @example
 * createEntityId('shop', 'java', 'src/Cart.java', 'shop.Cart.add(Item)')
 */
export function createEntityId(
  projectId: string,
  language: string,
  filePath: string,
  key: string
): string {
  return createHash('sha256')
    .update(`${projectId}\u0000${language}\u0000${filePath}\u0000${key}`)
    .digest('hex')
    .substring(0, ID_LENGTH);
}

// =============================================================================
// Type Names
// =============================================================================

/**
 * Split on commas that are not nested inside <>, (), [] or {}
 *
 * @example
 * splitTopLevel('Map<String, Int>, List<T>') // ['Map<String, Int>', 'List<T>']
 */
export function splitTopLevel(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';

  for (const ch of text) {
    if (ch === '<' || ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === '>' || ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);

    if (ch === separator && depth === 0) {
      parts.push(current.trim());
      current = '';
    } else {
      current += ch;
    }
  }

  if (current.trim()) parts.push(current.trim());
  return parts.filter(Boolean);
}

/**
 * Reduce a type expression to the simple name of its outer type
 *
 * @example
 * baseTypeName('java.util.List<Order>') // 'List'
 * baseTypeName('Repository<User>?')     // 'Repository'
 */
export function baseTypeName(typeText: string): string {
  const withoutGenerics = typeText.replace(/<.*$/s, '').replace(/\(.*$/s, '');
  const cleaned = withoutGenerics.replace(/[?!\[\]\s.]+$/g, '').trim();
  const segments = cleaned.split('.');
  return segments[segments.length - 1] ?? cleaned;
}

/**
 * Join non-empty name segments with dots
 */
export function qualify(...segments: Array<string | undefined>): string {
  return segments.filter((s): s is string => Boolean(s)).join('.');
}

/**
 * Collapse whitespace inside a type expression
 */
export function normalizeType(typeText: string): string {
  return typeText.replace(/\s+/g, ' ').replace(/\s*([<>,\[\]])\s*/g, '$1').replace(/,/g, ', ').trim();
}

/**
 * Render a method signature the same way for every language
 *
 * @example
 * formatSignature('total', ['int', 'String'], 'long') // 'total(int, String): long'
 */
export function formatSignature(
  name: string,
  parameterTypes: string[],
  returnType?: string
): string {
  const params = `${name}(${parameterTypes.join(', ')})`;
  return returnType ? `${params}: ${returnType}` : params;
}
