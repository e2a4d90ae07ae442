/**
 * Hand-built syntax trees for the AST extractors
 */

import type { SyntaxNode } from '../../src/parser/syntax-node.js';

export interface NodeSpec {
  text?: string;
  /** 0-indexed start row */
  row?: number;
  /** 0-indexed end row, defaults to `row` */
  endRow?: number;
  fields?: Record<string, SyntaxNode>;
  /** Named children in source order; fields not listed here are appended */
  children?: SyntaxNode[];
}

export function node(type: string, spec: NodeSpec = {}): SyntaxNode {
  const row = spec.row ?? 0;
  const fields = spec.fields ?? {};
  const children = [...(spec.children ?? [])];
  for (const field of Object.values(fields)) {
    if (!children.includes(field)) children.push(field);
  }

  return {
    type,
    text: spec.text ?? '',
    startPosition: { row, column: 0 },
    endPosition: { row: spec.endRow ?? row, column: 0 },
    namedChildren: children,
    childForFieldName: (name) => fields[name] ?? null,
  };
}

/** Leaf node whose text is its content */
export function leaf(type: string, text: string, row = 0): SyntaxNode {
  return node(type, { text, row });
}
