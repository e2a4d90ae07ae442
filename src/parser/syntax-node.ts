/**
 * Syntax Node
 *
 * The slice of the tree-sitter node API the AST extractors read. Real
 * `web-tree-sitter` nodes satisfy it structurally; tests build plain
 * objects.
 *
 * @module parser/syntax-node
 */

export interface SyntaxPoint {
  /** 0-indexed */
  row: number;
  column: number;
}

export interface SyntaxNode {
  type: string;
  text: string;
  startPosition: SyntaxPoint;
  endPosition: SyntaxPoint;
  namedChildren: ReadonlyArray<SyntaxNode | null>;
  childForFieldName(fieldName: string): SyntaxNode | null;
}

/**
 * Named children without the null holes
 */
export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  return node.namedChildren.filter((child): child is SyntaxNode => child !== null);
}

/**
 * First named child of one of the given types
 */
export function childOfType(node: SyntaxNode, ...types: string[]): SyntaxNode | undefined {
  return childrenOf(node).find((child) => types.includes(child.type));
}

/**
 * Depth-first walk. Returning `false` from `visit` skips the node's
 * children.
 */
export function walk(node: SyntaxNode, visit: (node: SyntaxNode) => boolean | void): void {
  if (visit(node) === false) return;
  for (const child of childrenOf(node)) {
    walk(child, visit);
  }
}

/** 1-indexed start line */
export function startLine(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

/** 1-indexed end line */
export function endLine(node: SyntaxNode): number {
  return node.endPosition.row + 1;
}
