/**
 * Code Knowledge Graph - Parser Module
 *
 * @module parser
 */

export * from './types.js';
export { ParserRegistry, createDefaultRegistry } from './registry.js';
export { BaseLanguageParser, type Extractor } from './base-parser.js';
export { JavaParser, extractJavaTree, JAVA_FALLBACK_RULES } from './java-parser.js';
export { PythonParser, extractPythonTree, scanPythonSource, moduleName } from './python-parser.js';
export { KotlinParser, KOTLIN_RULES } from './kotlin-parser.js';
export { DartParser, DART_RULES } from './dart-parser.js';
export { scanBraceSource, type BraceLanguageRules } from './pattern-scanner.js';
export { EntityAssembler, dedupeRelationships, type AssembledBatch } from './entity-assembler.js';
export { resolveCall, arityRange, type MethodCandidate, type ResolutionScope } from './call-resolver.js';
export {
  TreeSitterRuntime,
  defaultWasmDir,
  type GrammarProvider,
  type SyntaxTreeParser,
} from './tree-sitter-runtime.js';
export type { SyntaxNode, SyntaxPoint } from './syntax-node.js';
