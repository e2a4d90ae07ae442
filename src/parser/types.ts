/**
 * Code Knowledge Graph - Parser Types
 *
 * Language table, the language parser contract, and the intermediate
 * declaration model every extractor produces before entity ids exist.
 *
 * @module parser/types
 */

import type { ParseResult, Visibility } from '../types/index.js';
import type { ComponentLogger } from '../utils/logger.js';

// ============================================================================
// LANGUAGES
// ============================================================================

/**
 * Language configuration
 */
export interface LanguageConfig {
  /** Language tag used in entities and the parser registry */
  id: string;
  /** Display name */
  name: string;
  /** File extensions (with dot) */
  extensions: string[];
  /** Alternative tags accepted from language detection */
  aliases: string[];
  /** tree-sitter-wasms grammar file, when an AST parser exists */
  grammarFile?: string;
}

/**
 * Known languages. Only some of them have a registered parser; the rest
 * are recognised so that skipped files get a precise "unsupported" note.
 */
export const LANGUAGE_REGISTRY: Record<string, LanguageConfig> = {
  java: {
    id: 'java',
    name: 'Java',
    extensions: ['.java'],
    aliases: [],
    grammarFile: 'tree-sitter-java.wasm',
  },
  python: {
    id: 'python',
    name: 'Python',
    extensions: ['.py', '.pyi'],
    aliases: ['py', 'python3'],
    grammarFile: 'tree-sitter-python.wasm',
  },
  kotlin: {
    id: 'kotlin',
    name: 'Kotlin',
    extensions: ['.kt', '.kts'],
    aliases: ['kt', 'kts'],
  },
  dart: {
    id: 'dart',
    name: 'Dart',
    extensions: ['.dart'],
    aliases: ['flutter'],
  },
  typescript: {
    id: 'typescript',
    name: 'TypeScript',
    extensions: ['.ts', '.tsx', '.mts', '.cts'],
    aliases: ['ts'],
  },
  javascript: {
    id: 'javascript',
    name: 'JavaScript',
    extensions: ['.js', '.jsx', '.mjs', '.cjs'],
    aliases: ['js'],
  },
  go: { id: 'go', name: 'Go', extensions: ['.go'], aliases: ['golang'] },
  rust: { id: 'rust', name: 'Rust', extensions: ['.rs'], aliases: ['rs'] },
  csharp: { id: 'csharp', name: 'C#', extensions: ['.cs'], aliases: ['c#', 'cs'] },
  swift: { id: 'swift', name: 'Swift', extensions: ['.swift'], aliases: [] },
  scala: { id: 'scala', name: 'Scala', extensions: ['.scala', '.sc'], aliases: [] },
  ruby: { id: 'ruby', name: 'Ruby', extensions: ['.rb'], aliases: ['rb'] },
  php: { id: 'php', name: 'PHP', extensions: ['.php'], aliases: [] },
  cpp: {
    id: 'cpp',
    name: 'C++',
    extensions: ['.cpp', '.cc', '.cxx', '.hpp', '.hh'],
    aliases: ['c++'],
  },
  c: { id: 'c', name: 'C', extensions: ['.c', '.h'], aliases: [] },
};

/**
 * Get language config by file extension
 */
export function getLanguageByExtension(extension: string): LanguageConfig | undefined {
  const ext = (extension.startsWith('.') ? extension : `.${extension}`).toLowerCase();
  for (const config of Object.values(LANGUAGE_REGISTRY)) {
    if (config.extensions.includes(ext)) {
      return config;
    }
  }
  return undefined;
}

/**
 * Map a language tag or alias to its canonical id (lower-cased tag when unknown)
 */
export function normalizeLanguage(tag: string): string {
  const lower = tag.trim().toLowerCase();
  if (LANGUAGE_REGISTRY[lower]) return lower;
  for (const config of Object.values(LANGUAGE_REGISTRY)) {
    if (config.aliases.includes(lower)) return config.id;
  }
  return lower;
}

// ============================================================================
// PARSER CONTRACT
// ============================================================================

/**
 * Per-call parse settings. Everything a parser needs for one build is
 * passed in here; parsers keep no state between calls.
 */
export interface ParseContext {
  projectId: string;
  /** Absolute project root; file paths are relative to it */
  rootPath: string;
  /** Files above this size (bytes) are reported as parse errors */
  maxFileSize: number;
  /** Emit Parameter entities under each method */
  includeParameters: boolean;
  logger: ComponentLogger;
}

/**
 * One implementation per language, selected through the parser registry
 */
export interface LanguageParser {
  /** Canonical language tag */
  readonly language: string;
  /** File extensions handled (with dot) */
  readonly extensions: readonly string[];
  /** Parser implementation version, reported in results */
  readonly version: string;

  /**
   * Parse a batch of files of this language. Per-file failures are
   * returned in `errors`; the promise rejects only on failures that make
   * the whole batch impossible.
   *
   * @param files - Paths relative to `context.rootPath`
   */
  parseFiles(files: string[], context: ParseContext): Promise<ParseResult>;

  /** Check whether a path has one of this parser's extensions */
  canParse(filePath: string): boolean;
}

// ============================================================================
// EXTRACTION MODEL
// ============================================================================

export type DeclarationKind = 'Class' | 'Interface' | 'Method' | 'Field';

export interface DeclaredParameter {
  name: string;
  type?: string;
  /** Has a default value / is an optional positional or named parameter */
  optional?: boolean;
  /** Varargs, `*args`, `**kwargs` */
  variadic?: boolean;
}

/**
 * A declaration found in one file, before ids are assigned
 */
export interface Declaration {
  kind: DeclarationKind;
  name: string;
  qualifiedName: string;
  /** Index of the enclosing Class/Interface declaration in the same file */
  containerIndex?: number;
  startLine: number;
  endLine: number;
  visibility: Visibility;
  modifiers: string[];
  annotations: string[];
  /** Methods only */
  parameters?: DeclaredParameter[];
  /** Methods only */
  returnType?: string;
  /** Fields only: declared or inferred type */
  valueType?: string;
}

/**
 * A call expression inside a method body
 */
export interface CallSite {
  /** Index of the calling Method declaration */
  callerIndex: number;
  name: string;
  /** True for `x.name()`, whether or not `x` could be named */
  hasReceiver: boolean;
  /** Simple receiver identifier (`this`, `self`, a class, field or variable name) */
  receiver?: string;
  /** Type of the receiver when the extractor knows it (locals, parameters) */
  receiverType?: string;
  /** Argument count, null when unknown */
  arity: number | null;
  line: number;
}

/**
 * A type-level link that is resolved by simple name after the batch is read
 */
export interface TypeLink {
  fromIndex: number;
  /** Type expression as written */
  targetName: string;
  /** `supertype` becomes EXTENDS or IMPLEMENTS, `reference` REFERENCES */
  kind: 'supertype' | 'reference';
  line: number;
}

/**
 * Everything an extractor reports for one file
 */
export interface FileExtraction {
  /** Package / module prefix of top-level declarations */
  packageName?: string;
  /** In source order */
  declarations: Declaration[];
  calls: CallSite[];
  typeLinks: TypeLink[];
}

/**
 * A file's source handed to an extractor
 */
export interface SourceFile {
  /** Path relative to the project root */
  path: string;
  content: string;
}
