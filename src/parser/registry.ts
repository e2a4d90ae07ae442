/**
 * Code Knowledge Graph - Parser Registry
 *
 * Maps language tags (and their aliases) to `LanguageParser`
 * implementations. New languages are added by registering a parser, not
 * by changing the coordinator.
 *
 * @module parser/registry
 */

import { getExtension } from '../utils/paths.js';
import { DartParser } from './dart-parser.js';
import { JavaParser } from './java-parser.js';
import { KotlinParser } from './kotlin-parser.js';
import { PythonParser } from './python-parser.js';
import type { GrammarProvider } from './tree-sitter-runtime.js';
import { normalizeLanguage, type LanguageParser } from './types.js';

export class ParserRegistry {
  private readonly parsers = new Map<string, LanguageParser>();

  /**
   * Register (or replace) the parser for its language
   */
  register(parser: LanguageParser): this {
    this.parsers.set(normalizeLanguage(parser.language), parser);
    return this;
  }

  /**
   * @returns Whether a parser was removed
   */
  unregister(language: string): boolean {
    return this.parsers.delete(normalizeLanguage(language));
  }

  get(language: string): LanguageParser | undefined {
    return this.parsers.get(normalizeLanguage(language));
  }

  has(language: string): boolean {
    return this.parsers.has(normalizeLanguage(language));
  }

  /** Registered language tags, sorted */
  languages(): string[] {
    return Array.from(this.parsers.keys()).sort();
  }

  /**
   * Parser whose extensions include the file's extension
   */
  getForFile(filePath: string): LanguageParser | undefined {
    const extension = getExtension(filePath);
    for (const parser of this.parsers.values()) {
      if (parser.extensions.includes(extension)) return parser;
    }
    return undefined;
  }
}

/**
 * Registry with the Java, Python, Kotlin and Dart parsers
 *
 * @param grammars - tree-sitter grammars for Java and Python; without it
 * they use pattern extraction
 */
export function createDefaultRegistry(grammars?: GrammarProvider): ParserRegistry {
  return new ParserRegistry()
    .register(new JavaParser(grammars))
    .register(new PythonParser(grammars))
    .register(new KotlinParser())
    .register(new DartParser());
}
