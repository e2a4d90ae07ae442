/**
 * Code Knowledge Graph - Tree-sitter Runtime
 *
 * Loads the web-tree-sitter runtime and the tree-sitter-wasms grammars.
 * Each engine owns its runtime; nothing is cached at module level.
 *
 * @module parser/tree-sitter-runtime
 */

import * as fs from 'fs';
import { createRequire } from 'node:module';
import * as path from 'path';
import { Language, Parser } from 'web-tree-sitter';
import { errorMessage } from '../utils/errors.js';
import type { ComponentLogger } from '../utils/logger.js';
import type { SyntaxNode } from './syntax-node.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * A parser bound to one grammar
 */
export interface SyntaxTreeParser {
  /**
   * Parse `source` and hand the root node to `visit`. The tree is freed
   * when `visit` returns, so nodes must not escape it.
   *
   * @returns What `visit` returned, or null when no tree was produced
   */
  parse<T>(source: string, visit: (root: SyntaxNode) => T): T | null;
  dispose(): void;
}

/**
 * Source of grammar-bound parsers; null means "use the fallback"
 */
export interface GrammarProvider {
  createParser(grammarFile: string): Promise<SyntaxTreeParser | null>;
}

export interface TreeSitterRuntimeOptions {
  /** Give up on runtime initialization after this long */
  initTimeoutMs: number;
  logger: ComponentLogger;
  /** Directory holding the grammar .wasm files */
  wasmDir?: string;
}

// ============================================================================
// RUNTIME
// ============================================================================

/**
 * Directory of the tree-sitter-wasms grammars
 */
export function defaultWasmDir(): string {
  try {
    const require = createRequire(import.meta.url);
    return path.join(path.dirname(require.resolve('tree-sitter-wasms/package.json')), 'out');
  } catch {
    return path.join(process.cwd(), 'node_modules', 'tree-sitter-wasms', 'out');
  }
}

export class TreeSitterRuntime implements GrammarProvider {
  private initialization?: Promise<boolean>;
  private readonly languages = new Map<string, Promise<Language | null>>();
  private readonly wasmDir: string;

  constructor(private readonly options: TreeSitterRuntimeOptions) {
    this.wasmDir = options.wasmDir ?? defaultWasmDir();
  }

  async createParser(grammarFile: string): Promise<SyntaxTreeParser | null> {
    if (!(await this.initialize())) return null;

    const language = await this.language(grammarFile);
    if (!language) return null;

    const parser = new Parser();
    parser.setLanguage(language);

    return {
      parse: <T>(source: string, visit: (root: SyntaxNode) => T): T | null => {
        const tree = parser.parse(source);
        if (!tree) return null;
        try {
          return visit(tree.rootNode);
        } finally {
          tree.delete();
        }
      },
      dispose: () => parser.delete(),
    };
  }

  /**
   * Initialize the runtime once, with timeout protection
   */
  private initialize(): Promise<boolean> {
    if (!this.initialization) {
      this.initialization = this.runInit();
    }
    return this.initialization;
  }

  private async runInit(): Promise<boolean> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(
        () => reject(new Error('Tree-sitter init timeout')),
        this.options.initTimeoutMs
      );
    });

    try {
      await Promise.race([Parser.init(), timeoutPromise]);
      return true;
    } catch (error) {
      this.options.logger.warn('Tree-sitter unavailable, using pattern extraction', {
        error: errorMessage(error),
      });
      return false;
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }

  private language(grammarFile: string): Promise<Language | null> {
    let pending = this.languages.get(grammarFile);
    if (!pending) {
      pending = this.loadLanguage(grammarFile);
      this.languages.set(grammarFile, pending);
    }
    return pending;
  }

  private async loadLanguage(grammarFile: string): Promise<Language | null> {
    const wasmPath = path.join(this.wasmDir, grammarFile);
    if (!fs.existsSync(wasmPath)) {
      this.options.logger.warn('Grammar not found', { grammarFile, wasmDir: this.wasmDir });
      return null;
    }

    try {
      return await Language.load(wasmPath);
    } catch (error) {
      this.options.logger.warn('Grammar failed to load', { grammarFile, error: errorMessage(error) });
      return null;
    }
  }
}
