/**
 * Code Knowledge Graph - Dart Parser
 *
 * Pattern extraction for Dart: classes, mixins, enums and extensions,
 * functions and constructors, fields and call sites. Names starting with
 * `_` are library-private.
 *
 * @module parser/dart-parser
 */

import { normalizeType, splitTopLevel } from '../utils/strings.js';
import { BaseLanguageParser, type Extractor } from './base-parser.js';
import { clauseTypes, scanBraceSource, type BraceLanguageRules } from './pattern-scanner.js';
import type { DeclaredParameter, ParseContext } from './types.js';

// ============================================================================
// PATTERNS
// ============================================================================

const MODIFIER =
  '(?:@[\\w.]+(?:\\([^)\\n]*\\))?|abstract|base|final|sealed|interface|mixin|static|external|late|const|covariant|factory|var)';

const TYPE = '[\\w$.]+(?:<[^;{}()=\\n]*>)?\\??';

const RESERVED: ReadonlySet<string> = new Set([
  'if',
  'for',
  'while',
  'do',
  'switch',
  'return',
  'throw',
  'try',
  'catch',
  'finally',
  'super',
  'this',
  'else',
  'new',
  'is',
  'as',
  'in',
  'on',
  'assert',
  'await',
  'yield',
  'class',
  'enum',
  'mixin',
  'extension',
  'import',
  'export',
  'library',
  'part',
  'typedef',
  'set',
  'operator',
]);

/**
 * Dart parameter lists: positional, `[optional]` and `{named}` groups
 */
function parseParameters(list: string): DeclaredParameter[] {
  const params: DeclaredParameter[] = [];

  const add = (raw: string, grouped: 'positional' | 'optional' | 'named'): void => {
    const required = /\brequired\b/.test(raw);
    const text = raw
      .replace(/@[\w.]+(?:\([^)]*\))?/g, ' ')
      .replace(/\b(?:required|final|covariant|var)\s+/g, '')
      .trim();
    const [declaration = '', ...defaults] = splitTopLevel(text, '=');
    const words = declaration.trim().match(/^(.*?)([A-Za-z_$][\w$]*)$/s);
    if (!words) return;

    const name = words[2] ?? '';
    const typeText = (words[1] ?? '').trim();
    const type = typeText && !typeText.endsWith('.') ? normalizeType(typeText) : undefined;
    const optional =
      grouped === 'optional' || (grouped === 'named' && !required) || defaults.length > 0;

    params.push({
      name,
      ...(type ? { type } : {}),
      ...(optional ? { optional: true } : {}),
    });
  };

  for (const entry of splitTopLevel(list)) {
    if (entry.startsWith('[') || entry.startsWith('{')) {
      const grouped = entry.startsWith('[') ? 'optional' : 'named';
      for (const inner of splitTopLevel(entry.slice(1, -1))) add(inner, grouped);
    } else {
      add(entry, 'positional');
    }
  }
  return params;
}

export const DART_RULES: BraceLanguageRules = {
  mask: { cStyleComments: true, singleQuotes: true, tripleQuotes: true },
  packagePattern: /^\s*library\s+([\w.]+)\s*;/m,
  typePattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?<keyword>class|mixin|enum|extension)\\s+(?<name>[A-Za-z_$][\\w$]*)`,
    'gm'
  ),
  functionPattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?:(?<type>${TYPE}(?:\\s+Function\\s*\\([^)]*\\)\\??)?)\\s+)?(?<name>[A-Za-z_$][\\w$]*)\\s*(?:<[^<>()\\n]*>\\s*)?\\(`,
    'gm'
  ),
  fieldPattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?:(?<type>${TYPE})\\s+)?(?<name>[A-Za-z_$][\\w$]*)[ \\t]*(?=[=;,])`,
    'gm'
  ),
  expressionBody: '=>',
  reserved: RESERVED,
  typeKind: (_keyword, modifiers) => (modifiers.includes('interface') ? 'Interface' : 'Class'),
  supertypes: (header) => clauseTypes(header, ['extends', 'with', 'implements']),
  parameters: parseParameters,
  visibility: (_modifiers, name) => (name.startsWith('_') ? 'private' : 'public'),
  // Constructors, typed functions and top-level functions with a body
  acceptFunction: (fn) => Boolean(fn.returnType) || fn.name === fn.containerName || fn.hasBody,
};

// ============================================================================
// PARSER
// ============================================================================

export class DartParser extends BaseLanguageParser {
  readonly language = 'dart';
  readonly extensions = ['.dart'];
  readonly version = 'dart-patterns/1';

  protected async createExtractor(_context: ParseContext): Promise<Extractor> {
    return {
      extract: (file) => scanBraceSource(file, DART_RULES),
      usedFallback: false,
    };
  }
}
