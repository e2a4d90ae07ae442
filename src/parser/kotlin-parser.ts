/**
 * Code Knowledge Graph - Kotlin Parser
 *
 * Pattern extraction for Kotlin: classes, interfaces and objects,
 * functions (including extension functions), properties (including
 * primary-constructor `val`/`var` parameters) and call sites.
 *
 * A companion object is a nested class, `Companion` unless named, so
 * `Order.create()` on a companion function resolves heuristically.
 *
 * @module parser/kotlin-parser
 */

import type { Visibility } from '../types/index.js';
import { normalizeType, splitTopLevel } from '../utils/strings.js';
import { BaseLanguageParser, type Extractor } from './base-parser.js';
import {
  scanBraceSource,
  stripTypeParameters,
  type BraceLanguageRules,
  type HeaderProperty,
} from './pattern-scanner.js';
import type { DeclaredParameter, ParseContext } from './types.js';

// ============================================================================
// PATTERNS
// ============================================================================

const MODIFIER =
  '(?:@[\\w.]+(?:\\([^)\\n]*\\))?|public|private|protected|internal|open|abstract|final|sealed|data|enum|annotation|inner|value|inline|override|suspend|operator|infix|tailrec|external|const|lateinit|companion|fun|expect|actual)';

const VISIBILITY_WORDS: ReadonlySet<string> = new Set(['public', 'private', 'protected', 'internal']);

const RESERVED: ReadonlySet<string> = new Set([
  'if',
  'when',
  'for',
  'while',
  'do',
  'return',
  'throw',
  'try',
  'catch',
  'finally',
  'super',
  'this',
  'else',
  'is',
  'in',
  'as',
  'class',
  'interface',
  'object',
  'fun',
  'val',
  'var',
  'typealias',
  'import',
  'package',
  'constructor',
  'init',
]);

const PROPERTY_PARAMETER =
  /^\s*(?:@[\w.]+(?:\([^)]*\))?\s+)*(?<mods>(?:(?:public|private|protected|internal|override|open|final)\s+)*)(?:val|var)\s+(?<name>[A-Za-z_]\w*)\s*:\s*(?<type>[^=]+)/;

/**
 * Offset of the first `ch` outside brackets, or -1
 */
function topLevelIndex(text: string, ch: string): number {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (c === '(' || c === '<' || c === '[') depth++;
    else if (c === ')' || c === '>' || c === ']') depth = Math.max(0, depth - 1);
    else if (c === ch && depth === 0) return i;
  }
  return -1;
}

function parseParameters(list: string): DeclaredParameter[] {
  return splitTopLevel(list).map((raw) => {
    const text = raw.replace(/@[\w.]+(?:\([^)]*\))?/g, ' ').trim();
    const variadic = /\bvararg\b/.test(text);
    const withoutMods = text.replace(/\b(?:vararg|noinline|crossinline|val|var|private|protected|internal|public|override)\s+/g, '');
    const [declaration = '', ...defaults] = splitTopLevel(withoutMods, '=');
    const colon = declaration.indexOf(':');
    const name = (colon === -1 ? declaration : declaration.substring(0, colon)).trim();
    const type = colon === -1 ? undefined : normalizeType(declaration.substring(colon + 1));

    return {
      name,
      ...(type ? { type } : {}),
      ...(defaults.length > 0 ? { optional: true } : {}),
      ...(variadic ? { variadic: true } : {}),
    };
  });
}

function supertypes(header: string): string[] {
  const text = stripTypeParameters(header);
  const colon = topLevelIndex(text, ':');
  if (colon === -1) return [];

  const list = text.substring(colon + 1).split(/\bwhere\b/)[0] ?? '';
  return splitTopLevel(list)
    .map((entry) => entry.replace(/\bby\b[\s\S]*$/, '').replace(/\([\s\S]*$/, ''))
    .map(normalizeType)
    .filter(Boolean);
}

function headerProperties(header: string): HeaderProperty[] {
  const text = stripTypeParameters(header);
  const shift = header.length - text.length;
  const colon = topLevelIndex(text, ':');
  const open = text.indexOf('(');
  if (open === -1 || (colon !== -1 && open > colon)) return [];

  const prefix = text.substring(0, open).trim();
  if (prefix && !/\bconstructor$/.test(prefix)) return [];

  let depth = 0;
  let close = text.length;
  for (let i = open; i < text.length; i++) {
    if (text[i] === '(') depth++;
    else if (text[i] === ')' && --depth === 0) {
      close = i;
      break;
    }
  }

  const properties: HeaderProperty[] = [];
  const inner = text.substring(open + 1, close);
  let cursor = 0;
  for (const entry of splitTopLevel(inner)) {
    const at = inner.indexOf(entry, cursor);
    cursor = at + entry.length;
    const match = PROPERTY_PARAMETER.exec(entry);
    const name = match?.groups?.name;
    if (!match || !name) continue;
    properties.push({
      name,
      type: normalizeType(match.groups?.type ?? ''),
      modifiers: (match.groups?.mods ?? '').split(/\s+/).filter(Boolean),
      offset: shift + open + 1 + at,
    });
  }
  return properties;
}

function visibility(modifiers: string[]): Visibility {
  const word = modifiers.find((m) => VISIBILITY_WORDS.has(m));
  return word === 'private' || word === 'protected' || word === 'internal' ? word : 'public';
}

export const KOTLIN_RULES: BraceLanguageRules = {
  mask: { cStyleComments: true, singleQuotes: true, tripleQuotes: true },
  packagePattern: /^\s*package\s+([\w.]+)/m,
  typePattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?<keyword>class|interface|object)\\b(?:\\s+(?<name>[A-Za-z_]\\w*))?`,
    'gm'
  ),
  functionPattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)fun\\s+(?:<[^>\\n]*>\\s*)?(?:[\\w.]+(?:<[^>\\n]*>)?\\??\\.)?(?<name>[A-Za-z_]\\w*)\\s*\\(`,
    'gm'
  ),
  fieldPattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?:val|var)\\s+(?<name>[A-Za-z_]\\w*)[ \\t]*(?::[ \\t]*(?<type>[\\w.]+(?:<[^=\\n{}]*>)?\\??))?`,
    'gm'
  ),
  expressionBody: '=',
  reserved: RESERVED,
  typeKind: (keyword) => (keyword === 'interface' ? 'Interface' : 'Class'),
  implicitTypeName: (keyword, modifiers) =>
    keyword === 'object' && modifiers.includes('companion') ? 'Companion' : undefined,
  supertypes,
  parameters: parseParameters,
  visibility,
  trailingReturnType: (tail) => {
    const match = /^\s*:\s*([\s\S]+?)\s*(?:\bwhere\b[\s\S]*)?$/.exec(tail);
    return match?.[1] ? normalizeType(match[1]) : undefined;
  },
  headerProperties,
};

// ============================================================================
// PARSER
// ============================================================================

export class KotlinParser extends BaseLanguageParser {
  readonly language = 'kotlin';
  readonly extensions = ['.kt', '.kts'];
  readonly version = 'kotlin-patterns/1';

  protected async createExtractor(_context: ParseContext): Promise<Extractor> {
    return {
      extract: (file) => scanBraceSource(file, KOTLIN_RULES),
      usedFallback: false,
    };
  }
}
