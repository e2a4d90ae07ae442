/**
 * Pattern Scanner
 *
 * Regex-driven extraction for brace-delimited languages. Each language
 * supplies a `BraceLanguageRules` table; the scanner finds type, function
 * and field headers, locates their bodies by bracket matching over
 * comment- and string-masked text, and collects call sites inside
 * function bodies.
 *
 * Declarations inside function bodies (locals, lambdas, local classes)
 * are not reported; calls made from them are attributed to the enclosing
 * function.
 *
 * @module parser/pattern-scanner
 */

import type { Visibility } from '../types/index.js';
import { normalizeType, qualify, splitTopLevel } from '../utils/strings.js';
import { countArguments, LineIndex, maskSource, matchBracket, type MaskOptions } from './source-text.js';
import type {
  CallSite,
  Declaration,
  DeclaredParameter,
  FileExtraction,
  SourceFile,
  TypeLink,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface HeaderProperty {
  name: string;
  type?: string;
  modifiers: string[];
  /** Offset of the property inside the header text */
  offset: number;
}

/**
 * Per-language pattern table. Every pattern must use the `g` and `m`
 * flags and start with `^[ \t]*`.
 */
export interface BraceLanguageRules {
  mask: MaskOptions;
  /** Group 1: package name */
  packagePattern?: RegExp;
  /** Groups `mods`, `keyword`, `name`; ends right after the name */
  typePattern: RegExp;
  /** Groups `mods`, `type` (optional), `name`; ends with the `(` of the parameter list */
  functionPattern: RegExp;
  /** Groups `mods`, `type` (optional), `name`; ends after the name or the declared type */
  fieldPattern?: RegExp;
  /** Token that starts an expression body after the parameter list */
  expressionBody?: '=' | '=>';
  /** Words that never name a declaration or a called function */
  reserved: ReadonlySet<string>;
  typeKind(keyword: string, modifiers: string[]): 'Class' | 'Interface';
  /** Name of a type declared without one; `typePattern` leaves `name` unmatched */
  implicitTypeName?(keyword: string, modifiers: string[]): string | undefined;
  /** Supertype expressions in the text between a type's name and its body */
  supertypes(header: string): string[];
  parameters(list: string): DeclaredParameter[];
  visibility(modifiers: string[], name: string, containerKeyword: string | undefined): Visibility;
  /** Return type written after the parameter list */
  trailingReturnType?(tail: string): string | undefined;
  /** Properties declared in a type header (primary constructors) */
  headerProperties?(header: string): HeaderProperty[];
  /** Reject function matches that are not declarations (enum constants, statements) */
  acceptFunction?(fn: FunctionCandidate): boolean;
}

export interface FunctionCandidate {
  name: string;
  returnType?: string;
  hasBody: boolean;
  /** Simple name of the enclosing type */
  containerName?: string;
}

interface BodyRange {
  /** Offset of `{`, or of the expression-body token */
  open?: number;
  /** Offset just past the body (or the header when there is none) */
  end: number;
  /** Offset where the header stops */
  headerEnd: number;
}

interface RawBase {
  start: number;
  name: string;
  modifiers: string[];
  annotations: string[];
}

interface RawType extends RawBase {
  kind: 'type';
  keyword: string;
  header: string;
  headerOffset: number;
  headerEnd: number;
  end: number;
}

interface RawFunction extends RawBase {
  kind: 'function';
  parameters: DeclaredParameter[];
  returnType?: string;
  bodyStart?: number;
  end: number;
}

interface RawField extends RawBase {
  kind: 'field';
  valueType?: string;
  end: number;
}

type RawDeclaration = RawType | RawFunction | RawField;

/** Words after which `name(` is still an expression, not a declaration */
const EXPRESSION_KEYWORDS = new Set([
  'return',
  'new',
  'throw',
  'else',
  'await',
  'yield',
  'in',
  'is',
  'as',
  'case',
  'do',
  'not',
  'and',
  'or',
  'instanceof',
  'assert',
  'const',
  'lambda',
  'if',
  'elif',
  'while',
  'with',
  'from',
  'del',
  'raise',
  'except',
]);

const CALL_PATTERN = /([A-Za-z_$][\w$]*)\s*(?:<[^<>()\n]*>\s*)?\(/g;
const IDENT_CHAR = /[\w$]/;
const CONTINUATION_WORD = /^(extends|implements|with|throws|where|on|permits)\b/;

// ============================================================================
// SCANNER
// ============================================================================

/**
 * Extract declarations, calls and type links from one file
 */
export function scanBraceSource(file: SourceFile, rules: BraceLanguageRules): FileExtraction {
  const masked = maskSource(file.content, rules.mask);
  const lines = new LineIndex(file.content);
  const packageName = rules.packagePattern?.exec(masked)?.[1];
  if (rules.packagePattern) rules.packagePattern.lastIndex = 0;

  const types = scanTypes(masked, rules);
  const functions = scanFunctions(masked, rules);
  const fields = rules.fieldPattern ? scanFields(masked, rules.fieldPattern, rules) : [];

  const bodies = functions.filter((f) => f.bodyStart !== undefined);
  const insideBody = (pos: number): boolean =>
    bodies.some((f) => f.bodyStart !== undefined && f.bodyStart < pos && pos < f.end);
  const insideHeader = (pos: number): boolean =>
    types.some((t) => t.start < pos && pos < t.headerEnd);

  const raws: RawDeclaration[] = [...types, ...functions, ...fields]
    .filter((r) => !insideBody(r.start))
    .filter((r) => r.kind !== 'field' || !insideHeader(r.start))
    .sort((a, b) => a.start - b.start);

  const declarations: Declaration[] = [];
  const calls: CallSite[] = [];
  const typeLinks: TypeLink[] = [];
  const keptTypes: Array<{ raw: RawType; index: number }> = [];

  for (const raw of raws) {
    const container = innermostType(keptTypes, raw.start);
    const containerDecl = container ? declarations[container.index] : undefined;
    const parentName = containerDecl ? containerDecl.qualifiedName : packageName;
    const line = lines.lineOf(raw.start);
    const base = {
      name: raw.name,
      qualifiedName: qualify(parentName, raw.name),
      startLine: line,
      visibility: rules.visibility(raw.modifiers, raw.name, container?.raw.keyword),
      modifiers: raw.modifiers,
      annotations: raw.annotations,
      ...(container ? { containerIndex: container.index } : {}),
    };

    if (raw.kind === 'type') {
      const index = declarations.length;
      declarations.push({
        ...base,
        kind: rules.typeKind(raw.keyword, raw.modifiers),
        endLine: lines.lineOf(Math.max(raw.start, raw.end - 1)),
      });
      keptTypes.push({ raw, index });

      for (const supertype of rules.supertypes(raw.header)) {
        typeLinks.push({ fromIndex: index, targetName: supertype, kind: 'supertype', line });
      }

      for (const prop of rules.headerProperties?.(raw.header) ?? []) {
        const propLine = lines.lineOf(raw.headerOffset + prop.offset);
        declarations.push({
          kind: 'Field',
          name: prop.name,
          qualifiedName: qualify(base.qualifiedName, prop.name),
          containerIndex: index,
          startLine: propLine,
          endLine: propLine,
          visibility: rules.visibility(prop.modifiers, prop.name, raw.keyword),
          modifiers: prop.modifiers,
          annotations: [],
          ...(prop.type ? { valueType: prop.type } : {}),
        });
      }
      continue;
    }

    if (raw.kind === 'field') {
      declarations.push({
        ...base,
        kind: 'Field',
        endLine: lines.lineOf(Math.max(raw.start, raw.end - 1)),
        ...(raw.valueType ? { valueType: raw.valueType } : {}),
      });
      continue;
    }

    const accepted = rules.acceptFunction?.({
      name: raw.name,
      returnType: raw.returnType,
      hasBody: raw.bodyStart !== undefined,
      containerName: containerDecl?.name,
    });
    if (accepted === false) continue;

    const index = declarations.length;
    declarations.push({
      ...base,
      kind: 'Method',
      endLine: lines.lineOf(Math.max(raw.start, raw.end - 1)),
      parameters: raw.parameters,
      ...(raw.returnType ? { returnType: raw.returnType } : {}),
    });

    if (raw.bodyStart !== undefined) {
      collectCalls(masked, raw.bodyStart, raw.end, index, rules.reserved, lines, calls);
    }
  }

  return {
    ...(packageName ? { packageName } : {}),
    declarations,
    calls,
    typeLinks,
  };
}

function innermostType(
  types: Array<{ raw: RawType; index: number }>,
  pos: number
): { raw: RawType; index: number } | undefined {
  let best: { raw: RawType; index: number } | undefined;
  for (const entry of types) {
    if (entry.raw.start < pos && pos < entry.raw.end) {
      if (!best || entry.raw.start > best.raw.start) best = entry;
    }
  }
  return best;
}

// ============================================================================
// HEADERS
// ============================================================================

function scanTypes(masked: string, rules: BraceLanguageRules): RawType[] {
  const result: RawType[] = [];
  for (const match of masked.matchAll(rules.typePattern)) {
    const groups = match.groups ?? {};
    const keyword = groups.keyword ?? 'class';
    const mods = groups.mods ?? '';
    const name = groups.name ?? rules.implicitTypeName?.(keyword, modifierWords(mods));
    if (!name || rules.reserved.has(name)) continue;

    const matchStart = match.index ?? 0;
    const start = matchStart + leadingSpace(match[0]);
    const after = matchStart + match[0].length;
    const body = findBody(masked, after);

    result.push({
      kind: 'type',
      start,
      name,
      keyword,
      modifiers: modifierWords(mods),
      annotations: annotationsBefore(masked, start, mods),
      header: masked.substring(after, body.headerEnd),
      headerOffset: after,
      headerEnd: body.headerEnd,
      end: body.end,
    });
  }
  return result;
}

function scanFunctions(masked: string, rules: BraceLanguageRules): RawFunction[] {
  const result: RawFunction[] = [];
  for (const match of masked.matchAll(rules.functionPattern)) {
    const groups = match.groups ?? {};
    const name = groups.name;
    if (!name || rules.reserved.has(name)) continue;
    if (groups.type && rules.reserved.has(groups.type)) continue;

    const matchStart = match.index ?? 0;
    const start = matchStart + leadingSpace(match[0]);
    const parenOffset = matchStart + match[0].length - 1;
    const paramsEnd = matchBracket(masked, parenOffset);
    const body = findBody(masked, paramsEnd, rules.expressionBody);
    const tail = masked.substring(paramsEnd, body.headerEnd);
    const mods = groups.mods ?? '';
    const returnType = groups.type ? normalizeType(groups.type) : rules.trailingReturnType?.(tail);

    result.push({
      kind: 'function',
      start,
      name,
      modifiers: modifierWords(mods),
      annotations: annotationsBefore(masked, start, mods),
      parameters: rules.parameters(masked.substring(parenOffset + 1, paramsEnd - 1)),
      ...(returnType ? { returnType } : {}),
      ...(body.open !== undefined ? { bodyStart: body.open } : {}),
      end: body.end,
    });
  }
  return result;
}

function scanFields(masked: string, pattern: RegExp, rules: BraceLanguageRules): RawField[] {
  const result: RawField[] = [];
  for (const match of masked.matchAll(pattern)) {
    const groups = match.groups ?? {};
    const name = groups.name;
    if (!name || rules.reserved.has(name)) continue;
    if (groups.type && rules.reserved.has(groups.type)) continue;

    const matchStart = match.index ?? 0;
    const start = matchStart + leadingSpace(match[0]);
    const after = matchStart + match[0].length;
    const mods = groups.mods ?? '';
    const valueType = groups.type ? normalizeType(groups.type) : initializerType(masked, after);

    result.push({
      kind: 'field',
      start,
      name,
      modifiers: modifierWords(mods),
      annotations: annotationsBefore(masked, start, mods),
      ...(valueType ? { valueType } : {}),
      end: expressionEnd(masked, after),
    });
  }
  return result;
}

/**
 * Find the body following a header. A `{` at bracket depth 0 opens a
 * block body; `;`, a closing `}` or a line break not followed by a header
 * continuation ends a bodiless declaration.
 */
function findBody(masked: string, from: number, expressionBody?: '=' | '=>'): BodyRange {
  let depth = 0;
  for (let i = from; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === '(' || ch === '[') {
      depth++;
      continue;
    }
    if (ch === ')' || ch === ']') {
      depth = Math.max(0, depth - 1);
      continue;
    }
    if (depth > 0) continue;

    if (ch === '{') {
      return { open: i, end: matchBracket(masked, i), headerEnd: i };
    }
    if (ch === ';' || ch === '}') {
      return { end: i, headerEnd: i };
    }
    if (expressionBody && isExpressionBodyAt(masked, i, expressionBody)) {
      return { open: i, end: expressionEnd(masked, i + expressionBody.length), headerEnd: i };
    }
    if (ch === '\n' && !continuesHeader(masked, i + 1, expressionBody)) {
      return { end: i, headerEnd: i };
    }
  }
  return { end: masked.length, headerEnd: masked.length };
}

function isExpressionBodyAt(masked: string, i: number, token: '=' | '=>'): boolean {
  if (!masked.startsWith(token, i)) return false;
  if (token === '=>') return true;
  const prev = masked[i - 1] ?? '';
  const next = masked[i + 1] ?? '';
  return !'<>!=:'.includes(prev) && next !== '=' && next !== '>';
}

function continuesHeader(masked: string, from: number, expressionBody?: string): boolean {
  let j = from;
  while (j < masked.length && /\s/.test(masked[j] ?? '')) j++;
  const ch = masked[j];
  if (ch === undefined) return false;
  if (ch === '{' || ch === ':' || ch === ',') return true;
  if (expressionBody && masked.startsWith(expressionBody, j)) return true;
  return CONTINUATION_WORD.test(masked.substring(j, j + 12));
}

/**
 * End of an expression statement: `;` or a line break at bracket depth 0
 * (unless the next line continues a member chain), or the bracket that
 * closes an enclosing block
 */
function expressionEnd(masked: string, from: number): number {
  let depth = 0;
  for (let i = from; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') {
      if (depth === 0) return i;
      depth--;
    } else if (depth === 0 && ch === ';') {
      return i + 1;
    } else if (depth === 0 && ch === '\n') {
      const rest = masked.substring(i + 1).trimStart();
      if (!rest.startsWith('.') && !rest.startsWith('?.')) return i;
    }
  }
  return masked.length;
}

/**
 * `Foo(...)`, `new Foo(...)` or `const Foo(...)` initializer type
 */
function initializerType(masked: string, from: number): string | undefined {
  const lineEnd = masked.indexOf('\n', from);
  const rest = masked.substring(from, lineEnd === -1 ? masked.length : lineEnd);
  const match = /^\s*=\s*(?:new\s+|const\s+)?([A-Z][\w$]*)\s*(?:<[^>\n]*>)?\s*\(/.exec(rest);
  return match?.[1];
}

// ============================================================================
// CALLS
// ============================================================================

interface CallContext {
  declaration: boolean;
  hasReceiver: boolean;
  receiver?: string;
}

/**
 * Collect the call sites in `masked[from, to)` for one caller
 */
export function collectCalls(
  masked: string,
  from: number,
  to: number,
  callerIndex: number,
  reserved: ReadonlySet<string>,
  lines: LineIndex,
  calls: CallSite[]
): void {
  const body = masked.substring(from, to);
  for (const match of body.matchAll(CALL_PATTERN)) {
    const name = match[1];
    if (!name || reserved.has(name) || /^\d/.test(name)) continue;

    const nameOffset = from + (match.index ?? 0);
    if (IDENT_CHAR.test(masked[nameOffset - 1] ?? '')) continue;

    const context = callContext(masked, nameOffset);
    if (context.declaration) continue;

    const parenOffset = nameOffset + match[0].length - 1;
    calls.push({
      callerIndex,
      name,
      hasReceiver: context.hasReceiver,
      ...(context.receiver ? { receiver: context.receiver } : {}),
      arity: countArguments(masked, parenOffset),
      line: lines.lineOf(nameOffset),
    });
  }
}

/**
 * Look left of a call name for a receiver (`x.name`, `x?.name`,
 * `this.x.name`) or a word that makes it a declaration
 */
function callContext(masked: string, nameOffset: number): CallContext {
  let i = skipSpaceBack(masked, nameOffset - 1);
  const ch = masked[i];

  if (ch === '@') return { declaration: true, hasReceiver: false };

  if (ch === '.') {
    i--;
    if (masked[i] === '.') return { declaration: false, hasReceiver: true };
    if (masked[i] === '?') i--;
    else if (masked[i] === '!' && masked[i - 1] === '!') i -= 2;
    i = skipSpaceBack(masked, i);

    const word = wordEndingAt(masked, i);
    if (!word) return { declaration: false, hasReceiver: true };

    const beforeWord = skipSpaceBack(masked, i - word.length);
    if (masked[beforeWord] !== '.') {
      return { declaration: false, hasReceiver: true, receiver: word };
    }

    // this.field.name(...)
    const ownerEnd = skipSpaceBack(masked, beforeWord - 1);
    const owner = wordEndingAt(masked, ownerEnd);
    const ownerBefore = owner ? skipSpaceBack(masked, ownerEnd - owner.length) : -1;
    if ((owner === 'this' || owner === 'self') && masked[ownerBefore] !== '.') {
      return { declaration: false, hasReceiver: true, receiver: word };
    }
    return { declaration: false, hasReceiver: true };
  }

  if (ch !== undefined && IDENT_CHAR.test(ch)) {
    const word = wordEndingAt(masked, i);
    if (word && !EXPRESSION_KEYWORDS.has(word)) {
      return { declaration: true, hasReceiver: false };
    }
  }

  return { declaration: false, hasReceiver: false };
}

function skipSpaceBack(text: string, from: number): number {
  let i = from;
  while (i >= 0 && /\s/.test(text[i] ?? '')) i--;
  return i;
}

function wordEndingAt(text: string, end: number): string | undefined {
  let i = end;
  while (i >= 0 && IDENT_CHAR.test(text[i] ?? '')) i--;
  const word = text.substring(i + 1, end + 1);
  return word && /^[A-Za-z_$]/.test(word) ? word : undefined;
}

// ============================================================================
// HELPERS
// ============================================================================

function leadingSpace(text: string): number {
  return text.length - text.trimStart().length;
}

/**
 * Keyword modifiers of a modifier group, annotations removed
 */
export function modifierWords(mods: string): string[] {
  return mods
    .replace(/@[\w.]+(?:\([^)]*\))?/g, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

/**
 * Annotation names written inline in the modifier group or on the lines
 * directly above a declaration
 */
export function annotationsBefore(masked: string, start: number, mods: string): string[] {
  const above: string[] = [];
  let lineEnd = masked.lastIndexOf('\n', start - 1);

  while (lineEnd > 0) {
    const lineStart = masked.lastIndexOf('\n', lineEnd - 1) + 1;
    const text = masked.substring(lineStart, lineEnd).trim();
    if (!text.startsWith('@')) break;
    const names = Array.from(text.matchAll(/@([\w.]+)/g), (m) => m[1] ?? '').filter(Boolean);
    above.unshift(...names);
    lineEnd = lineStart - 1;
  }

  const inline = Array.from(mods.matchAll(/@([\w.]+)/g), (m) => m[1] ?? '').filter(Boolean);
  return [...above, ...inline].map((name) => name.split('.').pop() ?? name);
}

/**
 * Drop a leading `<...>` type parameter list from a type header
 */
export function stripTypeParameters(header: string): string {
  const trimmed = header.trimStart();
  if (!trimmed.startsWith('<')) return header;
  let depth = 0;
  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] === '<') depth++;
    else if (trimmed[i] === '>') {
      depth--;
      if (depth === 0) return trimmed.substring(i + 1);
    }
  }
  return '';
}

/**
 * Type lists introduced by the given keywords in a type header
 *
 * @example
 * clauseTypes(' extends Base implements A, B<C> ', ['extends', 'implements'])
 * // ['Base', 'A', 'B<C>']
 */
export function clauseTypes(header: string, keywords: string[]): string[] {
  const text = stripTypeParameters(header);
  const pattern = new RegExp(`\\b(${keywords.join('|')})\\b`, 'g');
  const marks = Array.from(text.matchAll(pattern), (m) => ({
    start: m.index ?? 0,
    length: m[0].length,
  }));

  const types: string[] = [];
  marks.forEach((mark, i) => {
    const next = marks[i + 1];
    const clause = text.substring(mark.start + mark.length, next ? next.start : text.length);
    for (const part of splitTopLevel(clause)) {
      const cleaned = normalizeType(part.replace(/[{;]/g, ''));
      if (cleaned) types.push(cleaned);
    }
  });
  return types;
}
