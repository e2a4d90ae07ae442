/**
 * Code Knowledge Graph - Java Parser
 *
 * Walks the tree-sitter-java syntax tree for classes, interfaces, enums,
 * records, methods, constructors, fields, calls and instantiations.
 * Falls back to pattern extraction when the grammar cannot be loaded.
 *
 * @module parser/java-parser
 */

import type { Visibility } from '../types/index.js';
import { baseTypeName, normalizeType, qualify, splitTopLevel } from '../utils/strings.js';
import { BaseLanguageParser, type Extractor } from './base-parser.js';
import { clauseTypes, scanBraceSource, type BraceLanguageRules } from './pattern-scanner.js';
import {
  childOfType,
  childrenOf,
  endLine,
  startLine,
  walk,
  type SyntaxNode,
} from './syntax-node.js';
import type { GrammarProvider } from './tree-sitter-runtime.js';
import type {
  CallSite,
  Declaration,
  DeclaredParameter,
  FileExtraction,
  ParseContext,
  SourceFile,
  TypeLink,
} from './types.js';

// ============================================================================
// SHARED RULES
// ============================================================================

const VISIBILITY_WORDS = ['public', 'private', 'protected'] as const;

/**
 * Members of interfaces and annotation types are implicitly public
 */
function javaVisibility(modifiers: string[], inInterface = false): Visibility {
  return VISIBILITY_WORDS.find((word) => modifiers.includes(word)) ?? (inInterface ? 'public' : 'package');
}

function parseParameters(list: string): DeclaredParameter[] {
  return splitTopLevel(list)
    .map((raw) => raw.replace(/@[\w.]+(?:\([^)]*\))?/g, ' ').replace(/\bfinal\s+/g, '').trim())
    .filter((text) => text.length > 0)
    .map((text) => {
      const match = /^(.*?)\s*([A-Za-z_$][\w$]*)(\s*\[\])*$/s.exec(text);
      const typeText = match?.[1] ?? '';
      const variadic = typeText.includes('...');
      const type = normalizeType(typeText.replace('...', '[]'));
      return {
        name: match?.[2] ?? text,
        ...(type ? { type } : {}),
        ...(variadic ? { variadic: true } : {}),
      };
    });
}

// ============================================================================
// PATTERN FALLBACK
// ============================================================================

const MODIFIER =
  '(?:@[\\w.]+(?:\\([^)\\n]*\\))?|public|private|protected|static|final|abstract|synchronized|native|default|strictfp|transient|volatile|sealed|non-sealed)';

const TYPE = '[\\w$.]+(?:<[^;{}()=\\n]*>)?(?:\\[\\])*';

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
  'synchronized',
  'super',
  'this',
  'else',
  'new',
  'case',
  'assert',
  'package',
  'import',
  'class',
  'interface',
  'enum',
  'record',
]);

export const JAVA_FALLBACK_RULES: BraceLanguageRules = {
  mask: { cStyleComments: true, singleQuotes: true, tripleQuotes: true },
  packagePattern: /^\s*package\s+([\w.]+)\s*;/m,
  typePattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?<keyword>class|interface|@interface|enum|record)\\s+(?<name>[A-Za-z_$][\\w$]*)`,
    'gm'
  ),
  functionPattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?:<[^>\\n]*>\\s+)?(?:(?<type>${TYPE})\\s+)?(?<name>[A-Za-z_$][\\w$]*)\\s*\\(`,
    'gm'
  ),
  fieldPattern: new RegExp(
    `^[ \\t]*(?<mods>(?:${MODIFIER}\\s+)*)(?<type>${TYPE})\\s+(?<name>[A-Za-z_$][\\w$]*)[ \\t]*(?=[=;,])`,
    'gm'
  ),
  reserved: RESERVED,
  typeKind: (keyword) => (keyword.endsWith('interface') ? 'Interface' : 'Class'),
  supertypes: (header) => clauseTypes(header, ['extends', 'implements']),
  parameters: parseParameters,
  visibility: (modifiers, _name, containerKeyword) =>
    javaVisibility(modifiers, containerKeyword?.endsWith('interface')),
  // Methods have a return type; constructors are named after their class
  acceptFunction: (fn) => Boolean(fn.returnType) || fn.name === fn.containerName,
};

// ============================================================================
// AST EXTRACTION
// ============================================================================

const TYPE_DECLARATIONS: Record<string, string> = {
  class_declaration: 'class',
  interface_declaration: 'interface',
  enum_declaration: 'enum',
  record_declaration: 'record',
  annotation_type_declaration: 'interface',
};

const BODY_TYPES = new Set(['class_body', 'interface_body', 'enum_body', 'enum_body_declarations', 'annotation_type_body']);

interface Scope {
  containerIndex?: number;
  qualifiedName?: string;
  inInterface?: boolean;
}

class JavaTreeExtractor {
  private readonly declarations: Declaration[] = [];
  private readonly calls: CallSite[] = [];
  private readonly typeLinks: TypeLink[] = [];
  private packageName?: string;

  extract(root: SyntaxNode): FileExtraction {
    for (const child of childrenOf(root)) {
      if (child.type === 'package_declaration') {
        const name = childOfType(child, 'scoped_identifier', 'identifier');
        if (name) this.packageName = name.text;
      }
    }
    this.visitMembers(root, { qualifiedName: this.packageName });

    return {
      ...(this.packageName ? { packageName: this.packageName } : {}),
      declarations: this.declarations,
      calls: this.calls,
      typeLinks: this.typeLinks,
    };
  }

  private visitMembers(node: SyntaxNode, scope: Scope): void {
    for (const child of childrenOf(node)) {
      if (TYPE_DECLARATIONS[child.type]) {
        this.visitType(child, scope);
      } else if (child.type === 'method_declaration' || child.type === 'constructor_declaration') {
        this.visitMethod(child, scope);
      } else if (child.type === 'field_declaration' || child.type === 'constant_declaration') {
        this.visitField(child, scope);
      } else if (BODY_TYPES.has(child.type)) {
        this.visitMembers(child, scope);
      }
    }
  }

  private visitType(node: SyntaxNode, scope: Scope): void {
    const name = node.childForFieldName('name')?.text;
    if (!name) return;

    const keyword = TYPE_DECLARATIONS[node.type] ?? 'class';
    const modifiers = modifiersOf(node);
    const index = this.declarations.length;
    const qualifiedName = qualify(scope.qualifiedName, name);

    this.declarations.push({
      kind: keyword === 'interface' ? 'Interface' : 'Class',
      name,
      qualifiedName,
      ...(scope.containerIndex !== undefined ? { containerIndex: scope.containerIndex } : {}),
      startLine: startLine(node),
      endLine: endLine(node),
      visibility: javaVisibility(modifiers.keywords, scope.inInterface),
      modifiers: modifiers.keywords,
      annotations: modifiers.annotations,
    });

    for (const supertype of supertypesOf(node)) {
      this.typeLinks.push({ fromIndex: index, targetName: supertype, kind: 'supertype', line: startLine(node) });
    }

    const inner: Scope = { containerIndex: index, qualifiedName, inInterface: keyword === 'interface' };

    // Record components are fields
    const components = node.type === 'record_declaration' ? node.childForFieldName('parameters') : null;
    for (const param of components ? parametersOf(components) : []) {
      this.declarations.push({
        kind: 'Field',
        name: param.name,
        qualifiedName: qualify(qualifiedName, param.name),
        containerIndex: index,
        startLine: startLine(node),
        endLine: startLine(node),
        visibility: 'private',
        modifiers: ['final'],
        annotations: [],
        ...(param.type ? { valueType: param.type } : {}),
      });
    }

    const body = node.childForFieldName('body');
    if (body) this.visitMembers(body, inner);
  }

  private visitMethod(node: SyntaxNode, scope: Scope): void {
    const name = node.childForFieldName('name')?.text;
    if (!name) return;

    const modifiers = modifiersOf(node);
    const paramsNode = node.childForFieldName('parameters');
    const parameters = paramsNode ? parametersOf(paramsNode) : [];
    const typeNode = node.childForFieldName('type');
    const index = this.declarations.length;

    this.declarations.push({
      kind: 'Method',
      name,
      qualifiedName: qualify(scope.qualifiedName, name),
      ...(scope.containerIndex !== undefined ? { containerIndex: scope.containerIndex } : {}),
      startLine: startLine(node),
      endLine: endLine(node),
      visibility: javaVisibility(modifiers.keywords, scope.inInterface),
      modifiers: modifiers.keywords,
      annotations: modifiers.annotations,
      parameters,
      ...(typeNode ? { returnType: normalizeType(typeNode.text) } : {}),
    });

    const body = node.childForFieldName('body');
    if (body) this.visitBody(body, index, parameters);
  }

  private visitField(node: SyntaxNode, scope: Scope): void {
    const modifiers = modifiersOf(node);
    const typeNode = node.childForFieldName('type');
    const valueType = typeNode ? normalizeType(typeNode.text) : undefined;

    for (const declarator of childrenOf(node).filter((c) => c.type === 'variable_declarator')) {
      const name = declarator.childForFieldName('name')?.text;
      if (!name) continue;
      this.declarations.push({
        kind: 'Field',
        name,
        qualifiedName: qualify(scope.qualifiedName, name),
        ...(scope.containerIndex !== undefined ? { containerIndex: scope.containerIndex } : {}),
        startLine: startLine(node),
        endLine: endLine(node),
        visibility: javaVisibility(modifiers.keywords, scope.inInterface),
        modifiers: modifiers.keywords,
        annotations: modifiers.annotations,
        ...(valueType ? { valueType } : {}),
      });
    }
  }

  /**
   * Calls, instantiations and local variable types of one method body
   */
  private visitBody(body: SyntaxNode, callerIndex: number, parameters: DeclaredParameter[]): void {
    const localTypes = new Map<string, string>();
    for (const param of parameters) {
      if (param.type) localTypes.set(param.name, param.type);
    }

    walk(body, (node) => {
      if (node.type === 'local_variable_declaration') {
        const type = node.childForFieldName('type');
        if (type && type.text !== 'var') {
          for (const declarator of childrenOf(node).filter((c) => c.type === 'variable_declarator')) {
            const name = declarator.childForFieldName('name')?.text;
            if (name) localTypes.set(name, normalizeType(type.text));
          }
          this.typeLinks.push({
            fromIndex: callerIndex,
            targetName: type.text,
            kind: 'reference',
            line: startLine(node),
          });
        }
        return;
      }

      if (node.type === 'method_invocation') {
        const name = node.childForFieldName('name')?.text;
        if (!name) return;
        this.calls.push({
          callerIndex,
          name,
          ...receiverOf(node.childForFieldName('object'), localTypes),
          arity: argumentCount(node),
          line: startLine(node),
        });
        return;
      }

      if (node.type === 'object_creation_expression') {
        const type = node.childForFieldName('type');
        if (!type) return;
        this.calls.push({
          callerIndex,
          name: baseTypeName(type.text),
          hasReceiver: false,
          arity: argumentCount(node),
          line: startLine(node),
        });
      }
    });
  }
}

function modifiersOf(node: SyntaxNode): { keywords: string[]; annotations: string[] } {
  const modifiers = childOfType(node, 'modifiers');
  if (!modifiers) return { keywords: [], annotations: [] };

  const annotations = childrenOf(modifiers)
    .filter((c) => c.type === 'marker_annotation' || c.type === 'annotation')
    .map((c) => baseTypeName(c.childForFieldName('name')?.text ?? c.text.replace(/^@/, '')));

  const keywords = modifiers.text
    .replace(/@[\w.]+(?:\s*\([^)]*\))?/g, ' ')
    .split(/\s+/)
    .filter(Boolean);

  return { keywords, annotations };
}

function supertypesOf(node: SyntaxNode): string[] {
  const result: string[] = [];
  for (const child of childrenOf(node)) {
    if (child.type === 'superclass') {
      const type = childrenOf(child)[0];
      if (type) result.push(normalizeType(type.text));
    } else if (child.type === 'super_interfaces' || child.type === 'extends_interfaces') {
      const list = childOfType(child, 'type_list') ?? child;
      for (const type of childrenOf(list)) result.push(normalizeType(type.text));
    }
  }
  return result;
}

function parametersOf(node: SyntaxNode): DeclaredParameter[] {
  const result: DeclaredParameter[] = [];
  for (const param of childrenOf(node)) {
    if (param.type === 'formal_parameter') {
      const name = param.childForFieldName('name')?.text;
      const type = param.childForFieldName('type')?.text;
      if (name) result.push({ name, ...(type ? { type: normalizeType(type) } : {}) });
    } else if (param.type === 'spread_parameter') {
      const declarator = childOfType(param, 'variable_declarator');
      const name = declarator?.childForFieldName('name')?.text ?? declarator?.text;
      const type = childrenOf(param).find((c) => c.type !== 'modifiers' && c.type !== 'variable_declarator');
      if (name) {
        result.push({ name, ...(type ? { type: `${normalizeType(type.text)}[]` } : {}), variadic: true });
      }
    }
  }
  return result;
}

function receiverOf(
  object: SyntaxNode | null,
  localTypes: ReadonlyMap<string, string>
): Pick<CallSite, 'hasReceiver' | 'receiver' | 'receiverType'> {
  if (!object) return { hasReceiver: false };

  if (object.type === 'this' || object.type === 'super') {
    return { hasReceiver: true, receiver: object.type };
  }

  if (object.type === 'identifier') {
    const receiverType = localTypes.get(object.text);
    return { hasReceiver: true, receiver: object.text, ...(receiverType ? { receiverType } : {}) };
  }

  // this.field.call()
  if (object.type === 'field_access' && object.childForFieldName('object')?.type === 'this') {
    const field = object.childForFieldName('field')?.text;
    return field ? { hasReceiver: true, receiver: field } : { hasReceiver: true };
  }

  return { hasReceiver: true };
}

function argumentCount(node: SyntaxNode): number | null {
  const args = node.childForFieldName('arguments');
  return args ? childrenOf(args).length : null;
}

// ============================================================================
// PARSER
// ============================================================================

export class JavaParser extends BaseLanguageParser {
  readonly language = 'java';
  readonly extensions = ['.java'];
  readonly version = 'java-tree-sitter/1';

  constructor(private readonly grammars?: GrammarProvider) {
    super();
  }

  protected async createExtractor(context: ParseContext): Promise<Extractor> {
    const parser = this.grammars ? await this.grammars.createParser('tree-sitter-java.wasm') : null;

    if (!parser) {
      context.logger.debug('Java grammar unavailable, using pattern extraction');
      return {
        extract: (file: SourceFile) => scanBraceSource(file, JAVA_FALLBACK_RULES),
        usedFallback: true,
      };
    }

    return {
      extract: (file: SourceFile) =>
        parser.parse(file.content, (root) => new JavaTreeExtractor().extract(root)) ??
        scanBraceSource(file, JAVA_FALLBACK_RULES),
      usedFallback: false,
      dispose: () => parser.dispose(),
    };
  }
}

/**
 * Extract from an already parsed tree
 */
export function extractJavaTree(root: SyntaxNode): FileExtraction {
  return new JavaTreeExtractor().extract(root);
}
