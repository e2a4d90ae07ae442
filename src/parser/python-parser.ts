/**
 * Code Knowledge Graph - Python Parser
 *
 * Walks the tree-sitter-python syntax tree for classes, functions and
 * methods, class attributes, `self.x` attributes assigned in `__init__`,
 * and calls. Falls back to an indentation-based scanner when the grammar
 * cannot be loaded.
 *
 * Qualified names start from the module path: `pkg/orders.py` declares
 * `pkg.orders.Order`; `pkg/__init__.py` declares `pkg.X`.
 *
 * @module parser/python-parser
 */

import type { Visibility } from '../types/index.js';
import { normalizeType, qualify, splitTopLevel } from '../utils/strings.js';
import { BaseLanguageParser, type Extractor } from './base-parser.js';
import { collectCalls } from './pattern-scanner.js';
import { LineIndex, maskSource, matchBracket } from './source-text.js';
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

const RESERVED: ReadonlySet<string> = new Set([
  'if',
  'elif',
  'while',
  'for',
  'with',
  'return',
  'not',
  'and',
  'or',
  'in',
  'is',
  'lambda',
  'yield',
  'await',
  'assert',
  'del',
  'raise',
  'except',
  'def',
  'class',
]);

const SELF_NAMES = new Set(['self', 'cls']);

/**
 * `__x__` is public, `__x` private, `_x` protected
 */
export function pythonVisibility(name: string): Visibility {
  if (/^__\w+__$/.test(name)) return 'public';
  if (name.startsWith('__')) return 'private';
  if (name.startsWith('_')) return 'protected';
  return 'public';
}

/**
 * Dotted module name of a file path
 */
export function moduleName(filePath: string): string {
  return filePath
    .replace(/\.pyi?$/, '')
    .split('/')
    .filter(Boolean)
    .join('.')
    .replace(/(^|\.)__init__$/, '');
}

function dropSelf(parameters: DeclaredParameter[], inClass: boolean, decorators: string[]): DeclaredParameter[] {
  if (!inClass || decorators.includes('staticmethod')) return parameters;
  const [first, ...rest] = parameters;
  return first && SELF_NAMES.has(first.name) ? rest : parameters;
}

/**
 * Constructor-call type of an assigned value (`Repo(...)`)
 */
function constructedType(value: string): string | undefined {
  return /^\s*([A-Z]\w*)\s*\(/.exec(value)?.[1];
}

// ============================================================================
// AST EXTRACTION
// ============================================================================

/**
 * Compound statements whose blocks declare into the enclosing scope
 * (`if TYPE_CHECKING:`, `try: ... except ImportError:`)
 */
const TRANSPARENT_STATEMENTS = new Set([
  'if_statement',
  'elif_clause',
  'else_clause',
  'try_statement',
  'except_clause',
  'except_group_clause',
  'finally_clause',
  'with_statement',
]);

interface PythonScope {
  containerIndex?: number;
  qualifiedName?: string;
}

class PythonTreeExtractor {
  private readonly declarations: Declaration[] = [];
  private readonly calls: CallSite[] = [];
  private readonly typeLinks: TypeLink[] = [];

  constructor(private readonly module: string) {}

  extract(root: SyntaxNode): FileExtraction {
    this.visitBlock(root, { qualifiedName: this.module || undefined });
    return {
      ...(this.module ? { packageName: this.module } : {}),
      declarations: this.declarations,
      calls: this.calls,
      typeLinks: this.typeLinks,
    };
  }

  private visitBlock(block: SyntaxNode, scope: PythonScope): void {
    for (const child of childrenOf(block)) {
      this.visitStatement(child, scope, []);
    }
  }

  private visitStatement(node: SyntaxNode, scope: PythonScope, decorators: string[]): void {
    if (node.type === 'decorated_definition') {
      const names = childrenOf(node)
        .filter((c) => c.type === 'decorator')
        .map(decoratorName)
        .filter((name): name is string => Boolean(name));
      const definition = node.childForFieldName('definition');
      if (definition) this.visitStatement(definition, scope, names);
      return;
    }

    if (TRANSPARENT_STATEMENTS.has(node.type)) {
      for (const child of childrenOf(node)) {
        if (child.type === 'block') this.visitBlock(child, scope);
        else if (TRANSPARENT_STATEMENTS.has(child.type)) this.visitStatement(child, scope, []);
      }
      return;
    }

    if (node.type === 'class_definition') {
      this.visitClass(node, scope, decorators);
    } else if (node.type === 'function_definition') {
      this.visitFunction(node, scope, decorators);
    } else if (node.type === 'expression_statement' && scope.containerIndex !== undefined) {
      const assignment = childOfType(node, 'assignment');
      if (assignment) this.visitClassAttribute(assignment, scope);
    }
  }

  private visitClass(node: SyntaxNode, scope: PythonScope, decorators: string[]): void {
    const name = node.childForFieldName('name')?.text;
    if (!name) return;

    const index = this.declarations.length;
    const qualifiedName = qualify(scope.qualifiedName, name);
    this.declarations.push({
      kind: 'Class',
      name,
      qualifiedName,
      ...(scope.containerIndex !== undefined ? { containerIndex: scope.containerIndex } : {}),
      startLine: startLine(node),
      endLine: endLine(node),
      visibility: pythonVisibility(name),
      modifiers: [],
      annotations: decorators,
    });

    const bases = node.childForFieldName('superclasses');
    for (const base of bases ? childrenOf(bases) : []) {
      if (base.type !== 'identifier' && base.type !== 'attribute') continue;
      this.typeLinks.push({ fromIndex: index, targetName: base.text, kind: 'supertype', line: startLine(node) });
    }

    const body = node.childForFieldName('body');
    if (body) this.visitBlock(body, { containerIndex: index, qualifiedName });
  }

  private visitFunction(node: SyntaxNode, scope: PythonScope, decorators: string[]): void {
    const name = node.childForFieldName('name')?.text;
    if (!name) return;

    const inClass = scope.containerIndex !== undefined;
    const paramsNode = node.childForFieldName('parameters');
    const parameters = dropSelf(paramsNode ? parametersOf(paramsNode) : [], inClass, decorators);
    const returnType = node.childForFieldName('return_type')?.text;
    const isAsync = /^async\b/.test(node.text);
    const index = this.declarations.length;

    this.declarations.push({
      kind: 'Method',
      name,
      qualifiedName: qualify(scope.qualifiedName, name),
      ...(scope.containerIndex !== undefined ? { containerIndex: scope.containerIndex } : {}),
      startLine: startLine(node),
      endLine: endLine(node),
      visibility: pythonVisibility(name),
      modifiers: isAsync ? ['async'] : [],
      annotations: decorators,
      parameters,
      ...(returnType ? { returnType: normalizeType(returnType) } : {}),
    });

    const body = node.childForFieldName('body');
    if (!body) return;

    if (name === '__init__' && scope.containerIndex !== undefined) {
      this.visitInitAttributes(body, scope);
    }
    this.visitBody(body, index, parameters);
  }

  private visitClassAttribute(assignment: SyntaxNode, scope: PythonScope): void {
    const left = assignment.childForFieldName('left');
    if (!left || left.type !== 'identifier') return;

    const annotation = assignment.childForFieldName('type')?.text;
    const right = assignment.childForFieldName('right')?.text;
    this.addField(left.text, annotation ?? (right ? constructedType(right) : undefined), assignment, scope);
  }

  private visitInitAttributes(body: SyntaxNode, scope: PythonScope): void {
    walk(body, (node) => {
      if (node.type === 'function_definition' || node.type === 'class_definition') return false;
      if (node.type !== 'assignment') return;

      const left = node.childForFieldName('left');
      if (left?.type !== 'attribute' || left.childForFieldName('object')?.text !== 'self') return;
      const attribute = left.childForFieldName('attribute')?.text;
      if (!attribute) return;

      const annotation = node.childForFieldName('type')?.text;
      const right = node.childForFieldName('right')?.text;
      this.addField(attribute, annotation ?? (right ? constructedType(right) : undefined), node, scope);
    });
  }

  private addField(name: string, valueType: string | undefined, node: SyntaxNode, scope: PythonScope): void {
    const qualifiedName = qualify(scope.qualifiedName, name);
    if (this.declarations.some((d) => d.kind === 'Field' && d.qualifiedName === qualifiedName)) return;

    this.declarations.push({
      kind: 'Field',
      name,
      qualifiedName,
      ...(scope.containerIndex !== undefined ? { containerIndex: scope.containerIndex } : {}),
      startLine: startLine(node),
      endLine: endLine(node),
      visibility: pythonVisibility(name),
      modifiers: [],
      annotations: [],
      ...(valueType ? { valueType: normalizeType(valueType) } : {}),
    });
  }

  private visitBody(body: SyntaxNode, callerIndex: number, parameters: DeclaredParameter[]): void {
    const localTypes = new Map<string, string>();
    for (const param of parameters) {
      if (param.type) localTypes.set(param.name, param.type);
    }

    walk(body, (node) => {
      if (node.type !== 'call') return;
      const fn = node.childForFieldName('function');
      if (!fn) return;

      const args = node.childForFieldName('arguments');
      const arity = args ? childrenOf(args).filter((c) => c.type !== 'comment').length : null;

      if (fn.type === 'identifier') {
        this.calls.push({ callerIndex, name: fn.text, hasReceiver: false, arity, line: startLine(node) });
        return;
      }

      if (fn.type === 'attribute') {
        const name = fn.childForFieldName('attribute')?.text;
        if (!name) return;
        this.calls.push({
          callerIndex,
          name,
          ...attributeReceiver(fn.childForFieldName('object'), localTypes),
          arity,
          line: startLine(node),
        });
      }
    });
  }
}

function decoratorName(decorator: SyntaxNode): string | undefined {
  const expression = childrenOf(decorator)[0];
  if (!expression) return undefined;
  const target = expression.type === 'call' ? expression.childForFieldName('function') : expression;
  return target?.text.split('.').pop();
}

function parametersOf(node: SyntaxNode): DeclaredParameter[] {
  const result: DeclaredParameter[] = [];
  for (const param of childrenOf(node)) {
    switch (param.type) {
      case 'identifier':
        result.push({ name: param.text });
        break;
      case 'typed_parameter': {
        const target = childOfType(param, 'identifier', 'list_splat_pattern', 'dictionary_splat_pattern');
        const type = param.childForFieldName('type')?.text;
        if (!target) break;
        const variadic = target.type !== 'identifier';
        result.push({
          name: target.text.replace(/^\*+/, ''),
          ...(type ? { type: normalizeType(type) } : {}),
          ...(variadic ? { variadic: true } : {}),
        });
        break;
      }
      case 'default_parameter':
      case 'typed_default_parameter': {
        const name = param.childForFieldName('name')?.text;
        const type = param.childForFieldName('type')?.text;
        if (name) result.push({ name, ...(type ? { type: normalizeType(type) } : {}), optional: true });
        break;
      }
      case 'list_splat_pattern':
      case 'dictionary_splat_pattern':
        result.push({ name: param.text.replace(/^\*+/, ''), variadic: true });
        break;
      default:
        break;
    }
  }
  return result;
}

function attributeReceiver(
  object: SyntaxNode | null,
  localTypes: ReadonlyMap<string, string>
): Pick<CallSite, 'hasReceiver' | 'receiver' | 'receiverType'> {
  if (!object) return { hasReceiver: true };

  if (object.type === 'identifier') {
    const receiverType = localTypes.get(object.text);
    return { hasReceiver: true, receiver: object.text, ...(receiverType ? { receiverType } : {}) };
  }

  // self.repo.save()
  if (object.type === 'attribute' && object.childForFieldName('object')?.text === 'self') {
    const attribute = object.childForFieldName('attribute')?.text;
    return attribute ? { hasReceiver: true, receiver: attribute } : { hasReceiver: true };
  }

  return { hasReceiver: true };
}

// ============================================================================
// INDENTATION FALLBACK
// ============================================================================

interface Statement {
  start: number;
  end: number;
  indent: number;
  text: string;
}

interface Block {
  indent: number;
  kind: 'class' | 'def' | 'nested';
  /** Declaration index, or the enclosing def's index for nested blocks */
  index?: number;
  qualifiedName?: string;
  isInit?: boolean;
}

const CLASS_HEADER = /^class\s+([A-Za-z_]\w*)\s*(\()?/;
const DEF_HEADER = /^(async\s+)?def\s+([A-Za-z_]\w*)\s*\(/;
const CLASS_ATTRIBUTE = /^([A-Za-z_]\w*)\s*(?::\s*([^=]+?))?\s*(?:=(?!=)\s*([\s\S]*))?$/;
const SELF_ATTRIBUTE = /^self\.([A-Za-z_]\w*)\s*(?::\s*([^=]+?))?\s*=(?!=)\s*([\s\S]*)$/;

/**
 * Split masked source into logical statements (bracketed continuation
 * lines joined)
 */
function statementsOf(masked: string): Statement[] {
  const statements: Statement[] = [];
  let offset = 0;

  while (offset < masked.length) {
    const lineEnd = masked.indexOf('\n', offset);
    const stop = lineEnd === -1 ? masked.length : lineEnd;
    const line = masked.substring(offset, stop);
    const trimmed = line.trim();

    if (!trimmed) {
      offset = stop + 1;
      continue;
    }

    let depth = 0;
    let end = offset;
    for (; end < masked.length; end++) {
      const ch = masked[end];
      if (ch === '(' || ch === '[' || ch === '{') depth++;
      else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
      else if (ch === '\n' && depth === 0 && masked[end - 1] !== '\\') break;
    }

    const indent = line.length - line.trimStart().length;
    statements.push({ start: offset + indent, end, indent, text: masked.substring(offset + indent, end) });
    offset = end + 1;
  }

  return statements;
}

function parseParameterList(list: string): DeclaredParameter[] {
  const result: DeclaredParameter[] = [];
  for (const raw of splitTopLevel(list)) {
    const text = raw.trim();
    if (!text || text === '*' || text === '/') continue;

    const variadic = text.startsWith('*');
    const [declaration = '', ...defaults] = splitTopLevel(text.replace(/^\*+/, ''), '=');
    const colon = declaration.indexOf(':');
    const name = (colon === -1 ? declaration : declaration.substring(0, colon)).trim();
    const type = colon === -1 ? undefined : normalizeType(declaration.substring(colon + 1));

    result.push({
      name,
      ...(type ? { type } : {}),
      ...(defaults.length > 0 ? { optional: true } : {}),
      ...(variadic ? { variadic: true } : {}),
    });
  }
  return result;
}

/**
 * Offset of the first `:` outside brackets at or after `from`
 */
function headerColon(masked: string, from: number, to: number): number {
  let depth = 0;
  for (let i = from; i < to; i++) {
    const ch = masked[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') depth = Math.max(0, depth - 1);
    else if (ch === ':' && depth === 0) return i;
  }
  return -1;
}

/**
 * Indentation-based extraction used without the grammar
 */
export function scanPythonSource(file: SourceFile): FileExtraction {
  const masked = maskSource(file.content, { hashComments: true, tripleQuotes: true, singleQuotes: true });
  const lines = new LineIndex(file.content);
  const module = moduleName(file.path);

  const declarations: Declaration[] = [];
  const calls: CallSite[] = [];
  const typeLinks: TypeLink[] = [];
  const stack: Block[] = [];
  let decorators: string[] = [];
  let lastLine = 1;

  const closeBlocks = (indent: number): void => {
    while (stack.length > 0) {
      const top = stack[stack.length - 1];
      if (!top || top.indent < indent) break;
      stack.pop();
      const decl = top.kind !== 'nested' && top.index !== undefined ? declarations[top.index] : undefined;
      if (decl) decl.endLine = Math.max(decl.startLine, lastLine);
    }
  };

  const enclosingDef = (): Block | undefined => [...stack].reverse().find((b) => b.kind === 'def' || b.kind === 'nested');
  const enclosingClass = (): Block | undefined => {
    const top = stack[stack.length - 1];
    return top?.kind === 'class' ? top : undefined;
  };

  for (const statement of statementsOf(masked)) {
    closeBlocks(statement.indent);
    const line = lines.lineOf(statement.start);
    const def = enclosingDef();
    const owner = enclosingClass();
    const scopeName = owner ? owner.qualifiedName : module || undefined;

    if (statement.text.startsWith('@')) {
      const name = /^@([\w.]+)/.exec(statement.text)?.[1];
      if (name) decorators.push(name.split('.').pop() ?? name);
      lastLine = lines.lineOf(statement.end);
      continue;
    }

    const classMatch = CLASS_HEADER.exec(statement.text);
    const defMatch = DEF_HEADER.exec(statement.text);

    if ((classMatch || defMatch) && def) {
      // Local class or function: its calls belong to the enclosing def
      stack.push({ indent: statement.indent, kind: 'nested', index: def.index });
      const colon = headerColon(masked, statement.start, statement.end);
      if (colon !== -1 && def.index !== undefined) {
        collectCalls(masked, colon + 1, statement.end, def.index, RESERVED, lines, calls);
      }
    } else if (classMatch) {
      const name = classMatch[1] ?? '';
      const index = declarations.length;
      const qualifiedName = qualify(scopeName, name);
      declarations.push({
        kind: 'Class',
        name,
        qualifiedName,
        ...(owner?.index !== undefined ? { containerIndex: owner.index } : {}),
        startLine: line,
        endLine: line,
        visibility: pythonVisibility(name),
        modifiers: [],
        annotations: decorators,
      });

      if (classMatch[2]) {
        const open = statement.start + (classMatch[0].length - 1);
        const bases = masked.substring(open + 1, matchBracket(masked, open) - 1);
        for (const base of splitTopLevel(bases)) {
          if (base.includes('=')) continue;
          typeLinks.push({ fromIndex: index, targetName: base.trim(), kind: 'supertype', line });
        }
      }
      stack.push({ indent: statement.indent, kind: 'class', index, qualifiedName });
    } else if (defMatch) {
      const name = defMatch[2] ?? '';
      const open = statement.start + defMatch[0].length - 1;
      const close = matchBracket(masked, open);
      const parameters = dropSelf(parseParameterList(masked.substring(open + 1, close - 1)), Boolean(owner), decorators);
      const colon = headerColon(masked, close, statement.end);
      const arrow = /^\s*->\s*([\s\S]+?)\s*$/.exec(masked.substring(close, colon === -1 ? statement.end : colon));
      const index = declarations.length;

      declarations.push({
        kind: 'Method',
        name,
        qualifiedName: qualify(scopeName, name),
        ...(owner?.index !== undefined ? { containerIndex: owner.index } : {}),
        startLine: line,
        endLine: line,
        visibility: pythonVisibility(name),
        modifiers: defMatch[1] ? ['async'] : [],
        annotations: decorators,
        parameters,
        ...(arrow?.[1] ? { returnType: normalizeType(arrow[1]) } : {}),
      });

      // One-line body after the colon
      if (colon !== -1) collectCalls(masked, colon + 1, statement.end, index, RESERVED, lines, calls);
      stack.push({
        indent: statement.indent,
        kind: 'def',
        index,
        ...(owner?.qualifiedName ? { qualifiedName: owner.qualifiedName } : {}),
        isInit: name === '__init__' && owner !== undefined,
      });
    } else if (def) {
      if (def.index !== undefined) {
        collectCalls(masked, statement.start, statement.end, def.index, RESERVED, lines, calls);
      }
      const attribute = def.isInit ? SELF_ATTRIBUTE.exec(statement.text) : null;
      const initOwner = [...stack].reverse().find((b) => b.kind === 'class');
      if (attribute?.[1] && initOwner?.index !== undefined) {
        addScannedField(declarations, attribute[1], attribute[2] ?? constructedType(attribute[3] ?? ''), line, initOwner);
      }
    } else if (owner) {
      const attribute = CLASS_ATTRIBUTE.exec(statement.text);
      if (attribute?.[1] && (attribute[2] || attribute[3] !== undefined)) {
        addScannedField(declarations, attribute[1], attribute[2] ?? constructedType(attribute[3] ?? ''), line, owner);
      }
    }

    if (!statement.text.startsWith('@')) decorators = [];
    lastLine = lines.lineOf(statement.end);
  }
  closeBlocks(0);

  return {
    ...(module ? { packageName: module } : {}),
    declarations,
    calls,
    typeLinks,
  };
}

function addScannedField(
  declarations: Declaration[],
  name: string,
  valueType: string | undefined,
  line: number,
  owner: Block
): void {
  const qualifiedName = qualify(owner.qualifiedName, name);
  if (declarations.some((d) => d.kind === 'Field' && d.qualifiedName === qualifiedName)) return;

  declarations.push({
    kind: 'Field',
    name,
    qualifiedName,
    ...(owner.index !== undefined ? { containerIndex: owner.index } : {}),
    startLine: line,
    endLine: line,
    visibility: pythonVisibility(name),
    modifiers: [],
    annotations: [],
    ...(valueType ? { valueType: normalizeType(valueType) } : {}),
  });
}

// ============================================================================
// PARSER
// ============================================================================

export class PythonParser extends BaseLanguageParser {
  readonly language = 'python';
  readonly extensions = ['.py', '.pyi'];
  readonly version = 'python-tree-sitter/1';

  constructor(private readonly grammars?: GrammarProvider) {
    super();
  }

  protected async createExtractor(context: ParseContext): Promise<Extractor> {
    const parser = this.grammars ? await this.grammars.createParser('tree-sitter-python.wasm') : null;

    if (!parser) {
      context.logger.debug('Python grammar unavailable, using indentation scanner');
      return { extract: scanPythonSource, usedFallback: true };
    }

    return {
      extract: (file: SourceFile) =>
        parser.parse(file.content, (root) => new PythonTreeExtractor(moduleName(file.path)).extract(root)) ??
        scanPythonSource(file),
      usedFallback: false,
      dispose: () => parser.dispose(),
    };
  }
}

/**
 * Extract from an already parsed tree
 */
export function extractPythonTree(root: SyntaxNode, filePath: string): FileExtraction {
  return new PythonTreeExtractor(moduleName(filePath)).extract(root);
}
