/**
 * Tests for Python extraction: indentation scanner and syntax-tree walk
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  extractPythonTree,
  moduleName,
  pythonVisibility,
  PythonParser,
  scanPythonSource,
} from '../src/parser/python-parser.js';
import type { SyntaxNode } from '../src/parser/syntax-node.js';
import { TreeSitterRuntime } from '../src/parser/tree-sitter-runtime.js';
import { leaf, node } from './helpers/syntax.js';
import { parseContext, recordingLogger } from './helpers/context.js';

const ORDERS = `from shop.repo import Repo


class Order(Base):
    status = "new"

    def __init__(self, repo: Repo):
        self.repo = repo
        self._items = Items()

    @property
    def total(self) -> int:
        return self.repo.sum(1)

    def __hidden(self, *args):
        pass


def helper():
    order = Order(None)
    return order
`;

describe('moduleName', () => {
  it('should turn a file path into a dotted module', () => {
    expect(moduleName('shop/orders.py')).toBe('shop.orders');
    expect(moduleName('shop/__init__.py')).toBe('shop');
    expect(moduleName('stubs/api.pyi')).toBe('stubs.api');
  });
});

describe('pythonVisibility', () => {
  it('should follow underscore naming conventions', () => {
    expect(pythonVisibility('__init__')).toBe('public');
    expect(pythonVisibility('__secret')).toBe('private');
    expect(pythonVisibility('_internal')).toBe('protected');
    expect(pythonVisibility('run')).toBe('public');
  });
});

describe('scanPythonSource', () => {
  const extraction = scanPythonSource({ path: 'shop/orders.py', content: ORDERS });

  it('should find classes, attributes and functions by indentation', () => {
    expect(extraction.packageName).toBe('shop.orders');
    expect(extraction.declarations.map((d) => `${d.kind} ${d.qualifiedName} ${d.startLine}-${d.endLine}`)).toEqual([
      'Class shop.orders.Order 4-16',
      'Field shop.orders.Order.status 5-5',
      'Method shop.orders.Order.__init__ 7-9',
      'Field shop.orders.Order.repo 8-8',
      'Field shop.orders.Order._items 9-9',
      'Method shop.orders.Order.total 12-13',
      'Method shop.orders.Order.__hidden 15-16',
      'Method shop.orders.helper 19-21',
    ]);
  });

  it('should drop self, keep decorators and read annotations', () => {
    const byName = new Map(extraction.declarations.map((d) => [d.name, d]));

    expect(byName.get('__init__')?.parameters).toEqual([{ name: 'repo', type: 'Repo' }]);
    expect(byName.get('total')?.parameters).toEqual([]);
    expect(byName.get('total')?.annotations).toEqual(['property']);
    expect(byName.get('total')?.returnType).toBe('int');
    expect(byName.get('__hidden')?.parameters).toEqual([{ name: 'args', variadic: true }]);
    expect(byName.get('__hidden')?.visibility).toBe('private');
    expect(byName.get('_items')?.visibility).toBe('protected');
    expect(byName.get('_items')?.valueType).toBe('Items');
    expect(byName.get('helper')?.containerIndex).toBeUndefined();
  });

  it('should report bases and calls', () => {
    expect(extraction.typeLinks).toEqual([{ fromIndex: 0, targetName: 'Base', kind: 'supertype', line: 4 }]);
    expect(extraction.calls).toEqual([
      { callerIndex: 2, name: 'Items', hasReceiver: false, arity: 0, line: 9 },
      { callerIndex: 5, name: 'sum', hasReceiver: true, receiver: 'repo', arity: 1, line: 13 },
      { callerIndex: 7, name: 'Order', hasReceiver: false, arity: 1, line: 20 },
    ]);
  });

  it('should keep self for static methods', () => {
    const source = 'class Util:\n    @staticmethod\n    def parse(self, text):\n        pass\n';
    const { declarations } = scanPythonSource({ path: 'util.py', content: source });

    expect(declarations[1]?.parameters).toEqual([{ name: 'self' }, { name: 'text' }]);
    expect(declarations[1]?.annotations).toEqual(['staticmethod']);
  });
});

/**
 * class Repo:
 *     def save(self, item: Item):
 *         self.validate(item)
 *
 *     @staticmethod
 *     def validate(item) -> bool:
 *         pass
 */
function repoTree(): SyntaxNode {
  const save = node('function_definition', {
    row: 1,
    endRow: 2,
    fields: {
      name: leaf('identifier', 'save'),
      parameters: node('parameters', {
        children: [
          leaf('identifier', 'self'),
          node('typed_parameter', {
            children: [leaf('identifier', 'item')],
            fields: { type: leaf('type', 'Item') },
          }),
        ],
      }),
      body: node('block', {
        row: 2,
        children: [
          node('expression_statement', {
            row: 2,
            children: [
              node('call', {
                row: 2,
                fields: {
                  function: node('attribute', {
                    fields: { object: leaf('identifier', 'self'), attribute: leaf('identifier', 'validate') },
                  }),
                  arguments: node('argument_list', { children: [leaf('identifier', 'item')] }),
                },
              }),
            ],
          }),
        ],
      }),
    },
  });

  const validate = node('decorated_definition', {
    row: 4,
    endRow: 6,
    children: [node('decorator', { children: [leaf('identifier', 'staticmethod')] })],
    fields: {
      definition: node('function_definition', {
        row: 5,
        endRow: 6,
        fields: {
          name: leaf('identifier', 'validate'),
          parameters: node('parameters', { children: [leaf('identifier', 'item')] }),
          return_type: leaf('type', 'bool'),
          body: node('block', { row: 6, children: [leaf('pass_statement', 'pass')] }),
        },
      }),
    },
  });

  return node('module', {
    endRow: 6,
    children: [
      node('class_definition', {
        endRow: 6,
        fields: {
          name: leaf('identifier', 'Repo'),
          body: node('block', { row: 1, endRow: 6, children: [save, validate] }),
        },
      }),
    ],
  });
}

/**
 * try:
 *     from speedups import Codec
 * except ImportError:
 *     class Codec:
 *         pass
 * if TYPE_CHECKING:
 *     def hint():
 *         pass
 */
function conditionalTree(): SyntaxNode {
  const fallbackCodec = node('class_definition', {
    row: 3,
    endRow: 4,
    fields: {
      name: leaf('identifier', 'Codec', 3),
      body: node('block', { row: 4, children: [leaf('pass_statement', 'pass', 4)] }),
    },
  });
  const hint = node('function_definition', {
    row: 6,
    endRow: 7,
    fields: {
      name: leaf('identifier', 'hint', 6),
      parameters: node('parameters', { row: 6 }),
      body: node('block', { row: 7, children: [leaf('pass_statement', 'pass', 7)] }),
    },
  });

  return node('module', {
    endRow: 7,
    children: [
      node('try_statement', {
        endRow: 4,
        fields: {
          body: node('block', {
            row: 1,
            children: [leaf('import_from_statement', 'from speedups import Codec', 1)],
          }),
        },
        children: [
          node('except_clause', {
            row: 2,
            endRow: 4,
            children: [
              leaf('identifier', 'ImportError', 2),
              node('block', { row: 3, endRow: 4, children: [fallbackCodec] }),
            ],
          }),
        ],
      }),
      node('if_statement', {
        row: 5,
        endRow: 7,
        fields: {
          condition: leaf('identifier', 'TYPE_CHECKING', 5),
          consequence: node('block', { row: 6, endRow: 7, children: [hint] }),
        },
      }),
    ],
  });
}

const CYCLE = `try:
    from speedups import C
except ImportError:
    class C:
        @staticmethod
        def baz():
            A.foo()


class A:
    @staticmethod
    def foo():
        B.bar()


class B:
    @staticmethod
    def bar():
        C.baz()
`;

describe('extractPythonTree', () => {
  const extraction = extractPythonTree(repoTree(), 'store/repo.py');

  it('should qualify declarations with the module name', () => {
    expect(extraction.packageName).toBe('store.repo');
    expect(extraction.declarations.map((d) => `${d.kind} ${d.qualifiedName} ${d.startLine}-${d.endLine}`)).toEqual([
      'Class store.repo.Repo 1-7',
      'Method store.repo.Repo.save 2-3',
      'Method store.repo.Repo.validate 6-7',
    ]);
  });

  it('should read typed parameters, decorators and return types', () => {
    const [, save, validate] = extraction.declarations;

    expect(save?.parameters).toEqual([{ name: 'item', type: 'Item' }]);
    expect(validate?.annotations).toEqual(['staticmethod']);
    expect(validate?.parameters).toEqual([{ name: 'item' }]);
    expect(validate?.returnType).toBe('bool');
  });

  it('should record calls on self', () => {
    expect(extraction.calls).toEqual([
      { callerIndex: 1, name: 'validate', hasReceiver: true, receiver: 'self', arity: 1, line: 3 },
    ]);
  });

  it('should declare definitions under try and if blocks in the enclosing scope', () => {
    const { declarations } = extractPythonTree(conditionalTree(), 'compat.py');

    expect(declarations.map((d) => `${d.kind} ${d.qualifiedName} ${d.startLine}-${d.endLine}`)).toEqual([
      'Class compat.Codec 4-5',
      'Method compat.hint 7-8',
    ]);
    expect(declarations.every((d) => d.containerIndex === undefined)).toBe(true);
  });
});

describe('PythonParser', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ckg-python-'));
    fs.mkdirSync(path.join(tempDir, 'shop'));
    fs.writeFileSync(path.join(tempDir, 'shop', 'orders.py'), ORDERS);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should use the indentation scanner without a grammar', async () => {
    const result = await new PythonParser().parseFiles(['shop/orders.py'], parseContext(tempDir));
    const names = new Map(result.entities.map((e) => [e.id, e.qualifiedName]));
    const edges = result.relationships
      .filter((r) => r.type !== 'CONTAINS')
      .map((r) => `${names.get(r.sourceId)} ${r.type} ${names.get(r.targetId)}`);

    expect(result.usedFallback).toBe(true);
    expect(result.language).toBe('python');
    expect(edges).toEqual(['shop.orders.helper REFERENCES shop.orders.Order']);
  });
});

describe('PythonParser with the tree-sitter-python grammar', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ckg-python-grammar-'));
    fs.mkdirSync(path.join(tempDir, 'shop'));
    fs.writeFileSync(path.join(tempDir, 'shop', 'cycle.py'), CYCLE);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should extract declarations and calls from a real syntax tree', async () => {
    const runtime = new TreeSitterRuntime({ initTimeoutMs: 10000, logger: recordingLogger().logger });
    const result = await new PythonParser(runtime).parseFiles(['shop/cycle.py'], parseContext(tempDir));
    const names = new Map(result.entities.map((e) => [e.id, e.qualifiedName]));
    const declared = result.entities.filter((e) => e.kind !== 'File');

    expect(result.usedFallback).toBe(false);
    expect(declared.map((e) => `${e.kind} ${e.qualifiedName}`)).toEqual([
      'Class shop.cycle.C',
      'Method shop.cycle.C.baz',
      'Class shop.cycle.A',
      'Method shop.cycle.A.foo',
      'Class shop.cycle.B',
      'Method shop.cycle.B.bar',
    ]);
    expect(
      result.relationships
        .filter((r) => r.type === 'CALLS')
        .map((r) => `${names.get(r.sourceId)} CALLS ${names.get(r.targetId)} (${r.confidence})`)
        .sort()
    ).toEqual([
      'shop.cycle.A.foo CALLS shop.cycle.B.bar (exact)',
      'shop.cycle.B.bar CALLS shop.cycle.C.baz (exact)',
      'shop.cycle.C.baz CALLS shop.cycle.A.foo (exact)',
    ]);
  }, 30000);

  it('should find the same entities with and without the grammar', async () => {
    const runtime = new TreeSitterRuntime({ initTimeoutMs: 10000, logger: recordingLogger().logger });
    const withGrammar = await new PythonParser(runtime).parseFiles(['shop/cycle.py'], parseContext(tempDir));
    const withoutGrammar = await new PythonParser().parseFiles(['shop/cycle.py'], parseContext(tempDir));

    expect(withoutGrammar.usedFallback).toBe(true);
    expect(withGrammar.entities.map((e) => e.id)).toEqual(withoutGrammar.entities.map((e) => e.id));
  }, 30000);
});
