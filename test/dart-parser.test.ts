/**
 * Tests for Dart pattern extraction
 */

import { describe, it, expect } from 'vitest';
import { DART_RULES, DartParser } from '../src/parser/dart-parser.js';
import { scanBraceSource } from '../src/parser/pattern-scanner.js';

const COUNTER = [
  'class Counter extends Base implements Tickable {',
  '  int _count = 0;',
  '',
  '  Counter(this._count);',
  '',
  '  void tick() {',
  '    _bump(1);',
  '  }',
  '',
  '  void _bump(int by) {',
  '    _count += by;',
  '  }',
  '}',
  '',
].join('\n');

describe('DART_RULES', () => {
  const extraction = scanBraceSource({ path: 'lib/counter.dart', content: COUNTER }, DART_RULES);

  it('should find the class, its field, constructor and methods', () => {
    expect(extraction.declarations.map((d) => `${d.kind} ${d.qualifiedName} ${d.startLine}-${d.endLine}`)).toEqual([
      'Class Counter 1-13',
      'Field Counter._count 2-2',
      'Method Counter.Counter 4-4',
      'Method Counter.tick 6-8',
      'Method Counter._bump 10-12',
    ]);
  });

  it('should treat leading underscores as library-private', () => {
    const [counter, count, constructor, tick, bump] = extraction.declarations;

    expect(counter?.visibility).toBe('public');
    expect(count?.visibility).toBe('private');
    expect(count?.valueType).toBe('int');
    expect(constructor?.visibility).toBe('public');
    expect(constructor?.parameters).toEqual([{ name: '_count' }]);
    expect(tick?.returnType).toBe('void');
    expect(bump?.visibility).toBe('private');
    expect(bump?.parameters).toEqual([{ name: 'by', type: 'int' }]);
  });

  it('should report extends and implements clauses', () => {
    expect(extraction.typeLinks.map((l) => l.targetName)).toEqual(['Base', 'Tickable']);
  });

  it('should attribute calls to the enclosing method', () => {
    expect(extraction.calls).toEqual([{ callerIndex: 3, name: '_bump', hasReceiver: false, arity: 1, line: 7 }]);
  });

  it('should map interface classes to Interface', () => {
    const { declarations } = scanBraceSource(
      { path: 'lib/shape.dart', content: 'abstract interface class Shape {\n  double area();\n}\n' },
      DART_RULES
    );

    expect(declarations.map((d) => `${d.kind} ${d.qualifiedName}`)).toEqual(['Interface Shape', 'Method Shape.area']);
    expect(declarations[1]?.returnType).toBe('double');
  });

  it('should read optional and named parameters', () => {
    const source = 'class Api {\n  Future<void> send(String path, {int retries = 3, required bool force}) async {\n  }\n}\n';
    const { declarations } = scanBraceSource({ path: 'lib/api.dart', content: source }, DART_RULES);

    expect(declarations[1]?.returnType).toBe('Future<void>');
    expect(declarations[1]?.parameters).toEqual([
      { name: 'path', type: 'String' },
      { name: 'retries', type: 'int', optional: true },
      { name: 'force', type: 'bool' },
    ]);
  });
});

describe('DartParser', () => {
  it('should handle .dart files only', () => {
    const parser = new DartParser();

    expect(parser.language).toBe('dart');
    expect(parser.canParse('lib/main.dart')).toBe(true);
    expect(parser.canParse('lib/main.kt')).toBe(false);
  });
});
