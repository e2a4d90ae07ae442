/**
 * Tests for Kotlin pattern extraction
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { KotlinParser, KOTLIN_RULES } from '../src/parser/kotlin-parser.js';
import { scanBraceSource } from '../src/parser/pattern-scanner.js';
import type { Declaration } from '../src/parser/types.js';
import { parseContext } from './helpers/context.js';

const CART = [
  'package shop',
  '',
  'interface Priced {',
  '    fun price(): Int',
  '}',
  '',
  'class Cart(private val owner: String) : Priced {',
  '    private val items = mutableListOf<Item>()',
  '',
  '    override fun price(): Int {',
  '        return total(1)',
  '    }',
  '',
  '    fun total(tax: Int, discount: Int = 0): Int = tax + discount',
  '}',
  '',
].join('\n');

function outline(declarations: Declaration[]): string[] {
  return declarations.map((d) => `${d.kind} ${d.qualifiedName} ${d.startLine}-${d.endLine}`);
}

describe('KOTLIN_RULES', () => {
  it('should find types, members and header properties in source order', () => {
    const { packageName, declarations } = scanBraceSource({ path: 'Cart.kt', content: CART }, KOTLIN_RULES);

    expect(packageName).toBe('shop');
    expect(outline(declarations)).toEqual([
      'Interface shop.Priced 3-5',
      'Method shop.Priced.price 4-4',
      'Class shop.Cart 7-15',
      'Field shop.Cart.owner 7-7',
      'Field shop.Cart.items 8-8',
      'Method shop.Cart.price 10-12',
      'Method shop.Cart.total 14-14',
    ]);
  });

  it('should read visibility, modifiers and types', () => {
    const { declarations } = scanBraceSource({ path: 'Cart.kt', content: CART }, KOTLIN_RULES);
    const [, abstractPrice, , owner, items, price, total] = declarations;

    expect(abstractPrice?.returnType).toBe('Int');
    expect(owner?.visibility).toBe('private');
    expect(owner?.valueType).toBe('String');
    expect(owner?.containerIndex).toBe(2);
    expect(items?.visibility).toBe('private');
    expect(items?.valueType).toBeUndefined();
    expect(price?.modifiers).toEqual(['override']);
    expect(price?.visibility).toBe('public');
    expect(total?.parameters).toEqual([
      { name: 'tax', type: 'Int' },
      { name: 'discount', type: 'Int', optional: true },
    ]);
    expect(total?.returnType).toBe('Int');
  });

  it('should report supertypes and calls', () => {
    const { typeLinks, calls } = scanBraceSource({ path: 'Cart.kt', content: CART }, KOTLIN_RULES);

    expect(typeLinks).toEqual([{ fromIndex: 2, targetName: 'Priced', kind: 'supertype', line: 7 }]);
    expect(calls).toEqual([{ callerIndex: 5, name: 'total', hasReceiver: false, arity: 1, line: 11 }]);
  });

  it('should collect annotations written above a declaration', () => {
    const { declarations } = scanBraceSource(
      { path: 'Repo.kt', content: '@Service\nclass Repo {\n}\n' },
      KOTLIN_RULES
    );

    expect(declarations).toHaveLength(1);
    expect(declarations[0]?.name).toBe('Repo');
    expect(declarations[0]?.annotations).toEqual(['Service']);
  });

  it('should declare a companion object as a nested class', () => {
    const source = [
      'package shop',
      '',
      'class Order {',
      '    companion object {',
      '        fun create(): Order = Order()',
      '    }',
      '',
      '    fun submit() {}',
      '}',
      '',
    ].join('\n');
    const { declarations } = scanBraceSource({ path: 'Order.kt', content: source }, KOTLIN_RULES);

    expect(outline(declarations)).toEqual([
      'Class shop.Order 3-9',
      'Class shop.Order.Companion 4-6',
      'Method shop.Order.Companion.create 5-5',
      'Method shop.Order.submit 8-8',
    ]);
    expect(declarations[1]?.containerIndex).toBe(0);
    expect(declarations[1]?.modifiers).toEqual(['companion']);
  });

  it('should keep the name of a named companion object', () => {
    const source = 'class Order {\n    companion object Factory : Builder {\n    }\n}\n';
    const { declarations, typeLinks } = scanBraceSource({ path: 'Order.kt', content: source }, KOTLIN_RULES);

    expect(declarations.map((d) => d.qualifiedName)).toEqual(['Order', 'Order.Factory']);
    expect(typeLinks).toEqual([{ fromIndex: 1, targetName: 'Builder', kind: 'supertype', line: 2 }]);
  });
});

describe('KotlinParser', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ckg-kotlin-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should resolve implementations and calls across the batch', async () => {
    fs.writeFileSync(path.join(tempDir, 'Cart.kt'), CART);

    const result = await new KotlinParser().parseFiles(['Cart.kt'], parseContext(tempDir, { projectId: 'shop' }));
    const names = new Map(result.entities.map((e) => [e.id, e.qualifiedName]));
    const edges = result.relationships
      .filter((r) => r.type !== 'CONTAINS')
      .map((r) => `${names.get(r.sourceId)} ${r.type} ${names.get(r.targetId)}`);

    expect(result.language).toBe('kotlin');
    expect(result.filesParsed).toBe(1);
    expect(result.usedFallback).toBe(false);
    expect(edges).toEqual(['shop.Cart IMPLEMENTS shop.Priced', 'shop.Cart.price CALLS shop.Cart.total']);
  });

  it('should report files over the size limit as errors', async () => {
    fs.writeFileSync(path.join(tempDir, 'Big.kt'), 'class Big {\n}\n');

    const result = await new KotlinParser().parseFiles(['Big.kt'], parseContext(tempDir, { maxFileSize: 4 }));

    expect(result.filesParsed).toBe(0);
    expect(result.filesFailed).toBe(1);
    expect(result.errors[0]?.code).toBe('FILE_TOO_LARGE');
    expect(result.entities).toEqual([]);
  });

  it('should report missing files without failing the batch', async () => {
    fs.writeFileSync(path.join(tempDir, 'A.kt'), 'class A {\n}\n');

    const result = await new KotlinParser().parseFiles(['Missing.kt', 'A.kt'], parseContext(tempDir));

    expect(result.filesParsed).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]?.filePath).toBe('Missing.kt');
    expect(result.errors[0]?.code).toBe('FILE_NOT_FOUND');
    expect(result.entities.map((e) => e.qualifiedName)).toEqual(['A.kt', 'A']);
  });
});
