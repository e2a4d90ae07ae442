/**
 * Tests for the logger
 */

import { describe, it, expect } from 'vitest';
import { createLogger, formatContext, formatPretty, isLogLevel, type LogEntry } from '../src/utils/logger.js';

function collect(level: 'debug' | 'warn') {
  const entries: LogEntry[] = [];
  const log = createLogger({ level, output: (entry) => entries.push(entry) });
  return { log, entries };
}

describe('Logger', () => {
  it('should drop entries below the configured level', () => {
    const { log, entries } = collect('warn');

    log.info('skipped');
    log.warn('kept');
    log.error('kept too');

    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ['warn', 'kept'],
      ['error', 'kept too'],
    ]);
  });

  it('should lift the component of a child logger onto the entry', () => {
    const { log, entries } = collect('debug');

    log.child({ component: 'graph-builder' }).warn('Relationship batch failed', { type: 'CALLS', size: 2 });

    expect(entries[0]?.component).toBe('graph-builder');
    expect(entries[0]?.context).toEqual({ type: 'CALLS', size: 2 });
  });

  it('should merge the context of nested children', () => {
    const { log, entries } = collect('debug');

    log.child({ component: 'query' }).child({ projectId: 'shop' }).debug('Slow query', { durationMs: 12 });

    expect(entries[0]?.component).toBe('query');
    expect(entries[0]?.context).toEqual({ projectId: 'shop', durationMs: 12 });
  });

  it('should record errors in context by their message', () => {
    const { log, entries } = collect('debug');

    log.error('Build failed', { error: new Error('store offline') });

    expect(entries[0]?.context).toEqual({ error: 'store offline' });
  });

  it('should omit an empty context', () => {
    const { log, entries } = collect('debug');

    log.info('Scanning project', {});

    expect(entries[0]?.context).toBeUndefined();
  });

  it('should follow configure() in existing children', () => {
    const { log, entries } = collect('warn');
    const child = log.child({ component: 'engine' });

    child.info('before');
    log.configure({ level: 'info' });
    child.info('after');

    expect(entries.map((e) => e.message)).toEqual(['after']);
  });
});

describe('formatting', () => {
  it('should print strings bare and other values as JSON', () => {
    expect(formatContext({ projectId: 'shop', files: 3, ids: ['a', 'b'] })).toBe('projectId=shop files=3 ids=["a","b"]');
  });

  it('should render a pretty line without colors', () => {
    const line = formatPretty(
      {
        level: 'warn',
        message: 'Slow build',
        timestamp: '2024-01-01T00:00:00.000Z',
        component: 'graph-builder',
        context: { durationMs: 6000 },
      },
      false
    );

    expect(line.startsWith('▲ ')).toBe(true);
    expect(line.endsWith(' [graph-builder] Slow build durationMs=6000')).toBe(true);
  });

  it('should recognise level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
