/**
 * Tests for the error hierarchy
 */

import { describe, it, expect } from 'vitest';
import {
  CodeGraphError,
  ConfigurationError,
  GraphWriteError,
  ParseError,
  QueryError,
  UnsupportedLanguageError,
  errorMessage,
  isCodeGraphError,
  wrapError,
} from '../src/utils/errors.js';

describe('CodeGraphError', () => {
  it('should append a fix hint for its code to the user message', () => {
    const error = new CodeGraphError('QUERY_FAILED', 'Store went away');

    expect(error.userMessage).toBe(
      'Store went away\n\nFix: Check that the graph store is reachable and rescan the project.'
    );
  });

  it('should keep an explicit user message', () => {
    const error = new CodeGraphError('INTERNAL_ERROR', 'boom', { userMessage: 'Try again' });
    expect(error.userMessage).toBe('Try again');
  });

  it('should format CLI output with or without symbols', () => {
    const error = new CodeGraphError('INTERNAL_ERROR', 'boom', { userMessage: 'Try again' });

    expect(error.toCliOutput()).toBe('✗ boom\n\nTry again');
    expect(error.toCliOutput(false)).toBe('[ERR] boom\n\nTry again');
  });

  it('should serialize to JSON without an empty technical field', () => {
    const error = new CodeGraphError('INTERNAL_ERROR', 'boom', { userMessage: 'Try again' });

    expect(error.toJSON()).toEqual({ code: 'INTERNAL_ERROR', message: 'boom', userMessage: 'Try again' });
  });
});

describe('specialized errors', () => {
  it('should default ParseError to PARSE_FAILED', () => {
    const error = new ParseError('bad syntax', { filePath: 'src/A.java', line: 3 });

    expect(error.code).toBe('PARSE_FAILED');
    expect(error.filePath).toBe('src/A.java');
    expect(error.line).toBe(3);
    expect(error.name).toBe('ParseError');
  });

  it('should name the language in UnsupportedLanguageError', () => {
    const error = new UnsupportedLanguageError('go', { filePath: 'main.go' });

    expect(error.code).toBe('UNSUPPORTED_LANGUAGE');
    expect(error.message).toBe('No parser registered for language "go"');
    expect(error.language).toBe('go');
  });

  it('should record the attempts of a GraphWriteError', () => {
    const error = new GraphWriteError('write failed', { projectId: 'shop', attempts: 2 });

    expect(error.code).toBe('GRAPH_WRITE_FAILED');
    expect(error.projectId).toBe('shop');
    expect(error.attempts).toBe(2);
  });

  it('should accept a narrower code on QueryError and ConfigurationError', () => {
    expect(new QueryError('missing', { code: 'ENTITY_NOT_FOUND' }).code).toBe('ENTITY_NOT_FOUND');
    expect(new QueryError('failed').code).toBe('QUERY_FAILED');
    expect(new ConfigurationError('down', { code: 'STORE_UNREACHABLE' }).code).toBe('STORE_UNREACHABLE');
    expect(new ConfigurationError('bad').code).toBe('CONFIG_INVALID');
  });
});

describe('error helpers', () => {
  it('should recognise engine errors', () => {
    expect(isCodeGraphError(new QueryError('x'))).toBe(true);
    expect(isCodeGraphError(new Error('x'))).toBe(false);
  });

  it('should return engine errors from wrapError unchanged', () => {
    const error = new QueryError('x');
    expect(wrapError(error)).toBe(error);
  });

  it('should wrap other errors as INTERNAL_ERROR with context', () => {
    const cause = new Error('disk full');
    const wrapped = wrapError(cause, 'Saving graph');

    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.message).toBe('Saving graph: disk full');
    expect(wrapped.cause).toBe(cause);
  });

  it('should read the message of any thrown value', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(42)).toBe('42');
  });
});
