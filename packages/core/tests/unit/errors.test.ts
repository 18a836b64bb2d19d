import { describe, it, expect } from 'vitest';
import {
  DeskmateError,
  ERROR_METADATA,
  FormatError,
  NotFoundError,
  PersistenceError,
  TimeoutError,
  createStructuredError,
  errorMessage,
} from '../../src/errors.js';

describe('errors', () => {
  it('fills category, severity and suggestions from the registry', () => {
    const error = createStructuredError('TIMEOUT', 'wikipedia did not answer', { backend: 'wikipedia' });

    expect(error).toMatchObject({
      code: 'TIMEOUT',
      category: 'network',
      severity: 'recoverable',
      message: 'wikipedia did not answer',
      details: { backend: 'wikipedia' },
      suggestedActions: ['Check the internet connection', 'Increase internet.timeout'],
    });
    expect(typeof error.timestamp).toBe('number');
  });

  it('honours a severity override', () => {
    expect(createStructuredError('NOT_FOUND', 'x', {}, 'warning').severity).toBe('warning');
  });

  it('registers every code', () => {
    expect([...ERROR_METADATA.keys()].sort()).toEqual([
      'CAPABILITY_UNAVAILABLE',
      'CONFIG_INVALID',
      'FORMAT_ERROR',
      'HEAL_FAILED',
      'NOT_FOUND',
      'PERSISTENCE_ERROR',
      'TIMEOUT',
    ]);
  });

  it('maps each error class to its code', () => {
    const cases: Array<[DeskmateError, string, string]> = [
      [new NotFoundError('a'), 'NOT_FOUND', 'NotFoundError'],
      [new FormatError('b'), 'FORMAT_ERROR', 'FormatError'],
      [new PersistenceError('c'), 'PERSISTENCE_ERROR', 'PersistenceError'],
      [new TimeoutError('d'), 'TIMEOUT', 'TimeoutError'],
    ];
    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(DeskmateError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
    }
  });

  it('serialises to its structured payload', () => {
    const error = new DeskmateError('HEAL_FAILED', 'sync failed', { kind: 'MEMORY' });
    const json: unknown = JSON.parse(JSON.stringify(error));

    expect(json).toMatchObject({ code: 'HEAL_FAILED', category: 'system', severity: 'warning', message: 'sync failed' });
    expect(error.category).toBe('system');
  });

  it('renders thrown values as messages', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
