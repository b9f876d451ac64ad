import { describe, it, expect } from 'vitest';

import {
  AcceptanceMetricsError,
  ConfigError,
  ErrorCollector,
  RegistrationError,
  UnknownBlockTypeError,
  UnknownTransactionTypeError,
  causeMessage
} from '../../src/errors.js';

describe('ErrorCollector', () => {
  it('should keep going after a failed attempt', () => {
    const errors = new ErrorCollector();
    const ran: string[] = [];

    errors.attempt('first', () => { ran.push('first'); throw new Error('boom'); });
    errors.attempt('second', () => { ran.push('second'); });
    errors.attempt('third', () => { ran.push('third'); throw new Error('bang'); });

    expect(ran).toEqual(['first', 'second', 'third']);
    expect(errors.failed.map(f => f.metric)).toEqual(['first', 'third']);
  });

  it('should not throw when nothing failed', () => {
    const errors = new ErrorCollector();
    errors.attempt('ok', () => undefined);

    expect(() => errors.throwIfAny()).not.toThrow();
  });

  it('should throw one RegistrationError holding every failure', () => {
    const errors = new ErrorCollector();
    errors.attempt('a', () => { throw new Error('first cause'); });
    errors.attempt('b', () => { throw 'second cause'; });

    expect(() => errors.throwIfAny()).toThrow(
      'failed to register 2 metric(s): a (first cause); b (second cause)'
    );
  });
});

describe('error types', () => {
  it('should share a base class and expose stable codes', () => {
    const unknown = new UnknownBlockTypeError('banff');
    const registration = new RegistrationError([{ metric: 'm', cause: new Error('x') }]);
    const config = new ConfigError(['PORT: expected a non-negative integer']);

    expect(unknown).toBeInstanceOf(AcceptanceMetricsError);
    expect(registration).toBeInstanceOf(AcceptanceMetricsError);
    expect(config).toBeInstanceOf(AcceptanceMetricsError);
    expect([unknown.code, registration.code, config.code]).toEqual([
      'UNKNOWN_BLOCK_TYPE',
      'REGISTRATION_FAILED',
      'INVALID_CONFIG'
    ]);
    expect(config.message).toBe('invalid configuration: PORT: expected a non-negative integer');
  });

  it('should describe a missing kind', () => {
    expect(new UnknownBlockTypeError(undefined).message).toBe('unknown block type: undefined');
    expect(new UnknownBlockTypeError(7).message).toBe('unknown block type: 7');
  });

  it('should describe kinds that JSON cannot encode', () => {
    const circular: Record<string, unknown> = { tag: 'loop' };
    circular.self = circular;

    expect(new UnknownBlockTypeError(10n).message).toBe('unknown block type: 10');
    expect(new UnknownBlockTypeError(circular).message).toBe('unknown block type: [object Object]');
    expect(new UnknownTransactionTypeError(Symbol('odd')).message).toBe(
      'unknown transaction type: Symbol(odd)'
    );
  });

  it('should stringify non-Error causes', () => {
    expect(causeMessage(new Error('inner'))).toBe('inner');
    expect(causeMessage('plain')).toBe('plain');
  });
});
