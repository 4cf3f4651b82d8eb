import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { createLogger, serializeError } from './logger';
import { ConnectionError, ValidationError } from './types/errors';

describe('logger', () => {
  describe('createLogger', () => {
    it('should bind the component to every line', () => {
      const log = createLogger('objects:test');

      expect(log.bindings()).toMatchObject({ component: 'objects:test' });
      expect(log.level).toBe('silent');
    });

    it('should expose the logging methods', () => {
      const log = createLogger('objects:test');

      expect(() => {
        log.info({ 'objects.count': 3 }, 'Exported 3 saved objects');
        log.warn('Skipping unreadable saved object');
      }).not.toThrow();
    });
  });

  describe('serializeError', () => {
    it('should describe non-Error values', () => {
      expect(serializeError('boom')).toEqual({ 'error.message': 'boom', 'error.type': 'string' });
      expect(serializeError({ custom: 'error' })).toEqual({
        'error.message': '[object Object]',
        'error.type': 'object',
      });
      expect(serializeError(null)).toEqual({ 'error.message': 'null', 'error.type': 'object' });
      expect(serializeError(undefined)).toEqual({
        'error.message': 'undefined',
        'error.type': 'undefined',
      });
    });

    it('should include the error code of dashsync errors', () => {
      const result = serializeError(new ValidationError('bad', 'LOG_LEVEL', 'INVALID_LOG_LEVEL'));

      expect(result['error.type']).toBe('ValidationError');
      expect(result['error.code']).toBe('INVALID_LOG_LEVEL');
      expect(typeof result['error.stack_trace']).toBe('string');
    });

    it('should include system error codes', () => {
      const error = Object.assign(new Error('connect ECONNREFUSED'), {
        code: 'ECONNREFUSED',
        errno: -111,
      });

      expect(serializeError(error)).toMatchObject({
        'error.message': 'connect ECONNREFUSED',
        'error.code': 'ECONNREFUSED',
        'error.errno': -111,
      });
    });

    it('should serialize the cause chain', () => {
      const cause = new Error('socket hang up');
      const error = new ConnectionError('Request failed', 'http://localhost:9200', undefined, cause);

      expect(serializeError(error)['error.cause']).toMatchObject({
        'error.message': 'socket hang up',
        'error.type': 'Error',
      });
    });

    it('should always produce string message and type fields', () => {
      const values = fc.oneof(
        fc.string(),
        fc.integer(),
        fc.boolean(),
        fc.constant(null),
        fc.constant(undefined),
        fc.string().map((message) => new Error(message)),
      );

      fc.assert(
        fc.property(values, (value) => {
          const result = serializeError(value);
          expect(typeof result['error.message']).toBe('string');
          expect(typeof result['error.type']).toBe('string');
        }),
      );
    });

    it('should keep the message of any Error', () => {
      fc.assert(
        fc.property(fc.string(), (message) => {
          expect(serializeError(new Error(message))['error.message']).toBe(message);
        }),
      );
    });
  });
});
