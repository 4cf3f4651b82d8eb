import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { makeRecord } from '../../tests/utils/test-helpers';
import {
  ConfigError,
  ConnectionError,
  DanglingReferenceError,
  DashsyncError,
  DuplicateRecordError,
  FileSystemError,
  InvalidPhaseOrderingError,
  NotFoundError,
  PartialExportError,
  UnknownTargetError,
  ValidationError,
  toErrorPayload,
} from './errors';

describe('error types', () => {
  describe('ValidationError', () => {
    it('should keep the variable and code', () => {
      const error = new ValidationError('Invalid value', 'LOG_LEVEL', 'INVALID_LOG_LEVEL');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(DashsyncError);
      expect(error).toMatchObject({
        name: 'ValidationError',
        message: 'Invalid value',
        variable: 'LOG_LEVEL',
        code: 'INVALID_LOG_LEVEL',
      });
    });

    it('should default the code', () => {
      expect(new ValidationError('x', 'Y').code).toBe('VALIDATION_ERROR');
    });
  });

  describe('path-carrying errors', () => {
    it('ConfigError should keep the path and cause', () => {
      const cause = new Error('EACCES');
      const error = new ConfigError(
        'Permission denied',
        '/home/user/.dashsync/config.json',
        'PERMISSION_DENIED',
        cause,
      );

      expect(error.path).toBe('/home/user/.dashsync/config.json');
      expect(error.code).toBe('PERMISSION_DENIED');
      expect(error.cause).toBe(cause);
    });

    it('FileSystemError should default the code', () => {
      expect(new FileSystemError('x', '/tmp/out').code).toBe('FS_ERROR');
    });
  });

  describe('messages', () => {
    it('UnknownTargetError should list the available targets', () => {
      expect(new UnknownTargetError('qa', ['local', 'prod']).message).toBe(
        "Server 'qa' not found in configuration. Available servers: local, prod",
      );
      expect(new UnknownTargetError('qa', []).message).toBe(
        "Server 'qa' not found in configuration. Available servers: (none configured)",
      );
    });

    it('ConnectionError should tell server failures from unreachable servers', () => {
      expect(new ConnectionError('x', 'http://a').code).toBe('CONNECTION_FAILED');
      expect(new ConnectionError('x', 'http://a', 503)).toMatchObject({
        code: 'SERVER_ERROR',
        statusCode: 503,
      });
    });

    it('NotFoundError and DuplicateRecordError should name the object', () => {
      expect(new NotFoundError('dashboard', 'web').message).toBe(
        'Saved object dashboard:web not found',
      );
      expect(new DuplicateRecordError('dashboard', 'web').message).toBe(
        'Saved object dashboard:web was returned twice while listing',
      );
    });

    it('DanglingReferenceError should list every missing reference', () => {
      const error = new DanglingReferenceError('dashboard', 'web', [
        { type: 'visualization', id: 'v1' },
        { type: 'index-pattern', id: 'logs' },
      ]);
      expect(error.message).toBe(
        'Saved object dashboard:web references missing objects: visualization:v1, index-pattern:logs',
      );
    });

    it('PartialExportError should carry the records that were found', () => {
      const found = [makeRecord('dashboard', 'a')];
      const error = new PartialExportError(['b', 'c'], found);

      expect(error.message).toBe('Export incomplete, objects not found: b, c');
      expect(error.records).toEqual(found);
    });

    it('InvalidPhaseOrderingError should name the policy', () => {
      const error = new InvalidPhaseOrderingError('logs', 'warm phase min_age 5d is before hot');
      expect(error.message).toBe("Policy 'logs': warm phase min_age 5d is before hot");
      expect(error.policy).toBe('logs');
    });
  });

  describe('toErrorPayload', () => {
    it('should use the class name and code of dashsync errors', () => {
      expect(toErrorPayload(new NotFoundError('search', 's1'))).toEqual({
        kind: 'NotFoundError',
        code: 'NOT_FOUND',
        message: 'Saved object search:s1 not found',
      });
    });

    it('should mark other errors as unexpected', () => {
      expect(toErrorPayload(new TypeError('bad'))).toEqual({
        kind: 'TypeError',
        code: 'UNEXPECTED',
        message: 'bad',
      });
      expect(toErrorPayload(42)).toEqual({ kind: 'Error', code: 'UNEXPECTED', message: '42' });
    });

    it('should keep any thrown message', () => {
      fc.assert(
        fc.property(fc.string(), (message) => {
          expect(toErrorPayload(new Error(message)).message).toBe(message);
          expect(toErrorPayload(message).message).toBe(message);
        }),
      );
    });
  });
});
