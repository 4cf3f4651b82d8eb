import { describe, it, expect, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import type { Span } from '@opentelemetry/api';
import { SpanStatusCode } from '@opentelemetry/api';
import { SpanAttributes, tracer, withSpan } from './instrumentation';

interface SpanSpies {
  setStatus: MockInstance<Span['setStatus']>;
  recordException: MockInstance<Span['recordException']>;
  end: MockInstance<Span['end']>;
}

function watch(span: Span): SpanSpies {
  return {
    setStatus: vi.spyOn(span, 'setStatus'),
    recordException: vi.spyOn(span, 'recordException'),
    end: vi.spyOn(span, 'end'),
  };
}

describe('instrumentation', () => {
  describe('withSpan', () => {
    it('should start an active span with the name and attributes', () => {
      const startActiveSpan = vi.spyOn(tracer, 'startActiveSpan');
      const attributes = { [SpanAttributes.TARGET_NAME]: 'prod' };

      withSpan('export_objects', attributes, () => 'done');

      expect(startActiveSpan).toHaveBeenCalledWith(
        'export_objects',
        { attributes },
        expect.any(Function),
      );
    });

    it('should return the result and mark the span OK', () => {
      let spies: SpanSpies | undefined;

      const result = withSpan('op', {}, (span) => {
        spies = watch(span);
        return { count: 2 };
      });

      expect(result).toEqual({ count: 2 });
      expect(spies?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
      expect(spies?.end).toHaveBeenCalledTimes(1);
    });

    it('should record a thrown error and rethrow it', () => {
      const error = new Error('sync failure');
      let spies: SpanSpies | undefined;

      expect(() =>
        withSpan('op', {}, (span) => {
          spies = watch(span);
          throw error;
        }),
      ).toThrow('sync failure');

      expect(spies?.recordException).toHaveBeenCalledWith(error);
      expect(spies?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.ERROR });
      expect(spies?.end).toHaveBeenCalledTimes(1);
    });

    it('should end the span once an async result settles', async () => {
      let spies: SpanSpies | undefined;

      const result = await withSpan('op', {}, async (span) => {
        spies = watch(span);
        return Promise.resolve('async result');
      });

      expect(result).toBe('async result');
      expect(spies?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.OK });
      expect(spies?.end).toHaveBeenCalledTimes(1);
    });

    it('should record a rejection and rethrow it', async () => {
      let spies: SpanSpies | undefined;

      await expect(
        withSpan('op', {}, async (span) => {
          spies = watch(span);
          await Promise.resolve();
          throw new Error('async failure');
        }),
      ).rejects.toThrow('async failure');

      expect(spies?.setStatus).toHaveBeenCalledWith({ code: SpanStatusCode.ERROR });
      expect(spies?.end).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-Error rejections before recording them', async () => {
      let spies: SpanSpies | undefined;

      await expect(
        withSpan('op', {}, (span) => {
          spies = watch(span);
          return Promise.reject('plain text');
        }),
      ).rejects.toBe('plain text');

      expect(spies?.recordException).toHaveBeenCalledWith(new Error('plain text'));
    });
  });

  it('SpanAttributes should use dotted attribute names', () => {
    expect(SpanAttributes.BACKEND_MODE).toBe('backend.mode');
    expect(SpanAttributes.OBJECTS_COUNT).toBe('objects.count');
    expect(SpanAttributes.POLICY_NAME).toBe('policy.name');
  });
});
