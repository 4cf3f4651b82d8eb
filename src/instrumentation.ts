/**
 * OpenTelemetry Manual Instrumentation Utilities
 *
 * Wraps pipeline stages in custom spans. Works alongside auto-instrumentation
 * from @elastic/opentelemetry-node, which traces the HTTP requests themselves.
 *
 * @example
 * ```typescript
 * import { withSpan, SpanAttributes } from './instrumentation';
 *
 * const batch = await withSpan('export_objects', { [SpanAttributes.TARGET_NAME]: 'prod' }, async () => {
 *   return repository.export({ types: ['dashboard'] });
 * });
 * ```
 */

import type { Span, Attributes } from '@opentelemetry/api';
import { trace, SpanStatusCode } from '@opentelemetry/api';

// Exported for tests
export const tracer = trace.getTracer('dashsync');

/**
 * Execute a function within a custom span.
 *
 * Automatically handles:
 * - Span creation and activation
 * - Error recording (sets span status to ERROR and records exception)
 * - Span ending (always, even on exception)
 *
 * @param operationName - Name of the span (e.g., 'export_objects', 'apply_policy_edit')
 * @param attributes - Span attributes following OpenTelemetry semantic conventions
 * @param fn - Function to execute within the span (sync or async)
 * @returns Result of the function
 *
 * @throws Re-throws any exception from the function after recording it in the span
 */
export function withSpan<T>(
  operationName: string,
  attributes: Attributes,
  fn: (span: Span) => T,
): T {
  return tracer.startActiveSpan(operationName, { attributes }, (span) => {
    try {
      const result = fn(span);

      // If result is a Promise, handle async error cases
      if (result instanceof Promise) {
        // Type assertion: Promise<unknown> is returned, caller expects Promise in T
        return result
          .then((value: unknown) => {
            span.setStatus({ code: SpanStatusCode.OK });
            return value;
          })
          .catch((error: unknown) => {
            span.recordException(error instanceof Error ? error : new Error(String(error)));
            span.setStatus({ code: SpanStatusCode.ERROR });
            throw error;
          })
          .finally(() => {
            span.end();
          }) as T;
      }

      // Synchronous success
      span.setStatus({ code: SpanStatusCode.OK });
      span.end();
      return result;
    } catch (error) {
      // Synchronous error
      span.recordException(error instanceof Error ? error : new Error(String(error)));
      span.setStatus({ code: SpanStatusCode.ERROR });
      span.end();
      throw error;
    }
  });
}

/**
 * Common span attribute names following OpenTelemetry semantic conventions.
 *
 * See: https://opentelemetry.io/docs/specs/semconv/
 *
 * Custom attributes for the saved-object domain:
 * - target.name: Server profile the command runs against
 * - backend.mode: Selected saved-object backend ('ModernApi' | 'LegacyIndex')
 * - objects.count: Number of saved objects in a batch
 * - policy.name / policy.phase: Lifecycle policy being edited
 */
export const SpanAttributes = {
  // Target attributes
  TARGET_NAME: 'target.name',
  BACKEND_MODE: 'backend.mode',

  // Saved object attributes
  OBJECTS_COUNT: 'objects.count',

  // Lifecycle policy attributes
  POLICY_NAME: 'policy.name',
  POLICY_PHASE: 'policy.phase',
} as const;
