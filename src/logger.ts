import pino from 'pino';
import * as path from 'path';
import { getLogsDir, ensureConfigDirs } from './config';

const SERVICE_NAME = process.env.OTEL_SERVICE_NAME ?? 'dashsync';

let _rootLogger: pino.Logger | undefined;

/**
 * Create the process-wide root logger on first use.
 *
 * Settings are read lazily so that cli.ts can load the .env file before the
 * first log line is written. Writes to:
 * - stderr (pretty-printed with colors, keeps stdout free for exports)
 * - File: ~/.dashsync/logs/dashsync-YYYY-MM-DD.log (JSON)
 * - OpenTelemetry (if enabled via OTEL_SDK_DISABLED !== 'true')
 *
 * LOG_LEVEL=silent builds a logger without transports (used by tests).
 */
function getRootLogger(): pino.Logger {
  if (_rootLogger) {
    return _rootLogger;
  }

  const level = process.env.LOG_LEVEL ?? 'info';

  if (level === 'silent') {
    _rootLogger = pino({ name: SERVICE_NAME, level });
    return _rootLogger;
  }

  ensureConfigDirs();
  const dateStamp = new Date().toISOString().split('T')[0] ?? '1970-01-01';
  const logFile = path.join(getLogsDir(), `${SERVICE_NAME}-${dateStamp}.log`);

  const targets: pino.TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      options: { colorize: true, destination: 2 },
      level,
    },
    {
      target: 'pino/file',
      options: { destination: logFile },
      level,
    },
  ];

  if (process.env.OTEL_SDK_DISABLED !== 'true') {
    targets.push({
      target: 'pino-opentelemetry-transport',
      options: {
        // Uses OTEL_EXPORTER_OTLP_ENDPOINT or defaults to http://localhost:4318
      },
      level,
    });
  }

  _rootLogger = pino({
    name: SERVICE_NAME,
    level,
    transport: { targets },
  });

  _rootLogger.debug({ 'file.path': logFile }, 'Logging initialized');
  return _rootLogger;
}

/**
 * Create a component logger.
 *
 * The returned logger is a lazy proxy: the underlying pino child logger is
 * created on the first call, after the environment has been loaded.
 *
 * @param component - Component name bound to every line (e.g., 'objects:pipeline')
 * @returns pino logger bound to the component
 *
 * @example
 * ```typescript
 * import { createLogger, serializeError } from './logger';
 *
 * const log = createLogger('objects:pipeline');
 * log.info({ 'saved_object.count': 12 }, 'Exported 12 saved objects');
 * ```
 */
export function createLogger(component: string): pino.Logger {
  let child: pino.Logger | undefined;
  const resolve = (): pino.Logger => {
    child ??= getRootLogger().child({ component });
    return child;
  };

  return new Proxy({} as pino.Logger, {
    get(_target, prop): unknown {
      const logger = resolve();
      const value = logger[prop as keyof pino.Logger];
      if (typeof value === 'function') {
        return value.bind(logger);
      }
      return value;
    },
  });
}

/**
 * Flush pending log lines before the process exits.
 */
export function flushLogs(): void {
  _rootLogger?.flush();
}

/**
 * Serialize an error object to ECS-compliant fields.
 *
 * **ECS fields returned:**
 * - `error.message` - Human-readable error message
 * - `error.stack_trace` - Full stack trace (if available)
 * - `error.type` - Error class name (e.g., "TypeError", "ConnectionError")
 * - `error.code` - Error code (if available, e.g., "ECONNREFUSED")
 * - `error.cause` - Nested cause error (recursively serialized)
 *
 * @param error - Error object, string, or unknown value to serialize
 * @returns Object with ECS-compliant error fields
 *
 * @see {@link https://www.elastic.co/guide/en/ecs/current/ecs-error.html|ECS Error Fields}
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (typeof error === 'string') {
    return {
      'error.message': error,
      'error.type': 'string',
    };
  }

  if (!(error instanceof Error)) {
    let errorMessage: string;
    try {
      errorMessage = String(error);
    } catch {
      errorMessage = '[Unstringifiable value]';
    }

    return {
      'error.message': errorMessage,
      'error.type': typeof error,
    };
  }

  const result: Record<string, unknown> = {
    'error.message': error.message,
    'error.type': error.name || error.constructor.name,
  };

  if (error.stack) {
    result['error.stack_trace'] = error.stack;
  }

  const code: unknown = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' || typeof code === 'number') {
    result['error.code'] = code;
  }

  const errno: unknown = 'errno' in error ? error.errno : undefined;
  if (typeof errno === 'number') {
    result['error.errno'] = errno;
  }

  if (error.cause) {
    result['error.cause'] = serializeError(error.cause);
  }

  return result;
}
