/**
 * Raw passthrough to the cluster API.
 *
 * `dashsync cat indices` becomes `GET /_cat/indices`; words that are not a
 * known shorthand are joined into the path as given.
 */

import { connectTarget } from '../objects/session';
import type { HttpMethod, RawBody } from '../transport/cluster';
import { isRecord } from '../utils';
import type { CommandContext, ExitFn } from './context';
import { printUsageError, reportError, stderrOf, stdoutOf, takeFlag } from './context';

const USAGE = 'dashsync <command> [args...] [-X <method>] [-d <body>]';

/** Shorthand words and the API prefix they stand for */
export const ENDPOINT_PREFIXES: Record<string, string> = {
  cat: '_cat',
  cluster: '_cluster',
  nodes: '_nodes',
  tasks: '_tasks',
  snapshot: '_snapshot',
  ingest: '_ingest',
  template: '_index_template',
  alias: '_alias',
  mapping: '_mapping',
  settings: '_settings',
  stats: '_stats',
};

const METHODS: readonly HttpMethod[] = ['GET', 'PUT', 'POST', 'DELETE', 'HEAD'];

function isMethod(value: string): value is HttpMethod {
  return METHODS.some((method) => method === value);
}

/**
 * Build the request path from the command words.
 *
 * @example
 * ```typescript
 * resolveEndpoint(['cat', 'indices?v']); // '/_cat/indices?v'
 * resolveEndpoint(['my-index', '_search']); // '/my-index/_search'
 * ```
 */
export function resolveEndpoint(words: readonly string[]): string {
  const [first, ...rest] = words;
  if (first === undefined) {
    return '/';
  }
  const prefix = ENDPOINT_PREFIXES[first] ?? first.replace(/^\/+/, '');
  return `/${[prefix, ...rest].join('/')}`;
}

/**
 * Parse a `-d` body: JSON objects are sent as JSON, anything else as text.
 */
export function parseBody(text: string): RawBody {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : text;
  } catch {
    return text;
  }
}

/**
 * Main entry point for the raw passthrough.
 *
 * @param exit - Exit callback (process.exit for the CLI, mocked in tests)
 * @param context - Configuration, command words and injected dependencies
 */
export async function main(exit: ExitFn, context: CommandContext): Promise<void> {
  const args = [...context.args];
  const method = (takeFlag(args, ['-X', '--method']) ?? 'GET').toUpperCase();
  const data = takeFlag(args, ['-d', '--data'], () => true);

  if (args.length === 0 || !isMethod(method)) {
    printUsageError(context, USAGE, exit);
    return;
  }

  try {
    const { target, cluster } = connectTarget(context.config, context.target, context.deps);
    if (target.isDefault && context.target === undefined) {
      stderrOf(context).write(`→ ${target.name}\n`);
    }

    const body = data === undefined || data === '' ? undefined : parseBody(data);
    const result = await cluster.rawRequest(method, resolveEndpoint(args), body);
    const text = typeof result === 'string' ? result : JSON.stringify(result ?? null, null, 2);
    stdoutOf(context).write(text.endsWith('\n') ? text : `${text}\n`);
    exit(0);
  } catch (err) {
    reportError(context, err);
    exit(1);
  }
}
