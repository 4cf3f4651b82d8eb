import type { Writable } from 'stream';
import { createLogger, serializeError } from '../logger';
import type { SessionDeps } from '../objects/session';
import type { AppConfig } from '../types/config';
import { toErrorPayload } from '../types/errors';

const log = createLogger('commands');

/**
 * Command context for dependency injection.
 *
 * cli.ts builds it from the validated configuration; tests inject fakes
 * and in-memory streams.
 */
export interface CommandContext {
  /** Validated configuration */
  config: AppConfig;
  /** Arguments after the command word */
  args: string[];
  /** Target from -t/--target; the default target when undefined */
  target?: string;
  /** Session dependencies (fetch, cluster, abort signal) */
  deps?: SessionDeps;
  /** Result output (defaults to process.stdout) */
  stdout?: Writable;
  /** Messages and errors (defaults to process.stderr) */
  stderr?: Writable;
}

export type ExitFn = (code: number) => void;

export function stdoutOf(context: Pick<CommandContext, 'stdout'>): Writable {
  return context.stdout ?? process.stdout;
}

export function stderrOf(context: Pick<CommandContext, 'stderr'>): Writable {
  return context.stderr ?? process.stderr;
}

export function writeLines(stream: Writable, lines: readonly string[]): void {
  for (const line of lines) {
    stream.write(`${line}\n`);
  }
}

/**
 * Print a failure as `{"error": {kind, code, message}}` on stderr.
 */
export function reportError(context: Pick<CommandContext, 'stderr'>, error: unknown): void {
  log.debug(serializeError(error), 'Command failed');
  stderrOf(context).write(`${JSON.stringify({ error: toErrorPayload(error) })}\n`);
}

export function printUsageError(
  context: Pick<CommandContext, 'stderr'>,
  usage: string,
  exit: ExitFn,
): void {
  stderrOf(context).write(`Usage: ${usage}\n`);
  exit(2);
}

/**
 * Take the value of a flag that may be given without one.
 *
 * @param args - Arguments; the flag and its value are removed
 * @param names - Flag spellings
 * @param isValue - Whether the next argument belongs to the flag
 * @returns undefined when absent, '' when present without value, else the value
 */
export function takeFlag(
  args: string[],
  names: readonly string[],
  isValue: (next: string) => boolean = (next) => !next.startsWith('-'),
): string | undefined {
  const index = args.findIndex((arg) => names.includes(arg));
  if (index === -1) {
    return undefined;
  }
  const value = args[index + 1];
  if (value !== undefined && isValue(value)) {
    args.splice(index, 2);
    return value;
  }
  args.splice(index, 1);
  return '';
}

export function takeSwitch(args: string[], names: readonly string[]): boolean {
  const index = args.findIndex((arg) => names.includes(arg));
  if (index === -1) {
    return false;
  }
  args.splice(index, 1);
  return true;
}
