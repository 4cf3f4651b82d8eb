/**
 * Saved object commands: list, export, import and delete per namespace.
 */

import { existsSync, statSync } from 'fs';
import { createLogger } from '../logger';
import type { ExportSink, ImportSource } from '../objects/pipeline';
import { exportObjects, importObjects } from '../objects/pipeline';
import { openSession } from '../objects/session';
import { formatObjectTable, formatOutcomeTable } from '../output';
import { PartialExportError } from '../types/errors';
import type { SavedObjectRecord } from '../types/saved-objects';
import type { CommandContext, ExitFn } from './context';
import {
  printUsageError,
  reportError,
  stderrOf,
  stdoutOf,
  takeFlag,
  takeSwitch,
  writeLines,
} from './context';

const log = createLogger('commands:objects');

/**
 * CLI namespaces and the saved object types they cover.
 * `saved-object` covers every managed type.
 */
export const NAMESPACES: Record<string, readonly string[]> = {
  'saved-object': [],
  dashboard: ['dashboard'],
  visualization: ['visualization'],
  search: ['search'],
  'index-pattern': ['index-pattern'],
};

export function isNamespace(word: string): boolean {
  return Object.prototype.hasOwnProperty.call(NAMESPACES, word);
}

function usage(namespace: string): string {
  const target = namespace === 'saved-object' ? '<type> <id>' : '<id>';
  return [
    `dashsync ${namespace} list`,
    `       dashsync ${namespace} export [ids...] [--json] [--to-file [dir]] [--best-effort]`,
    `       dashsync ${namespace} import <file|dir|-> [--overwrite]`,
    `       dashsync ${namespace} delete ${target}`,
  ].join('\n');
}

async function listCommand(
  namespace: string,
  exit: ExitFn,
  context: CommandContext,
): Promise<void> {
  const session = await openSession(context.config, context.target, context.deps);
  writeLines(stderrOf(context), session.warnings);

  const records: SavedObjectRecord[] = [];
  for await (const record of session.repository.list(NAMESPACES[namespace])) {
    records.push(record);
  }

  if (records.length === 0) {
    stdoutOf(context).write('No objects found\n');
  } else {
    writeLines(stdoutOf(context), formatObjectTable(records));
  }
  exit(0);
}

async function exportCommand(
  namespace: string,
  args: string[],
  exit: ExitFn,
  context: CommandContext,
): Promise<void> {
  const json = takeSwitch(args, ['--json']);
  const bestEffort = takeSwitch(args, ['--best-effort']);
  const toFile = takeFlag(args, ['--to-file'], (next) => next.includes('/') || next === '.');
  const ids = args;

  const directory = toFile === '' ? '.' : toFile;
  const sink: ExportSink =
    directory === undefined
      ? { kind: 'stream', stream: stdoutOf(context), format: json ? 'json' : 'ndjson' }
      : { kind: 'files', directory };

  try {
    const report = await exportObjects(
      context.config,
      { target: context.target, types: NAMESPACES[namespace], ids, bestEffort, sink },
      context.deps,
    );
    writeLines(stderrOf(context), report.warnings);
    if (report.files) {
      stderrOf(context).write(
        `Exported ${String(report.files.length)} objects to ${directory ?? '.'}\n`,
      );
    }
    if (report.missingIds.length > 0) {
      stderrOf(context).write(`Not found: ${report.missingIds.join(', ')}\n`);
    }
    if (report.aborted) {
      const unfetched =
        report.unfetchedIds.length > 0 ? `; not fetched: ${report.unfetchedIds.join(', ')}` : '';
      stderrOf(context).write(
        `Export interrupted after ${String(report.batch.length)} objects${unfetched}\n`,
      );
      exit(1);
      return;
    }
    exit(0);
  } catch (err) {
    if (err instanceof PartialExportError) {
      log.warn({ 'objects.missing': err.missingIds }, err.message);
    }
    reportError(context, err);
    exit(1);
  }
}

function importSource(path: string): ImportSource {
  if (path === '-') {
    return { kind: 'stream', stream: process.stdin };
  }
  if (existsSync(path) && statSync(path).isDirectory()) {
    return { kind: 'directory', path };
  }
  return { kind: 'file', path };
}

async function importCommand(
  namespace: string,
  args: string[],
  exit: ExitFn,
  context: CommandContext,
): Promise<void> {
  const overwrite = takeSwitch(args, ['--overwrite']);
  const path = args[0];
  if (path === undefined) {
    printUsageError(context, usage(namespace), exit);
    return;
  }

  const report = await importObjects(
    context.config,
    {
      target: context.target,
      source: importSource(path),
      overwrite,
      types: NAMESPACES[namespace],
    },
    context.deps,
  );
  writeLines(stderrOf(context), report.warnings);
  writeLines(stdoutOf(context), formatOutcomeTable(report.outcomes));

  const failed = report.outcomes.filter((outcome) => outcome.status === 'failed').length;
  exit(failed > 0 ? 1 : 0);
}

async function deleteCommand(
  namespace: string,
  args: string[],
  exit: ExitFn,
  context: CommandContext,
): Promise<void> {
  const types = NAMESPACES[namespace] ?? [];
  const [type, id] = types.length === 1 ? [types[0], args[0]] : [args[0], args[1]];
  if (type === undefined || id === undefined) {
    printUsageError(context, usage(namespace), exit);
    return;
  }

  const session = await openSession(context.config, context.target, context.deps);
  writeLines(stderrOf(context), session.warnings);
  const deleted = await session.repository.delete(type, id);
  stdoutOf(context).write(
    deleted ? `Deleted ${type} '${id}'\n` : `${type} '${id}' does not exist, nothing to delete\n`,
  );
  exit(0);
}

/**
 * Main entry point for the saved object namespaces.
 *
 * @param namespace - One of {@link NAMESPACES}
 * @param exit - Exit callback (process.exit for the CLI, mocked in tests)
 * @param context - Configuration, arguments and injected dependencies
 */
export async function main(
  namespace: string,
  exit: ExitFn,
  context: CommandContext,
): Promise<void> {
  const [subcommand, ...rest] = context.args;

  try {
    switch (subcommand) {
      case 'list':
        await listCommand(namespace, exit, context);
        return;
      case 'export':
        await exportCommand(namespace, rest, exit, context);
        return;
      case 'import':
        await importCommand(namespace, rest, exit, context);
        return;
      case 'delete':
        await deleteCommand(namespace, rest, exit, context);
        return;
      default:
        printUsageError(context, usage(namespace), exit);
    }
  } catch (err) {
    reportError(context, err);
    exit(1);
  }
}
