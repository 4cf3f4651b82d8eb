#!/usr/bin/env node

// OTEL auto-instrumentation must be loaded BEFORE any other imports
// to properly hook into Node.js modules
const noOtel = process.argv.includes('--no-otel');
if (!noOtel) {
  process.env.OTEL_SERVICE_NAME = process.env.OTEL_SERVICE_NAME ?? 'dashsync';
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  require('@elastic/opentelemetry-node');
}

import { readFileSync } from 'fs';
import { join } from 'path';
import { getConfigPaths, loadEnv } from './config';
import { createLogger, flushLogs } from './logger';
import type { CommandContext, ExitFn } from './commands/context';
import { printUsageError, reportError, takeFlag } from './commands/context';
import * as ilmCommand from './commands/ilm';
import * as indexCommand from './commands/indices';
import * as objectsCommand from './commands/objects';
import * as queryCommand from './commands/query';
import * as targetCommand from './commands/targets';
import type { AppConfig } from './types/config';
import { isRecord } from './utils';
import { loadServersConfig, validateRuntimeConfig } from './validation';

const log = createLogger('cli');

const COMMANDS: Record<string, string> = {
  'saved-object': 'List, export, import or delete saved objects of any type',
  dashboard: 'List, export, import or delete dashboards',
  visualization: 'List, export, import or delete visualizations',
  search: 'List, export, import or delete saved searches',
  'index-pattern': 'List, export, import or delete index patterns',
  ilm: 'Show lifecycle info or edit lifecycle policy phases',
  index: 'Delete an index',
  target: 'List configured servers',
};

function printUsage(): void {
  console.log(`
dashsync - Saved object and lifecycle policy management for search clusters

Usage: dashsync [-t <server>] <command> [options]

Commands:
${Object.entries(COMMANDS)
  .map(([name, description]) => `  ${name.padEnd(15)} ${description}`)
  .join('\n')}
  <endpoint>      Any other words are sent to the cluster API (e.g., cat indices)

Options:
  -t, --target   Server name from the configuration (default: first server)
  --help, -h     Show this help message
  --version, -v  Show version
  --no-otel      Disable OpenTelemetry instrumentation

Examples:
  dashsync dashboard list                       List dashboards
  dashsync dashboard export --to-file ./out     One file per dashboard
  dashsync -t prod saved-object export > all.ndjson
  dashsync -t staging saved-object import all.ndjson --overwrite
  dashsync ilm info --all                       Lifecycle overview of every index
  dashsync ilm logs set delete-after 30         Delete 'logs' indices after 30 days
  dashsync cat indices?v                        GET /_cat/indices?v
`);
}

function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  return isRecord(parsed) && typeof parsed.version === 'string' ? parsed.version : 'unknown';
}

/**
 * Validate the environment and the server profile file.
 *
 * @returns The configuration, or undefined after reporting the error
 */
function loadConfig(exit: ExitFn): AppConfig | undefined {
  const runtimeResult = validateRuntimeConfig();
  if (runtimeResult.isErr()) {
    reportError({}, runtimeResult.error);
    exit(1);
    return undefined;
  }

  const serversResult = loadServersConfig(runtimeResult.value.configFile);
  if (serversResult.isErr()) {
    reportError({}, serversResult.error);
    exit(1);
    return undefined;
  }

  log.debug(getConfigPaths(runtimeResult.value.configFile), 'Configuration loaded');
  return { runtime: runtimeResult.value, servers: serversResult.value };
}

async function dispatch(command: string, exit: ExitFn, context: CommandContext): Promise<void> {
  if (objectsCommand.isNamespace(command)) {
    await objectsCommand.main(command, exit, context);
    return;
  }
  switch (command) {
    case 'ilm':
      await ilmCommand.main(exit, context);
      return;
    case 'index':
      await indexCommand.main(exit, context);
      return;
    case 'target':
      targetCommand.main(exit, context);
      return;
    default:
      await queryCommand.main(exit, { ...context, args: [command, ...context.args] });
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2).filter((arg) => arg !== '--no-otel');

  // Create exit callback that flushes logs first
  const exit = (code: number): void => {
    flushLogs();
    process.exit(code);
  };

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`dashsync v${readVersion()}`);
    exit(0);
    return;
  }

  const target = takeFlag(args, ['-t', '--target']);
  if (target === '') {
    printUsageError({}, 'dashsync -t/--target <server> <command>', exit);
    return;
  }

  const [command, ...rest] = args;
  if (args.includes('--help') || args.includes('-h') || command === undefined) {
    printUsage();
    exit(0);
    return;
  }

  // Load environment variables before validating anything
  loadEnv();

  const config = loadConfig(exit);
  if (!config) {
    return;
  }

  const controller = new AbortController();
  process.once('SIGINT', () => {
    log.info('Interrupted, finishing in-flight requests');
    controller.abort();
  });

  await dispatch(command, exit, {
    config,
    args: rest,
    target,
    deps: { signal: controller.signal },
  });
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Fatal error:', message);
  flushLogs();
  process.exit(1);
});
