import { listTargets } from '../targets';
import { formatTable } from '../output';
import type { CommandContext, ExitFn } from './context';
import { printUsageError, stdoutOf, writeLines } from './context';

const USAGE = 'dashsync target list';

/**
 * `target list`: declared targets with their resolved URLs.
 */
export function main(exit: ExitFn, context: CommandContext): void {
  const [subcommand] = context.args;
  if (subcommand !== 'list') {
    printUsageError(context, USAGE, exit);
    return;
  }

  const targets = listTargets(context.config.servers);
  if (targets.length === 0) {
    stdoutOf(context).write('No servers configured\n');
    exit(0);
    return;
  }

  writeLines(
    stdoutOf(context),
    formatTable(
      ['Name', 'Cluster URL', 'Dashboards URL', 'Default'],
      targets.map((target) => [
        target.name,
        target.clusterBaseUrl,
        target.dashboardsBaseUrl,
        target.isDefault ? 'yes' : '',
      ]),
    ),
  );
  exit(0);
}
