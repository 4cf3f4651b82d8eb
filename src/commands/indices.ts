import { connectTarget } from '../objects/session';
import { IndexNotFoundError } from '../types/errors';
import type { CommandContext, ExitFn } from './context';
import { printUsageError, reportError, stdoutOf } from './context';

const USAGE = 'dashsync index delete <index-name>';

/**
 * `index delete <name>`: delete one index from the cluster.
 */
export async function main(exit: ExitFn, context: CommandContext): Promise<void> {
  const [subcommand, index] = context.args;
  if (subcommand !== 'delete' || index === undefined) {
    printUsageError(context, USAGE, exit);
    return;
  }

  try {
    const { cluster } = connectTarget(context.config, context.target, context.deps);
    if (!(await cluster.deleteIndex(index))) {
      throw new IndexNotFoundError(index);
    }
    stdoutOf(context).write(`Index '${index}' deleted\n`);
    exit(0);
  } catch (err) {
    reportError(context, err);
    exit(1);
  }
}
