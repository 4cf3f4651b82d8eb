/**
 * Lifecycle policy commands.
 *
 * - `ilm info [--all]` prints the lifecycle overview of every index
 * - `ilm <policy> set <warm|cold|delete>-after <days>` moves one phase
 * - `ilm <policy> set rollover <size|none> <docs|none>` sets the hot thresholds
 */

import { toRawPolicy } from '../ilm/composer';
import { getLifecycleInfo } from '../ilm/info';
import { editPolicy } from '../ilm/policies';
import { connectTarget } from '../objects/session';
import { formatLifecycleTable } from '../output';
import type { AgeEdit, PolicyEdit } from '../types/ilm';
import type { CommandContext, ExitFn } from './context';
import {
  printUsageError,
  reportError,
  stdoutOf,
  takeSwitch,
  writeLines,
} from './context';

const USAGE = [
  'dashsync ilm info [--all]',
  '       dashsync ilm <policy> set delete-after|warm-after|cold-after <days>',
  '       dashsync ilm <policy> set rollover <max_size|none> <max_docs|none>',
].join('\n');

const AGE_EDITS: Record<string, AgeEdit['phase']> = {
  'warm-after': 'warm',
  'cold-after': 'cold',
  'delete-after': 'delete',
};

const SIZE_PATTERN = /^\d+(\.\d+)?(b|kb|mb|gb|tb|pb)$/i;

/**
 * Parse the words after `set` into a policy edit.
 *
 * @returns The edit, or undefined when the words do not form one
 */
export function parsePolicyEdit(words: readonly string[]): PolicyEdit | undefined {
  const [kind, first, second] = words;
  if (kind === undefined || first === undefined) {
    return undefined;
  }

  if (kind === 'rollover') {
    if (second === undefined) {
      return undefined;
    }
    const maxSize = first.toLowerCase() === 'none' ? null : first.toLowerCase();
    if (maxSize !== null && !SIZE_PATTERN.test(maxSize)) {
      return undefined;
    }
    let maxDocs: number | null = null;
    if (second.toLowerCase() !== 'none') {
      if (!/^\d+$/.test(second)) {
        return undefined;
      }
      maxDocs = Number(second);
    }
    return { phase: 'rollover', maxSize, maxDocs };
  }

  const phase = AGE_EDITS[kind];
  if (!phase || !/^\d+$/.test(first)) {
    return undefined;
  }
  return { phase, days: Number(first) };
}

async function infoCommand(args: string[], exit: ExitFn, context: CommandContext): Promise<void> {
  const all = takeSwitch(args, ['--all']);
  const { cluster } = connectTarget(context.config, context.target, context.deps);
  const rows = await getLifecycleInfo(cluster, { all });

  if (rows.length === 0) {
    stdoutOf(context).write('No indices found\n');
  } else {
    writeLines(stdoutOf(context), formatLifecycleTable(rows));
  }
  exit(0);
}

async function setCommand(
  policyName: string,
  edit: PolicyEdit,
  exit: ExitFn,
  context: CommandContext,
): Promise<void> {
  const { cluster } = connectTarget(context.config, context.target, context.deps);
  const result = await editPolicy(cluster, policyName, edit);
  if (result.isErr()) {
    reportError(context, result.error);
    exit(1);
    return;
  }

  const output = { name: result.value.name, policy: toRawPolicy(result.value) };
  stdoutOf(context).write(`${JSON.stringify(output, null, 2)}\n`);
  exit(0);
}

/**
 * Main entry point for `ilm`.
 *
 * @param exit - Exit callback (process.exit for the CLI, mocked in tests)
 * @param context - Configuration, arguments and injected dependencies
 */
export async function main(exit: ExitFn, context: CommandContext): Promise<void> {
  const [first, second, ...rest] = context.args;

  try {
    if (first === 'info') {
      await infoCommand(second === undefined ? rest : [second, ...rest], exit, context);
      return;
    }

    const edit = second === 'set' ? parsePolicyEdit(rest) : undefined;
    if (first === undefined || edit === undefined) {
      printUsageError(context, USAGE, exit);
      return;
    }
    await setCommand(first, edit, exit, context);
  } catch (err) {
    reportError(context, err);
    exit(1);
  }
}
