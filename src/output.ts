/**
 * Terminal output helpers for the CLI commands.
 */

import chalk from 'chalk';
import type { ImportOutcome, SavedObjectRecord } from './types/saved-objects';
import { recordTitle } from './types/saved-objects';
import type { LifecycleRow } from './types/ilm';
import { formatBytes } from './utils';

/**
 * Render rows as a plain text table with a dashed rule under the header.
 *
 * @param headers - Column headers
 * @param rows - Cell values; missing cells render empty
 * @param paint - Optional colour per row, applied to every cell
 * @returns Lines of the table, without trailing newline
 */
export function formatTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  paint?: (rowIndex: number, text: string) => string,
): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length)),
  );

  const headerLine = headers.map((header, column) => header.padEnd(widths[column] ?? 0)).join('  ');
  const lines = [headerLine.trimEnd(), '-'.repeat(headerLine.trimEnd().length)];

  rows.forEach((row, rowIndex) => {
    const cells = widths.map((width, column) => {
      const cell = (row[column] ?? '').padEnd(width);
      return paint ? paint(rowIndex, cell) : cell;
    });
    lines.push(cells.join('  ').trimEnd());
  });
  return lines;
}

const PHASE_COLOURS: Record<string, (text: string) => string> = {
  hot: chalk.red,
  warm: chalk.yellow,
  cold: chalk.cyan,
  frozen: chalk.blue,
  delete: chalk.magenta,
};

export function paintPhase(phase: string, text: string): string {
  const paint = PHASE_COLOURS[phase];
  return paint ? paint(text) : text;
}

export function formatDate(date: Date | undefined): string {
  return date ? (date.toISOString().split('T')[0] ?? '-') : '-';
}

export function formatObjectTable(records: readonly SavedObjectRecord[]): string[] {
  return formatTable(
    ['Type', 'ID', 'Title'],
    records.map((record) => [record.type, record.id, recordTitle(record)]),
  );
}

export function formatOutcomeTable(outcomes: readonly ImportOutcome[]): string[] {
  return formatTable(
    ['Type', 'ID', 'Status', 'Error'],
    outcomes.map((outcome) => [
      outcome.type,
      outcome.id,
      outcome.status,
      outcome.error ? `${outcome.error.kind}: ${outcome.error.message}` : '',
    ]),
  );
}

export function formatLifecycleTable(rows: readonly LifecycleRow[]): string[] {
  return formatTable(
    ['Index', 'Size', 'Policy', 'Phase', 'Age', 'Warm At', 'Cold At', 'Delete At'],
    rows.map((row) => [
      row.index,
      formatBytes(row.sizeBytes),
      row.policy,
      row.phase,
      row.age,
      formatDate(row.warmAt),
      formatDate(row.coldAt),
      formatDate(row.deleteAt),
    ]),
    (rowIndex, text) => paintPhase(rows[rowIndex]?.phase ?? '', text),
  );
}
