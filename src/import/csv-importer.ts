/**
 * CSV import of tracked time.
 *
 * Expected header (column order is free, names are case-insensitive):
 *   team,member,feature,hours,process,date
 * `member_name` and `tracked_time_hours` are accepted as aliases.
 */

import * as fs from 'node:fs/promises';
import { ValidationError } from '../models/errors.js';
import type { RowError } from '../models/errors.js';
import { logger } from '../logging/index.js';
import { validateTrackedTimeInput } from '../estimation/tracked-time-store.js';
import type { TrackedTimeStore } from '../estimation/tracked-time-store.js';
import type { CreateTrackedTimeInput, TrackedTimeEntry } from '../estimation/types.js';

const log = logger.child('CsvImporter');

type Column = 'team' | 'member' | 'feature' | 'hours' | 'process' | 'date';

const REQUIRED_COLUMNS: readonly Column[] = ['team', 'member', 'feature', 'hours'];

const COLUMN_ALIASES: Record<string, Column> = {
  team: 'team',
  member: 'member',
  member_name: 'member',
  feature: 'feature',
  hours: 'hours',
  tracked_time_hours: 'hours',
  process: 'process',
  date: 'date',
};

export interface CsvImportResult {
  accepted: TrackedTimeEntry[];
  rejected: RowError[];
  /** Data rows, header excluded */
  totalRows: number;
}

/**
 * RFC 4180 style parsing: double-quoted fields may hold commas, line breaks
 * and `""` escapes. Blank lines are dropped.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  const endRow = () => {
    row.push(field);
    if (row.length > 1 || row[0].trim().length > 0) {
      rows.push(row);
    }
    row = [];
    field = '';
  };

  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  for (let i = 0; i < input.length; i++) {
    const char = input[i];

    if (quoted) {
      if (char === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n') {
      endRow();
    } else if (char === '\r') {
      if (input[i + 1] === '\n') i++;
      endRow();
    } else {
      field += char;
    }
  }

  if (quoted) {
    throw new ValidationError('csv', 'unterminated quoted field', 'must close every quoted field');
  }
  if (field.length > 0 || row.length > 0) {
    endRow();
  }
  return rows;
}

function mapHeader(header: string[]): Map<Column, number> {
  const columns = new Map<Column, number>();
  header.forEach((name, index) => {
    const column = COLUMN_ALIASES[name.trim().toLowerCase()];
    if (column && !columns.has(column)) {
      columns.set(column, index);
    }
  });

  const missing = REQUIRED_COLUMNS.filter(column => !columns.has(column));
  if (missing.length > 0) {
    throw new ValidationError('csv', header.join(','), `is missing required columns: ${missing.join(', ')}`);
  }
  return columns;
}

function parseHours(cell: string): number {
  const trimmed = cell.trim();
  return trimmed.length === 0 ? Number.NaN : Number(trimmed);
}

function toInput(cells: string[], columns: Map<Column, number>): CreateTrackedTimeInput {
  const cell = (column: Column): string | undefined => {
    const index = columns.get(column);
    return index === undefined ? undefined : cells[index];
  };
  const optional = (column: Column): string | undefined => {
    const value = cell(column)?.trim();
    return value ? value : undefined;
  };

  return {
    team: cell('team') ?? '',
    memberName: cell('member') ?? '',
    feature: cell('feature') ?? '',
    hours: parseHours(cell('hours') ?? ''),
    process: optional('process'),
    date: optional('date'),
  };
}

/**
 * Parses tracked time CSV. With a store the valid rows are ingested in one
 * batch; without one they are only validated. Row numbers count the header
 * as row 1.
 *
 * @throws ValidationError when a required column is missing
 */
export function importTrackedTimeCsv(text: string, store?: TrackedTimeStore): CsvImportResult {
  const [header, ...rows] = parseCsv(text);
  if (!header) {
    throw new ValidationError('csv', '', 'must contain a header row');
  }
  const columns = mapHeader(header);
  const inputs = rows.map(cells => toInput(cells, columns));
  const rowNumberOf = (index: number) => index + 2;

  let result: CsvImportResult;
  if (store) {
    const batch = store.addMany(inputs, rowNumberOf);
    result = { ...batch, totalRows: inputs.length };
  } else {
    const accepted: TrackedTimeEntry[] = [];
    const rejected: RowError[] = [];
    inputs.forEach((input, index) => {
      const { entry, errors } = validateTrackedTimeInput(input);
      if (entry) accepted.push(entry);
      else rejected.push({ rowNumber: rowNumberOf(index), errors });
    });
    result = { accepted, rejected, totalRows: inputs.length };
  }

  log.info('Tracked time CSV imported', {
    totalRows: result.totalRows,
    accepted: result.accepted.length,
    rejected: result.rejected.length,
  });
  return result;
}

export async function importTrackedTimeFile(filePath: string, store?: TrackedTimeStore): Promise<CsvImportResult> {
  const text = await fs.readFile(filePath, 'utf-8');
  return importTrackedTimeCsv(text, store);
}

const OUTPUT_COLUMNS: readonly Column[] = ['team', 'member', 'feature', 'hours', 'process', 'date'];

function escapeCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function formatRow(cells: readonly string[]): string {
  return cells.map(escapeCell).join(',');
}

function entryCells(entry: TrackedTimeEntry): Record<Column, string> {
  return {
    team: entry.team,
    member: entry.memberName,
    feature: entry.feature,
    hours: String(entry.hours),
    process: entry.process ?? '',
    date: entry.date ? entry.date.toISOString() : '',
  };
}

/**
 * One line per entry, cells in the order of `header`. Header columns the
 * importer does not know stay empty.
 */
function formatEntries(entries: readonly TrackedTimeEntry[], header: readonly string[]): string[] {
  const columns = header.map(name => COLUMN_ALIASES[name.trim().toLowerCase()]);
  return entries.map(entry => {
    const cells = entryCells(entry);
    return formatRow(columns.map(column => (column ? cells[column] : '')));
  });
}

/**
 * Inverse of the import, used to write entries to a new file.
 */
export function formatTrackedTimeCsv(entries: readonly TrackedTimeEntry[]): string {
  return [OUTPUT_COLUMNS.join(','), ...formatEntries(entries, OUTPUT_COLUMNS)].join('\n') + '\n';
}

export type TrackedTimeCsvChange =
  | { kind: 'append'; text: string }
  | { kind: 'rewrite'; text: string };

/**
 * Works out how to add `entries` to an existing tracked-time CSV without
 * touching the rows already there, valid or not. New lines follow the
 * file's own header; when the header lacks a `process` or `date` column the
 * entries need, the file is rewritten with the column added and every
 * existing row kept cell for cell.
 *
 * @throws ValidationError when the existing header lacks a required column
 */
export function appendTrackedTimeCsv(existing: string, entries: readonly TrackedTimeEntry[]): TrackedTimeCsvChange {
  const rows = parseCsv(existing);
  const [header] = rows;
  if (!header) {
    return { kind: 'rewrite', text: formatTrackedTimeCsv(entries) };
  }

  const columns = mapHeader(header);
  const missing: Column[] = [];
  if (!columns.has('process') && entries.some(entry => entry.process)) missing.push('process');
  if (!columns.has('date') && entries.some(entry => entry.date)) missing.push('date');

  if (missing.length === 0) {
    const separator = /[\r\n]$/.test(existing) ? '' : '\n';
    return { kind: 'append', text: separator + formatEntries(entries, header).join('\n') + '\n' };
  }

  const extended = [...header, ...missing];
  const kept = rows.slice(1).map(cells => formatRow([
    ...header.map((_, index) => cells[index] ?? ''),
    ...missing.map(() => ''),
    ...cells.slice(header.length),
  ]));
  const lines = [formatRow(extended), ...kept, ...formatEntries(entries, extended)];
  return { kind: 'rewrite', text: lines.join('\n') + '\n' };
}
