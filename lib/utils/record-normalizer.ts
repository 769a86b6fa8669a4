import { DEFAULT_COLUMNS } from '../config';
import { NormalizationError } from '../errors';
import type { ColumnMapping, ConnectionRecord, CSVRow, NormalizationResult } from '../types';

export interface NormalizeOptions {
  hasNotes: boolean;
  columns?: ColumnMapping;
}

function clean(value: string | undefined): string {
  return (value ?? '').trim().replace(/\s+/g, ' ');
}

function optional(value: string | undefined): string | undefined {
  const cleaned = clean(value);
  return cleaned ? cleaned : undefined;
}

/**
 * Builds a ConnectionRecord from one raw input row. Rows without a first or
 * last name are rejected rather than partially built.
 */
export function normalizeConnectionRow(row: CSVRow, options: NormalizeOptions): NormalizationResult {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const original: CSVRow = { ...row };

  const firstName = clean(row[columns.firstName]);
  const lastName = clean(row[columns.lastName]);

  const missing: string[] = [];
  if (!firstName) missing.push(columns.firstName);
  if (!lastName) missing.push(columns.lastName);

  if (missing.length > 0) {
    return {
      status: 'rejected',
      row: original,
      error: new NormalizationError(`Missing ${missing.join(' and ')}`, missing),
    };
  }

  const record: ConnectionRecord = {
    fullName: `${firstName} ${lastName}`,
    firstName,
    lastName,
    row: original,
  };

  const company = optional(row[columns.company]);
  const position = optional(row[columns.position]);
  const profileUrl = optional(row[columns.url]);
  const notes = options.hasNotes ? optional(row[columns.notes]) : undefined;

  if (company) record.company = company;
  if (position) record.position = position;
  if (profileUrl) record.profileUrl = profileUrl;
  if (notes) record.notes = notes;

  return { status: 'normalized', record };
}

export function normalizeConnectionRows(rows: CSVRow[], options: NormalizeOptions): NormalizationResult[] {
  return rows.map(row => normalizeConnectionRow(row, options));
}
