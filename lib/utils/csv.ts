import fs from 'fs/promises';
import path from 'path';
import Papa from 'papaparse';
import { InputError, WriteError, describeError } from '../errors';
import type { ColumnMapping, CSVRow } from '../types';

export interface ConnectionsTable {
  headers: string[];
  rows: CSVRow[];
  /** Lines above the header row, e.g. the "Notes:" block of a LinkedIn export. */
  preamble: string[][];
  hasNotes: boolean;
  /** The configured columns, spelled as they appear in this file's header row. */
  columns: ColumnMapping;
}

// How far down the file to look for the header row
const MAX_PREAMBLE_ROWS = 10;

function findHeaderIndex(data: string[][], columns: ColumnMapping): number {
  const required = [columns.firstName, columns.lastName].map(c => c.toLowerCase());
  const scanned = data.slice(0, MAX_PREAMBLE_ROWS + 1);

  return scanned.findIndex(cells => {
    const normalized = cells.map(cell => cell.trim().toLowerCase());
    return required.every(column => normalized.includes(column));
  });
}

function resolveColumns(headers: string[], columns: ColumnMapping): ColumnMapping {
  const spell = (name: string) => headers.find(header => header.toLowerCase() === name.toLowerCase()) ?? name;

  return {
    firstName: spell(columns.firstName),
    lastName: spell(columns.lastName),
    company: spell(columns.company),
    position: spell(columns.position),
    url: spell(columns.url),
    notes: spell(columns.notes),
  };
}

function findDuplicates(headers: string[]): string[] {
  return headers.filter((header, index) => headers.indexOf(header) !== index);
}

/**
 * Parses CSV text into header-keyed rows. Leading lines before the row that
 * names the first/last name columns are kept aside as preamble.
 */
export function parseConnectionsCsv(content: string, columns: ColumnMapping): ConnectionsTable {
  const parsed = Papa.parse<string[]>(content.replace(/^\uFEFF/, ''), {
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  if (parsed.errors.length > 0) {
    const [first] = parsed.errors;
    const location = first.row === undefined ? '' : ` at row ${first.row + 1}`;
    throw new InputError(`Malformed CSV${location}: ${first.message}`);
  }

  const data = parsed.data;
  if (data.length === 0) {
    throw new InputError('CSV file is empty');
  }

  const headerIndex = findHeaderIndex(data, columns);
  if (headerIndex === -1) {
    throw new InputError(
      `CSV is missing required columns: ${columns.firstName}, ${columns.lastName}`,
    );
  }

  const headers = data[headerIndex].map(header => header.trim());
  const duplicates = findDuplicates(headers);
  if (duplicates.length > 0) {
    throw new InputError(`CSV has duplicate column names: ${[...new Set(duplicates)].join(', ')}`);
  }

  const resolved = resolveColumns(headers, columns);
  const rows = data.slice(headerIndex + 1).map(cells => {
    const row: CSVRow = {};
    headers.forEach((header, index) => {
      row[header] = (cells[index] ?? '').trim();
    });
    return row;
  });

  if (headerIndex > 0) {
    console.log(`[CSV] Skipped ${headerIndex} preamble line(s) before the header row`);
  }

  return {
    headers,
    rows,
    preamble: data.slice(0, headerIndex),
    hasNotes: headers.includes(resolved.notes),
    columns: resolved,
  };
}

export async function readConnectionsCsv(filePath: string, columns: ColumnMapping): Promise<ConnectionsTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputError(`Could not read input file ${filePath}: ${describeError(error)}`, { cause: error });
  }

  return parseConnectionsCsv(content, columns);
}

export function serializeCsv(rows: CSVRow[], columns: readonly string[]): string {
  const header = [...columns];
  const body = rows.map(row => columns.map(column => row[column] ?? ''));
  return Papa.unparse([header, ...body], { newline: '\n' });
}

/**
 * Writes the rows to `filePath`, replacing any existing file. The content
 * goes to a sibling temp file first and is renamed into place, so the target
 * either holds the full output or is left untouched.
 */
export async function writeEnrichedCsv(
  filePath: string,
  rows: CSVRow[],
  columns: readonly string[],
): Promise<void> {
  const content = serializeCsv(rows, columns);
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );

  try {
    await fs.writeFile(tempPath, `${content}\n`, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.error(`[CSV] Could not remove temp file ${tempPath}:`, describeError(cleanupError));
    });
    throw new WriteError(filePath, { cause: error });
  }

  console.log(`[CSV] Wrote ${rows.length} rows to ${filePath}`);
}
