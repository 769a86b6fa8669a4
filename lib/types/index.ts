import type { NormalizationError } from '../errors';

export interface CSVRow {
  [key: string]: string;
}

/** Input header names for the fields the pipeline reads. */
export interface ColumnMapping {
  firstName: string;
  lastName: string;
  company: string;
  position: string;
  url: string;
  notes: string;
}

export interface ConnectionRecord {
  fullName: string;
  firstName: string;
  lastName: string;
  company?: string;
  position?: string;
  profileUrl?: string;
  notes?: string;
  /** Copy of the source row, every column verbatim. */
  row: CSVRow;
}

export type NormalizationResult =
  | { status: 'normalized'; record: ConnectionRecord }
  | { status: 'rejected'; row: CSVRow; error: NormalizationError };

export interface SearchResult {
  url: string;
  title: string;
  description: string;
}

export interface SearchProvider {
  search(query: string, options: { limit: number }): Promise<SearchResult[]>;
}

export interface GenerationOptions {
  temperature: number;
  maxTokens: number;
}

export interface TextGenerator {
  generate(prompt: string, options: GenerationOptions): Promise<string>;
}

export type SnippetSet = string[];

export type InterestTagSet = string[];

export type ProcessingOutcome =
  | { status: 'success'; tags: InterestTagSet }
  | { status: 'lookup_failed'; reason: string; tags: InterestTagSet }
  | { status: 'extraction_failed'; reason: string; lookupError?: string }
  | { status: 'rejected'; reason: string }
  | { status: 'skipped' };

export type RecordState =
  | 'pending'
  | 'looked_up'
  | 'lookup_failed'
  | 'extraction_failed'
  | 'tagged'
  | 'rejected'
  | 'passed_through';

export interface RecordOutcome {
  rowIndex: number;
  name?: string;
  /** States the record moved through, ending in a terminal state. */
  path: RecordState[];
  outcome: ProcessingOutcome;
}

export type ProgressType = 'info' | 'success' | 'warning';

export type ProgressCallback = (message: string, type: ProgressType) => void;

/**
 * Row counts for one run. `lookupFailed` and `extractionFailed` count rows by
 * outcome status, so a row whose lookup and extraction both failed is counted
 * once, as an extraction failure.
 */
export interface TaggingSummary {
  total: number;
  tagged: number;
  empty: number;
  lookupFailed: number;
  extractionFailed: number;
  rejected: number;
  passedThrough: number;
}

export interface TaggingRunResult {
  rows: CSVRow[];
  outcomes: RecordOutcome[];
  tagsColumn: string;
  summary: TaggingSummary;
}
