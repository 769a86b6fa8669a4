import type { TaggerConfig } from './config';
import { InputError, WriteError } from './errors';
import { InterestTaggingStrategy } from './strategies/interest-tagging-strategy';
import { readConnectionsCsv, writeEnrichedCsv } from './utils/csv';
import { loadInterestVocabulary } from './utils/interest-vocabulary';
import { normalizeConnectionRows } from './utils/record-normalizer';
import type { ProgressCallback, RecordOutcome, TaggingRunResult } from './types';

export interface RunTaggerOptions {
  inputPath: string;
  config: TaggerConfig;
  /** Injected in tests; built from the config's API keys otherwise. */
  strategy?: InterestTaggingStrategy;
  vocabularyPath?: string;
  onProgress?: ProgressCallback;
}

export interface RunTaggerResult extends TaggingRunResult {
  outputPath: string;
}

/** Strips surrounding whitespace and quote characters from a pasted path. */
export function cleanInputPath(raw: string): string {
  return raw.trim().replace(/^['"]+|['"]+$/g, '').trim();
}

function reportProcessed(outcomes: RecordOutcome[]): void {
  const processed = outcomes.filter(o => o.outcome.status !== 'skipped');
  console.error(`[TAGGER] ${processed.length} record(s) were processed before the write failed:`);
  processed.forEach(({ rowIndex, name, outcome }) => {
    console.error(`  row ${rowIndex + 1}${name ? ` (${name})` : ''}: ${outcome.status}`);
  });
}

export async function runTagger(options: RunTaggerOptions): Promise<RunTaggerResult> {
  const { config } = options;
  const inputPath = cleanInputPath(options.inputPath);
  if (!inputPath) {
    throw new InputError('No input file given');
  }

  const table = await readConnectionsCsv(inputPath, config.columns);
  console.log(`[TAGGER] Loaded ${table.rows.length} rows from ${inputPath}${table.hasNotes ? ' (with notes)' : ''}`);

  const entries = normalizeConnectionRows(table.rows, {
    hasNotes: table.hasNotes,
    columns: table.columns,
  });

  const strategy = options.strategy ?? InterestTaggingStrategy.fromApiKeys({
    firecrawlApiKey: config.firecrawlApiKey,
    openaiApiKey: config.openaiApiKey,
    model: config.model,
    snippetLimit: config.snippetLimit,
    vocabulary: await loadInterestVocabulary(options.vocabularyPath),
    restrictToVocabulary: config.restrictToVocabulary,
  });

  const result = await strategy.processRecords(entries, {
    headers: table.headers,
    maxRecords: config.maxRecords,
    onProgress: options.onProgress,
  });

  try {
    await writeEnrichedCsv(config.outputFile, result.rows, [...table.headers, result.tagsColumn]);
  } catch (error) {
    if (error instanceof WriteError) {
      reportProcessed(result.outcomes);
    }
    throw error;
  }

  return { ...result, outputPath: config.outputFile };
}
