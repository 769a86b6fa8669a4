import { TAGGER_CONFIG } from '../config';
import { describeError } from '../errors';
import { FirecrawlService } from '../services/firecrawl';
import { OpenAIService } from '../services/openai';
import { formatTags, resolveTagsColumn } from '../utils/column-utils';
import { InterestExtractor } from './interest-extractor';
import { ProfileLookup } from './profile-lookup';
import type {
  ConnectionRecord,
  CSVRow,
  InterestTagSet,
  NormalizationResult,
  ProcessingOutcome,
  ProgressCallback,
  RecordOutcome,
  RecordState,
  SnippetSet,
  TaggingRunResult,
  TaggingSummary,
} from '../types';

export interface InterestTaggingStrategyOptions {
  firecrawlApiKey: string;
  openaiApiKey: string;
  model?: string;
  snippetLimit?: number;
  vocabulary?: readonly string[];
  restrictToVocabulary?: boolean;
}

export interface ProcessRecordsOptions {
  /** Header row of the input, used to pick a non-clashing tags column. */
  headers: readonly string[];
  maxRecords?: number;
  tagsColumn?: string;
  onProgress?: ProgressCallback;
}

export interface RecordEnrichment {
  path: RecordState[];
  outcome: ProcessingOutcome;
  tags: InterestTagSet;
}

function sourceRow(entry: NormalizationResult): CSVRow {
  return { ...(entry.status === 'normalized' ? entry.record.row : entry.row) };
}

function summarize(outcomes: RecordOutcome[], rows: CSVRow[], tagsColumn: string): TaggingSummary {
  const summary: TaggingSummary = {
    total: outcomes.length,
    tagged: 0,
    empty: 0,
    lookupFailed: 0,
    extractionFailed: 0,
    rejected: 0,
    passedThrough: 0,
  };

  outcomes.forEach(({ outcome }, index) => {
    switch (outcome.status) {
      case 'rejected':
        summary.rejected++;
        return;
      case 'skipped':
        summary.passedThrough++;
        return;
      case 'lookup_failed':
        summary.lookupFailed++;
        break;
      case 'extraction_failed':
        summary.extractionFailed++;
        break;
      case 'success':
        break;
    }

    if (rows[index][tagsColumn]) {
      summary.tagged++;
    } else {
      summary.empty++;
    }
  });

  return summary;
}

/**
 * Drives Lookup then Extraction for each record, strictly in input order.
 * Per-record failures are turned into outcomes; nothing thrown by a
 * collaborator escapes a record.
 */
export class InterestTaggingStrategy {
  constructor(
    private lookup: ProfileLookup,
    private extractor: InterestExtractor,
  ) {}

  static fromApiKeys(options: InterestTaggingStrategyOptions): InterestTaggingStrategy {
    const firecrawl = new FirecrawlService(options.firecrawlApiKey);
    const openai = new OpenAIService(options.openaiApiKey, options.model ?? TAGGER_CONFIG.EXTRACTION.MODEL);

    return new InterestTaggingStrategy(
      new ProfileLookup(firecrawl, options.snippetLimit),
      new InterestExtractor(openai, {
        vocabulary: options.vocabulary,
        restrictToVocabulary: options.restrictToVocabulary,
      }),
    );
  }

  async enrichRecord(record: ConnectionRecord): Promise<RecordEnrichment> {
    const path: RecordState[] = ['pending'];
    let snippets: SnippetSet = [];
    let lookupError: string | undefined;

    try {
      snippets = await this.lookup.lookup(record);
      path.push('looked_up');
    } catch (error) {
      lookupError = describeError(error);
      path.push('lookup_failed');
      console.error(`[TAGGER] Lookup failed for ${record.fullName}: ${lookupError}`);
    }

    try {
      const tags = await this.extractor.extract(record, snippets);
      path.push('tagged');

      const outcome: ProcessingOutcome = lookupError === undefined
        ? { status: 'success', tags }
        : { status: 'lookup_failed', reason: lookupError, tags };

      return { path, outcome, tags };
    } catch (error) {
      const reason = describeError(error);
      path.push('extraction_failed', 'tagged');
      console.error(`[TAGGER] Extraction failed for ${record.fullName}: ${reason}`);

      return {
        path,
        outcome: lookupError === undefined
          ? { status: 'extraction_failed', reason }
          : { status: 'extraction_failed', reason, lookupError },
        tags: [],
      };
    }
  }

  async processRecords(entries: NormalizationResult[], options: ProcessRecordsOptions): Promise<TaggingRunResult> {
    const maxRecords = options.maxRecords ?? TAGGER_CONFIG.PROCESSING.MAX_RECORDS;
    const limit = Math.min(maxRecords, entries.length);
    const tagsColumn = resolveTagsColumn(options.headers, options.tagsColumn);
    const report: ProgressCallback = (message, type) => options.onProgress?.(message, type);

    const rows: CSVRow[] = [];
    const outcomes: RecordOutcome[] = [];

    console.log(`[TAGGER] Processing ${limit} of ${entries.length} records into column "${tagsColumn}"`);

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];

      if (i >= limit) {
        rows.push(sourceRow(entry));
        outcomes.push({
          rowIndex: i,
          name: entry.status === 'normalized' ? entry.record.fullName : undefined,
          path: ['passed_through'],
          outcome: { status: 'skipped' },
        });
        continue;
      }

      if (entry.status === 'rejected') {
        const reason = entry.error.message;
        console.warn(`[TAGGER] Skipping row ${i + 1}: ${reason}`);
        report(`Skipping row ${i + 1}/${limit}: ${reason}`, 'warning');

        rows.push(sourceRow(entry));
        outcomes.push({ rowIndex: i, path: ['rejected'], outcome: { status: 'rejected', reason } });
        continue;
      }

      const { record } = entry;
      console.log(`[TAGGER] Processing ${i + 1}/${limit}: ${record.fullName}`);
      report(`Processing ${i + 1}/${limit}: ${record.fullName}`, 'info');

      const { path, outcome, tags } = await this.enrichRecord(record);

      rows.push({ ...record.row, [tagsColumn]: formatTags(tags) });
      outcomes.push({ rowIndex: i, name: record.fullName, path, outcome });

      if (outcome.status === 'success' && tags.length > 0) {
        report(`Tagged ${record.fullName}: ${tags.join(', ')}`, 'success');
      } else if (outcome.status === 'success') {
        report(`No interests found for ${record.fullName}`, 'info');
      } else {
        report(`Degraded result for ${record.fullName} (${outcome.status})`, 'warning');
      }
    }

    const summary = summarize(outcomes, rows, tagsColumn);
    console.log(
      `[TAGGER] Completed: ${summary.tagged} tagged, ${summary.empty} empty, ` +
      `${summary.rejected} rejected, ${summary.passedThrough} passed through`,
    );

    return { rows, outcomes, tagsColumn, summary };
  }
}
