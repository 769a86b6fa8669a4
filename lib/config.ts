import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { ColumnMapping } from './types';

// Configuration for the interest tagger
export const TAGGER_CONFIG = {
  // Default header names of a LinkedIn connections export
  COLUMNS: {
    FIRST_NAME: 'First Name',
    LAST_NAME: 'Last Name',
    COMPANY: 'Company',
    POSITION: 'Position',
    URL: 'URL',
    NOTES: 'Notes',
  },

  PROCESSING: {
    MAX_RECORDS: 5,
    SNIPPET_LIMIT: 10,
  },

  EXTRACTION: {
    MODEL: 'gpt-4o',
    TEMPERATURE: 0.3,
    MAX_TOKENS: 500,
    MAX_PROFILE_CHARS: 2000,
    MAX_TAGS: 10,
    MAX_TAG_LENGTH: 48,
    MAX_TAG_WORDS: 5,
  },

  OUTPUT: {
    FILE: 'linkedin_connections_with_interests.csv',
    TAGS_COLUMN: 'Interests',
    TAG_DELIMITER: ';',
  },
} as const;

export const ERROR_MESSAGES = {
  MISSING_API_KEYS: 'Set OPENAI_API_KEY and FIRECRAWL_API_KEY in your environment or .env file.',
  INVALID_CONFIGURATION: 'Invalid configuration',
} as const;

export const DEFAULT_COLUMNS: ColumnMapping = {
  firstName: TAGGER_CONFIG.COLUMNS.FIRST_NAME,
  lastName: TAGGER_CONFIG.COLUMNS.LAST_NAME,
  company: TAGGER_CONFIG.COLUMNS.COMPANY,
  position: TAGGER_CONFIG.COLUMNS.POSITION,
  url: TAGGER_CONFIG.COLUMNS.URL,
  notes: TAGGER_CONFIG.COLUMNS.NOTES,
};

// Blank assignments in a .env file mean "use the default"
const blankAsUnset = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const apiKey = (name: string) =>
  z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

export const TaggerEnvSchema = z.object({
  OPENAI_API_KEY: apiKey('OPENAI_API_KEY'),
  FIRECRAWL_API_KEY: apiKey('FIRECRAWL_API_KEY'),
  OPENAI_MODEL: z.preprocess(blankAsUnset, z.string().default(TAGGER_CONFIG.EXTRACTION.MODEL)),
  TAGGER_MAX_RECORDS: positiveInt(TAGGER_CONFIG.PROCESSING.MAX_RECORDS),
  TAGGER_SNIPPET_LIMIT: positiveInt(TAGGER_CONFIG.PROCESSING.SNIPPET_LIMIT),
  TAGGER_OUTPUT_FILE: z.preprocess(blankAsUnset, z.string().default(TAGGER_CONFIG.OUTPUT.FILE)),
  TAGGER_RESTRICT_TO_VOCABULARY: z.preprocess(
    blankAsUnset,
    z
      .enum(['true', 'false', '1', '0'])
      .default('false')
      .transform(value => value === 'true' || value === '1'),
  ),
});

export interface TaggerConfig {
  openaiApiKey: string;
  firecrawlApiKey: string;
  model: string;
  maxRecords: number;
  snippetLimit: number;
  outputFile: string;
  restrictToVocabulary: boolean;
  columns: ColumnMapping;
}

/**
 * Reads and validates the tagger configuration from environment variables.
 * Throws a ConfigurationError naming every offending variable.
 */
export function loadTaggerConfig(env: NodeJS.ProcessEnv = process.env): TaggerConfig {
  const parsed = TaggerEnvSchema.safeParse(env);

  if (!parsed.success) {
    const variables = parsed.error.issues.map(issue => issue.path.join('.'));
    const missingKeys = variables.some(v => v === 'OPENAI_API_KEY' || v === 'FIRECRAWL_API_KEY');

    console.error('[CONFIG] Invalid environment:', {
      hasOpenAI: !!env.OPENAI_API_KEY,
      hasFirecrawl: !!env.FIRECRAWL_API_KEY,
      variables,
    });

    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    const message = missingKeys
      ? `${ERROR_MESSAGES.INVALID_CONFIGURATION}: ${details}. ${ERROR_MESSAGES.MISSING_API_KEYS}`
      : `${ERROR_MESSAGES.INVALID_CONFIGURATION}: ${details}`;

    throw new ConfigurationError(message, variables);
  }

  const values = parsed.data;
  return {
    openaiApiKey: values.OPENAI_API_KEY,
    firecrawlApiKey: values.FIRECRAWL_API_KEY,
    model: values.OPENAI_MODEL,
    maxRecords: values.TAGGER_MAX_RECORDS,
    snippetLimit: values.TAGGER_SNIPPET_LIMIT,
    outputFile: values.TAGGER_OUTPUT_FILE,
    restrictToVocabulary: values.TAGGER_RESTRICT_TO_VOCABULARY,
    columns: { ...DEFAULT_COLUMNS },
  };
}
