import { TAGGER_CONFIG } from '../config';
import { ExtractionError, describeError } from '../errors';
import { DEFAULT_TAG_LIMITS, isEmptyAnswer, parseInterestTags, type TagLimits } from '../utils/interest-parser';
import { matchVocabulary } from '../utils/interest-vocabulary';
import type { ConnectionRecord, InterestTagSet, SnippetSet, TextGenerator } from '../types';

export interface InterestExtractorOptions {
  vocabulary?: readonly string[];
  restrictToVocabulary?: boolean;
  temperature?: number;
  maxTokens?: number;
  maxProfileChars?: number;
  limits?: TagLimits;
}

export interface InterestPromptOptions {
  vocabulary?: readonly string[];
  maxProfileChars?: number;
  maxTags?: number;
}

export function buildInterestPrompt(
  record: ConnectionRecord,
  snippets: SnippetSet,
  options: InterestPromptOptions = {},
): string {
  const maxProfileChars = options.maxProfileChars ?? TAGGER_CONFIG.EXTRACTION.MAX_PROFILE_CHARS;
  const maxTags = options.maxTags ?? TAGGER_CONFIG.EXTRACTION.MAX_TAGS;
  const profileText = snippets.join('\n').slice(0, maxProfileChars);

  const lines = [
    'Based on the following public profile information, identify the most relevant professional interests of this person.',
    '',
    "Person's information:",
    `Name: ${record.fullName}`,
    `Position: ${record.position ?? 'Unknown'}`,
    `Company: ${record.company ?? 'Unknown'}`,
  ];

  if (record.notes) {
    lines.push(`Notes: ${record.notes}`);
  }

  lines.push('', 'Profile content:', profileText || '(no search results)', '');

  if (options.vocabulary && options.vocabulary.length > 0) {
    lines.push(`Prefer interests from this list when they fit: ${options.vocabulary.join(', ')}`, '');
  }

  lines.push(
    `Return up to ${maxTags} short interest tags of one to four words each, as a comma-separated list.`,
    'Do not write sentences, explanations or numbering.',
  );

  return lines.join('\n');
}

export class InterestExtractor {
  private vocabulary: readonly string[];
  private restrictToVocabulary: boolean;
  private temperature: number;
  private maxTokens: number;
  private maxProfileChars: number;
  private limits: TagLimits;

  constructor(private generator: TextGenerator, options: InterestExtractorOptions = {}) {
    this.vocabulary = options.vocabulary ?? [];
    this.restrictToVocabulary = options.restrictToVocabulary ?? false;
    this.temperature = options.temperature ?? TAGGER_CONFIG.EXTRACTION.TEMPERATURE;
    this.maxTokens = options.maxTokens ?? TAGGER_CONFIG.EXTRACTION.MAX_TOKENS;
    this.maxProfileChars = options.maxProfileChars ?? TAGGER_CONFIG.EXTRACTION.MAX_PROFILE_CHARS;
    this.limits = options.limits ?? DEFAULT_TAG_LIMITS;
  }

  async extract(record: ConnectionRecord, snippets: SnippetSet): Promise<InterestTagSet> {
    if (snippets.length === 0 && !record.notes) {
      console.log(`[EXTRACTOR] No profile content or notes for ${record.fullName}, skipping model call`);
      return [];
    }

    const prompt = buildInterestPrompt(record, snippets, {
      vocabulary: this.vocabulary,
      maxProfileChars: this.maxProfileChars,
      maxTags: this.limits.maxTags,
    });

    let response: string;
    try {
      response = await this.generator.generate(prompt, {
        temperature: this.temperature,
        maxTokens: this.maxTokens,
      });
    } catch (error) {
      if (error instanceof ExtractionError) throw error;
      throw new ExtractionError(`Text generation failed for "${record.fullName}": ${describeError(error)}`, { cause: error });
    }

    const parsed = parseInterestTags(response, this.limits);

    if (parsed.length === 0 && !isEmptyAnswer(response)) {
      throw new ExtractionError(`Unparseable model response for "${record.fullName}"`);
    }

    if (!this.restrictToVocabulary) {
      return parsed;
    }

    const tags = parsed
      .map(tag => matchVocabulary(tag, this.vocabulary))
      .filter((tag): tag is string => tag !== undefined);

    if (tags.length < parsed.length) {
      console.warn(`[EXTRACTOR] Dropped ${parsed.length - tags.length} tag(s) outside the vocabulary for ${record.fullName}`);
    }

    return tags;
  }
}
