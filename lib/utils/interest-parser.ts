import { TAGGER_CONFIG } from '../config';
import type { InterestTagSet } from '../types';

export interface TagLimits {
  maxTags: number;
  maxTagLength: number;
  maxTagWords: number;
}

export const DEFAULT_TAG_LIMITS: TagLimits = {
  maxTags: TAGGER_CONFIG.EXTRACTION.MAX_TAGS,
  maxTagLength: TAGGER_CONFIG.EXTRACTION.MAX_TAG_LENGTH,
  maxTagWords: TAGGER_CONFIG.EXTRACTION.MAX_TAG_WORDS,
};

const EMPTY_ANSWERS = new Set(['[]', '{}', 'none', 'n/a', 'na', 'no interests', 'no interests found', 'unknown']);

const BULLET = /^(?:[-*•]+|\d+[.)])\s*/;
const LABEL = /^(?:interests|tags|interest tags)\s*:\s*/i;
const QUOTES = /^["'`“”‘’]+|["'`“”‘’]+$/g;
const BRACKET_PAIRS: ReadonlyArray<readonly [string, string]> = [['[', ']'], ['(', ')']];
const CODE_FENCE = /^```[a-z]*\s*|\s*```$/gi;

function stripCodeFence(text: string): string {
  return text.trim().replace(CODE_FENCE, '').trim();
}

/** Pulls a string list out of a JSON answer, or returns null when the answer isn't one. */
function parseJsonTags(text: string): string[] | null {
  if (!text.startsWith('[') && !text.startsWith('{')) return null;

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }

  const list =
    Array.isArray(data) ? data
      : data && typeof data === 'object' && 'interests' in data && Array.isArray(data.interests) ? data.interests
        : null;

  if (!list) return null;
  return list.filter((item: unknown): item is string => typeof item === 'string');
}

function occurrences(value: string, char: string): number {
  return value.split(char).length - 1;
}

/** Drops leading openers and trailing closers that have no partner, e.g. the `[` of a cut-off list. */
function stripStrayBrackets(segment: string): string {
  let value = segment;
  for (const [open, close] of BRACKET_PAIRS) {
    while (value.startsWith(open) && occurrences(value, open) > occurrences(value, close)) {
      value = value.slice(1).trim();
    }
    while (value.endsWith(close) && occurrences(value, close) > occurrences(value, open)) {
      value = value.slice(0, -1).trim();
    }
  }
  return value;
}

function cleanSegment(segment: string): string {
  return stripStrayBrackets(segment.trim().replace(BULLET, '').replace(LABEL, ''))
    .replace(QUOTES, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function wordCount(value: string): number {
  return value.split(' ').filter(Boolean).length;
}

export function looksLikeProse(segment: string, limits: TagLimits = DEFAULT_TAG_LIMITS): boolean {
  const words = wordCount(segment);
  if (segment.length > limits.maxTagLength) return true;
  if (words > limits.maxTagWords) return true;
  return /[.!?]$/.test(segment) && words >= 3;
}

/**
 * Parses a model answer into interest tags. Accepts a JSON list (or an
 * object with an `interests` list) and falls back to comma, newline or
 * semicolon delimited text. Deterministic for a given input.
 */
export function parseInterestTags(text: string, limits: TagLimits = DEFAULT_TAG_LIMITS): InterestTagSet {
  const body = stripCodeFence(text);
  if (!body) return [];

  const segments = parseJsonTags(body) ?? body.split(/[,\n;]/);

  const seen = new Set<string>();
  const tags: InterestTagSet = [];

  for (const raw of segments) {
    let tag = cleanSegment(raw);
    if (!tag || looksLikeProse(tag, limits)) continue;

    tag = tag.replace(/\.$/, '').trim();
    const key = tag.toLowerCase();
    if (!tag || EMPTY_ANSWERS.has(key) || seen.has(key)) continue;

    seen.add(key);
    tags.push(tag);
    if (tags.length >= limits.maxTags) break;
  }

  return tags;
}

/** True when the model explicitly answered that it found nothing. */
export function isEmptyAnswer(text: string): boolean {
  const body = stripCodeFence(text).replace(/\.$/, '').trim().toLowerCase();
  if (!body || EMPTY_ANSWERS.has(body)) return true;

  const json = parseJsonTags(body);
  return json !== null && json.length === 0;
}
