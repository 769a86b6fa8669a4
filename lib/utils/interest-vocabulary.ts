import fs from 'fs/promises';
import { fileURLToPath } from 'url';

export const DEFAULT_VOCABULARY_PATH = fileURLToPath(new URL('../data/interests.txt', import.meta.url));

const FALLBACK_VOCABULARY = [
  'Strategy', 'Leadership', 'Management', 'Marketing', 'Sales',
  'Investing', 'Artificial Intelligence', 'Software Development', 'Data Science',
  'Career Development', 'Innovation', 'Sustainability',
];

const vocabularyCache = new Map<string, string[]>();

export function parseVocabulary(content: string): string[] {
  const seen = new Set<string>();
  const vocabulary: string[] = [];

  content.split('\n').forEach(line => {
    const trimmedLine = line.trim();
    // Skip empty lines and comments
    if (!trimmedLine || trimmedLine.startsWith('#')) return;

    const key = trimmedLine.toLowerCase();
    if (!seen.has(key)) {
      seen.add(key);
      vocabulary.push(trimmedLine);
    }
  });

  return vocabulary;
}

export async function loadInterestVocabulary(filePath: string = DEFAULT_VOCABULARY_PATH): Promise<string[]> {
  const cached = vocabularyCache.get(filePath);
  if (cached) {
    return cached;
  }

  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const vocabulary = parseVocabulary(content);
    vocabularyCache.set(filePath, vocabulary);
    return vocabulary;
  } catch (error) {
    console.error('[VOCABULARY] Failed to load interest vocabulary:', error instanceof Error ? error.message : error);
    return [...FALLBACK_VOCABULARY];
  }
}

/** Returns the vocabulary's spelling of `tag`, if the vocabulary has it. */
export function matchVocabulary(tag: string, vocabulary: readonly string[]): string | undefined {
  const key = tag.trim().toLowerCase();
  return vocabulary.find(entry => entry.toLowerCase() === key);
}
