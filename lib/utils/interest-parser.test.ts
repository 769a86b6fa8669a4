import { describe, expect, it } from 'vitest';
import { isEmptyAnswer, looksLikeProse, parseInterestTags } from './interest-parser';

describe('parseInterestTags', () => {
  it('splits a comma-delimited answer', () => {
    expect(parseInterestTags('machine learning, NLP, data science')).toEqual([
      'machine learning',
      'NLP',
      'data science',
    ]);
  });

  it('splits newline-delimited lists and strips bullets and numbering', () => {
    const text = '- Leadership\n* Venture Capital\n3. Public Speaking\n4) Design';
    expect(parseInterestTags(text)).toEqual(['Leadership', 'Venture Capital', 'Public Speaking', 'Design']);
  });

  it('drops a leading label and surrounding quotes', () => {
    expect(parseInterestTags('Interests: "Strategy", \'Sales\'')).toEqual(['Strategy', 'Sales']);
  });

  it('parses a JSON array answer', () => {
    expect(parseInterestTags('["Leadership", "Management", "Strategy"]')).toEqual([
      'Leadership',
      'Management',
      'Strategy',
    ]);
  });

  it('parses a JSON object with an interests list inside a code fence', () => {
    const text = '```json\n{"interests": ["Blockchain", 42, "Economics"]}\n```';
    expect(parseInterestTags(text)).toEqual(['Blockchain', 'Economics']);
  });

  it('falls back to delimited text when JSON is invalid', () => {
    expect(parseInterestTags('[Leadership, "Sales"')).toEqual(['Leadership', 'Sales']);
  });

  it('keeps balanced parentheses inside a tag', () => {
    expect(parseInterestTags('Machine Learning (ML), Diversity & Inclusion (D&I)')).toEqual([
      'Machine Learning (ML)',
      'Diversity & Inclusion (D&I)',
    ]);
    expect(parseInterestTags('(Cloud Computing (AWS), Sales)')).toEqual(['Cloud Computing (AWS)', 'Sales']);
  });

  it('discards explanatory sentences', () => {
    const text = [
      'Here are the interests I found for this person based on the profile.',
      'Data Science',
      'They seem passionate.',
      'Cloud Computing',
    ].join('\n');
    expect(parseInterestTags(text)).toEqual(['Data Science', 'Cloud Computing']);
  });

  it('strips a trailing period from a short tag', () => {
    expect(parseInterestTags('Leadership, Product Design.')).toEqual(['Leadership', 'Product Design']);
  });

  it('rejects overlong segments', () => {
    const long = 'Supercalifragilistic-expialidocious-interdisciplinary';
    expect(parseInterestTags(`${long}, Ethics`)).toEqual(['Ethics']);
  });

  it('deduplicates case-insensitively, keeping the first spelling', () => {
    expect(parseInterestTags('AI, Sales, ai, SALES, Art')).toEqual(['AI', 'Sales', 'Art']);
  });

  it('caps the number of tags', () => {
    const text = Array.from({ length: 14 }, (_, i) => `Tag ${i + 1}`).join(', ');
    const tags = parseInterestTags(text);
    expect(tags).toHaveLength(10);
    expect(tags[9]).toBe('Tag 10');
  });

  it('honours custom limits', () => {
    expect(parseInterestTags('a b c, d', { maxTags: 5, maxTagLength: 48, maxTagWords: 2 })).toEqual(['d']);
  });

  it('returns an empty set for blank or explicit-empty answers', () => {
    expect(parseInterestTags('')).toEqual([]);
    expect(parseInterestTags('   \n ')).toEqual([]);
    expect(parseInterestTags('None')).toEqual([]);
    expect(parseInterestTags('[]')).toEqual([]);
  });

  it('is deterministic for a fixed answer', () => {
    const text = '1. Strategy\n2. Leadership, Innovation; Design';
    expect(parseInterestTags(text)).toEqual(parseInterestTags(text));
    expect(parseInterestTags(text)).toEqual(['Strategy', 'Leadership', 'Innovation', 'Design']);
  });
});

describe('looksLikeProse', () => {
  it('flags sentences and long phrases', () => {
    expect(looksLikeProse('They like it.')).toBe(true);
    expect(looksLikeProse('one two three four five six')).toBe(true);
    expect(looksLikeProse('Machine Learning')).toBe(false);
    expect(looksLikeProse('AI.')).toBe(false);
  });
});

describe('isEmptyAnswer', () => {
  it('recognises explicit empty answers', () => {
    expect(isEmptyAnswer('')).toBe(true);
    expect(isEmptyAnswer('N/A')).toBe(true);
    expect(isEmptyAnswer('No interests found.')).toBe(true);
    expect(isEmptyAnswer('{"interests": []}')).toBe(true);
    expect(isEmptyAnswer('```json\n[]\n```')).toBe(true);
  });

  it('does not treat prose as an empty answer', () => {
    expect(isEmptyAnswer('I could not determine any interests from the snippets provided.')).toBe(false);
  });
});
