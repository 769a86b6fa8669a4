import { describe, expect, it } from 'vitest';
import { formatTags, resolveTagsColumn } from './column-utils';

describe('resolveTagsColumn', () => {
  it('uses the preferred name when it is free', () => {
    expect(resolveTagsColumn(['First Name', 'Last Name'])).toBe('Interests');
  });

  it('adds a counter instead of reusing an existing column', () => {
    expect(resolveTagsColumn(['Interests', 'interests 2'])).toBe('Interests 3');
  });

  it('accepts a custom preferred name', () => {
    expect(resolveTagsColumn(['Tags'], 'Tags')).toBe('Tags 2');
  });
});

describe('formatTags', () => {
  it('joins tags with semicolons', () => {
    expect(formatTags(['machine learning', 'NLP', 'data science'])).toBe('machine learning;NLP;data science');
  });

  it('formats an empty set as an empty string', () => {
    expect(formatTags([])).toBe('');
  });
});
