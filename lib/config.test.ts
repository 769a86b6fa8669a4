import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from './errors';
import { DEFAULT_COLUMNS, loadTaggerConfig } from './config';

const keys = { OPENAI_API_KEY: 'test-openai-key', FIRECRAWL_API_KEY: 'test-firecrawl-key' };

describe('loadTaggerConfig', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('applies defaults when only the API keys are set', () => {
    expect(loadTaggerConfig(keys)).toEqual({
      openaiApiKey: 'test-openai-key',
      firecrawlApiKey: 'test-firecrawl-key',
      model: 'gpt-4o',
      maxRecords: 5,
      snippetLimit: 10,
      outputFile: 'linkedin_connections_with_interests.csv',
      restrictToVocabulary: false,
      columns: DEFAULT_COLUMNS,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadTaggerConfig({
      ...keys,
      OPENAI_MODEL: 'gpt-4o-mini',
      TAGGER_MAX_RECORDS: '25',
      TAGGER_SNIPPET_LIMIT: '3',
      TAGGER_OUTPUT_FILE: 'out/tags.csv',
      TAGGER_RESTRICT_TO_VOCABULARY: 'true',
    });

    expect(config).toMatchObject({
      model: 'gpt-4o-mini',
      maxRecords: 25,
      snippetLimit: 3,
      outputFile: 'out/tags.csv',
      restrictToVocabulary: true,
    });
  });

  it('treats blank optional values as unset', () => {
    const config = loadTaggerConfig({ ...keys, TAGGER_MAX_RECORDS: '', OPENAI_MODEL: '  ' });
    expect(config.maxRecords).toBe(5);
    expect(config.model).toBe('gpt-4o');
  });

  it('fails with a ConfigurationError naming each missing key', () => {
    const load = () => loadTaggerConfig({ FIRECRAWL_API_KEY: '  ' });

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow('OPENAI_API_KEY: OPENAI_API_KEY is required; FIRECRAWL_API_KEY: FIRECRAWL_API_KEY is required');

    let error: unknown;
    try {
      load();
    } catch (caught) {
      error = caught;
    }
    expect(error).toMatchObject({
      code: 'CONFIGURATION_INVALID',
      fatal: true,
      variables: ['OPENAI_API_KEY', 'FIRECRAWL_API_KEY'],
    });
  });

  it('rejects a non-positive record limit', () => {
    expect(() => loadTaggerConfig({ ...keys, TAGGER_MAX_RECORDS: '0' })).toThrow(ConfigurationError);
    expect(() => loadTaggerConfig({ ...keys, TAGGER_MAX_RECORDS: 'five' })).toThrow(ConfigurationError);
  });
});
