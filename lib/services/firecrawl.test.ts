import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LookupError } from '../errors';
import { FirecrawlService } from './firecrawl';

const { mockSearch } = vi.hoisted(() => ({ mockSearch: vi.fn() }));

vi.mock('@mendable/firecrawl-js', () => ({
  default: class {
    search = mockSearch;
  },
}));

describe('FirecrawlService', () => {
  beforeEach(() => {
    mockSearch.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('keeps only the text fields of each result', async () => {
    mockSearch.mockResolvedValue({
      success: true,
      data: [
        { url: 'https://linkedin.com/in/janedoe', title: 'Jane Doe', description: 'Data Scientist', markdown: '# ignored' },
        { url: 'https://example.com' },
      ],
    });

    const results = await new FirecrawlService('test-key').search('"Jane Doe"', { limit: 4 });

    expect(results).toEqual([
      { url: 'https://linkedin.com/in/janedoe', title: 'Jane Doe', description: 'Data Scientist' },
      { url: 'https://example.com', title: '', description: '' },
    ]);
    expect(mockSearch).toHaveBeenCalledWith('"Jane Doe"', { limit: 4 });
  });

  it('wraps SDK errors in a LookupError', async () => {
    const cause = new Error('Request timed out');
    mockSearch.mockRejectedValue(cause);

    const search = new FirecrawlService('test-key').search('q', { limit: 1 });

    await expect(search).rejects.toBeInstanceOf(LookupError);
    await expect(search).rejects.toMatchObject({ message: 'Search request failed: Request timed out', cause });
  });

  it('treats an unsuccessful response as a lookup failure', async () => {
    mockSearch.mockResolvedValue({ success: false, data: [], error: 'Insufficient credits' });

    await expect(new FirecrawlService('test-key').search('q', { limit: 1 })).rejects.toThrow(
      'Search service reported a failure: Insufficient credits',
    );
  });

  it('treats a response without a result list as malformed', async () => {
    mockSearch.mockResolvedValue({ success: true });

    await expect(new FirecrawlService('test-key').search('q', { limit: 1 })).rejects.toThrow(
      'Malformed search response: missing result list',
    );
  });
});
