import FirecrawlApp from '@mendable/firecrawl-js';
import { LookupError, describeError } from '../errors';
import type { SearchProvider, SearchResult } from '../types';

export class FirecrawlService implements SearchProvider {
  private app: FirecrawlApp;

  constructor(apiKey: string) {
    this.app = new FirecrawlApp({ apiKey });
  }

  /**
   * Runs one SERP query. Only the text fields of each hit are kept; page
   * content is never scraped.
   */
  async search(query: string, options: { limit: number }): Promise<SearchResult[]> {
    let result: Awaited<ReturnType<FirecrawlApp['search']>>;

    try {
      result = await this.app.search(query, { limit: options.limit });
    } catch (error) {
      console.error('[FIRECRAWL] Search error:', describeError(error));
      console.error('[FIRECRAWL] Query:', query);
      throw new LookupError(`Search request failed: ${describeError(error)}`, { cause: error });
    }

    if (!result || result.success === false) {
      throw new LookupError(`Search service reported a failure${result?.error ? `: ${result.error}` : ''}`);
    }

    if (!Array.isArray(result.data)) {
      throw new LookupError('Malformed search response: missing result list');
    }

    return result.data.map(item => ({
      url: item.url || '',
      title: item.title || '',
      description: item.description || '',
    }));
  }
}
