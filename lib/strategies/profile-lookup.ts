import { TAGGER_CONFIG } from '../config';
import { LookupError, describeError } from '../errors';
import type { ConnectionRecord, SearchProvider, SearchResult, SnippetSet } from '../types';

const PROFILE_SITE = 'linkedin.com/in';

/** Extracts the public profile id from a LinkedIn `/in/<id>` URL. */
export function extractProfileId(url: string | undefined): string | undefined {
  if (!url) return undefined;
  const match = url.match(/linkedin\.com\/in\/([^/?#\s]+)/i);
  return match ? match[1] : undefined;
}

export function buildProfileQuery(record: ConnectionRecord): string {
  const profileId = extractProfileId(record.profileUrl);
  if (profileId) {
    return `site:${PROFILE_SITE}/${profileId}`;
  }

  return [`"${record.fullName}"`, record.position, record.company, `site:${PROFILE_SITE}`]
    .filter((part): part is string => Boolean(part))
    .join(' ');
}

function toSnippet(result: SearchResult): string {
  return [result.title, result.description]
    .map(text => (typeof text === 'string' ? text.replace(/\s+/g, ' ').trim() : ''))
    .filter(Boolean)
    .join(' - ');
}

export class ProfileLookup {
  constructor(
    private search: SearchProvider,
    private snippetLimit: number = TAGGER_CONFIG.PROCESSING.SNIPPET_LIMIT,
  ) {}

  /**
   * Issues a single search for the person and returns up to `snippetLimit`
   * title/description snippets. Throws LookupError on a failed or malformed
   * response; zero hits is an empty set.
   */
  async lookup(record: ConnectionRecord): Promise<SnippetSet> {
    const query = buildProfileQuery(record);
    console.log(`[LOOKUP] Searching: ${query}`);

    let results: SearchResult[];
    try {
      results = await this.search.search(query, { limit: this.snippetLimit });
    } catch (error) {
      if (error instanceof LookupError) throw error;
      throw new LookupError(`Search failed for "${record.fullName}": ${describeError(error)}`, { cause: error });
    }

    if (!Array.isArray(results)) {
      throw new LookupError(`Malformed search response for "${record.fullName}"`);
    }

    const snippets = results
      .map(toSnippet)
      .filter(Boolean)
      .slice(0, this.snippetLimit);

    if (snippets.length === 0) {
      console.warn(`[LOOKUP] No profile information found for ${record.fullName}`);
    }

    return snippets;
  }
}
