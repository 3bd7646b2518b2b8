import type { SearchResult } from '@verity/shared/src/types/verification.types.js';
import type { Capability } from '@verity/shared/src/utils/capability.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ProviderError, toError } from '@verity/shared/src/utils/errors.js';
import { err, ok, type Result } from '@verity/shared/src/utils/result.js';
import type { EvidenceRetriever, ProviderSearchItem, SearchProvider } from './types.js';

const log = createChildLogger('web-search:retriever');

export interface EvidenceRetrieverDeps {
  readonly searchProvider: Capability<SearchProvider>;
  readonly resultCount: number;
}

async function querySearchProvider(
  provider: SearchProvider,
  query: string,
  resultCount: number,
): Promise<Result<readonly ProviderSearchItem[], ProviderError>> {
  try {
    return ok(await provider.query(query, resultCount));
  } catch (error) {
    if (error instanceof ProviderError) {
      return err(error);
    }
    const cause = toError(error);
    return err(new ProviderError(`Search failed: ${cause.message}`, 'search', cause));
  }
}

export function createEvidenceRetriever(deps: EvidenceRetrieverDeps): EvidenceRetriever {
  const { searchProvider, resultCount } = deps;

  return {
    async search(query: string): Promise<readonly SearchResult[]> {
      if (searchProvider.status === 'unavailable') {
        log.warn({ reason: searchProvider.reason }, 'Search provider unavailable, skipping search');
        return [];
      }

      const result = await querySearchProvider(searchProvider.client, query, resultCount);
      if (!result.ok) {
        log.error({ error: result.error.message }, 'Search provider error');
        return [];
      }

      const results = result.value.slice(0, resultCount).map((item) => ({
        title: item.title,
        url: item.link,
        snippet: item.snippet,
      }));

      log.info({ resultCount: results.length }, 'Search results retrieved');

      return results;
    },
  };
}
