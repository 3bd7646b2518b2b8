import { z } from 'zod';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ConfigurationError, ProviderError, toError } from '@verity/shared/src/utils/errors.js';
import { discardBody } from '@verity/shared/src/utils/http.js';
import type { ProviderSearchItem, SearchProvider } from './types.js';

const log = createChildLogger('web-search:google');

export const GOOGLE_SEARCH_ENDPOINT = 'https://www.googleapis.com/customsearch/v1';

const CustomSearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().optional(),
        link: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
});

export interface GoogleSearchProviderConfig {
  readonly apiKey: string;
  readonly searchEngineId: string;
  readonly timeoutMs: number;
}

export function createGoogleSearchProvider(config: GoogleSearchProviderConfig): SearchProvider {
  const { apiKey, searchEngineId, timeoutMs } = config;

  if (!apiKey || !searchEngineId) {
    throw new ConfigurationError(
      'GOOGLE_API_KEY and SEARCH_ENGINE_ID are required for the Google search provider',
    );
  }

  log.info({ timeoutMs }, 'Creating Google search provider');

  return {
    async query(text: string, resultCount: number): Promise<readonly ProviderSearchItem[]> {
      log.debug({ queryLength: text.length, resultCount }, 'Executing web search');

      const params = new URLSearchParams({
        key: apiKey,
        cx: searchEngineId,
        q: text,
        num: String(resultCount),
      });

      let response: Response;
      try {
        response = await fetch(`${GOOGLE_SEARCH_ENDPOINT}?${params.toString()}`, {
          headers: { Accept: 'application/json' },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        const cause = toError(error);
        throw new ProviderError(`Search request failed: ${cause.message}`, 'search', cause);
      }

      if (!response.ok) {
        await discardBody(response);
        throw new ProviderError(
          `Search provider returned HTTP ${String(response.status)}`,
          'search',
        );
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (error) {
        const cause = toError(error);
        throw new ProviderError(`Search response is not JSON: ${cause.message}`, 'search', cause);
      }

      const parsed = CustomSearchResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new ProviderError('Search response has an unexpected shape', 'search');
      }

      const items = (parsed.data.items ?? []).map((item) => ({
        title: item.title ?? '',
        link: item.link ?? '',
        snippet: item.snippet ?? '',
      }));

      log.debug({ resultCount: items.length }, 'Web search completed');

      return items;
    },
  };
}
