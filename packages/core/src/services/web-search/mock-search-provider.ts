import { createChildLogger } from '@verity/shared/src/logger.js';
import type { ProviderSearchItem, SearchProvider } from './types.js';

const log = createChildLogger('web-search:mock');

const DEFAULT_ITEMS: readonly ProviderSearchItem[] = [
  {
    title: 'Example source one',
    link: 'https://example.com/source1',
    snippet: 'Mock search result with general information about the topic.',
  },
  {
    title: 'Example source two',
    link: 'https://example.com/source2',
    snippet: 'A second mock search result.',
  },
];

export function createMockSearchProvider(
  responses?: Map<string, readonly ProviderSearchItem[]>,
): SearchProvider {
  log.info('Using mock search provider');

  return {
    query(text: string, resultCount: number): Promise<readonly ProviderSearchItem[]> {
      log.debug({ query: text, resultCount }, 'Mock web search');

      const items = responses?.get(text) ?? DEFAULT_ITEMS;
      return Promise.resolve(items.slice(0, resultCount));
    },
  };
}
