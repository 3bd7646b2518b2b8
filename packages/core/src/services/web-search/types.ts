import type { SearchResult } from '@verity/shared/src/types/verification.types.js';

/** One hit as the search provider reports it. */
export interface ProviderSearchItem {
  readonly title: string;
  readonly link: string;
  readonly snippet: string;
}

export interface SearchProvider {
  query(text: string, resultCount: number): Promise<readonly ProviderSearchItem[]>;
}

export interface EvidenceRetriever {
  search(query: string): Promise<readonly SearchResult[]>;
}
