import type {
  EvidenceBundle,
  EvidenceEntry,
  SearchResult,
} from '@verity/shared/src/types/verification.types.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import type { ContentFetcher } from '../content-fetcher/content-fetcher.js';

const log = createChildLogger('evidence:collector');

export function isUsableUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  return parsed.protocol === 'http:' || parsed.protocol === 'https:';
}

/**
 * Fetches each result's page one at a time, in result order. Results without a usable
 * link are dropped; a page that cannot be read stays in the bundle with an empty body.
 */
export async function collectEvidence(
  results: readonly SearchResult[],
  contentFetcher: ContentFetcher,
  maxSources: number,
): Promise<EvidenceBundle> {
  const entries: EvidenceEntry[] = [];

  for (const result of results.slice(0, maxSources)) {
    if (!isUsableUrl(result.url)) {
      log.debug({ title: result.title }, 'Skipping result without a usable link');
      continue;
    }

    const body = await contentFetcher.fetchBody(result.url);
    entries.push({ result, body });
  }

  log.info(
    {
      results: results.length,
      sources: entries.length,
      emptySources: entries.filter((entry) => entry.body.length === 0).length,
    },
    'Evidence collected',
  );

  return {
    entries,
    sourceUrls: entries.map((entry) => entry.result.url),
  };
}
