import * as cheerio from 'cheerio';
import type { FetchSettings } from '@verity/schemas/src/verifier.schema.js';
import { createChildLogger } from '@verity/shared/src/logger.js';
import { ProviderError, toError } from '@verity/shared/src/utils/errors.js';
import { discardBody } from '@verity/shared/src/utils/http.js';
import { err, ok, type Result } from '@verity/shared/src/utils/result.js';

const log = createChildLogger('content-fetcher');

export interface ContentFetcher {
  /** Paragraph text of the page at `url`, or an empty string when it cannot be read. */
  fetchBody(url: string): Promise<string>;
}

/**
 * Joins the text of every `<p>` element with single spaces. Navigation, scripts and
 * other page chrome are left out.
 */
export function extractParagraphText(html: string, maxChars: number): string {
  const $ = cheerio.load(html);
  const paragraphs = $('p')
    .toArray()
    .map((element) => $(element).text());
  return paragraphs.join(' ').slice(0, maxChars);
}

async function requestPage(
  url: string,
  settings: FetchSettings,
): Promise<Result<string, ProviderError>> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        'User-Agent': settings.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(settings.timeoutMs),
    });
  } catch (error) {
    const cause = toError(error);
    return err(new ProviderError(`Request failed: ${cause.message}`, 'fetch', cause));
  }

  if (!response.ok) {
    await discardBody(response);
    return err(new ProviderError(`HTTP ${String(response.status)}`, 'fetch'));
  }

  try {
    return ok(await response.text());
  } catch (error) {
    const cause = toError(error);
    return err(new ProviderError(`Failed to read body: ${cause.message}`, 'fetch', cause));
  }
}

export function createContentFetcher(settings: FetchSettings): ContentFetcher {
  return {
    async fetchBody(url: string): Promise<string> {
      log.debug({ url }, 'Fetching source content');

      const page = await requestPage(url, settings);
      if (!page.ok) {
        log.warn({ url, error: page.error.message }, 'Source fetch failed');
        return '';
      }

      try {
        const body = extractParagraphText(page.value, settings.maxBodyChars);
        log.debug({ url, characters: body.length }, 'Source content extracted');
        return body;
      } catch (error) {
        log.warn({ url, error: toError(error).message }, 'Source parsing failed');
        return '';
      }
    },
  };
}
