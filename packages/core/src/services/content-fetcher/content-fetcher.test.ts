import { describe, it, expect, vi, afterEach } from 'vitest';
import type { FetchSettings } from '@verity/schemas/src/verifier.schema.js';
import { createContentFetcher, extractParagraphText } from './content-fetcher.js';

const settings: FetchSettings = {
  timeoutMs: 10_000,
  maxBodyChars: 2500,
  userAgent: 'Mozilla/5.0 (test)',
};

const ARTICLE_HTML = `<!doctype html>
<html>
  <head><title>Article</title><script>track()</script></head>
  <body>
    <nav><a href="/">Home</a> Menu</nav>
    <p>First paragraph.</p>
    <div><p>Second <b>bold</b> one.</p></div>
    <footer>Copyright</footer>
  </body>
</html>`;

function htmlResponse(html: string, status = 200): Response {
  return new Response(html, { status, headers: { 'Content-Type': 'text/html' } });
}

describe('extractParagraphText', () => {
  it('should join paragraph text with single spaces and skip page chrome', () => {
    expect(extractParagraphText(ARTICLE_HTML, 2500)).toBe('First paragraph. Second bold one.');
  });

  it('should truncate to the character limit', () => {
    const html = `<p>${'a'.repeat(3000)}</p>`;

    expect(extractParagraphText(html, 2500)).toHaveLength(2500);
  });

  it('should return an empty string for a page without paragraphs', () => {
    expect(extractParagraphText('<div>No paragraphs here</div>', 2500)).toBe('');
  });
});

describe('createContentFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return extracted paragraph text for a successful response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(htmlResponse(ARTICLE_HTML)));

    const body = await createContentFetcher(settings).fetchBody('https://news.example/article');

    expect(body).toBe('First paragraph. Second bold one.');
  });

  it('should send a browser-like user agent with a timeout signal', async () => {
    const fetchMock = vi.fn().mockResolvedValue(htmlResponse('<p>ok</p>'));
    vi.stubGlobal('fetch', fetchMock);

    await createContentFetcher(settings).fetchBody('https://news.example/article');

    const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
    expect(url).toBe('https://news.example/article');
    expect(init.headers).toMatchObject({ 'User-Agent': 'Mozilla/5.0 (test)' });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('should return an empty string for a non-200 status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(htmlResponse('<p>Forbidden</p>', 403)));

    await expect(
      createContentFetcher(settings).fetchBody('https://news.example/blocked'),
    ).resolves.toBe('');
  });

  it('should return an empty string when the request fails', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('The operation was aborted due to timeout')));

    await expect(
      createContentFetcher(settings).fetchBody('https://slow.example/page'),
    ).resolves.toBe('');
  });

  it('should truncate the body to the configured limit', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(htmlResponse(`<p>${'b'.repeat(100)}</p>`)));

    const body = await createContentFetcher({ ...settings, maxBodyChars: 40 }).fetchBody(
      'https://news.example/long',
    );

    expect(body).toBe('b'.repeat(40));
  });
});
