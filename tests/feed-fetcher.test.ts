import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FetchError, ParseError } from '../src/errors';
import { fetchFeed, parseFeed } from '../src/services/feed-fetcher';
import { feedResponse, mockFetch, rssFeed, silenceConsole } from './helpers';

const FEED_URL = 'https://example.com/feed.xml';

const RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:content="http://purl.org/rss/1.0/modules/content/">
<channel>
<title>Example</title>
<link>https://example.com/</link>
<item>
<title>Second &amp; last</title>
<link>https://example.com/2</link>
<guid isPermaLink="false"> post-2 </guid>
<description>Plain summary</description>
<content:encoded><![CDATA[<b>Rich</b> body]]></content:encoded>
</item>
<item>
<title>First</title>
<link>https://example.com/1</link>
<description>&lt;i&gt;Only&lt;/i&gt; description</description>
</item>
</channel>
</rss>`;

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
<title>Atom Example</title>
<link href="https://example.org/"/>
<id>urn:uuid:feed</id>
<entry>
<title>Atom post</title>
<link rel="self" href="https://example.org/a.atom"/>
<link rel="alternate" href="https://example.org/a"/>
<id>urn:uuid:entry-a</id>
<content type="html">&lt;b&gt;Bold&lt;/b&gt; text</content>
<summary>Short</summary>
</entry>
<entry>
<title>Summary only</title>
<link href="https://example.org/b"/>
<id>urn:uuid:entry-b</id>
<summary>Just a summary</summary>
</entry>
</feed>`;

const RDF = `<?xml version="1.0"?>
<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#" xmlns="http://purl.org/rss/1.0/">
<channel rdf:about="https://example.net/">
<title>RDF Example</title>
<link>https://example.net/</link>
</channel>
<item rdf:about="https://example.net/r1">
<title>R1</title>
<link>https://example.net/r1</link>
</item>
</rdf:RDF>`;

describe('parseFeed', () => {
	beforeEach(() => silenceConsole());
	afterEach(() => vi.restoreAllMocks());

	it('parses RSS items in document order', () => {
		expect(parseFeed(RSS)).toEqual([
			{ id: 'post-2', title: 'Second & last', link: 'https://example.com/2', bodyHtml: '<b>Rich</b> body' },
			{ id: 'https://example.com/1', title: 'First', link: 'https://example.com/1', bodyHtml: '<i>Only</i> description' },
		]);
	});

	it('parses Atom entries, preferring the alternate link and the content body', () => {
		expect(parseFeed(ATOM)).toEqual([
			{ id: 'urn:uuid:entry-a', title: 'Atom post', link: 'https://example.org/a', bodyHtml: '<b>Bold</b> text' },
			{ id: 'urn:uuid:entry-b', title: 'Summary only', link: 'https://example.org/b', bodyHtml: 'Just a summary' },
		]);
	});

	it('parses RSS 1.0 items keyed by rdf:about', () => {
		expect(parseFeed(RDF)).toEqual([
			{ id: 'https://example.net/r1', title: 'R1', link: 'https://example.net/r1' },
		]);
	});

	it('skips items with neither id nor link', () => {
		const xml = rssFeed([{ title: 'No key', link: '' }, { title: 'Keyed', link: 'https://example.com/k' }]);

		expect(parseFeed(xml).map((e) => e.id)).toEqual(['https://example.com/k']);
		expect(console.warn).toHaveBeenCalledTimes(1);
	});

	it('returns no entries for an empty channel', () => {
		expect(parseFeed(rssFeed([]))).toEqual([]);
	});

	it('rejects documents that are not feeds', () => {
		expect(() => parseFeed('<html><body>Maintenance</body></html>')).toThrow(ParseError);
	});
});

describe('fetchFeed', () => {
	beforeEach(() => silenceConsole());
	afterEach(() => vi.restoreAllMocks());

	it('sends conditional headers from the validators', async () => {
		const fetchFn = mockFetch(async () => new Response(null, { status: 304 }));

		const result = await fetchFeed(FEED_URL, {
			validators: { etag: '"v1"', lastModified: 'Mon, 01 Jan 2024 00:00:00 GMT' },
			fetchFn,
		});

		expect(result).toEqual({ notModified: true });
		const [url, init] = fetchFn.mock.calls[0];
		expect(url).toBe(FEED_URL);
		expect(init.headers).toMatchObject({
			'If-None-Match': '"v1"',
			'If-Modified-Since': 'Mon, 01 Jan 2024 00:00:00 GMT',
		});
	});

	it('omits conditional headers without validators', async () => {
		const fetchFn = mockFetch(async () => feedResponse(rssFeed([])));

		await fetchFeed(FEED_URL, { fetchFn });

		const headers = fetchFn.mock.calls[0][1].headers;
		expect(headers).not.toHaveProperty('If-None-Match');
		expect(headers).not.toHaveProperty('If-Modified-Since');
	});

	it('returns entries with the response validators', async () => {
		const fetchFn = mockFetch(async () =>
			feedResponse(RSS, { ETag: '"v2"', 'Last-Modified': 'Tue, 02 Jan 2024 00:00:00 GMT' })
		);

		const result = await fetchFeed(FEED_URL, { fetchFn });

		expect(result.notModified).toBe(false);
		if (result.notModified) return;
		expect(result.entries.map((e) => e.id)).toEqual(['post-2', 'https://example.com/1']);
		expect(result.etag).toBe('"v2"');
		expect(result.lastModified).toBe('Tue, 02 Jan 2024 00:00:00 GMT');
	});

	it('leaves validators undefined when the server sends none', async () => {
		const fetchFn = mockFetch(async () => feedResponse(rssFeed([])));

		const result = await fetchFeed(FEED_URL, { fetchFn });

		expect(result).toEqual({ notModified: false, entries: [], etag: undefined, lastModified: undefined });
	});

	it('throws FetchError with the status for other responses', async () => {
		const fetchFn = mockFetch(async () => new Response('oops', { status: 500 }));

		const error = await fetchFeed(FEED_URL, { fetchFn }).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(FetchError);
		expect(error).toMatchObject({ status: 500, message: `Failed to fetch feed ${FEED_URL}: HTTP 500` });
	});

	it('releases the response body of a failed request', async () => {
		const cancel = vi.fn();
		const body = new ReadableStream<Uint8Array>({ cancel });
		const fetchFn = mockFetch(async () => new Response(body, { status: 500 }));

		await expect(fetchFeed(FEED_URL, { fetchFn })).rejects.toBeInstanceOf(FetchError);
		expect(cancel).toHaveBeenCalledTimes(1);
	});

	it('wraps transport failures in FetchError', async () => {
		const fetchFn = mockFetch(async () => {
			throw new TypeError('fetch failed');
		});

		await expect(fetchFeed(FEED_URL, { fetchFn })).rejects.toThrow(`Failed to fetch feed ${FEED_URL}: fetch failed`);
	});

	it('reports an aborted request as a timeout', async () => {
		const fetchFn = mockFetch(async () => {
			const err = new Error('This operation was aborted');
			err.name = 'AbortError';
			throw err;
		});

		await expect(fetchFeed(FEED_URL, { fetchFn, timeoutMs: 50 })).rejects.toThrow('Timeout after 50ms');
	});

	it('throws ParseError for a body that is not a feed', async () => {
		const fetchFn = mockFetch(async () => new Response('<html></html>', { status: 200 }));

		await expect(fetchFeed(FEED_URL, { fetchFn })).rejects.toBeInstanceOf(ParseError);
	});
});
