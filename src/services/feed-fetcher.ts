import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { FeedEntry, FeedFetchResult, FeedValidators } from '../types/feed';
import { FEED_ACCEPT, FETCH_TIMEOUT_MS, USER_AGENT } from '../constants';
import { FetchError, ParseError } from '../errors';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchFeedOptions {
	/** Sent as If-None-Match / If-Modified-Since when present */
	validators?: FeedValidators;
	timeoutMs?: number;
	fetchFn?: FetchFn;
}

/**
 * Fetch an RSS/Atom/RDF feed and parse it into FeedEntry[], in document order.
 * A 304 short-circuits with no entries. Anything but 200/304 throws FetchError.
 */
export async function fetchFeed(url: string, options: FetchFeedOptions = {}): Promise<FeedFetchResult> {
	const { validators, timeoutMs = FETCH_TIMEOUT_MS, fetchFn = fetch } = options;

	const headers: Record<string, string> = {
		'User-Agent': USER_AGENT,
		Accept: FEED_ACCEPT,
	};
	if (validators?.etag) headers['If-None-Match'] = validators.etag;
	if (validators?.lastModified) headers['If-Modified-Since'] = validators.lastModified;

	const controller = new AbortController();
	const timeout = setTimeout(() => controller.abort(), timeoutMs);

	let response: Response;
	let xml: string;
	try {
		response = await fetchFn(url, { signal: controller.signal, headers });

		if (response.status === 304) {
			await response.body?.cancel();
			console.log(`[Fetch] ${url} not modified since last check`);
			return { notModified: true };
		}
		if (response.status !== 200) {
			await response.body?.cancel();
			throw new FetchError(url, `HTTP ${response.status}`, response.status);
		}

		xml = await response.text();
	} catch (err) {
		if (err instanceof FetchError) throw err;
		const reason = isAbortError(err) ? `Timeout after ${timeoutMs}ms` : describe(err);
		throw new FetchError(url, reason, undefined, { cause: err });
	} finally {
		clearTimeout(timeout);
	}

	const entries = parseFeed(xml);
	console.log(`[Fetch] ${url} returned ${entries.length} entries`);

	return {
		notModified: false,
		entries,
		etag: response.headers.get('etag') ?? undefined,
		lastModified: response.headers.get('last-modified') ?? undefined,
	};
}

/**
 * Parse raw RSS 2.0, RSS 1.0 (RDF) or Atom XML into FeedEntry[].
 */
export function parseFeed(xml: string): FeedEntry[] {
	if (!xml.includes('<rss') && !xml.includes('<feed') && !xml.includes('<rdf:RDF')) {
		throw new ParseError('Response is not RSS or Atom XML');
	}

	const $ = cheerio.load(xml, { xml: true });
	const isAtom = $.root().children('feed').length > 0;

	const entries: FeedEntry[] = [];
	const elements = isAtom ? $('entry') : $('item');

	elements.each((_, el) => {
		const entry = isAtom ? parseAtomEntry($(el)) : parseRSSItem($(el));
		if (entry) {
			entries.push(entry);
		} else {
			console.warn('[Fetch] Skipping entry without id or link');
		}
	});

	return entries;
}

function parseAtomEntry(entry: cheerio.Cheerio<Element>): FeedEntry | null {
	const id = entry.children('id').text().trim();
	const link = entry.children('link[rel="alternate"]').attr('href')
		|| entry.children('link:not([rel])').attr('href')
		|| entry.children('link').attr('href')
		|| '';
	const title = entry.children('title').text().trim();
	const bodyHtml = entry.children('content').text() || entry.children('summary').text() || '';

	return buildEntry(id, link.trim(), title, bodyHtml);
}

function parseRSSItem(entry: cheerio.Cheerio<Element>): FeedEntry | null {
	const guid = entry.children('guid').text().trim() || (entry.attr('rdf:about') ?? '').trim();
	const link = entry.children('link').text().trim();
	const title = entry.children('title').text().trim();
	const bodyHtml = entry.children('content\\:encoded').text()
		|| entry.children('description').text()
		|| '';

	return buildEntry(guid, link, title, bodyHtml);
}

function buildEntry(id: string, link: string, title: string, bodyHtml: string): FeedEntry | null {
	const key = id || link;
	if (!key) return null;

	const entry: FeedEntry = {
		id: key,
		title,
		link: link || (isHttpUrl(key) ? key : ''),
	};
	if (bodyHtml.trim()) entry.bodyHtml = bodyHtml;
	return entry;
}

function isHttpUrl(value: string): boolean {
	return value.startsWith('http://') || value.startsWith('https://');
}

function isAbortError(err: unknown): boolean {
	return err instanceof Error && err.name === 'AbortError';
}

function describe(err: unknown): string {
	return err instanceof Error ? err.message || 'Unknown error' : String(err);
}
