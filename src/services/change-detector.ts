import type { CacheRecord, Detection, FeedEntry } from '../types/feed';
import type { AppConfig } from '../config';
import { fetchFeed, type FetchFn } from './feed-fetcher';

export type DetectorConfig = Pick<AppConfig, 'feedUrl' | 'conditionalFetch' | 'maxEntriesPerRun' | 'fetchTimeoutMs'>;

/**
 * Fetches the feed and decides which entries have not been delivered yet.
 */
export class FeedChangeDetector {
	constructor(
		private readonly config: DetectorConfig,
		private readonly fetchFn?: FetchFn
	) {}

	async detect(cache: CacheRecord): Promise<Detection> {
		const result = await fetchFeed(this.config.feedUrl, {
			validators: this.config.conditionalFetch ? cache : undefined,
			timeoutMs: this.config.fetchTimeoutMs,
			fetchFn: this.fetchFn,
		});

		if (result.notModified) {
			return { notModified: true, fetched: 0, entries: [], deferred: 0, cache };
		}

		const updated: CacheRecord = { ...cache };
		if (result.etag) updated.etag = result.etag;
		if (result.lastModified) updated.lastModified = result.lastModified;

		const fresh = selectNewEntries(result.entries, cache.lastSeenEntryId);
		const limit = this.config.maxEntriesPerRun;
		const entries = limit > 0 ? fresh.slice(0, limit) : fresh;

		console.log(
			`[Detect] ${fresh.length} new of ${result.entries.length} entries` +
			(fresh.length > entries.length ? `, delivering ${entries.length} this run` : '')
		);

		return {
			notModified: false,
			fetched: result.entries.length,
			entries,
			deferred: fresh.length - entries.length,
			cache: updated,
		};
	}
}

/**
 * Entries above the last delivered one, oldest first.
 * When the last delivered id is unknown or no longer in the feed, every entry counts as new.
 */
export function selectNewEntries(entries: readonly FeedEntry[], lastSeenEntryId?: string): FeedEntry[] {
	const fresh: FeedEntry[] = [];
	const seen = new Set<string>();

	for (const entry of entries) {
		if (lastSeenEntryId && entry.id === lastSeenEntryId) break;
		if (seen.has(entry.id)) continue;
		seen.add(entry.id);
		fresh.push(entry);
	}

	// Send oldest first
	return fresh.reverse();
}
