export interface FeedEntry {
	/** Stable unique key — GUID/id from the feed, or the link URL. Used for dedup. */
	id: string;
	title: string;
	/** Canonical link to the article */
	link: string;
	/** Rich content when the feed has it, otherwise the description/summary */
	bodyHtml?: string;
}

/** Conditional-request validators plus the last delivered entry. Blank fields are absent. */
export interface CacheRecord {
	etag?: string;
	lastModified?: string;
	lastSeenEntryId?: string;
}

export type FeedValidators = Pick<CacheRecord, 'etag' | 'lastModified'>;

export type FeedFetchResult =
	| { notModified: true }
	| { notModified: false; entries: FeedEntry[]; etag?: string; lastModified?: string };

export interface Detection {
	notModified: boolean;
	/** Number of entries in the fetched document */
	fetched: number;
	/** Entries to deliver this run, oldest first */
	entries: FeedEntry[];
	/** New entries held back by the per-run cap */
	deferred: number;
	/** Input cache with the response validators applied */
	cache: CacheRecord;
}

export interface RunSummary {
	notModified: boolean;
	fetched: number;
	detected: number;
	delivered: number;
	deferred: number;
}
