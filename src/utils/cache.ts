import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { CacheRecord } from '../types/feed';
import { CacheCorruptError } from '../errors';

// On-disk shape. `first_entry_id` and `last_modified` are read for older cache files.
const cacheFileSchema = z.object({
	etag: z.string().nullish(),
	modified: z.string().nullish(),
	last_modified: z.string().nullish(),
	last_entry_id: z.string().nullish(),
	first_entry_id: z.string().nullish(),
});

type CacheFile = z.infer<typeof cacheFileSchema>;

/**
 * JSON file holding the feed validators and the last delivered entry id.
 */
export class CacheStore {
	constructor(private readonly filePath: string) {}

	get path(): string {
		return this.filePath;
	}

	/**
	 * Read the cache. A missing, unreadable or unusable file yields an empty record.
	 */
	async load(): Promise<CacheRecord> {
		let raw: string;
		try {
			raw = await readFile(this.filePath, 'utf8');
		} catch (err) {
			if (isNotFound(err)) {
				console.log(`[Cache] No cache file at ${this.filePath}, starting with an empty cache`);
				return {};
			}
			return this.recover(new CacheCorruptError(this.filePath, err));
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (err) {
			return this.recover(new CacheCorruptError(this.filePath, err));
		}

		const parsed = cacheFileSchema.safeParse(json);
		if (!parsed.success) {
			return this.recover(new CacheCorruptError(this.filePath, parsed.error.issues[0]?.message ?? 'unexpected shape'));
		}

		const record = fromCacheFile(parsed.data);
		console.log(`[Cache] Loaded ${this.filePath}:`, JSON.stringify(record));
		return record;
	}

	/**
	 * Write to a sibling temp file, then rename over the cache so a crash never leaves half a file.
	 */
	async save(record: CacheRecord): Promise<void> {
		const tmpPath = `${this.filePath}.tmp`;
		await mkdir(dirname(this.filePath), { recursive: true });
		await writeFile(tmpPath, serializeCache(record), 'utf8');
		await rename(tmpPath, this.filePath);
		console.log(`[Cache] Saved ${this.filePath}:`, JSON.stringify(record));
	}

	private recover(error: CacheCorruptError): CacheRecord {
		console.warn(`[Cache] ${error.message}. Starting with an empty cache.`);
		return {};
	}
}

export function serializeCache(record: CacheRecord): string {
	const file: CacheFile = {
		etag: record.etag ?? '',
		modified: record.lastModified ?? '',
		last_entry_id: record.lastSeenEntryId ?? '',
	};
	return JSON.stringify(file, null, 4) + '\n';
}

function fromCacheFile(file: CacheFile): CacheRecord {
	const record: CacheRecord = {};
	const etag = file.etag;
	const lastModified = file.modified || file.last_modified;
	const lastSeenEntryId = file.last_entry_id || file.first_entry_id;
	if (etag) record.etag = etag;
	if (lastModified) record.lastModified = lastModified;
	if (lastSeenEntryId) record.lastSeenEntryId = lastSeenEntryId;
	return record;
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
