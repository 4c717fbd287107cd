import type { CacheRecord, RunSummary } from '../types/feed';
import type { TelegramTransport } from '../types/telegram';
import type { CacheStore } from '../utils/cache';
import type { FeedChangeDetector } from '../services/change-detector';
import type { MessageDispatcher } from '../services/message-dispatcher';
import { DEFAULT_ALLOWED_TAGS } from '../constants';
import { formatEntryMessage } from '../utils/telegram-format';
import { escapeHtml, truncErr } from '../utils/text';

export interface FeedPipelineDeps {
	cacheStore: CacheStore;
	detector: FeedChangeDetector;
	dispatcher: MessageDispatcher;
	allowedTags?: ReadonlySet<string>;
}

/**
 * One poll-and-deliver pass: load cache, detect new entries, send them oldest first,
 * and commit the cache after every entry that went through.
 */
export class FeedPipeline {
	private readonly allowedTags: ReadonlySet<string>;

	constructor(private readonly deps: FeedPipelineDeps) {
		this.allowedTags = deps.allowedTags ?? DEFAULT_ALLOWED_TAGS;
	}

	async run(): Promise<RunSummary> {
		const { cacheStore, detector, dispatcher } = this.deps;

		const cache = await cacheStore.load();
		const detection = await detector.detect(cache);
		const summary: RunSummary = {
			notModified: detection.notModified,
			fetched: detection.fetched,
			detected: detection.entries.length + detection.deferred,
			delivered: 0,
			deferred: detection.deferred,
		};

		if (detection.notModified) return summary;

		if (detection.entries.length === 0) {
			if (validatorsChanged(cache, detection.cache)) {
				await cacheStore.save(detection.cache);
			}
			console.log('[Pipeline] No new entries');
			return summary;
		}

		// Fresh validators are only written once nothing is left undelivered,
		// otherwise the next run would get a 304 for entries it never sent.
		let committed: CacheRecord = cache;
		const lastIndex = detection.entries.length - 1;

		for (const [index, entry] of detection.entries.entries()) {
			const message = formatEntryMessage(entry, this.allowedTags);
			console.log(`[Pipeline] Sending entry ${entry.id}`);

			const result = await dispatcher.send(message);
			if (!result.ok) {
				console.error(`[Pipeline] Failed to send entry ${entry.id}, stopping after ${summary.delivered} delivered`);
				throw result.error;
			}

			const base = index === lastIndex && detection.deferred === 0 ? detection.cache : committed;
			committed = { ...base, lastSeenEntryId: entry.id };
			await cacheStore.save(committed);
			summary.delivered++;
		}

		return summary;
	}
}

function validatorsChanged(before: CacheRecord, after: CacheRecord): boolean {
	return before.etag !== after.etag || before.lastModified !== after.lastModified;
}

/**
 * Send an alert to the admin chat. Failure to alert is logged, never thrown.
 */
export async function alertAdmin(transport: TelegramTransport, adminChatId: string, message: string): Promise<void> {
	try {
		await transport.sendMessage(adminChatId, message, {
			parse_mode: 'HTML',
			link_preview_options: { is_disabled: true },
			disable_notification: false,
		});
	} catch (e) {
		console.error('[Alert] Failed to notify admin:', e);
	}
}

export function buildFailureAlert(feedUrl: string, err: unknown): string {
	return `<b>Feed check failed</b>\nFeed: <code>${escapeHtml(feedUrl)}</code>\n\n<pre>${escapeHtml(truncErr(err))}</pre>`;
}
