import type { FeedEntry } from '../types/feed';
import { DEFAULT_ALLOWED_TAGS, NO_DESCRIPTION_TEXT, TELEGRAM_MESSAGE_LIMIT, UNTITLED_TEXT } from '../constants';
import { sanitizeHtml } from './sanitize-html';
import { escapeHtml } from './text';

/**
 * Convert a FeedEntry into Telegram HTML: bold title, link line, blank line, body.
 */
export function formatEntryMessage(entry: FeedEntry, allowedTags: ReadonlySet<string> = DEFAULT_ALLOWED_TAGS): string {
	const title = escapeHtml(entry.title || UNTITLED_TEXT);
	const link = escapeHtml(entry.link);
	const body = entry.bodyHtml ? sanitizeHtml(entry.bodyHtml, allowedTags).trim() : '';

	const linkLine = link ? `<a href="${link}">${link}</a>\n` : '';

	return `<b>${title}</b>\n${linkLine}\n${body || NO_DESCRIPTION_TEXT}`;
}

/**
 * Cut text into consecutive pieces of `limit` characters. The last piece may be shorter.
 * A piece that would end on the first half of a surrogate pair ends one unit early.
 */
export function splitMessage(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
	if (text.length <= limit) return [text];

	const chunks: string[] = [];
	let start = 0;
	while (start < text.length) {
		let end = Math.min(start + limit, text.length);
		if (end < text.length && end - start > 1 && isHighSurrogate(text.charCodeAt(end - 1))) end--;
		chunks.push(text.slice(start, end));
		start = end;
	}
	return chunks;
}

function isHighSurrogate(code: number): boolean {
	return code >= 0xd800 && code <= 0xdbff;
}
