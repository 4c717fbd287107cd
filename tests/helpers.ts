import { vi } from 'vitest';
import type { AppConfig } from '../src/config';
import type { FetchFn } from '../src/services/feed-fetcher';
import type { TelegramTransport } from '../src/types/telegram';

export interface TestItem {
	guid?: string;
	title: string;
	link: string;
	description?: string;
}

/** RSS 2.0 document; bodies go in CDATA so they can hold raw HTML. */
export function rssFeed(items: TestItem[]): string {
	const body = items
		.map((item) => [
			'<item>',
			`<title>${item.title}</title>`,
			`<link>${item.link}</link>`,
			item.guid ? `<guid>${item.guid}</guid>` : '',
			item.description !== undefined ? `<description><![CDATA[${item.description}]]></description>` : '',
			'</item>',
		].join(''))
		.join('\n');

	return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
<channel>
<title>Test Feed</title>
<link>https://example.com/</link>
${body}
</channel>
</rss>`;
}

export function feedResponse(xml: string, headers: Record<string, string> = {}): Response {
	return new Response(xml, { status: 200, headers: { 'Content-Type': 'application/rss+xml', ...headers } });
}

export function mockFetch(handler: FetchFn) {
	return vi.fn<FetchFn>(handler);
}

export function mockTransport(impl?: TelegramTransport['sendMessage']) {
	const sendMessage = vi.fn<TelegramTransport['sendMessage']>(impl ?? (async () => ({})));
	const transport: TelegramTransport = { sendMessage };
	return { transport, sendMessage };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
	return {
		botToken: 'test-token',
		feedUrl: 'https://example.com/feed.xml',
		chatId: '12345',
		cacheFilePath: 'feed_cache.json',
		conditionalFetch: true,
		maxEntriesPerRun: 5,
		fetchTimeoutMs: 10000,
		linkPreview: true,
		silent: false,
		...overrides,
	};
}

export function silenceConsole(): void {
	vi.spyOn(console, 'log').mockImplementation(() => {});
	vi.spyOn(console, 'warn').mockImplementation(() => {});
	vi.spyOn(console, 'error').mockImplementation(() => {});
}
