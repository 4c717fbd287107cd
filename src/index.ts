#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { Api } from 'grammy';
import { loadConfig, type AppConfig } from './config';
import { FeedPipeline, alertAdmin, buildFailureAlert } from './cron/check-feed';
import { FeedChangeDetector } from './services/change-detector';
import type { FetchFn } from './services/feed-fetcher';
import { MessageDispatcher } from './services/message-dispatcher';
import type { TelegramTransport } from './types/telegram';
import { CacheStore } from './utils/cache';

export interface MainOptions {
	env?: NodeJS.ProcessEnv;
	/** Defaults to a grammy Api client for the configured bot */
	transport?: TelegramTransport;
	fetchFn?: FetchFn;
}

/**
 * Run one poll-and-deliver pass. Resolves to the process exit code.
 */
export async function main(options: MainOptions = {}): Promise<number> {
	let config: AppConfig;
	try {
		config = loadConfig(options.env);
	} catch (err) {
		console.error(`[Config] ${err instanceof Error ? err.message : String(err)}`);
		return 1;
	}

	const transport = options.transport ?? new Api(config.botToken, {
		timeoutSeconds: Math.ceil(config.fetchTimeoutMs / 1000),
	});

	const pipeline = new FeedPipeline({
		cacheStore: new CacheStore(config.cacheFilePath),
		detector: new FeedChangeDetector(config, options.fetchFn),
		dispatcher: new MessageDispatcher(transport, {
			chatId: config.chatId,
			linkPreview: config.linkPreview,
			silent: config.silent,
		}),
	});

	try {
		const summary = await pipeline.run();
		console.log('[Pipeline] Run complete:', JSON.stringify(summary));
		return 0;
	} catch (err) {
		console.error('[Pipeline] Run failed:', err);
		if (config.adminChatId) {
			await alertAdmin(transport, config.adminChatId, buildFailureAlert(config.feedUrl, err));
		}
		return 1;
	}
}

if (require.main === module) {
	loadDotenv();
	main().then(
		(code) => {
			process.exitCode = code;
		},
		(err: unknown) => {
			console.error('Unhandled error:', err);
			process.exitCode = 1;
		}
	);
}
