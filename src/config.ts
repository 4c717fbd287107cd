import { z } from 'zod';
import {
	DEFAULT_CACHE_FILE,
	DEFAULT_MAX_ENTRIES_PER_RUN,
	FETCH_TIMEOUT_MS,
} from './constants';
import { ConfigError } from './errors';

export interface AppConfig {
	botToken: string;
	feedUrl: string;
	chatId: string;
	cacheFilePath: string;
	/** Send If-None-Match / If-Modified-Since from the cache */
	conditionalFetch: boolean;
	/** 0 = unlimited */
	maxEntriesPerRun: number;
	fetchTimeoutMs: number;
	linkPreview: boolean;
	silent: boolean;
	/** Chat that receives failure alerts */
	adminChatId?: string;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

const requiredString = () =>
	z.string({ required_error: 'is required' }).trim().min(1, 'is required');

const feedUrl = () =>
	z.string({ required_error: 'is required' }).trim().superRefine((value, ctx) => {
		if (!value) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is required' });
		} else if (!isHttpUrl(value)) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be an http(s) URL' });
		}
	});

const envBoolean = (defaultValue: boolean) =>
	z.string().optional().transform((raw, ctx) => {
		const value = raw?.trim().toLowerCase();
		if (!value) return defaultValue;
		if (TRUE_VALUES.has(value)) return true;
		if (FALSE_VALUES.has(value)) return false;
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be true or false' });
		return z.NEVER;
	});

const envInteger = (defaultValue: number, min: number) =>
	z.string().optional().transform((raw, ctx) => {
		const value = raw?.trim();
		if (!value) return defaultValue;
		const parsed = Number(value);
		if (!Number.isInteger(parsed) || parsed < min) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: min === 0 ? 'must be a non-negative integer' : `must be an integer of at least ${min}`,
			});
			return z.NEVER;
		}
		return parsed;
	});

const optionalString = () =>
	z.string().optional().transform((raw) => raw?.trim() || undefined);

const envSchema = z.object({
	TELEGRAM_BOT_TOKEN: requiredString(),
	RSS_FEED_URL: feedUrl(),
	TELEGRAM_CHAT_ID: requiredString(),
	CACHE_FILE_PATH: optionalString(),
	CONDITIONAL_FETCH: envBoolean(true),
	MAX_ENTRIES_PER_RUN: envInteger(DEFAULT_MAX_ENTRIES_PER_RUN, 0),
	FETCH_TIMEOUT_MS: envInteger(FETCH_TIMEOUT_MS, 1),
	LINK_PREVIEW: envBoolean(true),
	SILENT_NOTIFICATIONS: envBoolean(false),
	TELEGRAM_ADMIN_CHAT_ID: optionalString(),
});

/**
 * Build the run configuration from environment variables.
 * Every missing or invalid variable is reported at once in a ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const parsed = envSchema.safeParse(env);
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`));
	}

	const vars = parsed.data;
	return {
		botToken: vars.TELEGRAM_BOT_TOKEN,
		feedUrl: vars.RSS_FEED_URL,
		chatId: vars.TELEGRAM_CHAT_ID,
		cacheFilePath: vars.CACHE_FILE_PATH ?? DEFAULT_CACHE_FILE,
		conditionalFetch: vars.CONDITIONAL_FETCH,
		maxEntriesPerRun: vars.MAX_ENTRIES_PER_RUN,
		fetchTimeoutMs: vars.FETCH_TIMEOUT_MS,
		linkPreview: vars.LINK_PREVIEW,
		silent: vars.SILENT_NOTIFICATIONS,
		adminChatId: vars.TELEGRAM_ADMIN_CHAT_ID,
	};
}

function isHttpUrl(value: string): boolean {
	try {
		const url = new URL(value);
		return url.protocol === 'http:' || url.protocol === 'https:';
	} catch {
		return false;
	}
}
