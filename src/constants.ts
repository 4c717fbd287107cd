// Telegram sendMessage text limit
export const TELEGRAM_MESSAGE_LIMIT = 4096;

// Tags Telegram's HTML parse mode renders from a feed body
export const DEFAULT_ALLOWED_TAGS: ReadonlySet<string> = new Set(['b', 'i', 'a']);

export const NO_DESCRIPTION_TEXT = 'No description available.';
export const UNTITLED_TEXT = 'Untitled';

// Feed fetch
export const USER_AGENT = 'Mozilla/5.0 (compatible; RSSBot/1.0)';
export const FEED_ACCEPT = 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*';
export const FETCH_TIMEOUT_MS = 10000;

// Defaults
export const DEFAULT_CACHE_FILE = 'feed_cache.json';
export const DEFAULT_MAX_ENTRIES_PER_RUN = 5;

// Alert error text is cut to this length
export const ALERT_ERROR_MAX_LENGTH = 300;
