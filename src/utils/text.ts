import { ALERT_ERROR_MAX_LENGTH } from '../constants';

export function escapeHtml(str: string): string {
	return str.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** Error text cut short enough to fit in a Telegram message. */
export function truncErr(err: unknown, maxLen = ALERT_ERROR_MAX_LENGTH): string {
	const msg = err instanceof Error ? err.message : String(err);
	return msg.length > maxLen ? msg.slice(0, maxLen) + '...' : msg;
}
