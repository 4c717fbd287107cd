import type { DeliveryError } from '../errors';

// Options passed with every sendMessage call
export interface SendMessageOptions {
	parse_mode: 'HTML';
	link_preview_options: { is_disabled: boolean };
	disable_notification: boolean;
}

/**
 * The slice of the Bot API the dispatcher needs. grammy's `Api` satisfies it.
 */
export interface TelegramTransport {
	sendMessage(chatId: string, text: string, other: SendMessageOptions): Promise<unknown>;
}

export interface DispatcherOptions {
	chatId: string;
	linkPreview: boolean;
	silent: boolean;
}

export type DeliveryResult =
	| { ok: true; chunks: number }
	| { ok: false; error: DeliveryError };
