import { GrammyError } from 'grammy';
import type { DeliveryResult, DispatcherOptions, TelegramTransport } from '../types/telegram';
import { TELEGRAM_MESSAGE_LIMIT } from '../constants';
import { DeliveryError } from '../errors';
import { splitMessage } from '../utils/telegram-format';

/**
 * Sends HTML text to one chat, in 4096-character chunks when it is longer than that.
 * The first failed chunk stops the rest; there is no retry.
 */
export class MessageDispatcher {
	constructor(
		private readonly transport: TelegramTransport,
		private readonly options: DispatcherOptions
	) {}

	async send(text: string): Promise<DeliveryResult> {
		const chunks = splitMessage(text, TELEGRAM_MESSAGE_LIMIT);
		if (chunks.length > 1) {
			console.log(`[Telegram] Message is too long (${text.length} characters), sending ${chunks.length} chunks`);
		}

		for (const [index, chunk] of chunks.entries()) {
			try {
				await this.transport.sendMessage(this.options.chatId, chunk, {
					parse_mode: 'HTML',
					link_preview_options: { is_disabled: !this.options.linkPreview },
					disable_notification: this.options.silent,
				});
			} catch (err) {
				const error = toDeliveryError(err, index + 1, chunks.length);
				console.error(`[Telegram] ${error.message}`);
				return { ok: false, error };
			}
		}

		return { ok: true, chunks: chunks.length };
	}
}

function toDeliveryError(err: unknown, chunkIndex: number, chunkCount: number): DeliveryError {
	if (err instanceof GrammyError) {
		return new DeliveryError(chunkIndex, chunkCount, err.description, err.error_code, { cause: err });
	}
	const body = err instanceof Error ? err.message : String(err);
	return new DeliveryError(chunkIndex, chunkCount, body, undefined, { cause: err });
}
