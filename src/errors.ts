/** Base class so callers can tell relay failures from programming errors. */
export class RelayError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Required settings missing or invalid. Raised before any I/O. */
export class ConfigError extends RelayError {
	constructor(public readonly issues: string[]) {
		super(`Invalid configuration: ${issues.join('; ')}`);
	}
}

/** Cache file exists but cannot be used. Recovered by starting from an empty record. */
export class CacheCorruptError extends RelayError {
	constructor(public readonly filePath: string, cause: unknown) {
		super(`Cache file ${filePath} is corrupt: ${describeCause(cause)}`, { cause });
	}
}

export class FetchError extends RelayError {
	constructor(
		public readonly url: string,
		reason: string,
		public readonly status?: number,
		options?: { cause?: unknown }
	) {
		super(`Failed to fetch feed ${url}: ${reason}`, options);
	}
}

export class ParseError extends RelayError {
	constructor(reason: string) {
		super(`Failed to parse feed: ${reason}`);
	}
}

/** A chunk the Bot API did not accept. Chunks before it were delivered. */
export class DeliveryError extends RelayError {
	constructor(
		public readonly chunkIndex: number,
		public readonly chunkCount: number,
		public readonly body: string,
		public readonly status?: number,
		options?: { cause?: unknown }
	) {
		const statusText = status !== undefined ? ` (status ${status})` : '';
		super(`Telegram rejected chunk ${chunkIndex}/${chunkCount}${statusText}: ${body}`, options);
	}
}

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}
