/**
 * Raised when the playback device cannot be queried (timeout, unreachable, SOAP fault)
 */
export class DeviceQueryError extends Error {
	readonly action: string
	readonly status: number | null

	constructor(action: string, message: string, status: number | null = null, options?: ErrorOptions) {
		super(message, options)
		this.name = 'DeviceQueryError'
		this.action = action
		this.status = status
	}
}

/**
 * Raised by an artwork lookup for transport failures and malformed responses
 */
export class ArtworkLookupError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = 'ArtworkLookupError'
	}
}

/**
 * The lookup service rejected the request for exceeding its rate limit
 */
export class RateLimitedError extends ArtworkLookupError {
	readonly status: number

	constructor(status: number) {
		super(`Rate limited by artwork service (HTTP ${status})`)
		this.name = 'RateLimitedError'
		this.status = status
	}
}

export class TimeoutError extends Error {
	readonly timeoutMs: number

	constructor(label: string, timeoutMs: number) {
		super(`${label} timed out after ${timeoutMs}ms`)
		this.name = 'TimeoutError'
		this.timeoutMs = timeoutMs
	}
}

export class ConfigError extends Error {
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
		this.name = 'ConfigError'
		this.issues = issues
	}
}

/**
 * Message of an unknown thrown value, for log lines
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
