/**
 * Reconnecting consumer of the /api/stream event stream.
 *
 * States: disconnected → connecting → connected. Any stream error closes the
 * source and schedules exactly one reconnect, backing off from 1s up to 30s.
 * The first valid `state` event after (re)connecting resets the backoff.
 */

import { createLogger } from '../logger'
import { StatePayloadSchema, type WireTrack } from '../wire'

const INITIAL_RECONNECT_DELAY_MS = 1000
const MAX_RECONNECT_DELAY_MS = 30000

const log = createLogger('Live')

export type ConnectionState = 'disconnected' | 'connecting' | 'connected'

export interface StreamMessage {
	data: string
}

/**
 * The part of the browser EventSource this client relies on
 */
export interface EventSourceLike {
	addEventListener(type: string, listener: (event: StreamMessage) => void): void
	onerror: ((event: unknown) => void) | null
	close(): void
}

export interface LiveConnectionOptions {
	url: string
	/** In a page: `url => new EventSource(url)` */
	createSource: (url: string) => EventSourceLike
	onTrack: (track: WireTrack | null) => void
	onStateChange?: (state: ConnectionState) => void
	initialDelayMs?: number
	maxDelayMs?: number
}

export class LiveConnection {
	private readonly options: LiveConnectionOptions
	private readonly initialDelayMs: number
	private readonly maxDelayMs: number

	private state: ConnectionState = 'disconnected'
	private source: EventSourceLike | null = null
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null
	private failedAttempts = 0
	private closed = false

	constructor(options: LiveConnectionOptions) {
		this.options = options
		this.initialDelayMs = options.initialDelayMs ?? INITIAL_RECONNECT_DELAY_MS
		this.maxDelayMs = options.maxDelayMs ?? MAX_RECONNECT_DELAY_MS
	}

	getState(): ConnectionState {
		return this.state
	}

	/**
	 * Delay the next reconnect would wait: doubles per consecutive failure, capped at maxDelayMs
	 */
	get nextDelayMs(): number {
		return Math.min(this.initialDelayMs * 2 ** this.failedAttempts, this.maxDelayMs)
	}

	get reconnectPending(): boolean {
		return this.reconnectTimer !== null
	}

	/**
	 * Open the stream, cancelling any pending reconnect and replacing any open source
	 */
	connect(): void {
		this.closed = false
		this.clearReconnect()
		this.closeSource()

		this.setState('connecting')
		const source = this.options.createSource(this.options.url)
		this.source = source

		source.addEventListener('state', event => {
			if (source !== this.source) return
			const track = this.parse('state', event)
			if (track === undefined) return
			this.failedAttempts = 0
			this.setState('connected')
			this.options.onTrack(track)
		})

		source.addEventListener('update', event => {
			if (source !== this.source) return
			const track = this.parse('update', event)
			if (track !== undefined) this.options.onTrack(track)
		})

		// Keepalive only
		source.addEventListener('ping', () => {})

		source.onerror = () => {
			if (source !== this.source) return
			this.handleError()
		}
	}

	/**
	 * Stop for good: no reconnects until connect() is called again
	 */
	close(): void {
		this.closed = true
		this.clearReconnect()
		this.closeSource()
		this.setState('disconnected')
	}

	private handleError(): void {
		this.closeSource()
		this.setState('disconnected')
		if (this.closed) return

		const delay = this.nextDelayMs
		this.failedAttempts++
		log.info(`Connection lost, reconnecting in ${delay}ms...`)
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null
			this.connect()
		}, delay)
	}

	/**
	 * Validated track from an event, or undefined when the payload is malformed
	 */
	private parse(kind: string, event: StreamMessage): WireTrack | null | undefined {
		let data: unknown
		try {
			data = JSON.parse(event.data)
		} catch {
			log.warn(`Ignoring ${kind} event with invalid JSON`)
			return undefined
		}

		const result = StatePayloadSchema.safeParse(data)
		if (!result.success) {
			log.warn(`Ignoring malformed ${kind} event: ${result.error.issues[0]?.message ?? 'invalid payload'}`)
			return undefined
		}
		return result.data.current_track
	}

	private closeSource(): void {
		if (this.source) {
			this.source.onerror = null
			this.source.close()
			this.source = null
		}
	}

	private clearReconnect(): void {
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer)
			this.reconnectTimer = null
		}
	}

	private setState(next: ConnectionState): void {
		if (this.state === next) return
		this.state = next
		this.options.onStateChange?.(next)
	}
}
