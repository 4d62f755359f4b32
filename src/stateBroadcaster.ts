/**
 * STATE BROADCASTER
 * =================
 * Holds the single current track and streams it to every connected display:
 * - "state" once on subscribe, so a joining client is never blank
 * - "update" on every published change
 * - "ping" keepalives on the same channel
 */

import { describeError } from './errors'
import { createLogger } from './logger'
import type { CanonicalTrack } from './types'
import { type StatePayload, type StreamEventName, formatSseEvent, toStatePayload } from './wire'

/**
 * The outbound half of a subscriber connection. An Express Response satisfies it.
 */
export interface SubscriberSink {
	write(chunk: string): boolean
	readonly writableEnded: boolean
	end?(): void
}

/**
 * What attach() needs from an HTTP response. An Express Response satisfies it.
 */
export interface StreamResponse extends SubscriberSink {
	setHeader(name: string, value: string): unknown
	flushHeaders(): void
	on(event: string, listener: (err?: Error) => void): unknown
}

export interface SubscriberConnection {
	readonly id: number
	readonly sink: SubscriberSink
	readonly connectedAt: number
	lastSentVersion: number
}

export interface BroadcastSnapshot extends StatePayload {
	last_updated: string
	version: number
}

const log = createLogger('SSE')

class StateBroadcaster {
	private subscribers: Map<number, SubscriberConnection> = new Map()
	private current: Readonly<CanonicalTrack> | null = null
	private lastUpdated: Date = new Date()
	private version: number = 0
	private nextId: number = 1

	/**
	 * Register a subscriber and push the current state to it
	 */
	subscribe(sink: SubscriberSink): SubscriberConnection {
		const connection: SubscriberConnection = {
			id: this.nextId++,
			sink,
			connectedAt: Date.now(),
			lastSentVersion: 0,
		}
		this.subscribers.set(connection.id, connection)
		log.info(`Client ${connection.id} connected. Total: ${this.subscribers.size}`)

		this.deliver(connection, 'state', toStatePayload(this.current))
		return connection
	}

	unsubscribe(id: number): boolean {
		const removed = this.subscribers.delete(id)
		if (removed) {
			log.info(`Client ${id} disconnected. Total: ${this.subscribers.size}`)
		}
		return removed
	}

	/**
	 * Replace the current track and notify every subscriber
	 */
	publish(track: CanonicalTrack | null): void {
		this.setCurrent(track)
		const payload = toStatePayload(this.current)
		for (const connection of [...this.subscribers.values()]) {
			this.deliver(connection, 'update', payload)
		}
	}

	/**
	 * Refresh the stored snapshot (positions, queue) without pushing anything
	 */
	replace(track: CanonicalTrack | null): void {
		this.current = track ? Object.freeze({ ...track }) : null
	}

	ping(): void {
		for (const connection of [...this.subscribers.values()]) {
			this.deliver(connection, 'ping', {})
		}
	}

	getCurrent(): Readonly<CanonicalTrack> | null {
		return this.current
	}

	getVersion(): number {
		return this.version
	}

	snapshot(): BroadcastSnapshot {
		return {
			...toStatePayload(this.current),
			last_updated: this.lastUpdated.toISOString(),
			version: this.version,
		}
	}

	get size(): number {
		return this.subscribers.size
	}

	/**
	 * Express adapter: turn a request into a long-lived event stream
	 */
	attach(req: { ip?: string }, res: StreamResponse): SubscriberConnection {
		log.debug(`Stream requested by ${req.ip ?? 'unknown'}`)
		res.setHeader('Content-Type', 'text/event-stream')
		res.setHeader('Cache-Control', 'no-cache')
		res.setHeader('Connection', 'keep-alive')
		// Prevent buffering in nginx/proxies
		res.setHeader('X-Accel-Buffering', 'no')
		res.flushHeaders()

		const connection = this.subscribe(res)

		res.on('close', () => {
			this.unsubscribe(connection.id)
		})
		res.on('error', err => {
			log.warn(`Client ${connection.id} stream error: ${err ? err.message : 'unknown'}`)
			this.unsubscribe(connection.id)
		})

		return connection
	}

	closeAll(): void {
		for (const connection of this.subscribers.values()) {
			try {
				if (!connection.sink.writableEnded) {
					connection.sink.end?.()
				}
			} catch (err) {
				log.warn(`Failed to close client ${connection.id}: ${describeError(err)}`)
			}
		}
		this.subscribers.clear()
	}

	private setCurrent(track: CanonicalTrack | null): void {
		this.current = track ? Object.freeze({ ...track }) : null
		this.lastUpdated = new Date()
		this.version++
	}

	/**
	 * Best-effort write to one subscriber; a dead sink is dropped without affecting the others
	 */
	private deliver(connection: SubscriberConnection, event: StreamEventName, data: unknown): void {
		if (connection.sink.writableEnded) {
			this.unsubscribe(connection.id)
			return
		}
		try {
			connection.sink.write(formatSseEvent(event, data))
			if (event !== 'ping') {
				connection.lastSentVersion = this.version
			}
		} catch (err) {
			log.warn(`Dropping client ${connection.id} after write failure: ${describeError(err)}`)
			this.unsubscribe(connection.id)
		}
	}
}

export { StateBroadcaster }
