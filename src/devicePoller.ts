import { type ArtworkResolver, REASONS, nativeResolution } from './artworkResolver'
import { TimeoutError, describeError } from './errors'
import { withTimeout } from './lib/timeout'
import { createLogger } from './logger'
import type { QueueEnricher } from './queueEnricher'
import type { StateBroadcaster } from './stateBroadcaster'
import type { ArtworkResolution, CanonicalTrack, DeviceSnapshot, PlaybackDevice } from './types'

export interface DevicePollerOptions {
	device: PlaybackDevice
	resolver: ArtworkResolver
	enricher: QueueEnricher
	broadcaster: StateBroadcaster
	intervalMs: number
	deviceTimeoutMs: number
	lookupTimeoutMs: number
	graceCycles: number
	heartbeatIntervalMs: number
	now?: () => Date
}

export interface PollerStatus {
	running: boolean
	device: string
	consecutiveMisses: number
	lastSuccessAt: string | null
	lastError: string | null
}

const log = createLogger('Poller')

/**
 * Whether the difference between two published states is worth pushing.
 * Position and duration drift every poll and never count on their own.
 */
export function isSignificantChange(previous: CanonicalTrack | null, next: CanonicalTrack | null): boolean {
	if (previous === null || next === null) {
		return previous !== next
	}
	return (
		previous.title !== next.title ||
		previous.artist !== next.artist ||
		previous.album !== next.album ||
		previous.isPlaying !== next.isPlaying ||
		previous.albumArtUrl !== next.albumArtUrl
	)
}

/**
 * Polls the playback device on a fixed interval and publishes significant changes.
 *
 * A failed or empty poll only demotes the display to "nothing playing" after
 * graceCycles consecutive misses, so brief network blips never flicker the screen.
 */
export class DevicePoller {
	private readonly device: PlaybackDevice
	private readonly resolver: ArtworkResolver
	private readonly enricher: QueueEnricher
	private readonly broadcaster: StateBroadcaster
	private readonly intervalMs: number
	private readonly deviceTimeoutMs: number
	private readonly lookupTimeoutMs: number
	private readonly graceCycles: number
	private readonly heartbeatIntervalMs: number
	private readonly now: () => Date

	private pollTimer: ReturnType<typeof setInterval> | null = null
	private heartbeatTimer: ReturnType<typeof setInterval> | null = null
	private inFlight: Promise<void> | null = null
	private isRunning: boolean = false
	private lastPublished: CanonicalTrack | null = null
	private consecutiveMisses: number = 0
	private lastSuccessAt: Date | null = null
	private lastError: string | null = null
	private reachable: boolean = false

	constructor(options: DevicePollerOptions) {
		this.device = options.device
		this.resolver = options.resolver
		this.enricher = options.enricher
		this.broadcaster = options.broadcaster
		this.intervalMs = options.intervalMs
		this.deviceTimeoutMs = options.deviceTimeoutMs
		this.lookupTimeoutMs = options.lookupTimeoutMs
		this.graceCycles = options.graceCycles
		this.heartbeatIntervalMs = options.heartbeatIntervalMs
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Run one cycle immediately, then keep polling and sending heartbeats
	 */
	async start(): Promise<void> {
		if (this.isRunning) return
		this.isRunning = true
		log.info(`Started: polling ${this.device.describe()} every ${this.intervalMs}ms`)

		await this.pollOnce()
		if (!this.isRunning) return

		this.pollTimer = setInterval(() => {
			void this.pollOnce()
		}, this.intervalMs)
		this.heartbeatTimer = setInterval(() => {
			this.broadcaster.ping()
		}, this.heartbeatIntervalMs)
	}

	/**
	 * Stop both timers, let an in-flight cycle finish, then release the device
	 */
	async stop(): Promise<void> {
		this.isRunning = false
		if (this.pollTimer) {
			clearInterval(this.pollTimer)
			this.pollTimer = null
		}
		if (this.heartbeatTimer) {
			clearInterval(this.heartbeatTimer)
			this.heartbeatTimer = null
		}
		if (this.inFlight) {
			await this.inFlight
		}
		this.device.close()
		log.info('Stopped')
	}

	/**
	 * A single poll cycle. Overlapping calls share the cycle already in flight.
	 */
	pollOnce(): Promise<void> {
		if (this.inFlight) {
			log.debug('Previous cycle still running, skipping tick')
			return this.inFlight
		}
		this.inFlight = this.runCycle().finally(() => {
			this.inFlight = null
		})
		return this.inFlight
	}

	getStatus(): PollerStatus {
		return {
			running: this.isRunning,
			device: this.device.describe(),
			consecutiveMisses: this.consecutiveMisses,
			lastSuccessAt: this.lastSuccessAt ? this.lastSuccessAt.toISOString() : null,
			lastError: this.lastError,
		}
	}

	/**
	 * Whether the last cycle got an answer from the device, even an empty one
	 */
	isDeviceReachable(): boolean {
		return this.reachable
	}

	private async runCycle(): Promise<void> {
		let snapshot: DeviceSnapshot | null
		try {
			// Discovery is bounded by its own listen window, not the query deadline
			await this.device.locate()
			snapshot = await withTimeout(this.device.query(), this.deviceTimeoutMs, 'Device query')
			this.reachable = true
		} catch (err) {
			this.reachable = false
			this.lastError = describeError(err)
			log.warn(`Device query failed (${this.consecutiveMisses + 1}/${this.graceCycles}): ${this.lastError}`)
			this.recordMiss()
			return
		}

		if (!snapshot) {
			log.debug('Device reports nothing loaded')
			this.recordMiss()
			return
		}

		this.consecutiveMisses = 0
		this.lastSuccessAt = this.now()
		this.lastError = null

		try {
			this.commit(await this.buildTrack(snapshot))
		} catch (err) {
			log.error('Failed to build track:', err)
		}
	}

	private recordMiss(): void {
		this.consecutiveMisses++
		if (this.lastPublished !== null && this.consecutiveMisses < this.graceCycles) {
			return
		}
		this.commit(null)
	}

	private commit(track: CanonicalTrack | null): void {
		if (isSignificantChange(this.lastPublished, track)) {
			if (track) {
				log.info(`Now ${track.isPlaying ? 'playing' : 'paused'}: ${track.artist} - ${track.title} [${track.artSource}: ${track.artSourceReason}]`)
			} else {
				log.info('Nothing playing')
			}
			this.broadcaster.publish(track)
		} else {
			this.broadcaster.replace(track)
		}
		this.lastPublished = track
	}

	private async buildTrack(snapshot: DeviceSnapshot): Promise<CanonicalTrack> {
		const [art, upcomingQueue] = await Promise.all([
			this.resolveCurrentArt(snapshot),
			this.enricher.enrich(snapshot.queue),
		])

		const upcomingArtUrls: string[] = []
		for (const item of upcomingQueue) {
			if (item.displayUrl) upcomingArtUrls.push(item.displayUrl)
		}

		return {
			source: 'sonos',
			title: snapshot.title,
			artist: snapshot.artist,
			album: snapshot.album,
			isPlaying: snapshot.isPlaying,
			positionMs: Math.max(0, Math.round(snapshot.positionMs)),
			durationMs: Math.max(0, Math.round(snapshot.durationMs)),
			albumArtUrl: art.url,
			artSource: art.source,
			artSourceReason: art.reason,
			originalNativeArtUrl: art.source === 'external' && snapshot.nativeArtUrl ? snapshot.nativeArtUrl : null,
			roomName: snapshot.roomName,
			upcomingQueue,
			upcomingArtUrls,
			updatedAt: this.now().toISOString(),
		}
	}

	private async resolveCurrentArt(snapshot: DeviceSnapshot): Promise<ArtworkResolution> {
		try {
			return await withTimeout(
				this.resolver.resolve(snapshot.artist, snapshot.album, snapshot.nativeArtUrl),
				this.lookupTimeoutMs,
				'Current track artwork',
			)
		} catch (err) {
			const reason = err instanceof TimeoutError ? REASONS.lookupTimeout : REASONS.lookupError
			log.warn(`Using native art for current track: ${describeError(err)}`)
			return nativeResolution(snapshot.nativeArtUrl, reason)
		}
	}
}
