import type { ArtworkCandidate, ArtworkLookup, ArtworkQuery, DeviceSnapshot, PlaybackDevice } from '../types'
import type { WireTrack } from '../wire'

export const SPEAKER_IP = '192.168.1.20'

export function deviceSnapshot(overrides: Partial<DeviceSnapshot> = {}): DeviceSnapshot {
	return {
		title: 'Comfortably Numb',
		artist: 'Pink Floyd',
		album: 'The Wall',
		nativeArtUrl: `http://${SPEAKER_IP}:1400/getaa?s=1&u=wall`,
		isPlaying: true,
		positionMs: 1000,
		durationMs: 382000,
		roomName: 'Living Room',
		queue: [],
		...overrides,
	}
}

export function wireTrack(overrides: Partial<WireTrack> = {}): WireTrack {
	return {
		source: 'sonos',
		title: 'Test Song',
		artist: 'Test Artist',
		album: 'Test Album',
		is_playing: true,
		position_ms: 0,
		duration_ms: 180000,
		album_art_url: null,
		art_source: 'none',
		art_source_reason: 'no metadata',
		original_native_art_url: null,
		room_name: null,
		upcoming_queue_items: [],
		upcoming_art_urls: [],
		updated_at: '2026-01-01T00:00:00.000Z',
		...overrides,
	}
}

/**
 * Artwork lookup answered by a handler, recording every query
 */
export class FakeLookup implements ArtworkLookup {
	readonly calls: ArtworkQuery[] = []
	private readonly handler: (query: ArtworkQuery) => Promise<ArtworkCandidate | null>

	constructor(handler: (query: ArtworkQuery) => Promise<ArtworkCandidate | null>) {
		this.handler = handler
	}

	findAlbum(query: ArtworkQuery): Promise<ArtworkCandidate | null> {
		this.calls.push(query)
		return this.handler(query)
	}
}

/**
 * Lookup that finds every album it is asked for
 */
export function matchingLookup(): FakeLookup {
	return new FakeLookup(async query => ({
		artist: query.artist,
		album: query.album,
		imageUrl: `https://art.example/${encodeURIComponent(query.album)}/${query.size}.jpg`,
		width: query.size,
		height: query.size,
	}))
}

type ScriptStep = DeviceSnapshot | null | Error | Promise<DeviceSnapshot | null>

/**
 * Device that plays back a script of results, then repeats a fallback
 */
export class FakeDevice implements PlaybackDevice {
	readonly script: ScriptStep[] = []
	fallback: DeviceSnapshot | null = deviceSnapshot()
	queries = 0
	closed = false
	/** Settles before each query; replace to simulate slow discovery */
	locating: () => Promise<void> = async () => {}

	locate(): Promise<void> {
		return this.locating()
	}

	query(): Promise<DeviceSnapshot | null> {
		this.queries++
		const step = this.script.length > 0 ? this.script.shift() : this.fallback
		if (step instanceof Error) return Promise.reject(step)
		if (step instanceof Promise) return step
		return Promise.resolve(step ?? null)
	}

	describe(): string {
		return 'fake device'
	}

	close(): void {
		this.closed = true
	}
}

export function deferred<T>() {
	let resolve: (value: T) => void = () => {}
	let reject: (reason: unknown) => void = () => {}
	const promise = new Promise<T>((res, rej) => {
		resolve = res
		reject = rej
	})
	return { promise, resolve, reject }
}
