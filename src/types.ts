export type ArtSource = 'native' | 'external' | 'none'

/**
 * One upcoming entry from the speaker queue, with its artwork resolved
 */
export interface QueueItem {
	title: string
	artist: string
	album: string
	nativeArtUrl: string | null
	displayUrl: string | null
	hasExternalMatch: boolean
	reason: string
}

/**
 * The normalized "what is playing now", independent of the device API that produced it
 */
export interface CanonicalTrack {
	source: 'sonos'
	title: string
	artist: string
	album: string
	isPlaying: boolean
	positionMs: number
	durationMs: number
	albumArtUrl: string | null
	artSource: ArtSource
	artSourceReason: string
	originalNativeArtUrl: string | null
	roomName: string | null
	upcomingQueue: QueueItem[]
	upcomingArtUrls: string[]
	updatedAt: string
}

export interface RawQueueEntry {
	title: string
	artist: string
	album: string
	nativeArtUrl: string | null
}

/**
 * Raw playback report from the device, before artwork resolution
 */
export interface DeviceSnapshot {
	title: string
	artist: string
	album: string
	nativeArtUrl: string | null
	isPlaying: boolean
	positionMs: number
	durationMs: number
	roomName: string | null
	queue: RawQueueEntry[]
}

export interface PlaybackDevice {
	/**
	 * Find the device before querying it. Discovery runs on its own clock,
	 * outside the per-query deadline.
	 */
	locate(): Promise<void>
	/** Resolves null when nothing is loaded, rejects when the device cannot be queried */
	query(): Promise<DeviceSnapshot | null>
	describe(): string
	close(): void
}

export interface ArtworkResolution {
	url: string | null
	source: ArtSource
	reason: string
}

export interface ArtworkQuery {
	artist: string
	album: string
	size: number
}

export interface ArtworkCandidate {
	artist: string
	album: string
	imageUrl: string
	width: number
	height: number
}

export interface ArtworkLookup {
	/** Resolves null when the service has no candidate */
	findAlbum(query: ArtworkQuery): Promise<ArtworkCandidate | null>
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>
