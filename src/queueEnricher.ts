import { type ArtworkResolver, REASONS, nativeResolution } from './artworkResolver'
import { TimeoutError, describeError } from './errors'
import { withTimeout } from './lib/timeout'
import { createLogger } from './logger'
import type { ArtworkResolution, QueueItem, RawQueueEntry } from './types'

const log = createLogger('Queue')

export interface QueueEnricherOptions {
	resolver: ArtworkResolver
	lookahead: number
	timeoutMs: number
}

/**
 * Resolves artwork for the upcoming queue, one concurrent lookup per entry.
 * A slow or failing entry falls back to its own native art without holding up the rest.
 */
export class QueueEnricher {
	private readonly resolver: ArtworkResolver
	private readonly lookahead: number
	private readonly timeoutMs: number

	constructor(options: QueueEnricherOptions) {
		this.resolver = options.resolver
		this.lookahead = options.lookahead
		this.timeoutMs = options.timeoutMs
	}

	async enrich(entries: RawQueueEntry[]): Promise<QueueItem[]> {
		const bounded = entries.slice(0, this.lookahead)
		return Promise.all(bounded.map(entry => this.enrichEntry(entry)))
	}

	private async enrichEntry(entry: RawQueueEntry): Promise<QueueItem> {
		let resolution: ArtworkResolution
		try {
			resolution = await withTimeout(
				this.resolver.resolve(entry.artist, entry.album, entry.nativeArtUrl),
				this.timeoutMs,
				`Artwork for "${entry.title}"`,
			)
		} catch (err) {
			const reason = err instanceof TimeoutError ? REASONS.lookupTimeout : REASONS.lookupError
			log.warn(`Falling back to native art for "${entry.title}": ${describeError(err)}`)
			resolution = nativeResolution(entry.nativeArtUrl, reason)
		}

		return {
			title: entry.title,
			artist: entry.artist,
			album: entry.album,
			nativeArtUrl: entry.nativeArtUrl,
			displayUrl: resolution.url,
			hasExternalMatch: resolution.source === 'external',
			reason: resolution.reason,
		}
	}
}
