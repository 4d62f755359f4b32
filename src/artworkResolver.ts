import type { ArtworkCache, RateLimitGate } from './artworkCache'
import { albumMatches, artistMatches, artworkCacheKey } from './artworkMatch'
import { RateLimitedError, describeError } from './errors'
import { createLogger } from './logger'
import type { ArtworkLookup, ArtworkResolution } from './types'

export const REASONS = {
	disabled: 'disabled',
	noMetadata: 'no metadata',
	gated: 'rate-limited, using native',
	cached: 'cached',
	matched: 'matched',
	noAlbumMatch: 'no album match',
	rateLimited: 'rate-limited',
	lookupError: 'lookup error',
	lookupTimeout: 'lookup timeout',
} as const

export interface ArtworkResolverOptions {
	lookup: ArtworkLookup
	cache: ArtworkCache
	gate: RateLimitGate
	enabled: boolean
	maxImageSize: number
	rateLimitCooldownMs: number
}

type LookupOutcome = { kind: 'match'; url: string } | { kind: 'no-match' } | { kind: 'rate-limited' } | { kind: 'error' }

const log = createLogger('Artwork')

/**
 * Falls back to the device's own art, or to nothing when the device has none
 */
export function nativeResolution(nativeArtUrl: string | null, reason: string): ArtworkResolution {
	return nativeArtUrl ? { url: nativeArtUrl, source: 'native', reason } : { url: null, source: 'none', reason }
}

/**
 * Picks the display artwork for an (artist, album) pair.
 *
 * Resolution never throws: every failure degrades to native art with a reason string.
 * The cache and rate-limit gate are shared handles, written only from here.
 */
export class ArtworkResolver {
	private readonly lookup: ArtworkLookup
	private readonly cache: ArtworkCache
	private readonly gate: RateLimitGate
	private readonly enabled: boolean
	private readonly maxImageSize: number
	private readonly rateLimitCooldownMs: number
	private pending: Map<string, Promise<LookupOutcome>> = new Map()

	constructor(options: ArtworkResolverOptions) {
		this.lookup = options.lookup
		this.cache = options.cache
		this.gate = options.gate
		this.enabled = options.enabled
		this.maxImageSize = options.maxImageSize
		this.rateLimitCooldownMs = options.rateLimitCooldownMs
	}

	async resolve(artist: string, album: string, nativeArtUrl: string | null): Promise<ArtworkResolution> {
		if (!this.enabled) {
			return nativeResolution(nativeArtUrl, REASONS.disabled)
		}

		const trimmedArtist = artist.trim()
		const trimmedAlbum = album.trim()
		if (!trimmedArtist || !trimmedAlbum) {
			return nativeResolution(nativeArtUrl, REASONS.noMetadata)
		}

		if (this.gate.isBlocked()) {
			return nativeResolution(nativeArtUrl, REASONS.gated)
		}

		const cached = this.cache.get(trimmedArtist, trimmedAlbum)
		if (cached) {
			return cached.kind === 'match'
				? { url: cached.url, source: 'external', reason: REASONS.cached }
				: nativeResolution(nativeArtUrl, REASONS.cached)
		}

		const outcome = await this.lookupOnce(trimmedArtist, trimmedAlbum)
		switch (outcome.kind) {
			case 'match':
				return { url: outcome.url, source: 'external', reason: REASONS.matched }
			case 'no-match':
				return nativeResolution(nativeArtUrl, REASONS.noAlbumMatch)
			case 'rate-limited':
				return nativeResolution(nativeArtUrl, REASONS.rateLimited)
			case 'error':
				return nativeResolution(nativeArtUrl, REASONS.lookupError)
		}
	}

	/**
	 * Concurrent misses for the same key share a single upstream call
	 */
	private lookupOnce(artist: string, album: string): Promise<LookupOutcome> {
		const key = artworkCacheKey(artist, album)
		const inFlight = this.pending.get(key)
		if (inFlight) return inFlight

		const request = this.fetchAndCache(artist, album).finally(() => {
			this.pending.delete(key)
		})
		this.pending.set(key, request)
		return request
	}

	private async fetchAndCache(artist: string, album: string): Promise<LookupOutcome> {
		try {
			const candidate = await this.lookup.findAlbum({ artist, album, size: this.maxImageSize })

			if (candidate && artistMatches(artist, candidate.artist) && albumMatches(album, candidate.album)) {
				this.cache.setMatch(artist, album, candidate.imageUrl)
				log.info(`Matched "${artist} - ${album}" (${candidate.width}x${candidate.height})`)
				return { kind: 'match', url: candidate.imageUrl }
			}

			if (candidate) {
				log.info(
					`Rejected candidate "${candidate.artist} - ${candidate.album}" for "${artist} - ${album}"`,
				)
			} else {
				log.debug(`No candidate for "${artist} - ${album}"`)
			}
			this.cache.setNoMatch(artist, album)
			return { kind: 'no-match' }
		} catch (err) {
			if (err instanceof RateLimitedError) {
				this.gate.block(this.rateLimitCooldownMs)
				log.warn(`Rate limited (HTTP ${err.status}), pausing lookups for ${this.rateLimitCooldownMs}ms`)
				return { kind: 'rate-limited' }
			}
			log.warn(`Lookup failed for "${artist} - ${album}": ${describeError(err)}`)
			return { kind: 'error' }
		}
	}

	get pendingLookups(): number {
		return this.pending.size
	}
}
