import { artworkCacheKey } from './artworkMatch'

export type Clock = () => number

export type ArtworkCacheEntry =
	| { readonly kind: 'match'; readonly url: string; readonly resolvedAt: number }
	| { readonly kind: 'no-match'; readonly resolvedAt: number }

/**
 * Process-wide memo of (artist, album) → external artwork result.
 *
 * A "no-match" is remembered exactly like a match: catalog lookups do not change,
 * so neither is retried until restart or an explicit invalidate/clear. There is no TTL.
 */
export class ArtworkCache {
	private entries: Map<string, ArtworkCacheEntry> = new Map()
	private readonly now: Clock

	constructor(now: Clock = Date.now) {
		this.now = now
	}

	get(artist: string, album: string): ArtworkCacheEntry | undefined {
		return this.entries.get(artworkCacheKey(artist, album))
	}

	has(artist: string, album: string): boolean {
		return this.entries.has(artworkCacheKey(artist, album))
	}

	setMatch(artist: string, album: string, url: string): ArtworkCacheEntry {
		const entry: ArtworkCacheEntry = Object.freeze({ kind: 'match', url, resolvedAt: this.now() })
		this.entries.set(artworkCacheKey(artist, album), entry)
		return entry
	}

	setNoMatch(artist: string, album: string): ArtworkCacheEntry {
		const entry: ArtworkCacheEntry = Object.freeze({ kind: 'no-match', resolvedAt: this.now() })
		this.entries.set(artworkCacheKey(artist, album), entry)
		return entry
	}

	invalidate(artist: string, album: string): boolean {
		return this.entries.delete(artworkCacheKey(artist, album))
	}

	clear(): void {
		this.entries.clear()
	}

	get size(): number {
		return this.entries.size
	}

	getStats() {
		let matches = 0
		for (const entry of this.entries.values()) {
			if (entry.kind === 'match') matches++
		}
		return {
			entries: this.entries.size,
			matches,
			noMatches: this.entries.size - matches,
		}
	}
}

/**
 * Cooldown window after the lookup service signals a rate limit.
 * blockedUntil of 0 means not blocked; the block lifts by itself once the clock passes it.
 */
export class RateLimitGate {
	private blockedUntil: number = 0
	private readonly now: Clock

	constructor(now: Clock = Date.now) {
		this.now = now
	}

	block(cooldownMs: number): void {
		const until = this.now() + cooldownMs
		// Never shorten a block already in place
		if (until > this.blockedUntil) {
			this.blockedUntil = until
		}
	}

	isBlocked(): boolean {
		if (this.blockedUntil === 0) return false
		if (this.now() >= this.blockedUntil) {
			this.blockedUntil = 0
			return false
		}
		return true
	}

	remainingMs(): number {
		return this.isBlocked() ? this.blockedUntil - this.now() : 0
	}

	getBlockedUntil(): number {
		return this.blockedUntil
	}

	reset(): void {
		this.blockedUntil = 0
	}
}
