import { z } from 'zod'
import { cleanAlbumName } from './artworkMatch'
import { ArtworkLookupError, RateLimitedError, describeError } from './errors'
import { createLogger } from './logger'
import type { ArtworkCandidate, ArtworkLookup, ArtworkQuery, FetchLike } from './types'

const ITUNES_SEARCH_URL = 'https://itunes.apple.com/search'

// iTunes answers 403 as well as 429 when it throttles a client
const RATE_LIMIT_STATUSES = new Set([403, 429])

const log = createLogger('iTunes')

const SearchResultSchema = z.object({
	artistName: z.string().optional(),
	collectionName: z.string().optional(),
	artworkUrl100: z.string().optional(),
})

const SearchResponseSchema = z.object({
	resultCount: z.number().int().nonnegative(),
	results: z.array(SearchResultSchema),
})

export interface ItunesClientOptions {
	timeoutMs: number
	fetch?: FetchLike
	baseUrl?: string
}

/**
 * Rewrites iTunes' 100px artwork URL to the requested square size
 */
export function upsizeArtworkUrl(url: string, size: number): string {
	return url.replace(/\/(\d+)x(\d+)bb\./, `/${size}x${size}bb.`)
}

/**
 * Album artwork lookup against the iTunes Search API
 */
export class ItunesClient implements ArtworkLookup {
	private readonly timeoutMs: number
	private readonly fetchImpl: FetchLike
	private readonly baseUrl: string

	constructor(options: ItunesClientOptions) {
		this.timeoutMs = options.timeoutMs
		this.fetchImpl = options.fetch ?? fetch
		this.baseUrl = options.baseUrl ?? ITUNES_SEARCH_URL
	}

	buildSearchUrl(artist: string, album: string): string {
		const params = new URLSearchParams({
			term: `${artist} ${cleanAlbumName(album)}`.trim(),
			media: 'music',
			entity: 'album',
			limit: '1',
		})
		return `${this.baseUrl}?${params.toString()}`
	}

	async findAlbum(query: ArtworkQuery): Promise<ArtworkCandidate | null> {
		const url = this.buildSearchUrl(query.artist, query.album)
		log.debug(`Searching: ${url}`)

		let response: Response
		try {
			response = await this.fetchImpl(url, {
				headers: { Accept: 'application/json' },
				signal: AbortSignal.timeout(this.timeoutMs),
			})
		} catch (err) {
			throw new ArtworkLookupError(`Search request failed: ${describeError(err)}`, { cause: err })
		}

		if (RATE_LIMIT_STATUSES.has(response.status)) {
			throw new RateLimitedError(response.status)
		}
		if (!response.ok) {
			throw new ArtworkLookupError(`Search failed: ${response.status} ${response.statusText}`)
		}

		let body: unknown
		try {
			body = await response.json()
		} catch (err) {
			throw new ArtworkLookupError(`Search returned invalid JSON: ${describeError(err)}`, { cause: err })
		}

		const parsed = SearchResponseSchema.safeParse(body)
		if (!parsed.success) {
			throw new ArtworkLookupError(`Search returned an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`)
		}

		const first = parsed.data.results[0]
		if (!first || !first.artworkUrl100) {
			return null
		}

		return {
			artist: first.artistName ?? '',
			album: first.collectionName ?? '',
			imageUrl: upsizeArtworkUrl(first.artworkUrl100, query.size),
			width: query.size,
			height: query.size,
		}
	}
}
