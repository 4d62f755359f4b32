/**
 * Remembers which upcoming artwork URLs were already requested so each image is fetched once
 */
export class ArtworkPrefetcher {
	private readonly requested: Set<string> = new Set()
	private readonly load: (url: string) => void

	/**
	 * @param load - Starts loading one image; in a page this is `url => { new Image().src = url }`
	 */
	constructor(load: (url: string) => void) {
		this.load = load
	}

	/**
	 * Loads every URL not seen before and returns how many were started
	 */
	prefetch(urls: readonly string[]): number {
		let started = 0
		for (const url of urls) {
			if (!url || this.requested.has(url)) continue
			this.requested.add(url)
			this.load(url)
			started++
		}
		return started
	}

	get size(): number {
		return this.requested.size
	}
}
