/**
 * Text normalization and match rules shared by the artwork cache and resolver.
 */

const EDITION_PATTERNS: RegExp[] = [
	/^(?:(?:\d+(?:st|nd|rd|th)|\d{4})\s+)?(?:super\s+deluxe|deluxe|expanded|special|anniversary|collector'?s|limited)(?:\s+(?:edition|version))?$/i,
	/^(?:\d{4}\s+)?(?:digital(?:ly)?\s+)?remaster(?:ed)?(?:\s+(?:edition|version))?(?:\s+\d{4})?$/i,
	/^(?:with\s+)?bonus\s+tracks?(?:\s+edition)?$/i,
]

const BRACKETED = /\s*[([]\s*([^()[\]]*?)\s*[)\]]/g
const DASH_REMASTER = /\s+[-–]\s+(?:\d{4}\s+)?remaster(?:ed)?(?:\s+\d{4})?\s*$/i

function isEditionLabel(label: string): boolean {
	return EDITION_PATTERNS.some(pattern => pattern.test(label.trim()))
}

/**
 * Strips edition suffixes such as "(Deluxe Edition)" or "[2011 Remastered]".
 * Ordinary parenthesized content like "(Part 1)" is kept.
 */
export function cleanAlbumName(album: string): string {
	let current = album
	for (;;) {
		const next = current
			.replace(BRACKETED, (match: string, label: string) => (isEditionLabel(label) ? '' : match))
			.replace(DASH_REMASTER, '')
		if (next === current) break
		current = next
	}
	return current.replace(/\s+/g, ' ').trim()
}

/**
 * Lowercases, strips diacritics and folds punctuation runs into single spaces
 */
export function normalizeText(value: string | null | undefined): string {
	if (!value) return ''
	return value
		.normalize('NFKD')
		.replace(/[\u0300-\u036f]/g, '')
		.toLowerCase()
		.replace(/&/g, ' and ')
		.replace(/[^\p{L}\p{N}]+/gu, ' ')
		.trim()
}

/**
 * Cache key for an (artist, album) pair. Both halves always participate.
 */
export function artworkCacheKey(artist: string, album: string): string {
	return `${normalizeText(artist)}\u0000${normalizeText(album)}`
}

function withoutLeadingThe(name: string): string {
	return name.replace(/^the /, '')
}

/**
 * Equal once normalized and stripped of a leading "the", so "Beatles" matches
 * "The Beatles" but "Pink" never matches "Pink Floyd"
 */
export function artistMatches(queried: string, candidate: string): boolean {
	const a = withoutLeadingThe(normalizeText(queried))
	const b = withoutLeadingThe(normalizeText(candidate))
	return a !== '' && a === b
}

export function albumMatches(queried: string, candidate: string): boolean {
	const a = normalizeText(cleanAlbumName(queried))
	const b = normalizeText(cleanAlbumName(candidate))
	return a !== '' && a === b
}
