import type { WireTrack } from '../wire'

/** Cycle order when the display is tapped */
export const DISPLAY_MODES = ['on', 'detailed', 'comparison', 'debug', 'off'] as const
export type DisplayMode = (typeof DISPLAY_MODES)[number]

export const MODE_STORAGE_KEY = 'displayMode'

/**
 * localStorage-shaped persistence for the chosen mode
 */
export interface ModeStore {
	getItem(key: string): string | null
	setItem(key: string, value: string): void
}

export function isDisplayMode(value: unknown): value is DisplayMode {
	return typeof value === 'string' && DISPLAY_MODES.some(mode => mode === value)
}

const AVAILABLE: Record<DisplayMode, (track: WireTrack | null) => boolean> = {
	on: () => true,
	detailed: () => true,
	// Nothing to compare unless external art replaced the speaker's own
	comparison: track => track !== null && track.original_native_art_url !== null,
	debug: track => track !== null && track.upcoming_queue_items.length > 0,
	off: () => true,
}

export function isModeAvailable(mode: DisplayMode, track: WireTrack | null): boolean {
	return AVAILABLE[mode](track)
}

/**
 * The mode after `current`, skipping modes the track has no data for
 */
export function nextMode(current: DisplayMode, track: WireTrack | null): DisplayMode {
	let index = DISPLAY_MODES.indexOf(current)
	for (let attempts = 0; attempts < DISPLAY_MODES.length; attempts++) {
		index = (index + 1) % DISPLAY_MODES.length
		const candidate = DISPLAY_MODES[index]
		if (candidate !== undefined && isModeAvailable(candidate, track)) {
			return candidate
		}
	}
	return current
}

export interface InitialModeSources {
	/** Value of the `mode` URL parameter, if any */
	urlMode?: string | null
	store?: ModeStore
	serverDefault?: string | null
}

/**
 * URL parameter wins, then the stored preference, then the server default, then "on".
 * Unknown values at any level fall through to the next one.
 */
export function initialMode(sources: InitialModeSources): DisplayMode {
	const candidates = [sources.urlMode, sources.store?.getItem(MODE_STORAGE_KEY), sources.serverDefault]
	for (const candidate of candidates) {
		if (isDisplayMode(candidate)) return candidate
	}
	return 'on'
}

export function saveMode(store: ModeStore, mode: DisplayMode): void {
	store.setItem(MODE_STORAGE_KEY, mode)
}
