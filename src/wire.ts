/**
 * JSON shape pushed to display clients. The browser client validates
 * incoming events against the same schemas.
 */

import { z } from 'zod'
import type { CanonicalTrack, QueueItem } from './types'

export const ArtSourceSchema = z.enum(['native', 'external', 'none'])

export const WireQueueItemSchema = z.object({
	title: z.string(),
	artist: z.string(),
	album: z.string(),
	native_art_url: z.string().nullable(),
	display_url: z.string().nullable(),
	has_external_match: z.boolean(),
	reason: z.string(),
})
export type WireQueueItem = z.infer<typeof WireQueueItemSchema>

export const WireTrackSchema = z.object({
	source: z.literal('sonos'),
	title: z.string(),
	artist: z.string(),
	album: z.string(),
	is_playing: z.boolean(),
	position_ms: z.number().int().nonnegative(),
	duration_ms: z.number().int().nonnegative(),
	album_art_url: z.string().nullable(),
	art_source: ArtSourceSchema,
	art_source_reason: z.string(),
	original_native_art_url: z.string().nullable(),
	room_name: z.string().nullable(),
	upcoming_queue_items: z.array(WireQueueItemSchema),
	upcoming_art_urls: z.array(z.string()),
	updated_at: z.string(),
})
export type WireTrack = z.infer<typeof WireTrackSchema>

/**
 * Payload of the "state" and "update" events
 */
export const StatePayloadSchema = z.object({
	current_track: WireTrackSchema.nullable(),
})
export type StatePayload = z.infer<typeof StatePayloadSchema>

export type StreamEventName = 'state' | 'update' | 'ping'

function toWireQueueItem(item: QueueItem): WireQueueItem {
	return {
		title: item.title,
		artist: item.artist,
		album: item.album,
		native_art_url: item.nativeArtUrl,
		display_url: item.displayUrl,
		has_external_match: item.hasExternalMatch,
		reason: item.reason,
	}
}

export function toWireTrack(track: CanonicalTrack): WireTrack {
	return {
		source: track.source,
		title: track.title,
		artist: track.artist,
		album: track.album,
		is_playing: track.isPlaying,
		position_ms: track.positionMs,
		duration_ms: track.durationMs,
		album_art_url: track.albumArtUrl,
		art_source: track.artSource,
		art_source_reason: track.artSourceReason,
		original_native_art_url: track.originalNativeArtUrl,
		room_name: track.roomName,
		upcoming_queue_items: track.upcomingQueue.map(toWireQueueItem),
		upcoming_art_urls: track.upcomingArtUrls,
		updated_at: track.updatedAt,
	}
}

export function toStatePayload(track: CanonicalTrack | null): StatePayload {
	return { current_track: track ? toWireTrack(track) : null }
}

/**
 * Frames one Server-Sent Event
 */
export function formatSseEvent(event: StreamEventName, data: unknown): string {
	return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`
}
