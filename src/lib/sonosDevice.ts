/**
 * Sonos playback device - reads the current track, transport state and upcoming queue via UPnP/SOAP
 */

import { DeviceQueryError, describeError } from '../errors'
import { createLogger } from '../logger'
import type { DeviceSnapshot, FetchLike, PlaybackDevice, RawQueueEntry } from '../types'
import { SONOS_PORT, extractSoapValue, sendSoapRequest, unescapeXml } from './soapClient'
import { type DiscoveredSpeaker, discoverSpeakers } from './ssdpDiscovery'

// Service URNs
const AV_TRANSPORT = 'urn:schemas-upnp-org:service:AVTransport:1'
const CONTENT_DIRECTORY = 'urn:schemas-upnp-org:service:ContentDirectory:1'
const DEVICE_PROPERTIES = 'urn:schemas-upnp-org:service:DeviceProperties:1'

// Control URLs
const AV_TRANSPORT_CONTROL = '/MediaRenderer/AVTransport/Control'
const CONTENT_DIRECTORY_CONTROL = '/MediaServer/ContentDirectory/Control'
const DEVICE_PROPERTIES_CONTROL = '/DeviceProperties/Control'

const QUEUE_FILTER = 'dc:title,res,dc:creator,upnp:artist,upnp:album,upnp:albumArtURI'
const DISCOVERY_TIMEOUT_MS = 5000

const log = createLogger('Sonos')

export interface SonosDeviceOptions {
	/** Fixed speaker address; discovered over SSDP when empty */
	ip: string
	/** Preferred room when discovering */
	room: string
	timeoutMs: number
	/** How long an SSDP search listens for replies */
	discoveryTimeoutMs?: number
	queueLookahead: number
	fetch?: FetchLike
	discover?: (timeoutMs: number) => Promise<DiscoveredSpeaker[]>
}

export interface DidlItem {
	title: string
	artist: string
	album: string
	albumArtUri: string | null
}

/**
 * Parse "H:MM:SS" or "M:SS" into milliseconds. Unknown values (NOT_IMPLEMENTED, empty) give 0.
 */
export function parseDuration(value: string | null | undefined): number {
	if (!value) return 0
	const parts = value.trim().split(':')
	if (parts.length < 2 || parts.length > 3) return 0

	let seconds = 0
	for (const part of parts) {
		if (!/^\d+$/.test(part)) return 0
		seconds = seconds * 60 + Number(part)
	}
	return seconds * 1000
}

/**
 * Sonos returns relative art paths (/getaa?...) that must be served from the speaker itself
 */
export function absoluteArtUrl(uri: string | null, ip: string): string | null {
	if (!uri) return null
	if (/^https?:\/\//i.test(uri)) return uri
	return `http://${ip}:${SONOS_PORT}${uri.startsWith('/') ? '' : '/'}${uri}`
}

function readField(itemXml: string, ...tags: string[]): string {
	for (const tag of tags) {
		const value = extractSoapValue(itemXml, tag)
		if (value) return unescapeXml(value).trim()
	}
	return ''
}

/**
 * Parse every <item> of an (already unescaped) DIDL-Lite document
 */
export function parseDidlItems(didl: string): DidlItem[] {
	const items: DidlItem[] = []
	const itemRegex = /<item[\s>][\s\S]*?<\/item>/g
	let match: RegExpExecArray | null

	while ((match = itemRegex.exec(didl)) !== null) {
		const itemXml = match[0]
		const albumArtUri = readField(itemXml, 'upnp:albumArtURI')
		items.push({
			title: readField(itemXml, 'dc:title'),
			artist: readField(itemXml, 'dc:creator', 'upnp:artist'),
			album: readField(itemXml, 'upnp:album'),
			albumArtUri: albumArtUri || null,
		})
	}

	return items
}

/**
 * Zone name a speaker reports, or null when it has none
 */
export async function fetchRoomName(
	ip: string,
	timeoutMs: number,
	fetchImpl?: FetchLike,
	signal?: AbortSignal,
): Promise<string | null> {
	const response = await sendSoapRequest({
		ip,
		controlUrl: DEVICE_PROPERTIES_CONTROL,
		serviceType: DEVICE_PROPERTIES,
		action: 'GetZoneAttributes',
		timeoutMs,
		signal,
		fetch: fetchImpl,
	})
	const name = unescapeXml(extractSoapValue(response, 'CurrentZoneName') ?? '').trim()
	return name || null
}

export class SonosDevice implements PlaybackDevice {
	private readonly options: SonosDeviceOptions
	private readonly fetchImpl: FetchLike | undefined
	private readonly discover: (timeoutMs: number) => Promise<DiscoveredSpeaker[]>
	private controller: AbortController = new AbortController()
	private activeIp: string | null = null
	private locating: Promise<string> | null = null
	private querySeq = 0
	private roomNames: Map<string, string> = new Map()

	constructor(options: SonosDeviceOptions) {
		this.options = options
		this.fetchImpl = options.fetch
		this.discover = options.discover ?? discoverSpeakers
		if (options.ip) {
			this.activeIp = options.ip
		}
	}

	describe(): string {
		return this.activeIp ? `Sonos at ${this.activeIp}` : 'Sonos (not yet located)'
	}

	/**
	 * Abort in-flight requests and refuse new ones
	 */
	close(): void {
		this.controller.abort(new Error('Device closed'))
	}

	/**
	 * Resolve the speaker address, running SSDP discovery when none is known.
	 * Concurrent callers share one search.
	 */
	async locate(): Promise<void> {
		this.assertOpen()
		await this.resolveIp()
	}

	async query(): Promise<DeviceSnapshot | null> {
		this.assertOpen()

		const seq = ++this.querySeq
		const ip = await this.resolveIp()
		try {
			return await this.readSnapshot(ip)
		} catch (err) {
			// Discovered address may be stale; look again next cycle.
			// A query overtaken by a newer one leaves the address alone.
			if (!this.options.ip && seq === this.querySeq && this.activeIp === ip) {
				this.activeIp = null
			}
			throw err
		}
	}

	private assertOpen(): void {
		if (this.controller.signal.aborted) {
			throw new DeviceQueryError('query', 'Device is closed')
		}
	}

	private resolveIp(): Promise<string> {
		if (this.activeIp) return Promise.resolve(this.activeIp)
		if (!this.locating) {
			this.locating = this.discoverIp().finally(() => {
				this.locating = null
			})
		}
		return this.locating
	}

	private async readSnapshot(ip: string): Promise<DeviceSnapshot | null> {
		const [positionXml, transportXml] = await Promise.all([
			this.soap(ip, AV_TRANSPORT_CONTROL, AV_TRANSPORT, 'GetPositionInfo', { InstanceID: 0 }),
			this.soap(ip, AV_TRANSPORT_CONTROL, AV_TRANSPORT, 'GetTransportInfo', { InstanceID: 0 }),
		])

		const metadata = extractSoapValue(positionXml, 'TrackMetaData') ?? ''
		const [item] = metadata && metadata !== 'NOT_IMPLEMENTED' ? parseDidlItems(unescapeXml(metadata)) : []
		if (!item || !item.title) {
			return null
		}

		const transportState = extractSoapValue(transportXml, 'CurrentTransportState') ?? ''
		const trackNumber = Number(extractSoapValue(positionXml, 'Track') ?? '0')

		const [roomName, queue] = await Promise.all([this.getRoomName(ip), this.getUpcoming(ip, trackNumber)])

		return {
			title: item.title,
			artist: item.artist,
			album: item.album,
			nativeArtUrl: absoluteArtUrl(item.albumArtUri, ip),
			isPlaying: transportState === 'PLAYING',
			positionMs: parseDuration(extractSoapValue(positionXml, 'RelTime')),
			durationMs: parseDuration(extractSoapValue(positionXml, 'TrackDuration')),
			roomName,
			queue,
		}
	}

	/**
	 * Upcoming queue entries after the current track. Failures give an empty queue.
	 */
	private async getUpcoming(ip: string, trackNumber: number): Promise<RawQueueEntry[]> {
		const lookahead = this.options.queueLookahead
		if (lookahead <= 0 || !Number.isInteger(trackNumber) || trackNumber < 1) {
			return []
		}

		try {
			const response = await this.soap(ip, CONTENT_DIRECTORY_CONTROL, CONTENT_DIRECTORY, 'Browse', {
				ObjectID: 'Q:0',
				BrowseFlag: 'BrowseDirectChildren',
				Filter: QUEUE_FILTER,
				// Track is 1-based, so the next entry sits at index Track
				StartingIndex: trackNumber,
				RequestedCount: lookahead,
				SortCriteria: '',
			})
			const result = extractSoapValue(response, 'Result')
			if (!result) return []

			return parseDidlItems(unescapeXml(result))
				.slice(0, lookahead)
				.map(entry => ({
					title: entry.title,
					artist: entry.artist,
					album: entry.album,
					nativeArtUrl: absoluteArtUrl(entry.albumArtUri, ip),
				}))
		} catch (err) {
			log.warn(`Queue fetch failed: ${describeError(err)}`)
			return []
		}
	}

	private async getRoomName(ip: string): Promise<string | null> {
		const known = this.roomNames.get(ip)
		if (known !== undefined) return known

		try {
			const name = await fetchRoomName(ip, this.options.timeoutMs, this.fetchImpl, this.controller.signal)
			if (name) {
				this.roomNames.set(ip, name)
				return name
			}
		} catch (err) {
			log.debug(`Room name lookup failed for ${ip}: ${describeError(err)}`)
		}
		return null
	}

	/**
	 * Fresh SSDP search, filtered by room
	 */
	private async discoverIp(): Promise<string> {
		const speakers = await this.discover(this.options.discoveryTimeoutMs ?? DISCOVERY_TIMEOUT_MS)
		this.assertOpen()
		if (speakers.length === 0) {
			throw new DeviceQueryError('discover', 'No Sonos speakers found on network')
		}

		let chosen = speakers[0]
		const room = this.options.room.toLowerCase()
		if (room) {
			let found: DiscoveredSpeaker | undefined
			for (const speaker of speakers) {
				const name = await this.getRoomName(speaker.ip)
				if (name && name.toLowerCase() === room) {
					found = speaker
					break
				}
			}
			if (found) chosen = found
			else log.warn(`Room "${this.options.room}" not found, using first speaker`)
		}

		if (!chosen) {
			throw new DeviceQueryError('discover', 'No Sonos speakers found on network')
		}

		this.activeIp = chosen.ip
		log.info(`Using speaker at ${chosen.ip}`)
		return chosen.ip
	}

	private soap(
		ip: string,
		controlUrl: string,
		serviceType: string,
		action: string,
		params?: Record<string, string | number>,
	): Promise<string> {
		return sendSoapRequest({
			ip,
			controlUrl,
			serviceType,
			action,
			params,
			timeoutMs: this.options.timeoutMs,
			signal: this.controller.signal,
			fetch: this.fetchImpl,
		})
	}
}
