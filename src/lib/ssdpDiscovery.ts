/**
 * SSDP discovery for Sonos speakers over UDP multicast
 */

import * as dgram from 'node:dgram'
import { networkInterfaces } from 'node:os'
import { describeError } from '../errors'
import { createLogger } from '../logger'

const SSDP_MULTICAST_IP = '239.255.255.250'
const SSDP_PORT = 1900
const SONOS_SEARCH_TARGET = 'urn:schemas-upnp-org:device:ZonePlayer:1'

const MX_VALUE = 3
const RETRY_COUNT = 3
const RETRY_INTERVAL_MS = 800
const DEFAULT_TIMEOUT_MS = 5000

const log = createLogger('SSDP')

export interface DiscoveredSpeaker {
	uuid: string
	ip: string
	location: string
}

interface LocalInterface {
	name: string
	address: string
}

/**
 * Non-internal IPv4 interfaces, skipping container and VM bridges
 */
function getValidInterfaces(): LocalInterface[] {
	const result: LocalInterface[] = []

	for (const [name, infos] of Object.entries(networkInterfaces())) {
		if (!infos) continue
		if (/^(docker|veth|br-|virbr)/.test(name)) continue

		for (const info of infos) {
			if (info.internal || info.family !== 'IPv4') continue
			result.push({ name, address: info.address })
		}
	}

	return result
}

export function parseSsdpResponse(response: string): DiscoveredSpeaker | null {
	const headers: Record<string, string> = {}

	for (const line of response.split('\r\n')) {
		const colonIndex = line.indexOf(':')
		if (colonIndex > 0) {
			headers[line.substring(0, colonIndex).toLowerCase().trim()] = line.substring(colonIndex + 1).trim()
		}
	}

	const location = headers['location']
	const usn = headers['usn']
	if (!location || !usn) return null

	// USN format: uuid:RINCON_xxxx::urn:schemas-upnp-org:device:ZonePlayer:1
	const uuid = usn.match(/uuid:(RINCON_[^:]+)/)?.[1]
	if (!uuid) return null

	try {
		return { uuid, ip: new URL(location).hostname, location }
	} catch {
		return null
	}
}

function buildSearchMessage(): string {
	return (
		'M-SEARCH * HTTP/1.1\r\n' +
		`HOST: ${SSDP_MULTICAST_IP}:${SSDP_PORT}\r\n` +
		'MAN: "ssdp:discover"\r\n' +
		`MX: ${MX_VALUE}\r\n` +
		`ST: ${SONOS_SEARCH_TARGET}\r\n` +
		'\r\n'
	)
}

function bindSocket(iface: LocalInterface, onSpeaker: (speaker: DiscoveredSpeaker) => void): Promise<dgram.Socket> {
	return new Promise((resolve, reject) => {
		const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true })

		socket.on('message', message => {
			const speaker = parseSsdpResponse(message.toString())
			if (speaker) onSpeaker(speaker)
		})
		socket.once('error', reject)
		socket.bind({ address: iface.address, port: 0 }, () => {
			socket.off('error', reject)
			socket.on('error', err => log.warn(`Socket error on ${iface.name}: ${err.message}`))
			resolve(socket)
		})
	})
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms))

/**
 * Discover Sonos speakers on every usable interface
 */
export async function discoverSpeakers(timeoutMs = DEFAULT_TIMEOUT_MS): Promise<DiscoveredSpeaker[]> {
	const discovered = new Map<string, DiscoveredSpeaker>()
	const interfaces = getValidInterfaces()

	if (interfaces.length === 0) {
		log.error('No valid network interfaces found')
		return []
	}

	log.info(`Discovering on ${interfaces.length} interface(s): ${interfaces.map(i => i.name).join(', ')}`)

	const sockets: dgram.Socket[] = []
	for (const iface of interfaces) {
		try {
			sockets.push(
				await bindSocket(iface, speaker => {
					if (!discovered.has(speaker.uuid)) {
						discovered.set(speaker.uuid, speaker)
						log.info(`Discovered ${speaker.uuid} at ${speaker.ip} (via ${iface.name})`)
					}
				}),
			)
		} catch (err) {
			log.warn(`Failed to open socket on ${iface.name} (${iface.address}): ${describeError(err)}`)
		}
	}

	if (sockets.length === 0) {
		log.error('No sockets could be opened')
		return []
	}

	const message = buildSearchMessage()
	const sendDuration = (RETRY_COUNT - 1) * RETRY_INTERVAL_MS

	for (let attempt = 0; attempt < RETRY_COUNT; attempt++) {
		for (const socket of sockets) {
			socket.send(message, SSDP_PORT, SSDP_MULTICAST_IP)
		}
		if (attempt < RETRY_COUNT - 1) {
			await sleep(RETRY_INTERVAL_MS)
		}
	}

	await sleep(Math.max(0, timeoutMs - sendDuration))

	for (const socket of sockets) {
		socket.close()
	}

	log.info(`Discovery complete: found ${discovered.size} speaker(s)`)
	return [...discovered.values()]
}
