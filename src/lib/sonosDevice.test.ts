import { afterEach, describe, expect, it, vi } from 'vitest'
import { loadSettings } from '../config'
import { DeviceQueryError } from '../errors'
import { createRuntime } from '../runtime'
import { deferred, matchingLookup } from '../test/fixtures'
import type { FetchLike } from '../types'
import { escapeXml } from './soapClient'
import { SonosDevice, absoluteArtUrl, parseDidlItems, parseDuration } from './sonosDevice'
import type { DiscoveredSpeaker } from './ssdpDiscovery'

const DIDL_OPEN =
	'<DIDL-Lite xmlns:dc="http://purl.org/dc/elements/1.1/" xmlns:upnp="urn:schemas-upnp-org:metadata-1-0/upnp/" xmlns="urn:schemas-upnp-org:metadata-1-0/DIDL-Lite/">'

const TRACK_DIDL =
	DIDL_OPEN +
	'<item id="-1" parentID="-1" restricted="true">' +
	'<res protocolInfo="sonos.com-http:*:audio/mp4:*">x-sonos-http:track1.mp4</res>' +
	'<upnp:albumArtURI>/getaa?s=1&amp;u=track1</upnp:albumArtURI>' +
	'<dc:title>Comfortably Numb</dc:title>' +
	'<upnp:class>object.item.audioItem.musicTrack</upnp:class>' +
	'<dc:creator>Pink Floyd</dc:creator>' +
	'<upnp:album>The Wall</upnp:album>' +
	'</item></DIDL-Lite>'

const QUEUE_DIDL =
	DIDL_OPEN +
	'<item id="Q:0/4" parentID="Q:0" restricted="true">' +
	'<upnp:albumArtURI>/getaa?s=1&amp;u=q1</upnp:albumArtURI>' +
	'<dc:title>Hey You</dc:title><dc:creator>Pink Floyd</dc:creator><upnp:album>The Wall</upnp:album>' +
	'</item>' +
	'<item id="Q:0/5" parentID="Q:0" restricted="true">' +
	'<upnp:albumArtURI>https://art.example/q2.jpg</upnp:albumArtURI>' +
	'<dc:title>Run Like Hell</dc:title><dc:creator>Pink Floyd</dc:creator><upnp:album>The Wall</upnp:album>' +
	'</item></DIDL-Lite>'

function soapBody(action: string, inner: string): Response {
	return new Response(
		'<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/"><s:Body>' +
			`<u:${action}Response xmlns:u="urn:x">${inner}</u:${action}Response>` +
			'</s:Body></s:Envelope>',
		{ status: 200 },
	)
}

type Handler = (ip: string) => Response

const DEFAULT_HANDLERS: Record<string, Handler> = {
	GetPositionInfo: () =>
		soapBody(
			'GetPositionInfo',
			'<Track>3</Track><TrackDuration>0:06:22</TrackDuration>' +
				`<TrackMetaData>${escapeXml(TRACK_DIDL)}</TrackMetaData>` +
				'<RelTime>0:01:30</RelTime>',
		),
	GetTransportInfo: () => soapBody('GetTransportInfo', '<CurrentTransportState>PLAYING</CurrentTransportState>'),
	GetZoneAttributes: () => soapBody('GetZoneAttributes', '<CurrentZoneName>Living Room</CurrentZoneName>'),
	Browse: () => soapBody('Browse', `<Result>${escapeXml(QUEUE_DIDL)}</Result><NumberReturned>2</NumberReturned>`),
}

/**
 * Speaker stand-in that answers by SOAP action; unknown actions get an HTTP 500 fault
 */
function fakeSpeaker(overrides: Record<string, Handler | null> = {}) {
	return vi.fn<FetchLike>(async (url, init) => {
		const body = typeof init?.body === 'string' ? init.body : ''
		const action = /<u:(\w+) /.exec(body)?.[1] ?? ''
		const handler = action in overrides ? overrides[action] : DEFAULT_HANDLERS[action]
		if (!handler) {
			return new Response('<errorCode>401</errorCode>', { status: 500 })
		}
		return handler(new URL(url).hostname)
	})
}

function speakerAt(ip: string): DiscoveredSpeaker {
	return { uuid: `RINCON_${ip.replace(/\./g, '')}`, ip, location: `http://${ip}:1400/xml/device_description.xml` }
}

describe('parseDuration', () => {
	it('parses hours, minutes and seconds', () => {
		expect(parseDuration('0:03:45')).toBe(225000)
		expect(parseDuration('1:02:03')).toBe(3723000)
		expect(parseDuration('3:45')).toBe(225000)
	})

	it('treats unknown values as zero', () => {
		expect(parseDuration('NOT_IMPLEMENTED')).toBe(0)
		expect(parseDuration('')).toBe(0)
		expect(parseDuration(null)).toBe(0)
	})
})

describe('absoluteArtUrl', () => {
	it('serves relative paths from the speaker', () => {
		expect(absoluteArtUrl('/getaa?s=1&u=x', '192.168.1.20')).toBe('http://192.168.1.20:1400/getaa?s=1&u=x')
	})

	it('keeps absolute URLs and missing art as they are', () => {
		expect(absoluteArtUrl('https://art.example/x.jpg', '192.168.1.20')).toBe('https://art.example/x.jpg')
		expect(absoluteArtUrl(null, '192.168.1.20')).toBeNull()
	})
})

describe('parseDidlItems', () => {
	it('reads every item in order', () => {
		expect(parseDidlItems(QUEUE_DIDL)).toEqual([
			{ title: 'Hey You', artist: 'Pink Floyd', album: 'The Wall', albumArtUri: '/getaa?s=1&u=q1' },
			{ title: 'Run Like Hell', artist: 'Pink Floyd', album: 'The Wall', albumArtUri: 'https://art.example/q2.jpg' },
		])
	})

	it('falls back to upnp:artist', () => {
		const didl = `${DIDL_OPEN}<item id="1"><dc:title>Intro</dc:title><upnp:artist>Test Artist</upnp:artist></item></DIDL-Lite>`
		expect(parseDidlItems(didl)).toEqual([{ title: 'Intro', artist: 'Test Artist', album: '', albumArtUri: null }])
	})
})

describe('SonosDevice', () => {
	function device(fetch: FetchLike, overrides: Partial<ConstructorParameters<typeof SonosDevice>[0]> = {}) {
		return new SonosDevice({ ip: '192.168.1.20', room: '', timeoutMs: 5000, queueLookahead: 5, fetch, ...overrides })
	}

	it('builds a snapshot from position, transport, zone and queue', async () => {
		const fetch = fakeSpeaker()
		const snapshot = await device(fetch).query()

		expect(snapshot).toEqual({
			title: 'Comfortably Numb',
			artist: 'Pink Floyd',
			album: 'The Wall',
			nativeArtUrl: 'http://192.168.1.20:1400/getaa?s=1&u=track1',
			isPlaying: true,
			positionMs: 90000,
			durationMs: 382000,
			roomName: 'Living Room',
			queue: [
				{
					title: 'Hey You',
					artist: 'Pink Floyd',
					album: 'The Wall',
					nativeArtUrl: 'http://192.168.1.20:1400/getaa?s=1&u=q1',
				},
				{ title: 'Run Like Hell', artist: 'Pink Floyd', album: 'The Wall', nativeArtUrl: 'https://art.example/q2.jpg' },
			],
		})
	})

	it('browses the queue from the entry after the current track', async () => {
		const fetch = fakeSpeaker()
		await device(fetch).query()

		const browse = fetch.mock.calls.find(([, init]) => typeof init?.body === 'string' && init.body.includes('<u:Browse'))
		const body = browse?.[1]?.body
		expect(body).toContain('<ObjectID>Q:0</ObjectID>')
		expect(body).toContain('<StartingIndex>3</StartingIndex><RequestedCount>5</RequestedCount>')
	})

	it('reports paused playback', async () => {
		const fetch = fakeSpeaker({
			GetTransportInfo: () =>
				soapBody('GetTransportInfo', '<CurrentTransportState>PAUSED_PLAYBACK</CurrentTransportState>'),
		})
		expect(await device(fetch).query()).toMatchObject({ isPlaying: false })
	})

	it('returns null when nothing is loaded', async () => {
		const fetch = fakeSpeaker({
			GetPositionInfo: () => soapBody('GetPositionInfo', '<Track>0</Track><TrackMetaData></TrackMetaData>'),
		})
		expect(await device(fetch).query()).toBeNull()
	})

	it('keeps the snapshot when the queue cannot be read', async () => {
		const fetch = fakeSpeaker({ Browse: null })
		expect(await device(fetch).query()).toMatchObject({ title: 'Comfortably Numb', queue: [] })
	})

	it('skips the queue with a lookahead of zero', async () => {
		const fetch = fakeSpeaker()
		expect(await device(fetch, { queueLookahead: 0 }).query()).toMatchObject({ queue: [] })
		const browsed = fetch.mock.calls.some(([, init]) => typeof init?.body === 'string' && init.body.includes('<u:Browse'))
		expect(browsed).toBe(false)
	})

	it('rejects queries after close', async () => {
		const sonos = device(fakeSpeaker())
		sonos.close()
		await expect(sonos.query()).rejects.toBeInstanceOf(DeviceQueryError)
	})

	it('discovers the speaker for the configured room', async () => {
		const fetch = fakeSpeaker({
			GetZoneAttributes: ip =>
				soapBody(
					'GetZoneAttributes',
					`<CurrentZoneName>${ip === '192.168.1.22' ? 'Kitchen' : 'Living Room'}</CurrentZoneName>`,
				),
		})
		const discover = vi.fn(async () => [speakerAt('192.168.1.21'), speakerAt('192.168.1.22')])
		const sonos = device(fetch, { ip: '', room: 'kitchen', discover })

		expect(sonos.describe()).toBe('Sonos (not yet located)')
		expect(await sonos.query()).toMatchObject({ roomName: 'Kitchen' })
		expect(sonos.describe()).toBe('Sonos at 192.168.1.22')

		await sonos.query()
		expect(discover).toHaveBeenCalledTimes(1)
	})

	it('fails when discovery finds nothing', async () => {
		const sonos = device(fakeSpeaker(), { ip: '', discover: async () => [] })
		await expect(sonos.query()).rejects.toThrow('No Sonos speakers found on network')
	})

	it('forgets a discovered address after a failed query', async () => {
		const fetch = fakeSpeaker({ GetPositionInfo: null })
		const sonos = device(fetch, { ip: '', discover: async () => [speakerAt('192.168.1.21')] })

		await expect(sonos.query()).rejects.toBeInstanceOf(DeviceQueryError)
		expect(sonos.describe()).toBe('Sonos (not yet located)')
	})

	it('keeps the address when an overtaken query fails late', async () => {
		const speaker = fakeSpeaker()
		const stalled = deferred<Response>()
		let positionCalls = 0
		const fetch = vi.fn<FetchLike>((url, init) => {
			const body = typeof init?.body === 'string' ? init.body : ''
			if (body.includes('<u:GetPositionInfo ') && ++positionCalls === 1) return stalled.promise
			return speaker(url, init)
		})
		const discover = vi.fn(async () => [speakerAt('192.168.1.21')])
		const sonos = device(fetch, { ip: '', discover })

		const first = sonos.query()
		await vi.waitFor(() => expect(positionCalls).toBe(1))
		expect(await sonos.query()).toMatchObject({ title: 'Comfortably Numb' })

		stalled.resolve(new Response('<errorCode>701</errorCode>', { status: 500 }))
		await expect(first).rejects.toBeInstanceOf(DeviceQueryError)
		expect(sonos.describe()).toBe('Sonos at 192.168.1.21')
		expect(discover).toHaveBeenCalledTimes(1)
	})

	it('shares one discovery between concurrent callers', async () => {
		const discover = vi.fn(async () => [speakerAt('192.168.1.21')])
		const sonos = device(fakeSpeaker(), { ip: '', discover })

		await Promise.all([sonos.locate(), sonos.locate(), sonos.query()])
		expect(discover).toHaveBeenCalledTimes(1)
		expect(sonos.describe()).toBe('Sonos at 192.168.1.21')
	})

	it('refuses a speaker found after close', async () => {
		const found = deferred<DiscoveredSpeaker[]>()
		const sonos = device(fakeSpeaker(), { ip: '', discover: () => found.promise })

		const locating = sonos.locate()
		sonos.close()
		found.resolve([speakerAt('192.168.1.21')])

		await expect(locating).rejects.toThrow('Device is closed')
		expect(sonos.describe()).toBe('Sonos (not yet located)')
	})
})

describe('SonosDevice discovery under the default deadlines', () => {
	afterEach(() => {
		vi.useRealTimers()
	})

	it('publishes on the first cycle even though discovery uses its whole window', async () => {
		vi.useFakeTimers()
		const speaker = fakeSpeaker()
		const fetch = vi.fn<FetchLike>(async (url, init) => {
			await new Promise(resolve => setTimeout(resolve, 20))
			return speaker(url, init)
		})
		const discover = vi.fn(
			(timeoutMs: number) =>
				new Promise<DiscoveredSpeaker[]>(resolve => {
					setTimeout(() => resolve([speakerAt('192.168.1.21')]), timeoutMs)
				}),
		)
		const settings = loadSettings({})
		const sonos = new SonosDevice({
			ip: '',
			room: '',
			timeoutMs: settings.polling.deviceTimeoutMs,
			queueLookahead: settings.artwork.queueLookahead,
			fetch,
			discover,
		})
		const rt = createRuntime(settings, { device: sonos, lookup: matchingLookup(), clock: () => 0 })

		const cycle = rt.poller.pollOnce()
		await vi.advanceTimersByTimeAsync(5100)
		await cycle

		expect(discover).toHaveBeenCalledWith(5000)
		expect(rt.poller.getStatus()).toMatchObject({ consecutiveMisses: 0, lastError: null })
		expect(rt.broadcaster.getCurrent()?.title).toBe('Comfortably Numb')
	})
})
