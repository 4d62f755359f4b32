import { ArtworkCache, type Clock, RateLimitGate } from './artworkCache'
import { ArtworkResolver } from './artworkResolver'
import type { Settings } from './config'
import { DevicePoller } from './devicePoller'
import { ItunesClient } from './itunes'
import { SonosDevice } from './lib/sonosDevice'
import { QueueEnricher } from './queueEnricher'
import { StateBroadcaster } from './stateBroadcaster'
import type { ArtworkLookup, PlaybackDevice } from './types'

export interface Runtime {
	settings: Readonly<Settings>
	device: PlaybackDevice
	cache: ArtworkCache
	gate: RateLimitGate
	resolver: ArtworkResolver
	enricher: QueueEnricher
	broadcaster: StateBroadcaster
	poller: DevicePoller
}

export interface RuntimeOverrides {
	device?: PlaybackDevice
	lookup?: ArtworkLookup
	clock?: Clock
}

/**
 * Wires every component with its own shared cache and rate-limit gate.
 * Nothing here is a module-level singleton, so each runtime is isolated.
 */
export function createRuntime(settings: Readonly<Settings>, overrides: RuntimeOverrides = {}): Runtime {
	const clock = overrides.clock ?? Date.now
	const cache = new ArtworkCache(clock)
	const gate = new RateLimitGate(clock)

	const device =
		overrides.device ??
		new SonosDevice({
			ip: settings.sonos.ip,
			room: settings.sonos.room,
			timeoutMs: settings.polling.deviceTimeoutMs,
			queueLookahead: settings.artwork.queueLookahead,
		})

	const lookup = overrides.lookup ?? new ItunesClient({ timeoutMs: settings.artwork.lookupTimeoutMs })

	const resolver = new ArtworkResolver({
		lookup,
		cache,
		gate,
		enabled: settings.artwork.externalLookupEnabled,
		maxImageSize: settings.artwork.maxImageSize,
		rateLimitCooldownMs: settings.artwork.rateLimitCooldownMs,
	})

	const enricher = new QueueEnricher({
		resolver,
		lookahead: settings.artwork.queueLookahead,
		timeoutMs: settings.artwork.lookupTimeoutMs,
	})

	const broadcaster = new StateBroadcaster()

	const poller = new DevicePoller({
		device,
		resolver,
		enricher,
		broadcaster,
		intervalMs: settings.polling.intervalMs,
		deviceTimeoutMs: settings.polling.deviceTimeoutMs,
		lookupTimeoutMs: settings.artwork.lookupTimeoutMs,
		graceCycles: settings.polling.graceCycles,
		heartbeatIntervalMs: settings.polling.heartbeatIntervalMs,
		now: () => new Date(clock()),
	})

	return { settings, device, cache, gate, resolver, enricher, broadcaster, poller }
}
