import { z } from 'zod'
import { DISPLAY_MODES, type DisplayMode } from './client/displayModes'
import { ConfigError } from './errors'
import type { LogLevel } from './logger'

const booleanFlag = z
	.enum(['true', 'false', '1', '0', 'yes', 'no'])
	.transform(value => value === 'true' || value === '1' || value === 'yes')

const positiveMs = z.coerce.number().int().positive()

/**
 * Environment variables consumed at startup. Keys mirror the variable names.
 */
const EnvSchema = z.object({
	HOST: z.string().min(1).default('0.0.0.0'),
	PORT: z.coerce.number().int().min(1).max(65535).default(5174),
	SONOS_IP: z.string().trim().default(''),
	SONOS_ROOM: z.string().trim().default(''),
	POLL_INTERVAL_MS: positiveMs.default(3000),
	DEVICE_TIMEOUT_MS: positiveMs.default(5000),
	GRACE_CYCLES: z.coerce.number().int().min(1).default(3),
	HEARTBEAT_INTERVAL_MS: positiveMs.default(15000),
	ITUNES_ENABLED: booleanFlag.default('true'),
	ITUNES_ARTWORK_SIZE: z.coerce.number().int().min(100).max(3000).default(1200),
	LOOKUP_TIMEOUT_MS: positiveMs.default(10000),
	RATE_LIMIT_COOLDOWN_MS: positiveMs.default(60000),
	QUEUE_LOOKAHEAD: z.coerce.number().int().min(0).max(20).default(5),
	DEFAULT_DISPLAY_MODE: z.enum(DISPLAY_MODES).default('on'),
	LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
})

export interface Settings {
	server: {
		host: string
		port: number
	}
	sonos: {
		ip: string
		room: string
	}
	polling: {
		intervalMs: number
		deviceTimeoutMs: number
		graceCycles: number
		heartbeatIntervalMs: number
	}
	artwork: {
		externalLookupEnabled: boolean
		maxImageSize: number
		lookupTimeoutMs: number
		rateLimitCooldownMs: number
		queueLookahead: number
	}
	display: {
		defaultMode: DisplayMode
	}
	logLevel: LogLevel
}

/**
 * Command-line overrides, applied on top of the environment
 */
export interface SettingsOverrides {
	host?: string
	port?: number
	speakerIp?: string
	room?: string
	defaultMode?: string
}

type Env = Record<string, string | undefined>

function pickEnv(env: Env): Env {
	const picked: Env = {}
	for (const key of Object.keys(EnvSchema.shape)) {
		const value = env[key]
		// Treat empty variables as unset so defaults apply
		if (value !== undefined && value !== '') {
			picked[key] = value
		}
	}
	return picked
}

/**
 * Builds the static settings object. Never re-read after startup.
 */
export function loadSettings(env: Env = process.env, overrides: SettingsOverrides = {}): Readonly<Settings> {
	const raw = pickEnv(env)
	if (overrides.host !== undefined) raw.HOST = overrides.host
	if (overrides.port !== undefined) raw.PORT = String(overrides.port)
	if (overrides.speakerIp !== undefined) raw.SONOS_IP = overrides.speakerIp
	if (overrides.room !== undefined) raw.SONOS_ROOM = overrides.room
	if (overrides.defaultMode !== undefined) raw.DEFAULT_DISPLAY_MODE = overrides.defaultMode

	const parsed = EnvSchema.safeParse(raw)
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`))
	}

	const values = parsed.data
	return Object.freeze({
		server: { host: values.HOST, port: values.PORT },
		sonos: { ip: values.SONOS_IP, room: values.SONOS_ROOM },
		polling: {
			intervalMs: values.POLL_INTERVAL_MS,
			deviceTimeoutMs: values.DEVICE_TIMEOUT_MS,
			graceCycles: values.GRACE_CYCLES,
			heartbeatIntervalMs: values.HEARTBEAT_INTERVAL_MS,
		},
		artwork: {
			externalLookupEnabled: values.ITUNES_ENABLED,
			maxImageSize: values.ITUNES_ARTWORK_SIZE,
			lookupTimeoutMs: values.LOOKUP_TIMEOUT_MS,
			rateLimitCooldownMs: values.RATE_LIMIT_COOLDOWN_MS,
			queueLookahead: values.QUEUE_LOOKAHEAD,
		},
		display: { defaultMode: values.DEFAULT_DISPLAY_MODE },
		logLevel: values.LOG_LEVEL,
	})
}
