#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander'
import { type Settings, type SettingsOverrides, loadSettings } from './config'
import { ConfigError, describeError } from './errors'
import { fetchRoomName } from './lib/sonosDevice'
import { discoverSpeakers } from './lib/ssdpDiscovery'
import { createLogger, setLogLevel } from './logger'
import { createRuntime } from './runtime'
import { createApp, listen } from './server'

const log = createLogger('CLI')

interface ServeOptions {
	port?: number
	host?: string
	speakerIp?: string
	room?: string
	defaultMode?: string
}

function parsePort(value: string): number {
	const port = Number(value)
	if (!Number.isInteger(port) || port < 1 || port > 65535) {
		throw new InvalidArgumentError('Not a valid port number.')
	}
	return port
}

function loadSettingsOrExit(overrides: SettingsOverrides): Readonly<Settings> {
	try {
		return loadSettings(process.env, overrides)
	} catch (error) {
		if (error instanceof ConfigError) {
			console.error(`❌ ${error.message}`)
			process.exit(1)
		}
		throw error
	}
}

/**
 * Serve command - polls the speaker and streams now-playing state to displays.
 */
async function serveCommand(options: ServeOptions): Promise<void> {
	const overrides: SettingsOverrides = {
		host: options.host,
		port: options.port,
		speakerIp: options.speakerIp,
		room: options.room,
		defaultMode: options.defaultMode,
	}

	const settings = loadSettingsOrExit(overrides)
	setLogLevel(settings.logLevel)

	const runtime = createRuntime(settings)
	const app = createApp(runtime)
	const server = await listen(app, settings.server.host, settings.server.port)

	// Graceful shutdown
	let shuttingDown = false
	const shutdown = async () => {
		if (shuttingDown) return
		shuttingDown = true
		console.log('\nShutting down...')
		await runtime.poller.stop()
		runtime.broadcaster.closeAll()
		server.close()
		process.exit(0)
	}

	process.on('SIGINT', () => {
		void shutdown()
	})
	process.on('SIGTERM', () => {
		void shutdown()
	})

	await runtime.poller.start()
}

/**
 * Discover command - lists Sonos speakers on the local network.
 */
async function discoverCommand(options: { timeout: number }): Promise<void> {
	setLogLevel('warn')
	console.log('🔍 Searching for Sonos speakers...')

	const speakers = await discoverSpeakers(options.timeout)
	if (speakers.length === 0) {
		console.log('⚠️  No speakers found.')
		return
	}

	for (const speaker of speakers) {
		let room: string | null = null
		try {
			room = await fetchRoomName(speaker.ip, 3000)
		} catch (error) {
			log.warn(`Could not read room name for ${speaker.ip}: ${describeError(error)}`)
		}
		console.log(`  ${room ?? '(unnamed)'}\t${speaker.ip}\t${speaker.uuid}`)
	}
}

const program = new Command()

program.name('album-art').description('Live album art display for Sonos speakers').version('0.1.0')

program
	.command('serve', { isDefault: true })
	.description('Poll the speaker and serve the display stream')
	.option('-p, --port <port>', 'HTTP port', parsePort)
	.option('-H, --host <host>', 'HTTP bind address')
	.option('--speaker-ip <ip>', 'Speaker address (skips discovery)')
	.option('--room <name>', 'Room to use when discovering')
	.option('--default-mode <mode>', 'Display mode for new clients')
	.action(serveCommand)

program
	.command('discover')
	.description('List Sonos speakers found over SSDP')
	.option('-t, --timeout <ms>', 'How long to listen for replies', value => Number(value), 5000)
	.action(discoverCommand)

program.parseAsync(process.argv).catch(error => {
	console.error('❌ Fatal error:', error)
	process.exit(1)
})
