/**
 * ALBUM ART DISPLAY SERVER
 * ========================
 *
 * Express front for the now-playing pipeline.
 * Display clients subscribe to /api/stream and receive state, update and ping events.
 */

import * as fs from 'node:fs'
import type { Server } from 'node:http'
import * as path from 'node:path'
import express, { type Express, type NextFunction, type Request, type Response } from 'express'
import { describeError } from './errors'
import { createLogger } from './logger'
import type { Settings } from './config'
import type { Runtime } from './runtime'

const PUBLIC_DIR = path.join(__dirname, '../public')

const log = createLogger('HTTP')

/**
 * Body of GET /api/config
 */
export function clientConfig(settings: Readonly<Settings>) {
	return { display: { default_mode: settings.display.defaultMode } }
}

/**
 * Body of GET /api/status
 */
export function pipelineStatus(runtime: Runtime) {
	const { broadcaster, poller, cache, gate } = runtime
	return {
		poller: poller.getStatus(),
		subscribers: broadcaster.size,
		version: broadcaster.getVersion(),
		artwork_cache: cache.getStats(),
		rate_limit: {
			blocked: gate.isBlocked(),
			remaining_ms: gate.remainingMs(),
		},
	}
}

/**
 * Body of GET /api/sources
 */
export function playbackSources(runtime: Runtime) {
	const { device, poller } = runtime
	return {
		sources: [
			{
				name: 'sonos',
				device: device.describe(),
				available: poller.isDeviceReachable(),
			},
		],
	}
}

export function createApp(runtime: Runtime, publicDir: string = PUBLIC_DIR): Express {
	const { broadcaster, settings } = runtime
	const app = express()

	// CORS middleware
	app.use((req: Request, res: Response, next: NextFunction) => {
		res.setHeader('Access-Control-Allow-Origin', '*')
		res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS')
		res.setHeader('Access-Control-Allow-Headers', 'Content-Type')
		if (req.method === 'OPTIONS') {
			res.sendStatus(204)
			return
		}
		next()
	})

	// ─────────────────────────────────────────────────────────────────────────────
	// PUSH STREAM
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Server-Sent Events for live now-playing updates
	 * Connect with: new EventSource("/api/stream")
	 */
	app.get('/api/stream', (req: Request, res: Response) => {
		broadcaster.attach(req, res)
		// Note: we don't call res.end() - the response stays open
	})

	// ─────────────────────────────────────────────────────────────────────────────
	// JSON API
	// ─────────────────────────────────────────────────────────────────────────────

	/**
	 * Current playback state
	 */
	app.get('/api/state', (req: Request, res: Response) => {
		res.json(broadcaster.snapshot())
	})

	/**
	 * Client-side configuration
	 */
	app.get('/api/config', (req: Request, res: Response) => {
		res.json(clientConfig(settings))
	})

	/**
	 * Pipeline diagnostics
	 */
	app.get('/api/status', (req: Request, res: Response) => {
		res.json(pipelineStatus(runtime))
	})

	/**
	 * Playback sources and whether each answered its last poll
	 */
	app.get('/api/sources', (req: Request, res: Response) => {
		res.json(playbackSources(runtime))
	})

	app.get('/api/health', (req: Request, res: Response) => {
		res.json({ status: 'ok', timestamp: Date.now() })
	})

	// ─────────────────────────────────────────────────────────────────────────────
	// STATIC FILES (display page)
	// ─────────────────────────────────────────────────────────────────────────────

	if (fs.existsSync(publicDir)) {
		app.use(express.static(publicDir))
	}

	app.use((req: Request, res: Response) => {
		res.status(404).json({ error: 'Not found' })
	})

	app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
		log.error(`${req.method} ${req.path} failed: ${describeError(err)}`)
		if (!res.headersSent) {
			res.status(500).json({ error: 'Internal server error' })
		}
	})

	return app
}

/**
 * Listen on the configured address
 */
export function listen(app: Express, host: string, port: number): Promise<Server> {
	return new Promise((resolve, reject) => {
		const server = app.listen(port, host, () => {
			log.info(`
╔═══════════════════════════════════════════════════════════════╗
║                  🎵 ALBUM ART DISPLAY RUNNING                  ║
╠═══════════════════════════════════════════════════════════════╣
║  Display:        http://${host}:${port}/
║  Live Updates:   http://${host}:${port}/api/stream
║  State:          http://${host}:${port}/api/state
║  Status:         http://${host}:${port}/api/status
╚═══════════════════════════════════════════════════════════════╝
`)
			resolve(server)
		})
		server.once('error', reject)
	})
}
