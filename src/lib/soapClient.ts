/**
 * Minimal SOAP client for Sonos UPnP control on port 1400
 */

import { DeviceQueryError, describeError } from '../errors'
import { createLogger } from '../logger'
import type { FetchLike } from '../types'

export const SONOS_PORT = 1400

const log = createLogger('SOAP')

export interface SoapRequestOptions {
	ip: string
	controlUrl: string
	serviceType: string
	action: string
	params?: Record<string, string | number>
	timeoutMs: number
	signal?: AbortSignal
	fetch?: FetchLike
}

export function escapeXml(value: string): string {
	return value
		.replace(/&/g, '&amp;')
		.replace(/</g, '&lt;')
		.replace(/>/g, '&gt;')
		.replace(/"/g, '&quot;')
		.replace(/'/g, '&apos;')
}

export function unescapeXml(xml: string): string {
	return xml
		.replace(/&lt;/g, '<')
		.replace(/&gt;/g, '>')
		.replace(/&quot;/g, '"')
		.replace(/&apos;/g, "'")
		.replace(/&amp;/g, '&')
}

export function buildSoapEnvelope(
	action: string,
	serviceType: string,
	params: Record<string, string | number> = {},
): string {
	const paramXml = Object.entries(params)
		.map(([key, value]) => `<${key}>${escapeXml(String(value))}</${key}>`)
		.join('')

	return (
		'<?xml version="1.0" encoding="utf-8"?>' +
		'<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/" ' +
		's:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">' +
		'<s:Body>' +
		`<u:${action} xmlns:u="${serviceType}">` +
		paramXml +
		`</u:${action}>` +
		'</s:Body>' +
		'</s:Envelope>'
	)
}

/**
 * Text content of the first element with this tag name (namespace prefix included), or null
 */
export function extractSoapValue(xml: string, tagName: string): string | null {
	const escaped = tagName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
	const regex = new RegExp(`<${escaped}(?:\\s[^>]*)?>([\\s\\S]*?)</${escaped}>`, 'i')
	const match = xml.match(regex)
	return match && match[1] !== undefined ? match[1] : null
}

function combineSignals(timeoutMs: number, signal?: AbortSignal): AbortSignal {
	const timeout = AbortSignal.timeout(timeoutMs)
	if (!signal) return timeout

	const controller = new AbortController()
	const abort = (source: AbortSignal) => controller.abort(source.reason)
	if (signal.aborted) abort(signal)
	else if (timeout.aborted) abort(timeout)
	else {
		signal.addEventListener('abort', () => abort(signal), { once: true })
		timeout.addEventListener('abort', () => abort(timeout), { once: true })
	}
	return controller.signal
}

/**
 * POST a SOAP action to a speaker and return the response body.
 * Every failure surfaces as a DeviceQueryError.
 */
export async function sendSoapRequest(options: SoapRequestOptions): Promise<string> {
	const { ip, controlUrl, serviceType, action, params = {}, timeoutMs, signal } = options
	const fetchImpl = options.fetch ?? fetch

	const url = `http://${ip}:${SONOS_PORT}${controlUrl}`
	log.debug(`${action} -> ${url}`)

	let response: Response
	try {
		response = await fetchImpl(url, {
			method: 'POST',
			headers: {
				'Content-Type': 'text/xml; charset="utf-8"',
				SOAPAction: `"${serviceType}#${action}"`,
			},
			body: buildSoapEnvelope(action, serviceType, params),
			signal: combineSignals(timeoutMs, signal),
		})
	} catch (err) {
		throw new DeviceQueryError(action, `${action} failed: ${describeError(err)}`, null, { cause: err })
	}

	if (!response.ok) {
		const body = await response.text().catch(() => '')
		const upnpCode = extractSoapValue(body, 'errorCode')
		const detail = upnpCode ? ` (UPnP error ${upnpCode})` : ''
		throw new DeviceQueryError(action, `${action} failed: HTTP ${response.status}${detail}`, response.status)
	}

	return response.text()
}
