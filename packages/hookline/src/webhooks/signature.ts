/**
 * HMAC-SHA256 signing of webhook payloads.
 *
 * Wire contract: the request body is `canonicalJson(payload)` (keys sorted by
 * Unicode code point, no whitespace) and `X-Webhook-Signature` carries `sha256=<hex digest>` of
 * those exact UTF-8 bytes keyed by the webhook secret.
 */

import { createHmac, timingSafeEqual } from 'node:crypto'
import type { JsonValue } from './types.ts'

export const SIGNATURE_HEADER = 'X-Webhook-Signature'
const PREFIX = 'sha256='
const HEX_DIGEST = /^[0-9a-f]{64}$/

// Keys outside the BMP sort after U+FFFF, unlike the default UTF-16 order
function byCodePoint(a: string, b: string): number {
	let i = 0
	while (i < a.length && i < b.length) {
		const x = a.codePointAt(i) ?? 0
		const y = b.codePointAt(i) ?? 0
		if (x !== y) return x - y
		i += x > 0xffff ? 2 : 1
	}
	return a.length - b.length
}

/** JSON with object keys sorted recursively and no insignificant whitespace */
export function canonicalJson(value: JsonValue): string {
	if (Array.isArray(value)) {
		return `[${value.map(canonicalJson).join(',')}]`
	}
	if (value !== null && typeof value === 'object') {
		const keys = Object.keys(value).sort(byCodePoint)
		const entries: string[] = []
		for (const key of keys) {
			const entry = value[key]
			if (entry === undefined) continue
			entries.push(`${JSON.stringify(key)}:${canonicalJson(entry)}`)
		}
		return `{${entries.join(',')}}`
	}
	return JSON.stringify(value)
}

function hmacHex(body: string, secret: string): string {
	return createHmac('sha256', secret).update(body, 'utf8').digest('hex')
}

/** Lowercase hex HMAC-SHA256 of the canonical payload */
export function sign(payload: JsonValue, secret: string): string {
	return hmacHex(canonicalJson(payload), secret)
}

function matches(expectedHex: string, signature: string): boolean {
	const candidate = signature.startsWith(PREFIX) ? signature.slice(PREFIX.length) : signature
	if (!HEX_DIGEST.test(candidate)) return false
	return timingSafeEqual(Buffer.from(expectedHex, 'hex'), Buffer.from(candidate, 'hex'))
}

/**
 * Check a signature (bare hex or `sha256=` prefixed) against the payload.
 * Returns false for any mismatch or malformed input.
 */
export function verify(payload: JsonValue, signature: string, secret: string): boolean {
	if (typeof signature !== 'string') return false
	return matches(sign(payload, secret), signature)
}

export function signatureHeader(payload: JsonValue, secret: string): Record<string, string> {
	return { [SIGNATURE_HEADER]: `${PREFIX}${sign(payload, secret)}` }
}

/**
 * Receiver side: verify the signature header of an incoming request
 * against the raw body exactly as it arrived.
 */
export function verifyRequest(
	rawBody: string,
	headers: Record<string, string | string[] | undefined>,
	secret: string,
): boolean {
	const wanted = SIGNATURE_HEADER.toLowerCase()
	let value: string | undefined
	for (const [name, raw] of Object.entries(headers)) {
		if (name.toLowerCase() !== wanted) continue
		value = Array.isArray(raw) ? raw[0] : raw
		break
	}
	if (!value) return false
	return matches(hmacHex(rawBody, secret), value)
}
