/**
 * Outbound POST for one delivery attempt.
 * Failures come back as data so the dispatcher's retry branch never
 * depends on which exception was thrown.
 */

export interface SendRequest {
	url: string
	headers: Record<string, string>
	body: string
	timeoutSeconds: number
}

export type SendResult =
	| {
			kind: 'delivered'
			statusCode: number
			body: string
			headers: Record<string, string>
			durationMs: number
	  }
	| {
			kind: 'transient'
			statusCode: number | null
			body: string | null
			headers: Record<string, string> | null
			error: string
			durationMs: number
	  }
	| {
			kind: 'fatal'
			error: string
	  }

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

function headersToRecord(headers: Headers): Record<string, string> {
	const out: Record<string, string> = {}
	headers.forEach((value, key) => {
		out[key] = value
	})
	return out
}

function describeError(err: unknown): string {
	if (!(err instanceof Error)) return String(err)
	const cause = err.cause
	if (cause instanceof Error && cause.message && cause.message !== err.message) {
		return `${err.message}: ${cause.message}`
	}
	return err.message
}

function isTimeout(err: unknown): boolean {
	return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
}

export class HttpSender {
	constructor(private readonly fetchFn: FetchLike = (url, init) => fetch(url, init)) {}

	async send(request: SendRequest): Promise<SendResult> {
		let target: URL
		try {
			target = new URL(request.url)
		} catch {
			return { kind: 'fatal', error: `Invalid webhook URL: ${request.url}` }
		}
		if (target.protocol !== 'http:' && target.protocol !== 'https:') {
			return { kind: 'fatal', error: `Unsupported URL scheme: ${target.protocol}` }
		}

		const started = performance.now()
		const elapsed = () => Math.round(performance.now() - started)

		let response: Response
		try {
			response = await this.fetchFn(target.toString(), {
				method: 'POST',
				headers: request.headers,
				body: request.body,
				redirect: 'manual',
				signal: AbortSignal.timeout(request.timeoutSeconds * 1000),
			})
		} catch (err) {
			return {
				kind: 'transient',
				statusCode: null,
				body: null,
				headers: null,
				error: isTimeout(err) ? `Timeout after ${request.timeoutSeconds}s` : describeError(err),
				durationMs: elapsed(),
			}
		}

		const headers = headersToRecord(response.headers)
		let body: string
		try {
			body = await response.text()
		} catch (err) {
			return {
				kind: 'transient',
				statusCode: response.status,
				body: null,
				headers,
				error: isTimeout(err)
					? `Timeout after ${request.timeoutSeconds}s`
					: `Failed to read response body: ${describeError(err)}`,
				durationMs: elapsed(),
			}
		}

		if (response.status >= 200 && response.status < 300) {
			return { kind: 'delivered', statusCode: response.status, body, headers, durationMs: elapsed() }
		}

		return {
			kind: 'transient',
			statusCode: response.status,
			body,
			headers,
			error: `HTTP ${response.status}`,
			durationMs: elapsed(),
		}
	}
}
