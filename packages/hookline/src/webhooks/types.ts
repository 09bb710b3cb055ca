/**
 * Webhook domain types.
 * Rows are mapped to camelCase by the stores; snake_case stays in SQL.
 */

export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue }

export type JsonObject = { [key: string]: JsonValue }

export type DeliveryStatus = 'pending' | 'sending' | 'success' | 'failed' | 'retrying'

export const TERMINAL_STATUSES: readonly DeliveryStatus[] = ['success', 'failed']

export function isTerminal(status: DeliveryStatus): boolean {
	return TERMINAL_STATUSES.includes(status)
}

export interface Webhook {
	id: string
	name: string
	url: string
	secret: string
	isActive: boolean
	customHeaders: Record<string, string>
	timeoutSeconds: number
	maxAttempts: number
	createdAt: Date
	updatedAt: Date
}

/** A webhook as returned by the management API: the secret is withheld */
export type PublicWebhook = Omit<Webhook, 'secret'>

export interface EventSubscription {
	id: string
	webhookId: string
	eventType: string
	isActive: boolean
	createdAt: Date
	updatedAt: Date
}

export interface Delivery {
	id: string
	webhookId: string
	eventType: string
	eventId: string | null
	payload: JsonObject
	status: DeliveryStatus
	attemptCount: number
	maxAttempts: number
	statusCode: number | null
	responseBody: string | null
	responseHeaders: Record<string, string> | null
	errorMessage: string | null
	requestUrl: string | null
	requestHeaders: Record<string, string> | null
	durationMs: number | null
	createdAt: Date
	sentAt: Date | null
	nextRetryAt: Date | null
	completedAt: Date | null
}

export interface DeliveryStats {
	total: number
	successful: number
	failed: number
	pending: number
	successRate: number
	averageDurationMs: number | null
}

/** Name of the queue job that runs one dispatch attempt */
export const DISPATCH_JOB = 'webhook.dispatch'

export type DispatchJobData = {
	deliveryId: string
}
