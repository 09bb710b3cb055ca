/**
 * Delivery Dispatcher
 * Runs one signed delivery attempt and moves the delivery through
 * pending -> sending -> success | retrying | failed.
 */

import { z } from 'zod'
import type { Logger } from '../logger/index.ts'
import type { JobHandler } from '../runtime/types.ts'
import { errorMessage } from '../utils/errors.ts'
import { type BackoffPolicy, DEFAULT_BACKOFF, retryDelaySeconds } from './backoff.ts'
import type { AttemptDetails, DeliveryStore } from './delivery-store.ts'
import type { HttpSender, SendResult } from './http-sender.ts'
import { canonicalJson, signatureHeader } from './signature.ts'
import { type Delivery, isTerminal, type Webhook } from './types.ts'
import type { WebhookStore } from './webhook-store.ts'

export const DEFAULT_USER_AGENT = 'Hookline-Webhooks/1.0'

export interface DispatcherOptions extends BackoffPolicy {
	userAgent: string
}

export interface DispatchOutcome {
	deliveryId: string
	status: 'success' | 'retrying' | 'failed' | 'skipped'
	attemptCount?: number
	nextRetryAt?: Date | null
	reason?: string
}

// Headers the dispatcher owns; custom headers with these names are dropped
const RESERVED_HEADERS = new Set([
	'content-type',
	'user-agent',
	'x-webhook-signature',
	'x-webhook-event',
	'x-webhook-delivery',
	'x-webhook-event-id',
])

export class DeliveryDispatcher {
	private readonly options: DispatcherOptions

	constructor(
		private readonly deliveries: DeliveryStore,
		private readonly webhooks: WebhookStore,
		private readonly sender: HttpSender,
		private readonly logger: Logger,
		options: Partial<DispatcherOptions> = {},
	) {
		this.options = { ...DEFAULT_BACKOFF, userAgent: DEFAULT_USER_AGENT, ...options }
	}

	/**
	 * Run one attempt for a delivery.
	 *
	 * Only a store failure while persisting a transition rejects; the queue
	 * then re-runs the attempt from freshly loaded state.
	 */
	async dispatch(deliveryId: string): Promise<DispatchOutcome> {
		const log = this.logger.child({ deliveryId })

		const delivery = await this.deliveries.get(deliveryId)
		if (!delivery) {
			log.warn('[Dispatcher] Delivery not found')
			return { deliveryId, status: 'skipped', reason: 'Delivery not found' }
		}

		if (isTerminal(delivery.status)) {
			log.debug('[Dispatcher] Delivery already completed', { status: delivery.status })
			return {
				deliveryId,
				status: 'skipped',
				attemptCount: delivery.attemptCount,
				reason: `Delivery already ${delivery.status}`,
			}
		}

		if (
			delivery.status === 'retrying' &&
			delivery.nextRetryAt &&
			delivery.nextRetryAt.getTime() > Date.now()
		) {
			return {
				deliveryId,
				status: 'skipped',
				attemptCount: delivery.attemptCount,
				nextRetryAt: delivery.nextRetryAt,
				reason: 'Retry not due yet',
			}
		}

		const webhook = await this.webhooks.get(delivery.webhookId)
		if (!webhook) {
			return this.fail(delivery, `Webhook ${delivery.webhookId} not found`, log)
		}
		if (!webhook.isActive) {
			return this.fail(delivery, `Webhook ${delivery.webhookId} is inactive`, log)
		}
		if (delivery.attemptCount >= delivery.maxAttempts) {
			return this.fail(delivery, 'max retry attempts exceeded', log)
		}

		const body = canonicalJson(delivery.payload)
		const headers = this.buildHeaders(webhook, delivery)

		const sending = await this.deliveries.updateStatus(delivery.id, 'sending', {
			requestUrl: webhook.url,
			requestHeaders: headers,
		})
		if (!sending) {
			return { deliveryId, status: 'skipped', reason: 'Delivery completed concurrently' }
		}

		log.debug('[Dispatcher] Sending', {
			webhookId: webhook.id,
			attempt: sending.attemptCount + 1,
		})

		let result: SendResult
		try {
			result = await this.sender.send({
				url: webhook.url,
				headers,
				body,
				timeoutSeconds: webhook.timeoutSeconds,
			})
		} catch (err) {
			result = {
				kind: 'transient',
				statusCode: null,
				body: null,
				headers: null,
				error: `Unexpected error: ${errorMessage(err)}`,
				durationMs: 0,
			}
		}

		switch (result.kind) {
			case 'delivered': {
				const done = await this.deliveries.updateStatus(delivery.id, 'success', {
					statusCode: result.statusCode,
					responseBody: result.body,
					responseHeaders: result.headers,
					durationMs: result.durationMs,
					countAttempt: true,
				})
				log.info('[Dispatcher] Delivered', {
					webhookId: webhook.id,
					statusCode: result.statusCode,
					durationMs: result.durationMs,
				})
				return {
					deliveryId,
					status: 'success',
					attemptCount: done?.attemptCount ?? sending.attemptCount + 1,
					nextRetryAt: null,
				}
			}
			case 'fatal':
				return this.fail(sending, result.error, log)
			case 'transient':
				return this.retryOrFail(sending, result, log)
		}
	}

	/**
	 * Outgoing headers: custom headers first, then the headers the
	 * dispatcher owns. Reserved names are matched case-insensitively.
	 */
	buildHeaders(webhook: Webhook, delivery: Delivery): Record<string, string> {
		const headers: Record<string, string> = {}
		for (const [name, value] of Object.entries(webhook.customHeaders)) {
			if (RESERVED_HEADERS.has(name.toLowerCase())) continue
			headers[name] = value
		}

		headers['Content-Type'] = 'application/json'
		headers['User-Agent'] = this.options.userAgent
		Object.assign(headers, signatureHeader(delivery.payload, webhook.secret))
		headers['X-Webhook-Event'] = delivery.eventType
		headers['X-Webhook-Delivery'] = delivery.id
		if (delivery.eventId) headers['X-Webhook-Event-ID'] = delivery.eventId

		return headers
	}

	private async retryOrFail(
		delivery: Delivery,
		result: Extract<SendResult, { kind: 'transient' }>,
		log: Logger,
	): Promise<DispatchOutcome> {
		const details: AttemptDetails = {
			statusCode: result.statusCode,
			responseBody: result.body,
			responseHeaders: result.headers,
			errorMessage: result.error,
			durationMs: result.durationMs,
		}

		if (delivery.attemptCount + 1 >= delivery.maxAttempts) {
			const failed = await this.deliveries.updateStatus(delivery.id, 'failed', {
				...details,
				countAttempt: true,
			})
			log.warn('[Dispatcher] Delivery failed after final attempt', {
				attempts: failed?.attemptCount ?? delivery.attemptCount + 1,
				error: result.error,
			})
			return {
				deliveryId: delivery.id,
				status: 'failed',
				attemptCount: failed?.attemptCount ?? delivery.attemptCount + 1,
				nextRetryAt: null,
				reason: result.error,
			}
		}

		const delay = retryDelaySeconds(delivery.attemptCount, this.options)
		const retrying = await this.deliveries.incrementAttempt(delivery.id, delay, details)
		if (!retrying) {
			return { deliveryId: delivery.id, status: 'skipped', reason: 'Delivery completed concurrently' }
		}

		log.info('[Dispatcher] Scheduled retry', {
			attempt: retrying.attemptCount,
			delaySeconds: delay,
			error: result.error,
		})
		return {
			deliveryId: delivery.id,
			status: 'retrying',
			attemptCount: retrying.attemptCount,
			nextRetryAt: retrying.nextRetryAt,
			reason: result.error,
		}
	}

	/** Terminal failure without counting an attempt */
	private async fail(delivery: Delivery, reason: string, log: Logger): Promise<DispatchOutcome> {
		const failed = await this.deliveries.updateStatus(delivery.id, 'failed', { errorMessage: reason })
		log.warn('[Dispatcher] Delivery failed', { reason })
		return {
			deliveryId: delivery.id,
			status: 'failed',
			attemptCount: failed?.attemptCount ?? delivery.attemptCount,
			nextRetryAt: null,
			reason,
		}
	}
}

const dispatchJobSchema = z.object({ deliveryId: z.string().min(1) })

/**
 * Queue handler for `webhook.dispatch` jobs. Malformed job data is logged
 * and dropped; store failures are rethrown so the queue retries.
 */
export function createDispatchJobHandler(dispatcher: DeliveryDispatcher): JobHandler {
	return async (data, ctx) => {
		const parsed = dispatchJobSchema.safeParse(data)
		if (!parsed.success) {
			ctx.logger.error('[Dispatcher] Invalid dispatch job data', { issues: parsed.error.issues })
			return
		}
		const outcome = await dispatcher.dispatch(parsed.data.deliveryId)
		ctx.logger.debug('[Dispatcher] Dispatch finished', { ...outcome })
	}
}
