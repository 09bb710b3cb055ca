import type { Logger } from '../logger/index.ts'
import type { JobQueue } from '../runtime/types.ts'
import { errorMessage } from '../utils/errors.ts'
import type { DeliveryStore } from './delivery-store.ts'
import type { EventRegistry } from './registry.ts'
import { DISPATCH_JOB, type DispatchJobData, type JsonObject } from './types.ts'

export interface TriggerResult {
	eventType: string
	eventId: string | null
	webhooksNotified: number
	deliveryIds: string[]
	message: string
}

export interface BatchEvent {
	eventType: string
	payload: JsonObject
	eventId?: string | null
}

export type BatchTriggerResult =
	| { ok: true; result: TriggerResult }
	| { ok: false; eventType: string; error: string }

/**
 * Event fan-out: one delivery per active subscriber, each enqueued for
 * dispatch. Returns once everything is enqueued; never waits on delivery.
 */
export class EventTrigger {
	constructor(
		private readonly registry: EventRegistry,
		private readonly deliveries: DeliveryStore,
		private readonly queue: JobQueue,
		private readonly logger: Logger,
	) {}

	async trigger(eventType: string, payload: JsonObject, eventId?: string | null): Promise<TriggerResult> {
		const subscribers = await this.registry.listSubscribers(eventType)
		const normalizedType = eventType.trim()

		if (subscribers.length === 0) {
			this.logger.debug('[Trigger] No subscribers', { eventType: normalizedType })
			return {
				eventType: normalizedType,
				eventId: eventId ?? null,
				webhooksNotified: 0,
				deliveryIds: [],
				message: `No active webhooks subscribed to ${normalizedType}`,
			}
		}

		const deliveryIds: string[] = []
		for (const webhook of subscribers) {
			let createdId: string | null = null
			try {
				const delivery = await this.deliveries.create({
					webhookId: webhook.id,
					eventType: normalizedType,
					payload,
					eventId: eventId ?? null,
					maxAttempts: webhook.maxAttempts,
				})
				createdId = delivery.id
				const job: DispatchJobData = { deliveryId: delivery.id }
				await this.queue.push(DISPATCH_JOB, job)
				deliveryIds.push(delivery.id)
			} catch (err) {
				this.logger.error('[Trigger] Failed to queue delivery', {
					eventType: normalizedType,
					webhookId: webhook.id,
					deliveryId: createdId,
					error: errorMessage(err),
				})
				if (createdId) await this.abandon(createdId, errorMessage(err))
			}
		}

		this.logger.info('[Trigger] Event fanned out', {
			eventType: normalizedType,
			eventId,
			subscribers: subscribers.length,
			queued: deliveryIds.length,
		})

		return {
			eventType: normalizedType,
			eventId: eventId ?? null,
			webhooksNotified: deliveryIds.length,
			deliveryIds,
			message: `Event ${normalizedType} queued for ${deliveryIds.length} webhook(s)`,
		}
	}

	/**
	 * No sweep picks up `pending` rows, so a delivery whose job was never
	 * queued is closed as failed rather than left waiting.
	 */
	private async abandon(deliveryId: string, reason: string): Promise<void> {
		try {
			await this.deliveries.updateStatus(deliveryId, 'failed', {
				errorMessage: `Enqueue failed: ${reason}`,
			})
		} catch (err) {
			this.logger.error('[Trigger] Failed to close unqueued delivery', {
				deliveryId,
				error: errorMessage(err),
			})
		}
	}

	/** Trigger several events; a failing event does not stop the others */
	async triggerBatch(events: BatchEvent[]): Promise<BatchTriggerResult[]> {
		const results: BatchTriggerResult[] = []
		for (const event of events) {
			try {
				const result = await this.trigger(event.eventType, event.payload, event.eventId)
				results.push({ ok: true, result })
			} catch (err) {
				this.logger.error('[Trigger] Batch event failed', {
					eventType: event.eventType,
					error: errorMessage(err),
				})
				results.push({ ok: false, eventType: event.eventType, error: errorMessage(err) })
			}
		}
		return results
	}
}
