import type { Logger } from '../logger/index.ts'
import { ValidationError } from './errors.ts'
import { EVENT_CATALOG_VERSION, EVENT_TYPES, MAX_EVENT_TYPE_LENGTH } from './event-catalog.ts'
import type { EventSubscription, Webhook } from './types.ts'
import type { WebhookStore } from './webhook-store.ts'

export interface EventCatalog {
	version: string
	eventTypes: string[]
}

/** Trimmed, non-empty, at most 100 characters */
export function normalizeEventType(eventType: string): string {
	const trimmed = eventType.trim()
	if (trimmed.length === 0) {
		throw new ValidationError('Event type cannot be empty', [
			{ path: 'eventType', message: 'Event type cannot be empty' },
		])
	}
	if (trimmed.length > MAX_EVENT_TYPE_LENGTH) {
		const message = `Event type must be at most ${MAX_EVENT_TYPE_LENGTH} characters`
		throw new ValidationError(message, [{ path: 'eventType', message }])
	}
	return trimmed
}

/**
 * Maps event types to subscribed webhooks.
 * Event types are free-form; the catalog is only advertised.
 */
export class EventRegistry {
	constructor(
		private readonly store: WebhookStore,
		private readonly logger: Logger,
	) {}

	async subscribe(webhookId: string, eventType: string): Promise<EventSubscription> {
		const subscription = await this.store.upsertSubscription(webhookId, normalizeEventType(eventType))
		this.logger.debug('[Registry] Subscribed', { webhookId, eventType: subscription.eventType })
		return subscription
	}

	async unsubscribe(webhookId: string, eventType: string): Promise<boolean> {
		const removed = await this.store.deleteSubscription(webhookId, normalizeEventType(eventType))
		if (removed) this.logger.debug('[Registry] Unsubscribed', { webhookId, eventType })
		return removed
	}

	async toggle(
		webhookId: string,
		eventType: string,
		isActive: boolean,
	): Promise<EventSubscription | null> {
		return this.store.setSubscriptionActive(webhookId, normalizeEventType(eventType), isActive)
	}

	async listSubscriptions(webhookId: string): Promise<EventSubscription[]> {
		return this.store.listSubscriptions(webhookId)
	}

	/** The only selection rule used by fan-out */
	async listSubscribers(eventType: string): Promise<Webhook[]> {
		return this.store.findSubscribers(normalizeEventType(eventType))
	}

	availableEventTypes(): EventCatalog {
		return { version: EVENT_CATALOG_VERSION, eventTypes: [...EVENT_TYPES] }
	}
}
