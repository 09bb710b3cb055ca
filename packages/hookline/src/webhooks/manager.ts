/**
 * Webhook Management
 * The operations an admin surface calls: webhooks, subscriptions,
 * delivery history and manual retries.
 */

import { z } from 'zod'
import type { Logger } from '../logger/index.ts'
import type { JobQueue } from '../runtime/types.ts'
import type { DeliveryStore } from './delivery-store.ts'
import {
	DeliveryNotFoundError,
	DeliveryNotRetryableError,
	SubscriptionNotFoundError,
	ValidationError,
	WebhookNotFoundError,
} from './errors.ts'
import { generateWebhookSecret } from './ids.ts'
import type { EventCatalog, EventRegistry } from './registry.ts'
import {
	type Delivery,
	type DeliveryStats,
	DISPATCH_JOB,
	type DispatchJobData,
	type EventSubscription,
	type PublicWebhook,
	type Webhook,
} from './types.ts'
import type { WebhookStore } from './webhook-store.ts'

const httpUrl = z
	.string()
	.trim()
	.url('Must be a valid URL')
	.refine((value) => /^https?:\/\//i.test(value), 'URL must use http or https')

const eventTypeSchema = z.string().trim().min(1, 'Event type cannot be empty').max(100)

const headersSchema = z.record(z.string().min(1), z.string())

export const createWebhookSchema = z.object({
	name: z.string().trim().min(1, 'Name is required').max(255),
	url: httpUrl,
	events: z.array(eventTypeSchema).default([]),
	isActive: z.boolean().default(true),
	customHeaders: headersSchema.default({}),
	timeoutSeconds: z.number().int().min(1).max(300).optional(),
	maxAttempts: z.number().int().min(1).max(20).optional(),
})

export const updateWebhookSchema = z.object({
	name: z.string().trim().min(1).max(255).optional(),
	url: httpUrl.optional(),
	isActive: z.boolean().optional(),
	customHeaders: headersSchema.optional(),
	timeoutSeconds: z.number().int().min(1).max(300).optional(),
	maxAttempts: z.number().int().min(1).max(20).optional(),
})

const paginationShape = {
	limit: z.number().int().min(1).max(100).default(50),
	offset: z.number().int().min(0).default(0),
}

export const listWebhooksSchema = z.object({
	isActive: z.boolean().optional(),
	...paginationShape,
})

export const listDeliveriesSchema = z.object({
	webhookId: z.string().min(1).optional(),
	status: z.enum(['pending', 'sending', 'success', 'failed', 'retrying']).optional(),
	...paginationShape,
})

const statsDaysSchema = z.number().int().min(1).max(365)

export type CreateWebhookInput = z.input<typeof createWebhookSchema>
export type UpdateWebhookInput = z.input<typeof updateWebhookSchema>
export type ListWebhooksInput = z.input<typeof listWebhooksSchema>
export type ListDeliveriesInput = z.input<typeof listDeliveriesSchema>

/** Returned once, at creation: the only time the secret leaves the manager besides rotation */
export type CreatedWebhook = Webhook & { events: string[] }

export type WebhookDetails = PublicWebhook & { events: string[] }

export type WebhookStats = DeliveryStats & { webhookId: string; windowDays: number }

export interface ManagerDefaults {
	timeoutSeconds: number
	maxAttempts: number
}

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
	const result = schema.safeParse(input)
	if (result.success) return result.data
	const issues = result.error.issues.map((issue) => ({
		path: issue.path.join('.') || '(root)',
		message: issue.message,
	}))
	const summary = issues.map((i) => `${i.path}: ${i.message}`).join('; ')
	throw new ValidationError(`Invalid input: ${summary}`, issues)
}

function toPublic(webhook: Webhook): PublicWebhook {
	const { secret: _secret, ...rest } = webhook
	return rest
}

export class WebhookManager {
	private readonly defaults: ManagerDefaults

	constructor(
		private readonly webhooks: WebhookStore,
		private readonly deliveries: DeliveryStore,
		private readonly registry: EventRegistry,
		private readonly queue: JobQueue,
		private readonly logger: Logger,
		defaults: Partial<ManagerDefaults> = {},
	) {
		this.defaults = { timeoutSeconds: 30, maxAttempts: 5, ...defaults }
	}

	/**
	 * Register a webhook with its initial subscriptions.
	 * The secret is generated here and never taken from input.
	 */
	async createWebhook(input: CreateWebhookInput): Promise<CreatedWebhook> {
		const data = parseInput(createWebhookSchema, input)

		const events = [...new Set(data.events)]

		const webhook = await this.webhooks.createWithSubscriptions(
			{
				name: data.name,
				url: data.url,
				secret: generateWebhookSecret(),
				isActive: data.isActive,
				customHeaders: data.customHeaders,
				timeoutSeconds: data.timeoutSeconds ?? this.defaults.timeoutSeconds,
				maxAttempts: data.maxAttempts ?? this.defaults.maxAttempts,
			},
			events,
		)

		this.logger.info('[Webhooks] Created webhook', { webhookId: webhook.id, url: webhook.url, events })
		return { ...webhook, events }
	}

	async getWebhook(id: string): Promise<WebhookDetails> {
		const webhook = await this.requireWebhook(id)
		const subscriptions = await this.registry.listSubscriptions(id)
		return {
			...toPublic(webhook),
			events: subscriptions.filter((s) => s.isActive).map((s) => s.eventType),
		}
	}

	async listWebhooks(input: ListWebhooksInput = {}): Promise<PublicWebhook[]> {
		const opts = parseInput(listWebhooksSchema, input)
		const webhooks = await this.webhooks.list(opts)
		return webhooks.map(toPublic)
	}

	async updateWebhook(id: string, input: UpdateWebhookInput): Promise<PublicWebhook> {
		const patch = parseInput(updateWebhookSchema, input)
		const updated = await this.webhooks.update(id, patch)
		if (!updated) throw new WebhookNotFoundError(id)

		this.logger.info('[Webhooks] Updated webhook', { webhookId: id, fields: Object.keys(patch) })
		return toPublic(updated)
	}

	/** Deletes the webhook along with its subscriptions and delivery history */
	async deleteWebhook(id: string): Promise<void> {
		const deleted = await this.webhooks.delete(id)
		if (!deleted) throw new WebhookNotFoundError(id)
		this.logger.info('[Webhooks] Deleted webhook', { webhookId: id })
	}

	/** Rotate the signing secret; the webhook keeps its id */
	async regenerateSecret(id: string): Promise<{ id: string; secret: string }> {
		const updated = await this.webhooks.setSecret(id, generateWebhookSecret())
		if (!updated) throw new WebhookNotFoundError(id)
		this.logger.info('[Webhooks] Rotated webhook secret', { webhookId: id })
		return { id: updated.id, secret: updated.secret }
	}

	async addSubscription(webhookId: string, eventType: string): Promise<EventSubscription> {
		await this.requireWebhook(webhookId)
		return this.registry.subscribe(webhookId, parseInput(eventTypeSchema, eventType))
	}

	async removeSubscription(webhookId: string, eventType: string): Promise<void> {
		await this.requireWebhook(webhookId)
		const type = parseInput(eventTypeSchema, eventType)
		const removed = await this.registry.unsubscribe(webhookId, type)
		if (!removed) throw new SubscriptionNotFoundError(webhookId, type)
	}

	async toggleSubscription(
		webhookId: string,
		eventType: string,
		isActive: boolean,
	): Promise<EventSubscription> {
		await this.requireWebhook(webhookId)
		const type = parseInput(eventTypeSchema, eventType)
		const subscription = await this.registry.toggle(webhookId, type, isActive)
		if (!subscription) throw new SubscriptionNotFoundError(webhookId, type)
		return subscription
	}

	async listSubscriptions(webhookId: string): Promise<EventSubscription[]> {
		await this.requireWebhook(webhookId)
		return this.registry.listSubscriptions(webhookId)
	}

	listEventTypes(): EventCatalog {
		return this.registry.availableEventTypes()
	}

	async getStats(webhookId: string, days = 7): Promise<WebhookStats> {
		const windowDays = parseInput(statsDaysSchema, days)
		await this.requireWebhook(webhookId)
		const stats = await this.deliveries.stats(webhookId, windowDays)
		return { ...stats, webhookId, windowDays }
	}

	async listDeliveries(input: ListDeliveriesInput = {}): Promise<Delivery[]> {
		const opts = parseInput(listDeliveriesSchema, input)
		return this.deliveries.list(opts)
	}

	async getDelivery(id: string): Promise<Delivery> {
		const delivery = await this.deliveries.get(id)
		if (!delivery) throw new DeliveryNotFoundError(id)
		return delivery
	}

	/**
	 * Manually retry a delivery that has not succeeded and still has
	 * attempts left: reset to `pending` with attempt_count 0, then enqueue.
	 */
	async retryDelivery(id: string): Promise<Delivery> {
		const delivery = await this.getDelivery(id)
		if (delivery.status === 'success') {
			throw new DeliveryNotRetryableError(id, 'delivery already succeeded')
		}
		if (delivery.attemptCount >= delivery.maxAttempts) {
			throw new DeliveryNotRetryableError(id, 'max retry attempts reached')
		}

		// The store re-checks the rule in the same statement; null means the row changed since it was read
		const reset = await this.deliveries.resetForRetry(id)
		if (!reset) throw new DeliveryNotRetryableError(id, 'delivery changed state, try again')

		const job: DispatchJobData = { deliveryId: id }
		await this.queue.push(DISPATCH_JOB, job)

		this.logger.info('[Webhooks] Manual retry queued', { deliveryId: id, webhookId: reset.webhookId })
		return reset
	}

	private async requireWebhook(id: string): Promise<Webhook> {
		const webhook = await this.webhooks.get(id)
		if (!webhook) throw new WebhookNotFoundError(id)
		return webhook
	}
}
