import type { SQL } from '../db/client.ts'
import type { EventSubscription, Webhook } from './types.ts'

export interface CreateWebhookRecord {
	name: string
	url: string
	secret: string
	isActive?: boolean
	customHeaders?: Record<string, string>
	timeoutSeconds: number
	maxAttempts: number
}

export interface WebhookPatch {
	name?: string
	url?: string
	isActive?: boolean
	customHeaders?: Record<string, string>
	timeoutSeconds?: number
	maxAttempts?: number
}

export interface ListWebhooksOptions {
	isActive?: boolean
	limit?: number
	offset?: number
}

/**
 * Persistence for webhooks and their event subscriptions.
 * Lookups of unknown ids resolve to null (or false), never throw.
 */
export interface WebhookStore {
	create(input: CreateWebhookRecord): Promise<Webhook>
	/** Insert the webhook and its subscriptions together, or nothing at all */
	createWithSubscriptions(input: CreateWebhookRecord, eventTypes: string[]): Promise<Webhook>
	get(id: string): Promise<Webhook | null>
	list(opts?: ListWebhooksOptions): Promise<Webhook[]>
	update(id: string, patch: WebhookPatch): Promise<Webhook | null>
	/** Deletes the webhook with its subscriptions and deliveries */
	delete(id: string): Promise<boolean>
	setSecret(id: string, secret: string): Promise<Webhook | null>

	/** Insert the (webhook, event type) pair, or reactivate the existing row */
	upsertSubscription(webhookId: string, eventType: string): Promise<EventSubscription>
	deleteSubscription(webhookId: string, eventType: string): Promise<boolean>
	setSubscriptionActive(
		webhookId: string,
		eventType: string,
		isActive: boolean,
	): Promise<EventSubscription | null>
	listSubscriptions(webhookId: string): Promise<EventSubscription[]>
	/** Active webhooks holding an active subscription to the event type */
	findSubscribers(eventType: string): Promise<Webhook[]>
}

interface WebhookRow {
	id: string
	name: string
	url: string
	secret: string
	is_active: boolean
	custom_headers: Record<string, string> | null
	timeout_seconds: number
	max_attempts: number
	created_at: Date
	updated_at: Date
}

interface SubscriptionRow {
	id: string
	webhook_id: string
	event_type: string
	is_active: boolean
	created_at: Date
	updated_at: Date
}

function rowToWebhook(row: WebhookRow): Webhook {
	return {
		id: row.id,
		name: row.name,
		url: row.url,
		secret: row.secret,
		isActive: row.is_active,
		customHeaders: row.custom_headers ?? {},
		timeoutSeconds: row.timeout_seconds,
		maxAttempts: row.max_attempts,
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	}
}

function rowToSubscription(row: SubscriptionRow): EventSubscription {
	return {
		id: row.id,
		webhookId: row.webhook_id,
		eventType: row.event_type,
		isActive: row.is_active,
		createdAt: row.created_at,
		updatedAt: row.updated_at,
	}
}

export class PostgresWebhookStore implements WebhookStore {
	constructor(private readonly sql: SQL) {}

	async create(input: CreateWebhookRecord): Promise<Webhook> {
		const [row] = await this.sql<WebhookRow[]>`
			INSERT INTO webhooks (name, url, secret, is_active, custom_headers, timeout_seconds, max_attempts)
			VALUES (
				${input.name},
				${input.url},
				${input.secret},
				${input.isActive ?? true},
				${JSON.stringify(input.customHeaders ?? {})}::jsonb,
				${input.timeoutSeconds},
				${input.maxAttempts}
			)
			RETURNING *
		`
		if (!row) throw new Error('Failed to create webhook')
		return rowToWebhook(row)
	}

	async createWithSubscriptions(input: CreateWebhookRecord, eventTypes: string[]): Promise<Webhook> {
		return this.sql.begin(async (tx) => {
			const [row] = await tx.unsafe<WebhookRow[]>(
				`INSERT INTO webhooks (name, url, secret, is_active, custom_headers, timeout_seconds, max_attempts)
				VALUES ($1, $2, $3, $4, $5::jsonb, $6, $7)
				RETURNING *`,
				[
					input.name,
					input.url,
					input.secret,
					input.isActive ?? true,
					JSON.stringify(input.customHeaders ?? {}),
					input.timeoutSeconds,
					input.maxAttempts,
				],
			)
			if (!row) throw new Error('Failed to create webhook')
			for (const eventType of eventTypes) {
				await tx.unsafe(
					`INSERT INTO event_subscriptions (webhook_id, event_type, is_active)
					VALUES ($1, $2, true)
					ON CONFLICT (webhook_id, event_type) DO UPDATE SET is_active = true`,
					[row.id, eventType],
				)
			}
			return rowToWebhook(row)
		})
	}

	async get(id: string): Promise<Webhook | null> {
		const [row] = await this.sql<WebhookRow[]>`
			SELECT * FROM webhooks WHERE id = ${id}
		`
		return row ? rowToWebhook(row) : null
	}

	async list(opts: ListWebhooksOptions = {}): Promise<Webhook[]> {
		const isActive = opts.isActive ?? null
		const rows = await this.sql<WebhookRow[]>`
			SELECT * FROM webhooks
			WHERE (${isActive}::boolean IS NULL OR is_active = ${isActive}::boolean)
			ORDER BY created_at DESC
			LIMIT ${opts.limit ?? 50} OFFSET ${opts.offset ?? 0}
		`
		return rows.map(rowToWebhook)
	}

	async update(id: string, patch: WebhookPatch): Promise<Webhook | null> {
		const headers = patch.customHeaders ? JSON.stringify(patch.customHeaders) : null
		const [row] = await this.sql<WebhookRow[]>`
			UPDATE webhooks SET
				name = COALESCE(${patch.name ?? null}::text, name),
				url = COALESCE(${patch.url ?? null}::text, url),
				is_active = COALESCE(${patch.isActive ?? null}::boolean, is_active),
				custom_headers = COALESCE(${headers}::jsonb, custom_headers),
				timeout_seconds = COALESCE(${patch.timeoutSeconds ?? null}::int, timeout_seconds),
				max_attempts = COALESCE(${patch.maxAttempts ?? null}::int, max_attempts)
			WHERE id = ${id}
			RETURNING *
		`
		return row ? rowToWebhook(row) : null
	}

	async delete(id: string): Promise<boolean> {
		const result = await this.sql`DELETE FROM webhooks WHERE id = ${id}`
		return result.count > 0
	}

	async setSecret(id: string, secret: string): Promise<Webhook | null> {
		const [row] = await this.sql<WebhookRow[]>`
			UPDATE webhooks SET secret = ${secret} WHERE id = ${id} RETURNING *
		`
		return row ? rowToWebhook(row) : null
	}

	async upsertSubscription(webhookId: string, eventType: string): Promise<EventSubscription> {
		const [row] = await this.sql<SubscriptionRow[]>`
			INSERT INTO event_subscriptions (webhook_id, event_type, is_active)
			VALUES (${webhookId}, ${eventType}, true)
			ON CONFLICT (webhook_id, event_type) DO UPDATE SET is_active = true
			RETURNING *
		`
		if (!row) throw new Error(`Failed to subscribe webhook ${webhookId} to ${eventType}`)
		return rowToSubscription(row)
	}

	async deleteSubscription(webhookId: string, eventType: string): Promise<boolean> {
		const result = await this.sql`
			DELETE FROM event_subscriptions
			WHERE webhook_id = ${webhookId} AND event_type = ${eventType}
		`
		return result.count > 0
	}

	async setSubscriptionActive(
		webhookId: string,
		eventType: string,
		isActive: boolean,
	): Promise<EventSubscription | null> {
		const [row] = await this.sql<SubscriptionRow[]>`
			UPDATE event_subscriptions SET is_active = ${isActive}
			WHERE webhook_id = ${webhookId} AND event_type = ${eventType}
			RETURNING *
		`
		return row ? rowToSubscription(row) : null
	}

	async listSubscriptions(webhookId: string): Promise<EventSubscription[]> {
		const rows = await this.sql<SubscriptionRow[]>`
			SELECT * FROM event_subscriptions
			WHERE webhook_id = ${webhookId}
			ORDER BY event_type ASC
		`
		return rows.map(rowToSubscription)
	}

	async findSubscribers(eventType: string): Promise<Webhook[]> {
		const rows = await this.sql<WebhookRow[]>`
			SELECT w.*
			FROM webhooks w
			INNER JOIN event_subscriptions s ON s.webhook_id = w.id
			WHERE s.event_type = ${eventType}
			  AND s.is_active = true
			  AND w.is_active = true
			ORDER BY w.created_at ASC
		`
		return rows.map(rowToWebhook)
	}
}
