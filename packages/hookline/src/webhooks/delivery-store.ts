import type { SQL } from '../db/client.ts'
import type {
	Delivery,
	DeliveryStats,
	DeliveryStatus,
	JsonObject,
} from './types.ts'

export const RESPONSE_BODY_LIMIT = 10_000

export interface CreateDeliveryInput {
	webhookId: string
	eventType: string
	payload: JsonObject
	eventId?: string | null
	maxAttempts?: number
}

/** Details of one attempt, persisted alongside a status transition */
export interface AttemptDetails {
	statusCode?: number | null
	responseBody?: string | null
	responseHeaders?: Record<string, string> | null
	errorMessage?: string | null
	requestUrl?: string | null
	requestHeaders?: Record<string, string> | null
	durationMs?: number | null
}

export interface StatusDetails extends AttemptDetails {
	/** Count the attempt that led to this transition (never past max_attempts) */
	countAttempt?: boolean
}

export interface ListDeliveriesOptions {
	webhookId?: string
	status?: DeliveryStatus
	limit?: number
	offset?: number
}

/**
 * Durable record of every delivery's lifecycle.
 *
 * Each transition is a single conditional statement per row: terminal rows
 * (`success`, `failed`) never move again, and `attempt_count` never exceeds
 * `max_attempts`. Unknown or terminal ids resolve to null.
 */
export interface DeliveryStore {
	create(input: CreateDeliveryInput): Promise<Delivery>
	get(id: string): Promise<Delivery | null>
	list(opts?: ListDeliveriesOptions): Promise<Delivery[]>
	updateStatus(id: string, status: DeliveryStatus, details?: StatusDetails): Promise<Delivery | null>
	incrementAttempt(
		id: string,
		retryDelaySeconds: number,
		details?: AttemptDetails,
	): Promise<Delivery | null>
	pendingRetries(limit?: number): Promise<Delivery[]>
	/**
	 * Manual retry: back to `pending` with a fresh attempt budget. Refused
	 * (null) for `success` and `sending` rows and for exhausted attempts.
	 */
	resetForRetry(id: string): Promise<Delivery | null>
	stats(webhookId: string, windowDays: number): Promise<DeliveryStats>
	cleanup(olderThanDays: number): Promise<number>
}

export function truncateBody(body: string | null | undefined, limit = RESPONSE_BODY_LIMIT): string | null {
	if (body === null || body === undefined) return null
	return body.length > limit ? body.slice(0, limit) : body
}

/** Percentage rounded to two decimals, 0 when there is nothing to count */
export function successRate(successful: number, total: number): number {
	if (total === 0) return 0
	return Math.round((successful / total) * 10_000) / 100
}

interface DeliveryRow {
	id: string
	webhook_id: string
	event_type: string
	event_id: string | null
	payload: JsonObject
	status: DeliveryStatus
	attempt_count: number
	max_attempts: number
	status_code: number | null
	response_body: string | null
	response_headers: Record<string, string> | null
	error_message: string | null
	request_url: string | null
	request_headers: Record<string, string> | null
	duration_ms: number | null
	created_at: Date
	sent_at: Date | null
	next_retry_at: Date | null
	completed_at: Date | null
}

interface StatsRow {
	total: number
	successful: number
	failed: number
	pending: number
	average_duration_ms: number | null
}

function rowToDelivery(row: DeliveryRow): Delivery {
	return {
		id: row.id,
		webhookId: row.webhook_id,
		eventType: row.event_type,
		eventId: row.event_id,
		payload: row.payload,
		status: row.status,
		attemptCount: row.attempt_count,
		maxAttempts: row.max_attempts,
		statusCode: row.status_code,
		responseBody: row.response_body,
		responseHeaders: row.response_headers,
		errorMessage: row.error_message,
		requestUrl: row.request_url,
		requestHeaders: row.request_headers,
		durationMs: row.duration_ms,
		createdAt: row.created_at,
		sentAt: row.sent_at,
		nextRetryAt: row.next_retry_at,
		completedAt: row.completed_at,
	}
}

function jsonOrNull(value: Record<string, string> | null | undefined): string | null {
	return value ? JSON.stringify(value) : null
}

export class PostgresDeliveryStore implements DeliveryStore {
	constructor(
		private readonly sql: SQL,
		private readonly responseBodyLimit = RESPONSE_BODY_LIMIT,
	) {}

	async create(input: CreateDeliveryInput): Promise<Delivery> {
		const [row] = await this.sql<DeliveryRow[]>`
			INSERT INTO webhook_deliveries (webhook_id, event_type, event_id, payload, status, attempt_count, max_attempts)
			VALUES (
				${input.webhookId},
				${input.eventType},
				${input.eventId ?? null},
				${JSON.stringify(input.payload)}::jsonb,
				'pending',
				0,
				${input.maxAttempts ?? 5}
			)
			RETURNING *
		`
		if (!row) throw new Error('Failed to create delivery')
		return rowToDelivery(row)
	}

	async get(id: string): Promise<Delivery | null> {
		const [row] = await this.sql<DeliveryRow[]>`
			SELECT * FROM webhook_deliveries WHERE id = ${id}
		`
		return row ? rowToDelivery(row) : null
	}

	async list(opts: ListDeliveriesOptions = {}): Promise<Delivery[]> {
		const webhookId = opts.webhookId ?? null
		const status = opts.status ?? null
		const rows = await this.sql<DeliveryRow[]>`
			SELECT * FROM webhook_deliveries
			WHERE (${webhookId}::text IS NULL OR webhook_id = ${webhookId}::text)
			  AND (${status}::text IS NULL OR status = ${status}::text)
			ORDER BY created_at DESC
			LIMIT ${opts.limit ?? 50} OFFSET ${opts.offset ?? 0}
		`
		return rows.map(rowToDelivery)
	}

	async updateStatus(
		id: string,
		status: DeliveryStatus,
		details: StatusDetails = {},
	): Promise<Delivery | null> {
		const body = truncateBody(details.responseBody, this.responseBodyLimit)
		const [row] = await this.sql<DeliveryRow[]>`
			UPDATE webhook_deliveries SET
				status = ${status}::text,
				status_code = COALESCE(${details.statusCode ?? null}::int, status_code),
				response_body = COALESCE(${body}::text, response_body),
				response_headers = COALESCE(${jsonOrNull(details.responseHeaders)}::jsonb, response_headers),
				error_message = CASE
					WHEN ${status}::text = 'success' THEN NULL
					ELSE COALESCE(${details.errorMessage ?? null}::text, error_message)
				END,
				request_url = COALESCE(${details.requestUrl ?? null}::text, request_url),
				request_headers = COALESCE(${jsonOrNull(details.requestHeaders)}::jsonb, request_headers),
				duration_ms = COALESCE(${details.durationMs ?? null}::int, duration_ms),
				attempt_count = CASE
					WHEN ${details.countAttempt ?? false}::boolean THEN LEAST(attempt_count + 1, max_attempts)
					ELSE attempt_count
				END,
				sent_at = CASE WHEN ${status}::text = 'sending' THEN NOW() ELSE sent_at END,
				completed_at = CASE WHEN ${status}::text IN ('success', 'failed') THEN NOW() ELSE completed_at END,
				next_retry_at = NULL
			WHERE id = ${id} AND status NOT IN ('success', 'failed')
			RETURNING *
		`
		return row ? rowToDelivery(row) : null
	}

	async incrementAttempt(
		id: string,
		retryDelaySeconds: number,
		details: AttemptDetails = {},
	): Promise<Delivery | null> {
		const body = truncateBody(details.responseBody, this.responseBodyLimit)
		const [row] = await this.sql<DeliveryRow[]>`
			UPDATE webhook_deliveries SET
				attempt_count = attempt_count + 1,
				status = 'retrying',
				next_retry_at = NOW() + make_interval(secs => ${retryDelaySeconds}::double precision),
				status_code = ${details.statusCode ?? null}::int,
				response_body = ${body}::text,
				response_headers = ${jsonOrNull(details.responseHeaders)}::jsonb,
				error_message = ${details.errorMessage ?? null}::text,
				duration_ms = ${details.durationMs ?? null}::int
			WHERE id = ${id}
			  AND attempt_count < max_attempts
			  AND status NOT IN ('success', 'failed')
			RETURNING *
		`
		return row ? rowToDelivery(row) : null
	}

	async pendingRetries(limit = 100): Promise<Delivery[]> {
		const rows = await this.sql<DeliveryRow[]>`
			SELECT * FROM webhook_deliveries
			WHERE status = 'retrying'
			  AND next_retry_at <= NOW()
			  AND attempt_count < max_attempts
			ORDER BY next_retry_at ASC
			LIMIT ${limit}
		`
		return rows.map(rowToDelivery)
	}

	async resetForRetry(id: string): Promise<Delivery | null> {
		const [row] = await this.sql<DeliveryRow[]>`
			UPDATE webhook_deliveries SET
				status = 'pending',
				attempt_count = 0,
				status_code = NULL,
				response_body = NULL,
				response_headers = NULL,
				error_message = NULL,
				duration_ms = NULL,
				sent_at = NULL,
				next_retry_at = NULL,
				completed_at = NULL
			WHERE id = ${id}
			  AND status NOT IN ('success', 'sending')
			  AND attempt_count < max_attempts
			RETURNING *
		`
		return row ? rowToDelivery(row) : null
	}

	async stats(webhookId: string, windowDays: number): Promise<DeliveryStats> {
		const [row] = await this.sql<StatsRow[]>`
			SELECT
				COUNT(*)::int AS total,
				COUNT(*) FILTER (WHERE status = 'success')::int AS successful,
				COUNT(*) FILTER (WHERE status = 'failed')::int AS failed,
				COUNT(*) FILTER (WHERE status IN ('pending', 'sending', 'retrying'))::int AS pending,
				ROUND(AVG(duration_ms))::int AS average_duration_ms
			FROM webhook_deliveries
			WHERE webhook_id = ${webhookId}
			  AND created_at >= NOW() - make_interval(days => ${windowDays}::int)
		`
		const total = row?.total ?? 0
		const successful = row?.successful ?? 0
		return {
			total,
			successful,
			failed: row?.failed ?? 0,
			pending: row?.pending ?? 0,
			successRate: successRate(successful, total),
			averageDurationMs: row?.average_duration_ms ?? null,
		}
	}

	async cleanup(olderThanDays: number): Promise<number> {
		const result = await this.sql`
			DELETE FROM webhook_deliveries
			WHERE created_at < NOW() - make_interval(days => ${olderThanDays}::int)
		`
		return result.count
	}
}
