import type { Logger } from '../logger/index.ts'
import type { JsonValue } from '../webhooks/types.ts'

export interface QueueOptions {
	/** Maximum number of retry attempts (default: 3) */
	maxRetries?: number
	/** Job priority - higher runs first (default: 0) */
	priority?: number
	/** Schedule job to run at a specific time (default: now) */
	runAt?: Date
}

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'retrying'

export interface Job {
	id: string
	name: string
	data: JsonValue
	status: JobStatus
	priority: number
	attempts: number
	maxAttempts: number
	runAt: Date
	lastError: string | null
}

export interface JobContext {
	/** Unique job ID */
	jobId: string
	/** Logger scoped to this job */
	logger: Logger
	/** Current attempt number (1-indexed) */
	attempt: number
}

export type JobHandler = (data: JsonValue, ctx: JobContext) => Promise<void>

/**
 * Task queue the trigger and retry sweep enqueue dispatch work into.
 * A handler that throws is retried by the queue with its own backoff.
 */
export interface JobQueue {
	/** Register a handler; must be called before `start()` */
	register(name: string, handler: JobHandler): void
	push(name: string, data: JsonValue, opts?: QueueOptions): Promise<string>
	start(): Promise<void>
	/** Stop polling and wait for in-flight jobs */
	stop(): Promise<void>
}

/** Delay before a failed job runs again: 1s, 2s, 4s ... capped at 30s */
export function jobRetryDelayMs(attempts: number): number {
	return Math.min(1000 * 2 ** Math.max(0, attempts - 1), 30_000)
}
