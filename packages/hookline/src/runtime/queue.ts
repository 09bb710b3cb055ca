import { randomUUID } from 'node:crypto'
import type { SQL } from '../db/client.ts'
import type { Logger } from '../logger/index.ts'
import { errorMessage } from '../utils/errors.ts'
import type { JsonValue } from '../webhooks/types.ts'
import {
	type Job,
	type JobHandler,
	type JobQueue,
	type JobStatus,
	type QueueOptions,
	jobRetryDelayMs,
} from './types.ts'

interface JobRow {
	id: string
	name: string
	data: JsonValue
	status: JobStatus
	priority: number
	attempts: number
	max_attempts: number
	run_at: Date
	last_error: string | null
}

function rowToJob(row: JobRow): Job {
	return {
		id: row.id,
		name: row.name,
		data: row.data,
		status: row.status,
		priority: row.priority,
		attempts: row.attempts,
		maxAttempts: row.max_attempts,
		runAt: row.run_at,
		lastError: row.last_error,
	}
}

export interface PostgresQueueOptions {
	pollIntervalMs?: number
	/** Jobs executed at once by this worker */
	concurrency?: number
	/** Default retries for pushed jobs */
	maxRetries?: number
	/**
	 * Seconds a `running` job may go untouched before another worker
	 * reclaims it. Must outlast the slowest handler.
	 */
	leaseSeconds?: number
}

/**
 * Postgres-backed job queue with a polling worker pool.
 * Claims are a single `FOR UPDATE SKIP LOCKED` statement, so several
 * workers can poll the same table. A claim is a lease: a job left
 * `running` by a worker that died is claimed again once it expires.
 */
export class PostgresJobQueue implements JobQueue {
	private running = false
	private polling = false
	private pollTimer: ReturnType<typeof setInterval> | null = null
	private readonly handlers = new Map<string, JobHandler>()
	private readonly inFlight = new Set<Promise<void>>()
	private readonly pollIntervalMs: number
	private readonly concurrency: number
	private readonly maxRetries: number
	private readonly leaseSeconds: number

	constructor(
		private readonly sql: SQL,
		private readonly logger: Logger,
		opts: PostgresQueueOptions = {},
	) {
		this.pollIntervalMs = opts.pollIntervalMs ?? 1000
		this.concurrency = opts.concurrency ?? 10
		this.maxRetries = opts.maxRetries ?? 3
		this.leaseSeconds = opts.leaseSeconds ?? 600
	}

	register(name: string, handler: JobHandler): void {
		if (this.handlers.has(name)) {
			throw new Error(`Job handler already registered: ${name}`)
		}
		this.handlers.set(name, handler)
		this.logger.debug(`[Queue] Registered handler for ${name}`)
	}

	async push(name: string, data: JsonValue, opts?: QueueOptions): Promise<string> {
		const maxAttempts = (opts?.maxRetries ?? this.maxRetries) + 1
		const priority = opts?.priority ?? 0
		const runAt = opts?.runAt ?? new Date()
		const id = randomUUID()

		await this.sql`
			INSERT INTO job_queue (id, name, data, priority, max_attempts, run_at, status)
			VALUES (${id}, ${name}, ${JSON.stringify(data)}::jsonb, ${priority}, ${maxAttempts}, ${runAt}, 'pending')
		`

		this.logger.debug(`[Queue] Added job ${name}`, { jobId: id })
		return id
	}

	async get(jobId: string): Promise<Job | null> {
		const [row] = await this.sql<JobRow[]>`
			SELECT id, name, data, status, priority, attempts, max_attempts, run_at, last_error
			FROM job_queue
			WHERE id = ${jobId}
		`
		return row ? rowToJob(row) : null
	}

	async start(): Promise<void> {
		if (this.running) {
			throw new Error('Queue is already running')
		}

		this.running = true
		this.logger.info('[Queue] Started worker', {
			pollIntervalMs: this.pollIntervalMs,
			concurrency: this.concurrency,
		})

		await this.poll()

		this.pollTimer = setInterval(() => {
			void this.poll()
		}, this.pollIntervalMs)
	}

	async stop(): Promise<void> {
		this.running = false

		if (this.pollTimer) {
			clearInterval(this.pollTimer)
			this.pollTimer = null
		}

		const pending = this.inFlight.size
		await Promise.allSettled([...this.inFlight])
		this.logger.info('[Queue] Stopped worker', { drainedJobs: pending })
	}

	/**
	 * Claim as many due jobs as there are free worker slots and start them.
	 */
	private async poll(): Promise<void> {
		if (!this.running || this.polling) return
		const free = this.concurrency - this.inFlight.size
		if (free <= 0) return

		this.polling = true
		try {
			const rows = await this.sql<JobRow[]>`
				UPDATE job_queue
				SET status = 'running', attempts = attempts + 1
				WHERE id IN (
					SELECT id FROM job_queue
					WHERE (status IN ('pending', 'retrying') AND run_at <= NOW())
					   OR (status = 'running' AND updated_at < NOW() - make_interval(secs => ${this.leaseSeconds}))
					ORDER BY priority DESC, run_at ASC
					LIMIT ${free}
					FOR UPDATE SKIP LOCKED
				)
				RETURNING id, name, data, status, priority, attempts, max_attempts, run_at, last_error
			`

			for (const row of rows) {
				const task = this.execute(rowToJob(row)).finally(() => {
					this.inFlight.delete(task)
				})
				this.inFlight.add(task)
			}
		} catch (err) {
			this.logger.error('[Queue] Poll error', err)
		} finally {
			this.polling = false
		}
	}

	/**
	 * Run a claimed job. `attempts` already counts this run.
	 * Never rejects: bookkeeping failures are logged.
	 */
	private async execute(job: Job): Promise<void> {
		const handler = this.handlers.get(job.name)
		try {
			if (!handler) {
				await this.markFailed(job.id, `No handler registered for job: ${job.name}`)
				return
			}

			const jobLogger = this.logger.child({ job: job.name, jobId: job.id })
			try {
				await handler(job.data, { jobId: job.id, logger: jobLogger, attempt: job.attempts })
			} catch (err) {
				await this.handleFailure(job, errorMessage(err))
				return
			}

			await this.sql`DELETE FROM job_queue WHERE id = ${job.id}`
			this.logger.debug(`[Queue] Completed job ${job.name}`, { jobId: job.id })
		} catch (err) {
			this.logger.error(`[Queue] Failed to record outcome of job ${job.name}`, {
				jobId: job.id,
				error: errorMessage(err),
			})
		}
	}

	private async handleFailure(job: Job, error: string): Promise<void> {
		this.logger.error(`[Queue] Job ${job.name} failed`, { jobId: job.id, attempt: job.attempts, error })

		if (job.attempts >= job.maxAttempts) {
			await this.markFailed(job.id, error)
			return
		}

		const retryAt = new Date(Date.now() + jobRetryDelayMs(job.attempts))
		await this.sql`
			UPDATE job_queue
			SET status = 'retrying', last_error = ${error}, run_at = ${retryAt}
			WHERE id = ${job.id}
		`
		this.logger.info(`[Queue] Scheduled retry for ${job.name}`, { jobId: job.id, retryAt })
	}

	private async markFailed(jobId: string, error: string): Promise<void> {
		await this.sql`
			UPDATE job_queue
			SET status = 'failed', last_error = ${error}
			WHERE id = ${jobId}
		`
	}
}
