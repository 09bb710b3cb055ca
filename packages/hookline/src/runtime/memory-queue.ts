import { randomUUID } from 'node:crypto'
import type { Logger } from '../logger/index.ts'
import { errorMessage } from '../utils/errors.ts'
import type { JsonValue } from '../webhooks/types.ts'
import {
	type Job,
	type JobHandler,
	type JobQueue,
	type QueueOptions,
	jobRetryDelayMs,
} from './types.ts'

export interface MemoryQueueOptions {
	pollIntervalMs?: number
	concurrency?: number
	maxRetries?: number
}

/** Failed jobs kept for inspection; older ones are dropped first */
export const MAX_FAILED_JOBS = 100

/**
 * In-process job queue for a single node.
 * Jobs live only as long as the process; `drain()` runs everything that
 * is due and waits for it. A completed job is released at once.
 */
export class MemoryJobQueue implements JobQueue {
	private readonly jobs = new Map<string, Job>()
	private readonly failed: Job[] = []
	private readonly handlers = new Map<string, JobHandler>()
	private readonly inFlight = new Set<Promise<void>>()
	private running = false
	private pollTimer: ReturnType<typeof setInterval> | null = null
	private readonly pollIntervalMs: number
	private readonly concurrency: number
	private readonly maxRetries: number

	constructor(
		private readonly logger: Logger,
		opts: MemoryQueueOptions = {},
	) {
		this.pollIntervalMs = opts.pollIntervalMs ?? 1000
		this.concurrency = opts.concurrency ?? 10
		this.maxRetries = opts.maxRetries ?? 3
	}

	register(name: string, handler: JobHandler): void {
		if (this.handlers.has(name)) {
			throw new Error(`Job handler already registered: ${name}`)
		}
		this.handlers.set(name, handler)
	}

	async push(name: string, data: JsonValue, opts?: QueueOptions): Promise<string> {
		const job: Job = {
			id: randomUUID(),
			name,
			data: structuredClone(data),
			status: 'pending',
			priority: opts?.priority ?? 0,
			attempts: 0,
			maxAttempts: (opts?.maxRetries ?? this.maxRetries) + 1,
			runAt: opts?.runAt ?? new Date(),
			lastError: null,
		}
		this.jobs.set(job.id, job)
		if (this.running) this.fill()
		return job.id
	}

	async start(): Promise<void> {
		if (this.running) {
			throw new Error('Queue is already running')
		}
		this.running = true
		this.fill()
		this.pollTimer = setInterval(() => this.fill(), this.pollIntervalMs)
		this.logger.info('[Queue] Started in-memory worker', { concurrency: this.concurrency })
	}

	async stop(): Promise<void> {
		this.running = false
		if (this.pollTimer) {
			clearInterval(this.pollTimer)
			this.pollTimer = null
		}
		await Promise.allSettled([...this.inFlight])
	}

	/** Run every due job, including ones pushed meanwhile, until none is left */
	async drain(): Promise<void> {
		for (;;) {
			this.fill()
			if (this.inFlight.size === 0) return
			await Promise.race(this.inFlight)
		}
	}

	/** Snapshot of the waiting and running jobs, then the retained failures */
	list(): Job[] {
		return [...this.jobs.values(), ...this.failed].map((job) => ({ ...job }))
	}

	/** Number of jobs executing right now */
	activeCount(): number {
		return this.inFlight.size
	}

	private nextDue(): Job | undefined {
		const now = Date.now()
		let next: Job | undefined
		for (const job of this.jobs.values()) {
			if (job.status !== 'pending' && job.status !== 'retrying') continue
			if (job.runAt.getTime() > now) continue
			if (!next || job.priority > next.priority) next = job
		}
		return next
	}

	private fill(): void {
		while (this.inFlight.size < this.concurrency) {
			const job = this.nextDue()
			if (!job) return
			job.status = 'running'
			job.attempts += 1
			const task = this.execute(job).finally(() => {
				this.inFlight.delete(task)
			})
			this.inFlight.add(task)
		}
	}

	private async execute(job: Job): Promise<void> {
		const handler = this.handlers.get(job.name)
		if (!handler) {
			this.fail(job, `No handler registered for job: ${job.name}`)
			return
		}

		try {
			await handler(job.data, {
				jobId: job.id,
				logger: this.logger.child({ job: job.name, jobId: job.id }),
				attempt: job.attempts,
			})
			this.jobs.delete(job.id)
		} catch (err) {
			job.lastError = errorMessage(err)
			this.logger.error(`[Queue] Job ${job.name} failed`, {
				jobId: job.id,
				attempt: job.attempts,
				error: job.lastError,
			})
			if (job.attempts >= job.maxAttempts) {
				this.fail(job, job.lastError)
			} else {
				job.status = 'retrying'
				job.runAt = new Date(Date.now() + jobRetryDelayMs(job.attempts))
			}
		}
	}

	private fail(job: Job, reason: string): void {
		job.status = 'failed'
		job.lastError = reason
		this.jobs.delete(job.id)
		this.failed.push(job)
		if (this.failed.length > MAX_FAILED_JOBS) this.failed.shift()
	}
}
