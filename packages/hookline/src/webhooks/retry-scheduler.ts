import type { Schedule } from '../config/types.ts'
import type { Logger } from '../logger/index.ts'
import type { JobQueue } from '../runtime/types.ts'
import type { Scheduler } from '../runtime/scheduler.ts'
import { errorMessage } from '../utils/errors.ts'
import type { DeliveryStore } from './delivery-store.ts'
import { type Delivery, DISPATCH_JOB, type DispatchJobData } from './types.ts'

export const RETRY_SWEEP_TASK = 'webhooks.retry-sweep'
export const RETENTION_SWEEP_TASK = 'webhooks.retention-sweep'

export interface RetrySchedulerOptions {
	batchSize: number
	retentionDays: number
	retrySchedule: Schedule
	retentionSchedule: Schedule
}

export interface SweepResult {
	due: number
	enqueued: number
}

const DEFAULTS: RetrySchedulerOptions = {
	batchSize: 100,
	retentionDays: 30,
	retrySchedule: { intervalSeconds: 60 },
	retentionSchedule: { intervalSeconds: 86_400 },
}

/**
 * Periodic sweeps: re-enqueue deliveries whose retry is due, and purge
 * old delivery history. Neither sweep throws.
 */
export class RetryScheduler {
	private readonly options: RetrySchedulerOptions

	constructor(
		private readonly deliveries: DeliveryStore,
		private readonly queue: JobQueue,
		private readonly logger: Logger,
		options: Partial<RetrySchedulerOptions> = {},
	) {
		this.options = { ...DEFAULTS, ...options }
	}

	async sweepRetries(): Promise<SweepResult> {
		let due: Delivery[]
		try {
			due = await this.deliveries.pendingRetries(this.options.batchSize)
		} catch (err) {
			this.logger.error('[RetrySweep] Failed to load due retries', { error: errorMessage(err) })
			return { due: 0, enqueued: 0 }
		}

		let enqueued = 0
		for (const delivery of due) {
			const job: DispatchJobData = { deliveryId: delivery.id }
			try {
				await this.queue.push(DISPATCH_JOB, job)
				enqueued++
			} catch (err) {
				this.logger.error('[RetrySweep] Failed to enqueue retry', {
					deliveryId: delivery.id,
					error: errorMessage(err),
				})
			}
		}

		if (due.length > 0) {
			this.logger.info('[RetrySweep] Re-enqueued due deliveries', { due: due.length, enqueued })
		}
		return { due: due.length, enqueued }
	}

	/** Delete deliveries older than the retention window; returns the count */
	async sweepRetention(): Promise<number> {
		try {
			const removed = await this.deliveries.cleanup(this.options.retentionDays)
			this.logger.info('[Retention] Purged old deliveries', {
				removed,
				olderThanDays: this.options.retentionDays,
			})
			return removed
		} catch (err) {
			this.logger.error('[Retention] Cleanup failed', { error: errorMessage(err) })
			return 0
		}
	}

	register(scheduler: Scheduler): void {
		scheduler.add(RETRY_SWEEP_TASK, this.options.retrySchedule, async () => {
			await this.sweepRetries()
		})
		scheduler.add(RETENTION_SWEEP_TASK, this.options.retentionSchedule, async () => {
			await this.sweepRetention()
		})
	}
}
