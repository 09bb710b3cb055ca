import type { HooklineConfig } from './config/types.ts'
import type { SQL } from './db/client.ts'
import { Migrator } from './db/migrator.ts'
import { DatabasePool, type SQLFactory } from './db/pool.ts'
import { Logger } from './logger/index.ts'
import { MemoryJobQueue } from './runtime/memory-queue.ts'
import { PostgresJobQueue } from './runtime/queue.ts'
import { Scheduler } from './runtime/scheduler.ts'
import type { JobQueue } from './runtime/types.ts'
import { PostgresDeliveryStore } from './webhooks/delivery-store.ts'
import { createDispatchJobHandler, DeliveryDispatcher } from './webhooks/dispatcher.ts'
import { type FetchLike, HttpSender } from './webhooks/http-sender.ts'
import { WebhookManager } from './webhooks/manager.ts'
import { EventRegistry } from './webhooks/registry.ts'
import { RetryScheduler } from './webhooks/retry-scheduler.ts'
import { EventTrigger } from './webhooks/trigger.ts'
import { DISPATCH_JOB } from './webhooks/types.ts'
import { PostgresWebhookStore } from './webhooks/webhook-store.ts'

export interface EngineOptions {
	logger?: Logger
	/** Builds the postgres client; replaced in tests */
	sqlFactory?: SQLFactory
	/** Outbound HTTP; defaults to the global fetch */
	fetch?: FetchLike
}

export interface EngineComponents {
	sql: SQL
	queue: JobQueue
	scheduler: Scheduler
	registry: EventRegistry
	dispatcher: DeliveryDispatcher
	trigger: EventTrigger
	retries: RetryScheduler
	manager: WebhookManager
	migrator: Migrator
}

/**
 * Process bootstrap: owns the database pool and wires every webhook
 * component explicitly. Nothing is created at import time.
 *
 * @example
 * const engine = new HooklineEngine(await loadConfig())
 * await engine.connect()
 * await engine.start()
 * await engine.components().trigger.trigger('user.created', { id: 'u_1' })
 */
export class HooklineEngine {
	readonly logger: Logger
	private readonly pool: DatabasePool
	private wired: EngineComponents | null = null
	private started = false

	constructor(
		private readonly config: HooklineConfig,
		private readonly options: EngineOptions = {},
	) {
		this.logger =
			options.logger ?? new Logger({ level: config.logger.level, verbose: config.logger.verbose })
		this.pool = new DatabasePool(
			{
				url: config.database.url,
				max: config.database.maxConnections,
				idleTimeoutSeconds: config.database.idleTimeoutSeconds,
				connectTimeoutSeconds: config.database.connectTimeoutSeconds,
				retryAttempts: config.database.retryAttempts,
				retryDelayMs: config.database.retryDelayMs,
				healthCheckIntervalMs: config.database.healthCheckIntervalMs,
			},
			this.logger.child({ component: 'database' }),
			options.sqlFactory,
		)
	}

	/** Connect to the database and build the components */
	async connect(): Promise<EngineComponents> {
		if (this.wired) return this.wired
		const sql = await this.pool.connect()
		this.wired = this.wire(sql)
		return this.wired
	}

	components(): EngineComponents {
		if (!this.wired) {
			throw new Error('Engine not connected. Call connect() first.')
		}
		return this.wired
	}

	async healthCheck(): Promise<boolean> {
		return this.pool.healthCheck()
	}

	/** Start the queue workers and the periodic sweeps */
	async start(): Promise<void> {
		const { queue, scheduler } = await this.connect()
		if (this.started) return
		this.started = true
		await queue.start()
		scheduler.start()
		this.logger.info('[Engine] Started', {
			queue: this.config.queue.driver,
			concurrency: this.config.queue.concurrency,
		})
	}

	async stop(): Promise<void> {
		if (this.wired && this.started) {
			await this.wired.scheduler.stop()
			await this.wired.queue.stop()
			this.started = false
		}
		await this.pool.close()
		this.wired = null
		this.logger.info('[Engine] Stopped')
	}

	private wire(sql: SQL): EngineComponents {
		const { delivery, queue: queueConfig, retrySweep, retention } = this.config
		const log = (component: string) => this.logger.child({ component })

		const webhooks = new PostgresWebhookStore(sql)
		const deliveries = new PostgresDeliveryStore(sql, delivery.responseBodyLimit)

		const queue: JobQueue =
			queueConfig.driver === 'memory'
				? new MemoryJobQueue(log('queue'), queueConfig)
				: new PostgresJobQueue(sql, log('queue'), queueConfig)

		const registry = new EventRegistry(webhooks, log('registry'))
		const dispatcher = new DeliveryDispatcher(
			deliveries,
			webhooks,
			new HttpSender(this.options.fetch),
			log('dispatcher'),
			{
				initialRetryDelaySeconds: delivery.initialRetryDelaySeconds,
				backoffFactor: delivery.backoffFactor,
				maxRetryDelaySeconds: delivery.maxRetryDelaySeconds,
				userAgent: delivery.userAgent,
			},
		)
		queue.register(DISPATCH_JOB, createDispatchJobHandler(dispatcher))

		const scheduler = new Scheduler(log('scheduler'))
		const retries = new RetryScheduler(deliveries, queue, log('retry-sweep'), {
			batchSize: retrySweep.batchSize,
			retrySchedule: retrySweep.schedule,
			retentionDays: retention.days,
			retentionSchedule: retention.schedule,
		})
		retries.register(scheduler)

		return {
			sql,
			queue,
			scheduler,
			registry,
			dispatcher,
			trigger: new EventTrigger(registry, deliveries, queue, log('trigger')),
			retries,
			manager: new WebhookManager(webhooks, deliveries, registry, queue, log('manager'), {
				timeoutSeconds: delivery.defaultTimeoutSeconds,
				maxAttempts: delivery.maxAttempts,
			}),
			migrator: new Migrator(sql, log('migrator')),
		}
	}
}
