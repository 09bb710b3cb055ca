export * from './config/index.ts'
export type { SQL } from './db/client.ts'
export { type Migration, WEBHOOK_MIGRATIONS } from './db/migrations.ts'
export { type MigrationStatus, Migrator } from './db/migrator.ts'
export { DatabasePool, type PoolConfig, type SQLFactory } from './db/pool.ts'
export { type EngineComponents, type EngineOptions, HooklineEngine } from './engine.ts'
export {
	CommandReport,
	type LogListener,
	Logger,
	type LoggerOptions,
	type LogLevel,
	type MarkKind,
} from './logger/index.ts'
export { MemoryJobQueue } from './runtime/memory-queue.ts'
export { PostgresJobQueue } from './runtime/queue.ts'
export { describeSchedule, Scheduler } from './runtime/scheduler.ts'
export type { Job, JobContext, JobHandler, JobQueue, QueueOptions } from './runtime/types.ts'
export * from './utils/errors.ts'
export * from './webhooks/index.ts'
