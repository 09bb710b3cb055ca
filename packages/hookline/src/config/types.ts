import type { z } from 'zod'
import type { hooklineConfigSchema, scheduleSchema } from './schema.ts'

/** Fully resolved configuration (every default filled in) */
export type HooklineConfig = z.output<typeof hooklineConfigSchema>

/** Configuration as written by users: every section and field optional */
export type HooklineConfigInput = z.input<typeof hooklineConfigSchema>

/** How often a periodic task runs: `{ intervalSeconds }` or `{ cron }` */
export type Schedule = z.output<typeof scheduleSchema>

export type DeliveryConfig = HooklineConfig['delivery']
export type QueueConfig = HooklineConfig['queue']
