/**
 * Zod schema for runtime validation of HooklineConfig.
 * Every field has a default, so an empty object resolves to a working config.
 */

import { z } from 'zod'

const positiveInt = z.number().int().positive()

// Either a fixed interval or a cron pattern
export const scheduleSchema = z.union([
	z.object({
		intervalSeconds: positiveInt,
	}),
	z.object({
		cron: z.string().min(1, 'Cron pattern cannot be empty'),
	}),
])

const databaseSchema = z
	.object({
		url: z.string().min(1, 'Database URL cannot be empty').optional(),
		maxConnections: positiveInt.default(20),
		idleTimeoutSeconds: positiveInt.default(30),
		connectTimeoutSeconds: positiveInt.default(10),
		retryAttempts: positiveInt.default(5),
		retryDelayMs: positiveInt.default(1000),
		healthCheckIntervalMs: positiveInt.default(30000),
	})
	.default({})

const deliverySchema = z
	.object({
		maxAttempts: positiveInt.max(20, 'maxAttempts must be at most 20').default(5),
		initialRetryDelaySeconds: positiveInt.default(60),
		backoffFactor: z.number().min(1, 'backoffFactor must be at least 1').default(2),
		maxRetryDelaySeconds: positiveInt.default(3600),
		defaultTimeoutSeconds: positiveInt.max(300).default(30),
		responseBodyLimit: positiveInt.default(10000),
		userAgent: z.string().min(1).default('Hookline-Webhooks/1.0'),
	})
	.default({})
	.refine((d) => d.maxRetryDelaySeconds >= d.initialRetryDelaySeconds, {
		message: 'maxRetryDelaySeconds must be >= initialRetryDelaySeconds',
		path: ['maxRetryDelaySeconds'],
	})

const retrySweepSchema = z
	.object({
		schedule: scheduleSchema.default({ intervalSeconds: 60 }),
		batchSize: positiveInt.default(100),
	})
	.default({})

const retentionSchema = z
	.object({
		days: positiveInt.default(30),
		schedule: scheduleSchema.default({ intervalSeconds: 86400 }),
	})
	.default({})

const queueSchema = z
	.object({
		driver: z.enum(['postgres', 'memory']).default('postgres'),
		pollIntervalMs: positiveInt.default(1000),
		concurrency: positiveInt.max(256).default(10),
		maxRetries: z.number().int().min(0).default(3),
		// Must exceed the largest webhook timeout
		leaseSeconds: positiveInt.min(301, 'leaseSeconds must exceed the 300s webhook timeout cap').default(600),
	})
	.default({})

const loggerSchema = z
	.object({
		level: z.enum(['debug', 'info', 'warn', 'error', 'critical']).default('info'),
		verbose: z.boolean().default(false),
	})
	.default({})

export const hooklineConfigSchema = z.object({
	database: databaseSchema,
	delivery: deliverySchema,
	retrySweep: retrySweepSchema,
	retention: retentionSchema,
	queue: queueSchema,
	logger: loggerSchema,
})
