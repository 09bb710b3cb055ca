import { describe, expect, test, vi } from 'vitest'
import { resolveConfig } from '../src/config/loader.ts'
import type { SQL } from '../src/db/client.ts'
import { HooklineEngine } from '../src/engine.ts'
import { MemoryJobQueue } from '../src/runtime/memory-queue.ts'
import { createTestLogger } from '../src/test/logger.ts'
import { RETENTION_SWEEP_TASK, RETRY_SWEEP_TASK } from '../src/webhooks/retry-scheduler.ts'

const fakeClient = () => {
	const end = vi.fn(async () => {})
	const client = Object.assign(async () => [{ '?column?': 1 }], { end }) as any as SQL
	return { client, end }
}

describe('HooklineEngine', () => {
	const config = resolveConfig({ queue: { driver: 'memory' } }, {})

	test('should refuse components before connecting', () => {
		const engine = new HooklineEngine(config, { logger: createTestLogger().logger })
		expect(() => engine.components()).toThrow('Engine not connected. Call connect() first.')
	})

	test('should wire components on the configured queue driver', async () => {
		const { client } = fakeClient()
		const engine = new HooklineEngine(config, {
			logger: createTestLogger().logger,
			sqlFactory: () => client,
		})

		const components = await engine.connect()

		expect(components.sql).toBe(client)
		expect(components.queue).toBeInstanceOf(MemoryJobQueue)
		expect(await engine.connect()).toBe(components)
		expect(components.registry.availableEventTypes().eventTypes.length).toBeGreaterThan(0)
		await engine.stop()
	})

	test('should start and stop workers and sweeps', async () => {
		const { client, end } = fakeClient()
		const engine = new HooklineEngine(config, {
			logger: createTestLogger().logger,
			sqlFactory: () => client,
		})

		await engine.start()
		const { scheduler } = engine.components()
		expect(scheduler.isRunning(RETRY_SWEEP_TASK)).toBe(false)
		expect(scheduler.nextRun(RETENTION_SWEEP_TASK)).toBeNull()
		expect(await engine.healthCheck()).toBe(true)

		await engine.stop()

		expect(end).toHaveBeenCalledWith({ timeout: 5 })
		expect(() => engine.components()).toThrow()
	})
})
