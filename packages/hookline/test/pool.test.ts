import { describe, expect, test, vi } from 'vitest'
import type { SQL } from '../src/db/client.ts'
import { DatabasePool, type SQLFactory } from '../src/db/pool.ts'
import { createTestLogger } from '../src/test/logger.ts'

// Client stand-in whose queries resolve, or reject with the given error
const fakeClient = (error?: Error) => {
	const query = async () => {
		if (error) throw error
		return [{ '?column?': 1 }]
	}
	return Object.assign(query, { end: vi.fn(async () => {}) }) as any as SQL
}

describe('DatabasePool', () => {
	test('should retry until the database answers', async () => {
		const clients = [fakeClient(new Error('ECONNREFUSED')), fakeClient()]
		const factory = vi.fn<SQLFactory>(() => clients.shift() ?? fakeClient())
		const { logger, logs } = createTestLogger()
		const pool = new DatabasePool({ url: 'postgres://localhost/test', retryDelayMs: 1 }, logger, factory)

		const sql = await pool.connect()

		expect(factory).toHaveBeenCalledTimes(2)
		expect(factory.mock.calls[0]?.[0]).toBe('postgres://localhost/test')
		expect(pool.getPool()).toBe(sql)
		expect(pool.isConnected()).toBe(true)
		expect(logs.filter((log) => log.msg === '[Database] Connection attempt failed')).toHaveLength(1)
		await pool.close()
		expect(pool.isConnected()).toBe(false)
	})

	test('should give up after the configured attempts', async () => {
		const { logger } = createTestLogger()
		const pool = new DatabasePool(
			{ url: 'postgres://localhost/test', retryAttempts: 2, retryDelayMs: 1 },
			logger,
			() => fakeClient(new Error('ECONNREFUSED')),
		)

		await expect(pool.connect()).rejects.toThrow(
			'Failed to connect to database after 2 attempts: ECONNREFUSED',
		)
		expect(pool.getState().consecutiveFailures).toBe(2)
		expect(() => pool.getPool()).toThrow('Database pool not initialized. Call connect() first.')
	})

	test('should report unhealthy before connecting', async () => {
		const { logger } = createTestLogger()
		const pool = new DatabasePool({}, logger, () => fakeClient())
		expect(await pool.healthCheck()).toBe(false)
	})
})
