import { beforeEach, describe, expect, test, vi } from 'vitest'
import { createWebhookHarness, type WebhookHarness } from '../src/test/harness.ts'
import type { FetchLike } from '../src/webhooks/http-sender.ts'

describe('EventTrigger', () => {
	let h: WebhookHarness
	let fetchMock: ReturnType<typeof vi.fn<FetchLike>>

	const register = async (name: string, events: string[], isActive = true) => {
		const webhook = await h.webhooks.create({
			name,
			url: `https://example.com/${name}`,
			secret: 'test-secret',
			isActive,
			timeoutSeconds: 30,
			maxAttempts: 4,
		})
		for (const event of events) await h.registry.subscribe(webhook.id, event)
		return webhook
	}

	beforeEach(() => {
		fetchMock = vi.fn<FetchLike>(async () => new Response('ok', { status: 200 }))
		h = createWebhookHarness({ fetch: fetchMock })
	})

	test('should create nothing when no webhook is subscribed', async () => {
		await register('other', ['order.completed'])

		const result = await h.trigger.trigger('user.created', { id: 'u_1' })

		expect(result).toEqual({
			eventType: 'user.created',
			eventId: null,
			webhooksNotified: 0,
			deliveryIds: [],
			message: 'No active webhooks subscribed to user.created',
		})
		expect(h.deliveries.count()).toBe(0)
		expect(h.queue.list()).toHaveLength(0)
	})

	test('should create one delivery per active subscriber only', async () => {
		const a = await register('a', ['user.created'])
		const b = await register('b', ['user.created', 'user.deleted'])
		await register('inactive', ['user.created'], false)
		await register('other-event', ['user.deleted'])
		const paused = await register('paused-subscription', ['user.created'])
		await h.registry.toggle(paused.id, 'user.created', false)

		const result = await h.trigger.trigger('user.created', { id: 'u_1' }, 'evt_42')

		expect(result.webhooksNotified).toBe(2)
		expect(result.deliveryIds).toHaveLength(2)
		expect(result.message).toBe('Event user.created queued for 2 webhook(s)')
		const rows = h.deliveries.all()
		expect(rows.map((d) => d.webhookId).sort()).toEqual([a.id, b.id].sort())
		expect(rows.every((d) => d.status === 'pending' && d.eventId === 'evt_42')).toBe(true)
		expect(rows.every((d) => d.maxAttempts === 4)).toBe(true)
	})

	test('should enqueue a dispatch job per delivery and not wait for it', async () => {
		await register('a', ['user.created'])

		const { deliveryIds } = await h.trigger.trigger('user.created', { id: 'u_1' })

		expect(fetchMock).not.toHaveBeenCalled()
		expect(h.queue.list().map((job) => job.data)).toEqual([{ deliveryId: deliveryIds[0] }])

		await h.queue.drain()
		expect(fetchMock).toHaveBeenCalledTimes(1)
		expect((await h.deliveries.get(deliveryIds[0] ?? ''))?.status).toBe('success')
	})

	test('should keep going when one subscriber fails', async () => {
		const a = await register('a', ['user.created'])
		const b = await register('b', ['user.created'])
		const c = await register('c', ['user.created'])
		const create = h.deliveries.create.bind(h.deliveries)
		vi.spyOn(h.deliveries, 'create').mockImplementation(async (input) => {
			if (input.webhookId === b.id) throw new Error('insert failed')
			return create(input)
		})

		const result = await h.trigger.trigger('user.created', { id: 'u_1' })

		expect(result.webhooksNotified).toBe(2)
		expect(h.deliveries.all().map((d) => d.webhookId).sort()).toEqual([a.id, c.id].sort())
		expect(h.logs.some((log) => log.level === 'ERROR' && log.meta.webhookId === b.id)).toBe(true)
	})

	test('should fail a delivery whose enqueue failed instead of leaving it pending', async () => {
		await register('a', ['user.created'])
		await register('b', ['user.created'])
		vi.spyOn(h.queue, 'push').mockRejectedValueOnce(new Error('queue unavailable'))

		const result = await h.trigger.trigger('user.created', { id: 'u_1' })

		expect(result.webhooksNotified).toBe(1)
		expect(result.deliveryIds).toHaveLength(1)
		const orphan = h.deliveries.all().find((d) => !result.deliveryIds.includes(d.id))
		expect(orphan).toMatchObject({
			status: 'failed',
			attemptCount: 0,
			errorMessage: 'Enqueue failed: queue unavailable',
		})
		expect(await h.retries.sweepRetries()).toEqual({ due: 0, enqueued: 0 })
	})

	test('should log when the unqueued delivery cannot be closed either', async () => {
		await register('a', ['user.created'])
		vi.spyOn(h.queue, 'push').mockRejectedValueOnce(new Error('queue unavailable'))
		vi.spyOn(h.deliveries, 'updateStatus').mockRejectedValueOnce(new Error('db down'))

		const result = await h.trigger.trigger('user.created', { id: 'u_1' })

		expect(result.webhooksNotified).toBe(0)
		const closeError = h.logs.find((log) => log.msg === '[Trigger] Failed to close unqueued delivery')
		expect(closeError?.meta.error).toBe('db down')
	})

	test('should trigger a batch and report each event', async () => {
		await register('a', ['user.created', 'order.completed'])

		const results = await h.trigger.triggerBatch([
			{ eventType: 'user.created', payload: { id: 'u_1' } },
			{ eventType: '   ', payload: {} },
			{ eventType: 'order.completed', payload: { id: 'o_1' }, eventId: 'evt_7' },
		])

		expect(results.map((r) => r.ok)).toEqual([true, false, true])
		const failed = results[1]
		expect(failed?.ok === false && failed.error).toBe('Event type cannot be empty')
		expect(h.deliveries.count()).toBe(2)
	})
})
