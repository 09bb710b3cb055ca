import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest'
import { createWebhookHarness, type WebhookHarness } from '../src/test/harness.ts'
import { DeliveryDispatcher } from '../src/webhooks/dispatcher.ts'
import { type FetchLike, HttpSender } from '../src/webhooks/http-sender.ts'
import { canonicalJson, verifyRequest } from '../src/webhooks/signature.ts'
import type { JsonObject, Webhook } from '../src/webhooks/types.ts'

const T0 = new Date('2024-05-10T08:00:00.000Z')
const SECOND = 1000

const respond = (status: number, body = '') => vi.fn<FetchLike>(async () => new Response(body, { status }))

describe('DeliveryDispatcher', () => {
	let fetchMock: ReturnType<typeof respond>
	let h: WebhookHarness

	const addWebhook = (overrides: Partial<Webhook> = {}) =>
		h.webhooks.create({
			name: 'Orders',
			url: 'https://example.com/hooks/orders',
			secret: 'test-secret',
			timeoutSeconds: 30,
			maxAttempts: 5,
			...overrides,
		})

	const addDelivery = async (webhook: Webhook, payload: JsonObject = { order: 'o_1', total: 12.5 }) =>
		h.deliveries.create({
			webhookId: webhook.id,
			eventType: 'order.completed',
			payload,
			eventId: 'evt_1',
			maxAttempts: webhook.maxAttempts,
		})

	beforeEach(() => {
		vi.useFakeTimers({ toFake: ['Date'] })
		vi.setSystemTime(T0)
		fetchMock = respond(200, 'ok')
		h = createWebhookHarness({ fetch: fetchMock })
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	describe('successful delivery', () => {
		test('should reach success with one counted attempt', async () => {
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome).toEqual({
				deliveryId: delivery.id,
				status: 'success',
				attemptCount: 1,
				nextRetryAt: null,
			})
			const row = await h.deliveries.get(delivery.id)
			expect(row?.status).toBe('success')
			expect(row?.attemptCount).toBe(1)
			expect(row?.completedAt).toEqual(T0)
			expect(row?.nextRetryAt).toBeNull()
			expect(row?.statusCode).toBe(200)
			expect(row?.responseBody).toBe('ok')
		})

		test('should POST the canonical JSON body with a verifiable signature', async () => {
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook, { total: 12.5, order: 'o_1' })

			await h.dispatcher.dispatch(delivery.id)

			expect(fetchMock).toHaveBeenCalledTimes(1)
			const [url, init] = fetchMock.mock.calls[0] ?? []
			expect(url).toBe('https://example.com/hooks/orders')
			expect(init?.method).toBe('POST')
			expect(init?.body).toBe('{"order":"o_1","total":12.5}')

			const headers = init?.headers as Record<string, string>
			expect(headers['Content-Type']).toBe('application/json')
			expect(headers['User-Agent']).toBe('Hookline-Webhooks/1.0')
			expect(headers['X-Webhook-Event']).toBe('order.completed')
			expect(headers['X-Webhook-Delivery']).toBe(delivery.id)
			expect(headers['X-Webhook-Event-ID']).toBe('evt_1')
			expect(verifyRequest('{"order":"o_1","total":12.5}', headers, 'test-secret')).toBe(true)
		})

		test('should persist the request URL and headers for audit', async () => {
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)

			await h.dispatcher.dispatch(delivery.id)

			const row = await h.deliveries.get(delivery.id)
			expect(row?.requestUrl).toBe('https://example.com/hooks/orders')
			expect(row?.requestHeaders?.['X-Webhook-Delivery']).toBe(delivery.id)
			expect(row?.sentAt).toEqual(T0)
		})

		test('should not let custom headers override reserved headers', async () => {
			const webhook = await addWebhook({
				customHeaders: {
					'x-webhook-signature': 'sha256=forged',
					'content-type': 'text/plain',
					'X-Tenant': 'acme',
				},
			})
			const delivery = await addDelivery(webhook)

			await h.dispatcher.dispatch(delivery.id)

			const headers = fetchMock.mock.calls[0]?.[1]?.headers as Record<string, string>
			expect(headers['X-Tenant']).toBe('acme')
			expect(headers['content-type']).toBeUndefined()
			expect(headers['x-webhook-signature']).toBeUndefined()
			expect(headers['Content-Type']).toBe('application/json')
			expect(headers['X-Webhook-Signature']).not.toBe('sha256=forged')
		})

		test('should truncate large response bodies', async () => {
			h = createWebhookHarness({ fetch: respond(200, 'r'.repeat(15_000)) })
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)

			await h.dispatcher.dispatch(delivery.id)

			expect((await h.deliveries.get(delivery.id))?.responseBody).toHaveLength(10_000)
		})
	})

	describe('retry and failure', () => {
		test('should retry on 500 and fail after max attempts', async () => {
			h = createWebhookHarness({ fetch: respond(500, 'boom') })
			const webhook = await addWebhook({ maxAttempts: 3 })
			const result = await h.trigger.trigger('order.created', { order: 'o_2' })
			expect(result.webhooksNotified).toBe(0)

			await h.registry.subscribe(webhook.id, 'order.created')
			const { deliveryIds } = await h.trigger.trigger('order.created', { order: 'o_2' })
			const id = deliveryIds[0] ?? ''

			await h.queue.drain()
			let row = await h.deliveries.get(id)
			expect(row?.status).toBe('retrying')
			expect(row?.attemptCount).toBe(1)
			expect(row?.nextRetryAt).toEqual(new Date(T0.getTime() + 60 * SECOND))
			expect(row?.statusCode).toBe(500)
			expect(row?.errorMessage).toBe('HTTP 500')

			const t1 = new Date(T0.getTime() + 60 * SECOND)
			vi.setSystemTime(t1)
			expect(await h.retries.sweepRetries()).toEqual({ due: 1, enqueued: 1 })
			await h.queue.drain()
			row = await h.deliveries.get(id)
			expect(row?.status).toBe('retrying')
			expect(row?.attemptCount).toBe(2)
			expect(row?.nextRetryAt).toEqual(new Date(t1.getTime() + 120 * SECOND))

			vi.setSystemTime(new Date(t1.getTime() + 120 * SECOND))
			await h.retries.sweepRetries()
			await h.queue.drain()
			row = await h.deliveries.get(id)
			expect(row?.status).toBe('failed')
			expect(row?.attemptCount).toBe(3)
			expect(row?.nextRetryAt).toBeNull()
			expect(row?.completedAt).not.toBeNull()

			vi.setSystemTime(new Date(t1.getTime() + 3600 * SECOND))
			expect(await h.deliveries.pendingRetries()).toEqual([])
		})

		test('should back off 60, 120, 240 and 480 seconds with the defaults', async () => {
			h = createWebhookHarness({ fetch: respond(503) })
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)

			const delays: number[] = []
			let now = T0.getTime()
			for (let attempt = 0; attempt < 4; attempt++) {
				const outcome = await h.dispatcher.dispatch(delivery.id)
				expect(outcome.status).toBe('retrying')
				const next = outcome.nextRetryAt?.getTime() ?? 0
				delays.push((next - now) / SECOND)
				now = next
				vi.setSystemTime(new Date(now))
			}
			expect(delays).toEqual([60, 120, 240, 480])

			const last = await h.dispatcher.dispatch(delivery.id)
			expect(last.status).toBe('failed')
			expect(last.attemptCount).toBe(5)
		})

		test('should record timeouts as transient failures', async () => {
			const timeout = Object.assign(new Error('The operation was aborted due to timeout'), {
				name: 'TimeoutError',
			})
			h = createWebhookHarness({ fetch: vi.fn<FetchLike>(async () => Promise.reject(timeout)) })
			const webhook = await addWebhook({ timeoutSeconds: 5 })
			const delivery = await addDelivery(webhook)

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome.status).toBe('retrying')
			expect(outcome.reason).toBe('Timeout after 5s')
			const row = await h.deliveries.get(delivery.id)
			expect(row?.statusCode).toBeNull()
			expect(row?.errorMessage).toBe('Timeout after 5s')
		})

		test('should record network errors with their cause', async () => {
			const failure = new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:9') })
			h = createWebhookHarness({ fetch: vi.fn<FetchLike>(async () => Promise.reject(failure)) })
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome.status).toBe('retrying')
			expect((await h.deliveries.get(delivery.id))?.errorMessage).toBe(
				'fetch failed: connect ECONNREFUSED 127.0.0.1:9',
			)
		})

		test('should fold an unexpected sender exception into a retry', async () => {
			const sender = new HttpSender()
			vi.spyOn(sender, 'send').mockRejectedValue(new Error('boom'))
			const dispatcher = new DeliveryDispatcher(h.deliveries, h.webhooks, sender, h.logger)
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)

			const outcome = await dispatcher.dispatch(delivery.id)

			expect(outcome.status).toBe('retrying')
			const row = await h.deliveries.get(delivery.id)
			expect(row?.status).toBe('retrying')
			expect(row?.errorMessage).toBe('Unexpected error: boom')
		})

		test('should fail without retry for a URL that is not http', async () => {
			const webhook = await addWebhook({ url: 'ftp://example.com/drop' })
			const delivery = await addDelivery(webhook)

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome.status).toBe('failed')
			expect(outcome.reason).toBe('Unsupported URL scheme: ftp:')
			expect(fetchMock).not.toHaveBeenCalled()
			expect((await h.deliveries.get(delivery.id))?.nextRetryAt).toBeNull()
		})

		test('should propagate a store failure while persisting the outcome', async () => {
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)
			const original = h.deliveries.updateStatus.bind(h.deliveries)
			vi.spyOn(h.deliveries, 'updateStatus').mockImplementation(async (id, status, details) => {
				if (status === 'success') throw new Error('connection terminated')
				return original(id, status, details)
			})

			await expect(h.dispatcher.dispatch(delivery.id)).rejects.toThrow('connection terminated')
			expect((await h.deliveries.get(delivery.id))?.status).toBe('sending')
		})
	})

	describe('loading step', () => {
		test('should skip an unknown delivery', async () => {
			const outcome = await h.dispatcher.dispatch('missing')
			expect(outcome).toEqual({ deliveryId: 'missing', status: 'skipped', reason: 'Delivery not found' })
		})

		test('should fail when the webhook no longer exists', async () => {
			const delivery = await h.deliveries.create({
				webhookId: 'wh_gone',
				eventType: 'order.completed',
				payload: {},
			})

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome.status).toBe('failed')
			expect(outcome.reason).toBe('Webhook wh_gone not found')
			expect(outcome.attemptCount).toBe(0)
			expect(fetchMock).not.toHaveBeenCalled()
		})

		test('should fail when the webhook is inactive', async () => {
			const webhook = await addWebhook({ isActive: false })
			const delivery = await addDelivery(webhook)

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome.reason).toBe(`Webhook ${webhook.id} is inactive`)
			expect((await h.deliveries.get(delivery.id))?.status).toBe('failed')
		})

		test('should fail a delivery whose attempts are used up', async () => {
			const webhook = await addWebhook({ maxAttempts: 1 })
			const delivery = await addDelivery(webhook)
			// a worker counted an attempt and crashed while the row was sending
			await h.deliveries.updateStatus(delivery.id, 'sending', { countAttempt: true })

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome.status).toBe('failed')
			expect(outcome.reason).toBe('max retry attempts exceeded')
			expect(fetchMock).not.toHaveBeenCalled()
		})

		test('should re-attempt a delivery left in sending', async () => {
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)
			await h.deliveries.updateStatus(delivery.id, 'sending')

			const outcome = await h.dispatcher.dispatch(delivery.id)

			expect(outcome.status).toBe('success')
			expect(fetchMock).toHaveBeenCalledTimes(1)
		})

		test('should be a no-op for terminal deliveries', async () => {
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)
			await h.dispatcher.dispatch(delivery.id)

			const again = await h.dispatcher.dispatch(delivery.id)

			expect(again.status).toBe('skipped')
			expect(again.reason).toBe('Delivery already success')
			expect(fetchMock).toHaveBeenCalledTimes(1)
		})

		test('should be a no-op for a retry that is not due', async () => {
			h = createWebhookHarness({ fetch: respond(500) })
			const webhook = await addWebhook()
			const delivery = await addDelivery(webhook)
			await h.dispatcher.dispatch(delivery.id)

			vi.setSystemTime(new Date(T0.getTime() + 30 * SECOND))
			const early = await h.dispatcher.dispatch(delivery.id)

			expect(early.status).toBe('skipped')
			expect(early.reason).toBe('Retry not due yet')
			expect((await h.deliveries.get(delivery.id))?.attemptCount).toBe(1)
		})
	})

	test('should keep attempt_count within max_attempts on every path', async () => {
		h = createWebhookHarness({ fetch: respond(500) })
		const webhook = await addWebhook({ maxAttempts: 2 })
		const delivery = await addDelivery(webhook)

		for (let i = 0; i < 6; i++) {
			await h.dispatcher.dispatch(delivery.id)
			vi.setSystemTime(new Date(Date.now() + 3600 * SECOND))
			const row = await h.deliveries.get(delivery.id)
			expect(row?.attemptCount).toBeLessThanOrEqual(2)
		}
		expect((await h.deliveries.get(delivery.id))?.status).toBe('failed')
	})

	test('should send exactly the canonical body of the stored payload', async () => {
		const webhook = await addWebhook()
		const payload = { z: [1, { b: 2, a: 1 }], a: 'ü' }
		const delivery = await addDelivery(webhook, payload)

		await h.dispatcher.dispatch(delivery.id)

		expect(fetchMock.mock.calls[0]?.[1]?.body).toBe(canonicalJson(payload))
	})
})
