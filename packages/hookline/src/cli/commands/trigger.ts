import { z } from 'zod'
import { Logger } from '../../logger/index.ts'
import type { JsonObject, JsonValue } from '../../webhooks/types.ts'
import { withEngine } from '../context.ts'

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
	z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValue), z.record(jsonValue)]),
)

const payloadSchema: z.ZodType<JsonObject> = z.record(jsonValue)

export function parsePayload(raw: string): JsonObject {
	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch (err) {
		throw new Error(`Payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`)
	}
	const result = payloadSchema.safeParse(parsed)
	if (!result.success) {
		throw new Error('Payload must be a JSON object')
	}
	return result.data
}

export async function triggerCommand(
	eventType: string,
	rawPayload: string,
	opts: { eventId?: string },
): Promise<void> {
	const report = new Logger().report(`hookline trigger ${eventType}`)
	const payload = parsePayload(rawPayload)

	const result = await withEngine(({ trigger }) => trigger.trigger(eventType, payload, opts.eventId))

	if (result.webhooksNotified === 0) {
		report.mark('warn', 'No subscribers', result.message)
	} else {
		for (const id of result.deliveryIds) report.mark('ok', 'Queued delivery', id)
	}
	report.close(result.message)
}
