import { Logger } from '../../logger/index.ts'
import { EVENT_CATALOG_VERSION, EVENT_TYPES } from '../../webhooks/event-catalog.ts'

export function eventTypesCommand(): void {
	const report = new Logger().report(`Event catalog ${EVENT_CATALOG_VERSION}`)
	for (const type of EVENT_TYPES) report.mark('info', type)
	report.close(`${EVENT_TYPES.length} event types`)
}
