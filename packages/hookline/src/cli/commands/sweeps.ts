import { Logger } from '../../logger/index.ts'
import { withEngine } from '../context.ts'

export async function retrySweepCommand(): Promise<void> {
	const report = new Logger().report('hookline retry-sweep')
	const result = await withEngine(({ retries }) => retries.sweepRetries())
	report.mark('info', 'Due deliveries', String(result.due))
	report.close(`Enqueued ${result.enqueued} retr${result.enqueued === 1 ? 'y' : 'ies'}`)
}

export async function cleanupCommand(opts: { days?: number }): Promise<void> {
	const report = new Logger().report('hookline cleanup')
	const removed = await withEngine(
		({ retries }) => retries.sweepRetention(),
		(config) =>
			opts.days ? { ...config, retention: { ...config.retention, days: opts.days } } : config,
	)
	report.close(`Removed ${removed} deliver${removed === 1 ? 'y' : 'ies'}`)
}
