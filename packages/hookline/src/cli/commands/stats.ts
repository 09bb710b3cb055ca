import { Logger } from '../../logger/index.ts'
import { withEngine } from '../context.ts'

export async function statsCommand(webhookId: string, opts: { days?: number }): Promise<void> {
	const report = new Logger().report(`hookline stats ${webhookId}`)
	const stats = await withEngine(({ manager }) => manager.getStats(webhookId, opts.days))

	report.mark('info', 'Window', `${stats.windowDays} day(s)`)
	report.mark('info', 'Total', String(stats.total))
	report.mark('ok', 'Successful', String(stats.successful))
	report.mark('error', 'Failed', String(stats.failed))
	report.mark('info', 'In progress', String(stats.pending))
	report.mark(
		'info',
		'Average duration',
		stats.averageDurationMs === null ? 'n/a' : `${stats.averageDurationMs}ms`,
	)
	report.close(`Success rate ${stats.successRate}%`)
}
