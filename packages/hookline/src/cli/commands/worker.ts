import { once } from 'node:events'
import { loadConfig } from '../../config/loader.ts'
import { HooklineEngine } from '../../engine.ts'
import { describeSchedule } from '../../runtime/scheduler.ts'

/**
 * Run the dispatch workers and periodic sweeps until SIGINT or SIGTERM.
 */
export async function workerCommand(opts: { concurrency?: number }): Promise<void> {
	const loaded = await loadConfig()
	const config = opts.concurrency
		? { ...loaded, queue: { ...loaded.queue, concurrency: opts.concurrency } }
		: loaded

	const engine = new HooklineEngine(config)
	const report = engine.logger.report('hookline worker')
	report.mark('info', 'Queue', `${config.queue.driver}, concurrency ${config.queue.concurrency}`)
	report.mark('info', 'Retry sweep', describeSchedule(config.retrySweep.schedule))
	report.mark('info', 'Retention', `${config.retention.days} days, ${describeSchedule(config.retention.schedule)}`)

	try {
		await engine.start()
	} catch (err) {
		report.close(err instanceof Error ? err.message : String(err), 'failed')
		await engine.stop()
		process.exitCode = 1
		return
	}
	report.mark('ok', 'Worker running', 'press Ctrl+C to stop')

	await Promise.race([once(process, 'SIGINT'), once(process, 'SIGTERM')])
	engine.logger.info('[Worker] Shutting down')
	await engine.stop()
	report.close('Stopped')
}
