import { Command, InvalidArgumentError } from 'commander'
import { eventTypesCommand } from './commands/event-types.ts'
import { migrateCommand } from './commands/migrate.ts'
import { statsCommand } from './commands/stats.ts'
import { cleanupCommand, retrySweepCommand } from './commands/sweeps.ts'
import { triggerCommand } from './commands/trigger.ts'
import { workerCommand } from './commands/worker.ts'

const version = '0.1.0'

function positiveInt(value: string): number {
	const n = Number(value)
	if (!Number.isInteger(n) || n < 1) {
		throw new InvalidArgumentError('Must be a positive integer.')
	}
	return n
}

export function createProgram(): Command {
	const program = new Command()

	program
		.name('hookline')
		.description('Outbound webhook delivery and retry engine')
		.version(version)

	program
		.command('migrate [subcommand] [steps]')
		.description('Apply migrations (subcommands: run, status, rollback [steps])')
		.action(async (subcommand?: string, steps?: string) => {
			await migrateCommand(subcommand, steps)
		})

	program
		.command('worker')
		.description('Run dispatch workers and the retry / retention sweeps')
		.option('--concurrency <n>', 'Jobs executed at once', positiveInt)
		.action(async (opts: { concurrency?: number }) => {
			await workerCommand(opts)
		})

	program
		.command('trigger <eventType> [payload]')
		.description('Fan an event out to every active subscriber')
		.option('--event-id <id>', 'External event identifier')
		.action(async (eventType: string, payload: string | undefined, opts: { eventId?: string }) => {
			await triggerCommand(eventType, payload ?? '{}', opts)
		})

	program
		.command('retry-sweep')
		.description('Re-enqueue deliveries whose retry is due, once')
		.action(async () => {
			await retrySweepCommand()
		})

	program
		.command('cleanup')
		.description('Delete delivery history older than the retention window')
		.option('--days <n>', 'Retention window in days', positiveInt)
		.action(async (opts: { days?: number }) => {
			await cleanupCommand(opts)
		})

	program
		.command('stats <webhookId>')
		.description('Delivery statistics for one webhook')
		.option('--days <n>', 'Window in days', positiveInt, 7)
		.action(async (webhookId: string, opts: { days?: number }) => {
			await statsCommand(webhookId, opts)
		})

	program
		.command('event-types')
		.description('List the advertised event types')
		.action(() => {
			eventTypesCommand()
		})

	return program
}
