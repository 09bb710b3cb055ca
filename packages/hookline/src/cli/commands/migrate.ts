import { Logger } from '../../logger/index.ts'
import { parsePositiveInt, withEngine } from '../context.ts'

export async function migrateCommand(subcommand = 'run', steps?: string): Promise<void> {
	const report = new Logger().report('hookline migrate')

	await withEngine(async ({ migrator }) => {
		switch (subcommand) {
			case 'status': {
				const statuses = await migrator.status()
				for (const s of statuses) {
					const detail = s.appliedAt ? s.appliedAt.toLocaleString() : 'pending'
					if (s.status === 'applied') report.mark('ok', `${s.id}_${s.name}`, detail)
					else report.mark('info', `${s.id}_${s.name}`, detail)
				}
				report.close(`${statuses.filter((s) => s.status === 'pending').length} pending`)
				return
			}
			case 'rollback': {
				const count = steps ? parsePositiveInt(steps, 'steps') : 1
				const result = await migrator.rollback(count)
				for (const name of result.rolledBack) report.mark('ok', 'Rolled back', name)
				report.close(
					result.rolledBack.length === 0
						? 'No migrations to roll back'
						: `Rolled back ${result.rolledBack.length} migration(s)`,
				)
				return
			}
			case 'run': {
				report.mark('progress', 'Running pending migrations')
				const result = await migrator.run()
				for (const name of result.applied) report.mark('ok', 'Applied', name)
				report.close(
					result.applied.length === 0
						? 'No pending migrations'
						: `Applied ${result.applied.length} migration(s)`,
				)
				return
			}
			default:
				report.close(`Unknown subcommand: ${subcommand}`, 'failed')
				process.exitCode = 1
		}
	})
}
