import type { Logger } from '../logger/index.ts'
import type { SQL } from './client.ts'
import { type Migration, WEBHOOK_MIGRATIONS } from './migrations.ts'

export interface AppliedMigration {
	id: string
	name: string
	applied_at: Date
}

export interface MigrationStatus {
	id: string
	name: string
	status: 'applied' | 'pending'
	appliedAt: Date | null
}

/**
 * Applies the in-code migrations, each in its own transaction, and records
 * them in `_hookline_migrations`.
 */
export class Migrator {
	constructor(
		private readonly sql: SQL,
		private readonly logger: Logger,
		private readonly migrations: Migration[] = WEBHOOK_MIGRATIONS,
	) {}

	async ensureTable(): Promise<void> {
		await this.sql`
			CREATE TABLE IF NOT EXISTS _hookline_migrations (
				id VARCHAR(20) PRIMARY KEY,
				name VARCHAR(255) NOT NULL,
				applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
			)
		`
	}

	async getApplied(): Promise<AppliedMigration[]> {
		await this.ensureTable()
		const rows = await this.sql<AppliedMigration[]>`
			SELECT id, name, applied_at FROM _hookline_migrations ORDER BY id ASC
		`
		return [...rows]
	}

	async getPending(): Promise<Migration[]> {
		const applied = new Set((await this.getApplied()).map((m) => m.id))
		return this.migrations.filter((m) => !applied.has(m.id))
	}

	async status(): Promise<MigrationStatus[]> {
		const applied = new Map((await this.getApplied()).map((m) => [m.id, m]))
		return this.migrations.map((m) => {
			const entry = applied.get(m.id)
			return {
				id: m.id,
				name: m.name,
				status: entry ? 'applied' : 'pending',
				appliedAt: entry?.applied_at ?? null,
			}
		})
	}

	/** Run all pending migrations in order */
	async run(): Promise<{ applied: string[] }> {
		const pending = await this.getPending()
		const applied: string[] = []

		for (const migration of pending) {
			try {
				await this.sql.begin(async (tx) => {
					await tx.unsafe(migration.up)
					await tx.unsafe('INSERT INTO _hookline_migrations (id, name) VALUES ($1, $2)', [
						migration.id,
						migration.name,
					])
				})
			} catch (err) {
				throw new Error(
					`Migration ${migration.id}_${migration.name} failed: ${err instanceof Error ? err.message : String(err)}`,
				)
			}
			applied.push(`${migration.id}_${migration.name}`)
			this.logger.info('[Migrator] Applied migration', { id: migration.id, name: migration.name })
		}

		return { applied }
	}

	/** Roll back the last `steps` applied migrations, newest first */
	async rollback(steps = 1): Promise<{ rolledBack: string[] }> {
		const applied = await this.getApplied()
		const toRollback = applied.slice(-steps).reverse()
		const rolledBack: string[] = []

		for (const entry of toRollback) {
			const migration = this.migrations.find((m) => m.id === entry.id)
			if (!migration) {
				throw new Error(`Migration ${entry.id} is applied but unknown to this version`)
			}

			await this.sql.begin(async (tx) => {
				await tx.unsafe(migration.down)
				await tx.unsafe('DELETE FROM _hookline_migrations WHERE id = $1', [migration.id])
			})
			rolledBack.push(`${migration.id}_${migration.name}`)
			this.logger.info('[Migrator] Rolled back migration', { id: migration.id })
		}

		return { rolledBack }
	}
}
