import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { HooklineConfig } from './types.ts'
import { validateConfig } from './validator.ts'

export const CONFIG_FILE = 'hookline.config.json'

type Env = Record<string, string | undefined>

function toInt(value: string | undefined): number | string | undefined {
	if (value === undefined || value === '') return undefined
	const n = Number(value)
	// Leave non-numeric values in place so validation reports them
	return Number.isInteger(n) ? n : value
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Overlays environment variables on a raw config object and validates it.
 * Environment wins over file values.
 */
export function resolveConfig(fileConfig: unknown = {}, env: Env = process.env): HooklineConfig {
	if (!isRecord(fileConfig)) return validateConfig(fileConfig)

	const raw: Record<string, unknown> = { ...fileConfig }
	const overlays: Array<[string, string, unknown]> = [
		['database', 'url', env.DATABASE_URL || undefined],
		['logger', 'level', env.HOOKLINE_LOG_LEVEL || undefined],
		['queue', 'driver', env.HOOKLINE_QUEUE_DRIVER || undefined],
		['queue', 'concurrency', toInt(env.HOOKLINE_QUEUE_CONCURRENCY)],
		['delivery', 'maxAttempts', toInt(env.HOOKLINE_MAX_ATTEMPTS)],
		['retention', 'days', toInt(env.HOOKLINE_RETENTION_DAYS)],
	]

	for (const [section, field, value] of overlays) {
		if (value === undefined) continue
		const current = raw[section]
		raw[section] = { ...(isRecord(current) ? current : {}), [field]: value }
	}

	return validateConfig(raw)
}

/**
 * Loads `hookline.config.json` from `cwd` (when present) and resolves it
 * against the environment.
 */
export async function loadConfig(
	cwd: string = process.cwd(),
	env: Env = process.env,
): Promise<HooklineConfig> {
	const fullPath = join(cwd, CONFIG_FILE)
	let fileConfig: unknown = {}

	if (existsSync(fullPath)) {
		const content = await readFile(fullPath, 'utf-8')
		try {
			fileConfig = JSON.parse(content)
		} catch (err) {
			throw new Error(
				`Failed to parse ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`,
			)
		}
	}

	return resolveConfig(fileConfig, env)
}
