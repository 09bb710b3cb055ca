import { loadConfig } from '../config/loader.ts'
import type { HooklineConfig } from '../config/types.ts'
import { type EngineComponents, HooklineEngine } from '../engine.ts'

/**
 * Load configuration, connect an engine, run `fn`, and always close the
 * pool afterwards.
 */
export async function withEngine<T>(
	fn: (components: EngineComponents, engine: HooklineEngine) => Promise<T>,
	adjust?: (config: HooklineConfig) => HooklineConfig,
): Promise<T> {
	const loaded = await loadConfig()
	const engine = new HooklineEngine(adjust ? adjust(loaded) : loaded)
	try {
		const components = await engine.connect()
		return await fn(components, engine)
	} finally {
		await engine.stop()
	}
}

/** Parse a positive integer option, or fail with a usage message */
export function parsePositiveInt(value: string, label: string): number {
	const n = Number(value)
	if (!Number.isInteger(n) || n < 1) {
		throw new Error(`${label} must be a positive integer, got "${value}"`)
	}
	return n
}
