import { Writable } from 'node:stream'
import { describe, expect, test } from 'vitest'
import { Logger, type LogLevel } from '../src/logger/index.ts'

const capture = (level: LogLevel) => {
	const chunks: string[] = []
	const output = new Writable({
		write(chunk, _encoding, callback) {
			chunks.push(String(chunk))
			callback()
		},
	})
	const logger = new Logger({ level, output })
	const entries: Array<{ level: string; msg: string; meta: Record<string, unknown> }> = []
	logger.addListener((lvl, msg, meta) => {
		entries.push({ level: lvl, msg, meta })
	})
	return { logger, entries, chunks }
}

describe('Logger', () => {
	test('should drop entries below the minimum level', () => {
		const { logger, entries } = capture('warn')

		logger.debug('noise')
		logger.info('noise')
		logger.warn('careful')
		logger.error('broken')

		expect(entries.map((e) => [e.level, e.msg])).toEqual([
			['WARNING', 'careful'],
			['ERROR', 'broken'],
		])
	})

	test('should default to info', () => {
		const logger = new Logger({ output: new Writable({ write: (_c, _e, cb) => cb() }) })
		const levels: string[] = []
		logger.addListener((lvl) => levels.push(lvl))

		logger.debug('hidden')
		logger.info('shown')

		expect(levels).toEqual(['INFO'])
	})

	test('should merge child metadata and notify parent listeners', () => {
		const { logger, entries } = capture('debug')
		const child = logger.child({ component: 'queue' }).child({ jobId: 'j_1' })

		child.info('[Queue] Job started', { attempt: 2 })

		expect(entries).toEqual([
			{
				level: 'INFO',
				msg: '[Queue] Job started',
				meta: { component: 'queue', jobId: 'j_1', attempt: 2 },
			},
		])
	})

	test('should wrap errors and primitives in metadata', () => {
		const { logger, entries } = capture('debug')
		const error = new Error('boom')

		logger.error('failed', error)
		logger.info('count', 42)

		expect(entries[0]?.meta).toEqual({ error })
		expect(entries[1]?.meta).toEqual({ detail: 42 })
	})

	test('should write the message to its output', () => {
		const { logger, chunks } = capture('info')
		logger.info('[Worker] Ready')
		expect(chunks.join('')).toContain('[Worker] Ready')
	})

	describe('report', () => {
		test('should write one line per mark between the opening and closing lines', () => {
			const { logger, chunks } = capture('info')

			const report = logger.report('hookline worker')
			report.mark('info', 'Queue', 'memory').mark('ok', 'Worker running')
			report.close('Stopped')

			const lines = chunks.join('').split('\n')
			expect(lines).toHaveLength(7)
			expect(lines[0]).toMatch(/hookline worker$/)
			expect(lines[1]).toMatch(/Queue: memory$/)
			expect(lines[2]).toMatch(/Worker running$/)
			expect(lines[4]).toContain('Stopped')
			expect(lines[4]).toMatch(/\(\d+ms\)/)
			expect(lines.slice(5)).toEqual(['', ''])
		})

		test('should not log through listeners', () => {
			const { logger, entries } = capture('debug')
			logger.report('hookline cleanup').close('Removed 0 deliveries', 'failed')
			expect(entries).toEqual([])
		})
	})
})
