import isUnicodeSupported from 'is-unicode-supported'
import pc from 'picocolors'

export type MarkKind = 'info' | 'progress' | 'ok' | 'warn' | 'error'
export type ReportOutcome = 'done' | 'failed'

type Paint = (text: string) => string

const glyphs = isUnicodeSupported()
	? { open: '┌', rail: '│', close: '└', info: '◇', progress: '●', ok: '✔', warn: '▲', error: '✖' }
	: { open: 'T', rail: '|', close: '-', info: 'o', progress: '>', ok: '√', warn: '!', error: 'x' }

const markPaint: Record<MarkKind, Paint> = {
	info: pc.green,
	progress: pc.cyan,
	ok: pc.green,
	warn: pc.yellow,
	error: pc.red,
}

/**
 * Line-per-event report for one CLI command, drawn on a rail:
 *
 *   ┌  hookline migrate
 *   ✔  Applied: 001_webhooks
 *   │
 *   └  1 applied (12ms)
 */
export class CommandReport {
	private readonly openedAt = Date.now()

	constructor(
		title: string,
		private readonly output: NodeJS.WritableStream = process.stdout,
	) {
		this.line(pc.gray(glyphs.open), title)
	}

	mark(kind: MarkKind, label: string, detail?: string): this {
		this.line(markPaint[kind](glyphs[kind]), detail ? `${label}: ${detail}` : label)
		return this
	}

	close(message: string, outcome: ReportOutcome = 'done'): void {
		const paint = outcome === 'done' ? pc.green : pc.red
		this.output.write(`${pc.gray(glyphs.rail)}\n`)
		this.line(pc.gray(glyphs.close), paint(message) + pc.gray(` (${Date.now() - this.openedAt}ms)`))
		this.output.write('\n')
	}

	private line(glyph: string, text: string): void {
		this.output.write(`${glyph}  ${text}\n`)
	}
}
