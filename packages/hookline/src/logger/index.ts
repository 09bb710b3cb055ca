import { prettyPrint } from './pretty-print.ts'
import { CommandReport } from './report.ts'
import type { LoggerOptions, LogLevel } from './types.ts'

export type { LoggerOptions, LogLevel } from './types.ts'
export { CommandReport, type MarkKind, type ReportOutcome } from './report.ts'

const LEVELS = {
	DEBUG: 10,
	INFO: 20,
	WARNING: 30,
	ERROR: 40,
	CRITICAL: 50,
} as const

type LevelName = keyof typeof LEVELS

const levelMap: Record<LogLevel, number> = {
	debug: LEVELS.DEBUG,
	info: LEVELS.INFO,
	warn: LEVELS.WARNING,
	error: LEVELS.ERROR,
	critical: LEVELS.CRITICAL,
}

export type LogListener = (
	level: LevelName,
	msg: string,
	meta: Record<string, unknown>,
) => void

function toMeta(args: unknown): Record<string, unknown> {
	if (args instanceof Error) return { error: args }
	if (args && typeof args === 'object') return { ...args }
	if (args === undefined) return {}
	return { detail: args }
}

export class Logger {
	private readonly listeners: LogListener[] = []
	private readonly minLevel: number

	constructor(
		private readonly options: LoggerOptions = {},
		private readonly meta: Record<string, unknown> = {},
		private readonly parent?: Logger,
	) {
		this.minLevel = options.level ? levelMap[options.level] : LEVELS.INFO
	}

	/** Create a child logger with additional metadata */
	public child(meta: Record<string, unknown>): Logger {
		return new Logger(this.options, { ...this.meta, ...meta }, this)
	}

	/** Open a command report on this logger's output */
	public report(title: string): CommandReport {
		return new CommandReport(title, this.options.output ?? process.stdout)
	}

	private shouldLog(messageLevel: number): boolean {
		return messageLevel >= this.minLevel
	}

	private _log(level: LevelName, msg: string, args?: unknown): void {
		const meta: Record<string, unknown> = { ...this.meta, ...toMeta(args) }
		const isVerbose = this.options.verbose ?? false
		prettyPrint(
			{ level, time: Date.now(), msg, ...meta },
			this.options.output ?? process.stdout,
			!isVerbose,
		)

		this.notify(level, msg, meta)
	}

	private notify(level: LevelName, msg: string, meta: Record<string, unknown>): void {
		for (const listener of this.listeners) listener(level, msg, meta)
		this.parent?.notify(level, msg, meta)
	}

	public debug(message: string, args?: unknown): void {
		if (this.shouldLog(LEVELS.DEBUG)) this._log('DEBUG', message, args)
	}

	public info(message: string, args?: unknown): void {
		if (this.shouldLog(LEVELS.INFO)) this._log('INFO', message, args)
	}

	public warn(message: string, args?: unknown): void {
		if (this.shouldLog(LEVELS.WARNING)) this._log('WARNING', message, args)
	}

	public error(message: string, args?: unknown): void {
		if (this.shouldLog(LEVELS.ERROR)) this._log('ERROR', message, args)
	}

	public critical(message: string, args?: unknown): void {
		if (this.shouldLog(LEVELS.CRITICAL)) this._log('CRITICAL', message, args)
	}

	public addListener(listener: LogListener): void {
		this.listeners.push(listener)
	}
}
