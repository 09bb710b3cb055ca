import pc from 'picocolors'

const timestampTag = (timestamp: string) => pc.gray(timestamp)
const traceIdTag = (traceId?: unknown) =>
	typeof traceId === 'string' ? pc.gray(traceId) : ''
const componentTag = (component?: unknown) =>
	typeof component === 'string' ? pc.bold(pc.cyan(component)) : ''

const levelTags: Record<string, string> = {
	critical: pc.bgRed(pc.white('[CRITICAL]')),
	error: pc.red('[ERROR]'),
	warning: pc.yellow('[WARN]'),
	info: pc.blue('[INFO]'),
	debug: pc.gray('[DEBUG]'),
}

const numericTag = (value: string) => pc.green(value)
const stringTag = (value: string) => pc.cyan(value)
const booleanTag = (value: string) => pc.blue(value)

const arrayBrackets = ['[', ']'].map((s) => pc.gray(s))
const objectBrackets = ['{', '}'].map((s) => pc.gray(s))

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null

const prettyPrintObject = (
	obj: Record<string, unknown>,
	depth = 0,
	prefix = '',
): string => {
	const tab = prefix + (depth === 0 ? '' : '│ ')

	if (depth > 2) return `${tab} └ ${pc.gray('[...]')}`

	const entries = Object.entries(obj)
	return entries
		.map(([key, value], index) => {
			const isLast = index === entries.length - 1
			const branch = isLast ? '└' : '├'

			if (value instanceof Error) {
				return `${tab}${branch} ${key}: ${pc.red(value.message)}`
			}

			if (value instanceof Date) {
				return `${tab}${branch} ${key}: ${stringTag(value.toISOString())}`
			}

			if (isRecord(value)) {
				const subObject = prettyPrintObject(value, depth + 1, tab)
				const [start, end] = Array.isArray(value) ? arrayBrackets : objectBrackets
				return `${tab}${branch} ${key}: ${start}\n${subObject}\n${tab}${isLast ? ' ' : '│'} ${end}`
			}

			let printedValue = String(value)
			if (typeof value === 'number') printedValue = numericTag(printedValue)
			else if (typeof value === 'boolean') printedValue = booleanTag(printedValue)
			else if (typeof value === 'string') printedValue = stringTag(value)

			return `${tab}${branch} ${key}: ${printedValue}`
		})
		.join('\n')
}

export interface LogRecord {
	level: string
	time: number
	msg: string
	[key: string]: unknown
}

export const prettyPrint = (
	record: LogRecord,
	output: NodeJS.WritableStream,
	excludeDetails = false,
): void => {
	const { time, traceId, msg, level, component, ...details } = record
	const levelTag = levelTags[level.toLowerCase()] ?? levelTags.info
	const timestamp = timestampTag(`[${new Date(time).toLocaleTimeString()}]`)
	const objectHasKeys = Object.keys(details).length > 0

	output.write(
		`${timestamp} ${traceIdTag(traceId)} ${levelTag} ${componentTag(component)} ${msg}\n`,
	)

	if (objectHasKeys && !excludeDetails) {
		output.write(`${prettyPrintObject(details)}\n`)
	}
}
