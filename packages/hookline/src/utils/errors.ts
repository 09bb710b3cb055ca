// Error classes shared by every Hookline component.
// The management API surfaces these; the dispatcher and sweeps never throw them to the queue.

/**
 * Context metadata attached to errors for structured logging.
 */
export interface ErrorContext {
	/** Trace ID for correlating a job or request */
	traceId?: string
	/** Additional metadata */
	[key: string]: unknown
}

export class HooklineError extends Error {
	public readonly statusCode: number
	public readonly context?: ErrorContext

	constructor(message: string, statusCode = 500, context?: ErrorContext) {
		super(message)
		this.name = 'HooklineError'
		this.statusCode = statusCode
		this.context = context
	}

	/**
	 * Serializes error to JSON for structured logging.
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			statusCode: this.statusCode,
			context: this.context,
		}
	}
}

export function isHooklineError(error: unknown): error is HooklineError {
	return error instanceof HooklineError
}

/** Message of any thrown value, for logs and persisted error fields. */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message
	return String(error)
}
