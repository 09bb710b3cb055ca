/**
 * Config validation with field-level error reporting.
 */

import type { ZodError } from 'zod'
import { hooklineConfigSchema } from './schema.ts'
import type { HooklineConfig } from './types.ts'

export interface ValidationIssue {
	/** Dot-separated path to the invalid field (e.g., "delivery.maxAttempts") */
	path: string
	message: string
	expected?: string
	received?: unknown
}

export class ConfigValidationError extends Error {
	constructor(
		message: string,
		public readonly issues: ValidationIssue[],
	) {
		super(message)
		this.name = 'ConfigValidationError'
	}

	/**
	 * Formats the error as a human-readable string with all validation issues.
	 */
	format(): string {
		const lines = [this.message, '']
		for (const issue of this.issues) {
			lines.push(`  • ${issue.path}: ${issue.message}`)
			if (issue.expected) {
				lines.push(`    Expected: ${issue.expected}`)
			}
			if (issue.received !== undefined) {
				lines.push(`    Received: ${JSON.stringify(issue.received)}`)
			}
		}
		return lines.join('\n')
	}
}

function formatZodError(error: ZodError): ValidationIssue[] {
	return error.issues.map((issue) => ({
		path: issue.path.join('.') || '<root>',
		message: issue.message,
		expected: issue.code === 'invalid_type' ? String(issue.expected) : undefined,
		received: issue.code === 'invalid_type' ? issue.received : undefined,
	}))
}

/**
 * Validates a raw config object and fills in defaults.
 *
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(raw: unknown): HooklineConfig {
	const result = hooklineConfigSchema.safeParse(raw ?? {})
	if (!result.success) {
		throw new ConfigValidationError(
			'Invalid Hookline configuration',
			formatZodError(result.error),
		)
	}
	return result.data
}

export function isConfigValidationError(error: unknown): error is ConfigValidationError {
	return error instanceof ConfigValidationError
}
