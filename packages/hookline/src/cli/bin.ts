#!/usr/bin/env tsx
import { isConfigValidationError } from '../config/validator.ts'
import { errorMessage, isHooklineError } from '../utils/errors.ts'
import { createProgram } from './index.ts'

createProgram()
	.parseAsync(process.argv)
	.catch((err: unknown) => {
		if (isConfigValidationError(err)) {
			console.error(err.format())
		} else if (isHooklineError(err)) {
			console.error(`hookline: ${err.message} (${err.statusCode})`)
		} else {
			console.error(`hookline: ${errorMessage(err)}`)
		}
		process.exitCode = 1
	})
