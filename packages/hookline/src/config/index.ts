export { CONFIG_FILE, loadConfig, resolveConfig } from './loader.ts'
export { hooklineConfigSchema, scheduleSchema } from './schema.ts'
export type {
	DeliveryConfig,
	HooklineConfig,
	HooklineConfigInput,
	QueueConfig,
	Schedule,
} from './types.ts'
export {
	ConfigValidationError,
	isConfigValidationError,
	validateConfig,
	type ValidationIssue,
} from './validator.ts'
