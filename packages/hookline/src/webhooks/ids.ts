import { randomBytes } from 'node:crypto'

const SECRET_PREFIX = 'whsec_'

/** New signing secret: `whsec_` + 32 random bytes, base64url */
export function generateWebhookSecret(): string {
	return `${SECRET_PREFIX}${randomBytes(32).toString('base64url')}`
}
