export interface BackoffPolicy {
	initialRetryDelaySeconds: number
	backoffFactor: number
	maxRetryDelaySeconds: number
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
	initialRetryDelaySeconds: 60,
	backoffFactor: 2,
	maxRetryDelaySeconds: 3600,
}

/**
 * Seconds to wait before the next attempt, given how many attempts were
 * already counted: `round(initial * factor ^ attemptCount)`, capped.
 * Defaults give 60, 120, 240, 480.
 */
export function retryDelaySeconds(attemptCount: number, policy: BackoffPolicy = DEFAULT_BACKOFF): number {
	const raw = policy.initialRetryDelaySeconds * policy.backoffFactor ** Math.max(0, attemptCount)
	return Math.min(Math.round(raw), policy.maxRetryDelaySeconds)
}
