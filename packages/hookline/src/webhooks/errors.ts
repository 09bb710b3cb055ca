import { type ErrorContext, HooklineError } from '../utils/errors.ts'

export class WebhookError extends HooklineError {
	constructor(message: string, statusCode = 500, context?: ErrorContext) {
		super(message, statusCode, context)
		this.name = 'WebhookError'
	}
}

export class WebhookNotFoundError extends WebhookError {
	constructor(webhookId: string) {
		super(`Webhook ${webhookId} not found`, 404, { webhookId })
		this.name = 'WebhookNotFoundError'
	}
}

export class DeliveryNotFoundError extends WebhookError {
	constructor(deliveryId: string) {
		super(`Delivery ${deliveryId} not found`, 404, { deliveryId })
		this.name = 'DeliveryNotFoundError'
	}
}

export class SubscriptionNotFoundError extends WebhookError {
	constructor(webhookId: string, eventType: string) {
		super(`Webhook ${webhookId} is not subscribed to ${eventType}`, 404, {
			webhookId,
			eventType,
		})
		this.name = 'SubscriptionNotFoundError'
	}
}

export class DeliveryNotRetryableError extends WebhookError {
	constructor(deliveryId: string, reason: string) {
		super(`Delivery ${deliveryId} cannot be retried: ${reason}`, 400, { deliveryId })
		this.name = 'DeliveryNotRetryableError'
	}
}

export class ValidationError extends WebhookError {
	constructor(
		message: string,
		public readonly issues: Array<{ path: string; message: string }> = [],
	) {
		super(message, 400, { issues })
		this.name = 'ValidationError'
	}
}
