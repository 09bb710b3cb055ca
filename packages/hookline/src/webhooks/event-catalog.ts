/**
 * Advisory catalog of event types, for discovery in admin surfaces.
 * Triggering a type that is not listed here is allowed.
 */

export const EVENT_CATALOG_VERSION = '2024-06-01'

export const EVENT_TYPES = [
	'user.created',
	'user.updated',
	'user.deleted',
	'lead.created',
	'lead.updated',
	'lead.converted',
	'contact.created',
	'contact.updated',
	'document.created',
	'document.updated',
	'document.shared',
	'order.created',
	'order.completed',
	'order.cancelled',
	'payment.succeeded',
	'payment.failed',
	'invoice.created',
	'invoice.paid',
	'task.created',
	'task.completed',
	'course.enrolled',
	'course.completed',
	'post.published',
	'workflow.completed',
	'workflow.failed',
] as const

export type CatalogEventType = (typeof EVENT_TYPES)[number]

export const MAX_EVENT_TYPE_LENGTH = 100
