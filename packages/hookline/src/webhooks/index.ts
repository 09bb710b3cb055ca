export * from './backoff.ts'
export * from './delivery-store.ts'
export * from './dispatcher.ts'
export * from './errors.ts'
export * from './event-catalog.ts'
export * from './http-sender.ts'
export * from './ids.ts'
export * from './manager.ts'
export * from './registry.ts'
export * from './retry-scheduler.ts'
export * from './signature.ts'
export * from './trigger.ts'
export * from './types.ts'
export * from './webhook-store.ts'
