/**
 * Shared foundational schemas
 *
 * Identity segments and temporal values used by every package.
 */

export * from './device-id.schema.ts'
export * from './iso8601-datetime.schema.ts'
export * from './tenant-id.schema.ts'
export * from './topic-segment.schema.ts'
