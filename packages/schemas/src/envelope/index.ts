/**
 * Envelope schemas
 *
 * Wire contract shared by the producer and the consumers.
 */

export * from './inbound-envelope.schema.ts'
export * from './priority-value.schema.ts'
export * from './result-envelope.schema.ts'
export * from './validate-envelope.ts'
