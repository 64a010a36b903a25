export * from './device-handle.schema.ts'
export * from './device-identity.schema.ts'
