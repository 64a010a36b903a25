export * from './analysis-result.schema.ts'
export * from './requester.schema.ts'
export * from './token-usage.schema.ts'
