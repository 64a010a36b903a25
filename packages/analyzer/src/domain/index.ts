export * from './normalize-analysis.ts'
export * from './source-key.ts'
