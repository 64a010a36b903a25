export * from './analyzer.config.ts'
