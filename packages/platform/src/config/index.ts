export * from './broker.config.ts'
