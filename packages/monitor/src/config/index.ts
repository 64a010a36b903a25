export * from './monitor.config.ts'
