export * from './config/index.ts'
export * as Domain from './domain/index.ts'
export * from './tenant-monitor.ts'
