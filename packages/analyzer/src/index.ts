export * as Adapters from './adapters/index.ts'
export * as Domain from './domain/index.ts'
export * from './handlers/index.ts'
export * as Ports from './ports/index.ts'
export * from './workflows/index.ts'
