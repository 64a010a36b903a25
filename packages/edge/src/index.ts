export * from './actuator/index.ts'
export * as Adapters from './adapters/index.ts'
export * from './config/index.ts'
export * from './consumer/index.ts'
export * as Domain from './domain/index.ts'
export * as Ports from './ports/index.ts'
export * from './workflows/index.ts'
