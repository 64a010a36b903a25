export * from './logging.ts'
