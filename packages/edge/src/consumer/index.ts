export * from './edge-consumer.ts'
