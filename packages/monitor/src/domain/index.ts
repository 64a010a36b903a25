export * from './observed-message.ts'
