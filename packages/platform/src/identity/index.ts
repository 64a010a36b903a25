export * from './identity-resolver.ts'
