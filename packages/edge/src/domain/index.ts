export * from './consumer-state.ts'
export * from './priority-signal.ts'
