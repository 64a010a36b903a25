export * from './flash-timing.ts'
export * from './priority-actuator.ts'
