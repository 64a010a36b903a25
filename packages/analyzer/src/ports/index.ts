export * from './image-store.port.ts'
export * from './vision-model.port.ts'
export * as Platform from '@site-sentinel/platform/ports'
