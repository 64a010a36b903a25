export * from './handler-response.ts'
export * from './relay-request.handler.ts'
export * from './storage-event.handler.ts'
