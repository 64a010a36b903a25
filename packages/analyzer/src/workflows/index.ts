export * from './analyze-image.workflow.ts'
export * from './publish-envelope.workflow.ts'
export * from './relay-envelope.workflow.ts'
