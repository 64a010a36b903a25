export * from './dispatch-message.workflow.ts'
