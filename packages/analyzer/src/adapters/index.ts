export * from './bedrock-vision-model.adapter.ts'
export * from './s3-image-store.adapter.ts'
export * as Platform from '@site-sentinel/platform/adapters'
