import * as Config from 'effect/Config'

export const VisionConfig = Config.all({
	modelId: Config.string('VISION_MODEL_ID').pipe(Config.withDefault('anthropic.claude-3-haiku-20240307-v1:0')),
	maxTokens: Config.integer('VISION_MAX_TOKENS').pipe(Config.withDefault(4096)),
	region: Config.option(Config.string('AWS_REGION')),
})

export type VisionConfig = Config.Config.Success<typeof VisionConfig>

export const StorageConfig = Config.all({
	region: Config.option(Config.string('AWS_REGION')),
})
