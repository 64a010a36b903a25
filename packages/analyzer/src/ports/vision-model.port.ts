/**
 * VisionModelPort - the model that inspects an image
 *
 * The model is a black box: it returns whatever JSON it produced, plus what the call cost. Making sense of the JSON
 * is the normalizer's job.
 */

import * as Context from 'effect/Context'
import * as Data from 'effect/Data'
import type * as Effect from 'effect/Effect'

export interface ModelAnswer {
	readonly output: unknown
	readonly inputTokens: number
	readonly outputTokens: number
}

export class ModelError extends Data.TaggedError('ModelError')<{
	readonly stage: 'invoke' | 'response'
	readonly cause: string
}> {}

export interface VisionModelPort {
	readonly analyze: (image: Uint8Array) => Effect.Effect<ModelAnswer, ModelError>
}

export const VisionModelPort = Context.GenericTag<VisionModelPort>('@site-sentinel/analyzer/VisionModelPort')
