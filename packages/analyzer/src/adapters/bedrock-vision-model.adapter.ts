/**
 * Vision model over the Bedrock messages API
 *
 * Sends the image as base64 JPEG together with the workplace-safety prompt and expects the first content block of
 * the answer to be a JSON object.
 */

/** biome-ignore-all lint/style/useNamingConvention: Bedrock request/response fields are snake_case */

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime'
import * as Array from 'effect/Array'
import type { ConfigError } from 'effect/ConfigError'
import * as Effect from 'effect/Effect'
import * as Encoding from 'effect/Encoding'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { VisionConfig } from '../config/index.ts'
import { type ModelAnswer, ModelError, VisionModelPort } from '../ports/index.ts'

const AnthropicVersion = 'bedrock-2023-05-31'

export const AnalysisPrompt = `You analyze photographs of workplaces for safety problems under OSHA (Occupational Safety and Health Administration) rules: hazards, safety violations, misplaced tools and unsafe behavior.

Answer with a single JSON object with these fields:
 - "priority": integer from 1 (low) to 5 (high) describing how urgently the findings must be addressed
 - "summary": a short summary of what the image shows
 - "description": a short description of each item or area of concern
 - "oshaReference": the OSHA standard or regulation that applies to the concern

All four fields are required for a workplace image. Base every finding on what is visible in the image and within OSHA's scope; do not report anything that is not there.

If the image does not show a workplace or cannot be analyzed, describe the image in "description" and use these fixed values for the other fields:
 - "priority": 0
 - "summary": "Invalid image"
 - "oshaReference": "N/A"
`

const ModelResponse = Schema.Struct({
	content: Schema.NonEmptyArray(Schema.Struct({ text: Schema.optional(Schema.String), type: Schema.String })),
	usage: Schema.Struct({ input_tokens: Schema.NonNegativeInt, output_tokens: Schema.NonNegativeInt }),
})

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))

export const requestBody = (image: Uint8Array, maxTokens: number): string =>
	JSON.stringify({
		anthropic_version: AnthropicVersion,
		max_tokens: maxTokens,
		messages: [
			{
				content: [
					{ source: { data: Encoding.encodeBase64(image), media_type: 'image/jpeg', type: 'base64' }, type: 'image' },
					{ text: AnalysisPrompt, type: 'text' },
				],
				role: 'user',
			},
		],
	})

/**
 * Extract the model's JSON answer and token counts from a raw response body
 */
export const parseResponse = (body: string): Effect.Effect<ModelAnswer, ModelError> =>
	Effect.gen(function* () {
		const response = yield* Schema.decodeUnknown(Schema.parseJson(ModelResponse))(body)
		const text = yield* Option.fromNullable(Array.headNonEmpty(response.content).text)
		const output = yield* Schema.decodeUnknown(Schema.parseJson())(text)
		return {
			inputTokens: response.usage.input_tokens,
			output,
			outputTokens: response.usage.output_tokens,
		}
	}).pipe(
		Effect.catchTags({
			NoSuchElementException: () => Effect.fail(new ModelError({ cause: 'first content block has no text', stage: 'response' })),
			ParseError: error => Effect.fail(new ModelError({ cause: error.message, stage: 'response' })),
		}),
	)

export class VisionModel {
	static readonly Bedrock: Layer.Layer<VisionModelPort, ConfigError> = Layer.effect(
		VisionModelPort,
		Effect.gen(function* () {
			const config = yield* VisionConfig
			const client = new BedrockRuntimeClient(
				Option.match(config.region, { onNone: () => ({}), onSome: region => ({ region }) }),
			)

			const analyze = Effect.fn('VisionModel.Bedrock.analyze')(function* (image: Uint8Array) {
				const output = yield* Effect.tryPromise({
					catch: cause => new ModelError({ cause: describeCause(cause), stage: 'invoke' }),
					try: () =>
						client.send(
							new InvokeModelCommand({
								accept: 'application/json',
								body: requestBody(image, config.maxTokens),
								contentType: 'application/json',
								modelId: config.modelId,
							}),
						),
				})
				const answer = yield* parseResponse(new TextDecoder().decode(output.body))

				yield* Effect.logInfo('Vision model answered', {
					inputTokens: answer.inputTokens,
					modelId: config.modelId,
					outputTokens: answer.outputTokens,
				})
				return answer
			})

			return VisionModelPort.of({ analyze })
		}),
	)

	/**
	 * Model that always gives `answer`
	 */
	static readonly Test = (answer: ModelAnswer): Layer.Layer<VisionModelPort> =>
		Layer.succeed(VisionModelPort, VisionModelPort.of({ analyze: () => Effect.succeed(answer) }))

	/**
	 * Model whose every call fails
	 */
	static readonly Failing = (cause: string): Layer.Layer<VisionModelPort> =>
		Layer.succeed(
			VisionModelPort,
			VisionModelPort.of({ analyze: () => Effect.fail(new ModelError({ cause, stage: 'invoke' })) }),
		)
}
