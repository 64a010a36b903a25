/**
 * Result Envelope Schema
 *
 * The single wire contract between the producer and every consumer:
 *
 * ```json
 * {
 *   "analysis": { "priority": 3, "summary": "...", "description": "...", "oshaReference": "..." },
 *   "tokenUsage": { "inputTokens": 1200, "outputTokens": 85, "totalTokens": 1285 },
 *   "requester": { "tenantId": "acme", "deviceId": "dev-1", "timestamp": "2025-10-05T12:00:00.000Z" }
 * }
 * ```
 *
 * Built once per analyzed image and serialized exactly once, by the publisher.
 */

import * as Effect from 'effect/Effect'
import { pipe } from 'effect/Function'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'
import type * as SchemaAst from 'effect/SchemaAST'

import { AnalysisResult, Requester, TokenUsage } from '../analysis/index.ts'

export class ResultEnvelope extends Schema.Class<ResultEnvelope>('ResultEnvelope')({
	analysis: AnalysisResult,
	tokenUsage: TokenUsage,
	requester: Requester,
}) {
	/**
	 * Decode a JSON string into a fully validated envelope (branded identifiers, consistent totals).
	 */
	static readonly decodeJson: (
		jsonString: string,
		options?: SchemaAst.ParseOptions,
	) => Effect.Effect<ResultEnvelope, ParseResult.ParseError> = Schema.decode(Schema.parseJson(ResultEnvelope))

	/**
	 * Encode to the JSON wire form. Brands are dropped, nested classes become plain objects.
	 */
	static readonly encodeJson = (
		envelope: ResultEnvelope,
		options?: SchemaAst.ParseOptions,
	): Effect.Effect<string, ParseResult.ParseError, never> =>
		pipe(envelope, Schema.encode(ResultEnvelope, options), Effect.map(dto => JSON.stringify(dto)))
}

export declare namespace ResultEnvelope {
	type Encoded = typeof ResultEnvelope.Encoded
}
