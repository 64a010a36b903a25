/**
 * InboundEnvelope - a consumer's reading of the result envelope
 *
 * Same sections and fields as {@link ResultEnvelope}, but lenient where the consumer must tolerate other publishers:
 * the priority may be any JSON value, and text fields are not required to be non-empty. Unknown properties are
 * ignored.
 */

import * as Schema from 'effect/Schema'

import { PriorityValue } from './priority-value.schema.ts'

export const InboundEnvelope = Schema.Struct({
	analysis: Schema.Struct({
		priority: PriorityValue,
		summary: Schema.String,
		description: Schema.String,
		oshaReference: Schema.String,
	}),
	tokenUsage: Schema.Struct({
		inputTokens: Schema.Number,
		outputTokens: Schema.Number,
		totalTokens: Schema.Number,
	}),
	requester: Schema.Struct({
		tenantId: Schema.String,
		deviceId: Schema.String,
		timestamp: Schema.String,
	}),
})

export declare namespace InboundEnvelope {
	type Type = typeof InboundEnvelope.Type
	type Encoded = typeof InboundEnvelope.Encoded
}
