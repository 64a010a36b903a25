/**
 * PriorityValue - the priority exactly as a consumer receives it
 *
 * The priority reaches consumers as the model reported it, and other publishers (including hand-written test messages)
 * may send any JSON value. Numbers and strings keep their own tags; anything else is `Other`. Turning the value into a
 * signal level is the actuator's job.
 */

import * as Schema from 'effect/Schema'

export const NumericPriority = Schema.TaggedStruct('Number', { value: Schema.Number })

export const TextPriority = Schema.TaggedStruct('Text', { value: Schema.String })

export const OtherPriority = Schema.TaggedStruct('Other', { value: Schema.Unknown })

export const PriorityValue = Schema.transform(
	Schema.Unknown,
	Schema.Union(NumericPriority, TextPriority, OtherPriority),
	{
		decode: wire =>
			typeof wire === 'number'
				? { _tag: 'Number' as const, value: wire }
				: typeof wire === 'string'
					? { _tag: 'Text' as const, value: wire }
					: { _tag: 'Other' as const, value: wire },
		encode: priority => priority.value,
		strict: true,
	},
)

export declare namespace PriorityValue {
	type Type = typeof PriorityValue.Type
	type Encoded = typeof PriorityValue.Encoded
}
