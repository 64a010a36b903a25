/**
 * AnalysisResult - canonical finding produced for one analyzed image
 *
 * Whatever shape the vision model answers in, the producer only ever publishes this one. Every field is present and
 * non-empty once a value of this type exists; the values themselves are the model's.
 */

import * as Schema from 'effect/Schema'

/**
 * Priority as the model reported it, a number or numeric text
 *
 * The scale is 5 for the most severe finding down to 1 for the least, with 0 for an image that could not be
 * assessed. The value is carried as reported; consumers decide which level it stands for.
 */
export const Priority = Schema.Union(Schema.Number, Schema.NonEmptyString).annotations({
	description: 'Priority 0..5 as reported, a number or numeric text',
	title: 'Priority',
})

export class AnalysisResult extends Schema.Class<AnalysisResult>('AnalysisResult')({
	priority: Priority,
	summary: Schema.NonEmptyString,
	description: Schema.NonEmptyString,
	oshaReference: Schema.NonEmptyString,
}) {}

export declare namespace AnalysisResult {
	type Encoded = typeof AnalysisResult.Encoded

	/**
	 * Field names in the order normalization checks them
	 */
	type Field = keyof typeof AnalysisResult.fields
}
