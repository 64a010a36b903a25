/**
 * TokenUsage - model accounting for one analysis call
 */

import * as Schema from 'effect/Schema'

export class TokenUsage extends Schema.Class<TokenUsage>('TokenUsage')(
	Schema.Struct({
		inputTokens: Schema.NonNegativeInt,
		outputTokens: Schema.NonNegativeInt,
		totalTokens: Schema.NonNegativeInt,
	}).pipe(
		Schema.filter(
			({ inputTokens, outputTokens, totalTokens }) =>
				totalTokens === inputTokens + outputTokens ||
				`totalTokens must equal inputTokens + outputTokens: expected ${inputTokens + outputTokens}, got ${totalTokens}`,
		),
	),
) {
	/**
	 * Build usage from the two counts the model reports; the total is derived, never copied.
	 */
	static readonly fromCounts = (counts: { readonly inputTokens: number; readonly outputTokens: number }): TokenUsage =>
		new TokenUsage({
			inputTokens: counts.inputTokens,
			outputTokens: counts.outputTokens,
			totalTokens: counts.inputTokens + counts.outputTokens,
		})
}
