/**
 * Iso8601DateTime - the requester timestamp as it travels on the wire
 *
 * The producer writes the image's last-modified instant with millisecond precision and a `Z` suffix. Consumers also
 * accept envelopes from other publishers, so any fraction precision and a numeric UTC offset are valid too.
 */

import * as DateTime from 'effect/DateTime'
import type * as Effect from 'effect/Effect'
import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

const InstantPattern = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/

export class Iso8601DateTime extends Schema.String.pipe(
	Schema.pattern(InstantPattern, {
		description: 'Date, time and zone, e.g. 2025-10-05T12:00:00.000Z',
		message: () => 'Expected YYYY-MM-DDTHH:MM:SS[.fff] followed by Z or ±HH:MM',
		title: 'Iso8601DateTime',
	}),
	Schema.brand('Iso8601DateTime'),
) {
	static readonly decode: (value: string) => Effect.Effect<Iso8601DateTime.Type, ParseResult.ParseError> = value =>
		Schema.decode(Iso8601DateTime)(value)

	static readonly decodeEither: (value: string) => Either.Either<Iso8601DateTime.Type, ParseResult.ParseError> =
		value => Schema.decodeEither(Iso8601DateTime)(value)

	/**
	 * `YYYY-MM-DDTHH:MM:SS.mmmZ` for a UTC instant
	 */
	static readonly fromDateTime = (instant: DateTime.Utc): Iso8601DateTime.Type =>
		Iso8601DateTime.make(DateTime.formatIso(instant))
}

export declare namespace Iso8601DateTime {
	type Type = typeof Iso8601DateTime.Type
}
