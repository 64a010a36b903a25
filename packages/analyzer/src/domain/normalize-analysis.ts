/**
 * Result Normalizer
 *
 * Vision models do not answer in one shape. Two are accepted:
 *
 * - `ConcernList`: `description` is an array of `{ concern, oshaReference }` items, one per finding
 * - `Scalar`: every field is a plain value
 *
 * Both are flattened into {@link AnalysisResult}, then checked field by field in the order priority, summary,
 * description, oshaReference. The first field that is missing or unusable is reported. Values are never rewritten: a
 * priority arrives at consumers as the model gave it, number or text. Text fields must be strings, since every
 * consumer reads them as such.
 */

import * as Data from 'effect/Data'
import * as Either from 'effect/Either'
import * as Predicate from 'effect/Predicate'
import * as Schema from 'effect/Schema'

import { AnalysisResult, Priority } from '@site-sentinel/schemas/analysis'

export interface Concern {
	readonly concern: string
	readonly oshaReference: string
}

export type ModelOutput = Data.TaggedEnum<{
	ConcernList: { readonly priority: unknown; readonly summary: unknown; readonly concerns: ReadonlyArray<Concern> }
	Scalar: {
		readonly priority: unknown
		readonly summary: unknown
		readonly description: unknown
		readonly oshaReference: unknown
	}
}>

export const ModelOutput = Data.taggedEnum<ModelOutput>()

export class SchemaError extends Schema.TaggedError<SchemaError>()('SchemaError', {
	field: Schema.Literal('priority', 'summary', 'description', 'oshaReference'),
	reason: Schema.Literal('missing', 'invalid'),
}) {}

const textOf = (value: unknown): string => (Predicate.isString(value) ? value : '')

const concernOf = (item: unknown): Concern =>
	Predicate.isRecord(item)
		? { concern: textOf(item['concern']), oshaReference: textOf(item['oshaReference']) }
		: { concern: '', oshaReference: '' }

/**
 * Decide which shape the model answered in. Anything that is not an object is treated as an empty `Scalar`.
 */
export const classifyModelOutput = (raw: unknown): ModelOutput => {
	const record = Predicate.isRecord(raw) ? raw : {}
	const description = record['description']

	return Array.isArray(description)
		? ModelOutput.ConcernList({
				concerns: description.map(concernOf),
				priority: record['priority'],
				summary: record['summary'],
			})
		: ModelOutput.Scalar({
				description: description ?? '',
				oshaReference: record['oshaReference'] ?? '',
				priority: record['priority'],
				summary: record['summary'],
			})
}

/**
 * Join in order; no separator is added while nothing has accumulated yet, so leading empty values vanish.
 */
const joinNonLeading = (values: ReadonlyArray<string>, separator: string): string =>
	values.reduce((joined, value) => (joined === '' ? value : `${joined}${separator}${value}`), '')

const flatten = ModelOutput.$match({
	ConcernList: ({ concerns, priority, summary }) => ({
		description: joinNonLeading(
			concerns.map(item => item.concern),
			' ',
		),
		oshaReference: joinNonLeading(
			concerns.map(item => item.oshaReference),
			'; ',
		),
		priority,
		summary,
	}),
	Scalar: ({ description, oshaReference, priority, summary }) => ({ description, oshaReference, priority, summary }),
})

const requireField = <A, I>(
	field: SchemaError['field'],
	schema: Schema.Schema<A, I>,
	value: unknown,
): Either.Either<A, SchemaError> =>
	value === undefined || value === null || value === ''
		? Either.left(new SchemaError({ field, reason: 'missing' }))
		: Schema.decodeUnknownEither(schema)(value).pipe(Either.mapLeft(() => new SchemaError({ field, reason: 'invalid' })))

/**
 * Normalize raw model output into the canonical result
 *
 * @example
 * ```typescript ignore
 * normalizeAnalysis({
 * 	priority: 3,
 * 	summary: 's',
 * 	description: [
 * 		{ concern: 'a', oshaReference: 'r1' },
 * 		{ concern: 'b', oshaReference: 'r2' },
 * 	],
 * })
 * // Right(AnalysisResult { priority: 3, summary: 's', description: 'a b', oshaReference: 'r1; r2' })
 * ```
 */
export const normalizeAnalysis = (raw: unknown): Either.Either<AnalysisResult, SchemaError> =>
	Either.gen(function* () {
		const candidate = flatten(classifyModelOutput(raw))

		const priority = yield* requireField('priority', Priority, candidate.priority)
		const summary = yield* requireField('summary', Schema.NonEmptyString, candidate.summary)
		const description = yield* requireField('description', Schema.NonEmptyString, candidate.description)
		const oshaReference = yield* requireField('oshaReference', Schema.NonEmptyString, candidate.oshaReference)

		return new AnalysisResult({ description, oshaReference, priority, summary })
	})
