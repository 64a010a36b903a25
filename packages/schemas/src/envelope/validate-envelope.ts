/**
 * Envelope Validator
 *
 * Structural completeness check applied to every envelope before it is published and to every message a consumer
 * receives. It only answers "is every required field there?": absent and null count as missing, any other value
 * (including an empty string) is present. Type checks are left to the schemas.
 */

import * as Either from 'effect/Either'
import * as Option from 'effect/Option'
import * as Predicate from 'effect/Predicate'
import * as Schema from 'effect/Schema'

/**
 * Required fields per section, in the order they are checked.
 */
export const EnvelopeSections = {
	analysis: ['priority', 'summary', 'description', 'oshaReference'],
	tokenUsage: ['inputTokens', 'outputTokens', 'totalTokens'],
	requester: ['tenantId', 'deviceId', 'timestamp'],
} as const

export type EnvelopeSection = keyof typeof EnvelopeSections

const SectionOrder: ReadonlyArray<EnvelopeSection> = ['analysis', 'tokenUsage', 'requester']

export class ValidationError extends Schema.TaggedError<ValidationError>()('ValidationError', {
	section: Schema.Literal('analysis', 'tokenUsage', 'requester'),
	field: Schema.String,
}) {
	get path(): string {
		return `${this.section}.${this.field}`
	}
}

const isPresent = (value: unknown): boolean => value !== undefined && value !== null

/**
 * First missing `{section, field}` in check order. A section that is absent or not an object reports its first field.
 */
export const firstMissingField = (
	candidate: unknown,
): Option.Option<{ readonly section: EnvelopeSection; readonly field: string }> => {
	for (const section of SectionOrder) {
		const value = Predicate.isRecord(candidate) ? candidate[section] : undefined
		for (const field of EnvelopeSections[section]) {
			if (!Predicate.isRecord(value) || !isPresent(value[field])) {
				return Option.some({ field, section })
			}
		}
	}
	return Option.none()
}

/**
 * Confirm that every required field is present. The candidate is returned unchanged on success.
 *
 * @example
 * ```typescript ignore
 * validateEnvelope({ analysis: { priority: 3 } })
 * // Left(ValidationError { section: 'analysis', field: 'summary' })
 * ```
 */
export const validateEnvelope = <A>(candidate: A): Either.Either<A, ValidationError> =>
	Option.match(firstMissingField(candidate), {
		onNone: () => Either.right(candidate),
		onSome: missing => Either.left(new ValidationError(missing)),
	})
