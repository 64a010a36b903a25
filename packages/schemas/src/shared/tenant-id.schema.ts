/**
 * TenantId Schema
 *
 * Identifies the company (tenant) a device and its findings belong to. The value is the first variable segment of
 * every result topic, so an envelope published under one tenant can only be received by devices subscribed under the
 * same tenant.
 *
 * Type Structure: `string & Brand<TenantIdBrand>`
 *
 * - Cannot be confused with DeviceId even though both are plain topic segments on the wire
 * - Runtime validation via Effect Schema
 */

import type * as Effect from 'effect/Effect'
import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { TopicSegment } from './topic-segment.schema.ts'

const TenantIdBrand: unique symbol = Symbol.for('@site-sentinel/schemas/shared/TenantId')

export class TenantId extends TopicSegment.pipe(Schema.brand(TenantIdBrand)) {
	/**
	 * Decode string to TenantId with validation
	 *
	 * Use for directory attributes and storage key segments, which are untrusted until decoded.
	 */
	static readonly decode: (value: string) => Effect.Effect<TenantId.Type, ParseResult.ParseError> = value =>
		Schema.decode(TenantId)(value)

	static readonly decodeEither: (value: string) => Either.Either<TenantId.Type, ParseResult.ParseError> = value =>
		Schema.decodeEither(TenantId)(value)
}

export declare namespace TenantId {
	/**
	 * The branded type: string & Brand<TenantIdBrand>
	 */
	type Type = typeof TenantId.Type
}
