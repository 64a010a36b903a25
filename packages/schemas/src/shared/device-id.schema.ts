/**
 * DeviceId Schema
 *
 * Identifies a single edge device within a tenant. Unique only together with its TenantId.
 */

import type * as Effect from 'effect/Effect'
import type * as Either from 'effect/Either'
import type * as ParseResult from 'effect/ParseResult'
import * as Schema from 'effect/Schema'

import { TopicSegment } from './topic-segment.schema.ts'

const DeviceIdBrand: unique symbol = Symbol.for('@site-sentinel/schemas/shared/DeviceId')

export class DeviceId extends TopicSegment.pipe(Schema.brand(DeviceIdBrand)) {
	static readonly decode: (value: string) => Effect.Effect<DeviceId.Type, ParseResult.ParseError> = value =>
		Schema.decode(DeviceId)(value)

	static readonly decodeEither: (value: string) => Either.Either<DeviceId.Type, ParseResult.ParseError> = value =>
		Schema.decodeEither(DeviceId)(value)
}

export declare namespace DeviceId {
	type Type = typeof DeviceId.Type
}
