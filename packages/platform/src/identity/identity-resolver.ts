/**
 * Identity Resolver
 *
 * Turns a device handle, or an unverified (tenant, device) claim, into a {@link DeviceIdentity} read from the device
 * directory. The directory entry's `tenantId` and `deviceId` attributes are the only values that ever become part of
 * a topic.
 */

/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import * as Array from 'effect/Array'
import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Either from 'effect/Either'
import { pipe } from 'effect/Function'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import { DeviceIdentity } from '@site-sentinel/schemas/identity'
import { DeviceId, TenantId } from '@site-sentinel/schemas/shared'

import { type DirectoryEntry, type DirectoryUnavailable, IdentityDirectoryPort } from '../ports/index.ts'

/**
 * Directory attribute names
 */
export const IdentityAttributes = {
	deviceId: 'deviceId',
	tenantId: 'tenantId',
} as const

/**
 * The lookup succeeded but did not yield a usable identity
 *
 * - `NotFound`: no entry for the handle
 * - `MissingAttribute`: entry exists but lacks a required attribute
 * - `InvalidAttribute`: attribute value cannot be used as a topic segment
 * - `ClaimRejected`: no entry matches the claimed tenant and device
 */
export class IdentityError extends Schema.TaggedError<IdentityError>()('IdentityError', {
	subject: Schema.String,
	reason: Schema.Literal('NotFound', 'MissingAttribute', 'InvalidAttribute', 'ClaimRejected'),
	attribute: Schema.optional(Schema.String),
}) {}

/**
 * Unverified identity, e.g. parsed from a storage key
 */
export interface IdentityClaim {
	readonly tenantId: TenantId.Type
	readonly deviceId: DeviceId.Type
}

const readAttribute = <A>(
	entry: DirectoryEntry,
	attribute: string,
	decode: (value: string) => Either.Either<A, unknown>,
): Either.Either<A, IdentityError> =>
	pipe(
		Option.fromNullable(entry.attributes[attribute]),
		Either.fromOption(() => new IdentityError({ attribute, reason: 'MissingAttribute', subject: entry.handle })),
		Either.flatMap(value =>
			Either.mapLeft(
				decode(value),
				() => new IdentityError({ attribute, reason: 'InvalidAttribute', subject: entry.handle }),
			),
		),
	)

const tenantOf = (entry: DirectoryEntry) => readAttribute(entry, IdentityAttributes.tenantId, TenantId.decodeEither)

const identityOf = (entry: DirectoryEntry): Either.Either<DeviceIdentity, IdentityError> =>
	Either.all({
		deviceId: readAttribute(entry, IdentityAttributes.deviceId, DeviceId.decodeEither),
		tenantId: tenantOf(entry),
	}).pipe(Either.map(fields => new DeviceIdentity(fields)))

export class IdentityResolver extends Context.Tag('@site-sentinel/platform/IdentityResolver')<
	IdentityResolver,
	{
		/**
		 * Resolve the full identity of the device registered under `handle`
		 */
		readonly resolve: (handle: string) => Effect.Effect<DeviceIdentity, IdentityError | DirectoryUnavailable>

		/**
		 * Resolve only the tenant of `handle`; administrative clients have no device attribute
		 */
		readonly resolveTenant: (handle: string) => Effect.Effect<TenantId.Type, IdentityError | DirectoryUnavailable>

		/**
		 * Verify a claim against the directory and return the identity as the directory records it
		 */
		readonly confirm: (claim: IdentityClaim) => Effect.Effect<DeviceIdentity, IdentityError | DirectoryUnavailable>
	}
>() {
	static readonly Live: Layer.Layer<IdentityResolver, never, IdentityDirectoryPort> = Layer.effect(
		IdentityResolver,
		Effect.gen(function* () {
			const directory = yield* IdentityDirectoryPort

			const describe = (handle: string) =>
				directory
					.describe(handle)
					.pipe(
						Effect.flatMap(
							Option.match({
								onNone: () => Effect.fail(new IdentityError({ reason: 'NotFound', subject: handle })),
								onSome: Effect.succeed,
							}),
						),
					)

			const resolve = Effect.fn('IdentityResolver.resolve')(function* (handle: string) {
				const identity = yield* describe(handle).pipe(Effect.flatMap(identityOf))
				yield* Effect.logDebug('Resolved device identity', {
					deviceId: identity.deviceId,
					handle,
					tenantId: identity.tenantId,
				})
				return identity
			})

			const resolveTenant = Effect.fn('IdentityResolver.resolveTenant')(function* (handle: string) {
				return yield* describe(handle).pipe(Effect.flatMap(tenantOf))
			})

			const confirm = Effect.fn('IdentityResolver.confirm')(function* (claim: IdentityClaim) {
				const entries = yield* directory.findByAttribute(IdentityAttributes.deviceId, claim.deviceId)
				const subject = `${claim.tenantId}/${claim.deviceId}`

				const identity = pipe(
					entries,
					Array.filterMap(entry => Either.getRight(identityOf(entry))),
					Array.findFirst(
						candidate => candidate.tenantId === claim.tenantId && candidate.deviceId === claim.deviceId,
					),
				)

				if (Option.isNone(identity)) {
					yield* Effect.logWarning('Identity claim rejected by directory', {
						candidates: entries.length,
						deviceId: claim.deviceId,
						tenantId: claim.tenantId,
					})
					return yield* new IdentityError({ reason: 'ClaimRejected', subject })
				}

				return identity.value
			})

			return IdentityResolver.of({ confirm, resolve, resolveTenant })
		}),
	)
}
