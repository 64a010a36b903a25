/**
 * Storage key convention for uploaded images: `company/{tenantId}/{deviceId}/{filename}.jpg`
 *
 * The tenant and device segments are only a claim; the identity resolver confirms them before they are used.
 */

import * as Data from 'effect/Data'
import * as Either from 'effect/Either'
import * as Schema from 'effect/Schema'

import type { IdentityClaim } from '@site-sentinel/platform/identity'
import { DeviceId, TenantId } from '@site-sentinel/schemas/shared'

const ImageExtension = '.jpg'
const SegmentCount = 4

export type SourceKey = Data.TaggedEnum<{
	/**
	 * An image to analyze, with the identity claimed by its location
	 */
	Image: { readonly key: string; readonly claim: IdentityClaim; readonly fileName: string }

	/**
	 * Not an image this pipeline handles
	 */
	Skipped: { readonly key: string; readonly reason: string }
}>

export const SourceKey = Data.taggedEnum<SourceKey>()

export class SourceKeyError extends Schema.TaggedError<SourceKeyError>()('SourceKeyError', {
	key: Schema.String,
	reason: Schema.String,
}) {}

/**
 * Classify a storage key
 *
 * - not ending in `.jpg` (case-insensitive) → `Skipped`
 * - not exactly four segments, or a tenant/device segment unusable in a topic → `SourceKeyError`
 */
export const parseSourceKey = (key: string): Either.Either<SourceKey, SourceKeyError> => {
	if (!key.toLowerCase().endsWith(ImageExtension)) {
		return Either.right(SourceKey.Skipped({ key, reason: `not a ${ImageExtension} image` }))
	}

	const segments = key.split('/')
	const [, tenant, device, fileName] = segments
	if (segments.length !== SegmentCount || tenant === undefined || device === undefined || fileName === undefined) {
		return Either.left(
			new SourceKeyError({ key, reason: `expected company/{tenantId}/{deviceId}/{filename}${ImageExtension}` }),
		)
	}

	return Either.all({ deviceId: DeviceId.decodeEither(device), tenantId: TenantId.decodeEither(tenant) }).pipe(
		Either.mapBoth({
			onLeft: () => new SourceKeyError({ key, reason: 'tenant or device segment is not a valid identifier' }),
			onRight: claim => SourceKey.Image({ claim, fileName, key }),
		}),
	)
}

/**
 * Keys in storage notifications are URL-encoded, with `+` for spaces.
 */
export const decodeNotificationKey = (encoded: string): string => decodeURIComponent(encoded.replace(/\+/g, ' '))
