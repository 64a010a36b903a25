/**
 * IdentityDirectoryPort - read access to the device registry
 *
 * The directory is the only trusted source of tenant and device identifiers. Entries are looked up by handle or by
 * attribute value; attribute values are untrusted strings until decoded.
 */

import * as Context from 'effect/Context'
import * as Data from 'effect/Data'
import type * as Effect from 'effect/Effect'
import type * as Option from 'effect/Option'

export interface DirectoryEntry {
	readonly handle: string
	readonly attributes: Readonly<Record<string, string>>
}

/**
 * Lookup could not be performed (network, permissions, missing credentials)
 */
export class DirectoryUnavailable extends Data.TaggedError('DirectoryUnavailable')<{
	readonly operation: 'describe' | 'findByAttribute'
	readonly cause: string
}> {}

export interface IdentityDirectoryPort {
	/**
	 * Entry registered under `handle`; None when there is none
	 */
	readonly describe: (handle: string) => Effect.Effect<Option.Option<DirectoryEntry>, DirectoryUnavailable>

	/**
	 * All entries whose attribute `name` equals `value`
	 */
	readonly findByAttribute: (
		name: string,
		value: string,
	) => Effect.Effect<ReadonlyArray<DirectoryEntry>, DirectoryUnavailable>
}

export const IdentityDirectoryPort = Context.GenericTag<IdentityDirectoryPort>(
	'@site-sentinel/platform/IdentityDirectoryPort',
)
