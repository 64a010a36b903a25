/**
 * ImageStorePort - read access to uploaded images
 */

import * as Context from 'effect/Context'
import * as Data from 'effect/Data'
import type * as DateTime from 'effect/DateTime'
import type * as Effect from 'effect/Effect'

export interface StoredImage {
	readonly bytes: Uint8Array
	readonly lastModified: DateTime.Utc
}

export class StorageError extends Data.TaggedError('StorageError')<{
	readonly bucket: string
	readonly key: string
	readonly cause: string
}> {}

export interface ImageStorePort {
	/**
	 * Image content and the time it was stored, used as the capture timestamp
	 */
	readonly fetch: (location: { readonly bucket: string; readonly key: string }) => Effect.Effect<StoredImage, StorageError>
}

export const ImageStorePort = Context.GenericTag<ImageStorePort>('@site-sentinel/analyzer/ImageStorePort')
