/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3'
import type { ConfigError } from 'effect/ConfigError'
import * as DateTime from 'effect/DateTime'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

import { StorageConfig } from '../config/index.ts'
import { ImageStorePort, type StoredImage, StorageError } from '../ports/index.ts'

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))

export class ImageStore {
	static readonly S3: Layer.Layer<ImageStorePort, ConfigError> = Layer.effect(
		ImageStorePort,
		Effect.gen(function* () {
			const config = yield* StorageConfig
			const client = new S3Client(Option.match(config.region, { onNone: () => ({}), onSome: region => ({ region }) }))

			const fetch = Effect.fn('ImageStore.S3.fetch')(function* (location: { readonly bucket: string; readonly key: string }) {
				const fail = (cause: string) => new StorageError({ bucket: location.bucket, cause, key: location.key })

				const output = yield* Effect.tryPromise({
					catch: cause => fail(describeCause(cause)),
					try: () => client.send(new GetObjectCommand({ Bucket: location.bucket, Key: location.key })),
				})
				const body = output.Body
				if (body === undefined) {
					return yield* fail('object has no body')
				}
				const bytes = yield* Effect.tryPromise({
					catch: cause => fail(`cannot read object body: ${describeCause(cause)}`),
					try: () => body.transformToByteArray(),
				})
				const lastModified = yield* Effect.fromNullable(output.LastModified).pipe(
					Effect.mapError(() => fail('object has no last-modified time')),
				)

				yield* Effect.logDebug('Fetched image', { bucket: location.bucket, bytes: bytes.byteLength, key: location.key })
				return { bytes, lastModified: DateTime.unsafeMake(lastModified) } satisfies StoredImage
			})

			return ImageStorePort.of({ fetch })
		}),
	)

	/**
	 * Store holding fixed images, keyed by `bucket/key`
	 */
	static readonly Test = (images: Readonly<Record<string, StoredImage>>): Layer.Layer<ImageStorePort> =>
		Layer.succeed(
			ImageStorePort,
			ImageStorePort.of({
				fetch: ({ bucket, key }) =>
					Effect.fromNullable(images[`${bucket}/${key}`]).pipe(
						Effect.mapError(() => new StorageError({ bucket, cause: 'NoSuchKey', key })),
					),
			}),
		)
}
