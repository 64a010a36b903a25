/**
 * Entry point for object-created notifications from image storage
 *
 * Only the first record of a notification is processed. Every outcome, including failures, becomes a
 * {@link HandlerResponse}; nothing is thrown back to the runtime.
 */

import * as Array from 'effect/Array'
import * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'

import { decodeNotificationKey } from '../domain/index.ts'
import { AnalysisOutcome, analyzeImage } from '../workflows/index.ts'
import { HandlerResponse } from './handler-response.ts'

export const StorageNotification = Schema.Struct({
	Records: Schema.NonEmptyArray(
		Schema.Struct({
			s3: Schema.Struct({
				bucket: Schema.Struct({ name: Schema.String }),
				object: Schema.Struct({ key: Schema.String }),
			}),
		}),
	),
})

const processStorageEvent = Effect.fn('Analyzer.ProcessStorageEvent')(function* (event: unknown) {
	const notification = yield* Schema.decodeUnknown(StorageNotification)(event)
	const record = Array.headNonEmpty(notification.Records)
	const location = { bucket: record.s3.bucket.name, key: decodeNotificationKey(record.s3.object.key) }

	yield* Effect.logInfo('Processing image', location)
	const outcome = yield* analyzeImage(location)

	return AnalysisOutcome.$match(outcome, {
		Published: ({ envelope, key, topic }) =>
			HandlerResponse.ok({
				analysis: {
					description: envelope.analysis.description,
					oshaReference: envelope.analysis.oshaReference,
					priority: envelope.analysis.priority,
					summary: envelope.analysis.summary,
				},
				key,
				message: 'Analysis published',
				topic,
			}),
		Skipped: ({ key, reason }) => HandlerResponse.ok({ key, message: 'Skipped', reason }),
	})
})

export const handleStorageEvent = (event: unknown) =>
	processStorageEvent(event).pipe(
		Effect.catchTags({
			DirectoryUnavailable: error => Effect.succeed(HandlerResponse.failed(error, error.cause)),
			IdentityError: error => Effect.succeed(HandlerResponse.rejected(error, `${error.reason}: ${error.subject}`)),
			ModelError: error => Effect.succeed(HandlerResponse.failed(error, error.cause)),
			ParseError: error => Effect.succeed(HandlerResponse.rejected(error, error.message)),
			PublishError: error => Effect.succeed(HandlerResponse.failed(error, error.cause)),
			SchemaError: error =>
				Effect.succeed(HandlerResponse.rejected(error, `${error.reason} required field: ${error.field}`)),
			SourceKeyError: error => Effect.succeed(HandlerResponse.rejected(error, `${error.key}: ${error.reason}`)),
			StorageError: error => Effect.succeed(HandlerResponse.failed(error, error.cause)),
			ValidationError: error => Effect.succeed(HandlerResponse.rejected(error, `missing field: ${error.path}`)),
		}),
		Effect.tap(response =>
			response.statusCode === 200
				? Effect.void
				: Effect.logError('Image analysis failed', { body: response.body, statusCode: response.statusCode }),
		),
		Effect.catchAllDefect(defect =>
			Effect.logError('Unexpected failure', { defect: String(defect) }).pipe(
				Effect.as(HandlerResponse.failed({ _tag: 'Defect' }, String(defect))),
			),
		),
	)
