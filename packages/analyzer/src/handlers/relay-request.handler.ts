/**
 * Entry point for publishing an envelope assembled by another component
 */

import * as Effect from 'effect/Effect'

import { relayEnvelope } from '../workflows/index.ts'
import { HandlerResponse } from './handler-response.ts'

export const handleRelayRequest = (candidate: unknown) =>
	relayEnvelope(candidate).pipe(
		Effect.map(topic => HandlerResponse.ok({ message: 'Envelope published', topic })),
		Effect.catchTags({
			DirectoryUnavailable: error => Effect.succeed(HandlerResponse.failed(error, error.cause)),
			IdentityError: error => Effect.succeed(HandlerResponse.rejected(error, `${error.reason}: ${error.subject}`)),
			ParseError: error => Effect.succeed(HandlerResponse.rejected(error, error.message)),
			PublishError: error => Effect.succeed(HandlerResponse.failed(error, error.cause)),
			ValidationError: error => Effect.succeed(HandlerResponse.rejected(error, `missing field: ${error.path}`)),
		}),
		Effect.tap(response =>
			response.statusCode === 200
				? Effect.void
				: Effect.logError('Relay failed', { body: response.body, statusCode: response.statusCode }),
		),
		Effect.catchAllDefect(defect =>
			Effect.logError('Unexpected failure', { defect: String(defect) }).pipe(
				Effect.as(HandlerResponse.failed({ _tag: 'Defect' }, String(defect))),
			),
		),
	)
