/**
 * Dispatch one received message to the actuator
 *
 * Unparseable, incomplete or undecodable payloads are logged and dropped; the result is `None` for a dropped message.
 */

import * as Effect from 'effect/Effect'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'

import type { BusEvent } from '@site-sentinel/platform/ports'
import { InboundEnvelope, validateEnvelope } from '@site-sentinel/schemas/envelope'

import { type FlashOutcome, PriorityActuator } from '../actuator/index.ts'

const parsePayload = Schema.decodeUnknown(Schema.parseJson())

const decodeInbound = Schema.decodeUnknown(InboundEnvelope)

export const readEnvelope = (payload: string) =>
	parsePayload(payload).pipe(Effect.flatMap(validateEnvelope), Effect.flatMap(decodeInbound))

export const dispatchMessage = (
	message: BusEvent.Message,
): Effect.Effect<Option.Option<FlashOutcome>, never, PriorityActuator> =>
	Effect.gen(function* () {
		const actuator = yield* PriorityActuator

		yield* Effect.logInfo('Received message', { qos: message.qos, topic: message.topic })
		yield* Effect.logDebug('Message payload', { payload: message.payload })

		const envelope = yield* readEnvelope(message.payload)
		yield* Effect.logInfo('Analysis received', {
			deviceId: envelope.requester.deviceId,
			summary: envelope.analysis.summary,
			tenantId: envelope.requester.tenantId,
		})

		return Option.some(yield* actuator.flash(envelope.analysis.priority))
	}).pipe(
		Effect.catchTags({
			ParseError: error =>
				Effect.logWarning('Dropped message that is not a valid envelope', {
					detail: error.message,
					topic: message.topic,
				}).pipe(Effect.as(Option.none())),
			ValidationError: error =>
				Effect.logWarning('Dropped incomplete envelope', { missing: error.path, topic: message.topic }).pipe(
					Effect.as(Option.none()),
				),
		}),
		Effect.withSpan('Edge.DispatchMessage', { attributes: { 'message.topic': message.topic } }),
	)
