/**
 * Publisher
 *
 * Encodes a validated envelope once and hands it to the broker once, at least once delivery, on the result topic of
 * the identity the envelope was built for. There is no local retry: a failed publish is reported to the caller.
 */

import * as Effect from 'effect/Effect'

import { Topics } from '@site-sentinel/platform/routing'
import { ResultEnvelope } from '@site-sentinel/schemas/envelope'

import * as Ports from '../ports/index.ts'

export const publishEnvelope = Effect.fn('Analyzer.PublishEnvelope')(function* (envelope: ResultEnvelope) {
	const bus = yield* Ports.Platform.MessageBusPort
	const topic = Topics.topicFor(envelope.requester.identity, 'result')

	yield* Effect.annotateCurrentSpan({
		'envelope.deviceId': envelope.requester.deviceId,
		'envelope.priority': envelope.analysis.priority,
		'envelope.tenantId': envelope.requester.tenantId,
		'message.topic': topic,
	})

	const payload = yield* ResultEnvelope.encodeJson(envelope).pipe(
		Effect.mapError(error => new Ports.Platform.PublishError({ cause: `Cannot encode envelope: ${error.message}`, topic })),
	)

	yield* bus.publish({ payload, qos: Ports.Platform.QualityOfService.AtLeastOnce, topic })

	yield* Effect.logInfo('Published analysis result', { priority: envelope.analysis.priority, topic })
	yield* Effect.logDebug('Published envelope', { payload })

	return topic
})
