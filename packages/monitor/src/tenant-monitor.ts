/**
 * Tenant Monitor
 *
 * Administrative observer of one tenant: prints every message published under the tenant, never anything outside
 * it. Optionally publishes a test message once its subscriptions are in place, to check the path end to end.
 */

import * as Effect from 'effect/Effect'
import * as Option from 'effect/Option'
import * as Ref from 'effect/Ref'

import { IdentityResolver } from '@site-sentinel/platform/identity'
import { BusEvent, MessageBusPort, QualityOfService } from '@site-sentinel/platform/ports'
import { Topics } from '@site-sentinel/platform/routing'
import type { TenantId } from '@site-sentinel/schemas/shared'

import { ObservedMessage, observeMessage } from './domain/index.ts'

export const DefaultTestMessage = 'Test message'

export interface MonitorOptions {
	/**
	 * Published to the tenant's test topic after the first successful subscription
	 */
	readonly testMessage: Option.Option<string>
}

const report = (message: ObservedMessage) =>
	ObservedMessage.$match(message, {
		Invalid: ({ qos, reason, topic }) => Effect.logError('Invalid JSON payload', { qos, reason, topic }),
		Json: ({ pretty, qos, topic }) => Effect.logInfo(`Message on ${topic} (QoS ${qos})\n${pretty}`),
	})

/**
 * Publish `message` to the tenant's test topic and return that topic
 */
export const publishTest = Effect.fn('TenantMonitor.publishTest')(function* (
	tenantId: TenantId.Type,
	message: string = DefaultTestMessage,
) {
	const bus = yield* MessageBusPort
	const topic = Topics.testResult(tenantId)

	yield* bus.publish({ payload: message, qos: QualityOfService.AtLeastOnce, topic })
	yield* Effect.logInfo('Published test message', { topic })
	return topic
})

export const TenantMonitor = {
	/**
	 * Resolve the tenant of `handle` and report its traffic until interrupted
	 */
	run: (handle: string, options: MonitorOptions) =>
		Effect.gen(function* () {
			const resolver = yield* IdentityResolver
			const bus = yield* MessageBusPort

			const tenantId = yield* resolver.resolveTenant(handle)
			const topics = [Topics.tenantResults(tenantId), Topics.tenantWildcard(tenantId)] as const
			yield* Effect.logInfo('Monitoring tenant', { handle, tenantId, topics })

			const pendingTest = yield* Ref.make(options.testMessage)

			const sendPendingTest = Ref.getAndSet(pendingTest, Option.none()).pipe(
				Effect.flatMap(
					Option.match({
						onNone: () => Effect.void,
						onSome: message =>
							publishTest(tenantId, message).pipe(
								Effect.catchTag('PublishError', error =>
									Effect.logError('Could not publish test message', { cause: error.cause, topic: error.topic }),
								),
							),
					}),
				),
			)

			return yield* bus.subscribe(
				topics,
				BusEvent.$match({
					Connected: () => Effect.logInfo('Connected to broker'),
					Connecting: () => Effect.logInfo('Connecting to broker'),
					Disconnected: ({ reason }) => Effect.logWarning('Disconnected from broker', { reason }),
					Message: message => report(observeMessage(message)),
					Subscribed: ({ topics: granted }) =>
						Effect.logInfo('Subscribed', { topics: granted }).pipe(Effect.zipRight(sendPendingTest)),
				}),
			)
		}).pipe(Effect.withSpan('TenantMonitor.run', { attributes: { handle } })),
}
