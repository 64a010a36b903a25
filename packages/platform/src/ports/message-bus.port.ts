/**
 * MessageBusPort - publish/subscribe over the broker
 *
 * Subscriptions deliver connection lifecycle events as well as messages, so the caller can track session state
 * and react to reconnects. Events for one subscription are delivered one at a time, in arrival order.
 */

import type { NonEmptyReadonlyArray } from 'effect/Array'
import * as Context from 'effect/Context'
import * as Data from 'effect/Data'
import type * as Effect from 'effect/Effect'

/**
 * MQTT delivery guarantee
 */
export type QualityOfService = 0 | 1 | 2

export const QualityOfService = {
	AtMostOnce: 0,
	AtLeastOnce: 1,
	ExactlyOnce: 2,
} as const satisfies Record<string, QualityOfService>

/**
 * Events observed by a subscription
 *
 * - `Connecting`: the client is attempting to (re)connect
 * - `Connected`: the broker accepted the connection; subscriptions are (re)established next
 * - `Subscribed`: the broker granted every requested subscription
 * - `Disconnected`: the connection dropped; the client keeps retrying
 * - `Message`: an application message arrived on one of the subscribed topics
 */
export type BusEvent = Data.TaggedEnum<{
	Connecting: {}
	Connected: {}
	Subscribed: { readonly topics: ReadonlyArray<string> }
	Disconnected: { readonly reason: string }
	Message: { readonly topic: string; readonly payload: string; readonly qos: number }
}>

export const BusEvent = Data.taggedEnum<BusEvent>()

export declare namespace BusEvent {
	type Message = Data.TaggedEnum.Value<BusEvent, 'Message'>
}

/**
 * Message handed to the broker
 */
export interface OutboundMessage {
	readonly topic: string
	readonly payload: string
	readonly qos: QualityOfService
}

/**
 * Connection could not be established (credentials, endpoint, TLS)
 */
export class ConnectError extends Data.TaggedError('ConnectError')<{ readonly cause: string }> {}

/**
 * Message was not accepted by the broker
 */
export class PublishError extends Data.TaggedError('PublishError')<{
	readonly topic: string
	readonly cause: string
}> {}

/**
 * Broker refused or failed a subscription
 */
export class SubscribeError extends Data.TaggedError('SubscribeError')<{
	readonly topics: ReadonlyArray<string>
	readonly cause: string
}> {}

/**
 * An established subscription could not be restored after a reconnect
 */
export class SubscriptionLost extends Data.TaggedError('SubscriptionLost')<{
	readonly topics: ReadonlyArray<string>
	readonly cause: string
}> {}

export interface MessageBusPort {
	/**
	 * Publish one message. Resolves once the broker acknowledged it (QoS 1 and 2) or it was written (QoS 0).
	 */
	readonly publish: (message: OutboundMessage) => Effect.Effect<void, PublishError>

	/**
	 * Subscribe and process events until interrupted or the handler fails
	 *
	 * Subscriptions are removed when the returned effect ends, whatever the reason. Fails with `SubscribeError` when
	 * the first subscription is refused, and with `SubscriptionLost` when a later reconnect cannot restore it.
	 *
	 * @param topics - Topic filters
	 * @param handler - Runs once per event; the next event waits until it completes
	 */
	readonly subscribe: <E, R>(
		topics: NonEmptyReadonlyArray<string>,
		handler: (event: BusEvent) => Effect.Effect<void, E, R>,
	) => Effect.Effect<never, SubscribeError | SubscriptionLost | E, R>
}

export const MessageBusPort = Context.GenericTag<MessageBusPort>('@site-sentinel/platform/MessageBusPort')
