/**
 * In-memory adapter for {@link MessageBusPort}
 *
 * A process-local broker: published messages are recorded and delivered to every subscription whose filters match
 * ({@link Topics.matches}). Tests drive connection lifecycle events through {@link InMemoryBroker.emit}.
 */

/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import * as Context from 'effect/Context'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Queue from 'effect/Queue'
import * as Ref from 'effect/Ref'

import { BusEvent, MessageBusPort, type OutboundMessage, PublishError, SubscriptionLost } from '../ports/index.ts'
import { Topics } from '../routing/topics.ts'
import { type EventSink, pumpEvents } from './event-pump.ts'

interface Subscriber {
	readonly topics: ReadonlyArray<string>
	readonly sink: EventSink<SubscriptionLost>
}

export class InMemoryBroker extends Context.Tag('@site-sentinel/platform/InMemoryBroker')<
	InMemoryBroker,
	{
		readonly port: MessageBusPort

		/**
		 * Every message accepted by `publish`, oldest first
		 */
		readonly published: Effect.Effect<ReadonlyArray<OutboundMessage>>

		/**
		 * Deliver an event to current subscribers; messages only reach subscriptions with a matching filter
		 */
		readonly emit: (event: BusEvent) => Effect.Effect<void>

		/**
		 * Wait for the next subscription to be established and return its filters
		 */
		readonly nextSubscription: Effect.Effect<ReadonlyArray<string>>

		/**
		 * End every current subscription as if a reconnect could not restore it
		 */
		readonly loseSubscriptions: (cause: string) => Effect.Effect<void>

		/**
		 * Make subsequent publishes fail (Some) or succeed again (None)
		 */
		readonly failPublishes: (cause: Option.Option<string>) => Effect.Effect<void>
	}
>() {
	static readonly Default: Layer.Layer<InMemoryBroker> = Layer.effect(
		InMemoryBroker,
		Effect.gen(function* () {
			const subscribers = new Set<Subscriber>()
			const published = yield* Ref.make<ReadonlyArray<OutboundMessage>>([])
			const publishFailure = yield* Ref.make(Option.none<string>())
			const subscriptions = yield* Queue.unbounded<ReadonlyArray<string>>()

			const deliver = (event: BusEvent) =>
				Effect.sync(() => {
					for (const subscriber of subscribers) {
						if (event._tag !== 'Message' || subscriber.topics.some(filter => Topics.matches(filter, event.topic))) {
							subscriber.sink.emit(event)
						}
					}
				})

			const port = MessageBusPort.of({
				publish: message =>
					Ref.get(publishFailure).pipe(
						Effect.flatMap(
							Option.match({
								onNone: () =>
									Ref.update(published, messages => [...messages, message]).pipe(
										Effect.zipRight(deliver(BusEvent.Message(message))),
									),
								onSome: cause => Effect.fail(new PublishError({ cause, topic: message.topic })),
							}),
						),
					),

				subscribe: (topics, handler) =>
					pumpEvents(
						16,
						(sink: EventSink<SubscriptionLost>) =>
							Effect.gen(function* () {
								const subscriber: Subscriber = { sink, topics }
								yield* Effect.acquireRelease(
									Effect.sync(() => subscribers.add(subscriber)),
									() => Effect.sync(() => subscribers.delete(subscriber)),
								)
								sink.emit(BusEvent.Connected())
								sink.emit(BusEvent.Subscribed({ topics }))
								yield* Queue.offer(subscriptions, topics)
							}),
						handler,
					),
			})

			return InMemoryBroker.of({
				emit: deliver,
				failPublishes: cause => Ref.set(publishFailure, cause),
				loseSubscriptions: cause =>
					Effect.sync(() => {
						for (const subscriber of subscribers) {
							subscriber.sink.fail(new SubscriptionLost({ cause, topics: subscriber.topics }))
						}
					}),
				nextSubscription: Queue.take(subscriptions),
				port,
				published: Ref.get(published),
			})
		}),
	)
}

export class InMemoryBus {
	/**
	 * Port backed by the {@link InMemoryBroker} in context; every build of this layer shares that broker
	 */
	static readonly Live: Layer.Layer<MessageBusPort, never, InMemoryBroker> = Layer.effect(
		MessageBusPort,
		Effect.map(InMemoryBroker, broker => broker.port),
	)

	static readonly Test: Layer.Layer<MessageBusPort | InMemoryBroker> = InMemoryBus.Live.pipe(
		Layer.provideMerge(InMemoryBroker.Default),
	)
}
