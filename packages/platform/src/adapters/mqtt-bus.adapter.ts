/**
 * MQTT adapter for {@link MessageBusPort}
 *
 * One client per layer: the connection is opened when the layer is built and closed when its scope ends. The client
 * reconnects on its own (`reconnectPeriod`); because it does not restore subscriptions itself, every subscription
 * re-subscribes on each `connect`, and ends with `SubscriptionLost` when that fails.
 *
 * Incoming messages are taken through the client's `handleMessage` hook, which holds back the next packet until the
 * message is queued; a full subscription queue therefore stops reading from the socket instead of buffering.
 */

/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import { readFile } from 'node:fs/promises'

import type { NonEmptyReadonlyArray } from 'effect/Array'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Random from 'effect/Random'
import * as Runtime from 'effect/Runtime'
import { connectAsync, type IClientOptions, type ISubscriptionGrant, type MqttClient } from 'mqtt'

import { BrokerConfig } from '../config/index.ts'
import {
	BusEvent,
	ConnectError,
	MessageBusPort,
	PublishError,
	SubscribeError,
	SubscriptionLost,
} from '../ports/index.ts'
import { Topics } from '../routing/topics.ts'
import { type EventSink, pumpEvents } from './event-pump.ts'

const SubscriptionRefused = 128

type PublishPacket = Parameters<MqttClient['handleMessage']>[0]

interface MessageSink {
	readonly topics: ReadonlyArray<string>
	readonly offer: (event: BusEvent) => Effect.Effect<void>
}

export interface ClientPortOptions {
	readonly qos: 0 | 1 | 2
	readonly queueCapacity: number

	/**
	 * Longest wait for the broker to acknowledge a publish
	 */
	readonly publishTimeout: Duration.Duration
}

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))

interface Credentials {
	readonly ca: Buffer
	readonly cert: Buffer
	readonly key: Buffer
}

export class MqttBus {
	/**
	 * Client options for a mutually authenticated TLS session
	 */
	static readonly clientOptions = (
		config: BrokerConfig,
		credentials: Credentials,
		fallbackClientId: string,
		instance: Option.Option<string> = Option.none(),
	): IClientOptions => ({
		ca: credentials.ca,
		cert: credentials.cert,
		clean: true,
		clientId: MqttBus.clientId(config, fallbackClientId, instance),
		keepalive: Math.round(Duration.toSeconds(config.keepalive)),
		key: credentials.key,
		protocol: 'mqtts',
		reconnectPeriod: Duration.toMillis(config.reconnectPeriod),
		rejectUnauthorized: true,
		resubscribe: false,
	})

	/**
	 * `MQTT_CLIENT_ID`, or the fallback, followed by `-{instance}` when the process needs an id of its own
	 */
	static readonly clientId = (config: BrokerConfig, fallbackClientId: string, instance: Option.Option<string>) => {
		const base = Option.getOrElse(config.clientId, () => fallbackClientId)
		return Option.match(instance, { onNone: () => base, onSome: suffix => `${base}-${suffix}` })
	}

	private static readonly instanceSuffix = Random.nextIntBetween(0, 36 ** 6).pipe(
		Effect.map(value => value.toString(36).padStart(6, '0')),
	)

	/**
	 * Topics the broker refused (granted QoS 128)
	 */
	static readonly refusedTopics = (grants: ReadonlyArray<ISubscriptionGrant>): ReadonlyArray<string> =>
		grants.filter(grant => grant.qos === SubscriptionRefused).map(grant => grant.topic)

	private static readonly readCredentials = (config: BrokerConfig) =>
		Effect.tryPromise({
			catch: cause => new ConnectError({ cause: `Cannot read TLS material: ${describeCause(cause)}` }),
			try: async () => {
				const [ca, cert, key] = await Promise.all([
					readFile(config.caPath),
					readFile(config.certPath),
					readFile(config.keyPath),
				])
				return { ca, cert, key } satisfies Credentials
			},
		})

	private static readonly connect = (config: BrokerConfig, options: IClientOptions) =>
		Effect.acquireRelease(
			Effect.tryPromise({
				catch: cause => new ConnectError({ cause: describeCause(cause) }),
				try: () => connectAsync(`mqtts://${config.endpoint}:${config.port}`, options),
			}).pipe(Effect.tap(() => Effect.logInfo('Connected to broker', { clientId: options.clientId, endpoint: config.endpoint }))),
			client =>
				Effect.tryPromise(() => client.endAsync()).pipe(
					Effect.tap(() => Effect.logInfo('Broker connection closed', { clientId: options.clientId })),
					Effect.catchAll(error => Effect.logWarning('Broker connection did not close cleanly', { error: describeCause(error) })),
				),
		)

	private static readonly subscribeTopics = (client: MqttClient, topics: NonEmptyReadonlyArray<string>, qos: 0 | 1 | 2) =>
		Effect.tryPromise({
			catch: cause => new SubscribeError({ cause: describeCause(cause), topics }),
			try: () => client.subscribeAsync([...topics], { qos }),
		}).pipe(
			Effect.flatMap(grants => {
				const refused = MqttBus.refusedTopics(grants)
				return refused.length === 0
					? Effect.void
					: Effect.fail(new SubscribeError({ cause: 'Subscription refused by broker', topics: refused }))
			}),
		)

	/**
	 * Port implementation over an already connected client
	 *
	 * Takes over the client's `handleMessage` hook; messages reach every subscription with a matching filter.
	 */
	static readonly fromClient = (client: MqttClient, options: ClientPortOptions): MessageBusPort => {
		const sinks = new Set<MessageSink>()

		client.handleMessage = (packet: PublishPacket, callback) => {
			const event = BusEvent.Message({
				payload: typeof packet.payload === 'string' ? packet.payload : packet.payload.toString('utf-8'),
				qos: packet.qos,
				topic: packet.topic,
			})
			const receivers = [...sinks].filter(sink => sink.topics.some(filter => Topics.matches(filter, packet.topic)))
			Effect.runFork(
				Effect.forEach(receivers, sink => sink.offer(event), { discard: true }).pipe(
					Effect.ensuring(Effect.sync(() => callback())),
				),
			)
		}

		const unsubscribe = (topics: ReadonlyArray<string>) =>
			client.connected
				? Effect.tryPromise(() => client.unsubscribeAsync([...topics])).pipe(
						Effect.tap(() => Effect.logDebug('Unsubscribed', { topics })),
						Effect.catchAll(error => Effect.logWarning('Unsubscribe failed', { error: describeCause(error), topics })),
					)
				: Effect.void

		return MessageBusPort.of({
			publish: message =>
				Effect.tryPromise({
					catch: cause => new PublishError({ cause: describeCause(cause), topic: message.topic }),
					try: () => client.publishAsync(message.topic, message.payload, { qos: message.qos }),
				}).pipe(
					Effect.timeoutFail({
						duration: options.publishTimeout,
						onTimeout: () =>
							new PublishError({
								cause: `No acknowledgement within ${Duration.format(options.publishTimeout)}`,
								topic: message.topic,
							}),
					}),
					Effect.asVoid,
					Effect.withSpan('MqttBus.publish', { attributes: { topic: message.topic } }),
				),

			subscribe: (topics, handler) =>
				pumpEvents(
					options.queueCapacity,
					(sink: EventSink<SubscriptionLost>) =>
						Effect.gen(function* () {
							const runFork = Runtime.runFork(yield* Effect.runtime<never>())
							const messages: MessageSink = { offer: sink.offer, topics }
							const subscribed = MqttBus.subscribeTopics(client, topics, options.qos).pipe(
								Effect.tap(() => Effect.sync(() => sink.emit(BusEvent.Subscribed({ topics })))),
							)

							const onConnect = () => {
								sink.emit(BusEvent.Connected())
								runFork(
									subscribed.pipe(
										Effect.tapError(error =>
											Effect.logError('Re-subscription after reconnect failed', { cause: error.cause, topics: error.topics }),
										),
										Effect.catchAll(error =>
											Effect.sync(() => sink.fail(new SubscriptionLost({ cause: error.cause, topics: error.topics }))),
										),
									),
								)
							}
							const onReconnect = () => sink.emit(BusEvent.Connecting())
							const onClose = () => sink.emit(BusEvent.Disconnected({ reason: 'connection closed' }))
							const onOffline = () => sink.emit(BusEvent.Disconnected({ reason: 'client offline' }))
							const onError = (error: Error) => {
								runFork(Effect.logWarning('Broker client error', { error: error.message }))
							}

							yield* Effect.acquireRelease(
								Effect.sync(() => {
									client.on('connect', onConnect)
									client.on('reconnect', onReconnect)
									client.on('close', onClose)
									client.on('offline', onOffline)
									client.on('error', onError)
									sinks.add(messages)
								}),
								() =>
									Effect.sync(() => {
										sinks.delete(messages)
										client.removeListener('connect', onConnect)
										client.removeListener('reconnect', onReconnect)
										client.removeListener('close', onClose)
										client.removeListener('offline', onOffline)
										client.removeListener('error', onError)
									}),
							)

							const initial: Effect.Effect<void, SubscribeError> = client.connected
								? Effect.sync(() => sink.emit(BusEvent.Connected())).pipe(Effect.zipRight(subscribed))
								: Effect.void
							yield* Effect.acquireRelease(initial, () => unsubscribe(topics))
						}),
					handler,
				),
		})
	}

	/**
	 * Live layer: reads {@link BrokerConfig} and the TLS material, connects, and disconnects on release
	 *
	 * @param fallbackClientId - Client id when `MQTT_CLIENT_ID` is unset, normally the device handle
	 * @param options.perInstance - Append a random suffix to the client id, for processes that run as many copies
	 */
	static readonly Live = (fallbackClientId: string, options: { readonly perInstance?: boolean } = {}) =>
		Layer.scoped(
			MessageBusPort,
			Effect.gen(function* () {
				const config = yield* BrokerConfig
				const credentials = yield* MqttBus.readCredentials(config)
				const instance = options.perInstance === true ? Option.some(yield* MqttBus.instanceSuffix) : Option.none()
				const client = yield* MqttBus.connect(
					config,
					MqttBus.clientOptions(config, credentials, fallbackClientId, instance),
				)
				return MqttBus.fromClient(client, {
					publishTimeout: config.publishTimeout,
					qos: config.qos,
					queueCapacity: config.queueCapacity,
				})
			}),
		)
}
