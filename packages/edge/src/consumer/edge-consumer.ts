/**
 * Edge Consumer
 *
 * Long-running loop of the device: resolve its identity, connect, subscribe to its result topic and flash every
 * analysis it receives. One session owns one connection and its subscriptions; a session ends when the directory
 * reports a different identity after a reconnect, and the next session starts on the new topics. A session whose
 * subscription could not be restored after a reconnect is replaced by a new one after {@link SessionRestartDelay}.
 */

import type { NonEmptyReadonlyArray } from 'effect/Array'
import * as Data from 'effect/Data'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'
import type * as Layer from 'effect/Layer'
import * as Ref from 'effect/Ref'

import { IdentityResolver } from '@site-sentinel/platform/identity'
import { Topics } from '@site-sentinel/platform/routing'
import type { DeviceIdentity } from '@site-sentinel/schemas/identity'

import type { PriorityActuator } from '../actuator/index.ts'
import { ConsumerState, initialState, isReconnect, transition } from '../domain/index.ts'
import * as Ports from '../ports/index.ts'
import { dispatchMessage } from '../workflows/index.ts'

/**
 * The directory now records a different identity for this device
 */
export class IdentityRotated extends Data.TaggedError('IdentityRotated')<{
	readonly previous: DeviceIdentity
	readonly current: DeviceIdentity
}> {}

export const SessionRestartDelay = Duration.seconds(5)

export interface ConsumerOptions {
	/**
	 * Also subscribe to every topic of the tenant
	 */
	readonly subscribeTenantWildcard: boolean
}

export const sessionTopics = (identity: DeviceIdentity, options: ConsumerOptions): NonEmptyReadonlyArray<string> =>
	options.subscribeTenantWildcard
		? [Topics.topicFor(identity, 'result'), Topics.topicFor(identity, 'tenantWildcard')]
		: [Topics.topicFor(identity, 'result')]

const sameIdentity = (left: DeviceIdentity, right: DeviceIdentity) =>
	left.tenantId === right.tenantId && left.deviceId === right.deviceId

/**
 * Re-resolve after a reconnect. A lookup failure keeps the current identity.
 */
const confirmIdentity = (handle: string, identity: DeviceIdentity) =>
	Effect.gen(function* () {
		const resolver = yield* IdentityResolver
		const current = yield* resolver.resolve(handle).pipe(
			Effect.catchTags({
				DirectoryUnavailable: error =>
					Effect.logWarning('Could not re-resolve identity, keeping the current one', {
						cause: error.cause,
						handle,
					}).pipe(Effect.as(identity)),
				IdentityError: error =>
					Effect.logWarning('Could not re-resolve identity, keeping the current one', {
						handle,
						reason: error.reason,
					}).pipe(Effect.as(identity)),
			}),
		)

		if (!sameIdentity(current, identity)) {
			yield* Effect.logWarning('Device identity changed, restarting session', {
				current: `${current.tenantId}/${current.deviceId}`,
				previous: `${identity.tenantId}/${identity.deviceId}`,
			})
			return yield* new IdentityRotated({ current, previous: identity })
		}
		yield* Effect.logDebug('Device identity unchanged after reconnect', { handle })
	})

const runSession = <EL, RL>(
	handle: string,
	identity: DeviceIdentity,
	bus: Layer.Layer<Ports.Platform.MessageBusPort, EL, RL>,
	options: ConsumerOptions,
) =>
	Effect.gen(function* () {
		const topics = sessionTopics(identity, options)
		const state = yield* Ref.make(initialState)

		const onEvent = (event: Ports.Platform.BusEvent) =>
			Effect.gen(function* () {
				const previous = yield* Ref.getAndUpdate(state, current => transition(current, event))
				const next = transition(previous, event)
				if (previous._tag !== next._tag) {
					yield* Effect.logInfo('Consumer state changed', { from: previous._tag, to: next._tag })
				}
				if (event._tag === 'Disconnected') {
					yield* Effect.logWarning('Connection lost', { reason: event.reason })
				}
				if (isReconnect(previous, event)) {
					yield* confirmIdentity(handle, identity)
				}
				if (event._tag === 'Message') {
					yield* dispatchMessage(event)
				}
			})

		yield* Effect.logInfo('Starting session', { topics })
		const messageBus = yield* Ports.Platform.MessageBusPort
		return yield* messageBus.subscribe(topics, onEvent).pipe(
			Effect.ensuring(
				Ref.set(state, ConsumerState.Closed()).pipe(Effect.zipRight(Effect.logInfo('Session closed', { topics }))),
			),
		)
	}).pipe(Effect.provide(bus), Effect.annotateLogs({ deviceId: identity.deviceId, tenantId: identity.tenantId }))

export const EdgeConsumer = {
	/**
	 * Resolve the identity of `handle` once, then run sessions over connections built from `bus` until interrupted
	 *
	 * Fails if the first resolution fails or a session cannot connect or make its first subscription.
	 */
	run: <EL, RL>(handle: string, bus: Layer.Layer<Ports.Platform.MessageBusPort, EL, RL>, options: ConsumerOptions) =>
		Effect.gen(function* () {
			const resolver = yield* IdentityResolver
			const initial = yield* resolver.resolve(handle)
			yield* Effect.logInfo('Resolved device identity', {
				deviceId: initial.deviceId,
				handle,
				tenantId: initial.tenantId,
			})

			const loop = (
				identity: DeviceIdentity,
			): Effect.Effect<
				never,
				EL | Ports.Platform.SubscribeError,
				RL | IdentityResolver | PriorityActuator
			> =>
				runSession(handle, identity, bus, options).pipe(
					Effect.catchTags({
						IdentityRotated: rotated => Effect.suspend(() => loop(rotated.current)),
						SubscriptionLost: lost =>
							Effect.logWarning('Subscription lost, restarting session', {
								cause: lost.cause,
								delay: Duration.format(SessionRestartDelay),
								topics: lost.topics,
							}).pipe(
								Effect.zipRight(Effect.sleep(SessionRestartDelay)),
								Effect.zipRight(Effect.suspend(() => loop(identity))),
							),
					}),
				)

			return yield* loop(initial)
		}).pipe(Effect.withSpan('EdgeConsumer.run', { attributes: { handle } })),
}
