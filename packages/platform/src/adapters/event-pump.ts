import * as Deferred from 'effect/Deferred'
import * as Effect from 'effect/Effect'
import * as Queue from 'effect/Queue'
import * as Runtime from 'effect/Runtime'
import type * as Scope from 'effect/Scope'

import type { BusEvent } from '../ports/index.ts'

/**
 * Where a subscription's client callbacks put their events
 */
export interface EventSink<EF> {
	/**
	 * Queue an event, suspending while the queue is full
	 */
	readonly offer: (event: BusEvent) => Effect.Effect<void>

	/**
	 * Queue an event from a callback that cannot wait. Each call parks one offer while the queue is full, so this is
	 * for connection lifecycle events only; messages go through `offer`.
	 */
	readonly emit: (event: BusEvent) => void

	/**
	 * End the subscription with `error`
	 */
	readonly fail: (error: EF) => void
}

/**
 * Bridge callback-style broker events into one consuming fiber
 *
 * `attach` registers listeners that feed the sink; it runs inside the subscription scope so its finalizers remove
 * them again. Events go through a queue of `capacity` and the handler sees them one at a time in arrival order. The
 * pump ends with the first error passed to `fail`.
 */
export const pumpEvents = <E, R, EA, RA, EF = never>(
	capacity: number,
	attach: (sink: EventSink<EF>) => Effect.Effect<void, EA, RA | Scope.Scope>,
	handler: (event: BusEvent) => Effect.Effect<void, E, R>,
): Effect.Effect<never, E | EA | EF, R | Exclude<RA, Scope.Scope>> =>
	Effect.scoped(
		Effect.gen(function* () {
			const queue = yield* Effect.acquireRelease(Queue.bounded<BusEvent>(capacity), Queue.shutdown)
			const failure = yield* Deferred.make<never, EF>()
			const runFork = Runtime.runFork(yield* Effect.runtime<never>())

			const offer = (event: BusEvent) => Queue.offer(queue, event).pipe(Effect.asVoid)

			yield* attach({
				emit: event => {
					runFork(offer(event))
				},
				fail: error => {
					runFork(Deferred.fail(failure, error))
				},
				offer,
			})

			return yield* Effect.raceFirst(
				Queue.take(queue).pipe(Effect.flatMap(handler), Effect.forever),
				Deferred.await(failure),
			)
		}),
	)
