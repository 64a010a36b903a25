/**
 * Priority Actuator
 *
 * Turns a received priority into a visible signal: the color for its level, flashed three times. Nothing that goes
 * wrong on the device reaches the caller; failures are logged and the display is cleared before `flash` returns.
 */

/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import * as Array from 'effect/Array'
import * as Context from 'effect/Context'
import * as Duration from 'effect/Duration'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

import type { PriorityValue } from '@site-sentinel/schemas/envelope'

import { coercePriority, SelfTestLevels, SignalColors, signalColor } from '../domain/index.ts'
import { type DeviceError, SignalDevicePort } from '../ports/index.ts'
import { FlashTiming } from './flash-timing.ts'

export const FlashRepetitions = 3

export interface FlashOutcome {
	readonly level: Option.Option<number>
	readonly color: string

	/**
	 * False when the device failed part-way or was never available
	 */
	readonly completed: boolean
}

const logOnly = (priority: PriorityValue.Type) =>
	Effect.gen(function* () {
		const level = coercePriority(priority)
		const color = signalColor(level)
		yield* Effect.logWarning('No signal device, priority not shown', { color: color.name, priority: priority.value })
		return { color: color.name, completed: false, level } satisfies FlashOutcome
	})

const clearAfterwards = (device: SignalDevicePort.Type) =>
	device.clear.pipe(
		Effect.tap(() => Effect.logDebug('Signal cleared')),
		Effect.catchAll(error => Effect.logError('Could not clear signal', { cause: error.cause, operation: error.operation })),
	)

const reportFailure = (message: string) => (error: DeviceError) =>
	Effect.logError(message, { cause: error.cause, operation: error.operation }).pipe(Effect.as(false))

const selfTest = (device: SignalDevicePort.Type, unit: Duration.Duration) =>
	Effect.gen(function* () {
		yield* Effect.logInfo('Testing signal device')
		const completed = yield* Effect.forEach(
			SelfTestLevels,
			level =>
				Effect.logInfo('Testing priority color', { color: SignalColors[level].name, level }).pipe(
					Effect.zipRight(device.fill(SignalColors[level].rgb)),
					Effect.zipRight(Effect.sleep(Duration.times(unit, 0.5))),
				),
			{ discard: true },
		).pipe(
			Effect.as(true),
			Effect.catchAll(reportFailure('Signal device self-test failed')),
			Effect.ensuring(clearAfterwards(device)),
		)
		if (completed) {
			yield* Effect.logInfo('Signal device self-test completed')
		}
	})

const flashOn = (device: SignalDevicePort.Type, unit: Duration.Duration) =>
	Effect.fn('PriorityActuator.flash')(function* (priority: PriorityValue.Type) {
		const level = coercePriority(priority)
		const color = signalColor(level)

		if (Option.isNone(level)) {
			yield* Effect.logWarning('Unrecognized priority, showing default signal', { priority: priority.value })
		}
		yield* Effect.logInfo('Showing priority', { color: color.name, level: Option.getOrNull(level) })

		const completed = yield* Effect.forEach(
			Array.range(1, FlashRepetitions),
			repetition =>
				Effect.logDebug('Flash', { of: FlashRepetitions, repetition }).pipe(
					Effect.zipRight(device.fill(color.rgb)),
					Effect.zipRight(Effect.sleep(unit)),
					Effect.zipRight(device.clear),
					Effect.zipRight(Effect.sleep(Duration.times(unit, 0.5))),
				),
			{ discard: true },
		).pipe(
			Effect.as(true),
			Effect.catchAll(reportFailure('Signal device failed during flash')),
			Effect.ensuring(clearAfterwards(device)),
		)

		if (completed) {
			yield* Effect.logDebug('Flash sequence completed', { color: color.name })
		}
		return { color: color.name, completed, level } satisfies FlashOutcome
	})

export class PriorityActuator extends Context.Tag('@site-sentinel/edge/PriorityActuator')<
	PriorityActuator,
	{
		readonly flash: (priority: PriorityValue.Type) => Effect.Effect<FlashOutcome>
	}
>() {
	/**
	 * Actuator over the signal device in context; with `selfTest`, each table color is shown briefly at startup
	 */
	static readonly Live = (options: {
		readonly selfTest: boolean
	}): Layer.Layer<PriorityActuator, never, SignalDevicePort | FlashTiming> =>
		Layer.effect(
			PriorityActuator,
			Effect.gen(function* () {
				const { unit } = yield* FlashTiming
				const device = yield* SignalDevicePort

				if (options.selfTest) {
					yield* selfTest(device, unit)
				}

				return PriorityActuator.of({ flash: flashOn(device, unit) })
			}),
		)

	/**
	 * Actuator without a device: reports what it would have shown
	 */
	static readonly LogOnly: Layer.Layer<PriorityActuator> = Layer.succeed(
		PriorityActuator,
		PriorityActuator.of({ flash: logOnly }),
	)

	/**
	 * Actuator over the device built from `device`, or {@link PriorityActuator.LogOnly} when it fails to initialize
	 */
	static readonly fromDevice = <E, R>(
		device: Layer.Layer<SignalDevicePort, E, R>,
		options: { readonly selfTest: boolean },
	): Layer.Layer<PriorityActuator, never, R | FlashTiming> =>
		PriorityActuator.Live(options).pipe(
			Layer.provide(device),
			Layer.catchAllCause(cause =>
				Layer.effectDiscard(Effect.logError('Signal device unavailable, priorities will only be logged', cause)).pipe(
					Layer.provideMerge(PriorityActuator.LogOnly),
				),
			),
		)
}
