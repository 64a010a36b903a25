/**
 * In-memory {@link SignalDevicePort} that records what it was asked to show
 */

/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import * as Context from 'effect/Context'
import * as Data from 'effect/Data'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Ref from 'effect/Ref'

import type { Rgb } from '../domain/index.ts'
import { DeviceError, SignalDevicePort } from '../ports/index.ts'

export type SignalOperation = Data.TaggedEnum<{
	Fill: { readonly color: Rgb }
	Clear: {}
}>

export const SignalOperation = Data.taggedEnum<SignalOperation>()

export class SignalRecording extends Context.Tag('@site-sentinel/edge/SignalRecording')<
	SignalRecording,
	{
		/**
		 * Successful operations, oldest first
		 */
		readonly operations: Effect.Effect<ReadonlyArray<SignalOperation>>
	}
>() {}

export class RecordingSignal {
	/**
	 * @param options.failOnFill - 1-based index of the fill call that fails instead of being recorded
	 */
	static readonly Test = (
		options: { readonly failOnFill?: number } = {},
	): Layer.Layer<SignalDevicePort | SignalRecording> =>
		Layer.effectContext(
			Effect.gen(function* () {
				const operations = yield* Ref.make<ReadonlyArray<SignalOperation>>([])
				const fills = yield* Ref.make(0)

				const record = (operation: SignalOperation) => Ref.update(operations, recorded => [...recorded, operation])

				const fill = (color: Rgb) =>
					Ref.updateAndGet(fills, count => count + 1).pipe(
						Effect.flatMap(count =>
							count === options.failOnFill
								? Effect.fail(new DeviceError({ cause: 'injected failure', operation: 'fill' }))
								: record(SignalOperation.Fill({ color })),
						),
					)

				return Context.make(SignalDevicePort, SignalDevicePort.of({ clear: record(SignalOperation.Clear()), fill })).pipe(
					Context.add(SignalRecording, SignalRecording.of({ operations: Ref.get(operations) })),
				)
			}),
		)

	/**
	 * Device that cannot be opened
	 */
	static readonly Unavailable = (cause: string): Layer.Layer<SignalDevicePort, DeviceError> =>
		Layer.fail(new DeviceError({ cause, operation: 'open' }))
}
