/**
 * SignalDevicePort - the visual signal shown for a received priority
 *
 * The device shows one solid color or nothing. It has no notion of priorities or timing; both belong to the
 * actuator.
 */

import * as Context from 'effect/Context'
import type * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'

import type { Rgb } from '../domain/index.ts'

export class DeviceError extends Schema.TaggedError<DeviceError>()('DeviceError', {
	operation: Schema.Literal('open', 'fill', 'clear'),
	cause: Schema.optional(Schema.String),
}) {}

export class SignalDevicePort extends Context.Tag('@site-sentinel/edge/SignalDevicePort')<
	SignalDevicePort,
	{
		/**
		 * Show `color` on the whole display
		 */
		readonly fill: (color: Rgb) => Effect.Effect<void, DeviceError>

		/**
		 * Turn every pixel off
		 */
		readonly clear: Effect.Effect<void, DeviceError>
	}
>() {}

export declare namespace SignalDevicePort {
	type Type = Context.Tag.Service<SignalDevicePort>
}
