/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import * as Context from 'effect/Context'
import * as Duration from 'effect/Duration'
import * as Layer from 'effect/Layer'

/**
 * Base time unit of the signal: a flash holds the color for one unit and stays dark for half a unit
 */
export class FlashTiming extends Context.Tag('@site-sentinel/edge/FlashTiming')<
	FlashTiming,
	{ readonly unit: Duration.Duration }
>() {
	static readonly make = (unit: Duration.DurationInput): Layer.Layer<FlashTiming> =>
		Layer.succeed(FlashTiming, FlashTiming.of({ unit: Duration.decode(unit) }))

	static readonly Default: Layer.Layer<FlashTiming> = FlashTiming.make(Duration.seconds(1))
}
