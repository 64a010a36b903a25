/**
 * Edge device configuration, read once at startup
 */

import * as Config from 'effect/Config'
import * as Context from 'effect/Context'
import * as Duration from 'effect/Duration'
import * as Layer from 'effect/Layer'

export const EdgeConfigValues = Config.all({
	deviceHandle: Config.nonEmptyString('DEVICE_HANDLE').pipe(Config.orElse(() => Config.nonEmptyString('AWS_IOT_THING_NAME'))),
	subscribeTenantWildcard: Config.boolean('EDGE_SUBSCRIBE_TENANT_WILDCARD').pipe(Config.withDefault(false)),
	framebuffer: Config.nonEmptyString('SIGNAL_FRAMEBUFFER').pipe(Config.withDefault('/dev/fb1')),
	lowLight: Config.boolean('SIGNAL_LOW_LIGHT').pipe(Config.withDefault(true)),
	flashUnit: Config.duration('FLASH_UNIT').pipe(Config.withDefault(Duration.seconds(1))),
})

export class EdgeConfig extends Context.Tag('@site-sentinel/edge/EdgeConfig')<
	EdgeConfig,
	Config.Config.Success<typeof EdgeConfigValues>
>() {
	static readonly Live = Layer.effect(EdgeConfig, EdgeConfigValues)
}
