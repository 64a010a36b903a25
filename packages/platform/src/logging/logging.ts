/**
 * Logger setup for process entrypoints
 *
 * - `LOG_FORMAT`: `pretty` (default) for terminals, `json` for log shippers
 * - `LOG_LEVEL`: minimum level, default `Info`
 */

import * as Config from 'effect/Config'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Logger from 'effect/Logger'
import * as LogLevel from 'effect/LogLevel'

export const LoggingConfig = Config.all({
	format: Config.literal('pretty', 'json')('LOG_FORMAT').pipe(Config.withDefault('pretty' as const)),
	level: Config.logLevel('LOG_LEVEL').pipe(Config.withDefault(LogLevel.Info)),
})

export const Logging = {
	Live: Layer.unwrapEffect(
		Effect.map(LoggingConfig, ({ format, level }) =>
			Layer.merge(format === 'json' ? Logger.json : Logger.pretty, Logger.minimumLogLevel(level)),
		),
	),
}
