/**
 * Tenant monitor entrypoint
 *
 * Prints every message of the tenant this client belongs to. Set `MONITOR_TEST_MESSAGE` to publish one message to the
 * tenant's test topic once subscribed.
 */

import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { IdentityDirectory, MqttBus } from '@site-sentinel/platform/adapters'
import { IdentityResolver } from '@site-sentinel/platform/identity'
import { Logging } from '@site-sentinel/platform/logging'
import { runMain } from '@site-sentinel/platform/runtime'

import { MonitorConfig } from './config/index.ts'
import { TenantMonitor } from './tenant-monitor.ts'

const program = Effect.gen(function* () {
	const config = yield* MonitorConfig

	return yield* TenantMonitor.run(config.handle, { testMessage: config.testMessage }).pipe(
		Effect.provide(
			Layer.merge(
				MqttBus.Live(config.handle),
				IdentityResolver.Live.pipe(Layer.provide(IdentityDirectory.IotRegistry)),
			),
		),
	)
}).pipe(Effect.provide(Logging.Live))

runMain(program)
