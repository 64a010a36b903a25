/**
 * Edge device entrypoint
 *
 * Shows the priority of every analysis published for this device on its LED matrix. Runs until SIGINT/SIGTERM;
 * exits non-zero when configuration, identity resolution, the connection or the subscription fails at startup.
 */

import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import { IdentityResolver } from '@site-sentinel/platform/identity'
import { Logging } from '@site-sentinel/platform/logging'
import { runMain } from '@site-sentinel/platform/runtime'

import { FlashTiming, PriorityActuator } from './actuator/index.ts'
import * as Adapters from './adapters/index.ts'
import { EdgeConfig } from './config/index.ts'
import { EdgeConsumer } from './consumer/index.ts'

const program = Effect.gen(function* () {
	const config = yield* EdgeConfig

	const Actuator = PriorityActuator.fromDevice(
		Adapters.Framebuffer.Live({ lowLight: config.lowLight, path: config.framebuffer }),
		{ selfTest: true },
	).pipe(Layer.provide(FlashTiming.make(config.flashUnit)))

	const Resolver = IdentityResolver.Live.pipe(
		Layer.provide(Adapters.Platform.IdentityDirectory.IotRegistryWith({ requireTokenExchange: true })),
	)

	return yield* EdgeConsumer.run(config.deviceHandle, Adapters.Platform.MqttBus.Live(config.deviceHandle), {
		subscribeTenantWildcard: config.subscribeTenantWildcard,
	}).pipe(Effect.provide(Layer.merge(Actuator, Resolver)))
}).pipe(Effect.provide(Layer.merge(EdgeConfig.Live, Logging.Live)))

runMain(program)
