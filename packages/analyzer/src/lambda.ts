/**
 * Function runtime entry points
 *
 * One managed runtime per warm container: the broker connection and AWS clients are created on first use and reused
 * by later invocations. Each container connects under its own client id, so concurrent containers do not take over
 * each other's broker session.
 */

import * as Layer from 'effect/Layer'
import * as ManagedRuntime from 'effect/ManagedRuntime'

import { IdentityResolver } from '@site-sentinel/platform/identity'
import { Logging } from '@site-sentinel/platform/logging'

import * as Adapters from './adapters/index.ts'
import { handleRelayRequest, handleStorageEvent } from './handlers/index.ts'

const ProducerClientId = 'site-sentinel-analyzer'

export const AnalyzerLive = Layer.mergeAll(
	IdentityResolver.Live.pipe(Layer.provide(Adapters.Platform.IdentityDirectory.IotRegistry)),
	Adapters.Platform.MqttBus.Live(ProducerClientId, { perInstance: true }),
	Adapters.ImageStore.S3,
	Adapters.VisionModel.Bedrock,
	Logging.Live,
)

const runtime = ManagedRuntime.make(AnalyzerLive)

export const storageEventHandler = (event: unknown) => runtime.runPromise(handleStorageEvent(event))

export const relayRequestHandler = (event: unknown) => runtime.runPromise(handleRelayRequest(event))
