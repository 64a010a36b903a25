import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'
import * as Queue from 'effect/Queue'

import type { PriorityValue } from '@site-sentinel/schemas/envelope'

import { PriorityActuator } from '../actuator/index.ts'

export const envelopePayload = (
	requester: { readonly tenantId: string; readonly deviceId: string },
	priority: unknown,
): string =>
	JSON.stringify({
		analysis: {
			description: 'Pallet stacked above rated height.',
			oshaReference: '1910.176(b)',
			priority,
			summary: 'Loading dock',
		},
		requester: { ...requester, timestamp: '2025-10-05T12:00:00.000Z' },
		tokenUsage: { inputTokens: 1200, outputTokens: 85, totalTokens: 1285 },
	})

/**
 * Actuator that hands every requested priority to `received` instead of showing it
 */
export const QueueingActuator = (received: Queue.Enqueue<PriorityValue.Type>): Layer.Layer<PriorityActuator> =>
	Layer.succeed(
		PriorityActuator,
		PriorityActuator.of({
			flash: priority =>
				Queue.offer(received, priority).pipe(Effect.as({ color: 'recorded', completed: true, level: Option.none() })),
		}),
	)
