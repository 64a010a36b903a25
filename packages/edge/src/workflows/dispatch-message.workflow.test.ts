import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'
import * as Option from 'effect/Option'
import * as Queue from 'effect/Queue'

import { BusEvent } from '@site-sentinel/platform/ports'
import type { PriorityValue } from '@site-sentinel/schemas/envelope'

import { envelopePayload, QueueingActuator } from '../test/fixtures.ts'
import { dispatchMessage } from './dispatch-message.workflow.ts'

const topic = 'client/acme/dev-1/result'
const requester = { deviceId: 'dev-1', tenantId: 'acme' }

const dispatch = (payload: string) =>
	Effect.gen(function* () {
		const received = yield* Queue.unbounded<PriorityValue.Type>()
		const outcome = yield* dispatchMessage(BusEvent.Message({ payload, qos: 1, topic })).pipe(
			Effect.provide(QueueingActuator(received)),
		)
		return { outcome, received: yield* Queue.takeAll(received) }
	})

describe('dispatchMessage', () => {
	it.effect('flashes the priority of a complete envelope', () =>
		Effect.gen(function* () {
			const { outcome, received } = yield* dispatch(envelopePayload(requester, 4))

			expect(Option.isSome(outcome)).toBe(true)
			expect([...received]).toStrictEqual([{ _tag: 'Number', value: 4 }])
		}),
	)

	it.effect('passes a textual priority through unchanged', () =>
		Effect.gen(function* () {
			const { received } = yield* dispatch(envelopePayload(requester, '3'))

			expect([...received]).toStrictEqual([{ _tag: 'Text', value: '3' }])
		}),
	)

	it.effect('drops a payload that is not JSON', () =>
		Effect.gen(function* () {
			const { outcome, received } = yield* dispatch('priority: 5')

			expect(outcome).toStrictEqual(Option.none())
			expect([...received]).toStrictEqual([])
		}),
	)

	it.effect('drops an envelope with a missing field', () =>
		Effect.gen(function* () {
			const incomplete = JSON.stringify({ analysis: { priority: 5, summary: 's' } })

			const { outcome, received } = yield* dispatch(incomplete)

			expect(outcome).toStrictEqual(Option.none())
			expect([...received]).toStrictEqual([])
		}),
	)

	it.effect('flashes a priority that is neither number nor text', () =>
		Effect.gen(function* () {
			const { outcome, received } = yield* dispatch(envelopePayload(requester, true))

			expect(Option.isSome(outcome)).toBe(true)
			expect([...received]).toStrictEqual([{ _tag: 'Other', value: true }])
		}),
	)

	it.effect('drops an envelope whose priority is null', () =>
		Effect.gen(function* () {
			const { outcome, received } = yield* dispatch(envelopePayload(requester, null))

			expect(outcome).toStrictEqual(Option.none())
			expect([...received]).toStrictEqual([])
		}),
	)
})
