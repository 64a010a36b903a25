import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

import { IdentityDirectory, InMemoryBroker, InMemoryBus } from '@site-sentinel/platform/adapters'
import { IdentityResolver } from '@site-sentinel/platform/identity'
import { MessageBusPort } from '@site-sentinel/platform/ports'
import { ResultEnvelope } from '@site-sentinel/schemas/envelope'

import { handleRelayRequest } from './relay-request.handler.ts'

const TestLayer = Layer.mergeAll(
	IdentityResolver.Live.pipe(
		Layer.provide(
			IdentityDirectory.Test([{ attributes: { deviceId: 'dev-1', tenantId: 'acme' }, handle: 'acme-dev-1' }]),
		),
	),
	InMemoryBus.Test,
)

const candidate = (requester: Readonly<Record<string, unknown>>) => ({
	analysis: {
		description: 'Unsecured load on top shelf.',
		oshaReference: '1910.176(b)',
		priority: 2,
		summary: 'Warehouse aisle',
	},
	requester,
	tokenUsage: { inputTokens: 900, outputTokens: 40, totalTokens: 940 },
})

const parseBody = (body: string): unknown => JSON.parse(body)

describe('handleRelayRequest', () => {
	it.effect('publishes a complete envelope for a known device', () =>
		Effect.gen(function* () {
			const broker = yield* InMemoryBroker

			const response = yield* handleRelayRequest(
				candidate({ deviceId: 'dev-1', tenantId: 'acme', timestamp: '2025-10-05T12:00:00Z' }),
			)

			expect(response.statusCode).toBe(200)
			expect(parseBody(response.body)).toStrictEqual({
				message: 'Envelope published',
				topic: 'client/acme/dev-1/result',
			})

			const [message] = yield* broker.published
			const envelope = yield* ResultEnvelope.decodeJson(message?.payload ?? '')
			expect(envelope.requester.timestamp).toBe('2025-10-05T12:00:00Z')
			expect(envelope.analysis.priority).toBe(2)
		}).pipe(Effect.provide(TestLayer)),
	)

	it.effect('rejects an envelope with a missing field before touching the directory', () =>
		Effect.gen(function* () {
			const response = yield* handleRelayRequest(candidate({ deviceId: 'dev-1', tenantId: 'acme' }))

			expect(response.statusCode).toBe(400)
			expect(parseBody(response.body)).toStrictEqual({
				detail: 'missing field: requester.timestamp',
				error: 'ValidationError',
			})
		}).pipe(Effect.provide(TestLayer)),
	)

	it.effect('rejects a requester the directory does not confirm', () =>
		Effect.gen(function* () {
			const broker = yield* InMemoryBroker

			const response = yield* handleRelayRequest(
				candidate({ deviceId: 'dev-1', tenantId: 'globex', timestamp: '2025-10-05T12:00:00Z' }),
			)

			expect(response.statusCode).toBe(400)
			expect(parseBody(response.body)).toStrictEqual({ detail: 'ClaimRejected: globex/dev-1', error: 'IdentityError' })
			expect(yield* broker.published).toStrictEqual([])
		}).pipe(Effect.provide(TestLayer)),
	)

	it.effect('rejects inconsistent token totals', () =>
		Effect.gen(function* () {
			const response = yield* handleRelayRequest({
				...candidate({ deviceId: 'dev-1', tenantId: 'acme', timestamp: '2025-10-05T12:00:00Z' }),
				tokenUsage: { inputTokens: 900, outputTokens: 40, totalTokens: 1000 },
			})

			expect(response.statusCode).toBe(400)
			expect(parseBody(response.body)).toMatchObject({ error: 'ParseError' })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.effect('reports a broker failure', () =>
		Effect.gen(function* () {
			const broker = yield* InMemoryBroker
			yield* broker.failPublishes(Option.some('offline'))

			const response = yield* handleRelayRequest(
				candidate({ deviceId: 'dev-1', tenantId: 'acme', timestamp: '2025-10-05T12:00:00Z' }),
			)

			expect(response.statusCode).toBe(500)
			expect(parseBody(response.body)).toStrictEqual({ detail: 'offline', error: 'PublishError' })
		}).pipe(Effect.provide(TestLayer)),
	)

	it.effect('answers 500 when publishing dies unexpectedly', () =>
		Effect.gen(function* () {
			const response = yield* handleRelayRequest(
				candidate({ deviceId: 'dev-1', tenantId: 'acme', timestamp: '2025-10-05T12:00:00Z' }),
			)

			expect(response.statusCode).toBe(500)
			expect(parseBody(response.body)).toStrictEqual({ detail: 'Error: socket closed', error: 'Defect' })
		}).pipe(
			Effect.provide(
				Layer.mergeAll(
					IdentityResolver.Live.pipe(
						Layer.provide(
							IdentityDirectory.Test([{ attributes: { deviceId: 'dev-1', tenantId: 'acme' }, handle: 'acme-dev-1' }]),
						),
					),
					Layer.succeed(
						MessageBusPort,
						MessageBusPort.of({
							publish: () => Effect.die(new Error('socket closed')),
							subscribe: () => Effect.never,
						}),
					),
				),
			),
		),
	)
})
