/**
 * Relay workflow: publish an envelope assembled elsewhere
 *
 * The candidate must be complete and well-formed, and its requester must match the directory. The topic is derived
 * from the confirmed identity, never from the candidate itself.
 */

import * as Effect from 'effect/Effect'
import * as Schema from 'effect/Schema'

import { IdentityResolver } from '@site-sentinel/platform/identity'
import { Requester } from '@site-sentinel/schemas/analysis'
import { ResultEnvelope, validateEnvelope } from '@site-sentinel/schemas/envelope'

import { publishEnvelope } from './publish-envelope.workflow.ts'

export const relayEnvelope = Effect.fn('Analyzer.RelayEnvelope')(function* (candidate: unknown) {
	const resolver = yield* IdentityResolver

	yield* validateEnvelope(candidate)
	const decoded = yield* Schema.decodeUnknown(ResultEnvelope)(candidate)
	const identity = yield* resolver.confirm(decoded.requester)

	const envelope = new ResultEnvelope({
		analysis: decoded.analysis,
		requester: Requester.fromIdentity(identity, decoded.requester.timestamp),
		tokenUsage: decoded.tokenUsage,
	})

	return yield* publishEnvelope(envelope)
})
