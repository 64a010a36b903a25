/**
 * Analysis workflow: one uploaded image in, at most one published envelope out
 *
 * key → identity claim → confirmed identity → image → model answer → normalized result → envelope → publish
 */

import * as Data from 'effect/Data'
import * as Effect from 'effect/Effect'

import { IdentityResolver } from '@site-sentinel/platform/identity'
import { Requester, TokenUsage } from '@site-sentinel/schemas/analysis'
import { ResultEnvelope, validateEnvelope } from '@site-sentinel/schemas/envelope'
import { Iso8601DateTime } from '@site-sentinel/schemas/shared'

import { normalizeAnalysis, parseSourceKey } from '../domain/index.ts'
import * as Ports from '../ports/index.ts'
import { publishEnvelope } from './publish-envelope.workflow.ts'

export type AnalysisOutcome = Data.TaggedEnum<{
	Published: { readonly key: string; readonly topic: string; readonly envelope: ResultEnvelope }
	Skipped: { readonly key: string; readonly reason: string }
}>

export const AnalysisOutcome = Data.taggedEnum<AnalysisOutcome>()

export interface ImageLocation {
	readonly bucket: string
	readonly key: string
}

export const analyzeImage = Effect.fn('Analyzer.AnalyzeImage')(function* (location: ImageLocation) {
	const source = yield* parseSourceKey(location.key)
	if (source._tag === 'Skipped') {
		yield* Effect.logInfo('Skipping object', { key: location.key, reason: source.reason })
		return AnalysisOutcome.Skipped({ key: location.key, reason: source.reason })
	}

	const resolver = yield* IdentityResolver
	const store = yield* Ports.ImageStorePort
	const model = yield* Ports.VisionModelPort

	const identity = yield* resolver.confirm(source.claim)
	yield* Effect.annotateCurrentSpan({ 'requester.deviceId': identity.deviceId, 'requester.tenantId': identity.tenantId })

	const image = yield* store.fetch(location)
	const answer = yield* model.analyze(image.bytes)
	yield* Effect.logDebug('Raw model output', { output: answer.output })

	const analysis = yield* normalizeAnalysis(answer.output)
	const tokenUsage = yield* Effect.try({
		catch: () =>
			new Ports.ModelError({
				cause: `Inconsistent token counts: ${answer.inputTokens}/${answer.outputTokens}`,
				stage: 'response',
			}),
		try: () => TokenUsage.fromCounts(answer),
	})

	const envelope = new ResultEnvelope({
		analysis,
		requester: Requester.fromIdentity(identity, Iso8601DateTime.fromDateTime(image.lastModified)),
		tokenUsage,
	})
	yield* validateEnvelope(envelope)

	const topic = yield* publishEnvelope(envelope)
	return AnalysisOutcome.Published({ envelope, key: location.key, topic })
})
