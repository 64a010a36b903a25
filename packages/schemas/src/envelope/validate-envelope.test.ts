import * as Either from 'effect/Either'
import * as Option from 'effect/Option'
import { describe, expect, test } from 'vitest'

import { firstMissingField, ValidationError, validateEnvelope } from './validate-envelope.ts'

const complete = () => ({
	analysis: { description: 'd', oshaReference: 'r', priority: 3, summary: 's' },
	requester: { deviceId: 'dev-1', tenantId: 'acme', timestamp: '2025-10-05T12:00:00Z' },
	tokenUsage: { inputTokens: 1, outputTokens: 2, totalTokens: 3 },
})

const failureOf = (candidate: unknown) =>
	Either.match(validateEnvelope(candidate), {
		onLeft: error => ({ field: error.field, section: error.section }),
		onRight: () => undefined,
	})

describe('validateEnvelope', () => {
	test('returns the same candidate when every field is present', () => {
		const candidate = complete()

		const result = validateEnvelope(candidate)

		expect(Either.isRight(result) && result.right === candidate).toBe(true)
	})

	test('treats an empty string and zero as present', () => {
		const candidate = complete()
		candidate.analysis.summary = ''
		candidate.analysis.priority = 0

		expect(Either.isRight(validateEnvelope(candidate))).toBe(true)
	})

	test('reports the missing timestamp', () => {
		const { requester, ...rest } = complete()
		const candidate = { ...rest, requester: { deviceId: requester.deviceId, tenantId: requester.tenantId } }

		expect(failureOf(candidate)).toStrictEqual({ field: 'timestamp', section: 'requester' })
	})

	test('reports a null field as missing', () => {
		const candidate = { ...complete(), tokenUsage: { inputTokens: 1, outputTokens: null, totalTokens: 3 } }

		expect(failureOf(candidate)).toStrictEqual({ field: 'outputTokens', section: 'tokenUsage' })
	})

	test('reports the first field of a missing section', () => {
		const { analysis, tokenUsage } = complete()

		expect(failureOf({ analysis, tokenUsage })).toStrictEqual({ field: 'tenantId', section: 'requester' })
	})

	test('reports the first field of a section that is not an object', () => {
		expect(failureOf({ ...complete(), analysis: 'oops' })).toStrictEqual({ field: 'priority', section: 'analysis' })
	})

	test('checks sections in order analysis, tokenUsage, requester', () => {
		expect(failureOf({})).toStrictEqual({ field: 'priority', section: 'analysis' })
	})

	test('rejects non-object candidates', () => {
		expect(failureOf(null)).toStrictEqual({ field: 'priority', section: 'analysis' })
		expect(failureOf([1, 2])).toStrictEqual({ field: 'priority', section: 'analysis' })
	})

	test('does not mutate the candidate', () => {
		const candidate = { analysis: { priority: 3 } }

		validateEnvelope(candidate)

		expect(candidate).toStrictEqual({ analysis: { priority: 3 } })
	})

	test('error exposes a dotted path', () => {
		expect(new ValidationError({ field: 'summary', section: 'analysis' }).path).toBe('analysis.summary')
	})
})

describe('firstMissingField', () => {
	test('is None for a complete envelope', () => {
		expect(Option.isNone(firstMissingField(complete()))).toBe(true)
	})
})
