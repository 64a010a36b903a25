import { describe, expect, it } from '@effect/vitest'
import * as Either from 'effect/Either'

import { classifyModelOutput, normalizeAnalysis } from './normalize-analysis.ts'

const failureOf = (raw: unknown) =>
	Either.match(normalizeAnalysis(raw), {
		onLeft: error => ({ field: error.field, reason: error.reason }),
		onRight: () => undefined,
	})

describe('classifyModelOutput', () => {
	it('recognizes a concern list', () => {
		expect(classifyModelOutput({ description: [] })._tag).toBe('ConcernList')
	})

	it('treats a plain description as scalar', () => {
		expect(classifyModelOutput({ description: 'text' })._tag).toBe('Scalar')
	})

	it('treats non-object output as an empty scalar', () => {
		expect(classifyModelOutput('not json object')).toMatchObject({
			_tag: 'Scalar',
			description: '',
			oshaReference: '',
		})
	})
})

describe('normalizeAnalysis', () => {
	it('joins concerns with a space and references with a semicolon', () => {
		const result = normalizeAnalysis({
			description: [
				{ concern: 'a', oshaReference: 'r1' },
				{ concern: 'b', oshaReference: 'r2' },
			],
			priority: 3,
			summary: 's',
		})

		expect(Either.getOrThrow(result)).toMatchObject({
			description: 'a b',
			oshaReference: 'r1; r2',
			priority: 3,
			summary: 's',
		})
	})

	it('copies a scalar answer through', () => {
		const result = normalizeAnalysis({ description: 'd', oshaReference: 'r', priority: 5, summary: 's' })

		expect(Either.getOrThrow(result)).toMatchObject({ description: 'd', oshaReference: 'r', priority: 5, summary: 's' })
	})

	it('accepts the invalid-image answer', () => {
		const result = normalizeAnalysis({
			description: 'The image appears to be a landscape',
			oshaReference: 'N/A',
			priority: 0,
			summary: 'Invalid image',
		})

		expect(Either.getOrThrow(result).priority).toBe(0)
	})

	it('fails on an absent oshaReference', () => {
		expect(failureOf({ description: 'x', priority: 2, summary: 's' })).toStrictEqual({
			field: 'oshaReference',
			reason: 'missing',
		})
	})

	it('fails on the description of an empty concern list', () => {
		expect(failureOf({ description: [], priority: 2, summary: 's' })).toStrictEqual({
			field: 'description',
			reason: 'missing',
		})
	})

	it('treats missing concern sub-fields as empty strings', () => {
		const result = normalizeAnalysis({ description: [{ concern: 'a' }, { oshaReference: 'r2' }], priority: 1, summary: 's' })

		expect(Either.getOrThrow(result)).toMatchObject({ description: 'a ', oshaReference: 'r2' })
	})

	it('reports the first failing field in order', () => {
		expect(failureOf({})).toStrictEqual({ field: 'priority', reason: 'missing' })
		expect(failureOf({ priority: 1 })).toStrictEqual({ field: 'summary', reason: 'missing' })
		expect(failureOf({ priority: 1, summary: '' })).toStrictEqual({ field: 'summary', reason: 'missing' })
		expect(failureOf({ priority: 1, summary: null })).toStrictEqual({ field: 'summary', reason: 'missing' })
	})

	it.each([7, 2.5, '3', ' 4 '])('carries priority %s through unchanged', priority => {
		const raw = { description: 'd', oshaReference: 'r', priority, summary: 's' }

		expect(Either.getOrThrow(normalizeAnalysis(raw))).toMatchObject(raw)
	})

	it('rejects a priority that is neither number nor text', () => {
		expect(failureOf({ description: 'd', oshaReference: 'r', priority: true, summary: 's' })).toStrictEqual({
			field: 'priority',
			reason: 'invalid',
		})
	})

	it('rejects a non-string summary', () => {
		expect(failureOf({ description: 'd', oshaReference: 'r', priority: 1, summary: 42 })).toStrictEqual({
			field: 'summary',
			reason: 'invalid',
		})
	})

	it('is deterministic', () => {
		const raw = { description: [{ concern: 'a', oshaReference: 'r' }], priority: 4, summary: 's' }

		expect(normalizeAnalysis(raw)).toStrictEqual(normalizeAnalysis(raw))
	})
})
