import * as Schema from 'effect/Schema'
import { describe, expect, test } from 'vitest'

import { AnalysisResult } from './analysis-result.schema.ts'

const fields = { description: 'd', oshaReference: 'r', summary: 's' }

describe('AnalysisResult', () => {
	test.each([0, 1, 5, 7, 2.5, '3'])('carries priority %s as reported', priority => {
		expect(Schema.decodeUnknownSync(AnalysisResult)({ ...fields, priority }).priority).toBe(priority)
	})

	test.each(['', true, null])('rejects priority %s', priority => {
		expect(() => Schema.decodeUnknownSync(AnalysisResult)({ ...fields, priority })).toThrow()
	})

	test('rejects an empty summary', () => {
		expect(() => Schema.decodeUnknownSync(AnalysisResult)({ ...fields, priority: 1, summary: '' })).toThrow()
	})
})
