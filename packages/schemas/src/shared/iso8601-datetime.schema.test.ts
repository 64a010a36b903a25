/**
 * Tests for Iso8601DateTime branded type
 */

import * as DateTime from 'effect/DateTime'
import * as Schema from 'effect/Schema'
import { describe, expect, test } from 'vitest'

import { Iso8601DateTime } from './iso8601-datetime.schema.ts'

describe('Iso8601DateTime', () => {
	describe('schema validation', () => {
		test.each([
			'2025-10-05T12:00:00Z',
			'2025-10-05T12:00:00.123Z',
			'2025-10-05T12:00:00+05:30',
			'2025-10-05T12:00:00-08:00',
			'2025-10-05T12:00:00.999+02:00',
			'2025-10-05T12:00:00.123456+00:00',
		])('accepts %s', value => {
			expect(Schema.decodeUnknownSync(Iso8601DateTime)(value)).toBe(value)
		})

		test('rejects datetime without timezone', () => {
			expect(() => Schema.decodeUnknownSync(Iso8601DateTime)('2025-10-05T12:00:00')).toThrow()
		})

		test('rejects datetime with invalid format', () => {
			expect(() => Schema.decodeUnknownSync(Iso8601DateTime)('2025/10/05 12:00:00')).toThrow()
		})

		test('rejects datetime with missing time separator', () => {
			expect(() => Schema.decodeUnknownSync(Iso8601DateTime)('2025-10-05 12:00:00Z')).toThrow()
		})

		test('rejects a dangling fraction separator', () => {
			expect(() => Schema.decodeUnknownSync(Iso8601DateTime)('2025-10-05T12:00:00.Z')).toThrow()
		})

		test('rejects non-string values', () => {
			expect(() => Schema.decodeUnknownSync(Iso8601DateTime)(123)).toThrow()
			expect(() => Schema.decodeUnknownSync(Iso8601DateTime)(null)).toThrow()
			expect(() => Schema.decodeUnknownSync(Iso8601DateTime)(new Date())).toThrow()
		})
	})

	describe('.fromDateTime()', () => {
		test('formats a UTC instant with milliseconds', () => {
			const instant = DateTime.unsafeMake(Date.UTC(2025, 9, 5, 12, 0, 0, 42))

			expect(Iso8601DateTime.fromDateTime(instant)).toBe('2025-10-05T12:00:00.042Z')
		})
	})
})
