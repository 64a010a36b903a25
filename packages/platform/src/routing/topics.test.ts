import { describe, expect, it } from '@effect/vitest'
import * as Option from 'effect/Option'

import { DeviceIdentity } from '@site-sentinel/schemas/identity'
import { DeviceId, TenantId } from '@site-sentinel/schemas/shared'

import { Topics } from './topics.ts'

const identity = (tenantId: string, deviceId: string) =>
	new DeviceIdentity({ deviceId: DeviceId.make(deviceId), tenantId: TenantId.make(tenantId) })

describe('Topics', () => {
	describe('topicFor', () => {
		it('should build the device result topic', () => {
			expect(Topics.topicFor(identity('acme', 'dev-1'), 'result')).toBe('client/acme/dev-1/result')
		})

		it('should build the tenant wildcard', () => {
			expect(Topics.topicFor(identity('acme', 'dev-1'), 'tenantWildcard')).toBe('client/acme/#')
		})

		it('should give distinct topics to devices of different tenants with the same device id', () => {
			expect(Topics.topicFor(identity('acme', 'dev-1'), 'result')).not.toBe(
				Topics.topicFor(identity('globex', 'dev-1'), 'result'),
			)
		})

		it('should be deterministic', () => {
			const a = identity('acme', 'dev-1')
			expect(Topics.topicFor(a, 'result')).toBe(Topics.topicFor(a, 'result'))
		})
	})

	describe('tenant filters', () => {
		it('should build the single-level result filter', () => {
			expect(Topics.tenantResults(TenantId.make('acme'))).toBe('client/acme/+/result')
		})

		it('should build the tenant wildcard from a tenant alone', () => {
			expect(Topics.tenantWildcard(TenantId.make('acme'))).toBe('client/acme/#')
		})

		it('should place the test topic under both tenant filters', () => {
			const acme = TenantId.make('acme')
			const topic = Topics.testResult(acme)

			expect(topic).toBe('client/acme/test/result')
			expect(Topics.matches(Topics.tenantResults(acme), topic)).toBe(true)
			expect(Topics.matches(Topics.tenantWildcard(acme), topic)).toBe(true)
		})
	})

	describe('matches', () => {
		it('should match an exact topic', () => {
			expect(Topics.matches('client/acme/dev-1/result', 'client/acme/dev-1/result')).toBe(true)
		})

		it('should not match a different device', () => {
			expect(Topics.matches('client/acme/dev-1/result', 'client/acme/dev-2/result')).toBe(false)
		})

		it('should match one level with +', () => {
			expect(Topics.matches('client/acme/+/result', 'client/acme/dev-2/result')).toBe(true)
		})

		it('should not let + span two levels', () => {
			expect(Topics.matches('client/acme/+/result', 'client/acme/a/b/result')).toBe(false)
		})

		it('should match everything below # and the parent level', () => {
			expect(Topics.matches('client/acme/#', 'client/acme/dev-1/result')).toBe(true)
			expect(Topics.matches('client/acme/#', 'client/acme/test/result')).toBe(true)
			expect(Topics.matches('client/acme/#', 'client/acme')).toBe(true)
		})

		it('should never match across tenants', () => {
			expect(Topics.matches('client/acme/#', 'client/globex/dev-1/result')).toBe(false)
			expect(Topics.matches('client/acme/+/result', 'client/acme-west/dev-1/result')).toBe(false)
		})

		it('should reject # that is not the last level', () => {
			expect(Topics.matches('client/#/result', 'client/acme/result')).toBe(false)
		})

		it('should not match a shorter topic', () => {
			expect(Topics.matches('client/acme/dev-1/result', 'client/acme/dev-1')).toBe(false)
		})
	})

	describe('parseResultTopic', () => {
		it('should recover the identity of a result topic', () => {
			expect(Topics.parseResultTopic('client/acme/dev-1/result')).toStrictEqual(
				Option.some(identity('acme', 'dev-1')),
			)
		})

		it('should be None for a filter', () => {
			expect(Option.isNone(Topics.parseResultTopic('client/acme/+/result'))).toBe(true)
		})

		it('should be None for a non-result topic', () => {
			expect(Option.isNone(Topics.parseResultTopic('client/acme/dev-1/status'))).toBe(true)
		})

		it('should be None for an empty level', () => {
			expect(Option.isNone(Topics.parseResultTopic('client//dev-1/result'))).toBe(true)
		})
	})
})
