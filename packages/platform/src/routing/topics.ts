/**
 * Centralized topic/routing configuration
 *
 * Topic Naming Convention:
 * - Device results: `client/{tenantId}/{deviceId}/result`
 * - Tenant wildcard: `client/{tenantId}/#` (administrative consumers only)
 * - Tenant results: `client/{tenantId}/+/result` (every device of one tenant)
 *
 * Routing Strategy:
 * - Producer and consumers derive topics from the same resolved identity, never from payload values
 * - Identifiers are branded topic segments, so an identity can never widen a filter or escape its tenant
 *
 * Evolution Path:
 * - New result kinds become new {@link Topics.Kind} members with their own suffix
 */

import * as Array from 'effect/Array'
import * as Option from 'effect/Option'

import { DeviceId, TenantId } from '@site-sentinel/schemas/shared'
import { DeviceIdentity } from '@site-sentinel/schemas/identity'

export namespace Topics {
	const root = 'client' as const
	const result = 'result' as const
	const separator = '/'
	const singleLevel = '+'
	const multiLevel = '#'

	/**
	 * Topic kinds derivable from an identity
	 *
	 * - `result`: the exact device topic results are published to and edge devices subscribe to
	 * - `tenantWildcard`: every topic under the tenant, for administrative observers
	 */
	export type Kind = 'result' | 'tenantWildcard'

	/**
	 * Device-scoped result topic
	 */
	export type Result = `${typeof root}/${string}/${string}/${typeof result}`

	/**
	 * Tenant-scoped filter
	 */
	export type TenantFilter = `${typeof root}/${string}/${typeof multiLevel}` | `${typeof root}/${string}/+/${typeof result}`

	/**
	 * Valid topic type (compile-time validation)
	 */
	export type Type = Result | TenantFilter

	/**
	 * Compute the topic for an identity
	 *
	 * @example
	 * ```typescript ignore
	 * Topics.topicFor(identity, 'result') // 'client/acme/dev-1/result'
	 * Topics.topicFor(identity, 'tenantWildcard') // 'client/acme/#'
	 * ```
	 */
	export function topicFor(identity: DeviceIdentity, kind: 'result'): Result
	export function topicFor(identity: DeviceIdentity, kind: 'tenantWildcard'): TenantFilter
	export function topicFor(identity: DeviceIdentity, kind: Kind): Type
	export function topicFor(identity: DeviceIdentity, kind: Kind): Type {
		return kind === 'result'
			? `${root}/${identity.tenantId}/${identity.deviceId}/${result}`
			: `${root}/${identity.tenantId}/${multiLevel}`
	}

	/**
	 * Filter matching the result topic of every device of one tenant
	 */
	export const tenantResults = (tenantId: TenantId.Type): TenantFilter =>
		`${root}/${tenantId}/${singleLevel}/${result}`

	/**
	 * Result topic of the tenant's pseudo device `test`, used to check a monitor's subscription end to end
	 */
	export const testResult = (tenantId: TenantId.Type): Result => `${root}/${tenantId}/test/${result}`

	/**
	 * Filter matching every topic under one tenant
	 */
	export const tenantWildcard = (tenantId: TenantId.Type): TenantFilter => `${root}/${tenantId}/${multiLevel}`

	/**
	 * MQTT topic filter matching
	 *
	 * `+` matches exactly one level, `#` (last level only) matches the parent level and everything below it.
	 */
	export const matches = (filter: string, topic: string): boolean => {
		const filterLevels = filter.split(separator)
		const topicLevels = topic.split(separator)

		for (const [index, level] of filterLevels.entries()) {
			if (level === multiLevel) {
				return index === filterLevels.length - 1
			}
			const topicLevel = topicLevels[index]
			if (topicLevel === undefined || (level !== singleLevel && level !== topicLevel)) {
				return false
			}
		}
		return filterLevels.length === topicLevels.length
	}

	/**
	 * Recover the identity a result topic was derived from. None for any other topic.
	 */
	export const parseResultTopic = (topic: string): Option.Option<DeviceIdentity> => {
		const levels = topic.split(separator)
		if (levels.length !== 4 || levels[0] !== root || levels[3] !== result) {
			return Option.none()
		}
		return Option.all({
			deviceId: Array.get(levels, 2).pipe(Option.flatMap(level => Option.getRight(DeviceId.decodeEither(level)))),
			tenantId: Array.get(levels, 1).pipe(Option.flatMap(level => Option.getRight(TenantId.decodeEither(level)))),
		}).pipe(Option.map(fields => new DeviceIdentity(fields)))
	}
}
