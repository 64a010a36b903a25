/**
 * DeviceIdentity - the (tenant, device) pair a directory entry resolves to
 *
 * Only the identity resolver constructs these from directory data; everything that derives a topic takes one.
 */

import * as Schema from 'effect/Schema'

import { DeviceId, TenantId } from '../shared/index.ts'

export class DeviceIdentity extends Schema.Class<DeviceIdentity>('DeviceIdentity')({
	tenantId: TenantId,
	deviceId: DeviceId,
}) {}
