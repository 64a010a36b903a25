/**
 * Requester - who the finding is for, and when the source image was captured
 *
 * `tenantId` and `deviceId` are always copied from a resolved {@link DeviceIdentity}, never from caller input.
 */

import * as Schema from 'effect/Schema'

import { DeviceIdentity } from '../identity/device-identity.schema.ts'
import { DeviceId, Iso8601DateTime, TenantId } from '../shared/index.ts'

export class Requester extends Schema.Class<Requester>('Requester')({
	tenantId: TenantId,
	deviceId: DeviceId,
	timestamp: Iso8601DateTime,
}) {
	static readonly fromIdentity = (identity: DeviceIdentity, timestamp: Iso8601DateTime.Type): Requester =>
		new Requester({ deviceId: identity.deviceId, tenantId: identity.tenantId, timestamp })

	get identity(): DeviceIdentity {
		return new DeviceIdentity({ deviceId: this.deviceId, tenantId: this.tenantId })
	}
}
