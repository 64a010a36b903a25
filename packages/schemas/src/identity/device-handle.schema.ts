/**
 * DeviceHandle - the name a device is provisioned under in the directory
 *
 * Edge devices know their handle from configuration. The monitor derives it from its client certificate file name:
 * `site7-certificate.pem.crt` → `site7-mqtt-client`.
 */

import * as Array from 'effect/Array'
import { pipe } from 'effect/Function'
import * as Option from 'effect/Option'
import * as Schema from 'effect/Schema'
import * as String from 'effect/String'

const DeviceHandleBrand: unique symbol = Symbol.for('@site-sentinel/schemas/identity/DeviceHandle')

const MonitorHandleSuffix = '-mqtt-client'

export class DeviceHandle extends Schema.NonEmptyTrimmedString.pipe(Schema.brand(DeviceHandleBrand)) {
	/**
	 * Derive the monitor handle from a certificate path: the file name's prefix before the first `-`.
	 *
	 * Returns None when the path has no usable file name.
	 */
	static readonly fromCertificatePath = (path: string): Option.Option<DeviceHandle.Type> =>
		pipe(
			String.split(path, /[\\/]/),
			Array.last,
			Option.flatMap(fileName => Array.head(String.split(fileName, '-'))),
			Option.filter(String.isNonEmpty),
			Option.map(prefix => DeviceHandle.make(`${prefix}${MonitorHandleSuffix}`)),
		)
}

export declare namespace DeviceHandle {
	type Type = typeof DeviceHandle.Type
}
