/**
 * Monitor configuration
 *
 * The handle is derived from the client certificate file name (`MONITOR_CERT_PATH`, e.g. `9971-certificate.pem.crt`
 * → `9971-mqtt-client`) or given directly as `DEVICE_HANDLE`.
 */

import * as Config from 'effect/Config'
import * as ConfigError from 'effect/ConfigError'
import * as Either from 'effect/Either'
import * as Option from 'effect/Option'

import { DeviceHandle } from '@site-sentinel/schemas/identity'

const handleFromCertificate = Config.string('MONITOR_CERT_PATH').pipe(
	Config.mapOrFail(path =>
		Option.match(DeviceHandle.fromCertificatePath(path), {
			onNone: () =>
				Either.left(ConfigError.InvalidData(['MONITOR_CERT_PATH'], `Cannot derive a handle from ${path}`)),
			onSome: handle => Either.right<string>(handle),
		}),
	),
)

export const MonitorConfig = Config.all({
	handle: handleFromCertificate.pipe(Config.orElse(() => Config.nonEmptyString('DEVICE_HANDLE'))),
	testMessage: Config.option(Config.string('MONITOR_TEST_MESSAGE')),
})

export type MonitorConfig = Config.Config.Success<typeof MonitorConfig>
