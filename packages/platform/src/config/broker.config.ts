/**
 * Broker connection settings, read from the environment once at startup
 */

import * as Config from 'effect/Config'
import * as Duration from 'effect/Duration'

export const BrokerConfig = Config.all({
	endpoint: Config.string('MQTT_ENDPOINT'),
	port: Config.integer('MQTT_PORT').pipe(Config.withDefault(8883)),
	caPath: Config.string('MQTT_CA_PATH'),
	certPath: Config.string('MQTT_CERT_PATH'),
	keyPath: Config.string('MQTT_KEY_PATH'),
	qos: Config.literal(0, 1, 2)('MQTT_QOS').pipe(Config.withDefault<0 | 1 | 2>(1)),
	keepalive: Config.duration('MQTT_KEEPALIVE').pipe(Config.withDefault(Duration.seconds(60))),
	reconnectPeriod: Config.duration('MQTT_RECONNECT_PERIOD').pipe(Config.withDefault(Duration.seconds(5))),
	clientId: Config.option(Config.string('MQTT_CLIENT_ID')),
	publishTimeout: Config.duration('MQTT_PUBLISH_TIMEOUT').pipe(Config.withDefault(Duration.seconds(10))),
	queueCapacity: Config.integer('MQTT_QUEUE_CAPACITY').pipe(
		Config.validate({ message: 'MQTT_QUEUE_CAPACITY must be positive', validation: capacity => capacity > 0 }),
		Config.withDefault(16),
	),
})

export type BrokerConfig = Config.Config.Success<typeof BrokerConfig>
