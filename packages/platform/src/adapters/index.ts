/**
 * Platform Adapters: Infrastructure implementations for platform ports
 *
 * - {@link MqttBus} / {@link InMemoryBus}: message bus over an MQTT broker or in process
 * - {@link IdentityDirectory}: device directory over the AWS IoT registry or fixed entries
 */

export * from './in-memory-bus.adapter.ts'
export * from './iot-directory.adapter.ts'
export * from './mqtt-bus.adapter.ts'
