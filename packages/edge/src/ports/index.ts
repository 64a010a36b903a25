/**
 * Edge ports
 */

export * as Platform from '@site-sentinel/platform/ports'
export * from './signal-device.port.ts'
