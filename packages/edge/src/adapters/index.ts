/**
 * Edge adapters
 *
 * - {@link Framebuffer}: LED matrix behind a Linux framebuffer device
 * - {@link RecordingSignal}: in-memory device for tests
 */

export * as Platform from '@site-sentinel/platform/adapters'
export * from './framebuffer.adapter.ts'
export * from './recording-signal.adapter.ts'
