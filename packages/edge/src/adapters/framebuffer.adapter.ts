/**
 * Framebuffer adapter for {@link SignalDevicePort}
 *
 * Drives an 8×8 LED matrix exposed as a Linux framebuffer device (the Sense HAT registers as `/dev/fb1`). Each frame
 * is 64 RGB565 pixels, little-endian, 128 bytes, written at offset 0.
 */

/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import { open } from 'node:fs/promises'

import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'

import type { Rgb } from '../domain/index.ts'
import { DeviceError, SignalDevicePort } from '../ports/index.ts'

export const MatrixPixels = 64

/**
 * Brightness multiplier applied in low-light mode
 */
export const LowLightScale = 0.25

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))

const toRgb565 = ([red, green, blue]: Rgb, scale: number): number => {
	const channel = (value: number, bits: number) => Math.round(value * scale) >> (8 - bits)
	return (channel(red, 5) << 11) | (channel(green, 6) << 5) | channel(blue, 5)
}

/**
 * Encode one solid-color frame
 */
export const encodeFrame = (color: Rgb, lowLight: boolean): Uint8Array => {
	const pixel = toRgb565(color, lowLight ? LowLightScale : 1)
	const frame = new Uint8Array(MatrixPixels * 2)
	for (let index = 0; index < MatrixPixels; index++) {
		frame[index * 2] = pixel & 0xff
		frame[index * 2 + 1] = pixel >> 8
	}
	return frame
}

const Off: Rgb = [0, 0, 0]

export interface FramebufferOptions {
	readonly path: string
	readonly lowLight: boolean
}

export class Framebuffer {
	/**
	 * Open the framebuffer for the lifetime of the layer and blank it once opened
	 */
	static readonly Live = (options: FramebufferOptions): Layer.Layer<SignalDevicePort, DeviceError> =>
		Layer.scoped(
			SignalDevicePort,
			Effect.gen(function* () {
				const handle = yield* Effect.acquireRelease(
					Effect.tryPromise({
						catch: cause => new DeviceError({ cause: describeCause(cause), operation: 'open' }),
						try: () => open(options.path, 'r+'),
					}),
					handle =>
						Effect.tryPromise(() => handle.close()).pipe(
							Effect.catchAll(error =>
								Effect.logWarning('Could not close framebuffer', { cause: error.message, path: options.path }),
							),
						),
				)

				const write = (color: Rgb, operation: 'fill' | 'clear') =>
					Effect.tryPromise({
						catch: cause => new DeviceError({ cause: describeCause(cause), operation }),
						try: () => {
							const frame = encodeFrame(color, options.lowLight)
							return handle.write(frame, 0, frame.length, 0)
						},
					}).pipe(Effect.asVoid)

				const clear = write(Off, 'clear')
				yield* clear
				yield* Effect.logInfo('Signal device ready', { lowLight: options.lowLight, path: options.path })

				return SignalDevicePort.of({ clear, fill: color => write(color, 'fill') })
			}),
		)
}
