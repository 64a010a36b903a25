import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { describe, expect, it } from '@effect/vitest'
import * as Effect from 'effect/Effect'

import { DeviceError, SignalDevicePort } from '../ports/index.ts'
import { encodeFrame, Framebuffer } from './framebuffer.adapter.ts'

const pixelsOf = (frame: Uint8Array) => new Set(Array.from({ length: frame.length / 2 }, (_, index) => `${frame[index * 2]},${frame[index * 2 + 1]}`))

describe('encodeFrame', () => {
	it('fills 64 little-endian RGB565 pixels', () => {
		const frame = encodeFrame([255, 0, 0], false)

		expect(frame).toHaveLength(128)
		expect(pixelsOf(frame)).toStrictEqual(new Set(['0,248']))
	})

	it('encodes white and off', () => {
		expect(pixelsOf(encodeFrame([255, 255, 255], false))).toStrictEqual(new Set(['255,255']))
		expect(pixelsOf(encodeFrame([0, 0, 0], true))).toStrictEqual(new Set(['0,0']))
	})

	it('dims every channel in low-light mode', () => {
		// 255 * 0.25 rounds to 64; 64 >> 3 = 8 → 0x4000
		expect(pixelsOf(encodeFrame([255, 0, 0], true))).toStrictEqual(new Set(['0,64']))
		// green 128 * 0.25 = 32; 32 >> 2 = 8 → 8 << 5 = 0x0100
		expect(pixelsOf(encodeFrame([0, 128, 0], true))).toStrictEqual(new Set(['0,1']))
	})
})

describe('Framebuffer.Live', () => {
	const withDevice = <A, E>(use: (path: string) => Effect.Effect<A, E>) =>
		Effect.acquireUseRelease(
			Effect.promise(async () => {
				const directory = await mkdtemp(join(tmpdir(), 'signal-'))
				const path = join(directory, 'fb')
				await writeFile(path, new Uint8Array(128).fill(0xaa))
				return { directory, path }
			}),
			({ path }) => use(path),
			({ directory }) => Effect.promise(() => rm(directory, { force: true, recursive: true })),
		)

	it.effect('blanks the display when opened and writes each frame at the start', () =>
		withDevice(path =>
			Effect.gen(function* () {
				const device = yield* SignalDevicePort
				expect(pixelsOf(yield* Effect.promise(() => readFile(path)))).toStrictEqual(new Set(['0,0']))

				yield* device.fill([255, 255, 0])
				const frame = yield* Effect.promise(() => readFile(path))
				expect(frame).toHaveLength(128)
				// yellow: 31 << 11 | 63 << 5 = 0xffe0
				expect(pixelsOf(frame)).toStrictEqual(new Set(['224,255']))
			}).pipe(Effect.provide(Framebuffer.Live({ lowLight: false, path }))),
		),
	)

	it.effect('fails to open a missing device', () =>
		Effect.gen(function* () {
			const error = yield* SignalDevicePort.pipe(
				Effect.provide(Framebuffer.Live({ lowLight: true, path: join(tmpdir(), 'no-such-dir', 'fb') })),
				Effect.flip,
			)

			expect(error).toBeInstanceOf(DeviceError)
			expect(error.operation).toBe('open')
		}),
	)
})
