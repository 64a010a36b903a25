/**
 * Priority → signal color
 *
 * A received priority is first coerced to an integer level; levels 1..5 have a color, everything else (level 0,
 * out of range, or not a number at all) shows the default white.
 */

import * as Option from 'effect/Option'

import type { PriorityValue } from '@site-sentinel/schemas/envelope'

/**
 * 8-bit red, green, blue
 */
export type Rgb = readonly [red: number, green: number, blue: number]

export interface SignalColor {
	readonly name: string
	readonly rgb: Rgb
}

export const SignalColors = {
	5: { name: 'red', rgb: [255, 0, 0] },
	4: { name: 'red-orange', rgb: [255, 69, 0] },
	3: { name: 'orange', rgb: [255, 165, 0] },
	2: { name: 'yellow', rgb: [255, 255, 0] },
	1: { name: 'green', rgb: [0, 128, 0] },
} as const satisfies Record<number, SignalColor>

export const DefaultSignal: SignalColor = { name: 'white', rgb: [255, 255, 255] }

/**
 * Levels shown by the startup self-test, most severe first
 */
export const SelfTestLevels = [5, 4, 3, 2, 1] as const

const IntegerText = /^\s*[+-]?\d+\s*$/

/**
 * Integer level of a received priority
 *
 * Numbers must already be integers; text must be an optionally signed run of digits, surrounding whitespace allowed.
 * Any other value has no level.
 */
export const coercePriority = (priority: PriorityValue.Type): Option.Option<number> => {
	switch (priority._tag) {
		case 'Number':
			return Number.isInteger(priority.value) ? Option.some(priority.value) : Option.none()
		case 'Text':
			return IntegerText.test(priority.value) ? Option.some(Number.parseInt(priority.value, 10)) : Option.none()
		case 'Other':
			return Option.none()
	}
}

const isTableLevel = (level: number): level is keyof typeof SignalColors => Object.hasOwn(SignalColors, level)

export const signalColor = (level: Option.Option<number>): SignalColor =>
	level.pipe(
		Option.filter(isTableLevel),
		Option.match({ onNone: () => DefaultSignal, onSome: known => SignalColors[known] }),
	)
