/**
 * Edge consumer session state
 *
 * ```
 * Disconnected ──Connecting/Connected──▶ Connecting ──Subscribed──▶ Subscribed ──Message──▶ Receiving
 *       ▲                                                                │                      │
 *       └──────────────────────────────Disconnected──────────────────────┴──────────────────────┘
 * ```
 *
 * `Closed` is terminal and entered only when the session ends. The `reconnecting` flag remembers that the session
 * was established once before, which is what makes a later `Connected` a reconnect.
 */

import * as Data from 'effect/Data'

import type { BusEvent } from '@site-sentinel/platform/ports'

export type ConsumerState = Data.TaggedEnum<{
	Disconnected: { readonly reconnecting: boolean }
	Connecting: { readonly reconnecting: boolean }
	Subscribed: { readonly topics: ReadonlyArray<string> }
	Receiving: { readonly topics: ReadonlyArray<string>; readonly received: number }
	Closed: {}
}>

export const ConsumerState = Data.taggedEnum<ConsumerState>()

export const initialState: ConsumerState = ConsumerState.Disconnected({ reconnecting: false })

/**
 * Whether the session had been established (subscribed) at some point before reaching `state`
 */
const wasEstablished = ConsumerState.$match({
	Closed: () => false,
	Connecting: ({ reconnecting }) => reconnecting,
	Disconnected: ({ reconnecting }) => reconnecting,
	Receiving: () => true,
	Subscribed: () => true,
})

/**
 * Apply one bus event. `Closed` absorbs everything; a message outside a subscription leaves the state unchanged.
 */
export const transition = (state: ConsumerState, event: BusEvent): ConsumerState => {
	if (ConsumerState.$is('Closed')(state)) {
		return state
	}

	switch (event._tag) {
		case 'Connecting':
		case 'Connected':
			return ConsumerState.Connecting({ reconnecting: wasEstablished(state) })
		case 'Subscribed':
			return ConsumerState.Subscribed({ topics: event.topics })
		case 'Disconnected':
			return ConsumerState.Disconnected({ reconnecting: wasEstablished(state) })
		case 'Message':
			return ConsumerState.$match(state, {
				Closed: () => state,
				Connecting: () => state,
				Disconnected: () => state,
				Receiving: ({ received, topics }) => ConsumerState.Receiving({ received: received + 1, topics }),
				Subscribed: ({ topics }) => ConsumerState.Receiving({ received: 1, topics }),
			})
	}
}

/**
 * A `Connected` event for a session that had already been established
 */
export const isReconnect = (state: ConsumerState, event: BusEvent): boolean =>
	event._tag === 'Connected' && wasEstablished(state)
