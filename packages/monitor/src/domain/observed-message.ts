import * as Data from 'effect/Data'
import * as Either from 'effect/Either'
import * as Schema from 'effect/Schema'

import type { BusEvent } from '@site-sentinel/platform/ports'

/**
 * A message as the monitor reports it: JSON is re-indented for reading, anything else is only described
 */
export type ObservedMessage = Data.TaggedEnum<{
	Json: { readonly topic: string; readonly qos: number; readonly pretty: string }
	Invalid: { readonly topic: string; readonly qos: number; readonly reason: string }
}>

export const ObservedMessage = Data.taggedEnum<ObservedMessage>()

const parseJson = Schema.decodeUnknownEither(Schema.parseJson())

export const observeMessage = ({ payload, qos, topic }: BusEvent.Message): ObservedMessage =>
	Either.match(parseJson(payload), {
		onLeft: error => ObservedMessage.Invalid({ qos, reason: error.message, topic }),
		onRight: value => ObservedMessage.Json({ pretty: JSON.stringify(value, null, 2), qos, topic }),
	})
