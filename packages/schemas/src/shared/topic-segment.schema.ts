/**
 * TopicSegment - a single level of a broker topic
 *
 * Tenant and device identifiers are interpolated into topic strings, so they must never carry the topic separator
 * (`/`), the wildcards (`+`, `#`), or whitespace. An empty string would produce an empty topic level and is rejected
 * as well.
 */

import * as Schema from 'effect/Schema'

export const TopicSegment = Schema.String.pipe(
	Schema.pattern(/^[^/+#\s]+$/, {
		description: 'Non-empty topic level without separators, wildcards or whitespace',
		message: () => 'Expected a non-empty value without "/", "+", "#" or whitespace',
		title: 'TopicSegment',
	}),
)
