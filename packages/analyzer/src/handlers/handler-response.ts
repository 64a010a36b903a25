import * as Schema from 'effect/Schema'

/**
 * Structured result returned to the function runtime for every invocation
 */
export class HandlerResponse extends Schema.Class<HandlerResponse>('HandlerResponse')({
	statusCode: Schema.Literal(200, 400, 500),
	body: Schema.String,
}) {
	static readonly ok = (body: Readonly<Record<string, unknown>>): HandlerResponse =>
		new HandlerResponse({ body: JSON.stringify(body), statusCode: 200 })

	/**
	 * Request could not be processed as given; retrying the same input fails again
	 */
	static readonly rejected = (error: { readonly _tag: string }, detail: string): HandlerResponse =>
		new HandlerResponse({ body: JSON.stringify({ detail, error: error._tag }), statusCode: 400 })

	/**
	 * A dependency failed; the same input may succeed later
	 */
	static readonly failed = (error: { readonly _tag: string }, detail: string): HandlerResponse =>
		new HandlerResponse({ body: JSON.stringify({ detail, error: error._tag }), statusCode: 500 })
}
