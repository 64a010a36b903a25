/**
 * Process entrypoint runner
 *
 * Runs a long-lived program as the process's main fiber:
 *
 * - SIGINT / SIGTERM interrupt the fiber, so every scoped resource is released before exit
 * - exit code 0 on success or interruption, 1 on failure (the cause is logged first)
 */

import * as Cause from 'effect/Cause'
import * as Effect from 'effect/Effect'
import * as Exit from 'effect/Exit'
import * as Fiber from 'effect/Fiber'

export const runMain = <A, E>(program: Effect.Effect<A, E>): void => {
	const fiber = Effect.runFork(
		program.pipe(
			Effect.tapErrorCause(cause =>
				Cause.isInterruptedOnly(cause) ? Effect.void : Effect.logError('Process failed', cause),
			),
		),
	)

	const interrupt = () => {
		Effect.runFork(Fiber.interrupt(fiber))
	}
	process.once('SIGINT', interrupt)
	process.once('SIGTERM', interrupt)

	fiber.addObserver(exit => {
		process.removeListener('SIGINT', interrupt)
		process.removeListener('SIGTERM', interrupt)
		process.exit(Exit.isFailure(exit) && !Cause.isInterruptedOnly(exit.cause) ? 1 : 0)
	})
}
