/**
 * Device directory adapters for {@link IdentityDirectoryPort}
 *
 * - `IotRegistry`: AWS IoT thing registry. Handles are thing names, identity lives in thing attributes.
 * - `Test`: fixed entries, for tests and local runs.
 */

/** biome-ignore-all lint/style/useNamingConvention: Effect Layer pattern uses PascalCase for static layer properties */

import { DescribeThingCommand, IoTClient, ListThingsCommand, ResourceNotFoundException } from '@aws-sdk/client-iot'
import * as Config from 'effect/Config'
import type { ConfigError } from 'effect/ConfigError'
import * as Effect from 'effect/Effect'
import * as Layer from 'effect/Layer'
import * as Option from 'effect/Option'

import { type DirectoryEntry, DirectoryUnavailable, IdentityDirectoryPort } from '../ports/index.ts'

/**
 * Variables the container credential provider needs when the device authenticates through a token exchange
 */
export const TokenExchangeVariables = ['AWS_CONTAINER_CREDENTIALS_FULL_URI', 'AWS_CONTAINER_AUTHORIZATION_TOKEN'] as const

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause))

export const DirectoryConfig = (defaults: { readonly requireTokenExchange: boolean }) =>
	Config.all({
		region: Config.option(Config.string('AWS_REGION')),
		requireTokenExchange: Config.boolean('DIRECTORY_REQUIRE_TOKEN_EXCHANGE').pipe(
			Config.withDefault(defaults.requireTokenExchange),
		),
		tokenExchange: Config.all({
			authorizationToken: Config.option(Config.redacted('AWS_CONTAINER_AUTHORIZATION_TOKEN')),
			credentialsUri: Config.option(Config.string('AWS_CONTAINER_CREDENTIALS_FULL_URI')),
		}),
	})

export class IdentityDirectory {
	/**
	 * AWS IoT registry; `defaults.requireTokenExchange` applies when `DIRECTORY_REQUIRE_TOKEN_EXCHANGE` is unset
	 */
	static readonly IotRegistryWith = (defaults: {
		readonly requireTokenExchange: boolean
	}): Layer.Layer<IdentityDirectoryPort, ConfigError> =>
		Layer.effect(
			IdentityDirectoryPort,
			Effect.gen(function* () {
				const config = yield* DirectoryConfig(defaults)
				const client = new IoTClient(Option.match(config.region, { onNone: () => ({}), onSome: region => ({ region }) }))

				const tokenExchange = {
					AWS_CONTAINER_AUTHORIZATION_TOKEN: config.tokenExchange.authorizationToken,
					AWS_CONTAINER_CREDENTIALS_FULL_URI: config.tokenExchange.credentialsUri,
				}
				const missingVariables = TokenExchangeVariables.filter(name => Option.isNone<unknown>(tokenExchange[name]))

				if (config.requireTokenExchange && missingVariables.length > 0) {
					yield* Effect.logWarning('Token exchange credentials are not configured', { missing: missingVariables })
				}

				const ensureCredentials = (operation: DirectoryUnavailable['operation']) =>
					config.requireTokenExchange && missingVariables.length > 0
						? Effect.fail(
								new DirectoryUnavailable({
									cause: `Missing token exchange variables: ${missingVariables.join(', ')}`,
									operation,
								}),
							)
						: Effect.void

				const describe = Effect.fn('IdentityDirectory.describe')(function* (handle: string) {
					yield* ensureCredentials('describe')
					return yield* Effect.tryPromise({
						catch: cause => cause,
						try: () => client.send(new DescribeThingCommand({ thingName: handle })),
					}).pipe(
						Effect.map(output =>
							Option.some<DirectoryEntry>({ attributes: output.attributes ?? {}, handle: output.thingName ?? handle }),
						),
						Effect.catchIf(
							cause => cause instanceof ResourceNotFoundException,
							() => Effect.succeed(Option.none<DirectoryEntry>()),
						),
						Effect.mapError(cause => new DirectoryUnavailable({ cause: describeCause(cause), operation: 'describe' })),
					)
				})

				const findByAttribute = Effect.fn('IdentityDirectory.findByAttribute')(function* (name: string, value: string) {
					yield* ensureCredentials('findByAttribute')
					const output = yield* Effect.tryPromise({
						catch: cause => new DirectoryUnavailable({ cause: describeCause(cause), operation: 'findByAttribute' }),
						try: () => client.send(new ListThingsCommand({ attributeName: name, attributeValue: value })),
					})
					return (output.things ?? []).flatMap((thing): ReadonlyArray<DirectoryEntry> =>
						thing.thingName === undefined ? [] : [{ attributes: thing.attributes ?? {}, handle: thing.thingName }],
					)
				})

				return IdentityDirectoryPort.of({ describe, findByAttribute })
			}),
		)

	static readonly IotRegistry: Layer.Layer<IdentityDirectoryPort, ConfigError> = IdentityDirectory.IotRegistryWith({
		requireTokenExchange: false,
	})

	/**
	 * Directory holding exactly `entries`
	 */
	static readonly Test = (entries: ReadonlyArray<DirectoryEntry>): Layer.Layer<IdentityDirectoryPort> =>
		Layer.succeed(
			IdentityDirectoryPort,
			IdentityDirectoryPort.of({
				describe: handle => Effect.succeed(Option.fromNullable(entries.find(entry => entry.handle === handle))),
				findByAttribute: (name, value) =>
					Effect.succeed(entries.filter(entry => entry.attributes[name] === value)),
			}),
		)

	/**
	 * Directory whose every lookup fails, e.g. to exercise startup failure paths
	 */
	static readonly Unavailable = (cause: string): Layer.Layer<IdentityDirectoryPort> =>
		Layer.succeed(
			IdentityDirectoryPort,
			IdentityDirectoryPort.of({
				describe: () => Effect.fail(new DirectoryUnavailable({ cause, operation: 'describe' })),
				findByAttribute: () => Effect.fail(new DirectoryUnavailable({ cause, operation: 'findByAttribute' })),
			}),
		)
}
