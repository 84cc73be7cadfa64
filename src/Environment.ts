/**
 * Unit environments: a unit registry plus the seven SI base units bound to it.
 *
 * Environments are loaded from JSON definition files and are immutable once
 * built. The {@link UnitEnvironment} service owns the current environment for
 * an application and replaces it only through an explicit `reconfigure` or
 * `register` call; quantities already built keep the registry they were made
 * with.
 *
 * @since 0.1.0
 */

import { readFileSync } from "node:fs"
import { resolve } from "node:path"
import { pathToFileURL } from "node:url"
import { Context, Data, Effect, Layer, Ref, Schema } from "effect"
import { QuantitiesConfig } from "./Config.js"
import * as Dimensions from "./Dimensions.js"
import { EnvironmentLoadError } from "./Errors.js"
import { DEFAULT_PRECISION, Quantity } from "./Quantity.js"
import { UnitDefinition, type UnitRegistry, extendRegistry, makeRegistry } from "./Units.js"

/**
 * The seven SI base units, value 1 and factor 1.
 *
 * @since 0.1.0
 */
export type BaseUnits = { readonly [S in Dimensions.BaseSymbol]: Quantity }

/**
 * @since 0.1.0
 * @category Models
 */
export class Environment extends Data.Class<{
  readonly name: string
  readonly precision: number
  readonly registry: UnitRegistry
  readonly base: BaseUnits
}> {}

/**
 * @since 0.1.0
 */
export interface EnvironmentOptions {
  readonly precision?: number | undefined
  readonly tolerance?: number | undefined
}

/**
 * On-disk shape of an environment file. `extends` names another environment
 * whose units are loaded first.
 *
 * @since 0.1.0
 */
export const EnvironmentFile = Schema.Struct({
  name: Schema.NonEmptyTrimmedString,
  extends: Schema.optional(Schema.String),
  units: Schema.Array(UnitDefinition),
})

const decodeEnvironmentFile = Schema.decodeUnknown(Schema.parseJson(EnvironmentFile))

const ENVIRONMENTS_DIRECTORY = new URL("../data/environments/", import.meta.url)

const baseUnits = (registry: UnitRegistry, precision: number): BaseUnits => {
  const unit = (index: number) =>
    new Quantity({ value: 1, dimensions: Dimensions.axis(index), precision, registry })
  return {
    kg: unit(0),
    m: unit(1),
    s: unit(2),
    A: unit(3),
    cd: unit(4),
    K: unit(5),
    mol: unit(6),
  }
}

/**
 * Build an environment from unit definitions.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeEnvironment = (
  name: string,
  definitions: ReadonlyArray<UnitDefinition>,
  options: EnvironmentOptions = {},
): Environment => {
  const precision = options.precision ?? DEFAULT_PRECISION
  const registry = makeRegistry(definitions, options.tolerance)
  return new Environment({ name, precision, registry, base: baseUnits(registry, precision) })
}

/**
 * Return a new environment with additional units; base units are rebound to
 * the extended registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const registerUnits = (
  environment: Environment,
  definitions: ReadonlyArray<UnitDefinition>,
): Environment => {
  const registry = extendRegistry(environment.registry, definitions)
  return new Environment({
    name: environment.name,
    precision: environment.precision,
    registry,
    base: baseUnits(registry, environment.precision),
  })
}

// Names resolve to shipped environments; anything ending in .json is a path,
// relative to the extending file when there is one.
const locate = (source: string, relativeTo?: URL): URL => {
  if (!source.endsWith(".json")) {
    return new URL(`${source}.json`, ENVIRONMENTS_DIRECTORY)
  }
  return relativeTo === undefined ? pathToFileURL(resolve(source)) : new URL(source, relativeTo)
}

interface LoadedFile {
  readonly name: string
  readonly units: ReadonlyArray<UnitDefinition>
}

const readEnvironmentFile = (
  location: URL,
  visited: ReadonlySet<string>,
): Effect.Effect<LoadedFile, EnvironmentLoadError> =>
  Effect.gen(function* () {
    const source = location.href
    if (visited.has(source)) {
      return yield* Effect.fail(new EnvironmentLoadError({ source, reason: "circular extends" }))
    }
    const text = yield* Effect.try({
      try: () => readFileSync(location, "utf-8"),
      catch: (error) =>
        new EnvironmentLoadError({
          source,
          reason: error instanceof Error ? error.message : String(error),
        }),
    })
    const file = yield* decodeEnvironmentFile(text).pipe(
      Effect.mapError((error) => new EnvironmentLoadError({ source, reason: error.message })),
    )
    if (file.extends === undefined) {
      return { name: file.name, units: file.units }
    }
    const parent = yield* readEnvironmentFile(locate(file.extends, location), new Set([...visited, source]))
    return { name: file.name, units: [...parent.units, ...file.units] }
  })

/**
 * Load a shipped environment by name (`"default"`, `"structural"`) or an
 * environment file by path.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const loadEnvironment = (
  source: string,
  options: EnvironmentOptions = {},
): Effect.Effect<Environment, EnvironmentLoadError> =>
  readEnvironmentFile(locate(source), new Set()).pipe(
    Effect.map(({ name, units }) => makeEnvironment(name, units, options)),
    Effect.tap((environment) =>
      Effect.logDebug("Loaded unit environment").pipe(
        Effect.annotateLogs({ environment: environment.name, units: environment.registry.units.length }),
      ),
    ),
  )

/**
 * Owns the current environment; it changes only through `reconfigure` and
 * `register`.
 *
 * @since 0.1.0
 */
export interface UnitEnvironmentService {
  readonly current: Effect.Effect<Environment>
  readonly reconfigure: (source: string) => Effect.Effect<Environment, EnvironmentLoadError>
  readonly register: (definitions: ReadonlyArray<UnitDefinition>) => Effect.Effect<Environment>
}

const makeService = (initial: Environment): Effect.Effect<UnitEnvironmentService> =>
  Effect.gen(function* () {
    const environmentRef = yield* Ref.make(initial)

    const service: UnitEnvironmentService = {
      current: Ref.get(environmentRef),
      reconfigure: (source) =>
        Effect.gen(function* () {
          const previous = yield* Ref.get(environmentRef)
          const next = yield* loadEnvironment(source, {
            precision: previous.precision,
            tolerance: previous.registry.tolerance,
          })
          yield* Ref.set(environmentRef, next)
          yield* Effect.logInfo("Unit environment reconfigured").pipe(
            Effect.annotateLogs({ from: previous.name, to: next.name }),
          )
          return next
        }),
      register: (definitions) =>
        Ref.updateAndGet(environmentRef, (current) => registerUnits(current, definitions)).pipe(
          Effect.tap((environment) =>
            Effect.logDebug("Registered units").pipe(
              Effect.annotateLogs({
                environment: environment.name,
                symbols: definitions.map((definition) => definition.symbol).join(","),
              }),
            ),
          ),
        ),
    }

    return service
  })

/**
 * @since 0.1.0
 * @category Services
 */
export class UnitEnvironment extends Context.Tag("si-quantities/UnitEnvironment")<
  UnitEnvironment,
  UnitEnvironmentService
>() {
  /**
   * Loads the environment named by `QUANTITIES_ENVIRONMENT`.
   */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const settings = yield* QuantitiesConfig
      const initial = yield* loadEnvironment(settings.environment, settings)
      return yield* makeService(initial)
    }),
  )

  static fromEnvironment(environment: Environment) {
    return Layer.effect(this, makeService(environment))
  }
}
