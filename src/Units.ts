/**
 * Unit registry with schema-backed definitions.
 *
 * The registry keeps two read-only indices over its definitions: one keyed by
 * dimension vector, used to pick display symbols and list alternatives, and
 * one ordered by conversion factor, used to recognise that a computed factor
 * denotes a named unit. Registries are never mutated; extending one returns a
 * new registry.
 *
 * @since 0.1.0
 */

import { Option, Schema } from "effect"
import * as Dimensions from "./Dimensions.js"

/**
 * Relative tolerance used when matching a computed factor against registered
 * unit factors.
 *
 * @since 0.1.0
 */
export const DEFAULT_FACTOR_TOLERANCE = 1e-7

/**
 * Derived units are coherent SI units (factor 1); defined units carry a
 * conversion factor.
 *
 * @since 0.1.0
 */
export const UnitKind = Schema.Literal("derived", "defined")

/**
 * @since 0.1.0
 */
export type UnitKind = typeof UnitKind.Type

/**
 * Declarative unit definition. `factor` converts a base-unit value into this
 * unit's display value (`display = value * factor`).
 *
 * @since 0.1.0
 */
export class UnitDefinition extends Schema.Class<UnitDefinition>("UnitDefinition")({
  symbol: Schema.NonEmptyTrimmedString,
  kind: UnitKind,
  dimensions: Dimensions.DimensionTuple,
  factor: Schema.Number.pipe(Schema.greaterThan(0)),
  prefixed: Schema.Boolean,
  description: Schema.optional(Schema.String),
}) {
  /**
   * The definition's dimension vector.
   */
  get vector(): Dimensions.Dimensions {
    return Dimensions.fromArray(this.dimensions)
  }
}

/**
 * Units registered under one dimension vector, split by kind.
 *
 * @since 0.1.0
 */
export interface UnitsByKind {
  readonly derived: ReadonlyMap<string, UnitDefinition>
  readonly defined: ReadonlyMap<string, UnitDefinition>
}

const EMPTY_UNITS: UnitsByKind = { derived: new Map(), defined: new Map() }

interface DimensionEntry {
  readonly vector: Dimensions.Dimensions
  readonly derived: Map<string, UnitDefinition>
  readonly defined: Map<string, UnitDefinition>
}

const buildDimensionIndex = (
  units: ReadonlyArray<UnitDefinition>,
): ReadonlyMap<string, DimensionEntry> => {
  const index = new Map<string, DimensionEntry>()
  for (const definition of units) {
    const vector = definition.vector
    const dimensionKey = Dimensions.key(vector)
    const entry = index.get(dimensionKey) ?? { vector, derived: new Map(), defined: new Map() }
    entry[definition.kind].set(definition.symbol, definition)
    index.set(dimensionKey, entry)
  }
  return index
}

const buildFactorIndex = (units: ReadonlyArray<UnitDefinition>): ReadonlyArray<UnitDefinition> =>
  [...units].sort((a, b) => a.factor - b.factor)

/**
 * Aggregate registry holding all known unit definitions.
 *
 * @since 0.1.0
 */
export class UnitRegistry extends Schema.Class<UnitRegistry>("UnitRegistry")({
  units: Schema.Array(UnitDefinition),
  tolerance: Schema.optionalWith(Schema.Number.pipe(Schema.positive()), {
    default: () => DEFAULT_FACTOR_TOLERANCE,
  }),
}) {
  private readonly byDimension = buildDimensionIndex(this.units)
  private readonly byFactor = buildFactorIndex(this.units)

  /**
   * Units registered under exactly this dimension vector.
   */
  unitsFor(dimensions: Dimensions.Dimensions): UnitsByKind {
    return this.byDimension.get(Dimensions.key(dimensions)) ?? EMPTY_UNITS
  }

  /**
   * Every distinct dimension vector with at least one registered unit, in
   * registration order.
   */
  bases(): ReadonlyArray<Dimensions.Dimensions> {
    return Array.from(this.byDimension.values(), (entry) => entry.vector)
  }

  /**
   * Whether a derived unit is registered under this dimension vector.
   */
  isNamedDerived(dimensions: Dimensions.Dimensions): boolean {
    return this.unitsFor(dimensions).derived.size > 0
  }

  /**
   * Find the unit, registered under `basis`, whose factor raised to `power`
   * equals `factor` within the registry tolerance.
   */
  matchFactor(
    factor: number,
    basis: Dimensions.Dimensions,
    power: number,
  ): Option.Option<UnitDefinition> {
    const target = power === 1 ? factor : Math.pow(factor, 1 / power)
    if (!Number.isFinite(target) || target <= 0) {
      return Option.none()
    }
    const lower = target * (1 - this.tolerance)
    const upper = target * (1 + this.tolerance)
    let low = 0
    let high = this.byFactor.length
    while (low < high) {
      const middle = (low + high) >>> 1
      const candidate = this.byFactor[middle]
      if (candidate !== undefined && candidate.factor < lower) {
        low = middle + 1
      } else {
        high = middle
      }
    }
    for (let index = low; index < this.byFactor.length; index++) {
      const candidate = this.byFactor[index]
      if (candidate === undefined || candidate.factor > upper) {
        break
      }
      if (Dimensions.equals(candidate.vector, basis)) {
        return Option.some(candidate)
      }
    }
    return Option.none()
  }

  /**
   * Look up a unit symbol among the units registered under `dimensions`.
   */
  find(dimensions: Dimensions.Dimensions, symbol: string): Option.Option<UnitDefinition> {
    const units = this.unitsFor(dimensions)
    return Option.fromNullable(units.derived.get(symbol) ?? units.defined.get(symbol))
  }
}

/**
 * Register a set of unit definitions into a registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const makeRegistry = (
  definitions: ReadonlyArray<UnitDefinition>,
  tolerance: number = DEFAULT_FACTOR_TOLERANCE,
): UnitRegistry => new UnitRegistry({ units: [...definitions], tolerance })

/**
 * Append additional unit definitions to an existing registry.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const extendRegistry = (
  registry: UnitRegistry,
  definitions: ReadonlyArray<UnitDefinition>,
): UnitRegistry =>
  new UnitRegistry({ units: [...registry.units, ...definitions], tolerance: registry.tolerance })

/**
 * Registry without any named units; every quantity renders with composite
 * base-unit symbols.
 *
 * @since 0.1.0
 */
export const emptyRegistry: UnitRegistry = makeRegistry([])
