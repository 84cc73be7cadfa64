import { Option } from "effect"
import * as Dimensions from "../../Dimensions.js"
import type { UnitDefinition, UnitRegistry } from "../../Units.js"

/**
 * A dimension vector written as `power` times `basis`.
 */
export interface Decomposition {
  readonly power: number
  readonly basis: Dimensions.Dimensions
}

/**
 * The display decision for a dimension vector and factor.
 *
 * `symbol` is set when a named unit applies; otherwise the quantity renders
 * with composite base-unit symbols. `mass` marks the composite kilogram case,
 * whose prefixes attach to the gram.
 */
export interface Resolution extends Decomposition {
  readonly symbol: Option.Option<string>
  readonly prefixEligible: boolean
  readonly mass: boolean
}

interface Candidate extends Decomposition {
  readonly rank: ReadonlyArray<number | string>
}

const compareRanks = (
  left: ReadonlyArray<number | string>,
  right: ReadonlyArray<number | string>,
): number => {
  for (let index = 0; index < left.length; index++) {
    const a = left[index]
    const b = right[index]
    if (a === b || a === undefined || b === undefined) {
      continue
    }
    return a < b ? -1 : 1
  }
  return 0
}

/**
 * Decompose `dimensions` as an integer multiple of the smallest known basis.
 *
 * Candidate bases are the registry's dimension vectors, the base axis when
 * the vector lies on a single dimension, and the vector itself. Ties go to
 * fewer non-zero components, then positive powers, then named derived units,
 * then the canonical key.
 */
export const powersOfDerived = (
  dimensions: Dimensions.Dimensions,
  registry: UnitRegistry,
): Decomposition => {
  const bases = new Map<string, Dimensions.Dimensions>()
  for (const basis of registry.bases()) {
    bases.set(Dimensions.key(basis), basis)
  }
  const single = Dimensions.baseAxis(dimensions)
  if (Option.isSome(single)) {
    bases.set(Dimensions.key(single.value.basis), single.value.basis)
  }
  bases.set(Dimensions.key(dimensions), dimensions)

  let best: Candidate | undefined
  for (const [basisKey, basis] of bases) {
    const power = Dimensions.quotient(dimensions, basis)
    if (Option.isNone(power)) {
      continue
    }
    const candidate: Candidate = {
      power: power.value,
      basis,
      rank: [
        Dimensions.magnitudeSquared(basis),
        Dimensions.nonZeroCount(basis),
        power.value > 0 ? 0 : 1,
        registry.isNamedDerived(basis) ? 0 : 1,
        basisKey,
      ],
    }
    if (best === undefined || compareRanks(candidate.rank, best.rank) < 0) {
      best = candidate
    }
  }
  return best === undefined ? { power: 1, basis: dimensions } : { power: best.power, basis: best.basis }
}

// The decomposition itself, then the whole vector as its own basis.
const decompositions = (
  dimensions: Dimensions.Dimensions,
  decomposition: Decomposition,
): ReadonlyArray<Decomposition> =>
  decomposition.power === 1
    ? [decomposition]
    : [decomposition, { power: 1, basis: dimensions }]

/**
 * A registered unit whose factor, raised to the decomposition's power, is
 * `factor`.
 */
export const matchNamedUnit = (
  dimensions: Dimensions.Dimensions,
  factor: number,
  registry: UnitRegistry,
  decomposition: Decomposition = powersOfDerived(dimensions, registry),
): Option.Option<{ readonly unit: UnitDefinition } & Decomposition> => {
  for (const candidate of decompositions(dimensions, decomposition)) {
    const unit = registry.matchFactor(factor, candidate.basis, candidate.power)
    if (Option.isSome(unit)) {
      return Option.some({ unit: unit.value, ...candidate })
    }
  }
  return Option.none()
}

/**
 * Look up a unit symbol registered for the quantity's basis or for its whole
 * dimension vector.
 */
export const findUnit = (
  dimensions: Dimensions.Dimensions,
  symbol: string,
  registry: UnitRegistry,
): Option.Option<{ readonly unit: UnitDefinition } & Decomposition> => {
  for (const candidate of decompositions(dimensions, powersOfDerived(dimensions, registry))) {
    const unit = registry.find(candidate.basis, symbol)
    if (Option.isSome(unit)) {
      return Option.some({ unit: unit.value, ...candidate })
    }
  }
  return Option.none()
}

/**
 * Symbols of the units a quantity of this dimension can be converted to,
 * derived units first.
 */
export const alternativeUnits = (
  dimensions: Dimensions.Dimensions,
  registry: UnitRegistry,
): ReadonlyArray<string> => {
  const symbols = new Set<string>()
  for (const candidate of decompositions(dimensions, powersOfDerived(dimensions, registry))) {
    const units = registry.unitsFor(candidate.basis)
    for (const symbol of units.derived.keys()) {
      symbols.add(symbol)
    }
    for (const symbol of units.defined.keys()) {
      symbols.add(symbol)
    }
  }
  return [...symbols]
}

const firstDerived = (
  dimensions: Dimensions.Dimensions,
  decomposition: Decomposition,
  registry: UnitRegistry,
): Option.Option<{ readonly unit: UnitDefinition } & Decomposition> => {
  for (const candidate of decompositions(dimensions, decomposition)) {
    const [unit] = registry.unitsFor(candidate.basis).derived.values()
    if (unit !== undefined) {
      return Option.some({ unit, ...candidate })
    }
  }
  return Option.none()
}

/**
 * Decide the display unit for a dimension vector and factor: a unit matching
 * a non-unit factor, else the first derived unit of the basis, else the
 * composite base-unit symbol.
 */
export const resolveUnit = (
  dimensions: Dimensions.Dimensions,
  factor: number,
  registry: UnitRegistry,
): Resolution => {
  const decomposition = powersOfDerived(dimensions, registry)
  const named =
    factor === 1
      ? firstDerived(dimensions, decomposition, registry)
      : matchNamedUnit(dimensions, factor, registry, decomposition)
  if (Option.isSome(named)) {
    const { unit, power, basis } = named.value
    return { power, basis, symbol: Option.some(unit.symbol), prefixEligible: unit.prefixed, mass: false }
  }
  const onAxis = Dimensions.isBaseAxis(decomposition.basis)
  return {
    ...decomposition,
    symbol: Option.none(),
    prefixEligible: onAxis,
    mass: onAxis && decomposition.basis.mass === 1,
  }
}
