/**
 * Dimension vectors over the seven SI base dimensions.
 *
 * A `Dimensions` value records the exponent of each base dimension in a fixed
 * order: mass, length, time, electric current, luminous intensity,
 * temperature and amount of substance. Values are immutable and compare
 * structurally through `Equal.equals`.
 *
 * @since 0.1.0
 */

import { Data, Equal, Option, Schema } from "effect"

/**
 * Names of the base dimensions in vector order.
 *
 * @since 0.1.0
 */
export const DIMENSION_NAMES = [
  "mass",
  "length",
  "time",
  "current",
  "luminosity",
  "temperature",
  "substance",
] as const

/**
 * @since 0.1.0
 */
export type DimensionName = (typeof DIMENSION_NAMES)[number]

/**
 * Symbols of the SI base units, aligned with {@link DIMENSION_NAMES}.
 *
 * @since 0.1.0
 */
export const BASE_SYMBOLS = ["kg", "m", "s", "A", "cd", "K", "mol"] as const

/**
 * @since 0.1.0
 */
export type BaseSymbol = (typeof BASE_SYMBOLS)[number]

/**
 * Plain tuple form used by unit definition files.
 *
 * @since 0.1.0
 */
export const DimensionTuple = Schema.Tuple(
  Schema.Number,
  Schema.Number,
  Schema.Number,
  Schema.Number,
  Schema.Number,
  Schema.Number,
  Schema.Number,
)

/**
 * @since 0.1.0
 */
export type DimensionTuple = typeof DimensionTuple.Type

/**
 * Exponents of the seven base dimensions.
 *
 * @since 0.1.0
 * @category Models
 */
export class Dimensions extends Data.Class<{
  readonly mass: number
  readonly length: number
  readonly time: number
  readonly current: number
  readonly luminosity: number
  readonly temperature: number
  readonly substance: number
}> {}

const SNAP_EPSILON = 1e-9

// Keeps integer results of scalar products exact and folds -0 into 0.
const snap = (exponent: number): number => {
  const rounded = Math.round(exponent)
  const value = Math.abs(exponent - rounded) < SNAP_EPSILON ? rounded : exponent
  return value === 0 ? 0 : value
}

/**
 * Build a dimension vector from exponents given in vector order.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const fromArray = (exponents: ReadonlyArray<number>): Dimensions => {
  const at = (index: number): number => snap(exponents[index] ?? 0)
  return new Dimensions({
    mass: at(0),
    length: at(1),
    time: at(2),
    current: at(3),
    luminosity: at(4),
    temperature: at(5),
    substance: at(6),
  })
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const make = (
  mass = 0,
  length = 0,
  time = 0,
  current = 0,
  luminosity = 0,
  temperature = 0,
  substance = 0,
): Dimensions => fromArray([mass, length, time, current, luminosity, temperature, substance])

/**
 * @since 0.1.0
 */
export const toArray = (dimensions: Dimensions): DimensionTuple => [
  dimensions.mass,
  dimensions.length,
  dimensions.time,
  dimensions.current,
  dimensions.luminosity,
  dimensions.temperature,
  dimensions.substance,
]

/**
 * The dimensionless vector.
 *
 * @since 0.1.0
 */
export const zero: Dimensions = make()

/**
 * Unit vector along a single base dimension.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const axis = (index: number): Dimensions =>
  fromArray(DIMENSION_NAMES.map((_, position) => (position === index ? 1 : 0)))

const zipWith = (
  left: Dimensions,
  right: Dimensions,
  f: (a: number, b: number) => number,
): Dimensions => {
  const rightValues = toArray(right)
  return fromArray(toArray(left).map((value, index) => f(value, rightValues[index] ?? 0)))
}

/**
 * @category Algebra
 * @since 0.1.0
 */
export const add = (left: Dimensions, right: Dimensions): Dimensions =>
  zipWith(left, right, (a, b) => a + b)

/**
 * @category Algebra
 * @since 0.1.0
 */
export const subtract = (left: Dimensions, right: Dimensions): Dimensions =>
  zipWith(left, right, (a, b) => a - b)

/**
 * @category Algebra
 * @since 0.1.0
 */
export const multiply = (dimensions: Dimensions, scalar: number): Dimensions =>
  fromArray(toArray(dimensions).map((value) => value * scalar))

/**
 * Exact component-wise equality.
 *
 * @category Algebra
 * @since 0.1.0
 */
export const equals = (left: Dimensions, right: Dimensions): boolean => Equal.equals(left, right)

/**
 * @since 0.1.0
 */
export const isZero = (dimensions: Dimensions): boolean => equals(dimensions, zero)

/**
 * Canonical string key, stable for equal vectors.
 *
 * @since 0.1.0
 */
export const key = (dimensions: Dimensions): string => toArray(dimensions).join(",")

/**
 * @since 0.1.0
 */
export const nonZeroCount = (dimensions: Dimensions): number =>
  toArray(dimensions).filter((value) => value !== 0).length

/**
 * Squared Euclidean length.
 *
 * @since 0.1.0
 */
export const magnitudeSquared = (dimensions: Dimensions): number =>
  toArray(dimensions).reduce((sum, value) => sum + value * value, 0)

/**
 * The non-zero integer `k` such that `dimensions = k * basis`, if any.
 *
 * @since 0.1.0
 */
export const quotient = (dimensions: Dimensions, basis: Dimensions): Option.Option<number> => {
  const values = toArray(dimensions)
  const bases = toArray(basis)
  const pivot = bases.findIndex((value) => value !== 0)
  if (pivot < 0) {
    return Option.none()
  }
  const k = snap((values[pivot] ?? 0) / (bases[pivot] ?? 1))
  if (k === 0 || !Number.isInteger(k)) {
    return Option.none()
  }
  return bases.every((value, index) => snap(value * k) === values[index])
    ? Option.some(k)
    : Option.none()
}

/**
 * When the vector lies on a single base dimension, that dimension's unit
 * vector together with its position.
 *
 * @since 0.1.0
 */
export const baseAxis = (
  dimensions: Dimensions,
): Option.Option<{ readonly index: number; readonly basis: Dimensions }> => {
  if (nonZeroCount(dimensions) !== 1) {
    return Option.none()
  }
  const index = toArray(dimensions).findIndex((value) => value !== 0)
  return Option.some({ index, basis: axis(index) })
}

/**
 * Whether the vector is exactly one base unit vector.
 *
 * @since 0.1.0
 */
export const isBaseAxis = (dimensions: Dimensions): boolean =>
  nonZeroCount(dimensions) === 1 && toArray(dimensions).some((value) => value === 1)

/**
 * @since 0.1.0
 */
export const format = (dimensions: Dimensions): string => `Dimensions(${toArray(dimensions).join(", ")})`
