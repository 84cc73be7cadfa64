/**
 * Physical quantities: a numeric value with an SI dimension vector.
 *
 * Arithmetic between quantities is checked for dimensional consistency and
 * always returns new values; a quantity cannot be changed after it is built.
 * Rendering picks a named unit and metric prefix from the quantity's unit
 * registry.
 *
 * @since 0.1.0
 */

import { Option } from "effect"
import * as Dimensions from "./Dimensions.js"
import {
  DimensionMismatchError,
  ImmutabilityViolationError,
  IncompatibleOperandError,
  InvalidPrefixError,
  UnitNotFoundError,
} from "./Errors.js"
import { type UnitRegistry, emptyRegistry } from "./Units.js"
import { measure, render, type Template } from "./internal/quantities/format.js"
import { isPrefix } from "./internal/quantities/prefixes.js"
import {
  alternativeUnits,
  findUnit,
  matchNamedUnit,
} from "./internal/quantities/resolution.js"

/**
 * Digits kept when comparing values, independent of display precision.
 *
 * @since 0.1.0
 */
export const COMPARISON_DIGITS = 6

/**
 * Display precision used when none is given.
 *
 * @since 0.1.0
 */
export const DEFAULT_PRECISION = 3

/**
 * @since 0.1.0
 */
export interface QuantityFields {
  /** Magnitude in SI base units, before `factor` is applied. */
  readonly value: number
  readonly dimensions: Dimensions.Dimensions
  /** Display multiplier; also identifies the named unit shown. */
  readonly factor?: number | undefined
  /** Decimal places shown when rendering. */
  readonly precision?: number | undefined
  /** Metric prefix forced when rendering; `""` lets it be chosen. */
  readonly prefixHint?: string | undefined
  /** Units used to resolve symbols and validate factors. */
  readonly registry?: UnitRegistry | undefined
}

/**
 * A quantity or a plain number, the operands every operator accepts.
 *
 * @since 0.1.0
 */
export type Operand = Quantity | number

const describe = (operand: unknown): string =>
  operand === null ? "null" : Array.isArray(operand) ? "array" : typeof operand

const immutable: ProxyHandler<Quantity> = {
  set: (_, property) => {
    throw new ImmutabilityViolationError({ property: String(property), action: "set" })
  },
  defineProperty: (_, property) => {
    throw new ImmutabilityViolationError({ property: String(property), action: "define" })
  },
  deleteProperty: (_, property) => {
    throw new ImmutabilityViolationError({ property: String(property), action: "delete" })
  },
}

const assertPrecision = (precision: number): number => {
  if (!Number.isInteger(precision) || precision < 0 || precision > 100) {
    throw new IncompatibleOperandError({
      operation: "set precision",
      operand: `${precision} (expected an integer from 0 to 100)`,
    })
  }
  return precision
}

const assertFactor = (factor: number): number => {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new IncompatibleOperandError({
      operation: "set factor",
      operand: `${factor} (expected a finite number above zero)`,
    })
  }
  return factor
}

const inspect: unique symbol = Symbol.for("nodejs.util.inspect.custom")

const roundValue = (value: number): number => Number(value.toFixed(COMPARISON_DIGITS))

/**
 * An immutable physical quantity.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```ts
 * const { kg, m, s } = environment.base
 * const force = kg.multiply(m).divide(s.pow(2))
 * String(force) // "1.000 N"
 * ```
 */
export class Quantity {
  readonly value: number
  readonly dimensions: Dimensions.Dimensions
  readonly factor: number
  readonly precision: number
  readonly prefixHint: string
  readonly registry: UnitRegistry

  constructor(fields: QuantityFields) {
    this.value = fields.value
    this.dimensions = fields.dimensions
    this.factor = assertFactor(fields.factor ?? 1)
    this.precision = assertPrecision(fields.precision ?? DEFAULT_PRECISION)
    this.prefixHint = fields.prefixHint ?? ""
    this.registry = fields.registry ?? emptyRegistry
    Object.freeze(this)
    return new Proxy<Quantity>(this, immutable)
  }

  /**
   * Return a quantity that renders with the metric `prefix`. Only quantities
   * in SI units (`factor === 1`) can be prefixed; `""` clears a forced prefix.
   */
  prefixed(prefix: string): Quantity {
    if (this.factor !== 1) {
      throw new InvalidPrefixError({ prefix, reason: `the quantity carries factor ${this.factor}` })
    }
    if (!isPrefix(prefix)) {
      throw new InvalidPrefixError({ prefix, reason: "not a metric prefix symbol" })
    }
    return derive(this, { prefixHint: prefix })
  }

  /**
   * List the units this quantity can be expressed in, or return a copy
   * expressed in `unit`.
   */
  to(): ReadonlyArray<string>
  to(unit: string): Quantity
  to(unit?: string): Quantity | ReadonlyArray<string> {
    if (unit === undefined) {
      return alternativeUnits(this.dimensions, this.registry)
    }
    const match = findUnit(this.dimensions, unit, this.registry)
    if (Option.isNone(match)) {
      throw new UnitNotFoundError({ symbol: unit, dimensions: Dimensions.format(this.dimensions) })
    }
    return new Quantity({
      value: this.value,
      dimensions: this.dimensions,
      factor: Math.pow(match.value.unit.factor, match.value.power),
      precision: this.precision,
      registry: this.registry,
    })
  }

  /**
   * Return a copy shown with `digits` decimal places.
   */
  round(digits: number): Quantity {
    return derive(this, { precision: digits })
  }

  /**
   * Return a copy shown in SI units.
   */
  si(): Quantity {
    return new Quantity({
      value: this.value,
      dimensions: this.dimensions,
      precision: this.precision,
      registry: this.registry,
    })
  }

  /**
   * Separate the number from the unit, for numeric code that only takes
   * plain numbers. The product of the two parts is this quantity.
   *
   * With `baseValue` the number is `value * factor`; otherwise it is the
   * displayed magnitude.
   */
  split(baseValue = true): readonly [number, Quantity] {
    const unit = (value: number) =>
      new Quantity({
        value,
        dimensions: this.dimensions,
        factor: this.factor,
        precision: this.precision,
        registry: this.registry,
      })
    return baseValue
      ? [this.value * this.factor, unit(1 / this.factor)]
      : [this.toNumber(), unit(1)]
  }

  add(other: Operand): Quantity {
    const operand = checkOperand("add", other)
    if (typeof operand === "number") {
      return derive(this, { value: this.value + operand / this.factor })
    }
    assertSameDimensions("add", this, operand)
    return derive(this, { value: this.value + operand.value })
  }

  subtract(other: Operand): Quantity {
    const operand = checkOperand("subtract", other)
    if (typeof operand === "number") {
      return derive(this, { value: this.value - operand / this.factor })
    }
    assertSameDimensions("subtract", this, operand)
    return derive(this, { value: this.value - operand.value })
  }

  multiply(other: number): Quantity
  multiply(other: Quantity): Quantity | number
  multiply(other: Operand): Quantity | number
  multiply(other: Operand): Quantity | number {
    const operand = checkOperand("multiply", other)
    if (typeof operand === "number") {
      return derive(this, { value: this.value * operand })
    }
    return combine(
      this,
      Dimensions.add(this.dimensions, operand.dimensions),
      this.value * operand.value,
      this.factor * operand.factor,
    )
  }

  divide(other: number): Quantity
  divide(other: Quantity): Quantity | number
  divide(other: Operand): Quantity | number
  divide(other: Operand): Quantity | number {
    const operand = checkOperand("divide", other)
    if (typeof operand === "number") {
      return derive(this, { value: this.value / operand })
    }
    return combine(
      this,
      Dimensions.subtract(this.dimensions, operand.dimensions),
      this.value / operand.value,
      this.factor / operand.factor,
    )
  }

  /**
   * Raise to a plain-number power. A quantity with a forced prefix first
   * collapses to its displayed magnitude and the result is a plain number.
   */
  pow(exponent: Operand): Quantity | number {
    if (exponent instanceof Quantity) {
      throw new DimensionMismatchError({
        operation: "raise",
        left: Dimensions.format(this.dimensions),
        right: `the power of a quantity with ${Dimensions.format(exponent.dimensions)}`,
      })
    }
    const power = checkOperand("raise", exponent)
    if (this.prefixHint !== "") {
      return Math.pow(this.toNumber(), power)
    }
    const dimensions = Dimensions.multiply(this.dimensions, power)
    if (Dimensions.isZero(dimensions)) {
      return Math.pow(this.value, power)
    }
    return new Quantity({
      value: Math.pow(this.value, power),
      dimensions,
      factor: Math.pow(this.factor, power),
      precision: this.precision,
      registry: this.registry,
    })
  }

  /**
   * The `n`-th root, `pow(1 / n)`.
   */
  sqrt(n = 2): Quantity | number {
    return this.pow(1 / n)
  }

  negate(): Quantity {
    return this.multiply(-1)
  }

  abs(): Quantity {
    return this.value < 0 ? this.negate() : this
  }

  /**
   * Compare values rounded to {@link COMPARISON_DIGITS} places. A plain
   * number is read as a base-unit value; anything that is neither a number
   * nor a quantity is never equal.
   */
  equals(other: unknown): boolean {
    if (typeof other === "number") {
      return roundValue(this.value) === other
    }
    if (other instanceof Quantity) {
      assertSameDimensions("compare", this, other)
      return roundValue(this.value) === roundValue(other.value)
    }
    return false
  }

  lessThan(other: Operand): boolean {
    return order("compare", this, other) < 0
  }

  lessThanOrEqual(other: Operand): boolean {
    return order("compare", this, other) <= 0
  }

  greaterThan(other: Operand): boolean {
    return order("compare", this, other) > 0
  }

  greaterThanOrEqual(other: Operand): boolean {
    return order("compare", this, other) >= 0
  }

  /**
   * The displayed magnitude: factor and prefix applied, as rendered.
   */
  toNumber(): number {
    return measure(this).magnitude
  }

  toInt(): number {
    return Math.trunc(this.toNumber())
  }

  format(template: Template = "plain"): string {
    return render(this, template)
  }

  toString(): string {
    return render(this, "plain")
  }

  get html(): string {
    return render(this, "html")
  }

  get latex(): string {
    return render(this, "latex")
  }

  /**
   * Constructor-style description of every field.
   */
  get repr(): string {
    return `Quantity(value=${this.value}, dimensions=${Dimensions.format(this.dimensions)}, factor=${this.factor}, precision=${this.precision}, prefixHint=${JSON.stringify(this.prefixHint)})`
  }

  /**
   * Only string conversion is implicit. Numeric operators and their compound
   * assignments throw; use `toNumber()` or `toInt()` for the magnitude.
   */
  [Symbol.toPrimitive](hint: string): string {
    if (hint === "string") {
      return this.toString()
    }
    throw new IncompatibleOperandError({
      operation: "apply a built-in operator",
      operand: "a quantity (use add, subtract, multiply, divide or toNumber)",
    })
  }

  [inspect](): string {
    return this.toString()
  }
}

/**
 * @since 0.1.0
 */
export const isQuantity = (value: unknown): value is Quantity => value instanceof Quantity

const checkOperand = <A extends Operand>(operation: string, operand: A): A => {
  if (typeof operand === "number" || operand instanceof Quantity) {
    return operand
  }
  throw new IncompatibleOperandError({ operation, operand: describe(operand) })
}

const assertSameDimensions = (operation: string, left: Quantity, right: Quantity): void => {
  if (!Dimensions.equals(left.dimensions, right.dimensions)) {
    throw new DimensionMismatchError({
      operation,
      left: Dimensions.format(left.dimensions),
      right: Dimensions.format(right.dimensions),
    })
  }
}

const derive = (quantity: Quantity, overrides: Partial<QuantityFields>): Quantity =>
  new Quantity({
    value: quantity.value,
    dimensions: quantity.dimensions,
    factor: quantity.factor,
    precision: quantity.precision,
    prefixHint: quantity.prefixHint,
    registry: quantity.registry,
    ...overrides,
  })

// Product or quotient of two quantities: collapses to a number when the
// dimensions cancel, and keeps the combined factor only when it names a unit.
const combine = (
  left: Quantity,
  dimensions: Dimensions.Dimensions,
  value: number,
  factor: number,
): Quantity | number => {
  if (Dimensions.isZero(dimensions)) {
    return value
  }
  const named = factor !== 1 && Option.isSome(matchNamedUnit(dimensions, factor, left.registry))
  return new Quantity({
    value,
    dimensions,
    factor: named ? factor : 1,
    precision: left.precision,
    registry: left.registry,
  })
}

const order = (operation: string, left: Quantity, right: Operand): number => {
  const operand = checkOperand(operation, right)
  if (typeof operand === "number") {
    return Math.sign(roundValue(left.value) - operand)
  }
  assertSameDimensions(operation, left, operand)
  return Math.sign(roundValue(left.value) - roundValue(operand.value))
}

/**
 * Build a quantity.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = (fields: QuantityFields): Quantity => new Quantity(fields)

/**
 * `left + right`, with numbers read as display values of the quantity.
 *
 * @category Operators
 * @since 0.1.0
 */
export function add(left: Quantity, right: Operand): Quantity
export function add(left: number, right: Quantity): Quantity
export function add(left: number, right: number): number
export function add(left: Operand, right: Operand): Operand
export function add(left: Operand, right: Operand): Operand {
  if (left instanceof Quantity) {
    return left.add(right)
  }
  if (right instanceof Quantity) {
    return right.add(checkOperand("add", left))
  }
  return checkOperand("add", left) + checkOperand("add", right)
}

/**
 * `left - right`. A number on the left is read as a display value of the
 * quantity on the right.
 *
 * @category Operators
 * @since 0.1.0
 */
export function subtract(left: Quantity, right: Operand): Quantity
export function subtract(left: number, right: Quantity): Quantity
export function subtract(left: number, right: number): number
export function subtract(left: Operand, right: Operand): Operand
export function subtract(left: Operand, right: Operand): Operand {
  if (left instanceof Quantity) {
    return left.subtract(right)
  }
  const minuend = checkOperand("subtract", left)
  if (right instanceof Quantity) {
    return derive(right, { value: minuend / right.factor - right.value })
  }
  return minuend - checkOperand("subtract", right)
}

/**
 * `left * right`.
 *
 * @category Operators
 * @since 0.1.0
 */
export function multiply(left: Quantity, right: number): Quantity
export function multiply(left: number, right: Quantity): Quantity
export function multiply(left: number, right: number): number
export function multiply(left: Operand, right: Operand): Operand
export function multiply(left: Operand, right: Operand): Operand {
  if (left instanceof Quantity) {
    return left.multiply(right)
  }
  if (right instanceof Quantity) {
    return right.multiply(checkOperand("multiply", left))
  }
  return checkOperand("multiply", left) * checkOperand("multiply", right)
}

/**
 * `left / right`. Dividing a number by a quantity inverts its dimensions and
 * factor.
 *
 * @category Operators
 * @since 0.1.0
 */
export function divide(left: Quantity, right: number): Quantity
export function divide(left: number, right: Quantity): Quantity | number
export function divide(left: number, right: number): number
export function divide(left: Operand, right: Operand): Operand
export function divide(left: Operand, right: Operand): Operand {
  if (left instanceof Quantity) {
    return left.divide(right)
  }
  const dividend = checkOperand("divide", left)
  if (right instanceof Quantity) {
    const dimensions = Dimensions.multiply(right.dimensions, -1)
    if (Dimensions.isZero(dimensions)) {
      return dividend / right.value
    }
    return new Quantity({
      value: dividend / right.value,
      dimensions,
      factor: 1 / right.factor,
      precision: right.precision,
      registry: right.registry,
    })
  }
  return dividend / checkOperand("divide", right)
}

/**
 * @category Operators
 * @since 0.1.0
 */
export const pow = (quantity: Quantity, exponent: Operand): Quantity | number =>
  quantity.pow(exponent)

/**
 * @category Operators
 * @since 0.1.0
 */
export const sqrt = (quantity: Quantity, n = 2): Quantity | number => quantity.sqrt(n)

/**
 * @category Operators
 * @since 0.1.0
 */
export const negate = (quantity: Quantity): Quantity => quantity.negate()

/**
 * @category Operators
 * @since 0.1.0
 */
export const abs = (quantity: Quantity): Quantity => quantity.abs()

/**
 * Equality with the quantity on either side.
 *
 * @category Operators
 * @since 0.1.0
 */
export const equals = (left: unknown, right: unknown): boolean => {
  if (left instanceof Quantity) {
    return left.equals(right)
  }
  if (right instanceof Quantity) {
    return right.equals(left)
  }
  return left === right
}

/**
 * Three-way comparison: `-1`, `0` or `1`.
 *
 * @category Operators
 * @since 0.1.0
 */
export const compare = (left: Operand, right: Operand): number => {
  if (left instanceof Quantity) {
    return order("compare", left, right)
  }
  if (right instanceof Quantity) {
    return -order("compare", right, left)
  }
  return Math.sign(checkOperand("compare", left) - checkOperand("compare", right))
}
