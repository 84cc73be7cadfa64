/**
 * Error hierarchy for quantities and unit environments.
 *
 * Quantity operations throw these synchronously; the environment service
 * fails with them in the Effect error channel so callers can recover with
 * `Effect.catchTag`.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised when an operation combines or compares quantities whose dimension
 * vectors differ, or when a quantity is used as an exponent.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * kg.add(m) // throws DimensionMismatchError
 * ```
 */
export class DimensionMismatchError extends Data.TaggedError("DimensionMismatchError")<{
  readonly operation: string
  readonly left: string
  readonly right: string
}> {
  override get message(): string {
    return `Cannot ${this.operation} ${this.left} and ${this.right}: dimensions are not equal`
  }
}

/**
 * Raised on any attempt to mutate a quantity after construction.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ImmutabilityViolationError extends Data.TaggedError("ImmutabilityViolationError")<{
  readonly property: string
  readonly action: "set" | "define" | "delete"
}> {
  override get message(): string {
    return `Cannot ${this.action} property "${this.property}": quantities are immutable, build a new one instead`
  }
}

/**
 * Raised when a forced prefix is requested on a quantity carrying a
 * conversion factor, or when the prefix symbol is not a metric prefix.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidPrefixError extends Data.TaggedError("InvalidPrefixError")<{
  readonly prefix: string
  readonly reason: string
}> {
  override get message(): string {
    return `Cannot prefix with "${this.prefix}": ${this.reason}`
  }
}

/**
 * Raised when an operator receives a value that is neither a quantity nor a
 * number, or a quantity is coerced to a primitive implicitly.
 *
 * @category Errors
 * @since 0.1.0
 */
export class IncompatibleOperandError extends Data.TaggedError("IncompatibleOperandError")<{
  readonly operation: string
  readonly operand: string
}> {
  override get message(): string {
    return `Cannot ${this.operation} with operand ${this.operand}`
  }
}

/**
 * Raised when a unit symbol is not registered for a quantity's dimension.
 *
 * @category Errors
 * @since 0.1.0
 */
export class UnitNotFoundError extends Data.TaggedError("UnitNotFoundError")<{
  readonly symbol: string
  readonly dimensions: string
}> {
  override get message(): string {
    return `Unknown unit symbol "${this.symbol}" for ${this.dimensions}`
  }
}

/**
 * Raised when a unit environment cannot be read or decoded.
 *
 * @category Errors
 * @since 0.1.0
 */
export class EnvironmentLoadError extends Data.TaggedError("EnvironmentLoadError")<{
  readonly source: string
  readonly reason: string
}> {
  override get message(): string {
    return `Failed to load unit environment ${this.source}: ${this.reason}`
  }
}

/**
 * Union of the errors a quantity operation can throw.
 *
 * @category Errors
 * @since 0.1.0
 */
export type QuantityError =
  | DimensionMismatchError
  | ImmutabilityViolationError
  | InvalidPrefixError
  | IncompatibleOperandError
  | UnitNotFoundError
