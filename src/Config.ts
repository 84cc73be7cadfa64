/**
 * Settings for the unit environment service, read through Effect `Config`.
 *
 * @since 0.1.0
 */

import { Config } from "effect"
import { DEFAULT_PRECISION } from "./Quantity.js"
import { DEFAULT_FACTOR_TOLERANCE } from "./Units.js"

/**
 * @since 0.1.0
 */
export interface QuantitiesSettings {
  /** Shipped environment name or path to an environment file. */
  readonly environment: string
  /** Display precision of the base units. */
  readonly precision: number
  /** Relative tolerance when matching factors to named units. */
  readonly tolerance: number
}

/**
 * `QUANTITIES_ENVIRONMENT`, `QUANTITIES_PRECISION` and
 * `QUANTITIES_FACTOR_TOLERANCE`, with defaults.
 *
 * @category Config
 * @since 0.1.0
 */
export const QuantitiesConfig: Config.Config<QuantitiesSettings> = Config.all({
  environment: Config.string("QUANTITIES_ENVIRONMENT").pipe(Config.withDefault("default")),
  precision: Config.integer("QUANTITIES_PRECISION").pipe(
    Config.validate({
      message: "Expected a precision from 0 to 100",
      validation: (precision: number) => precision >= 0 && precision <= 100,
    }),
    Config.withDefault(DEFAULT_PRECISION),
  ),
  tolerance: Config.number("QUANTITIES_FACTOR_TOLERANCE").pipe(
    Config.validate({
      message: "Expected a positive tolerance",
      validation: (tolerance: number) => tolerance > 0,
    }),
    Config.withDefault(DEFAULT_FACTOR_TOLERANCE),
  ),
})
