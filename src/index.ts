/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * as Dimensions from "./Dimensions.js"
export * from "./Units.js"
export {
  COMPARISON_DIGITS,
  DEFAULT_PRECISION,
  Quantity,
  isQuantity,
  type Operand,
  type QuantityFields,
} from "./Quantity.js"
export * as Quantities from "./Quantity.js"
export * from "./Environment.js"
export * from "./Config.js"
export type { Template } from "./internal/quantities/format.js"
