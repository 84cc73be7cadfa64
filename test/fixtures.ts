import { Schema } from "effect"
import { type Environment, makeEnvironment } from "../src/Environment.js"
import { Quantity } from "../src/Quantity.js"
import { UnitDefinition } from "../src/Units.js"

const decodeDefinition = Schema.decodeSync(UnitDefinition)

type Exponents = readonly [number, number, number, number, number, number, number]

export const derived = (symbol: string, dimensions: Exponents): UnitDefinition =>
  decodeDefinition({ symbol, kind: "derived", dimensions, factor: 1, prefixed: true })

export const defined = (symbol: string, dimensions: Exponents, factor: number): UnitDefinition =>
  decodeDefinition({ symbol, kind: "defined", dimensions, factor, prefixed: false })

export const siUnits: ReadonlyArray<UnitDefinition> = [
  derived("N", [1, 1, -2, 0, 0, 0, 0]),
  derived("Pa", [1, -1, -2, 0, 0, 0, 0]),
  derived("J", [1, 2, -2, 0, 0, 0, 0]),
  derived("W", [1, 2, -3, 0, 0, 0, 0]),
  derived("Hz", [0, 0, -1, 0, 0, 0, 0]),
  derived("C", [0, 0, 1, 1, 0, 0, 0]),
  derived("V", [1, 2, -3, -1, 0, 0, 0]),
  derived("Ω", [1, 2, -3, -2, 0, 0, 0]),
  derived("S", [-1, -2, 3, 2, 0, 0, 0]),
]

export const imperialUnits: ReadonlyArray<UnitDefinition> = [
  defined("lb", [1, 0, 0, 0, 0, 0, 0], 2.2046226218487757),
  defined("ft", [0, 1, 0, 0, 0, 0, 0], 3.280839895013123),
  defined("inch", [0, 1, 0, 0, 0, 0, 0], 39.37007874015748),
  defined("lbf", [1, 1, -2, 0, 0, 0, 0], 0.22480894309971047),
  defined("psi", [1, -1, -2, 0, 0, 0, 0], 0.00014503773773020923),
]

export const testEnvironment: Environment = makeEnvironment("test", [...siUnits, ...imperialUnits])

/**
 * Narrow an operator result that the test expects to keep its dimensions.
 */
export const q = (result: Quantity | number): Quantity => {
  if (result instanceof Quantity) {
    return result
  }
  throw new Error(`expected a quantity, got the number ${result}`)
}
