import { Effect } from "effect"
import { UnitEnvironment } from "../src/Environment.js"
import { IncompatibleOperandError } from "../src/Errors.js"
import { type Quantity, isQuantity } from "../src/Quantity.js"

const dimensioned = (result: Quantity | number): Quantity => {
  if (isQuantity(result)) {
    return result
  }
  throw new IncompatibleOperandError({ operation: "expect a quantity", operand: String(result) })
}

// Simply supported beam under a uniform load: M = w L² / 8, σ = M / S.
const program = Effect.gen(function* () {
  const units = yield* UnitEnvironment
  const { kg, m, s } = (yield* units.reconfigure("structural")).base

  const newton = dimensioned(dimensioned(kg.multiply(m)).divide(dimensioned(s.pow(2))))
  const load = dimensioned(newton.multiply(12_000).divide(m))
  const span = m.multiply(6)
  const modulus = dimensioned(m.pow(3)).multiply(4.5e-4)

  const moment = dimensioned(load.multiply(dimensioned(span.pow(2)))).divide(8)
  const stress = dimensioned(moment.divide(modulus))

  yield* Effect.logInfo("Beam check").pipe(
    Effect.annotateLogs({
      load: load.toString(),
      span: span.to("ft").toString(),
      moment: `${moment} (${moment.to("kip·ft")})`,
      stress: `${stress} (${stress.to("ksi")})`,
    }),
  )
})

Effect.runPromise(program.pipe(Effect.provide(UnitEnvironment.layer))).catch((error) => {
  console.error("Failed to run the beam check", error)
  process.exitCode = 1
})
