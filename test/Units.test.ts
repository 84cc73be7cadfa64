import { describe, expect, it } from "@effect/vitest"
import { Option, Schema } from "effect"
import * as Dimensions from "../src/Dimensions.js"
import {
  DEFAULT_FACTOR_TOLERANCE,
  UnitDefinition,
  emptyRegistry,
  extendRegistry,
  makeRegistry,
} from "../src/Units.js"
import { defined, derived, imperialUnits, siUnits } from "./fixtures.js"

const metre = Dimensions.make(0, 1)
const registry = makeRegistry([...siUnits, ...imperialUnits])

describe("Units module", () => {
  const decodeDefinition = Schema.decodeUnknownSync(UnitDefinition)

  it("decodes unit definitions", () => {
    const definition = decodeDefinition({
      symbol: "ft",
      kind: "defined",
      dimensions: [0, 1, 0, 0, 0, 0, 0],
      factor: 3.280839895013123,
      prefixed: false,
      description: "international foot",
    })
    expect(Dimensions.equals(definition.vector, metre)).toBe(true)
    expect(definition.description).toBe("international foot")
  })

  it("rejects non-positive factors and unknown kinds", () => {
    const base = { symbol: "x", dimensions: [0, 1, 0, 0, 0, 0, 0], prefixed: false }
    expect(() => decodeDefinition({ ...base, kind: "defined", factor: 0 })).toThrow()
    expect(() => decodeDefinition({ ...base, kind: "custom", factor: 1 })).toThrow()
    expect(() => decodeDefinition({ ...base, kind: "defined", factor: 1, dimensions: [0, 1] })).toThrow()
  })

  it("indexes units by dimension and kind", () => {
    const force = registry.unitsFor(Dimensions.make(1, 1, -2))
    expect([...force.derived.keys()]).toEqual(["N"])
    expect([...force.defined.keys()]).toEqual(["lbf"])
    expect(registry.unitsFor(Dimensions.make(0, 0, 0, 0, 1)).derived.size).toBe(0)
  })

  it("lists each registered dimension once", () => {
    expect(registry.bases()).toHaveLength(11)
    expect(registry.isNamedDerived(Dimensions.make(0, 0, -1))).toBe(true)
    expect(registry.isNamedDerived(metre)).toBe(false)
  })

  it("matches factors within the relative tolerance", () => {
    expect(Option.map(registry.matchFactor(3.2808399, metre, 1), (unit) => unit.symbol)).toEqual(
      Option.some("ft"),
    )
    expect(Option.isNone(registry.matchFactor(3.28, metre, 1))).toBe(true)
    expect(Option.isNone(registry.matchFactor(3.280839895013123, Dimensions.make(1), 1))).toBe(true)
  })

  it("matches powers through the root of the factor", () => {
    const squareInch = 39.37007874015748 ** 2
    expect(Option.map(registry.matchFactor(squareInch, metre, 2), (unit) => unit.symbol)).toEqual(
      Option.some("inch"),
    )
    expect(Option.isNone(registry.matchFactor(-1, metre, 2))).toBe(true)
  })

  it("honours a configured tolerance", () => {
    const loose = makeRegistry(imperialUnits, 1e-3)
    expect(loose.tolerance).toBe(1e-3)
    expect(Option.isSome(loose.matchFactor(3.28, metre, 1))).toBe(true)
    expect(makeRegistry([]).tolerance).toBe(DEFAULT_FACTOR_TOLERANCE)
  })

  it("finds symbols registered for a dimension", () => {
    expect(Option.map(registry.find(metre, "inch"), (unit) => unit.factor)).toEqual(
      Option.some(39.37007874015748),
    )
    expect(Option.isNone(registry.find(metre, "lb"))).toBe(true)
  })

  it("extends registries without changing the original", () => {
    const furlong = defined("furlong", [0, 1, 0, 0, 0, 0, 0], 0.004970969537898672)
    const extended = extendRegistry(registry, [furlong, derived("Gy", [0, 2, -2, 0, 0, 0, 0])])
    expect(extended.units).toHaveLength(registry.units.length + 2)
    expect(Option.isSome(extended.find(metre, "furlong"))).toBe(true)
    expect(Option.isNone(registry.find(metre, "furlong"))).toBe(true)
    expect(extended.tolerance).toBe(registry.tolerance)
  })

  it("starts empty", () => {
    expect(emptyRegistry.units).toHaveLength(0)
    expect(emptyRegistry.bases()).toEqual([])
  })
})
