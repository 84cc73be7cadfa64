import { describe, expect, it } from "@effect/vitest"
import { Option } from "effect"
import * as Dimensions from "../src/Dimensions.js"
import { emptyRegistry, makeRegistry } from "../src/Units.js"
import { compositeSymbol } from "../src/internal/quantities/format.js"
import {
  type Decomposition,
  alternativeUnits,
  matchNamedUnit,
  powersOfDerived,
  resolveUnit,
} from "../src/internal/quantities/resolution.js"
import { imperialUnits, siUnits } from "./fixtures.js"

const registry = makeRegistry([...siUnits, ...imperialUnits])

const plain = ({ power, basis }: Decomposition) => ({ power, basis: Dimensions.toArray(basis) })

describe("Resolution", () => {
  describe("powersOfDerived", () => {
    it("decomposes powers of a base axis", () => {
      expect(plain(powersOfDerived(Dimensions.make(0, 2), registry))).toEqual({
        power: 2,
        basis: [0, 1, 0, 0, 0, 0, 0],
      })
      expect(plain(powersOfDerived(Dimensions.make(0, 2), emptyRegistry))).toEqual({
        power: 2,
        basis: [0, 1, 0, 0, 0, 0, 0],
      })
    })

    it("decomposes powers of a named derived unit", () => {
      expect(plain(powersOfDerived(Dimensions.make(2, 2, -4), registry))).toEqual({
        power: 2,
        basis: [1, 1, -2, 0, 0, 0, 0],
      })
    })

    it("prefers positive powers", () => {
      expect(plain(powersOfDerived(Dimensions.make(0, 0, 1), registry))).toEqual({
        power: 1,
        basis: [0, 0, 1, 0, 0, 0, 0],
      })
      expect(plain(powersOfDerived(Dimensions.make(1, 2, -3, -2), registry))).toEqual({
        power: 1,
        basis: [1, 2, -3, -2, 0, 0, 0],
      })
    })

    it("falls back to the vector itself", () => {
      expect(plain(powersOfDerived(Dimensions.make(0, 1, -1), registry))).toEqual({
        power: 1,
        basis: [0, 1, -1, 0, 0, 0, 0],
      })
      expect(plain(powersOfDerived(Dimensions.make(0, 0, -1), emptyRegistry))).toEqual({
        power: 1,
        basis: [0, 0, -1, 0, 0, 0, 0],
      })
    })

    it("does not depend on registration order", () => {
      const reversed = makeRegistry([...imperialUnits, ...siUnits].reverse())
      for (const dimensions of [Dimensions.make(2, 2, -4), Dimensions.make(0, 3), Dimensions.make(-1, -2, 3, 2)]) {
        expect(plain(powersOfDerived(dimensions, reversed))).toEqual(plain(powersOfDerived(dimensions, registry)))
      }
    })
  })

  describe("resolveUnit", () => {
    it("picks the first derived unit for SI values", () => {
      const resolution = resolveUnit(Dimensions.make(0, 0, -1), 1, registry)
      expect(resolution.symbol).toEqual(Option.some("Hz"))
      expect(resolution.prefixEligible).toBe(true)
    })

    it("picks the unit whose factor matches", () => {
      const resolution = resolveUnit(Dimensions.make(1, -1, -2), 0.00014503773773020923, registry)
      expect(resolution.symbol).toEqual(Option.some("psi"))
      expect(resolution.prefixEligible).toBe(false)
    })

    it("matches squared units through the root of the factor", () => {
      const resolution = resolveUnit(Dimensions.make(0, 2), 3.280839895013123 ** 2, registry)
      expect(resolution.symbol).toEqual(Option.some("ft"))
      expect(resolution.power).toBe(2)
    })

    it("marks the composite kilogram case", () => {
      const resolution = resolveUnit(Dimensions.make(1), 1, registry)
      expect(Option.isNone(resolution.symbol)).toBe(true)
      expect(resolution.prefixEligible).toBe(true)
      expect(resolution.mass).toBe(true)
    })

    it("disallows prefixes on composites off a single axis", () => {
      const resolution = resolveUnit(Dimensions.make(0, 1, -1), 1, registry)
      expect(resolution.prefixEligible).toBe(false)
      expect(resolution.mass).toBe(false)
    })

    it("ignores factors that name no unit", () => {
      const resolution = resolveUnit(Dimensions.make(0, 1), 2, registry)
      expect(Option.isNone(resolution.symbol)).toBe(true)
      expect(Option.isNone(matchNamedUnit(Dimensions.make(0, 1), 2, registry))).toBe(true)
    })
  })

  it("lists alternatives derived first", () => {
    expect(alternativeUnits(Dimensions.make(1, 1, -2), registry)).toEqual(["N", "lbf"])
    expect(alternativeUnits(Dimensions.make(0, 2), registry)).toEqual(["ft", "inch"])
  })

  it("builds the same composite symbol for any registry", () => {
    const dimensions = Dimensions.make(1, 0, -1, 0, 0, -1)
    expect(compositeSymbol(dimensions, "plain")).toBe("kg·s⁻¹·K⁻¹")
    expect(compositeSymbol(dimensions, "plain")).toBe(compositeSymbol(dimensions, "plain"))
  })
})
