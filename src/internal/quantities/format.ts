import { Option } from "effect"
import * as Dimensions from "../../Dimensions.js"
import type { UnitRegistry } from "../../Units.js"
import { autoPrefix, isPrefix, prefixValue, type PrefixSymbol } from "./prefixes.js"
import { resolveUnit, type Resolution } from "./resolution.js"

/**
 * Output templates: plain text, HTML and LaTeX.
 */
export type Template = "plain" | "html" | "latex"

interface TemplateStyle {
  readonly space: string
  readonly dot: string
  readonly symbol: (text: string) => string
  readonly exponent: (exponent: number) => string
}

const SUPERSCRIPTS: Readonly<Record<string, string>> = {
  "0": "⁰",
  "1": "¹",
  "2": "²",
  "3": "³",
  "4": "⁴",
  "5": "⁵",
  "6": "⁶",
  "7": "⁷",
  "8": "⁸",
  "9": "⁹",
  "-": "⁻",
}

const superscript = (exponent: number): string =>
  Number.isInteger(exponent)
    ? Array.from(String(exponent), (char) => SUPERSCRIPTS[char] ?? char).join("")
    : `^${exponent}`

const TEMPLATES: Readonly<Record<Template, TemplateStyle>> = {
  plain: {
    space: " ",
    dot: "·",
    symbol: (text) => text,
    exponent: superscript,
  },
  html: {
    space: "&nbsp;",
    dot: "&middot;",
    symbol: (text) => text,
    exponent: (exponent) => `<sup>${exponent}</sup>`,
  },
  latex: {
    space: "\\ ",
    dot: " \\cdot ",
    symbol: (text) => `\\mathrm{${text}}`,
    exponent: (exponent) => `^{${exponent}}`,
  },
}

/**
 * The fields of a quantity that rendering depends on.
 */
export interface Renderable {
  readonly value: number
  readonly dimensions: Dimensions.Dimensions
  readonly factor: number
  readonly precision: number
  readonly prefixHint: string
  readonly registry: UnitRegistry
}

/**
 * The resolved display unit, prefix and magnitude of a quantity.
 */
export interface Measurement {
  readonly resolution: Resolution
  readonly prefix: PrefixSymbol
  readonly magnitude: number
}

/**
 * Resolve the unit and prefix a quantity displays with, and the number shown
 * next to them.
 */
export const measure = (quantity: Renderable): Measurement => {
  const resolution = resolveUnit(quantity.dimensions, quantity.factor, quantity.registry)
  const display = quantity.value * quantity.factor
  if (!resolution.prefixEligible) {
    return { resolution, prefix: "", magnitude: display }
  }
  const prefix = isPrefix(quantity.prefixHint) && quantity.prefixHint !== ""
    ? quantity.prefixHint
    : autoPrefix(display, resolution.power, resolution.mass)
  return {
    resolution,
    prefix,
    magnitude: prefixValue(display, resolution.power, prefix, resolution.mass),
  }
}

const withExponent = (style: TemplateStyle, text: string, exponent: number): string =>
  exponent === 1 ? style.symbol(text) : `${style.symbol(text)}${style.exponent(exponent)}`

/**
 * Composite symbol built from the base-unit symbols of each non-zero
 * exponent, in vector order.
 */
export const compositeSymbol = (dimensions: Dimensions.Dimensions, template: Template): string => {
  const style = TEMPLATES[template]
  return Dimensions.toArray(dimensions)
    .flatMap((exponent, index) => {
      const symbol = Dimensions.BASE_SYMBOLS[index]
      return exponent === 0 || symbol === undefined ? [] : [withExponent(style, symbol, exponent)]
    })
    .join(style.dot)
}

const unitText = (
  quantity: Renderable,
  { resolution, prefix }: Measurement,
  template: Template,
): string => {
  const style = TEMPLATES[template]
  if (Option.isSome(resolution.symbol)) {
    return withExponent(style, `${prefix}${resolution.symbol.value}`, resolution.power)
  }
  if (resolution.prefixEligible) {
    const axis = Dimensions.baseAxis(resolution.basis)
    const symbol = resolution.mass
      ? "g"
      : Option.match(axis, {
          onNone: () => "",
          onSome: ({ index }) => Dimensions.BASE_SYMBOLS[index] ?? "",
        })
    return withExponent(style, `${prefix}${symbol}`, resolution.power)
  }
  return compositeSymbol(quantity.dimensions, template)
}

const formatters = new Map<number, Intl.NumberFormat>()

// Fixed-point at every magnitude, without digit grouping.
const fixed = (value: number, precision: number): string => {
  let formatter = formatters.get(precision)
  if (formatter === undefined) {
    formatter = new Intl.NumberFormat("en-US", {
      useGrouping: false,
      minimumFractionDigits: precision,
      maximumFractionDigits: precision,
    })
    formatters.set(precision, formatter)
  }
  return formatter.format(value === 0 ? 0 : value)
}

/**
 * Render a quantity with exactly `precision` decimal places in fixed-point
 * notation followed by its unit.
 */
export const render = (quantity: Renderable, template: Template = "plain"): string => {
  const measurement = measure(quantity)
  const units = unitText(quantity, measurement, template)
  const number = fixed(measurement.magnitude, quantity.precision)
  return units === "" ? number : `${number}${TEMPLATES[template].space}${units}`
}
