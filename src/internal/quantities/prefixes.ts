/**
 * Metric prefixes and the automatic prefix choice used when rendering.
 */

export const PREFIX_EXPONENTS = {
  Y: 24,
  Z: 21,
  E: 18,
  P: 15,
  T: 12,
  G: 9,
  M: 6,
  k: 3,
  "": 0,
  m: -3,
  μ: -6,
  n: -9,
  p: -12,
  f: -15,
  a: -18,
  z: -21,
  y: -24,
} as const

export type PrefixSymbol = keyof typeof PREFIX_EXPONENTS

const PREFIX_SYMBOLS = Object.keys(PREFIX_EXPONENTS).filter(isPrefix)

export function isPrefix(symbol: string): symbol is PrefixSymbol {
  return Object.prototype.hasOwnProperty.call(PREFIX_EXPONENTS, symbol)
}

// Scaling by a power of ten, dividing for positive exponents so that values
// such as 0.0025 * 1000 stay exact.
const scaleDown = (value: number, exponent: number): number =>
  exponent >= 0 ? value / Math.pow(10, exponent) : value * Math.pow(10, -exponent)

// Mass prefixes attach to the gram.
const anchor = (value: number, power: number, mass: boolean): number =>
  mass ? scaleDown(value, -3 * power) : value

/**
 * Choose the prefix whose scale, raised to `power`, is the largest one not
 * exceeding the magnitude of `value`. Zero takes no prefix; magnitudes below
 * every scale take the smallest prefix.
 */
export const autoPrefix = (value: number, power: number, mass: boolean): PrefixSymbol => {
  const magnitude = Math.abs(anchor(value, power, mass))
  if (magnitude === 0 || power === 0 || !Number.isFinite(magnitude)) {
    return ""
  }
  const ordered = [...PREFIX_SYMBOLS].sort(
    (a, b) => PREFIX_EXPONENTS[b] * power - PREFIX_EXPONENTS[a] * power,
  )
  for (const prefix of ordered) {
    if (magnitude >= Math.pow(10, PREFIX_EXPONENTS[prefix] * power)) {
      return prefix
    }
  }
  return ordered[ordered.length - 1] ?? ""
}

/**
 * Express `value` in units carrying `prefix`, for a unit raised to `power`.
 */
export const prefixValue = (
  value: number,
  power: number,
  prefix: PrefixSymbol,
  mass: boolean,
): number => scaleDown(anchor(value, power, mass), PREFIX_EXPONENTS[prefix] * power)
