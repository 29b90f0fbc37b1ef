/**
 * Resource quantity parsing (e.g. "10Gi", "500M", "1.5").
 */

const BINARY_SUFFIXES: Record<string, number> = {
  Ki: 2 ** 10,
  Mi: 2 ** 20,
  Gi: 2 ** 30,
  Ti: 2 ** 40,
  Pi: 2 ** 50,
  Ei: 2 ** 60,
}

const DECIMAL_SUFFIXES: Record<string, number> = {
  m: 1e-3,
  '': 1,
  k: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18,
}

/**
 * Value of a quantity in thousandths of a base unit, rounded up.
 */
function parseMilli(quantity: string): number | null {
  const match = quantity
    .trim()
    .match(/^([+-]?\d+(?:\.\d+)?|[+-]?\.\d+)([eE][+-]?\d+|Ki|Mi|Gi|Ti|Pi|Ei|[mkMGTPE])?$/)
  if (!match) return null

  const value = Number.parseFloat(match[1])
  const suffix = match[2] ?? ''

  let multiplier: number
  if (suffix in BINARY_SUFFIXES) {
    multiplier = BINARY_SUFFIXES[suffix]
  } else if (/^[eE][+-]?\d+$/.test(suffix)) {
    multiplier = 10 ** Number.parseInt(suffix.slice(1), 10)
  } else {
    multiplier = DECIMAL_SUFFIXES[suffix]
  }

  return Math.ceil(value * (multiplier * 1000))
}

/**
 * Parse a quantity to its value in base units, rounded up to an integer.
 * @returns null when the string is not a valid quantity
 * @example parseQuantity('1Gi') === 1073741824
 */
export function parseQuantity(quantity: string): number | null {
  const milli = parseMilli(quantity)
  return milli === null ? null : Math.ceil(milli / 1000)
}

/**
 * Whether two quantity strings denote the same value, to milli precision.
 */
export function quantitiesEqual(a: string | undefined, b: string | undefined): boolean {
  if (a === undefined || b === undefined) return false
  const left = parseMilli(a)
  const right = parseMilli(b)
  return left !== null && left === right
}
