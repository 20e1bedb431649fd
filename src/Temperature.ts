/**
 * Thermodynamic temperature, with the kelvin as base unit.
 *
 * Only scales that are a pure multiple of the kelvin are unit variants.
 * Celsius is offset from the kelvin, so it is available as a read-out
 * (`toCelsius`) and a constructor (`fromCelsius`) rather than a variant.
 *
 * @since 0.1.0
 */

import * as Dimension from "./Dimension.js"
import { float64 } from "./Numeric.js"
import type * as Quantity from "./Quantity.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type Unit = "Kelvin" | "Millikelvin" | "Rankine"

/**
 * @category Models
 * @since 0.1.0
 */
export type Temperature<N = number> = Quantity.Variants<"Temperature", Unit, N>

/**
 * @category Dimensions
 * @since 0.1.0
 */
export const dimension = Dimension.make<"Temperature", Unit, "Kelvin">("Temperature", "Kelvin", {
  Kelvin: 1,
  Millikelvin: 0.001,
  Rankine: 5 / 9,
})

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Kelvin = dimension.unit("Kelvin")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Millikelvin = dimension.unit("Millikelvin")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Rankine = dimension.unit("Rankine")

/**
 * Float64 algebra for temperature.
 *
 * @category Algebra
 * @since 0.1.0
 */
export const {
  toBaseUnit,
  fromBaseUnit,
  add,
  subtract,
  negate,
  multiply,
  times,
  divide,
  sum,
  to,
  convert,
  Order,
  equivalence,
} = dimension.over(float64)

/**
 * 0 °C in kelvin.
 *
 * @since 0.1.0
 */
export const ZERO_CELSIUS = 273.15

/**
 * @category Conversions
 * @since 0.1.0
 */
export const toCelsius = (self: Temperature): number => toBaseUnit(self) - ZERO_CELSIUS

/**
 * @category Constructors
 * @since 0.1.0
 */
export const fromCelsius = (celsius: number): Quantity.Quantity<"Temperature", "Kelvin", number> =>
  Kelvin(celsius + ZERO_CELSIUS)
