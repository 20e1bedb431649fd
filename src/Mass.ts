/**
 * Mass, with the kilogram as base unit.
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
export type Unit = "Gram" | "Kilogram" | "Tonne" | "Pound" | "Ounce"

/**
 * @category Models
 * @since 0.1.0
 */
export type Mass<N = number> = Quantity.Variants<"Mass", Unit, N>

/**
 * @category Dimensions
 * @since 0.1.0
 */
export const dimension = Dimension.make<"Mass", Unit, "Kilogram">("Mass", "Kilogram", {
  Gram: 0.001,
  Kilogram: 1,
  Tonne: 1_000,
  Pound: 0.45359237,
  Ounce: 0.028349523125,
})

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Gram = dimension.unit("Gram")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Kilogram = dimension.unit("Kilogram")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Tonne = dimension.unit("Tonne")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Pound = dimension.unit("Pound")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Ounce = dimension.unit("Ounce")

/**
 * Float64 algebra for mass.
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
