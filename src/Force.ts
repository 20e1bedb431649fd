/**
 * Force, with the newton as base unit.
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
export type Unit = "Newton" | "Kilonewton" | "PoundForce" | "Kilopound"

/**
 * @category Models
 * @since 0.1.0
 */
export type Force<N = number> = Quantity.Variants<"Force", Unit, N>

/**
 * @category Dimensions
 * @since 0.1.0
 */
export const dimension = Dimension.make<"Force", Unit, "Newton">("Force", "Newton", {
  Newton: 1,
  Kilonewton: 1_000,
  PoundForce: 4.4482216152605,
  Kilopound: 4448.221615255,
})

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Newton = dimension.unit("Newton")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Kilonewton = dimension.unit("Kilonewton")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const PoundForce = dimension.unit("PoundForce")

/**
 * 1 kip, 4448.221615255 N.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const Kilopound = dimension.unit("Kilopound")

/**
 * Float64 algebra for force.
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
