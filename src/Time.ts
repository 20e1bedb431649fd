/**
 * Time spans, with the second as base unit, and their bridge to `Duration`.
 *
 * @since 0.1.0
 */

import { Duration } from "effect"
import * as Dimension from "./Dimension.js"
import { float64 } from "./Numeric.js"
import type * as Quantity from "./Quantity.js"

/**
 * @category Models
 * @since 0.1.0
 */
export type Unit = "Millisecond" | "Second" | "Minute" | "Hour" | "Day"

/**
 * @category Models
 * @since 0.1.0
 */
export type Time<N = number> = Quantity.Variants<"Time", Unit, N>

/**
 * @category Dimensions
 * @since 0.1.0
 */
export const dimension = Dimension.make<"Time", Unit, "Second">("Time", "Second", {
  Millisecond: 0.001,
  Second: 1,
  Minute: 60,
  Hour: 3_600,
  Day: 86_400,
})

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Millisecond = dimension.unit("Millisecond")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Second = dimension.unit("Second")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Minute = dimension.unit("Minute")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Hour = dimension.unit("Hour")

/**
 * @category Constructors
 * @since 0.1.0
 */
export const Day = dimension.unit("Day")

/**
 * Float64 algebra for time.
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
 * Negative spans become `Duration.zero`, since a `Duration` cannot be
 * negative.
 *
 * @category Conversions
 * @since 0.1.0
 */
export const toDuration = (self: Time): Duration.Duration => Duration.seconds(toBaseUnit(self))

/**
 * @category Conversions
 * @since 0.1.0
 */
export const fromDuration = (duration: Duration.Duration): Quantity.Quantity<"Time", "Second", number> =>
  Second(Duration.toMillis(duration) / 1_000)
