/**
 * Unitless multipliers.
 *
 * A scale factor is not a quantity: it can scale one through
 * `multiply`, `times` and `divide`, but no additive operation accepts it. The
 * factor carries the kernel it was built for, which keeps `ScaleFactor<N>`
 * invariant in `N`: a float64 factor cannot scale a float32 quantity.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import { float64, type Numeric } from "./Numeric.js"

/**
 * @category Models
 * @since 0.1.0
 */
export interface ScaleFactor<N> {
  readonly _tag: "ScaleFactor"
  readonly value: N
  readonly numeric: Numeric<N>
}

/**
 * Wrap a kernel value as a scale factor.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = <N>(numeric: Numeric<N>, value: N): ScaleFactor<N> =>
  Data.struct({ _tag: "ScaleFactor" as const, value, numeric })

/**
 * Build scale factors for a kernel from bare numeric literals.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * const half = ScaleFactor.literal(float32)(0.5)
 * ```
 */
export const literal =
  <N>(numeric: Numeric<N>) =>
  (value: number): ScaleFactor<N> =>
    make(numeric, numeric.fromNumber(value))

/**
 * Float64 shorthand for {@link literal}.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const of: (value: number) => ScaleFactor<number> = literal(float64)

/**
 * Scale a base-unit magnitude.
 *
 * @since 0.1.0
 */
export const multiply = <N>(factor: ScaleFactor<N>, base: N): N =>
  factor.numeric.multiply(factor.value, base)

/**
 * Divide a base-unit magnitude. A zero factor is not guarded against.
 *
 * @since 0.1.0
 */
export const divide = <N>(base: N, factor: ScaleFactor<N>): N =>
  factor.numeric.divide(base, factor.value)
