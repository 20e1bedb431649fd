/**
 * Configured tolerance for comparing quantities.
 *
 * Floating-point conversions accumulate rounding error, so code that checks
 * whether two quantities are "the same" needs a tolerance. The `Tolerance`
 * service supplies one from configuration (`QUANTITY_TOLERANCE`).
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer, type Equivalence } from "effect"

/**
 * @since 0.1.0
 */
export const DEFAULT_TOLERANCE = 1e-9

/**
 * Relative tolerance used when comparing quantities.
 *
 * @category Models
 * @since 0.1.0
 */
export interface ToleranceService {
  readonly epsilon: number
}

const ToleranceConfig = Config.number("QUANTITY_TOLERANCE").pipe(
  Config.withDefault(DEFAULT_TOLERANCE),
  Config.validate({
    message: "Expected a finite, non-negative tolerance",
    validation: (epsilon: number) => Number.isFinite(epsilon) && epsilon >= 0,
  }),
)

/**
 * @category Services
 * @since 0.1.0
 */
export class Tolerance extends Context.Tag("effect-quantities/Tolerance")<
  Tolerance,
  ToleranceService
>() {
  /**
   * Reads `QUANTITY_TOLERANCE` from the active `ConfigProvider`.
   */
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const epsilon = yield* ToleranceConfig
      yield* Effect.logDebug("Loaded quantity tolerance").pipe(Effect.annotateLogs({ epsilon }))
      return { epsilon }
    }),
  )

  static readonly Default = Layer.succeed(this, { epsilon: DEFAULT_TOLERANCE })

  /**
   * Compare two quantities with a dimension's `equivalence` at the configured
   * tolerance.
   *
   * @example
   * ```ts
   * const same = yield* Tolerance.equivalent(Force.equivalence)(a, b)
   * ```
   */
  static equivalent<Q>(equivalence: (tolerance: number) => Equivalence.Equivalence<Q>) {
    return (self: Q, that: Q): Effect.Effect<boolean, never, Tolerance> =>
      Effect.map(Tolerance, ({ epsilon }) => equivalence(epsilon)(self, that))
  }
}
