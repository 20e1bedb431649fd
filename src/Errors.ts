/**
 * Errors raised while defining dimensions.
 *
 * Quantity arithmetic itself never fails; mismatched dimensions are rejected by
 * the type checker. The only runtime failure is a malformed conversion table,
 * which surfaces the moment the dimension is declared.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Raised by `Dimension.make` when a conversion table is unusable: a factor
 * that is not finite and strictly positive, or a base unit whose factor is
 * not exactly `1`.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * Dimension.make("Length", "Metre", { Metre: 2 })
 * // throws InvalidDimensionError
 * ```
 */
export class InvalidDimensionError extends Data.TaggedError("InvalidDimensionError")<{
  readonly dimension: string
  readonly reason: string
}> {
  override get message(): string {
    return `Invalid dimension "${this.dimension}": ${this.reason}`
  }
}
