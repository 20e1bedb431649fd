/**
 * Quantity arithmetic, written once against {@link QuantityKind}.
 *
 * Every operation converts its operands to the base unit, applies the kernel
 * operation and converts back with `fromBaseUnit`, so results always carry the
 * base unit: `Newton(1) + Kilopound(1)` is a `Newton`.
 *
 * @since 0.1.0
 */

import type { QuantityKind } from "./Quantity.js"
import * as ScaleFactor from "./ScaleFactor.js"

/**
 * Operations a dimension gains by satisfying the quantity contract.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Arithmetic<Q, N, B = Q> {
  readonly add: (self: Q, that: Q) => B
  readonly subtract: (self: Q, that: Q) => B
  readonly negate: (self: Q) => B
  /** `quantity * factor` */
  readonly multiply: (self: Q, factor: ScaleFactor.ScaleFactor<N>) => B
  /** `factor * quantity` */
  readonly times: (factor: ScaleFactor.ScaleFactor<N>, self: Q) => B
  readonly divide: (self: Q, factor: ScaleFactor.ScaleFactor<N>) => B
  /** Sum of any number of quantities; zero in the base unit when empty. */
  readonly sum: (quantities: Iterable<Q>) => B
}

/**
 * Derive the arithmetic of a quantity kind.
 *
 * @category Constructors
 * @since 0.1.0
 */
export const make = <Q, N, B = Q>(kind: QuantityKind<Q, N, B>): Arithmetic<Q, N, B> => {
  const { numeric, toBaseUnit, fromBaseUnit } = kind

  const multiply = (self: Q, factor: ScaleFactor.ScaleFactor<N>): B =>
    fromBaseUnit(ScaleFactor.multiply(factor, toBaseUnit(self)))

  return {
    add: (self, that) => fromBaseUnit(numeric.add(toBaseUnit(self), toBaseUnit(that))),
    subtract: (self, that) => fromBaseUnit(numeric.subtract(toBaseUnit(self), toBaseUnit(that))),
    negate: (self) => fromBaseUnit(numeric.negate(toBaseUnit(self))),
    multiply,
    times: (factor, self) => multiply(self, factor),
    divide: (self, factor) => fromBaseUnit(ScaleFactor.divide(toBaseUnit(self), factor)),
    sum: (quantities) => {
      let total = numeric.fromNumber(0)
      for (const quantity of quantities) {
        total = numeric.add(total, toBaseUnit(quantity))
      }
      return fromBaseUnit(total)
    },
  }
}
