/**
 * Dimension definitions.
 *
 * A dimension is a closed set of units declared through a conversion table
 * that maps every unit to its factor against the base unit. The table is
 * typed by the dimension's unit union, so leaving a unit out is a compile
 * error. Binding a dimension to a numeric kernel with `over` yields its
 * {@link Algebra}: the quantity contract, the shared arithmetic, and
 * unit-aware conversions and comparisons.
 *
 * @since 0.1.0
 */

import { Either, Equivalence, Order, Schema } from "effect"
import * as Arithmetic from "./Arithmetic.js"
import { InvalidDimensionError } from "./Errors.js"
import type { Numeric } from "./Numeric.js"
import * as Quantity from "./Quantity.js"

const ConversionTable = Schema.Record({
  key: Schema.String,
  value: Schema.Number.pipe(Schema.finite(), Schema.positive()),
})

/**
 * Everything a dimension offers once bound to a numeric kernel `N`.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Algebra<D extends string, U extends string, B extends U, N>
  extends Quantity.QuantityKind<Quantity.Variants<D, U, N>, N, Quantity.Quantity<D, B, N>>,
    Arithmetic.Arithmetic<Quantity.Variants<D, U, N>, N, Quantity.Quantity<D, B, N>> {
  /**
   * Magnitude of a quantity expressed in `unit`. Exact when `unit` is the
   * base unit.
   */
  readonly to: (self: Quantity.Variants<D, U, N>, unit: U) => N
  /**
   * Re-express a quantity in an explicitly chosen unit.
   */
  readonly convert: <K extends U>(self: Quantity.Variants<D, U, N>, unit: K) => Quantity.Quantity<D, K, N>
  /**
   * Orders quantities by their base-unit magnitude, across units.
   */
  readonly Order: Order.Order<Quantity.Variants<D, U, N>>
  /**
   * Compares base-unit magnitudes with `|a - b| <= tolerance * max(1, |a|, |b|)`.
   */
  readonly equivalence: (tolerance: number) => Equivalence.Equivalence<Quantity.Variants<D, U, N>>
}

/**
 * A closed family of units sharing a base unit.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Dimension<D extends string, U extends string, B extends U> {
  readonly name: D
  readonly base: B
  readonly units: ReadonlyArray<U>
  readonly factors: Readonly<Record<U, number>>
  /**
   * Constructor for one unit variant.
   */
  readonly unit: <K extends U>(unit: K) => <N>(value: N) => Quantity.Quantity<D, K, N>
  /**
   * Bind the dimension to a numeric kernel.
   */
  readonly over: <N>(numeric: Numeric<N>) => Algebra<D, U, B, N>
}

const validate = <U extends string>(
  name: string,
  base: U,
  factors: Readonly<Record<U, number>>,
): void => {
  const decoded = Schema.decodeUnknownEither(ConversionTable)(factors)
  if (Either.isLeft(decoded)) {
    throw new InvalidDimensionError({ dimension: name, reason: decoded.left.message })
  }
  if (factors[base] !== 1) {
    throw new InvalidDimensionError({
      dimension: name,
      reason: `base unit "${base}" must have conversion factor 1`,
    })
  }
}

/**
 * Declare a dimension from its conversion table.
 *
 * @category Constructors
 * @since 0.1.0
 * @example
 * ```ts
 * type LengthUnit = "Metre" | "Foot"
 * const Length = Dimension.make<"Length", LengthUnit, "Metre">("Length", "Metre", {
 *   Metre: 1,
 *   Foot: 0.3048,
 * })
 * const { add } = Length.over(float64)
 * add(Length.unit("Metre")(1), Length.unit("Foot")(1)) // 1.3048 Metre
 * ```
 */
export const make = <D extends string, U extends string, B extends U>(
  name: D,
  base: B,
  factors: Readonly<Record<U, number>>,
): Dimension<D, U, B> => {
  const table: Readonly<Record<U, number>> = Object.freeze({ ...factors })
  validate<U>(name, base, table)
  const units = Object.freeze(Object.keys(table).filter((key): key is U => Object.hasOwn(table, key)))

  const over = <N>(numeric: Numeric<N>): Algebra<D, U, B, N> => {
    const factor = (unit: U): N => numeric.fromNumber(table[unit])

    const toBaseUnit = (self: Quantity.Quantity<D, U, N>): N =>
      self._tag === base ? self.value : numeric.multiply(self.value, factor(self._tag))

    const fromBaseUnit = (value: N): Quantity.Quantity<D, B, N> => Quantity.make(name, base, value)

    const to = (self: Quantity.Quantity<D, U, N>, unit: U): N =>
      unit === base ? toBaseUnit(self) : numeric.divide(toBaseUnit(self), factor(unit))

    const kind: Quantity.QuantityKind<Quantity.Variants<D, U, N>, N, Quantity.Quantity<D, B, N>> = {
      dimension: name,
      numeric,
      toBaseUnit,
      fromBaseUnit,
    }

    return {
      ...kind,
      ...Arithmetic.make(kind),
      to,
      convert: (self, unit) => Quantity.make(name, unit, to(self, unit)),
      Order: Order.mapInput(numeric.Order, toBaseUnit),
      equivalence: (tolerance) =>
        Equivalence.make((self, that) => {
          const left = numeric.toNumber(toBaseUnit(self))
          const right = numeric.toNumber(toBaseUnit(that))
          return Math.abs(left - right) <= tolerance * Math.max(1, Math.abs(left), Math.abs(right))
        }),
    }
  }

  return {
    name,
    base,
    units,
    factors: table,
    unit: (unit) => (value) => Quantity.make(name, unit, value),
    over,
  }
}
