/**
 * The generic quantity contract.
 *
 * A quantity is an immutable `{ _tag, dimension, value }` record: `_tag` names
 * the unit the magnitude is expressed in and `dimension` names the closed
 * family the unit belongs to. Quantities of different dimensions have
 * disjoint types, so mixing them is a compile error rather than a runtime
 * check.
 *
 * @since 0.1.0
 */

import { Data, Predicate } from "effect"
import type { Numeric } from "./Numeric.js"

/**
 * A magnitude of kernel type `N`, measured in unit `U` of dimension `D`.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Quantity<D extends string, U extends string, N> {
  readonly _tag: U
  readonly dimension: D
  readonly value: N
}

/**
 * The closed tagged union of every unit variant of a dimension.
 *
 * @category Models
 * @since 0.1.0
 */
export type Variants<D extends string, U extends string, N> = {
  [K in U]: Quantity<D, K, N>
}[U]

/**
 * The contract every dimension satisfies. Generic code only ever talks to a
 * dimension through these two conversions.
 *
 * `fromBaseUnit` always rebuilds the base-unit variant (`B`), whatever unit
 * the inputs were expressed in.
 *
 * @category Models
 * @since 0.1.0
 */
export interface QuantityKind<Q, N, B = Q> {
  readonly dimension: string
  readonly numeric: Numeric<N>
  readonly toBaseUnit: (self: Q) => N
  readonly fromBaseUnit: (value: N) => B
}

/**
 * @category Constructors
 * @since 0.1.0
 */
export const make = <D extends string, U extends string, N>(
  dimension: D,
  unit: U,
  value: N,
): Quantity<D, U, N> => Data.struct({ _tag: unit, dimension, value })

/**
 * @category Guards
 * @since 0.1.0
 */
export const isQuantity = (u: unknown): u is Quantity<string, string, unknown> =>
  Predicate.hasProperty(u, "_tag") &&
  Predicate.hasProperty(u, "dimension") &&
  Predicate.hasProperty(u, "value") &&
  Predicate.isString(u._tag) &&
  Predicate.isString(u.dimension)
