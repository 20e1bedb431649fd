/**
 * Numeric kernels: the scalar arithmetic that quantities and scale factors
 * are built on.
 *
 * A kernel bundles the group operations (`add`, `subtract`, `negate`) and the
 * field operations (`multiply`, `divide`) for one scalar representation, plus
 * the conversions needed to lift numeric literals into it. Every operation is
 * total: dividing by zero yields whatever the representation yields
 * (`Infinity` or `NaN` for IEEE floats).
 *
 * @since 0.1.0
 */

import { Brand, Order, Schema } from "effect"

/**
 * Additive capabilities of a scalar type.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Group<N> {
  readonly add: (self: N, that: N) => N
  readonly subtract: (self: N, that: N) => N
  readonly negate: (self: N) => N
}

/**
 * Multiplicative capabilities layered on top of {@link Group}.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Field<N> extends Group<N> {
  readonly multiply: (self: N, that: N) => N
  readonly divide: (self: N, that: N) => N
}

/**
 * A complete numeric kernel.
 *
 * `fromNumber` is how unit conversion factors and scale-factor literals enter
 * the kernel; `toNumber` is only used for tolerance checks.
 *
 * @category Models
 * @since 0.1.0
 */
export interface Numeric<N> extends Field<N> {
  readonly name: string
  readonly fromNumber: (value: number) => N
  readonly toNumber: (self: N) => number
  readonly Order: Order.Order<N>
}

/**
 * IEEE-754 double precision kernel over plain `number`.
 *
 * @category Kernels
 * @since 0.1.0
 */
export const float64: Numeric<number> = {
  name: "float64",
  add: (self, that) => self + that,
  subtract: (self, that) => self - that,
  negate: (self) => -self,
  multiply: (self, that) => self * that,
  divide: (self, that) => self / that,
  fromNumber: (value) => value,
  toNumber: (self) => self,
  Order: Order.number,
}

/**
 * Branded number holding a value representable as a 32-bit float.
 *
 * @category Kernels
 * @since 0.1.0
 */
export const Float32 = Schema.Number.pipe(
  Schema.filter((value) => Number.isNaN(value) || Math.fround(value) === value, {
    message: () => "Expected a value representable as a 32-bit float",
  }),
  Schema.brand("Float32"),
)

/**
 * Type extracted from the Float32 schema
 *
 * @category Kernels
 * @since 0.1.0
 */
export type Float32 = typeof Float32.Type

const float32Brand = Brand.nominal<Float32>()

/**
 * Round a number to the nearest 32-bit float. The result of `Math.fround`
 * always satisfies the `Float32` schema, so it is branded without decoding.
 *
 * @category Kernels
 * @since 0.1.0
 */
export const toFloat32 = (value: number): Float32 => float32Brand(Math.fround(value))

/**
 * Single precision kernel: every intermediate result is rounded with
 * `Math.fround`.
 *
 * @category Kernels
 * @since 0.1.0
 */
export const float32: Numeric<Float32> = {
  name: "float32",
  add: (self, that) => toFloat32(self + that),
  subtract: (self, that) => toFloat32(self - that),
  negate: (self) => toFloat32(-self),
  multiply: (self, that) => toFloat32(self * that),
  divide: (self, that) => toFloat32(self / that),
  fromNumber: toFloat32,
  toNumber: (self) => self,
  Order: Order.number,
}
