import { describe, expectTypeOf, it } from "vitest"
import * as Force from "../src/Force.js"
import type * as Mass from "../src/Mass.js"
import { float32, toFloat32, type Float32 } from "../src/Numeric.js"
import type * as Quantity from "../src/Quantity.js"
import * as ScaleFactor from "../src/ScaleFactor.js"
import * as Temperature from "../src/Temperature.js"

describe("Force types", () => {
  it("rejects mixed dimensions and bare scalars", () => {
    // @ts-expect-error a temperature is not a force
    Force.add(Force.Newton(1), Temperature.Kelvin(1))
    // @ts-expect-error a bare number is not a force
    Force.add(Force.Newton(1), 2.5)
    // @ts-expect-error a scale factor is not a force
    Force.add(Force.Newton(1), ScaleFactor.of(2))
    // @ts-expect-error a bare number is not a scale factor
    Force.multiply(Force.Newton(1), 2)

    expectTypeOf(Force.Kilopound(1)).toMatchTypeOf<Force.Force>()
    expectTypeOf<Temperature.Temperature>().not.toMatchTypeOf<Force.Force>()
    expectTypeOf<Mass.Mass>().not.toMatchTypeOf<Force.Force>()
    expectTypeOf<number>().not.toMatchTypeOf<Force.Force>()
    expectTypeOf<ScaleFactor.ScaleFactor<number>>().not.toMatchTypeOf<Force.Force>()
    expectTypeOf<Force.Force<number>>().not.toMatchTypeOf<Force.Force<Float32>>()
    expectTypeOf(Force.add).parameter(1).toEqualTypeOf<Force.Force>()
    expectTypeOf(Force.multiply).parameter(1).toEqualTypeOf<ScaleFactor.ScaleFactor<number>>()
  })

  it("ties scale factors to the kernel of the quantity", () => {
    const force32 = Force.dimension.over(float32)
    const newton32 = Force.Newton(toFloat32(1))

    // @ts-expect-error a float32 factor cannot scale a float64 force
    Force.multiply(Force.Newton(1), ScaleFactor.literal(float32)(2))
    // @ts-expect-error a float64 factor cannot scale a float32 force
    force32.multiply(newton32, ScaleFactor.of(2))

    expectTypeOf(force32.multiply(newton32, ScaleFactor.literal(float32)(2))).toEqualTypeOf<
      Quantity.Quantity<"Force", "Newton", Float32>
    >()
    expectTypeOf<ScaleFactor.ScaleFactor<number>>().not.toMatchTypeOf<ScaleFactor.ScaleFactor<Float32>>()
    expectTypeOf<ScaleFactor.ScaleFactor<Float32>>().not.toMatchTypeOf<ScaleFactor.ScaleFactor<number>>()
    expectTypeOf(ScaleFactor.of).returns.toEqualTypeOf<ScaleFactor.ScaleFactor<number>>()
  })

  it("types results as the base unit", () => {
    expectTypeOf(Force.add(Force.Newton(1), Force.Kilopound(1))).toEqualTypeOf<
      Quantity.Quantity<"Force", "Newton", number>
    >()
    expectTypeOf(Force.convert(Force.Newton(1), "Kilopound")).toEqualTypeOf<
      Quantity.Quantity<"Force", "Kilopound", number>
    >()
  })
})
