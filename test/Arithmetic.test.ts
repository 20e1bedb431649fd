import { describe, it, expect } from "@effect/vitest"
import * as Arithmetic from "../src/Arithmetic.js"
import { float64 } from "../src/Numeric.js"
import type { QuantityKind } from "../src/Quantity.js"
import * as ScaleFactor from "../src/ScaleFactor.js"

// A single-unit kind written by hand, without Dimension.make.
interface Span {
  readonly _tag: "Span"
  readonly seconds: number
}

const span = (seconds: number): Span => ({ _tag: "Span", seconds })

const SpanKind: QuantityKind<Span, number> = {
  dimension: "Span",
  numeric: float64,
  toBaseUnit: (self) => self.seconds,
  fromBaseUnit: span,
}

const { add, subtract, negate, multiply, times, divide, sum } = Arithmetic.make(SpanKind)

describe("Arithmetic", () => {
  it("adds and subtracts through the base unit", () => {
    expect(add(span(1), span(2))).toEqual(span(3))
    expect(subtract(span(5), span(7))).toEqual(span(-2))
  })

  it("negates", () => {
    expect(negate(span(3))).toEqual(span(-3))
    expect(negate(negate(span(3)))).toEqual(span(3))
  })

  it("scales by a factor on either side", () => {
    expect(multiply(span(2), ScaleFactor.of(2.5))).toEqual(span(5))
    expect(times(ScaleFactor.of(3), span(2))).toEqual(span(6))
  })

  it("divides by a factor", () => {
    expect(divide(span(1), ScaleFactor.of(4))).toEqual(span(0.25))
  })

  it("propagates the kernel's result for a zero factor", () => {
    expect(divide(span(1), ScaleFactor.of(0)).seconds).toBe(Infinity)
    expect(divide(span(-1), ScaleFactor.of(0)).seconds).toBe(-Infinity)
    expect(divide(span(0), ScaleFactor.of(0)).seconds).toBeNaN()
  })

  it("sums any number of quantities", () => {
    expect(sum([])).toEqual(span(0))
    expect(sum([span(1), span(2), span(3)])).toEqual(span(6))
  })
})
