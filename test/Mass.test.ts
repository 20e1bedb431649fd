import { describe, it, expect } from "@effect/vitest"
import * as Mass from "../src/Mass.js"
import * as ScaleFactor from "../src/ScaleFactor.js"

describe("Mass", () => {
  it("converts avoirdupois units", () => {
    expect(Mass.toBaseUnit(Mass.Pound(1))).toBe(0.45359237)
    expect(Mass.to(Mass.Kilogram(1), "Pound")).toBeCloseTo(2.2046226218, 9)
    expect(Mass.to(Mass.Pound(1), "Ounce")).toBeCloseTo(16, 10)
  })

  it("adds metric units into kilograms", () => {
    const total = Mass.add(Mass.Tonne(1), Mass.Gram(500))
    expect(total._tag).toBe("Kilogram")
    expect(total.value).toBeCloseTo(1000.5, 10)
  })

  it("halves a mass", () => {
    const half = Mass.divide(Mass.Kilogram(3), ScaleFactor.of(2))
    expect(half.value).toBe(1.5)
  })

  it("orders across units", () => {
    expect(Mass.Order(Mass.Pound(1), Mass.Kilogram(0.5))).toBe(-1)
  })
})
