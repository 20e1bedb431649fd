import { describe, it, expect } from "@effect/vitest"
import { Duration, Equal } from "effect"
import * as Time from "../src/Time.js"

describe("Time", () => {
  it("uses the second as base unit", () => {
    expect(Time.toBaseUnit(Time.Hour(2))).toBe(7200)
    expect(Time.toBaseUnit(Time.Day(1))).toBe(86400)
  })

  it("reads a span in any unit", () => {
    expect(Time.to(Time.Hour(1.5), "Minute")).toBe(90)
    expect(Time.to(Time.Day(1), "Hour")).toBe(24)
  })

  it("sums mixed units into seconds", () => {
    const total = Time.sum([Time.Day(1), Time.Hour(1), Time.Minute(1), Time.Second(1)])
    expect(Equal.equals(total, Time.Second(90061))).toBe(true)
  })

  it("bridges to Duration", () => {
    expect(Duration.toMillis(Time.toDuration(Time.Minute(1.5)))).toBe(90000)
    expect(Duration.toMillis(Time.toDuration(Time.Second(-5)))).toBe(0)
  })

  it("bridges from Duration", () => {
    expect(Equal.equals(Time.fromDuration(Duration.seconds(2)), Time.Second(2))).toBe(true)
    expect(Time.fromDuration(Duration.millis(250)).value).toBe(0.25)
  })
})
