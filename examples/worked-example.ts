import { Effect } from "effect"
import { Force, ScaleFactor, Temperature, Time } from "../src/index.js"

const program = Effect.gen(function* () {
  const f0 = Force.Newton(1)
  const f1 = Force.Kilopound(1)

  // 10 * f0 + f1 / 444.8221615255
  const total = Force.add(
    Force.times(ScaleFactor.of(10), f0),
    Force.divide(f1, ScaleFactor.of(444.8221615255)),
  )
  yield* Effect.log("Combined force").pipe(
    Effect.annotateLogs({ unit: total._tag, value: total.value }),
  )

  const boiling = Temperature.fromCelsius(100)
  yield* Effect.log("Boiling water").pipe(
    Effect.annotateLogs({ kelvin: boiling.value, rankine: Temperature.to(boiling, "Rankine") }),
  )

  const shift = Time.sum([Time.Hour(7), Time.Minute(45)])
  yield* Effect.log("Shift length").pipe(
    Effect.annotateLogs({ hours: Time.to(shift, "Hour"), duration: Time.toDuration(shift) }),
  )
})

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run the worked example", error)
  process.exitCode = 1
})
