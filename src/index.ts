/**
 * @since 0.1.0
 */
export * as Arithmetic from "./Arithmetic.js"
export * as Dimension from "./Dimension.js"
export * from "./Errors.js"
export * as Force from "./Force.js"
export * as Mass from "./Mass.js"
export * as Numeric from "./Numeric.js"
export * as Quantity from "./Quantity.js"
export * as ScaleFactor from "./ScaleFactor.js"
export * as Temperature from "./Temperature.js"
export * as Time from "./Time.js"
export * from "./Tolerance.js"
