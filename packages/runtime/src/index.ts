export { createRuntime, logCircuitStateChange } from "./runtime.js";
export type { HealthReport, Runtime, RuntimeOptions, RuntimeRole } from "./runtime.js";
