export * from "./schema.js";
export { decodeApplianceCatalog, decodeSystemConfig, stepsPerDayFor } from "./validation.js";
export { chargeablePowerKw, dischargeablePowerKw, updateBattery, type BatteryParameters, type BatteryState, type BatteryUpdate } from "./battery/battery-state-model.js";
export { pvPower, pvSeries } from "./pv/pv-conversion.js";
export {
  advanceTasks,
  applianceDurationSteps,
  applianceStepRange,
  buildDailyTasks,
  catalogMaximumByCategory,
  requestedByCategory,
  requestedForStep,
  DEFAULT_RUN_HOURS,
} from "./load/load-demand-model.js";
export { computeNominalPlan, nominalRunHours } from "./load/nominal-plan.js";
export * from "./controller/index.js";
export { KpiAccumulator, type KpiStep } from "./kpi/kpi-accumulator.js";
export { alignToSteps, placeholderIrradiance, resampleSeries, resolveIrradiance } from "./forecast/resample.js";
export {
  EXPECTED_PROFILE,
  expectedIrradiance,
  hourlyMeanProfile,
  isUsableProfile,
  type ExpectedIrradianceRequest,
  type ExpectedProfile,
  type ExpectedProfileSource,
} from "./forecast/expected-profile.js";
export { ForecastNotAvailableError, IrradianceForecast, type ForecastProvenance, type IrradianceRequest } from "./forecast/types.js";
export { NasaPowerForecastLayer, parseHourlyIrradiance } from "./forecast/nasa-power.adapter.js";
export { makeSimulation, SimulationLoop, type SimulationOptions, type SimulationOutput, type SimulationStatus } from "./simulation/simulation-loop.js";
export { runDigitalTwin, type DigitalTwinResult } from "./simulation/digital-twin.js";
export { compareControllers } from "./simulation/batch.js";
export * from "./matching/index.js";
export { loadHouseholdFile } from "./household/household-file.js";
export { EventLogger } from "./event-logger/index.js";
export type { SimulationEventLogger } from "./event-logger/types.js";
export { InvalidConfigError } from "./errors/invalid-config.error.js";
export { InsufficientDataError } from "./errors/insufficient-data.error.js";
export { HouseholdFileNotReadableError } from "./errors/household-file-not-readable.error.js";
