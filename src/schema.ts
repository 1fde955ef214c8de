import { Schema } from "effect";

// Canonical data contracts shared by the simulation, the matching engine and
// every consumer of their output. Every field listed here is always present.

export const LoadCategorySchema = Schema.Literal("critical", "flexible", "deferrable");

export type LoadCategory = typeof LoadCategorySchema.Type;

// Serving precedence, most urgent first.
export const LOAD_CATEGORIES: readonly LoadCategory[] = ["critical", "flexible", "deferrable"];

export const RiskLevelSchema = Schema.Literal("low", "medium", "high");

export type RiskLevel = typeof RiskLevelSchema.Type;

export const ReasonCodeSchema = Schema.Literal(
  "LOW_SOC",
  "MID_SOC",
  "LOW_PV_FORECAST",
  "PV_SURPLUS",
  "DEFER_TASKS",
  "RESERVE_PROTECTED",
  "EXTRA_DISCHARGE_ALLOWED",
  "BLACKOUT",
);

export type ReasonCode = typeof ReasonCodeSchema.Type;

const Fraction = Schema.Number.pipe(Schema.between(0, 1));
const Efficiency = Schema.Number.pipe(Schema.greaterThan(0), Schema.lessThanOrEqualTo(1));
const PositiveNumber = Schema.Number.pipe(Schema.positive());

export const SystemConfigSchema = Schema.Struct({
  locationName: Schema.optionalWith(Schema.String, { default: () => "" }),
  latitude: Schema.optionalWith(Schema.Number.pipe(Schema.between(-90, 90)), { default: () => 0 }),
  longitude: Schema.optionalWith(Schema.Number.pipe(Schema.between(-180, 180)), { default: () => 0 }),

  pvCapacityKw: PositiveNumber,
  // derate applied to nameplate output (wiring, soiling, temperature)
  pvEfficiency: Schema.optionalWith(Efficiency, { default: () => 1 }),

  batteryCapacityKwh: PositiveNumber,
  socMin: Schema.optionalWith(Fraction, { default: () => 0.2 }),
  socMax: Schema.optionalWith(Fraction, { default: () => 0.95 }),
  socInitial: Schema.optionalWith(Fraction, { default: () => 0.7 }),
  chargeEfficiency: Schema.optionalWith(Efficiency, { default: () => 0.95 }),
  dischargeEfficiency: Schema.optionalWith(Efficiency, { default: () => 0.95 }),

  inverterMaxKw: PositiveNumber,
  timestepMinutes: Schema.optionalWith(Schema.Int.pipe(Schema.between(1, 60)), { default: () => 15 }),
  reserveSoc: Schema.optionalWith(Fraction, { default: () => 0.3 }),
  horizonSteps: Schema.optionalWith(Schema.Int.pipe(Schema.between(1, 288)), { default: () => 12 }),
}).pipe(
  Schema.filter((config) =>
    config.socMin <= config.socMax || `socMin (${config.socMin}) must not exceed socMax (${config.socMax})`
  ),
  Schema.filter((config) =>
    (config.socInitial >= config.socMin && config.socInitial <= config.socMax)
      || `socInitial (${config.socInitial}) must lie within [socMin, socMax]`
  ),
  Schema.filter((config) =>
    (config.reserveSoc >= config.socMin && config.reserveSoc <= config.socMax)
      || `reserveSoc (${config.reserveSoc}) must lie within [socMin, socMax]`
  ),
  Schema.filter((config) =>
    1440 % config.timestepMinutes === 0 || `timestepMinutes (${config.timestepMinutes}) must divide a day evenly`
  ),
);

export type SystemConfig = typeof SystemConfigSchema.Type;
export type SystemConfigInput = typeof SystemConfigSchema.Encoded;

export const ApplianceWindowSchema = Schema.Struct({
  startHour: Schema.Number.pipe(Schema.between(0, 24)),
  endHour: Schema.Number.pipe(Schema.between(0, 24)),
}).pipe(
  Schema.filter((window) => window.startHour < window.endHour || "window startHour must be before endHour"),
);

export type ApplianceWindow = typeof ApplianceWindowSchema.Type;

export const ApplianceSchema = Schema.Struct({
  id: Schema.NonEmptyString,
  name: Schema.String,
  category: LoadCategorySchema,
  powerW: PositiveNumber,
  quantity: Schema.optionalWith(Schema.Int.pipe(Schema.greaterThanOrEqualTo(1)), { default: () => 1 }),
  window: Schema.optional(ApplianceWindowSchema),
  runHours: Schema.optional(PositiveNumber),
});

export type Appliance = typeof ApplianceSchema.Type;
export type ApplianceInput = typeof ApplianceSchema.Encoded;

export const ApplianceCatalogSchema = Schema.Array(ApplianceSchema).pipe(
  Schema.filter((appliances) => {
    const seen = new Set<string>();
    for (const appliance of appliances) {
      if (seen.has(appliance.id)) {
        return `duplicate appliance id "${appliance.id}"`;
      }
      seen.add(appliance.id);
    }
    return true;
  }),
);

export const HouseholdFileSchema = Schema.Struct({
  system: SystemConfigSchema,
  appliances: ApplianceCatalogSchema,
});

export type Household = typeof HouseholdFileSchema.Type;
export type HouseholdFile = typeof HouseholdFileSchema.Encoded;

export const IrradiancePointSchema = Schema.Struct({
  timestamp: Schema.String, // ISO 8601, UTC
  ghiWm2: Schema.Number,
});

export type IrradiancePoint = typeof IrradiancePointSchema.Type;

export const CategoryPowerSchema = Schema.Struct({
  critical: Schema.Number,
  flexible: Schema.Number,
  deferrable: Schema.Number,
});

export type CategoryPower = typeof CategoryPowerSchema.Type;

export const TaskInstanceSchema = Schema.Struct({
  id: Schema.String,
  applianceId: Schema.String,
  name: Schema.String,
  category: LoadCategorySchema,
  powerKw: Schema.Number,
  earliestStartStep: Schema.Int,
  latestEndStep: Schema.Int, // exclusive
  durationSteps: Schema.Int,
  remainingSteps: Schema.Int,
  served: Schema.Boolean,
});

export type TaskInstance = typeof TaskInstanceSchema.Type;

export const DecisionSchema = Schema.Struct({
  timestamp: Schema.String,
  requested: CategoryPowerSchema,
  served: CategoryPowerSchema,
  servedTaskIds: Schema.Array(Schema.String),
  deferredTaskIds: Schema.Array(Schema.String),
  shedTaskIds: Schema.Array(Schema.String),
  netCommandKw: Schema.Number, // + charges the battery, - discharges it
  blackout: Schema.Boolean,
  riskLevel: RiskLevelSchema,
  reasonCodes: Schema.Array(ReasonCodeSchema),
});

export type Decision = typeof DecisionSchema.Type;

export const KpiSnapshotSchema = Schema.Struct({
  clsr: Schema.Number,
  blackoutMinutes: Schema.Number,
  sar: Schema.Number,
  solarUtilization: Schema.Number,
  batteryThroughputKwh: Schema.Number,
  curtailedKwh: Schema.Number,
});

export type KpiSnapshot = typeof KpiSnapshotSchema.Type;

export const StepRecordSchema = Schema.Struct({
  stepIndex: Schema.Int,
  day: Schema.Int,
  timestamp: Schema.String,
  pvKw: Schema.Number,
  soc: Schema.Number,
  requested: CategoryPowerSchema,
  served: CategoryPowerSchema,
  servedTaskIds: Schema.Array(Schema.String),
  deferredTaskIds: Schema.Array(Schema.String),
  shedTaskIds: Schema.Array(Schema.String),
  chargeKw: Schema.Number,
  dischargeKw: Schema.Number,
  curtailedKw: Schema.Number,
  blackout: Schema.Boolean,
  riskLevel: RiskLevelSchema,
  reasonCodes: Schema.Array(ReasonCodeSchema),
  kpis: KpiSnapshotSchema,
});

export type StepRecord = typeof StepRecordSchema.Type;

export const TimeWindowSchema = Schema.Struct({
  startStep: Schema.Int,
  endStep: Schema.Int, // inclusive
  start: Schema.String,
  end: Schema.String, // end of the last step
  label: Schema.Literal("surplus", "deficit"),
});

export type TimeWindow = typeof TimeWindowSchema.Type;

export const ApplianceStatusSchema = Schema.Literal("safe_to_run", "run_in_window", "avoid");

export type ApplianceStatus = typeof ApplianceStatusSchema.Type;

export const ApplianceAdvisorySchema = Schema.Struct({
  applianceId: Schema.String,
  name: Schema.String,
  category: LoadCategorySchema,
  status: ApplianceStatusSchema,
  window: Schema.NullOr(TimeWindowSchema),
  reason: Schema.String,
});

export type ApplianceAdvisory = typeof ApplianceAdvisorySchema.Type;

export const MarginTypeSchema = Schema.Literal("surplus", "tight", "deficit");

export type MarginType = typeof MarginTypeSchema.Type;

export const NominalPlanSchema = Schema.Struct({
  byCategoryKwh: CategoryPowerSchema,
  energy24hKwh: Schema.Number,
  energy12hKwh: Schema.Number,
  averagePowerKw: Schema.Number,
});

export type NominalPlan = typeof NominalPlanSchema.Type;

export const MatchingResultSchema = Schema.Struct({
  dayStart: Schema.String,
  timestepMinutes: Schema.Int,
  stepsPerDay: Schema.Int,
  totalSolarKwh: Schema.Number,
  totalDemandKwh: Schema.Number,
  nominalPlan: NominalPlanSchema,
  energyMarginKwh: Schema.Number,
  marginType: MarginTypeSchema,
  minStepMarginKw: Schema.Number,
  surplusWindows: Schema.Array(TimeWindowSchema),
  deficitWindows: Schema.Array(TimeWindowSchema),
  criticalFullyProtected: Schema.Boolean,
  criticalShortfallSteps: Schema.Array(Schema.Int),
  riskLevel: RiskLevelSchema,
  advisories: Schema.Array(ApplianceAdvisorySchema),
  statements: Schema.Array(Schema.String),
});

export type MatchingResult = typeof MatchingResultSchema.Type;
