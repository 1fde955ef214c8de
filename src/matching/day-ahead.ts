import { Effect } from "effect";
import { InsufficientDataError } from "../errors/insufficient-data.error.js";
import { totalPower } from "../load/load-demand-model.js";
import { computeNominalPlan } from "../load/nominal-plan.js";
import type { Appliance, MarginType, MatchingResult, RiskLevel, StepRecord, SystemConfig } from "../schema.js";
import { stepsPerDayFor } from "../validation.js";
import { computeAdvisories } from "./advisories.js";
import { formatStatements } from "./statements.js";
import { buildWindows } from "./windows.js";

export const MATCHING_THRESHOLDS = {
  marginToleranceKwh: 0.5, // daily margin within ±this is "tight"
  stepMarginToleranceKw: 0.5, // a single step below -this raises risk to medium
} as const;

const POWER_EPSILON_KW = 1e-9;

const classifyMargin = (marginKwh: number): MarginType => {
  if (marginKwh > MATCHING_THRESHOLDS.marginToleranceKwh) {
    return "surplus";
  }
  if (marginKwh < -MATCHING_THRESHOLDS.marginToleranceKwh) {
    return "deficit";
  }
  return "tight";
};

const assessDayRisk = (criticalFullyProtected: boolean, marginKwh: number, minStepMarginKw: number): RiskLevel => {
  if (!criticalFullyProtected || marginKwh < -MATCHING_THRESHOLDS.marginToleranceKwh) {
    return "high";
  }
  if (marginKwh < 0 || minStepMarginKw < -MATCHING_THRESHOLDS.stepMarginToleranceKw) {
    return "medium";
  }
  return "low";
};

/**
 * Reduces the first simulated day to a feasibility verdict: energy margin,
 * solar-only surplus and deficit windows, critical coverage, risk and
 * per-appliance advice. Depends on nothing but its arguments.
 */
export const computeDayAheadMatching = (
  records: readonly StepRecord[],
  appliances: readonly Appliance[],
  config: SystemConfig,
): Effect.Effect<MatchingResult, InsufficientDataError> =>
  Effect.gen(function* () {
    const stepsPerDay = stepsPerDayFor(config.timestepMinutes);

    if (records.length < stepsPerDay) {
      return yield* new InsufficientDataError({ required: stepsPerDay, received: records.length });
    }

    const day = records.slice(0, stepsPerDay);
    const dtHours = config.timestepMinutes / 60;
    const demandKw = day.map((record) => totalPower(record.requested));
    const stepMarginsKw = day.map((record, i) => record.pvKw - (demandKw[i] ?? 0));

    const totalSolarKwh = day.reduce((sum, record) => sum + record.pvKw * dtHours, 0);
    const totalDemandKwh = demandKw.reduce((sum, kw) => sum + kw * dtHours, 0);
    const energyMarginKwh = totalSolarKwh - totalDemandKwh;
    const minStepMarginKw = Math.min(...stepMarginsKw);

    // solar alone against demand; the battery is left out on purpose
    const surplusFlags = stepMarginsKw.map((margin) => margin >= 0);
    const timestamps = day.map((record) => record.timestamp);

    const criticalShortfallSteps = day
      .filter((record) => record.served.critical + POWER_EPSILON_KW < record.requested.critical)
      .map((record) => record.stepIndex);
    const criticalFullyProtected = criticalShortfallSteps.length === 0;

    const marginType = classifyMargin(energyMarginKwh);
    const surplusWindows = buildWindows(surplusFlags, "surplus", timestamps, config.timestepMinutes);
    const deficitWindows = buildWindows(surplusFlags.map((flag) => !flag), "deficit", timestamps, config.timestepMinutes);

    const result: Omit<MatchingResult, "statements"> = {
      dayStart: day[0]?.timestamp ?? "",
      timestepMinutes: config.timestepMinutes,
      stepsPerDay,
      totalSolarKwh,
      totalDemandKwh,
      nominalPlan: computeNominalPlan(appliances),
      energyMarginKwh,
      marginType,
      minStepMarginKw,
      surplusWindows,
      deficitWindows,
      criticalFullyProtected,
      criticalShortfallSteps,
      riskLevel: assessDayRisk(criticalFullyProtected, energyMarginKwh, minStepMarginKw),
      advisories: computeAdvisories(appliances, {
        timestepMinutes: config.timestepMinutes,
        marginType,
        criticalFullyProtected,
        surplusWindows,
        deficitWindows,
      }),
    };

    return { ...result, statements: formatStatements(result) };
  });
