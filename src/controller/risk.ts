import type { ReasonCode, RiskLevel } from "../schema.js";
import type { ForecastContext } from "./types.js";

export const RISK_THRESHOLDS = {
  lowSocBand: 0.05, // soc <= socMin + band -> LOW_SOC
  midSocBand: 0.12, // soc <= socMin + band -> MID_SOC
  lowOutlookFraction: 0.25, // horizon average below this share of capacity -> LOW_PV_FORECAST
} as const;

export const horizonAverageKw = (forecast: ForecastContext): number =>
  forecast.pvKw.length === 0
    ? 0
    : forecast.pvKw.reduce((sum, value) => sum + value, 0) / forecast.pvKw.length;

export const isOutlookLow = (forecast: ForecastContext): boolean =>
  horizonAverageKw(forecast) < RISK_THRESHOLDS.lowOutlookFraction * forecast.pvCapacityKw;

export type RiskInput = {
  readonly soc: number;
  readonly socMin: number;
  readonly outlookLow: boolean;
  readonly pvSurplus: boolean;
  readonly tasksHeldBack: boolean;
  readonly blackout: boolean;
  readonly policyReasons: readonly ReasonCode[];
};

export const assessRisk = (input: RiskInput): { riskLevel: RiskLevel; reasonCodes: ReasonCode[] } => {
  const reasonCodes: ReasonCode[] = [];
  let riskLevel: RiskLevel = "low";

  if (input.soc <= input.socMin + RISK_THRESHOLDS.lowSocBand) {
    riskLevel = "high";
    reasonCodes.push("LOW_SOC");
  } else if (input.soc <= input.socMin + RISK_THRESHOLDS.midSocBand) {
    riskLevel = "medium";
    reasonCodes.push("MID_SOC");
  }

  if (input.outlookLow) {
    reasonCodes.push("LOW_PV_FORECAST");
    riskLevel = riskLevel === "medium" ? "high" : riskLevel;
  }

  if (input.pvSurplus) {
    reasonCodes.push("PV_SURPLUS");
  }

  if (input.tasksHeldBack) {
    reasonCodes.push("DEFER_TASKS");
  }

  for (const reason of input.policyReasons) {
    if (!reasonCodes.includes(reason)) {
      reasonCodes.push(reason);
    }
  }

  if (input.blackout) {
    riskLevel = "high";
    reasonCodes.push("BLACKOUT");
  }

  return { riskLevel, reasonCodes };
};
